import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  const base = { OPENAI_API_KEY: 'test-openai-key', CALCOM_API_KEY: 'test-calcom-key' };

  it('applies defaults for optional settings', () => {
    const env = validateEnv(base);

    expect(env.OPENAI_MODEL).toBe('gpt-4-turbo-preview');
    expect(env.CALCOM_V2_BASE_URL).toBe('https://api.cal.com/v2');
    expect(env.CALCOM_V1_BASE_URL).toBe('https://api.cal.com/v1');
    expect(env.REFERENCE_TIMEZONE).toBe('America/New_York');
    expect(env.PORT).toBe(3000);
    expect(env.HTTP_TIMEOUT_MS).toBe(15000);
    expect(env.CALCOM_EVENT_TYPE_ID).toBeUndefined();
    expect(env.TELEGRAM_BOT_TOKEN).toBeUndefined();
  });

  it('coerces the pinned event type id', () => {
    expect(validateEnv({ ...base, CALCOM_EVENT_TYPE_ID: '42' }).CALCOM_EVENT_TYPE_ID).toBe(42);
    expect(validateEnv({ ...base, CALCOM_EVENT_TYPE_ID: '' }).CALCOM_EVENT_TYPE_ID).toBeUndefined();
  });

  it('treats blank optional strings as unset', () => {
    expect(validateEnv({ ...base, TELEGRAM_BOT_TOKEN: '  ' }).TELEGRAM_BOT_TOKEN).toBeUndefined();
  });

  it('rejects a missing booking credential', () => {
    expect(() => validateEnv({ OPENAI_API_KEY: 'test-openai-key' })).toThrow(
      'Invalid environment configuration: CALCOM_API_KEY: Required',
    );
  });
});
