import { z } from 'zod';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional(),
);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4-turbo-preview'),
  CALCOM_API_KEY: z.string().min(1, 'CALCOM_API_KEY is required'),
  CALCOM_V2_BASE_URL: z.string().url().default('https://api.cal.com/v2'),
  CALCOM_V1_BASE_URL: z.string().url().default('https://api.cal.com/v1'),
  CALCOM_EVENT_TYPE_ID: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().optional(),
  ),
  REFERENCE_TIMEZONE: z.string().default('America/New_York'),
  // Test-only: pin "today" to a YYYY-MM-DD date. A malformed value falls back to the clock.
  ASSISTANT_TODAY: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  PORT: z.coerce.number().int().positive().default(3000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(86400000),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
