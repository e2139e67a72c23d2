import { AxiosError } from 'axios';
import { BookingHttpClient } from './booking-http.client';
import { FakeBackend } from '../testing/fake-backend';

describe('BookingHttpClient', () => {
  const url = 'https://cal.test/v2/event-types';
  let backend: FakeBackend;
  let client: BookingHttpClient;

  beforeEach(() => {
    backend = new FakeBackend();
    client = new BookingHttpClient(backend.http, { baseDelayMs: 0, maxAttempts: 3 });
  });

  it('returns a 2xx answer after one attempt', async () => {
    backend.on('GET', url, { status: 200, data: { data: [] } });

    const outcome = await client.request({ method: 'GET', url });

    expect(outcome).toEqual({ ok: true, status: 200, data: { data: [] }, attempts: 1 });
  });

  it('does not retry a 4xx answer', async () => {
    backend.on('POST', url, { status: 409, data: { message: 'taken' } });

    const outcome = await client.request({ method: 'POST', url, body: {} });

    expect(outcome.status).toBe(409);
    expect(outcome.ok).toBe(false);
    expect(backend.calls('POST', url)).toHaveLength(1);
  });

  it('retries 5xx answers until one succeeds', async () => {
    backend.on('GET', url, { status: 503 }, { status: 502 }, { status: 200, data: { ok: 1 } });

    const outcome = await client.request({ method: 'GET', url });

    expect(outcome).toEqual({ ok: true, status: 200, data: { ok: 1 }, attempts: 3 });
  });

  it('gives up after the attempt ceiling', async () => {
    backend.on('GET', url, { status: 500 });

    const outcome = await client.request({ method: 'GET', url });

    expect(outcome.status).toBe(500);
    expect(outcome.attempts).toBe(3);
    expect(backend.calls('GET', url)).toHaveLength(3);
  });

  it('turns transport failures into an outcome instead of throwing', async () => {
    backend.on('GET', url, new AxiosError('socket hang up', 'ECONNRESET'));

    const outcome = await client.request({ method: 'GET', url });

    expect(outcome.ok).toBe(false);
    expect(outcome.status).toBe(0);
    expect(outcome.transportError).toBe('ECONNRESET: socket hang up');
    expect(backend.calls('GET', url)).toHaveLength(3);
  });

  it('serves repeated GETs with the same parameters from cache', async () => {
    backend.on('GET', url, { status: 200, data: { data: [] } });

    await client.request({ method: 'GET', url, params: { b: 2, a: 1 } });
    await client.request({ method: 'GET', url, params: { a: 1, b: 2 } });
    await client.request({ method: 'GET', url, params: { a: 1, b: 3 } });

    expect(backend.calls('GET', url)).toHaveLength(2);
  });

  it('does not cache failed reads', async () => {
    backend.on('GET', url, { status: 404 });

    await client.request({ method: 'GET', url });
    await client.request({ method: 'GET', url });

    expect(backend.calls('GET', url)).toHaveLength(2);
  });

  it('clears the cache after a successful write', async () => {
    backend.on('GET', url, { status: 200, data: [] });
    backend.on('POST', url, { status: 201, data: {} });

    await client.request({ method: 'GET', url });
    await client.request({ method: 'POST', url, body: {} });
    await client.request({ method: 'GET', url });

    expect(backend.calls('GET', url)).toHaveLength(2);
  });
});
