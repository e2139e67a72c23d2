import { BookingHttpClient, HttpMethod, HttpOutcome, HttpRequest } from './booking-http.client';

export type GenerationName = 'v2' | 'v1';

/** cal-api-version header values the v2 endpoints are pinned to. */
export const V2_API_VERSIONS = {
  eventTypes: '2024-06-14',
  slots: '2024-09-04',
  bookings: '2024-08-13',
} as const;

export interface CalComCredentials {
  apiKey: string;
  v2BaseUrl: string;
  v1BaseUrl: string;
}

interface RequestParts {
  params?: Record<string, string | number | undefined>;
  body?: unknown;
}

/**
 * Request builders for both API generations. v2 authenticates with a bearer
 * token and a version header; v1 takes the key as an `apiKey` query parameter.
 */
export class CalComGenerations {
  constructor(private readonly credentials: CalComCredentials) {}

  v2(method: HttpMethod, path: string, apiVersion: string, parts: RequestParts = {}): HttpRequest {
    return {
      method,
      url: `${trimSlash(this.credentials.v2BaseUrl)}${path}`,
      params: parts.params,
      body: parts.body,
      headers: {
        Authorization: `Bearer ${this.credentials.apiKey}`,
        'cal-api-version': apiVersion,
        'Content-Type': 'application/json',
      },
    };
  }

  v1(method: HttpMethod, path: string, parts: RequestParts = {}): HttpRequest {
    return {
      method,
      url: `${trimSlash(this.credentials.v1BaseUrl)}${path}`,
      params: { ...parts.params, apiKey: this.credentials.apiKey },
      body: parts.body,
      headers: { 'Content-Type': 'application/json' },
    };
  }
}

export type OutcomeClass = 'success' | 'client_error' | 'transient';

function classifyOutcome(outcome: HttpOutcome): OutcomeClass {
  if (outcome.ok) return 'success';
  if (outcome.status >= 400 && outcome.status < 500) return 'client_error';
  return 'transient';
}

export interface GenerationStep<T> {
  generation: GenerationName;
  build(): HttpRequest;
  parse(data: unknown): T;
}

export type FallbackResult<T> =
  | { kind: 'success'; value: T; generation: GenerationName; status: number }
  | { kind: 'client_error'; generation: GenerationName; status: number; data: unknown }
  | { kind: 'transient'; generation: GenerationName; status: number; data: unknown; transportError?: string };

/**
 * Walks the generation steps in order. A success or a client error ends the
 * walk; only transient failures move on to the next generation.
 */
export async function attemptWithFallback<T>(
  client: BookingHttpClient,
  steps: GenerationStep<T>[],
): Promise<FallbackResult<T>> {
  if (steps.length === 0) {
    throw new Error('attemptWithFallback needs at least one generation step');
  }
  let last: FallbackResult<T> | undefined;
  for (const step of steps) {
    const outcome = await client.request(step.build());
    const verdict = classifyOutcome(outcome);
    if (verdict === 'success') {
      return { kind: 'success', value: step.parse(outcome.data), generation: step.generation, status: outcome.status };
    }
    if (verdict === 'client_error') {
      return { kind: 'client_error', generation: step.generation, status: outcome.status, data: outcome.data };
    }
    last = {
      kind: 'transient',
      generation: step.generation,
      status: outcome.status,
      data: outcome.data,
      transportError: outcome.transportError,
    };
  }
  // steps is non-empty, so the loop assigned `last`
  return last ?? { kind: 'transient', generation: steps[steps.length - 1].generation, status: 0, data: undefined };
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
