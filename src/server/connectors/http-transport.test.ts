import { describe, it, expect } from 'vitest';
import {
  AuthError,
  InvalidGrantError,
  ProviderRequestError,
  ProviderUnavailableError,
  RateLimitedError
} from '../utils/errors';
import { parseRetryAfter, readJsonResponse, type HttpResponse } from './http-transport';

function response(status: number, body = '{}', headers: Record<string, string> = {}): HttpResponse {
  return { status, body, headers };
}

describe('parseRetryAfter', () => {
  const now = Date.parse('2024-03-15T12:00:00.000Z');

  it('reads delay seconds', () => {
    expect(parseRetryAfter('30', now)).toBe(30_000);
  });

  it('reads an HTTP date relative to now', () => {
    expect(parseRetryAfter('Fri, 15 Mar 2024 12:00:10 GMT', now)).toBe(10_000);
    expect(parseRetryAfter('Fri, 15 Mar 2024 11:00:00 GMT', now)).toBe(0);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
    expect(parseRetryAfter('soon', now)).toBeUndefined();
  });
});

describe('readJsonResponse', () => {
  it('parses a successful body', () => {
    expect(readJsonResponse(response(200, '{"data":[1,2]}'))).toEqual({ data: [1, 2] });
  });

  it('maps 401 to an auth error', () => {
    expect(() => readJsonResponse(response(401))).toThrow(AuthError);
  });

  it('maps 429 to a rate limit carrying Retry-After', () => {
    try {
      readJsonResponse(response(429, '', { 'retry-after': '5' }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(5_000);
    }
  });

  it('maps server errors to an unavailable provider', () => {
    expect(() => readJsonResponse(response(503, 'maintenance'))).toThrow(ProviderUnavailableError);
  });

  it('maps invalid_grant to InvalidGrantError and other 4xx to a request error', () => {
    expect(() => readJsonResponse(response(400, '{"error":"invalid_grant"}'))).toThrow(InvalidGrantError);
    expect(() => readJsonResponse(response(404, 'not json'))).toThrow(ProviderRequestError);
  });

  it('treats a malformed success body as a provider failure', () => {
    expect(() => readJsonResponse(response(200, '<html>'))).toThrow('Provider returned a malformed JSON body');
  });
});
