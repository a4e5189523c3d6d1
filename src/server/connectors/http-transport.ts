/**
 * HTTP Transport
 *
 * Mutual-TLS HTTP client for the Open Banking network, plus translation of
 * HTTP failures into domain errors. The transport is an interface so the
 * connector can be exercised without a network.
 */

import { readFileSync } from 'fs';
import { Agent, request } from 'undici';
import {
  AuthError,
  InvalidGrantError,
  ProviderRequestError,
  ProviderUnavailableError,
  RateLimitedError
} from '../utils/errors';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string | undefined>;
  body: string;
}

export interface HttpTransport {
  send(req: HttpRequest): Promise<HttpResponse>;
}

export interface MtlsOptions {
  certPath?: string;
  keyPath?: string;
  caPath?: string;
  timeoutMs: number;
}

export class MtlsTransport implements HttpTransport {
  private readonly agent: Agent;

  constructor(options: MtlsOptions) {
    this.agent = new Agent({
      connect: {
        cert: options.certPath ? readFileSync(options.certPath) : undefined,
        key: options.keyPath ? readFileSync(options.keyPath) : undefined,
        ca: options.caPath ? readFileSync(options.caPath) : undefined
      },
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs
    });
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await request(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: req.signal,
        dispatcher: this.agent
      });

      const headers: Record<string, string | undefined> = {};
      for (const [name, value] of Object.entries(response.headers)) {
        headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
      }
      return { status: response.statusCode, headers, body: await response.body.text() };
    } catch (error) {
      if (req.signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[HttpTransport] ${req.method} ${req.url} failed:`, message);
      throw new ProviderUnavailableError(`Provider request failed: ${message}`);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

/**
 * Parses a Retry-After header given in seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function readOAuthError(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
      return parsed.error;
    }
  } catch {
    // Not JSON; the status code decides
  }
  return undefined;
}

/**
 * Throws the domain error for a non-2xx response; returns the parsed JSON body otherwise.
 */
export function readJsonResponse(response: HttpResponse): unknown {
  const { status } = response;

  if (status === 401) {
    throw new AuthError('Provider rejected the access token');
  }
  if (status === 429) {
    throw new RateLimitedError(parseRetryAfter(response.headers['retry-after']));
  }
  if (status >= 500) {
    throw new ProviderUnavailableError(`Provider responded with HTTP ${status}`);
  }
  if (status >= 400) {
    if (readOAuthError(response.body) === 'invalid_grant') {
      throw new InvalidGrantError();
    }
    throw new ProviderRequestError(status, `Provider rejected the request with HTTP ${status}`);
  }

  try {
    return JSON.parse(response.body);
  } catch {
    throw new ProviderUnavailableError('Provider returned a malformed JSON body');
  }
}
