/**
 * Domain Errors
 *
 * Error taxonomy shared by the connector, sync and categorization layers.
 * Transport failures are translated into these at the provider boundary.
 */

import { AppError } from '../middleware/error-handler';

export class AuthError extends AppError {
  constructor(message = 'Access token missing, expired or rejected') {
    super(401, message, 'AUTH_ERROR');
  }
}

export class InvalidGrantError extends AppError {
  constructor(message = 'Authorization grant is invalid or expired') {
    super(400, message, 'INVALID_GRANT');
  }
}

export class ProviderNotFoundError extends AppError {
  constructor(providerCode: string) {
    super(404, `Bank provider not found or inactive: ${providerCode}`, 'PROVIDER_NOT_FOUND');
  }
}

export class ProviderUnavailableError extends AppError {
  constructor(message = 'Bank provider is unavailable') {
    super(502, message, 'PROVIDER_UNAVAILABLE', true);
  }
}

/**
 * Non-retryable provider rejection (4xx other than 401/429).
 */
export class ProviderRequestError extends AppError {
  public readonly providerStatus: number;

  constructor(providerStatus: number, message: string) {
    super(502, message, 'PROVIDER_REQUEST_ERROR');
    this.providerStatus = providerStatus;
  }
}

export class RateLimitedError extends AppError {
  public readonly retryAfterMs?: number;

  constructor(retryAfterMs?: number) {
    super(429, 'Bank provider rate limit reached', 'RATE_LIMITED', true);
    this.retryAfterMs = retryAfterMs;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, 'VALIDATION_ERROR');
  }
}

export class SyncAlreadyRunningError extends AppError {
  constructor(connectionId: string) {
    super(409, `A sync is already running for connection ${connectionId}`, 'SYNC_ALREADY_RUNNING');
  }
}

export class SyncTimeoutError extends AppError {
  constructor(budgetMs: number) {
    super(504, `Sync exceeded its ${budgetMs}ms budget`, 'SYNC_TIMEOUT', true);
  }
}

export class SyncFailedError extends AppError {
  constructor(message: string) {
    super(500, message, 'SYNC_FAILED');
  }
}

export type CategorizationStage = 'rule' | 'classifier';

/**
 * Internal signal that a categorization stage produced nothing usable.
 * Caught inside the pipeline, never surfaced to callers. `cause` is set
 * when the stage failed rather than declined.
 */
export class CategorizationFallback extends Error {
  constructor(readonly stage: CategorizationStage, reason: string, options?: { cause?: unknown }) {
    super(`${stage}: ${reason}`, options);
    this.name = 'CategorizationFallback';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AppError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
