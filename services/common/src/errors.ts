import { isAxiosError } from 'axios';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>, code = 'validation_failed') {
    super(message, { statusCode: 400, code, details });
    this.name = 'ValidationError';
  }
}

/** Retryable failure of an external dependency (timeouts, resets, 429, 5xx). */
export class ExternalTransientError extends ServiceError {
  constructor(message: string, options: Omit<ServiceErrorOptions, 'statusCode'> = {}) {
    super(message, { statusCode: 503, code: options.code ?? 'external_transient', details: options.details, cause: options.cause });
    this.name = 'ExternalTransientError';
  }
}

/** The dependency rejected the request itself; retrying would not help. */
export class ExternalPermanentError extends ServiceError {
  constructor(message: string, options: Omit<ServiceErrorOptions, 'statusCode'> = {}) {
    super(message, { statusCode: 502, code: options.code ?? 'external_permanent', details: options.details, cause: options.cause });
    this.name = 'ExternalPermanentError';
  }
}

export class CacheWriteError extends ServiceError {
  constructor(message: string, options: Omit<ServiceErrorOptions, 'statusCode' | 'code'> = {}) {
    super(message, { statusCode: 500, code: 'cache_write_failed', details: options.details, cause: options.cause });
    this.name = 'CacheWriteError';
  }
}

export class SessionExpiredError extends ServiceError {
  constructor(sessionId: string) {
    super(`Search session ${sessionId} has expired or does not exist.`, {
      statusCode: 410,
      code: 'session_expired',
      details: { sessionId }
    });
    this.name = 'SessionExpiredError';
  }
}

export class PipelineCancelledError extends ServiceError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Pipeline cancelled: ${reason}`, { statusCode: 499, code: 'cancelled', details });
    this.name = 'PipelineCancelledError';
  }
}

/** Wraps an unexpected failure so it carries the taxonomy's fields. */
export function internalError(message: string, details?: Record<string, unknown>): ServiceError {
  return new ServiceError(message, { statusCode: 500, code: 'internal', details });
}

const TRANSIENT_NETWORK_CODES = new Set(['ECONNABORTED', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE']);

export function isTransientError(error: unknown): boolean {
  if (error instanceof ExternalTransientError) {
    return true;
  }
  if (error instanceof ServiceError) {
    return false;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }
  return false;
}

/**
 * Maps an axios (or network) failure onto the external error taxonomy.
 * Errors that are already part of the taxonomy pass through unchanged.
 */
export function classifyHttpError(error: unknown, context: { dependency: string; details?: Record<string, unknown> }): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    const details = { ...context.details, dependency: context.dependency, status, code: error.code };

    // no response at all: the request never completed
    if (status === undefined) {
      const reason = error.code && TRANSIENT_NETWORK_CODES.has(error.code) ? 'request failed' : 'unreachable';
      return new ExternalTransientError(`${context.dependency} ${reason}: ${error.message}`, { details, cause: error });
    }

    if (status === 429 || status >= 500) {
      return new ExternalTransientError(`${context.dependency} responded with ${status}.`, { details, cause: error });
    }

    return new ExternalPermanentError(`${context.dependency} rejected the request with ${status}.`, { details, cause: error });
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return new ExternalTransientError(`${context.dependency} timed out.`, {
      details: { ...context.details, dependency: context.dependency },
      cause: error
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ExternalPermanentError(`${context.dependency} failed: ${message}`, {
    details: { ...context.details, dependency: context.dependency },
    cause: error
  });
}
