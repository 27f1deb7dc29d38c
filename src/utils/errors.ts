/**
 * Errors carried up to the HTTP layer. Every error response has the shape
 * { error: string, code?: string, details?: unknown }.
 */

export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** 400 */
export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = 'VALIDATION_ERROR';
}

/** 404 */
export class NotFoundError extends AppError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';
}

/** 503: the server cannot reach a service because it is not configured. */
export class ConfigurationError extends AppError {
  readonly status = 503;
  readonly code = 'NOT_CONFIGURED';
}

/**
 * An error response (or no response) from a third-party API. `status` is what
 * the client gets back: the remote status for 4xx, 429 for quota exhaustion,
 * 502 for remote 5xx and network failures.
 */
export class ExternalServiceError extends AppError {
  readonly status: number;
  readonly code: string;

  constructor(
    readonly service: string,
    message: string,
    options: { status?: number; code?: string; remoteStatus?: number } = {}
  ) {
    super(message, options.remoteStatus !== undefined ? { remoteStatus: options.remoteStatus } : undefined);
    this.status = options.status ?? 502;
    this.code = options.code ?? 'EXTERNAL_SERVICE_ERROR';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** True for a Node filesystem error with the given code (ENOENT, EISDIR, ...). */
export function isErrnoCode(e: unknown, code: string): boolean {
  return e instanceof Error && 'code' in e && e.code === code;
}
