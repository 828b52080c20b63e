/**
 * Admission Control - Error Types
 */

export class AdmissionError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'AdmissionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid rule set or engine settings. Raised while loading; the service
 * must not start (or must keep its previous rules on reload).
 */
export class ConfigError extends AdmissionError {
  public readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message, 500, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export type BackendOperation = 'ban-check' | 'window-check' | 'record-offense' | 'clear-ban';

/**
 * The counter store failed, rejected the call or did not answer in time.
 */
export class BackendError extends AdmissionError {
  public readonly operation: BackendOperation;
  public override readonly cause: unknown;

  constructor(operation: BackendOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Counter store ${operation} failed: ${detail}`, 503, 'BACKEND_ERROR', true);
    this.name = 'BackendError';
    this.operation = operation;
    this.cause = cause;
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything a store call threw; BackendErrors pass through unchanged.
 */
export function asBackendError(operation: BackendOperation, error: unknown): BackendError {
  return error instanceof BackendError ? error : new BackendError(operation, error);
}
