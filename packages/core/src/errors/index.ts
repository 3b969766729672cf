/**
 * Base error types shared across packages.
 *
 * Every error carries a stable `code` that callers can switch on, and an
 * optional `cause` holding the lower-level error it wraps.
 */

export interface DomainErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown> | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options?: DomainErrorOptions) {
    super(message, options && 'cause' in options ? { cause: options.cause } : undefined);
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Raised when an asynchronous operation is cancelled through an AbortSignal.
 */
export class AbortError extends Error {
  constructor(message = 'The operation was aborted', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AbortError';
  }
}
