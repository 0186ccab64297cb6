/**
 * Error taxonomy.
 *
 * Every failure the orchestrator can surface is a ModelGateError with
 * a `kind`. The kind decides retry (only `transient`), the compare slot
 * descriptor and the HTTP status.
 */

export type ErrorKind =
  | 'validation'
  | 'provider_not_configured'
  | 'model_not_found'
  | 'auth'
  | 'transient'
  | 'backend'
  | 'storage'
  | 'cancelled';

export interface ErrorDescriptor {
  kind: ErrorKind | 'unknown';
  message: string;
}

export class ModelGateError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly provider?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ModelGateError';
  }
}

/** Malformed or contradictory request. Never dispatched. */
export class ValidationError extends ModelGateError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'validation');
    this.name = 'ValidationError';
  }
}

export class ProviderNotConfiguredError extends ModelGateError {
  constructor(provider: string) {
    super(`Provider "${provider}" is not configured`, 'provider_not_configured', provider);
    this.name = 'ProviderNotConfiguredError';
  }
}

/** `status` is set when the backend itself answered that the model is missing. */
export class ModelNotFoundError extends ModelGateError {
  public readonly status?: number;

  constructor(model: string, provider: string, options?: { cause?: unknown; status?: number }) {
    super(`Model "${model}" not found on ${provider}`, 'model_not_found', provider, { cause: options?.cause });
    this.name = 'ModelNotFoundError';
    this.status = options?.status;
  }
}

export class AuthError extends ModelGateError {
  constructor(message: string, provider: string, options?: { cause?: unknown }) {
    super(message, 'auth', provider, options);
    this.name = 'AuthError';
  }
}

/** Network failure, timeout, rate limit or 5xx. The only retryable kind. */
export class TransientError extends ModelGateError {
  constructor(message: string, provider?: string, options?: { cause?: unknown }) {
    super(message, 'transient', provider, options);
    this.name = 'TransientError';
  }
}

/** Backend rejected the call for a reason retrying won't fix (e.g. HTTP 400). */
export class BackendError extends ModelGateError {
  constructor(
    message: string,
    provider: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'backend', provider, options);
    this.name = 'BackendError';
  }
}

export class StorageError extends ModelGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'storage', undefined, options);
    this.name = 'StorageError';
  }
}

export class CancelledError extends ModelGateError {
  constructor(message = 'Request cancelled', provider?: string) {
    super(message, 'cancelled', provider);
    this.name = 'CancelledError';
  }
}

export function isModelGateError(error: unknown): error is ModelGateError {
  return error instanceof ModelGateError;
}

export function isTransientError(error: unknown): boolean {
  return isModelGateError(error) && error.kind === 'transient';
}

export function toErrorDescriptor(error: unknown): ErrorDescriptor {
  if (isModelGateError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return {
    kind: 'unknown',
    message: error instanceof Error ? error.message : String(error),
  };
}
