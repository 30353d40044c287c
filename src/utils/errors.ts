/**
 * Application error taxonomy. Each error carries the HTTP status the
 * transport layer answers with.
 */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string) {
    super(message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

export type ProviderFailureKind = 'request' | 'timeout' | 'unavailable';

/**
 * Failure of an external provider (speech, assistant, synthesis, rooms)
 */
export class ProviderError extends AppError {
  readonly provider: string;
  readonly kind: ProviderFailureKind;

  constructor(provider: string, kind: ProviderFailureKind, message: string, options?: ErrorOptions) {
    super(message, 500, options);
    this.provider = provider;
    this.kind = kind;
  }

  /**
   * Wrap an unknown thrown value, keeping an existing ProviderError as is
   */
  static from(provider: string, error: unknown): ProviderError {
    if (error instanceof ProviderError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(provider, 'request', message, { cause: error });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
