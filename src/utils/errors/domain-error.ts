/**
 * Error taxonomy shared by every core operation.
 *
 * The HTTP layer maps each kind to a status code (see DomainErrorFilter);
 * nothing below the controllers knows about HTTP.
 */
export enum ErrorKind {
  InvalidInput = 'InvalidInput',
  NotFound = 'NotFound',
  Forbidden = 'Forbidden',
  Conflict = 'Conflict',
  StorageUnavailable = 'StorageUnavailable',
  Internal = 'Internal',
}

/**
 * DomainError - typed failure raised by domain services and adapters
 *
 * `message` is caller-facing and must never carry driver text, blob URLs
 * or stack traces. `details` holds safe structured context (field names,
 * limits) for the response body.
 */
export class DomainError extends Error {
  readonly kind: ErrorKind;

  readonly details?: Record<string, unknown>;

  readonly timestamp: string;

  constructor(
    kind: ErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
    this.kind = kind;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, DomainError.prototype);
  }

  static invalidInput(
    message: string,
    details?: Record<string, unknown>,
  ): DomainError {
    return new DomainError(ErrorKind.InvalidInput, message, details);
  }

  static notFound(entity: string): DomainError {
    return new DomainError(ErrorKind.NotFound, `${entity} not found`);
  }

  static forbidden(message: string): DomainError {
    return new DomainError(ErrorKind.Forbidden, message);
  }

  static conflict(message: string): DomainError {
    return new DomainError(ErrorKind.Conflict, message);
  }

  static storageUnavailable(message: string): DomainError {
    return new DomainError(ErrorKind.StorageUnavailable, message);
  }

  static internal(message = 'Internal error'): DomainError {
    return new DomainError(ErrorKind.Internal, message);
  }

  static is(error: unknown, kind?: ErrorKind): error is DomainError {
    return (
      error instanceof DomainError && (kind === undefined || error.kind === kind)
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.kind,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
      timestamp: this.timestamp,
    };
  }
}
