export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ChannelError extends AppError {
  constructor(
    public provider: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(502, `Messaging provider error: ${provider}.${operation}`, true);
    Object.setPrototypeOf(this, ChannelError.prototype);
  }
}

/** Stored data that no longer matches its schema. Callers treat it as fail-closed. */
export class DataIntegrityError extends Error {
  constructor(
    public entity: string,
    public key: string,
    detail: string
  ) {
    super(`${entity} ${key} failed validation: ${detail}`);
    Object.setPrototypeOf(this, DataIntegrityError.prototype);
  }
}

export class UnrecognizedRoutingTargetError extends Error {
  constructor(public target: string) {
    super(`Unknown routing target: ${target}`);
    Object.setPrototypeOf(this, UnrecognizedRoutingTargetError.prototype);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return toError(error).message;
}
