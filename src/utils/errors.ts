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

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message, true);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class WhatsAppError extends AppError {
  constructor(
    public provider: string,
    public operation: string,
    public originalError: Error,
    public details: string | null = null
  ) {
    super(502, `WhatsApp provider error: ${provider}.${operation}`, true);
    Object.setPrototypeOf(this, WhatsAppError.prototype);
  }
}

/** Normalizes anything caught in a `catch` clause into an Error. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
