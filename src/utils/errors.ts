/**
 * Application error hierarchy. Each subclass carries the HTTP status and a stable
 * machine-readable code; the error handler middleware renders them as
 * `{ error: { code, message } }`.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode = 500, code = "INTERNAL_ERROR", options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Caller-supplied value outside its valid range. Raised before any mutation. */
export class InvalidInputError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 400, "INVALID_INPUT");
    this.field = field;
  }
}

/**
 * A computed value (BMR, TDEE) fell outside its sanity band. Usually a unit mix-up
 * upstream; callers should re-validate the input. Never clamped.
 */
export class CalculationOutOfRangeError extends AppError {
  public readonly quantity: string;
  public readonly value: number;

  constructor(quantity: string, value: number, min: number, max: number) {
    super(`${quantity} ${value} is outside the expected range [${min}, ${max}]`, 422, "CALCULATION_OUT_OF_RANGE");
    this.quantity = quantity;
    this.value = value;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404, "NOT_FOUND");
  }
}

/** Wraps a driver error raised by a storage collaborator. */
export class StorageFailureError extends AppError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage failure during ${operation}: ${detail}`, 503, "STORAGE_FAILURE", { cause });
  }
}
