import { AppError } from './AppError';

/**
 * Validation Error
 * Thrown when run parameters, an upstream payload or a persisted row is malformed
 */
export class ValidationError extends AppError {
  public readonly errors?: unknown;

  constructor(message: string, errors?: unknown) {
    super(message, 'VALIDATION_FAILED');
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
