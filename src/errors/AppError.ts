/**
 * Base class for all errors raised by the ETL
 *
 * `code` is a stable machine-readable identifier used in logs and metrics.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
