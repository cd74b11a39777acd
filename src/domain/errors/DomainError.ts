/**
 * Base class for expected domain outcomes.
 *
 * `code` is the stable machine-readable identifier clients see in
 * `error.code` of an API error response.
 */
export class DomainError extends Error {
  public readonly code: string;

  public constructor(code: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}
