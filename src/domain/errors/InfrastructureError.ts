/**
 * InfrastructureError
 *
 * Thrown when infrastructure-level operations fail, including:
 * - Database connection failures
 * - Unexpected driver or SQL errors
 * - Pool lifecycle misuse (acquiring from a pool that is not open)
 *
 * This error type allows the application layer to handle infrastructure
 * failures without knowing the specific infrastructure technology in use.
 * It is never retried automatically.
 */
export class InfrastructureError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InfrastructureError';

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}
