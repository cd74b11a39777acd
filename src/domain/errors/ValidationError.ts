import { DomainError } from './DomainError';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when input fails domain validation. Raised before any store call,
 * so a ValidationError never leaves a partial write behind.
 */
export class ValidationError extends DomainError {
  public readonly details?: ValidationIssue[];

  public constructor(message: string, details?: ValidationIssue[]) {
    super('VALIDATION_FAILED', message);
    this.details = details;
  }

  /**
   * Shorthand for a single-field failure
   */
  public static forField(path: string, message: string): ValidationError {
    return new ValidationError(message, [{ path, message }]);
  }
}
