import type { ZodError } from 'zod';

export interface FieldViolation {
  /** Location of the offending value, starting with the request part (`body`). */
  loc: Array<string | number>;
  msg: string;
  type: string;
}

/**
 * Raised when a request payload does not match its schema. Kept outside the
 * LLMError hierarchy: it never reaches the inference service.
 */
export class RequestValidationError extends Error {
  constructor(public readonly details: FieldViolation[]) {
    super(`Request validation failed with ${details.length} violation(s)`);
    this.name = 'RequestValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static fromZodError(error: ZodError, location = 'body'): RequestValidationError {
    return new RequestValidationError(
      error.issues.map((issue) => ({
        loc: [location, ...issue.path],
        msg: issue.message,
        type: issue.code,
      })),
    );
  }
}
