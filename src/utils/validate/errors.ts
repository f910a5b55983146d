/**
 * Raised whenever a scenario, a single field or a rule lookup is rejected.
 * `field` is the dotted path of the offending input (e.g. `commutation.amount`).
 */
export class ValidationError extends Error {
  /** Dotted path of the rejected field */
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
