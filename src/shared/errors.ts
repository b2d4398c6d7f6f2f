/**
 * Agrarian BNPL - Error Types
 */

export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * ValidationError - Thrown at the API boundary for malformed applicants.
 * The engines never raise it.
 */
export class ValidationError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}
