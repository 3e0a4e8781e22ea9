/**
 * Raised when a scoring primitive is called with bounds it cannot work with
 * (slope score min/max, precision/recall outside [0, 1], malformed matrices)
 */
export class InvalidRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

/**
 * Raised when an input record is missing a required field or holds a value
 * of the wrong shape. Also covers scorer preconditions on the record set
 * (duplicate same-date count records, unknown scopes or categories).
 */
export class RecordValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'RecordValidationError';
  }
}

/**
 * Render an unknown thrown value for logging
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
