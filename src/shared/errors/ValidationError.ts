/**
 * Error for malformed conditions, rules and configuration values.
 * Raised at construction time only; evaluators assume well-formed input.
 */
import FolderSenseError, { ErrorCodes } from './FolderSenseError';

class ValidationError extends FolderSenseError {
  field: string;
  reason: string;
  value: unknown;

  /**
   * @param field - Field that failed validation
   * @param reason - Why validation failed
   * @param value - The invalid value
   */
  constructor(field: string, reason: string, value: unknown = null) {
    super(
      `Validation failed for '${field}': ${reason}`,
      ErrorCodes.VALIDATION_FAILED,
      {
        field,
        reason,
        value: value !== null && value !== undefined ? String(value) : null,
      },
      `Invalid ${field}: ${reason}`,
      [
        {
          label: 'Fix input',
          action: 'fixInput',
          description: `Correct the ${field} and try again`,
        },
      ],
    );
    this.field = field;
    this.reason = reason;
    this.value = value;
  }
}

export default ValidationError;
