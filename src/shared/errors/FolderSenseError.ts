/**
 * Standard error codes for FolderSense errors
 */
export const ErrorCodes = {
  // Validation errors
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Model lifecycle
  TRAINING_FAILED: 'TRAINING_FAILED',
  MODEL_NOT_FOUND: 'MODEL_NOT_FOUND',
  ARTIFACT_INVALID: 'ARTIFACT_INVALID',

  // Inference
  PREDICTION_FAILED: 'PREDICTION_FAILED',

  // Storage
  HISTORY_STORE_FAILED: 'HISTORY_STORE_FAILED',

  // Unknown
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface RecoveryAction {
  label: string;
  action: string;
  description: string;
}

/**
 * Base error class for all FolderSense errors
 * Carries a code, structured context, a user-facing message and recovery actions
 */
export class FolderSenseError extends Error {
  code: ErrorCode;
  context: Record<string, unknown>;
  userMessage: string;
  recoveryActions: RecoveryAction[];
  timestamp: string;

  /**
   * @param message - Technical error message for developers
   * @param code - Error code (e.g., 'TRAINING_FAILED')
   * @param context - Additional context (field names, model versions, etc.)
   * @param userMessage - User-friendly message
   * @param recoveryActions - Suggested actions for user
   */
  constructor(
    message: string,
    code: ErrorCode,
    context: Record<string, unknown> = {},
    userMessage: string | null = null,
    recoveryActions: RecoveryAction[] = [],
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.userMessage = userMessage || message;
    this.recoveryActions = recoveryActions;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON for serialization
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      userMessage: this.userMessage,
      recoveryActions: this.recoveryActions,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Get structured log entry
   */
  toLogEntry(level = 'error') {
    return {
      level,
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

export default FolderSenseError;
