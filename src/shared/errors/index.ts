/**
 * Error system exports
 * Provides typed errors with context, user messages, and recovery actions
 */
import FolderSenseError, { ErrorCodes, type ErrorCode, type RecoveryAction } from './FolderSenseError';
import ValidationError from './ValidationError';
import TrainingError from './TrainingError';
import PredictionError from './PredictionError';

function isFolderSenseError(error: unknown): error is FolderSenseError {
  return error instanceof FolderSenseError;
}

/**
 * Safely get error message from an unknown error type
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Normalize an unknown thrown value to a FolderSense error
 */
function normalizeError(error: unknown): FolderSenseError {
  if (isFolderSenseError(error)) {
    return error;
  }

  return new FolderSenseError(getErrorMessage(error) || 'An unknown error occurred', ErrorCodes.UNKNOWN_ERROR, {
    originalError: error instanceof Error ? error.name : typeof error,
    stack: error instanceof Error ? error.stack : undefined,
  });
}

export {
  FolderSenseError,
  ErrorCodes,
  type ErrorCode,
  type RecoveryAction,
  ValidationError,
  TrainingError,
  PredictionError,
  isFolderSenseError,
  normalizeError,
  getErrorMessage,
};
