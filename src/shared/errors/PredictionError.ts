/**
 * Error for inference failures inside the prediction gate
 */
import FolderSenseError, { ErrorCodes } from './FolderSenseError';

class PredictionError extends FolderSenseError {
  modelVersion: string;

  constructor(modelVersion: string, reason: string) {
    super(
      `Prediction with model ${modelVersion} failed: ${reason}`,
      ErrorCodes.PREDICTION_FAILED,
      { modelVersion },
    );
    this.modelVersion = modelVersion;
  }
}

export default PredictionError;
