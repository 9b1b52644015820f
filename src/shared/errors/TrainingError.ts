/**
 * Error for a training run that could not produce a model
 */
import FolderSenseError, { ErrorCodes } from './FolderSenseError';

class TrainingError extends FolderSenseError {
  modelName: string;
  stage: string;

  constructor(modelName: string, stage: string, reason: string, originalError?: Error) {
    super(
      `Training of '${modelName}' failed during ${stage}: ${reason}`,
      ErrorCodes.TRAINING_FAILED,
      {
        modelName,
        stage,
        originalError: originalError?.message ?? null,
      },
      'Destination predictions could not be updated',
    );
    this.modelName = modelName;
    this.stage = stage;
  }
}

export default TrainingError;
