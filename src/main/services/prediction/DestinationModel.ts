/**
 * Contracts between the prediction gate, the lifecycle manager and a trained classifier
 */

export interface RankedDestination {
  destination: string;
  /** Probability in [0, 1]; scores over all destinations sum to 1 */
  score: number;
}

/**
 * An immutable trained classifier
 */
export interface DestinationModel {
  /** Candidates sorted by descending score */
  rank(tokens: readonly string[]): RankedDestination[];
  /** How many training examples of `destination` carried `token` */
  support(destination: string, token: string): number;
  readonly destinations: readonly string[];
  serialize(): string;
}

export interface TrainingSample {
  tokens: string[];
  destination: string;
}

export interface ModelTrainer {
  train(samples: readonly TrainingSample[]): Promise<DestinationModel>;
  /** Rebuild a model from the string produced by DestinationModel.serialize() */
  restore(artifact: string): DestinationModel;
}
