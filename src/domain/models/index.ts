/**
 * Domain model exports
 */
export * from './FileFact';
export * from './Condition';
export * from './Rule';
export * from './LearnedPattern';
export * from './TrainingHistory';
export * from './Suggestion';
