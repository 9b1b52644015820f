/**
 * Runtime configuration
 * Read from environment variables and validated with zod; invalid values throw ValidationError.
 */
import { z } from 'zod';
import { BATCH_DEFAULTS, PREDICTION_DEFAULTS } from './constants';
import { LOG_LEVEL_NAMES, type LogLevelName } from './logger';
import { ValidationError } from './errors';

export interface FolderSenseConfig {
  mlEnabled: boolean;
  minimumConfidence: number;
  /** SQLite path for training history; null keeps history in memory */
  historyDbPath: string | null;
  logLevel: LogLevelName;
  logFile: string | null;
  batchConcurrency: number;
}

const ENV_KEYS = {
  mlEnabled: 'FOLDERSENSE_ML_ENABLED',
  minimumConfidence: 'FOLDERSENSE_MIN_CONFIDENCE',
  historyDbPath: 'FOLDERSENSE_HISTORY_DB',
  logLevel: 'FOLDERSENSE_LOG_LEVEL',
  logFile: 'FOLDERSENSE_LOG_FILE',
  batchConcurrency: 'FOLDERSENSE_BATCH_CONCURRENCY',
} as const satisfies Record<keyof FolderSenseConfig, string>;

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((value) => ['true', '1', 'yes', 'on'].includes(value))
  .optional();

const ConfigSchema = z.object({
  [ENV_KEYS.mlEnabled]: booleanFlag.default('true'),
  [ENV_KEYS.minimumConfidence]: z.coerce
    .number()
    .min(0, 'must be between 0 and 1')
    .max(1, 'must be between 0 and 1')
    .default(PREDICTION_DEFAULTS.MINIMUM_CONFIDENCE),
  [ENV_KEYS.historyDbPath]: optionalText,
  [ENV_KEYS.logLevel]: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(z.enum(LOG_LEVEL_NAMES))
    .optional(),
  [ENV_KEYS.logFile]: optionalText,
  [ENV_KEYS.batchConcurrency]: z.coerce
    .number()
    .int('must be a whole number')
    .min(1, 'must be at least 1')
    .default(BATCH_DEFAULTS.CONCURRENCY),
});

function defaultLogLevel(nodeEnv: string | undefined): LogLevelName {
  if (nodeEnv === 'development') return 'DEBUG';
  if (nodeEnv === 'test') return 'ERROR';
  return 'INFO';
}

/**
 * Build the configuration from an environment (defaults to process.env)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FolderSenseConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'config';
    const value = typeof issue.path[0] === 'string' ? env[issue.path[0]] : undefined;
    throw new ValidationError(field, issue.message, value);
  }

  const data = parsed.data;
  return {
    mlEnabled: data[ENV_KEYS.mlEnabled],
    minimumConfidence: data[ENV_KEYS.minimumConfidence],
    historyDbPath: data[ENV_KEYS.historyDbPath],
    logLevel: data[ENV_KEYS.logLevel] ?? defaultLogLevel(env.NODE_ENV),
    logFile: data[ENV_KEYS.logFile],
    batchConcurrency: data[ENV_KEYS.batchConcurrency],
  };
}

export { ENV_KEYS };
