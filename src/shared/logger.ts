/**
 * Unified Logging System for FolderSense
 * Uses electron-log's Node entry point so the same transports work outside Electron
 */
import log from 'electron-log/node';

if (log.transports.file) {
  log.transports.file.maxSize = 10 * 1024 * 1024; // 10MB file rotation
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';
  // File output is opt-in through enableFileLogging()
  log.transports.file.level = false;
}

if (log.transports.console) {
  log.transports.console.format = '[{h}:{i}:{s}] [{level}] {text}';
}

export const LOG_LEVELS = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

export const LOG_LEVEL_NAMES = ['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE'] as const;

type ElectronLevel = 'error' | 'warn' | 'info' | 'debug' | 'silly';

const ELECTRON_LEVELS: Record<number, ElectronLevel> = {
  [LOG_LEVELS.ERROR]: 'error',
  [LOG_LEVELS.WARN]: 'warn',
  [LOG_LEVELS.INFO]: 'info',
  [LOG_LEVELS.DEBUG]: 'debug',
  [LOG_LEVELS.TRACE]: 'silly',
};

function isLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Level-filtered logger with a context prefix.
 * All instances share the electron-log transports; the level is per instance.
 */
export class Logger {
  private level: number;
  private readonly context: string;
  private logFile: string | null;
  private parent: Logger | null;

  constructor(context = '', parent: Logger | null = null) {
    this.level = LOG_LEVELS.INFO;
    this.context = context;
    this.logFile = null;
    this.parent = parent;
  }

  setLevel(level: string | number): void {
    if (typeof level === 'string') {
      const name = level.toUpperCase();
      this.level = isLevelName(name) ? LOG_LEVELS[name] : LOG_LEVELS.INFO;
    } else {
      this.level = level;
    }

    const electronLevel = ELECTRON_LEVELS[this.level] ?? 'info';
    if (log.transports.console) {
      log.transports.console.level = electronLevel;
    }
    if (log.transports.file && this.logFile) {
      log.transports.file.level = electronLevel;
    }
  }

  getLevel(): number {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  /**
   * Returns a logger that follows this logger's level but prefixes a different context
   */
  child(context: string): Logger {
    return new Logger(context, this);
  }

  enableFileLogging(logFile: string): void {
    this.logFile = logFile;
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.level = ELECTRON_LEVELS[this.level] ?? 'info';
  }

  /**
   * Safe JSON stringifier that handles circular references
   */
  private safeStringify(obj: unknown): string {
    const seen = new WeakSet<object>();
    return JSON.stringify(obj, (_key, value: unknown) => {
      if (value instanceof Error) {
        return {
          name: value.name,
          message: value.message,
          stack: value.stack,
        };
      }

      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular Reference]';
        }
        seen.add(value);
      }

      if (typeof value === 'function') {
        return `[Function: ${value.name || 'anonymous'}]`;
      }

      return value;
    });
  }

  private formatData(data?: unknown): string {
    if (data === undefined || data === null) return '';
    if (typeof data === 'object' && Object.keys(data).length === 0) return '';

    try {
      return ` | ${this.safeStringify(data)}`;
    } catch (error) {
      return ` | [Error stringifying data: ${error instanceof Error ? error.message : String(error)}]`;
    }
  }

  formatMessage(message: string, data?: unknown): string {
    const contextStr = this.context ? `[${this.context}] ` : '';
    return `${contextStr}${message}${this.formatData(data)}`;
  }

  log(level: number, message: string, data?: unknown): void {
    if (level > this.getLevel()) return;

    const formattedMessage = this.formatMessage(message, data);

    switch (level) {
      case LOG_LEVELS.ERROR:
        log.error(formattedMessage);
        break;
      case LOG_LEVELS.WARN:
        log.warn(formattedMessage);
        break;
      case LOG_LEVELS.INFO:
        log.info(formattedMessage);
        break;
      case LOG_LEVELS.DEBUG:
        log.debug(formattedMessage);
        break;
      case LOG_LEVELS.TRACE:
        log.silly(formattedMessage);
        break;
      default:
        log.info(formattedMessage);
    }
  }

  error(message: string, data?: unknown): void {
    this.log(LOG_LEVELS.ERROR, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LOG_LEVELS.WARN, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LOG_LEVELS.INFO, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log(LOG_LEVELS.DEBUG, message, data);
  }

  trace(message: string, data?: unknown): void {
    this.log(LOG_LEVELS.TRACE, message, data);
  }

  performance(operation: string, duration: number, metadata: Record<string, unknown> = {}): void {
    this.debug(`Performance: ${operation}`, {
      duration: `${duration}ms`,
      ...metadata,
    });
  }
}

// Create singleton instance
export const logger = new Logger();

if (process.env.NODE_ENV === 'development') {
  logger.setLevel(LOG_LEVELS.DEBUG);
} else if (process.env.NODE_ENV === 'test') {
  logger.setLevel(LOG_LEVELS.ERROR);
} else {
  logger.setLevel(LOG_LEVELS.INFO);
}
