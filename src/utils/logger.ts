/**
 * Logger for the glTF Mesh Importer
 *
 * Leveled console output with an optional clock and operation timing.
 * Warnings go to stderr through console.warn, errors through console.error.
 */

import { LOGGER_PREFIXES } from '../constants/config';

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Print wall-clock time after the prefix */
  timestamp?: boolean;
  /** Attach elapsed milliseconds to completed operations */
  duration?: boolean;
  prefix?: string;
}

/**
 * Structured fields printed after the message
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  mesh?: string | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

type ConsoleWriter = (message: string, ...rest: unknown[]) => void;

interface LevelStyle {
  rank: number;
  label: string;
  color: string;
  write: ConsoleWriter;
}

const RESET = '\x1b[0m';

const LEVEL_STYLES: Record<LogLevel, LevelStyle> = {
  [LogLevel.DEBUG]: { rank: 0, label: 'DEBUG', color: '\x1b[90m', write: (...args) => console.log(...args) },
  [LogLevel.INFO]: { rank: 1, label: 'INFO', color: '\x1b[36m', write: (...args) => console.log(...args) },
  [LogLevel.WARN]: { rank: 2, label: 'WARN', color: '\x1b[33m', write: (...args) => console.warn(...args) },
  [LogLevel.ERROR]: { rank: 3, label: 'ERROR', color: '\x1b[31m', write: (...args) => console.error(...args) },
};

export class Logger {
  private readonly options: Required<LoggerOptions>;
  private readonly startTimes = new Map<string, number>();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level ?? LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix ?? LOGGER_PREFIXES.DEFAULT,
    };
  }

  get level(): LogLevel {
    return this.options.level;
  }

  /**
   * Whether messages at `level` are printed
   */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_STYLES[level].rank >= LEVEL_STYLES[this.options.level].rank;
  }

  /**
   * Logger with the same settings and another prefix
   */
  child(prefix: string): Logger {
    return new Logger({ ...this.options, prefix });
  }

  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.isEnabled(level)) return;

    const style = LEVEL_STYLES[level];
    const clock = this.options.timestamp ? ` @ ${new Date().toISOString().slice(11, 23)}` : '';
    const line = `${style.color}${this.options.prefix} [${style.label}]${clock} ${message}${RESET}`;

    if (context) {
      style.write(line, context);
    } else {
      style.write(line);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime === undefined) return;
    this.startTimes.delete(operation);

    const payload: LoggerContext = { operation, ...context };
    if (this.options.duration) {
      payload.duration = Date.now() - startTime;
    }
    this.debug(`Completed operation: ${operation}`, payload);
  }

  /**
   * Run `fn` between startTiming and endTiming; failures are rethrown
   */
  async withTiming<T>(operation: string, fn: () => Promise<T>, context?: LoggerContext): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, {
        ...context,
        success: false,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  logStage(stage: string, context?: LoggerContext): void {
    this.debug(`Stage: ${stage}`, { stage, ...context });
  }

  logConfig(config: Record<string, unknown>): void {
    this.debug('Configuration loaded', { config });
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Loggers for each import phase, used when the caller passes none
 */
export const LoggerFactory = {
  forDecode(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({ level, prefix: LOGGER_PREFIXES.DECODE });
  },

  forBuild(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({ level, prefix: LOGGER_PREFIXES.BUILD });
  },
};
