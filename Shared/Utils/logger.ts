/**
 * Shared logger for the client and CLI.
 * Writes every level to stderr so command output on stdout stays machine-readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const VALID_LOG_LEVELS: readonly string[] = Object.keys(LOG_LEVELS);

export function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

/**
 * JSON replacer for Error objects (their properties are non-enumerable).
 * BaseError subclasses never reach it: their toJSON runs first.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

export class Logger {
  private level: LogLevel | undefined;
  private context: string;
  private parent: Logger | undefined;

  constructor(context: string = 'guarded-mcp', parent?: Logger) {
    this.context = context;
    this.parent = parent;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.error(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.error(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.error(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, data));
    }
  }

  /**
   * Create a child logger with additional context.
   * Until it gets its own level, a child follows its parent's current level,
   * so a later `setLevel` on the root (e.g. from `--verbose`) reaches
   * loggers created at import time.
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this);
  }

  setContext(context: string): void {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * A root logger without an explicit level reads LOG_LEVEL on every call,
   * so a value loaded from `.env` after import still applies.
   */
  getLevel(): LogLevel {
    if (this.level !== undefined) return this.level;
    if (this.parent) return this.parent.getLevel();
    const envLevel = process.env.LOG_LEVEL;
    return isValidLogLevel(envLevel) ? envLevel : 'info';
  }
}

/** Default logger instance */
export const logger = new Logger();
