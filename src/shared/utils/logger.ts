/**
 * Logger for bank clients
 *
 * Production-safe defaults:
 * - `warn` level unless `LOG_LEVEL` says otherwise
 * - Output format: "[timestamp] [LEVEL] [component] message"
 * - Helpers to keep credentials and cookies out of log lines
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Log level (default: LOG_LEVEL env var, else 'warn') */
  level?: LogLevel;
  /** Component/module name for prefixing logs */
  component?: string;
  /** Where formatted lines go (default: console) */
  sink?: LogSink;
}

export interface LogSink {
  error(line: string): void;
  warn(line: string): void;
  info(line: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

const consoleSink: LogSink = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line)
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Determine log level from environment or use default
 */
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'warn';
}

export class Logger {
  private level: LogLevel;
  private levelNum: number;
  private component: string;
  private sink: LogSink;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getDefaultLogLevel();
    this.levelNum = LOG_LEVELS[this.level];
    this.component = config.component ?? 'bnpnet';
    this.sink = config.sink ?? consoleSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= this.levelNum;
  }

  private formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}`;
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) return;

    this.sink.error(this.formatMessage('error', message));

    if (error instanceof Error && error.stack && this.levelNum >= LOG_LEVELS.debug) {
      this.sink.error(error.stack);
    }
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    this.sink.warn(this.formatMessage('warn', message));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    this.sink.info(this.formatMessage('info', message));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;

    let line = this.formatMessage('debug', message);
    if (data !== undefined) {
      line += ` ${JSON.stringify(redactSensitive(data))}`;
    }
    this.sink.info(line);
  }

  /**
   * Create a child logger with a different component name
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component,
      sink: this.sink
    });
  }

  /**
   * Set log level dynamically
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    this.levelNum = LOG_LEVELS[level];
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, config?: Omit<LoggerConfig, 'component'>): Logger {
  return new Logger({ ...config, component });
}

const DEFAULT_SENSITIVE_KEYS = ['password', 'userid', 'token', 'secret', 'cookie', 'session'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive values in an object for safe logging
 */
export function redactSensitive(
  obj: Record<string, unknown>,
  sensitiveKeys: string[] = DEFAULT_SENSITIVE_KEYS
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    const isSensitive = sensitiveKeys.some(k => keyLower.includes(k.toLowerCase()));

    if (isSensitive && typeof value === 'string') {
      result[key] = value.length > 0 ? '<redacted>' : '';
    } else if (isRecord(value)) {
      result[key] = redactSensitive(value, sensitiveKeys);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Safely truncate a string for logging (useful for usernames, etc.)
 */
export function truncateForLog(value: string, showChars: number = 3): string {
  if (value.length <= showChars) return '*'.repeat(value.length);
  return value.substring(0, showChars) + '***';
}
