/**
 * Logger for the Cronometer client
 *
 * - Minimal output by default (warn level, overridable through LOG_LEVEL)
 * - Component-prefixed lines: `[timestamp] [LEVEL] [Component] message`
 * - Helpers to redact credentials before they reach a log line
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Log level (default: LOG_LEVEL env var, else 'warn') */
  level?: LogLevel;
  /** Component/module name for prefixing logs */
  component?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

function isLogLevel(value: string): value is LogLevel {
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

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getDefaultLogLevel();
    this.levelNum = LOG_LEVELS[this.level];
    this.component = config.component ?? 'Cronometer';
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

    console.error(this.formatMessage('error', message));

    if (error !== undefined && this.levelNum >= LOG_LEVELS.debug) {
      console.error(error);
    }
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(this.formatMessage('info', message));
  }

  debug(message: string, data?: unknown): void {
    if (!this.shouldLog('debug')) return;

    console.log(this.formatMessage('debug', message));

    if (data !== undefined) {
      console.log('  Data:', JSON.stringify(data, null, 2));
    }
  }

  /**
   * Create a child logger with a different component name
   */
  child(component: string): Logger {
    return new Logger({ level: this.level, component });
  }

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

/**
 * Redact sensitive values in an object for safe logging
 */
export function redactSensitive(
  obj: Record<string, unknown>,
  sensitiveKeys: string[] = ['password', 'anticsrf', 'token', 'nonce', 'secret', 'cookie', 'session']
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    const isSensitive = sensitiveKeys.some(k => keyLower.includes(k.toLowerCase()));

    if (isSensitive && typeof value === 'string') {
      result[key] = value.length > 0 ? '<redacted>' : '';
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value, sensitiveKeys);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Safely truncate a string for logging (emails, user ids, etc.)
 */
export function truncateForLog(value: string, showChars: number = 3): string {
  if (value.length <= showChars) return '*'.repeat(value.length);
  return value.substring(0, showChars) + '***';
}
