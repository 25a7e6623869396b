import { ConfigError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Receives one fully formatted log line, without the trailing newline. */
export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_LEVEL: LogLevel = 'debug';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Parses a `LOG_LEVEL` value. Unset or empty means `debug`.
 * @throws {ConfigError} When the value names no known level.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_LEVEL;
  }

  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL "${value}", expected one of: ${Object.keys(LEVEL_ORDER).join(', ')}`
    );
  }
  return level;
}

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Leveled logger. Everything goes to stderr by default so that stdout
 * carries nothing but the report.
 */
export class Logger {
  private readonly threshold: number;

  constructor(
    level: LogLevel = DEFAULT_LEVEL,
    private readonly sink: LogSink = writeToStderr
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  /**
   * Builds a logger whose level comes from `LOG_LEVEL`.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
    return new Logger(parseLogLevel(env.LOG_LEVEL));
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const timestamp = new Date().toISOString();
    this.sink(`${timestamp} [${level.toUpperCase()}] ${message}`);
  }
}
