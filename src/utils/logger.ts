/**
 * Leveled, chalk-coloured logging.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type OutputLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelStyle {
  tag: string;
  color: (text: string) => string;
  write: (line: string) => void;
}

// stdout carries only the report
const STYLES: Record<OutputLevel, LevelStyle> = {
  debug: { tag: 'DEBUG', color: chalk.gray, write: (line) => console.error(line) },
  info: { tag: 'INFO', color: chalk.blue, write: (line) => console.error(line) },
  warn: { tag: 'WARN', color: chalk.yellow, write: (line) => console.warn(line) },
  error: { tag: 'ERROR', color: chalk.red, write: (line) => console.error(line) },
};

/**
 * Logger for the casecheck CLI. A child logger adds a prefix and shares the
 * level of its root, so `--quiet` and `--verbose` reach it too.
 */
class Logger {
  private level: LogLevel = 'info';

  constructor(
    private readonly prefix: string = '',
    private readonly parent?: Logger
  ) {}

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
    } else {
      this.level = level;
    }
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    this.log('error', message, error);
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this);
  }

  private log(level: OutputLevel, message: string, data?: Error | Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.getLevel()]) return;

    const { tag, color, write } = STYLES[level];
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    write(color(`[${tag}] ${text}`));
    if (data === undefined) return;
    write(color(data instanceof Error ? data.stack || data.message : JSON.stringify(data, null, 2)));
  }
}

export const logger = new Logger();

export { Logger };
