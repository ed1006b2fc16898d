/**
 * Levelled console logging.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = (line: string) => void;

const stdout: Sink = (line) => console.log(line);
const stderr: Sink = (line) => console.error(line);
const warnings: Sink = (line) => console.warn(line);

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private write(
    level: Exclude<LogLevel, 'silent'>,
    sink: Sink,
    paint: (text: string) => string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    sink(paint(`[${level.toUpperCase()}] ${message}`));
    if (data) sink(paint(JSON.stringify(data, null, 2)));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', stdout, chalk.gray, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', stdout, chalk.blue, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', warnings, chalk.yellow, message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', stderr, chalk.red, message, data);
  }

  /** Shown at info level, without a level tag. */
  success(message: string): void {
    if (LOG_LEVELS.info < LOG_LEVELS[this.level]) return;
    stdout(chalk.green(`✓ ${message}`));
  }
}

export const logger = new Logger();

export { Logger };
