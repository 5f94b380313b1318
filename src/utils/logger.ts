/**
 * Level-filtered diagnostics for the parser.
 *
 * Everything goes to stderr so it never mixes with help, version or program
 * output on stdout.
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

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /** Trace a parse step; `data` follows on its own line as compact JSON. */
  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.error(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      console.error(chalk.gray(JSON.stringify(data)));
    }
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${message}`));
  }
}

// Shared by the engine, the config loader and argtest
export const logger = new Logger();

export { Logger };
