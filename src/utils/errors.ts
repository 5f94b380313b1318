/**
 * Error types and codes for argwise.
 * Every failure the parser reports extends ArgParseError.
 */
import { processTerminal, type Terminal } from '../core/terminal/terminal.js';

/**
 * Base error class for all argwise errors.
 */
export class ArgParseError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ArgParseError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Print `Error: <message>.` to stderr and exit with status 1.
   */
  exit(terminal: Terminal = processTerminal): never {
    terminal.err(`Error: ${this.message}.`);
    return terminal.exit(1);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * An unregistered flag, option or command name, either on the command line
 * or passed to an accessor.
 */
export class BadNameError extends ArgParseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.BAD_NAME, message, details);
    this.name = 'BadNameError';
  }
}

/**
 * An option on the command line with no value available.
 */
export class MissingValueError extends ArgParseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.MISSING_VALUE, message, details);
    this.name = 'MissingValueError';
  }
}

/**
 * The built-in `help` command was given without a command name.
 */
export class MissingHelpArgError extends ArgParseError {
  constructor(message = 'missing argument for the help command', details?: Record<string, unknown>) {
    super(ErrorCodes.MISSING_HELP_ARG, message, details);
    this.name = 'MissingHelpArgError';
  }
}

/**
 * The process delivered arguments that could not be decoded as text.
 */
export class NotUnicodeError extends ArgParseError {
  constructor(message = 'arguments are not valid unicode strings', details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_UNICODE, message, details);
    this.name = 'NotUnicodeError';
  }
}

/**
 * Invalid parser configuration (bad options object, bad environment).
 */
export class ConfigError extends ArgParseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  BAD_NAME: 'A001',
  MISSING_VALUE: 'A002',
  MISSING_HELP_ARG: 'A003',
  NOT_UNICODE: 'A004',

  INVALID_OPTIONS: 'C001',
  INVALID_ENV: 'C002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export function isArgParseError(value: unknown): value is ArgParseError {
  return value instanceof ArgParseError;
}
