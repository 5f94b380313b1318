import { z } from 'zod';

/** Log levels accepted by the logger. */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Object form of the parser builder, accepted by `new ArgParser(options)`.
 */
export const ParserOptionsSchema = z.object({
  /** Printed verbatim (trimmed) for --help and -h */
  helpText: z.string().optional(),
  /** Printed verbatim (trimmed) for --version and -v */
  version: z.string().optional(),
  /** Enables the built-in `help <command>` command */
  helpCommand: z.boolean().default(false),
});

/** Environment variables read when parsing the process arguments. Unset means untouched. */
export const EnvConfigSchema = z.object({
  ARGWISE_LOG_LEVEL: LogLevelSchema.optional(),
});

export type ParserOptions = z.infer<typeof ParserOptionsSchema>;
export type ParserOptionsInput = z.input<typeof ParserOptionsSchema>;
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
