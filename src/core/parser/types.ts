/**
 * Type definitions for the argument parser.
 */
import type { AliasTable } from '../registry/alias-table.js';
import type { Terminal } from '../terminal/terminal.js';
import type { ArgParser } from './parser.js';

/** A value-taking option. */
export interface OptionEntry {
  /** Values in the order they were supplied */
  values: string[];
  /** Returned by `value()` when nothing was supplied */
  defaultValue?: string;
}

/** A boolean flag; only its occurrence count is observable. */
export interface FlagEntry {
  count: number;
}

/**
 * Called after a command's parser has finished parsing, with the alias the
 * command was invoked by.
 */
export type CommandCallback = (name: string, parser: ArgParser) => void;

/**
 * Mutable state of one parser level.
 */
export interface ParserState {
  helpText?: string;
  version?: string;
  helpCommand: boolean;
  options: AliasTable<OptionEntry>;
  flags: AliasTable<FlagEntry>;
  commands: AliasTable<ArgParser>;
  positionals: string[];
  commandName?: string;
  callback?: CommandCallback;
  /** Falls back to the dispatching parent's terminal when unset */
  terminal?: Terminal;
}

/**
 * Plain snapshot of a parsed parser, keyed by the first alias of each entry.
 */
export interface ParserSnapshot {
  flags: Record<string, number>;
  options: Record<string, string[]>;
  args: string[];
  command?: {
    name: string;
    parser: ParserSnapshot;
  };
}
