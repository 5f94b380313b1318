/**
 * Command line parser with a builder API for registering flags, options and
 * commands, and accessors for reading the results back by name.
 *
 * ```ts
 * const parser = new ArgParser()
 *   .helpText('Usage: appname...')
 *   .version('1.0')
 *   .flag('foo f')
 *   .option('bar b');
 *
 * try {
 *   parser.parse();
 * } catch (err) {
 *   if (err instanceof ArgParseError) err.exit();
 *   throw err;
 * }
 * ```
 */
import { resolveParserOptions, applyEnvConfig } from '../config/loader.js';
import type { ParserOptionsInput } from '../config/schema.js';
import { readProcessArgs } from '../process/argv.js';
import { AliasTable } from '../registry/alias-table.js';
import { TokenStream } from '../stream/token-stream.js';
import { processTerminal, type Terminal } from '../terminal/terminal.js';
import { BadNameError } from '../../utils/errors.js';
import { parseTokens } from './engine.js';
import type {
  CommandCallback,
  FlagEntry,
  OptionEntry,
  ParserSnapshot,
  ParserState,
} from './types.js';

export class ArgParser {
  private readonly state: ParserState;

  constructor(options?: ParserOptionsInput) {
    const resolved = resolveParserOptions(options);
    this.state = {
      helpText: resolved.helpText,
      version: resolved.version,
      helpCommand: resolved.helpCommand,
      options: new AliasTable<OptionEntry>(),
      flags: new AliasTable<FlagEntry>(),
      commands: new AliasTable<ArgParser>(),
      positionals: [],
    };
  }

  // ---------------------------------------------------------------------------
  // Builder
  // ---------------------------------------------------------------------------

  /**
   * Set the help text. Enables `--help`, and `-h` unless another entry
   * registers that character.
   */
  helpText(text: string): this {
    this.state.helpText = text;
    return this;
  }

  /**
   * Set the version text. Enables `--version`, and `-v` unless another entry
   * registers that character.
   */
  version(text: string): this {
    this.state.version = text;
    return this;
  }

  /**
   * Register an option under space-separated aliases, e.g. `"output o"`.
   */
  option(spec: string, defaultValue?: string): this {
    this.state.options.register(spec, { values: [], defaultValue });
    return this;
  }

  /**
   * Register a flag under space-separated aliases, e.g. `"verbose v"`.
   */
  flag(spec: string): this {
    this.state.flags.register(spec, { count: 0 });
    return this;
  }

  /**
   * Register a command. Its flags, options and help text live on `parser`.
   */
  command(spec: string, parser: ArgParser): this {
    this.state.commands.register(spec, parser);
    return this;
  }

  /** Set the function called when this parser is matched as a command. */
  callback(fn: CommandCallback): this {
    this.state.callback = fn;
    return this;
  }

  /** Turn on the built-in `help <command>` command. */
  enableHelpCommand(): this {
    this.state.helpCommand = true;
    return this;
  }

  /**
   * Use `terminal` for help, version and error output. Command parsers
   * without their own terminal use their parent's.
   */
  terminal(terminal: Terminal): this {
    this.state.terminal = terminal;
    return this;
  }

  // ---------------------------------------------------------------------------
  // Parsing
  // ---------------------------------------------------------------------------

  /**
   * Parse the program's command line arguments.
   */
  parse(): void {
    applyEnvConfig();
    this.parseArgs(readProcessArgs());
  }

  /**
   * Parse a list of tokens. Does not touch the process arguments.
   */
  parseArgs(args: readonly string[]): void {
    this.parseStream(new TokenStream(args));
  }

  /**
   * Continue parsing from a shared stream.
   * @internal Used by the engine to dispatch into command parsers.
   */
  parseStream(stream: TokenStream, inherited: Terminal = processTerminal): void {
    parseTokens(this.state, stream, this.state.terminal ?? inherited);
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  /**
   * The last value given for an option, its default if none was given, or
   * undefined.
   */
  value(name: string): string | undefined {
    const option = this.requireOption(name);
    if (option.values.length > 0) {
      return option.values[option.values.length - 1];
    }
    return option.defaultValue;
  }

  /** Every value given for an option, in order. */
  values(name: string): string[] {
    return [...this.requireOption(name).values];
  }

  /** How many times a flag or option was found. */
  count(name: string): number {
    const flag = this.state.flags.lookup(name);
    if (flag) return flag.count;
    const option = this.state.options.lookup(name);
    if (option) return option.values.length;
    throw new BadNameError(`'${name}' is not a registered flag or option name`, { name });
  }

  found(name: string): boolean {
    return this.count(name) > 0;
  }

  /** Positional arguments in input order. */
  get args(): readonly string[] {
    return [...this.state.positionals];
  }

  hasArgs(): boolean {
    return this.state.positionals.length > 0;
  }

  numArgs(): number {
    return this.state.positionals.length;
  }

  hasCmd(): boolean {
    return this.state.commandName !== undefined;
  }

  /** Alias the matched command was invoked by. */
  get cmdName(): string | undefined {
    return this.state.commandName;
  }

  get cmdParser(): ArgParser | undefined {
    if (this.state.commandName === undefined) return undefined;
    return this.state.commands.lookup(this.state.commandName);
  }

  getHelpText(): string | undefined {
    return this.state.helpText;
  }

  getVersion(): string | undefined {
    return this.state.version;
  }

  getCallback(): CommandCallback | undefined {
    return this.state.callback;
  }

  toJSON(): ParserSnapshot {
    const flags: Record<string, number> = {};
    this.state.flags.entries.forEach((entry, index) => {
      const [name] = this.state.flags.aliasesOf(index);
      if (name !== undefined) flags[name] = entry.count;
    });

    const options: Record<string, string[]> = {};
    this.state.options.entries.forEach((entry, index) => {
      const [name] = this.state.options.aliasesOf(index);
      if (name !== undefined) options[name] = [...entry.values];
    });

    const snapshot: ParserSnapshot = { flags, options, args: [...this.state.positionals] };
    const command = this.cmdParser;
    if (this.state.commandName !== undefined && command) {
      snapshot.command = { name: this.state.commandName, parser: command.toJSON() };
    }
    return snapshot;
  }

  private requireOption(name: string): OptionEntry {
    const option = this.state.options.lookup(name);
    if (!option) {
      throw new BadNameError(`'${name}' is not a registered option name`, { name });
    }
    return option;
  }
}
