/**
 * Token classification and dispatch.
 *
 * Walks a token stream for one parser level, updating flag counts, option
 * values and positionals, and hands the rest of the stream to a command's
 * parser when the first token names a registered command.
 */
import type { TokenStream } from '../stream/token-stream.js';
import { printAndExit, type Terminal } from '../terminal/terminal.js';
import { BadNameError, MissingHelpArgError, MissingValueError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ParserState } from './types.js';
import type { ArgParser } from './parser.js';

const ASCII_DIGIT = /^[0-9]$/;

export function parseTokens(state: ParserState, stream: TokenStream, terminal: Terminal): void {
  let isFirstArg = true;

  while (stream.hasNext()) {
    const token = stream.next();
    const command = isFirstArg ? state.commands.lookup(token) : undefined;

    if (token === '--') {
      logger.debug('end of options', { remaining: stream.remaining() });
      while (stream.hasNext()) {
        state.positionals.push(stream.next());
      }
    } else if (token.startsWith('--')) {
      if (token.includes('=')) {
        handleEqualsOption(state, token);
      } else {
        handleLongOption(state, token, stream, terminal);
      }
    } else if (token.startsWith('-')) {
      if (token === '-' || ASCII_DIGIT.test(token[1])) {
        state.positionals.push(token);
      } else if (token.includes('=')) {
        handleEqualsOption(state, token);
      } else {
        handleShortCluster(state, token, stream, terminal);
      }
    } else if (command) {
      dispatchCommand(state, token, command, stream, terminal);
    } else if (isFirstArg && state.helpCommand && token === 'help') {
      handleHelpCommand(state, stream, terminal);
    } else {
      state.positionals.push(token);
    }

    isFirstArg = false;
  }
}

function dispatchCommand(
  state: ParserState,
  name: string,
  command: ArgParser,
  stream: TokenStream,
  terminal: Terminal
): void {
  logger.debug(`dispatching to command '${name}'`, { remaining: stream.remaining() });
  command.parseStream(stream, terminal);
  state.commandName = name;

  const callback = command.getCallback();
  if (callback) {
    callback(name, command);
  }
}

function handleHelpCommand(state: ParserState, stream: TokenStream, terminal: Terminal): never {
  if (!stream.hasNext()) {
    throw new MissingHelpArgError();
  }
  const name = stream.next();
  const command = state.commands.lookup(name);
  if (!command) {
    throw new BadNameError(`'${name}' is not a recognised command name`, { name });
  }
  logger.debug(`printing help for command '${name}'`);
  return printAndExit(terminal, command.getHelpText() ?? '');
}

/**
 * `--name=value` or `-n=value`. Only options take inline values.
 */
function handleEqualsOption(state: ParserState, token: string): void {
  const split = token.indexOf('=');
  const name = token.slice(0, split);
  const value = token.slice(split + 1);

  const option = state.options.lookup(name.replace(/^-+/, ''));
  if (!option) {
    throw new BadNameError(`${name} is not a recognised option name`, { token });
  }
  if (value === '') {
    throw new MissingValueError(`missing value for ${name}`, { token });
  }
  option.values.push(value);
}

function handleLongOption(state: ParserState, token: string, stream: TokenStream, terminal: Terminal): void {
  const name = token.slice(2);

  const flag = state.flags.lookup(name);
  if (flag) {
    flag.count += 1;
    return;
  }

  const option = state.options.lookup(name);
  if (option) {
    if (!stream.hasNext()) {
      throw new MissingValueError(`missing value for ${token}`, { token });
    }
    option.values.push(stream.next());
    return;
  }

  if (name === 'help' && state.helpText !== undefined) {
    printAndExit(terminal, state.helpText);
  }
  if (name === 'version' && state.version !== undefined) {
    printAndExit(terminal, state.version);
  }

  throw new BadNameError(`${token} is not a recognised flag or option name`, { token });
}

/**
 * `-abc`: every character is a flag, or an option taking the next token.
 */
function handleShortCluster(state: ParserState, token: string, stream: TokenStream, terminal: Terminal): void {
  const isCluster = Array.from(token).length > 2;

  for (const char of Array.from(token.slice(1))) {
    const flag = state.flags.lookup(char);
    if (flag) {
      flag.count += 1;
      continue;
    }

    const option = state.options.lookup(char);
    if (option) {
      if (!stream.hasNext()) {
        const message = isCluster
          ? `missing value for '${char}' in ${token}`
          : `missing value for ${token}`;
        throw new MissingValueError(message, { token, name: char });
      }
      option.values.push(stream.next());
      continue;
    }

    if (char === 'h' && state.helpText !== undefined) {
      printAndExit(terminal, state.helpText);
    }
    if (char === 'v' && state.version !== undefined) {
      printAndExit(terminal, state.version);
    }

    const message = isCluster
      ? `'${char}' in ${token} is not a recognised flag or option name`
      : `${token} is not a recognised flag or option name`;
    throw new BadNameError(message, { token, name: char });
  }
}
