/**
 * `argtest`: parses its own command line and prints the result as JSON.
 * Handy for checking how a given argument list is classified.
 */
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { ArgParser } from '../core/parser/parser.js';
import { processTerminal, type Terminal } from '../core/terminal/terminal.js';
import { isArgParseError } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(moduleDir, '../../package.json'), 'utf-8')).version;

export const ARGTEST_HELP = `
Usage: argtest [options] [arguments]

Options:
  -f, --file <path>   File to operate on (repeatable)
  -q, --quiet         Quiet mode (repeatable)
  -d, --debug         Print a summary to stderr once parsing is done
  -h, --help          Print this help text and exit
  -v, --version       Print the version number and exit

Set ARGWISE_LOG_LEVEL=debug to trace the parser itself.
`;

/**
 * Create the argtest parser.
 */
export function createArgtestParser(terminal: Terminal = processTerminal): ArgParser {
  return new ArgParser({ helpText: ARGTEST_HELP, version: VERSION })
    .option('file f')
    .flag('quiet q')
    .flag('debug d')
    .terminal(terminal);
}

/**
 * Run argtest against `argv`, or the process arguments when omitted.
 */
export function runArgtest(argv?: readonly string[], terminal: Terminal = processTerminal): void {
  const parser = createArgtestParser(terminal);
  try {
    if (argv) {
      parser.parseArgs(argv);
    } else {
      parser.parse();
    }
  } catch (error) {
    if (isArgParseError(error)) {
      error.exit(terminal);
    }
    throw error;
  }

  if (parser.found('debug')) {
    log.setLevel('debug');
    log.debug('parsed arguments', { args: parser.numArgs(), quiet: parser.count('quiet') });
  }
  terminal.out(JSON.stringify(parser.toJSON(), null, 2));
}
