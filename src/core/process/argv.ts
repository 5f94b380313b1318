/**
 * Access to the program's own argument vector.
 */
import { NotUnicodeError } from '../../utils/errors.js';

// Node decodes invalid UTF-8 argument bytes to U+FFFD.
const REPLACEMENT_CHAR = '\uFFFD';
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function isDecodableArg(arg: string): boolean {
  return !arg.includes(REPLACEMENT_CHAR) && !LONE_SURROGATE.test(arg);
}

/**
 * Return the program arguments without the runtime and script path.
 * Throws NotUnicodeError if any argument did not decode as text.
 *
 * Node hands over arguments already decoded, so a U+FFFD that was typed on
 * purpose cannot be told apart from one Node substituted for bad bytes. Such
 * an argument is rejected too; pass it through `parseArgs()` to accept it.
 */
export function readProcessArgs(argv: readonly string[] = process.argv): string[] {
  const args = argv.slice(2);
  const position = args.findIndex((arg) => !isDecodableArg(arg));
  if (position !== -1) {
    throw new NotUnicodeError(undefined, { position });
  }
  return args;
}
