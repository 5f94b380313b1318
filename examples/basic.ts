/**
 * Flags, options and positional arguments.
 *
 *   npx tsx examples/basic.ts -f --bar value one two
 */
import { ArgParser, isArgParseError } from '../src/index.js';

const parser = new ArgParser()
  .helpText('Usage: foobar [--foo] [--bar <value>] [args...]')
  .version('1.0')
  .flag('foo f')
  .option('bar b');

try {
  parser.parse();
} catch (error) {
  if (isArgParseError(error)) error.exit();
  throw error;
}

if (parser.found('foo')) {
  console.log('Found --foo/-f flag.');
}

const bar = parser.value('bar');
if (bar !== undefined) {
  console.log(`Found --bar/-b option with value: ${bar}`);
}

for (const arg of parser.args) {
  console.log(`Arg: ${arg}`);
}
