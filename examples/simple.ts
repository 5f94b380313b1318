/**
 * Repeated flags and a default option value.
 *
 *   npx tsx examples/simple.ts -qq --file notes.txt extra
 */
import { ArgParser, isArgParseError } from '../src/index.js';

const parser = new ArgParser()
  .helpText('help!')
  .version('v1.0')
  .option('file f', 'default.txt')
  .flag('quiet q');

try {
  parser.parse();
} catch (error) {
  if (isArgParseError(error)) error.exit();
  throw error;
}

console.log(`quiet: ${parser.found('quiet')} (${parser.count('quiet')})`);
console.log(`file: ${parser.value('file')}`);

for (const arg of parser.args) {
  console.log(`arg: ${arg}`);
}
