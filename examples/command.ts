/**
 * A git-style command with a callback.
 *
 *   npx tsx examples/command.ts boo --loud
 *   npx tsx examples/command.ts help boo
 */
import { ArgParser, isArgParseError } from '../src/index.js';

function cmdBoo(name: string, parser: ArgParser): void {
  console.log(parser.found('loud') ? `${name.toUpperCase()}!` : `${name}!`);
}

const parser = new ArgParser({ helpText: 'Usage: foobar <command>', version: '1.0', helpCommand: true })
  .command(
    'boo',
    new ArgParser()
      .helpText('Usage: foobar boo [--loud]')
      .flag('loud l')
      .callback(cmdBoo)
  );

try {
  parser.parse();
} catch (error) {
  if (isArgParseError(error)) error.exit();
  throw error;
}
