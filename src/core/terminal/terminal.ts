/**
 * Standard stream and process-exit seam.
 *
 * Help, version and error exits all go through a Terminal so that tests can
 * replace the process with a fake.
 */

export interface Terminal {
  /** Write a line to standard output. */
  out(text: string): void;
  /** Write a line to standard error. */
  err(text: string): void;
  exit(code: number): never;
}

export const processTerminal: Terminal = {
  out(text) {
    process.stdout.write(`${text}\n`);
  },
  err(text) {
    process.stderr.write(`${text}\n`);
  },
  exit(code) {
    return process.exit(code);
  },
};

/**
 * Print trimmed text to stdout and exit with status 0.
 */
export function printAndExit(terminal: Terminal, text: string): never {
  terminal.out(text.trim());
  return terminal.exit(0);
}
