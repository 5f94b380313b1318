/**
 * Tests for the process-backed terminal and the print-and-exit helper.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { printAndExit, processTerminal } from '../../../../src/core/terminal/terminal.js';
import { captureExit, createFakeTerminal } from '../../../helpers/terminal.js';

describe('processTerminal', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write lines to stdout and stderr', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    processTerminal.out('to stdout');
    processTerminal.err('to stderr');

    expect(stdout).toHaveBeenCalledWith('to stdout\n');
    expect(stderr).toHaveBeenCalledWith('to stderr\n');
  });

  it('should exit the process with the given status', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });

    expect(() => processTerminal.exit(3)).toThrow('exit called');
    expect(exit).toHaveBeenCalledWith(3);
  });
});

describe('printAndExit', () => {
  it('should print trimmed text and exit 0', () => {
    const terminal = createFakeTerminal();

    expect(captureExit(() => printAndExit(terminal, '\n  text  \n'))).toBe(0);
    expect(terminal.stdout).toEqual(['text']);
  });
});
