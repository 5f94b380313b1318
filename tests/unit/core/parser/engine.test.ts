/**
 * Tests for token classification: the end-of-options sentinel, positionals,
 * and the errors raised for malformed input.
 */
import { describe, it, expect } from 'vitest';
import { ArgParser } from '../../../../src/core/parser/parser.js';
import { BadNameError, MissingValueError } from '../../../../src/utils/errors.js';

describe('token classification', () => {
  describe('positionals', () => {
    it('should collect plain words in order', () => {
      const parser = new ArgParser();
      parser.parseArgs(['foo', 'bar']);

      expect(parser.args).toEqual(['foo', 'bar']);
    });

    it('should keep a lone dash and negative numbers as positionals', () => {
      const parser = new ArgParser();
      parser.parseArgs(['-', '-42', 'plain']);

      expect(parser.args).toEqual(['-', '-42', 'plain']);
    });

    it('should keep any token starting with a dash and a digit', () => {
      const parser = new ArgParser().flag('one 1');
      parser.parseArgs(['-1', '-3.5', '-0x']);

      expect(parser.args).toEqual(['-1', '-3.5', '-0x']);
      expect(parser.count('one')).toBe(0);
    });

    it('should interleave positionals with flags', () => {
      const parser = new ArgParser().flag('quiet q');
      parser.parseArgs(['a', '-q', 'b', '--quiet', 'c']);

      expect(parser.args).toEqual(['a', 'b', 'c']);
      expect(parser.count('quiet')).toBe(2);
    });
  });

  describe('end-of-options sentinel', () => {
    it('should pass every later token through verbatim', () => {
      const parser = new ArgParser().option('opt o');
      parser.parseArgs(['--opt=hello', '--', '--opt=ignored']);

      expect(parser.values('opt')).toEqual(['hello']);
      expect(parser.args).toEqual(['--opt=ignored']);
    });

    it('should not classify flags, sentinels or commands after it', () => {
      const parser = new ArgParser()
        .flag('quiet q')
        .command('cmd', new ArgParser());
      parser.parseArgs(['--', 'cmd', '-q', '--', '-']);

      expect(parser.args).toEqual(['cmd', '-q', '--', '-']);
      expect(parser.count('quiet')).toBe(0);
      expect(parser.hasCmd()).toBe(false);
    });

    it('should leave no positionals when it is the last token', () => {
      const parser = new ArgParser();
      parser.parseArgs(['--']);

      expect(parser.args).toEqual([]);
    });
  });

  describe('errors', () => {
    it('should reject an unknown long name', () => {
      const parser = new ArgParser();

      expect(() => parser.parseArgs(['--nope'])).toThrow(BadNameError);
      expect(() => new ArgParser().parseArgs(['--nope'])).toThrow(
        '--nope is not a recognised flag or option name'
      );
    });

    it('should reject an unknown single short name', () => {
      expect(() => new ArgParser().parseArgs(['-x'])).toThrow(
        '-x is not a recognised flag or option name'
      );
    });

    it('should name the offending character in a cluster', () => {
      const parser = new ArgParser().flag('all a');

      expect(() => parser.parseArgs(['-ax'])).toThrow(
        "'x' in -ax is not a recognised flag or option name"
      );
    });

    it('should reject an inline value for an unknown name', () => {
      expect(() => new ArgParser().parseArgs(['--nope=1'])).toThrow(
        '--nope is not a recognised option name'
      );
    });

    it('should reject an inline value for a flag', () => {
      const parser = new ArgParser().flag('flag f');

      expect(() => parser.parseArgs(['--flag=1'])).toThrow(BadNameError);
      expect(() => new ArgParser().flag('flag f').parseArgs(['-f=1'])).toThrow(
        '-f is not a recognised option name'
      );
    });

    it('should reject an empty inline value', () => {
      const parser = new ArgParser().option('opt o');

      expect(() => parser.parseArgs(['--opt='])).toThrow(MissingValueError);
      expect(() => new ArgParser().option('opt o').parseArgs(['--opt='])).toThrow(
        'missing value for --opt'
      );
    });

    it('should reject a long option at the end of input', () => {
      const parser = new ArgParser().option('opt o');

      let caught: unknown;
      try {
        parser.parseArgs(['--opt']);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MissingValueError);
      expect(caught).toMatchObject({ message: 'missing value for --opt', details: { token: '--opt' } });
    });

    it('should reject a short option at the end of input', () => {
      expect(() => new ArgParser().option('opt o').parseArgs(['-o'])).toThrow('missing value for -o');
    });

    it('should name the option character when a cluster runs out of input', () => {
      const parser = new ArgParser().flag('all a').option('out o');

      expect(() => parser.parseArgs(['-ao'])).toThrow("missing value for 'o' in -ao");
    });

    it('should keep state from tokens before the error', () => {
      const parser = new ArgParser().flag('flag f');

      expect(() => parser.parseArgs(['-f', 'pos', '--nope', '-f'])).toThrow(BadNameError);
      expect(parser.count('flag')).toBe(1);
      expect(parser.args).toEqual(['pos']);
    });
  });
});
