/**
 * Single-pass cursor over command line tokens.
 *
 * One stream is shared by a parser and every command parser it dispatches
 * to, so a nested parse continues from wherever its parent stopped.
 */
export class TokenStream {
  private cursor = 0;

  constructor(private readonly tokens: readonly string[]) {}

  hasNext(): boolean {
    return this.cursor < this.tokens.length;
  }

  next(): string {
    if (!this.hasNext()) {
      throw new RangeError('token stream is exhausted');
    }
    const token = this.tokens[this.cursor];
    this.cursor += 1;
    return token;
  }

  /** Number of tokens not yet consumed. */
  remaining(): number {
    return this.tokens.length - this.cursor;
  }
}
