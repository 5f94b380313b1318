/**
 * Alias-indexed entry store.
 *
 * A parser keeps one table each for options, flags and commands. Entries are
 * kept in registration order; every alias maps to an index into that list so
 * that all aliases of an entry share its accumulated state.
 */

/**
 * Split a registration spec such as `"verbose v"` into its aliases.
 */
export function parseAliasSpec(spec: string): string[] {
  return spec.split(/\s+/).filter((alias) => alias.length > 0);
}

export class AliasTable<T> {
  private readonly items: T[] = [];
  private readonly registered: string[][] = [];
  private readonly index = new Map<string, number>();

  /**
   * Append an entry and bind each alias in `spec` to it.
   * A later registration of the same alias takes the binding over; the earlier
   * entry stays in the list. An empty spec registers an unreachable entry.
   */
  register(spec: string, entry: T): number {
    const aliases = parseAliasSpec(spec);
    this.items.push(entry);
    this.registered.push([...new Set(aliases)]);
    const position = this.items.length - 1;
    for (const alias of aliases) {
      this.index.set(alias, position);
    }
    return position;
  }

  lookup(alias: string): T | undefined {
    const position = this.index.get(alias);
    return position === undefined ? undefined : this.items[position];
  }

  has(alias: string): boolean {
    return this.index.has(alias);
  }

  indexOf(alias: string): number | undefined {
    return this.index.get(alias);
  }

  /**
   * Aliases of the entry at `position` in the order its spec listed them,
   * minus any that a later registration has taken over.
   */
  aliasesOf(position: number): string[] {
    const aliases = this.registered[position] ?? [];
    return aliases.filter((alias) => this.index.get(alias) === position);
  }

  get entries(): readonly T[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }
}
