/**
 * Argument sources feeding the parser one token at a time.
 */

/** Forward-only token stream. The first token is the program name. */
export interface ArgumentSource {
  next(): string | undefined;
}

/** Source over an in-memory list, mainly for tests and embedding. */
export class ListSource implements ArgumentSource {
  private index = 0;
  private readonly items: readonly string[];

  constructor(items: readonly string[]) {
    this.items = [...items];
  }

  next(): string | undefined {
    if (this.index >= this.items.length) {
      return undefined;
    }
    const item = this.items[this.index];
    this.index++;
    return item;
  }
}

export function fromList(items: readonly string[]): ArgumentSource {
  return new ListSource(items);
}

/**
 * Source over process arguments. `process.argv[0]` is the node binary, so the
 * script path at index 1 stands in for the program name.
 */
export function fromProcess(argv: readonly string[] = process.argv): ArgumentSource {
  return new ListSource(argv.slice(1));
}
