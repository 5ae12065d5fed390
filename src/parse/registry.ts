import type { QueryParser } from '../types.js';

/** Maps every clause name (and its camelCase alias) to the parser that reads it. */
export class ClauseRegistry {
  private readonly parsers: Map<string, QueryParser> = new Map();

  register(parser: QueryParser): this {
    for (const name of parser.names()) {
      if (this.parsers.has(name)) {
        throw new Error(`ClauseRegistry: a parser is already registered for [${name}]`);
      }
      this.parsers.set(name, parser);
    }
    return this;
  }

  lookup(name: string): QueryParser | undefined {
    return this.parsers.get(name);
  }

  names(): string[] {
    return [...this.parsers.keys()];
  }
}
