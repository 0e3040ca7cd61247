export interface HttpHeader {
  /** Field name as it arrived on the wire. */
  readonly name: string;
  readonly value: string;
}

/** Lookup side of {@link HttpHeaders}, handed out while the parser owns the fields. */
export interface ReadonlyHttpHeaders extends Iterable<HttpHeader> {
  /** First value for `name`, any casing. */
  get(name: string): string | undefined;
  getAll(name: string): readonly string[];
  has(name: string): boolean;
  readonly size: number;
  entries(): readonly HttpHeader[];
  toJSON(): Array<[string, string]>;
}

// Arrays are copied on the way out so a caller cannot reach the backing lists.
class HeadersView implements ReadonlyHttpHeaders {
  constructor(private readonly source: HttpHeaders) {}

  get(name: string): string | undefined {
    return this.source.get(name);
  }

  getAll(name: string): readonly string[] {
    return [...this.source.getAll(name)];
  }

  has(name: string): boolean {
    return this.source.has(name);
  }

  get size(): number {
    return this.source.size;
  }

  entries(): readonly HttpHeader[] {
    return [...this.source.entries()];
  }

  [Symbol.iterator](): Iterator<HttpHeader> {
    return this.entries()[Symbol.iterator]();
  }

  toJSON(): Array<[string, string]> {
    return this.source.toJSON();
  }
}

/**
 * Header fields in arrival order, duplicates kept, with a
 * case-insensitive index for lookups.
 */
export class HttpHeaders implements ReadonlyHttpHeaders {
  private readonly list: HttpHeader[] = [];
  private readonly index = new Map<string, string[]>();

  /** Live view without `append`; reads see fields added later. */
  readonly view: ReadonlyHttpHeaders = new HeadersView(this);

  append(name: string, value: string): HttpHeader {
    const header: HttpHeader = Object.freeze({ name, value });
    this.list.push(header);

    const key = name.toLowerCase();
    const values = this.index.get(key);
    if (values) {
      values.push(value);
    } else {
      this.index.set(key, [value]);
    }
    return header;
  }

  get(name: string): string | undefined {
    return this.index.get(name.toLowerCase())?.[0];
  }

  getAll(name: string): readonly string[] {
    return this.index.get(name.toLowerCase()) ?? [];
  }

  has(name: string): boolean {
    return this.index.has(name.toLowerCase());
  }

  get size(): number {
    return this.list.length;
  }

  entries(): readonly HttpHeader[] {
    return this.list;
  }

  [Symbol.iterator](): Iterator<HttpHeader> {
    return this.list[Symbol.iterator]();
  }

  toJSON(): Array<[string, string]> {
    return this.list.map((h) => [h.name, h.value]);
  }
}
