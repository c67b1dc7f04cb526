const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/u;

export type RawHeaderValue = string | string[] | number | undefined;

export const isValidHeaderName = (name: string) => HTTP_HEADER_NAME_REGEX.test(name.trim());

export const isValidHeaderValue = (value: string) => !/[\r\n\0]/u.test(value);

export const normalizeHeaderName = (name: string) => name.trim().toLowerCase();

const isHeaderPairIterable = (
  value: Record<string, RawHeaderValue> | Iterable<readonly [string, string]>
): value is Iterable<readonly [string, string]> => Symbol.iterator in value;

/**
 * Header collection keyed by lower-cased name. Setting a name that differs
 * only in case replaces the previous entry, so a name is present at most once.
 */
export class HeaderMap {
  private readonly entriesByName = new Map<string, string>();

  public static from(init: Record<string, RawHeaderValue> | Iterable<readonly [string, string]>): HeaderMap {
    const headers = new HeaderMap();
    const pairs: Iterable<readonly [string, RawHeaderValue]> = isHeaderPairIterable(init)
      ? init
      : Object.entries(init);

    for (const [name, rawValue] of pairs) {
      if (rawValue === undefined || !isValidHeaderName(name)) {
        continue;
      }

      const value = Array.isArray(rawValue) ? rawValue.join(', ') : String(rawValue);
      if (!isValidHeaderValue(value)) {
        continue;
      }

      headers.set(name, value);
    }

    return headers;
  }

  public get size() {
    return this.entriesByName.size;
  }

  public get(name: string): string | undefined {
    return this.entriesByName.get(normalizeHeaderName(name));
  }

  public has(name: string) {
    return this.entriesByName.has(normalizeHeaderName(name));
  }

  public set(name: string, value: string): this {
    if (!isValidHeaderName(name)) {
      throw new TypeError(`Invalid header name: ${name}`);
    }

    if (!isValidHeaderValue(value)) {
      throw new TypeError(`Header ${normalizeHeaderName(name)} has a value with control characters`);
    }

    this.entriesByName.set(normalizeHeaderName(name), value.trim());
    return this;
  }

  public delete(name: string) {
    return this.entriesByName.delete(normalizeHeaderName(name));
  }

  public entries(): IterableIterator<[string, string]> {
    return this.entriesByName.entries();
  }

  public [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  public clone(): HeaderMap {
    return HeaderMap.from(this.entriesByName);
  }

  public toRecord(): Record<string, string> {
    return Object.fromEntries(this.entriesByName);
  }
}
