/**
 * Ordered, case-insensitive header multimap.
 *
 * HTTP allows the same field to appear more than once (`Set-Cookie`, `Via`,
 * `Accept` split across lines) and the order of those lines is meaningful
 * to some servers. A `Record<string, string>` loses both, so captured
 * messages keep their headers as a list of `[name, value]` pairs and only
 * lookups fold case.
 */

export type HeaderEntry = readonly [name: string, value: string];

export class Headers implements Iterable<HeaderEntry> {
  private fields: [string, string][];

  constructor(entries: Iterable<HeaderEntry> = []) {
    this.fields = [];
    for (const [name, value] of entries) {
      this.fields.push([name, value]);
    }
  }

  get size(): number {
    return this.fields.length;
  }

  /**
   * First value for `name`, or undefined when the header is absent.
   */
  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.fields.find(([n]) => n.toLowerCase() === key)?.[1];
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.fields.filter(([n]) => n.toLowerCase() === key).map(([, v]) => v);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  append(name: string, value: string): void {
    this.fields.push([name, value]);
  }

  /**
   * Replace the first entry for `name` in place and drop any later ones.
   * Appends when the header is absent.
   */
  set(name: string, value: string): void {
    const key = name.toLowerCase();
    let replaced = false;
    const next: [string, string][] = [];

    for (const field of this.fields) {
      if (field[0].toLowerCase() !== key) {
        next.push(field);
      } else if (!replaced) {
        next.push([field[0], value]);
        replaced = true;
      }
    }

    if (!replaced) {
      next.push([name, value]);
    }
    this.fields = next;
  }

  /**
   * Remove every entry for `name`. Returns how many were removed.
   */
  delete(name: string): number {
    const key = name.toLowerCase();
    const before = this.fields.length;
    this.fields = this.fields.filter(([n]) => n.toLowerCase() !== key);
    return before - this.fields.length;
  }

  entries(): HeaderEntry[] {
    return this.fields.map(([n, v]) => [n, v] as const);
  }

  clone(): Headers {
    return new Headers(this.fields);
  }

  [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.entries()[Symbol.iterator]();
  }
}
