import { Location } from './types.js';

/**
 * One distinct string and every place it was seen
 */
export interface CatalogEntry {
  msgid: string;
  locations: Location[];
}

/**
 * Escape decoded text for a quoted catalog string.
 * Only backslash and double quote are transformed.
 */
export function escapeCatalogString(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Accumulates translatable strings, keyed by decoded text.
 *
 * Entries are never removed. A location is appended every time a string is
 * recorded, so the same string seen twice on one line has two location lines.
 */
export class Catalog {
  private readonly index = new Map<string, Location[]>();

  record(text: string, location: Location): void {
    const locations = this.index.get(text);
    if (locations) {
      locations.push({ ...location });
    } else {
      this.index.set(text, [{ ...location }]);
    }
  }

  get size(): number {
    return this.index.size;
  }

  has(text: string): boolean {
    return this.index.has(text);
  }

  locations(text: string): Location[] {
    return (this.index.get(text) ?? []).map(l => ({ ...l }));
  }

  entries(): CatalogEntry[] {
    return Array.from(this.index, ([msgid, locations]) => ({
      msgid,
      locations: locations.map(l => ({ ...l }))
    }));
  }

  /**
   * Render as translation template text: per entry, one `#:` line per
   * location, the msgid, an empty msgstr and a blank separator line.
   */
  serialize(): string {
    let out = '';
    for (const [msgid, locations] of this.index) {
      for (const { source, line } of locations) {
        out += `#: ${source}:${line}\n`;
      }
      out += `msgid "${escapeCatalogString(msgid)}"\n`;
      out += 'msgstr ""\n';
      out += '\n';
    }
    return out;
  }

  toJSON(): CatalogEntry[] {
    return this.entries();
  }
}
