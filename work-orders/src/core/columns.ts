import { FeedTable } from "./dto";

export function normalizeHeader(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Header lookup built once per fetched table. Logical field names resolve to
 * the table's actual header regardless of case or surrounding whitespace.
 */
export class ColumnIndex {
  private byKey = new Map<string, string>();

  constructor(headers: readonly string[]) {
    for (const header of headers) {
      const key = normalizeHeader(header);
      // first occurrence wins on duplicate headers
      if (!this.byKey.has(key)) this.byKey.set(key, header);
    }
  }

  static of(table: FeedTable): ColumnIndex {
    return new ColumnIndex(table.columns);
  }

  /** Actual header for the first accepted name present */
  resolve(names: readonly string[]): string | undefined {
    for (const name of names) {
      const header = this.byKey.get(normalizeHeader(name));
      if (header !== undefined) return header;
    }
    return undefined;
  }

  has(names: readonly string[]): boolean {
    return this.resolve(names) !== undefined;
  }

  /**
   * Reader for a logical column; reads "" for every row when absent.
   */
  reader(names: readonly string[]): (row: Record<string, string>) => string {
    const header = this.resolve(names);
    if (header === undefined) return () => "";
    return (row) => row[header] ?? "";
  }
}

// logical field → accepted header names, most preferred first
export type ColumnSpec = Readonly<Record<string, readonly string[]>>;

/**
 * Fields of `spec` that no header in the table satisfies.
 */
export function missingColumns(index: ColumnIndex, spec: ColumnSpec): string[] {
  return Object.entries(spec)
    .filter(([, names]) => !index.has(names))
    .map(([field]) => field);
}

export function emptyTable(spec: ColumnSpec): FeedTable {
  return {
    columns: Object.entries(spec).map(([field, names]) => names[0] ?? field),
    rows: [],
  };
}
