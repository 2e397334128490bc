import Papa from "papaparse";
import { FeedTable } from "../core/dto";

/**
 * Parse a CSV export with a header row. Headers are kept as written;
 * cells missing from short rows read as "".
 */
export function parseCsvTable(text: string): FeedTable {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    skipEmptyLines: "greedy",
  });

  const columns = result.meta.fields ?? [];
  const rows = result.data.map((raw) => {
    const row: Record<string, string> = {};
    for (const column of columns) {
      const value = raw[column];
      row[column] = typeof value === "string" ? value : "";
    }
    return row;
  });

  return { columns, rows };
}
