import { Logger } from "@preservation/shared-utils";
import { FeedTable } from "../core/dto";
import { errorMessage, FeedFetchError } from "../core/errors";
import { FeedSourcePort } from "../core/ports";
import { parseCsvTable } from "./csv";

/**
 * CSV export URL of one tab of a spreadsheet
 */
export function sheetCsvUrl(sheetId: string, sheetName?: string): string {
  const base = `https://docs.google.com/spreadsheets/d/${encodeURIComponent(sheetId)}/gviz/tq?tqx=out:csv`;
  return sheetName ? `${base}&sheet=${encodeURIComponent(sheetName)}` : base;
}

type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export class SheetsCsvSource implements FeedSourcePort {
  constructor(
    private options: { timeoutMs: number },
    private logger: Logger,
    private fetchFn: FetchFn = fetch
  ) {}

  async fetchTable(url: string): Promise<FeedTable> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new FeedFetchError(`Request failed: ${errorMessage(error)}`, url, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new FeedFetchError(`Unexpected status ${response.status}`, url, response.status);
    }

    const text = await response.text();
    // private sheets answer with a sign-in page instead of CSV
    if (/^\s*</.test(text)) {
      throw new FeedFetchError("Expected CSV but received HTML", url, response.status);
    }

    const table = parseCsvTable(text);
    if (table.columns.length === 0) {
      throw new FeedFetchError("CSV export has no header row", url, response.status);
    }
    this.logger.debug(`Fetched ${table.rows.length} rows from ${url}`);
    return table;
  }
}
