import { describe, expect, it, vi } from "vitest";
import { SheetsCsvSource, sheetCsvUrl } from "../src/adapters/feed.sheets";
import { FeedFetchError } from "../src/core/errors";
import { silentLogger } from "./helpers";

const URL = "https://sheets.test/export.csv";

function sourceReturning(response: Response | Error) {
  const fetchFn = vi.fn(async (_url: string, _init?: RequestInit) => {
    if (response instanceof Error) throw response;
    return response;
  });
  return { fetchFn, source: new SheetsCsvSource({ timeoutMs: 1000 }, silentLogger(), fetchFn) };
}

describe("sheetCsvUrl", () => {
  it("should build the CSV export URL for a named tab", () => {
    expect(sheetCsvUrl("sheet 1", "Work Orders")).toBe(
      "https://docs.google.com/spreadsheets/d/sheet%201/gviz/tq?tqx=out:csv&sheet=Work%20Orders"
    );
  });

  it("should omit the tab for the first sheet", () => {
    expect(sheetCsvUrl("abc")).toBe(
      "https://docs.google.com/spreadsheets/d/abc/gviz/tq?tqx=out:csv"
    );
  });
});

describe("SheetsCsvSource", () => {
  it("should parse the CSV body", async () => {
    const { fetchFn, source } = sourceReturning(
      new Response("Property,Status\n12 Birch Ln,Done\n", { status: 200 })
    );

    const table = await source.fetchTable(URL);

    expect(table).toEqual({
      columns: ["Property", "Status"],
      rows: [{ Property: "12 Birch Ln", Status: "Done" }],
    });
    expect(fetchFn).toHaveBeenCalledWith(URL, expect.objectContaining({ signal: expect.anything() }));
  });

  it("should reject non-OK responses with the status", async () => {
    const { source } = sourceReturning(new Response("gone", { status: 404 }));

    const error = await source.fetchTable(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FeedFetchError);
    expect(error).toMatchObject({ message: "Unexpected status 404", status: 404, url: URL });
  });

  it("should reject HTML sign-in pages", async () => {
    const { source } = sourceReturning(
      new Response("  <!DOCTYPE html><html></html>", { status: 200 })
    );

    await expect(source.fetchTable(URL)).rejects.toThrow("Expected CSV but received HTML");
  });

  it("should reject empty exports", async () => {
    const { source } = sourceReturning(new Response("", { status: 200 }));

    await expect(source.fetchTable(URL)).rejects.toThrow("CSV export has no header row");
  });

  it("should wrap network failures", async () => {
    const { source } = sourceReturning(new Error("connect ECONNREFUSED"));

    await expect(source.fetchTable(URL)).rejects.toThrow(
      "Request failed: connect ECONNREFUSED"
    );
  });
});
