import { describe, expect, it } from "vitest";
import { parseCsvTable } from "../src/adapters/csv";

describe("parseCsvTable", () => {
  it("should keep headers as written and read quoted cells", () => {
    const table = parseCsvTable(' Property ,Due Date\n12 Birch Ln,"Mar 12, 2025"\n');

    expect(table).toEqual({
      columns: [" Property ", "Due Date"],
      rows: [{ " Property ": "12 Birch Ln", "Due Date": "Mar 12, 2025" }],
    });
  });

  it("should fill short rows and skip blank lines", () => {
    const table = parseCsvTable("Name,Status\nA,Done\n\n  \nB\n");

    expect(table.rows).toEqual([
      { Name: "A", Status: "Done" },
      { Name: "B", Status: "" },
    ]);
  });

  it("should return no columns for empty input", () => {
    expect(parseCsvTable("")).toEqual({ columns: [], rows: [] });
  });
});
