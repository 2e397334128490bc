import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { FeedTable } from "../src/core/dto";
import { FeedFetchError } from "../src/core/errors";
import { DashboardService } from "../src/core/refresh";
import { silentLogger } from "./helpers";

const NOW = new Date(2025, 2, 10, 9);

const UPDATES: FeedTable = {
  columns: ["Property", "Crew Name", "Due Date", "Status"],
  rows: [
    { Property: "12 Birch Ln", "Crew Name": "North Crew", "Due Date": "03/09/25", Status: "Completed" },
    { Property: "7 Mill St", "Crew Name": "North Crew", "Due Date": "N/A", Status: "Overdue - no crew" },
    {
      Property: "48 Harbor Rd",
      "Crew Name": "South Crew",
      "Due Date": "2025-03-14",
      Status: "Waiting on activation",
    },
    { Property: "95 Oak Ct", "Crew Name": "", "Due Date": "2025-03-01", Status: "" },
  ],
};

describe("DashboardService", () => {
  let fetchTable: Mock<[string], Promise<FeedTable>>;
  let service: DashboardService;

  beforeEach(() => {
    fetchTable = vi.fn(async (url: string): Promise<FeedTable> => {
      if (url === "properties.csv") {
        throw new FeedFetchError("sheet offline", url);
      }
      return UPDATES;
    });
    service = new DashboardService({
      feeds: { fetchTable },
      urls: { properties: "properties.csv", updates: "updates.csv" },
      logger: silentLogger(),
      clock: () => NOW,
    });
  });

  it("should build metrics from the updates feed", async () => {
    const view = await service.refresh();

    expect(view.today).toBe("2025-03-10");
    expect(view.metrics).toEqual({
      total: 4,
      countsByCategory: { Completed: 1, Overdue: 2, InProgress: 0, PendingBid: 1, Other: 0 },
      completionRate: 25,
      distinctCrewCount: 2,
      topCrew: { name: "North Crew", count: 2 },
      dueSoonCount: 2,
    });
  });

  it("should order the urgent worklist by due date with unknown dates last", async () => {
    const view = await service.refresh();

    expect(view.worklists.urgent.map((r) => r.propertyId)).toEqual([
      "95 Oak Ct",
      "48 Harbor Rd",
      "7 Mill St",
    ]);
    expect(view.worklists.pending.map((r) => r.propertyId)).toEqual(["48 Harbor Rd"]);
  });

  it("should keep refreshing when one feed fails", async () => {
    const view = await service.refresh();

    expect(view.notices).toEqual([
      { feed: "properties", level: "error", message: "Failed to load properties feed: sheet offline" },
      { feed: "updates", level: "info", message: "Loaded 4 updates rows" },
      { feed: "updates", level: "warn", message: "Missing columns: details, reason" },
    ]);
    expect(view.properties).toEqual({ center: [24, 90], pins: [], droppedRows: 0 });
  });

  it("should track refresh metrics", async () => {
    await service.refresh();
    await service.refresh();

    expect(service.getMetrics()).toEqual({
      refreshes: 2,
      feedFailures: 2,
      lastRefreshAt: NOW.toISOString(),
    });
  });

  it("should evaluate dates against an explicit reference time", async () => {
    const view = await service.refresh(new Date(2025, 2, 20, 9));

    expect(view.today).toBe("2025-03-20");
    expect(view.worklists.overdue.map((r) => r.propertyId)).toEqual([
      "95 Oak Ct",
      "48 Harbor Rd",
      "7 Mill St",
    ]);
    expect(fetchTable).toHaveBeenCalledTimes(2);
  });
});
