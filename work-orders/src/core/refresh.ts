import { Logger } from "@preservation/shared-utils";
import { DashboardView, FeedName, FeedNotice, FeedTable } from "./dto";
import { ColumnIndex, ColumnSpec, emptyTable, missingColumns } from "./columns";
import { errorMessage } from "./errors";
import { FeedSourcePort } from "./ports";
import { PROPERTY_COLUMNS, UPDATE_COLUMNS } from "./records";
import { buildDashboardView } from "./view";

export interface FeedUrls {
  properties: string;
  updates: string;
}

export interface FeedLoad {
  table: FeedTable;
  notices: FeedNotice[];
}

export interface RefreshDependencies {
  feeds: FeedSourcePort;
  urls: FeedUrls;
  logger: Logger;
  clock?: () => Date;
}

export interface RefreshMetrics {
  refreshes: number;
  feedFailures: number;
  lastRefreshAt?: string;
}

const FEED_COLUMNS: Record<FeedName, ColumnSpec> = {
  properties: PROPERTY_COLUMNS,
  updates: UPDATE_COLUMNS,
};

/**
 * One refresh cycle per call: both feeds are fetched concurrently, then the
 * view is rebuilt from scratch. A feed that fails to load contributes an
 * empty table and an error notice instead of failing the cycle.
 */
export class DashboardService {
  private clock: () => Date;
  private metrics: RefreshMetrics = { refreshes: 0, feedFailures: 0 };

  constructor(private deps: RefreshDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async refresh(now: Date = this.clock()): Promise<DashboardView> {
    const startTime = Date.now();

    const [properties, updates] = await Promise.all([
      this.loadFeed("properties", this.deps.urls.properties),
      this.loadFeed("updates", this.deps.urls.updates),
    ]);

    const view = buildDashboardView(
      {
        properties: properties.table,
        updates: updates.table,
        notices: [...properties.notices, ...updates.notices],
      },
      now
    );

    this.metrics.refreshes++;
    this.metrics.lastRefreshAt = view.generatedAt;
    this.deps.logger.info("Refresh completed:", {
      today: view.today,
      records: view.records.length,
      pins: view.properties.pins.length,
      urgent: view.worklists.urgent.length,
      durationMs: Date.now() - startTime,
    });

    return view;
  }

  async loadFeed(feed: FeedName, url: string): Promise<FeedLoad> {
    const spec = FEED_COLUMNS[feed];

    let table: FeedTable;
    try {
      table = await this.deps.feeds.fetchTable(url);
    } catch (error) {
      this.metrics.feedFailures++;
      this.deps.logger.error(`Failed to load ${feed} feed:`, error);
      return {
        table: emptyTable(spec),
        notices: [
          {
            feed,
            level: "error",
            message: `Failed to load ${feed} feed: ${errorMessage(error)}`,
          },
        ],
      };
    }

    const notices: FeedNotice[] = [
      { feed, level: "info", message: `Loaded ${table.rows.length} ${feed} rows` },
    ];

    const missing = missingColumns(ColumnIndex.of(table), spec);
    if (missing.length > 0) {
      this.deps.logger.warn(`${feed} feed is missing columns:`, missing);
      notices.push({
        feed,
        level: "warn",
        message: `Missing columns: ${missing.join(", ")}`,
      });
    }

    return { table, notices };
  }

  getMetrics(): RefreshMetrics {
    return { ...this.metrics };
  }
}
