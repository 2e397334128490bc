import {
  createRedisConfig,
  createServiceConfig,
  parseEnvNumber,
} from "@preservation/shared-utils";
import * as dotenv from "dotenv";
import { sheetCsvUrl } from "../adapters/feed.sheets";

// Load environment variables from .env file
dotenv.config();

export const appCfg = createServiceConfig(8080);

export const feedCfg = {
  source: (process.env.FEED_SOURCE || "MOCK").toUpperCase(), // MOCK|SHEETS
  sheetId: process.env.SHEET_ID || "",
  propertiesSheet: process.env.PROPERTIES_SHEET || "Properties",
  updatesSheet: process.env.UPDATES_SHEET || "Updates",
  propertiesUrl: process.env.PROPERTIES_FEED_URL || undefined,
  updatesUrl: process.env.UPDATES_FEED_URL || undefined,
  timeoutMs: parseEnvNumber("FEED_TIMEOUT_MS", 10000),
};

export const cacheCfg = {
  adapter: (process.env.CACHE_ADAPTER || "MEMORY").toUpperCase(), // MEMORY|REDIS
  ttlSec: parseEnvNumber("FEED_CACHE_TTL_SEC", 300), // 5 minutes default
};

export const redisCfg = createRedisConfig();

/**
 * Feed locations: fixture file names in MOCK mode, CSV export URLs otherwise.
 * Explicit *_FEED_URL settings win.
 */
export function feedUrls(): { properties: string; updates: string } {
  if (feedCfg.source === "MOCK") {
    return {
      properties: feedCfg.propertiesUrl ?? "properties.csv",
      updates: feedCfg.updatesUrl ?? "updates.csv",
    };
  }

  return {
    properties:
      feedCfg.propertiesUrl ?? sheetCsvUrl(feedCfg.sheetId, feedCfg.propertiesSheet),
    updates: feedCfg.updatesUrl ?? sheetCsvUrl(feedCfg.sheetId, feedCfg.updatesSheet),
  };
}

// Validation
export function validateConfig(): void {
  if (feedCfg.source !== "MOCK" && feedCfg.source !== "SHEETS") {
    throw new Error(`FEED_SOURCE must be MOCK or SHEETS, got ${feedCfg.source}`);
  }

  if (
    feedCfg.source === "SHEETS" &&
    !feedCfg.sheetId &&
    (!feedCfg.propertiesUrl || !feedCfg.updatesUrl)
  ) {
    throw new Error(
      "SHEET_ID (or both PROPERTIES_FEED_URL and UPDATES_FEED_URL) is required when using SHEETS source"
    );
  }

  if (cacheCfg.adapter !== "MEMORY" && cacheCfg.adapter !== "REDIS") {
    throw new Error(`CACHE_ADAPTER must be MEMORY or REDIS, got ${cacheCfg.adapter}`);
  }

  if (cacheCfg.ttlSec < 60) {
    console.warn(
      "Warning: Feed cache TTL is less than 60 seconds, this may hit the spreadsheet too often"
    );
  }
}
