#!/usr/bin/env node

/**
 * Work orders dashboard HTTP server
 */

import {
  createLogger,
  MemoryCache,
  ServiceLifecycle,
  ServiceState,
} from "@preservation/shared-utils";
import { Server } from "http";
import { RedisCache } from "../adapters/cache.redis";
import { CachedFeedSource } from "../adapters/feed.cached";
import { FixtureFeedSource } from "../adapters/feed.fixtures";
import { SheetsCsvSource } from "../adapters/feed.sheets";
import { appCfg, cacheCfg, feedCfg, feedUrls, redisCfg, validateConfig } from "../config/env";
import { CachePort, FeedSourcePort } from "../core/ports";
import { DashboardService } from "../core/refresh";
import { createApp } from "../http/app";

async function main(): Promise<void> {
  validateConfig();

  const logger = createLogger("work-orders", appCfg.logLevel);
  const lifecycle = new ServiceLifecycle(logger.child("lifecycle"), {
    handleSignals: true,
    shutdownTimeoutMs: 10000,
  });

  let cache: CachePort;
  if (cacheCfg.adapter === "REDIS") {
    const redis = new RedisCache({ url: redisCfg.url }, logger.child("redis"));
    lifecycle.addShutdownHandler(() => redis.disconnect());
    cache = redis;
  } else {
    cache = new MemoryCache();
  }

  const source: FeedSourcePort =
    feedCfg.source === "SHEETS"
      ? new SheetsCsvSource({ timeoutMs: feedCfg.timeoutMs }, logger.child("sheets"))
      : new FixtureFeedSource();

  const dashboard = new DashboardService({
    feeds: new CachedFeedSource(source, cache, cacheCfg.ttlSec, logger.child("cache")),
    urls: feedUrls(),
    logger,
  });

  const app = createApp({
    dashboard,
    logger,
    health: () => ({
      healthy: lifecycle.isHealthy(),
      uptimeSeconds: lifecycle.getUptimeSeconds(),
    }),
  });

  const port = appCfg.port ?? 8080;
  const server: Server = app.listen(port, () => {
    logger.info(`Dashboard API listening on http://localhost:${port} (${feedCfg.source} feeds)`);
    lifecycle.setState(ServiceState.RUNNING);
  });

  lifecycle.addShutdownHandler(
    () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  );
}

// Start the service
if (require.main === module) {
  main().catch((error) => {
    console.error("Failed to start work orders service:", error);
    process.exit(1);
  });
}
