import { Logger } from "@preservation/shared-utils";
import { FeedTable } from "../core/dto";
import { CachePort, FeedSourcePort } from "../core/ports";

/**
 * Caches fetched tables per feed URL. Failed fetches are not cached, so the
 * next cycle retries.
 */
export class CachedFeedSource implements FeedSourcePort {
  constructor(
    private inner: FeedSourcePort,
    private cache: CachePort,
    private ttlSec: number,
    private logger: Logger
  ) {}

  static key(url: string): string {
    return `feed:${url}`;
  }

  async fetchTable(url: string): Promise<FeedTable> {
    const key = CachedFeedSource.key(url);

    const cached = await this.cache.get<FeedTable>(key);
    if (cached) {
      this.logger.debug(`Cache hit for ${url}`);
      return cached;
    }

    const table = await this.inner.fetchTable(url);
    await this.cache.set(key, table, this.ttlSec);
    return table;
  }
}
