import { FeedTable } from "./dto";

// Tabular feed (spreadsheet export, fixtures)
export interface FeedSourcePort {
  fetchTable(url: string): Promise<FeedTable>;
}

// Cache
export interface CachePort {
  get<T = unknown>(key: string): Promise<T | null>;
  set(key: string, val: unknown, ttlSec: number): Promise<void>;
}
