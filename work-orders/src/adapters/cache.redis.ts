import { Logger } from "@preservation/shared-utils";
import { createClient } from "redis";
import { CachePort } from "../core/ports";

type RedisClient = ReturnType<typeof createClient>;

/**
 * Shared feed cache for several dashboard instances. Cache failures are
 * logged and read as misses; they never fail a refresh.
 */
export class RedisCache implements CachePort {
  private client: RedisClient;

  constructor(options: { url: string }, private logger: Logger) {
    this.client = createClient({
      url: options.url,
      socket: {
        reconnectStrategy: (retries: number) => {
          if (retries > 10) {
            return new Error("Too many retries");
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    this.client.on("error", (err: unknown) => {
      this.logger.error("Redis Client Error:", err);
    });
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
  }

  async disconnect(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  async get<T = unknown>(key: string): Promise<T | null> {
    try {
      await this.connect();

      const value = await this.client.get(key);
      if (value === null) {
        return null;
      }

      return JSON.parse(value) as T;
    } catch (error) {
      this.logger.error(`Redis GET error for key ${key}:`, error);
      return null;
    }
  }

  async set(key: string, val: unknown, ttlSec: number): Promise<void> {
    try {
      await this.connect();
      await this.client.setEx(key, ttlSec, JSON.stringify(val));
    } catch (error) {
      this.logger.error(`Redis SET error for key ${key}:`, error);
    }
  }
}
