import { Redis } from "ioredis";
import type { Logger } from "./log.js";

/** Destination for precomputed tables read back later by the interactive viewer. */
export interface KeyValueStore {
  set(key: string, value: unknown): Promise<void>;
  close(): Promise<void>;
}

/** Stores every value as a JSON string under its key. */
export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(host: string, port: number, private readonly logger?: Logger) {
    this.logger?.info(`Connecting to redis at ${host}:${port}`);
    this.client = new Redis({ host, port, maxRetriesPerRequest: 3 });
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.client.set(key, JSON.stringify(value));
  }

  async close(): Promise<void> {
    await this.client.quit();
    this.logger?.info("Closed connection to redis");
  }
}
