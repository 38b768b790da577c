import IORedis from "ioredis";
import { logger } from "../logger";
import { Env } from "../config/env";
import { StockUpdatePayload } from "../interfaces/stockUpdate";
import { stockUpdatePayloadSchema } from "../schemas/stockUpdate.schema";
import {
  STOCK_BROADCAST_CACHE_KEY,
  STOCK_BROADCAST_TTL_SECONDS,
} from "../constants/stocks";

const RECONNECT_DELAY_MS = 5000;

export type SnapshotStoreConfig = Pick<Env, "VALKEY_HOST" | "VALKEY_PORT" | "VALKEY_PASSWORD">;

/**
 * Last broadcast payload kept in Valkey, so clients are hydrated across
 * restarts. Best effort: while Valkey is down reads miss and writes are
 * skipped.
 */
export interface SnapshotStore {
  connect(): Promise<void>;
  isAvailable(): boolean;
  getLatest(): Promise<StockUpdatePayload | null>;
  saveLatest(payload: StockUpdatePayload): Promise<void>;
  close(): void;
}

export function createSnapshotStore(config: SnapshotStoreConfig): SnapshotStore {
  let available = false;
  let closing = false;

  const redis = new IORedis({
    host: config.VALKEY_HOST,
    port: config.VALKEY_PORT,
    password: config.VALKEY_PASSWORD,
    retryStrategy: () => (closing ? null : RECONNECT_DELAY_MS),
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  redis.on("connect", () => {
    if (!available) {
      available = true;
      logger.info({ host: config.VALKEY_HOST, port: config.VALKEY_PORT }, "Valkey connected");
    }
  });

  redis.on("error", (err: Error) => {
    if (available) {
      available = false;
      logger.warn({ err: err.message }, "Valkey unavailable, running without snapshot store");
    }
  });

  redis.on("close", () => {
    if (available) {
      available = false;
      logger.warn("Valkey connection closed");
    }
  });

  return {
    async connect() {
      try {
        await redis.connect();
      } catch (err) {
        // retryStrategy keeps reconnecting in the background
        logger.warn({ err }, "Valkey unavailable at startup, running without snapshot store");
      }
    },

    isAvailable: () => available,

    async getLatest() {
      if (!available) return null;

      try {
        const raw = await redis.get(STOCK_BROADCAST_CACHE_KEY);
        if (!raw) return null;

        const parsed = stockUpdatePayloadSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
          logger.warn({ issues: parsed.error.issues }, "Discarding malformed stock snapshot");
          return null;
        }
        return parsed.data;
      } catch (err) {
        logger.warn({ err }, "Error while reading stock snapshot");
        return null;
      }
    },

    async saveLatest(payload) {
      if (!available) return;

      try {
        await redis.set(
          STOCK_BROADCAST_CACHE_KEY,
          JSON.stringify(payload),
          "EX",
          STOCK_BROADCAST_TTL_SECONDS
        );
      } catch (err) {
        logger.error({ err }, "Error while saving stock snapshot");
      }
    },

    close() {
      closing = true;
      available = false;
      redis.disconnect();
    },
  };
}
