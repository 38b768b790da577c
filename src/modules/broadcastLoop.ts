import { logger } from "../logger";
import { BatchFetcher } from "./batchFetcher";
import { Subscriber } from "../interfaces/subscriber";
import { StockUpdatePayload, toStockUpdate } from "../interfaces/stockUpdate";

export const BROADCAST_INTERVAL_MS = 30_000;

export type BroadcastLoopOptions = {
    batchFetcher: Pick<BatchFetcher, "fetchMany">;
    symbols: readonly string[];
    intervalMs?: number;
    // Run a tick as soon as the loop starts instead of one interval later
    tickOnStart?: boolean;
    onPublished?: (payload: StockUpdatePayload) => Promise<void>;
};

/**
 * Pushes one batch of quotes to every subscriber on a fixed cadence. The
 * timer runs only while at least one subscriber is connected.
 */
export class BroadcastLoop {
    private readonly subscribers = new Set<Subscriber>();
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private latestPayload: StockUpdatePayload | null = null;

    constructor(private readonly options: BroadcastLoopOptions) {}

    /**
     * Adds a subscriber and hands it the last broadcast payload, if any, so it
     * does not wait a full interval for its first update.
     */
    subscribe(subscriber: Subscriber): void {
        if (this.subscribers.has(subscriber)) return;

        this.subscribers.add(subscriber);
        logger.info(
            { subscriberId: subscriber.id, subscribers: this.subscribers.size },
            "Subscriber joined stock broadcast"
        );

        if (this.latestPayload) this.sendLatest(subscriber, this.latestPayload);
        this.start();
    }

    unsubscribe(subscriber: Subscriber): void {
        if (!this.subscribers.delete(subscriber)) return;

        logger.info(
            { subscriberId: subscriber.id, subscribers: this.subscribers.size },
            "Subscriber left stock broadcast"
        );
        if (this.subscribers.size === 0) this.stop();
    }

    subscriberCount(): number {
        return this.subscribers.size;
    }

    latest(): StockUpdatePayload | null {
        return this.latestPayload;
    }

    isRunning(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer) return;

        const intervalMs = this.options.intervalMs ?? BROADCAST_INTERVAL_MS;
        this.timer = setInterval(() => this.runScheduledTick(), intervalMs);
        logger.info({ intervalMs, symbols: this.options.symbols }, "Stock broadcast loop started");

        if (this.options.tickOnStart ?? true) this.runScheduledTick();
    }

    stop(): void {
        if (!this.timer) return;

        clearInterval(this.timer);
        this.timer = null;
        // Stale once nobody is listening; the next start ticks right away
        this.latestPayload = null;
        logger.info("Stock broadcast loop stopped");
    }

    /**
     * Fetches once and delivers to every current subscriber. A subscriber that
     * is closed or whose send fails is removed after the delivery pass; the
     * others still receive the update. Overlapping calls share one run.
     */
    tick(): Promise<void> {
        if (this.inFlight) {
            logger.debug("Broadcast tick already running, skipping");
            return this.inFlight;
        }

        this.inFlight = this.broadcast().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    private runScheduledTick(): void {
        this.tick().catch((err) => {
            logger.error({ err }, "Stock broadcast tick failed");
        });
    }

    private sendLatest(subscriber: Subscriber, payload: StockUpdatePayload): void {
        Promise.resolve()
            .then(() => subscriber.send(payload))
            .catch((err) => {
                logger.warn(
                    { subscriberId: subscriber.id, err },
                    "Failed to deliver stock update, dropping subscriber"
                );
                this.unsubscribe(subscriber);
            });
    }

    private async broadcast(): Promise<void> {
        if (this.subscribers.size === 0) return;

        const data = await this.options.batchFetcher.fetchMany(this.options.symbols);
        const payload = toStockUpdate(data);
        if (this.subscribers.size === 0) return;
        this.latestPayload = payload;

        const targets = [...this.subscribers];
        const results = await Promise.allSettled(
            targets.map(async (subscriber) => {
                if (!subscriber.isOpen()) {
                    throw new Error("Subscriber connection closed");
                }
                await subscriber.send(payload);
            })
        );

        let delivered = 0;
        results.forEach((result, i) => {
            const subscriber = targets[i];
            if (result.status === "fulfilled") {
                delivered++;
                return;
            }
            logger.warn(
                { subscriberId: subscriber.id, err: result.reason },
                "Failed to deliver stock update, dropping subscriber"
            );
            this.unsubscribe(subscriber);
        });

        logger.debug({ delivered, dropped: targets.length - delivered }, "Stock update broadcast");

        if (delivered > 0 && this.options.onPublished) {
            try {
                await this.options.onPublished(payload);
            } catch (err) {
                logger.error({ err }, "Failed to publish stock update snapshot");
            }
        }
    }
}
