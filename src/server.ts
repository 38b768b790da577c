import http from "http";
import https from "https";
import axios from "axios";
import { Server, Socket } from "socket.io";

import { loadEnv } from "./config/env";
import { logger } from "./logger";
import { createApp } from "./app";
import { createSnapshotStore } from "./cache";
import { FinnhubProvider } from "./modules/finnhubProvider";
import { QuoteFetcher } from "./modules/quoteFetcher";
import { BatchFetcher } from "./modules/batchFetcher";
import { PriceHistoryService } from "./modules/priceHistory";
import { BroadcastLoop } from "./modules/broadcastLoop";
import { attachStockUpdates } from "./modules/socketSubscriber";

// -------------------------------------------------
// Env
// -------------------------------------------------
const env = loadEnv();

const snapshotStore = createSnapshotStore(env);

// -------------------------------------------------
// Quote pipeline
// -------------------------------------------------
const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
});

const axiosClient = axios.create({
    timeout: 10_000,
    httpsAgent,
});

const provider = new FinnhubProvider({ apiKey: env.FINNHUB_API_KEY, axiosClient });
const fetcher = new QuoteFetcher({ provider });
const history = new PriceHistoryService({ provider, gate: fetcher.gate });
const batchFetcher = new BatchFetcher(fetcher);

const broadcastLoop = new BroadcastLoop({
    batchFetcher,
    symbols: env.BROADCAST_SYMBOLS,
    intervalMs: env.BROADCAST_INTERVAL_MS,
    // Survives restarts; within one process the loop hydrates new clients itself
    onPublished: (payload) => snapshotStore.saveLatest(payload),
});

// -------------------------------------------------
// HTTP + Socket.IO
// -------------------------------------------------
const app = createApp({
    fetcher,
    history,
    batchFetcher,
    defaultSymbols: env.BROADCAST_SYMBOLS,
});

const server = http.createServer(app);
const io = new Server(server, {
    cors: {
        origin: env.FRONTEND_URL,
        methods: ["GET", "POST"],
        credentials: true,
    },
});

io.on("connection", (socket: Socket) => {
    logger.info({ socketId: socket.id }, "Client connected");

    attachStockUpdates(socket, { loop: broadcastLoop, store: snapshotStore }).catch((err) => {
        logger.error({ err, socketId: socket.id }, "Failed to subscribe client to stock updates");
    });
});

// -------------------------------------------------
// Graceful shutdown
// -------------------------------------------------
let shuttingDown = false;

async function shutdown(signal: string) {
    if (shuttingDown) {
        logger.warn(`Shutdown already in progress, ignoring ${signal}`);
        return;
    }
    shuttingDown = true;

    logger.info(`Received ${signal}. Shutting down gracefully...`);
    try {
        broadcastLoop.stop();

        // Also closes the underlying HTTP server
        await io.close();
        logger.info("Socket.io and HTTP server closed");

        httpsAgent.destroy();
        snapshotStore.close();
        logger.info("Snapshot store connection closed");

        setTimeout(() => process.exit(0), 3000);
    } catch (err) {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
    }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

// -------------------------------------------------
// Start the service
// -------------------------------------------------
(async () => {
    await snapshotStore.connect();

    const PORT = Number(env.SERVER_PORT);
    server.listen(PORT, () => {
        logger.info({ symbols: env.BROADCAST_SYMBOLS }, `Server running on http://localhost:${PORT}`);
    });
})().catch((err) => {
    logger.fatal({ err }, "Failed to start server");
    process.exit(1);
});
