import express, { ErrorRequestHandler, Express } from "express";
import { logger } from "./logger";
import { HttpError } from "./errors";
import { createStocksRouter, StocksRouterDeps } from "./routes/stocks";

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof HttpError) {
        res.status(err.status).json({ error: err.message });
        return;
    }

    logger.error({ err, path: req.path }, "Unhandled request error");
    res.status(500).json({ error: "Internal server error" });
};

export function createApp(deps: StocksRouterDeps): Express {
    const app = express();
    app.set("trust proxy", true);

    app.get("/", (_req, res) => {
        res.json({
            message: "Stock quote service is running",
            endpoints: {
                batch: "/api/stocks/batch?symbols=AAPL,MSFT",
                quote: "/api/stocks/{symbol}",
                history: "/api/stocks/{symbol}/history?period=1d&interval=5m",
                search: "/api/stocks/search/{query}",
                socket: "stock_update event over Socket.IO",
            },
        });
    });

    app.get("/health", (_req, res) => {
        res.json({ status: "healthy", timestamp: new Date().toISOString() });
    });

    app.use("/api/stocks", createStocksRouter(deps));

    app.use((req, res) => {
        res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
    });

    app.use(errorHandler);

    return app;
}
