export const DEFAULT_TRACKED_SYMBOLS = ["AAPL", "GOOGL", "MSFT", "TSLA", "AMZN"];

export const STOCK_BROADCAST_CACHE_KEY = "stock:broadcast:latest";
export const STOCK_BROADCAST_TTL_SECONDS = 300; // 5 minutes

export const STOCK_UPDATE_EVENT = "stock_update";
