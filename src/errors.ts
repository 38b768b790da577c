/**
 * Upstream signalled that the shared quota is exhausted (HTTP 429).
 */
export class RateLimitedError extends Error {
    constructor(readonly symbol: string, cause?: unknown) {
        super(`Upstream rate limit hit while fetching ${symbol}`, { cause });
        this.name = "RateLimitedError";
    }
}

/**
 * Upstream answered but carried no usable price. Retrying will not help.
 */
export class NoPriceDataError extends Error {
    constructor(readonly symbol: string) {
        super(`No price data for ${symbol}`);
        this.name = "NoPriceDataError";
    }
}

export class HttpError extends Error {
    constructor(
        readonly status: number,
        message: string
    ) {
        super(message);
        this.name = "HttpError";
    }
}
