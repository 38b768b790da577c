import { logger } from "../logger";

export const RATE_LIMIT_COOLDOWN_MS = 60_000; // 1 minute

export type RateLimitGateConfig = {
    name: string;
    cooldownMs?: number;
};

/**
 * Process-wide upstream cooldown. One throttled call blocks every symbol,
 * since the provider enforces a single shared quota.
 */
export class RateLimitGate {
    private blockedUntilMs = 0;

    constructor(private readonly config: RateLimitGateConfig) {}

    isBlocked(): boolean {
        return Date.now() < this.blockedUntilMs;
    }

    blockedUntil(): number {
        return this.blockedUntilMs;
    }

    /** Last trip wins; cooldowns do not stack. */
    trip(cooldownMs: number = this.config.cooldownMs ?? RATE_LIMIT_COOLDOWN_MS): void {
        this.blockedUntilMs = Date.now() + cooldownMs;

        logger.warn(
            {
                name: this.config.name,
                cooldownMs,
                blockedUntil: new Date(this.blockedUntilMs).toISOString(),
            },
            "Upstream rate limit hit, cooling down"
        );
    }
}
