import fs from "fs";
import { z } from "zod";
import { DEFAULT_TRACKED_SYMBOLS } from "../constants/stocks";

const symbolList = z
    .string()
    .transform((value) =>
        value
            .split(",")
            .map((s) => s.trim().toUpperCase())
            .filter(Boolean)
    )
    .pipe(z.array(z.string()).min(1));

export const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
    SERVER_PORT: z.string().regex(/^\d+$/).default("8000"),
    FRONTEND_URL: z.string().url().default("http://localhost:3000"),
    FINNHUB_API_KEY: z.string().min(1),
    BROADCAST_SYMBOLS: symbolList.default(DEFAULT_TRACKED_SYMBOLS.join(",")),
    BROADCAST_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
    VALKEY_HOST: z.string().min(1).default("127.0.0.1"),
    VALKEY_PORT: z.coerce.number().int().min(1).max(65_535).default(6379),
    VALKEY_PASSWORD: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Secrets are either literal values (local dev) or Docker secret file paths.
 */
export function resolveSecret(value: string): string {
    if (value.startsWith("/run/secrets/")) {
        return fs.readFileSync(value, "utf8").trim();
    }
    return value;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const env = envSchema.parse(source);
    return {
        ...env,
        FINNHUB_API_KEY: resolveSecret(env.FINNHUB_API_KEY),
        VALKEY_PASSWORD: env.VALKEY_PASSWORD && resolveSecret(env.VALKEY_PASSWORD),
    };
}
