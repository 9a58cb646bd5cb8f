import { z } from "zod";
import { isSortKeyId, type SortKeyId } from "@shared/sortKeys";

// --- Schema ---

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1");

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    RESTAURANT_DATA_FILE: z.string().default("data/restaurants.json"),
    DEFAULT_SORT_KEY: z
        .string()
        .refine(isSortKeyId, (value) => ({ message: `Unknown sort key "${value}"` }))
        .default("bestMatch"),
    SORT_OPEN_FIRST: booleanFlag.default("true"),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface AppConfig {
    nodeEnv: "development" | "production" | "test";
    restaurantDataFile: string;
    defaultSortKey: SortKeyId;
    sortOpenFirst: boolean;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(readonly details: string[]) {
        super(`Invalid configuration:\n${details.map((detail) => `  - ${detail}`).join("\n")}`);
        this.name = "ConfigError";
    }
}

/**
 * Validate the environment and fail fast when it is wrong.
 * Empty strings count as unset, so `FOO=` in a .env file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const raw: Record<string, string | undefined> = {};
    for (const key of Object.keys(EnvSchema.shape)) {
        const value = env[key];
        raw[key] = value === "" ? undefined : value;
    }

    const result = EnvSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(
            result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
        );
    }

    const parsed = result.data;
    return {
        nodeEnv: parsed.NODE_ENV,
        restaurantDataFile: parsed.RESTAURANT_DATA_FILE,
        defaultSortKey: parsed.DEFAULT_SORT_KEY,
        sortOpenFirst: parsed.SORT_OPEN_FIRST,
        logLevel: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === "production" ? "info" : "debug"),
    };
}
