import dotenv from "dotenv";
import { z } from "zod";
import {
    OUTPUT_FORMAT_VALUES,
    normalizeSortKey,
    type OutputFormat,
    type SortKey,
} from "@lsmp3/listing-contract";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { isEnvFlagEnabled, parseEnvCsv } from "./utils/envParsers";
import { LOG_LEVELS, type LogLevel } from "./utils/logger";

dotenv.config();

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
    LSMP3_FORMAT: z.enum(OUTPUT_FORMAT_VALUES).optional(),
    LSMP3_SORT: z.string().optional(),
    LSMP3_RECURSIVE: z.string().optional(),
});

export interface ListingDefaults {
    format: OutputFormat;
    sortBy: SortKey[];
    recursive: boolean;
}

export interface Config {
    logLevel: LogLevel;
    defaults: ListingDefaults;
}

function parseSortKeys(value: string | undefined): SortKey[] {
    const raw = parseEnvCsv(value);
    if (!raw) {
        return ["file-name"];
    }

    const keys: SortKey[] = [];
    for (const item of raw) {
        const key = normalizeSortKey(item);
        if (!key) {
            throw new AppError(
                ErrorCode.INVALID_CONFIG,
                ErrorCategory.FATAL,
                `LSMP3_SORT: unknown sort key ${JSON.stringify(item)}`,
                { value }
            );
        }
        keys.push(key);
    }
    return keys;
}

/** Builds the runtime configuration from an environment map. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (err) => `${err.path.join(".")}: ${err.message}`
        );
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Environment validation failed: ${issues.join("; ")}`,
            { issues }
        );
    }

    const values = parsed.data;
    return {
        logLevel:
            values.LOG_LEVEL ??
            (values.NODE_ENV === "development" ? "debug" : "warn"),
        defaults: {
            format: values.LSMP3_FORMAT ?? "table",
            sortBy: parseSortKeys(values.LSMP3_SORT),
            recursive: isEnvFlagEnabled(values.LSMP3_RECURSIVE),
        },
    };
}
