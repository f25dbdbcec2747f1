export const LOG_LEVELS = ["debug", "warn", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, context?: LogContext) => void;
    warn: (message: string, context?: LogContext) => void;
    child: (scope: string) => Logger;
}

let currentLevel: LogLevel = "warn";

/** Applies to every logger; the command sets it from the loaded config. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] =
            value instanceof Error
                ? { name: value.name, message: value.message, stack: value.stack }
                : value;
    }
    return output;
}

// Both levels go to stderr; stdout is reserved for the listing itself.
function emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    scope: string | null,
    context?: LogContext
): void {
    if (!shouldLog(level)) {
        return;
    }

    const prefix = scope
        ? `[${level.toUpperCase()}] [${scope}] ${message}`
        : `[${level.toUpperCase()}] ${message}`;
    const method = level === "warn" ? console.warn : console.error;

    if (context) {
        method(prefix, normalizeContext(context));
        return;
    }
    method(prefix);
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, context) => emit("debug", message, scoped, context),
        warn: (message, context) => emit("warn", message, scoped, context),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.debug(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export const logger = createLogger();
