import { types } from "util";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function defaultLogLevel(): LogLevel {
    switch (process.env.NODE_ENV) {
        case "production":
            return "info";
        case "test":
            return "silent";
        default:
            return "debug";
    }
}

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** Level from LOG_LEVEL, falling back to one picked by NODE_ENV. */
export const resolveLogLevel = (): LogLevel => {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();

    if (!configured) {
        return defaultLogLevel();
    }

    return isLogLevel(configured) ? configured : defaultLogLevel();
};

let currentLevel = resolveLogLevel();

/** Overrides the level picked up from LOG_LEVEL at import time. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !isError(value)
    );
}

function isError(value: unknown): value is Error {
    return value instanceof Error || types.isNativeError(value);
}

function normalizeError(error: unknown): unknown {
    if (!isError(error)) {
        return error;
    }

    const normalized: LogContext = {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
    if ("code" in error && error.code !== undefined) {
        normalized.code = error.code;
    }
    return normalized;
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = normalizeError(value);
    }
    return output;
}

function splitArgs(args: unknown[]): {
    context: LogContext | null;
    passthrough: unknown[];
} {
    if (args.length === 0) {
        return { context: null, passthrough: [] };
    }

    const [first, ...rest] = args;
    if (!isLogContextCandidate(first)) {
        return {
            context: null,
            passthrough: args.map(normalizeError),
        };
    }

    return {
        context: normalizeContext(first),
        passthrough: rest.map(normalizeError),
    };
}

function emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    scope: string | null,
    args: unknown[],
): void {
    if (!shouldLog(level)) {
        return;
    }

    const { context, passthrough } = splitArgs(args);
    const timestamp = new Date().toISOString();
    const prefix = scope
        ? `${timestamp} [${level.toUpperCase()}] [${scope}] ${message}`
        : `${timestamp} [${level.toUpperCase()}] ${message}`;

    const method = level === "debug"
        ? console.debug
        : level === "info"
            ? console.info
            : level === "warn"
                ? console.warn
                : console.error;

    if (context) {
        method(prefix, context, ...passthrough);
        return;
    }

    method(prefix, ...passthrough);
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message: string, ...args: unknown[]) =>
            emit("debug", message, scoped, args),
        info: (message: string, ...args: unknown[]) =>
            emit("info", message, scoped, args),
        warn: (message: string, ...args: unknown[]) =>
            emit("warn", message, scoped, args),
        error: (message: string, ...args: unknown[]) =>
            emit("error", message, scoped, args),
        child: (childScope: string) => {
            const trimmed = childScope.trim();
            const nextScope = scoped ? `${scoped}.${trimmed}` : trimmed;
            return createLogger(nextScope);
        },
    };
}

export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {},
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.info(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.error(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}
