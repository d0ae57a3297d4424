#!/usr/bin/env node
import { loadConfig, loadEnvFile } from "./config";
import { startDaemon, type RunningDaemon } from "./daemon";
import { createLogger, resolveLogLevel, setLogLevel } from "./utils/logger";
import { ErrorCode, isAppError } from "./utils/errors";

const log = createLogger("Main");

const FORCE_FLAGS = new Set(["--force", "--kill"]);

export function parseArgs(argv: string[]): { force: boolean } {
    return { force: argv.some((arg) => FORCE_FLAGS.has(arg)) };
}

async function main(): Promise<void> {
    loadEnvFile();
    setLogLevel(resolveLogLevel());
    const { force } = parseArgs(process.argv.slice(2));

    let daemon: RunningDaemon;
    try {
        daemon = await startDaemon({ config: loadConfig(), force });
    } catch (error) {
        if (isAppError(error, ErrorCode.ALREADY_RUNNING)) {
            log.error(`${error.message}. Pass --force to take over.`, error.details);
        } else {
            log.error("Start-up failed", error);
        }
        process.exit(1);
    }

    let isShuttingDown = false;
    const gracefulShutdown = async (signal: string) => {
        if (isShuttingDown) {
            log.debug("Shutdown already in progress...");
            return;
        }
        isShuttingDown = true;
        log.info(`Received ${signal}. Starting graceful shutdown...`);

        try {
            await daemon.shutdown();
            log.info("Graceful shutdown complete");
            process.exit(0);
        } catch (error) {
            log.error("Error during shutdown", error);
            process.exit(1);
        }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

    process.on("unhandledRejection", (reason) => {
        log.error("Unhandled Promise Rejection", {
            reason: reason instanceof Error ? reason.message : String(reason),
            stack: reason instanceof Error ? reason.stack : undefined,
        });
    });

    process.on("uncaughtException", (error) => {
        log.error("Uncaught Exception - initiating graceful shutdown", {
            message: error.message,
            stack: error.stack,
        });
        void gracefulShutdown("uncaughtException");
    });
}

if (require.main === module) {
    main().catch((error: unknown) => {
        log.error("Fatal error", error);
        process.exit(1);
    });
}
