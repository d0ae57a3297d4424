import express, { type Express } from "express";
import type { Server } from "http";
import type { Socket } from "net";
import { createLogger } from "./utils/logger";
import { requireControlToken } from "./middleware/controlAuth";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createPlaybackRouter } from "./routes/playback";
import type { CatalogueReader } from "./services/catalogue";
import type { PlaybackController } from "./services/streamEngine";

const log = createLogger("ControlServer");

const SERVER_CLOSE_TIMEOUT_MS = 5_000;

export interface ControlAppOptions {
    token: string | null;
}

export function createControlApp(
    controller: PlaybackController,
    catalogue: CatalogueReader,
    options: ControlAppOptions
): Express {
    const app = express();
    app.disable("x-powered-by");
    app.use(express.json({ limit: "16kb" }));

    app.get("/health/live", (_req, res) => {
        res.json({ status: "ok", connectionState: controller.getState().connectionState });
    });

    // Ready only while audio is actually reaching the sink.
    app.get("/health/ready", (_req, res) => {
        const { connectionState } = controller.getState();
        const ready = connectionState === "streaming";
        res.status(ready ? 200 : 503).json({
            status: ready ? "ready" : "not_ready",
            connectionState,
        });
    });

    app.use(
        "/api/playback",
        requireControlToken(options.token),
        createPlaybackRouter(controller, catalogue)
    );

    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
}

export interface ControlServer {
    readonly server: Server;
    readonly address: string;
    close(): Promise<void>;
}

export function startControlServer(app: Express, host: string, port: number): Promise<ControlServer> {
    return new Promise((resolve, reject) => {
        const sockets = new Set<Socket>();
        const server = app.listen(port, host);

        server.on("connection", (socket: Socket) => {
            sockets.add(socket);
            socket.on("close", () => sockets.delete(socket));
        });

        server.once("error", reject);
        server.once("listening", () => {
            server.off("error", reject);
            const bound = server.address();
            const address =
                bound && typeof bound === "object" ? `${bound.address}:${bound.port}` : `${host}:${port}`;
            log.info(`Control API listening on ${address}`);
            resolve({
                server,
                address,
                close: () => closeServer(server, sockets),
            });
        });
    });
}

function closeServer(server: Server, sockets: Set<Socket>): Promise<void> {
    return new Promise<void>((resolve) => {
        let settled = false;
        const finish = () => {
            if (settled) return;
            settled = true;
            clearTimeout(timeoutId);
            resolve();
        };

        const timeoutId = setTimeout(() => {
            if (sockets.size > 0) {
                log.warn(`Control API close timed out; destroying ${sockets.size} connection(s)`);
            }
            for (const socket of sockets) {
                socket.destroy();
            }
            finish();
        }, SERVER_CLOSE_TIMEOUT_MS);
        timeoutId.unref();

        server.close((error) => {
            if (error) {
                log.debug("Control API was not listening", error);
            }
            finish();
        });
        server.closeIdleConnections();
    });
}
