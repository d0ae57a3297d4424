import { Router, type Response } from "express";
import { z } from "zod";
import { createLogger } from "../utils/logger";
import { isAppError } from "../utils/errors";
import { LOOP_MODES } from "../services/playbackState";
import type { CatalogueReader } from "../services/catalogue";
import type { CommandOutcome, PlaybackController } from "../services/streamEngine";
import { sendAppError, sendInternalRouteError, sendRouteError } from "./routeErrorResponse";

const log = createLogger("PlaybackRoutes");

const jumpSchema = z.object({
    trackNumber: z.number().int().positive(),
});

const performerSchema = z.object({
    performerId: z.string().trim().min(1),
});

const loopModeSchema = z.object({
    mode: z.enum(LOOP_MODES),
});

/**
 * Playback control endpoints. Every command answers with the outcome
 * ("applied" or "queued" while the sink reconnects) and the current state.
 */
export function createPlaybackRouter(
    controller: PlaybackController,
    catalogue: CatalogueReader
): Router {
    const router = Router();

    const respond = async (
        res: Response,
        label: string,
        command: () => Promise<CommandOutcome>
    ) => {
        try {
            const status = await command();
            res.json({ status, state: controller.getState() });
        } catch (error) {
            if (isAppError(error)) {
                sendAppError(res, error);
                return;
            }
            log.error(`${label} failed`, error);
            sendInternalRouteError(res, `Failed to ${label}`);
        }
    };

    // GET /api/playback/state
    router.get("/state", (_req, res) => {
        res.json(controller.getState());
    });

    // GET /api/playback/performers
    router.get("/performers", (_req, res) => {
        res.json(
            catalogue.listPerformers().map((id) => ({
                id,
                trackCount: catalogue.tracksFor(id).length,
            }))
        );
    });

    // POST /api/playback/jump
    router.post("/jump", async (req, res) => {
        const parsed = jumpSchema.safeParse(req.body);
        if (!parsed.success) {
            return sendRouteError(res, 400, "Invalid request", { details: parsed.error.errors });
        }
        await respond(res, "jump", () => controller.jumpTo(parsed.data.trackNumber));
    });

    // POST /api/playback/performer
    router.post("/performer", async (req, res) => {
        const parsed = performerSchema.safeParse(req.body);
        if (!parsed.success) {
            return sendRouteError(res, 400, "Invalid request", { details: parsed.error.errors });
        }
        await respond(res, "switch performer", () =>
            controller.switchPerformer(parsed.data.performerId)
        );
    });

    // POST /api/playback/loop-mode
    router.post("/loop-mode", async (req, res) => {
        const parsed = loopModeSchema.safeParse(req.body);
        if (!parsed.success) {
            return sendRouteError(res, 400, "Invalid request", { details: parsed.error.errors });
        }
        await respond(res, "set loop mode", () => controller.setLoopMode(parsed.data.mode));
    });

    router.post("/skip", async (_req, res) => {
        await respond(res, "skip", () => controller.skip());
    });

    router.post("/pause", async (_req, res) => {
        await respond(res, "pause", () => controller.pause());
    });

    router.post("/resume", async (_req, res) => {
        await respond(res, "resume", () => controller.resume());
    });

    return router;
}
