import type { Request, Response, NextFunction } from "express";
import { createLogger } from "../utils/logger";
import { isAppError } from "../utils/errors";
import { sendAppError, sendRouteError } from "../routes/routeErrorResponse";

const log = createLogger("ControlApi");

function isBodyParseError(err: unknown): boolean {
    return (
        err instanceof SyntaxError &&
        "type" in err &&
        err.type === "entity.parse.failed"
    );
}

export function notFoundHandler(req: Request, res: Response) {
    sendRouteError(res, 404, `No route for ${req.method} ${req.path}`);
}

export function errorHandler(
    err: unknown,
    _req: Request,
    res: Response,
    // Express only treats four-argument middleware as an error handler.
    _next: NextFunction
) {
    if (isBodyParseError(err)) {
        return sendRouteError(res, 400, "Request body is not valid JSON");
    }

    if (isAppError(err)) {
        log.warn(`${err.code}: ${err.message}`, err.details);
        return sendAppError(res, err);
    }

    log.error("Unhandled control API error", err);
    return sendRouteError(res, 500, "Internal server error");
}
