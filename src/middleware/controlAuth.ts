import crypto from "crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { sendRouteError } from "../routes/routeErrorResponse";

function tokensMatch(expected: string, provided: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(provided);
    return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Requires `Authorization: Bearer <token>` when a control token is
 * configured; passes everything through otherwise.
 */
export function requireControlToken(token: string | null): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!token) {
            return next();
        }

        const header = req.header("authorization") ?? "";
        const match = /^Bearer\s+(.+)$/i.exec(header);
        if (!match || !tokensMatch(token, match[1].trim())) {
            sendRouteError(res, 401, "Missing or invalid control token");
            return;
        }
        next();
    };
}
