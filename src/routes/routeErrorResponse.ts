import type { Response } from "express";
import { ErrorCategory, ErrorCode, type AppError } from "../utils/errors";

export type RouteErrorExtras = Record<string, unknown>;

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

export const sendInternalRouteError = (
    res: Response,
    message: string,
    extras?: RouteErrorExtras
): Response => sendRouteError(res, 500, message, extras);

/** RECOVERABLE → 400, TRANSIENT → 503, FATAL → 500. */
export const statusForAppError = (error: AppError): number => {
    if (error.code === ErrorCode.ENGINE_STOPPED) {
        return 503;
    }
    switch (error.category) {
        case ErrorCategory.RECOVERABLE:
            return 400;
        case ErrorCategory.TRANSIENT:
            return 503;
        default:
            return 500;
    }
};

export const sendAppError = (res: Response, error: AppError): Response =>
    sendRouteError(res, statusForAppError(error), error.message, {
        code: error.code,
        ...(error.details ? { details: error.details } : {}),
    });
