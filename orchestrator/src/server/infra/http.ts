import crypto from "node:crypto";
import type { ApiResponse } from "@shared/types";
import type {
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import type { AppError } from "./errors";
import { notFound, toAppError } from "./errors";
import { logger } from "./logger";
import { getRequestId, runWithRequestContext } from "./request-context";
import { sanitizeUnknown } from "./sanitize";

function getResponseRequestId(res: Response): string {
  const header = res.getHeader("x-request-id");
  if (typeof header === "string") return header;
  return getRequestId() ?? "unknown";
}

export function ok<T>(res: Response, data: T, status = 200): void {
  const payload: ApiResponse<T> = {
    ok: true,
    data,
    meta: { requestId: getResponseRequestId(res) },
  };
  res.status(status).json(payload);
}

export function fail(res: Response, error: AppError): void {
  const payload: ApiResponse<never> = {
    ok: false,
    error: {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined
        ? { details: sanitizeUnknown(error.details) }
        : {}),
    },
    meta: { requestId: getResponseRequestId(res) },
  };
  res.status(error.status).json(payload);
}

export function asyncRoute(
  handler: (
    req: Request,
    res: Response,
    next: NextFunction,
  ) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(handler(req, res, next)).catch(next);
  };
}

export function requestContextMiddleware(): RequestHandler {
  return (req, res, next) => {
    const requestIdHeader = req.header("x-request-id")?.trim();
    const requestId =
      requestIdHeader && requestIdHeader.length > 0
        ? requestIdHeader
        : crypto.randomUUID();

    res.setHeader("x-request-id", requestId);
    runWithRequestContext({ requestId }, () => next());
  };
}

export function notFoundApiHandler(): RequestHandler {
  return (req, _res, next) => {
    if (!req.path.startsWith("/api")) return next();
    next(notFound(`Route not found: ${req.method} ${req.path}`));
  };
}

export const apiErrorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  const appError = toAppError(err);
  const log = appError.status >= 500 ? logger.error : logger.warn;
  log.call(logger, appError.message, {
    status: appError.status,
    code: appError.code,
    details: appError.details,
    cause: appError.cause,
  });
  fail(res, appError);
};
