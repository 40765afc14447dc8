import { NextFunction, Request, Response } from "express";
import { AppError } from "./AppError";
import { Logger } from "../observability/logger";
import { getTraceId } from "../observability/trace";

const resolveError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  // body-parser rejections (oversized payload, bad charset) carry a 4xx status.
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return new AppError("INVALID_INPUT", error.status, error.message);
  }
  return new AppError("INTERNAL", 500, "Internal server error");
};

export const createErrorMiddleware =
  (logger: Logger) =>
  (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const resolved = resolveError(error);
    const meta = {
      code: resolved.code,
      statusCode: resolved.statusCode,
      originalMessage: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined
    };
    if (resolved.statusCode >= 500) {
      logger.error("Request failed", meta);
    } else {
      logger.warn("Request rejected", { code: meta.code, statusCode: meta.statusCode });
    }
    if (resolved.retryAfterSeconds !== undefined) {
      res.setHeader("Retry-After", String(resolved.retryAfterSeconds));
    }
    res.status(resolved.statusCode).json({
      error: resolved.message,
      code: resolved.code,
      traceId: getTraceId()
    });
  };
