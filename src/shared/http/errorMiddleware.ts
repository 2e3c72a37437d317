import { NextFunction, Request, Response } from "express";
import { AppError } from "./AppError";
import { Logger } from "../observability/logger";
import { getTraceId } from "../observability/trace";

const isMalformedBody = (error: unknown): boolean =>
  error instanceof SyntaxError && "body" in error;

export const resolveError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  if (isMalformedBody(error)) {
    return new AppError("INVALID_INPUT", 400, "Malformed JSON body");
  }
  return new AppError("INTERNAL", 500, "Internal server error");
};

export const createErrorMiddleware =
  (logger: Logger) =>
  (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const resolved = resolveError(error);
    const originalMessage = error instanceof Error ? error.message : String(error);
    const meta = {
      code: resolved.code,
      statusCode: resolved.statusCode,
      originalMessage,
      stack: error instanceof Error ? error.stack : undefined
    };
    if (resolved.statusCode >= 500) {
      logger.error("Request failed", meta);
    } else {
      logger.warn("Request rejected", { code: meta.code, statusCode: meta.statusCode });
    }
    res.status(resolved.statusCode).json({
      error: resolved.message,
      code: resolved.code,
      traceId: getTraceId()
    });
  };
