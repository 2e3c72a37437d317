import { NextFunction, Request, Response } from "express";
import { Logger } from "../observability/logger";

export const resolveRoute = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  return typeof routePath === "string" ? `${req.baseUrl}${routePath}` : req.path;
};

export const requestLoggerMiddleware =
  (logger: Logger) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();
    let logged = false;
    const logRequest = () => {
      if (logged) {
        return;
      }
      logged = true;
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      logger.info("HTTP request", {
        method: req.method,
        route: resolveRoute(req),
        statusCode: res.statusCode,
        durationMs
      });
    };
    res.on("finish", logRequest);
    res.on("close", logRequest);
    next();
  };
