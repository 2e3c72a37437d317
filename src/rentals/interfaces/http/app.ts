import express, { Express } from "express";
import { buildRentalsRoutes, RentalsControllers } from "./routes";
import { AuthConfig } from "../../../shared/http/authMiddleware";
import { createCorsMiddleware } from "../../../shared/http/corsMiddleware";
import { buildHealthRoutes, HealthCheck } from "../../../shared/http/healthRoutes";
import { createErrorMiddleware } from "../../../shared/http/errorMiddleware";
import { RouteRateLimiters } from "../../../shared/http/rateLimitMiddleware";
import { requestLoggerMiddleware } from "../../../shared/http/requestLoggerMiddleware";
import { traceMiddleware } from "../../../shared/http/traceMiddleware";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";

export type RentalsAppDeps = {
  controllers: RentalsControllers;
  jwtKey: string;
  readiness: HealthCheck;
  metrics: Metrics;
  logger: Logger;
  rateLimiters?: Partial<RouteRateLimiters>;
  corsOrigins?: readonly string[];
};

export const buildRentalsApp = (deps: RentalsAppDeps): Express => {
  const { metrics, logger } = deps;
  const authConfig: AuthConfig = { jwtKey: deps.jwtKey, metrics };

  const app = express();
  app.use(createCorsMiddleware(deps.corsOrigins));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(traceMiddleware);
  app.use(metrics.httpMiddleware);
  app.use(requestLoggerMiddleware(logger));
  app.get("/metrics", metrics.metricsHandler);
  app.use("/", buildHealthRoutes(async () => {}, deps.readiness));
  app.use("/", buildRentalsRoutes(deps.controllers, authConfig, deps.rateLimiters));
  app.use(createErrorMiddleware(logger));
  return app;
};
