import express, { Express } from "express";
import { createCorsMiddleware } from "../../../shared/http/corsMiddleware";
import { buildHealthRoutes, HealthCheck } from "../../../shared/http/healthRoutes";
import { createErrorMiddleware } from "../../../shared/http/errorMiddleware";
import { requestLoggerMiddleware } from "../../../shared/http/requestLoggerMiddleware";
import { traceMiddleware } from "../../../shared/http/traceMiddleware";
import { Logger } from "../../../shared/observability/logger";
import { Metrics } from "../../../shared/observability/metrics";

export type NotificationsAppDeps = {
  readiness: HealthCheck;
  metrics: Metrics;
  logger: Logger;
  corsOrigins?: readonly string[];
};

export const buildNotificationsApp = ({
  readiness,
  metrics,
  logger,
  corsOrigins
}: NotificationsAppDeps): Express => {
  const app = express();
  app.use(createCorsMiddleware(corsOrigins));
  app.use(traceMiddleware);
  app.use(metrics.httpMiddleware);
  app.use(requestLoggerMiddleware(logger));
  app.get("/metrics", metrics.metricsHandler);
  app.use("/", buildHealthRoutes(async () => {}, readiness));
  app.use(createErrorMiddleware(logger));
  return app;
};
