import client, { Counter, Gauge, Histogram, Registry } from "prom-client";
import type { NextFunction, Request, Response } from "express";
import { resolveRoute } from "../http/requestLoggerMiddleware";

export type NotificationOutcome = "delivered" | "failed" | "timeout";

export type Metrics = {
  registry: Registry;
  httpMiddleware: (req: Request, res: Response, next: NextFunction) => void;
  metricsHandler: (req: Request, res: Response) => Promise<void>;
  recordAuthFailure: (reason: string) => void;
  recordDbQuery: (db: string, operation: string, durationSeconds: number) => void;
  recordKafkaProduced: (topic: string) => void;
  recordKafkaConsumed: (topic: string) => void;
  recordKafkaError: (topic: string) => void;
  recordKafkaDiscarded: (topic: string, reason: string) => void;
  recordNotification: (outcome: NotificationOutcome) => void;
  setWebSocketConnections: (count: number) => void;
  updateMongoState: (state: number) => void;
};

export type MetricsOptions = {
  collectDefaultMetrics?: boolean;
};

export const createMetrics = (service: string, options: MetricsOptions = {}): Metrics => {
  const registry = new Registry();
  registry.setDefaultLabels({ service });
  if (options.collectDefaultMetrics ?? true) {
    client.collectDefaultMetrics({ register: registry });
  }

  const httpDuration = new Histogram({
    name: "http_request_duration_seconds",
    help: "HTTP request duration in seconds",
    labelNames: ["service", "method", "route", "status_code"],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5],
    registers: [registry]
  });

  const httpRequests = new Counter({
    name: "http_requests_total",
    help: "Total HTTP requests",
    labelNames: ["service", "method", "route", "status_code"],
    registers: [registry]
  });

  const authFailures = new Counter({
    name: "auth_failures_total",
    help: "Total auth failures",
    labelNames: ["service", "reason"],
    registers: [registry]
  });

  const dbQueryDuration = new Histogram({
    name: "db_query_duration_seconds",
    help: "Database query duration in seconds",
    labelNames: ["service", "db", "operation"],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5],
    registers: [registry]
  });

  const kafkaProduced = new Counter({
    name: "kafka_messages_produced_total",
    help: "Total Kafka messages produced",
    labelNames: ["service", "topic"],
    registers: [registry]
  });

  const kafkaConsumed = new Counter({
    name: "kafka_messages_consumed_total",
    help: "Total Kafka messages consumed",
    labelNames: ["service", "topic"],
    registers: [registry]
  });

  const kafkaErrors = new Counter({
    name: "kafka_processing_errors_total",
    help: "Total Kafka processing errors",
    labelNames: ["service", "topic"],
    registers: [registry]
  });

  const kafkaDiscarded = new Counter({
    name: "kafka_messages_discarded_total",
    help: "Kafka messages dropped without processing",
    labelNames: ["service", "topic", "reason"],
    registers: [registry]
  });

  const notifications = new Counter({
    name: "notifications_sent_total",
    help: "WebSocket notification sends by outcome",
    labelNames: ["service", "outcome"],
    registers: [registry]
  });

  const wsConnections = new Gauge({
    name: "websocket_connections",
    help: "Open WebSocket connections",
    labelNames: ["service"],
    registers: [registry]
  });

  const mongoState = new Gauge({
    name: "mongo_connection_state",
    help: "Mongo connection state",
    labelNames: ["service"],
    registers: [registry]
  });

  const httpMiddleware = (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
      const labels = {
        service,
        method: req.method,
        route: resolveRoute(req),
        status_code: String(res.statusCode)
      };
      httpDuration.observe(labels, durationSeconds);
      httpRequests.inc(labels);
    });
    next();
  };

  const metricsHandler = async (_req: Request, res: Response) => {
    res.setHeader("Content-Type", registry.contentType);
    res.end(await registry.metrics());
  };

  return {
    registry,
    httpMiddleware,
    metricsHandler,
    recordAuthFailure: (reason) => authFailures.inc({ service, reason }),
    recordDbQuery: (db, operation, durationSeconds) => {
      dbQueryDuration.observe({ service, db, operation }, durationSeconds);
    },
    recordKafkaProduced: (topic) => kafkaProduced.inc({ service, topic }),
    recordKafkaConsumed: (topic) => kafkaConsumed.inc({ service, topic }),
    recordKafkaError: (topic) => kafkaErrors.inc({ service, topic }),
    recordKafkaDiscarded: (topic, reason) => kafkaDiscarded.inc({ service, topic, reason }),
    recordNotification: (outcome) => notifications.inc({ service, outcome }),
    setWebSocketConnections: (count) => wsConnections.set({ service }, count),
    updateMongoState: (state) => mongoState.set({ service }, state)
  };
};
