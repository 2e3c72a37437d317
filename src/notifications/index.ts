import http from "http";
import dotenv from "dotenv";
import { loadNotificationsConfig } from "./config";
import { InMemoryConnectionRegistry } from "./infrastructure/realtime/InMemoryConnectionRegistry";
import { WebSocketGateway } from "./infrastructure/realtime/WebSocketGateway";
import { NotificationDispatcher } from "./infrastructure/messaging/NotificationDispatcher";
import { DispatchNotificationUseCase } from "./application/use-cases/DispatchNotificationUseCase";
import { buildNotificationsApp } from "./interfaces/http/app";
import { eventTopics } from "../shared/messaging/DomainEvent";
import { JsonEventCodec } from "../shared/messaging/JsonEventCodec";
import { KafkaTopicAdmin } from "../shared/messaging/KafkaTopicAdmin";
import { AppError } from "../shared/http/AppError";
import { createLogger } from "../shared/observability/logger";
import { createMetrics } from "../shared/observability/metrics";

dotenv.config();

const logger = createLogger("notifications");
const metrics = createMetrics("notifications");

const start = async (): Promise<void> => {
  const config = loadNotificationsConfig();

  const registry = new InMemoryConnectionRegistry(metrics);
  const dispatchNotificationUseCase = new DispatchNotificationUseCase(
    registry,
    new JsonEventCodec(),
    { sendTimeoutMs: config.sendTimeoutMs },
    metrics,
    logger
  );
  const dispatcher = new NotificationDispatcher(
    {
      clientId: "notifications-service",
      brokers: config.kafka.brokers,
      groupId: "notifications-dispatcher",
      internalJwtKey: config.internalJwtKey
    },
    dispatchNotificationUseCase,
    metrics,
    logger
  );
  const gateway = new WebSocketGateway({ jwtKey: config.jwtKey }, registry, metrics, logger);
  const topicAdmin = new KafkaTopicAdmin(
    {
      clientId: "notifications-admin",
      brokers: config.kafka.brokers,
      numPartitions: config.kafka.numPartitions,
      replicationFactor: config.kafka.replicationFactor
    },
    logger
  );

  const app = buildNotificationsApp({
    corsOrigins: config.corsOrigins,
    metrics,
    logger,
    readiness: async () => {
      if (dispatcher.state !== "running") {
        throw new AppError("SERVICE_UNAVAILABLE", 503, "Notification dispatcher not running");
      }
    }
  });

  await topicAdmin.ensureTopics(eventTopics);
  await dispatcher.start();

  const server = http.createServer(app);
  gateway.attach(server);
  server.listen(config.port, () => {
    logger.info("Notifications service running", { port: config.port });
  });

  const shutdown = async () => {
    logger.info("Shutting down notifications service", { openConnections: registry.size() });
    server.close();
    await dispatcher.stop();
    await gateway.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Notifications shutdown failed", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

start().catch((error: unknown) => {
  logger.error("Failed to start notifications service", { error: String(error) });
  process.exit(1);
});
