import { z } from "zod";
import { brokerList, originList, parseEnv, port, positiveInt, secret, timeoutMs } from "../shared/config/env";

const notificationsEnvSchema = z.object({
  NOTIFICATIONS_PORT: port(3002),
  KAFKA_BROKERS: brokerList,
  CORS_ORIGINS: originList,
  KAFKA_TOPIC_PARTITIONS: positiveInt(1),
  KAFKA_REPLICATION_FACTOR: positiveInt(1),
  JWT_PRIVATE_KEY: secret("vehicle-rentals-dev"),
  INTERNAL_JWT_PRIVATE_KEY: secret("vehicle-rentals-internal-dev"),
  NOTIFICATION_SEND_TIMEOUT_MS: timeoutMs(5000)
});

export type NotificationsConfig = {
  port: number;
  corsOrigins: string[];
  kafka: {
    brokers: string[];
    numPartitions: number;
    replicationFactor: number;
  };
  jwtKey: string;
  internalJwtKey: string;
  sendTimeoutMs: number;
};

export const loadNotificationsConfig = (env: NodeJS.ProcessEnv = process.env): NotificationsConfig => {
  const parsed = parseEnv(notificationsEnvSchema, env);
  return {
    port: parsed.NOTIFICATIONS_PORT,
    corsOrigins: parsed.CORS_ORIGINS,
    kafka: {
      brokers: parsed.KAFKA_BROKERS,
      numPartitions: parsed.KAFKA_TOPIC_PARTITIONS,
      replicationFactor: parsed.KAFKA_REPLICATION_FACTOR
    },
    jwtKey: parsed.JWT_PRIVATE_KEY,
    internalJwtKey: parsed.INTERNAL_JWT_PRIVATE_KEY,
    sendTimeoutMs: parsed.NOTIFICATION_SEND_TIMEOUT_MS
  };
};
