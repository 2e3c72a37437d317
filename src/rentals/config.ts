import { z } from "zod";
import { brokerList, originList, parseEnv, port, positiveInt, secret } from "../shared/config/env";

const rentalsEnvSchema = z.object({
  RENTALS_PORT: port(3001),
  MONGO_URI: z.string().min(1).default("mongodb://localhost:27017/vehicle_rental"),
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  KAFKA_BROKERS: brokerList,
  CORS_ORIGINS: originList,
  KAFKA_TOPIC_PARTITIONS: positiveInt(1),
  KAFKA_REPLICATION_FACTOR: positiveInt(1),
  JWT_PRIVATE_KEY: secret("vehicle-rentals-dev"),
  INTERNAL_JWT_PRIVATE_KEY: secret("vehicle-rentals-internal-dev"),
  ACCESS_TOKEN_TTL_MINUTES: positiveInt(30),
  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
  AUTH_RATE_LIMIT: positiveInt(10),
  WRITE_RATE_LIMIT: positiveInt(60)
});

export type RentalsConfig = {
  port: number;
  corsOrigins: string[];
  mongoUri: string;
  redisUrl: string;
  kafka: {
    brokers: string[];
    numPartitions: number;
    replicationFactor: number;
  };
  jwtKey: string;
  internalJwtKey: string;
  accessTokenTtlMinutes: number;
  rateLimit: {
    windowMs: number;
    auth: number;
    write: number;
  };
};

export const loadRentalsConfig = (env: NodeJS.ProcessEnv = process.env): RentalsConfig => {
  const parsed = parseEnv(rentalsEnvSchema, env);
  return {
    port: parsed.RENTALS_PORT,
    corsOrigins: parsed.CORS_ORIGINS,
    mongoUri: parsed.MONGO_URI,
    redisUrl: parsed.REDIS_URL,
    kafka: {
      brokers: parsed.KAFKA_BROKERS,
      numPartitions: parsed.KAFKA_TOPIC_PARTITIONS,
      replicationFactor: parsed.KAFKA_REPLICATION_FACTOR
    },
    jwtKey: parsed.JWT_PRIVATE_KEY,
    internalJwtKey: parsed.INTERNAL_JWT_PRIVATE_KEY,
    accessTokenTtlMinutes: parsed.ACCESS_TOKEN_TTL_MINUTES,
    rateLimit: {
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      auth: parsed.AUTH_RATE_LIMIT,
      write: parsed.WRITE_RATE_LIMIT
    }
  };
};
