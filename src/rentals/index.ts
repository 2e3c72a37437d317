import http from "http";
import dotenv from "dotenv";
import Redis from "ioredis";
import mongoose from "mongoose";
import { loadRentalsConfig } from "./config";
import { createRentalsControllers } from "./composition";
import { connectMongo } from "./infrastructure/db/mongoose";
import { UserMongoRepository } from "./infrastructure/db/UserMongoRepository";
import { VehicleMongoRepository } from "./infrastructure/db/VehicleMongoRepository";
import { RentalMongoRepository } from "./infrastructure/db/RentalMongoRepository";
import { BranchMongoRepository } from "./infrastructure/db/BranchMongoRepository";
import { KafkaEventPublisher } from "./infrastructure/messaging/KafkaEventPublisher";
import { BcryptPasswordHasher } from "./infrastructure/security/BcryptPasswordHasher";
import { JwtTokenIssuer } from "./infrastructure/security/JwtTokenIssuer";
import { buildRentalsApp } from "./interfaces/http/app";
import { AppError } from "../shared/http/AppError";
import { createRateLimiters } from "../shared/http/rateLimitMiddleware";
import { eventTopics } from "../shared/messaging/DomainEvent";
import { KafkaTopicAdmin } from "../shared/messaging/KafkaTopicAdmin";
import { createLogger } from "../shared/observability/logger";
import { createMetrics } from "../shared/observability/metrics";

dotenv.config();

const logger = createLogger("rentals");
const metrics = createMetrics("rentals");

const start = async (): Promise<void> => {
  const config = loadRentalsConfig();

  const redis = new Redis(config.redisUrl);
  const eventPublisher = new KafkaEventPublisher(
    {
      clientId: "rentals-service",
      brokers: config.kafka.brokers,
      internalJwt: config.internalJwtKey
    },
    metrics
  );
  const topicAdmin = new KafkaTopicAdmin(
    {
      clientId: "rentals-admin",
      brokers: config.kafka.brokers,
      numPartitions: config.kafka.numPartitions,
      replicationFactor: config.kafka.replicationFactor
    },
    logger
  );

  const controllers = createRentalsControllers({
    repositories: {
      users: new UserMongoRepository(metrics),
      vehicles: new VehicleMongoRepository(metrics),
      rentals: new RentalMongoRepository(metrics),
      branches: new BranchMongoRepository(metrics)
    },
    eventPublisher,
    passwordHasher: new BcryptPasswordHasher(),
    tokenIssuer: new JwtTokenIssuer({
      jwtKey: config.jwtKey,
      ttlMinutes: config.accessTokenTtlMinutes
    }),
    logger
  });

  const app = buildRentalsApp({
    controllers,
    jwtKey: config.jwtKey,
    corsOrigins: config.corsOrigins,
    metrics,
    logger,
    rateLimiters: createRateLimiters({
      namespace: "rentals",
      redis,
      auth: { windowMs: config.rateLimit.windowMs, limit: config.rateLimit.auth },
      write: { windowMs: config.rateLimit.windowMs, limit: config.rateLimit.write }
    }),
    readiness: async () => {
      if (mongoose.connection.readyState !== 1) {
        throw new AppError("SERVICE_UNAVAILABLE", 503, "Mongo not ready");
      }
      await redis.ping();
    }
  });

  await connectMongo({ uri: config.mongoUri });
  await topicAdmin.ensureTopics(eventTopics);
  await eventPublisher.connect();

  const mongoStateInterval = setInterval(() => {
    metrics.updateMongoState(mongoose.connection.readyState);
  }, 10000);

  const server = http.createServer(app);
  server.listen(config.port, () => {
    logger.info("Rentals service running", { port: config.port });
  });

  const shutdown = async () => {
    logger.info("Shutting down rentals service");
    clearInterval(mongoStateInterval);
    server.close();
    await eventPublisher.disconnect();
    await mongoose.disconnect();
    redis.disconnect();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Rentals shutdown failed", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

start().catch((error: unknown) => {
  logger.error("Failed to start rentals service", { error: String(error) });
  process.exit(1);
});
