import type { Redis } from "ioredis";
import type { RequestHandler } from "express";
import { ipKeyGenerator, rateLimit } from "express-rate-limit";
import { RedisStore, type RedisReply } from "rate-limit-redis";
import { AppError } from "./AppError";

export type RateLimitPolicy = {
  windowMs: number;
  limit: number;
};

export type RateLimitConfig = {
  namespace: string;
  redis?: Redis;
  auth: RateLimitPolicy;
  write: RateLimitPolicy;
};

export type RouteRateLimiters = {
  auth: RequestHandler;
  write: RequestHandler;
};

type PolicyName = keyof RouteRateLimiters;

const createStore = (redis: Redis | undefined, prefix: string): RedisStore | undefined => {
  if (!redis) {
    return undefined;
  }
  return new RedisStore({
    sendCommand: async (...args: string[]) => {
      const [command, ...commandArgs] = args;
      return (await redis.call(command, ...commandArgs)) as RedisReply;
    },
    prefix
  });
};

const createLimiter = (config: RateLimitConfig, policyName: PolicyName): RequestHandler => {
  const policy = config[policyName];
  return rateLimit({
    windowMs: policy.windowMs,
    limit: policy.limit,
    // failed logins count, successful ones do not
    skipSuccessfulRequests: policyName === "auth",
    standardHeaders: "draft-8",
    legacyHeaders: false,
    passOnStoreError: true,
    identifier: `${config.namespace}-${policyName}`,
    keyGenerator: (req) => ipKeyGenerator(req.ip ?? "", 56),
    store: createStore(config.redis, `rate-limit:${config.namespace}:${policyName}:`),
    handler: (_req, _res, next) => {
      next(new AppError("TOO_MANY_REQUESTS", 429, "Too many requests. Please try again later."));
    }
  });
};

export const createRateLimiters = (config: RateLimitConfig): RouteRateLimiters => ({
  auth: createLimiter(config, "auth"),
  write: createLimiter(config, "write")
});
