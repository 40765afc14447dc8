import type { Redis } from "ioredis";
import type { RequestHandler } from "express";
import { ipKeyGenerator, rateLimit } from "express-rate-limit";
import { AppError } from "./AppError";
import { RedisStore, type RedisReply } from "rate-limit-redis";

export type RateLimitPolicy = {
  windowMs: number;
  limit: number;
};

export type RateLimitConfig = {
  namespace: string;
  redis?: Redis;
  webhook: RateLimitPolicy;
};

export type RouteRateLimiters = {
  webhook: RequestHandler;
};

// Shared across instances when Redis is configured, per-process otherwise.
const createStore = (redis: Redis | undefined, namespace: string): RedisStore | undefined => {
  if (!redis) {
    return undefined;
  }
  return new RedisStore({
    sendCommand: async (...args: string[]) => {
      const [command, ...commandArgs] = args;
      return (await redis.call(command, ...commandArgs)) as RedisReply;
    },
    prefix: `rate-limit:${namespace}:`
  });
};

export const createRateLimiters = (config: RateLimitConfig): RouteRateLimiters => {
  return {
    webhook: rateLimit({
      windowMs: config.webhook.windowMs,
      limit: config.webhook.limit,
      standardHeaders: "draft-8",
      legacyHeaders: false,
      passOnStoreError: true,
      identifier: `${config.namespace}-webhook`,
      keyGenerator: (req) => ipKeyGenerator(req.ip ?? "", 56),
      store: createStore(config.redis, `${config.namespace}:webhook`),
      handler: (_req, _res, next) => {
        next(new AppError("TOO_MANY_REQUESTS", 429, "Too many requests. Please try again later."));
      }
    })
  };
};
