import http from "http";
import dotenv from "dotenv";
import Redis from "ioredis";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { ProcessPaymentWebhookUseCase } from "./application/use-cases/ProcessPaymentWebhookUseCase";
import { PaymentUnitOfWork } from "./domain/repositories/PaymentUnitOfWork";
import { WebhookSignatureVerifier } from "./domain/services/WebhookSignatureVerifier";
import { createPool, initSchema } from "./infrastructure/db/postgres";
import { PostgresPaymentUnitOfWork } from "./infrastructure/db/PostgresPaymentUnitOfWork";
import { InMemoryPaymentStore } from "./infrastructure/memory/InMemoryPaymentStore";
import { loadAccountSeeds } from "./infrastructure/memory/loadAccountSeeds";
import { HealthCheck } from "../shared/http/healthRoutes";
import { createRateLimiters } from "../shared/http/rateLimitMiddleware";
import { createLogger } from "../shared/observability/logger";
import { createMetrics } from "../shared/observability/metrics";

dotenv.config();

const config = loadConfig(process.env);
const logger = createLogger("payments", { level: config.logLevel });
const metrics = createMetrics("payments");

const redis = config.redisUrl ? new Redis(config.redisUrl) : undefined;

const start = async (): Promise<void> => {
  const pool = config.storage === "postgres" ? createPool(config.postgres) : undefined;
  const readiness: Record<string, HealthCheck> = {};
  let unitOfWork: PaymentUnitOfWork;

  if (pool) {
    await initSchema(pool);
    unitOfWork = new PostgresPaymentUnitOfWork(pool, metrics, logger);
    readiness.postgres = async () => {
      await pool.query("SELECT 1");
    };
  } else {
    const seeds = config.memorySeedPath ? await loadAccountSeeds(config.memorySeedPath) : [];
    unitOfWork = new InMemoryPaymentStore(seeds);
    logger.warn("Using in-memory payment storage; state is lost on restart", {
      accounts: seeds.length
    });
  }
  if (redis) {
    readiness.redis = async () => {
      await redis.ping();
    };
  }

  const processPaymentWebhookUseCase = new ProcessPaymentWebhookUseCase(
    new WebhookSignatureVerifier(config.webhookSecret),
    unitOfWork,
    metrics,
    logger
  );

  const app = buildApp({
    processPaymentWebhookUseCase,
    logger,
    metrics,
    readiness,
    rateLimiters: createRateLimiters({
      namespace: "payments",
      redis,
      webhook: config.webhookRateLimit
    })
  });

  const metricsInterval = pool
    ? setInterval(() => metrics.updatePgPool(pool), 10000)
    : undefined;

  const server = http.createServer(app);
  server.listen(config.port, () => {
    logger.info("Payments service running", { port: config.port, storage: config.storage });
  });

  const shutdown = async () => {
    logger.info("Shutting down payments service");
    clearInterval(metricsInterval);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pool?.end();
    redis?.disconnect();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

start().catch((error: unknown) => {
  logger.error("Failed to start payments service", { error: String(error) });
  process.exit(1);
});
