import express, { Express } from "express";
import { ProcessPaymentWebhookUseCase } from "./application/use-cases/ProcessPaymentWebhookUseCase";
import { WebhookController } from "./interfaces/http/WebhookController";
import { buildWebhookRoutes } from "./interfaces/http/routes";
import { asyncHandler } from "../shared/http/asyncHandler";
import { createErrorMiddleware } from "../shared/http/errorMiddleware";
import { buildHealthRoutes, HealthCheck } from "../shared/http/healthRoutes";
import { RouteRateLimiters } from "../shared/http/rateLimitMiddleware";
import { requestLoggerMiddleware } from "../shared/http/requestLoggerMiddleware";
import { traceMiddleware } from "../shared/http/traceMiddleware";
import { Logger } from "../shared/observability/logger";
import { Metrics } from "../shared/observability/metrics";

export type AppDependencies = {
  processPaymentWebhookUseCase: ProcessPaymentWebhookUseCase;
  logger: Logger;
  metrics?: Metrics;
  rateLimiters?: Partial<RouteRateLimiters>;
  readiness?: Record<string, HealthCheck>;
};

export const buildApp = (dependencies: AppDependencies): Express => {
  const { logger, metrics } = dependencies;
  const app = express();
  app.disable("x-powered-by");
  app.use(traceMiddleware);
  if (metrics) {
    app.use(metrics.httpMiddleware);
    app.get("/metrics", asyncHandler(metrics.metricsHandler));
  }
  app.use(requestLoggerMiddleware(logger));
  app.use("/", buildHealthRoutes(async () => {}, dependencies.readiness ?? {}));
  app.use(
    "/",
    buildWebhookRoutes(
      new WebhookController(dependencies.processPaymentWebhookUseCase),
      dependencies.rateLimiters
    )
  );
  app.use(createErrorMiddleware(logger));
  return app;
};
