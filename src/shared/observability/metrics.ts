import client, { Counter, Gauge, Histogram, Registry } from "prom-client";
import { NextFunction, Request, Response } from "express";

export type Metrics = {
  registry: Registry;
  httpMiddleware: (req: Request, res: Response, next: NextFunction) => void;
  metricsHandler: (req: Request, res: Response) => Promise<void>;
  recordDbQuery: (db: string, operation: string, durationSeconds: number) => void;
  recordIdempotencyHit: () => void;
  recordIdempotencyMiss: () => void;
  recordWebhookOutcome: (outcome: string) => void;
  updatePgPool: (pool: { totalCount: number; idleCount: number; waitingCount: number }) => void;
};

export const createMetrics = (service: string): Metrics => {
  const registry = new Registry();
  registry.setDefaultLabels({ service });
  client.collectDefaultMetrics({ register: registry });

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

  const dbQueryDuration = new Histogram({
    name: "db_query_duration_seconds",
    help: "Database query duration in seconds",
    labelNames: ["service", "db", "operation"],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5],
    registers: [registry]
  });

  const dbQueries = new Counter({
    name: "db_queries_total",
    help: "Total database queries",
    labelNames: ["service", "db", "operation"],
    registers: [registry]
  });

  const idempotencyHits = new Counter({
    name: "idempotency_hits_total",
    help: "Webhook deliveries whose transaction id was already in the ledger",
    labelNames: ["service"],
    registers: [registry]
  });

  const idempotencyMisses = new Counter({
    name: "idempotency_misses_total",
    help: "Webhook deliveries with a transaction id not yet in the ledger",
    labelNames: ["service"],
    registers: [registry]
  });

  const webhookOutcomes = new Counter({
    name: "payment_webhooks_total",
    help: "Payment webhooks by terminal outcome",
    labelNames: ["service", "outcome"],
    registers: [registry]
  });

  const pgPoolTotal = new Gauge({
    name: "pg_pool_total",
    help: "Postgres pool total clients",
    labelNames: ["service"],
    registers: [registry]
  });

  const pgPoolIdle = new Gauge({
    name: "pg_pool_idle",
    help: "Postgres pool idle clients",
    labelNames: ["service"],
    registers: [registry]
  });

  const pgPoolWaiting = new Gauge({
    name: "pg_pool_waiting",
    help: "Postgres pool waiting requests",
    labelNames: ["service"],
    registers: [registry]
  });

  const httpMiddleware = (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const route = req.route ? `${req.baseUrl}${String(req.route.path)}` : req.path;
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
      const labels = {
        service,
        method: req.method,
        route,
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
    recordDbQuery: (db, operation, durationSeconds) => {
      dbQueryDuration.observe({ service, db, operation }, durationSeconds);
      dbQueries.inc({ service, db, operation });
    },
    recordIdempotencyHit: () => idempotencyHits.inc({ service }),
    recordIdempotencyMiss: () => idempotencyMisses.inc({ service }),
    recordWebhookOutcome: (outcome) => webhookOutcomes.inc({ service, outcome }),
    updatePgPool: (pool) => {
      pgPoolTotal.set({ service }, pool.totalCount);
      pgPoolIdle.set({ service }, pool.idleCount);
      pgPoolWaiting.set({ service }, pool.waitingCount);
    }
  };
};
