import { z } from "zod";
import { PostgresConfig } from "./infrastructure/db/postgres";
import { LogLevel } from "../shared/observability/logger";
import { RateLimitPolicy } from "../shared/http/rateLimitMiddleware";

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3002),
  WEBHOOK_SECRET: z.string({ required_error: "is required" }).min(1, "is required"),
  PAYMENTS_STORAGE: z.enum(["postgres", "memory"]).default("postgres"),
  PAYMENTS_MEMORY_SEED: z.preprocess(emptyAsUndefined, z.string().optional()),
  PG_HOST: z.string().default("localhost"),
  PG_PORT: z.coerce.number().int().positive().default(5432),
  PG_USER: z.string().default("payments"),
  PG_PASSWORD: z.string().default("payments"),
  PG_DATABASE: z.string().default("payments"),
  REDIS_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  WEBHOOK_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  WEBHOOK_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  LOG_LEVEL: z.enum(["info", "warn", "error"]).default("info")
});

export type StorageKind = "postgres" | "memory";

export type AppConfig = {
  port: number;
  webhookSecret: string;
  storage: StorageKind;
  memorySeedPath?: string;
  postgres: PostgresConfig;
  redisUrl?: string;
  webhookRateLimit: RateLimitPolicy;
  logLevel: LogLevel;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const loadConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const values = parsed.data;
  return {
    port: values.PORT,
    webhookSecret: values.WEBHOOK_SECRET,
    storage: values.PAYMENTS_STORAGE,
    memorySeedPath: values.PAYMENTS_MEMORY_SEED,
    postgres: {
      host: values.PG_HOST,
      port: values.PG_PORT,
      user: values.PG_USER,
      password: values.PG_PASSWORD,
      database: values.PG_DATABASE
    },
    redisUrl: values.REDIS_URL,
    webhookRateLimit: {
      windowMs: values.WEBHOOK_RATE_LIMIT_WINDOW_MS,
      limit: values.WEBHOOK_RATE_LIMIT_MAX
    },
    logLevel: values.LOG_LEVEL
  };
};
