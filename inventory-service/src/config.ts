import { z } from "zod";
import { ConfigError } from "./common/errors";
import type { RetryPolicy } from "./common/retry";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  KAFKA_BROKERS: z.string().default("localhost:9092"),
  KAFKA_CLIENT_ID: z.string().min(1).default("inventory-service"),
  KAFKA_GROUP_ID: z.string().min(1).default("inventory-service-group"),
  PORT: positiveInt(8086),
  STORE_TIMEOUT_MS: positiveInt(5000),
  PUBLISH_TIMEOUT_MS: positiveInt(10000),
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(200),
});

export interface ServiceConfig {
  databaseUrl: string;
  kafka: {
    clientId: string;
    groupId: string;
    brokers: string[];
  };
  port: number;
  storeTimeoutMs: number;
  publishTimeoutMs: number;
  retryPolicy: RetryPolicy;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const vars = parsed.data;
  const brokers = vars.KAFKA_BROKERS.split(",")
    .map((broker) => broker.trim())
    .filter((broker) => broker.length > 0);

  if (brokers.length === 0) {
    throw new ConfigError(["KAFKA_BROKERS: at least one broker is required"]);
  }

  return {
    databaseUrl: vars.DATABASE_URL,
    kafka: {
      clientId: vars.KAFKA_CLIENT_ID,
      groupId: vars.KAFKA_GROUP_ID,
      brokers,
    },
    port: vars.PORT,
    storeTimeoutMs: vars.STORE_TIMEOUT_MS,
    publishTimeoutMs: vars.PUBLISH_TIMEOUT_MS,
    retryPolicy: {
      maxAttempts: vars.RETRY_MAX_ATTEMPTS,
      baseDelayMs: vars.RETRY_BASE_DELAY_MS,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
    },
  };
}
