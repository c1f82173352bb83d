import dotenv from "dotenv";

dotenv.config();

export function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Like parseNumber, but zero and negative values fall back too. */
export function parsePositiveNumber(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

export const config = {
  port: parsePositiveNumber(process.env.PORT, 3010),
  serviceName: process.env.SERVICE_NAME ?? "publishing-service",
  brokerBrokers: (process.env.BROKER_BROKERS ?? "localhost:9092").split(","),
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true",
  runPassOnStart: parseBoolean(process.env.RUN_PASS_ON_START, false),
  summarizerUrl: process.env.SUMMARIZER_URL ?? "http://localhost:8000",
  publisherUrl: process.env.PUBLISHER_URL ?? "http://localhost:8010",
  approval: {
    ttlMs: parsePositiveNumber(process.env.APPROVAL_TTL_MS, 24 * 60 * 60 * 1000),
    sweepIntervalMs: parsePositiveNumber(process.env.APPROVAL_SWEEP_INTERVAL_MS, 30_000)
  },
  publish: {
    maxAttempts: parsePositiveNumber(process.env.PUBLISH_MAX_ATTEMPTS, 3),
    baseDelayMs: parsePositiveNumber(process.env.PUBLISH_RETRY_DELAY_MS, 5000),
    maxDelayMs: parsePositiveNumber(process.env.PUBLISH_RETRY_MAX_DELAY_MS, 60_000)
  },
  telemetry: {
    enabled: parseBoolean(process.env.TELEMETRY_ENABLED, true),
    environment: process.env.DEPLOYMENT_ENV ?? "development"
  },
  post: {
    prefix: process.env.POST_PREFIX ?? "",
    suffix: process.env.POST_SUFFIX ?? ""
  },
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseNumber(process.env.DB_PORT, 5432),
    user: process.env.DB_USER ?? "publisher",
    password: process.env.DB_PASSWORD ?? "publisher",
    database: process.env.DB_NAME ?? "publishing"
  }
};
