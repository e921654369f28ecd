import dotenv from "dotenv";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
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

function parseAcquisitionsMode(value: string | undefined): "live" | "fake" {
  return value?.toLowerCase() === "fake" ? "fake" : "live";
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

export const config = {
  port: parseNumber(process.env.PORT, 3010),
  serviceName: process.env.SERVICE_NAME ?? "pol-pipeline-service",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: parseBoolean(process.env.USE_INMEMORY_STORE, false),
  ordersDir: process.env.ORDERS_DIR ?? "orders",
  templatesDir: optional(process.env.TEMPLATES_DIR),
  defaultTemplate: process.env.DEFAULT_TEMPLATE ?? "book",
  concurrency: parseNumber(process.env.PIPELINE_CONCURRENCY, 1),
  amazonVendorCode: process.env.AMAZON_VENDOR_CODE ?? "AMAZON",
  catalog: {
    baseUrl: process.env.CATALOG_URL ?? "http://localhost:8081",
    apiKey: optional(process.env.CATALOG_API_KEY),
    timeoutMs: parseNumber(process.env.CATALOG_TIMEOUT_MS, 10000),
    maxAttempts: parseNumber(process.env.CATALOG_MAX_ATTEMPTS, 3),
    ratePerSecond: parseNumber(process.env.CATALOG_RATE_LIMIT_PER_SECOND, 1),
    matchThreshold: parseNumber(process.env.MATCH_THRESHOLD, 0.8)
  },
  acquisitions: {
    mode: parseAcquisitionsMode(process.env.ACQ_MODE),
    baseUrl: process.env.ACQ_API_URL ?? "http://localhost:8082/almaws/v1",
    apiKey: optional(process.env.ACQ_API_KEY),
    tokenUrl: optional(process.env.ACQ_TOKEN_URL),
    clientId: optional(process.env.ACQ_CLIENT_ID),
    clientSecret: optional(process.env.ACQ_CLIENT_SECRET),
    timeoutMs: parseNumber(process.env.ACQ_TIMEOUT_MS, 15000),
    maxAttempts: parseNumber(process.env.ACQ_MAX_ATTEMPTS, 5),
    ratePerSecond: parseNumber(process.env.ACQ_RATE_LIMIT_PER_SECOND, 5)
  },
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseNumber(process.env.DB_PORT, 5432),
    user: process.env.DB_USER ?? "acquisitions",
    password: process.env.DB_PASSWORD ?? "acquisitions",
    database: process.env.DB_NAME ?? "acquisitions"
  }
};

export type AppConfig = typeof config;
