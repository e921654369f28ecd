import Fastify from "fastify";
import { config } from "./config";
import { logger } from "./logger";
import { registerHealthRoutes } from "./health";
import { registerRoutes } from "./api/routes";
import { closeDb, getDb, migrate } from "./db";
import { startTelemetry, stopTelemetry } from "./telemetry";
import { getTraceIdFromRequest } from "./trace/trace";
import { createSubmissionLedger } from "./ledger/ledger";
import { perSecond, SlidingWindowRateLimiter } from "./lib/rate-limiter";
import { HttpCatalogSearchClient } from "./catalog/catalog-client";
import { createIdentifierResolver } from "./catalog/identifier-resolver";
import type { AcquisitionsApi } from "./acquisitions/acquisitions-api";
import { AlmaAcquisitionsApi } from "./acquisitions/acquisitions-api";
import { FakeAcquisitionsApi } from "./acquisitions/fake-acquisitions-api";
import { createTokenProvider, StaticTokenProvider } from "./acquisitions/token-provider";
import { createPolSubmitter } from "./acquisitions/pol-submitter";
import { FileBatchSource } from "./orders/batch-source";
import { createTemplateLoader } from "./templates/template-store";
import { createPipelineOrchestrator } from "./pipeline/orchestrator";
import { ActiveRuns } from "./pipeline/active-runs";

const app = Fastify({ logger: false });
const runs = new ActiveRuns();

async function start(): Promise<void> {
  await startTelemetry();
  app.addHook("onRequest", (request, reply, done) => {
    reply.header("x-trace-id", getTraceIdFromRequest(request));
    done();
  });

  const db = config.useInMemoryStore ? undefined : getDb();
  if (db) {
    await migrate(db);
  }
  const ledger = createSubmissionLedger({ useInMemoryStore: config.useInMemoryStore, db });
  const templates = createTemplateLoader({ root: config.templatesDir, logger });
  // Fail fast on a broken templates directory; runs reload it each time.
  templates.load();

  const resolver = createIdentifierResolver({
    client: new HttpCatalogSearchClient({
      baseUrl: config.catalog.baseUrl,
      apiKey: config.catalog.apiKey,
      timeoutMs: config.catalog.timeoutMs
    }),
    threshold: config.catalog.matchThreshold,
    backoff: { maxAttempts: config.catalog.maxAttempts },
    rateLimiter: new SlidingWindowRateLimiter(perSecond(config.catalog.ratePerSecond)),
    logger
  });

  const fakeMode = config.acquisitions.mode === "fake";
  const api: AcquisitionsApi = fakeMode
    ? new FakeAcquisitionsApi()
    : new AlmaAcquisitionsApi({ baseUrl: config.acquisitions.baseUrl, timeoutMs: config.acquisitions.timeoutMs });
  const tokens = fakeMode
    ? new StaticTokenProvider("fake-token")
    : createTokenProvider({
        apiKey: config.acquisitions.apiKey,
        tokenUrl: config.acquisitions.tokenUrl,
        clientId: config.acquisitions.clientId,
        clientSecret: config.acquisitions.clientSecret,
        timeoutMs: config.acquisitions.timeoutMs,
        logger
      });
  if (fakeMode) {
    logger.warn("ACQ_MODE=fake: POLs are accepted locally and never reach the acquisitions system");
  }

  const submitter = createPolSubmitter({
    api,
    tokens,
    ledger,
    backoff: { maxAttempts: config.acquisitions.maxAttempts },
    rateLimiter: new SlidingWindowRateLimiter(perSecond(config.acquisitions.ratePerSecond)),
    logger
  });

  const orchestrator = createPipelineOrchestrator({
    batches: new FileBatchSource(config.ordersDir),
    templates,
    resolver,
    submitter,
    logger,
    defaultTemplate: config.defaultTemplate,
    amazonVendorCode: config.amazonVendorCode,
    concurrency: config.concurrency
  });

  await registerHealthRoutes(app, { db, templates });
  await registerRoutes(app, { orchestrator, ledger, runs, logger });

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port }, "POL pipeline service listening");
}

async function shutdown(): Promise<void> {
  logger.info({ activeRuns: runs.ids() }, "Shutting down POL pipeline service");
  runs.cancelAll();
  await app.close();
  await closeDb();
  await stopTelemetry();
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

start().catch((error) => {
  logger.error({ error }, "Failed to start POL pipeline service");
  process.exit(1);
});
