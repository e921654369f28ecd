import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { AuthenticationError, BatchReadError, describeError, TemplateStoreError } from "../errors";
import type { SubmissionLedger } from "../ledger/ledger";
import { logger as rootLogger } from "../logger";
import { formatIssues } from "../orders/order-schema";
import type { ActiveRuns } from "../pipeline/active-runs";
import type { PipelineOrchestrator } from "../pipeline/orchestrator";
import { getTraceIdFromRequest, withTraceId } from "../trace/trace";

export type RouteDependencies = {
  orchestrator: PipelineOrchestrator;
  ledger: SubmissionLedger;
  runs: ActiveRuns;
  logger?: Logger;
};

const batchParamsSchema = z.object({
  batchId: z.string().min(1)
});

const runBodySchema = z
  .object({
    runId: z
      .string()
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/, "runId must be a short token of letters, digits, dot, dash or underscore")
      .optional()
  })
  .nullish();

const runParamsSchema = z.object({
  runId: z.string().min(1)
});

const ledgerParamsSchema = z.object({
  vendorOrderRef: z.string().min(1),
  lineIndex: z.coerce.number().int().positive()
});

export async function registerRoutes(app: FastifyInstance, deps: RouteDependencies): Promise<void> {
  const baseLogger = deps.logger ?? rootLogger;

  app.post("/v1/batches/:batchId/runs", async (request, reply) => {
    const params = batchParamsSchema.safeParse(request.params);
    const body = runBodySchema.safeParse(request.body);
    if (!params.success || !body.success) {
      reply.code(400);
      const issues = [params, body].flatMap((result) => (result.success ? [] : [formatIssues(result.error)]));
      return { message: "Invalid run request", issues };
    }

    const runId = body.data?.runId ?? uuidv4();
    if (deps.runs.has(runId)) {
      reply.code(409);
      return { message: "Run already in progress", runId };
    }
    const log = withTraceId(baseLogger, getTraceIdFromRequest(request));
    const signal = deps.runs.start(runId);
    log.info({ runId, batchId: params.data.batchId }, "Starting batch run");
    try {
      return await deps.orchestrator.runBatch(params.data.batchId, { runId, signal });
    } catch (error) {
      if (error instanceof BatchReadError) {
        reply.code(error.statusCode);
        return { message: error.message, batchId: error.batchId, runId };
      }
      if (error instanceof AuthenticationError) {
        reply.code(502);
        return { message: error.message, stage: error.stage, runId };
      }
      if (error instanceof TemplateStoreError) {
        log.error({ runId, error: describeError(error) }, "POL templates unavailable");
        reply.code(500);
        return { message: error.message, runId };
      }
      throw error;
    } finally {
      deps.runs.finish(runId);
    }
  });

  app.post("/v1/runs/:runId/cancel", async (request, reply) => {
    const params = runParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return { message: formatIssues(params.error) };
    }
    if (!deps.runs.cancel(params.data.runId)) {
      reply.code(404);
      return { message: "Run not found or already finished", runId: params.data.runId };
    }
    withTraceId(baseLogger, getTraceIdFromRequest(request)).info({ runId: params.data.runId }, "Run cancellation requested");
    reply.code(202);
    return { runId: params.data.runId, status: "cancelling" };
  });

  app.get("/v1/ledger/:vendorOrderRef/:lineIndex", async (request, reply) => {
    const params = ledgerParamsSchema.safeParse(request.params);
    if (!params.success) {
      reply.code(400);
      return { message: formatIssues(params.error) };
    }
    const entry = await deps.ledger.get(params.data);
    if (!entry) {
      reply.code(404);
      return { message: "No submission recorded", ...params.data };
    }
    return entry;
  });
}
