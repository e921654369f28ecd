import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import type { PolSubmitter } from "../acquisitions/pol-submitter";
import type { IdentifierResolver, ResolvedIdentifier } from "../catalog/identifier-resolver";
import type { PipelineStage } from "../errors";
import { AuthenticationError, BatchReadError, describeError } from "../errors";
import { Semaphore } from "../lib/concurrency";
import { logger as rootLogger } from "../logger";
import { readOrderBatch } from "../orders/batch-reader";
import type { BatchSource } from "../orders/batch-source";
import type { OrderBatch, OrderLine } from "../orders/order-types";
import { orderLineRef } from "../orders/order-types";
import { mergePolRecord } from "../templates/template-merger";
import type { TemplateLoader, TemplateStore } from "../templates/template-store";
import { withTraceId } from "../trace/trace";
import type { LineOutcome, ResolutionSummary, RunReport, RunStatus } from "./run-report";
import { buildRunReport } from "./run-report";

export type PipelineDependencies = {
  batches: BatchSource;
  templates: TemplateLoader;
  resolver: IdentifierResolver;
  submitter: PolSubmitter;
  logger?: Logger;
  defaultTemplate?: string;
  amazonVendorCode?: string;
  concurrency?: number;
  now?: () => Date;
  generateRunId?: () => string;
};

export type RunOptions = {
  runId?: string;
  signal?: AbortSignal;
};

export type PipelineOrchestrator = {
  runBatch: (batchId: string, options?: RunOptions) => Promise<RunReport>;
};

type RunState = {
  runId: string;
  batch: OrderBatch;
  store: TemplateStore;
  asOf: Date;
  log: Logger;
  signal?: AbortSignal;
  stopReason: Exclude<RunStatus, "completed"> | null;
};

function summarize(resolved: ResolvedIdentifier): ResolutionSummary {
  return {
    catalogId: resolved.catalogId,
    confidence: resolved.confidence,
    matchMethod: resolved.matchMethod,
    matchedTitle: resolved.matchedTitle
  };
}

export function createPipelineOrchestrator(deps: PipelineDependencies): PipelineOrchestrator {
  const now = deps.now ?? (() => new Date());
  const generateRunId = deps.generateRunId ?? (() => uuidv4());
  const defaultTemplate = deps.defaultTemplate ?? "book";

  const loadBatch = async (batchId: string): Promise<OrderBatch> => {
    try {
      return await deps.batches.load(batchId);
    } catch (error) {
      if (error instanceof BatchReadError) {
        throw error;
      }
      throw new BatchReadError(`Cannot read batch "${batchId}": ${describeError(error).message}`, batchId);
    }
  };

  const processLine = async (line: OrderLine, state: RunState): Promise<LineOutcome> => {
    const templateName = line.details.template ?? state.batch.defaultTemplate ?? defaultTemplate;
    const base = {
      lineNumber: line.lineNumber,
      vendorOrderRef: line.vendorOrderRef,
      lineIndex: line.lineIndex,
      keyId: orderLineRef(line),
      title: line.title,
      templateName
    };

    let stage: PipelineStage = "resolve";
    let resolution: ResolutionSummary | undefined;
    try {
      const resolved = await deps.resolver.resolve(line);
      resolution = summarize(resolved);

      stage = "merge";
      const record = mergePolRecord(state.store, templateName, line, resolved, { asOf: state.asOf });

      if (state.signal?.aborted) {
        state.stopReason = state.stopReason ?? "cancelled";
      }
      if (state.stopReason) {
        return {
          ...base,
          status: "failed",
          stage: "cancelled",
          resolution,
          attempts: 0,
          error: { name: "RunStopped", message: `Run stopped (${state.stopReason}) before submission` }
        };
      }

      stage = "submit";
      const result = await deps.submitter.submit(record, { runId: state.runId, logger: state.log });
      return {
        ...base,
        status: result.status,
        stage: result.status === "failed" ? "submit" : undefined,
        resolution,
        remotePoLineId: result.remotePoLineId,
        attempts: result.attempts,
        error: result.errorDetail
      };
    } catch (error) {
      if (error instanceof AuthenticationError) {
        state.stopReason = "auth_failed";
        stage = "authentication";
        state.log.error({ keyId: base.keyId, error: describeError(error) }, "Authentication lost; stopping run");
      }
      return { ...base, status: "failed", stage, resolution, attempts: 0, error: describeError(error) };
    }
  };

  const notStarted = (line: OrderLine, state: RunState): LineOutcome => ({
    lineNumber: line.lineNumber,
    vendorOrderRef: line.vendorOrderRef,
    lineIndex: line.lineIndex,
    keyId: orderLineRef(line),
    title: line.title,
    templateName: line.details.template ?? state.batch.defaultTemplate ?? defaultTemplate,
    status: "failed",
    stage: "cancelled",
    attempts: 0,
    error: { name: "RunStopped", message: `Run stopped (${state.stopReason ?? "cancelled"}) before this line started` }
  });

  const runBatch: PipelineOrchestrator["runBatch"] = async (batchId, options = {}) => {
    const runId = options.runId ?? generateRunId();
    const log = withTraceId(deps.logger ?? rootLogger, runId).child({ batchId });
    const startedAt = now();

    const batch = await loadBatch(batchId);
    const store = deps.templates.load();
    const { lines, readErrors } = readOrderBatch(batch, { amazonVendorCode: deps.amazonVendorCode });
    for (const readError of readErrors) {
      log.warn({ readError }, "Skipping unreadable order entry");
    }
    log.info({ lines: lines.length, readErrors: readErrors.length }, "Order batch read");

    await deps.submitter.verifyCredentials();

    const state: RunState = {
      runId,
      batch,
      store,
      asOf: startedAt,
      log,
      signal: options.signal,
      stopReason: null
    };
    const semaphore = new Semaphore(Math.max(1, Math.floor(deps.concurrency ?? 1)));
    const outcomes = await Promise.all(
      lines.map((line) =>
        semaphore.run(async () => {
          if (state.signal?.aborted) {
            state.stopReason = state.stopReason ?? "cancelled";
          }
          if (state.stopReason) {
            return notStarted(line, state);
          }
          return processLine(line, state);
        })
      )
    );

    const report = buildRunReport({
      runId,
      batchId: batch.batchId,
      status: state.stopReason ?? "completed",
      startedAt,
      finishedAt: now(),
      entries: batch.entries.length,
      lines: outcomes,
      readErrors
    });
    log.info({ status: report.status, counts: report.counts }, "Batch run finished");
    return report;
  };

  return { runBatch };
}
