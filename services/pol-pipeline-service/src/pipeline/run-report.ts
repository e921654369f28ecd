import type { SubmissionStatus } from "../acquisitions/pol-submitter";
import type { MatchMethod } from "../catalog/identifier-resolver";
import type { PipelineStage } from "../errors";
import type { ReadError } from "../orders/order-types";

export type ResolutionSummary = {
  catalogId: string | null;
  confidence: number;
  matchMethod: MatchMethod;
  matchedTitle?: string;
};

export type LineOutcome = {
  lineNumber: number;
  vendorOrderRef: string;
  lineIndex: number;
  keyId: string;
  title: string;
  templateName: string;
  status: SubmissionStatus;
  stage?: PipelineStage;
  resolution?: ResolutionSummary;
  remotePoLineId?: string | null;
  attempts: number;
  error?: { name: string; message: string; detail?: unknown };
};

export type RunStatus = "completed" | "cancelled" | "auth_failed";

export type RunCounts = {
  entries: number;
  submitted: number;
  duplicate: number;
  failed: number;
  unresolved: number;
  readErrors: number;
};

export type RunReport = {
  runId: string;
  batchId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  counts: RunCounts;
  lines: LineOutcome[];
  failed: LineOutcome[];
  unresolved: LineOutcome[];
  readErrors: ReadError[];
};

export function isUnresolved(outcome: LineOutcome): boolean {
  return outcome.resolution !== undefined && outcome.resolution.catalogId === null;
}

export function buildRunReport(input: {
  runId: string;
  batchId: string;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date;
  entries: number;
  lines: LineOutcome[];
  readErrors: ReadError[];
}): RunReport {
  const lines = [...input.lines].sort((a, b) => a.lineNumber - b.lineNumber);
  const failed = lines.filter((line) => line.status === "failed");
  const unresolved = lines.filter(isUnresolved);

  return {
    runId: input.runId,
    batchId: input.batchId,
    status: input.status,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    counts: {
      entries: input.entries,
      submitted: lines.filter((line) => line.status === "submitted").length,
      duplicate: lines.filter((line) => line.status === "duplicate").length,
      failed: failed.length,
      unresolved: unresolved.length,
      readErrors: input.readErrors.length
    },
    lines,
    failed,
    unresolved,
    readErrors: input.readErrors
  };
}
