import { formatIssues, rawOrderEntrySchema } from "./order-schema";
import type { BatchReadResult, OrderBatch, OrderLine, ReadError } from "./order-types";
import { toOrderLine } from "./vendor-formats";

export type ReaderOptions = {
  amazonVendorCode?: string;
};

const REFERENCE_FIELDS: Record<string, string> = {
  amazon: "orderId",
  generic: "vendorReference",
  consortial: "shipmentId"
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function peekString(entry: Record<string, unknown>, field: string): string | undefined {
  const value = entry[field];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Reads the vendor order reference before validation so that a malformed
 * entry still takes its slot in the (vendorOrderRef, lineIndex) numbering.
 */
function peekVendorOrderRef(entry: unknown): string | undefined {
  if (!isRecord(entry)) {
    return undefined;
  }
  const format = peekString(entry, "format");
  const field = format ? REFERENCE_FIELDS[format] : undefined;
  return field ? peekString(entry, field) : undefined;
}

export function readOrderBatch(batch: OrderBatch, options: ReaderOptions = {}): BatchReadResult {
  const amazonVendorCode = options.amazonVendorCode ?? "AMAZON";
  const lines: OrderLine[] = [];
  const readErrors: ReadError[] = [];
  const refCounts = new Map<string, number>();

  batch.entries.forEach((entry, index) => {
    const lineNumber = index + 1;
    const vendorOrderRef = peekVendorOrderRef(entry);
    let lineIndex = 0;
    if (vendorOrderRef) {
      lineIndex = (refCounts.get(vendorOrderRef) ?? 0) + 1;
      refCounts.set(vendorOrderRef, lineIndex);
    }
    const format = isRecord(entry) ? peekString(entry, "format") : undefined;

    const parsed = rawOrderEntrySchema.safeParse(entry);
    if (!parsed.success) {
      readErrors.push({ lineNumber, reason: formatIssues(parsed.error), format, vendorOrderRef });
      return;
    }

    const conversion = toOrderLine(parsed.data, { lineNumber, lineIndex, amazonVendorCode });
    if (!conversion.ok) {
      readErrors.push({ lineNumber, reason: conversion.reason, format, vendorOrderRef });
      return;
    }
    lines.push(conversion.line);
  });

  return { batchId: batch.batchId, lines, readErrors };
}
