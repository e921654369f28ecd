import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { BatchReadError } from "../errors";
import { formatIssues, orderBatchFileSchema } from "./order-schema";
import type { OrderBatch } from "./order-types";

export interface BatchSource {
  load(batchId: string): Promise<OrderBatch>;
}

const BATCH_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const EXTENSIONS = [".json", ".yaml", ".yml"];

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads `<root>/<batchId>.json` (or .yaml) exported from a vendor confirmation.
 */
export class FileBatchSource implements BatchSource {
  constructor(private readonly root: string) {}

  async load(batchId: string): Promise<OrderBatch> {
    if (!BATCH_ID_PATTERN.test(batchId)) {
      throw new BatchReadError(`Invalid batch id "${batchId}"`, batchId, 400);
    }

    for (const extension of EXTENSIONS) {
      const filePath = path.resolve(this.root, `${batchId}${extension}`);
      let raw: string;
      try {
        raw = await readFile(filePath, "utf-8");
      } catch (error) {
        if (isMissingFile(error)) {
          continue;
        }
        throw new BatchReadError(`Cannot read batch file ${filePath}: ${String(error)}`, batchId);
      }
      return this.parse(batchId, raw, extension);
    }

    throw new BatchReadError(`Batch "${batchId}" not found under ${this.root}`, batchId, 404);
  }

  private parse(batchId: string, raw: string, extension: string): OrderBatch {
    let document: unknown;
    try {
      document = extension === ".json" ? JSON.parse(raw) : parseYaml(raw);
    } catch (error) {
      throw new BatchReadError(`Batch "${batchId}" is not valid ${extension.slice(1)}: ${String(error)}`, batchId);
    }
    const parsed = orderBatchFileSchema.safeParse(document);
    if (!parsed.success) {
      throw new BatchReadError(`Batch "${batchId}" has no readable entries: ${formatIssues(parsed.error)}`, batchId);
    }
    return {
      batchId: parsed.data.batchId ?? batchId,
      defaultTemplate: parsed.data.defaultTemplate,
      entries: parsed.data.entries
    };
  }
}

export class InMemoryBatchSource implements BatchSource {
  private readonly batches = new Map<string, OrderBatch>();

  add(batch: OrderBatch): void {
    this.batches.set(batch.batchId, batch);
  }

  async load(batchId: string): Promise<OrderBatch> {
    const batch = this.batches.get(batchId);
    if (!batch) {
      throw new BatchReadError(`Batch "${batchId}" not found`, batchId, 404);
    }
    return batch;
  }
}
