import { fileURLToPath } from "node:url";
import type { AcquisitionsApi, AcquisitionsResponse } from "../src/acquisitions/acquisitions-api";
import type { CatalogCandidate, CatalogQuery, CatalogSearchClient } from "../src/catalog/catalog-client";
import type { Queryable } from "../src/ledger/ledger.pg";
import type { Sleep } from "../src/lib/retry";
import type { OrderLine, OrderLineDetails } from "../src/orders/order-types";
import type { PolPayload } from "../src/templates/template-merger";

export const TEMPLATES_DIR = fileURLToPath(new URL("../../../templates", import.meta.url));

export const noSleep: Sleep = async () => undefined;

export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    }
  };
}

type CatalogReply = CatalogCandidate[] | Error;

export class ScriptedCatalogClient implements CatalogSearchClient {
  readonly queries: CatalogQuery[] = [];

  constructor(private readonly reply: (query: CatalogQuery) => CatalogReply) {}

  async search(query: CatalogQuery): Promise<CatalogCandidate[]> {
    this.queries.push(query);
    const result = this.reply(query);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

type AcquisitionsReply = AcquisitionsResponse | Error;

/**
 * Plays back the given responses in order, then accepts every further call.
 */
export class ScriptedAcquisitionsApi implements AcquisitionsApi {
  readonly calls: Array<{ payload: PolPayload; token: string }> = [];
  private created = 0;

  constructor(private readonly script: AcquisitionsReply[] = []) {}

  async createPoLine(payload: PolPayload, token: string): Promise<AcquisitionsResponse> {
    this.calls.push({ payload, token });
    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next) {
      return next;
    }
    this.created += 1;
    return { status: 201, body: { po_line_id: `POL-${this.created}` } };
  }
}

/**
 * Records statements and answers each with the next scripted row set.
 */
export class ScriptedQueryable implements Queryable {
  readonly statements: Array<{ text: string; values?: unknown[] }> = [];

  constructor(private readonly results: unknown[][] = []) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }> {
    this.statements.push({ text, values });
    const rows = this.results.shift() ?? [];
    return { rows, rowCount: rows.length };
  }
}

export function makeLine(overrides: Partial<Omit<OrderLine, "details">> & { details?: Partial<OrderLineDetails> } = {}): OrderLine {
  const { details, ...fields } = overrides;
  return {
    format: "generic",
    vendorId: "hacky-m",
    title: "Dune",
    author: "Frank Herbert",
    rawPrice: "24.99",
    price: 24.99,
    currency: "USD",
    vendorOrderRef: "INV-1",
    quantity: 1,
    lineNumber: 1,
    lineIndex: 1,
    ...fields,
    details: { receivingCategories: [], ...details }
  };
}
