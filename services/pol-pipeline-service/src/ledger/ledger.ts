import type { PolKey } from "../templates/template-merger";
import type { ClaimResult, LedgerEntry, NewClaim } from "./ledger-types";
import { InMemorySubmissionLedger } from "./ledger.memory";
import type { Queryable } from "./ledger.pg";
import { PostgresSubmissionLedger } from "./ledger.pg";

/**
 * Durable record of which (vendorOrderRef, lineIndex) keys reached the
 * acquisitions API. `claim` is the only check-then-write and is atomic per key.
 */
export interface SubmissionLedger {
  claim(claim: NewClaim): Promise<ClaimResult>;
  markSubmitted(key: PolKey, remotePoLineId: string | null): Promise<LedgerEntry>;
  release(key: PolKey): Promise<void>;
  get(key: PolKey): Promise<LedgerEntry | null>;
}

export function createSubmissionLedger(options: { useInMemoryStore: boolean; db?: Queryable }): SubmissionLedger {
  if (options.useInMemoryStore) {
    return new InMemorySubmissionLedger();
  }
  if (!options.db) {
    throw new Error("A database connection is required for the durable submission ledger");
  }
  return new PostgresSubmissionLedger(options.db);
}
