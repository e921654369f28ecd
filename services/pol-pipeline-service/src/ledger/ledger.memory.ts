import type { PolKey } from "../templates/template-merger";
import { buildPolKeyId } from "../templates/template-merger";
import type { SubmissionLedger } from "./ledger";
import type { ClaimResult, LedgerEntry, NewClaim } from "./ledger-types";

export class InMemorySubmissionLedger implements SubmissionLedger {
  private readonly entries = new Map<string, LedgerEntry>();

  async claim(claim: NewClaim): Promise<ClaimResult> {
    const keyId = buildPolKeyId(claim.key);
    const existing = this.entries.get(keyId);
    if (existing) {
      return { outcome: existing.status === "submitted" ? "already_submitted" : "in_progress", entry: { ...existing } };
    }
    const entry: LedgerEntry = {
      vendorOrderRef: claim.key.vendorOrderRef,
      lineIndex: claim.key.lineIndex,
      status: "submitting",
      runId: claim.runId,
      payloadHash: claim.payloadHash,
      remotePoLineId: null,
      claimedAt: new Date(),
      submittedAt: null
    };
    this.entries.set(keyId, entry);
    return { outcome: "claimed", entry: { ...entry } };
  }

  async markSubmitted(key: PolKey, remotePoLineId: string | null): Promise<LedgerEntry> {
    const keyId = buildPolKeyId(key);
    const existing = this.entries.get(keyId);
    if (!existing) {
      throw new Error(`No ledger claim for ${keyId}`);
    }
    const updated: LedgerEntry = { ...existing, status: "submitted", remotePoLineId, submittedAt: new Date() };
    this.entries.set(keyId, updated);
    return { ...updated };
  }

  async release(key: PolKey): Promise<void> {
    const keyId = buildPolKeyId(key);
    if (this.entries.get(keyId)?.status === "submitting") {
      this.entries.delete(keyId);
    }
  }

  async get(key: PolKey): Promise<LedgerEntry | null> {
    const entry = this.entries.get(buildPolKeyId(key));
    return entry ? { ...entry } : null;
  }
}
