import { z } from "zod";
import type { PolKey } from "../templates/template-merger";
import { buildPolKeyId } from "../templates/template-merger";
import type { SubmissionLedger } from "./ledger";
import type { ClaimResult, LedgerEntry, NewClaim } from "./ledger-types";

export type Queryable = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
};

const COLUMNS =
  "vendor_order_ref, line_index, status, run_id, payload_hash, remote_po_line_id, claimed_at, submitted_at";

const ledgerRowSchema = z.object({
  vendor_order_ref: z.string(),
  line_index: z.coerce.number().int(),
  status: z.enum(["submitting", "submitted"]),
  run_id: z.string(),
  payload_hash: z.string(),
  remote_po_line_id: z.string().nullable(),
  claimed_at: z.coerce.date(),
  submitted_at: z.coerce.date().nullable()
});

export class PostgresSubmissionLedger implements SubmissionLedger {
  constructor(private readonly db: Queryable) {}

  async claim(claim: NewClaim): Promise<ClaimResult> {
    // A concurrent release can delete the row between the insert and the
    // select; one more insert settles it.
    for (let attempt = 0; attempt < 2; attempt++) {
      const inserted = await this.db.query(
        `INSERT INTO pol_submissions (vendor_order_ref, line_index, status, run_id, payload_hash, claimed_at) VALUES ($1, $2, 'submitting', $3, $4, NOW()) ON CONFLICT (vendor_order_ref, line_index) DO NOTHING RETURNING ${COLUMNS}`,
        [claim.key.vendorOrderRef, claim.key.lineIndex, claim.runId, claim.payloadHash]
      );
      if (inserted.rows.length > 0) {
        return { outcome: "claimed", entry: this.mapEntry(inserted.rows[0]) };
      }
      const existing = await this.get(claim.key);
      if (existing) {
        return { outcome: existing.status === "submitted" ? "already_submitted" : "in_progress", entry: existing };
      }
    }
    throw new Error(`Could not claim ledger key ${buildPolKeyId(claim.key)}`);
  }

  async markSubmitted(key: PolKey, remotePoLineId: string | null): Promise<LedgerEntry> {
    const result = await this.db.query(
      `UPDATE pol_submissions SET status = 'submitted', remote_po_line_id = $3, submitted_at = NOW() WHERE vendor_order_ref = $1 AND line_index = $2 RETURNING ${COLUMNS}`,
      [key.vendorOrderRef, key.lineIndex, remotePoLineId]
    );
    if (result.rows.length === 0) {
      throw new Error(`No ledger claim for ${buildPolKeyId(key)}`);
    }
    return this.mapEntry(result.rows[0]);
  }

  async release(key: PolKey): Promise<void> {
    await this.db.query(
      "DELETE FROM pol_submissions WHERE vendor_order_ref = $1 AND line_index = $2 AND status = 'submitting'",
      [key.vendorOrderRef, key.lineIndex]
    );
  }

  async get(key: PolKey): Promise<LedgerEntry | null> {
    const result = await this.db.query(
      `SELECT ${COLUMNS} FROM pol_submissions WHERE vendor_order_ref = $1 AND line_index = $2`,
      [key.vendorOrderRef, key.lineIndex]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return this.mapEntry(result.rows[0]);
  }

  private mapEntry(row: unknown): LedgerEntry {
    const parsed = ledgerRowSchema.parse(row);
    return {
      vendorOrderRef: parsed.vendor_order_ref,
      lineIndex: parsed.line_index,
      status: parsed.status,
      runId: parsed.run_id,
      payloadHash: parsed.payload_hash,
      remotePoLineId: parsed.remote_po_line_id,
      claimedAt: parsed.claimed_at,
      submittedAt: parsed.submitted_at
    };
  }
}
