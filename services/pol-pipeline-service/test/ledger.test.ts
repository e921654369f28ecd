import { describe, expect, test } from "vitest";
import { createSubmissionLedger } from "../src/ledger/ledger";
import { InMemorySubmissionLedger } from "../src/ledger/ledger.memory";
import { PostgresSubmissionLedger } from "../src/ledger/ledger.pg";
import { ScriptedQueryable } from "./fakes";

const key = { vendorOrderRef: "INV-1", lineIndex: 1 };

function row(status: "submitting" | "submitted", remotePoLineId: string | null = null) {
  return {
    vendor_order_ref: "INV-1",
    line_index: "1",
    status,
    run_id: "run-1",
    payload_hash: "hash-1",
    remote_po_line_id: remotePoLineId,
    claimed_at: "2026-10-01T12:00:00.000Z",
    submitted_at: status === "submitted" ? "2026-10-01T12:00:05.000Z" : null
  };
}

describe("in-memory submission ledger", () => {
  test("claims a key once until it is released", async () => {
    const ledger = new InMemorySubmissionLedger();
    const first = await ledger.claim({ key, runId: "run-1", payloadHash: "hash-1" });
    const second = await ledger.claim({ key, runId: "run-2", payloadHash: "hash-1" });
    expect(first.outcome).toBe("claimed");
    expect(second.outcome).toBe("in_progress");
    expect(second.entry.runId).toBe("run-1");

    await ledger.release(key);
    expect(await ledger.get(key)).toBeNull();
  });

  test("a submitted key reports already_submitted and survives release", async () => {
    const ledger = new InMemorySubmissionLedger();
    await ledger.claim({ key, runId: "run-1", payloadHash: "hash-1" });
    await ledger.markSubmitted(key, "POL-1");
    await ledger.release(key);

    const again = await ledger.claim({ key, runId: "run-2", payloadHash: "hash-1" });
    expect(again.outcome).toBe("already_submitted");
    expect(again.entry.remotePoLineId).toBe("POL-1");
    expect(again.entry.submittedAt).toBeInstanceOf(Date);
  });

  test("markSubmitted without a claim fails", async () => {
    await expect(new InMemorySubmissionLedger().markSubmitted(key, "POL-1")).rejects.toThrow(
      "No ledger claim for INV-1#1"
    );
  });
});

describe("postgres submission ledger", () => {
  test("an inserted row is a fresh claim", async () => {
    const db = new ScriptedQueryable([[row("submitting")]]);
    const result = await new PostgresSubmissionLedger(db).claim({ key, runId: "run-1", payloadHash: "hash-1" });

    expect(result.outcome).toBe("claimed");
    expect(result.entry).toEqual({
      vendorOrderRef: "INV-1",
      lineIndex: 1,
      status: "submitting",
      runId: "run-1",
      payloadHash: "hash-1",
      remotePoLineId: null,
      claimedAt: new Date("2026-10-01T12:00:00.000Z"),
      submittedAt: null
    });
    expect(db.statements[0].text).toMatch(/^INSERT INTO pol_submissions/);
    expect(db.statements[0].values).toEqual(["INV-1", 1, "run-1", "hash-1"]);
  });

  test("a conflicting submitted row is already_submitted", async () => {
    const db = new ScriptedQueryable([[], [row("submitted", "POL-7")]]);
    const result = await new PostgresSubmissionLedger(db).claim({ key, runId: "run-2", payloadHash: "hash-1" });

    expect(result.outcome).toBe("already_submitted");
    expect(result.entry.remotePoLineId).toBe("POL-7");
    expect(db.statements[1].text).toMatch(/^SELECT /);
  });

  test("a row released between insert and select is claimed on the second insert", async () => {
    const db = new ScriptedQueryable([[], [], [row("submitting")]]);
    const result = await new PostgresSubmissionLedger(db).claim({ key, runId: "run-1", payloadHash: "hash-1" });
    expect(result.outcome).toBe("claimed");
    expect(db.statements).toHaveLength(3);
  });

  test("markSubmitted needs an existing claim", async () => {
    const ledger = new PostgresSubmissionLedger(new ScriptedQueryable([[]]));
    await expect(ledger.markSubmitted(key, "POL-1")).rejects.toThrow("No ledger claim for INV-1#1");
  });

  test("release only deletes in-flight claims", async () => {
    const db = new ScriptedQueryable();
    await new PostgresSubmissionLedger(db).release(key);
    expect(db.statements[0].text).toContain("status = 'submitting'");
    expect(db.statements[0].values).toEqual(["INV-1", 1]);
  });
});

describe("createSubmissionLedger", () => {
  test("selects the store from options", () => {
    expect(createSubmissionLedger({ useInMemoryStore: true })).toBeInstanceOf(InMemorySubmissionLedger);
    expect(createSubmissionLedger({ useInMemoryStore: false, db: new ScriptedQueryable() })).toBeInstanceOf(
      PostgresSubmissionLedger
    );
    expect(() => createSubmissionLedger({ useInMemoryStore: false })).toThrow(
      "A database connection is required for the durable submission ledger"
    );
  });
});
