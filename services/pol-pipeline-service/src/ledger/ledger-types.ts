import type { PolKey } from "../templates/template-merger";

export type LedgerStatus = "submitting" | "submitted";

export type LedgerEntry = {
  vendorOrderRef: string;
  lineIndex: number;
  status: LedgerStatus;
  runId: string;
  payloadHash: string;
  remotePoLineId: string | null;
  claimedAt: Date;
  submittedAt: Date | null;
};

export type NewClaim = {
  key: PolKey;
  runId: string;
  payloadHash: string;
};

export type ClaimResult =
  | { outcome: "claimed"; entry: LedgerEntry }
  | { outcome: "already_submitted"; entry: LedgerEntry }
  | { outcome: "in_progress"; entry: LedgerEntry };
