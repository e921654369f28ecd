import type { Logger } from "pino";
import {
  AuthenticationError,
  describeError,
  SubmissionRejected,
  TransientSubmissionError
} from "../errors";
import type { SubmissionLedger } from "../ledger/ledger";
import { logger as rootLogger } from "../logger";
import type { RateLimiter } from "../lib/rate-limiter";
import { unlimited } from "../lib/rate-limiter";
import type { BackoffConfig, Sleep } from "../lib/retry";
import { computeBackoff, isRetryableStatus, sleep as defaultSleep } from "../lib/retry";
import type { POLRecord, PolKey } from "../templates/template-merger";
import type { AcquisitionsApi } from "./acquisitions-api";
import { extractPoLineId } from "./acquisitions-api";
import type { TokenProvider } from "./token-provider";

export type SubmissionStatus = "submitted" | "duplicate" | "failed";
export type SubmissionState = "pending" | "submitting" | SubmissionStatus;

export type SubmissionResult = {
  polKey: PolKey;
  keyId: string;
  status: SubmissionStatus;
  remotePoLineId?: string | null;
  errorDetail?: { name: string; message: string; detail?: unknown };
  attempts: number;
  transitions: SubmissionState[];
};

export type SubmitContext = {
  runId: string;
  logger?: Logger;
};

export type PolSubmitter = {
  submit: (record: POLRecord, context: SubmitContext) => Promise<SubmissionResult>;
  verifyCredentials: () => Promise<void>;
};

export type PolSubmitterOptions = {
  api: AcquisitionsApi;
  tokens: TokenProvider;
  ledger: SubmissionLedger;
  backoff?: Partial<BackoffConfig>;
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
  logger?: Logger;
};

const DEFAULT_SUBMIT_BACKOFF: BackoffConfig = {
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitter: 0.3
};

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function isAuthRejection(status: number): boolean {
  return status === 401 || status === 403;
}

export function createPolSubmitter(options: PolSubmitterOptions): PolSubmitter {
  const backoff: BackoffConfig = { ...DEFAULT_SUBMIT_BACKOFF, ...options.backoff };
  const limiter = options.rateLimiter ?? unlimited;
  const wait = options.sleep ?? defaultSleep;

  /**
   * Sends the record until it is accepted, rejected, or the attempt cap is
   * hit. Resolves with the remote PO line id on 2xx; throws otherwise.
   */
  const send = async (record: POLRecord, log: Logger, onCall: () => void): Promise<string | null> => {
    let transientFailures = 0;
    let refreshed = false;

    while (true) {
      const token = await options.tokens.getToken();
      await limiter.acquire("acquisitions");
      onCall();

      let failure: unknown;
      try {
        const response = await options.api.createPoLine(record.payload, token);
        if (isSuccess(response.status)) {
          return extractPoLineId(response.body);
        }
        if (isAuthRejection(response.status)) {
          if (refreshed) {
            throw new AuthenticationError(
              `Acquisitions API rejected refreshed credentials (HTTP ${response.status})`,
              response.body
            );
          }
          log.info({ keyId: record.keyId }, "Acquisitions token rejected; refreshing");
          options.tokens.invalidate();
          refreshed = true;
          continue;
        }
        if (!isRetryableStatus(response.status) && response.status < 500) {
          throw new SubmissionRejected(response.status, response.body);
        }
        failure = { status: response.status, body: response.body };
      } catch (error) {
        if (error instanceof AuthenticationError || error instanceof SubmissionRejected) {
          throw error;
        }
        failure = describeError(error);
      }

      transientFailures += 1;
      if (transientFailures >= backoff.maxAttempts) {
        throw new TransientSubmissionError(
          `Acquisitions API unavailable after ${transientFailures} attempt(s)`,
          transientFailures,
          failure
        );
      }
      const delay = computeBackoff(transientFailures, backoff);
      log.warn({ keyId: record.keyId, attempt: transientFailures, delay, failure }, "POL submission failed; retrying");
      await wait(delay);
    }
  };

  const submit: PolSubmitter["submit"] = async (record, context) => {
    const log = (context.logger ?? options.logger ?? rootLogger).child({ keyId: record.keyId });
    const transitions: SubmissionState[] = ["pending"];
    const base = { polKey: record.key, keyId: record.keyId };

    const claim = await options.ledger.claim({
      key: record.key,
      runId: context.runId,
      payloadHash: record.payloadHash
    });
    if (claim.outcome === "already_submitted") {
      transitions.push("duplicate");
      if (claim.entry.payloadHash !== record.payloadHash) {
        log.warn(
          { previousHash: claim.entry.payloadHash, payloadHash: record.payloadHash, remotePoLineId: claim.entry.remotePoLineId },
          "Order line changed since it was submitted; the existing POL was left as is"
        );
      }
      log.info({ remotePoLineId: claim.entry.remotePoLineId }, "POL already submitted; skipping");
      return { ...base, status: "duplicate", remotePoLineId: claim.entry.remotePoLineId, attempts: 0, transitions };
    }
    if (claim.outcome === "in_progress") {
      transitions.push("failed");
      return {
        ...base,
        status: "failed",
        attempts: 0,
        transitions,
        errorDetail: {
          name: "SubmissionInProgress",
          message: `Claimed by run ${claim.entry.runId} at ${claim.entry.claimedAt.toISOString()} without a recorded outcome; check the acquisitions system before resubmitting`
        }
      };
    }

    transitions.push("submitting");
    let attempts = 0;
    let remotePoLineId: string | null;
    try {
      remotePoLineId = await send(record, log, () => {
        attempts += 1;
      });
    } catch (error) {
      await options.ledger.release(record.key);
      if (error instanceof AuthenticationError) {
        throw error;
      }
      transitions.push("failed");
      log.warn({ attempts, error: describeError(error) }, "POL submission failed");
      return { ...base, status: "failed", attempts, transitions, errorDetail: describeError(error) };
    }

    if (!remotePoLineId) {
      log.warn("Acquisitions API accepted the POL without returning its id");
    }
    try {
      await options.ledger.markSubmitted(record.key, remotePoLineId);
    } catch (error) {
      // The POL exists remotely; the claim stays in "submitting" so a re-run
      // flags it for a manual check instead of creating it again.
      transitions.push("failed");
      log.error({ remotePoLineId, error: describeError(error) }, "POL created but ledger update failed");
      return {
        ...base,
        status: "failed",
        remotePoLineId,
        attempts,
        transitions,
        errorDetail: {
          name: "LedgerWriteFailed",
          message: `POL created as ${remotePoLineId ?? "unknown id"} but the submission ledger could not be updated`,
          detail: describeError(error)
        }
      };
    }

    transitions.push("submitted");
    log.info({ remotePoLineId, attempts }, "POL submitted");
    return { ...base, status: "submitted", remotePoLineId, attempts, transitions };
  };

  const verifyCredentials = async (): Promise<void> => {
    await options.tokens.getToken();
  };

  return { submit, verifyCredentials };
}
