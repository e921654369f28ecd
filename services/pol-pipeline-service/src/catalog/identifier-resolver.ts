import type { Logger } from "pino";
import { describeError, ResolutionFailure } from "../errors";
import { logger as rootLogger } from "../logger";
import type { RateLimiter } from "../lib/rate-limiter";
import { unlimited } from "../lib/rate-limiter";
import type { BackoffConfig, Sleep } from "../lib/retry";
import { computeBackoff, DEFAULT_BACKOFF, sleep as defaultSleep } from "../lib/retry";
import { titleSimilarity } from "../lib/similarity";
import type { OrderLine } from "../orders/order-types";
import { orderLineRef } from "../orders/order-types";
import type { CatalogCandidate, CatalogQuery, CatalogSearchClient } from "./catalog-client";
import { CatalogLookupError } from "./catalog-client";

export const DEFAULT_MATCH_THRESHOLD = 0.8;

export type MatchMethod =
  | "supplied"
  | "title_match"
  | "title_author_match"
  | "below_threshold"
  | "no_candidates"
  | "lookup_failed";

export type ResolvedIdentifier = {
  sourceOrderLineRef: string;
  catalogId: string | null;
  confidence: number;
  matchMethod: MatchMethod;
  matchedTitle?: string;
  failure?: { name: string; message: string; detail?: unknown };
};

export type RankedCandidate = CatalogCandidate & {
  similarity: number;
  confidence: number;
  position: number;
};

export type IdentifierResolver = {
  resolve: (line: Pick<OrderLine, "title" | "author" | "vendorOrderRef" | "lineIndex" | "details">) => Promise<ResolvedIdentifier>;
};

export type IdentifierResolverOptions = {
  client: CatalogSearchClient;
  threshold?: number;
  backoff?: Partial<BackoffConfig>;
  rateLimiter?: RateLimiter;
  sleep?: Sleep;
  logger?: Logger;
};

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Orders candidates by confidence (service score × title similarity), then by
 * service score, then by the order the service returned them in.
 */
export function rankCandidates(title: string, candidates: CatalogCandidate[]): RankedCandidate[] {
  return candidates
    .map((candidate, position) => {
      const similarity = round(titleSimilarity(title, candidate.title));
      return { ...candidate, similarity, confidence: round(candidate.score * similarity), position };
    })
    .sort((a, b) => b.confidence - a.confidence || b.score - a.score || a.position - b.position);
}

export function createIdentifierResolver(options: IdentifierResolverOptions): IdentifierResolver {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const backoff: BackoffConfig = { ...DEFAULT_BACKOFF, ...options.backoff };
  const limiter = options.rateLimiter ?? unlimited;
  const wait = options.sleep ?? defaultSleep;
  const log = options.logger ?? rootLogger;

  const searchWithRetry = async (query: CatalogQuery): Promise<CatalogCandidate[]> => {
    let lastError: unknown;
    let attempt = 0;
    while (attempt < backoff.maxAttempts) {
      attempt += 1;
      await limiter.acquire("catalog");
      try {
        return await options.client.search(query);
      } catch (error) {
        lastError = error;
        const retryable = !(error instanceof CatalogLookupError) || error.retryable;
        if (!retryable || attempt >= backoff.maxAttempts) {
          break;
        }
        const delay = computeBackoff(attempt, backoff);
        log.debug({ attempt, delay, title: query.title }, "Catalog lookup failed; retrying");
        await wait(delay);
      }
    }
    throw new ResolutionFailure(`Catalog lookup failed after ${attempt} attempt(s)`, describeError(lastError));
  };

  const resolve: IdentifierResolver["resolve"] = async (line) => {
    const sourceOrderLineRef = orderLineRef(line);

    if (line.details.catalogId) {
      return { sourceOrderLineRef, catalogId: line.details.catalogId, confidence: 1, matchMethod: "supplied" };
    }

    let candidates: CatalogCandidate[];
    let authorQualified = false;
    try {
      if (line.author) {
        candidates = await searchWithRetry({ title: line.title, author: line.author });
        authorQualified = candidates.length > 0;
        if (!authorQualified) {
          candidates = await searchWithRetry({ title: line.title });
        }
      } else {
        candidates = await searchWithRetry({ title: line.title });
      }
    } catch (error) {
      log.warn({ sourceOrderLineRef, error: describeError(error) }, "Catalog lookup failed; line needs manual review");
      return {
        sourceOrderLineRef,
        catalogId: null,
        confidence: 0,
        matchMethod: "lookup_failed",
        failure: describeError(error)
      };
    }

    const ranked = rankCandidates(line.title, candidates);
    const best = ranked[0];
    if (!best) {
      return { sourceOrderLineRef, catalogId: null, confidence: 0, matchMethod: "no_candidates" };
    }
    if (best.confidence <= threshold) {
      return {
        sourceOrderLineRef,
        catalogId: null,
        confidence: best.confidence,
        matchMethod: "below_threshold",
        matchedTitle: best.title
      };
    }
    return {
      sourceOrderLineRef,
      catalogId: best.identifier,
      confidence: best.confidence,
      matchMethod: authorQualified ? "title_author_match" : "title_match",
      matchedTitle: best.title
    };
  };

  return { resolve };
}
