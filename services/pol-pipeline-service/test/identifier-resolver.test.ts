import { describe, expect, test } from "vitest";
import { CatalogLookupError } from "../src/catalog/catalog-client";
import { createIdentifierResolver, rankCandidates } from "../src/catalog/identifier-resolver";
import type { RateLimiter } from "../src/lib/rate-limiter";
import { makeLine, noSleep, recordingSleep, ScriptedCatalogClient } from "./fakes";

describe("rankCandidates", () => {
  test("weights the service score by title similarity", () => {
    const ranked = rankCandidates("Dune", [
      { identifier: "ocm-messiah", title: "Dune Messiah", score: 0.99 },
      { identifier: "ocm-dune", title: "Dune", score: 0.95 }
    ]);
    expect(ranked.map((candidate) => [candidate.identifier, candidate.confidence])).toEqual([
      ["ocm-dune", 0.95],
      ["ocm-messiah", 0.33]
    ]);
  });

  test("breaks confidence ties by score, then by service order", () => {
    const ranked = rankCandidates("Dune", [
      { identifier: "first", title: "Dune", score: 0.9 },
      { identifier: "second", title: "Dune", score: 0.9 },
      { identifier: "third", title: "Dune", score: 0.9 }
    ]);
    expect(ranked.map((candidate) => candidate.identifier)).toEqual(["first", "second", "third"]);
  });
});

describe("identifier resolver", () => {
  test("accepts a match above the threshold", async () => {
    const client = new ScriptedCatalogClient(() => [{ identifier: "ocm-dune", title: "Dune", score: 0.95 }]);
    const resolver = createIdentifierResolver({ client, sleep: noSleep });

    const resolved = await resolver.resolve(makeLine());
    expect(resolved).toEqual({
      sourceOrderLineRef: "INV-1#1",
      catalogId: "ocm-dune",
      confidence: 0.95,
      matchMethod: "title_author_match",
      matchedTitle: "Dune"
    });
    expect(client.queries).toEqual([{ title: "Dune", author: "Frank Herbert" }]);
  });

  test("falls back to a title-only search when the author search is empty", async () => {
    const client = new ScriptedCatalogClient((query) =>
      query.author ? [] : [{ identifier: "ocm-dune", title: "Dune", score: 0.9 }]
    );
    const resolver = createIdentifierResolver({ client, sleep: noSleep });

    const resolved = await resolver.resolve(makeLine());
    expect(resolved.catalogId).toBe("ocm-dune");
    expect(resolved.matchMethod).toBe("title_match");
    expect(client.queries).toEqual([{ title: "Dune", author: "Frank Herbert" }, { title: "Dune" }]);
  });

  test("a confidence equal to the threshold stays unresolved", async () => {
    const client = new ScriptedCatalogClient(() => [{ identifier: "ocm-dune", title: "Dune", score: 0.8 }]);
    const resolver = createIdentifierResolver({ client, sleep: noSleep });

    const resolved = await resolver.resolve(makeLine({ author: undefined }));
    expect(resolved).toEqual({
      sourceOrderLineRef: "INV-1#1",
      catalogId: null,
      confidence: 0.8,
      matchMethod: "below_threshold",
      matchedTitle: "Dune"
    });
  });

  test("no candidates leaves the line unresolved", async () => {
    const resolver = createIdentifierResolver({ client: new ScriptedCatalogClient(() => []), sleep: noSleep });
    const resolved = await resolver.resolve(makeLine({ author: undefined }));
    expect(resolved).toEqual({
      sourceOrderLineRef: "INV-1#1",
      catalogId: null,
      confidence: 0,
      matchMethod: "no_candidates"
    });
  });

  test("a catalog id on the order skips the search", async () => {
    const client = new ScriptedCatalogClient(() => []);
    const resolver = createIdentifierResolver({ client, sleep: noSleep });

    const resolved = await resolver.resolve(makeLine({ details: { catalogId: "ocm00012345" } }));
    expect(resolved).toEqual({
      sourceOrderLineRef: "INV-1#1",
      catalogId: "ocm00012345",
      confidence: 1,
      matchMethod: "supplied"
    });
    expect(client.queries).toHaveLength(0);
  });

  test("retries retryable lookup errors with backoff", async () => {
    let calls = 0;
    const client = new ScriptedCatalogClient(() => {
      calls += 1;
      return calls < 3
        ? new CatalogLookupError("Catalog search returned HTTP 503", true, 503)
        : [{ identifier: "ocm-dune", title: "Dune", score: 0.95 }];
    });
    const { sleep, delays } = recordingSleep();
    const resolver = createIdentifierResolver({
      client,
      sleep,
      backoff: { maxAttempts: 3, baseDelayMs: 100, jitter: 0 }
    });

    const resolved = await resolver.resolve(makeLine({ author: undefined }));
    expect(resolved.catalogId).toBe("ocm-dune");
    expect(delays).toEqual([100, 200]);
  });

  test("a non-retryable lookup error fails the lookup after one call", async () => {
    const client = new ScriptedCatalogClient(
      () => new CatalogLookupError("Catalog search returned HTTP 400", false, 400)
    );
    const resolver = createIdentifierResolver({ client, sleep: noSleep });

    const resolved = await resolver.resolve(makeLine({ author: undefined }));
    expect(client.queries).toHaveLength(1);
    expect(resolved.catalogId).toBeNull();
    expect(resolved.matchMethod).toBe("lookup_failed");
    expect(resolved.failure?.name).toBe("ResolutionFailure");
    expect(resolved.failure?.message).toBe("Catalog lookup failed after 1 attempt(s)");
  });

  test("gives up after the attempt cap", async () => {
    const client = new ScriptedCatalogClient(() => new Error("socket hang up"));
    const resolver = createIdentifierResolver({ client, sleep: noSleep, backoff: { maxAttempts: 3 } });

    const resolved = await resolver.resolve(makeLine({ author: undefined }));
    expect(client.queries).toHaveLength(3);
    expect(resolved.matchMethod).toBe("lookup_failed");
    expect(resolved.failure?.message).toBe("Catalog lookup failed after 3 attempt(s)");
  });

  test("every search goes through the shared rate limiter", async () => {
    const keys: string[] = [];
    const rateLimiter: RateLimiter = {
      isLimited: () => false,
      acquire: async (key) => {
        keys.push(key);
      }
    };
    const client = new ScriptedCatalogClient(() => []);
    const resolver = createIdentifierResolver({ client, sleep: noSleep, rateLimiter });

    await resolver.resolve(makeLine());
    expect(keys).toEqual(["catalog", "catalog"]);
  });
});
