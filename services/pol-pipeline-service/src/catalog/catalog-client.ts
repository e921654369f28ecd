import { z } from "zod";
import { fetchWithTimeout, isRetryableStatus } from "../lib/retry";

export type CatalogQuery = {
  title: string;
  author?: string;
};

export type CatalogCandidate = {
  identifier: string;
  title: string;
  score: number;
};

export interface CatalogSearchClient {
  search(query: CatalogQuery): Promise<CatalogCandidate[]>;
}

export class CatalogLookupError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number
  ) {
    super(message);
    this.name = "CatalogLookupError";
  }
}

const catalogSearchResponseSchema = z.object({
  candidates: z.array(
    z.object({
      identifier: z.union([z.string().min(1), z.number()]).transform(String),
      title: z.string(),
      score: z.number().min(0).max(1)
    })
  )
});

export type HttpCatalogSearchOptions = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

/**
 * Client for the bibliographic search service:
 * `GET {baseUrl}/search?title=&author=` → `{ candidates: [{ identifier, title, score }] }`
 */
export class HttpCatalogSearchClient implements CatalogSearchClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpCatalogSearchOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: CatalogQuery): Promise<CatalogCandidate[]> {
    const url = new URL("search", this.options.baseUrl.endsWith("/") ? this.options.baseUrl : `${this.options.baseUrl}/`);
    url.searchParams.set("title", query.title);
    if (query.author) {
      url.searchParams.set("author", query.author);
    }

    const headers: Record<string, string> = { accept: "application/json" };
    if (this.options.apiKey) {
      headers["x-api-key"] = this.options.apiKey;
    }

    let response: Response;
    try {
      response = await fetchWithTimeout(this.fetchImpl, url.toString(), { headers }, this.options.timeoutMs);
    } catch (error) {
      throw new CatalogLookupError(`Catalog search unreachable: ${error instanceof Error ? error.message : String(error)}`, true);
    }

    if (!response.ok) {
      throw new CatalogLookupError(
        `Catalog search returned HTTP ${response.status}`,
        isRetryableStatus(response.status),
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new CatalogLookupError("Catalog search returned a non-JSON body", false, response.status);
    }
    const parsed = catalogSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CatalogLookupError("Catalog search response did not match the expected shape", false, response.status);
    }
    return parsed.data.candidates;
  }
}
