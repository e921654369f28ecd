import type { Logger } from "pino";
import { z } from "zod";
import { AuthenticationError, describeError } from "../errors";
import { logger as rootLogger } from "../logger";
import type { BackoffConfig, Sleep } from "../lib/retry";
import { computeBackoff, DEFAULT_BACKOFF, fetchWithTimeout, isRetryableStatus, sleep as defaultSleep } from "../lib/retry";

export interface TokenProvider {
  getToken(): Promise<string>;
  invalidate(): void;
}

/**
 * A long-lived API key issued out of band.
 */
export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string | undefined) {}

  async getToken(): Promise<string> {
    if (!this.token) {
      throw new AuthenticationError("No acquisitions API key configured");
    }
    return this.token;
  }

  invalidate(): void {}
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600)
});

export type ClientCredentialsOptions = {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs: number;
  refreshSkewMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
  backoff?: Partial<BackoffConfig>;
  sleep?: Sleep;
  logger?: Logger;
};

type TokenAttempt = { ok: true; token: string; expiresIn: number } | { ok: false; failure: unknown };

/**
 * OAuth client-credentials grant. The token is cached until shortly before
 * it expires; concurrent callers share one in-flight refresh. Outages at the
 * token endpoint are retried with backoff; a refused grant is not.
 */
export class ClientCredentialsTokenProvider implements TokenProvider {
  private cached: { token: string; expiresAt: number } | null = null;
  private pending: Promise<string> | null = null;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly backoff: BackoffConfig;
  private readonly wait: Sleep;
  private readonly log: Logger;

  constructor(private readonly options: ClientCredentialsOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => Date.now());
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.wait = options.sleep ?? defaultSleep;
    this.log = options.logger ?? rootLogger;
  }

  async getToken(): Promise<string> {
    const skew = this.options.refreshSkewMs ?? 30_000;
    if (this.cached && this.now() < this.cached.expiresAt - skew) {
      return this.cached.token;
    }
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.cached = null;
  }

  private async requestToken(): Promise<string> {
    let failure: unknown;
    for (let attempt = 1; attempt <= this.backoff.maxAttempts; attempt += 1) {
      const result = await this.attempt();
      if (result.ok) {
        this.cached = { token: result.token, expiresAt: this.now() + result.expiresIn * 1000 };
        return result.token;
      }
      failure = result.failure;
      if (attempt < this.backoff.maxAttempts) {
        const delay = computeBackoff(attempt, this.backoff);
        this.log.warn({ attempt, delay, failure }, "Token request failed; retrying");
        await this.wait(delay);
      }
    }
    throw new AuthenticationError(
      `Token endpoint unavailable after ${this.backoff.maxAttempts} attempt(s)`,
      failure
    );
  }

  /**
   * One grant request. Refusals and unusable bodies throw; outages come back
   * as a failure to retry.
   */
  private async attempt(): Promise<TokenAttempt> {
    const credentials = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString("base64");
    let response: Response;
    try {
      response = await fetchWithTimeout(
        this.fetchImpl,
        this.options.tokenUrl,
        {
          method: "POST",
          headers: {
            authorization: `Basic ${credentials}`,
            "content-type": "application/x-www-form-urlencoded"
          },
          body: new URLSearchParams({ grant_type: "client_credentials" }).toString()
        },
        this.options.timeoutMs
      );
    } catch (error) {
      return { ok: false, failure: describeError(error) };
    }
    if (isRetryableStatus(response.status) || response.status >= 500) {
      return { ok: false, failure: { status: response.status } };
    }
    if (!response.ok) {
      throw new AuthenticationError(`Token endpoint returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(await response.text());
    } catch (error) {
      throw new AuthenticationError("Token endpoint returned a body that is not JSON", describeError(error));
    }
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError("Token endpoint returned an unexpected body");
    }
    return { ok: true, token: parsed.data.access_token, expiresIn: parsed.data.expires_in };
  }
}

export function createTokenProvider(options: {
  apiKey?: string;
  tokenUrl?: string;
  clientId?: string;
  clientSecret?: string;
  timeoutMs: number;
  logger?: Logger;
}): TokenProvider {
  if (options.tokenUrl && options.clientId && options.clientSecret) {
    return new ClientCredentialsTokenProvider({
      tokenUrl: options.tokenUrl,
      clientId: options.clientId,
      clientSecret: options.clientSecret,
      timeoutMs: options.timeoutMs,
      logger: options.logger
    });
  }
  return new StaticTokenProvider(options.apiKey);
}
