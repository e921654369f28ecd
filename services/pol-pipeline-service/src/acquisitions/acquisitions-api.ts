import { z } from "zod";
import { fetchWithTimeout } from "../lib/retry";
import type { PolPayload } from "../templates/template-merger";

export type AcquisitionsResponse = {
  status: number;
  body: unknown;
};

/**
 * Create-POL endpoint of the acquisitions system. Resolves with the HTTP
 * status and parsed body; rejects only on transport failure or timeout.
 */
export interface AcquisitionsApi {
  createPoLine(payload: PolPayload, token: string): Promise<AcquisitionsResponse>;
}

const createdPoLineSchema = z.union([
  z.object({ po_line_id: z.union([z.string().min(1), z.number()]).transform(String) }),
  z.object({ number: z.string().min(1) }).transform((body) => ({ po_line_id: body.number }))
]);

export function extractPoLineId(body: unknown): string | null {
  const parsed = createdPoLineSchema.safeParse(body);
  return parsed.success ? parsed.data.po_line_id : null;
}

export type HttpAcquisitionsOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
};

export class AlmaAcquisitionsApi implements AcquisitionsApi {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpAcquisitionsOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createPoLine(payload: PolPayload, token: string): Promise<AcquisitionsResponse> {
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}/acq/po-lines`;
    const response = await fetchWithTimeout(
      this.fetchImpl,
      url,
      {
        method: "POST",
        headers: {
          accept: "application/json",
          "content-type": "application/json",
          authorization: `Bearer ${token}`
        },
        body: JSON.stringify(payload)
      },
      this.options.timeoutMs
    );
    const text = await response.text();
    return { status: response.status, body: parseBody(text) };
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}
