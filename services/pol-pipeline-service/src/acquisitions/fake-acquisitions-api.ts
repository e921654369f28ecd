import type { PolPayload } from "../templates/template-merger";
import type { AcquisitionsApi, AcquisitionsResponse } from "./acquisitions-api";

/**
 * Accepts every POL; used for dry runs (ACQ_MODE=fake) and tests.
 */
export class FakeAcquisitionsApi implements AcquisitionsApi {
  private counter = 0;

  constructor(private readonly prefix: string = "POL-FAKE") {}

  async createPoLine(_payload: PolPayload, _token: string): Promise<AcquisitionsResponse> {
    this.counter += 1;
    return {
      status: 201,
      body: { po_line_id: `${this.prefix}-${String(this.counter).padStart(5, "0")}` }
    };
  }
}
