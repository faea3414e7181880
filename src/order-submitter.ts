import { SubmissionError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { NormalizedOrderRequest, OrderGateway, OrderOutcome } from "./types.js";

export type SubmissionResult =
  | { ok: true; outcome: OrderOutcome }
  | { ok: false; error: SubmissionError };

export class OrderSubmitter {
  constructor(
    private readonly gateway: OrderGateway,
    private readonly logger: Logger
  ) {}

  /** Sends the request exactly once, failed or not. */
  async submit(request: NormalizedOrderRequest): Promise<SubmissionResult> {
    this.logger.info(`Placing order: ${JSON.stringify(request)}`);

    let outcome: OrderOutcome;
    try {
      outcome = await this.gateway.createOrder(request);
    } catch (error) {
      const submissionError = SubmissionError.from(error);
      this.logger.error(
        `Futures API error: ${submissionError.message}`,
        submissionError.code !== undefined ? { code: submissionError.code } : undefined
      );
      return { ok: false, error: submissionError };
    }

    this.logger.info(`Order params: ${JSON.stringify(request)}`);
    this.logger.info(`Order response: ${JSON.stringify(outcome)}`);
    return { ok: true, outcome };
  }
}
