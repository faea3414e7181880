import { z } from "zod";
import { FuturesApiError } from "./errors.js";
import { RequestSigner } from "./signer.js";
import type {
  Config,
  Credentials,
  NormalizedOrderRequest,
  OrderGateway,
  OrderOutcome
} from "./types.js";
import { OrderOutcomeSchema } from "./types.js";

export const ORDER_ENDPOINT = "/fapi/v1/order";

const ErrorBodySchema = z.object({
  code: z.number(),
  msg: z.string()
});

export interface FuturesClientOptions {
  baseUrl: string;
  recvWindow: number;
  requestTimeoutMs: number;
  now?: () => number;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Order placement against the USDT-margined futures REST API. One call per
 * `createOrder`; nothing here retries.
 */
export class FuturesClient implements OrderGateway {
  readonly #signer: RequestSigner;
  readonly #baseUrl: string;
  readonly #recvWindow: number;
  readonly #requestTimeoutMs: number;
  readonly #now: () => number;

  constructor(credentials: Credentials, options: FuturesClientOptions) {
    this.#signer = new RequestSigner(credentials.apiKey, credentials.apiSecret);
    this.#baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.#recvWindow = options.recvWindow;
    this.#requestTimeoutMs = options.requestTimeoutMs;
    this.#now = options.now ?? Date.now;
  }

  get baseUrl(): string {
    return this.#baseUrl;
  }

  async createOrder(request: NormalizedOrderRequest): Promise<OrderOutcome> {
    const query = this.#signer.buildSignedQuery({ ...request }, this.#now(), this.#recvWindow);

    const response = await fetch(`${this.#baseUrl}${ORDER_ENDPOINT}?${query}`, {
      method: "POST",
      headers: this.#signer.getHeaders(),
      signal: AbortSignal.timeout(this.#requestTimeoutMs)
    });

    return this.handleResponse(response);
  }

  private async handleResponse(response: Response): Promise<OrderOutcome> {
    const body = parseJson(await response.text());

    if (!response.ok) {
      const errorBody = ErrorBodySchema.safeParse(body);
      throw new FuturesApiError(
        errorBody.success
          ? { code: errorBody.data.code, message: errorBody.data.msg, status: response.status }
          : { message: `HTTP ${response.status}`, status: response.status }
      );
    }

    const outcome = OrderOutcomeSchema.safeParse(body);
    if (!outcome.success) {
      throw new FuturesApiError({
        message: "Unexpected order response shape",
        status: response.status
      });
    }

    return outcome.data;
  }
}

export function createFuturesClient(credentials: Credentials, config: Config): FuturesClient {
  return new FuturesClient(credentials, {
    baseUrl: config.baseUrl,
    recvWindow: config.recvWindow,
    requestTimeoutMs: config.requestTimeoutMs
  });
}
