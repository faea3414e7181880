import { createHmac } from "node:crypto";

export type QueryValue = string | number | boolean | undefined | null;

/**
 * HMAC-SHA256 request signing for the futures REST API. Signed requests
 * carry `timestamp`, `recvWindow` and `signature` in the query string plus
 * the API key in the `X-MBX-APIKEY` header.
 */
export class RequestSigner {
  readonly #apiKey: string;
  readonly #apiSecret: string;

  constructor(apiKey: string, apiSecret: string) {
    this.#apiKey = apiKey;
    this.#apiSecret = apiSecret;
  }

  get apiKey(): string {
    return this.#apiKey;
  }

  /** Skips undefined and null values; keeps insertion order. */
  buildQueryString(params: Record<string, QueryValue>): string {
    const entries: string[] = [];

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        entries.push(`${key}=${encodeURIComponent(String(value))}`);
      }
    }

    return entries.join("&");
  }

  signString(data: string): string {
    return createHmac("sha256", this.#apiSecret).update(data).digest("hex");
  }

  buildSignedQuery(
    params: Record<string, QueryValue>,
    timestamp: number,
    recvWindow: number
  ): string {
    const queryString = this.buildQueryString({ ...params, timestamp, recvWindow });
    return `${queryString}&signature=${this.signString(queryString)}`;
  }

  getHeaders(): Record<string, string> {
    return {
      "X-MBX-APIKEY": this.#apiKey,
      "Content-Type": "application/x-www-form-urlencoded"
    };
  }
}
