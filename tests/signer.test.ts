import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createHmac } from "node:crypto";
import { RequestSigner } from "../src/signer.js";

describe("RequestSigner", () => {
  const signer = new RequestSigner("test-key", "test-secret");

  it("builds the query string in insertion order and skips empty values", () => {
    const query = signer.buildQueryString({
      symbol: "BTCUSDT",
      side: "BUY",
      price: undefined,
      reduceOnly: null,
      quantity: 0.001
    });

    assert.equal(query, "symbol=BTCUSDT&side=BUY&quantity=0.001");
  });

  it("encodes reserved characters", () => {
    assert.equal(signer.buildQueryString({ note: "a b&c" }), "note=a%20b%26c");
  });

  it("appends timestamp, recvWindow and the HMAC-SHA256 signature", () => {
    const query = signer.buildSignedQuery({ symbol: "BTCUSDT", side: "BUY" }, 1700000000000, 5000);

    const unsigned = "symbol=BTCUSDT&side=BUY&timestamp=1700000000000&recvWindow=5000";
    const expected = createHmac("sha256", "test-secret").update(unsigned).digest("hex");

    assert.equal(query, `${unsigned}&signature=${expected}`);
    assert.match(expected, /^[0-9a-f]{64}$/);
  });

  it("sends the API key header", () => {
    assert.equal(signer.getHeaders()["X-MBX-APIKEY"], "test-key");
    assert.equal(signer.apiKey, "test-key");
  });
});
