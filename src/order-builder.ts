import { ValidationError } from "./errors.js";
import type {
  NormalizedOrderRequest,
  OrderIntent,
  OrderSide,
  OrderType,
  TimeInForce
} from "./types.js";
import { ORDER_SIDES, ORDER_TYPES, TIME_IN_FORCE } from "./types.js";

export type BuildResult =
  | { ok: true; request: NormalizedOrderRequest }
  | { ok: false; error: ValidationError };

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  const allowed: readonly string[] = values;
  return allowed.includes(value);
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

function fail(message: string): BuildResult {
  return { ok: false, error: new ValidationError(message) };
}

/**
 * Turns a raw order intent into the exact field set the order endpoint takes.
 *
 * MARKET orders drop any price or time in force that came along with them.
 */
export function buildOrderRequest(intent: OrderIntent): BuildResult {
  const orderType = intent.orderType.toUpperCase();
  if (!isOneOf<OrderType>(ORDER_TYPES, orderType)) {
    return fail(`Unsupported order type: ${intent.orderType}`);
  }

  if (orderType === "LIMIT" && intent.price === undefined) {
    return fail("Limit orders require price");
  }

  const side = intent.side.toUpperCase();
  if (!isOneOf<OrderSide>(ORDER_SIDES, side)) {
    return fail(`Unsupported order side: ${intent.side}`);
  }

  if (!isPositive(intent.quantity)) {
    return fail("Quantity must be a positive number");
  }

  const symbol = intent.symbol.toUpperCase();

  if (orderType === "MARKET") {
    return {
      ok: true,
      request: { symbol, side, type: "MARKET", quantity: intent.quantity }
    };
  }

  if (!isPositive(intent.price)) {
    return fail("Price must be a positive number");
  }

  const rawTif = intent.timeInForce ?? "GTC";
  const timeInForce = rawTif.toUpperCase();
  if (!isOneOf<TimeInForce>(TIME_IN_FORCE, timeInForce)) {
    return fail(`Unsupported time in force: ${rawTif}`);
  }

  return {
    ok: true,
    request: {
      symbol,
      side,
      type: "LIMIT",
      quantity: intent.quantity,
      price: intent.price,
      timeInForce
    }
  };
}
