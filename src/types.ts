import { z } from "zod";

export const ORDER_SIDES = ["BUY", "SELL"] as const;
export const ORDER_TYPES = ["MARKET", "LIMIT"] as const;
export const TIME_IN_FORCE = ["GTC", "IOC", "FOK"] as const;

export type OrderSide = (typeof ORDER_SIDES)[number];
export type OrderType = (typeof ORDER_TYPES)[number];
export type TimeInForce = (typeof TIME_IN_FORCE)[number];

export const TESTNET_BASE_URL = "https://testnet.binancefuture.com";

export const ConfigSchema = z.object({
  baseUrl: z.string().url().default(TESTNET_BASE_URL),
  recvWindow: z.number().int().positive().max(60000).default(5000),
  requestTimeoutMs: z.number().int().positive().default(10000),
  logFile: z.string().min(1).default("bot.log"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type Config = z.infer<typeof ConfigSchema>;

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Order as typed on the command line. Enum fields stay plain strings here;
 * the builder checks them.
 */
export interface OrderIntent {
  symbol: string;
  side: string;
  orderType: string;
  quantity: number;
  price?: number;
  timeInForce?: string;
}

export interface MarketOrderRequest {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: "MARKET";
  readonly quantity: number;
}

export interface LimitOrderRequest {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: "LIMIT";
  readonly quantity: number;
  readonly price: number;
  readonly timeInForce: TimeInForce;
}

export type NormalizedOrderRequest = MarketOrderRequest | LimitOrderRequest;

export const OrderOutcomeSchema = z.record(z.unknown());

/** Exchange reply, passed through untouched. */
export type OrderOutcome = z.infer<typeof OrderOutcomeSchema>;

export interface OrderGateway {
  createOrder(request: NormalizedOrderRequest): Promise<OrderOutcome>;
}

export type GatewayFactory = (credentials: Credentials, config: Config) => OrderGateway;

export type PlaceOrderFlags = {
  apiKey?: string;
  apiSecret?: string;
  symbol: string;
  side: string;
  type: string;
  quantity: number;
  price?: number;
  tif: string;
};
