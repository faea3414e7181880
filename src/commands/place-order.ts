import { maskApiKey, resolveCredentials } from "../config.js";
import { ConfigurationError, SubmissionError, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { buildOrderRequest } from "../order-builder.js";
import { OrderSubmitter } from "../order-submitter.js";
import type { Config, GatewayFactory, OrderOutcome, PlaceOrderFlags } from "../types.js";

export type PlaceOrderResult =
  | { status: "success"; outcome: OrderOutcome }
  | { status: "configuration-error"; error: ConfigurationError }
  | { status: "validation-error"; error: ValidationError }
  | { status: "submission-error"; error: SubmissionError };

export interface PlaceOrderDependencies {
  config: Config;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  createGateway: GatewayFactory;
}

export const MISSING_CREDENTIALS_MESSAGE =
  "API credentials must be provided via flags or environment variables.";

export async function placeOrderCommand(
  flags: PlaceOrderFlags,
  deps: PlaceOrderDependencies
): Promise<PlaceOrderResult> {
  const { config, env, logger } = deps;

  const credentials = resolveCredentials(flags, env);
  if (!credentials) {
    logger.error(MISSING_CREDENTIALS_MESSAGE);
    return { status: "configuration-error", error: new ConfigurationError(MISSING_CREDENTIALS_MESSAGE) };
  }

  const built = buildOrderRequest({
    symbol: flags.symbol,
    side: flags.side,
    orderType: flags.type,
    quantity: flags.quantity,
    price: flags.price,
    timeInForce: flags.tif
  });
  if (!built.ok) {
    logger.error(built.error.message);
    return { status: "validation-error", error: built.error };
  }

  const gateway = deps.createGateway(credentials, config);
  logger.info(`Client initialized for futures testnet @ ${config.baseUrl}`, {
    apiKey: maskApiKey(credentials.apiKey)
  });

  const submitter = new OrderSubmitter(gateway, logger);
  const submitted = await submitter.submit(built.request);
  if (!submitted.ok) {
    return { status: "submission-error", error: submitted.error };
  }

  logger.info(`Order successfully executed. ID: ${String(submitted.outcome.orderId)}`);
  return { status: "success", outcome: submitted.outcome };
}
