import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { ZodError } from "zod";
import { placeOrderCommand } from "./commands/place-order.js";
import type { PlaceOrderDependencies, PlaceOrderResult } from "./commands/place-order.js";
import { API_KEY_ENV, API_SECRET_ENV, resolveConfig } from "./config.js";
import { ExitCode } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Config, GatewayFactory, PlaceOrderFlags } from "./types.js";
import { ORDER_SIDES, ORDER_TYPES, TIME_IN_FORCE } from "./types.js";
import { formatOutcome } from "./utils/formatting.js";

export const VERSION = "0.1.0";

const EXAMPLES = `
Examples:
  $ testnet-order --symbol BTCUSDT --side BUY --type MARKET --quantity 0.001
  $ testnet-order --symbol ETHUSDT --side SELL --type LIMIT --quantity 0.01 --price 2000
`;

export interface CliDependencies extends PlaceOrderDependencies {
  writeOutput: (text: string) => void;
  writeError: (text: string) => void;
}

export interface MainDependencies {
  env: NodeJS.ProcessEnv;
  createLogger: (config: Config) => Logger;
  createGateway: GatewayFactory;
  writeOutput: (text: string) => void;
  writeError: (text: string) => void;
}

// plain decimal notation only: no hex, binary or octal literals
const DECIMAL_PATTERN = /^\s*[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?\s*$/i;

export function parsePositiveNumber(value: string): number {
  if (!DECIMAL_PATTERN.test(value)) {
    throw new InvalidArgumentError("Not a number.");
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Value must be a positive finite number.");
  }
  return parsed;
}

export function exitCodeFor(result: PlaceOrderResult): ExitCode {
  switch (result.status) {
    case "success":
      return ExitCode.Success;
    case "configuration-error":
    case "validation-error":
    case "submission-error":
      return result.error.exitCode;
  }
}

export function createProgram(
  deps: CliDependencies,
  onResult: (result: PlaceOrderResult) => void
): Command {
  const program = new Command();

  program
    .name("testnet-order")
    .description("Place a single MARKET or LIMIT order on the USDT-M futures testnet")
    .version(VERSION)
    .option("--api-key <key>", `API key (falls back to ${API_KEY_ENV})`)
    .option("--api-secret <secret>", `API secret (falls back to ${API_SECRET_ENV})`)
    .requiredOption("--symbol <symbol>", "Trading pair symbol, e.g. BTCUSDT")
    .addOption(new Option("--side <side>", "Order side").choices(ORDER_SIDES).makeOptionMandatory())
    .addOption(new Option("--type <type>", "Order type").choices(ORDER_TYPES).makeOptionMandatory())
    .addOption(
      new Option("--quantity <quantity>", "Order quantity")
        .argParser(parsePositiveNumber)
        .makeOptionMandatory()
    )
    .addOption(
      new Option("--price <price>", "Limit price (required for LIMIT)").argParser(parsePositiveNumber)
    )
    .addOption(
      new Option("--tif <tif>", "Time in force (LIMIT orders)").choices(TIME_IN_FORCE).default("GTC")
    )
    .addHelpText("after", EXAMPLES)
    .exitOverride()
    .configureOutput({
      writeOut: deps.writeOutput,
      writeErr: deps.writeError
    })
    .action(async () => {
      onResult(await placeOrderCommand(program.opts<PlaceOrderFlags>(), deps));
    });

  return program;
}

/**
 * Parses `argv` (user arguments only), places the order and returns the exit
 * code. The order response is the only thing written to `writeOutput`.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<ExitCode> {
  const state: { result?: PlaceOrderResult } = {};
  const program = createProgram(deps, (result) => {
    state.result = result;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version surface as exit code 0
      return error.exitCode === 0 ? ExitCode.Success : ExitCode.ValidationError;
    }
    throw error;
  }

  const { result } = state;
  if (!result) {
    return ExitCode.Success;
  }

  if (result.status === "success") {
    deps.writeOutput(formatOutcome(result.outcome));
  }

  return exitCodeFor(result);
}

export function loadConfig(env: NodeJS.ProcessEnv, writeError: (text: string) => void): Config | null {
  try {
    return resolveConfig({}, env);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      writeError(`Invalid configuration: ${issues.join("; ")}\n`);
      return null;
    }
    throw error;
  }
}

/** Resolves configuration, then the logger, then runs the CLI. */
export async function main(argv: readonly string[], deps: MainDependencies): Promise<ExitCode> {
  const config = loadConfig(deps.env, deps.writeError);
  if (!config) {
    return ExitCode.ConfigurationError;
  }

  return runCli(argv, {
    config,
    env: deps.env,
    logger: deps.createLogger(config),
    createGateway: deps.createGateway,
    writeOutput: deps.writeOutput,
    writeError: deps.writeError
  });
}
