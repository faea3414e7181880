import type { Config, Credentials } from "./types.js";
import { ConfigSchema } from "./types.js";

export const API_KEY_ENV = "BINANCE_API_KEY";
export const API_SECRET_ENV = "BINANCE_API_SECRET";

const ENV_MAPPINGS: Record<string, keyof Config> = {
  TESTNET_ORDER_BASE_URL: "baseUrl",
  TESTNET_ORDER_RECV_WINDOW: "recvWindow",
  TESTNET_ORDER_TIMEOUT_MS: "requestTimeoutMs",
  TESTNET_ORDER_LOG_FILE: "logFile",
  TESTNET_ORDER_LOG_LEVEL: "logLevel"
};

const NUMERIC_KEYS: ReadonlySet<keyof Config> = new Set<keyof Config>(["recvWindow", "requestTimeoutMs"]);

function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value === undefined || value === "") {
      continue;
    }

    if (NUMERIC_KEYS.has(configKey)) {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        config[configKey] = parsed;
      }
    } else {
      config[configKey] = value;
    }
  }

  return config;
}

/**
 * Precedence: overrides > environment > defaults. Throws a ZodError when a
 * supplied value does not fit the schema.
 */
export function resolveConfig(
  overrides: Partial<Config> = {},
  env: NodeJS.ProcessEnv = process.env
): Config {
  const merged: Record<string, unknown> = loadEnvConfig(env);

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  return ConfigSchema.parse(merged);
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value !== "");
}

export function resolveCredentials(
  flags: { apiKey?: string; apiSecret?: string },
  env: NodeJS.ProcessEnv = process.env
): Credentials | null {
  const apiKey = firstNonEmpty(flags.apiKey, env[API_KEY_ENV]);
  const apiSecret = firstNonEmpty(flags.apiSecret, env[API_SECRET_ENV]);

  if (!apiKey || !apiSecret) {
    return null;
  }

  return { apiKey, apiSecret };
}

export function maskApiKey(apiKey: string): string {
  return apiKey.length > 8 ? `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}` : "****";
}
