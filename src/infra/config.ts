import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseLedgerSeedEnv(name: string): LedgerSeedEntry[] | undefined {
  const items = parseStringListEnv(name, 3, 1000);
  if (items === undefined) {
    return undefined;
  }

  return items.map((item) => {
    const separator = item.lastIndexOf("=");
    const account = item.slice(0, separator).trim();
    const amountText = item.slice(separator + 1).trim();
    const amount = Number(amountText);
    if (separator <= 0 || account.length === 0 || amountText.length === 0 || !Number.isSafeInteger(amount) || amount < 0) {
      throw invalidConfig(name, "items must look like account=amount with a non-negative integer amount");
    }
    return { account, amount };
  });
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/** Opening balance of an account in the in-memory value ledger. */
export interface LedgerSeedEntry {
  account: string;
  amount: number;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  listDefaultLimit: number;
  listMaxLimit: number;
  eventApiVersion: string;
  eventSource: string;
  eventSchemaVersion: string;
  processorAccount: string;
  cashbackRate: number;
  cashbackEnabled: boolean;
  revocationLimit: number;
  metricsEnabled: boolean;
  rateLimitEnabled: boolean;
  rateLimitWindowSeconds: number;
  rateLimitMaxRequests: number;
  logLevel?: (typeof LOG_LEVELS)[number];
  storeBackend?: "memory" | "postgres";
  rateLimitBackend?: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  redisRateLimitPrefix?: string;
  ledgerSeed?: LedgerSeedEntry[];
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("CSL_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("CSL_API_KEY", "dev_csl_key", 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const listDefaultLimit = parseIntegerEnv("CSL_LIST_DEFAULT_LIMIT", 50, 1, 1000);
  const listMaxLimit = parseIntegerEnv("CSL_LIST_MAX_LIMIT", 500, 1, 5000);
  const eventApiVersion = parseStringEnv("CSL_EVENT_API_VERSION", "2026-10-01", 3);
  const eventSource = parseStringEnv("CSL_EVENT_SOURCE", "card-settlement-ledger", 3);
  const eventSchemaVersion = parseStringEnv("CSL_EVENT_SCHEMA_VERSION", "1.0.0", 3);
  const processorAccount = parseStringEnv("CSL_PROCESSOR_ACCOUNT", "settlement-processor", 3);
  const cashbackRate = parseIntegerEnv("CSL_CASHBACK_RATE", 100, 0, 250);
  const cashbackEnabled = parseBooleanEnv("CSL_CASHBACK_ENABLED", false);
  const revocationLimit = parseIntegerEnv("CSL_REVOCATION_LIMIT", 255, 0, 255);
  const metricsEnabled = parseBooleanEnv("CSL_METRICS_ENABLED", true);
  const rateLimitEnabled = parseBooleanEnv("CSL_RATE_LIMIT_ENABLED", true);
  const rateLimitWindowSeconds = parseIntegerEnv("CSL_RATE_LIMIT_WINDOW_SECONDS", 1, 1, 3600);
  const rateLimitMaxRequests = parseIntegerEnv("CSL_RATE_LIMIT_MAX_REQUESTS", 1000, 1, 1_000_000);
  const logLevel = parseEnumEnv("CSL_LOG_LEVEL", LOG_LEVELS, "info");
  const storeBackend = parseEnumEnv(
    "CSL_STORE_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const rateLimitBackend = parseEnumEnv(
    "CSL_RATE_LIMIT_BACKEND",
    ["memory", "redis"] as const,
    "memory",
  );
  const postgresUrl = parseOptionalStringEnv("CSL_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("CSL_REDIS_URL", 8);
  const redisRateLimitPrefix = parseStringEnv("CSL_REDIS_RATE_LIMIT_PREFIX", "csl:ratelimit", 3);
  const ledgerSeed = parseLedgerSeedEnv("CSL_LEDGER_SEED");

  if (process.env.NODE_ENV === "production" && apiKeys.includes("dev_csl_key")) {
    throw invalidConfig(
      configuredApiKeys ? "CSL_API_KEYS" : "CSL_API_KEY",
      "must not include default key value in production",
    );
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("CSL_LIST_DEFAULT_LIMIT", "must be lower or equal to CSL_LIST_MAX_LIMIT");
  }
  if (storeBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("CSL_POSTGRES_URL", "is required when the postgres store backend is enabled");
  }
  if (rateLimitBackend === "redis" && !redisUrl) {
    throw invalidConfig("CSL_REDIS_URL", "is required when redis rate limiting is enabled");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    listDefaultLimit,
    listMaxLimit,
    eventApiVersion,
    eventSource,
    eventSchemaVersion,
    processorAccount,
    cashbackRate,
    cashbackEnabled,
    revocationLimit,
    metricsEnabled,
    rateLimitEnabled,
    rateLimitWindowSeconds,
    rateLimitMaxRequests,
    logLevel,
    storeBackend,
    rateLimitBackend,
    redisRateLimitPrefix,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
    ...(ledgerSeed ? { ledgerSeed } : {}),
  };
}
