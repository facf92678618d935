import { destination, pino, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  bindings?: Record<string, unknown>;
}

/**
 * JSON logger on stdout. Silent under Vitest and NODE_ENV=test so suites stay quiet.
 */
export function makeLogger(options: LoggerOptions = {}): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const isTestTooling = process.env.VITEST === "true" || nodeEnv === "test";

  return pino(
    {
      level: options.level ?? "info",
      enabled: !isTestTooling,
      base: { ...options.bindings, service: "card-settlement-ledger" },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination({ dest: 1, sync: nodeEnv !== "production" }),
  );
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
