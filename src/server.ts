import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { createHash } from "node:crypto";
import { Pool } from "pg";
import { AtomicExecutor } from "./application/atomic-executor.js";
import { CashbackGateway } from "./application/cashback-gateway.js";
import { PaymentEngine } from "./application/payment-engine.js";
import { SettlementOrchestrator } from "./application/settlement-orchestrator.js";
import { InMemoryCashbackDistributor } from "./adapters/inmemory/cashback-distributor.js";
import { InMemoryEventBus } from "./adapters/inmemory/event-bus.js";
import { InMemoryPaymentStore } from "./adapters/inmemory/payment-store.js";
import { InMemoryValueLedger } from "./adapters/inmemory/value-ledger.js";
import { PostgresPaymentStore } from "./adapters/postgres/payment-store.js";
import { RedisRateLimiter } from "./adapters/redis/rate-limiter.js";
import type { LedgerSettings } from "./domain/types.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { makeLogger, type Logger } from "./infra/logger.js";
import { CslMetricsRegistry } from "./infra/metrics.js";
import { InMemoryRateLimiter } from "./infra/rate-limiter.js";
import type { CashbackDistributorPort } from "./ports/cashback-distributor.js";
import type { EventBusPort } from "./ports/event-bus.js";
import type { PaymentStorePort } from "./ports/payment-store.js";
import type { RateLimiterPort } from "./ports/rate-limiter.js";
import { isTransactionalResource, type TransactionalResource } from "./ports/transaction.js";
import type { ValueLedgerPort } from "./ports/value-ledger.js";
import {
  assertAmountUpdateBody,
  assertCancelPaymentBody,
  assertCashOutAccountBody,
  assertCashbackDistributorBody,
  assertCashbackRateBody,
  assertConfirmAmountsBody,
  assertLazyUpdateBody,
  assertMakeCommonPaymentInput,
  assertMakePaymentInput,
  assertMergePaymentsBody,
  assertPaymentIdsBody,
  assertRefundAccountBody,
  assertRefundPaymentBody,
  assertRevocationLimitBody,
  normalizeLedgerEventType,
  normalizeLimit,
  normalizeResourceId,
  requirePathParameter,
} from "./api/validators.js";

export const DEFAULT_DISTRIBUTOR_ACCOUNT = "cashback-distributor";

export interface AppDependencies {
  store: PaymentStorePort;
  ledger: ValueLedgerPort;
  distributor: CashbackDistributorPort;
  eventBus: EventBusPort;
  clock: ClockPort;
  logger: Logger;
}

interface RequestState {
  startNs: bigint;
  rateLimitIdentity?: string;
}

type IdParams = { Params: { id: string } };
type AccountParams = { Params: { account: string } };

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function setRateLimitHeaders(
  reply: { header(name: string, value: string): unknown },
  options: {
    limit: number;
    remaining: number;
    resetSeconds: number;
  },
): void {
  const limit = String(options.limit);
  const remaining = String(options.remaining);
  const reset = String(options.resetSeconds);
  reply.header("RateLimit-Limit", limit);
  reply.header("RateLimit-Remaining", remaining);
  reply.header("RateLimit-Reset", reset);
  reply.header("X-RateLimit-Limit", limit);
  reply.header("X-RateLimit-Remaining", remaining);
  reply.header("X-RateLimit-Reset", reset);
}

function rateLimitIdentityFromApiKey(apiKey: string): string {
  return createHash("sha256").update(apiKey).digest("hex");
}

function initialSettings(config: RuntimeConfig): LedgerSettings {
  return {
    cash_out_account: null,
    cashback_distributor: null,
    cashback_enabled: config.cashbackEnabled,
    cashback_rate: config.cashbackRate,
    revocation_limit: config.revocationLimit,
  };
}

function seededLedger(config: RuntimeConfig): InMemoryValueLedger {
  const ledger = new InMemoryValueLedger();
  for (const entry of config.ledgerSeed ?? []) {
    ledger.fund(entry.account, entry.amount, config.processorAccount);
  }
  return ledger;
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: Partial<AppDependencies> = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const metrics = new CslMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const closeActions: Array<() => Promise<void>> = [];
  const requestState = new WeakMap<FastifyRequest, RequestState>();

  const logger = overrides.logger ?? makeLogger({ ...(config.logLevel ? { level: config.logLevel } : {}) });
  const clock = overrides.clock ?? new SystemClock();

  const postgresPool =
    !overrides.store && config.storeBackend === "postgres" && config.postgresUrl
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const redisClient =
    config.redisUrl && config.rateLimitBackend === "redis"
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  let store: PaymentStorePort;
  if (overrides.store) {
    store = overrides.store;
  } else if (config.storeBackend === "postgres") {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres store backend requested without PostgreSQL.");
    }
    store = new PostgresPaymentStore(postgresPool, initialSettings(config));
  } else {
    store = new InMemoryPaymentStore(initialSettings(config));
  }

  const ledger = overrides.ledger ?? seededLedger(config);
  let distributor: CashbackDistributorPort;
  if (overrides.distributor) {
    distributor = overrides.distributor;
  } else if (ledger instanceof InMemoryValueLedger) {
    distributor = new InMemoryCashbackDistributor(ledger, {
      account: DEFAULT_DISTRIBUTOR_ACCOUNT,
      revocationSource: config.processorAccount,
    });
  } else {
    throw new AppError(500, "invalid_runtime_config", "An external value ledger needs its own cashback distributor.");
  }

  let rateLimiter: RateLimiterPort;
  if (config.rateLimitBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis rate limiting requested without Redis client.");
    }
    rateLimiter = new RedisRateLimiter(redisClient, {
      windowSeconds: config.rateLimitWindowSeconds,
      maxRequests: config.rateLimitMaxRequests,
      keyPrefix: config.redisRateLimitPrefix ?? "csl:ratelimit",
    });
  } else {
    rateLimiter = new InMemoryRateLimiter({
      windowSeconds: config.rateLimitWindowSeconds,
      maxRequests: config.rateLimitMaxRequests,
    });
  }

  const eventBus = overrides.eventBus ?? new InMemoryEventBus({ maxRetained: config.listMaxLimit });
  eventBus.subscribe(async (event) => {
    metrics.recordPublishedEvent(event);
  });

  const resources: TransactionalResource[] = [];
  for (const candidate of [store, ledger, distributor]) {
    if (isTransactionalResource(candidate)) {
      resources.push(candidate);
    }
  }
  const executor = new AtomicExecutor({
    resources,
    eventBus,
    clock,
    logger,
    envelope: {
      apiVersion: config.eventApiVersion,
      source: config.eventSource,
      schemaVersion: config.eventSchemaVersion,
    },
    onRollback: (operation, code) => {
      metrics.recordRolledBackOperation(operation, code);
    },
  });
  const engine = new PaymentEngine(
    store,
    executor,
    new CashbackGateway(distributor, logger),
    new SettlementOrchestrator(ledger, config.processorAccount),
    logger,
  );

  async function enforceRateLimit(
    reply: { header(name: string, value: string): unknown },
    identity: string,
    cost: number,
  ): Promise<void> {
    const rateLimitDecision = await rateLimiter.consume(identity, cost);
    setRateLimitHeaders(reply, {
      limit: rateLimitDecision.limit,
      remaining: rateLimitDecision.remaining,
      resetSeconds: rateLimitDecision.resetSeconds,
    });
    if (!rateLimitDecision.allowed) {
      if (config.metricsEnabled) {
        metrics.recordRateLimitRejection("api_key");
      }
      reply.header("Retry-After", String(rateLimitDecision.retryAfterSeconds));
      throw new AppError(429, "rate_limit_exceeded", "Rate limit exceeded. Retry later.");
    }
  }

  // The request itself paid one token in onRequest; batches pay for the remaining items here.
  async function chargeBatch(
    request: FastifyRequest,
    reply: { header(name: string, value: string): unknown },
    itemCount: number,
  ): Promise<void> {
    const identity = requestState.get(request)?.rateLimitIdentity;
    if (!identity || itemCount <= 1) {
      return;
    }
    await enforceRateLimit(reply, identity, itemCount - 1);
  }

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    const state: RequestState = { startNs: process.hrtime.bigint() };
    requestState.set(request, state);
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    const apiKey = requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
    if (!config.rateLimitEnabled) {
      return;
    }
    state.rateLimitIdentity = rateLimitIdentityFromApiKey(apiKey);
    await enforceRateLimit(reply, state.rateLimitIdentity, 1);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestState.get(request)?.startNs;
    if (!startNs) {
      return;
    }
    const endNs = process.hrtime.bigint();
    const durationSeconds = Number(endNs - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/v1/payments", async (request, reply) => {
    assertMakePaymentInput(request.body);
    const payment = await engine.makePayment(request.body);
    return reply.status(201).send(payment);
  });

  app.post("/v1/payments/common", async (request, reply) => {
    assertMakeCommonPaymentInput(request.body);
    const payment = await engine.makeCommonPayment(request.body);
    return reply.status(201).send(payment);
  });

  app.post("/v1/payments/clear", async (request, reply) => {
    assertPaymentIdsBody(request.body);
    await chargeBatch(request, reply, request.body.payment_ids.length);
    const payments = await engine.clearPayments(request.body.payment_ids);
    return reply.status(200).send({ data: payments });
  });

  app.post("/v1/payments/unclear", async (request, reply) => {
    assertPaymentIdsBody(request.body);
    await chargeBatch(request, reply, request.body.payment_ids.length);
    const payments = await engine.unclearPayments(request.body.payment_ids);
    return reply.status(200).send({ data: payments });
  });

  app.post("/v1/payments/confirm", async (request, reply) => {
    assertPaymentIdsBody(request.body);
    await chargeBatch(request, reply, request.body.payment_ids.length);
    const payments = await engine.confirmPayments(request.body.payment_ids);
    return reply.status(200).send({ data: payments });
  });

  app.post("/v1/payments/clear-and-confirm", async (request, reply) => {
    assertPaymentIdsBody(request.body);
    await chargeBatch(request, reply, request.body.payment_ids.length);
    const payments = await engine.clearAndConfirmPayments(request.body.payment_ids);
    return reply.status(200).send({ data: payments });
  });

  app.post("/v1/payments/confirm-amounts", async (request, reply) => {
    assertConfirmAmountsBody(request.body);
    await chargeBatch(request, reply, request.body.confirmations.length);
    const payments = await engine.confirmPaymentAmounts(request.body.confirmations);
    return reply.status(200).send({ data: payments });
  });

  app.get<IdParams>("/v1/payments/:id", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    return reply.status(200).send(await engine.getPayment(paymentId));
  });

  app.get<IdParams>("/v1/payments/:id/cashback", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    return reply.status(200).send(await engine.getCashback(paymentId));
  });

  app.post<IdParams>("/v1/payments/:id/update", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    assertAmountUpdateBody(request.body);
    const payment = await engine.updatePayment({ ...request.body, payment_id: paymentId });
    return reply.status(200).send(payment);
  });

  app.post<IdParams>("/v1/payments/:id/update-lazy-and-confirm", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    assertLazyUpdateBody(request.body);
    const payment = await engine.updateLazyAndConfirmPayment({ ...request.body, payment_id: paymentId });
    return reply.status(200).send(payment);
  });

  app.post<IdParams>("/v1/payments/:id/refund", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    assertRefundPaymentBody(request.body);
    const payment = await engine.refundPayment({ ...request.body, payment_id: paymentId });
    return reply.status(200).send(payment);
  });

  app.post<IdParams>("/v1/payments/:id/revoke", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    assertCancelPaymentBody(request.body);
    const payment = await engine.revokePayment({ ...request.body, payment_id: paymentId });
    return reply.status(200).send(payment);
  });

  app.post<IdParams>("/v1/payments/:id/reverse", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    assertCancelPaymentBody(request.body);
    const payment = await engine.reversePayment({ ...request.body, payment_id: paymentId });
    return reply.status(200).send(payment);
  });

  app.post<IdParams>("/v1/payments/:id/merge", async (request, reply) => {
    const paymentId = requirePathParameter(request.params.id, "payment_id");
    assertMergePaymentsBody(request.body);
    await chargeBatch(request, reply, request.body.merged_payment_ids.length);
    const payment = await engine.mergePayments({
      target_payment_id: paymentId,
      merged_payment_ids: request.body.merged_payment_ids,
      ...(request.body.correlation_id ? { correlation_id: request.body.correlation_id } : {}),
    });
    return reply.status(200).send(payment);
  });

  app.post<AccountParams>("/v1/accounts/:account/refund", async (request, reply) => {
    const account = requirePathParameter(request.params.account, "account");
    assertRefundAccountBody(request.body);
    const result = await engine.refundAccount({ ...request.body, account });
    return reply.status(200).send(result);
  });

  app.get<AccountParams>("/v1/accounts/:account/balances", async (request, reply) => {
    const account = requirePathParameter(request.params.account, "account");
    return reply.status(200).send(await engine.getAccountBalances(account));
  });

  app.get("/v1/balances", async (_request, reply) => {
    return reply.status(200).send(await engine.getTotalBalances());
  });

  app.get("/v1/balances/audit", async (_request, reply) => {
    return reply.status(200).send(await engine.auditBalances());
  });

  app.get<{ Params: { reference: string } }>("/v1/cancellations/:reference", async (request, reply) => {
    const reference = requirePathParameter(request.params.reference, "reference");
    return reply.status(200).send({
      reference,
      revoked: await engine.isPaymentRevoked(reference),
      reversed: await engine.isPaymentReversed(reference),
    });
  });

  app.get<{ Querystring: { limit?: string; payment_id?: string; type?: string } }>(
    "/v1/events",
    async (request, reply) => {
      const limit = normalizeLimit(request.query.limit, config.listDefaultLimit, config.listMaxLimit);
      const paymentId = normalizeResourceId(request.query.payment_id, "payment_id");
      const eventType = normalizeLedgerEventType(request.query.type);
      const events = await eventBus.listPublishedEvents({
        limit,
        ...(paymentId ? { paymentId } : {}),
        ...(eventType ? { eventType } : {}),
      });
      return reply.status(200).send({ data: events });
    },
  );

  app.get("/v1/settings", async (_request, reply) => {
    return reply.status(200).send(await engine.getSettings());
  });

  app.put("/v1/settings/cash-out-account", async (request, reply) => {
    assertCashOutAccountBody(request.body);
    return reply.status(200).send(await engine.setCashOutAccount(request.body.account));
  });

  app.put("/v1/settings/cashback-distributor", async (request, reply) => {
    assertCashbackDistributorBody(request.body);
    return reply.status(200).send(await engine.setCashbackDistributor(request.body.account));
  });

  app.put("/v1/settings/cashback-rate", async (request, reply) => {
    assertCashbackRateBody(request.body);
    return reply.status(200).send(await engine.setCashbackRate(request.body.cashback_rate));
  });

  app.put("/v1/settings/revocation-limit", async (request, reply) => {
    assertRevocationLimitBody(request.body);
    return reply.status(200).send(await engine.setRevocationLimit(request.body.revocation_limit));
  });

  app.post("/v1/settings/cashback/enable", async (_request, reply) => {
    return reply.status(200).send(await engine.enableCashback());
  });

  app.post("/v1/settings/cashback/disable", async (_request, reply) => {
    return reply.status(200).send(await engine.disableCashback());
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
          ...(error.details ? { details: error.details } : {}),
        },
      });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, request_id: request.id, route: request.url }, "unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
