import type {
  LedgerEventType,
  MakeCommonPaymentInput,
  MakePaymentInput,
  PaymentConfirmation,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

const MAX_IDENTIFIER_LENGTH = 255;
const MAX_BATCH_SIZE = 500;

const ledgerEventTypes: readonly LedgerEventType[] = [
  "payment.made",
  "payment.updated",
  "payment.cleared",
  "payment.uncleared",
  "payment.confirmed",
  "payment.confirmed_amount_changed",
  "payment.refunded",
  "payment.revoked",
  "payment.reversed",
  "payments.merged",
  "account.refunded",
  "cashback.sent",
  "cashback.send_failed",
  "cashback.increased",
  "cashback.increase_failed",
  "cashback.revoked",
  "cashback.revoke_failed",
  "settings.cash_out_account_set",
  "settings.cashback_distributor_set",
  "settings.cashback_rate_set",
  "settings.cashback_enabled",
  "settings.cashback_disabled",
  "settings.revocation_limit_set",
];

export interface AmountUpdateBody {
  base_amount: number;
  extra_amount: number;
  correlation_id?: string;
}

export interface LazyUpdateBody extends AmountUpdateBody {
  confirmation_amount: number;
}

export interface RefundPaymentBody {
  refund_amount: number;
  correlation_id?: string;
}

export interface CancelPaymentBody {
  parent_tx_hash: string;
  correlation_id?: string;
}

export interface MergePaymentsBody {
  merged_payment_ids: string[];
  correlation_id?: string;
}

export interface RefundAccountBody {
  amount: number;
  correlation_id?: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isIdentifier(value: unknown): value is string {
  return isString(value) && value.trim().length > 0 && value.length <= MAX_IDENTIFIER_LENGTH;
}

function isAmount(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function assertBodyObject(payload: unknown): asserts payload is Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
}

function assertAmountField(payload: Record<string, unknown>, field: string, options: { positive?: boolean } = {}): void {
  const value = payload[field];
  if (!isAmount(value) || (options.positive && value === 0)) {
    throw new AppError(
      422,
      "invalid_amount",
      options.positive
        ? `${field} must be an integer greater than zero.`
        : `${field} must be a non-negative integer.`,
      { field },
    );
  }
}

function assertOptionalAmountField(payload: Record<string, unknown>, field: string): void {
  if (payload[field] !== undefined) {
    assertAmountField(payload, field);
  }
}

function assertIdentifierField(payload: Record<string, unknown>, field: string): void {
  if (!isIdentifier(payload[field])) {
    throw new AppError(
      422,
      `invalid_${field}`,
      `${field} must be a string between 1 and ${MAX_IDENTIFIER_LENGTH} characters.`,
    );
  }
}

function assertOptionalCorrelationId(payload: Record<string, unknown>): void {
  if (payload.correlation_id !== undefined && !isIdentifier(payload.correlation_id)) {
    throw new AppError(422, "invalid_correlation_id", "correlation_id must be a non-empty string.");
  }
}

function assertIdentifierList(value: unknown, field: string): asserts value is string[] {
  if (!Array.isArray(value)) {
    throw new AppError(422, `invalid_${field}`, `${field} must be an array of ids.`);
  }
  if (value.length > MAX_BATCH_SIZE) {
    throw new AppError(422, `invalid_${field}`, `${field} must hold at most ${MAX_BATCH_SIZE} ids.`);
  }
  if (!value.every(isIdentifier)) {
    throw new AppError(422, `invalid_${field}`, `${field} must contain non-empty string ids.`);
  }
}

export function assertMakePaymentInput(payload: unknown): asserts payload is MakePaymentInput {
  assertBodyObject(payload);
  assertIdentifierField(payload, "payment_id");
  assertIdentifierField(payload, "payer");
  assertAmountField(payload, "base_amount");
  assertAmountField(payload, "extra_amount");
  if (payload.sponsor !== undefined) {
    assertIdentifierField(payload, "sponsor");
  }
  assertOptionalAmountField(payload, "subsidy_limit");
  assertOptionalAmountField(payload, "confirmation_amount");
  if (payload.cashback_rate !== undefined) {
    const rate = payload.cashback_rate;
    if (typeof rate !== "number" || !Number.isInteger(rate) || rate < -1) {
      throw new AppError(422, "invalid_cashback_rate", "cashback_rate must be -1 or a non-negative integer.");
    }
  }
  assertOptionalCorrelationId(payload);
}

export function assertMakeCommonPaymentInput(payload: unknown): asserts payload is MakeCommonPaymentInput {
  assertBodyObject(payload);
  assertIdentifierField(payload, "payment_id");
  assertIdentifierField(payload, "payer");
  assertAmountField(payload, "base_amount");
  assertAmountField(payload, "extra_amount");
  assertOptionalCorrelationId(payload);
}

export function assertAmountUpdateBody(payload: unknown): asserts payload is AmountUpdateBody {
  assertBodyObject(payload);
  assertAmountField(payload, "base_amount");
  assertAmountField(payload, "extra_amount");
  assertOptionalCorrelationId(payload);
}

export function assertLazyUpdateBody(payload: unknown): asserts payload is LazyUpdateBody {
  assertBodyObject(payload);
  assertAmountField(payload, "base_amount");
  assertAmountField(payload, "extra_amount");
  assertAmountField(payload, "confirmation_amount");
  assertOptionalCorrelationId(payload);
}

export function assertRefundPaymentBody(payload: unknown): asserts payload is RefundPaymentBody {
  assertBodyObject(payload);
  assertAmountField(payload, "refund_amount", { positive: true });
  assertOptionalCorrelationId(payload);
}

export function assertCancelPaymentBody(payload: unknown): asserts payload is CancelPaymentBody {
  assertBodyObject(payload);
  assertIdentifierField(payload, "parent_tx_hash");
  assertOptionalCorrelationId(payload);
}

export function assertMergePaymentsBody(payload: unknown): asserts payload is MergePaymentsBody {
  assertBodyObject(payload);
  assertIdentifierList(payload.merged_payment_ids, "merged_payment_ids");
  assertOptionalCorrelationId(payload);
}

export function assertPaymentIdsBody(payload: unknown): asserts payload is { payment_ids: string[] } {
  assertBodyObject(payload);
  assertIdentifierList(payload.payment_ids, "payment_ids");
}

export function assertConfirmAmountsBody(
  payload: unknown,
): asserts payload is { confirmations: PaymentConfirmation[] } {
  assertBodyObject(payload);
  const { confirmations } = payload;
  if (!Array.isArray(confirmations) || confirmations.length > MAX_BATCH_SIZE) {
    throw new AppError(
      422,
      "invalid_confirmations",
      `confirmations must be an array of at most ${MAX_BATCH_SIZE} items.`,
    );
  }
  for (const confirmation of confirmations) {
    if (!isObject(confirmation) || !isIdentifier(confirmation.payment_id) || !isAmount(confirmation.amount)) {
      throw new AppError(
        422,
        "invalid_confirmations",
        "Each confirmation needs a payment_id and a non-negative integer amount.",
      );
    }
  }
}

export function assertRefundAccountBody(payload: unknown): asserts payload is RefundAccountBody {
  assertBodyObject(payload);
  assertAmountField(payload, "amount", { positive: true });
  assertOptionalCorrelationId(payload);
}

export function assertCashOutAccountBody(payload: unknown): asserts payload is { account: string | null } {
  assertBodyObject(payload);
  if (payload.account !== null) {
    assertIdentifierField(payload, "account");
  }
}

export function assertCashbackDistributorBody(payload: unknown): asserts payload is { account: string } {
  assertBodyObject(payload);
  assertIdentifierField(payload, "account");
}

export function assertCashbackRateBody(payload: unknown): asserts payload is { cashback_rate: number } {
  assertBodyObject(payload);
  if (!isAmount(payload.cashback_rate)) {
    throw new AppError(422, "invalid_cashback_rate", "cashback_rate must be a non-negative integer.");
  }
}

export function assertRevocationLimitBody(payload: unknown): asserts payload is { revocation_limit: number } {
  assertBodyObject(payload);
  if (!isAmount(payload.revocation_limit)) {
    throw new AppError(422, "invalid_revocation_limit", "revocation_limit must be a non-negative integer.");
  }
}

export function normalizeLedgerEventType(value: unknown): LedgerEventType | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_event_type", "type must be a string.");
  }

  const eventType = ledgerEventTypes.find((candidate) => candidate === value.trim());
  if (!eventType) {
    throw new AppError(422, "invalid_event_type", "Unsupported ledger event type.");
  }
  return eventType;
}

export function normalizeLimit(value: unknown, fallback = 50, max = 500): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(422, "invalid_limit", "limit must be a positive integer.");
  }
  return Math.min(parsed, max);
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > MAX_IDENTIFIER_LENGTH) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and ${MAX_IDENTIFIER_LENGTH} characters.`,
    );
  }
  return normalized;
}

export function requirePathParameter(value: unknown, fieldName: string): string {
  const normalized = normalizeResourceId(value, fieldName);
  if (!normalized) {
    throw new AppError(400, "invalid_path_parameter", `${fieldName} is required.`);
  }
  return normalized;
}
