import { AppError } from "../infra/app-error.js";
import type { CashbackMergingFailureKind } from "./types.js";

const ZERO_IDENTIFIER_PATTERN = /^(0x)?0+$/i;

export function isZeroIdentifier(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length === 0 || ZERO_IDENTIFIER_PATTERN.test(trimmed);
}

export function assertPaymentId(paymentId: string): void {
  if (isZeroIdentifier(paymentId)) {
    throw new AppError(422, "payment_zero_id", "Payment id must not be zero.");
  }
}

export function paymentNonExistent(paymentId: string): AppError {
  return new AppError(404, "payment_non_existent", `Payment '${paymentId}' does not exist.`, {
    payment_id: paymentId,
  });
}

export function paymentIdArrayEmpty(): AppError {
  return new AppError(422, "payment_id_array_empty", "At least one payment id is required.");
}

export function cashOutAccountNotConfigured(): AppError {
  return new AppError(409, "cash_out_account_not_configured", "Cash-out account is not configured.");
}

export function inappropriateConfirmationAmount(paymentId: string, requested: number, remainder: number): AppError {
  return new AppError(
    422,
    "inappropriate_confirmation_amount",
    `Confirmed amount ${requested} exceeds the remainder ${remainder} of payment '${paymentId}'.`,
    { payment_id: paymentId, confirmed_amount: requested, remainder },
  );
}

export function cashbackMergingFailure(paymentId: string, kind: CashbackMergingFailureKind): AppError {
  return new AppError(
    409,
    "cashback_merging_failure",
    `Cashback of payment '${paymentId}' could not be merged (${kind}).`,
    { payment_id: paymentId, failure_kind: kind },
  );
}
