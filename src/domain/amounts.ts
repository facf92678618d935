import { AppError } from "../infra/app-error.js";

export const MAX_AMOUNT = Number.MAX_SAFE_INTEGER;
export const CASHBACK_RATE_FACTOR = 1000;
export const CASHBACK_ROUNDING_COEF = 10_000;
export const CASHBACK_RATE_MAX = 250;

export interface AmountParts {
  payerBase: number;
  payerExtra: number;
  payerSum: number;
  sponsorBase: number;
  sponsorExtra: number;
  sponsorSum: number;
}

export interface RefundParts {
  payerRefund: number;
  sponsorRefund: number;
}

/**
 * The sponsor covers the base amount first and the extra amount with whatever is left of the
 * subsidy limit. Everything the sponsor does not cover belongs to the payer.
 */
export function defineAmountParts(baseAmount: number, extraAmount: number, subsidyLimit: number): AmountParts {
  let sponsorBase: number;
  let sponsorExtra: number;
  if (subsidyLimit >= baseAmount + extraAmount) {
    sponsorBase = baseAmount;
    sponsorExtra = extraAmount;
  } else if (subsidyLimit >= baseAmount) {
    sponsorBase = baseAmount;
    sponsorExtra = subsidyLimit - baseAmount;
  } else {
    sponsorBase = subsidyLimit;
    sponsorExtra = 0;
  }
  const payerBase = baseAmount - sponsorBase;
  const payerExtra = extraAmount - sponsorExtra;
  return {
    payerBase,
    payerExtra,
    payerSum: payerBase + payerExtra,
    sponsorBase,
    sponsorExtra,
    sponsorSum: sponsorBase + sponsorExtra,
  };
}

export function splitSum(total: number, subsidyLimit: number): { payerPart: number; sponsorPart: number } {
  const sponsorPart = Math.min(total, subsidyLimit);
  return { payerPart: total - sponsorPart, sponsorPart };
}

/** Base amount the payer covers; the only part of a payment that earns cashback. */
export function payerBaseShare(baseAmount: number, subsidyLimit: number): number {
  return baseAmount - Math.min(baseAmount, subsidyLimit);
}

/** Refund share of the sponsor, proportional to its share of the base amount. Floors. */
export function proratedSponsorRefund(refundAmount: number, baseAmount: number, subsidyLimit: number): number {
  if (subsidyLimit === 0) {
    return 0;
  }
  if (subsidyLimit >= baseAmount) {
    return refundAmount;
  }
  const prorated = Number((BigInt(refundAmount) * BigInt(subsidyLimit)) / BigInt(baseAmount));
  return Math.min(prorated, subsidyLimit);
}

export function defineRefundParts(
  refundAmount: number,
  baseAmount: number,
  extraAmount: number,
  subsidyLimit: number,
): RefundParts {
  // A sponsor never gets back more than it put in.
  const { sponsorPart } = splitSum(baseAmount + extraAmount, subsidyLimit);
  const sponsorRefund = Math.min(proratedSponsorRefund(refundAmount, baseAmount, subsidyLimit), sponsorPart);
  return {
    payerRefund: refundAmount - sponsorRefund,
    sponsorRefund,
  };
}

export function roundCashback(rawCashback: number): number {
  const half = CASHBACK_ROUNDING_COEF / 2;
  return Math.floor((rawCashback + half) / CASHBACK_ROUNDING_COEF) * CASHBACK_ROUNDING_COEF;
}

export function calculateCashback(payerBase: number, payerRefund: number, cashbackRate: number): number {
  if (payerBase < payerRefund) {
    return 0;
  }
  const eligible = BigInt(payerBase - payerRefund);
  const raw = Number((eligible * BigInt(cashbackRate)) / BigInt(CASHBACK_RATE_FACTOR));
  return roundCashback(raw);
}

export function isValidAmount(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function overflowOfSumAmount(context: Record<string, unknown>): AppError {
  return new AppError(
    422,
    "overflow_of_sum_amount",
    `Amount sum exceeds the maximum supported amount (${MAX_AMOUNT}).`,
    context,
  );
}

export function checkedSum(values: readonly number[], context: Record<string, unknown> = {}): number {
  let total = 0;
  for (const value of values) {
    if (value > MAX_AMOUNT - total) {
      throw overflowOfSumAmount(context);
    }
    total += value;
  }
  return total;
}

export function subtractOrFail(minuend: number, subtrahend: number, context: string): number {
  if (subtrahend > minuend) {
    throw new AppError(
      500,
      "ledger_invariant_violation",
      `Subtraction underflow in ${context}: ${minuend} - ${subtrahend}.`,
    );
  }
  return minuend - subtrahend;
}
