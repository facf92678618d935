import type { BalanceBucket, PaymentStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<PaymentStatus, PaymentStatus[]> = {
  nonexistent: ["active"],
  active: ["cleared", "reversed", "revoked", "merged"],
  cleared: ["active", "confirmed", "reversed", "revoked"],
  confirmed: [],
  reversed: [],
  revoked: ["active"],
  merged: [],
};

export function canTransition(current: PaymentStatus, next: PaymentStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

/** A revoked id may be made again; every other status past `nonexistent` blocks creation. */
export function isRecreatableStatus(status: PaymentStatus): boolean {
  return status === "nonexistent" || status === "revoked";
}

export function balanceBucketFor(status: PaymentStatus): BalanceBucket | null {
  switch (status) {
    case "active":
      return "uncleared";
    case "cleared":
      return "cleared";
    default:
      return null;
  }
}

export function assertTransition(paymentId: string, current: PaymentStatus, next: PaymentStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "inappropriate_payment_status",
    `Payment '${paymentId}' cannot move from '${current}' to '${next}'.`,
    { payment_id: paymentId, current_status: current, requested_status: next },
  );
}

export function assertStatusIn(
  paymentId: string,
  current: PaymentStatus,
  allowed: readonly PaymentStatus[],
  operation: string,
): void {
  if (allowed.includes(current)) {
    return;
  }
  throw new AppError(
    409,
    "inappropriate_payment_status",
    `Operation '${operation}' is not allowed when payment '${paymentId}' is '${current}'.`,
    { payment_id: paymentId, current_status: current },
  );
}
