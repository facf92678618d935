import type { Logger } from "../infra/logger.js";
import type { CashbackDistributorPort } from "../ports/cashback-distributor.js";
import type { OperationContext } from "./atomic-executor.js";

export interface CashbackTarget {
  paymentId: string;
  payer: string;
  correlationId: string | null;
}

export interface CashbackGrantOutcome {
  succeeded: boolean;
  requestedAmount: number;
  grantedAmount: number;
  nonce: number;
}

export interface CashbackIncreaseOutcome {
  succeeded: boolean;
  requestedAmount: number;
  increasedAmount: number;
}

export interface CashbackRevocationOutcome {
  succeeded: boolean;
  requestedAmount: number;
  revokedAmount: number;
}

/**
 * Talks to the cashback distributor. Refusals and partial grants come back as outcomes carrying the
 * amounts that actually moved; each call emits a success or failure event on the operation.
 */
export class CashbackGateway {
  constructor(
    private readonly distributor: CashbackDistributorPort,
    private readonly logger: Logger,
  ) {}

  async grant(context: OperationContext, target: CashbackTarget, amount: number): Promise<CashbackGrantOutcome> {
    const result = await this.distributor.sendCashback({
      kind: "card_payment",
      paymentId: target.paymentId,
      recipient: target.payer,
      amount,
    });

    if (!result.success) {
      this.logger.warn(
        { operation: context.operation, payment_id: target.paymentId, amount },
        "cashback grant refused by distributor",
      );
      context.emit("cashback.send_failed", {
        ...this.baseData(target),
        requested_amount: amount,
      });
      return { succeeded: false, requestedAmount: amount, grantedAmount: 0, nonce: 0 };
    }

    context.emit("cashback.sent", {
      ...this.baseData(target),
      requested_amount: amount,
      sent_amount: result.amount,
      nonce: result.nonce,
    });
    return { succeeded: true, requestedAmount: amount, grantedAmount: result.amount, nonce: result.nonce };
  }

  async increase(
    context: OperationContext,
    target: CashbackTarget,
    nonce: number,
    amount: number,
  ): Promise<CashbackIncreaseOutcome> {
    const result = nonce === 0
      ? { success: false, amount: 0 }
      : await this.distributor.increaseCashback(nonce, amount);

    if (!result.success) {
      this.logger.warn(
        { operation: context.operation, payment_id: target.paymentId, nonce, amount },
        "cashback increase refused by distributor",
      );
      context.emit("cashback.increase_failed", {
        ...this.baseData(target),
        nonce,
        requested_amount: amount,
      });
      return { succeeded: false, requestedAmount: amount, increasedAmount: 0 };
    }

    context.emit("cashback.increased", {
      ...this.baseData(target),
      nonce,
      requested_amount: amount,
      increased_amount: result.amount,
    });
    return { succeeded: true, requestedAmount: amount, increasedAmount: result.amount };
  }

  async revoke(
    context: OperationContext,
    target: CashbackTarget,
    nonce: number,
    amount: number,
  ): Promise<CashbackRevocationOutcome> {
    const succeeded = nonce !== 0 && (await this.distributor.revokeCashback(nonce, amount));

    if (!succeeded) {
      this.logger.warn(
        { operation: context.operation, payment_id: target.paymentId, nonce, amount },
        "cashback revocation refused by distributor",
      );
      context.emit("cashback.revoke_failed", {
        ...this.baseData(target),
        nonce,
        requested_amount: amount,
      });
      return { succeeded: false, requestedAmount: amount, revokedAmount: 0 };
    }

    context.emit("cashback.revoked", {
      ...this.baseData(target),
      nonce,
      revoked_amount: amount,
    });
    return { succeeded: true, requestedAmount: amount, revokedAmount: amount };
  }

  private baseData(target: CashbackTarget): Record<string, unknown> {
    return {
      payment_id: target.paymentId,
      correlation_id: target.correlationId,
      recipient: target.payer,
    };
  }
}
