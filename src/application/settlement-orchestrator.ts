import {
  defineAmountParts,
  defineRefundParts,
  subtractOrFail,
  type AmountParts,
  type RefundParts,
} from "../domain/amounts.js";
import { cashOutAccountNotConfigured } from "../domain/ledger-errors.js";
import type { ValueLedgerPort } from "../ports/value-ledger.js";

export interface PaymentAmounts {
  baseAmount: number;
  extraAmount: number;
  refundAmount: number;
  confirmedAmount: number;
  subsidyLimit: number;
}

export interface PaymentBreakdown {
  parts: AmountParts;
  refundParts: RefundParts;
  remainder: number;
  payerRemainder: number;
  sponsorRemainder: number;
}

export interface SettlementDeltas {
  /** Positive: the processor pays the payer. Negative: the payer pays the processor. */
  payerDelta: number;
  sponsorDelta: number;
  /** Positive: the processor sends to cash-out. Negative: funds come back from cash-out. */
  cashOutDelta: number;
  before: PaymentBreakdown;
  after: PaymentBreakdown;
}

export interface SettlementPlan {
  payer: string;
  sponsor: string | null;
  payerDelta: number;
  sponsorDelta: number;
  cashOutDelta: number;
  cashOutAccount: string | null;
}

export function breakdownPayment(amounts: PaymentAmounts): PaymentBreakdown {
  const sum = amounts.baseAmount + amounts.extraAmount;
  const parts = defineAmountParts(amounts.baseAmount, amounts.extraAmount, amounts.subsidyLimit);
  const refundParts = defineRefundParts(
    amounts.refundAmount,
    amounts.baseAmount,
    amounts.extraAmount,
    amounts.subsidyLimit,
  );
  return {
    parts,
    refundParts,
    remainder: subtractOrFail(sum, amounts.refundAmount, "payment remainder"),
    payerRemainder: subtractOrFail(parts.payerSum, refundParts.payerRefund, "payer remainder"),
    sponsorRemainder: subtractOrFail(parts.sponsorSum, refundParts.sponsorRefund, "sponsor remainder"),
  };
}

export function computeSettlementDeltas(before: PaymentAmounts, after: PaymentAmounts): SettlementDeltas {
  const beforeBreakdown = breakdownPayment(before);
  const afterBreakdown = breakdownPayment(after);
  return {
    payerDelta: beforeBreakdown.payerRemainder - afterBreakdown.payerRemainder,
    sponsorDelta: beforeBreakdown.sponsorRemainder - afterBreakdown.sponsorRemainder,
    cashOutDelta: after.confirmedAmount - before.confirmedAmount,
    before: beforeBreakdown,
    after: afterBreakdown,
  };
}

/**
 * Moves value between the processor account and the parties of a payment. Every pull runs before
 * any push, so the processor never pays out funds it has not collected yet.
 */
export class SettlementOrchestrator {
  constructor(
    private readonly ledger: ValueLedgerPort,
    readonly processorAccount: string,
  ) {}

  async settle(plan: SettlementPlan): Promise<void> {
    if (plan.payerDelta < 0) {
      await this.pull(plan.payer, -plan.payerDelta);
    }
    if (plan.sponsor && plan.sponsorDelta < 0) {
      await this.pull(plan.sponsor, -plan.sponsorDelta);
    }
    if (plan.cashOutDelta < 0) {
      await this.pull(this.requireCashOut(plan.cashOutAccount), -plan.cashOutDelta);
    }

    if (plan.payerDelta > 0) {
      await this.ledger.transfer(this.processorAccount, plan.payer, plan.payerDelta);
    }
    if (plan.sponsor && plan.sponsorDelta > 0) {
      await this.ledger.transfer(this.processorAccount, plan.sponsor, plan.sponsorDelta);
    }
    if (plan.cashOutDelta > 0) {
      await this.ledger.transfer(this.processorAccount, this.requireCashOut(plan.cashOutAccount), plan.cashOutDelta);
    }
  }

  async pull(from: string, amount: number): Promise<void> {
    if (amount === 0) {
      return;
    }
    await this.ledger.transferFrom(this.processorAccount, from, this.processorAccount, amount);
  }

  async refundFromCashOut(cashOutAccount: string, account: string, amount: number): Promise<void> {
    await this.ledger.transferFrom(this.processorAccount, cashOutAccount, account, amount);
  }

  async processorBalance(): Promise<number> {
    return this.ledger.balanceOf(this.processorAccount);
  }

  async approve(spender: string, amount: number): Promise<void> {
    await this.ledger.approve(this.processorAccount, spender, amount);
  }

  private requireCashOut(cashOutAccount: string | null): string {
    if (!cashOutAccount) {
      throw cashOutAccountNotConfigured();
    }
    return cashOutAccount;
  }
}
