import {
  CASHBACK_RATE_MAX,
  MAX_AMOUNT,
  calculateCashback,
  checkedSum,
  isValidAmount,
  payerBaseShare,
  subtractOrFail,
} from "../domain/amounts.js";
import {
  assertPaymentId,
  cashOutAccountNotConfigured,
  cashbackMergingFailure,
  inappropriateConfirmationAmount,
  isZeroIdentifier,
  paymentIdArrayEmpty,
  paymentNonExistent,
} from "../domain/ledger-errors.js";
import {
  assertStatusIn,
  assertTransition,
  balanceBucketFor,
  isRecreatableStatus,
} from "../domain/state-machine.js";
import type {
  AccountBalances,
  BalanceAuditReport,
  BalanceBucket,
  CancelPaymentInput,
  CancellationKind,
  CashbackResponse,
  LedgerSettings,
  MakeCommonPaymentInput,
  MakePaymentInput,
  MergePaymentsInput,
  PaymentConfirmation,
  PaymentRecord,
  PaymentResponse,
  PaymentStatus,
  RefundAccountInput,
  RefundPaymentInput,
  TotalBalances,
  UpdateLazyAndConfirmInput,
  UpdatePaymentInput,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { Logger } from "../infra/logger.js";
import type { BalanceChangeResult, PaymentStorePort } from "../ports/payment-store.js";
import type { AtomicExecutor, OperationContext } from "./atomic-executor.js";
import type { CashbackGateway, CashbackTarget } from "./cashback-gateway.js";
import {
  computeSettlementDeltas,
  type PaymentAmounts,
  type SettlementDeltas,
  type SettlementOrchestrator,
} from "./settlement-orchestrator.js";

const LIVE_STATUSES: readonly PaymentStatus[] = ["active", "cleared", "confirmed"];

/** `recompute` follows the entitlement both ways; `decrease_only` never asks for more cashback. */
type CashbackPolicy = "recompute" | "decrease_only";

interface TransitionOutcome {
  amounts: PaymentAmounts;
  deltas: SettlementDeltas;
  payerTransfer: number;
  cashbackAmount: number;
  cashbackRequested: number;
}

function assertAmount(value: number, field: string): void {
  if (!isValidAmount(value)) {
    throw new AppError(422, "invalid_amount", `${field} must be a non-negative safe integer.`, { field });
  }
}

function amountsOf(payment: PaymentRecord): PaymentAmounts {
  return {
    baseAmount: payment.base_amount,
    extraAmount: payment.extra_amount,
    refundAmount: payment.refund_amount,
    confirmedAmount: payment.confirmed_amount,
    subsidyLimit: payment.subsidy_limit,
  };
}

function remainderOf(payment: PaymentRecord): number {
  return subtractOrFail(payment.base_amount + payment.extra_amount, payment.refund_amount, "payment remainder");
}

function correlationOf(input: { correlation_id?: string }): string | null {
  return input.correlation_id ?? null;
}

function cashbackTargetOf(payment: PaymentRecord, correlationId: string | null): CashbackTarget {
  return { paymentId: payment.id, payer: payment.payer, correlationId };
}

function amountChangeData(
  before: PaymentRecord,
  after: PaymentRecord,
  correlationId: string | null,
): Record<string, unknown> {
  return {
    payment_id: after.id,
    correlation_id: correlationId,
    payer: after.payer,
    sponsor: after.sponsor,
    subsidized: after.sponsor !== null,
    old_base_amount: before.base_amount,
    new_base_amount: after.base_amount,
    old_extra_amount: before.extra_amount,
    new_extra_amount: after.extra_amount,
    old_refund_amount: before.refund_amount,
    new_refund_amount: after.refund_amount,
    old_confirmed_amount: before.confirmed_amount,
    new_confirmed_amount: after.confirmed_amount,
    old_cashback_amount: before.cashback_amount,
    new_cashback_amount: after.cashback_amount,
  };
}

export class PaymentEngine {
  constructor(
    private readonly store: PaymentStorePort,
    private readonly executor: AtomicExecutor,
    private readonly cashback: CashbackGateway,
    private readonly settlement: SettlementOrchestrator,
    private readonly logger: Logger,
  ) {}

  async makePayment(input: MakePaymentInput): Promise<PaymentResponse> {
    return this.executor.run("make_payment", async (context) => {
      const payment = await this.makePaymentInternal(context, input);
      return this.mapPayment(payment);
    });
  }

  async makeCommonPayment(input: MakeCommonPaymentInput): Promise<PaymentResponse> {
    return this.executor.run("make_common_payment", async (context) => {
      const payment = await this.makePaymentInternal(context, {
        payment_id: input.payment_id,
        payer: input.payer,
        base_amount: input.base_amount,
        extra_amount: input.extra_amount,
        ...(input.correlation_id ? { correlation_id: input.correlation_id } : {}),
      });
      return this.mapPayment(payment);
    });
  }

  async updatePayment(input: UpdatePaymentInput): Promise<PaymentResponse> {
    return this.executor.run("update_payment", async (context) => {
      const payment = await this.updatePaymentInternal(context, input);
      return this.mapPayment(payment);
    });
  }

  async updateLazyAndConfirmPayment(input: UpdateLazyAndConfirmInput): Promise<PaymentResponse> {
    return this.executor.run("update_lazy_and_confirm_payment", async (context) => {
      assertAmount(input.confirmation_amount, "confirmation_amount");
      let payment = await this.getPaymentRecordOrThrow(input.payment_id);
      if (payment.base_amount !== input.base_amount || payment.extra_amount !== input.extra_amount) {
        payment = await this.updatePaymentInternal(context, input);
      }
      if (input.confirmation_amount > 0) {
        payment = await this.confirmAmountInternal(context, payment, input.confirmation_amount);
      }
      return this.mapPayment(payment);
    });
  }

  async clearPayment(paymentId: string): Promise<PaymentResponse> {
    return this.executor.run("clear_payment", async (context) => {
      const payment = await this.clearInternal(context, paymentId);
      return this.mapPayment(payment);
    });
  }

  async clearPayments(paymentIds: string[]): Promise<PaymentResponse[]> {
    return this.runBatch("clear_payments", paymentIds, (context, paymentId) => this.clearInternal(context, paymentId));
  }

  async unclearPayment(paymentId: string): Promise<PaymentResponse> {
    return this.executor.run("unclear_payment", async (context) => {
      const payment = await this.unclearInternal(context, paymentId);
      return this.mapPayment(payment);
    });
  }

  async unclearPayments(paymentIds: string[]): Promise<PaymentResponse[]> {
    return this.runBatch("unclear_payments", paymentIds, (context, paymentId) =>
      this.unclearInternal(context, paymentId));
  }

  async confirmPayment(paymentId: string): Promise<PaymentResponse> {
    return this.executor.run("confirm_payment", async (context) => {
      const payment = await this.confirmInternal(context, paymentId);
      return this.mapPayment(payment);
    });
  }

  async confirmPayments(paymentIds: string[]): Promise<PaymentResponse[]> {
    return this.runBatch("confirm_payments", paymentIds, (context, paymentId) =>
      this.confirmInternal(context, paymentId));
  }

  async clearAndConfirmPayment(paymentId: string): Promise<PaymentResponse> {
    return this.executor.run("clear_and_confirm_payment", async (context) => {
      await this.clearInternal(context, paymentId);
      const payment = await this.confirmInternal(context, paymentId);
      return this.mapPayment(payment);
    });
  }

  async clearAndConfirmPayments(paymentIds: string[]): Promise<PaymentResponse[]> {
    return this.runBatch("clear_and_confirm_payments", paymentIds, async (context, paymentId) => {
      await this.clearInternal(context, paymentId);
      return this.confirmInternal(context, paymentId);
    });
  }

  async confirmPaymentAmount(paymentId: string, amount: number): Promise<PaymentResponse> {
    return this.executor.run("confirm_payment_amount", async (context) => {
      const payment = await this.getPaymentRecordOrThrow(paymentId);
      return this.mapPayment(await this.confirmAmountInternal(context, payment, amount));
    });
  }

  async confirmPaymentAmounts(confirmations: PaymentConfirmation[]): Promise<PaymentResponse[]> {
    return this.executor.run("confirm_payment_amounts", async (context) => {
      if (confirmations.length === 0) {
        throw new AppError(422, "payment_confirmation_array_empty", "At least one confirmation is required.");
      }
      const results: PaymentResponse[] = [];
      for (const confirmation of confirmations) {
        const payment = await this.getPaymentRecordOrThrow(confirmation.payment_id);
        results.push(this.mapPayment(await this.confirmAmountInternal(context, payment, confirmation.amount)));
      }
      return results;
    });
  }

  async refundPayment(input: RefundPaymentInput): Promise<PaymentResponse> {
    return this.executor.run("refund_payment", async (context) => {
      assertAmount(input.refund_amount, "refund_amount");
      const payment = await this.getPaymentRecordOrThrow(input.payment_id);
      assertStatusIn(payment.id, payment.status, LIVE_STATUSES, "refund_payment");

      const sumAmount = payment.base_amount + payment.extra_amount;
      const newRefundAmount = checkedSum([payment.refund_amount, input.refund_amount], { payment_id: payment.id });
      if (newRefundAmount > sumAmount) {
        throw new AppError(
          422,
          "inappropriate_refunding_amount",
          `Refund total ${newRefundAmount} exceeds the sum ${sumAmount} of payment '${payment.id}'.`,
          { payment_id: payment.id, refund_amount: newRefundAmount, sum_amount: sumAmount },
        );
      }

      const before = { ...payment };
      const correlationId = correlationOf(input);
      const outcome = await this.applyTransition(
        context,
        payment,
        { ...amountsOf(payment), refundAmount: newRefundAmount },
        "decrease_only",
        correlationId,
      );
      this.assignAmounts(payment, outcome);
      payment.updated_at = context.nowIso();
      await this.store.savePayment(payment);

      const bucket = balanceBucketFor(payment.status);
      const balance = bucket ? await this.shiftBucket(bucket, payment.payer, -input.refund_amount) : null;
      context.emit("payment.refunded", {
        ...amountChangeData(before, payment, correlationId),
        refunding_amount: input.refund_amount,
        payer_refund_amount: outcome.deltas.after.refundParts.payerRefund,
        sponsor_refund_amount: outcome.deltas.after.refundParts.sponsorRefund,
        payer_transfer: outcome.payerTransfer,
        sponsor_transfer: outcome.deltas.sponsorDelta,
        ...(bucket && balance ? { [`${bucket}_balance`]: balance.accountBalance } : {}),
      });
      return this.mapPayment(payment);
    });
  }

  async revokePayment(input: CancelPaymentInput): Promise<PaymentResponse> {
    return this.executor.run("revoke_payment", async (context) => {
      const settings = await this.store.getSettings();
      if (settings.revocation_limit === 0) {
        throw new AppError(409, "revocation_limit_zero", "Revocations are disabled by a zero revocation limit.");
      }
      const payment = await this.cancelInternal(context, input, "revoked");
      return this.mapPayment(payment);
    });
  }

  async reversePayment(input: CancelPaymentInput): Promise<PaymentResponse> {
    return this.executor.run("reverse_payment", async (context) => {
      const payment = await this.cancelInternal(context, input, "reversed");
      return this.mapPayment(payment);
    });
  }

  async mergePayments(input: MergePaymentsInput): Promise<PaymentResponse> {
    return this.executor.run("merge_payments", async (context) => {
      const payment = await this.mergeInternal(context, input);
      return this.mapPayment(payment);
    });
  }

  async refundAccount(input: RefundAccountInput): Promise<{ account: string; amount: number }> {
    return this.executor.run("refund_account", async (context) => {
      if (isZeroIdentifier(input.account)) {
        throw new AppError(422, "account_zero_address", "Account must not be zero.");
      }
      assertAmount(input.amount, "amount");
      const settings = await this.store.getSettings();
      if (!settings.cash_out_account) {
        throw cashOutAccountNotConfigured();
      }
      await this.settlement.refundFromCashOut(settings.cash_out_account, input.account, input.amount);
      context.emit("account.refunded", {
        account: input.account,
        amount: input.amount,
        cash_out_account: settings.cash_out_account,
        correlation_id: correlationOf(input),
      });
      return { account: input.account, amount: input.amount };
    });
  }

  async setCashOutAccount(account: string | null): Promise<LedgerSettings> {
    return this.executor.run("set_cash_out_account", async (context) => {
      const settings = await this.store.getSettings();
      const nextAccount = account && !isZeroIdentifier(account) ? account : null;
      if (settings.cash_out_account === nextAccount) {
        throw new AppError(409, "cash_out_account_unchanged", "Cash-out account is already set to this value.");
      }
      const previous = settings.cash_out_account;
      settings.cash_out_account = nextAccount;
      await this.store.saveSettings(settings);
      context.emit("settings.cash_out_account_set", { old_account: previous, new_account: nextAccount });
      this.logger.info({ old_account: previous, new_account: nextAccount }, "cash-out account changed");
      return settings;
    });
  }

  async setCashbackDistributor(account: string): Promise<LedgerSettings> {
    return this.executor.run("set_cashback_distributor", async (context) => {
      if (isZeroIdentifier(account)) {
        throw new AppError(422, "cashback_distributor_zero_address", "Cashback distributor must not be zero.");
      }
      const settings = await this.store.getSettings();
      if (settings.cashback_distributor !== null) {
        throw new AppError(
          409,
          "cashback_distributor_already_configured",
          "Cashback distributor is already configured.",
        );
      }
      settings.cashback_distributor = account;
      await this.store.saveSettings(settings);
      await this.settlement.approve(account, MAX_AMOUNT);
      context.emit("settings.cashback_distributor_set", { old_distributor: null, new_distributor: account });
      this.logger.info({ distributor: account }, "cashback distributor configured");
      return settings;
    });
  }

  async setCashbackRate(rate: number): Promise<LedgerSettings> {
    return this.executor.run("set_cashback_rate", async (context) => {
      assertAmount(rate, "cashback_rate");
      if (rate > CASHBACK_RATE_MAX) {
        throw new AppError(422, "cashback_rate_excess", `Cashback rate must not exceed ${CASHBACK_RATE_MAX}.`);
      }
      const settings = await this.store.getSettings();
      if (settings.cashback_rate === rate) {
        throw new AppError(409, "cashback_rate_unchanged", "Cashback rate is already set to this value.");
      }
      const previous = settings.cashback_rate;
      settings.cashback_rate = rate;
      await this.store.saveSettings(settings);
      context.emit("settings.cashback_rate_set", { old_rate: previous, new_rate: rate });
      return settings;
    });
  }

  async enableCashback(): Promise<LedgerSettings> {
    return this.executor.run("enable_cashback", async (context) => {
      const settings = await this.store.getSettings();
      if (settings.cashback_distributor === null) {
        throw new AppError(409, "cashback_distributor_not_configured", "Cashback distributor is not configured.");
      }
      if (settings.cashback_enabled) {
        throw new AppError(409, "cashback_already_enabled", "Cashback is already enabled.");
      }
      settings.cashback_enabled = true;
      await this.store.saveSettings(settings);
      context.emit("settings.cashback_enabled", {});
      return settings;
    });
  }

  async disableCashback(): Promise<LedgerSettings> {
    return this.executor.run("disable_cashback", async (context) => {
      const settings = await this.store.getSettings();
      if (!settings.cashback_enabled) {
        throw new AppError(409, "cashback_already_disabled", "Cashback is already disabled.");
      }
      settings.cashback_enabled = false;
      await this.store.saveSettings(settings);
      context.emit("settings.cashback_disabled", {});
      return settings;
    });
  }

  async setRevocationLimit(limit: number): Promise<LedgerSettings> {
    return this.executor.run("set_revocation_limit", async (context) => {
      if (!Number.isInteger(limit) || limit < 0 || limit > 255) {
        throw new AppError(422, "invalid_revocation_limit", "Revocation limit must be an integer from 0 to 255.");
      }
      const settings = await this.store.getSettings();
      const previous = settings.revocation_limit;
      settings.revocation_limit = limit;
      await this.store.saveSettings(settings);
      context.emit("settings.revocation_limit_set", { old_limit: previous, new_limit: limit });
      return settings;
    });
  }

  async getPayment(paymentId: string): Promise<PaymentResponse> {
    return this.executor.run("get_payment", async () => this.mapPayment(await this.getPaymentRecordOrThrow(paymentId)));
  }

  async getCashback(paymentId: string): Promise<CashbackResponse> {
    return this.executor.run("get_cashback", async () => {
      const payment = await this.getPaymentRecordOrThrow(paymentId);
      return { payment_id: payment.id, last_cashback_nonce: payment.cashback_nonce };
    });
  }

  async getSettings(): Promise<LedgerSettings> {
    return this.executor.run("get_settings", async () => this.store.getSettings());
  }

  async getAccountBalances(account: string): Promise<AccountBalances> {
    return this.executor.run("get_account_balances", async () => ({
      account,
      uncleared: await this.store.getAccountBalance("uncleared", account),
      cleared: await this.store.getAccountBalance("cleared", account),
    }));
  }

  async getTotalBalances(): Promise<TotalBalances> {
    return this.executor.run("get_total_balances", async () => ({
      uncleared: await this.store.getTotalBalance("uncleared"),
      cleared: await this.store.getTotalBalance("cleared"),
    }));
  }

  async isPaymentRevoked(parentTxHash: string): Promise<boolean> {
    return this.executor.run("is_payment_revoked", async () =>
      this.store.hasCancellationFlag("revoked", parentTxHash));
  }

  async isPaymentReversed(parentTxHash: string): Promise<boolean> {
    return this.executor.run("is_payment_reversed", async () =>
      this.store.hasCancellationFlag("reversed", parentTxHash));
  }

  /** Recomputes every bucket from payment remainders and compares it with the stored counters. */
  async auditBalances(): Promise<BalanceAuditReport> {
    return this.executor.run("audit_balances", async () => {
      const totals: TotalBalances = {
        uncleared: await this.store.getTotalBalance("uncleared"),
        cleared: await this.store.getTotalBalance("cleared"),
      };
      const accountSums: TotalBalances = { uncleared: 0, cleared: 0 };
      const stored = new Map<string, number>();
      for (const entry of await this.store.listAccountBalances()) {
        accountSums[entry.bucket] += entry.amount;
        stored.set(`${entry.bucket}:${entry.account}`, entry.amount);
      }

      const paymentSums: TotalBalances = { uncleared: 0, cleared: 0 };
      const expected = new Map<string, number>();
      for (const payment of await this.store.listPayments({ statuses: ["active", "cleared"] })) {
        const bucket = balanceBucketFor(payment.status);
        if (!bucket) {
          continue;
        }
        const remainder = remainderOf(payment);
        paymentSums[bucket] += remainder;
        const key = `${bucket}:${payment.payer}`;
        expected.set(key, (expected.get(key) ?? 0) + remainder);
      }

      const mismatched = new Set<string>();
      for (const key of new Set([...stored.keys(), ...expected.keys()])) {
        if ((stored.get(key) ?? 0) !== (expected.get(key) ?? 0)) {
          mismatched.add(key.slice(key.indexOf(":") + 1));
        }
      }

      const ok =
        mismatched.size === 0
        && totals.uncleared === accountSums.uncleared
        && totals.cleared === accountSums.cleared
        && accountSums.uncleared === paymentSums.uncleared
        && accountSums.cleared === paymentSums.cleared;
      return {
        ok,
        totals,
        account_sums: accountSums,
        payment_sums: paymentSums,
        mismatched_accounts: [...mismatched].sort(),
      };
    });
  }

  private async runBatch(
    operation: string,
    paymentIds: string[],
    step: (context: OperationContext, paymentId: string) => Promise<PaymentRecord>,
  ): Promise<PaymentResponse[]> {
    return this.executor.run(operation, async (context) => {
      if (paymentIds.length === 0) {
        throw paymentIdArrayEmpty();
      }
      const results: PaymentResponse[] = [];
      for (const paymentId of paymentIds) {
        results.push(this.mapPayment(await step(context, paymentId)));
      }
      return results;
    });
  }

  private async makePaymentInternal(context: OperationContext, input: MakePaymentInput): Promise<PaymentRecord> {
    assertPaymentId(input.payment_id);
    if (isZeroIdentifier(input.payer)) {
      throw new AppError(422, "payer_zero_address", "Payer must not be zero.");
    }
    assertAmount(input.base_amount, "base_amount");
    assertAmount(input.extra_amount, "extra_amount");
    const confirmationAmount = input.confirmation_amount ?? 0;
    assertAmount(confirmationAmount, "confirmation_amount");

    const requestedRate = input.cashback_rate ?? -1;
    if (!Number.isInteger(requestedRate) || requestedRate < -1) {
      throw new AppError(422, "invalid_cashback_rate", "cashback_rate must be -1 or a non-negative integer.");
    }
    if (requestedRate > CASHBACK_RATE_MAX) {
      throw new AppError(422, "cashback_rate_excess", `Cashback rate must not exceed ${CASHBACK_RATE_MAX}.`);
    }

    const settings = await this.store.getSettings();
    const existing = await this.store.getPayment(input.payment_id);
    const previousStatus = existing?.status ?? "nonexistent";
    if (!isRecreatableStatus(previousStatus)) {
      throw new AppError(409, "payment_already_existent", `Payment '${input.payment_id}' already exists.`, {
        payment_id: input.payment_id,
        status: previousStatus,
      });
    }
    const revocationCounter = existing?.revocation_counter ?? 0;
    if (revocationCounter !== 0 && revocationCounter >= settings.revocation_limit) {
      throw new AppError(
        409,
        "revocation_limit_reached",
        `Payment '${input.payment_id}' was revoked ${revocationCounter} times; the limit is ${settings.revocation_limit}.`,
        { payment_id: input.payment_id, revocation_counter: revocationCounter },
      );
    }

    const sumAmount = checkedSum([input.base_amount, input.extra_amount], { payment_id: input.payment_id });
    if (confirmationAmount > sumAmount) {
      throw inappropriateConfirmationAmount(input.payment_id, confirmationAmount, sumAmount);
    }
    if (confirmationAmount > 0 && !settings.cash_out_account) {
      throw cashOutAccountNotConfigured();
    }

    const requestedSubsidy = input.subsidy_limit ?? 0;
    assertAmount(requestedSubsidy, "subsidy_limit");
    const sponsor = input.sponsor && !isZeroIdentifier(input.sponsor) && requestedSubsidy > 0 ? input.sponsor : null;
    const subsidyLimit = sponsor ? requestedSubsidy : 0;
    const cashbackActive = settings.cashback_enabled && settings.cashback_distributor !== null;
    const cashbackRate = !cashbackActive ? 0 : requestedRate < 0 ? settings.cashback_rate : requestedRate;

    assertTransition(input.payment_id, previousStatus, "active");
    const timestamp = context.nowIso();
    const correlationId = correlationOf(input);
    const payment: PaymentRecord = {
      id: input.payment_id,
      payer: input.payer,
      sponsor,
      subsidy_limit: subsidyLimit,
      base_amount: input.base_amount,
      extra_amount: input.extra_amount,
      refund_amount: 0,
      cashback_amount: 0,
      confirmed_amount: 0,
      cashback_rate: cashbackRate,
      cashback_nonce: 0,
      revocation_counter: revocationCounter,
      status: "active",
      created_at: timestamp,
      updated_at: timestamp,
    };

    const deltas = computeSettlementDeltas(
      { baseAmount: 0, extraAmount: 0, refundAmount: 0, confirmedAmount: 0, subsidyLimit },
      amountsOf(payment),
    );
    await this.settlement.settle({
      payer: payment.payer,
      sponsor: payment.sponsor,
      payerDelta: deltas.payerDelta,
      sponsorDelta: deltas.sponsorDelta,
      cashOutDelta: 0,
      cashOutAccount: settings.cash_out_account,
    });

    if (cashbackRate > 0) {
      const requested = calculateCashback(payerBaseShare(payment.base_amount, subsidyLimit), 0, cashbackRate);
      const grant = await this.cashback.grant(context, cashbackTargetOf(payment, correlationId), requested);
      if (grant.succeeded) {
        payment.cashback_amount = grant.grantedAmount;
        payment.cashback_nonce = grant.nonce;
      } else {
        payment.cashback_rate = 0;
      }
    }

    await this.store.savePayment(payment);
    const balance = await this.shiftBucket("uncleared", payment.payer, sumAmount);
    context.emit("payment.made", {
      payment_id: payment.id,
      correlation_id: correlationId,
      payer: payment.payer,
      sponsor: payment.sponsor,
      subsidized: payment.sponsor !== null,
      subsidy_limit: payment.subsidy_limit,
      base_amount: payment.base_amount,
      extra_amount: payment.extra_amount,
      payer_sum_amount: deltas.after.parts.payerSum,
      sponsor_sum_amount: deltas.after.parts.sponsorSum,
      cashback_rate: payment.cashback_rate,
      cashback_amount: payment.cashback_amount,
      revocation_counter: payment.revocation_counter,
      uncleared_balance: balance.accountBalance,
      total_uncleared_balance: balance.totalBalance,
    });

    if (confirmationAmount > 0) {
      return this.confirmAmountInternal(context, payment, confirmationAmount, correlationId);
    }
    return payment;
  }

  private async updatePaymentInternal(context: OperationContext, input: UpdatePaymentInput): Promise<PaymentRecord> {
    assertAmount(input.base_amount, "base_amount");
    assertAmount(input.extra_amount, "extra_amount");
    const payment = await this.getPaymentRecordOrThrow(input.payment_id);
    assertStatusIn(payment.id, payment.status, ["active"], "update_payment");

    const newSum = checkedSum([input.base_amount, input.extra_amount], { payment_id: payment.id });
    if (newSum < payment.refund_amount) {
      throw new AppError(
        422,
        "inappropriate_sum_amount",
        `New sum ${newSum} is below the refunded amount ${payment.refund_amount} of payment '${payment.id}'.`,
        { payment_id: payment.id, sum_amount: newSum, refund_amount: payment.refund_amount },
      );
    }

    const before = { ...payment };
    const correlationId = correlationOf(input);
    const outcome = await this.applyTransition(
      context,
      payment,
      { ...amountsOf(payment), baseAmount: input.base_amount, extraAmount: input.extra_amount },
      "recompute",
      correlationId,
    );
    this.assignAmounts(payment, outcome);
    payment.updated_at = context.nowIso();
    await this.store.savePayment(payment);

    const balance = await this.shiftBucket(
      "uncleared",
      payment.payer,
      outcome.deltas.after.remainder - outcome.deltas.before.remainder,
    );
    context.emit("payment.updated", {
      ...amountChangeData(before, payment, correlationId),
      payer_transfer: outcome.payerTransfer,
      sponsor_transfer: outcome.deltas.sponsorDelta,
      uncleared_balance: balance.accountBalance,
    });
    return payment;
  }

  private async clearInternal(context: OperationContext, paymentId: string): Promise<PaymentRecord> {
    const payment = await this.getPaymentRecordOrThrow(paymentId);
    if (payment.status === "cleared") {
      throw new AppError(409, "payment_already_cleared", `Payment '${paymentId}' is already cleared.`);
    }
    assertTransition(paymentId, payment.status, "cleared");

    const remainder = remainderOf(payment);
    const uncleared = await this.shiftBucket("uncleared", payment.payer, -remainder);
    const cleared = await this.shiftBucket("cleared", payment.payer, remainder);
    payment.status = "cleared";
    payment.updated_at = context.nowIso();
    await this.store.savePayment(payment);
    context.emit("payment.cleared", {
      payment_id: payment.id,
      payer: payment.payer,
      amount: remainder,
      uncleared_balance: uncleared.accountBalance,
      cleared_balance: cleared.accountBalance,
      total_uncleared_balance: uncleared.totalBalance,
      total_cleared_balance: cleared.totalBalance,
    });
    return payment;
  }

  private async unclearInternal(context: OperationContext, paymentId: string): Promise<PaymentRecord> {
    const payment = await this.getPaymentRecordOrThrow(paymentId);
    if (payment.status === "active") {
      throw new AppError(409, "payment_already_uncleared", `Payment '${paymentId}' is already uncleared.`);
    }
    assertStatusIn(paymentId, payment.status, ["cleared"], "unclear_payment");

    const remainder = remainderOf(payment);
    const cleared = await this.shiftBucket("cleared", payment.payer, -remainder);
    const uncleared = await this.shiftBucket("uncleared", payment.payer, remainder);
    payment.status = "active";
    payment.updated_at = context.nowIso();
    await this.store.savePayment(payment);
    context.emit("payment.uncleared", {
      payment_id: payment.id,
      payer: payment.payer,
      amount: remainder,
      uncleared_balance: uncleared.accountBalance,
      cleared_balance: cleared.accountBalance,
      total_uncleared_balance: uncleared.totalBalance,
      total_cleared_balance: cleared.totalBalance,
    });
    return payment;
  }

  private async confirmInternal(context: OperationContext, paymentId: string): Promise<PaymentRecord> {
    const payment = await this.getPaymentRecordOrThrow(paymentId);
    assertTransition(paymentId, payment.status, "confirmed");

    const remainder = remainderOf(payment);
    const transferAmount = subtractOrFail(remainder, payment.confirmed_amount, "unconfirmed remainder");
    if (transferAmount > 0) {
      const settings = await this.store.getSettings();
      await this.settlement.settle({
        payer: payment.payer,
        sponsor: payment.sponsor,
        payerDelta: 0,
        sponsorDelta: 0,
        cashOutDelta: transferAmount,
        cashOutAccount: settings.cash_out_account,
      });
    }

    const cleared = await this.shiftBucket("cleared", payment.payer, -remainder);
    payment.confirmed_amount = remainder;
    payment.status = "confirmed";
    payment.updated_at = context.nowIso();
    await this.store.savePayment(payment);
    context.emit("payment.confirmed", {
      payment_id: payment.id,
      payer: payment.payer,
      confirmed_amount: remainder,
      transferred_amount: transferAmount,
      cleared_balance: cleared.accountBalance,
      total_cleared_balance: cleared.totalBalance,
    });
    return payment;
  }

  private async confirmAmountInternal(
    context: OperationContext,
    payment: PaymentRecord,
    amount: number,
    correlationId: string | null = null,
  ): Promise<PaymentRecord> {
    assertAmount(amount, "amount");
    assertStatusIn(payment.id, payment.status, ["active", "cleared"], "confirm_payment_amount");
    if (amount === 0) {
      return payment;
    }
    const remainder = remainderOf(payment);
    const newConfirmed = checkedSum([payment.confirmed_amount, amount], { payment_id: payment.id });
    if (newConfirmed > remainder) {
      throw inappropriateConfirmationAmount(payment.id, newConfirmed, remainder);
    }

    const settings = await this.store.getSettings();
    await this.settlement.settle({
      payer: payment.payer,
      sponsor: payment.sponsor,
      payerDelta: 0,
      sponsorDelta: 0,
      cashOutDelta: amount,
      cashOutAccount: settings.cash_out_account,
    });

    const oldConfirmed = payment.confirmed_amount;
    payment.confirmed_amount = newConfirmed;
    payment.updated_at = context.nowIso();
    await this.store.savePayment(payment);
    context.emit("payment.confirmed_amount_changed", {
      payment_id: payment.id,
      correlation_id: correlationId,
      payer: payment.payer,
      old_confirmed_amount: oldConfirmed,
      new_confirmed_amount: newConfirmed,
    });
    return payment;
  }

  private async cancelInternal(
    context: OperationContext,
    input: CancelPaymentInput,
    targetStatus: CancellationKind,
  ): Promise<PaymentRecord> {
    const payment = await this.getPaymentRecordOrThrow(input.payment_id);
    if (isZeroIdentifier(input.parent_tx_hash)) {
      throw new AppError(422, "parent_tx_hash_zero", "Parent transaction hash must not be zero.");
    }
    assertStatusIn(payment.id, payment.status, ["active", "cleared"], targetStatus === "revoked" ? "revoke" : "reverse");
    assertTransition(payment.id, payment.status, targetStatus);

    const before = { ...payment };
    const bucket = balanceBucketFor(payment.status);
    const correlationId = correlationOf(input);
    const outcome = await this.applyTransition(
      context,
      payment,
      { baseAmount: 0, extraAmount: 0, refundAmount: 0, confirmedAmount: 0, subsidyLimit: payment.subsidy_limit },
      "recompute",
      correlationId,
    );

    // Base, extra and refund stay on the record as history of the cancelled payment.
    payment.confirmed_amount = 0;
    payment.cashback_amount = outcome.cashbackAmount;
    payment.status = targetStatus;
    if (targetStatus === "revoked") {
      payment.revocation_counter += 1;
    }
    payment.updated_at = context.nowIso();
    await this.store.savePayment(payment);
    await this.store.setCancellationFlag(targetStatus, input.parent_tx_hash);

    const balance = bucket
      ? await this.shiftBucket(bucket, payment.payer, -outcome.deltas.before.remainder)
      : null;
    context.emit(targetStatus === "revoked" ? "payment.revoked" : "payment.reversed", {
      payment_id: payment.id,
      correlation_id: correlationId,
      parent_tx_hash: input.parent_tx_hash,
      payer: payment.payer,
      sponsor: payment.sponsor,
      subsidized: payment.sponsor !== null,
      previous_status: before.status,
      base_amount: before.base_amount,
      extra_amount: before.extra_amount,
      refund_amount: before.refund_amount,
      old_confirmed_amount: before.confirmed_amount,
      old_cashback_amount: before.cashback_amount,
      new_cashback_amount: payment.cashback_amount,
      payer_transfer: outcome.payerTransfer,
      sponsor_transfer: outcome.deltas.sponsorDelta,
      cash_out_returned_amount: before.confirmed_amount,
      revocation_counter: payment.revocation_counter,
      ...(bucket && balance ? { [`${bucket}_balance`]: balance.accountBalance } : {}),
    });
    return payment;
  }

  private async mergeInternal(context: OperationContext, input: MergePaymentsInput): Promise<PaymentRecord> {
    assertPaymentId(input.target_payment_id);
    if (input.merged_payment_ids.length === 0) {
      throw new AppError(422, "merged_payment_id_array_empty", "At least one payment to merge is required.");
    }
    const target = await this.getPaymentRecordOrThrow(input.target_payment_id);
    assertStatusIn(target.id, target.status, ["active"], "merge_payments");
    if (target.sponsor !== null) {
      throw new AppError(409, "payment_subsidized", `Payment '${target.id}' is subsidized and cannot be merged.`);
    }

    const before = { ...target };
    const correlationId = correlationOf(input);
    const targetCashback = cashbackTargetOf(target, correlationId);
    for (const mergedId of input.merged_payment_ids) {
      assertPaymentId(mergedId);
      if (mergedId === target.id) {
        throw new AppError(
          422,
          "merged_payment_id_and_target_payment_id_equality",
          `Payment '${mergedId}' cannot be merged into itself.`,
        );
      }
      const source = await this.getPaymentRecordOrThrow(mergedId);
      assertStatusIn(source.id, source.status, ["active"], "merge_payments");
      if (source.sponsor !== null) {
        throw new AppError(409, "payment_subsidized", `Payment '${source.id}' is subsidized and cannot be merged.`);
      }
      if (source.payer !== target.payer) {
        throw new AppError(
          409,
          "merged_payment_payer_mismatch",
          `Payment '${source.id}' belongs to another payer than '${target.id}'.`,
          { payment_id: source.id, payer: source.payer, target_payer: target.payer },
        );
      }
      if (source.cashback_rate > target.cashback_rate) {
        throw new AppError(
          409,
          "merged_payment_cashback_rate_mismatch",
          `Payment '${source.id}' has a higher cashback rate than '${target.id}'.`,
          { payment_id: source.id, cashback_rate: source.cashback_rate, target_cashback_rate: target.cashback_rate },
        );
      }

      const overflowContext = { payment_id: target.id, merged_payment_id: source.id };
      const baseAmount = checkedSum([target.base_amount, source.base_amount], overflowContext);
      const extraAmount = checkedSum([target.extra_amount, source.extra_amount], overflowContext);
      checkedSum([baseAmount, extraAmount], overflowContext);

      const movedCashback = source.cashback_amount;
      if (movedCashback > 0) {
        if ((await this.settlement.processorBalance()) < movedCashback) {
          throw cashbackMergingFailure(source.id, "not_enough_balance");
        }
        const revocation = await this.cashback.revoke(
          context,
          cashbackTargetOf(source, correlationId),
          source.cashback_nonce,
          movedCashback,
        );
        if (!revocation.succeeded) {
          throw cashbackMergingFailure(source.id, "revocation_error");
        }
        const increase = await this.cashback.increase(context, targetCashback, target.cashback_nonce, movedCashback);
        if (!increase.succeeded || increase.increasedAmount !== movedCashback) {
          throw cashbackMergingFailure(source.id, "increase_error");
        }
        await this.settlement.pull(target.payer, movedCashback);
      }

      const sourceRemainder = remainderOf(source);
      target.base_amount = baseAmount;
      target.extra_amount = extraAmount;
      target.refund_amount += source.refund_amount;
      target.confirmed_amount += source.confirmed_amount;
      target.cashback_amount += movedCashback;

      assertTransition(source.id, source.status, "merged");
      source.status = "merged";
      source.cashback_amount = 0;
      source.updated_at = context.nowIso();
      await this.store.savePayment(source);
      await this.shiftBucket("uncleared", source.payer, -sourceRemainder);
      await this.shiftBucket("uncleared", target.payer, sourceRemainder);
    }

    target.updated_at = context.nowIso();
    await this.store.savePayment(target);
    context.emit("payments.merged", {
      ...amountChangeData(before, target, correlationId),
      merged_payment_ids: [...input.merged_payment_ids],
    });
    return target;
  }

  /**
   * Moves a payment from its current amounts to `next`: requests a cashback increase first, settles
   * payer, sponsor and cash-out, and revokes surplus cashback last. The payment record is left as is.
   */
  private async applyTransition(
    context: OperationContext,
    payment: PaymentRecord,
    next: PaymentAmounts,
    policy: CashbackPolicy,
    correlationId: string | null,
  ): Promise<TransitionOutcome> {
    const nextRemainder = subtractOrFail(
      next.baseAmount + next.extraAmount,
      next.refundAmount,
      "next payment remainder",
    );
    const amounts: PaymentAmounts = {
      ...next,
      confirmedAmount: Math.min(next.confirmedAmount, nextRemainder),
    };
    const deltas = computeSettlementDeltas(amountsOf(payment), amounts);

    const entitledCashback = payment.cashback_rate > 0
      ? calculateCashback(
        payerBaseShare(amounts.baseAmount, amounts.subsidyLimit),
        deltas.after.refundParts.payerRefund,
        payment.cashback_rate,
      )
      : 0;
    let cashbackRequested = entitledCashback - payment.cashback_amount;
    if (policy === "decrease_only" && cashbackRequested > 0) {
      cashbackRequested = 0;
    }

    const target = cashbackTargetOf(payment, correlationId);
    let cashbackAmount = payment.cashback_amount;
    if (cashbackRequested > 0) {
      const increase = await this.cashback.increase(context, target, payment.cashback_nonce, cashbackRequested);
      cashbackAmount += increase.increasedAmount;
    }

    // The payer pays back the cashback being revoked, whether or not the distributor accepts it.
    const payerTransfer = deltas.payerDelta + Math.min(cashbackRequested, 0);
    const settings = await this.store.getSettings();
    await this.settlement.settle({
      payer: payment.payer,
      sponsor: payment.sponsor,
      payerDelta: payerTransfer,
      sponsorDelta: deltas.sponsorDelta,
      cashOutDelta: deltas.cashOutDelta,
      cashOutAccount: settings.cash_out_account,
    });

    if (cashbackRequested < 0) {
      const revocation = await this.cashback.revoke(context, target, payment.cashback_nonce, -cashbackRequested);
      cashbackAmount = subtractOrFail(cashbackAmount, revocation.revokedAmount, "cashback amount");
    }

    return { amounts, deltas, payerTransfer, cashbackAmount, cashbackRequested };
  }

  private assignAmounts(payment: PaymentRecord, outcome: TransitionOutcome): void {
    payment.base_amount = outcome.amounts.baseAmount;
    payment.extra_amount = outcome.amounts.extraAmount;
    payment.refund_amount = outcome.amounts.refundAmount;
    payment.confirmed_amount = outcome.amounts.confirmedAmount;
    payment.cashback_amount = outcome.cashbackAmount;
  }

  private async shiftBucket(bucket: BalanceBucket, account: string, delta: number): Promise<BalanceChangeResult> {
    if (delta === 0) {
      return {
        accountBalance: await this.store.getAccountBalance(bucket, account),
        totalBalance: await this.store.getTotalBalance(bucket),
      };
    }
    return this.store.applyBalanceDelta(bucket, account, delta);
  }

  private async getPaymentRecordOrThrow(paymentId: string): Promise<PaymentRecord> {
    assertPaymentId(paymentId);
    const payment = await this.store.getPayment(paymentId);
    if (!payment || payment.status === "nonexistent") {
      throw paymentNonExistent(paymentId);
    }
    return payment;
  }

  private mapPayment(payment: PaymentRecord): PaymentResponse {
    const sumAmount = payment.base_amount + payment.extra_amount;
    return {
      id: payment.id,
      status: payment.status,
      payer: payment.payer,
      sponsor: payment.sponsor,
      subsidized: payment.sponsor !== null,
      subsidy_limit: payment.subsidy_limit,
      base_amount: payment.base_amount,
      extra_amount: payment.extra_amount,
      sum_amount: sumAmount,
      refund_amount: payment.refund_amount,
      remainder: LIVE_STATUSES.includes(payment.status) ? sumAmount - payment.refund_amount : 0,
      confirmed_amount: payment.confirmed_amount,
      cashback_amount: payment.cashback_amount,
      compensation_amount: payment.refund_amount + payment.cashback_amount,
      cashback_rate: payment.cashback_rate,
      revocation_counter: payment.revocation_counter,
      created_at: payment.created_at,
      updated_at: payment.updated_at,
    };
  }
}
