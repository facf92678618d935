import { beforeEach, describe, expect, it } from "vitest";
import {
  CASH_OUT,
  DISTRIBUTOR,
  OTHER_PAYER,
  PAYER,
  PROCESSOR,
  SPONSOR,
  createLedgerHarness,
  type LedgerHarness,
} from "./support/ledger-harness.js";

async function expectAppError(promise: Promise<unknown>, statusCode: number, code: string): Promise<void> {
  await expect(promise).rejects.toMatchObject({ name: "AppError", statusCode, code });
}

describe("PaymentEngine", () => {
  let harness: LedgerHarness;

  beforeEach(async () => {
    harness = await createLedgerHarness();
  });

  describe("making payments", () => {
    it("pulls the payment sum from the payer and books it as uncleared", async () => {
      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 200_000,
        cashback_rate: 0,
      });

      expect(payment).toMatchObject({
        id: "pay-1",
        status: "active",
        sponsor: null,
        subsidized: false,
        sum_amount: 1_200_000,
        remainder: 1_200_000,
        cashback_amount: 0,
        cashback_rate: 0,
        created_at: "2026-01-01T00:00:00.000Z",
      });
      expect(await harness.balance(PAYER)).toBe(8_800_000);
      expect(await harness.balance(PROCESSOR)).toBe(1_200_000);
      expect(await harness.engine.getAccountBalances(PAYER)).toEqual({
        account: PAYER,
        uncleared: 1_200_000,
        cleared: 0,
      });

      const [made] = harness.eventsFor("pay-1");
      expect(made?.type).toBe("payment.made");
      expect(made?.data.uncleared_balance).toBe(1_200_000);
      expect(made?.data.payer_sum_amount).toBe(1_200_000);
    });

    it("grants cashback at the default rate on the payer base amount", async () => {
      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 200_000,
      });

      expect(payment.cashback_rate).toBe(100);
      expect(payment.cashback_amount).toBe(100_000);
      expect(payment.compensation_amount).toBe(100_000);
      expect(await harness.balance(PAYER)).toBe(8_900_000);
      expect(await harness.engine.getCashback("pay-1")).toEqual({ payment_id: "pay-1", last_cashback_nonce: 1 });
      expect(harness.eventsFor("pay-1").map((event) => event.type)).toEqual(["cashback.sent", "payment.made"]);
    });

    it("makes common payments at the default rate without a sponsor", async () => {
      const payment = await harness.engine.makeCommonPayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 500_000,
        extra_amount: 0,
      });

      expect(payment.cashback_amount).toBe(50_000);
      expect(payment.subsidized).toBe(false);
    });

    it("uses a zero rate while cashback is disabled", async () => {
      await harness.engine.disableCashback();

      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
        cashback_rate: 200,
      });

      expect(payment.cashback_rate).toBe(0);
      expect(payment.cashback_amount).toBe(0);
      expect(harness.distributor.getCalls()).toEqual([]);
    });

    it("keeps the payment when the distributor refuses the grant", async () => {
      harness.distributor.configure({ sendEnabled: false });

      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
      });

      expect(payment.status).toBe("active");
      expect(payment.cashback_rate).toBe(0);
      expect(payment.cashback_amount).toBe(0);
      expect(await harness.balance(PAYER)).toBe(9_000_000);
      expect(harness.eventsFor("pay-1").map((event) => event.type)).toEqual(["cashback.send_failed", "payment.made"]);
    });

    it("splits a subsidized payment between payer and sponsor", async () => {
      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        sponsor: SPONSOR,
        subsidy_limit: 400_000,
        base_amount: 1_000_000,
        extra_amount: 200_000,
        cashback_rate: 0,
      });

      expect(payment.subsidized).toBe(true);
      expect(payment.subsidy_limit).toBe(400_000);
      expect(await harness.balance(PAYER)).toBe(9_200_000);
      expect(await harness.balance(SPONSOR)).toBe(9_600_000);
      expect(await harness.balance(PROCESSOR)).toBe(1_200_000);
    });

    it("ignores a sponsor without a subsidy limit", async () => {
      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        sponsor: SPONSOR,
        base_amount: 1_000_000,
        extra_amount: 0,
        cashback_rate: 0,
      });

      expect(payment.sponsor).toBeNull();
      expect(payment.subsidy_limit).toBe(0);
      expect(await harness.balance(SPONSOR)).toBe(10_000_000);
    });

    it("confirms part of a new payment right away", async () => {
      const payment = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
        cashback_rate: 0,
        confirmation_amount: 300_000,
      });

      expect(payment.confirmed_amount).toBe(300_000);
      expect(await harness.balance(CASH_OUT)).toBe(300_000);
      expect(await harness.balance(PROCESSOR)).toBe(700_000);
      expect(harness.eventsFor("pay-1").map((event) => event.type)).toEqual([
        "payment.made",
        "payment.confirmed_amount_changed",
      ]);
    });

    it("rejects invalid payments", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 100, extra_amount: 0 });

      await expectAppError(
        harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 100, extra_amount: 0 }),
        409,
        "payment_already_existent",
      );
      await expectAppError(
        harness.engine.makeCommonPayment({ payment_id: "0x00", payer: PAYER, base_amount: 100, extra_amount: 0 }),
        422,
        "payment_zero_id",
      );
      await expectAppError(
        harness.engine.makeCommonPayment({ payment_id: "pay-2", payer: "0x000", base_amount: 100, extra_amount: 0 }),
        422,
        "payer_zero_address",
      );
      await expectAppError(
        harness.engine.makePayment({
          payment_id: "pay-2",
          payer: PAYER,
          base_amount: 100,
          extra_amount: 0,
          cashback_rate: 251,
        }),
        422,
        "cashback_rate_excess",
      );
      await expectAppError(
        harness.engine.makePayment({
          payment_id: "pay-2",
          payer: PAYER,
          base_amount: 100,
          extra_amount: 0,
          confirmation_amount: 101,
        }),
        422,
        "inappropriate_confirmation_amount",
      );
      await expectAppError(
        harness.engine.makePayment({
          payment_id: "pay-2",
          payer: PAYER,
          base_amount: Number.MAX_SAFE_INTEGER,
          extra_amount: 1,
        }),
        422,
        "overflow_of_sum_amount",
      );
    });

    it("rolls back when the payer cannot cover the payment", async () => {
      await expectAppError(
        harness.engine.makePayment({
          payment_id: "pay-1",
          payer: PAYER,
          base_amount: 20_000_000,
          extra_amount: 0,
        }),
        409,
        "insufficient_balance",
      );

      expect(harness.rollbacks).toEqual([{ operation: "make_payment", code: "insufficient_balance" }]);
      await expectAppError(harness.engine.getPayment("pay-1"), 404, "payment_non_existent");
      expect(await harness.balance(PAYER)).toBe(10_000_000);
      expect(await harness.engine.getTotalBalances()).toEqual({ uncleared: 0, cleared: 0 });
      expect(harness.eventsFor("pay-1")).toEqual([]);
    });
  });

  describe("updating payments", () => {
    it("collects the difference and increases cashback before pulling funds", async () => {
      await harness.engine.makePayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });

      const payment = await harness.engine.updatePayment({
        payment_id: "pay-1",
        base_amount: 2_000_000,
        extra_amount: 0,
      });

      expect(payment.base_amount).toBe(2_000_000);
      expect(payment.cashback_amount).toBe(200_000);
      expect(await harness.balance(PAYER)).toBe(8_200_000);
      expect(await harness.balance(PROCESSOR)).toBe(2_000_000);
      expect(harness.distributor.getOutstanding(1)).toBe(200_000);
      expect((await harness.engine.getAccountBalances(PAYER)).uncleared).toBe(2_000_000);

      const updated = harness.eventsFor("pay-1").find((event) => event.type === "payment.updated");
      expect(updated?.data).toMatchObject({
        old_base_amount: 1_000_000,
        new_base_amount: 2_000_000,
        old_cashback_amount: 100_000,
        new_cashback_amount: 200_000,
        payer_transfer: -1_000_000,
      });
    });

    it("returns funds and revokes cashback when the amount shrinks", async () => {
      await harness.engine.makePayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });

      const payment = await harness.engine.updatePayment({ payment_id: "pay-1", base_amount: 400_000, extra_amount: 0 });

      expect(payment.cashback_amount).toBe(40_000);
      expect(await harness.balance(PAYER)).toBe(9_640_000);
      expect(await harness.balance(PROCESSOR)).toBe(400_000);
      expect(harness.distributor.getOutstanding(1)).toBe(40_000);
    });

    it("computes later cashback changes from a partially granted amount", async () => {
      harness.distributor.configure({ sendCap: 30_000 });
      const made = await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
      });
      expect(made.cashback_amount).toBe(30_000);

      const payment = await harness.engine.updatePayment({ payment_id: "pay-1", base_amount: 500_000, extra_amount: 0 });

      expect(payment.cashback_amount).toBe(50_000);
      expect(harness.distributor.getCalls()).toEqual([
        { operation: "send", nonce: 1, requested: 100_000, succeeded: true, amount: 30_000 },
        { operation: "increase", nonce: 1, requested: 20_000, succeeded: true, amount: 20_000 },
      ]);
      expect(await harness.balance(PAYER)).toBe(9_550_000);
      expect(await harness.balance(PROCESSOR)).toBe(500_000);
    });

    it("keeps the cashback when the distributor refuses the revocation of a shrinking payment", async () => {
      await harness.engine.makePayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });
      harness.distributor.configure({ revokeEnabled: false });

      const payment = await harness.engine.updatePayment({ payment_id: "pay-1", base_amount: 400_000, extra_amount: 0 });

      expect(payment.cashback_amount).toBe(100_000);
      expect(await harness.balance(PAYER)).toBe(9_640_000);
      expect(await harness.balance(PROCESSOR)).toBe(460_000);
      expect(harness.distributor.getOutstanding(1)).toBe(100_000);
      expect(harness.eventsFor("pay-1").map((event) => event.type)).toContain("cashback.revoke_failed");
    });

    it("rejects updates of cleared payments and sums below the refunded amount", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 });
      await harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 600 });

      await expectAppError(
        harness.engine.updatePayment({ payment_id: "pay-1", base_amount: 500, extra_amount: 0 }),
        422,
        "inappropriate_sum_amount",
      );

      await harness.engine.clearPayment("pay-1");
      await expectAppError(
        harness.engine.updatePayment({ payment_id: "pay-1", base_amount: 2_000, extra_amount: 0 }),
        409,
        "inappropriate_payment_status",
      );
    });

    it("updates lazily and confirms in one step", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });

      const unchanged = await harness.engine.updateLazyAndConfirmPayment({
        payment_id: "pay-1",
        base_amount: 1_000_000,
        extra_amount: 0,
        confirmation_amount: 300_000,
      });
      expect(unchanged.confirmed_amount).toBe(300_000);
      expect(harness.eventsFor("pay-1").map((event) => event.type)).toEqual([
        "cashback.sent",
        "payment.made",
        "payment.confirmed_amount_changed",
      ]);

      const changed = await harness.engine.updateLazyAndConfirmPayment({
        payment_id: "pay-1",
        base_amount: 1_000_000,
        extra_amount: 100_000,
        confirmation_amount: 0,
      });
      expect(changed.sum_amount).toBe(1_100_000);
      expect(changed.confirmed_amount).toBe(300_000);
      expect(harness.eventsFor("pay-1").at(-1)?.type).toBe("payment.updated");
    });
  });

  describe("clearing and confirming", () => {
    beforeEach(async () => {
      await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 200_000,
        cashback_rate: 0,
      });
    });

    it("moves the remainder between the uncleared and cleared buckets", async () => {
      const cleared = await harness.engine.clearPayment("pay-1");
      expect(cleared.status).toBe("cleared");
      expect(await harness.engine.getTotalBalances()).toEqual({ uncleared: 0, cleared: 1_200_000 });
      await expectAppError(harness.engine.clearPayment("pay-1"), 409, "payment_already_cleared");

      const uncleared = await harness.engine.unclearPayment("pay-1");
      expect(uncleared.status).toBe("active");
      expect(await harness.engine.getTotalBalances()).toEqual({ uncleared: 1_200_000, cleared: 0 });
      await expectAppError(harness.engine.unclearPayment("pay-1"), 409, "payment_already_uncleared");
    });

    it("sends the unconfirmed remainder to the cash-out account", async () => {
      await harness.engine.clearPayment("pay-1");
      const confirmed = await harness.engine.confirmPayment("pay-1");

      expect(confirmed.status).toBe("confirmed");
      expect(confirmed.confirmed_amount).toBe(1_200_000);
      expect(confirmed.remainder).toBe(1_200_000);
      expect(await harness.balance(CASH_OUT)).toBe(1_200_000);
      expect(await harness.balance(PROCESSOR)).toBe(0);
      expect(await harness.engine.getTotalBalances()).toEqual({ uncleared: 0, cleared: 0 });
    });

    it("only confirms cleared payments", async () => {
      await expectAppError(harness.engine.confirmPayment("pay-1"), 409, "inappropriate_payment_status");
    });

    it("clears and confirms batches atomically", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-2", payer: OTHER_PAYER, base_amount: 300_000, extra_amount: 0 });

      await expectAppError(harness.engine.clearPayments(["pay-1", "pay-missing"]), 404, "payment_non_existent");
      expect((await harness.engine.getPayment("pay-1")).status).toBe("active");
      await expectAppError(harness.engine.clearPayments([]), 422, "payment_id_array_empty");

      const confirmed = await harness.engine.clearAndConfirmPayments(["pay-1", "pay-2"]);
      expect(confirmed.map((payment) => payment.status)).toEqual(["confirmed", "confirmed"]);
      expect(await harness.balance(CASH_OUT)).toBe(1_500_000);
    });

    it("confirms amounts across payments", async () => {
      const [payment] = await harness.engine.confirmPaymentAmounts([
        { payment_id: "pay-1", amount: 200_000 },
        { payment_id: "pay-1", amount: 0 },
      ]);
      expect(payment?.confirmed_amount).toBe(200_000);
      await expectAppError(harness.engine.confirmPaymentAmounts([]), 422, "payment_confirmation_array_empty");
    });

    it("requires a cash-out account to confirm", async () => {
      const bare = await createLedgerHarness({ cashOut: false, cashback: false });
      await bare.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 });

      await expectAppError(
        bare.engine.confirmPaymentAmount("pay-1", 500),
        409,
        "cash_out_account_not_configured",
      );
    });
  });

  describe("refunds", () => {
    it("splits a refund between payer and sponsor by the subsidy share", async () => {
      await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        sponsor: SPONSOR,
        subsidy_limit: 400_000,
        base_amount: 1_000_000,
        extra_amount: 200_000,
        cashback_rate: 0,
      });

      const payment = await harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 500_000 });

      expect(payment.refund_amount).toBe(500_000);
      expect(payment.remainder).toBe(700_000);
      expect(await harness.balance(PAYER)).toBe(9_500_000);
      expect(await harness.balance(SPONSOR)).toBe(9_800_000);
      expect(await harness.balance(PROCESSOR)).toBe(700_000);

      const refunded = harness.eventsFor("pay-1").find((event) => event.type === "payment.refunded");
      expect(refunded?.data).toMatchObject({
        refunding_amount: 500_000,
        payer_refund_amount: 300_000,
        sponsor_refund_amount: 200_000,
        uncleared_balance: 700_000,
      });
    });

    it("keeps the revoked cashback from the payer refund", async () => {
      await harness.engine.makePayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });

      const payment = await harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 300_000 });

      expect(payment.cashback_amount).toBe(70_000);
      expect(payment.compensation_amount).toBe(370_000);
      expect(await harness.balance(PAYER)).toBe(9_370_000);
      expect(await harness.balance(PROCESSOR)).toBe(700_000);
      expect(harness.distributor.getOutstanding(1)).toBe(70_000);
    });

    it("keeps the cashback on record when the distributor refuses the revocation", async () => {
      await harness.engine.makePayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });
      harness.distributor.configure({ revokeEnabled: false });

      const payment = await harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 300_000 });

      expect(payment.cashback_amount).toBe(100_000);
      expect(await harness.balance(PAYER)).toBe(9_370_000);
      expect(await harness.balance(PROCESSOR)).toBe(730_000);
      expect(harness.eventsFor("pay-1").map((event) => event.type)).toContain("cashback.revoke_failed");
    });

    it("takes the refund of a confirmed payment back from the cash-out account", async () => {
      await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
        cashback_rate: 0,
      });
      await harness.engine.clearAndConfirmPayment("pay-1");
      expect(await harness.balance(CASH_OUT)).toBe(1_000_000);

      const payment = await harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 400_000 });

      expect(payment.status).toBe("confirmed");
      expect(payment.confirmed_amount).toBe(600_000);
      expect(await harness.balance(CASH_OUT)).toBe(600_000);
      expect(await harness.balance(PROCESSOR)).toBe(0);
      expect(await harness.balance(PAYER)).toBe(9_400_000);
    });

    it("clamps the confirmed amount to the new remainder", async () => {
      await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
        cashback_rate: 0,
      });
      await harness.engine.confirmPaymentAmount("pay-1", 400_000);

      const payment = await harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 800_000 });

      expect(payment.confirmed_amount).toBe(200_000);
      expect(await harness.balance(CASH_OUT)).toBe(200_000);
      expect(await harness.balance(PROCESSOR)).toBe(0);
      expect(await harness.balance(PAYER)).toBe(9_800_000);
      expect((await harness.engine.getAccountBalances(PAYER)).uncleared).toBe(200_000);
      await expectAppError(
        harness.engine.confirmPaymentAmount("pay-1", 1),
        422,
        "inappropriate_confirmation_amount",
      );
    });

    it("rejects refunds beyond the payment sum", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 200 });

      await expectAppError(
        harness.engine.refundPayment({ payment_id: "pay-1", refund_amount: 1_201 }),
        422,
        "inappropriate_refunding_amount",
      );
    });

    it("refunds an account from the cash-out balance", async () => {
      harness.ledger.mint(CASH_OUT, 500_000);

      const result = await harness.engine.refundAccount({ account: "customer-9", amount: 200_000 });

      expect(result).toEqual({ account: "customer-9", amount: 200_000 });
      expect(await harness.balance("customer-9")).toBe(200_000);
      expect(await harness.balance(CASH_OUT)).toBe(300_000);
      const [event] = harness.eventBus.getPublishedEvents().filter((item) => item.type === "account.refunded");
      expect(event?.data).toEqual({
        account: "customer-9",
        amount: 200_000,
        cash_out_account: CASH_OUT,
        correlation_id: null,
      });
      await expectAppError(
        harness.engine.refundAccount({ account: "0x0", amount: 1 }),
        422,
        "account_zero_address",
      );
    });
  });

  describe("cancellations", () => {
    it("revokes a payment, returns its funds and lets it be made again", async () => {
      await harness.engine.makePayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000_000, extra_amount: 0 });

      const revoked = await harness.engine.revokePayment({ payment_id: "pay-1", parent_tx_hash: "tx-1" });

      expect(revoked).toMatchObject({
        status: "revoked",
        base_amount: 1_000_000,
        remainder: 0,
        confirmed_amount: 0,
        cashback_amount: 0,
        revocation_counter: 1,
      });
      expect(await harness.balance(PAYER)).toBe(10_000_000);
      expect(await harness.balance(PROCESSOR)).toBe(0);
      expect(await harness.engine.getTotalBalances()).toEqual({ uncleared: 0, cleared: 0 });
      expect(await harness.engine.isPaymentRevoked("tx-1")).toBe(true);
      expect(await harness.engine.isPaymentReversed("tx-1")).toBe(false);

      const remade = await harness.engine.makeCommonPayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 500_000,
        extra_amount: 0,
      });
      expect(remade.status).toBe("active");
      expect(remade.revocation_counter).toBe(1);
    });

    it("stops making a payment again once the revocation limit is reached", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 });
      await harness.engine.revokePayment({ payment_id: "pay-1", parent_tx_hash: "tx-1" });
      await harness.engine.setRevocationLimit(1);

      await expectAppError(
        harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 }),
        409,
        "revocation_limit_reached",
      );
    });

    it("refuses revocations under a zero limit", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 });
      await harness.engine.setRevocationLimit(0);

      await expectAppError(
        harness.engine.revokePayment({ payment_id: "pay-1", parent_tx_hash: "tx-1" }),
        409,
        "revocation_limit_zero",
      );
    });

    it("reverses a cleared payment and recovers confirmed funds", async () => {
      await harness.engine.makePayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 200_000,
        cashback_rate: 0,
      });
      await harness.engine.clearPayment("pay-1");
      await harness.engine.confirmPaymentAmount("pay-1", 500_000);

      const reversed = await harness.engine.reversePayment({ payment_id: "pay-1", parent_tx_hash: "tx-9" });

      expect(reversed.status).toBe("reversed");
      expect(reversed.confirmed_amount).toBe(0);
      expect(await harness.balance(PAYER)).toBe(10_000_000);
      expect(await harness.balance(CASH_OUT)).toBe(0);
      expect(await harness.balance(PROCESSOR)).toBe(0);
      expect(await harness.engine.getTotalBalances()).toEqual({ uncleared: 0, cleared: 0 });
      expect(await harness.engine.isPaymentReversed("tx-9")).toBe(true);

      const event = harness.eventsFor("pay-1").find((item) => item.type === "payment.reversed");
      expect(event?.data).toMatchObject({ previous_status: "cleared", cash_out_returned_amount: 500_000 });

      await expectAppError(
        harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1, extra_amount: 0 }),
        409,
        "payment_already_existent",
      );
    });

    it("rejects a zero parent transaction hash", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 });

      await expectAppError(
        harness.engine.reversePayment({ payment_id: "pay-1", parent_tx_hash: "0x0000" }),
        422,
        "parent_tx_hash_zero",
      );
    });
  });

  describe("merging", () => {
    beforeEach(async () => {
      await harness.engine.makeCommonPayment({
        payment_id: "pay-target",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
      });
      await harness.engine.makeCommonPayment({
        payment_id: "pay-source",
        payer: PAYER,
        base_amount: 500_000,
        extra_amount: 0,
      });
    });

    it("absorbs the source payment and moves its cashback to the target", async () => {
      expect(await harness.balance(PAYER)).toBe(8_650_000);

      const target = await harness.engine.mergePayments({
        target_payment_id: "pay-target",
        merged_payment_ids: ["pay-source"],
      });

      expect(target.base_amount).toBe(1_500_000);
      expect(target.cashback_amount).toBe(150_000);
      expect(await harness.balance(PAYER)).toBe(8_650_000);
      expect(await harness.balance(PROCESSOR)).toBe(1_500_000);
      expect(harness.distributor.getOutstanding(1)).toBe(150_000);
      expect(harness.distributor.getOutstanding(2)).toBe(0);

      const source = await harness.engine.getPayment("pay-source");
      expect(source.status).toBe("merged");
      expect(source.remainder).toBe(0);
      expect((await harness.engine.getAccountBalances(PAYER)).uncleared).toBe(1_500_000);

      const merged = harness.eventBus.getPublishedEvents().filter((event) => event.type === "payments.merged");
      expect(merged).toHaveLength(1);
      expect(merged[0]?.data.merged_payment_ids).toEqual(["pay-source"]);
    });

    it("rolls everything back when the cashback increase fails", async () => {
      harness.distributor.configure({ increaseEnabled: false });

      await expect(
        harness.engine.mergePayments({ target_payment_id: "pay-target", merged_payment_ids: ["pay-source"] }),
      ).rejects.toMatchObject({
        code: "cashback_merging_failure",
        details: { payment_id: "pay-source", failure_kind: "increase_error" },
      });

      expect((await harness.engine.getPayment("pay-source")).status).toBe("active");
      expect(harness.distributor.getOutstanding(2)).toBe(50_000);
      expect(await harness.balance(PROCESSOR)).toBe(1_500_000);
    });

    it("reports a refused revocation of the source cashback", async () => {
      harness.distributor.configure({ revokeEnabled: false });

      await expect(
        harness.engine.mergePayments({ target_payment_id: "pay-target", merged_payment_ids: ["pay-source"] }),
      ).rejects.toMatchObject({ details: { failure_kind: "revocation_error" } });
    });

    it("rejects merges across payers, into itself and of subsidized payments", async () => {
      await harness.engine.makeCommonPayment({ payment_id: "pay-other", payer: OTHER_PAYER, base_amount: 1_000, extra_amount: 0 });
      await harness.engine.makePayment({
        payment_id: "pay-sponsored",
        payer: PAYER,
        sponsor: SPONSOR,
        subsidy_limit: 100,
        base_amount: 1_000,
        extra_amount: 0,
      });

      await expectAppError(
        harness.engine.mergePayments({ target_payment_id: "pay-target", merged_payment_ids: ["pay-other"] }),
        409,
        "merged_payment_payer_mismatch",
      );
      await expectAppError(
        harness.engine.mergePayments({ target_payment_id: "pay-target", merged_payment_ids: ["pay-target"] }),
        422,
        "merged_payment_id_and_target_payment_id_equality",
      );
      await expectAppError(
        harness.engine.mergePayments({ target_payment_id: "pay-target", merged_payment_ids: ["pay-sponsored"] }),
        409,
        "payment_subsidized",
      );
      await expectAppError(
        harness.engine.mergePayments({ target_payment_id: "pay-target", merged_payment_ids: [] }),
        422,
        "merged_payment_id_array_empty",
      );
    });

    it("rejects sources with a higher cashback rate than the target", async () => {
      await harness.engine.makePayment({
        payment_id: "pay-plain",
        payer: PAYER,
        base_amount: 1_000,
        extra_amount: 0,
        cashback_rate: 0,
      });

      await expectAppError(
        harness.engine.mergePayments({ target_payment_id: "pay-plain", merged_payment_ids: ["pay-source"] }),
        409,
        "merged_payment_cashback_rate_mismatch",
      );
    });
  });

  describe("settings", () => {
    it("rejects settings that do not change anything", async () => {
      await expectAppError(harness.engine.setCashOutAccount(CASH_OUT), 409, "cash_out_account_unchanged");
      await expectAppError(harness.engine.setCashbackDistributor(DISTRIBUTOR), 409, "cashback_distributor_already_configured");
      await expectAppError(harness.engine.setCashbackRate(100), 409, "cashback_rate_unchanged");
      await expectAppError(harness.engine.enableCashback(), 409, "cashback_already_enabled");

      await harness.engine.disableCashback();
      await expectAppError(harness.engine.disableCashback(), 409, "cashback_already_disabled");
    });

    it("validates settings values", async () => {
      await expectAppError(harness.engine.setCashbackRate(251), 422, "cashback_rate_excess");
      await expectAppError(harness.engine.setRevocationLimit(256), 422, "invalid_revocation_limit");
      await expectAppError(harness.engine.setCashbackDistributor("0x0"), 422, "cashback_distributor_zero_address");
    });

    it("needs a distributor before cashback can be enabled", async () => {
      const bare = await createLedgerHarness({ cashback: false });
      await expectAppError(bare.engine.enableCashback(), 409, "cashback_distributor_not_configured");
    });

    it("applies a changed default rate to new payments", async () => {
      const settings = await harness.engine.setCashbackRate(50);
      expect(settings.cashback_rate).toBe(50);

      const payment = await harness.engine.makeCommonPayment({
        payment_id: "pay-1",
        payer: PAYER,
        base_amount: 1_000_000,
        extra_amount: 0,
      });
      expect(payment.cashback_amount).toBe(50_000);
    });

    it("clears the cash-out account with null", async () => {
      const settings = await harness.engine.setCashOutAccount(null);
      expect(settings.cash_out_account).toBeNull();
      expect((await harness.engine.getSettings()).cash_out_account).toBeNull();
    });
  });

  it("audits bucket balances against payment remainders", async () => {
    await harness.engine.makeCommonPayment({ payment_id: "pay-1", payer: PAYER, base_amount: 1_000, extra_amount: 0 });
    await harness.engine.makeCommonPayment({ payment_id: "pay-2", payer: OTHER_PAYER, base_amount: 2_000, extra_amount: 0 });
    await harness.engine.clearPayment("pay-2");

    expect(await harness.engine.auditBalances()).toEqual({
      ok: true,
      totals: { uncleared: 1_000, cleared: 2_000 },
      account_sums: { uncleared: 1_000, cleared: 2_000 },
      payment_sums: { uncleared: 1_000, cleared: 2_000 },
      mismatched_accounts: [],
    });
  });
});
