import type {
  BalanceBucket,
  CancellationKind,
  LedgerSettings,
  PaymentRecord,
} from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type {
  AccountBucketBalance,
  BalanceChangeResult,
  PaymentListInput,
  PaymentStorePort,
} from "../../ports/payment-store.js";
import type { TransactionalResource } from "../../ports/transaction.js";

interface StoreState {
  payments: Map<string, PaymentRecord>;
  accountBalances: Map<string, number>;
  totals: Record<BalanceBucket, number>;
  cancellationFlags: Set<string>;
  settings: LedgerSettings;
}

function balanceKey(bucket: BalanceBucket, account: string): string {
  return `${bucket}:${account}`;
}

function cloneState(state: StoreState): StoreState {
  return {
    payments: new Map([...state.payments.entries()].map(([id, payment]) => [id, { ...payment }])),
    accountBalances: new Map(state.accountBalances),
    totals: { ...state.totals },
    cancellationFlags: new Set(state.cancellationFlags),
    settings: { ...state.settings },
  };
}

export class InMemoryPaymentStore implements PaymentStorePort, TransactionalResource {
  private state: StoreState;
  private snapshot: StoreState | null = null;

  constructor(initialSettings: LedgerSettings) {
    this.state = {
      payments: new Map(),
      accountBalances: new Map(),
      totals: { uncleared: 0, cleared: 0 },
      cancellationFlags: new Set(),
      settings: { ...initialSettings },
    };
  }

  async begin(): Promise<void> {
    if (this.snapshot) {
      throw new AppError(500, "transaction_already_open", "Payment store transaction is already open.");
    }
    this.snapshot = cloneState(this.state);
  }

  async commit(): Promise<void> {
    this.snapshot = null;
  }

  async rollback(): Promise<void> {
    if (this.snapshot) {
      this.state = this.snapshot;
      this.snapshot = null;
    }
  }

  async getPayment(id: string): Promise<PaymentRecord | null> {
    const payment = this.state.payments.get(id);
    return payment ? { ...payment } : null;
  }

  async savePayment(payment: PaymentRecord): Promise<void> {
    this.state.payments.set(payment.id, { ...payment });
  }

  async listPayments(input: PaymentListInput): Promise<PaymentRecord[]> {
    return [...this.state.payments.values()]
      .filter((payment) => {
        if (input.payer && payment.payer !== input.payer) {
          return false;
        }
        if (input.statuses && !input.statuses.includes(payment.status)) {
          return false;
        }
        return true;
      })
      .map((payment) => ({ ...payment }));
  }

  async applyBalanceDelta(bucket: BalanceBucket, account: string, delta: number): Promise<BalanceChangeResult> {
    const key = balanceKey(bucket, account);
    const accountBalance = (this.state.accountBalances.get(key) ?? 0) + delta;
    const totalBalance = this.state.totals[bucket] + delta;
    if (accountBalance < 0 || totalBalance < 0) {
      throw new AppError(
        500,
        "ledger_invariant_violation",
        `Balance of bucket '${bucket}' would become negative for account '${account}'.`,
      );
    }
    if (accountBalance === 0) {
      this.state.accountBalances.delete(key);
    } else {
      this.state.accountBalances.set(key, accountBalance);
    }
    this.state.totals[bucket] = totalBalance;
    return { accountBalance, totalBalance };
  }

  async getAccountBalance(bucket: BalanceBucket, account: string): Promise<number> {
    return this.state.accountBalances.get(balanceKey(bucket, account)) ?? 0;
  }

  async getTotalBalance(bucket: BalanceBucket): Promise<number> {
    return this.state.totals[bucket];
  }

  async listAccountBalances(): Promise<AccountBucketBalance[]> {
    const result: AccountBucketBalance[] = [];
    for (const [key, amount] of this.state.accountBalances.entries()) {
      const separator = key.indexOf(":");
      const bucket = key.slice(0, separator);
      if (bucket !== "uncleared" && bucket !== "cleared") {
        continue;
      }
      result.push({ bucket, account: key.slice(separator + 1), amount });
    }
    return result;
  }

  async hasCancellationFlag(kind: CancellationKind, reference: string): Promise<boolean> {
    return this.state.cancellationFlags.has(`${kind}:${reference}`);
  }

  async setCancellationFlag(kind: CancellationKind, reference: string): Promise<void> {
    this.state.cancellationFlags.add(`${kind}:${reference}`);
  }

  async getSettings(): Promise<LedgerSettings> {
    return { ...this.state.settings };
  }

  async saveSettings(settings: LedgerSettings): Promise<void> {
    this.state.settings = { ...settings };
  }
}
