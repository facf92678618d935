import type {
  BalanceBucket,
  CancellationKind,
  LedgerSettings,
  PaymentRecord,
  PaymentStatus,
} from "../domain/types.js";

export interface PaymentListInput {
  payer?: string;
  statuses?: PaymentStatus[];
}

export interface AccountBucketBalance {
  account: string;
  bucket: BalanceBucket;
  amount: number;
}

export interface BalanceChangeResult {
  accountBalance: number;
  totalBalance: number;
}

export interface PaymentStorePort {
  getPayment(id: string): Promise<PaymentRecord | null>;
  savePayment(payment: PaymentRecord): Promise<void>;
  listPayments(input: PaymentListInput): Promise<PaymentRecord[]>;
  /** The only write path for bucket balances: moves the account value and the total together. */
  applyBalanceDelta(bucket: BalanceBucket, account: string, delta: number): Promise<BalanceChangeResult>;
  getAccountBalance(bucket: BalanceBucket, account: string): Promise<number>;
  getTotalBalance(bucket: BalanceBucket): Promise<number>;
  listAccountBalances(): Promise<AccountBucketBalance[]>;
  hasCancellationFlag(kind: CancellationKind, reference: string): Promise<boolean>;
  setCancellationFlag(kind: CancellationKind, reference: string): Promise<void>;
  getSettings(): Promise<LedgerSettings>;
  saveSettings(settings: LedgerSettings): Promise<void>;
}
