export type PaymentStatus =
  | "nonexistent"
  | "active"
  | "cleared"
  | "confirmed"
  | "reversed"
  | "revoked"
  | "merged";

export type BalanceBucket = "uncleared" | "cleared";
export type CancellationKind = "revoked" | "reversed";
export type CashbackKind = "card_payment";
export type CashbackMergingFailureKind = "not_enough_balance" | "revocation_error" | "increase_error";

export interface PaymentRecord {
  id: string;
  payer: string;
  sponsor: string | null;
  subsidy_limit: number;
  base_amount: number;
  extra_amount: number;
  refund_amount: number;
  cashback_amount: number;
  confirmed_amount: number;
  cashback_rate: number;
  cashback_nonce: number;
  revocation_counter: number;
  status: PaymentStatus;
  created_at: string;
  updated_at: string;
}

export interface PaymentResponse {
  id: string;
  status: PaymentStatus;
  payer: string;
  sponsor: string | null;
  subsidized: boolean;
  subsidy_limit: number;
  base_amount: number;
  extra_amount: number;
  sum_amount: number;
  refund_amount: number;
  remainder: number;
  confirmed_amount: number;
  cashback_amount: number;
  compensation_amount: number;
  cashback_rate: number;
  revocation_counter: number;
  created_at: string;
  updated_at: string;
}

export interface CashbackResponse {
  payment_id: string;
  last_cashback_nonce: number;
}

export interface LedgerSettings {
  cash_out_account: string | null;
  cashback_distributor: string | null;
  cashback_enabled: boolean;
  cashback_rate: number;
  revocation_limit: number;
}

export interface AccountBalances {
  account: string;
  uncleared: number;
  cleared: number;
}

export interface TotalBalances {
  uncleared: number;
  cleared: number;
}

export interface BalanceAuditReport {
  ok: boolean;
  totals: TotalBalances;
  account_sums: TotalBalances;
  payment_sums: TotalBalances;
  mismatched_accounts: string[];
}

export interface MakePaymentInput {
  payment_id: string;
  payer: string;
  base_amount: number;
  extra_amount: number;
  sponsor?: string;
  subsidy_limit?: number;
  cashback_rate?: number;
  confirmation_amount?: number;
  correlation_id?: string;
}

export interface MakeCommonPaymentInput {
  payment_id: string;
  payer: string;
  base_amount: number;
  extra_amount: number;
  correlation_id?: string;
}

export interface UpdatePaymentInput {
  payment_id: string;
  base_amount: number;
  extra_amount: number;
  correlation_id?: string;
}

export interface UpdateLazyAndConfirmInput extends UpdatePaymentInput {
  confirmation_amount: number;
}

export interface RefundPaymentInput {
  payment_id: string;
  refund_amount: number;
  correlation_id?: string;
}

export interface CancelPaymentInput {
  payment_id: string;
  parent_tx_hash: string;
  correlation_id?: string;
}

export interface PaymentConfirmation {
  payment_id: string;
  amount: number;
}

export interface MergePaymentsInput {
  target_payment_id: string;
  merged_payment_ids: string[];
  correlation_id?: string;
}

export interface RefundAccountInput {
  account: string;
  amount: number;
  correlation_id?: string;
}

export type LedgerEventType =
  | "payment.made"
  | "payment.updated"
  | "payment.cleared"
  | "payment.uncleared"
  | "payment.confirmed"
  | "payment.confirmed_amount_changed"
  | "payment.refunded"
  | "payment.revoked"
  | "payment.reversed"
  | "payments.merged"
  | "account.refunded"
  | "cashback.sent"
  | "cashback.send_failed"
  | "cashback.increased"
  | "cashback.increase_failed"
  | "cashback.revoked"
  | "cashback.revoke_failed"
  | "settings.cash_out_account_set"
  | "settings.cashback_distributor_set"
  | "settings.cashback_rate_set"
  | "settings.cashback_enabled"
  | "settings.cashback_disabled"
  | "settings.revocation_limit_set";

export interface LedgerEvent {
  id: string;
  api_version: string;
  source: string;
  event_version: string;
  type: LedgerEventType;
  occurred_at: string;
  data: Record<string, unknown>;
}
