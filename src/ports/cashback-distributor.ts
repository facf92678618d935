import type { CashbackKind } from "../domain/types.js";

export interface SendCashbackRequest {
  kind: CashbackKind;
  paymentId: string;
  recipient: string;
  amount: number;
}

export interface SendCashbackResult {
  success: boolean;
  amount: number;
  nonce: number;
}

export interface IncreaseCashbackResult {
  success: boolean;
  amount: number;
}

/**
 * External incentive ledger. Refusals are reported through the returned values; the caller keeps
 * its bookkeeping on what was actually sent or revoked.
 */
export interface CashbackDistributorPort {
  sendCashback(request: SendCashbackRequest): Promise<SendCashbackResult>;
  revokeCashback(nonce: number, amount: number): Promise<boolean>;
  increaseCashback(nonce: number, amount: number): Promise<IncreaseCashbackResult>;
}
