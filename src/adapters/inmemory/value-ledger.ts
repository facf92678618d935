import { MAX_AMOUNT, isValidAmount } from "../../domain/amounts.js";
import { AppError } from "../../infra/app-error.js";
import type { TransactionalResource } from "../../ports/transaction.js";
import type { ValueLedgerPort } from "../../ports/value-ledger.js";

interface LedgerState {
  balances: Map<string, number>;
  allowances: Map<string, number>;
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}->${spender}`;
}

function assertTransferAmount(amount: number): void {
  if (!isValidAmount(amount)) {
    throw new AppError(422, "invalid_transfer_amount", `Transfer amount '${amount}' is not a valid amount.`);
  }
}

/**
 * Balance-and-allowance asset ledger kept in process. Stands in for the external settlement asset
 * in tests and in the memory runtime.
 */
export class InMemoryValueLedger implements ValueLedgerPort, TransactionalResource {
  private state: LedgerState = { balances: new Map(), allowances: new Map() };
  private snapshot: LedgerState | null = null;

  async begin(): Promise<void> {
    this.snapshot = {
      balances: new Map(this.state.balances),
      allowances: new Map(this.state.allowances),
    };
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

  mint(account: string, amount: number): void {
    assertTransferAmount(amount);
    this.state.balances.set(account, this.balanceOfSync(account) + amount);
  }

  /** Mints an opening balance and lets `spender` pull from it without limit. */
  fund(account: string, amount: number, spender: string): void {
    this.mint(account, amount);
    this.state.allowances.set(allowanceKey(account, spender), MAX_AMOUNT);
  }

  async balanceOf(account: string): Promise<number> {
    return this.balanceOfSync(account);
  }

  async allowance(owner: string, spender: string): Promise<number> {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0;
  }

  async approve(owner: string, spender: string, amount: number): Promise<void> {
    assertTransferAmount(amount);
    this.state.allowances.set(allowanceKey(owner, spender), amount);
  }

  async transfer(from: string, to: string, amount: number): Promise<void> {
    assertTransferAmount(amount);
    this.move(from, to, amount);
  }

  async transferFrom(spender: string, from: string, to: string, amount: number): Promise<void> {
    assertTransferAmount(amount);
    const key = allowanceKey(from, spender);
    const allowed = this.state.allowances.get(key) ?? 0;
    if (allowed < amount) {
      throw new AppError(
        409,
        "insufficient_allowance",
        `Account '${from}' allows '${spender}' to move ${allowed}, ${amount} requested.`,
        { owner: from, spender, allowance: allowed, amount },
      );
    }
    this.move(from, to, amount);
    this.state.allowances.set(key, allowed - amount);
  }

  private balanceOfSync(account: string): number {
    return this.state.balances.get(account) ?? 0;
  }

  private move(from: string, to: string, amount: number): void {
    const fromBalance = this.balanceOfSync(from);
    if (fromBalance < amount) {
      throw new AppError(
        409,
        "insufficient_balance",
        `Account '${from}' holds ${fromBalance}, ${amount} requested.`,
        { account: from, balance: fromBalance, amount },
      );
    }
    this.state.balances.set(from, fromBalance - amount);
    this.state.balances.set(to, this.balanceOfSync(to) + amount);
  }
}
