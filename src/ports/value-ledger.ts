export interface ValueLedgerPort {
  balanceOf(account: string): Promise<number>;
  allowance(owner: string, spender: string): Promise<number>;
  approve(owner: string, spender: string, amount: number): Promise<void>;
  transfer(from: string, to: string, amount: number): Promise<void>;
  transferFrom(spender: string, from: string, to: string, amount: number): Promise<void>;
}
