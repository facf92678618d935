import type {
  CashbackDistributorPort,
  IncreaseCashbackResult,
  SendCashbackRequest,
  SendCashbackResult,
} from "../../ports/cashback-distributor.js";
import type { TransactionalResource } from "../../ports/transaction.js";
import type { InMemoryValueLedger } from "./value-ledger.js";

interface CashbackGrant {
  paymentId: string;
  recipient: string;
  outstanding: number;
}

interface InMemoryCashbackDistributorOptions {
  /** Account holding the incentive funds. */
  account: string;
  /** Account revocations are pulled from; it must approve `account` on the ledger. */
  revocationSource: string;
  firstNonce?: number;
}

export interface DistributorBehaviour {
  sendEnabled: boolean;
  revokeEnabled: boolean;
  increaseEnabled: boolean;
  /** Upper bound of a single grant; larger requests are granted partially. */
  sendCap: number | null;
  increaseCap: number | null;
}

const DEFAULT_BEHAVIOUR: DistributorBehaviour = {
  sendEnabled: true,
  revokeEnabled: true,
  increaseEnabled: true,
  sendCap: null,
  increaseCap: null,
};

export interface DistributorCall {
  operation: "send" | "revoke" | "increase";
  nonce: number;
  requested: number;
  succeeded: boolean;
  amount: number;
}

interface DistributorState {
  grants: Map<number, CashbackGrant>;
  nextNonce: number;
  calls: DistributorCall[];
}

export class InMemoryCashbackDistributor implements CashbackDistributorPort, TransactionalResource {
  private state: DistributorState;
  private snapshot: DistributorState | null = null;
  private behaviour: DistributorBehaviour = { ...DEFAULT_BEHAVIOUR };

  constructor(
    private readonly ledger: InMemoryValueLedger,
    private readonly options: InMemoryCashbackDistributorOptions,
  ) {
    this.state = { grants: new Map(), nextNonce: options.firstNonce ?? 1, calls: [] };
  }

  get account(): string {
    return this.options.account;
  }

  configure(behaviour: Partial<DistributorBehaviour>): void {
    this.behaviour = { ...this.behaviour, ...behaviour };
  }

  getCalls(): DistributorCall[] {
    return [...this.state.calls];
  }

  getOutstanding(nonce: number): number {
    return this.state.grants.get(nonce)?.outstanding ?? 0;
  }

  async begin(): Promise<void> {
    this.snapshot = {
      grants: new Map([...this.state.grants.entries()].map(([nonce, grant]) => [nonce, { ...grant }])),
      nextNonce: this.state.nextNonce,
      calls: [...this.state.calls],
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

  async sendCashback(request: SendCashbackRequest): Promise<SendCashbackResult> {
    const granted = this.applyCap(request.amount, this.behaviour.sendCap);
    const funded = (await this.ledger.balanceOf(this.options.account)) >= granted;
    if (!this.behaviour.sendEnabled || !funded) {
      this.record({ operation: "send", nonce: 0, requested: request.amount, succeeded: false, amount: 0 });
      return { success: false, amount: 0, nonce: 0 };
    }

    await this.ledger.transfer(this.options.account, request.recipient, granted);
    const nonce = this.state.nextNonce;
    this.state.nextNonce += 1;
    this.state.grants.set(nonce, {
      paymentId: request.paymentId,
      recipient: request.recipient,
      outstanding: granted,
    });
    this.record({ operation: "send", nonce, requested: request.amount, succeeded: true, amount: granted });
    return { success: true, amount: granted, nonce };
  }

  async revokeCashback(nonce: number, amount: number): Promise<boolean> {
    const grant = this.state.grants.get(nonce);
    const source = this.options.revocationSource;
    const canPull =
      (await this.ledger.balanceOf(source)) >= amount
      && (await this.ledger.allowance(source, this.options.account)) >= amount;
    if (!this.behaviour.revokeEnabled || !grant || grant.outstanding < amount || !canPull) {
      this.record({ operation: "revoke", nonce, requested: amount, succeeded: false, amount: 0 });
      return false;
    }

    await this.ledger.transferFrom(this.options.account, source, this.options.account, amount);
    grant.outstanding -= amount;
    this.record({ operation: "revoke", nonce, requested: amount, succeeded: true, amount });
    return true;
  }

  async increaseCashback(nonce: number, amount: number): Promise<IncreaseCashbackResult> {
    const grant = this.state.grants.get(nonce);
    const granted = this.applyCap(amount, this.behaviour.increaseCap);
    const funded = (await this.ledger.balanceOf(this.options.account)) >= granted;
    if (!this.behaviour.increaseEnabled || !grant || !funded) {
      this.record({ operation: "increase", nonce, requested: amount, succeeded: false, amount: 0 });
      return { success: false, amount: 0 };
    }

    await this.ledger.transfer(this.options.account, grant.recipient, granted);
    grant.outstanding += granted;
    this.record({ operation: "increase", nonce, requested: amount, succeeded: true, amount: granted });
    return { success: true, amount: granted };
  }

  private applyCap(amount: number, cap: number | null): number {
    return cap === null ? amount : Math.min(amount, cap);
  }

  private record(call: DistributorCall): void {
    this.state.calls.push(call);
  }
}
