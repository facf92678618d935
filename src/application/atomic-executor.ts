import { randomUUID } from "node:crypto";
import type { LedgerEvent } from "../domain/types.js";
import { isAppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { TransactionalResource } from "../ports/transaction.js";

export interface EventEnvelopeOptions {
  apiVersion: string;
  source: string;
  schemaVersion: string;
}

/** Unit of work handed to every step of a ledger operation. */
export class OperationContext {
  private readonly pending: LedgerEvent[] = [];

  constructor(
    readonly operation: string,
    private readonly clock: ClockPort,
    private readonly envelope: EventEnvelopeOptions,
  ) {}

  emit(type: LedgerEvent["type"], data: Record<string, unknown>): void {
    this.pending.push({
      id: `evt_${randomUUID()}`,
      api_version: this.envelope.apiVersion,
      source: this.envelope.source,
      event_version: this.envelope.schemaVersion,
      type,
      occurred_at: this.clock.nowIso(),
      data,
    });
  }

  nowIso(): string {
    return this.clock.nowIso();
  }

  drainEvents(): LedgerEvent[] {
    return this.pending.splice(0, this.pending.length);
  }
}

export interface AtomicExecutorOptions {
  resources: TransactionalResource[];
  eventBus: EventBusPort;
  clock: ClockPort;
  logger: Logger;
  envelope: EventEnvelopeOptions;
  onRollback?: (operation: string, code: string) => void;
}

/**
 * Runs ledger operations one at a time. Every resource is opened before the work starts and either
 * committed or rolled back afterwards; events reach the bus only after a commit.
 */
export class AtomicExecutor {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly options: AtomicExecutorOptions) {}

  async run<TResult>(operation: string, work: (context: OperationContext) => Promise<TResult>): Promise<TResult> {
    const acquire = this.tail;
    let release: () => void = () => {};
    const releaseSignal = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = this.tail.then(() => releaseSignal);

    await acquire;
    try {
      return await this.runExclusive(operation, work);
    } finally {
      release();
    }
  }

  private async runExclusive<TResult>(
    operation: string,
    work: (context: OperationContext) => Promise<TResult>,
  ): Promise<TResult> {
    const context = new OperationContext(operation, this.options.clock, this.options.envelope);
    const opened: TransactionalResource[] = [];
    let result: TResult;
    try {
      for (const resource of this.options.resources) {
        await resource.begin();
        opened.push(resource);
      }
      result = await work(context);
      for (const resource of opened) {
        await resource.commit();
      }
    } catch (error) {
      for (const resource of [...opened].reverse()) {
        await resource.rollback();
      }
      const code = isAppError(error) ? error.code : "unexpected_error";
      this.options.logger.warn({ operation, code, err: error }, "ledger operation rolled back");
      this.options.onRollback?.(operation, code);
      throw error;
    }

    for (const event of context.drainEvents()) {
      await this.options.eventBus.publish(event);
    }
    return result;
  }
}
