import type { LedgerEvent } from "../../domain/types.js";
import type { EventBusPort, LedgerEventListInput } from "../../ports/event-bus.js";

export interface InMemoryEventBusOptions {
  /** Oldest events are dropped past this many. Unbounded when left out. */
  maxRetained?: number;
}

export class InMemoryEventBus implements EventBusPort {
  private readonly outbox: LedgerEvent[] = [];
  private readonly subscribers: Array<(event: LedgerEvent) => Promise<void>> = [];

  constructor(private readonly options: InMemoryEventBusOptions = {}) {}

  async publish(event: LedgerEvent): Promise<void> {
    this.outbox.push(event);
    const { maxRetained } = this.options;
    if (maxRetained !== undefined && this.outbox.length > maxRetained) {
      this.outbox.splice(0, this.outbox.length - maxRetained);
    }
    for (const subscriber of this.subscribers) {
      await subscriber(event);
    }
  }

  getPublishedEvents(): LedgerEvent[] {
    return [...this.outbox];
  }

  async listPublishedEvents(input: LedgerEventListInput): Promise<LedgerEvent[]> {
    const items = this.outbox.filter((event) => {
      if (input.paymentId && !eventConcernsPayment(event, input.paymentId)) {
        return false;
      }
      if (input.eventType && event.type !== input.eventType) {
        return false;
      }
      return true;
    });
    return items.slice(-Math.max(1, input.limit));
  }

  subscribe(handler: (event: LedgerEvent) => Promise<void>): void {
    this.subscribers.push(handler);
  }
}

function eventConcernsPayment(event: LedgerEvent, paymentId: string): boolean {
  if (event.data.payment_id === paymentId) {
    return true;
  }
  const mergedIds = event.data.merged_payment_ids;
  return Array.isArray(mergedIds) && mergedIds.includes(paymentId);
}
