import type { LedgerEvent } from "../domain/types.js";

export interface LedgerEventListInput {
  limit: number;
  paymentId?: string;
  eventType?: LedgerEvent["type"];
}

export interface EventBusPort {
  publish(event: LedgerEvent): Promise<void>;
  listPublishedEvents(input: LedgerEventListInput): Promise<LedgerEvent[]>;
  subscribe(handler: (event: LedgerEvent) => Promise<void>): void;
}
