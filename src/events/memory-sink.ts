import type { EventSink, LedgerEvent } from '../ledger/types.js';

/**
 * In-process event sink. Records events in emission order.
 */
export class MemoryEventSink implements EventSink {
  protected readonly events: LedgerEvent[] = [];

  emit(event: LedgerEvent): void {
    this.events.push(event);
  }

  list(offset = 0, limit = this.events.length): readonly LedgerEvent[] {
    return this.events.slice(offset, offset + limit);
  }

  count(): number {
    return this.events.length;
  }

  async healthy(): Promise<boolean> {
    return true;
  }
}
