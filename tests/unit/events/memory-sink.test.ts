import { describe, it, expect } from 'vitest';

import { MemoryEventSink } from '@/events/memory-sink.js';
import type { LedgerEvent } from '@/ledger/types.js';

const ALICE = 'aa'.repeat(32);
const BOB = 'bb'.repeat(32);

const events: LedgerEvent[] = [
  { type: 'Created', from: ALICE, totalSupply: 1000n },
  { type: 'Transfer', from: ALICE, to: BOB, value: 10n },
  { type: 'Burn', from: BOB, value: 5n },
];

describe('MemoryEventSink', () => {
  it('should record events in emission order', () => {
    const sink = new MemoryEventSink();
    events.forEach((e) => sink.emit(e));

    expect(sink.count()).toBe(3);
    expect(sink.list()).toEqual(events);
  });

  it('should page with offset and limit', () => {
    const sink = new MemoryEventSink();
    events.forEach((e) => sink.emit(e));

    expect(sink.list(1, 1)).toEqual([events[1]]);
    expect(sink.list(2)).toEqual([events[2]]);
    expect(sink.list(5, 10)).toEqual([]);
  });

  it('should return a copy that later emits do not extend', () => {
    const sink = new MemoryEventSink();
    sink.emit(events[0]);
    const listed = sink.list();

    sink.emit(events[1]);

    expect(listed).toHaveLength(1);
  });

  it('should always report healthy', async () => {
    await expect(new MemoryEventSink().healthy()).resolves.toBe(true);
  });
});
