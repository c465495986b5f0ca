import { describe, it, expect } from 'vitest';
import { compareEvents, sortCanonical } from './ordering.js';

function key(seq: number, timestamp: string, event_id: string) {
  return { seq, timestamp, event_id };
}

describe('canonical ordering', () => {
  it('orders by seq before timestamp', () => {
    const early = key(2, '2026-01-01T00:00:00.000Z', 'B');
    const late = key(1, '2026-06-01T00:00:00.000Z', 'A');
    expect(sortCanonical([early, late])).toEqual([late, early]);
  });

  it('falls back to timestamp for equal seq', () => {
    const a = key(3, '2026-01-02T00:00:00.000Z', 'A');
    const b = key(3, '2026-01-01T00:00:00.000Z', 'Z');
    expect(sortCanonical([a, b]).map((e) => e.event_id)).toEqual(['Z', 'A']);
  });

  it('compares timestamps by instant, not by text', () => {
    const utc = key(1, '2026-01-01T10:00:00.000Z', 'A');
    const offset = key(1, '2026-01-01T09:00:00.000-02:00', 'B');
    // 09:00-02:00 is 11:00Z, so it sorts after 10:00Z
    expect(compareEvents(utc, offset)).toBeLessThan(0);
  });

  it('uses event_id as the final tie-break', () => {
    const ts = '2026-01-01T00:00:00.000Z';
    const events = [key(1, ts, '01C'), key(1, ts, '01A'), key(1, ts, '01B')];
    expect(sortCanonical(events).map((e) => e.event_id)).toEqual(['01A', '01B', '01C']);
  });

  it('sorts wrapped events by their envelope', () => {
    const ts = '2026-01-01T00:00:00.000Z';
    const wrapped = [{ event: key(2, ts, 'B'), raw: 'b' }, { event: key(1, ts, 'A'), raw: 'a' }];
    expect(sortCanonical(wrapped).map((item) => item.raw)).toEqual(['a', 'b']);
  });

  it('does not mutate its input', () => {
    const input = [key(2, 'x', 'B'), key(1, 'x', 'A')];
    sortCanonical(input);
    expect(input[0].seq).toBe(2);
  });
});
