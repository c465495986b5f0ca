import type { EventEnvelope } from './types.js';

type OrderKey = Pick<EventEnvelope, 'seq' | 'timestamp' | 'event_id'>;
type Orderable = OrderKey | { event: OrderKey };

function orderKey(item: Orderable): OrderKey {
  return 'event' in item ? item.event : item;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareTimestamps(a: string, b: string): number {
  const left = Date.parse(a);
  const right = Date.parse(b);
  if (!Number.isNaN(left) && !Number.isNaN(right) && left !== right) {
    return left < right ? -1 : 1;
  }
  return compareText(a, b);
}

/**
 * Canonical per-task order: `(seq, timestamp, event_id)`.
 *
 * `seq` dominates because clocks on different machines and branches cannot be
 * trusted to agree; `event_id` makes the order total when two branches
 * extended the same base and produced equal `seq` values.
 */
export function compareEvents(a: OrderKey, b: OrderKey): number {
  if (a.seq !== b.seq) return a.seq - b.seq;
  const byTime = compareTimestamps(a.timestamp, b.timestamp);
  if (byTime !== 0) return byTime;
  return compareText(a.event_id, b.event_id);
}

/** Sorts envelopes, or located events by their envelope. */
export function sortCanonical<T extends Orderable>(events: readonly T[]): T[] {
  return [...events].sort((a, b) => compareEvents(orderKey(a), orderKey(b)));
}
