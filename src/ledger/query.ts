/**
 * Ledger Query
 *
 * Filtering and pagination over ledger events for downstream reporting.
 */

import { LedgerEventType } from '../contracts/types';
import type { LedgerEvent } from '../contracts/schemas';

export interface LedgerQueryOptions {
  eventTypes?: LedgerEventType[];
  /** Match a block id; null selects events not tied to a block */
  blockId?: string | null;
  /** Inclusive lower bound (ISO 8601) */
  startTime?: string;
  /** Exclusive upper bound (ISO 8601) */
  endTime?: string;
  limit?: number;
  offset?: number;
  /** 'asc' = append order, 'desc' = newest first */
  order?: 'asc' | 'desc';
}

export interface LedgerQueryResult {
  events: LedgerEvent[];
  totalCount: number;
  hasMore: boolean;
}

function matches(event: LedgerEvent, options: LedgerQueryOptions): boolean {
  if (options.eventTypes && options.eventTypes.length > 0 && !options.eventTypes.includes(event.event_type)) {
    return false;
  }
  if (options.blockId !== undefined && event.block_id !== options.blockId) {
    return false;
  }
  const at = new Date(event.ts).getTime();
  if (options.startTime !== undefined && at < new Date(options.startTime).getTime()) {
    return false;
  }
  if (options.endTime !== undefined && at >= new Date(options.endTime).getTime()) {
    return false;
  }
  return true;
}

/**
 * Query events. Ordering follows `seq`, which is the append order.
 *
 * @example
 * ```typescript
 * const denials = queryLedger(ledger.getEvents(), {
 *   eventTypes: [LedgerEventType.BLOCK_DENIED],
 *   order: 'desc',
 *   limit: 5,
 * });
 * ```
 */
export function queryLedger(
  events: readonly LedgerEvent[],
  options: LedgerQueryOptions = {}
): LedgerQueryResult {
  const filtered = events
    .filter(e => matches(e, options))
    .sort((a, b) => (options.order === 'desc' ? b.seq - a.seq : a.seq - b.seq));

  const offset = options.offset ?? 0;
  const limit = options.limit ?? filtered.length;
  const page = filtered.slice(offset, offset + limit);

  return {
    events: page,
    totalCount: filtered.length,
    hasMore: offset + page.length < filtered.length,
  };
}

/**
 * All events recorded against one block, in append order.
 */
export function getBlockHistory(events: readonly LedgerEvent[], blockId: string): LedgerEvent[] {
  return queryLedger(events, { blockId }).events;
}

/**
 * Count events per type.
 */
export function countByEventType(events: readonly LedgerEvent[]): Record<LedgerEventType, number> {
  const counts: Record<LedgerEventType, number> = {
    [LedgerEventType.TICK_END]: 0,
    [LedgerEventType.RESET_START]: 0,
    [LedgerEventType.RESET_END]: 0,
    [LedgerEventType.BLOCK_DEFINED]: 0,
    [LedgerEventType.BLOCK_DENIED]: 0,
    [LedgerEventType.BLOCK_CLOSED]: 0,
    [LedgerEventType.CHECKPOINT_EMITTED]: 0,
  };
  for (const event of events) {
    counts[event.event_type]++;
  }
  return counts;
}
