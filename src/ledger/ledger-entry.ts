/**
 * Ledger Entry
 *
 * Creation and hashing of individual ledger events. Each event carries the
 * SHA-256 of its own canonical content and the hash of the previous event,
 * so any edit to an appended event breaks the chain.
 */

import { createHash } from 'crypto';
import { canonicalize } from 'json-canonicalize';
import {
  LedgerEventZ,
  formatSchemaIssues,
  toSchemaIssues,
  type LedgerEvent,
  type LedgerEventInput,
} from '../contracts/schemas';

export type LedgerEventData = Omit<LedgerEvent, 'hash'>;

/**
 * Create a chained event from caller-supplied fields.
 *
 * Optional fields are only present when set, so the stored line and the
 * hashed content are the same object.
 */
export function createLedgerEvent(
  input: LedgerEventInput,
  seq: number,
  prevHash: string | null
): LedgerEvent {
  const data: LedgerEventData = {
    seq,
    ts: input.ts,
    timer_phase: input.timer_phase,
    mode: input.mode,
    fatigue_band: input.fatigue_band,
    block_id: input.block_id,
    event_type: input.event_type,
    prev_hash: prevHash,
  };
  if (input.otest_summary !== undefined) {
    data.otest_summary = { ...input.otest_summary };
  }
  if (input.reason !== undefined) {
    data.reason = input.reason;
  }

  return { ...data, hash: computeEventHash(data) };
}

/**
 * SHA-256 over the RFC 8785 canonical JSON of an event without its hash.
 */
export function computeEventHash(data: LedgerEventData): string {
  return createHash('sha256').update(canonicalize(data)).digest('hex');
}

export function recomputeEventHash(event: LedgerEvent): string {
  const { hash: _hash, ...data } = event;
  return computeEventHash(data);
}

export function verifyEventHash(event: LedgerEvent): boolean {
  return event.hash === recomputeEventHash(event);
}

/**
 * Whether `current` links to `previous` (or starts the chain when previous is null).
 */
export function verifyEventLink(current: LedgerEvent, previous: LedgerEvent | null): boolean {
  if (previous === null) {
    return current.prev_hash === null && current.seq === 0;
  }
  return current.prev_hash === previous.hash && current.seq === previous.seq + 1;
}

/**
 * Serialize to a JSONL line (no trailing newline).
 */
export function serializeEvent(event: LedgerEvent): string {
  return JSON.stringify(event);
}

/**
 * Parse and schema-check one JSONL line.
 *
 * @throws Error if the line is not JSON or fails the event schema
 */
export function deserializeEvent(line: string): LedgerEvent {
  const parsed: unknown = JSON.parse(line);
  const result = LedgerEventZ.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid ledger event: ${formatSchemaIssues(toSchemaIssues(result.error))}`);
  }
  return result.data;
}
