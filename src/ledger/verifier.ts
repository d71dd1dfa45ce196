/**
 * Ledger Verifier
 *
 * Integrity and policy audits over a session's event stream:
 * 1. hash chain (each event's own hash and its link to the predecessor)
 * 2. monotonicity (mode never relaxes and band never improves outside a
 *    reset boundary)
 */

import {
  BAND_RISK,
  FatigueBand,
  LedgerEventType,
  MODE_RANK,
  Mode,
} from '../contracts/types';
import type { LedgerEvent } from '../contracts/schemas';
import { recomputeEventHash, verifyEventHash, verifyEventLink } from './ledger-entry';

/**
 * Result of chain verification.
 */
export interface LedgerVerificationResult {
  valid: boolean;
  eventsVerified: number;
  /** Index of the first bad event */
  brokenAt?: number;
  errorType?: 'hash_mismatch' | 'link_mismatch';
  errorMessage?: string;
}

/**
 * Verify the hash chain of a full ledger.
 *
 * @example
 * ```typescript
 * const result = verifyLedger(ledger.getEvents());
 * if (!result.valid) {
 *   logger.error(`Ledger broken at event ${result.brokenAt}`);
 * }
 * ```
 */
export function verifyLedger(events: readonly LedgerEvent[]): LedgerVerificationResult {
  for (let i = 0; i < events.length; i++) {
    const current = events[i];
    const previous = i === 0 ? null : events[i - 1];

    if (!verifyEventHash(current)) {
      const expected = recomputeEventHash(current);
      return {
        valid: false,
        eventsVerified: i,
        brokenAt: i,
        errorType: 'hash_mismatch',
        errorMessage: `Event ${i} hash mismatch. Expected: ${expected.slice(0, 16)}..., Got: ${current.hash.slice(0, 16)}...`,
      };
    }

    if (!verifyEventLink(current, previous)) {
      return {
        valid: false,
        eventsVerified: i,
        brokenAt: i,
        errorType: 'link_mismatch',
        errorMessage: previous === null
          ? 'First event must have seq 0 and a null prev_hash'
          : `Event ${i} does not link to event ${i - 1}`,
      };
    }
  }

  return { valid: true, eventsVerified: events.length };
}

/**
 * A point where the recorded state relaxed outside a reset boundary.
 */
export interface MonotonicityViolation {
  seq: number;
  kind: 'mode_relaxed' | 'band_relaxed';
  from: Mode | FatigueBand;
  to: Mode | FatigueBand;
}

export interface MonotonicityReport {
  valid: boolean;
  violations: MonotonicityViolation[];
}

/**
 * Replay the recorded states and report every relaxation that did not
 * happen at a RESET_END event.
 */
export function auditMonotonicity(events: readonly LedgerEvent[]): MonotonicityReport {
  const violations: MonotonicityViolation[] = [];
  let previous: LedgerEvent | undefined;

  for (const event of events) {
    if (previous && event.event_type !== LedgerEventType.RESET_END) {
      if (MODE_RANK[event.mode] > MODE_RANK[previous.mode]) {
        violations.push({ seq: event.seq, kind: 'mode_relaxed', from: previous.mode, to: event.mode });
      }
      if (BAND_RISK[event.fatigue_band] < BAND_RISK[previous.fatigue_band]) {
        violations.push({
          seq: event.seq,
          kind: 'band_relaxed',
          from: previous.fatigue_band,
          to: event.fatigue_band,
        });
      }
    }
    previous = event;
  }

  return { valid: violations.length === 0, violations };
}

/**
 * Multi-line report for operators.
 */
export function formatVerificationReport(result: LedgerVerificationResult): string {
  if (result.valid) {
    return `Ledger valid (${result.eventsVerified} events verified)`;
  }
  return [
    'Ledger INVALID',
    `  Broken at: event ${result.brokenAt}`,
    `  Error: ${result.errorType}`,
    `  Detail: ${result.errorMessage}`,
  ].join('\n');
}
