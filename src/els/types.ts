/**
 * Execution Ledger Supervisor Types
 */

import { z } from 'zod';
import type { LedgerEvent, TimeBlock } from '../contracts/schemas';
import { BlockIdZ, ModeZ, WorkPatternZ } from '../contracts/schemas';

/**
 * Reasons a block proposal is refused. The values are recorded verbatim in
 * the ledger.
 */
export enum DenialReason {
  INVALID_PROPOSAL = 'invalid block proposal',
  BLOCK_ID_USED = 'block id already used',
  TIMER_IN_RESET = 'timer in reset phase',
  MODE_ABOVE_CEILING = 'mode above HPS ceiling',
  CTX_OUTSIDE_WINDOW = 'CTX outside legal window',
  CTX_ALREADY_TODAY = 'CTX block already defined today',
}

export const BlockProposalZ = z
  .object({
    block_id: BlockIdZ,
    work_pattern: WorkPatternZ,
    mode_at_start: ModeZ,
    allowed_paths: z.array(z.string().min(1)).default([]),
    declared_illegal_moves: z.array(z.string().min(1)).default([]),
  })
  .strict();

/** A plan proposal as submitted; path and move lists may be omitted */
export type BlockProposal = z.input<typeof BlockProposalZ>;

/**
 * Outcome of a legality check. Each variant carries the ledger event it
 * produced.
 */
export type LegalityDecision =
  | { kind: 'granted'; block: TimeBlock; event: LedgerEvent }
  | { kind: 'denied'; reason: string; event: LedgerEvent }
  | { kind: 'fallback'; reason: string; event: LedgerEvent };

/**
 * Something the operator is about to do inside a block.
 */
export interface BoundaryAction {
  /** Name of the move, checked against declared_illegal_moves */
  move: string;
  /** Repository path the move touches, checked against allowed_paths */
  path?: string;
}

export type BoundaryVerdict =
  | { allowed: true; blockId: string }
  | { allowed: false; blockId: string | null; reason: string };

/**
 * Result of logging a tick against a block.
 */
export interface TickVerdict {
  event: LedgerEvent;
  /** The block may keep running under the current HPS state */
  mayContinue: boolean;
  /** Why it may not, when it may not */
  reason?: string;
}
