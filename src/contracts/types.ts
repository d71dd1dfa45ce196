/**
 * Core Enumerations
 *
 * Modes, fatigue bands, timer phases and the other closed vocabularies shared
 * by the supervisors. Orderings are defined here so that every component
 * compares modes and bands the same way.
 */

/**
 * Operating mode granted to the operator.
 *
 * Ordering by permissiveness: RED < YELLOW < GREEN. "a ≤ b" means a is at
 * least as restrictive as b.
 */
export enum Mode {
  /** Normal operation */
  GREEN = 'GREEN',
  /** Reduced scope, no new high-risk work */
  YELLOW = 'YELLOW',
  /** Most restrictive, notes and wrap-up only */
  RED = 'RED',
}

/**
 * Fatigue band derived from O-test failures, ordered by risk.
 */
export enum FatigueBand {
  OK = 'OK',
  RISING = 'RISING',
  NEAR_LIMIT = 'NEAR_LIMIT',
}

/**
 * Phase of the work/reset timer.
 */
export enum TimerPhase {
  WORK = 'WORK',
  RESET_SHORT = 'RESET_SHORT',
  RESET_LONG = 'RESET_LONG',
}

/**
 * Outcome of a single O-test. UNCERTAIN is always treated as FAIL.
 */
export enum OTestOutcome {
  PASS = 'PASS',
  FAIL = 'FAIL',
  UNCERTAIN = 'UNCERTAIN',
}

/**
 * Work-pattern classes. CTX is higher-risk and legal only in scheduled windows.
 */
export enum WorkPattern {
  SYL = 'SYL',
  CTX = 'CTX',
}

/**
 * Block contract lifecycle.
 *
 * UNDEFINED → DEFINED → CLOSED. A closed block is never reopened.
 */
export enum BlockState {
  UNDEFINED = 'UNDEFINED',
  DEFINED = 'DEFINED',
  CLOSED = 'CLOSED',
}

/**
 * Event types recorded in the session ledger.
 */
export enum LedgerEventType {
  TICK_END = 'TICK_END',
  RESET_START = 'RESET_START',
  RESET_END = 'RESET_END',
  BLOCK_DEFINED = 'BLOCK_DEFINED',
  BLOCK_DENIED = 'BLOCK_DENIED',
  BLOCK_CLOSED = 'BLOCK_CLOSED',
  CHECKPOINT_EMITTED = 'CHECKPOINT_EMITTED',
}

/**
 * Action tags the policy catalog can require.
 */
export enum ActionTag {
  DOWNGRADE_MODE = 'DOWNGRADE_MODE',
  FORCE_CLOSE_BLOCK = 'FORCE_CLOSE_BLOCK',
  RUN_RESET_PROTOCOL = 'RUN_RESET_PROTOCOL',
}

/**
 * Operations an external actuator may perform with a checkpoint.
 */
export enum CheckpointOperation {
  COMMENT = 'comment',
  LABEL_ADD = 'label_add',
  LABEL_REMOVE = 'label_remove',
  CLOSE_VIA_PR_ONLY = 'close_via_pr_only',
  PROJECT_UPDATE = 'project_update',
}

/**
 * Permissiveness rank of each mode (higher = more permissive).
 */
export const MODE_RANK: Record<Mode, number> = {
  [Mode.RED]: 0,
  [Mode.YELLOW]: 1,
  [Mode.GREEN]: 2,
};

/**
 * Risk rank of each fatigue band (higher = riskier).
 */
export const BAND_RISK: Record<FatigueBand, number> = {
  [FatigueBand.OK]: 0,
  [FatigueBand.RISING]: 1,
  [FatigueBand.NEAR_LIMIT]: 2,
};

const MODES_BY_RANK: Mode[] = [Mode.RED, Mode.YELLOW, Mode.GREEN];

/**
 * Return the more restrictive of two modes.
 */
export function mostRestrictive(a: Mode, b: Mode): Mode {
  return MODE_RANK[a] <= MODE_RANK[b] ? a : b;
}

/**
 * Whether `mode` is at least as restrictive as `ceiling`.
 */
export function isWithinCeiling(mode: Mode, ceiling: Mode): boolean {
  return MODE_RANK[mode] <= MODE_RANK[ceiling];
}

/**
 * One step more restrictive, stopping at RED.
 */
export function stepDown(mode: Mode): Mode {
  return MODES_BY_RANK[Math.max(0, MODE_RANK[mode] - 1)];
}

/**
 * Return the riskier of two bands.
 */
export function riskier(a: FatigueBand, b: FatigueBand): FatigueBand {
  return BAND_RISK[a] >= BAND_RISK[b] ? a : b;
}

/**
 * Whether an outcome counts as a failure for classification.
 */
export function countsAsFail(outcome: OTestOutcome): boolean {
  return outcome !== OTestOutcome.PASS;
}

/**
 * Whether a timer phase is one of the reset phases.
 */
export function isResetPhase(phase: TimerPhase): boolean {
  return phase === TimerPhase.RESET_SHORT || phase === TimerPhase.RESET_LONG;
}
