/**
 * Human Plant Supervisor Types
 *
 * Session state and per-operation results of the fatigue/mode state machine.
 */

import type { ActionTag, FatigueBand, Mode, TimerPhase } from '../contracts/types';
import type { OTestResult, OTestSummary } from '../contracts/schemas';

/**
 * Mutable per-session state, held explicitly by one supervisor instance.
 */
export interface HumanPlantState {
  /** Current operating mode */
  mode: Mode;
  /** Current fatigue band */
  fatigueBand: FatigueBand;
  /** Current work/reset timer phase */
  timerPhase: TimerPhase;
  /** Highest mode this session may ever reach (from the prior end pointer) */
  sessionCeiling: Mode;
  /** Resets completed so far this session */
  resetCount: number;
}

/**
 * Result of processing one tick's O-tests.
 */
export interface TickOutcome {
  mode: Mode;
  fatigueBand: FatigueBand;
  timerPhase: TimerPhase;
  /** All actions now required, in stable order */
  actions: ActionTag[];
  /** The mode moved to a more restrictive level on this tick */
  downgradeMode: boolean;
  forceCloseBlock: boolean;
  runResetProtocol: boolean;
  summary: OTestSummary;
}

/**
 * Result of an explicit reset boundary.
 */
export interface ResetOutcome {
  mode: Mode;
  fatigueBand: FatigueBand;
  timerPhase: TimerPhase;
  resetCount: number;
  summary: OTestSummary;
}

export interface PreflightOptions {
  /**
   * Proceed without a prior end pointer even when the supervisor requires
   * one. Used by the notes-only fallback.
   */
  allowMissing?: boolean;
}

/**
 * What the execution side reads from the human plant. Re-read on every
 * legality check and every tick; never cached.
 */
export interface HumanPlantView {
  getState(): Readonly<HumanPlantState>;
  recommendNextMode(): Mode;
}

/**
 * O-test results after validation, de-duplication and fail-safe folding.
 */
export interface FoldedResults {
  /** Accepted results, one per test id, in catalog order */
  results: OTestResult[];
  summary: OTestSummary;
  /** Test ids that are not in the catalog */
  ignoredIds: string[];
  /** Entries that failed the O-test result schema */
  invalidCount: number;
  /** Catalog O-tests with no result */
  missingIds: string[];
}
