/**
 * Human Plant Supervisor
 *
 * Classifies operator fatigue from O-tests and holds the session's mode.
 * Within a session the mode only tightens and the band only worsens; the
 * one exception is an explicit reset boundary (`completeReset`).
 */

import {
  ActionTag,
  FatigueBand,
  Mode,
  TimerPhase,
  isResetPhase,
  mostRestrictive,
  riskier,
  stepDown,
} from '../contracts/types';
import {
  EndPointerZ,
  SCHEMA_VERSION,
  formatSchemaIssues,
  toSchemaIssues,
  type EndPointer,
  type LedgerEvent,
  type PreflightSnapshot,
} from '../contracts/schemas';
import type { PolicyCatalog } from '../catalog/catalog';
import { InvalidPriorStateError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { foldResults, latestTimestamp } from './otests';
import type {
  HumanPlantState,
  HumanPlantView,
  PreflightOptions,
  ResetOutcome,
  TickOutcome,
} from './types';

const EPOCH = '1970-01-01T00:00:00.000Z';

export interface HumanPlantSupervisorOptions {
  /** Fail preflight when no prior end pointer is supplied */
  requirePriorEndPointer?: boolean;
  logger?: Logger;
}

/**
 * RED requires a band other than OK; when a clamp produces that pair the
 * band is raised instead of relaxing the mode.
 */
function reconcile(mode: Mode, band: FatigueBand): FatigueBand {
  return mode === Mode.RED && band === FatigueBand.OK ? FatigueBand.RISING : band;
}

function orderActions(actions: Set<ActionTag>): ActionTag[] {
  return Object.values(ActionTag).filter(tag => actions.has(tag));
}

/**
 * Fatigue/mode state machine for one session.
 *
 * @example
 * ```typescript
 * const hps = new HumanPlantSupervisor(catalog, { requirePriorEndPointer: true });
 * const snapshot = hps.preflight(results, priorEndPointer);
 * const tick = hps.onTickEnd(tickResults, gate.allowsContextWork(new Date()));
 * if (tick.runResetProtocol) {
 *   // operator steps away, then:
 *   hps.completeReset(freshResults);
 * }
 * ```
 */
export class HumanPlantSupervisor implements HumanPlantView {
  private readonly catalog: PolicyCatalog;
  private readonly requirePrior: boolean;
  private readonly logger: Logger;
  private state?: HumanPlantState;
  private snapshot?: PreflightSnapshot;

  constructor(catalog: PolicyCatalog, options: HumanPlantSupervisorOptions = {}) {
    this.catalog = catalog;
    this.requirePrior = options.requirePriorEndPointer ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start the session from a full O-test pass and the previous session's
   * end pointer.
   *
   * The snapshot depends only on the inputs, so replaying the same results
   * against the same pointer gives an identical snapshot.
   *
   * @throws InvalidPriorStateError if the pointer is malformed, or missing while required
   */
  preflight(
    otestResults: readonly unknown[],
    priorEndPointer: unknown,
    options: PreflightOptions = {}
  ): PreflightSnapshot {
    const prior = this.checkPrior(priorEndPointer, options);
    const folded = foldResults(otestResults, this.catalog, { fullPass: true, logger: this.logger });
    const failCount = folded.summary.fail_count;

    const sessionCeiling = prior ? prior.recommended_next_mode : Mode.GREEN;
    let band = this.catalog.classify(failCount);
    const mode = mostRestrictive(this.catalog.policyMode(band), sessionCeiling);
    const reconciled = reconcile(mode, band);
    if (reconciled !== band) {
      this.logger.info('Prior end pointer clamps to RED; band raised', { from: band, to: reconciled });
      band = reconciled;
    }

    this.state = {
      mode,
      fatigueBand: band,
      timerPhase: TimerPhase.WORK,
      sessionCeiling,
      resetCount: 0,
    };

    this.snapshot = Object.freeze({
      schema_version: SCHEMA_VERSION,
      otest_results: folded.results,
      fail_count: failCount,
      fatigue_band: band,
      mode,
      prior_block_id: prior ? prior.block_id : null,
      timestamp: latestTimestamp(folded.results) ?? prior?.timestamp ?? EPOCH,
    });

    this.logger.info('Preflight complete', { failCount, band, mode, ceiling: sessionCeiling });
    return this.snapshot;
  }

  /**
   * Reclassify after a tick. Never relaxes mode or band.
   *
   * @param otestResults - the tick's O-tests; unreadable entries count as UNCERTAIN
   * @param isContextWindow - whether the schedule currently allows CTX work
   */
  onTickEnd(otestResults: readonly unknown[], isContextWindow: boolean): TickOutcome {
    const state = this.requireState();
    const folded = foldResults(otestResults, this.catalog, { fullPass: false, logger: this.logger });

    const previousMode = state.mode;
    const band = riskier(state.fatigueBand, this.catalog.classify(folded.summary.fail_count));
    let mode = mostRestrictive(state.mode, this.catalog.policyMode(band));

    const actions = new Set(this.catalog.requiredActions(band, mode, isContextWindow));
    if (actions.has(ActionTag.DOWNGRADE_MODE)) {
      mode = stepDown(mode);
    }
    if (band === FatigueBand.NEAR_LIMIT) {
      actions.add(ActionTag.RUN_RESET_PROTOCOL);
    }

    let timerPhase = state.timerPhase;
    if (actions.has(ActionTag.RUN_RESET_PROTOCOL) && !isResetPhase(timerPhase)) {
      timerPhase = this.catalog.resetPhaseFor(state.resetCount);
      this.logger.warn('Reset protocol required', {
        phase: timerPhase,
        minutes: this.catalog.resetMinutes(timerPhase),
      });
    }

    const downgradeMode = mode !== previousMode;
    if (downgradeMode) {
      actions.add(ActionTag.DOWNGRADE_MODE);
      this.logger.info('Mode downgraded', { from: previousMode, to: mode, band });
    }

    state.mode = mode;
    state.fatigueBand = reconcile(mode, band);
    state.timerPhase = timerPhase;

    const ordered = orderActions(actions);
    return {
      mode: state.mode,
      fatigueBand: state.fatigueBand,
      timerPhase,
      actions: ordered,
      downgradeMode,
      forceCloseBlock: actions.has(ActionTag.FORCE_CLOSE_BLOCK),
      runResetProtocol: actions.has(ActionTag.RUN_RESET_PROTOCOL),
      summary: folded.summary,
    };
  }

  /**
   * Close a reset phase with a fresh full O-test pass. The mode may relax,
   * but never above the ceiling set at preflight.
   *
   * @throws Error if the timer is not in a reset phase
   */
  completeReset(otestResults: readonly unknown[]): ResetOutcome {
    const state = this.requireState();
    if (!isResetPhase(state.timerPhase)) {
      throw new Error(`completeReset requires a reset phase, timer is ${state.timerPhase}`);
    }

    const folded = foldResults(otestResults, this.catalog, { fullPass: true, logger: this.logger });
    const band = this.catalog.classify(folded.summary.fail_count);
    const mode = mostRestrictive(this.catalog.policyMode(band), state.sessionCeiling);

    state.mode = mode;
    state.fatigueBand = reconcile(mode, band);
    state.timerPhase = TimerPhase.WORK;
    state.resetCount += 1;

    this.logger.info('Reset complete', { mode, band: state.fatigueBand, resets: state.resetCount });
    return {
      mode,
      fatigueBand: state.fatigueBand,
      timerPhase: state.timerPhase,
      resetCount: state.resetCount,
      summary: folded.summary,
    };
  }

  /**
   * Re-apply the state recorded by the last ledger event of a resumed
   * session. Only ever tightens.
   */
  resumeFrom(lastEvent: LedgerEvent, completedResets: number): Readonly<HumanPlantState> {
    const state = this.requireState();
    state.mode = mostRestrictive(state.mode, lastEvent.mode);
    state.fatigueBand = reconcile(state.mode, riskier(state.fatigueBand, lastEvent.fatigue_band));
    state.timerPhase = lastEvent.timer_phase;
    state.resetCount = completedResets;
    this.logger.info('Session state resumed from ledger', { seq: lastEvent.seq, mode: state.mode });
    return this.getState();
  }

  /**
   * Mode recommended for the next session, from the current band.
   */
  recommendNextMode(): Mode {
    return this.catalog.nextSessionMode(this.requireState().fatigueBand);
  }

  getState(): Readonly<HumanPlantState> {
    return Object.freeze({ ...this.requireState() });
  }

  getSnapshot(): PreflightSnapshot | undefined {
    return this.snapshot;
  }

  hasStarted(): boolean {
    return this.state !== undefined;
  }

  private checkPrior(input: unknown, options: PreflightOptions): EndPointer | undefined {
    if (input === null || input === undefined) {
      if (this.requirePrior && !options.allowMissing) {
        throw new InvalidPriorStateError('Prior end pointer is required but missing');
      }
      return undefined;
    }
    const parsed = EndPointerZ.safeParse(input);
    if (!parsed.success) {
      const issues = toSchemaIssues(parsed.error);
      throw new InvalidPriorStateError(
        `Prior end pointer is malformed: ${formatSchemaIssues(issues)}`,
        issues
      );
    }
    return parsed.data;
  }

  private requireState(): HumanPlantState {
    if (!this.state) {
      throw new Error('Preflight has not run for this session');
    }
    return this.state;
  }
}
