/**
 * Policy Catalog
 *
 * Pure lookup tables consumed by both supervisors: O-test procedures, the
 * FAIL-count classifier and the (band, mode, window) → action policy.
 * No clock and no randomness, so identical inputs always give identical
 * outputs and a ledger can be replayed against the same catalog.
 */

import {
  ActionTag,
  FatigueBand,
  Mode,
  TimerPhase,
} from '../contracts/types';
import type {
  OTestProcedure,
  PolicyCatalogData,
  PolicyRule,
} from './schema';

/** Stable ordering for action sets */
const ACTION_ORDER: ActionTag[] = [
  ActionTag.DOWNGRADE_MODE,
  ActionTag.FORCE_CLOSE_BLOCK,
  ActionTag.RUN_RESET_PROTOCOL,
];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function ruleMatches(rule: PolicyRule, band: FatigueBand, mode: Mode, isContextWindow: boolean): boolean {
  if (rule.band !== band) {
    return false;
  }
  if (rule.modes && !rule.modes.includes(mode)) {
    return false;
  }
  if (rule.context_window !== undefined && rule.context_window !== isContextWindow) {
    return false;
  }
  return true;
}

/**
 * Validated, immutable policy catalog.
 *
 * Construct through `loadCatalog` or `parseCatalog`; the constructor assumes
 * its input already passed schema validation.
 *
 * @example
 * ```typescript
 * const catalog = loadCatalog('./config/catalog.yaml');
 * const band = catalog.classify(2);            // NEAR_LIMIT with near_limit_at: 2
 * const actions = catalog.requiredActions(band, Mode.YELLOW, false);
 * ```
 */
export class PolicyCatalog {
  private readonly data: PolicyCatalogData;

  constructor(data: PolicyCatalogData) {
    this.data = deepFreeze(structuredClone(data));
  }

  /**
   * Catalog version, recorded alongside artifacts for audit replay.
   */
  get version(): string {
    return this.data.version;
  }

  /**
   * Map a FAIL count (UNCERTAIN already folded in) to a fatigue band.
   *
   * @throws RangeError when the count is not a non-negative integer
   */
  classify(failCount: number): FatigueBand {
    if (!Number.isInteger(failCount) || failCount < 0) {
      throw new RangeError(`fail count must be a non-negative integer, got ${failCount}`);
    }
    const { rising_at, near_limit_at } = this.data.classifier;
    if (failCount >= near_limit_at) {
      return FatigueBand.NEAR_LIMIT;
    }
    if (failCount >= rising_at) {
      return FatigueBand.RISING;
    }
    return FatigueBand.OK;
  }

  /**
   * Actions the policy requires for a state, in a stable order.
   */
  requiredActions(band: FatigueBand, mode: Mode, isContextWindow: boolean): ActionTag[] {
    const tags = new Set<ActionTag>();
    for (const rule of this.data.rules) {
      if (ruleMatches(rule, band, mode, isContextWindow)) {
        rule.actions.forEach(tag => tags.add(tag));
      }
    }
    return ACTION_ORDER.filter(tag => tags.has(tag));
  }

  /**
   * Mode ceiling the policy assigns to a band within a session.
   */
  policyMode(band: FatigueBand): Mode {
    return this.data.band_modes[band];
  }

  /**
   * Mode recommended for the next session after ending in `band`.
   */
  nextSessionMode(band: FatigueBand): Mode {
    return this.data.next_session_modes[band];
  }

  /**
   * Reset phase for the next reset, given how many resets already ran this session.
   */
  resetPhaseFor(completedResets: number): TimerPhase {
    return completedResets < this.data.reset.long_after_resets
      ? TimerPhase.RESET_SHORT
      : TimerPhase.RESET_LONG;
  }

  /**
   * Declared duration of a reset phase in minutes (0 for WORK).
   */
  resetMinutes(phase: TimerPhase): number {
    switch (phase) {
      case TimerPhase.RESET_SHORT:
        return this.data.reset.short_minutes;
      case TimerPhase.RESET_LONG:
        return this.data.reset.long_minutes;
      default:
        return 0;
    }
  }

  /**
   * All O-test procedures a full preflight pass runs.
   */
  getOTests(): readonly OTestProcedure[] {
    return this.data.otests;
  }

  hasOTest(testId: string): boolean {
    return this.data.otests.some(o => o.id === testId);
  }

  /**
   * Plain copy of the catalog data.
   */
  toJSON(): PolicyCatalogData {
    return structuredClone(this.data);
  }
}
