/**
 * Shared test data
 */

import { ActionTag, FatigueBand, Mode, OTestOutcome } from '../contracts/types';
import type { OTestResult } from '../contracts/schemas';
import type { PolicyCatalogData } from '../catalog/schema';
import type { ScheduleTemplate } from '../schedule/schema';
import { WindowKind } from '../schedule/schema';

export const OTEST_IDS = ['alpha', 'beta', 'gamma'] as const;

/** Monday, inside the weekday CONTEXT range */
export const MONDAY_CONTEXT = new Date('2024-06-03T10:00:00Z');
/** Monday, outside every range */
export const MONDAY_AFTERNOON = new Date('2024-06-03T14:00:00Z');
/** Saturday night, inside the overnight DEFERRED range */
export const SATURDAY_LATE = new Date('2024-06-08T23:00:00Z');

export function catalogData(overrides: Partial<PolicyCatalogData> = {}): PolicyCatalogData {
  return {
    version: '1.0.0',
    otests: OTEST_IDS.map(id => ({ id, description: `check ${id}`, max_seconds: 30 })),
    classifier: { rising_at: 1, near_limit_at: 2 },
    band_modes: {
      [FatigueBand.OK]: Mode.GREEN,
      [FatigueBand.RISING]: Mode.YELLOW,
      [FatigueBand.NEAR_LIMIT]: Mode.YELLOW,
    },
    next_session_modes: {
      [FatigueBand.OK]: Mode.GREEN,
      [FatigueBand.RISING]: Mode.YELLOW,
      [FatigueBand.NEAR_LIMIT]: Mode.RED,
    },
    rules: [{ band: FatigueBand.NEAR_LIMIT, actions: [ActionTag.RUN_RESET_PROTOCOL] }],
    reset: { short_minutes: 10, long_minutes: 30, long_after_resets: 1 },
    ...overrides,
  };
}

export function scheduleTemplate(overrides: Partial<ScheduleTemplate> = {}): ScheduleTemplate {
  return {
    version: '1.0.0',
    timezone: 'UTC',
    ranges: [
      { kind: WindowKind.CONTEXT, days: ['mon', 'tue', 'wed', 'thu', 'fri'], start: '09:00', end: '12:00' },
      { kind: WindowKind.DEFERRED, days: ['sat'], start: '22:00', end: '02:00' },
    ],
    ...overrides,
  };
}

/**
 * One result per catalog O-test, in order.
 */
export function otests(outcomes: OTestOutcome[], timestamp = '2024-06-03T08:00:00.000Z'): OTestResult[] {
  return outcomes.map((outcome, i) => ({ test_id: OTEST_IDS[i], outcome, timestamp }));
}

export const ALL_PASS = [OTestOutcome.PASS, OTestOutcome.PASS, OTestOutcome.PASS];
