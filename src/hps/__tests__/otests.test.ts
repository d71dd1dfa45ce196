/**
 * Tests for O-test folding
 */

import { describe, it, expect } from 'vitest';
import { OTestOutcome } from '../../contracts/types';
import { parseCatalog } from '../../catalog/loader';
import { countFailures, foldResults, latestTimestamp } from '../otests';
import { catalogData, otests } from '../../__tests__/fixtures';

const { PASS, FAIL, UNCERTAIN } = OTestOutcome;
const ALL_THREE = [PASS, FAIL, PASS];

describe('foldResults', () => {
  const catalog = parseCatalog(catalogData());

  it('should report missing tests on a full pass', () => {
    const folded = foldResults(otests([PASS]), catalog, { fullPass: true });
    expect(folded.missingIds).toEqual(['beta', 'gamma']);
    expect(folded.summary).toEqual({ total: 3, pass: 1, fail: 0, uncertain: 2, fail_count: 2 });
  });

  it('should not invent results for tests skipped during a tick', () => {
    const folded = foldResults(otests([PASS]), catalog, { fullPass: false });
    expect(folded.summary).toEqual({ total: 1, pass: 1, fail: 0, uncertain: 0, fail_count: 0 });
  });

  it('should drop unreadable entries on a full pass but count them during a tick', () => {
    const entries: unknown[] = [...otests(ALL_THREE), 'garbage', { test_id: 'beta', outcome: 'pass' }];
    const full = foldResults(entries, catalog, { fullPass: true });
    const tick = foldResults(entries, catalog, { fullPass: false });

    expect(full.invalidCount).toBe(2);
    expect(full.summary.fail_count).toBe(1);
    expect(tick.summary).toEqual({ total: 5, pass: 2, fail: 1, uncertain: 2, fail_count: 3 });
  });

  it('should list ignored ids', () => {
    const folded = foldResults(
      [{ test_id: 'omega', outcome: FAIL, timestamp: '2024-06-03T08:00:00.000Z' }],
      catalog,
      { fullPass: false }
    );
    expect(folded.ignoredIds).toEqual(['omega']);
    expect(folded.summary.total).toBe(0);
  });

  it('should rank UNCERTAIN above FAIL among duplicates', () => {
    const folded = foldResults(
      [
        { test_id: 'alpha', outcome: UNCERTAIN, timestamp: '2024-06-03T08:00:00.000Z' },
        { test_id: 'alpha', outcome: FAIL, timestamp: '2024-06-03T08:05:00.000Z' },
      ],
      catalog,
      { fullPass: false }
    );
    expect(folded.results).toEqual([
      { test_id: 'alpha', outcome: UNCERTAIN, timestamp: '2024-06-03T08:00:00.000Z' },
    ]);
  });
});

describe('countFailures', () => {
  it('should count UNCERTAIN as a failure', () => {
    expect(countFailures(otests([PASS, FAIL, UNCERTAIN]))).toBe(2);
  });
});

describe('latestTimestamp', () => {
  it('should compare instants rather than strings', () => {
    const results = [
      { test_id: 'alpha', outcome: PASS, timestamp: '2024-06-03T10:00:00+02:00' },
      { test_id: 'beta', outcome: PASS, timestamp: '2024-06-03T09:30:00Z' },
    ];
    expect(latestTimestamp(results)).toBe('2024-06-03T09:30:00Z');
    expect(latestTimestamp([])).toBeUndefined();
  });
});
