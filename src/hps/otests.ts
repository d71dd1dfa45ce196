/**
 * O-test folding
 *
 * Turns raw O-test submissions into a FAIL count. Anything that cannot be
 * read as a definite PASS counts against the operator.
 */

import { OTestOutcome, countsAsFail } from '../contracts/types';
import { OTestResultZ, type OTestResult, type OTestSummary } from '../contracts/schemas';
import type { PolicyCatalog } from '../catalog/catalog';
import { silentLogger, type Logger } from '../logger';
import type { FoldedResults } from './types';

const OUTCOME_SEVERITY: Record<OTestOutcome, number> = {
  [OTestOutcome.PASS]: 0,
  [OTestOutcome.FAIL]: 1,
  [OTestOutcome.UNCERTAIN]: 2,
};

export interface FoldOptions {
  /**
   * Full pass: every catalog O-test must report, a missing one counts as
   * UNCERTAIN and unreadable entries are dropped. Otherwise (ticks) only the
   * submitted tests count and each unreadable entry is one UNCERTAIN.
   */
  fullPass: boolean;
  logger?: Logger;
}

/**
 * Validate, de-duplicate (keeping the worst outcome per test) and summarize.
 */
export function foldResults(
  entries: readonly unknown[],
  catalog: PolicyCatalog,
  options: FoldOptions
): FoldedResults {
  const logger = options.logger ?? silentLogger;
  const byId = new Map<string, OTestResult>();
  const ignoredIds: string[] = [];
  let invalidCount = 0;

  entries.forEach((entry, index) => {
    const parsed = OTestResultZ.safeParse(entry);
    if (!parsed.success) {
      invalidCount++;
      logger.warn('Unreadable O-test result', { index, issue: parsed.error.issues[0]?.message });
      return;
    }
    const result = parsed.data;
    if (!catalog.hasOTest(result.test_id)) {
      ignoredIds.push(result.test_id);
      logger.warn('Ignoring result for unknown O-test', { testId: result.test_id });
      return;
    }
    const existing = byId.get(result.test_id);
    if (!existing || OUTCOME_SEVERITY[result.outcome] > OUTCOME_SEVERITY[existing.outcome]) {
      byId.set(result.test_id, result);
    }
  });

  const results: OTestResult[] = [];
  const missingIds: string[] = [];
  for (const otest of catalog.getOTests()) {
    const result = byId.get(otest.id);
    if (result) {
      results.push(result);
    } else {
      missingIds.push(otest.id);
    }
  }

  const pass = results.filter(r => r.outcome === OTestOutcome.PASS).length;
  const fail = results.filter(r => r.outcome === OTestOutcome.FAIL).length;
  let uncertain = results.filter(r => r.outcome === OTestOutcome.UNCERTAIN).length;
  let total = results.length;

  if (options.fullPass) {
    if (missingIds.length > 0) {
      logger.warn('O-tests missing from full pass, counted as UNCERTAIN', { missing: missingIds });
    }
    uncertain += missingIds.length;
    total += missingIds.length;
  } else {
    uncertain += invalidCount;
    total += invalidCount;
  }

  const summary: OTestSummary = {
    total,
    pass,
    fail,
    uncertain,
    fail_count: fail + uncertain,
  };

  return { results, summary, ignoredIds, invalidCount, missingIds };
}

/**
 * FAIL count of a plain result list (UNCERTAIN counts as FAIL).
 */
export function countFailures(results: readonly OTestResult[]): number {
  return results.filter(r => countsAsFail(r.outcome)).length;
}

/**
 * Latest timestamp among the results, compared as instants.
 */
export function latestTimestamp(results: readonly OTestResult[]): string | undefined {
  let latest: OTestResult | undefined;
  for (const result of results) {
    if (!latest || Date.parse(result.timestamp) > Date.parse(latest.timestamp)) {
      latest = result;
    }
  }
  return latest?.timestamp;
}
