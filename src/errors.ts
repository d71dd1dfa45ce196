/**
 * Supervisor Errors
 *
 * Fatal conditions only. Policy denials and fail-safe classifications are
 * returned as values and never appear here.
 */

import type { SchemaIssue } from './contracts/schemas';

/**
 * Malformed configuration detected at load time.
 * Startup must abort; values are never coerced.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: SchemaIssue[] = []
  ) {
    super(issues.length > 0
      ? `${message}:\n${issues.map(i => `  ${i.path || '(root)'}: ${i.message}`).join('\n')}`
      : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The previous end pointer is missing where monotonicity requires one, or malformed.
 */
export class InvalidPriorStateError extends Error {
  constructor(message: string, public readonly issues: SchemaIssue[] = []) {
    super(message);
    this.name = 'InvalidPriorStateError';
  }
}

/**
 * A block id does not name a block in the state the operation requires.
 */
export class UnknownBlockError extends Error {
  constructor(public readonly blockId: string, detail = 'is not DEFINED') {
    super(`Block ${blockId} ${detail}`);
    this.name = 'UnknownBlockError';
  }
}

/**
 * Attempt to record an event against a CLOSED block.
 */
export class BlockClosedError extends Error {
  constructor(public readonly blockId: string) {
    super(`Block ${blockId} is CLOSED and cannot take further events`);
    this.name = 'BlockClosedError';
  }
}

/**
 * Another writer holds, or has written to, the session ledger.
 */
export class ConcurrentSessionError extends Error {
  constructor(message: string, public readonly ledgerPath: string) {
    super(message);
    this.name = 'ConcurrentSessionError';
  }
}

/**
 * The persisted ledger fails hash-chain verification.
 */
export class LedgerCorruptedError extends Error {
  constructor(
    message: string,
    public readonly brokenAt: number
  ) {
    super(message);
    this.name = 'LedgerCorruptedError';
  }
}

/**
 * A ledger event is missing required fields or carries out-of-enum values.
 */
export class InvalidLedgerEventError extends Error {
  constructor(message: string, public readonly issues: SchemaIssue[] = []) {
    super(message);
    this.name = 'InvalidLedgerEventError';
  }
}

/**
 * A write-once artifact already exists.
 */
export class ArtifactConflictError extends Error {
  constructor(message: string, public readonly artifactPath: string) {
    super(message);
    this.name = 'ArtifactConflictError';
  }
}
