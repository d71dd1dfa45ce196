/**
 * Artifact Schemas
 *
 * Runtime schemas for every persisted artifact. An artifact is trusted only
 * after it parses against its schema; all object schemas are strict so that
 * unknown fields are rejected rather than carried along.
 */

import { z } from 'zod';
import {
  Mode,
  FatigueBand,
  TimerPhase,
  OTestOutcome,
  WorkPattern,
  BlockState,
  LedgerEventType,
  CheckpointOperation,
} from './types';

/** Current schema version written into every artifact */
export const SCHEMA_VERSION = '1.0.0';

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/, 'must be a semantic version');

const TimestampZ = z.string().datetime({ offset: true });

const HashZ = z.string().regex(/^[0-9a-f]{64}$/, 'must be a hex SHA-256 digest');

/** Block ids double as file names, so they are restricted to a safe alphabet */
export const BlockIdZ = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must be alphanumeric with . _ -');

const CalendarDayZ = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD');

export const ModeZ = z.nativeEnum(Mode);
export const FatigueBandZ = z.nativeEnum(FatigueBand);
export const TimerPhaseZ = z.nativeEnum(TimerPhase);
export const OTestOutcomeZ = z.nativeEnum(OTestOutcome);
export const WorkPatternZ = z.nativeEnum(WorkPattern);
export const BlockStateZ = z.nativeEnum(BlockState);
export const LedgerEventTypeZ = z.nativeEnum(LedgerEventType);
export const CheckpointOperationZ = z.nativeEnum(CheckpointOperation);

export const OTestResultZ = z
  .object({
    test_id: z.string().min(1),
    outcome: OTestOutcomeZ,
    timestamp: TimestampZ,
  })
  .strict();

export const PreflightSnapshotZ = z
  .object({
    schema_version: SemVerZ,
    otest_results: z.array(OTestResultZ),
    fail_count: z.number().int().nonnegative(),
    fatigue_band: FatigueBandZ,
    mode: ModeZ,
    prior_block_id: BlockIdZ.nullable(),
    timestamp: TimestampZ,
  })
  .strict()
  .refine((v) => !(v.mode === Mode.RED && v.fatigue_band === FatigueBand.OK), {
    message: 'RED mode requires a fatigue band other than OK',
  });

export const TimeBlockZ = z
  .object({
    schema_version: SemVerZ,
    block_id: BlockIdZ,
    work_pattern: WorkPatternZ,
    mode_at_start: ModeZ,
    allowed_paths: z.array(z.string().min(1)),
    declared_illegal_moves: z.array(z.string().min(1)),
    state: BlockStateZ,
    day: CalendarDayZ,
    defined_at: TimestampZ,
  })
  .strict();

export const EndPointerZ = z
  .object({
    schema_version: SemVerZ,
    block_id: BlockIdZ,
    mode_at_end: ModeZ,
    fatigue_band_at_end: FatigueBandZ,
    recommended_next_mode: ModeZ,
    timestamp: TimestampZ,
  })
  .strict();

export const OTestSummaryZ = z
  .object({
    total: z.number().int().nonnegative(),
    pass: z.number().int().nonnegative(),
    fail: z.number().int().nonnegative(),
    uncertain: z.number().int().nonnegative(),
    fail_count: z.number().int().nonnegative(),
  })
  .strict();

export const LedgerEventZ = z
  .object({
    seq: z.number().int().nonnegative(),
    ts: TimestampZ,
    timer_phase: TimerPhaseZ,
    mode: ModeZ,
    fatigue_band: FatigueBandZ,
    block_id: BlockIdZ.nullable(),
    event_type: LedgerEventTypeZ,
    otest_summary: OTestSummaryZ.optional(),
    reason: z.string().min(1).optional(),
    prev_hash: HashZ.nullable(),
    hash: HashZ,
  })
  .strict();

/** Fields a caller supplies when appending; chain fields are computed */
export const LedgerEventInputZ = z
  .object({
    ts: TimestampZ,
    timer_phase: TimerPhaseZ,
    mode: ModeZ,
    fatigue_band: FatigueBandZ,
    block_id: BlockIdZ.nullable(),
    event_type: LedgerEventTypeZ,
    otest_summary: OTestSummaryZ.optional(),
    reason: z.string().min(1).optional(),
  })
  .strict();

export const CheckpointZ = z
  .object({
    schema_version: SemVerZ,
    block_id: BlockIdZ,
    end_pointer: EndPointerZ,
    summary: z.string().min(1),
    allowed_operations: z
      .array(CheckpointOperationZ)
      .min(1)
      .refine((ops) => new Set(ops).size === ops.length, {
        message: 'allowed_operations must not repeat',
      }),
    digest: HashZ,
  })
  .strict();

export type OTestResult = z.infer<typeof OTestResultZ>;
export type PreflightSnapshot = z.infer<typeof PreflightSnapshotZ>;
export type TimeBlock = z.infer<typeof TimeBlockZ>;
export type EndPointer = z.infer<typeof EndPointerZ>;
export type OTestSummary = z.infer<typeof OTestSummaryZ>;
export type LedgerEvent = z.infer<typeof LedgerEventZ>;
export type LedgerEventInput = z.infer<typeof LedgerEventInputZ>;
export type Checkpoint = z.infer<typeof CheckpointZ>;

/**
 * A single schema violation.
 */
export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * Result of validating an untrusted value against an artifact schema.
 */
export type ArtifactCheck<T> =
  | { ok: true; value: T }
  | { ok: false; issues: SchemaIssue[] };

/**
 * Convert zod issues into path/message pairs.
 */
export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate an untrusted value against a schema without throwing.
 */
export function checkArtifact<T>(schema: z.ZodType<T>, input: unknown): ArtifactCheck<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, issues: toSchemaIssues(result.error) };
}

/**
 * Format schema issues as a single line for logs and ledger reasons.
 */
export function formatSchemaIssues(issues: SchemaIssue[]): string {
  return issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
}
