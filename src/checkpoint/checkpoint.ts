/**
 * Checkpoint
 *
 * Read-only projection of a closed block's end pointer for an external
 * actuator (issue comments, labels, project boards). The core only emits
 * it; the actuator may perform nothing outside `allowed_operations`.
 */

import { createHash } from 'crypto';
import { canonicalize } from 'json-canonicalize';
import { CheckpointOperation, LedgerEventType } from '../contracts/types';
import {
  CheckpointZ,
  SCHEMA_VERSION,
  formatSchemaIssues,
  toSchemaIssues,
  type Checkpoint,
  type EndPointer,
  type LedgerEvent,
} from '../contracts/schemas';

export type CheckpointData = Omit<Checkpoint, 'digest'>;

/** Every operation an actuator may be granted */
export const ALL_CHECKPOINT_OPERATIONS: readonly CheckpointOperation[] = Object.freeze(
  Object.values(CheckpointOperation)
);

/**
 * SHA-256 over the canonical JSON of every field but `digest`.
 */
export function computeCheckpointDigest(data: CheckpointData): string {
  return createHash('sha256').update(canonicalize(data)).digest('hex');
}

/**
 * One-paragraph summary of how a block ended.
 */
export function summarizeBlock(pointer: EndPointer, blockEvents: readonly LedgerEvent[] = []): string {
  const ticks = blockEvents.filter(e => e.event_type === LedgerEventType.TICK_END).length;
  const closed = blockEvents.find(e => e.event_type === LedgerEventType.BLOCK_CLOSED);
  const parts = [
    `Block ${pointer.block_id} closed at ${pointer.timestamp} in ${pointer.mode_at_end}`,
    `with fatigue band ${pointer.fatigue_band_at_end}`,
    `after ${ticks} tick${ticks === 1 ? '' : 's'}.`,
  ];
  if (closed?.reason) {
    parts.push(`Close reason: ${closed.reason}.`);
  }
  parts.push(`Recommended next mode: ${pointer.recommended_next_mode}.`);
  return parts.join(' ');
}

/**
 * Build a checkpoint and seal it with its digest.
 *
 * @throws Error if the operations list is empty or repeats
 */
export function buildCheckpoint(
  pointer: EndPointer,
  summary: string,
  operations: readonly CheckpointOperation[] = ALL_CHECKPOINT_OPERATIONS
): Checkpoint {
  const data: CheckpointData = {
    schema_version: SCHEMA_VERSION,
    block_id: pointer.block_id,
    end_pointer: { ...pointer },
    summary,
    allowed_operations: [...operations],
  };
  const checkpoint = { ...data, digest: computeCheckpointDigest(data) };

  const parsed = CheckpointZ.safeParse(checkpoint);
  if (!parsed.success) {
    throw new Error(`Invalid checkpoint: ${formatSchemaIssues(toSchemaIssues(parsed.error))}`);
  }
  return parsed.data;
}

/**
 * Whether the digest still matches the content.
 */
export function verifyCheckpointDigest(checkpoint: Checkpoint): boolean {
  const { digest, ...data } = checkpoint;
  return digest === computeCheckpointDigest(data);
}

/**
 * Markdown rendering for humans reading the checkpoint directory.
 */
export function renderCheckpointSummary(checkpoint: Checkpoint): string {
  const p = checkpoint.end_pointer;
  return [
    `# Checkpoint: ${checkpoint.block_id}`,
    '',
    checkpoint.summary,
    '',
    '| Field | Value |',
    '| --- | --- |',
    `| Mode at end | ${p.mode_at_end} |`,
    `| Fatigue band at end | ${p.fatigue_band_at_end} |`,
    `| Recommended next mode | ${p.recommended_next_mode} |`,
    `| Closed at | ${p.timestamp} |`,
    '',
    `Allowed operations: ${checkpoint.allowed_operations.join(', ')}`,
    '',
    `Digest: \`${checkpoint.digest}\``,
    '',
  ].join('\n');
}
