/**
 * Tests for checkpoint building
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'crypto';
import { canonicalize } from 'json-canonicalize';
import {
  CheckpointOperation,
  FatigueBand,
  LedgerEventType,
  Mode,
  TimerPhase,
} from '../../contracts/types';
import { CheckpointZ, SCHEMA_VERSION, type EndPointer } from '../../contracts/schemas';
import { createLedgerEvent } from '../../ledger/ledger-entry';
import {
  ALL_CHECKPOINT_OPERATIONS,
  buildCheckpoint,
  renderCheckpointSummary,
  summarizeBlock,
  verifyCheckpointDigest,
} from '../checkpoint';

const pointer: EndPointer = {
  schema_version: SCHEMA_VERSION,
  block_id: 'b-1',
  mode_at_end: Mode.YELLOW,
  fatigue_band_at_end: FatigueBand.RISING,
  recommended_next_mode: Mode.YELLOW,
  timestamp: '2024-06-03T12:00:00.000Z',
};

describe('buildCheckpoint', () => {
  it('should seal the content with a digest over everything else', () => {
    const checkpoint = buildCheckpoint(pointer, 'done');
    const { digest, ...rest } = checkpoint;

    expect(digest).toBe(createHash('sha256').update(canonicalize(rest)).digest('hex'));
    expect(checkpoint.allowed_operations).toEqual([...ALL_CHECKPOINT_OPERATIONS]);
    expect(CheckpointZ.safeParse(checkpoint).success).toBe(true);
    expect(verifyCheckpointDigest(checkpoint)).toBe(true);
  });

  it('should detect edits after sealing', () => {
    const checkpoint = buildCheckpoint(pointer, 'done', [CheckpointOperation.COMMENT]);
    expect(verifyCheckpointDigest({
      ...checkpoint,
      allowed_operations: [CheckpointOperation.COMMENT, CheckpointOperation.LABEL_ADD],
    })).toBe(false);
  });

  it('should give identical digests for identical inputs', () => {
    expect(buildCheckpoint({ ...pointer }, 'done').digest).toBe(buildCheckpoint(pointer, 'done').digest);
  });

  it('should reject empty or repeated operations', () => {
    expect(() => buildCheckpoint(pointer, 'done', [])).toThrow('Invalid checkpoint');
    expect(() => buildCheckpoint(pointer, 'done', [CheckpointOperation.COMMENT, CheckpointOperation.COMMENT]))
      .toThrow('allowed_operations must not repeat');
  });
});

describe('summarizeBlock', () => {
  it('should describe how the block ended', () => {
    const base = {
      timer_phase: TimerPhase.WORK,
      mode: Mode.YELLOW,
      fatigue_band: FatigueBand.RISING,
      block_id: 'b-1',
    };
    const tick = createLedgerEvent({ ...base, ts: '2024-06-03T11:00:00.000Z', event_type: LedgerEventType.TICK_END }, 0, null);
    const closed = createLedgerEvent(
      { ...base, ts: '2024-06-03T12:00:00.000Z', event_type: LedgerEventType.BLOCK_CLOSED, reason: 'mode above HPS ceiling' },
      1,
      tick.hash
    );

    expect(summarizeBlock(pointer, [tick, closed])).toBe(
      'Block b-1 closed at 2024-06-03T12:00:00.000Z in YELLOW with fatigue band RISING after 1 tick. ' +
      'Close reason: mode above HPS ceiling. Recommended next mode: YELLOW.'
    );
    expect(summarizeBlock(pointer)).toBe(
      'Block b-1 closed at 2024-06-03T12:00:00.000Z in YELLOW with fatigue band RISING after 0 ticks. ' +
      'Recommended next mode: YELLOW.'
    );
  });
});

describe('renderCheckpointSummary', () => {
  it('should list the allowed operations and the digest', () => {
    const checkpoint = buildCheckpoint(pointer, 'done', [CheckpointOperation.COMMENT, CheckpointOperation.LABEL_ADD]);
    const lines = renderCheckpointSummary(checkpoint).split('\n');
    expect(lines[0]).toBe('# Checkpoint: b-1');
    expect(lines).toContain('| Recommended next mode | YELLOW |');
    expect(lines).toContain('Allowed operations: comment, label_add');
    expect(lines).toContain(`Digest: \`${checkpoint.digest}\``);
  });
});
