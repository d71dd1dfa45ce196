/**
 * Tests for SupervisorSession
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  BlockState,
  FatigueBand,
  LedgerEventType,
  Mode,
  OTestOutcome,
  TimerPhase,
  WorkPattern,
} from '../../contracts/types';
import { SCHEMA_VERSION } from '../../contracts/schemas';
import {
  ArtifactConflictError,
  BlockClosedError,
  InvalidPriorStateError,
  UnknownBlockError,
} from '../../errors';
import { silentLogger } from '../../logger';
import { parseCatalog } from '../../catalog/loader';
import { parseSchedule } from '../../schedule/loader';
import { ArtifactStore } from '../../ledger/artifact-store';
import type { SupervisorConfig } from '../../config/schema';
import { SupervisorSession } from '../session';
import {
  ALL_PASS,
  MONDAY_AFTERNOON,
  MONDAY_CONTEXT,
  catalogData,
  otests,
  scheduleTemplate,
} from '../../__tests__/fixtures';

const { PASS, FAIL } = OTestOutcome;

describe('SupervisorSession', () => {
  let storeDir: string;

  beforeEach(() => {
    storeDir = mkdtempSync(join(tmpdir(), 'plant-session-'));
  });

  afterEach(() => {
    rmSync(storeDir, { recursive: true, force: true });
  });

  function config(overrides: Partial<SupervisorConfig> = {}): SupervisorConfig {
    return {
      version: '1.0.0',
      logLevel: 'error',
      storeDir,
      requirePriorEndPointer: false,
      catalog: parseCatalog(catalogData()),
      schedule: parseSchedule(scheduleTemplate()),
      ...overrides,
    };
  }

  function open(sessionId = 's-1', overrides: Partial<SupervisorConfig> = {}): SupervisorSession {
    return SupervisorSession.open(config(overrides), sessionId, {
      logger: silentLogger,
      now: () => MONDAY_CONTEXT,
    });
  }

  function eventTypes(session: SupervisorSession): LedgerEventType[] {
    return session.getEvents().map(e => e.event_type);
  }

  describe('block lifecycle', () => {
    it('should close a block after two ticks with one end pointer from the final state', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));

      const decision = session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.YELLOW });
      expect(decision.kind).toBe('granted');

      const first = session.tick('b-1', otests([PASS]));
      const second = session.tick('b-1', otests([FAIL]));
      expect(first.verdict.mayContinue).toBe(true);
      expect(second.verdict.mayContinue).toBe(true);
      expect(second.outcome.mode).toBe(Mode.YELLOW);

      const pointer = session.closeBlock('b-1');
      expect(pointer.mode_at_end).toBe(second.outcome.mode);
      expect(pointer.fatigue_band_at_end).toBe(FatigueBand.RISING);
      expect(pointer.recommended_next_mode).toBe(Mode.YELLOW);

      expect(eventTypes(session)).toEqual([
        LedgerEventType.BLOCK_DEFINED,
        LedgerEventType.TICK_END,
        LedgerEventType.TICK_END,
        LedgerEventType.BLOCK_CLOSED,
      ]);
      expect(readdirSync(join(storeDir, 'sessions', 's-1', 'end-pointers'))).toEqual(['b-1.json']);
      expect(session.auditLedger()).toEqual({
        chain: { valid: true, eventsVerified: 4 },
        monotonicity: { valid: true, violations: [] },
      });
    });

    it('should force-close a block whose mode is above the new HPS mode', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.GREEN });

      const result = session.tick('b-1', otests([FAIL]));
      expect(result.verdict).toMatchObject({ mayContinue: false, reason: 'mode above HPS ceiling' });
      expect(result.closed?.mode_at_end).toBe(Mode.YELLOW);

      const closed = session.getEvents()[2];
      expect(closed.event_type).toBe(LedgerEventType.BLOCK_CLOSED);
      expect(closed.reason).toBe('mode above HPS ceiling');
    });

    it('should reject ticks for unknown or closed blocks without touching the state', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      expect(() => session.tick('ghost', otests([FAIL]))).toThrow(UnknownBlockError);

      session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.GREEN });
      session.closeBlock('b-1');
      expect(() => session.tick('b-1', otests([FAIL, FAIL]))).toThrow(BlockClosedError);

      expect(session.getState().mode).toBe(Mode.GREEN);
      expect(session.getState().fatigueBand).toBe(FatigueBand.OK);
      expect(session.getEvents()).toHaveLength(2);
    });

    it('should deny CTX outside the schedule', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      const decision = session.proposeBlock(
        { block_id: 'ctx-1', work_pattern: WorkPattern.CTX, mode_at_start: Mode.GREEN },
        MONDAY_AFTERNOON
      );
      expect(decision).toMatchObject({ kind: 'denied', reason: 'CTX outside legal window' });
      expect(eventTypes(session)).toEqual([LedgerEventType.BLOCK_DENIED]);
    });
  });

  describe('CTX exclusivity', () => {
    it('should deny a second CTX block on the same day from another session', () => {
      const morning = open('am');
      morning.preflight(otests(ALL_PASS));
      const first = morning.proposeBlock({ block_id: 'c1', work_pattern: WorkPattern.CTX, mode_at_start: Mode.GREEN });
      expect(first.kind).toBe('granted');
      morning.closeBlock('c1');

      const later = open('am2');
      later.preflight(otests(ALL_PASS));
      const second = later.proposeBlock(
        { block_id: 'c2', work_pattern: WorkPattern.CTX, mode_at_start: Mode.GREEN },
        new Date('2024-06-03T11:00:00Z')
      );
      expect(second).toMatchObject({ kind: 'denied', reason: 'CTX block already defined today' });
      expect(existsSync(join(storeDir, 'sessions', 'am2', 'blocks', 'c2.json'))).toBe(false);
    });

    it('should grant CTX to another session on the next day', () => {
      const monday = open('mon');
      monday.preflight(otests(ALL_PASS));
      monday.proposeBlock({ block_id: 'c1', work_pattern: WorkPattern.CTX, mode_at_start: Mode.GREEN });

      const tuesday = open('tue');
      tuesday.preflight(otests(ALL_PASS));
      const decision = tuesday.proposeBlock(
        { block_id: 'c2', work_pattern: WorkPattern.CTX, mode_at_start: Mode.GREEN },
        new Date('2024-06-04T10:00:00Z')
      );
      expect(decision.kind).toBe('granted');
    });
  });

  describe('stale ledger lock', () => {
    it('should resume a session whose previous writer died holding the lock', () => {
      const crashed = open('crash');
      crashed.preflight(otests(ALL_PASS));
      crashed.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.GREEN });
      writeFileSync(
        join(storeDir, 'sessions', 'crash', 'ledger.lock'),
        JSON.stringify({ pid: 2147483646, acquired_at: '2024-06-03T10:00:00.000Z' })
      );

      const again = open('crash');
      again.preflight(otests(ALL_PASS));
      const decision = again.proposeBlock({ block_id: 'b-2', work_pattern: WorkPattern.SYL, mode_at_start: Mode.GREEN });
      expect(decision.kind).toBe('granted');
      expect(eventTypes(again)).toEqual([LedgerEventType.BLOCK_DEFINED, LedgerEventType.BLOCK_DEFINED]);
    });
  });

  describe('checkBoundary', () => {
    it('should check actions against the active block', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      session.proposeBlock({
        block_id: 'b-1',
        work_pattern: WorkPattern.SYL,
        mode_at_start: Mode.GREEN,
        allowed_paths: ['src/'],
      });
      expect(session.checkBoundary({ move: 'edit', path: 'src/a.ts' })).toEqual({ allowed: true, blockId: 'b-1' });
      expect(session.checkBoundary({ move: 'edit', path: 'test/a.ts' })).toEqual({
        allowed: false,
        blockId: 'b-1',
        reason: 'path "test/a.ts" is outside allowed_paths',
      });
    });
  });

  describe('reset protocol', () => {
    it('should start a reset at NEAR_LIMIT and end it with a fresh pass', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.YELLOW });

      const result = session.tick('b-1', otests([FAIL, FAIL]));
      expect(result.outcome.timerPhase).toBe(TimerPhase.RESET_SHORT);
      expect(result.closed).toBeUndefined();
      expect(result.resetStarted).toMatchObject({
        event_type: LedgerEventType.RESET_START,
        block_id: 'b-1',
        reason: 'RESET_SHORT for 10 minutes',
        timer_phase: TimerPhase.RESET_SHORT,
      });

      const denied = session.proposeBlock({ block_id: 'b-2', work_pattern: WorkPattern.SYL, mode_at_start: Mode.RED });
      expect(denied).toMatchObject({ kind: 'denied', reason: 'timer in reset phase' });

      const reset = session.completeReset(otests(ALL_PASS));
      expect(reset).toMatchObject({
        mode: Mode.GREEN,
        fatigueBand: FatigueBand.OK,
        timerPhase: TimerPhase.WORK,
        resetCount: 1,
      });
      expect(reset.event).toMatchObject({
        event_type: LedgerEventType.RESET_END,
        block_id: null,
        otest_summary: { total: 3, pass: 3, fail: 0, uncertain: 0, fail_count: 0 },
      });

      session.tick('b-1', otests([PASS]));
      expect(eventTypes(session)).toEqual([
        LedgerEventType.BLOCK_DEFINED,
        LedgerEventType.TICK_END,
        LedgerEventType.RESET_START,
        LedgerEventType.BLOCK_DENIED,
        LedgerEventType.RESET_END,
        LedgerEventType.TICK_END,
      ]);
      expect(session.auditLedger().monotonicity.valid).toBe(true);
    });
  });

  describe('preflight', () => {
    it('should clamp the next session to the recommendation of the last one', () => {
      const first = open('s-1');
      first.preflight(otests(ALL_PASS));
      first.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.YELLOW });
      first.tick('b-1', otests([FAIL]));
      first.closeBlock('b-1');

      const next = open('s-2');
      const { snapshot, resumed, fallbackReason } = next.preflight(otests(ALL_PASS));
      expect(snapshot.mode).toBe(Mode.YELLOW);
      expect(snapshot.fatigue_band).toBe(FatigueBand.OK);
      expect(snapshot.prior_block_id).toBe('b-1');
      expect(resumed).toBe(false);
      expect(fallbackReason).toBeUndefined();
    });

    it('should store the snapshot under its digest', () => {
      const session = open();
      const { digest, snapshot } = session.preflight(otests(ALL_PASS));
      const read = session.getStore().readSnapshot(digest);
      expect(read.status === 'ok' && read.value).toEqual(snapshot);
    });

    it('should engage the notes-only fallback when the prior pointer is invalid', () => {
      const earlier = new ArtifactStore({ storeDir, sessionId: 's-0' });
      const path = earlier.saveEndPointer({
        schema_version: SCHEMA_VERSION,
        block_id: 'b-0',
        mode_at_end: Mode.GREEN,
        fatigue_band_at_end: FatigueBand.OK,
        recommended_next_mode: Mode.GREEN,
        timestamp: '2024-06-02T18:00:00.000Z',
      });
      writeFileSync(path, JSON.stringify({ ...JSON.parse(readFileSync(path, 'utf-8')), mode_at_end: 'PURPLE' }));
      const prefix = `invalid end pointer at ${path}: mode_at_end: `;

      const session = open('s-1');
      const result = session.preflight(otests(ALL_PASS));
      expect(result.fallbackReason?.startsWith(prefix)).toBe(true);
      expect(session.isFallbackEngaged()).toBe(true);

      const events = session.getEvents();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ event_type: LedgerEventType.BLOCK_DENIED, block_id: null });
      expect(events[0].reason).toBe(`notes-only fallback: ${result.fallbackReason}`);
      expect(result.snapshot.mode).toBe(Mode.GREEN);

      const decision = session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.RED });
      expect(decision.kind).toBe('fallback');
    });

    it('should refuse to start without a required prior pointer', () => {
      const session = open('s-1', { requirePriorEndPointer: true });
      expect(() => session.preflight(otests(ALL_PASS))).toThrow(InvalidPriorStateError);
    });

    it('should refuse to start without a required prior pointer even when a block contract is invalid', () => {
      const blocks = join(storeDir, 'sessions', 's-1', 'blocks');
      mkdirSync(blocks, { recursive: true });
      writeFileSync(join(blocks, 'broken.json'), '{}');

      const session = open('s-1', { requirePriorEndPointer: true });
      expect(() => session.preflight(otests(ALL_PASS))).toThrow(InvalidPriorStateError);
      expect(session.getEvents()).toHaveLength(0);
    });

    it('should run only once per session', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      expect(() => session.preflight(otests(ALL_PASS))).toThrow('Preflight already ran for session s-1');
    });

    it('should resume a session from its ledger and persisted blocks', () => {
      const first = open('s-1');
      first.preflight(otests(ALL_PASS));
      first.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.GREEN });
      first.tick('b-1', otests([FAIL]));

      const again = open('s-1');
      const { resumed } = again.preflight(otests(ALL_PASS));
      expect(resumed).toBe(true);
      expect(again.getState().mode).toBe(Mode.YELLOW);
      expect(again.getState().fatigueBand).toBe(FatigueBand.RISING);
      expect(() => again.tick('b-1', otests([PASS]))).toThrow(BlockClosedError);
    });
  });

  describe('emitCheckpoint', () => {
    function closedSession(): SupervisorSession {
      const session = open();
      session.preflight(otests(ALL_PASS));
      session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.YELLOW });
      session.tick('b-1', otests([PASS]));
      session.tick('b-1', otests([FAIL]));
      session.closeBlock('b-1');
      return session;
    }

    it('should write the checkpoint and log its digest', () => {
      const session = closedSession();
      const checkpoint = session.emitCheckpoint('b-1');

      expect(checkpoint.summary).toBe(
        'Block b-1 closed at 2024-06-03T10:00:00.000Z in YELLOW with fatigue band RISING after 2 ticks. ' +
        'Recommended next mode: YELLOW.'
      );
      const last = session.getEvents()[session.getEvents().length - 1];
      expect(last.event_type).toBe(LedgerEventType.CHECKPOINT_EMITTED);
      expect(last.reason).toBe(`digest ${checkpoint.digest}`);

      const checkpoints = join(storeDir, 'sessions', 's-1', 'checkpoints');
      expect(existsSync(join(checkpoints, 'b-1.json'))).toBe(true);
      expect(existsSync(join(checkpoints, 'b-1.md'))).toBe(true);
    });

    it('should refuse to emit twice', () => {
      const session = closedSession();
      session.emitCheckpoint('b-1');
      expect(() => session.emitCheckpoint('b-1')).toThrow(ArtifactConflictError);
    });

    it('should refuse a block without an end pointer', () => {
      const session = open();
      session.preflight(otests(ALL_PASS));
      session.proposeBlock({ block_id: 'b-1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.GREEN });
      expect(() => session.emitCheckpoint('b-1')).toThrow('Block b-1 has no end pointer');
      const block = session.getStore().readBlock('b-1');
      expect(block.status === 'ok' && block.value.state).toBe(BlockState.DEFINED);
    });
  });
});
