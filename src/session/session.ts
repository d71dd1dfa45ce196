/**
 * Supervisor Session
 *
 * The control loop for one operator session: preflight, block proposals,
 * ticks, resets, closes and checkpoints, in strict sequence. Owns one
 * instance of each supervisor; nothing here is process-global.
 */

import { BlockState, LedgerEventType, isResetPhase } from '../contracts/types';
import type { CheckpointOperation } from '../contracts/types';
import {
  formatSchemaIssues,
  type Checkpoint,
  type EndPointer,
  type LedgerEvent,
  type PreflightSnapshot,
} from '../contracts/schemas';
import { BlockClosedError, UnknownBlockError } from '../errors';
import { createLogger, type Logger } from '../logger';
import type { SupervisorConfig } from '../config/schema';
import { SchedulerGate } from '../schedule/schedule-gate';
import { HumanPlantSupervisor } from '../hps/human-plant-supervisor';
import type { HumanPlantState, ResetOutcome, TickOutcome } from '../hps/types';
import { ExecutionLedgerSupervisor } from '../els/execution-ledger-supervisor';
import type {
  BlockProposal,
  BoundaryAction,
  BoundaryVerdict,
  LegalityDecision,
  TickVerdict,
} from '../els/types';
import { SessionLedger } from '../ledger/ledger';
import { ArtifactStore } from '../ledger/artifact-store';
import { getBlockHistory } from '../ledger/query';
import {
  auditMonotonicity,
  verifyLedger,
  type LedgerVerificationResult,
  type MonotonicityReport,
} from '../ledger/verifier';
import {
  buildCheckpoint,
  renderCheckpointSummary,
  summarizeBlock,
} from '../checkpoint/checkpoint';

export interface SessionOptions {
  now?: () => Date;
  logger?: Logger;
}

export interface PreflightResult {
  snapshot: PreflightSnapshot;
  /** Content digest the snapshot is stored under */
  digest: string;
  /** Set when the notes-only fallback was engaged */
  fallbackReason?: string;
  /** The ledger already held events and the state was re-applied from them */
  resumed: boolean;
}

export interface TickResult {
  outcome: TickOutcome;
  verdict: TickVerdict;
  /** End pointer of the block, when the tick force-closed it */
  closed?: EndPointer;
  /** RESET_START event, when the tick started a reset */
  resetStarted?: LedgerEvent;
}

export interface CompleteResetResult extends ResetOutcome {
  event: LedgerEvent;
}

export interface LedgerAudit {
  chain: LedgerVerificationResult;
  monotonicity: MonotonicityReport;
}

/**
 * One supervised session.
 *
 * @example
 * ```typescript
 * const config = loadSupervisorConfig('./config/supervisor.yaml');
 * const session = SupervisorSession.open(config, '2024-06-03-am');
 * session.preflight(otestResults);
 * const decision = session.proposeBlock({ block_id: 'b1', work_pattern: WorkPattern.SYL, mode_at_start: Mode.YELLOW });
 * session.tick('b1', tickResults);
 * session.closeBlock('b1');
 * session.emitCheckpoint('b1');
 * ```
 */
export class SupervisorSession {
  readonly sessionId: string;
  private readonly config: SupervisorConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly ledger: SessionLedger;
  private readonly store: ArtifactStore;
  private readonly gate: SchedulerGate;
  private readonly hps: HumanPlantSupervisor;
  private readonly els: ExecutionLedgerSupervisor;
  private readonly invalidArtifacts: string[];

  private constructor(config: SupervisorConfig, sessionId: string, options: SessionOptions) {
    this.sessionId = sessionId;
    this.config = config;
    this.logger = options.logger ?? createLogger(config.logLevel, `plant:${sessionId}`);
    this.now = options.now ?? (() => new Date());

    const base = { storeDir: config.storeDir, sessionId, logger: this.logger };
    this.ledger = SessionLedger.open({ ...base, now: this.now });
    this.store = new ArtifactStore(base);
    this.gate = new SchedulerGate(config.schedule);
    this.hps = new HumanPlantSupervisor(config.catalog, {
      requirePriorEndPointer: config.requirePriorEndPointer,
      logger: this.logger,
    });

    const { blocks, invalid } = this.store.loadBlocks();
    this.invalidArtifacts = invalid.map(a => `invalid block contract at ${a.path}: ${formatSchemaIssues(a.issues)}`);
    this.els = new ExecutionLedgerSupervisor({
      ledger: this.ledger,
      store: this.store,
      hps: this.hps,
      gate: this.gate,
      blocks,
      logger: this.logger,
      now: this.now,
    });
  }

  /**
   * Open a session, loading and verifying anything already persisted for it.
   *
   * @throws LedgerCorruptedError if the existing ledger fails verification
   */
  static open(config: SupervisorConfig, sessionId: string, options: SessionOptions = {}): SupervisorSession {
    return new SupervisorSession(config, sessionId, options);
  }

  /**
   * Run preflight against the latest end pointer in the store.
   *
   * A pointer that fails its schema is treated as missing and engages the
   * notes-only fallback. A pointer that is absent while one is required is
   * fatal, whatever else is wrong with the store.
   *
   * @throws InvalidPriorStateError
   */
  preflight(otestResults: readonly unknown[]): PreflightResult {
    if (this.hps.hasStarted()) {
      throw new Error(`Preflight already ran for session ${this.sessionId}`);
    }

    const reasons = [...this.invalidArtifacts];
    let prior: EndPointer | null = null;
    const read = this.store.readLatestEndPointer();
    const pointerInvalid = read.status === 'invalid';
    if (read.status === 'ok') {
      prior = read.value;
    } else if (read.status === 'invalid') {
      this.logger.warn('Prior end pointer failed validation', { path: read.path });
      reasons.unshift(`invalid end pointer at ${read.path}: ${formatSchemaIssues(read.issues)}`);
    }

    const snapshot = this.hps.preflight(otestResults, prior, { allowMissing: pointerInvalid });
    const { digest } = this.store.saveSnapshot(snapshot);

    const last = this.ledger.getLastEvent();
    if (last) {
      const resets = this.ledger.getEvents().filter(e => e.event_type === LedgerEventType.RESET_END).length;
      this.hps.resumeFrom(last, resets);
    }

    let fallbackReason: string | undefined;
    if (reasons.length > 0) {
      fallbackReason = reasons.join('; ');
      this.els.engageFallback(fallbackReason);
    }

    return { snapshot, digest, fallbackReason, resumed: last !== undefined };
  }

  /**
   * Ask for a block. The schedule is evaluated at `at` (default now).
   */
  proposeBlock(proposal: BlockProposal, at?: Date): LegalityDecision {
    return this.els.defineBlock(proposal, this.gate.verdict(at ?? this.now()));
  }

  /**
   * End a tick: reclassify, log TICK_END, force-close the block if it may
   * not continue, and start a reset if the policy demands one.
   *
   * @throws UnknownBlockError if the block does not exist
   * @throws BlockClosedError if the block is CLOSED
   */
  tick(blockId: string, otestResults: readonly unknown[], at?: Date): TickResult {
    const block = this.els.getBlock(blockId);
    if (!block) {
      throw new UnknownBlockError(blockId, 'does not exist');
    }
    if (block.state === BlockState.CLOSED) {
      throw new BlockClosedError(blockId);
    }

    const when = at ?? this.now();
    const phaseBefore = this.hps.getState().timerPhase;
    const outcome = this.hps.onTickEnd(otestResults, this.gate.allowsContextWork(when));
    const verdict = this.els.recordTick(blockId, outcome.summary, {
      forceClose: outcome.forceCloseBlock,
      at: when,
    });

    const result: TickResult = { outcome, verdict };
    if (!verdict.mayContinue) {
      this.logger.warn('Block may not continue, closing', { blockId, reason: verdict.reason });
      result.closed = this.els.closeBlock(blockId, verdict.reason);
    }

    if (!isResetPhase(phaseBefore) && isResetPhase(outcome.timerPhase)) {
      const stillDefined = this.els.getBlock(blockId)?.state === BlockState.DEFINED;
      result.resetStarted = this.els.recordStateEvent(LedgerEventType.RESET_START, stillDefined ? blockId : null, {
        reason: `${outcome.timerPhase} for ${this.config.catalog.resetMinutes(outcome.timerPhase)} minutes`,
        at: when,
      });
    }
    return result;
  }

  /**
   * Finish a reset with a fresh full O-test pass and log RESET_END.
   */
  completeReset(otestResults: readonly unknown[], at?: Date): CompleteResetResult {
    const outcome = this.hps.completeReset(otestResults);
    const event = this.els.recordStateEvent(LedgerEventType.RESET_END, null, {
      summary: outcome.summary,
      at,
    });
    return { ...outcome, event };
  }

  closeBlock(blockId: string, reason?: string): EndPointer {
    return this.els.closeBlock(blockId, reason);
  }

  checkBoundary(action: BoundaryAction, blockId?: string): BoundaryVerdict {
    return this.els.enforceBoundary(action, blockId);
  }

  /**
   * Write the checkpoint of a closed block and log CHECKPOINT_EMITTED.
   *
   * @throws UnknownBlockError if the block has no valid end pointer
   * @throws ArtifactConflictError if a checkpoint was already emitted
   */
  emitCheckpoint(blockId: string, operations?: readonly CheckpointOperation[]): Checkpoint {
    const read = this.store.readEndPointer(blockId);
    if (read.status !== 'ok') {
      throw new UnknownBlockError(blockId, read.status === 'missing' ? 'has no end pointer' : 'has an invalid end pointer');
    }

    const pointer = read.value;
    const summary = summarizeBlock(pointer, getBlockHistory(this.ledger.getEvents(), blockId));
    const checkpoint = buildCheckpoint(pointer, summary, operations);
    this.store.saveCheckpoint(checkpoint, renderCheckpointSummary(checkpoint));
    this.els.recordStateEvent(LedgerEventType.CHECKPOINT_EMITTED, blockId, {
      reason: `digest ${checkpoint.digest}`,
    });
    return checkpoint;
  }

  /**
   * Chain integrity and monotonicity of everything logged so far.
   */
  auditLedger(): LedgerAudit {
    const events = this.ledger.getEvents();
    return { chain: verifyLedger(events), monotonicity: auditMonotonicity(events) };
  }

  getState(): Readonly<HumanPlantState> {
    return this.hps.getState();
  }

  getEvents(): readonly LedgerEvent[] {
    return this.ledger.getEvents();
  }

  getStore(): ArtifactStore {
    return this.store;
  }

  getGate(): SchedulerGate {
    return this.gate;
  }

  isFallbackEngaged(): boolean {
    return this.els.isFallbackEngaged();
  }
}
