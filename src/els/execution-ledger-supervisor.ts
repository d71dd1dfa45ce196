/**
 * Execution Ledger Supervisor
 *
 * Grants or denies block contracts against the current human-plant state
 * and the schedule, and is the only writer of the session ledger. Every
 * decision, granted or not, leaves exactly one ledger event.
 */

import {
  BlockState,
  LedgerEventType,
  WorkPattern,
  isResetPhase,
  isWithinCeiling,
} from '../contracts/types';
import {
  LedgerEventInputZ,
  SCHEMA_VERSION,
  formatSchemaIssues,
  toSchemaIssues,
  type EndPointer,
  type LedgerEvent,
  type LedgerEventInput,
  type OTestSummary,
  type TimeBlock,
} from '../contracts/schemas';
import {
  ArtifactConflictError,
  BlockClosedError,
  InvalidLedgerEventError,
  UnknownBlockError,
} from '../errors';
import type { HumanPlantView } from '../hps/types';
import type { SessionLedger } from '../ledger/ledger';
import type { ArtifactStore } from '../ledger/artifact-store';
import type { SchedulerGate, ScheduleVerdict } from '../schedule/schedule-gate';
import { silentLogger, type Logger } from '../logger';
import { boundaryViolation } from './boundary';
import {
  BlockProposalZ,
  DenialReason,
  type BlockProposal,
  type BoundaryAction,
  type BoundaryVerdict,
  type LegalityDecision,
  type TickVerdict,
} from './types';

export interface ExecutionLedgerSupervisorOptions {
  ledger: SessionLedger;
  store: ArtifactStore;
  hps: HumanPlantView;
  gate: SchedulerGate;
  /** Block contracts already persisted for this session */
  blocks?: readonly TimeBlock[];
  logger?: Logger;
  now?: () => Date;
}

/**
 * Block lifecycle and ledger writer for one session.
 *
 * @example
 * ```typescript
 * const decision = els.defineBlock({
 *   block_id: 'triage-1',
 *   work_pattern: WorkPattern.SYL,
 *   mode_at_start: Mode.YELLOW,
 * });
 * if (decision.kind === 'granted') {
 *   // work, tick, then:
 *   els.closeBlock('triage-1');
 * }
 * ```
 */
export class ExecutionLedgerSupervisor {
  private readonly ledger: SessionLedger;
  private readonly store: ArtifactStore;
  private readonly hps: HumanPlantView;
  private readonly gate: SchedulerGate;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly blocks = new Map<string, TimeBlock>();
  private fallbackReason?: string;

  constructor(options: ExecutionLedgerSupervisorOptions) {
    this.ledger = options.ledger;
    this.store = options.store;
    this.hps = options.hps;
    this.gate = options.gate;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    for (const block of options.blocks ?? []) {
      this.blocks.set(block.block_id, { ...block });
    }
  }

  // ---------------------------------------------------------------------------
  // Legality
  // ---------------------------------------------------------------------------

  /**
   * Decide whether a proposal may become a DEFINED block.
   *
   * Denials are values, never exceptions. The HPS state is read fresh on
   * every call.
   *
   * @param verdict - schedule verdict to decide against; computed for now() when omitted
   */
  defineBlock(proposal: BlockProposal, verdict?: ScheduleVerdict): LegalityDecision {
    const sg = verdict ?? this.gate.verdict(this.now());

    if (this.fallbackReason !== undefined) {
      const reason = `notes-only fallback: ${this.fallbackReason}`;
      const event = this.appendDenial(null, reason, sg.at);
      return { kind: 'fallback', reason, event };
    }

    const parsed = BlockProposalZ.safeParse(proposal);
    if (!parsed.success) {
      const detail = formatSchemaIssues(toSchemaIssues(parsed.error));
      return this.deny(null, `${DenialReason.INVALID_PROPOSAL}: ${detail}`, sg.at);
    }
    const p = parsed.data;

    if (this.blocks.has(p.block_id)) {
      return this.deny(p.block_id, DenialReason.BLOCK_ID_USED, sg.at);
    }

    const state = this.hps.getState();
    if (isResetPhase(state.timerPhase)) {
      return this.deny(p.block_id, DenialReason.TIMER_IN_RESET, sg.at);
    }
    if (!isWithinCeiling(p.mode_at_start, state.mode)) {
      return this.deny(p.block_id, DenialReason.MODE_ABOVE_CEILING, sg.at);
    }

    const day = this.gate.calendarDay(new Date(sg.at));
    if (p.work_pattern === WorkPattern.CTX) {
      if (!sg.isContextBlock && !sg.isDeferredWindow) {
        return this.deny(p.block_id, DenialReason.CTX_OUTSIDE_WINDOW, sg.at);
      }
      const sameDay = [...this.blocks.values()].some(b =>
        b.work_pattern === WorkPattern.CTX &&
        b.day === day &&
        (b.state === BlockState.DEFINED || b.state === BlockState.CLOSED)
      );
      const elsewhere = sameDay ? undefined : this.store.findContextBlock(day);
      if (elsewhere) {
        this.logger.info('CTX block already held by another session', {
          day,
          sessionId: elsewhere.sessionId,
          blockId: elsewhere.block.block_id,
        });
      }
      if (sameDay || elsewhere) {
        return this.deny(p.block_id, DenialReason.CTX_ALREADY_TODAY, sg.at);
      }
    }

    const block: TimeBlock = {
      schema_version: SCHEMA_VERSION,
      block_id: p.block_id,
      work_pattern: p.work_pattern,
      mode_at_start: p.mode_at_start,
      allowed_paths: p.allowed_paths,
      declared_illegal_moves: p.declared_illegal_moves,
      state: BlockState.DEFINED,
      day,
      defined_at: sg.at,
    };

    this.blocks.set(block.block_id, block);
    let event: LedgerEvent;
    try {
      event = this.appendStateEvent(LedgerEventType.BLOCK_DEFINED, block.block_id, sg.at);
    } catch (e) {
      this.blocks.delete(block.block_id);
      throw e;
    }
    this.store.saveBlock(block);

    this.logger.info('Block defined', { blockId: block.block_id, pattern: block.work_pattern, mode: block.mode_at_start });
    return { kind: 'granted', block: { ...block }, event };
  }

  /**
   * Enter notes-only mode: no block is granted for the rest of the session.
   * Records one BLOCK_DENIED event with the cause.
   */
  engageFallback(reason: string): LedgerEvent {
    this.fallbackReason = reason;
    this.logger.warn('Notes-only fallback engaged', { reason });
    return this.appendDenial(null, `notes-only fallback: ${reason}`, this.now().toISOString());
  }

  isFallbackEngaged(): boolean {
    return this.fallbackReason !== undefined;
  }

  // ---------------------------------------------------------------------------
  // Boundary
  // ---------------------------------------------------------------------------

  /**
   * Check an action against the active block's declared boundary. Advisory:
   * the verdict is logged and returned, nothing is blocked.
   *
   * @param blockId - the block to check against; defaults to the only DEFINED block
   */
  enforceBoundary(action: BoundaryAction, blockId?: string): BoundaryVerdict {
    const block = this.activeBlock(blockId);
    if (!block) {
      const reason = blockId !== undefined
        ? `block ${blockId} is not DEFINED`
        : 'no single active block';
      this.logger.warn('Boundary check denied', { move: action.move, reason });
      return { allowed: false, blockId: blockId ?? null, reason };
    }

    const violation = boundaryViolation(block, action);
    if (violation !== undefined) {
      this.logger.warn('Boundary check denied', { blockId: block.block_id, move: action.move, reason: violation });
      return { allowed: false, blockId: block.block_id, reason: violation };
    }
    return { allowed: true, blockId: block.block_id };
  }

  // ---------------------------------------------------------------------------
  // Ledger
  // ---------------------------------------------------------------------------

  /**
   * Validate and append one event.
   *
   * @throws InvalidLedgerEventError if fields are missing or out of enum
   * @throws UnknownBlockError if block_id names no DEFINED block
   * @throws BlockClosedError if block_id names a CLOSED block
   */
  appendEvent(input: LedgerEventInput): LedgerEvent {
    const parsed = LedgerEventInputZ.safeParse(input);
    if (!parsed.success) {
      const issues = toSchemaIssues(parsed.error);
      throw new InvalidLedgerEventError(
        `Invalid ledger event: ${formatSchemaIssues(issues)}`,
        issues
      );
    }
    const event = parsed.data;

    if (event.block_id !== null && event.event_type !== LedgerEventType.BLOCK_DENIED) {
      const block = this.blocks.get(event.block_id);
      if (!block) {
        throw new UnknownBlockError(event.block_id, 'does not exist');
      }
      if (block.state === BlockState.CLOSED && event.event_type !== LedgerEventType.CHECKPOINT_EMITTED) {
        throw new BlockClosedError(event.block_id);
      }
      if (block.state === BlockState.UNDEFINED) {
        throw new UnknownBlockError(event.block_id);
      }
    }

    return this.ledger.append(event);
  }

  /**
   * Log the end of a tick against a block and decide whether it may continue
   * under the HPS state as it is now.
   */
  recordTick(
    blockId: string,
    summary: OTestSummary,
    options: { forceClose?: boolean; at?: Date } = {}
  ): TickVerdict {
    const state = this.hps.getState();
    const event = this.appendEvent({
      ts: (options.at ?? this.now()).toISOString(),
      timer_phase: state.timerPhase,
      mode: state.mode,
      fatigue_band: state.fatigueBand,
      block_id: blockId,
      event_type: LedgerEventType.TICK_END,
      otest_summary: summary,
    });

    const block = this.requireDefined(blockId);
    if (!isWithinCeiling(block.mode_at_start, state.mode)) {
      return { event, mayContinue: false, reason: DenialReason.MODE_ABOVE_CEILING };
    }
    if (options.forceClose) {
      return { event, mayContinue: false, reason: 'policy requires force close' };
    }
    return { event, mayContinue: true };
  }

  /**
   * Record a state-carrying event (RESET_START, RESET_END, CHECKPOINT_EMITTED, ...).
   */
  recordStateEvent(
    type: LedgerEventType,
    blockId: string | null,
    extra: { summary?: OTestSummary; reason?: string; at?: Date } = {}
  ): LedgerEvent {
    const input = this.stateEventInput(type, blockId, (extra.at ?? this.now()).toISOString());
    if (extra.summary !== undefined) {
      input.otest_summary = extra.summary;
    }
    if (extra.reason !== undefined) {
      input.reason = extra.reason;
    }
    return this.appendEvent(input);
  }

  /**
   * Close a DEFINED block and persist its end pointer.
   *
   * @throws UnknownBlockError if the block is not DEFINED
   * @throws ArtifactConflictError if an end pointer already exists (nothing is written)
   */
  closeBlock(blockId: string, reason?: string): EndPointer {
    const block = this.requireDefined(blockId);
    if (this.store.hasEndPointer(blockId)) {
      throw new ArtifactConflictError(
        `End pointer for block ${blockId} already exists`,
        this.store.endPointerPath(blockId)
      );
    }

    const at = this.now().toISOString();
    const state = this.hps.getState();
    const input = this.stateEventInput(LedgerEventType.BLOCK_CLOSED, blockId, at);
    if (reason !== undefined) {
      input.reason = reason;
    }
    this.appendEvent(input);

    const pointer: EndPointer = {
      schema_version: SCHEMA_VERSION,
      block_id: blockId,
      mode_at_end: state.mode,
      fatigue_band_at_end: state.fatigueBand,
      recommended_next_mode: this.hps.recommendNextMode(),
      timestamp: at,
    };
    this.store.saveEndPointer(pointer);

    block.state = BlockState.CLOSED;
    this.store.saveBlock(block);
    this.logger.info('Block closed', { blockId, modeAtEnd: pointer.mode_at_end, next: pointer.recommended_next_mode });
    return pointer;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  getBlock(blockId: string): TimeBlock | undefined {
    const block = this.blocks.get(blockId);
    return block ? { ...block } : undefined;
  }

  getBlocks(): TimeBlock[] {
    return [...this.blocks.values()].map(b => ({ ...b }));
  }

  getDefinedBlocks(): TimeBlock[] {
    return this.getBlocks().filter(b => b.state === BlockState.DEFINED);
  }

  private activeBlock(blockId?: string): TimeBlock | undefined {
    if (blockId !== undefined) {
      const block = this.blocks.get(blockId);
      return block?.state === BlockState.DEFINED ? block : undefined;
    }
    const defined = [...this.blocks.values()].filter(b => b.state === BlockState.DEFINED);
    return defined.length === 1 ? defined[0] : undefined;
  }

  private requireDefined(blockId: string): TimeBlock {
    const block = this.blocks.get(blockId);
    if (!block) {
      throw new UnknownBlockError(blockId, 'does not exist');
    }
    if (block.state !== BlockState.DEFINED) {
      throw new UnknownBlockError(blockId, `is ${block.state}, not DEFINED`);
    }
    return block;
  }

  private stateEventInput(type: LedgerEventType, blockId: string | null, ts: string): LedgerEventInput {
    const state = this.hps.getState();
    return {
      ts,
      timer_phase: state.timerPhase,
      mode: state.mode,
      fatigue_band: state.fatigueBand,
      block_id: blockId,
      event_type: type,
    };
  }

  private appendStateEvent(type: LedgerEventType, blockId: string | null, ts: string): LedgerEvent {
    return this.appendEvent(this.stateEventInput(type, blockId, ts));
  }

  private appendDenial(blockId: string | null, reason: string, ts: string): LedgerEvent {
    const input = this.stateEventInput(LedgerEventType.BLOCK_DENIED, blockId, ts);
    input.reason = reason;
    return this.appendEvent(input);
  }

  private deny(blockId: string | null, reason: string, ts: string): LegalityDecision {
    const event = this.appendDenial(blockId, reason, ts);
    this.logger.info('Block denied', { blockId, reason });
    return { kind: 'denied', reason, event };
  }
}
