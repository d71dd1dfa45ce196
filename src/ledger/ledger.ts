/**
 * Session Ledger
 *
 * Append-only, hash-chained JSONL log of one supervision session. Appends
 * are synchronous: the control loop is single-threaded and a tick either
 * writes its event or writes nothing.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, statSync } from 'fs';
import { dirname, join } from 'path';
import {
  LedgerEventInputZ,
  formatSchemaIssues,
  toSchemaIssues,
  type LedgerEvent,
  type LedgerEventInput,
} from '../contracts/schemas';
import {
  ConcurrentSessionError,
  InvalidLedgerEventError,
  LedgerCorruptedError,
} from '../errors';
import { silentLogger, type Logger } from '../logger';
import { createLedgerEvent, deserializeEvent, serializeEvent } from './ledger-entry';
import { withLedgerLock } from './lock';
import { verifyLedger, type LedgerVerificationResult } from './verifier';

export const LEDGER_FILE = 'ledger.jsonl';
export const LOCK_FILE = 'ledger.lock';

export interface SessionLedgerOptions {
  /** Root of the artifact store */
  storeDir: string;
  sessionId: string;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Directory holding everything written for one session.
 */
export function sessionDir(storeDir: string, sessionId: string): string {
  return join(storeDir, 'sessions', sessionId);
}

function fileSize(path: string): number {
  return existsSync(path) ? statSync(path).size : 0;
}

/**
 * Manages the ledger of one session.
 *
 * @example
 * ```typescript
 * const ledger = SessionLedger.open({ storeDir: './store', sessionId: 's-01' });
 * ledger.append({
 *   ts: new Date().toISOString(),
 *   timer_phase: TimerPhase.WORK,
 *   mode: Mode.GREEN,
 *   fatigue_band: FatigueBand.OK,
 *   block_id: 'b-1',
 *   event_type: LedgerEventType.BLOCK_DEFINED,
 * });
 * ```
 */
export class SessionLedger {
  private readonly path: string;
  private readonly lockPath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private events: LedgerEvent[] = [];
  private knownSize = 0;

  private constructor(options: SessionLedgerOptions) {
    const dir = sessionDir(options.storeDir, options.sessionId);
    this.path = join(dir, LEDGER_FILE);
    this.lockPath = join(dir, LOCK_FILE);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open (and verify) the ledger of a session, creating its directory.
   *
   * @throws LedgerCorruptedError if a line cannot be parsed or the chain is broken
   */
  static open(options: SessionLedgerOptions): SessionLedger {
    const ledger = new SessionLedger(options);
    ledger.load();
    return ledger;
  }

  private load(): void {
    mkdirSync(dirname(this.path), { recursive: true });

    if (!existsSync(this.path)) {
      this.events = [];
      this.knownSize = 0;
      return;
    }

    const content = readFileSync(this.path, 'utf-8');
    const lines = content.split('\n').filter(line => line.length > 0);

    this.events = lines.map((line, index) => {
      try {
        return Object.freeze(deserializeEvent(line));
      } catch (e) {
        const detail = e instanceof Error ? e.message : String(e);
        throw new LedgerCorruptedError(`Unreadable ledger line ${index + 1}: ${detail}`, index);
      }
    });

    const result = this.verify();
    if (!result.valid) {
      this.logger.error('Ledger chain verification failed', { path: this.path, brokenAt: result.brokenAt });
      throw new LedgerCorruptedError(
        `Ledger corrupted at event ${result.brokenAt}: ${result.errorMessage}`,
        result.brokenAt ?? 0
      );
    }

    this.knownSize = fileSize(this.path);
    this.logger.debug('Ledger loaded', { path: this.path, events: this.events.length });
  }

  /**
   * Append one event.
   *
   * @throws InvalidLedgerEventError if the input fails the event schema
   * @throws ConcurrentSessionError if the lock is held or the file grew behind our back
   */
  append(input: LedgerEventInput): LedgerEvent {
    const parsed = LedgerEventInputZ.safeParse(input);
    if (!parsed.success) {
      const issues = toSchemaIssues(parsed.error);
      throw new InvalidLedgerEventError(
        `Invalid ledger event: ${formatSchemaIssues(issues)}`,
        issues
      );
    }

    return withLedgerLock(this.lockPath, this.path, () => {
      const size = fileSize(this.path);
      if (size !== this.knownSize) {
        throw new ConcurrentSessionError(
          `Ledger changed on disk (expected ${this.knownSize} bytes, found ${size})`,
          this.path
        );
      }

      const last = this.getLastEvent();
      const event = Object.freeze(createLedgerEvent(
        parsed.data,
        last ? last.seq + 1 : 0,
        last ? last.hash : null
      ));
      const line = serializeEvent(event) + '\n';
      appendFileSync(this.path, line, 'utf-8');

      this.knownSize = size + Buffer.byteLength(line, 'utf-8');
      this.events.push(event);
      this.logger.debug('Ledger event appended', { seq: event.seq, type: event.event_type });
      return event;
    }, { now: this.now, logger: this.logger });
  }

  getEvents(): readonly LedgerEvent[] {
    return [...this.events];
  }

  getLastEvent(): LedgerEvent | undefined {
    return this.events[this.events.length - 1];
  }

  get length(): number {
    return this.events.length;
  }

  verify(): LedgerVerificationResult {
    return verifyLedger(this.events);
  }

  getPath(): string {
    return this.path;
  }

  getLockPath(): string {
    return this.lockPath;
  }
}
