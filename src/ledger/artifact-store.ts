/**
 * Artifact Store
 *
 * File persistence for everything a session produces besides the ledger:
 * preflight snapshots, block contracts, end pointers and checkpoints.
 * Every read goes through the artifact's schema; a file that fails it is
 * reported as `invalid` and callers treat it as missing.
 *
 * Layout under the store root:
 * ```
 * sessions/<session>/preflight/<digest>.json
 * sessions/<session>/blocks/<block>.json
 * sessions/<session>/end-pointers/<block>.json
 * sessions/<session>/checkpoints/<block>.json (+ .md)
 * end-pointers/LATEST
 * ```
 */

import { createHash } from 'crypto';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  writeFileSync,
} from 'fs';
import { dirname, join } from 'path';
import { canonicalize } from 'json-canonicalize';
import { z } from 'zod';
import {
  BlockIdZ,
  CheckpointZ,
  EndPointerZ,
  PreflightSnapshotZ,
  TimeBlockZ,
  checkArtifact,
  type Checkpoint,
  type EndPointer,
  type PreflightSnapshot,
  type SchemaIssue,
  type TimeBlock,
} from '../contracts/schemas';
import { BlockState, WorkPattern } from '../contracts/types';
import { ArtifactConflictError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { sessionDir } from './ledger';

/**
 * Outcome of reading an artifact from disk.
 */
export type ArtifactRead<T> =
  | { status: 'missing' }
  | { status: 'ok'; value: T; path: string }
  | { status: 'invalid'; path: string; issues: SchemaIssue[] };

/**
 * A stored file that failed its schema.
 */
export interface InvalidArtifact {
  path: string;
  issues: SchemaIssue[];
}

export interface ArtifactStoreOptions {
  storeDir: string;
  sessionId: string;
  logger?: Logger;
}

const LatestPointerZ = z
  .object({
    session_id: z.string().min(1),
    block_id: BlockIdZ,
  })
  .strict();

const LATEST_FILE = 'LATEST';

function ensureDirectory(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Write through a temp file and rename so readers never see a partial file.
 */
function writeAtomic(filePath: string, content: string): void {
  ensureDirectory(filePath);
  const tempPath = filePath + '.tmp';
  writeFileSync(tempPath, content, 'utf-8');
  renameSync(tempPath, filePath);
}

/**
 * Create a file that must not already exist.
 *
 * @throws ArtifactConflictError if it does
 */
function writeOnce(filePath: string, content: string): void {
  ensureDirectory(filePath);
  try {
    writeFileSync(filePath, content, { encoding: 'utf-8', flag: 'wx' });
  } catch (e) {
    if (isErrnoException(e) && e.code === 'EEXIST') {
      throw new ArtifactConflictError(`Artifact already exists: ${filePath}`, filePath);
    }
    throw e;
  }
}

function readJson<T>(schema: z.ZodType<T>, filePath: string): ArtifactRead<T> {
  if (!existsSync(filePath)) {
    return { status: 'missing' };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { status: 'invalid', path: filePath, issues: [{ path: '', message: `not valid JSON: ${message}` }] };
  }
  const check = checkArtifact(schema, parsed);
  return check.ok
    ? { status: 'ok', value: check.value, path: filePath }
    : { status: 'invalid', path: filePath, issues: check.issues };
}

/**
 * SHA-256 of the canonical JSON of a value.
 */
export function contentDigest(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}

/**
 * Artifact persistence for one session.
 */
export class ArtifactStore {
  private readonly storeDir: string;
  private readonly sessionId: string;
  private readonly root: string;
  private readonly logger: Logger;

  constructor(options: ArtifactStoreOptions) {
    this.storeDir = options.storeDir;
    this.sessionId = options.sessionId;
    this.root = sessionDir(options.storeDir, options.sessionId);
    this.logger = options.logger ?? silentLogger;
  }

  // ---------------------------------------------------------------------------
  // Preflight snapshots
  // ---------------------------------------------------------------------------

  /**
   * Store a snapshot under its content digest. Saving identical content
   * again is a no-op and returns the same digest.
   */
  saveSnapshot(snapshot: PreflightSnapshot): { digest: string; path: string } {
    const content = canonicalize(snapshot);
    const digest = createHash('sha256').update(content).digest('hex');
    const path = join(this.root, 'preflight', `${digest}.json`);
    if (!existsSync(path)) {
      writeAtomic(path, content);
      this.logger.debug('Preflight snapshot stored', { digest });
    }
    return { digest, path };
  }

  readSnapshot(digest: string): ArtifactRead<PreflightSnapshot> {
    return readJson(PreflightSnapshotZ, join(this.root, 'preflight', `${digest}.json`));
  }

  // ---------------------------------------------------------------------------
  // Block contracts
  // ---------------------------------------------------------------------------

  saveBlock(block: TimeBlock): string {
    const path = this.blockPath(block.block_id);
    writeAtomic(path, JSON.stringify(block, null, 2));
    return path;
  }

  readBlock(blockId: string): ArtifactRead<TimeBlock> {
    return readJson(TimeBlockZ, this.blockPath(blockId));
  }

  /**
   * All block contracts of the session, with the files that failed validation.
   */
  loadBlocks(): { blocks: TimeBlock[]; invalid: InvalidArtifact[] } {
    return this.readBlockDir(join(this.root, 'blocks'), true);
  }

  /**
   * A DEFINED or CLOSED CTX block for `day` held by any other session in
   * the store.
   */
  findContextBlock(day: string): { sessionId: string; block: TimeBlock } | undefined {
    const sessionsDir = join(this.storeDir, 'sessions');
    if (!existsSync(sessionsDir)) {
      return undefined;
    }
    for (const sessionId of readdirSync(sessionsDir).sort()) {
      if (sessionId === this.sessionId) {
        continue;
      }
      const { blocks } = this.readBlockDir(join(sessionsDir, sessionId, 'blocks'), false);
      const block = blocks.find(b =>
        b.work_pattern === WorkPattern.CTX &&
        b.day === day &&
        (b.state === BlockState.DEFINED || b.state === BlockState.CLOSED)
      );
      if (block) {
        return { sessionId, block };
      }
    }
    return undefined;
  }

  private readBlockDir(dir: string, warn: boolean): { blocks: TimeBlock[]; invalid: InvalidArtifact[] } {
    if (!existsSync(dir)) {
      return { blocks: [], invalid: [] };
    }

    const blocks: TimeBlock[] = [];
    const invalid: InvalidArtifact[] = [];
    const files = readdirSync(dir).filter(f => f.endsWith('.json')).sort();
    for (const file of files) {
      const read = readJson(TimeBlockZ, join(dir, file));
      if (read.status === 'ok') {
        blocks.push(read.value);
      } else if (read.status === 'invalid') {
        if (warn) {
          this.logger.warn('Ignoring invalid block contract', { path: read.path });
        }
        invalid.push({ path: read.path, issues: read.issues });
      }
    }
    return { blocks, invalid };
  }

  // ---------------------------------------------------------------------------
  // End pointers
  // ---------------------------------------------------------------------------

  /**
   * Persist a block's end pointer and mark it as the latest one.
   *
   * @throws ArtifactConflictError if the block already has an end pointer
   */
  saveEndPointer(pointer: EndPointer): string {
    const path = this.endPointerPath(pointer.block_id);
    writeOnce(path, JSON.stringify(pointer, null, 2));
    writeAtomic(
      this.latestPath(),
      JSON.stringify({ session_id: this.sessionId, block_id: pointer.block_id })
    );
    this.logger.info('End pointer written', { blockId: pointer.block_id, mode: pointer.mode_at_end });
    return path;
  }

  hasEndPointer(blockId: string): boolean {
    return existsSync(this.endPointerPath(blockId));
  }

  readEndPointer(blockId: string): ArtifactRead<EndPointer> {
    return readJson(EndPointerZ, this.endPointerPath(blockId));
  }

  /**
   * The most recently written end pointer in the store, from any session.
   */
  readLatestEndPointer(): ArtifactRead<EndPointer> {
    const latest = readJson(LatestPointerZ, this.latestPath());
    if (latest.status !== 'ok') {
      return latest;
    }
    const { session_id, block_id } = latest.value;
    const path = join(sessionDir(this.storeDir, session_id), 'end-pointers', `${block_id}.json`);
    const read = readJson(EndPointerZ, path);
    if (read.status === 'missing') {
      return {
        status: 'invalid',
        path: this.latestPath(),
        issues: [{ path: '', message: `names a missing end pointer: ${path}` }],
      };
    }
    return read;
  }

  // ---------------------------------------------------------------------------
  // Checkpoints
  // ---------------------------------------------------------------------------

  /**
   * Write a checkpoint and its human-readable summary.
   *
   * @throws ArtifactConflictError if the block already has a checkpoint
   */
  saveCheckpoint(checkpoint: Checkpoint, markdown: string): { jsonPath: string; markdownPath: string } {
    const jsonPath = join(this.root, 'checkpoints', `${checkpoint.block_id}.json`);
    const markdownPath = join(this.root, 'checkpoints', `${checkpoint.block_id}.md`);
    writeOnce(jsonPath, JSON.stringify(checkpoint, null, 2));
    writeAtomic(markdownPath, markdown);
    return { jsonPath, markdownPath };
  }

  readCheckpoint(blockId: string): ArtifactRead<Checkpoint> {
    return readJson(CheckpointZ, join(this.root, 'checkpoints', `${blockId}.json`));
  }

  getSessionDir(): string {
    return this.root;
  }

  private blockPath(blockId: string): string {
    return join(this.root, 'blocks', `${blockId}.json`);
  }

  endPointerPath(blockId: string): string {
    return join(this.root, 'end-pointers', `${blockId}.json`);
  }

  private latestPath(): string {
    return join(this.storeDir, 'end-pointers', LATEST_FILE);
  }
}
