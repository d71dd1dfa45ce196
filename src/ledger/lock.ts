/**
 * Ledger Lock
 *
 * At-most-one writer per session ledger. The lock is a file created with
 * the exclusive `wx` flag beside the ledger and removed when the scoped
 * operation finishes. A lock left behind by a process that no longer
 * exists is stale and is taken over.
 */

import { closeSync, openSync, readFileSync, rmSync, writeSync } from 'fs';
import { z } from 'zod';
import { ConcurrentSessionError } from '../errors';
import { silentLogger, type Logger } from '../logger';

/**
 * Contents written into a held lock file.
 */
export interface LockInfo {
  pid: number;
  acquired_at: string;
}

const LockInfoZ = z
  .object({
    pid: z.number().int().positive(),
    acquired_at: z.string(),
  })
  .strict();

export interface LockOptions {
  now?: () => Date;
  logger?: Logger;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * The holder recorded in a lock file, if it can be read.
 */
export function readLockInfo(lockPath: string): LockInfo | undefined {
  let raw: string;
  try {
    raw = readFileSync(lockPath, 'utf-8');
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') {
      return undefined;
    }
    throw e;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = LockInfoZ.safeParse(parsed);
  return result.success ? result.data : undefined;
}

/**
 * Whether a process with this pid exists. EPERM means it exists but
 * belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ESRCH') {
      return false;
    }
    return true;
  }
}

function tryCreate(lockPath: string, now: () => Date): boolean {
  let fd: number;
  try {
    fd = openSync(lockPath, 'wx');
  } catch (e) {
    if (isErrnoException(e) && e.code === 'EEXIST') {
      return false;
    }
    throw e;
  }
  try {
    const info: LockInfo = { pid: process.pid, acquired_at: now().toISOString() };
    writeSync(fd, JSON.stringify(info));
  } finally {
    closeSync(fd);
  }
  return true;
}

/**
 * Create the lock file, taking over a stale one whose holder has exited.
 * A lock file without a readable holder is treated as held.
 *
 * @throws ConcurrentSessionError if the lock is held by a live process
 */
export function acquireLock(lockPath: string, ledgerPath: string, options: LockOptions = {}): void {
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? silentLogger;

  if (tryCreate(lockPath, now)) {
    return;
  }

  const holder = readLockInfo(lockPath);
  if (holder === undefined || isProcessAlive(holder.pid)) {
    throw new ConcurrentSessionError(`Ledger lock already held: ${lockPath}`, ledgerPath);
  }

  logger.warn('Taking over stale ledger lock', {
    path: lockPath,
    pid: holder.pid,
    acquiredAt: holder.acquired_at,
  });
  releaseLock(lockPath);
  if (!tryCreate(lockPath, now)) {
    throw new ConcurrentSessionError(`Ledger lock already held: ${lockPath}`, ledgerPath);
  }
}

export function releaseLock(lockPath: string): void {
  rmSync(lockPath, { force: true });
}

/**
 * Run `fn` while holding the lock; the lock is released on every exit path.
 */
export function withLedgerLock<T>(
  lockPath: string,
  ledgerPath: string,
  fn: () => T,
  options?: LockOptions
): T {
  acquireLock(lockPath, ledgerPath, options);
  try {
    return fn();
  } finally {
    releaseLock(lockPath);
  }
}
