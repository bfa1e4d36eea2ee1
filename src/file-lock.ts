import * as fs from 'fs';
import * as path from 'path';
import { logger } from './logger';

export interface LockHandle {
  fd: number;
  lockPath: string;
}

export interface LockOptions {
  /** Give up after this long (default: 10 minutes, a checkout can be slow) */
  timeoutMs?: number;
  /** A lock older than this is considered abandoned (default: 30 minutes) */
  staleAfterMs?: number;
}

export class LockTimeout extends Error {
  constructor(lockPath: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
    this.name = 'LockTimeout';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// 50, 100, 200, ... capped at 1s
function backoff(attempt: number): number {
  return Math.min(50 * Math.pow(2, attempt), 1000);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

function isStale(lockPath: string, staleAfterMs: number): boolean {
  let contents: unknown;
  try {
    contents = JSON.parse(fs.readFileSync(lockPath, 'utf-8'));
  } catch {
    // Unreadable or half-written by a holder that is still starting; judge by age
    try {
      return Date.now() - fs.statSync(lockPath).mtimeMs > staleAfterMs;
    } catch {
      return false;
    }
  }

  if (typeof contents !== 'object' || contents === null) {
    return false;
  }
  const { pid, startedMs } = contents as { pid?: unknown; startedMs?: unknown };

  if (typeof pid === 'number' && !isProcessAlive(pid)) {
    logger.warn(`Removing lock ${lockPath} left by dead process ${pid}`);
    return true;
  }
  if (typeof startedMs === 'number' && Date.now() - startedMs > staleAfterMs) {
    logger.warn(`Removing lock ${lockPath} older than ${staleAfterMs}ms`);
    return true;
  }
  return false;
}

/**
 * Takes an exclusive lock by creating `lockPath` with O_EXCL, waiting with
 * exponential back-off while another live process holds it
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const timeoutMs = options.timeoutMs ?? 10 * 60 * 1000;
  const staleAfterMs = options.staleAfterMs ?? 30 * 60 * 1000;

  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  const started = Date.now();
  let attempt = 0;

  for (;;) {
    try {
      const fd = fs.openSync(lockPath, 'wx');
      fs.writeSync(fd, JSON.stringify({ pid: process.pid, startedMs: Date.now() }));
      return { fd, lockPath };
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
    }

    if (isStale(lockPath, staleAfterMs)) {
      fs.rmSync(lockPath, { force: true });
      continue;
    }

    if (Date.now() - started >= timeoutMs) {
      throw new LockTimeout(lockPath, timeoutMs);
    }

    const wait = backoff(attempt++);
    logger.debug(`Lock ${lockPath} is held, retrying in ${wait}ms`);
    await sleep(wait);
  }
}

export function releaseLock(handle: LockHandle): void {
  fs.closeSync(handle.fd);
  fs.rmSync(handle.lockPath, { force: true });
}

/**
 * Runs `fn` while holding the lock at `lockPath`
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>, options?: LockOptions): Promise<T> {
  const handle = await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    releaseLock(handle);
  }
}
