/**
 * Instance Guard: at most one session engine per machine.
 *
 * The lease is a proper-lockfile lock on <dataDir>/tunnelkit.lock. The
 * lock is refreshed while held, so a crashed instance's lock goes stale
 * and is reclaimed by the next acquire. A lock lost while held marks
 * the lease compromised: listeners hear about it and `release()` fails.
 */

import { promises as fs } from 'node:fs';
import lockfile from 'proper-lockfile';
import { AlreadyRunningError, LockTimeoutError } from './errors.js';
import { getInstanceLockPath } from './utils/paths.js';

export interface Lease {
  readonly lockPath: string;
  readonly released: boolean;
  /** Why the lock was lost while held, or null */
  readonly compromised: Error | null;
  /** Subscribes to the loss of the lock; returns the unsubscribe function */
  onCompromised(listener: (err: Error) => void): () => void;
  /**
   * Releases the lock. Safe to call more than once.
   *
   * @throws {LockTimeoutError} If the lock was lost while held
   */
  release(): Promise<void>;
}

export interface InstanceGuardOptions {
  /** Age in ms after which an unrefreshed lock is considered stale (default: 10000) */
  stale?: number;
  /** Called if the lock is lost while held (e.g. lock dir removed) */
  onCompromised?: (err: Error) => void;
}

/**
 * Acquires the single-instance lease.
 *
 * @throws {AlreadyRunningError} If another live instance holds the lease
 * @throws {LockTimeoutError} For any other locking failure
 */
export async function acquireInstanceLease(
  dataDir: string,
  options: InstanceGuardOptions = {},
): Promise<Lease> {
  const lockPath = getInstanceLockPath(dataDir);
  await fs.mkdir(dataDir, { recursive: true });

  let compromised: Error | null = null;
  const listeners = new Set<(err: Error) => void>();
  const markCompromised = (err: Error): void => {
    compromised = err;
    options.onCompromised?.(err);
    for (const listener of listeners) listener(err);
  };

  let unlock: () => Promise<void>;
  try {
    unlock = await lockfile.lock(lockPath, {
      realpath: false,
      retries: 0,
      stale: options.stale ?? 10_000,
      onCompromised: markCompromised,
    });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ELOCKED') {
      throw new AlreadyRunningError('Another tunnelkit instance is already running.', lockPath);
    }
    throw new LockTimeoutError(
      `Could not acquire instance lock ${lockPath}: ${err instanceof Error ? err.message : String(err)}`,
      lockPath,
    );
  }

  let released = false;
  return {
    lockPath,
    get released() {
      return released;
    },
    get compromised() {
      return compromised;
    },
    onCompromised(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    async release() {
      if (released) return;
      released = true;
      if (compromised) {
        throw new LockTimeoutError(`Instance lock ${lockPath} was lost while held: ${compromised.message}`, lockPath);
      }
      await unlock();
    },
  };
}

/**
 * Runs `fn` while holding the lease and releases it on every exit path.
 * A run that completes after the lock was lost rejects with the
 * release error.
 */
export async function withInstanceLease<T>(
  dataDir: string,
  fn: (lease: Lease) => Promise<T>,
  options?: InstanceGuardOptions,
): Promise<T> {
  const lease = await acquireInstanceLease(dataDir, options);
  try {
    return await fn(lease);
  } finally {
    await lease.release();
  }
}
