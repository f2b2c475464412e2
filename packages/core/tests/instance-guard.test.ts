import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { acquireInstanceLease, AlreadyRunningError, LockTimeoutError, withInstanceLease } from '../src/index.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tunnelkit-guard-test-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('acquireInstanceLease', () => {
  it('grants one lease at a time', async () => {
    const lease = await acquireInstanceLease(tmpDir);

    await expect(acquireInstanceLease(tmpDir)).rejects.toBeInstanceOf(AlreadyRunningError);

    await lease.release();
    expect(lease.released).toBe(true);
    const next = await acquireInstanceLease(tmpDir);
    await next.release();
  });

  it('tolerates a double release', async () => {
    const lease = await acquireInstanceLease(tmpDir);
    await lease.release();
    await expect(lease.release()).resolves.toBeUndefined();
  });

  it('creates the data directory', async () => {
    const nested = path.join(tmpDir, 'nested', 'data');
    const lease = await acquireInstanceLease(nested);

    await expect(fs.access(nested)).resolves.toBeUndefined();
    await lease.release();
  });

  it('reclaims a stale lock left by a dead instance', async () => {
    const lockDir = path.join(tmpDir, 'tunnelkit.lock.lock');
    await fs.mkdir(lockDir);
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(lockDir, old, old);

    const lease = await acquireInstanceLease(tmpDir, { stale: 10_000 });
    expect(lease.released).toBe(false);
    await lease.release();
  });
});

describe('lost lease', () => {
  it('reports a lock removed while held and fails the release', async () => {
    const lease = await acquireInstanceLease(tmpDir, { stale: 2_000 });
    const lost = new Promise<Error>((resolve) => lease.onCompromised(resolve));

    await fs.rm(path.join(tmpDir, 'tunnelkit.lock.lock'), { recursive: true, force: true });
    const err = await lost;

    expect(err).toMatchObject({ code: 'ECOMPROMISED' });
    expect(lease.compromised).toBe(err);
    await expect(lease.release()).rejects.toBeInstanceOf(LockTimeoutError);
    expect(lease.released).toBe(true);
  }, 10_000);

  it('stops notifying an unsubscribed listener', async () => {
    const lease = await acquireInstanceLease(tmpDir, { stale: 2_000 });
    const dropped = vi.fn();
    lease.onCompromised(dropped)();
    const lost = new Promise<Error>((resolve) => lease.onCompromised(resolve));

    await fs.rm(path.join(tmpDir, 'tunnelkit.lock.lock'), { recursive: true, force: true });
    await lost;

    expect(dropped).not.toHaveBeenCalled();
    await expect(lease.release()).rejects.toBeInstanceOf(LockTimeoutError);
  }, 10_000);
});

describe('withInstanceLease', () => {
  it('releases the lease when the body throws', async () => {
    await expect(
      withInstanceLease(tmpDir, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    const lease = await acquireInstanceLease(tmpDir);
    await lease.release();
  });

  it('returns the body result', async () => {
    expect(await withInstanceLease(tmpDir, async (lease) => lease.released)).toBe(false);
  });
});
