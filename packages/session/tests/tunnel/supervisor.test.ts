import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CancellationToken, TunnelError } from '@tunnelkit/core';
import { TunnelSupervisor } from '../../src/tunnel/supervisor.js';
import type { TunnelCommandOptions } from '../../src/tunnel/escalation.js';
import {
  FakeLauncher,
  FakeNetwork,
  fakeBuildCommand,
  makeCookie,
  waitUntil,
  PORTAL_URL,
} from '../support/fakes.js';

const OPTIONS: TunnelCommandOptions = {
  portalUrl: PORTAL_URL,
  interfaceName: 'tk0',
  escalationTool: null,
  openconnectPath: 'openconnect',
};

async function expectTunnelError(promise: Promise<unknown>, code: TunnelError['code']): Promise<TunnelError> {
  const err = await promise.then(
    () => null,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(TunnelError);
  if (!(err instanceof TunnelError)) throw new Error('unreachable');
  expect(err.code).toBe(code);
  return err;
}

describe('TunnelSupervisor', () => {
  let network: FakeNetwork;
  let launcher: FakeLauncher;
  let supervisor: TunnelSupervisor;
  let token: CancellationToken;

  beforeEach(() => {
    network = new FakeNetwork();
    launcher = new FakeLauncher(network);
    supervisor = new TunnelSupervisor({
      launcher,
      probe: network,
      buildCommand: fakeBuildCommand,
      timing: { livenessPollIntervalMs: 5, establishTimeoutMs: 200, teardownGraceMs: 50 },
    });
    token = new CancellationToken();
  });

  it('brings the tunnel up and tears it down', async () => {
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    expect(await supervisor.status(handle)).toEqual({ kind: 'Up' });
    expect(supervisor.current).toBe(handle);

    await supervisor.stop(handle);

    expect(launcher.spawned[0].signals).toEqual(['SIGTERM']);
    expect(network.up.has('tk0')).toBe(false);
    expect(await supervisor.status(handle)).toEqual({ kind: 'Exited', code: null });
    expect(supervisor.current).toBeNull();
  });

  it('redacts the cookie value in the handle', async () => {
    const handle = await supervisor.start(makeCookie('secret-value'), OPTIONS, token);

    expect(handle.command.args).toContain('DSID=***');
    expect(handle.command.args.join(' ')).not.toContain('secret-value');
    expect(handle.interfaceName).toBe('tk0');
    expect(handle.pid).toBe(launcher.spawned[0].pid);

    await supervisor.stop(handle);
  });

  it('reports Starting before the interface appears', async () => {
    launcher.queue({ upAfterMs: null });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);

    expect(await supervisor.status(handle)).toEqual({ kind: 'Starting' });

    await supervisor.stop(handle);
  });

  it('refuses a second start while the first process is alive', async () => {
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);

    await expectTunnelError(supervisor.start(makeCookie(), OPTIONS, token), 'SpawnError');
    expect(launcher.spawned).toHaveLength(1);

    await supervisor.stop(handle);
    const second = await supervisor.start(makeCookie(), OPTIONS, token);
    expect(launcher.spawned).toHaveLength(2);
    await supervisor.stop(second);
  });

  it('refuses to start when the interface already exists', async () => {
    network.up.add('tk0');

    const err = await expectTunnelError(supervisor.start(makeCookie(), OPTIONS, token), 'SpawnError');
    expect(err.message).toContain('tk0');
    expect(launcher.spawned).toHaveLength(0);
  });

  it('maps a rejected-cookie marker to RejectedCredential', async () => {
    launcher.queue({
      upAfterMs: null,
      stderr: ['Unexpected 302 result from server\n'],
      exitAfterMs: 10,
      exitCode: 2,
    });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);

    const err = await expectTunnelError(supervisor.waitUntilUp(handle, token), 'RejectedCredential');
    expect(err.exitCode).toBe(2);
  });

  it('maps any other early exit to UnexpectedExit', async () => {
    launcher.queue({ upAfterMs: null, stderr: ['TLS handshake failed\n'], exitAfterMs: 10, exitCode: 1 });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);

    const err = await expectTunnelError(supervisor.waitUntilUp(handle, token), 'UnexpectedExit');
    expect(err.exitCode).toBe(1);
    expect(err.message).toContain('TLS handshake failed');
  });

  it('fails with EstablishTimeout when the interface never appears', async () => {
    supervisor = new TunnelSupervisor({
      launcher,
      probe: network,
      buildCommand: fakeBuildCommand,
      timing: { livenessPollIntervalMs: 5, establishTimeoutMs: 30, teardownGraceMs: 50 },
    });
    launcher.queue({ upAfterMs: null });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);

    await expectTunnelError(supervisor.waitUntilUp(handle, token), 'EstablishTimeout');
    await supervisor.stop(handle);
  });

  it('stops waiting when the token fires', async () => {
    launcher.queue({ upAfterMs: null });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);

    setTimeout(() => token.cancel(), 15);
    await expectTunnelError(supervisor.waitUntilUp(handle, token), 'Cancelled');
    await supervisor.stop(handle);
    expect(launcher.alive).toBe(0);
  });

  it('does not start once the token has fired', async () => {
    token.cancel();
    await expectTunnelError(supervisor.start(makeCookie(), OPTIONS, token), 'Cancelled');
    expect(launcher.spawned).toHaveLength(0);
  });

  it('escalates to a forced kill when SIGTERM is ignored', async () => {
    launcher.queue({ ignoreSigterm: true });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    await supervisor.stop(handle);

    expect(launcher.spawned[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(launcher.alive).toBe(0);
  });

  it('reports TeardownError when the interface outlives the process', async () => {
    launcher.queue({ leaveInterface: true });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    await expectTunnelError(supervisor.stop(handle), 'TeardownError');
  });

  it('stops a root-owned process through the escalation tool', async () => {
    launcher.queue({ rootOwned: true });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);
    const pid = String(launcher.spawned[0].pid);

    await supervisor.stop(handle);

    expect(launcher.helpers).toEqual([
      { file: 'sudo', args: ['-n', 'pkill', '-TERM', '-P', pid] },
      { file: 'sudo', args: ['-n', 'kill', '-TERM', pid] },
    ]);
    expect(launcher.spawned[0].elevatedSignals).toEqual(['SIGTERM']);
    expect(launcher.spawned[0].signals).toEqual([]);
    expect(network.up.has('tk0')).toBe(false);
    expect(supervisor.current).toBeNull();
  });

  it('force-kills a root-owned process through the escalation tool', async () => {
    launcher.queue({ rootOwned: true, ignoreSigterm: true });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);
    const pid = String(launcher.spawned[0].pid);

    await supervisor.stop(handle);

    expect(launcher.helpers.slice(2)).toEqual([
      { file: 'sudo', args: ['-n', 'pkill', '-KILL', '-P', pid] },
      { file: 'sudo', args: ['-n', 'kill', '-KILL', pid] },
    ]);
    expect(launcher.spawned[0].elevatedSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(launcher.alive).toBe(0);
  });

  it('does not mistake an undeliverable signal for an exit', async () => {
    launcher.queue({ rootOwned: true });
    launcher.helpersFail = true;
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    const err = await expectTunnelError(supervisor.stop(handle), 'TeardownError');

    expect(err.message).toContain('did not exit after a forced kill');
    expect(supervisor.current).toBe(handle);
    expect(launcher.spawned[0].alive).toBe(true);
    launcher.spawned[0].finish({ code: 0, signal: null, spawnError: null });
  });

  it('shares one teardown between concurrent stop calls', async () => {
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    await Promise.all([supervisor.stop(handle), supervisor.stop(handle)]);

    expect(launcher.spawned[0].signals).toEqual(['SIGTERM']);
  });

  it('watch() returns when the process exits after coming up', async () => {
    launcher.queue({ upAfterMs: 1, exitAfterMs: 40, exitCode: 3 });
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    const down = await supervisor.watch(handle, token);

    expect(down).toEqual({ reason: 'exited', code: 3, signal: null });
  });

  it('watch() returns cancelled when the token fires', async () => {
    const handle = await supervisor.start(makeCookie(), OPTIONS, token);
    await supervisor.waitUntilUp(handle, token);

    setTimeout(() => token.cancel(), 10);
    expect(await supervisor.watch(handle, token)).toEqual({ reason: 'cancelled' });

    await supervisor.stop(handle);
  });

  it('relays the escalation prompt and writes the answer to stdin', async () => {
    launcher.queue({ upAfterMs: 30, stderr: ['tunnelkit-escalation-password:'] });
    const requestCredential = vi.fn().mockResolvedValue('test-password');
    const handle = await supervisor.start(makeCookie(), OPTIONS, token, { requestCredential });

    await supervisor.waitUntilUp(handle, token);
    await waitUntil(() => launcher.spawned[0].stdinWrites.length > 0);

    expect(requestCredential).toHaveBeenCalledWith(
      'escalation-password',
      'tunnelkit-escalation-password:',
      token,
    );
    expect(launcher.spawned[0].stdinWrites.join('')).toBe('test-password\n');
    await supervisor.stop(handle);
  });

  it('kills the process when the prompt is dismissed', async () => {
    launcher.queue({ upAfterMs: null, stderr: ['tunnelkit-escalation-password:'] });
    const requestCredential = vi.fn().mockResolvedValue(null);
    const handle = await supervisor.start(makeCookie(), OPTIONS, token, { requestCredential });

    const err = await expectTunnelError(supervisor.waitUntilUp(handle, token), 'SpawnError');

    expect(err.message).toContain('Privilege escalation failed');
    expect(launcher.spawned[0].signals).toEqual(['SIGTERM']);
  });

  it('forwards every output line to onLine', async () => {
    launcher.queue({ stderr: ['Connected to 10.0.0.1:443\n', 'ESP session established\n'] });
    const lines: string[] = [];
    const handle = await supervisor.start(makeCookie(), OPTIONS, token, {
      onLine: (line) => lines.push(line),
    });
    await supervisor.waitUntilUp(handle, token);
    await waitUntil(() => lines.length === 2);

    expect(lines).toEqual(['Connected to 10.0.0.1:443', 'ESP session established']);
    await supervisor.stop(handle);
  });
});
