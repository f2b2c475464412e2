import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../src/commands/connect.js', () => ({ runConnect: vi.fn() }));
vi.mock('../src/commands/get-cookie.js', () => ({ runGetCookie: vi.fn() }));
vi.mock('../src/commands/clean.js', () => ({ runClean: vi.fn() }));
vi.mock('../src/commands/status.js', () => ({ runStatus: vi.fn() }));
vi.mock('../src/commands/init.js', () => ({ runInit: vi.fn() }));

import { runClean } from '../src/commands/clean.js';
import { runConnect } from '../src/commands/connect.js';
import { runGetCookie } from '../src/commands/get-cookie.js';
import { runInit } from '../src/commands/init.js';
import { runStatus } from '../src/commands/status.js';
import { createProgram, toOverrides } from '../src/program.js';

const argv = (...args: string[]): string[] => ['node', 'tunnelkit', '--data-dir', '/tmp/tk', ...args];

beforeEach(() => {
  vi.clearAllMocks();
});

describe('toOverrides', () => {
  it('leaves unset flags undefined', () => {
    expect(toOverrides({})).toEqual({});
  });

  it('maps flags to config keys', () => {
    expect(
      toOverrides({
        url: 'https://vpn.example.com/',
        domain: 'vpn.example.com',
        mode: 'visual-auto',
        interface: 'tk0',
        escalationTool: 'doas',
        openconnect: '/usr/sbin/openconnect',
        browser: '/usr/bin/chromium',
        probe: false,
      }),
    ).toEqual({
      portalUrl: 'https://vpn.example.com/',
      cookieDomain: 'vpn.example.com',
      loginMode: 'visual-auto',
      interfaceName: 'tk0',
      escalationTool: 'doas',
      openconnectPath: '/usr/sbin/openconnect',
      browserExecutablePath: '/usr/bin/chromium',
      probeStoredCookie: false,
    });
  });

  it('rejects an unknown login mode', () => {
    expect(() => toOverrides({ mode: 'auto' })).toThrow();
  });
});

describe('createProgram', () => {
  it('runs connect with the overrides from its flags', async () => {
    await createProgram().parseAsync(argv('connect', '--url', 'https://vpn.example.com/', '--interface', 'tk0'));

    expect(runConnect).toHaveBeenCalledWith({
      dataDir: '/tmp/tk',
      overrides: { portalUrl: 'https://vpn.example.com/', interfaceName: 'tk0' },
    });
  });

  it('turns --no-probe off for get-cookie', async () => {
    await createProgram().parseAsync(argv('get-cookie', '--mode', 'manual', '--no-probe'));

    expect(runGetCookie).toHaveBeenCalledWith({
      dataDir: '/tmp/tk',
      overrides: { loginMode: 'manual', probeStoredCookie: false },
    });
  });

  it('passes the data directory to clean and status', async () => {
    await createProgram().parseAsync(argv('clean'));
    await createProgram().parseAsync(argv('status', '--json'));

    expect(runClean).toHaveBeenCalledWith('/tmp/tk');
    expect(runStatus).toHaveBeenCalledWith('/tmp/tk', { json: true });
  });

  it('writes config with init', async () => {
    await createProgram().parseAsync(
      argv('init', '--url', 'https://vpn.example.com/', '--domain', 'vpn.example.com'),
    );

    expect(runInit).toHaveBeenCalledWith(
      '/tmp/tk',
      { portalUrl: 'https://vpn.example.com/', cookieDomain: 'vpn.example.com', email: null },
      { force: undefined },
    );
  });
});
