import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseActiveUtun, SysfsInterfaceProbe } from '../../src/tunnel/interface-probe.js';

const IFCONFIG = [
  'lo0: flags=8049<UP,LOOPBACK,RUNNING,MULTICAST> mtu 16384',
  '\tinet 127.0.0.1 netmask 0xff000000',
  'utun0: flags=8051<UP,POINTOPOINT,RUNNING,MULTICAST> mtu 1380',
  '\tinet6 fe80::1%utun0 prefixlen 64 scopeid 0x10',
  'utun3: flags=8051<UP,POINTOPOINT,RUNNING,MULTICAST> mtu 1400',
  '\tinet 10.20.0.5 --> 10.20.0.5 netmask 0xffffffff',
].join('\n');

describe('parseActiveUtun', () => {
  it('returns the first utun with an IPv4 address', () => {
    expect(parseActiveUtun(IFCONFIG)).toBe('utun3');
  });

  it('ignores utuns that only carry IPv6', () => {
    expect(parseActiveUtun(IFCONFIG.split('\n').slice(0, 4).join('\n'))).toBeNull();
  });
});

describe('SysfsInterfaceProbe', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tunnelkit-sysfs-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('is down when the interface directory is missing', async () => {
    expect(await new SysfsInterfaceProbe(root).isUp('tk0')).toBe(false);
  });

  it('reads operstate', async () => {
    await fs.mkdir(path.join(root, 'tk0'));
    await fs.writeFile(path.join(root, 'tk0', 'operstate'), 'down\n');
    const probe = new SysfsInterfaceProbe(root);

    expect(await probe.isUp('tk0')).toBe(false);

    await fs.writeFile(path.join(root, 'tk0', 'operstate'), 'unknown\n');
    expect(await probe.isUp('tk0')).toBe(true);
  });
});
