/**
 * Interface liveness checks used by the Tunnel Supervisor.
 *
 *   linux   /sys/class/net/<name> exists and operstate is not "down"
 *   darwin  some utunN carries an inet address (openconnect picks the
 *           utun number itself, so the configured name is ignored)
 *   other   the adapter is listed by os.networkInterfaces()
 */

import { promises as fs } from 'node:fs';
import { networkInterfaces } from 'node:os';
import { join } from 'node:path';
import { execa } from 'execa';

export interface InterfaceProbe {
  isUp(interfaceName: string): Promise<boolean>;
}

const SYSFS_NET = '/sys/class/net';

/** Linux probe over sysfs. */
export class SysfsInterfaceProbe implements InterfaceProbe {
  constructor(private readonly root: string = SYSFS_NET) {}

  async isUp(interfaceName: string): Promise<boolean> {
    const dir = join(this.root, interfaceName);
    try {
      await fs.access(dir);
    } catch {
      return false;
    }
    try {
      const state = await fs.readFile(join(dir, 'operstate'), 'utf-8');
      return state.trim() !== 'down';
    } catch {
      // Present without operstate: count as up
      return true;
    }
  }
}

/**
 * Finds the first utun interface that has an IPv4 address in
 * `ifconfig` output.
 */
export function parseActiveUtun(ifconfigOutput: string): string | null {
  let current: string | null = null;
  for (const line of ifconfigOutput.split('\n')) {
    const header = /^(\S+?):\s/.exec(line);
    if (header) {
      current = header[1];
      continue;
    }
    if (current?.startsWith('utun') && /^\s+inet\s/.test(line)) {
      return current;
    }
  }
  return null;
}

/** macOS probe over `ifconfig`. */
export class IfconfigInterfaceProbe implements InterfaceProbe {
  async isUp(_interfaceName: string): Promise<boolean> {
    const result = await execa('ifconfig', [], { reject: false });
    if (result.exitCode !== 0) return false;
    return parseActiveUtun(result.stdout) !== null;
  }
}

/** Fallback probe over the OS interface table. */
export class OsInterfaceProbe implements InterfaceProbe {
  async isUp(interfaceName: string): Promise<boolean> {
    return interfaceName in networkInterfaces();
  }
}

export function createInterfaceProbe(platform: NodeJS.Platform = process.platform): InterfaceProbe {
  switch (platform) {
    case 'linux':
      return new SysfsInterfaceProbe();
    case 'darwin':
      return new IfconfigInterfaceProbe();
    default:
      return new OsInterfaceProbe();
  }
}
