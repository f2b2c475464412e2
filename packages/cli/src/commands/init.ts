import { promises as fs } from 'node:fs';
import { getConfigPath, saveConfig } from '@tunnelkit/core';
import type { VpnConfig, VpnConfigInput } from '@tunnelkit/core';
import { CLIError, ExitCode } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

/**
 * Writes config.yaml for the data directory.
 *
 * @throws {CLIError} If config.yaml exists and `force` is not set
 */
export async function runInit(
  dataDir: string,
  input: VpnConfigInput,
  options: { force?: boolean } = {},
): Promise<VpnConfig> {
  const configPath = getConfigPath(dataDir);
  if (!options.force) {
    const exists = await fs.access(configPath).then(
      () => true,
      () => false,
    );
    if (exists) {
      throw new CLIError(`${configPath} already exists (use --force to overwrite)`, ExitCode.ValidationError);
    }
  }

  const config = await saveConfig(dataDir, input);
  logger.success(`Wrote ${configPath}`);
  return config;
}
