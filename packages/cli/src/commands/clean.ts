import { FileCredentialStore, withInstanceLease } from '@tunnelkit/core';
import { logger } from '../utils/logger.js';

export interface CleanResult {
  profileRemoved: boolean;
}

/**
 * Removes the stored cookie and the browser profile, so the next
 * connect signs in from scratch. Refused while a session is running.
 */
export async function runClean(dataDir: string): Promise<CleanResult> {
  return withInstanceLease(dataDir, async () => {
    const store = new FileCredentialStore(dataDir);
    await store.purge();
    const profileRemoved = await store.wipeBrowserProfile();
    logger.success(profileRemoved ? 'Session data wiped' : 'Session cookie removed; no browser profile found');
    return { profileRemoved };
  });
}
