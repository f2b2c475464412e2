/**
 * Credential Store: persisted session cookie.
 *
 * File location: <dataDir>/session-cookie.json
 * Write strategy: atomic (write .tmp, then rename); last writer wins.
 *
 * The store does not serialize its own callers; the Session Coordinator
 * is the single writer. A read racing a write from a previous instance
 * sees either the old or the new file, never a torn one.
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { atomicWrite, removeFile } from '../utils/atomic-write.js';
import { getBrowserProfileDir, getCookiePath } from '../utils/paths.js';

export const SessionCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string().min(1),
  domain: z.string().min(1),
  /** ISO 8601 timestamp of when the login flow produced the cookie */
  obtainedAt: z.string().datetime(),
});

export type SessionCookie = z.infer<typeof SessionCookieSchema>;

/** Contract consumed by the Login Driver and the Session Coordinator. */
export interface CredentialStore {
  load(): Promise<SessionCookie | null>;
  save(cookie: SessionCookie): Promise<void>;
  purge(): Promise<void>;
}

/** File-backed {@link CredentialStore}. */
export class FileCredentialStore implements CredentialStore {
  private readonly cookiePath: string;

  constructor(private readonly dataDir: string) {
    this.cookiePath = getCookiePath(dataDir);
  }

  /**
   * Returns the stored cookie, or null when the file is missing,
   * unreadable or fails validation.
   */
  async load(): Promise<SessionCookie | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.cookiePath, 'utf-8');
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }

    const result = SessionCookieSchema.safeParse(parsed);
    return result.success ? result.data : null;
  }

  async save(cookie: SessionCookie): Promise<void> {
    const validated = SessionCookieSchema.parse(cookie);
    await atomicWrite(this.cookiePath, JSON.stringify(validated, null, 2));
  }

  async purge(): Promise<void> {
    await removeFile(this.cookiePath);
  }

  /**
   * Deletes the browser profile directory (identity-provider cookies,
   * "stay signed in" state). Used by the `clean` command.
   *
   * @returns true if a profile directory existed
   */
  async wipeBrowserProfile(): Promise<boolean> {
    const profileDir = getBrowserProfileDir(this.dataDir);
    try {
      await fs.access(profileDir);
    } catch {
      return false;
    }
    await fs.rm(profileDir, { recursive: true, force: true });
    return true;
  }
}

/** In-memory {@link CredentialStore}, for embedding and tests. */
export class MemoryCredentialStore implements CredentialStore {
  constructor(private cookie: SessionCookie | null = null) {}

  async load(): Promise<SessionCookie | null> {
    return this.cookie;
  }

  async save(cookie: SessionCookie): Promise<void> {
    this.cookie = SessionCookieSchema.parse(cookie);
  }

  async purge(): Promise<void> {
    this.cookie = null;
  }
}
