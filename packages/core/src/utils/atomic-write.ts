import path from 'node:path';
import fs from 'graceful-fs';
import { FileSystemError } from '../errors.js';

const fsPromises = fs.promises;

/**
 * Atomically writes content to a file using a temporary file + rename pattern.
 * A reader racing the write sees either the previous content or the new one.
 *
 * @param filePath - Target file path
 * @param content - String content to write
 * @param mode - File mode for the written file (default 0o600)
 * @throws {FileSystemError} If the write or rename operation fails
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  mode = 0o600,
): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
    await fsPromises.writeFile(tmpPath, content, { encoding: 'utf-8', mode });
    await fsPromises.rename(tmpPath, filePath);
  } catch (err) {
    try {
      await fsPromises.unlink(tmpPath);
    } catch {
      // tmp file was never created
    }
    throw new FileSystemError(
      `Atomic write failed for ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err,
    );
  }
}

/**
 * Removes a file, treating a missing file as success.
 *
 * @throws {FileSystemError} For any failure other than ENOENT
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsPromises.unlink(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return;
    throw new FileSystemError(
      `Could not remove ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err,
    );
  }
}
