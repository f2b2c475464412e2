/**
 * Session journal: state transitions and notable facts appended to
 * events.jsonl, one JSON object per line.
 */

import { dirname } from 'node:path';
import fs from 'graceful-fs';
import lockfile from 'proper-lockfile';
import { v4 as uuidv4 } from 'uuid';
import { LockTimeoutError, ValidationError } from '../errors.js';
import { getEventsPath } from '../utils/paths.js';
import { SessionEventSchema } from './types.js';
import type { EventFilters, SessionEvent, SessionEventType } from './types.js';

const fsPromises = fs.promises;

/**
 * An append holds the lock for one write, so waits are short and a lock
 * older than `stale` belongs to a writer that died mid-append.
 */
const JOURNAL_LOCK = {
  retries: { retries: 20, factor: 1.5, minTimeout: 10, maxTimeout: 250 },
  stale: 2_000,
} as const;

/** Builds an event with a fresh id and the current timestamp. */
export function createSessionEvent(
  eventType: SessionEventType,
  data: Record<string, unknown> = {},
  operationId: string | null = null,
): SessionEvent {
  return {
    event_id: uuidv4(),
    timestamp: new Date().toISOString(),
    event_type: eventType,
    operation_id: operationId,
    data,
  };
}

/**
 * Appends one event to <dataDir>/events.jsonl under a file lock, so
 * concurrent writers (a running `connect` and a `get-cookie`) never
 * interleave partial lines.
 *
 * @throws {ValidationError} If the event does not match the schema
 * @throws {LockTimeoutError} If another writer keeps the journal locked
 */
export async function appendSessionEvent(dataDir: string, event: SessionEvent): Promise<void> {
  const result = SessionEventSchema.safeParse(event);
  if (!result.success) {
    throw new ValidationError(
      `Invalid session event: ${result.error.issues.map((i) => i.message).join('; ')}`,
      'event',
      result.error.issues,
    );
  }

  const eventsPath = getEventsPath(dataDir);
  await fsPromises.mkdir(dirname(eventsPath), { recursive: true });
  await fsPromises.appendFile(eventsPath, '', 'utf-8');

  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(eventsPath, JOURNAL_LOCK);
  } catch (err) {
    throw new LockTimeoutError(
      `Session journal is locked by another writer: ${err instanceof Error ? err.message : String(err)}`,
      eventsPath,
    );
  }

  try {
    await fsPromises.appendFile(eventsPath, JSON.stringify(result.data) + '\n', 'utf-8');
  } finally {
    await release();
  }
}

/**
 * Reads the journal back, newest last. Malformed lines are skipped.
 */
export async function readSessionEvents(
  dataDir: string,
  filters: EventFilters = {},
): Promise<SessionEvent[]> {
  let content: string;
  try {
    content = await fsPromises.readFile(getEventsPath(dataDir), 'utf-8');
  } catch {
    return [];
  }

  const events: SessionEvent[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    const result = SessionEventSchema.safeParse(parsed);
    if (!result.success) continue;

    const event = result.data;
    if (filters.eventType && event.event_type !== filters.eventType) continue;
    if (filters.startTime && event.timestamp < filters.startTime) continue;
    events.push(event);
  }

  return filters.limit !== undefined ? events.slice(-filters.limit) : events;
}
