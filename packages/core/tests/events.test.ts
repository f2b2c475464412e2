import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import lockfile from 'proper-lockfile';
import {
  appendSessionEvent,
  createSessionEvent,
  getEventsPath,
  readSessionEvents,
  SessionEventType,
  ValidationError,
} from '../src/index.js';
import type { SessionEvent } from '../src/index.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tunnelkit-events-test-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('createSessionEvent', () => {
  it('stamps an id and a timestamp', () => {
    const event = createSessionEvent(SessionEventType.CookiePurged, {}, 'op-1');

    expect(event.event_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false);
    expect(event.operation_id).toBe('op-1');
  });
});

describe('appendSessionEvent / readSessionEvents', () => {
  it('appends one line per event, in order', async () => {
    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.StateChanged, { state: 'LoggingIn' }));
    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.StateChanged, { state: 'Connected' }));

    const lines = (await fs.readFile(getEventsPath(tmpDir), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);

    const events = await readSessionEvents(tmpDir);
    expect(events.map((e) => e.data?.['state'])).toEqual(['LoggingIn', 'Connected']);
  });

  it('keeps every line under concurrent appends', async () => {
    await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.StateChanged, { n: i })),
      ),
    );

    const events = await readSessionEvents(tmpDir);
    expect(events.map((e) => e.data?.['n']).sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it('waits for another writer to release the journal', async () => {
    const eventsPath = getEventsPath(tmpDir);
    await fs.writeFile(eventsPath, '');
    const release = await lockfile.lock(eventsPath);
    setTimeout(() => void release(), 40);

    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.CookiePurged));

    expect(await lockfile.check(eventsPath)).toBe(false);
    expect(await readSessionEvents(tmpDir)).toHaveLength(1);
  });

  it('rejects an event that does not match the schema', async () => {
    const bad: SessionEvent = { ...createSessionEvent(SessionEventType.CookiePurged), timestamp: 'yesterday' };

    await expect(appendSessionEvent(tmpDir, bad)).rejects.toBeInstanceOf(ValidationError);
  });

  it('filters by type and keeps the newest entries', async () => {
    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.StateChanged, { state: 'Connected' }));
    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.CookiePurged));
    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.StateChanged, { state: 'Idle' }));

    const last = await readSessionEvents(tmpDir, { eventType: SessionEventType.StateChanged, limit: 1 });

    expect(last.map((e) => e.data?.['state'])).toEqual(['Idle']);
  });

  it('skips malformed lines and tolerates a missing journal', async () => {
    expect(await readSessionEvents(tmpDir)).toEqual([]);

    await appendSessionEvent(tmpDir, createSessionEvent(SessionEventType.CookiePurged));
    await fs.appendFile(getEventsPath(tmpDir), 'not json\n{"event_id":"x"}\n');

    expect(await readSessionEvents(tmpDir)).toHaveLength(1);
  });
});
