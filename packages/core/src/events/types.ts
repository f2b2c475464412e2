import { z } from 'zod';

/** Event type values written to the session journal. */
export const SessionEventType = {
  StateChanged: 'state_changed',
  PromptIssued: 'prompt_issued',
  CookiePurged: 'cookie_purged',
  TeardownWarning: 'teardown_warning',
} as const;

export type SessionEventType = (typeof SessionEventType)[keyof typeof SessionEventType];

/** Zod schema for one events.jsonl line. */
export const SessionEventSchema = z.object({
  event_id: z.string().uuid(),
  timestamp: z.string().datetime(),
  event_type: z.enum(['state_changed', 'prompt_issued', 'cookie_purged', 'teardown_warning']),
  /** Operation that produced the event, when one was in flight */
  operation_id: z.string().nullable().optional(),
  data: z.record(z.unknown()).optional(),
});

/** TypeScript type for a session journal event. */
export type SessionEvent = z.infer<typeof SessionEventSchema>;

/** Filters for reading the journal back. */
export interface EventFilters {
  eventType?: SessionEventType;
  startTime?: string;
  limit?: number;
}
