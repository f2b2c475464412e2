export { SessionEventSchema, SessionEventType } from './types.js';
export type { SessionEvent, EventFilters } from './types.js';
export { appendSessionEvent, createSessionEvent, readSessionEvents } from './append.js';
