import { randomUUID } from 'node:crypto';
import type { CalendarEventCreate } from '../schemas.js';

/** What a calendar provider is asked to create. */
export type EventRequest =
  | { kind: 'task-event'; event: CalendarEventCreate }
  | { kind: 'subtask-block'; calendarId: string; title: string; durationMinutes: number };

/**
 * Creates events with a calendar provider and returns the provider's event id.
 * Only the id is kept; nothing is sent anywhere by the default issuer.
 */
export interface EventIdIssuer {
  issue(request: EventRequest): string;
}

/** Stand-in for the Google Calendar API: ids look like `evt_<uuid>`. */
export class SimulatedEventIdIssuer implements EventIdIssuer {
  issue(): string {
    return `evt_${randomUUID()}`;
  }
}
