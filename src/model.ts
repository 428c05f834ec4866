import type { CalendarEvent, CalendarEventCreate } from './schemas.js';

export interface SubTask {
  /** Opaque id (uuid), assigned at creation. */
  id: string;
  /** Owning task. Relation only; the task owns the subtask. */
  task_id: string;
  title: string;
  due_datetime: string | null;
  completed: boolean;
  add_to_calendar: boolean;
  /** Length of the calendar block, 1..1440. */
  event_duration_minutes: number;
  calendar_id: string | null;
  /** Simulated provider event id. */
  calendar_event_id: string | null;
  created_at: string; // ISO
  updated_at: string; // ISO
}

export interface Task {
  /** Opaque id (uuid), immutable. */
  id: string;
  title: string;
  note: string | null;
  /** ISO-8601 with offset. */
  due_datetime: string | null;
  completed: boolean;
  calendar_event: CalendarEvent | null;
  /** Insertion order. */
  subtasks: SubTask[];
}

/**
 * Explicit presence for a patch field: left out of the payload, sent as
 * `null`, or sent with a value.
 */
export type FieldUpdate<T> = { kind: 'keep' } | { kind: 'clear' } | { kind: 'set'; value: T };

export interface TaskPatch {
  title?: string;
  note?: string;
  due_datetime?: string;
  completed?: boolean;
  calendar_event: FieldUpdate<CalendarEventCreate | CalendarEvent>;
}

export interface SubTaskPatch {
  title?: string;
  due_datetime?: string;
  completed?: boolean;
  add_to_calendar?: boolean;
  event_duration_minutes?: number;
  calendar_id?: string;
  calendar_event_id?: string;
}

export function isMaterializedEvent(event: CalendarEventCreate | CalendarEvent): event is CalendarEvent {
  return 'event_id' in event;
}

/** A subtask flagged for the calendar with a calendar id but no event yet. */
export function needsCalendarEvent<T extends Pick<SubTask, 'add_to_calendar' | 'calendar_id' | 'calendar_event_id'>>(
  subtask: T,
): subtask is T & { calendar_id: string } {
  return subtask.add_to_calendar && !!subtask.calendar_id && subtask.calendar_event_id === null;
}
