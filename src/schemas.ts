import { z } from 'zod';
import { TaskApiError } from './errors.js';
import type { FieldUpdate, SubTaskPatch, TaskPatch } from './model.js';
import { isValidTimeZone, toEpochMs } from './time.js';

/* ------------------------------------------------------------------ */
/*  Building blocks                                                    */
/* ------------------------------------------------------------------ */

const NonBlankSchema = z
  .string()
  .min(1)
  .refine((s) => s.trim().length > 0, { message: 'Must not be blank' });

/** ISO-8601 date-time carrying `Z` or an explicit offset. */
export const TimestampSchema = z.string().datetime({ offset: true });

export const IdSchema = z.string().uuid();

const EventDurationSchema = z.number().int().min(1).max(24 * 60);

export const CalendarProviderSchema = z.enum(['google']);
export type CalendarProvider = z.infer<typeof CalendarProviderSchema>;

export const TaskListFilterSchema = z.enum(['today', 'upcoming', 'done']);
export type TaskListFilter = z.infer<typeof TaskListFilterSchema>;

/* ------------------------------------------------------------------ */
/*  Calendar events                                                    */
/* ------------------------------------------------------------------ */

const calendarEventShape = {
  provider: CalendarProviderSchema,
  calendar_id: NonBlankSchema,
  summary: NonBlankSchema,
  start_datetime: TimestampSchema,
  end_datetime: TimestampSchema,
  description: z.string().nullable().default(null),
  /** IANA zone, e.g. "Asia/Colombo". */
  timezone: z.string(),
  reminder_minutes_before: z.number().int().min(0).nullable().default(null),
};

function checkCalendarEvent(
  event: { timezone: string; start_datetime: string; end_datetime: string },
  ctx: z.RefinementCtx,
) {
  if (!isValidTimeZone(event.timezone)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['timezone'],
      message: `Invalid IANA timezone: ${event.timezone}`,
      params: { reason: 'InvalidTimezone' },
    });
  }
  if (toEpochMs(event.end_datetime) <= toEpochMs(event.start_datetime)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['end_datetime'],
      message: 'end_datetime must be after start_datetime',
      params: { reason: 'InvalidTimeRange' },
    });
  }
}

/** Event to be created with the provider (no provider event id yet). */
export const CalendarEventCreateSchema = z.object(calendarEventShape).strict().superRefine(checkCalendarEvent);
export type CalendarEventCreate = z.infer<typeof CalendarEventCreateSchema>;

/** Event the provider has already created. */
export const CalendarEventSchema = z
  .object({ ...calendarEventShape, event_id: NonBlankSchema })
  .strict()
  .superRefine(checkCalendarEvent);
export type CalendarEvent = z.infer<typeof CalendarEventSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasKey(value: unknown, key: string): boolean {
  return isRecord(value) && Object.prototype.hasOwnProperty.call(value, key);
}

/**
 * Either event shape. The presence of `event_id` picks the schema, so issues
 * are reported against the shape the caller meant.
 */
const CalendarEventValueSchema = z.unknown().transform((value, ctx): CalendarEventCreate | CalendarEvent => {
  const result = hasKey(value, 'event_id')
    ? CalendarEventSchema.safeParse(value)
    : CalendarEventCreateSchema.safeParse(value);
  if (!result.success) {
    for (const issue of result.error.issues) ctx.addIssue(issue);
    return z.NEVER;
  }
  return result.data;
});

/* ------------------------------------------------------------------ */
/*  Tasks                                                              */
/* ------------------------------------------------------------------ */

export const TaskCreateSchema = z
  .object({
    title: NonBlankSchema,
    note: z.string().nullable().default(null),
    due_datetime: TimestampSchema.nullable().default(null),
    completed: z.boolean().default(false),
    calendar_event: CalendarEventCreateSchema.nullable().default(null),
  })
  .strict();
export type TaskCreate = z.infer<typeof TaskCreateSchema>;

export const TaskUpdateSchema = z
  .object({
    title: NonBlankSchema.nullish(),
    note: z.string().nullish(),
    due_datetime: TimestampSchema.nullish(),
    completed: z.boolean().nullish(),
    calendar_event: CalendarEventValueSchema.nullish(),
  })
  .strict();
export type TaskUpdate = z.infer<typeof TaskUpdateSchema>;

/* ------------------------------------------------------------------ */
/*  Subtasks                                                           */
/* ------------------------------------------------------------------ */

export const SubTaskCreateSchema = z
  .object({
    title: NonBlankSchema,
    due_datetime: TimestampSchema.nullable().default(null),
    completed: z.boolean().default(false),
    add_to_calendar: z.boolean().default(false),
    event_duration_minutes: EventDurationSchema.default(60),
    calendar_id: z.string().nullable().default(null),
    calendar_event_id: z.string().nullable().default(null),
  })
  .strict();
export type SubTaskCreate = z.infer<typeof SubTaskCreateSchema>;

export const SubTaskUpdateSchema = z
  .object({
    title: NonBlankSchema.nullish(),
    due_datetime: TimestampSchema.nullish(),
    completed: z.boolean().nullish(),
    add_to_calendar: z.boolean().nullish(),
    event_duration_minutes: EventDurationSchema.nullish(),
    calendar_id: z.string().nullish(),
    calendar_event_id: z.string().nullish(),
  })
  .strict();
export type SubTaskUpdate = z.infer<typeof SubTaskUpdateSchema>;

/* ------------------------------------------------------------------ */
/*  Listing                                                            */
/* ------------------------------------------------------------------ */

export const TaskListQuerySchema = z
  .object({
    list: TaskListFilterSchema.optional(),
    /** Free-text search over title and note. */
    q: z.string().optional(),
    due_from: TimestampSchema.optional(),
    due_to: TimestampSchema.optional(),
  })
  .strict()
  .superRefine((query, ctx) => {
    if (query.due_from && query.due_to && toEpochMs(query.due_from) > toEpochMs(query.due_to)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['due_from'],
        message: 'due_from must be <= due_to',
        params: { reason: 'InvalidRange' },
      });
    }
  });
export type TaskListQuery = z.infer<typeof TaskListQuerySchema>;

/* ------------------------------------------------------------------ */
/*  Parsing into domain values                                         */
/* ------------------------------------------------------------------ */

export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw TaskApiError.fromZod(result.error);
  return result.data;
}

export function parseId(raw: string, entity: 'Task' | 'Subtask' = 'Task'): string {
  const result = IdSchema.safeParse(raw);
  if (!result.success) {
    throw TaskApiError.validation(`Malformed ${entity.toLowerCase()} id`, [
      { path: entity === 'Task' ? 'task_id' : 'subtask_id', message: 'Invalid uuid' },
    ]);
  }
  // ids are issued lower-case
  return result.data.toLowerCase();
}

export function parseTaskCreate(input: unknown): TaskCreate {
  return parseWith(TaskCreateSchema, input);
}

export function parseSubTaskCreate(input: unknown): SubTaskCreate {
  return parseWith(SubTaskCreateSchema, input);
}

export function parseTaskListQuery(input: unknown): TaskListQuery {
  return parseWith(TaskListQuerySchema, input);
}

/**
 * Validate a task PATCH body. Scalar fields sent as `null` are ignored;
 * `calendar_event` keeps the difference between left out and `null`.
 */
export function parseTaskUpdate(input: unknown): TaskPatch {
  const update = parseWith(TaskUpdateSchema, input);

  let event: FieldUpdate<CalendarEventCreate | CalendarEvent> = { kind: 'keep' };
  if (hasKey(input, 'calendar_event')) {
    event = update.calendar_event == null ? { kind: 'clear' } : { kind: 'set', value: update.calendar_event };
  }

  const patch: TaskPatch = { calendar_event: event };
  if (update.title != null) patch.title = update.title;
  if (update.note != null) patch.note = update.note;
  if (update.due_datetime != null) patch.due_datetime = update.due_datetime;
  if (update.completed != null) patch.completed = update.completed;
  return patch;
}

/** Validate a subtask PATCH body; `null` fields are ignored. */
export function parseSubTaskUpdate(input: unknown): SubTaskPatch {
  const update = parseWith(SubTaskUpdateSchema, input);
  const patch: SubTaskPatch = {};
  if (update.title != null) patch.title = update.title;
  if (update.due_datetime != null) patch.due_datetime = update.due_datetime;
  if (update.completed != null) patch.completed = update.completed;
  if (update.add_to_calendar != null) patch.add_to_calendar = update.add_to_calendar;
  if (update.event_duration_minutes != null) patch.event_duration_minutes = update.event_duration_minutes;
  if (update.calendar_id != null) patch.calendar_id = update.calendar_id;
  if (update.calendar_event_id != null) patch.calendar_event_id = update.calendar_event_id;
  return patch;
}
