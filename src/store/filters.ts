import type { SubTask, Task } from '../model.js';
import type { TaskListFilter, TaskListQuery } from '../schemas.js';
import { calendarDay, REFERENCE_TIME_ZONE, toEpochMs } from '../time.js';

type Dated = Pick<Task, 'due_datetime'>;

/** Case-insensitive substring match on title or note. Empty `q` matches everything. */
export function matchesText(task: Pick<Task, 'title' | 'note'>, q?: string): boolean {
  if (!q) return true;
  const needle = q.toLowerCase();
  if (task.title.toLowerCase().includes(needle)) return true;
  return task.note !== null && task.note.toLowerCase().includes(needle);
}

/** Inclusive range. Undated tasks are never excluded by a range. */
export function inDueRange(task: Dated, dueFrom?: string, dueTo?: string): boolean {
  if (task.due_datetime === null) return true;
  const due = toEpochMs(task.due_datetime);
  if (dueFrom && due < toEpochMs(dueFrom)) return false;
  if (dueTo && due > toEpochMs(dueTo)) return false;
  return true;
}

export function matchesListFilter(
  task: Pick<Task, 'due_datetime' | 'completed'>,
  filter: TaskListFilter | undefined,
  now: Date,
  timeZone: string = REFERENCE_TIME_ZONE,
): boolean {
  if (!filter) return true;
  if (filter === 'done') return task.completed;

  // today / upcoming need a due date
  if (task.due_datetime === null) return false;
  const dueDay = calendarDay(task.due_datetime, timeZone);
  const today = calendarDay(now, timeZone);
  return filter === 'today' ? dueDay === today : dueDay > today;
}

export function matchesQuery(task: Task, query: TaskListQuery, now: Date): boolean {
  return (
    matchesText(task, query.q) &&
    inDueRange(task, query.due_from, query.due_to) &&
    matchesListFilter(task, query.list, now)
  );
}

/** Ascending due date, undated last. Equal keys compare as 0 so a stable sort keeps input order. */
export function compareByDue(a: Dated, b: Dated): number {
  if (a.due_datetime === null || b.due_datetime === null) {
    if (a.due_datetime === b.due_datetime) return 0;
    return a.due_datetime === null ? 1 : -1;
  }
  return toEpochMs(a.due_datetime) - toEpochMs(b.due_datetime);
}

export function compareSubtasks(a: SubTask, b: SubTask): number {
  return compareByDue(a, b) || toEpochMs(a.created_at) - toEpochMs(b.created_at);
}
