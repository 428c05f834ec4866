import { randomUUID } from 'node:crypto';
import { TaskApiError } from '../errors.js';
import { isMaterializedEvent, needsCalendarEvent } from '../model.js';
import type { SubTask, SubTaskPatch, Task, TaskPatch } from '../model.js';
import { SimulatedEventIdIssuer, type EventIdIssuer } from '../providers/calendar.js';
import type { CalendarEvent, CalendarEventCreate, SubTaskCreate, TaskCreate, TaskListQuery } from '../schemas.js';
import { compareByDue, compareSubtasks, matchesQuery } from './filters.js';

export interface TaskStoreOptions {
  /** Calendar provider stand-in (default: simulated `evt_<uuid>` ids). */
  issuer?: EventIdIssuer;
  /** Inject a clock for tests */
  now?: () => Date;
  /** Inject id generation for tests */
  newId?: () => string;
}

const snapshot = <T>(value: T): T => structuredClone(value);

/**
 * In-memory task collection.
 *
 * - Tasks own their subtasks; deleting a task drops them.
 * - Every call is synchronous and returns a copy, never the stored object.
 * - No locking: concurrent callers see each other's writes as they land.
 */
export class TaskStore {
  private tasks = new Map<string, Task>();
  private issuer: EventIdIssuer;
  private now: () => Date;
  private newId: () => string;

  constructor(opts: TaskStoreOptions = {}) {
    this.issuer = opts.issuer ?? new SimulatedEventIdIssuer();
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  size(): number {
    return this.tasks.size;
  }

  /* ---------------------------- tasks ---------------------------- */

  listTasks(query: TaskListQuery = {}): Task[] {
    const now = this.now();
    return [...this.tasks.values()]
      .filter((t) => matchesQuery(t, query, now))
      .sort(compareByDue)
      .map(snapshot);
  }

  getTask(id: string): Task {
    return snapshot(this.requireTask(id));
  }

  createTask(input: TaskCreate): Task {
    const task: Task = {
      id: this.newId(),
      title: input.title,
      note: input.note,
      due_datetime: input.due_datetime,
      completed: input.completed,
      calendar_event: input.calendar_event ? this.createEvent(input.calendar_event) : null,
      subtasks: [],
    };
    this.tasks.set(task.id, task);
    return snapshot(task);
  }

  updateTask(id: string, patch: TaskPatch): Task {
    const task = this.requireTask(id);

    if (patch.title !== undefined) task.title = patch.title;
    if (patch.note !== undefined) task.note = patch.note;
    if (patch.due_datetime !== undefined) task.due_datetime = patch.due_datetime;
    if (patch.completed !== undefined) task.completed = patch.completed;

    const event = patch.calendar_event;
    if (event.kind === 'clear') {
      task.calendar_event = null;
    } else if (event.kind === 'set') {
      task.calendar_event = isMaterializedEvent(event.value) ? snapshot(event.value) : this.createEvent(event.value);
    }

    return snapshot(task);
  }

  deleteTask(id: string): void {
    this.requireTask(id);
    this.tasks.delete(id);
  }

  completeTask(id: string): Task {
    return this.setTaskCompleted(id, true);
  }

  undoTask(id: string): Task {
    return this.setTaskCompleted(id, false);
  }

  /* --------------------------- subtasks -------------------------- */

  /** Ascending due date (undated last), then creation time. */
  listSubtasks(taskId: string): SubTask[] {
    const task = this.requireTask(taskId);
    return [...task.subtasks].sort(compareSubtasks).map(snapshot);
  }

  getSubtask(taskId: string, subtaskId: string): SubTask {
    return snapshot(this.requireSubtask(this.requireTask(taskId), subtaskId));
  }

  createSubtask(taskId: string, input: SubTaskCreate): SubTask {
    const task = this.requireTask(taskId);
    const at = this.now().toISOString();
    const subtask: SubTask = {
      id: this.newId(),
      task_id: task.id,
      title: input.title,
      due_datetime: input.due_datetime,
      completed: input.completed,
      add_to_calendar: input.add_to_calendar,
      event_duration_minutes: input.event_duration_minutes,
      calendar_id: input.calendar_id,
      calendar_event_id: input.calendar_event_id,
      created_at: at,
      updated_at: at,
    };
    this.ensureSubtaskEvent(subtask);
    task.subtasks.push(subtask);
    return snapshot(subtask);
  }

  updateSubtask(taskId: string, subtaskId: string, patch: SubTaskPatch): SubTask {
    const subtask = this.requireSubtask(this.requireTask(taskId), subtaskId);

    if (patch.title !== undefined) subtask.title = patch.title;
    if (patch.due_datetime !== undefined) subtask.due_datetime = patch.due_datetime;
    if (patch.completed !== undefined) subtask.completed = patch.completed;
    if (patch.add_to_calendar !== undefined) subtask.add_to_calendar = patch.add_to_calendar;
    if (patch.event_duration_minutes !== undefined) subtask.event_duration_minutes = patch.event_duration_minutes;
    if (patch.calendar_id !== undefined) subtask.calendar_id = patch.calendar_id;
    if (patch.calendar_event_id !== undefined) subtask.calendar_event_id = patch.calendar_event_id;

    // Turning add_to_calendar on with a calendar id creates the event.
    this.ensureSubtaskEvent(subtask);
    subtask.updated_at = this.now().toISOString();
    return snapshot(subtask);
  }

  deleteSubtask(taskId: string, subtaskId: string): void {
    const task = this.requireTask(taskId);
    this.requireSubtask(task, subtaskId);
    task.subtasks = task.subtasks.filter((st) => st.id !== subtaskId);
  }

  completeSubtask(taskId: string, subtaskId: string): SubTask {
    return this.setSubtaskCompleted(taskId, subtaskId, true);
  }

  undoSubtask(taskId: string, subtaskId: string): SubTask {
    return this.setSubtaskCompleted(taskId, subtaskId, false);
  }

  /* --------------------------- helpers --------------------------- */

  private requireTask(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) throw TaskApiError.notFound('Task', id);
    return task;
  }

  private requireSubtask(task: Task, subtaskId: string): SubTask {
    const subtask = task.subtasks.find((st) => st.id === subtaskId);
    if (!subtask) throw TaskApiError.notFound('Subtask', subtaskId);
    return subtask;
  }

  private setTaskCompleted(id: string, completed: boolean): Task {
    const task = this.requireTask(id);
    task.completed = completed;
    return snapshot(task);
  }

  private setSubtaskCompleted(taskId: string, subtaskId: string, completed: boolean): SubTask {
    const subtask = this.requireSubtask(this.requireTask(taskId), subtaskId);
    subtask.completed = completed;
    subtask.updated_at = this.now().toISOString();
    return snapshot(subtask);
  }

  private createEvent(request: CalendarEventCreate): CalendarEvent {
    return { ...request, event_id: this.issuer.issue({ kind: 'task-event', event: request }) };
  }

  private ensureSubtaskEvent(subtask: SubTask): void {
    if (!needsCalendarEvent(subtask)) return;
    subtask.calendar_event_id = this.issuer.issue({
      kind: 'subtask-block',
      calendarId: subtask.calendar_id,
      title: subtask.title,
      durationMinutes: subtask.event_duration_minutes,
    });
  }
}
