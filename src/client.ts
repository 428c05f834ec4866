import type { z } from 'zod';
import { requestJson, type FetchLike, type JsonRequestOptions } from './http.js';
import type { SubTask, Task } from './model.js';
import type {
  CalendarEventCreateSchema,
  CalendarEventSchema,
  SubTaskCreateSchema,
  SubTaskUpdateSchema,
  TaskCreateSchema,
  TaskListQuery,
  TaskUpdateSchema,
} from './schemas.js';
import { API_PREFIX } from './server/router.js';

export type TaskCreateBody = z.input<typeof TaskCreateSchema>;
export type TaskUpdateBody = Omit<z.input<typeof TaskUpdateSchema>, 'calendar_event'> & {
  calendar_event?: z.input<typeof CalendarEventCreateSchema> | z.input<typeof CalendarEventSchema> | null;
};
export type SubTaskCreateBody = z.input<typeof SubTaskCreateSchema>;
export type SubTaskUpdateBody = z.input<typeof SubTaskUpdateSchema>;

export interface PingResponse {
  ok: boolean;
  service: string;
  tasks: number;
}

export interface TaskApiClientOptions {
  /** Server origin, e.g. http://127.0.0.1:8000 */
  baseUrl: string;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Request-per-second cap (best-effort). */
  rps?: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

const seg = (id: string) => encodeURIComponent(id);

/** Typed client for every task-api route. Failures surface as HttpError. */
export class TaskApiClient {
  private fetcher: FetchLike;
  private baseUrl: string;

  constructor(private opts: TaskApiClientOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  private api<T>(path: string, init: JsonRequestOptions = {}): Promise<T> {
    return requestJson<T>(
      `${this.baseUrl}${API_PREFIX}${path}`,
      { retries: this.opts.retries, rps: this.opts.rps, ...init },
      this.fetcher,
    );
  }

  ping(): Promise<PingResponse> {
    return requestJson<PingResponse>(`${this.baseUrl}/`, { retries: this.opts.retries, rps: this.opts.rps }, this.fetcher);
  }

  listTasks(query: Partial<TaskListQuery> = {}): Promise<Task[]> {
    return this.api<Task[]>('/tasks', { query: { ...query } });
  }

  createTask(body: TaskCreateBody): Promise<Task> {
    return this.api<Task>('/tasks', { method: 'POST', body });
  }

  getTask(id: string): Promise<Task> {
    return this.api<Task>(`/tasks/${seg(id)}`);
  }

  updateTask(id: string, body: TaskUpdateBody): Promise<Task> {
    return this.api<Task>(`/tasks/${seg(id)}`, { method: 'PATCH', body });
  }

  deleteTask(id: string): Promise<void> {
    return this.api<void>(`/tasks/${seg(id)}`, { method: 'DELETE' });
  }

  completeTask(id: string): Promise<Task> {
    return this.api<Task>(`/tasks/${seg(id)}/complete`, { method: 'POST' });
  }

  undoTask(id: string): Promise<Task> {
    return this.api<Task>(`/tasks/${seg(id)}/undo`, { method: 'POST' });
  }

  listSubtasks(taskId: string): Promise<SubTask[]> {
    return this.api<SubTask[]>(`/tasks/${seg(taskId)}/subtasks`);
  }

  createSubtask(taskId: string, body: SubTaskCreateBody): Promise<SubTask> {
    return this.api<SubTask>(`/tasks/${seg(taskId)}/subtasks`, { method: 'POST', body });
  }

  updateSubtask(taskId: string, subtaskId: string, body: SubTaskUpdateBody): Promise<SubTask> {
    return this.api<SubTask>(`/tasks/${seg(taskId)}/subtasks/${seg(subtaskId)}`, { method: 'PATCH', body });
  }

  deleteSubtask(taskId: string, subtaskId: string): Promise<void> {
    return this.api<void>(`/tasks/${seg(taskId)}/subtasks/${seg(subtaskId)}`, { method: 'DELETE' });
  }

  completeSubtask(taskId: string, subtaskId: string): Promise<SubTask> {
    return this.api<SubTask>(`/tasks/${seg(taskId)}/subtasks/${seg(subtaskId)}/complete`, { method: 'POST' });
  }

  undoSubtask(taskId: string, subtaskId: string): Promise<SubTask> {
    return this.api<SubTask>(`/tasks/${seg(taskId)}/subtasks/${seg(subtaskId)}/undo`, { method: 'POST' });
  }
}
