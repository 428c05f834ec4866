import { TaskApiError } from '../errors.js';
import {
  parseId,
  parseSubTaskCreate,
  parseSubTaskUpdate,
  parseTaskCreate,
  parseTaskListQuery,
  parseTaskUpdate,
} from '../schemas.js';
import type { TaskStore } from '../store/taskStore.js';

export const API_PREFIX = '/api/v1';
export const SERVICE_NAME = 'task-api';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface ApiRequest {
  method: string;
  /** Path plus query string, as received. */
  url: string;
  /** Raw body text; empty when the request had none. */
  body?: string;
}

export interface ApiResponse {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

interface RouteContext {
  store: TaskStore;
  params: Record<string, string>;
  query: URLSearchParams;
  /** Parsed JSON body; `undefined` when empty. */
  json(): unknown;
}

interface Route {
  method: HttpMethod;
  pattern: RegExp;
  keys: string[];
  handle(ctx: RouteContext): ApiResponse;
}

function route(method: HttpMethod, path: string, handle: Route['handle']): Route {
  const keys: string[] = [];
  const source = path.replace(/:([A-Za-z]+)/g, (_match, key: string) => {
    keys.push(key);
    return '([^/]+)';
  });
  return { method, pattern: new RegExp(`^${source}$`), keys, handle };
}

const ok = (body: unknown): ApiResponse => ({ status: 200, body });
const created = (body: unknown): ApiResponse => ({ status: 201, body });
const noContent = (): ApiResponse => ({ status: 204 });

const LIST_QUERY_KEYS = ['list', 'q', 'due_from', 'due_to'] as const;

/** Known list parameters only; anything else on the query string is ignored. */
function listQuery(query: URLSearchParams): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of LIST_QUERY_KEYS) {
    const value = query.get(key);
    if (value !== null) out[key] = value;
  }
  return out;
}

const taskId = (ctx: RouteContext) => parseId(ctx.params.taskId, 'Task');
const subtaskId = (ctx: RouteContext) => parseId(ctx.params.subtaskId, 'Subtask');

const routes: Route[] = [
  // tasks
  route('GET', '/tasks', (ctx) => ok(ctx.store.listTasks(parseTaskListQuery(listQuery(ctx.query))))),
  route('POST', '/tasks', (ctx) => created(ctx.store.createTask(parseTaskCreate(ctx.json())))),
  route('GET', '/tasks/:taskId', (ctx) => ok(ctx.store.getTask(taskId(ctx)))),
  route('PATCH', '/tasks/:taskId', (ctx) => {
    const id = taskId(ctx);
    return ok(ctx.store.updateTask(id, parseTaskUpdate(ctx.json())));
  }),
  route('DELETE', '/tasks/:taskId', (ctx) => {
    ctx.store.deleteTask(taskId(ctx));
    return noContent();
  }),
  route('POST', '/tasks/:taskId/complete', (ctx) => ok(ctx.store.completeTask(taskId(ctx)))),
  route('POST', '/tasks/:taskId/undo', (ctx) => ok(ctx.store.undoTask(taskId(ctx)))),

  // subtasks
  route('GET', '/tasks/:taskId/subtasks', (ctx) => ok(ctx.store.listSubtasks(taskId(ctx)))),
  route('POST', '/tasks/:taskId/subtasks', (ctx) => {
    const id = taskId(ctx);
    return created(ctx.store.createSubtask(id, parseSubTaskCreate(ctx.json())));
  }),
  route('PATCH', '/tasks/:taskId/subtasks/:subtaskId', (ctx) => {
    const [id, sid] = [taskId(ctx), subtaskId(ctx)];
    return ok(ctx.store.updateSubtask(id, sid, parseSubTaskUpdate(ctx.json())));
  }),
  route('DELETE', '/tasks/:taskId/subtasks/:subtaskId', (ctx) => {
    ctx.store.deleteSubtask(taskId(ctx), subtaskId(ctx));
    return noContent();
  }),
  route('POST', '/tasks/:taskId/subtasks/:subtaskId/complete', (ctx) =>
    ok(ctx.store.completeSubtask(taskId(ctx), subtaskId(ctx))),
  ),
  route('POST', '/tasks/:taskId/subtasks/:subtaskId/undo', (ctx) =>
    ok(ctx.store.undoSubtask(taskId(ctx), subtaskId(ctx))),
  ),
];

function parseJsonBody(raw: string | undefined): unknown {
  if (!raw || !raw.trim()) return undefined;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw TaskApiError.validation(`Request body is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function errorResponse(err: TaskApiError, headers?: Record<string, string>): ApiResponse {
  return { status: err.status, body: err.toBody(), ...(headers ? { headers } : {}) };
}

/**
 * Route one request against the store.
 *
 * TaskApiErrors become their error responses. Anything else is a bug and is
 * rethrown for the server to turn into a 500.
 */
export function dispatch(store: TaskStore, req: ApiRequest): ApiResponse {
  const url = new URL(req.url, 'http://localhost');
  const method = req.method.toUpperCase();

  try {
    if (url.pathname === '/') {
      if (method !== 'GET') throw TaskApiError.methodNotAllowed(method, url.pathname);
      return ok({ ok: true, service: SERVICE_NAME, tasks: store.size() });
    }

    if (url.pathname !== API_PREFIX && !url.pathname.startsWith(`${API_PREFIX}/`)) {
      throw TaskApiError.routeNotFound(method, url.pathname);
    }
    const path = url.pathname.slice(API_PREFIX.length);

    const allowed: HttpMethod[] = [];
    for (const r of routes) {
      const m = r.pattern.exec(path);
      if (!m) continue;
      if (r.method !== method) {
        allowed.push(r.method);
        continue;
      }

      const params: Record<string, string> = {};
      r.keys.forEach((key, i) => {
        params[key] = m[i + 1] ?? '';
      });

      return r.handle({ store, params, query: url.searchParams, json: () => parseJsonBody(req.body) });
    }

    if (allowed.length) {
      return errorResponse(TaskApiError.methodNotAllowed(method, url.pathname), { allow: allowed.join(', ') });
    }
    throw TaskApiError.routeNotFound(method, url.pathname);
  } catch (err) {
    if (err instanceof TaskApiError) return errorResponse(err);
    throw err;
  }
}
