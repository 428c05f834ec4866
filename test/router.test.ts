import { describe, expect, it } from 'vitest';
import { MockEventIdIssuer } from '../src/providers/mock.js';
import { dispatch, type ApiRequest, type ApiResponse } from '../src/server/router.js';
import { TaskStore } from '../src/store/taskStore.js';

const MISSING = '00000000-0000-4000-8000-000000000000';

function setup() {
  const store = new TaskStore({ issuer: new MockEventIdIssuer(), now: () => new Date('2024-06-10T12:00:00Z') });
  const call = (method: string, url: string, body?: unknown): ApiResponse => {
    const req: ApiRequest = { method, url };
    if (body !== undefined) req.body = typeof body === 'string' ? body : JSON.stringify(body);
    return dispatch(store, req);
  };
  const createTask = (body: unknown) => {
    const res = call('POST', '/api/v1/tasks', body);
    expect(res.status).toBe(201);
    return { id: idOf(res.body), body: res.body };
  };
  return { store, call, createTask };
}

function idOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string') return body.id;
  throw new Error(`response has no id: ${JSON.stringify(body)}`);
}

describe('dispatch', () => {
  it('answers the ping route', () => {
    const { call, createTask } = setup();
    createTask({ title: 'one' });
    expect(call('GET', '/')).toEqual({ status: 200, body: { ok: true, service: 'task-api', tasks: 1 } });
  });

  it('creates, reads, updates and deletes a task', () => {
    const { call, createTask } = setup();
    const task = createTask({ title: 'Write report' });

    expect(call('GET', `/api/v1/tasks/${task.id}`)).toEqual({ status: 200, body: task.body });

    const patched = call('PATCH', `/api/v1/tasks/${task.id}`, { note: 'draft first' });
    expect(patched.status).toBe(200);
    expect(patched.body).toMatchObject({ id: task.id, title: 'Write report', note: 'draft first' });

    expect(call('DELETE', `/api/v1/tasks/${task.id}`)).toEqual({ status: 204 });
    expect(call('GET', `/api/v1/tasks/${task.id}`).status).toBe(404);
  });

  it('lists tasks with filters and ignores unknown parameters', () => {
    const { call, createTask } = setup();
    createTask({ title: 'Buy milk' });
    createTask({ title: 'Call bank' });

    const res = call('GET', '/api/v1/tasks?q=milk&page=2');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject([{ title: 'Buy milk' }]);
  });

  it('completes and undoes a task', () => {
    const { call, createTask } = setup();
    const task = createTask({ title: 'x' });
    expect(call('POST', `/api/v1/tasks/${task.id}/complete`).body).toMatchObject({ completed: true });
    expect(call('POST', `/api/v1/tasks/${task.id}/undo`).body).toMatchObject({ completed: false });
  });

  it('runs the subtask routes', () => {
    const { call, createTask } = setup();
    const task = createTask({ title: 'Party' });
    const base = `/api/v1/tasks/${task.id}/subtasks`;

    const createdRes = call('POST', base, { title: 'Book venue', add_to_calendar: true, calendar_id: 'cal1' });
    expect(createdRes.status).toBe(201);
    expect(createdRes.body).toMatchObject({ task_id: task.id, calendar_event_id: 'evt_mock_1' });
    const st = { id: idOf(createdRes.body) };

    expect(call('PATCH', `${base}/${st.id}`, { title: 'Book hall' }).body).toMatchObject({ title: 'Book hall' });
    expect(call('POST', `${base}/${st.id}/complete`).body).toMatchObject({ completed: true });
    expect(call('POST', `${base}/${st.id}/undo`).body).toMatchObject({ completed: false });
    expect(call('GET', base)).toMatchObject({ status: 200, body: [{ id: st.id, title: 'Book hall' }] });

    expect(call('DELETE', `${base}/${st.id}`)).toEqual({ status: 204 });
    expect(call('GET', base)).toEqual({ status: 200, body: [] });
  });

  it('returns NotFound bodies for missing tasks and subtasks', () => {
    const { call, createTask } = setup();
    expect(call('GET', `/api/v1/tasks/${MISSING}`)).toEqual({
      status: 404,
      body: { error: { kind: 'NotFound', message: `Task not found: ${MISSING}` } },
    });

    const task = createTask({ title: 'x' });
    expect(call('POST', `/api/v1/tasks/${task.id}/subtasks/${MISSING}/complete`)).toEqual({
      status: 404,
      body: { error: { kind: 'NotFound', message: `Subtask not found: ${MISSING}` } },
    });
  });

  it('matches ids regardless of case', () => {
    const { call, createTask } = setup();
    const task = createTask({ title: 'Write report' });
    const upper = task.id.toUpperCase();
    expect(upper).not.toBe(task.id);

    expect(call('GET', `/api/v1/tasks/${upper}`)).toEqual({ status: 200, body: task.body });

    const st = idOf(call('POST', `/api/v1/tasks/${upper}/subtasks`, { title: 'Outline' }).body);
    const done = call('POST', `/api/v1/tasks/${upper}/subtasks/${st.toUpperCase()}/complete`);
    expect(done.status).toBe(200);
    expect(done.body).toMatchObject({ id: st, task_id: task.id, completed: true });
  });

  it('applies nothing from a rejected task patch', () => {
    const { call, createTask } = setup();
    const task = createTask({ title: 'Original' });

    const res = call('PATCH', `/api/v1/tasks/${task.id}`, {
      title: 'Renamed',
      calendar_event: {
        provider: 'google',
        calendar_id: 'primary',
        summary: 'Review',
        start_datetime: '2024-06-12T09:00:00Z',
        end_datetime: '2024-06-12T10:00:00Z',
        timezone: 'Nowhere/City',
      },
    });

    expect(res).toEqual({
      status: 422,
      body: {
        error: {
          kind: 'ValidationError',
          message: 'calendar_event.timezone: Invalid IANA timezone: Nowhere/City',
          issues: [
            { path: 'calendar_event.timezone', message: 'Invalid IANA timezone: Nowhere/City', reason: 'InvalidTimezone' },
          ],
        },
      },
    });
    expect(call('GET', `/api/v1/tasks/${task.id}`)).toEqual({ status: 200, body: task.body });
  });

  it('applies nothing from a rejected subtask patch', () => {
    const { call, createTask } = setup();
    const task = createTask({ title: 'Party' });
    const base = `/api/v1/tasks/${task.id}/subtasks`;
    const created = call('POST', base, { title: 'Book venue' });
    const st = idOf(created.body);

    const res = call('PATCH', `${base}/${st}`, { title: 'Book hall', event_duration_minutes: 0 });

    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { kind: 'ValidationError', issues: [{ path: 'event_duration_minutes' }] } });
    expect(call('GET', base)).toEqual({ status: 200, body: [created.body] });
  });

  it('rejects malformed ids with 422', () => {
    const { call } = setup();
    expect(call('GET', '/api/v1/tasks/42')).toEqual({
      status: 422,
      body: {
        error: {
          kind: 'ValidationError',
          message: 'Malformed task id',
          issues: [{ path: 'task_id', message: 'Invalid uuid' }],
        },
      },
    });
  });

  it('reports validation issues', () => {
    const { call } = setup();
    const res = call('POST', '/api/v1/tasks', { title: '   ' });
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { kind: 'ValidationError', issues: [{ path: 'title', message: 'Must not be blank' }] } });

    const range = call('GET', '/api/v1/tasks?due_from=2024-02-01T00:00:00Z&due_to=2024-01-01T00:00:00Z');
    expect(range).toEqual({
      status: 422,
      body: {
        error: {
          kind: 'ValidationError',
          message: 'due_from: due_from must be <= due_to',
          issues: [{ path: 'due_from', message: 'due_from must be <= due_to', reason: 'InvalidRange' }],
        },
      },
    });
  });

  it('rejects a body that is not JSON', () => {
    const { call } = setup();
    const res = call('POST', '/api/v1/tasks', '{"title":');
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { kind: 'ValidationError' } });
    expect(JSON.stringify(res.body)).toContain('Request body is not valid JSON');
  });

  it('names the allowed methods on 405', () => {
    const { call } = setup();
    expect(call('PUT', '/api/v1/tasks')).toEqual({
      status: 405,
      headers: { allow: 'GET, POST' },
      body: { error: { kind: 'MethodNotAllowed', message: 'PUT is not allowed on /api/v1/tasks' } },
    });
  });

  it('returns 404 for unknown paths', () => {
    const { call } = setup();
    expect(call('GET', '/api/v1/projects')).toEqual({
      status: 404,
      body: { error: { kind: 'NotFound', message: 'No route for GET /api/v1/projects' } },
    });
    expect(call('GET', '/tasks').status).toBe(404);
  });
});
