#!/usr/bin/env node
import { Command } from 'commander';
import { TaskApiClient } from './client.js';
import { clientBaseUrl, doctorReport, readEnv, serverConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { HttpError } from './http.js';
import { createLogger } from './log.js';
import type { Task } from './model.js';
import { TaskListFilterSchema } from './schemas.js';
import { startServer } from './server/server.js';
import { TaskStore } from './store/taskStore.js';

loadEnvFiles();

const program = new Command();

program
  .name('task-api')
  .description('In-memory task and subtask HTTP API with simulated calendar events')
  .version('0.1.0');

program
  .command('serve')
  .description('Start the HTTP API (state lives in memory until the process exits)')
  .option('--host <host>', 'Bind address (default: TASK_API_HOST or 127.0.0.1)')
  .option('--port <port>', 'Port (default: TASK_API_PORT or 8000)')
  .action(async (opts: { host?: string; port?: string }) => {
    const env = readEnv({
      ...process.env,
      ...(opts.host ? { TASK_API_HOST: opts.host } : {}),
      ...(opts.port ? { TASK_API_PORT: opts.port } : {}),
    });
    const config = serverConfig(env);
    const logger = createLogger(config.logLevel);

    const running = await startServer({
      store: new TaskStore(),
      logger,
      host: config.host,
      port: config.port,
      corsOrigin: config.corsOrigin,
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      running.close().catch((err: unknown) => {
        logger.error('shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('doctor')
  .description('Print the resolved configuration')
  .action(() => {
    const report = doctorReport();
    console.log('task-api doctor');
    console.log('config:', report.config);
    console.log('client url:', report.clientUrl);
    console.log(
      `reference timezone: ${report.referenceTimeZone.name} (${report.referenceTimeZone.available ? 'ok' : 'NOT AVAILABLE in this runtime'})`,
    );

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }

    if (!report.referenceTimeZone.available) process.exitCode = 2;
  });

function makeClient(url?: string) {
  const env = readEnv();
  return new TaskApiClient({ baseUrl: url ?? clientBaseUrl(env), retries: 1, rps: env.TASK_API_HTTP_RPS });
}

function formatTask(t: Task): string {
  const box = t.completed ? '[x]' : '[ ]';
  const due = t.due_datetime ? ` (due ${t.due_datetime})` : '';
  const subs = t.subtasks.length ? ` +${t.subtasks.filter((s) => s.completed).length}/${t.subtasks.length}` : '';
  return `${box} ${t.title}${due}${subs}  ${t.id}`;
}

program
  .command('ping')
  .description('Check that a server is answering')
  .option('--url <url>', 'Server URL (default: TASK_API_URL or http://host:port)')
  .action(async (opts: { url?: string }) => {
    const res = await makeClient(opts.url).ping();
    console.log(`${res.service}: ok (${res.tasks} tasks)`);
  });

program
  .command('list')
  .description('List tasks on a running server')
  .option('--url <url>', 'Server URL (default: TASK_API_URL or http://host:port)')
  .option('--list <filter>', 'today|upcoming|done')
  .option('-q, --query <text>', 'Free-text search')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action(async (opts: { url?: string; list?: string; query?: string; format?: string }) => {
    const list = opts.list === undefined ? undefined : TaskListFilterSchema.parse(opts.list);
    const tasks = await makeClient(opts.url).listTasks({ list, q: opts.query });

    if ((opts.format ?? 'pretty') === 'json') {
      console.log(JSON.stringify(tasks, null, 2));
      return;
    }
    if (!tasks.length) console.log('(no tasks)');
    for (const t of tasks) console.log(formatTask(t));
  });

program
  .command('add <title>')
  .description('Create a task on a running server')
  .option('--url <url>', 'Server URL (default: TASK_API_URL or http://host:port)')
  .option('--note <note>', 'Note')
  .option('--due <datetime>', 'Due date-time, ISO-8601 with offset')
  .action(async (title: string, opts: { url?: string; note?: string; due?: string }) => {
    const task = await makeClient(opts.url).createTask({ title, note: opts.note, due_datetime: opts.due });
    console.log(formatTask(task));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof HttpError) console.error(`${err.message}${err.responseText ? `\n${err.responseText}` : ''}`);
  else console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
