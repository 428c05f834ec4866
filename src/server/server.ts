import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import { TaskApiError, type ErrorBody } from '../errors.js';
import { createLogger, type Logger } from '../log.js';
import type { TaskStore } from '../store/taskStore.js';
import { dispatch, errorResponse, type ApiResponse } from './router.js';

export const MAX_BODY_BYTES = 1024 * 1024;

export interface TaskServerOptions {
  store: TaskStore;
  logger?: Logger;
  /** Value of Access-Control-Allow-Origin (default: '*'). */
  corsOrigin?: string;
}

export interface ListenOptions extends TaskServerOptions {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
}

export interface RunningServer {
  server: Server;
  /** Base URL, e.g. http://127.0.0.1:8000 */
  url: string;
  close(): Promise<void>;
}

function setCORSHeaders(res: ServerResponse, origin: string): void {
  res.setHeader('Access-Control-Allow-Origin', origin);
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  if (origin !== '*') res.setHeader('Vary', 'Origin');
}

function send(res: ServerResponse, response: ApiResponse): void {
  if (response.status === 204 || response.body === undefined) {
    res.writeHead(response.status, response.headers);
    res.end();
    return;
  }
  res.writeHead(response.status, { 'Content-Type': 'application/json', ...response.headers });
  res.end(JSON.stringify(response.body));
}

function readBody(req: IncomingMessage, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let bytes = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      bytes += chunk.length;
      if (bytes > limit) tooLarge = true;
      // keep draining so the response can still be written
      if (!tooLarge) chunks.push(chunk);
    });

    req.on('end', () => {
      if (tooLarge) reject(TaskApiError.payloadTooLarge(limit));
      else resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
}

export function createTaskServer(opts: TaskServerOptions): Server {
  const logger = opts.logger ?? createLogger('silent');
  const corsOrigin = opts.corsOrigin ?? '*';

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<number> {
    setCORSHeaders(res, corsOrigin);

    // CORS preflight
    if (req.method === 'OPTIONS') {
      send(res, { status: 204 });
      return 204;
    }

    let response: ApiResponse;
    try {
      const body = req.method === 'GET' || req.method === 'HEAD' ? '' : await readBody(req);
      response = dispatch(opts.store, { method: req.method ?? 'GET', url: req.url ?? '/', body });
    } catch (err) {
      if (!(err instanceof TaskApiError)) throw err;
      response = errorResponse(err);
    }
    send(res, response);
    return response.status;
  }

  const server = createServer((req, res) => {
    const started = Date.now();
    const log = logger.child({ method: req.method, path: req.url });

    handle(req, res)
      .then((status) => {
        log.debug('request', { status, ms: Date.now() - started });
      })
      .catch((err: unknown) => {
        log.error('request failed', { error: err instanceof Error ? err.stack ?? err.message : String(err) });
        if (res.headersSent) {
          res.end();
          return;
        }
        const body: ErrorBody = { error: { kind: 'InternalError', message: 'Internal server error' } };
        send(res, { status: 500, body });
      });
  });

  server.headersTimeout = 10_000;
  server.requestTimeout = 30_000;
  return server;
}

export async function startServer(opts: ListenOptions): Promise<RunningServer> {
  const logger = opts.logger ?? createLogger('silent');
  const server = createTaskServer({ ...opts, logger });
  const host = opts.host ?? '127.0.0.1';

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(opts.port ?? 0, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  if (!address || typeof address === 'string') throw new Error(`Unexpected server address: ${String(address)}`);
  const urlHost = address.family === 'IPv6' ? `[${address.address}]` : address.address;
  const url = `http://${urlHost}:${address.port}`;
  logger.info(`listening on ${url}`);

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info('server closed');
          resolve();
        });
        server.closeIdleConnections();
      }),
  };
}
