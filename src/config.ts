import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './log.js';
import { REFERENCE_TIME_ZONE, isValidTimeZone } from './time.js';

const str = z.string().min(1);

export const EnvSchema = z.object({
  // server
  TASK_API_HOST: str.optional(),
  TASK_API_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  TASK_API_CORS_ORIGIN: str.optional(),

  // behavior
  TASK_API_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // client
  TASK_API_URL: z.string().url().optional(),
  TASK_API_HTTP_RPS: z.coerce.number().positive().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigin: string;
  logLevel: LogLevel;
}

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;

export function serverConfig(env: EnvConfig = readEnv()): ServerConfig {
  return {
    host: env.TASK_API_HOST ?? DEFAULT_HOST,
    port: env.TASK_API_PORT ?? DEFAULT_PORT,
    corsOrigin: env.TASK_API_CORS_ORIGIN ?? '*',
    logLevel: env.TASK_API_LOG_LEVEL ?? 'info',
  };
}

/** Base URL the CLI client talks to. */
export function clientBaseUrl(env: EnvConfig = readEnv()): string {
  if (env.TASK_API_URL) return env.TASK_API_URL.replace(/\/+$/, '');
  const { host, port } = serverConfig(env);
  return `http://${host === '0.0.0.0' ? '127.0.0.1' : host}:${port}`;
}

export function doctorReport(env = readEnv()) {
  const config = serverConfig(env);
  const notes: string[] = [];

  if (config.host === '0.0.0.0') {
    notes.push('TASK_API_HOST=0.0.0.0 exposes the API on every interface; there is no authentication.');
  }
  if (config.port === 0) {
    notes.push('TASK_API_PORT=0 picks a random free port at startup.');
  }
  if (config.corsOrigin === '*') {
    notes.push('CORS allows any origin. Set TASK_API_CORS_ORIGIN to restrict it.');
  }

  return {
    config,
    clientUrl: clientBaseUrl(env),
    referenceTimeZone: {
      name: REFERENCE_TIME_ZONE,
      available: isValidTimeZone(REFERENCE_TIME_ZONE),
    },
    notes,
  };
}
