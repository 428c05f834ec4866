import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse dotenv text.
 *
 * - KEY=VALUE lines, optionally prefixed with `export `
 * - Comments and empty lines are skipped
 * - Matching single or double quotes around the value are stripped
 */
export function parseEnvFile(raw: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const line of raw.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    if (trimmed.startsWith('export ')) trimmed = trimmed.slice('export '.length).trimStart();

    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();

    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    if (key) out[key] = value;
  }

  return out;
}

/**
 * Load `.env` then `.env.local` into `env`. Keys already set are left alone,
 * so the real environment always wins over the files.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of Object.entries(parseEnvFile(readFileSync(filePath, 'utf8')))) {
      if (env[key] === undefined) env[key] = value;
    }

    loaded.push(name);
  }

  return { loaded };
}
