import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';

/**
 * Parse a `.env` file. A missing or unreadable file yields an empty object.
 */
export function readEnvFile(envPath: string): Record<string, string> {
  try {
    if (!fs.existsSync(envPath)) return {};
    return dotenv.parse(fs.readFileSync(envPath, 'utf8'));
  } catch {
    return {};
  }
}

export function getHomeDir(env: NodeJS.ProcessEnv): string {
  const home = env.HOME || env.USERPROFILE;
  if (!home) throw new Error('HOME is not set');
  return home;
}

/**
 * Copy of `env` with `dir` first on PATH (no-op when it is already there).
 */
export function withPathEntry(env: NodeJS.ProcessEnv, dir: string): NodeJS.ProcessEnv {
  const current = env.PATH ?? '';
  const entries = current.split(path.delimiter).filter((p) => p.length > 0);
  if (entries.includes(dir)) return { ...env };
  return { ...env, PATH: [dir, ...entries].join(path.delimiter) };
}
