import dotenv from 'dotenv';
import os from 'node:os';
import path from 'node:path';
import { LogLevel, parseLogLevel } from './logger.js';

export const DEFAULT_ROOT = '~/logs';

const ENV_REFERENCE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export type RunlogDefaults = {
  root: string;
  logLevel: LogLevel;
};

let envLoaded = false;

function loadEnv(): void {
  if (envLoaded) {
    return;
  }

  const envPath = path.resolve(process.cwd(), '.env');
  dotenv.config({ path: envPath });
  envLoaded = true;
}

export function ensureEnvLoaded(): void {
  loadEnv();
}

export function resolveRunlogDefaults(env: NodeJS.ProcessEnv = process.env): RunlogDefaults {
  return {
    root: env.RUNLOG_ROOT || DEFAULT_ROOT,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

/** Defined variables only; `process.env` may report keys with undefined values. */
export function snapshotEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const snapshot: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return snapshot;
}

/**
 * Expands a leading `~` and `$VAR` / `${VAR}` references. Unknown variables
 * are left as written.
 */
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  let expanded = input;
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = path.join(os.homedir(), expanded.slice(1));
  }
  return expanded.replace(ENV_REFERENCE, (match, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    return env[name] ?? match;
  });
}
