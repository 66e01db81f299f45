import { lstatSync, symlinkSync, unlinkSync } from 'node:fs';
import path from 'node:path';
import { expandPath } from './util/env.js';
import { ensureDir } from './util/fs.js';
import type { Logger } from './util/logger.js';

export const LATEST_ALIAS = 'latest';

export type RunPaths = {
  basePath: string;
  metaPath: string;
  logsPath: string;
  msgPath: string;
};

export type RunDirectoryOptions = {
  root: string;
  runId: string;
  latestAlias?: boolean;
  suffix?: string;
  env?: NodeJS.ProcessEnv;
};

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// Codes another process produces by unlinking or creating the alias between
// our lstat and our symlink.
const RACE_CODES = new Set(['EEXIST', 'ENOENT']);

function isSymlink(aliasPath: string): boolean | null {
  try {
    return lstatSync(aliasPath).isSymbolicLink();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Points `<root>/latest` at `target`. A real file or directory named `latest`
 * is left alone. Returns true when this call created the link; losing a race
 * to another creator returns false.
 */
export function ensureLatestAlias(root: string, target: string): boolean {
  const aliasPath = path.join(root, LATEST_ALIAS);
  try {
    const existing = isSymlink(aliasPath);
    if (existing === false) {
      return false;
    }
    if (existing) {
      unlinkSync(aliasPath);
    }
    // A relative target would resolve against the link's own directory.
    symlinkSync(path.resolve(target), aliasPath);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code !== undefined && RACE_CODES.has(code)) {
      return false;
    }
    throw error;
  }
}

export function runPaths(basePath: string, suffix = ''): RunPaths {
  return {
    basePath,
    metaPath: path.join(basePath, `meta${suffix}.json`),
    logsPath: path.join(basePath, `logs${suffix}.csv`),
    msgPath: path.join(basePath, `out${suffix}.log`),
  };
}

export function resolveRunDirectory(options: RunDirectoryOptions, logger?: Logger): RunPaths {
  const root = expandPath(options.root, options.env);
  const basePath = path.join(root, options.runId);

  if (ensureDir(basePath)) {
    logger?.info(`Creating log directory: ${basePath}`);
  }

  if (options.latestAlias ?? true) {
    if (ensureLatestAlias(root, basePath)) {
      logger?.info(`Symlinked log directory: ${path.join(root, LATEST_ALIAS)}`);
    }
  }

  return runPaths(basePath, options.suffix);
}
