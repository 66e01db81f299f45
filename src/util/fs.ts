import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { sortKeysDeep, type JsonValue } from './json.js';

/** Creates `dirPath` and missing parents. Returns true when something was created. */
export function ensureDir(dirPath: string): boolean {
  return mkdirSync(dirPath, { recursive: true }) !== undefined;
}

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

/** Whole-file write: keys sorted at every depth, 4-space indent. */
export function writeJsonFile(filePath: string, data: JsonValue): void {
  ensureDir(path.dirname(filePath));
  const json = `${JSON.stringify(sortKeysDeep(data), null, 4)}\n`;
  writeFileSync(filePath, json, 'utf8');
}

export function readJsonFile(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf8')) as unknown;
}
