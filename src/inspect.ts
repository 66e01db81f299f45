import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { runPaths } from './run-directory.js';
import { fileExists, readJsonFile } from './util/fs.js';
import { isJsonObject, type JsonObject } from './util/json.js';

export type RunSummary = {
  runId: string | null;
  dateStart: string | null;
  dateEnd: string | null;
  successful: boolean | null;
  commit: string | null;
  branch: string | null;
  header: string[];
  rows: number;
};

function stringField(source: JsonObject, key: string): string | null {
  const value = source[key];
  return typeof value === 'string' ? value : null;
}

function readHeader(logsPath: string): { header: string[]; rows: number } {
  if (!fileExists(logsPath)) {
    return { header: [], rows: 0 };
  }
  const records: unknown = parse(readFileSync(logsPath, 'utf8'), {
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records) || records.length === 0) {
    return { header: [], rows: 0 };
  }
  const [first]: unknown[] = records;
  const header = Array.isArray(first) ? first.map((field) => String(field)) : [];
  return { header, rows: records.length - 1 };
}

/** Reads back what a recorder left in `runDir`. */
export function summarizeRun(runDir: string, suffix = ''): RunSummary {
  const paths = runPaths(runDir, suffix);
  const meta: unknown = fileExists(paths.metaPath) ? readJsonFile(paths.metaPath) : {};
  if (!isJsonObject(meta)) {
    throw new Error(`Metadata is not a JSON object: ${paths.metaPath}`);
  }
  const revision = meta.revision_info;
  const revisionInfo: JsonObject = isJsonObject(revision) ? revision : {};
  const successful = meta.successful;

  return {
    runId: stringField(meta, 'run_id'),
    dateStart: stringField(meta, 'date_start'),
    dateEnd: stringField(meta, 'date_end'),
    successful: typeof successful === 'boolean' ? successful : null,
    commit: stringField(revisionInfo, 'commit'),
    branch: stringField(revisionInfo, 'branch'),
    ...readHeader(paths.logsPath),
  };
}
