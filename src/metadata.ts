import { getRevisionInfo, type RevisionInfo } from './git.js';
import { formatTimestamp } from './util/date.js';
import { snapshotEnv } from './util/env.js';
import { cloneJson, type JsonObject } from './util/json.js';

export type SchedulerInfo = Record<string, string>;

export type RunMetadata = {
  date_start: string;
  date_end: string | null;
  successful: boolean;
  revision_info: RevisionInfo | null;
  scheduler_info: SchedulerInfo | null;
  environment: Record<string, string>;
  args: JsonObject;
  run_id: string;
};

export type MetadataSources = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  clock?: () => Date;
};

const SCHEDULER_JOB_VARIABLE = 'SLURM_JOB_ID';
const SCHEDULER_PREFIX = 'SLURM';

/**
 * SLURM job context, or null outside a SLURM job. `SLURM_JOB_ID` becomes
 * `job_id`, `SLURMD_NODENAME` becomes `nodename`.
 */
export function collectSchedulerInfo(env: NodeJS.ProcessEnv = process.env): SchedulerInfo | null {
  if (env[SCHEDULER_JOB_VARIABLE] === undefined) {
    return null;
  }

  const info: SchedulerInfo = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(SCHEDULER_PREFIX) || value === undefined) {
      continue;
    }
    info[key.replace(/^SLURMD?_/, '').toLowerCase()] = value;
  }
  return info;
}

export async function collectMetadata(
  runId: string,
  config: JsonObject = {},
  sources: MetadataSources = {},
): Promise<RunMetadata> {
  const env = sources.env ?? process.env;
  const now = sources.clock ?? (() => new Date());

  return {
    date_start: formatTimestamp(now()),
    date_end: null,
    successful: false,
    revision_info: await getRevisionInfo(sources.cwd),
    scheduler_info: collectSchedulerInfo(env),
    environment: snapshotEnv(env),
    args: cloneJson(config),
    run_id: runId,
  };
}
