import { unlinkSync } from 'node:fs';
import { collectMetadata, type RunMetadata } from './metadata.js';
import { resolveRunDirectory, type RunPaths } from './run-directory.js';
import { TabularLogAppender, type LogRecord, type LogRow } from './tabular-log.js';
import { formatTimestamp } from './util/date.js';
import { resolveRunlogDefaults } from './util/env.js';
import { fileExists, writeJsonFile } from './util/fs.js';
import { cloneJson, type JsonObject } from './util/json.js';
import { Logger, consoleSink, fileSink, type LogSink } from './util/logger.js';

export type RunRecorderOptions = {
  /** Defaults to `<pid>_<unix seconds>`. */
  runId?: string;
  config?: JsonObject;
  /** Defaults to `RUNLOG_ROOT`, then `~/logs`. */
  root?: string;
  latestAlias?: boolean;
  suffix?: string;
  overwrite?: boolean;
  verbose?: boolean;
  /** Set to false to keep messages out of the terminal. */
  console?: boolean;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  clock?: () => Date;
};

export function makeRunId(clock: () => Date = () => new Date()): string {
  return `${process.pid}_${Math.floor(clock().getTime() / 1000)}`;
}

/**
 * One run on disk: metadata, the tabular log and the message file.
 *
 * ```ts
 * const recorder = await RunRecorder.open({ runId: 'lr-sweep-3', config: { lr: 0.01 } });
 * recorder.log({ loss: 0.5 });
 * recorder.close(true);
 * ```
 */
export class RunRecorder {
  private closedFlag = false;

  private constructor(
    private readonly meta: RunMetadata,
    readonly paths: RunPaths,
    readonly logger: Logger,
    private readonly appender: TabularLogAppender,
    private readonly messageSink: LogSink,
    private readonly verboseDefault: boolean,
    private readonly clock: () => Date,
  ) {}

  static async open(options: RunRecorderOptions = {}): Promise<RunRecorder> {
    const env = options.env ?? process.env;
    const clock = options.clock ?? (() => new Date());
    const defaults = resolveRunlogDefaults(env);
    const runId = options.runId || makeRunId(clock);

    const logger =
      options.logger ??
      new Logger({
        level: defaults.logLevel,
        sinks: options.console === false ? [] : [consoleSink()],
      });

    const meta = await collectMetadata(runId, options.config ?? {}, { env, cwd: options.cwd, clock });

    const paths = resolveRunDirectory(
      {
        root: options.root ?? defaults.root,
        runId,
        latestAlias: options.latestAlias,
        suffix: options.suffix,
        env,
      },
      logger,
    );

    logger.info(`Saving arguments to ${paths.metaPath}`);
    if (fileExists(paths.metaPath)) {
      if (!options.overwrite) {
        logger.warn('Path to meta file already exists. Not overriding meta.');
      } else {
        unlinkSync(paths.metaPath);
        writeJsonFile(paths.metaPath, meta);
      }
    } else {
      writeJsonFile(paths.metaPath, meta);
    }

    logger.info(`Saving messages to ${paths.msgPath}`);
    if (fileExists(paths.msgPath)) {
      logger.warn('Path to message file already exists. New data will be appended.');
    }
    const messageSink = fileSink(paths.msgPath);
    logger.addSink(messageSink);

    logger.info(`Saving logs data to ${paths.logsPath}`);
    const appender = new TabularLogAppender(paths.logsPath, { logger, clock });

    return new RunRecorder(meta, paths, logger, appender, messageSink, options.verbose ?? false, clock);
  }

  get runId(): string {
    return this.meta.run_id;
  }

  get metadata(): RunMetadata {
    return cloneJson(this.meta);
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  get columns(): string[] {
    return this.appender.columns;
  }

  log(record: LogRecord, verbose: boolean = this.verboseDefault): LogRow {
    return this.appender.append(record, { verbose });
  }

  close(successful = true): void {
    if (this.closedFlag) {
      return;
    }
    this.closedFlag = true;

    this.meta.date_end = formatTimestamp(this.clock());
    this.meta.successful = successful;
    try {
      writeJsonFile(this.paths.metaPath, this.meta);
    } finally {
      this.appender.close();
      this.logger.removeSink(this.messageSink.name);
    }
  }
}
