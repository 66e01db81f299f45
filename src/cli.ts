#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { consola } from 'consola';
import { createRequire } from 'node:module';
import { recordCommand } from './exec.js';
import { summarizeRun } from './inspect.js';
import { TabularLogAppender } from './tabular-log.js';
import { ensureEnvLoaded } from './util/env.js';
import { logger } from './util/logger.js';
import { parseAssignments } from './util/string.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version?: string };

type AppendCommandOptions = {
  verbose?: boolean;
};

type ShowCommandOptions = {
  suffix?: string;
};

type ExecCommandOptions = {
  id?: string;
  root?: string;
  suffix?: string;
  overwrite?: boolean;
  latest: boolean;
  verbose?: boolean;
};

ensureEnvLoaded();

const program = new Command();

program
  .name('runlog')
  .description('Record experiment runs: metadata, resumable CSV metrics and messages')
  .version(packageJson.version ?? '0.0.0')
  .enablePositionalOptions();

program
  .command('append')
  .description('Append one row to a CSV log, resuming its tick count')
  .argument('<logsPath>', 'Path to the logs CSV file')
  .argument('<values...>', 'Row values as key=value')
  .option('-v, --verbose', 'Echo the stored row')
  .action((logsPath: string, values: string[], options: AppendCommandOptions) => {
    try {
      const appender = new TabularLogAppender(logsPath, { logger });
      try {
        const row = appender.append(parseAssignments(values), { verbose: options.verbose });
        consola.success(`Appended tick ${row._tick} to ${logsPath}`);
      } finally {
        appender.close();
      }
    } catch (error) {
      consola.error(error);
      process.exitCode = 1;
    }
  });

program
  .command('show')
  .description('Summarize a run directory')
  .argument('<runDir>', 'Run directory')
  .option('--suffix <suffix>', 'File name suffix', '')
  .action((runDir: string, options: ShowCommandOptions) => {
    try {
      const summary = summarizeRun(runDir, options.suffix);
      const status =
        summary.successful === null ? 'unknown' : summary.successful ? chalk.green('successful') : chalk.red('failed');
      consola.info(`${chalk.bold(summary.runId ?? runDir)} ${status}`);
      consola.info(`started ${summary.dateStart ?? '-'}, ended ${summary.dateEnd ?? '-'}`);
      if (summary.commit) {
        consola.info(`revision ${summary.commit}${summary.branch ? ` (${summary.branch})` : ''}`);
      }
      consola.info(`${summary.rows} rows, columns: ${summary.header.join(', ')}`);
    } catch (error) {
      consola.error(error);
      process.exitCode = 1;
    }
  });

program
  .command('exec')
  .description('Run a command as a recorded run; JSON object lines on stdout become rows')
  .argument('<command>', 'Command to run')
  .argument('[args...]', 'Command arguments')
  .passThroughOptions()
  .option('--id <runId>', 'Run id (defaults to <pid>_<unix seconds>)')
  .option('--root <path>', 'Root directory for runs (defaults to RUNLOG_ROOT or ~/logs)')
  .option('--suffix <suffix>', 'File name suffix', '')
  .option('--overwrite', 'Replace existing metadata')
  .option('--no-latest', 'Do not update the latest alias')
  .option('-v, --verbose', 'Echo every stored row')
  .action(async (command: string, args: string[], options: ExecCommandOptions) => {
    try {
      const summary = await recordCommand(command, args, {
        runId: options.id,
        root: options.root,
        suffix: options.suffix,
        overwrite: Boolean(options.overwrite),
        latestAlias: options.latest,
        verbose: Boolean(options.verbose),
      });
      consola.info(`${chalk.bold(summary.runId)} → ${summary.rows} rows, exit code ${summary.exitCode}`);
      process.exitCode = summary.exitCode;
    } catch (error) {
      consola.error(error);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  consola.error(error);
  process.exitCode = 1;
});
