/**
 * s3pi <package-directory>: publish distributions and the simple index.
 *
 * Stages run in order and the first failure ends the run:
 *   config  load and validate the configuration files
 *   scan    find distribution files in the package directory
 *   index   build the package pages and the root page
 *   sync    upload changed objects (or plan them when upload is off)
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import {
  buildIndex,
  buildRemoteObjects,
  createLogger,
  IndexSynchronizer,
  isS3piError,
  loadConfig,
  S3ObjectStore,
  scanArtifacts,
  writeIndexToDirectory,
} from '@s3pi/index-sync';
import type {
  IndexConfig,
  ObjectStore,
  ObjectSyncResult,
  Sleep,
  SyncReport,
} from '@s3pi/index-sync';

export type PublishStage = 'config' | 'scan' | 'index' | 'sync';

/** Options as given on the command line */
export interface PublishOptions {
  /** Directory containing the distributions to publish */
  packageDirectory: string;
  /** Configuration file (default: ~/.s3pi/config) */
  config?: string;
  /** Overrides the upload setting of the configuration */
  upload?: boolean;
  /** Overrides the region setting of the configuration */
  region?: string;
  /** Also write the generated pages under this directory */
  output?: string;
  verbose?: boolean;
  /** Aborts the sync stage */
  signal?: AbortSignal;
}

/** Collaborators that tests (or embedding programs) may replace */
export interface PublishDeps {
  logger?: Logger;
  createStore?: (config: IndexConfig, logger: Logger) => ObjectStore;
  /** System-wide configuration file (default: /etc/s3pi/config) */
  systemConfigPath?: string;
  sleep?: Sleep;
}

export interface PublishResult {
  exitCode: number;
  /** Stage that failed, when exitCode is non-zero */
  failedStage?: PublishStage;
  report?: SyncReport;
}

function describeResult(result: ObjectSyncResult, dryRun: boolean): string {
  const verb = result.action === 'create' ? 'create' : 'update';
  const marker = result.action === 'create' ? chalk.green('+') : chalk.yellow('~');
  return dryRun
    ? `  ${marker} would ${verb} ${result.key}`
    : `  ${marker} ${verb}d ${result.key}`;
}

function printReport(report: SyncReport): void {
  const location = `s3://${report.bucket}/${report.prefix}`;

  if (report.dryRun) {
    console.log(chalk.yellow(`DRY RUN - nothing was uploaded to ${location}`));
  }

  for (const result of report.results) {
    if (result.action !== 'skip') {
      console.log(describeResult(result, report.dryRun));
    }
  }

  const summary = `${report.created} created, ${report.updated} updated, ${report.skipped} unchanged`;
  if (report.dryRun) {
    console.log(chalk.dim(`Plan: ${summary}`));
  } else {
    console.log(chalk.green(`✓ Published ${location} (${summary})`));
  }
}

/**
 * Run the publish pipeline.
 *
 * Never throws for pipeline failures: they are printed with the stage that
 * failed and reported through the exit code.
 */
export async function runPublish(
  options: PublishOptions,
  deps: PublishDeps = {}
): Promise<PublishResult> {
  const logger = deps.logger ?? createLogger({ level: options.verbose ? 'debug' : 'info' });
  let stage: PublishStage = 'config';

  try {
    const config = loadConfig({
      configPath: options.config,
      systemPath: deps.systemConfigPath,
      overrides: {
        ...(options.upload !== undefined ? { upload: options.upload } : {}),
        ...(options.region !== undefined ? { region: options.region } : {}),
      },
    });

    stage = 'scan';
    const artifacts = await scanArtifacts(options.packageDirectory, logger);
    console.log(chalk.blue(`Found ${artifacts.length} distribution file(s) in ${options.packageDirectory}`));

    stage = 'index';
    const index = buildIndex(artifacts);
    const objects = buildRemoteObjects(config, index);
    if (options.output) {
      const written = await writeIndexToDirectory(objects, options.output);
      console.log(chalk.dim(`Wrote ${written.length} index page(s) to ${options.output}`));
    }

    stage = 'sync';
    const store = deps.createStore
      ? deps.createStore(config, logger)
      : new S3ObjectStore({ region: config.region }, logger);
    const synchronizer = new IndexSynchronizer(config, store, logger, {
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    });
    const report = await synchronizer.sync(objects, { signal: options.signal });

    printReport(report);
    return { exitCode: 0, report };
  } catch (error) {
    if (isS3piError(error)) {
      console.error(chalk.red(`Error [${stage}]: ${error.message}`));
      logger.debug({ err: error, stage, code: error.code }, 'Publish failed');
    } else {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Error [${stage}]: Unexpected error: ${message}`));
      logger.error({ err: error, stage }, 'Unexpected failure');
    }
    return { exitCode: 1, failedStage: stage };
  }
}

export function registerPublishCommand(program: Command): void {
  program
    .argument('<package-directory>', 'Directory containing the packages to be uploaded')
    .option('-c, --config <path>', 'Configuration file to use (default: ~/.s3pi/config)')
    .option('--upload', 'Upload even if the configuration sets upload=false')
    .option('--no-upload', 'Only report what would be uploaded')
    .option('--region <region>', 'AWS region of the bucket (overrides s3.region)')
    .option('-o, --output <dir>', 'Also write the generated index pages to a local directory')
    .option('-v, --verbose', 'Log debug output')
    .action(
      async (
        packageDirectory: string,
        options: { config?: string; upload?: boolean; region?: string; output?: string; verbose?: boolean }
      ) => {
        const controller = new AbortController();
        const onSignal = (): void => {
          console.error(chalk.yellow('\nInterrupted, finishing in-flight uploads...'));
          controller.abort();
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);

        try {
          const result = await runPublish({
            packageDirectory,
            ...options,
            signal: controller.signal,
          });
          if (result.exitCode !== 0) {
            process.exit(result.exitCode);
          }
        } finally {
          process.off('SIGINT', onSignal);
          process.off('SIGTERM', onSignal);
        }
      }
    );
}
