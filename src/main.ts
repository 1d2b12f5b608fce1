#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, CommanderError } from 'commander';
import { BAT_CASES, runSuite, selectCases } from './batSuite.js';
import { CiaoCli } from './ciaoCli.js';
import { type CommandRunner, ProcessCommandRunner } from './commandRunner.js';
import { DEFAULT_RUN_OPTIONS, type RunOptions, buildHarnessConfig, checkEnvironment } from './config.js';
import { type BaseEnvironment, buildAdminCredentials, buildUserCredentials } from './credentials.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { type Sleep, sleep as realSleep } from './polling.js';
import { Scenarios } from './scenarios.js';
import { TapReporter } from './tapReporter.js';

/**
 * 0: every case passed. 1: at least one case failed. 2: configuration error, nothing ran.
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Seams for running the harness without a cluster.
 */
export interface MainDependencies {
  readonly env?: BaseEnvironment;
  readonly runner?: CommandRunner;
  readonly sleep?: Sleep;
  readonly random?: () => number;
}

async function runBat(options: RunOptions, deps: MainDependencies): Promise<ExitCode> {
  const env = deps.env ?? process.env;
  checkEnvironment(env);

  const config = buildHarnessConfig(options);
  const cases = selectCases(BAT_CASES, config.only);
  const sleep = deps.sleep ?? realSleep;

  const cli = new CiaoCli({
    runner: deps.runner ?? new ProcessCommandRunner(),
    user: buildUserCredentials(env),
    admin: buildAdminCredentials(env),
    cliPath: config.cliPath,
    commandTimeoutMs: config.commandTimeoutMs
  });

  const scenarios = new Scenarios({
    cli,
    pollAttempts: config.pollAttempts,
    pollIntervalMs: config.pollIntervalMs,
    sleep,
    random: deps.random
  });

  const reporter = new TapReporter(cases.length);

  logger.info(
    { cases: cases.length, commandTimeoutMs: config.commandTimeoutMs, pollAttempts: config.pollAttempts },
    'Starting basic acceptance tests'
  );

  const summary = await runSuite(cases, {
    scenarios,
    reporter,
    sleep,
    teardownSettleMs: config.teardownSettleMs,
    listSettleMs: config.listSettleMs
  });

  await reporter.writeTo(config.reportPath);

  // eslint-disable-next-line no-console
  console.log(`${String(summary.passed)} passed, ${String(summary.failed)} failed (report: ${config.reportPath})`);
  logger.info({ passed: summary.passed, failed: summary.failed, report: config.reportPath }, 'Run summary');

  return summary.failed > 0 ? 1 : 0;
}

function runList(): void {
  for (const batCase of BAT_CASES) {
    // eslint-disable-next-line no-console
    console.log(`${batCase.name}\t${batCase.description}`);
  }
}

/**
 * Commander-based CLI entrypoint.
 */
export async function main(argv: string[], deps: MainDependencies = {}): Promise<ExitCode> {
  let exitCode: ExitCode = 0;
  const program = new Command();

  program
    .name('ciao-bat')
    .description('Basic acceptance tests for a ciao cluster, driven through ciao-cli')
    .version('0.1.0')
    .exitOverride();

  program
    .command('run', { isDefault: true })
    .description('Run the acceptance cases and write a TAP report')
    .option('--command-timeout <seconds>', 'seconds to wait for a ciao-cli command', String(DEFAULT_RUN_OPTIONS.commandTimeout))
    .option('--cluster-timeout <attempts>', 'attempts to wait for the cluster to reach a state', String(DEFAULT_RUN_OPTIONS.clusterTimeout))
    .option('--poll-interval <seconds>', 'seconds between cluster state checks', String(DEFAULT_RUN_OPTIONS.pollInterval))
    .option('--teardown-settle <seconds>', 'seconds to wait after each case teardown', String(DEFAULT_RUN_OPTIONS.teardownSettle))
    .option('--list-settle <seconds>', 'seconds to wait before counting instances', String(DEFAULT_RUN_OPTIONS.listSettle))
    .option('--cli <path>', 'ciao-cli binary', DEFAULT_RUN_OPTIONS.cli)
    .option('--report <path>', 'TAP report file', DEFAULT_RUN_OPTIONS.report)
    .option('--only <names...>', 'run only the named cases')
    .action(async (options: RunOptions) => {
      exitCode = await runBat(options, deps);
    });

  program
    .command('list')
    .description('Print the acceptance cases, one per line')
    .action(() => {
      runList();
    });

  try {
    await program.parseAsync(['node', 'ciao-bat', ...argv]);
  } catch (error) {
    if (error instanceof ConfigError) {
      // eslint-disable-next-line no-console
      console.error(`ERROR: ${error.message}`);
      return 2;
    }
    // Commander has already printed the usage error; help and version exit 0.
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  return exitCode;
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error }, 'Harness crashed');
      process.exitCode = 1;
    }
  );
}
