import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { BaseEnvironment } from './credentials.js';

const REQUIRED_ENV_VARS = [
  'CIAO_IDENTITY',
  'CIAO_CONTROLLER',
  'CIAO_USERNAME',
  'CIAO_PASSWORD',
  'CIAO_ADMIN_USERNAME',
  'CIAO_ADMIN_PASSWORD'
] as const;

/**
 * Knobs for one harness run. Built once in main and passed down; never mutated.
 */
export interface HarnessConfig {
  readonly cliPath: string;
  readonly commandTimeoutMs: number;
  readonly pollAttempts: number;
  readonly pollIntervalMs: number;
  readonly teardownSettleMs: number;
  readonly listSettleMs: number;
  readonly reportPath: string;
  readonly only: readonly string[];
}

/**
 * Raw values as commander hands them over (strings from argv, or defaults).
 */
export interface RunOptions {
  readonly commandTimeout?: string | number;
  readonly clusterTimeout?: string | number;
  readonly pollInterval?: string | number;
  readonly teardownSettle?: string | number;
  readonly listSettle?: string | number;
  readonly cli?: string;
  readonly report?: string;
  readonly only?: readonly string[];
}

export const DEFAULT_RUN_OPTIONS = {
  commandTimeout: 300,
  clusterTimeout: 60,
  pollInterval: 1,
  teardownSettle: 2,
  listSettle: 5,
  cli: 'ciao-cli',
  report: './report.tap'
} as const;

const optionsSchema = z.object({
  commandTimeout: z.coerce.number().int().positive().default(DEFAULT_RUN_OPTIONS.commandTimeout),
  clusterTimeout: z.coerce.number().int().positive().default(DEFAULT_RUN_OPTIONS.clusterTimeout),
  pollInterval: z.coerce.number().nonnegative().default(DEFAULT_RUN_OPTIONS.pollInterval),
  teardownSettle: z.coerce.number().nonnegative().default(DEFAULT_RUN_OPTIONS.teardownSettle),
  listSettle: z.coerce.number().nonnegative().default(DEFAULT_RUN_OPTIONS.listSettle),
  cli: z.string().min(1).default(DEFAULT_RUN_OPTIONS.cli),
  report: z.string().min(1).default(DEFAULT_RUN_OPTIONS.report),
  only: z.array(z.string().min(1)).default([])
});

/**
 * Fail on the first required variable that is absent, naming it.
 */
export function checkEnvironment(env: BaseEnvironment): void {
  for (const name of REQUIRED_ENV_VARS) {
    if (env[name] === undefined) {
      throw new ConfigError(`env var ${name} not set`);
    }
  }
}

export function buildHarnessConfig(options: RunOptions): HarnessConfig {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') ?? 'options';
    throw new ConfigError(`Invalid option ${where}: ${issue?.message ?? 'invalid value'}`, {
      cause: parsed.error
    });
  }

  const value = parsed.data;
  return {
    cliPath: value.cli,
    commandTimeoutMs: value.commandTimeout * 1000,
    pollAttempts: value.clusterTimeout,
    pollIntervalMs: value.pollInterval * 1000,
    teardownSettleMs: value.teardownSettle * 1000,
    listSettleMs: value.listSettle * 1000,
    reportPath: value.report,
    only: value.only
  };
}
