import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import type { Sleep } from './polling.js';
import type { Scenarios } from './scenarios.js';
import type { CaseResult, TapReporter } from './tapReporter.js';

export class AssertionFailure extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'AssertionFailure';
  }
}

function assertThat(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new AssertionFailure(message);
  }
}

export interface CaseContext {
  readonly scenarios: Scenarios;
  readonly sleep: Sleep;
  readonly listSettleMs: number;
}

export interface BatCase {
  readonly name: string;
  readonly description: string;
  run(context: CaseContext): Promise<void>;
}

export const BAT_CASES: readonly BatCase[] = [
  {
    name: 'get_tenants',
    description: 'Get all tenants',
    async run({ scenarios }) {
      assertThat(await scenarios.tenantsListed(), 'no tenants listed');
    }
  },
  {
    name: 'cluster_status',
    description: 'Confirm that the cluster is ready',
    async run({ scenarios }) {
      assertThat(await scenarios.clusterReady(), 'cluster is not ready');
    }
  },
  {
    name: 'get_workloads',
    description: 'Get all available workloads',
    async run({ scenarios }) {
      assertThat(await scenarios.workloadsListed(), 'no workloads listed');
    }
  },
  {
    name: 'start_all_workloads',
    description: 'Start one instance of all workloads',
    async run({ scenarios }) {
      assertThat(await scenarios.launchAllWorkloads(1), 'not every workload could be launched');
    }
  },
  {
    name: 'get_cncis',
    description: 'Start a random workload, then get CNCI information',
    async run({ scenarios }) {
      assertThat(await scenarios.launchRandomWorkload(1), 'random workload did not launch');
      assertThat(await scenarios.cncisListed(), 'no CNCIs listed');
    }
  },
  {
    name: 'get_instances',
    description: "Start a random workload, then make sure it's listed",
    async run({ scenarios, sleep, listSettleMs }) {
      assertThat(await scenarios.launchRandomWorkload(1), 'random workload did not launch');
      await sleep(listSettleMs);
      const count = await scenarios.instanceCount();
      assertThat(count === 1, `expected exactly 1 instance, found ${count === null ? 'none (listing failed)' : String(count)}`);
    }
  },
  {
    name: 'delete_all_instances',
    description: 'Start a random workload, then delete it',
    async run({ scenarios }) {
      assertThat(await scenarios.launchRandomWorkload(1), 'random workload did not launch');
      assertThat(await scenarios.deleteAllInstances(), 'instances were not deleted');
      assertThat((await scenarios.instanceCount()) === 0, 'instance list is not empty after delete');
    }
  }
];

/**
 * Cases named in `only`, kept in suite order. Empty `only` selects everything.
 */
export function selectCases(cases: readonly BatCase[], only: readonly string[]): BatCase[] {
  const known = new Set(cases.map(batCase => batCase.name));
  const unknown = only.filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown test case: ${unknown.join(', ')}`);
  }
  if (only.length === 0) {
    return [...cases];
  }
  const wanted = new Set(only);
  return cases.filter(batCase => wanted.has(batCase.name));
}

export interface SuiteContext {
  readonly scenarios: Scenarios;
  readonly reporter: TapReporter;
  readonly sleep: Sleep;
  readonly teardownSettleMs: number;
  readonly listSettleMs: number;
}

export interface SuiteSummary {
  readonly passed: number;
  readonly failed: number;
  readonly results: readonly CaseResult[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run cases one after another. Teardown (delete everything, then settle)
 * follows every case whatever its outcome and cannot change that outcome.
 */
export async function runSuite(cases: readonly BatCase[], context: SuiteContext): Promise<SuiteSummary> {
  const results: CaseResult[] = [];

  for (const batCase of cases) {
    const diagnostics: string[] = [];
    const scenarios = context.scenarios.withDiagnostics(text => diagnostics.push(text));
    let passed = false;

    logger.info({ case: batCase.name }, 'Starting case');
    try {
      await batCase.run({ scenarios, sleep: context.sleep, listSettleMs: context.listSettleMs });
      passed = true;
    } catch (error) {
      diagnostics.push(describeError(error));
      logger.warn({ case: batCase.name, error: describeError(error) }, 'Case failed');
    } finally {
      try {
        const cleaned = await context.scenarios.deleteAllInstances();
        if (!cleaned) {
          logger.warn({ case: batCase.name }, 'Teardown could not confirm all instances deleted');
        }
      } catch (error) {
        logger.error({ case: batCase.name, error: describeError(error) }, 'Teardown failed');
      }
      await context.sleep(context.teardownSettleMs);
    }

    const result: CaseResult = {
      name: batCase.name,
      description: batCase.description,
      passed,
      diagnostics
    };
    results.push(result);
    context.reporter.record(result);
    logger.info({ case: batCase.name, passed }, 'Finished case');
  }

  const passedCount = results.filter(result => result.passed).length;
  return { passed: passedCount, failed: results.length - passedCount, results };
}
