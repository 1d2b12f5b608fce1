import type { CiaoCli } from './ciaoCli.js';
import { isBatError } from './errors.js';
import { logger } from './logger.js';
import { type Sleep, pollUntil } from './polling.js';
import { type Workload, isClusterReady } from './responseParsers.js';

export type DiagnosticSink = (text: string) => void;

export interface ScenarioOptions {
  readonly cli: CiaoCli;
  readonly pollAttempts: number;
  readonly pollIntervalMs: number;
  readonly sleep?: Sleep;
  readonly random?: () => number;
  readonly onDiagnostic?: DiagnosticSink;
}

/**
 * Cluster-level actions the acceptance cases assert on.
 *
 * Every public method answers with a value rather than throwing for
 * command, timeout or parse failures: the failure is logged and its
 * diagnostic text goes to `onDiagnostic`.
 */
export class Scenarios {
  public constructor(private readonly options: ScenarioOptions) {}

  /**
   * Same settings, diagnostics routed to `sink`.
   */
  public withDiagnostics(sink: DiagnosticSink): Scenarios {
    return new Scenarios({ ...this.options, onDiagnostic: sink });
  }

  private report(text: string): void {
    this.options.onDiagnostic?.(text);
  }

  private async attempt<T>(action: string, fallback: T, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      if (!isBatError(error)) {
        throw error;
      }
      logger.warn({ action, kind: error.kind, error: error.message }, 'Scenario step failed');
      this.report(`${action}: ${error.diagnostic()}`);
      return fallback;
    }
  }

  private poll(predicate: () => Promise<boolean>): Promise<boolean> {
    return pollUntil(predicate, {
      intervalMs: this.options.pollIntervalMs,
      maxAttempts: this.options.pollAttempts,
      sleep: this.options.sleep
    });
  }

  private async pollActive(uuid: string): Promise<boolean> {
    const active = await this.poll(async () => {
      const instance = await this.options.cli.getInstance(uuid);
      return instance?.status === 'active';
    });
    if (!active) {
      this.report(`instance ${uuid} not active after ${String(this.options.pollAttempts)} attempts`);
    }
    return active;
  }

  private async pollEmpty(): Promise<boolean> {
    const empty = await this.poll(async () => (await this.options.cli.listInstances()).length === 0);
    if (!empty) {
      this.report(`instances still listed after ${String(this.options.pollAttempts)} attempts`);
    }
    return empty;
  }

  public async waitTillActive(uuid: string): Promise<boolean> {
    return this.attempt('wait for active', false, () => this.pollActive(uuid));
  }

  public async waitTillEmpty(): Promise<boolean> {
    return this.attempt('wait for empty instance list', false, () => this.pollEmpty());
  }

  /**
   * Create `count` instances of one workload and wait for each to go active,
   * giving up on the first one that does not.
   */
  public async launchWorkload(workloadUuid: string, count = 1): Promise<boolean> {
    const created = await this.attempt<string[] | null>('launch workload', null, () =>
      this.options.cli.addInstances(workloadUuid, count)
    );
    if (created === null) {
      return false;
    }
    logger.info({ workloadUuid, created }, 'Instances created');

    for (const uuid of created) {
      if (!(await this.waitTillActive(uuid))) {
        return false;
      }
    }
    return true;
  }

  /**
   * Launch every workload in listing order; stops at the first failure.
   */
  public async launchAllWorkloads(countPerWorkload = 1): Promise<boolean> {
    const workloads = await this.attempt<Workload[]>('list workloads', [], () => this.options.cli.listWorkloads());
    if (workloads.length === 0) {
      this.report('no workloads available');
      return false;
    }

    for (const workload of workloads) {
      if (!(await this.launchWorkload(workload.uuid, countPerWorkload))) {
        logger.warn({ workload: workload.name, uuid: workload.uuid }, 'Workload launch failed');
        return false;
      }
    }
    return true;
  }

  public async launchRandomWorkload(count = 1): Promise<boolean> {
    const workloads = await this.attempt<Workload[]>('list workloads', [], () => this.options.cli.listWorkloads());
    if (workloads.length === 0) {
      this.report('no workloads available');
      return false;
    }

    const random = this.options.random ?? Math.random;
    const index = Math.min(Math.floor(random() * workloads.length), workloads.length - 1);
    const workload = workloads[index];
    if (!workload) {
      return false;
    }

    logger.info({ workload: workload.name, uuid: workload.uuid }, 'Launching random workload');
    return this.launchWorkload(workload.uuid, count);
  }

  /**
   * Ask for every instance to be deleted, then wait for the list to drain.
   */
  public async deleteAllInstances(): Promise<boolean> {
    const acknowledged = await this.attempt<boolean | null>('delete all instances', null, () =>
      this.options.cli.deleteAllInstances()
    );
    if (acknowledged === null) {
      return false;
    }
    if (!acknowledged) {
      this.report('delete all instances was not acknowledged');
      return false;
    }
    return this.waitTillEmpty();
  }

  public async tenantsListed(): Promise<boolean> {
    return this.attempt('list tenants', false, async () => (await this.options.cli.listTenants()).length > 0);
  }

  public async clusterReady(): Promise<boolean> {
    return this.attempt('node status', false, async () => {
      const summary = await this.options.cli.nodeStatus();
      if (!isClusterReady(summary)) {
        this.report(`cluster not ready: ${summary.ready} of ${summary.total} nodes ready`);
        return false;
      }
      return true;
    });
  }

  public async workloadsListed(): Promise<boolean> {
    return this.attempt('list workloads', false, async () => (await this.options.cli.listWorkloads()).length > 0);
  }

  public async cncisListed(): Promise<boolean> {
    return this.attempt('list cncis', false, async () => (await this.options.cli.listCncis()).length > 0);
  }

  /**
   * Number of instances listed for the user's tenant, or null if the listing failed.
   */
  public async instanceCount(): Promise<number | null> {
    return this.attempt<number | null>('list instances', null, async () => (await this.options.cli.listInstances()).length);
  }
}
