import type { CommandRunner } from './commandRunner.js';
import type { Credentials } from './credentials.js';
import {
  type Cnci,
  type Instance,
  type NodeStatusSummary,
  type Tenant,
  type Workload,
  isDeleteAcknowledged,
  parseCncis,
  parseCreatedInstances,
  parseInstances,
  parseNodeStatus,
  parseTenants,
  parseWorkloads
} from './responseParsers.js';

export interface CiaoCliOptions {
  readonly runner: CommandRunner;
  readonly user: Credentials;
  readonly admin: Credentials;
  readonly cliPath: string;
  readonly commandTimeoutMs: number;
}

/**
 * ciao-cli, one method per command the acceptance tests use.
 *
 * Methods throw TimeoutError, CommandError or ParseError; callers decide
 * whether that is a failure or an answer.
 */
export class CiaoCli {
  public constructor(private readonly options: CiaoCliOptions) {}

  private async exec(args: readonly string[], credentials: Credentials): Promise<string[]> {
    return this.options.runner.run(
      [this.options.cliPath, ...args],
      credentials,
      this.options.commandTimeoutMs
    );
  }

  public async listWorkloads(): Promise<Workload[]> {
    return parseWorkloads(await this.exec(['workload', 'list'], this.options.user));
  }

  public async listTenants(): Promise<Tenant[]> {
    return parseTenants(await this.exec(['tenant', 'list', '-all'], this.options.admin));
  }

  public async listInstances(): Promise<Instance[]> {
    return parseInstances(await this.exec(['instance', 'list', '-detail'], this.options.user));
  }

  public async getInstance(uuid: string): Promise<Instance | undefined> {
    const instances = await this.listInstances();
    return instances.find(instance => instance.uuid === uuid);
  }

  public async listCncis(): Promise<Cnci[]> {
    return parseCncis(await this.exec(['node', 'list', '-cnci'], this.options.admin));
  }

  public async nodeStatus(): Promise<NodeStatusSummary> {
    return parseNodeStatus(await this.exec(['node', 'status'], this.options.admin));
  }

  /**
   * Returns the uuids ciao-cli reports as created, in output order.
   */
  public async addInstances(workloadUuid: string, count: number): Promise<string[]> {
    const lines = await this.exec(
      ['instance', 'add', '-workload', workloadUuid, '-instances', String(count)],
      this.options.user
    );
    return parseCreatedInstances(lines);
  }

  /**
   * True when the controller acknowledged the request; deletion itself is asynchronous.
   */
  public async deleteAllInstances(): Promise<boolean> {
    return isDeleteAcknowledged(await this.exec(['instance', 'delete', '-all'], this.options.user));
  }
}
