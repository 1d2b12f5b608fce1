import type { CommandRunner } from './commandRunner.js';
import type { CredentialRole, Credentials } from './credentials.js';
import { CommandError } from './errors.js';
import type { Instance, Workload } from './responseParsers.js';

export interface RecordedCall {
  readonly args: readonly string[];
  readonly role: CredentialRole;
  readonly timeoutMs: number;
}

export type CommandHandler = (args: readonly string[], credentials: Credentials) => string[];

/**
 * In-process CommandRunner for tests. Records every call; the handler
 * returns the stdout lines or throws a BatError.
 */
export class FakeCommandRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = [];

  public constructor(private readonly handler: CommandHandler) {}

  public async run(args: readonly string[], credentials: Credentials, timeoutMs: number): Promise<string[]> {
    this.calls.push({ args: [...args], role: credentials.role, timeoutMs });
    return Promise.resolve(this.handler(args, credentials));
  }

  /**
   * Calls without the binary, e.g. `instance list -detail`.
   */
  public commands(): string[] {
    return this.calls.map(call => call.args.slice(1).join(' '));
  }
}

export function renderWorkloads(workloads: readonly Workload[]): string[] {
  return workloads.flatMap((workload, index) => [
    `Workload ${String(index + 1)}`,
    `\tName: ${workload.name}`,
    `\tUUID:${workload.uuid}`,
    `\tImage UUID: ${workload.imageUuid}`,
    `\tCPUs: ${workload.cpus}`,
    `\tMemory: ${workload.memory}`
  ]);
}

export function renderInstances(instances: readonly Instance[]): string[] {
  return instances.flatMap((instance, index) => [
    `Instance #${String(index + 1)}`,
    `\tUUID: ${instance.uuid}`,
    `\tStatus: ${instance.status}`,
    `\tPrivate IP: ${instance.ip}`,
    `\tMAC Address: ${instance.mac}`,
    `\tCN UUID: ${instance.computeNodeUuid}`,
    `\tImage UUID: ${instance.imageUuid}`,
    `\tTenant UUID: ${instance.tenantUuid}`
  ]);
}

export function makeWorkload(name: string, uuid: string): Workload {
  return { name, uuid, imageUuid: `image-${uuid}`, cpus: '2', memory: '256 MB' };
}

export function makeInstance(uuid: string, status: string): Instance {
  return {
    uuid,
    status,
    ip: '172.16.0.2',
    mac: '02:00:ac:10:00:02',
    computeNodeUuid: 'cn-1',
    imageUuid: 'image-1',
    tenantUuid: 'tenant-1'
  };
}

/**
 * A small cluster that answers ciao-cli commands from in-memory state.
 * New instances are active as soon as they are created.
 */
export class FakeCluster {
  public readonly instances: Instance[] = [];
  private created = 0;

  public constructor(
    public readonly workloads: readonly Workload[] = [
      makeWorkload('Fedora Cloud', 'workload-1'),
      makeWorkload('Ubuntu Cloud', 'workload-2')
    ]
  ) {}

  public runner(): FakeCommandRunner {
    return new FakeCommandRunner(args => this.handle(args));
  }

  public handle(args: readonly string[]): string[] {
    const command = args.slice(1).join(' ');

    switch (command) {
      case 'workload list':
        return renderWorkloads(this.workloads);
      case 'tenant list -all':
        return ['Tenant [1]', '\tUUID: tenant-1', '\tName: demo'];
      case 'node status':
        return ['Total Nodes 2', '\tReady 2', '\tFull 0', '\tOffline 0', '\tMaintenance 0'];
      case 'node list -cnci':
        return ['CNCI 1', '\tCNCI UUID: cnci-1', '\tTenant UUID: tenant-1', '\tIPv4: 192.168.0.10', '\tSubnets:'];
      case 'instance list -detail':
        return renderInstances(this.instances);
      case 'instance delete -all':
        this.instances.length = 0;
        return ['os-delete all instances for tenant tenant-1'];
      default:
        break;
    }

    if (args[1] === 'instance' && args[2] === 'add') {
      const count = Number(args[6] ?? '1');
      const lines: string[] = [];
      for (let i = 0; i < count; i += 1) {
        this.created += 1;
        const uuid = `instance-${String(this.created)}`;
        this.instances.push(makeInstance(uuid, 'active'));
        lines.push(`Created new instance: ${uuid}`);
      }
      return lines;
    }

    throw new CommandError(args, 1, `unknown command: ${command}`);
  }
}
