import { type Mock, beforeEach, describe, expect, it, vi } from 'vitest';
import { CiaoCli } from './ciaoCli.js';
import { buildAdminCredentials, buildUserCredentials } from './credentials.js';
import { CommandError, TimeoutError } from './errors.js';
import {
  type CommandHandler,
  FakeCluster,
  FakeCommandRunner,
  makeInstance,
  makeWorkload,
  renderInstances,
  renderWorkloads
} from './fakeCluster.js';
import { logger } from './logger.js';
import { Scenarios } from './scenarios.js';

const env = {
  CIAO_USERNAME: 'csr',
  CIAO_PASSWORD: 'test-secret',
  CIAO_ADMIN_USERNAME: 'admin',
  CIAO_ADMIN_PASSWORD: 'test-secret'
};

interface Harness {
  readonly runner: FakeCommandRunner;
  readonly scenarios: Scenarios;
  readonly diagnostics: string[];
  readonly sleep: Mock<(ms: number) => Promise<void>>;
}

function makeHarness(handler: CommandHandler, random = () => 0): Harness {
  const runner = new FakeCommandRunner(handler);
  const diagnostics: string[] = [];
  const sleep = vi.fn(async (_ms: number) => Promise.resolve());
  const cli = new CiaoCli({
    runner,
    user: buildUserCredentials(env),
    admin: buildAdminCredentials(env),
    cliPath: 'ciao-cli',
    commandTimeoutMs: 1000
  });
  const scenarios = new Scenarios({
    cli,
    pollAttempts: 3,
    pollIntervalMs: 1000,
    sleep,
    random,
    onDiagnostic: text => diagnostics.push(text)
  });
  return { runner, scenarios, diagnostics, sleep };
}

const WORKLOADS = [makeWorkload('A', 'wl-a'), makeWorkload('B', 'wl-b'), makeWorkload('C', 'wl-c')];

describe('Scenarios.launchWorkload', () => {
  it('waits for every created instance to become active', async () => {
    const listings = [
      renderInstances([makeInstance('i-1', 'pending'), makeInstance('i-2', 'pending')]),
      renderInstances([makeInstance('i-1', 'active'), makeInstance('i-2', 'pending')]),
      renderInstances([makeInstance('i-1', 'active'), makeInstance('i-2', 'active')])
    ];
    const { runner, scenarios, sleep } = makeHarness(args => {
      if (args[2] === 'add') {
        return ['Created new instance: i-1', 'Created new instance: i-2'];
      }
      return listings.shift() ?? [];
    });

    expect(await scenarios.launchWorkload('wl-a', 2)).toBe(true);
    expect(runner.commands()).toEqual([
      'instance add -workload wl-a -instances 2',
      'instance list -detail',
      'instance list -detail',
      'instance list -detail'
    ]);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('gives up on the first instance that never becomes active', async () => {
    const { runner, scenarios, diagnostics } = makeHarness(args => {
      if (args[2] === 'add') {
        return ['Created new instance: i-1', 'Created new instance: i-2'];
      }
      return renderInstances([makeInstance('i-1', 'pending'), makeInstance('i-2', 'active')]);
    });

    expect(await scenarios.launchWorkload('wl-a', 2)).toBe(false);
    expect(runner.commands().filter(command => command === 'instance list -detail')).toHaveLength(3);
    expect(diagnostics).toEqual(['instance i-1 not active after 3 attempts']);
  });

  it('treats an instance missing from the listing as not active', async () => {
    const { scenarios } = makeHarness(args => (args[2] === 'add' ? ['Created new instance: i-9'] : []));

    expect(await scenarios.launchWorkload('wl-a')).toBe(false);
  });

  it('collapses a failed create into false with the captured output', async () => {
    const { scenarios, diagnostics } = makeHarness(args => {
      throw new CommandError(args, 1, 'workload not found');
    });

    expect(await scenarios.launchWorkload('wl-x')).toBe(false);
    expect(diagnostics).toEqual([
      'launch workload: Command failed (exit 1): ciao-cli instance add -workload wl-x -instances 1\nworkload not found'
    ]);
  });
});

describe('Scenarios.launchAllWorkloads', () => {
  it('stops at the first workload that fails to launch', async () => {
    const { runner, scenarios } = makeHarness(args => {
      if (args[1] === 'workload') {
        return renderWorkloads(WORKLOADS);
      }
      if (args[2] === 'add') {
        if (args[4] === 'wl-b') {
          throw new CommandError(args, 1, 'no capacity');
        }
        return [`Created new instance: ${args[4] ?? ''}-instance`];
      }
      return renderInstances([makeInstance('wl-a-instance', 'active')]);
    });

    expect(await scenarios.launchAllWorkloads()).toBe(false);

    const adds = runner.commands().filter(command => command.startsWith('instance add'));
    expect(adds).toEqual(['instance add -workload wl-a -instances 1', 'instance add -workload wl-b -instances 1']);
  });

  it('launches each workload when all succeed', async () => {
    const cluster = new FakeCluster(WORKLOADS);
    const { scenarios } = makeHarness(args => cluster.handle(args));

    expect(await scenarios.launchAllWorkloads(1)).toBe(true);
    expect(cluster.instances.map(instance => instance.uuid)).toEqual(['instance-1', 'instance-2', 'instance-3']);
  });

  it('fails fast when there are no workloads', async () => {
    const { runner, scenarios, diagnostics } = makeHarness(() => []);

    expect(await scenarios.launchAllWorkloads()).toBe(false);
    expect(runner.commands()).toEqual(['workload list']);
    expect(diagnostics).toEqual(['no workloads available']);
  });
});

describe('Scenarios.launchRandomWorkload', () => {
  it('launches the workload the random source points at', async () => {
    const cluster = new FakeCluster(WORKLOADS);
    const { runner, scenarios } = makeHarness(args => cluster.handle(args), () => 0.5);

    expect(await scenarios.launchRandomWorkload()).toBe(true);
    expect(runner.commands()).toContain('instance add -workload wl-b -instances 1');
  });

  it('clamps a random source that returns 1', async () => {
    const cluster = new FakeCluster(WORKLOADS);
    const { runner, scenarios } = makeHarness(args => cluster.handle(args), () => 1);

    expect(await scenarios.launchRandomWorkload()).toBe(true);
    expect(runner.commands()).toContain('instance add -workload wl-c -instances 1');
  });

  it('fails fast when the workload listing fails', async () => {
    const { runner, scenarios } = makeHarness(args => {
      throw new TimeoutError(args, 1000, '');
    });

    expect(await scenarios.launchRandomWorkload()).toBe(false);
    expect(runner.commands()).toEqual(['workload list']);
  });
});

describe('Scenarios wait helpers', () => {
  it('collapses a failed listing inside the active poll without retrying it', async () => {
    const { runner, scenarios, diagnostics } = makeHarness(args => {
      throw new CommandError(args, 1, 'controller unavailable');
    });

    expect(await scenarios.waitTillActive('i-1')).toBe(false);
    expect(runner.commands()).toEqual(['instance list -detail']);
    expect(diagnostics).toEqual([
      'wait for active: Command failed (exit 1): ciao-cli instance list -detail\ncontroller unavailable'
    ]);
  });

  it('is true once the instance lists as active', async () => {
    const { scenarios, diagnostics } = makeHarness(() => renderInstances([makeInstance('i-1', 'active')]));

    expect(await scenarios.waitTillActive('i-1')).toBe(true);
    expect(diagnostics).toEqual([]);
  });

  it('collapses a timed-out listing inside the empty poll', async () => {
    const { scenarios, diagnostics } = makeHarness(args => {
      throw new TimeoutError(args, 1000, '');
    });

    expect(await scenarios.waitTillEmpty()).toBe(false);
    expect(diagnostics).toEqual(['wait for empty instance list: Command timed out after 1000ms: ciao-cli instance list -detail']);
  });

  it('reports a listing failure during launch against the wait step', async () => {
    const { scenarios, diagnostics } = makeHarness(args => {
      if (args[2] === 'add') {
        return ['Created new instance: i-1'];
      }
      throw new CommandError(args, 3, '');
    });

    expect(await scenarios.launchWorkload('wl-a')).toBe(false);
    expect(diagnostics).toEqual(['wait for active: Command failed (exit 3): ciao-cli instance list -detail']);
  });
});

describe('Scenarios.deleteAllInstances', () => {
  let listings: string[][];

  beforeEach(() => {
    listings = [renderInstances([makeInstance('i-1', 'active')]), []];
  });

  it('polls until the instance list is empty', async () => {
    const { runner, scenarios, sleep } = makeHarness(args =>
      args[2] === 'delete' ? ['os-delete all instances for tenant tenant-1'] : listings.shift() ?? []
    );

    expect(await scenarios.deleteAllInstances()).toBe(true);
    expect(runner.commands()).toEqual(['instance delete -all', 'instance list -detail', 'instance list -detail']);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('fails without polling when the delete is not acknowledged', async () => {
    const { runner, scenarios, diagnostics } = makeHarness(() => ['Error: no instances']);

    expect(await scenarios.deleteAllInstances()).toBe(false);
    expect(runner.commands()).toEqual(['instance delete -all']);
    expect(diagnostics).toEqual(['delete all instances was not acknowledged']);
  });

  it('fails when instances never drain', async () => {
    const { scenarios, diagnostics } = makeHarness(args =>
      args[2] === 'delete'
        ? ['os-delete all instances for tenant tenant-1']
        : renderInstances([makeInstance('i-1', 'deleting')])
    );

    expect(await scenarios.deleteAllInstances()).toBe(false);
    expect(diagnostics).toEqual(['instances still listed after 3 attempts']);
  });

  it('reports a failed delete once, without polling', async () => {
    const { runner, scenarios, diagnostics } = makeHarness(args => {
      throw new CommandError(args, 1, 'forbidden');
    });

    expect(await scenarios.deleteAllInstances()).toBe(false);
    expect(runner.commands()).toEqual(['instance delete -all']);
    expect(diagnostics).toEqual(['delete all instances: Command failed (exit 1): ciao-cli instance delete -all\nforbidden']);
  });
});

describe('Scenarios queries', () => {
  it('reports a failed tenant listing with its captured output', async () => {
    const { scenarios, diagnostics } = makeHarness(args => {
      throw new CommandError(args, 1, 'unauthorized');
    });

    expect(await scenarios.tenantsListed()).toBe(false);
    expect(diagnostics).toEqual(['list tenants: Command failed (exit 1): ciao-cli tenant list -all\nunauthorized']);
  });

  it('is not ready when the node counts differ as strings', async () => {
    const { scenarios, diagnostics } = makeHarness(() => ['Total Nodes 05', '\tReady 5']);

    expect(await scenarios.clusterReady()).toBe(false);
    expect(diagnostics).toEqual(['cluster not ready: 5 of 05 nodes ready']);
  });

  it('answers the listing queries from the cluster', async () => {
    const cluster = new FakeCluster();
    const { scenarios } = makeHarness(args => cluster.handle(args));

    expect(await scenarios.tenantsListed()).toBe(true);
    expect(await scenarios.clusterReady()).toBe(true);
    expect(await scenarios.workloadsListed()).toBe(true);
    expect(await scenarios.cncisListed()).toBe(true);
    expect(await scenarios.instanceCount()).toBe(0);
  });

  it('returns null for the instance count when listing times out', async () => {
    const { scenarios } = makeHarness(args => {
      throw new TimeoutError(args, 1000, '');
    });

    expect(await scenarios.instanceCount()).toBeNull();
  });

  it('routes diagnostics to the sink given to withDiagnostics', async () => {
    const { scenarios, diagnostics } = makeHarness(() => []);
    const other: string[] = [];

    expect(await scenarios.withDiagnostics(text => other.push(text)).launchRandomWorkload()).toBe(false);
    expect(other).toEqual(['no workloads available']);
    expect(diagnostics).toEqual([]);
  });

  it('logs each collapsed failure', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const { scenarios } = makeHarness(args => {
      throw new CommandError(args, 2, '');
    });

    try {
      await scenarios.cncisListed();

      expect(warn).toHaveBeenCalledWith(
        { action: 'list cncis', kind: 'command', error: 'Command failed (exit 2): ciao-cli node list -cnci' },
        'Scenario step failed'
      );
    } finally {
      warn.mockRestore();
    }
  });

  it('lets unexpected errors through', async () => {
    const { scenarios } = makeHarness(() => {
      throw new RangeError('bug');
    });

    await expect(scenarios.tenantsListed()).rejects.toThrow(RangeError);
  });
});
