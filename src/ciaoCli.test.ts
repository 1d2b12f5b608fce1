import { describe, expect, it } from 'vitest';
import { CiaoCli } from './ciaoCli.js';
import { buildAdminCredentials, buildUserCredentials } from './credentials.js';
import { ParseError } from './errors.js';
import { FakeCluster, FakeCommandRunner, makeInstance, renderInstances } from './fakeCluster.js';
import type { CommandRunner } from './commandRunner.js';

const env = {
  CIAO_USERNAME: 'csr',
  CIAO_PASSWORD: 'test-secret',
  CIAO_ADMIN_USERNAME: 'admin',
  CIAO_ADMIN_PASSWORD: 'admin-secret'
};

function makeCli(runner: CommandRunner): CiaoCli {
  return new CiaoCli({
    runner,
    user: buildUserCredentials(env),
    admin: buildAdminCredentials(env),
    cliPath: '/usr/local/bin/ciao-cli',
    commandTimeoutMs: 30_000
  });
}

describe('CiaoCli', () => {
  it('creates instances as the user and returns their uuids', async () => {
    const cluster = new FakeCluster();
    const runner = cluster.runner();

    const created = await makeCli(runner).addInstances('workload-1', 2);

    expect(created).toEqual(['instance-1', 'instance-2']);
    expect(runner.calls).toEqual([
      {
        args: ['/usr/local/bin/ciao-cli', 'instance', 'add', '-workload', 'workload-1', '-instances', '2'],
        role: 'user',
        timeoutMs: 30_000
      }
    ]);
  });

  it('lists tenants, CNCIs and node status with admin credentials', async () => {
    const runner = new FakeCluster().runner();
    const cli = makeCli(runner);

    await cli.listTenants();
    await cli.listCncis();
    await cli.nodeStatus();

    expect(runner.calls.map(call => call.role)).toEqual(['admin', 'admin', 'admin']);
    expect(runner.commands()).toEqual(['tenant list -all', 'node list -cnci', 'node status']);
  });

  it('lists workloads and instances with user credentials', async () => {
    const runner = new FakeCluster().runner();
    const cli = makeCli(runner);

    const workloads = await cli.listWorkloads();
    await cli.listInstances();

    expect(workloads.map(workload => workload.uuid)).toEqual(['workload-1', 'workload-2']);
    expect(runner.calls.map(call => call.role)).toEqual(['user', 'user']);
    expect(runner.commands()).toEqual(['workload list', 'instance list -detail']);
  });

  it('finds a single instance by uuid', async () => {
    const runner = new FakeCommandRunner(() =>
      renderInstances([makeInstance('i-1', 'pending'), makeInstance('i-2', 'active')])
    );
    const cli = makeCli(runner);

    expect((await cli.getInstance('i-2'))?.status).toBe('active');
    expect(await cli.getInstance('i-3')).toBeUndefined();
  });

  it('reports whether delete all was acknowledged', async () => {
    const acknowledged = makeCli(new FakeCluster().runner());
    const refused = makeCli(new FakeCommandRunner(() => ['nothing to delete']));

    expect(await acknowledged.deleteAllInstances()).toBe(true);
    expect(await refused.deleteAllInstances()).toBe(false);
  });

  it('surfaces malformed output as ParseError', async () => {
    const cli = makeCli(new FakeCommandRunner(() => ['Workload 1', '\tName: broken']));

    await expect(cli.listWorkloads()).rejects.toThrow(ParseError);
  });
});
