import { describe, expect, it } from 'vitest';
import { DeploymentError } from '../lib/errors.js';
import { SINGLE_NODE_ROLES } from '../settings/derive.js';
import { FakeEngine } from '../testing/fake-engine.js';
import { USAGE, runCli, type CliDeps } from './index.js';

function harness(answers: boolean[] = []) {
  const engine = new FakeEngine();
  const out: string[] = [];
  const err: string[] = [];
  const progress: string[] = [];
  const questions: string[] = [];
  let engineLoads = 0;

  const deps: CliDeps = {
    version: '1.2.3',
    out: line => out.push(line),
    err: line => err.push(line),
    progress: chunk => progress.push(chunk),
    confirm: async (question, defaultAnswer) => {
      questions.push(question);
      return answers.shift() ?? defaultAnswer;
    },
    loadConfig: () => ({ workPath: '/srv/clusterdev', engineOptions: {}, baseDir: '/srv' }),
    loadEngine: async () => {
      engineLoads++;
      return engine;
    },
  };

  return {
    engine,
    out,
    err,
    progress,
    questions,
    engineLoads: () => engineLoads,
    run: (...argv: string[]) => runCli(argv, deps),
  };
}

describe('runCli', () => {
  it('prints the usage for --help', async () => {
    const h = harness();
    expect(await h.run('--help')).toBe(0);
    expect(h.out).toEqual([USAGE]);
  });

  it('prints the version', async () => {
    const h = harness();
    expect(await h.run('--version')).toBe(0);
    expect(h.out).toEqual(['1.2.3']);
  });

  it('rejects unknown commands', async () => {
    const h = harness();
    expect(await h.run('frobnicate')).toBe(1);
    expect(h.err).toEqual(['Error: Unknown command: frobnicate. Run with --help for usage information']);
  });

  describe('list', () => {
    it('renders a table with the aggregated status of each deployment', async () => {
      const h = harness();
      h.engine.add('alpha', { admin: 'running', node1: 'stopped' });
      h.engine.add('beta', { admin: 'not deployed' });

      expect(await h.run('list')).toBe(0);
      expect(h.out).toEqual([
        `| Deployments | ${' '.repeat(4)}Status${' '.repeat(5)} | ${' '.repeat(28)}VMs${' '.repeat(29)} |`,
        '-'.repeat(96),
        `| ${'alpha'.padEnd(11)} | partially running | ${'admin, node1'.padEnd(60)} |`,
        `| ${'beta'.padEnd(11)} | ${'not deployed'.padEnd(15)} | ${'admin'.padEnd(60)} |`,
        '',
      ]);
      expect(h.out[0]).toHaveLength(96);
      expect(h.engine.calls).toEqual(['list true']);
    });
  });

  describe('create', () => {
    it('creates and deploys a single-node cluster after confirmation', async () => {
      const h = harness([true]);

      expect(await h.run('create', 'ses6', '--single-node', 'demo')).toBe(0);

      expect(h.questions).toEqual(['Do you want to continue with the deployment?']);
      expect(h.engine.calls).toEqual(['create demo', 'start demo']);
      expect(h.progress).toEqual(['started all\n']);
      expect(h.out).toEqual([
        '=== Creating deployment with the following configuration ===',
        `deployment: demo\nversion: ses6\nroles: [${SINGLE_NODE_ROLES.join(', ')}]`,
        '=== Deployment Finished ===',
        '',
        'You can login into the cluster with:',
        '',
        '  $ clusterdev ssh demo',
        '',
        'Or, access the Ceph Dashboard with:',
        '',
        '  $ clusterdev tunnel demo dashboard',
        '',
      ]);
      expect(h.engine.deployments.get('demo')?.settings).toEqual({
        version: 'ses6',
        roles: [[...SINGLE_NODE_ROLES]],
        numDisks: 3,
        useDeepseaCli: true,
      });
    });

    it('points ses5 deployments at openATTIC', async () => {
      const h = harness([true]);

      expect(await h.run('create', 'ses5', 'old', '--roles', '[admin], [storage, mon]')).toBe(0);

      expect(h.out.slice(-3)).toEqual([
        'Or, access openATTIC with:',
        '',
        '  $ clusterdev tunnel old openattic',
      ]);
      expect(h.engine.deployments.get('old')?.settings.roles).toEqual([
        ['admin', 'openattic'],
        ['storage', 'mon'],
      ]);
    });

    it('destroys the new deployment silently when the operator declines', async () => {
      const h = harness([false]);

      expect(await h.run('create', 'octopus', 'demo')).toBe(0);

      expect(h.engine.calls).toEqual(['create demo', 'destroy demo']);
      expect(h.progress).toEqual([]);
      expect(h.engine.deployments.has('demo')).toBe(false);
    });

    it('only creates the deployment with --no-deploy', async () => {
      const h = harness();

      expect(await h.run('create', 'nautilus', 'demo', '--no-deploy')).toBe(0);

      expect(h.questions).toEqual([]);
      expect(h.engine.calls).toEqual(['create demo']);
    });

    it('passes the deployment tool for ses7', async () => {
      const h = harness();

      await h.run('create', 'ses7', 'demo', '--use-deepsea', '--no-deploy');

      expect(h.engine.deployments.get('demo')?.settings.deploymentTool).toBe('deepsea');
    });

    it('hands octopus deployments to DeepSea', async () => {
      const h = harness();

      await h.run('create', 'octopus', 'demo', '--no-deploy');

      expect(h.engine.deployments.get('demo')?.settings.deploymentTool).toBe('deepsea');
    });

    it('stops on malformed role text before loading the engine', async () => {
      const h = harness();

      expect(await h.run('create', 'ses6', 'demo', '--roles', '[admin, mon')).toBe(1);

      expect(h.err).toEqual(["Error: Unterminated role group [admin, mon in '[admin, mon'"]);
      expect(h.engineLoads()).toBe(0);
      expect(h.engine.calls).toEqual([]);
    });

    it('reports engine failures with a non-zero exit code', async () => {
      const h = harness();
      h.engine.failures.set('create', new DeploymentError('box sle15sp1 is not available'));

      expect(await h.run('create', 'ses6', 'demo')).toBe(1);

      expect(h.err).toEqual(['Error: box sle15sp1 is not available']);
    });
  });

  describe('destroy', () => {
    it('asks for confirmation and aborts when declined', async () => {
      const h = harness([false]);
      h.engine.add('demo', { admin: 'running' });

      expect(await h.run('destroy', 'demo')).toBe(1);

      expect(h.questions).toEqual(['Are you sure you want to destroy the cluster?']);
      expect(h.err).toEqual(['Aborted!']);
      expect(h.engine.calls).toEqual([]);
    });

    it('skips the confirmation with --force', async () => {
      const h = harness();
      h.engine.add('demo', { admin: 'running' });

      expect(await h.run('destroy', '--force', 'demo')).toBe(0);

      expect(h.questions).toEqual([]);
      expect(h.engine.calls).toEqual(['load demo', 'destroy demo']);
      expect(h.progress).toEqual(['destroyed\n']);
    });

    it('surfaces unknown deployments', async () => {
      const h = harness();

      expect(await h.run('destroy', 'nope', '--force')).toBe(1);

      expect(h.err).toEqual(["Error: Deployment 'nope' not found"]);
    });
  });

  it('redeploys with the same settings', async () => {
    const h = harness([true]);
    h.engine.add('demo', { admin: 'running', node1: 'running' }, {
      version: 'ses6',
      roles: [['admin'], ['storage']],
    });

    expect(await h.run('redeploy', 'demo')).toBe(0);

    expect(h.questions).toEqual(['Are you sure you want to redeploy the cluster?']);
    expect(h.engine.calls).toEqual(['load demo', 'destroy demo', 'create demo', 'start demo']);
    expect(h.engine.deployments.get('demo')?.settings.roles).toEqual([['admin'], ['storage']]);
  });

  it('opens an SSH shell on the admin node by default', async () => {
    const h = harness();
    h.engine.add('demo', { admin: 'running', node1: 'running' });

    await h.run('ssh', 'demo');
    await h.run('ssh', 'demo', 'node1');

    expect(h.engine.calls).toEqual(['load demo', 'ssh demo admin', 'load demo', 'ssh demo node1']);
  });

  it('starts and stops single nodes', async () => {
    const h = harness();
    h.engine.add('demo', { admin: 'running', node1: 'running' });

    expect(await h.run('stop', 'demo', 'node1')).toBe(0);
    expect(await h.run('start', 'demo')).toBe(0);

    expect(h.engine.calls).toEqual(['load demo', 'stop demo node1', 'load demo', 'start demo']);
    expect(h.progress).toEqual(['stopped node1\n', 'started all\n']);
  });

  it('reports start failures', async () => {
    const h = harness();
    h.engine.add('demo', { admin: 'stopped' });
    h.engine.failures.set('start', new DeploymentError('vagrant up failed'));

    expect(await h.run('start', 'demo')).toBe(1);

    expect(h.err).toEqual(['Error: vagrant up failed']);
  });

  it('shows deployment info', async () => {
    const h = harness();
    h.engine.add('demo', { admin: 'running' });

    expect(await h.run('info', 'demo')).toBe(0);

    expect(h.out).toEqual(['deployment: demo\nversion: ses6\nroles: (default)']);
  });

  describe('tunnel', () => {
    it('forwards a named service', async () => {
      const h = harness();
      h.engine.add('demo', { admin: 'running' });

      expect(await h.run('tunnel', 'demo', 'dashboard')).toBe(0);

      expect(h.out).toEqual(["Opening tunnel to service 'dashboard'..."]);
      expect(h.engine.calls).toEqual(['load demo', 'tunnel demo dashboard admin - - localhost']);
    });

    it('forwards a raw port', async () => {
      const h = harness();
      h.engine.add('demo', { admin: 'running', node1: 'running' });

      expect(await h.run('tunnel', 'demo', '--remote-port', '8080', '--node', 'node1')).toBe(0);

      expect(h.out).toEqual(['Opening tunnel between remote 8080 port and local 8080 port']);
      expect(h.engine.calls).toEqual(['load demo', 'tunnel demo - node1 8080 - localhost']);
    });

    it('requires a service or a remote port', async () => {
      const h = harness();
      h.engine.add('demo', { admin: 'running' });

      expect(await h.run('tunnel', 'demo')).toBe(1);

      expect(h.err).toEqual(['Error: Either a SERVICE or --remote-port must be given']);
      expect(h.engine.calls).toEqual([]);
    });
  });
});
