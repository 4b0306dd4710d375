import { createDeployment } from '../actions/create.js';
import { listDeployments } from '../actions/list.js';
import {
  destroyDeployment,
  openTunnel,
  redeployDeployment,
  showInfo,
  sshToNode,
  startDeployment,
  stopDeployment,
} from '../actions/manage.js';
import type { CommandContext } from '../actions/types.js';
import { AbortedError, errorMessage } from '../lib/errors.js';
import { configureLogging, createLogger } from '../lib/logger.js';
import { deriveSettings } from '../settings/derive.js';
import type { DeploymentSettings } from '../settings/types.js';
import type { CliConfig, LoadConfigOptions } from './config.js';
import type { DeploymentEngine, ProgressCallback } from './engine-interface.js';
import { parseCommandLine, type Command } from './parse.js';

export { loadConfig } from './config.js';
export { createEngine } from './engine-factory.js';
export type {
  Deployment,
  DeploymentEngine,
  DeploymentNode,
  EngineOptions,
  PortForwardOptions,
  ProgressCallback,
  TunnelService,
} from './engine-interface.js';

const logger = createLogger('cli');

export const USAGE = `
Usage: clusterdev [options] <command> [args]

Options:
  -w, --work-path <dir>     Directory that holds the deployments
  -c, --config-file <file>  Configuration file (default: ~/.clusterdev/config.yaml)
  --debug / --no-debug      Log debug messages
  --log-file <file>         Write the log to this file
  --version                 Show the version
  -h, --help                Show this help message

Commands:
  list                               List all deployments
  create <mode> <id> [options]       Create a cluster; mode is one of
                                     ses5, ses6, ses7, nautilus, octopus
  destroy <id> [--force]             Destroy the VMs and the deployment
  ssh <id> [node]                    Open an SSH shell (default node: admin)
  stop <id> [node]                   Stop the VMs
  start <id> [node]                  Start the VMs, deploying if needed
  info <id>                          Show the deployment configuration
  redeploy <id> [--force]            Destroy and deploy again from scratch
  tunnel <id> [service]              Forward a service port; service is one of
                                     dashboard, grafana, openattic
    --node <name>                    Node to connect to (default: admin)
    --remote-port <port>             Service port on the node
    --local-port <port>              Local port (default: the remote port)
    --local-address <addr>           Local bind address (default: localhost)

Create options:
  --roles <text>                     Roles per node, e.g.
                                     "[admin, mon, mgr], [storage, mon, mgr, mds]"
  --os <os>                          leap-15.1, leap-15.2, tumbleweed,
                                     sles-12-sp3, sles-15-sp1, sles-15-sp2
  --vagrant-box <box>                Vagrant box to use
  --deploy / --no-deploy             Deploy, or only generate the definition
  --cpus <n>                         Virtual CPUs per VM
  --ram <gb>                         RAM per VM in gigabytes
  --disk-size <gb>                   Size of each storage disk in gigabytes
  --num-disks <n>                    Storage disks per OSD node
  --single-node / --no-single-node   Single node cluster; overrides --roles
  --repo <url>                       Zypper repo added to each node (repeatable)
  --deepsea-cli / --salt-run         How DeepSea stages are run
  --stop-before-deepsea-stage <n>    Stop before running this DeepSea stage
  --deepsea-repo <url>               DeepSea Git repo
  --deepsea-branch <branch>          DeepSea Git branch
  --libvirt-host <host>              libvirt host
  --libvirt-user <user>              libvirt user
  --libvirt-storage-pool <pool>      libvirt storage pool
  --use-deepsea / --use-orchestrator Deployment tool (ses7 and octopus only)

Examples:
  clusterdev create ses6 --single-node my_ses6_cluster
  clusterdev create octopus --roles="[admin, mon, mgr], [storage, mon, mgr, mds]" \\
      --use-deepsea --num-disks=4 --disk-size=10 my_octopus_cluster
  clusterdev destroy --force my_octopus_cluster
`;

export interface CliDeps {
  version: string;
  out(line: string): void;
  err(line: string): void;
  progress: ProgressCallback;
  confirm(question: string, defaultAnswer: boolean): Promise<boolean>;
  loadConfig(options: LoadConfigOptions): CliConfig;
  loadEngine(config: CliConfig): Promise<DeploymentEngine>;
}

// Runs one command and returns the process exit code.
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    const { global, command } = parseCommandLine(argv);

    if (global.help) {
      deps.out(USAGE);
      return 0;
    }
    if (global.version || command === null) {
      deps.out(deps.version);
      return 0;
    }

    configureLogging({ debug: global.debug, logFile: global.logFile });

    // Role text and option ranges are checked before the engine is loaded.
    const ready = prepare(command);

    const config = deps.loadConfig({ configFile: global.configFile, workPath: global.workPath });
    logger.info(`Working path: ${config.workPath}`);

    const ctx: CommandContext = {
      engine: await deps.loadEngine(config),
      out: deps.out,
      progress: deps.progress,
      confirm: deps.confirm,
    };

    await dispatch(ctx, ready);
    return 0;
  } catch (err) {
    if (err instanceof AbortedError) {
      deps.err(err.message);
      return 1;
    }
    logger.error(errorMessage(err), err);
    deps.err(`Error: ${errorMessage(err)}`);
    return 1;
  }
}

type ReadyCommand =
  | Exclude<Command, { name: 'create' }>
  | { name: 'create'; deploymentId: string; deploy: boolean; settings: DeploymentSettings };

function prepare(command: Command): ReadyCommand {
  if (command.name !== 'create') {
    return command;
  }
  const { deploymentId, deploy, overrides } = command;
  return { name: 'create', deploymentId, deploy, settings: deriveSettings(overrides) };
}

async function dispatch(ctx: CommandContext, command: ReadyCommand): Promise<void> {
  logger.debug(`Running ${command.name}`);

  switch (command.name) {
    case 'list':
      return listDeployments(ctx);

    case 'create':
      await createDeployment(ctx, command);
      return;

    case 'destroy':
      return destroyDeployment(ctx, command.deploymentId, command.force);

    case 'redeploy':
      return redeployDeployment(ctx, command.deploymentId, command.force);

    case 'ssh':
      return sshToNode(ctx, command.deploymentId, command.node);

    case 'start':
      return startDeployment(ctx, command.deploymentId, command.node);

    case 'stop':
      return stopDeployment(ctx, command.deploymentId, command.node);

    case 'info':
      return showInfo(ctx, command.deploymentId);

    case 'tunnel':
      return openTunnel(ctx, command.deploymentId, command.options);
  }
}
