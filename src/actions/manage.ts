import type { PortForwardOptions } from '../cli/engine-interface.js';
import { AbortedError, ValidationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { ADMIN_NODE } from '../status/aggregate.js';
import type { CommandContext } from './types.js';

const logger = createLogger('manage');

export async function destroyDeployment(
  ctx: CommandContext,
  deploymentId: string,
  force: boolean
): Promise<void> {
  await confirmUnlessForced(ctx, force, 'Are you sure you want to destroy the cluster?');
  const dep = await ctx.engine.load(deploymentId);
  await dep.destroy(ctx.progress);
}

// Destroys the VMs and deploys again from scratch with the same settings.
export async function redeployDeployment(
  ctx: CommandContext,
  deploymentId: string,
  force: boolean
): Promise<void> {
  await confirmUnlessForced(ctx, force, 'Are you sure you want to redeploy the cluster?');
  const old = await ctx.engine.load(deploymentId);
  await old.destroy(ctx.progress);

  logger.info(`Recreating ${deploymentId}`);
  const dep = await ctx.engine.create(deploymentId, old.settings);
  await dep.start(ctx.progress);
}

export async function startDeployment(
  ctx: CommandContext,
  deploymentId: string,
  node?: string
): Promise<void> {
  const dep = await ctx.engine.load(deploymentId);
  await dep.start(ctx.progress, node);
}

export async function stopDeployment(
  ctx: CommandContext,
  deploymentId: string,
  node?: string
): Promise<void> {
  const dep = await ctx.engine.load(deploymentId);
  await dep.stop(ctx.progress, node);
}

export async function sshToNode(
  ctx: CommandContext,
  deploymentId: string,
  node: string = ADMIN_NODE
): Promise<void> {
  const dep = await ctx.engine.load(deploymentId);
  await dep.ssh(node);
}

export async function showInfo(ctx: CommandContext, deploymentId: string): Promise<void> {
  const dep = await ctx.engine.load(deploymentId);
  ctx.out(dep.status());
}

export async function openTunnel(
  ctx: CommandContext,
  deploymentId: string,
  options: PortForwardOptions
): Promise<void> {
  const { service, remotePort, localPort } = options;

  if (service) {
    ctx.out(`Opening tunnel to service '${service}'...`);
  } else if (remotePort !== undefined) {
    ctx.out(`Opening tunnel between remote ${remotePort} port and local ${localPort ?? remotePort} port`);
  } else {
    throw new ValidationError('Either a SERVICE or --remote-port must be given');
  }

  const dep = await ctx.engine.load(deploymentId);
  await dep.startPortForwarding(options);
}

async function confirmUnlessForced(
  ctx: CommandContext,
  force: boolean,
  question: string
): Promise<void> {
  if (force) return;
  if (!await ctx.confirm(question, false)) {
    throw new AbortedError();
  }
}
