import type { Deployment } from '../cli/engine-interface.js';
import { createLogger } from '../lib/logger.js';
import type { DeploymentSettings } from '../settings/types.js';
import { PROGRAM_NAME, silentProgress, type CommandContext } from './types.js';

const logger = createLogger('create');

export interface CreateOptions {
  deploymentId: string;
  settings: DeploymentSettings;
  // When false only the deployment definition is generated.
  deploy: boolean;
}

export async function createDeployment(
  ctx: CommandContext,
  options: CreateOptions
): Promise<Deployment> {
  const { deploymentId, settings, deploy } = options;

  const dep = await ctx.engine.create(deploymentId, settings);
  ctx.out('=== Creating deployment with the following configuration ===');
  ctx.out(dep.status());

  if (!deploy) {
    return dep;
  }

  if (!await ctx.confirm('Do you want to continue with the deployment?', true)) {
    logger.info(`Deployment of ${deploymentId} cancelled, removing it`);
    await dep.destroy(silentProgress);
    return dep;
  }

  await dep.start(ctx.progress);

  ctx.out('=== Deployment Finished ===');
  ctx.out('');
  ctx.out('You can login into the cluster with:');
  ctx.out('');
  ctx.out(`  $ ${PROGRAM_NAME} ssh ${deploymentId}`);
  ctx.out('');
  if (dep.settings.version === 'ses5') {
    ctx.out('Or, access openATTIC with:');
    ctx.out('');
    ctx.out(`  $ ${PROGRAM_NAME} tunnel ${deploymentId} openattic`);
  } else {
    ctx.out('Or, access the Ceph Dashboard with:');
    ctx.out('');
    ctx.out(`  $ ${PROGRAM_NAME} tunnel ${deploymentId} dashboard`);
    ctx.out('');
  }

  return dep;
}
