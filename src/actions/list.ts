import { aggregateStatus, nodeStates } from '../status/aggregate.js';
import type { CommandContext } from './types.js';

const ID_WIDTH = 11;
const STATUS_WIDTH = 15;
const NODES_WIDTH = 60;

export async function listDeployments(ctx: CommandContext): Promise<void> {
  const deployments = await ctx.engine.list(true);

  ctx.out(row(center('Deployments', ID_WIDTH), center('Status', STATUS_WIDTH), center('VMs', NODES_WIDTH)));
  ctx.out('-'.repeat(ID_WIDTH + STATUS_WIDTH + NODES_WIDTH + 10));

  for (const dep of deployments) {
    const status = aggregateStatus(nodeStates(dep.nodes));
    const nodeNames = Array.from(dep.nodes.keys()).join(', ');
    ctx.out(row(
      dep.id.padEnd(ID_WIDTH),
      status.padEnd(STATUS_WIDTH),
      nodeNames.padEnd(NODES_WIDTH),
    ));
  }

  ctx.out('');
}

function row(id: string, status: string, nodes: string): string {
  return `| ${id} | ${status} | ${nodes} |`;
}

// Extra padding goes on the right.
function center(text: string, width: number): string {
  const left = Math.max(0, Math.floor((width - text.length) / 2));
  return (' '.repeat(left) + text).padEnd(width);
}
