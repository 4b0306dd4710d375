import { ValidationError } from '../lib/errors.js';

export type NodeState = 'not deployed' | 'running' | 'stopped' | 'suspended';

export type ClusterStatus = NodeState | 'partially deployed' | 'partially running';

export const ADMIN_NODE = 'admin';

interface Transition {
  // Any of these states on another node moves the cluster to `to`.
  when: readonly NodeState[];
  to: ClusterStatus;
}

// Keyed by the admin node's state. When no other node is in one of the
// `when` states, the admin state is the cluster status.
const TRANSITIONS: Record<NodeState, Transition> = {
  'not deployed': { when: ['running'], to: 'partially deployed' },
  running: { when: ['stopped', 'suspended'], to: 'partially running' },
  stopped: { when: ['running'], to: 'partially running' },
  suspended: { when: ['running'], to: 'partially running' },
};

/**
 * Reduces the per-node states of a cluster to one status label.
 *
 * The result depends only on the admin node's state and the set of states
 * present on the cluster, never on the order of the nodes.
 */
export function aggregateStatus(nodes: ReadonlyMap<string, NodeState>): ClusterStatus {
  const adminState = nodes.get(ADMIN_NODE);
  if (adminState === undefined) {
    throw new ValidationError(`Cluster has no '${ADMIN_NODE}' node`);
  }

  const seen = new Set(nodes.values());
  const transition = TRANSITIONS[adminState];

  if (transition.when.some(state => seen.has(state))) {
    return transition.to;
  }
  return adminState;
}

export function nodeStates(
  nodes: ReadonlyMap<string, { readonly status: NodeState }>,
): Map<string, NodeState> {
  return new Map(Array.from(nodes, ([name, node]): [string, NodeState] => [name, node.status]));
}
