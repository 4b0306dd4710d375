import type { DeploymentSettings } from '../settings/types.js';
import type { NodeState } from '../status/aggregate.js';

// Receives chunks of engine output as work proceeds. Must not throw.
export type ProgressCallback = (chunk: string) => void;

export interface DeploymentNode {
  name: string;
  status: NodeState;
}

export type TunnelService = 'dashboard' | 'grafana' | 'openattic';

export interface PortForwardOptions {
  service?: TunnelService;
  node: string;
  remotePort?: number;
  localPort?: number;
  localAddress: string;
}

export interface Deployment {
  readonly id: string;
  readonly settings: DeploymentSettings;
  readonly nodes: ReadonlyMap<string, DeploymentNode>;

  // Human-readable summary of the configuration and node states.
  status(): string;

  start(onOutput: ProgressCallback, node?: string): Promise<void>;
  stop(onOutput: ProgressCallback, node?: string): Promise<void>;
  destroy(onOutput: ProgressCallback): Promise<void>;
  ssh(nodeName: string): Promise<void>;
  startPortForwarding(options: PortForwardOptions): Promise<void>;
}

export interface DeploymentEngine {
  // Rejects with DeploymentError when the deployment cannot be set up.
  create(id: string, settings: DeploymentSettings): Promise<Deployment>;
  // Rejects with NotFoundError for unknown ids.
  load(id: string): Promise<Deployment>;
  list(refresh: boolean): Promise<Deployment[]>;
}

export interface EngineOptions {
  workPath: string;
  engineOptions: Record<string, unknown>;
}

export type EngineModule = {
  createEngine(options: EngineOptions): DeploymentEngine | Promise<DeploymentEngine>;
};
