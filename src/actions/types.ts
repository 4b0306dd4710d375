import type { DeploymentEngine, ProgressCallback } from '../cli/engine-interface.js';

export const PROGRAM_NAME = 'clusterdev';

export interface CommandContext {
  engine: DeploymentEngine;

  // One line of operator-facing output.
  out(line: string): void;

  // Streams engine output while long operations run.
  progress: ProgressCallback;

  confirm(question: string, defaultAnswer: boolean): Promise<boolean>;
}

export const silentProgress: ProgressCallback = () => {};
