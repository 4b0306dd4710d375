export class ClusterDevError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed role text, e.g. an unterminated `[` group.
export class ParseError extends ClusterDevError {}

export class ValidationError extends ClusterDevError {}

export class ConfigError extends ClusterDevError {}

export class NotFoundError extends ClusterDevError {
  constructor(readonly deploymentId: string, message = `Deployment '${deploymentId}' not found`) {
    super(message);
  }
}

export class DeploymentError extends ClusterDevError {}

// The operator declined a confirmation prompt.
export class AbortedError extends ClusterDevError {
  constructor() {
    super('Aborted!');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
