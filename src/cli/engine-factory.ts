import * as path from 'path';
import { pathToFileURL } from 'url';
import { ConfigError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { CliConfig } from './config.js';
import type { DeploymentEngine, EngineModule } from './engine-interface.js';

const logger = createLogger('engine');

export async function createEngine(config: CliConfig): Promise<DeploymentEngine> {
  if (!config.engine) {
    throw new ConfigError(
      'No deployment engine configured. Set `engine:` in the config file ' +
      'to a module that exports createEngine().'
    );
  }

  const isPath = config.engine.startsWith('.') || path.isAbsolute(config.engine);
  const specifier = isPath
    ? pathToFileURL(path.resolve(config.baseDir, config.engine)).href
    : config.engine;

  logger.info(`Loading deployment engine from ${specifier}`);

  let mod: unknown;
  try {
    mod = await import(specifier);
  } catch (err) {
    throw new ConfigError(`Failed to load deployment engine '${config.engine}': ${errorMessage(err)}`);
  }

  if (!isEngineModule(mod)) {
    throw new ConfigError(`Deployment engine '${config.engine}' does not export createEngine()`);
  }

  const engine: unknown = await mod.createEngine({
    workPath: config.workPath,
    engineOptions: config.engineOptions,
  });

  if (!isDeploymentEngine(engine)) {
    throw new ConfigError(
      `createEngine() from '${config.engine}' must return an object with create, load and list`
    );
  }

  return engine;
}

function isEngineModule(value: unknown): value is EngineModule {
  return typeof value === 'object' && value !== null &&
    'createEngine' in value && typeof value.createEngine === 'function';
}

export function isDeploymentEngine(value: unknown): value is DeploymentEngine {
  return typeof value === 'object' && value !== null &&
    'create' in value && typeof value.create === 'function' &&
    'load' in value && typeof value.load === 'function' &&
    'list' in value && typeof value.list === 'function';
}
