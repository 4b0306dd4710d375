import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../lib/errors.js';

export const DEFAULT_WORK_PATH = path.join(os.homedir(), '.clusterdev');
export const DEFAULT_CONFIG_FILE = path.join(DEFAULT_WORK_PATH, 'config.yaml');

const CliConfigSchema = z.object({
  // Module exporting createEngine(), relative to the config file.
  engine: z.string().min(1).optional(),
  workPath: z.string().min(1).optional(),
  engineOptions: z.record(z.unknown()).default({}),
});

export interface CliConfig {
  engine?: string;
  workPath: string;
  engineOptions: Record<string, unknown>;
  // Directory that relative paths in the file resolve against.
  baseDir: string;
}

export interface LoadConfigOptions {
  configFile?: string;
  workPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): CliConfig {
  if (options.workPath !== undefined && !isDirectory(options.workPath)) {
    throw new ConfigError(`Work path is not a directory: ${options.workPath}`);
  }

  const configPath = options.configFile ?? DEFAULT_CONFIG_FILE;

  if (!fs.existsSync(configPath)) {
    if (options.configFile !== undefined) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return {
      workPath: options.workPath ?? DEFAULT_WORK_PATH,
      engineOptions: {},
      baseDir: process.cwd(),
    };
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let raw: unknown;
  try {
    // An empty file parses to null; treat it as an empty mapping.
    raw = yaml.parse(content) ?? {};
  } catch (err) {
    throw new ConfigError(`Invalid config ${configPath}: ${errorMessage(err)}`);
  }

  const result = CliConfigSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config ${configPath}:\n${errors}`);
  }

  const baseDir = path.dirname(path.resolve(configPath));
  const { engine, workPath, engineOptions } = result.data;

  return {
    engine,
    workPath: options.workPath ?? (workPath ? path.resolve(baseDir, workPath) : DEFAULT_WORK_PATH),
    engineOptions,
    baseDir,
  };
}

function isDirectory(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}
