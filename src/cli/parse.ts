import { parseArgs } from 'util';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../lib/errors.js';
import { OS_CHOICES, VERSIONS, type RawOverrides, type Version } from '../settings/types.js';
import type { PortForwardOptions } from './engine-interface.js';

export const COMMANDS = ['list', 'create', 'destroy', 'ssh', 'stop', 'start', 'info', 'redeploy', 'tunnel'] as const;
export type CommandName = typeof COMMANDS[number];

export interface GlobalOptions {
  workPath?: string;
  configFile?: string;
  logFile?: string;
  debug: boolean;
  help: boolean;
  version: boolean;
}

export type Command =
  | { name: 'list' }
  | { name: 'create'; deploymentId: string; deploy: boolean; overrides: RawOverrides }
  | { name: 'destroy' | 'redeploy'; deploymentId: string; force: boolean }
  | { name: 'ssh' | 'start' | 'stop'; deploymentId: string; node?: string }
  | { name: 'info'; deploymentId: string }
  | { name: 'tunnel'; deploymentId: string; options: PortForwardOptions };

export interface CommandLine {
  global: GlobalOptions;
  // null when only --help or --version was asked for
  command: Command | null;
}

const GLOBAL_OPTIONS = ['work-path', 'config-file', 'debug', 'no-debug', 'log-file', 'version', 'help'];

const CREATE_OPTIONS = [
  'roles', 'os', 'vagrant-box', 'deploy', 'no-deploy', 'cpus', 'ram', 'disk-size', 'num-disks',
  'single-node', 'no-single-node', 'repo',
  'deepsea-cli', 'salt-run', 'stop-before-deepsea-stage', 'deepsea-repo', 'deepsea-branch',
  'libvirt-host', 'libvirt-user', 'libvirt-storage-pool',
];

// Versions that can be deployed either with DeepSea or the SSH orchestrator.
const DEPLOYMENT_TOOL_VERSIONS: readonly Version[] = ['ses7', 'octopus'];
const DEPLOYMENT_TOOL_OPTIONS = ['use-deepsea', 'use-orchestrator'];

const COMMAND_OPTIONS: Record<CommandName, readonly string[]> = {
  list: [],
  create: [...CREATE_OPTIONS, ...DEPLOYMENT_TOOL_OPTIONS],
  destroy: ['force'],
  ssh: [],
  stop: [],
  start: [],
  info: [],
  redeploy: ['force'],
  tunnel: ['node', 'remote-port', 'local-port', 'local-address'],
};

const IntegerString = z
  .string()
  .regex(/^-?\d+$/, 'expected an integer')
  .transform(Number);

const PortString = IntegerString.pipe(z.number().int().min(1).max(65535));

const CreateOptionsSchema = z.object({
  'roles': z.string().optional(),
  'os': z.enum(OS_CHOICES).optional(),
  'vagrant-box': z.string().optional(),
  'cpus': IntegerString.optional(),
  'ram': IntegerString.optional(),
  'disk-size': IntegerString.optional(),
  'num-disks': IntegerString.optional(),
  'repo': z.array(z.string()).optional(),
  'stop-before-deepsea-stage': IntegerString.optional(),
  'deepsea-repo': z.string().optional(),
  'deepsea-branch': z.string().optional(),
  'libvirt-host': z.string().optional(),
  'libvirt-user': z.string().optional(),
  'libvirt-storage-pool': z.string().optional(),
});

const TunnelOptionsSchema = z.object({
  'service': z.enum(['dashboard', 'grafana', 'openattic']).optional(),
  'node': z.string().min(1).default('admin'),
  'remote-port': PortString.optional(),
  'local-port': PortString.optional(),
  'local-address': z.string().min(1).default('localhost'),
});

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        'work-path': { type: 'string', short: 'w' },
        'config-file': { type: 'string', short: 'c' },
        'debug': { type: 'boolean' },
        'no-debug': { type: 'boolean' },
        'log-file': { type: 'string' },
        'version': { type: 'boolean' },
        'help': { type: 'boolean', short: 'h' },

        'roles': { type: 'string' },
        'os': { type: 'string' },
        'vagrant-box': { type: 'string' },
        'deploy': { type: 'boolean' },
        'no-deploy': { type: 'boolean' },
        'cpus': { type: 'string' },
        'ram': { type: 'string' },
        'disk-size': { type: 'string' },
        'num-disks': { type: 'string' },
        'single-node': { type: 'boolean' },
        'no-single-node': { type: 'boolean' },
        'repo': { type: 'string', multiple: true },
        'deepsea-cli': { type: 'boolean' },
        'salt-run': { type: 'boolean' },
        'stop-before-deepsea-stage': { type: 'string' },
        'deepsea-repo': { type: 'string' },
        'deepsea-branch': { type: 'string' },
        'libvirt-host': { type: 'string' },
        'libvirt-user': { type: 'string' },
        'libvirt-storage-pool': { type: 'string' },
        'use-deepsea': { type: 'boolean' },
        'use-orchestrator': { type: 'boolean' },

        'force': { type: 'boolean' },

        'node': { type: 'string' },
        'remote-port': { type: 'string' },
        'local-port': { type: 'string' },
        'local-address': { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
      tokens: true,
    });
  } catch (err) {
    throw new ValidationError(errorMessage(err));
  }
}

type Token = ReturnType<typeof parseRaw>['tokens'][number];

export function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals, tokens } = parseRaw(argv);

  const global: GlobalOptions = {
    workPath: values['work-path'],
    configFile: values['config-file'],
    logFile: values['log-file'],
    debug: lastFlag(tokens, 'debug', 'no-debug', false),
    help: values.help ?? false,
    version: values.version ?? false,
  };

  if (global.help || global.version) {
    return { global, command: null };
  }

  const [name, ...args] = positionals;
  if (name === undefined) {
    throw new ValidationError('Missing command. Run with --help for usage information');
  }
  if (!isCommandName(name)) {
    throw new ValidationError(`Unknown command: ${name}. Run with --help for usage information`);
  }

  checkOptions(name, args[0], tokens);

  switch (name) {
    case 'list':
      expectArgs(name, args, 0, 0);
      return { global, command: { name } };

    case 'create': {
      expectArgs(name, args, 2, 2, 'MODE DEPLOYMENT_ID');
      const [mode, deploymentId] = args;
      if (!isVersion(mode)) {
        throw new ValidationError(`Unknown create mode '${mode}'. Choose from: ${VERSIONS.join(', ')}`);
      }

      const result = CreateOptionsSchema.safeParse(values);
      if (!result.success) {
        throw new ValidationError(`Invalid options:\n${formatIssues(result.error.issues)}`);
      }
      const opts = result.data;

      const overrides: RawOverrides = {
        version: mode,
        roles: opts['roles'],
        os: opts['os'],
        vagrantBox: opts['vagrant-box'],
        cpus: opts['cpus'],
        ram: opts['ram'],
        diskSize: opts['disk-size'],
        numDisks: opts['num-disks'],
        singleNode: lastFlag(tokens, 'single-node', 'no-single-node', false),
        repos: opts['repo'],
        useDeepseaCli: lastFlag(tokens, 'deepsea-cli', 'salt-run', true),
        stopBeforeStage: opts['stop-before-deepsea-stage'],
        deepseaRepo: opts['deepsea-repo'],
        deepseaBranch: opts['deepsea-branch'],
        libvirtHost: opts['libvirt-host'],
        libvirtUser: opts['libvirt-user'],
        libvirtStoragePool: opts['libvirt-storage-pool'],
      };

      // Octopus is always deployed with DeepSea; the switches only matter for ses7.
      if (mode === 'octopus' || lastFlag(tokens, 'use-deepsea', 'use-orchestrator', false)) {
        overrides.deploymentTool = 'deepsea';
      }

      return {
        global,
        command: {
          name,
          deploymentId,
          deploy: lastFlag(tokens, 'deploy', 'no-deploy', true),
          overrides,
        },
      };
    }

    case 'destroy':
    case 'redeploy':
      expectArgs(name, args, 1, 1, 'DEPLOYMENT_ID');
      return { global, command: { name, deploymentId: args[0], force: values.force ?? false } };

    case 'ssh':
    case 'start':
    case 'stop':
      expectArgs(name, args, 1, 2, 'DEPLOYMENT_ID [NODE]');
      return { global, command: { name, deploymentId: args[0], node: args[1] } };

    case 'info':
      expectArgs(name, args, 1, 1, 'DEPLOYMENT_ID');
      return { global, command: { name, deploymentId: args[0] } };

    case 'tunnel': {
      expectArgs(name, args, 1, 2, 'DEPLOYMENT_ID [SERVICE]');
      const result = TunnelOptionsSchema.safeParse({ ...values, service: args[1] });
      if (!result.success) {
        throw new ValidationError(`Invalid options:\n${formatIssues(result.error.issues)}`);
      }
      const opts = result.data;
      return {
        global,
        command: {
          name,
          deploymentId: args[0],
          options: {
            service: opts['service'],
            node: opts['node'],
            remotePort: opts['remote-port'],
            localPort: opts['local-port'],
            localAddress: opts['local-address'],
          },
        },
      };
    }
  }
}

// For paired switches such as --deploy/--no-deploy the last one given wins.
function lastFlag(tokens: Token[], positive: string, negative: string, fallback: boolean): boolean {
  let value = fallback;
  for (const token of tokens) {
    if (token.kind !== 'option') continue;
    if (token.name === positive) value = true;
    else if (token.name === negative) value = false;
  }
  return value;
}

function checkOptions(name: CommandName, mode: string | undefined, tokens: Token[]): void {
  const allowed = new Set([...GLOBAL_OPTIONS, ...COMMAND_OPTIONS[name]]);
  const takesTool = name === 'create' && isVersion(mode) && DEPLOYMENT_TOOL_VERSIONS.includes(mode);

  for (const token of tokens) {
    if (token.kind !== 'option') continue;
    const toolOnly = DEPLOYMENT_TOOL_OPTIONS.includes(token.name);
    if (!allowed.has(token.name) || (toolOnly && !takesTool)) {
      throw new ValidationError(`Option ${token.rawName} is not valid for '${name}'`);
    }
  }
}

function expectArgs(name: CommandName, args: string[], min: number, max: number, usage = ''): void {
  if (args.length < min) {
    throw new ValidationError(`Missing argument for '${name}'. Usage: ${name} ${usage}`.trimEnd());
  }
  if (args.length > max) {
    throw new ValidationError(`Got unexpected extra argument for '${name}': ${args[max]}`);
  }
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map(issue => `  --${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

function isVersion(value: string | undefined): value is Version {
  return VERSIONS.some(version => version === value);
}
