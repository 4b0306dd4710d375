import { ValidationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { parseRoles, type RoleList } from './roles.js';
import type { DeploymentSettings, RawOverrides, Version } from './types.js';

const logger = createLogger('settings');

export const SINGLE_NODE_ROLES: readonly string[] = [
  'admin',
  'storage',
  'mon',
  'mgr',
  'prometheus',
  'grafana',
  'mds',
  'igw',
  'rgw',
  'ganesha',
];

export const SINGLE_NODE_MIN_DISKS = 3;

// Roles that a version always needs on the first node.
const VERSION_EXTRA_ROLES: Partial<Record<Version, readonly string[]>> = {
  ses5: ['openattic'],
};

const DEEPSEA_ONLY_VERSIONS: readonly Version[] = ['ses5', 'ses6', 'nautilus'];

type Draft = { -readonly [K in keyof DeploymentSettings]: DeploymentSettings[K] };

/**
 * Builds the settings handed to the deployment engine from what the operator
 * supplied. Only options that were given (or derived from single-node mode)
 * end up in the result, so the engine's defaults apply to everything else.
 *
 * Disk count, CPUs, RAM, disk size, OS, the libvirt options, repo URLs and
 * the vagrant box are kept only when truthy: a literal `0` or `''` is treated
 * as not supplied. This matches how deployments have always been configured;
 * the stage index and the deepsea-cli switch are checked for presence
 * instead, since `0` and `false` are meaningful there.
 *
 * @throws ParseError when the role text is malformed
 * @throws ValidationError for out-of-range or conflicting values
 */
export function deriveSettings(overrides: RawOverrides): DeploymentSettings {
  validate(overrides);

  const { version, singleNode = false } = overrides;
  const draft: Draft = { version };

  let roles: RoleList | undefined;
  if (singleNode) {
    if (overrides.roles) {
      logger.info(`single-node mode ignores --roles ${overrides.roles}`);
    }
    roles = [[...SINGLE_NODE_ROLES]];
  } else if (overrides.roles) {
    roles = parseRoles(overrides.roles);
  }

  if (truthy(overrides.numDisks)) {
    draft.numDisks = singleNode
      ? Math.max(overrides.numDisks, SINGLE_NODE_MIN_DISKS)
      : overrides.numDisks;
  } else if (singleNode) {
    draft.numDisks = SINGLE_NODE_MIN_DISKS;
  }

  if (truthy(overrides.os)) draft.os = overrides.os;
  if (truthy(overrides.cpus)) draft.cpus = overrides.cpus;
  if (truthy(overrides.ram)) draft.ram = overrides.ram;
  if (truthy(overrides.diskSize)) draft.diskSize = overrides.diskSize;
  if (truthy(overrides.libvirtHost)) draft.libvirtHost = overrides.libvirtHost;
  if (truthy(overrides.libvirtUser)) draft.libvirtUser = overrides.libvirtUser;
  if (truthy(overrides.libvirtStoragePool)) draft.libvirtStoragePool = overrides.libvirtStoragePool;
  if (overrides.useDeepseaCli !== undefined) draft.useDeepseaCli = overrides.useDeepseaCli;
  if (overrides.stopBeforeStage !== undefined) draft.stopBeforeStage = overrides.stopBeforeStage;
  if (truthy(overrides.deepseaRepo)) draft.deepseaGitRepo = overrides.deepseaRepo;
  if (truthy(overrides.deepseaBranch)) draft.deepseaGitBranch = overrides.deepseaBranch;
  if (truthy(overrides.deploymentTool)) draft.deploymentTool = overrides.deploymentTool;
  if (truthy(overrides.vagrantBox)) draft.vagrantBox = overrides.vagrantBox;

  if (overrides.repos && overrides.repos.length > 0) {
    draft.repos = Object.freeze([...overrides.repos]);
  }

  // Must run after single-node mode has settled the role list.
  const extraRoles = VERSION_EXTRA_ROLES[version];
  if (roles && roles.length > 0 && extraRoles) {
    roles[0].push(...extraRoles);
  }

  // Whitespace-only role text parses to an empty list: leave the engine default.
  if (roles && roles.length > 0) {
    draft.roles = Object.freeze(roles.map(node => Object.freeze(node)));
  }

  logger.debug(`derived settings: ${JSON.stringify(draft)}`);
  return Object.freeze(draft);
}

// TODO: give the truthy-gated options explicit presence checks once a
// literal 0 disk size or CPU count has a defined meaning downstream.
function truthy<T extends string | number>(value: T | undefined): value is T {
  return Boolean(value);
}

function validate(overrides: RawOverrides): void {
  const integers: Array<[string, number | undefined]> = [
    ['number of disks', overrides.numDisks],
    ['number of CPUs', overrides.cpus],
    ['RAM size', overrides.ram],
    ['disk size', overrides.diskSize],
    ['DeepSea stage', overrides.stopBeforeStage],
  ];

  for (const [label, value] of integers) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ValidationError(`Invalid ${label}: ${value} (expected a non-negative integer)`);
    }
  }

  if (overrides.deploymentTool === 'orchestrator' && DEEPSEA_ONLY_VERSIONS.includes(overrides.version)) {
    throw new ValidationError(`${overrides.version} can only be deployed with DeepSea`);
  }

  if (overrides.repos?.some(repo => repo.trim() === '')) {
    throw new ValidationError('Repository URLs must not be empty');
  }
}
