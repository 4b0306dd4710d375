export const VERSIONS = ['ses5', 'ses6', 'ses7', 'nautilus', 'octopus'] as const;
export type Version = typeof VERSIONS[number];

export const OS_CHOICES = [
  'leap-15.1',
  'leap-15.2',
  'tumbleweed',
  'sles-12-sp3',
  'sles-15-sp1',
  'sles-15-sp2',
] as const;
export type OsChoice = typeof OS_CHOICES[number];

export type DeploymentTool = 'deepsea' | 'orchestrator';

// What the operator supplied on the command line. `undefined` means the
// option was not given.
export interface RawOverrides {
  version: Version;
  roles?: string;
  os?: OsChoice;
  numDisks?: number;
  cpus?: number;
  ram?: number;
  diskSize?: number;
  singleNode?: boolean;
  repos?: string[];
  libvirtHost?: string;
  libvirtUser?: string;
  libvirtStoragePool?: string;
  useDeepseaCli?: boolean;
  stopBeforeStage?: number;
  deepseaRepo?: string;
  deepseaBranch?: string;
  deploymentTool?: DeploymentTool;
  vagrantBox?: string;
}

// Handed to the deployment engine. Keys that are absent fall back to the
// engine's own defaults.
export interface DeploymentSettings {
  readonly version: Version;
  readonly roles?: readonly (readonly string[])[];
  readonly os?: OsChoice;
  readonly numDisks?: number;
  readonly cpus?: number;
  readonly ram?: number;
  readonly diskSize?: number;
  readonly libvirtHost?: string;
  readonly libvirtUser?: string;
  readonly libvirtStoragePool?: string;
  readonly useDeepseaCli?: boolean;
  readonly stopBeforeStage?: number;
  readonly deepseaGitRepo?: string;
  readonly deepseaGitBranch?: string;
  readonly repos?: readonly string[];
  readonly vagrantBox?: string;
  readonly deploymentTool?: DeploymentTool;
}
