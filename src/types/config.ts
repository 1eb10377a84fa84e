/**
 * Configuration type definitions for borgrun
 */

export interface BorgConfig {
  binary: string;
  compression: string;
  /** Item status filter for `--list` output, e.g. "AME-x" */
  filter: string;
  excludeCaches: boolean;
  extraCreateArgs: string[];
  /** Let prune/compact run after a create that exited with warnings (rc 1) */
  continueOnWarning: boolean;
}

export interface PruneConfig {
  /** Restricts pruning to this machine's archives */
  globArchives: string;
  keepHourly?: number;
  keepDaily?: number;
  keepWeekly?: number;
  keepMonthly?: number;
  keepYearly?: number;
}

export interface NetworkConfig {
  enabled: boolean;
  /** Gateway MAC addresses a backup may run behind */
  allowedGateways: string[];
}

export interface SecretConfig {
  command: string;
  attributes: Record<string, string>;
}

export interface LogrotateConfig {
  binary: string;
  config: string;
  state: string;
}

export interface BorgrunConfig {
  repository: string;
  archiveName: string;
  sources: string[];
  borg: BorgConfig;
  prune: PruneConfig;
  network: NetworkConfig;
  secret: SecretConfig;
  sessionScript?: string;
  logFile: string;
  logrotate: LogrotateConfig;
}

/**
 * A loaded profile: merged configuration plus the directory layout it came from
 */
export interface Profile {
  name: string;
  dir: string;
  globalDir: string;
  config: BorgrunConfig;
  /** Path handed to `--exclude-from`, null when the global dir has no exclude file */
  excludeFile: string | null;
  excludePatterns: string[];
}
