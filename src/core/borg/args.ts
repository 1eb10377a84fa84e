/**
 * borg command lines for create, prune and compact
 */

import type { BorgrunConfig, Profile, PruneConfig } from "../../types";

const KEEP_FLAGS: Array<[keyof PruneConfig, string]> = [
  ["keepHourly", "--keep-hourly"],
  ["keepDaily", "--keep-daily"],
  ["keepWeekly", "--keep-weekly"],
  ["keepMonthly", "--keep-monthly"],
  ["keepYearly", "--keep-yearly"],
];

export function archiveLocation(config: BorgrunConfig): string {
  return `${config.repository}::${config.archiveName}`;
}

export function buildCreateArgs(profile: Profile, dryRun: boolean): string[] {
  const { borg } = profile.config;
  const args = [
    "create",
    "--verbose",
    "--filter",
    borg.filter,
    "--list",
    "--stats",
    "--show-rc",
    "--compression",
    borg.compression,
  ];

  if (borg.excludeCaches) {
    args.push("--exclude-caches");
  }
  if (profile.excludeFile) {
    args.push("--exclude-from", profile.excludeFile);
  }
  if (dryRun) {
    args.push("--dry-run");
  }

  args.push(...borg.extraCreateArgs);
  args.push(archiveLocation(profile.config), ...profile.config.sources);
  return args;
}

export function buildPruneArgs(config: BorgrunConfig, dryRun: boolean): string[] {
  const args = ["prune", "--list", "--show-rc", "--glob-archives", config.prune.globArchives];

  for (const [key, flag] of KEEP_FLAGS) {
    const value = config.prune[key];
    if (typeof value === "number" && value > 0) {
      args.push(flag, String(value));
    }
  }

  if (dryRun) {
    args.push("--dry-run");
  }

  args.push(config.repository);
  return args;
}

export function buildCompactArgs(config: BorgrunConfig): string[] {
  return ["compact", "--show-rc", config.repository];
}

export function buildListArgs(repository: string): string[] {
  return ["list", repository];
}
