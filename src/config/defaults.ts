/**
 * Default configuration values
 */

import type { BorgrunConfig } from "../types";

export const DEFAULT_GLOBAL_CONFIG_FILE = "config.yaml";
export const DEFAULT_PROFILE_CONFIG_FILE = "profile.yaml";
export const DEFAULT_EXCLUDE_FILE = "exclude.txt";
export const REPO_PATH_FILE = "repo-path.txt";

// repository is intentionally NOT defaulted - it comes from the profile or repo-path.txt
export const DEFAULT_CONFIG: Omit<BorgrunConfig, "repository"> = {
  archiveName: "{hostname}-{now}",
  sources: ["~"],
  borg: {
    binary: "borg",
    compression: "auto,zstd",
    filter: "AME-x",
    excludeCaches: true,
    extraCreateArgs: [],
    continueOnWarning: false,
  },
  prune: {
    globArchives: "{hostname}-*",
    keepDaily: 7,
    keepWeekly: 4,
    keepMonthly: 6,
  },
  network: {
    enabled: true,
    allowedGateways: [],
  },
  secret: {
    command: "secret-tool",
    attributes: {},
  },
  logFile: "logs/log",
  logrotate: {
    binary: "logrotate",
    config: "logrotate.conf",
    state: "logrotate-state",
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Overlay the profile document on the global one. A key the profile sets
 * replaces the global value wholesale, nested maps and lists included.
 */
export function mergeLayers(
  global: Record<string, unknown>,
  profile: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...global };
  for (const [key, value] of Object.entries(profile)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
