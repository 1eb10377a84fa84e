/**
 * Configuration validation
 */

import { ConfigError } from "../errors";
import { normalizeMac } from "../system/gateway";
import type { BorgrunConfig } from "../types";
import { isPlainObject } from "./defaults";

export { ConfigError };

type Validator = (config: Record<string, unknown>) => void;

const KEEP_KEYS = ["keepHourly", "keepDaily", "keepWeekly", "keepMonthly", "keepYearly"] as const;

function requireString(value: unknown, name: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
}

function requireBoolean(value: unknown, name: string): void {
  if (typeof value !== "boolean") {
    throw new ConfigError(`${name} must be a boolean`);
  }
}

function requireStringArray(value: unknown, name: string): asserts value is string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${name} must be an array`);
  }
  value.forEach((item, i) => {
    if (typeof item !== "string") {
      throw new ConfigError(`${name}[${i}] must be a string`);
    }
  });
}

function requireSection(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = c[name];
  if (!isPlainObject(section)) {
    throw new ConfigError(`${name} must be an object`);
  }
  return section;
}

const validators: Record<string, Validator> = {
  repository: (c) => {
    if (c.repository === undefined) {
      throw new ConfigError("No repository configured: set 'repository' or provide repo-path.txt");
    }
    requireString(c.repository, "repository");
  },

  archiveName: (c) => {
    requireString(c.archiveName, "archiveName");
    if (String(c.archiveName).includes("::")) {
      throw new ConfigError("archiveName must not contain '::'");
    }
  },

  sources: (c) => {
    requireStringArray(c.sources, "sources");
    if (Array.isArray(c.sources) && c.sources.length === 0) {
      throw new ConfigError("sources must list at least one path");
    }
  },

  borg: (c) => {
    const borg = requireSection(c, "borg");
    requireString(borg.binary, "borg.binary");
    requireString(borg.compression, "borg.compression");
    requireString(borg.filter, "borg.filter");
    requireBoolean(borg.excludeCaches, "borg.excludeCaches");
    requireStringArray(borg.extraCreateArgs, "borg.extraCreateArgs");
    requireBoolean(borg.continueOnWarning, "borg.continueOnWarning");
  },

  prune: (c) => {
    const prune = requireSection(c, "prune");
    requireString(prune.globArchives, "prune.globArchives");

    let anyKeep = false;
    for (const key of KEEP_KEYS) {
      const value = prune[key];
      if (value === undefined) continue;
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new ConfigError(`prune.${key} must be a non-negative integer`);
      }
      if (value > 0) anyKeep = true;
    }
    // borg refuses to prune without at least one keep rule
    if (!anyKeep) {
      throw new ConfigError("prune must set at least one positive keep* rule");
    }
  },

  network: (c) => {
    const network = requireSection(c, "network");
    requireBoolean(network.enabled, "network.enabled");
    const gateways = network.allowedGateways;
    requireStringArray(gateways, "network.allowedGateways");
    gateways.forEach((entry, i) => {
      if (normalizeMac(entry) === null) {
        throw new ConfigError(`network.allowedGateways[${i}] is not a MAC address: ${entry}`);
      }
    });
  },

  secret: (c) => {
    const secret = requireSection(c, "secret");
    requireString(secret.command, "secret.command");
    const attributes = secret.attributes;
    if (!isPlainObject(attributes)) {
      throw new ConfigError("secret.attributes must be a map of strings");
    }
    for (const [key, value] of Object.entries(attributes)) {
      if (typeof value !== "string") {
        throw new ConfigError(`secret.attributes.${key} must be a string`);
      }
    }
  },

  sessionScript: (c) => {
    if (c.sessionScript !== undefined) {
      requireString(c.sessionScript, "sessionScript");
    }
  },

  logFile: (c) => {
    requireString(c.logFile, "logFile");
  },

  logrotate: (c) => {
    const logrotate = requireSection(c, "logrotate");
    requireString(logrotate.binary, "logrotate.binary");
    requireString(logrotate.config, "logrotate.config");
    requireString(logrotate.state, "logrotate.state");
  },
};

/**
 * Validate a merged configuration object
 */
export function validateConfig(config: unknown): asserts config is BorgrunConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
