/**
 * Configuration file loading
 *
 * Layout on disk:
 *
 *   <global>/config.yaml         shared settings (optional)
 *   <global>/exclude.txt         shared exclude patterns (optional)
 *   <global>/<profile>/profile.yaml
 *   <global>/<profile>/repo-path.txt   repository fallback (optional)
 */

import * as path from "node:path";
import * as yaml from "js-yaml";
import { ConfigError, errorMessage } from "../errors";
import type { Environment, Profile } from "../types";
import { isDirectory, readOptionalFile } from "../utils/fs";
import { logger } from "../utils/logger";
import {
  DEFAULT_CONFIG,
  DEFAULT_EXCLUDE_FILE,
  DEFAULT_GLOBAL_CONFIG_FILE,
  DEFAULT_PROFILE_CONFIG_FILE,
  deepMerge,
  isPlainObject,
  mergeLayers,
  REPO_PATH_FILE,
} from "./defaults";
import { resolvePaths } from "./resolver";
import { validateConfig } from "./validator";

export { ConfigError } from "../errors";

/**
 * Parse a YAML document into a mapping. An empty document is an empty mapping.
 */
export function parseConfigContent(content: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    throw new ConfigError(`Failed to parse YAML in ${source}: ${errorMessage(e)}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${source} must contain a YAML mapping`);
  }
  return parsed;
}

/**
 * Parse an exclude file: one pattern per line, blank lines and # comments skipped
 */
export function parseExcludeList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

async function loadYamlFile(filePath: string, required: boolean): Promise<Record<string, unknown>> {
  const content = await readOptionalFile(filePath);
  if (content === null) {
    if (required) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    logger.debug(`No config file at ${filePath}, using an empty layer`);
    return {};
  }
  return parseConfigContent(content, filePath);
}

async function readRepoPathFile(profileDir: string): Promise<string | undefined> {
  const content = await readOptionalFile(path.join(profileDir, REPO_PATH_FILE));
  if (content === null) {
    return undefined;
  }
  const firstLine = content.split(/\r?\n/, 1)[0]?.trim();
  return firstLine ? firstLine : undefined;
}

/**
 * Load a profile directory: global layer, profile layer, defaults, exclude list
 */
export async function loadProfile(profileDir: string, env: Environment): Promise<Profile> {
  const dir = path.resolve(profileDir);
  const globalDir = path.dirname(dir);
  const name = path.basename(dir);

  if (!(await isDirectory(dir))) {
    throw new ConfigError(`Profile directory not found: ${dir}`);
  }

  const globalLayer = await loadYamlFile(path.join(globalDir, DEFAULT_GLOBAL_CONFIG_FILE), false);
  const profileLayer = await loadYamlFile(path.join(dir, DEFAULT_PROFILE_CONFIG_FILE), true);

  const layered = mergeLayers(globalLayer, profileLayer);
  if (layered.repository === undefined) {
    const fromFile = await readRepoPathFile(dir);
    if (fromFile !== undefined) {
      layered.repository = fromFile;
    }
  }

  const merged = deepMerge(DEFAULT_CONFIG, layered);
  const secret = merged.secret;
  if (isPlainObject(secret) && isPlainObject(secret.attributes)) {
    if (Object.keys(secret.attributes).length === 0) {
      merged.secret = { ...secret, attributes: { "borg-config": name } };
    }
  }

  validateConfig(merged);

  const excludePath = path.join(globalDir, DEFAULT_EXCLUDE_FILE);
  const excludeContent = await readOptionalFile(excludePath);
  if (excludeContent === null) {
    logger.debug(`No exclude file at ${excludePath}`);
  }

  return {
    name,
    dir,
    globalDir,
    config: resolvePaths(merged, dir, env),
    excludeFile: excludeContent === null ? null : excludePath,
    excludePatterns: excludeContent === null ? [] : parseExcludeList(excludeContent),
  };
}
