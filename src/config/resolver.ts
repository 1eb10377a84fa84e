/**
 * Path expansion for loaded configuration
 */

import * as os from "node:os";
import * as path from "node:path";
import type { BorgrunConfig, Environment } from "../types";

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references. Unknown variables
 * are left as written.
 */
export function expandPath(value: string, env: Environment): string {
  const home = env.HOME ?? os.homedir();
  let expanded = value;

  if (expanded === "~") {
    expanded = home;
  } else if (expanded.startsWith("~/")) {
    expanded = path.join(home, expanded.slice(2));
  }

  return expanded.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (name === undefined) return match;
      const resolved = env[name];
      return resolved === undefined ? match : resolved;
    },
  );
}

/**
 * Expand and make absolute, relative paths being taken from the profile directory
 */
export function resolvePath(value: string, baseDir: string, env: Environment): string {
  return path.resolve(baseDir, expandPath(value, env));
}

/**
 * Resolve every filesystem path in the config against the profile directory.
 * The repository only gets `~`/variable expansion: it may be a remote URL.
 */
export function resolvePaths(
  config: BorgrunConfig,
  profileDir: string,
  env: Environment,
): BorgrunConfig {
  return {
    ...config,
    repository: expandPath(config.repository, env),
    sources: config.sources.map((source) => resolvePath(source, profileDir, env)),
    sessionScript:
      config.sessionScript !== undefined
        ? resolvePath(config.sessionScript, profileDir, env)
        : undefined,
    logFile: resolvePath(config.logFile, profileDir, env),
    logrotate: {
      ...config.logrotate,
      config: resolvePath(config.logrotate.config, profileDir, env),
      state: resolvePath(config.logrotate.state, profileDir, env),
    },
  };
}
