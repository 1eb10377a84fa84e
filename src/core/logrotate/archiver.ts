/**
 * Run log rotation through logrotate
 */

import * as fs from "node:fs/promises";
import { LogArchiveError } from "../../errors";
import type { CommandRunner, OutputTee } from "../../system/process";
import type { Environment, LogrotateConfig, Profile } from "../../types";
import { logger } from "../../utils/logger";

export interface ArchiveLogOptions {
  runner: CommandRunner;
  env: Environment;
  tee?: OutputTee;
  dryRun?: boolean;
}

export function buildLogrotateArgs(config: LogrotateConfig, dryRun: boolean): string[] {
  const args = ["--verbose", "--state", config.state];
  if (dryRun) {
    // logrotate --debug only reports what it would do
    args.push("--debug");
  }
  args.push(config.config);
  return args;
}

/**
 * Rotate the profile's run log. logrotate runs from the profile directory so
 * relative paths in its configuration resolve there.
 */
export async function archiveRunLog(profile: Profile, options: ArchiveLogOptions): Promise<void> {
  const { logrotate } = profile.config;

  try {
    await fs.access(logrotate.config);
  } catch {
    throw new LogArchiveError(`logrotate configuration not found: ${logrotate.config}`);
  }

  const args = buildLogrotateArgs(logrotate, options.dryRun ?? false);
  logger.info(`Rotating run log ${profile.config.logFile}`);

  const result = await options.runner(logrotate.binary, args, {
    cwd: profile.dir,
    env: options.env,
    tee: options.tee,
  });

  if (!result.success) {
    const detail = result.stderr ? `: ${result.stderr}` : "";
    throw new LogArchiveError(`logrotate exited with code ${result.exitCode}${detail}`);
  }
}
