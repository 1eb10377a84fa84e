/**
 * External command runner using node:child_process
 */

import { spawn } from "node:child_process";
import type { Environment } from "../types";
import { logger } from "../utils/logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Receives child output as it arrives */
export interface OutputTee {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
}

export interface RunCommandOptions {
  env?: Environment;
  cwd?: string;
  tee?: OutputTee;
  /** Keep output in the result (default true). Off for chatty commands. */
  capture?: boolean;
  /** Return stdout as printed, minus one trailing newline, instead of trimmed */
  raw?: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/** Exit code used when the command could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Run a command to completion and return its result. A non-zero exit is a
 * result, not an exception.
 */
function stripNewline(text: string): string {
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const capture = options.capture ?? true;
  const cleanStdout = options.raw ? stripNewline : (text: string) => text.trim();

  logger.debug(`Running: ${command} ${args.join(" ")}`);

  return new Promise<CommandResult>((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (chunk: string) => {
      if (capture) stdout += chunk;
      options.tee?.stdout(chunk);
    });

    child.stderr.on("data", (chunk: string) => {
      if (capture) stderr += chunk;
      options.tee?.stderr(chunk);
    });

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      logger.debug(`Failed to start ${command}: ${error.message}`);
      resolve({
        success: false,
        stdout: cleanStdout(stdout),
        stderr: error.message,
        exitCode: SPAWN_FAILURE_EXIT_CODE,
      });
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      if (signal !== null) {
        logger.warn(`${command} terminated by ${signal}`);
      }
      const exitCode = code ?? 1;
      resolve({
        success: exitCode === 0,
        stdout: cleanStdout(stdout),
        stderr: stderr.trim(),
        exitCode,
      });
    });
  });
};
