/**
 * Session variable snapshot
 *
 * An interactive desktop session knows where the SSH agent and the D-Bus
 * session bus live; cron and systemd timers do not. `export-session` writes
 * both into a small sourceable script, and backup runs read it back into the
 * child environment.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { SessionError } from "../errors";
import type { Environment, SessionVariables } from "../types";
import { readOptionalFile } from "../utils/fs";

export const SESSION_VARIABLE_NAMES = ["SSH_AUTH_SOCK", "DBUS_SESSION_BUS_ADDRESS"] as const;

export type SessionVariableName = (typeof SESSION_VARIABLE_NAMES)[number];

export const SESSION_SCRIPT_MODE = 0o600;

export function defaultSessionScriptPath(env: Environment): string {
  const home = env.HOME ?? os.homedir();
  return path.join(home, ".config", "borgrun", "session-env.sh");
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function renderSessionScript(variables: SessionVariables, generatedAt: Date): string {
  const lines = [`# Generated by borgrun export-session at ${generatedAt.toISOString()}`];
  for (const name of SESSION_VARIABLE_NAMES) {
    lines.push(`export ${name}=${shellQuote(variables[name])}`);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Decode one shell word: single quotes, double quotes with backslash escapes,
 * and bare characters. Stops at unquoted whitespace, `;` or `#`.
 */
export function unquoteShellWord(raw: string): string {
  let result = "";
  let i = 0;

  while (i < raw.length) {
    const ch = raw.charAt(i);

    if (ch === "'") {
      const end = raw.indexOf("'", i + 1);
      if (end === -1) throw new SessionError(`Unterminated single quote in: ${raw}`);
      result += raw.slice(i + 1, end);
      i = end + 1;
    } else if (ch === '"') {
      i++;
      let closed = false;
      while (i < raw.length) {
        const inner = raw.charAt(i);
        if (inner === '"') {
          closed = true;
          i++;
          break;
        }
        if (inner === "\\" && i + 1 < raw.length && '"\\$`'.includes(raw.charAt(i + 1))) {
          result += raw.charAt(i + 1);
          i += 2;
        } else {
          result += inner;
          i++;
        }
      }
      if (!closed) throw new SessionError(`Unterminated double quote in: ${raw}`);
    } else if (ch === "\\" && i + 1 < raw.length) {
      result += raw.charAt(i + 1);
      i += 2;
    } else if (/\s/.test(ch) || ch === ";" || ch === "#") {
      break;
    } else {
      result += ch;
      i++;
    }
  }

  return result;
}

/**
 * Read `NAME=value` / `export NAME=value` assignments out of a session script
 */
export function parseSessionScript(content: string): Record<string, string> {
  const assignments: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const match = line.match(/^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!match?.[1]) continue;
    assignments[match[1]] = unquoteShellWord(match[2] ?? "");
  }

  return assignments;
}

export function pickSessionVariables(env: Environment): {
  variables: SessionVariables;
  missing: SessionVariableName[];
} {
  const missing = SESSION_VARIABLE_NAMES.filter((name) => !env[name]);
  return {
    variables: {
      SSH_AUTH_SOCK: env.SSH_AUTH_SOCK ?? "",
      DBUS_SESSION_BUS_ADDRESS: env.DBUS_SESSION_BUS_ADDRESS ?? "",
    },
    missing,
  };
}

export interface ExportSessionOptions {
  env: Environment;
  outputPath: string;
  /** Export empty values instead of failing when a variable is unset */
  allowEmpty?: boolean;
  now?: Date;
}

export interface ExportSessionResult {
  path: string;
  variables: SessionVariables;
  missing: SessionVariableName[];
}

/**
 * Write the session script, replacing any previous one. The file is always
 * left at mode 0600.
 */
export async function exportSessionVariables(
  options: ExportSessionOptions,
): Promise<ExportSessionResult> {
  const { variables, missing } = pickSessionVariables(options.env);

  if (missing.length > 0 && !options.allowEmpty) {
    throw new SessionError(
      `Session variable(s) not set: ${missing.join(", ")}. Run from the desktop session or pass --allow-empty.`,
    );
  }

  const target = path.resolve(options.outputPath);
  const content = renderSessionScript(variables, options.now ?? new Date());

  await fs.mkdir(path.dirname(target), { recursive: true, mode: 0o700 });

  const tempPath = `${target}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, content, { mode: SESSION_SCRIPT_MODE });
    await fs.chmod(tempPath, SESSION_SCRIPT_MODE);
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return { path: target, variables, missing };
}

/**
 * Load the snapshot written by exportSessionVariables
 */
export async function readSessionScript(scriptPath: string): Promise<SessionVariables> {
  const content = await readOptionalFile(scriptPath);
  if (content === null) {
    throw new SessionError(`Session script not found: ${scriptPath}`);
  }

  const assignments = parseSessionScript(content);
  return {
    SSH_AUTH_SOCK: assignments.SSH_AUTH_SOCK ?? "",
    DBUS_SESSION_BUS_ADDRESS: assignments.DBUS_SESSION_BUS_ADDRESS ?? "",
  };
}

/**
 * Environment additions for child processes: only the non-empty variables
 */
export function sessionEnvironment(variables: SessionVariables): Environment {
  const env: Environment = {};
  for (const name of SESSION_VARIABLE_NAMES) {
    if (variables[name]) {
      env[name] = variables[name];
    }
  }
  return env;
}
