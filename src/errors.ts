/**
 * Error taxonomy for backup runs
 */

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  config: 2,
  networkPolicy: 3,
  auth: 4,
  backupEngine: 5,
  logArchive: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class BorgrunError extends Error {
  code: string;
  exitCode: ExitCode;

  constructor(message: string, code = "ERR_BORGRUN", exitCode: ExitCode = EXIT_CODES.unexpected) {
    super(message);
    this.name = "BorgrunError";
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends BorgrunError {
  constructor(message: string) {
    super(message, "ERR_CONFIG", EXIT_CODES.config);
    this.name = "ConfigError";
  }
}

/** Gateway not on the whitelist, or not determinable at all */
export class NetworkPolicyError extends BorgrunError {
  constructor(message: string) {
    super(message, "ERR_NETWORK_POLICY", EXIT_CODES.networkPolicy);
    this.name = "NetworkPolicyError";
  }
}

export class AuthError extends BorgrunError {
  constructor(message: string) {
    super(message, "ERR_AUTH", EXIT_CODES.auth);
    this.name = "AuthError";
  }
}

export class BackupEngineError extends BorgrunError {
  constructor(message: string) {
    super(message, "ERR_BACKUP_ENGINE", EXIT_CODES.backupEngine);
    this.name = "BackupEngineError";
  }
}

export class LogArchiveError extends BorgrunError {
  constructor(message: string) {
    super(message, "ERR_LOG_ARCHIVE", EXIT_CODES.logArchive);
    this.name = "LogArchiveError";
  }
}

/** Raised by export-session when a required session variable is unset */
export class SessionError extends BorgrunError {
  constructor(message: string) {
    super(message, "ERR_SESSION", EXIT_CODES.config);
    this.name = "SessionError";
  }
}

export function toExitCode(error: unknown): ExitCode {
  return error instanceof BorgrunError ? error.exitCode : EXIT_CODES.unexpected;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
