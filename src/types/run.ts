/**
 * Run pipeline type definitions
 */

import type { BorgrunError, ExitCode } from "../errors";

export type RunState =
  | "START"
  | "ConfigLoaded"
  | "NetworkChecked"
  | "CredentialObtained"
  | "ArchiveCreated"
  | "Pruned"
  | "Compacted"
  | "LogArchived"
  | "DONE"
  | "ABORTED";

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: BorgrunError };

export type BorgOperation = "create" | "prune" | "compact";

export type StepStatus = "success" | "warning" | "error";

export interface BorgStepResult {
  operation: BorgOperation;
  args: string[];
  exitCode: number;
  status: StepStatus;
  durationMs: number;
}

export interface RunOutcome {
  state: "DONE" | "ABORTED";
  /** Every state entered, in order */
  reached: RunState[];
  exitCode: ExitCode;
  steps: BorgStepResult[];
  error: BorgrunError | null;
  /** Set when log rotation failed after the backup stage */
  logArchiveError: BorgrunError | null;
  durationMs: number;
}

export interface SessionVariables {
  SSH_AUTH_SOCK: string;
  DBUS_SESSION_BUS_ADDRESS: string;
}

export type Environment = Record<string, string | undefined>;
