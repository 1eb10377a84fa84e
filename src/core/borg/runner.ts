/**
 * Runs borg create → prune → compact for a profile
 */

import { BackupEngineError } from "../../errors";
import type { CommandRunner, OutputTee } from "../../system/process";
import type {
  BorgOperation,
  BorgStepResult,
  Environment,
  Profile,
  StepStatus,
} from "../../types";
import { logger } from "../../utils/logger";
import { formatDuration } from "../../utils/format";
import { buildCompactArgs, buildCreateArgs, buildPruneArgs } from "./args";

export interface BorgSequenceOptions {
  profile: Profile;
  /** Complete child environment, passphrase and session variables included */
  env: Environment;
  runner: CommandRunner;
  tee?: OutputTee;
  dryRun?: boolean;
  /** Called once a step finished and was accepted */
  onStepComplete?: (step: BorgStepResult) => void;
}

export interface BorgSequenceResult {
  steps: BorgStepResult[];
  error: BackupEngineError | null;
}

export const STEP_LABELS: Record<BorgOperation, string> = {
  create: "Backup",
  prune: "Prune",
  compact: "Compact",
};

/**
 * borg exits 0 on success, 1 on warnings and 2 or more on errors
 */
export function classifyExitCode(exitCode: number): StepStatus {
  if (exitCode === 0) return "success";
  if (exitCode === 1) return "warning";
  return "error";
}

export function describeStep(step: BorgStepResult): string {
  const label = STEP_LABELS[step.operation];
  switch (step.status) {
    case "success":
      return `${label} finished successfully`;
    case "warning":
      return `${label} finished with warnings`;
    case "error":
      return `${label} finished with errors (exit ${step.exitCode})`;
  }
}

function isAccepted(step: BorgStepResult, continueOnWarning: boolean): boolean {
  return step.status === "success" || (step.status === "warning" && continueOnWarning);
}

async function runStep(
  operation: BorgOperation,
  args: string[],
  options: BorgSequenceOptions,
): Promise<BorgStepResult> {
  const startTime = Date.now();
  const result = await options.runner(options.profile.config.borg.binary, args, {
    env: options.env,
    tee: options.tee,
    capture: false,
  });

  const step: BorgStepResult = {
    operation,
    args,
    exitCode: result.exitCode,
    status: classifyExitCode(result.exitCode),
    durationMs: Date.now() - startTime,
  };

  const message = `${describeStep(step)} in ${formatDuration(step.durationMs)}`;
  if (step.status === "success") {
    logger.info(message);
  } else if (step.status === "warning") {
    logger.warn(message);
  } else {
    logger.error(message);
  }

  return step;
}

/**
 * Stops at the first step that is not accepted; later steps are never invoked
 */
export async function runBorgSequence(options: BorgSequenceOptions): Promise<BorgSequenceResult> {
  const { config } = options.profile;
  const dryRun = options.dryRun ?? false;
  const continueOnWarning = config.borg.continueOnWarning;

  const plan: Array<[BorgOperation, string[]]> = [
    ["create", buildCreateArgs(options.profile, dryRun)],
    ["prune", buildPruneArgs(config, dryRun)],
  ];
  if (dryRun) {
    logger.info("[DRY RUN] Skipping compact");
  } else {
    plan.push(["compact", buildCompactArgs(config)]);
  }

  const steps: BorgStepResult[] = [];

  for (const [operation, args] of plan) {
    if (operation === "create") {
      logger.info(`Starting backup to ${config.repository}`);
      const { excludeFile, excludePatterns } = options.profile;
      if (excludeFile) {
        logger.debug(`Excluding ${excludePatterns.length} pattern(s) listed in ${excludeFile}`);
      }
    } else if (operation === "prune") {
      logger.info(`Pruning repository ${config.repository}`);
    } else {
      logger.info(`Compacting repository ${config.repository}`);
    }

    const step = await runStep(operation, args, options);
    steps.push(step);

    if (!isAccepted(step, continueOnWarning)) {
      return {
        steps,
        error: new BackupEngineError(
          `borg ${operation} exited with code ${step.exitCode}; remaining steps skipped`,
        ),
      };
    }

    options.onStepComplete?.(step);
  }

  return { steps, error: null };
}
