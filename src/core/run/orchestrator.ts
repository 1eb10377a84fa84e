/**
 * Backup run orchestration
 *
 * START → ConfigLoaded → NetworkChecked → CredentialObtained → ArchiveCreated
 *       → Pruned → Compacted → LogArchived → DONE, or ABORTED at the first
 * failing stage. Log rotation is attempted whenever the backup stage started.
 */

import {
  AuthError,
  BackupEngineError,
  type BorgrunError,
  ConfigError,
  EXIT_CODES,
  type ExitCode,
  LogArchiveError,
  NetworkPolicyError,
} from "../../errors";
import { loadProfile as defaultLoadProfile } from "../../config/loader";
import { type GatewayResolver, IpRouteGatewayResolver } from "../../system/gateway";
import { type CommandRunner, type OutputTee, runCommand } from "../../system/process";
import { type SecretStore, SecretToolStore } from "../../system/secret-store";
import { readSessionScript, sessionEnvironment } from "../../system/session";
import type {
  BorgOperation,
  BorgStepResult,
  Environment,
  Profile,
  RunOutcome,
  RunState,
} from "../../types";
import { formatDuration } from "../../utils/format";
import { logger, setLogSink } from "../../utils/logger";
import { runBorgSequence } from "../borg/runner";
import { archiveRunLog } from "../logrotate/archiver";
import { checkNetwork } from "./guard";
import { attempt } from "./result";
import { RunLog } from "./run-log";

export interface RunDependencies {
  /** Base environment for child processes; never read from process.env here */
  env: Environment;
  runner?: CommandRunner;
  /** Defaults to iproute2 through `runner` */
  gateway?: GatewayResolver;
  /** Defaults to secret-tool (per `secret.command`) through `runner` */
  secrets?: SecretStore;
  /** Console side of the child output tee */
  console?: OutputTee;
  loadProfile?: (profileDir: string, env: Environment) => Promise<Profile>;
}

export interface RunOptions {
  profileDir: string;
  dryRun?: boolean;
}

const STATE_AFTER_STEP: Record<BorgOperation, RunState> = {
  create: "ArchiveCreated",
  prune: "Pruned",
  compact: "Compacted",
};

/** Environment variables stripped so borg only sees the looked-up passphrase */
const PASSPHRASE_OVERRIDES = ["BORG_PASSCOMMAND", "BORG_PASSPHRASE_FD", "BORG_NEW_PASSPHRASE"];

export function buildChildEnvironment(
  base: Environment,
  passphrase: string,
  session: Environment,
): Environment {
  const env: Environment = { ...base };
  for (const name of PASSPHRASE_OVERRIDES) {
    delete env[name];
  }
  return { ...env, ...session, BORG_PASSPHRASE: passphrase };
}

class RunTracker {
  readonly reached: RunState[] = ["START"];
  private readonly startTime = Date.now();

  enter(state: RunState): void {
    this.reached.push(state);
    logger.debug(`Run state: ${state}`);
  }

  finish(
    error: BorgrunError | null,
    steps: BorgStepResult[],
    logArchiveError: BorgrunError | null = null,
  ): RunOutcome {
    let exitCode: ExitCode = EXIT_CODES.success;
    if (error) {
      exitCode = error.exitCode;
    } else if (logArchiveError) {
      exitCode = logArchiveError.exitCode;
    }

    const state = error || logArchiveError ? "ABORTED" : "DONE";
    this.enter(state);

    return {
      state,
      reached: this.reached,
      exitCode,
      steps,
      error,
      logArchiveError,
      durationMs: Date.now() - this.startTime,
    };
  }
}

interface StageOutcome {
  /** Whether borg was started, which is what makes log rotation due */
  started: boolean;
  steps: BorgStepResult[];
  error: BorgrunError | null;
}

export async function runProfile(options: RunOptions, deps: RunDependencies): Promise<RunOutcome> {
  const runner = deps.runner ?? runCommand;
  const load = deps.loadProfile ?? defaultLoadProfile;
  const dryRun = options.dryRun ?? false;
  const tracker = new RunTracker();

  // Configuration
  const loaded = await attempt(
    () => load(options.profileDir, deps.env),
    (message) => new ConfigError(message),
  );
  if (!loaded.ok) {
    logger.error(loaded.error.message);
    return tracker.finish(loaded.error, []);
  }
  const profile = loaded.value;
  tracker.enter("ConfigLoaded");

  // Run log; refusals from the later stages are written to it as well
  const opened = await attempt(
    () => RunLog.open(profile.config.logFile),
    (message) => new BackupEngineError(`Cannot open run log: ${message}`),
  );
  if (!opened.ok) {
    logger.error(opened.error.message);
    return tracker.finish(opened.error, []);
  }
  const runLog = opened.value;
  runLog.line(`--- borgrun ${profile.name} started ${new Date().toISOString()}${dryRun ? " [DRY RUN]" : ""} ---`);
  setLogSink((line) => runLog.line(line));
  logger.info(`Loaded profile "${profile.name}" (repository ${profile.config.repository})`);

  let stages: StageOutcome;
  try {
    stages = await runStages(profile, runLog, { runner, dryRun, deps, tracker });
    if (stages.error) {
      logger.error(stages.error.message);
    }
  } finally {
    setLogSink(null);
  }

  const logFailure = await runLog.close();
  if (logFailure) {
    logger.error(logFailure.message);
  }
  const error = stages.error ?? logFailure;

  if (!stages.started) {
    return tracker.finish(error, []);
  }

  // Log rotation runs whatever the backup outcome was
  const rotated = await attempt(
    () =>
      archiveRunLog(profile, {
        runner,
        env: deps.env,
        tee: deps.console,
        dryRun,
      }),
    (message) => new LogArchiveError(message),
  );

  if (!rotated.ok) {
    logger.error(`Log archiving failed: ${rotated.error.message}`);
  } else if (!error) {
    tracker.enter("LogArchived");
  }

  const outcome = tracker.finish(error, stages.steps, rotated.ok ? null : rotated.error);
  logger.info(`Run ${outcome.state === "DONE" ? "finished" : "aborted"} in ${formatDuration(outcome.durationMs)}`);
  return outcome;
}

interface StageContext {
  runner: CommandRunner;
  dryRun: boolean;
  deps: RunDependencies;
  tracker: RunTracker;
}

function refused(error: BorgrunError): StageOutcome {
  return { started: false, steps: [], error };
}

async function runStages(profile: Profile, runLog: RunLog, context: StageContext): Promise<StageOutcome> {
  const { runner, dryRun, deps, tracker } = context;

  // Network
  const gateway = deps.gateway ?? new IpRouteGatewayResolver(runner);
  const network = await attempt(
    () => checkNetwork(profile.config.network, gateway),
    (message) => new NetworkPolicyError(message),
  );
  if (!network.ok) return refused(network.error);
  tracker.enter("NetworkChecked");

  // Credential
  const secrets = deps.secrets ?? new SecretToolStore(runner, profile.config.secret.command);
  const credential = await attempt(
    () => secrets.lookup(profile.config.secret.attributes),
    (message) => new AuthError(message),
  );
  if (!credential.ok) return refused(credential.error);
  tracker.enter("CredentialObtained");

  // Session variables
  const scriptPath = profile.config.sessionScript;
  const session = await attempt(
    async (): Promise<Environment> =>
      scriptPath ? sessionEnvironment(await readSessionScript(scriptPath)) : {},
    (message) => new ConfigError(message),
  );
  if (!session.ok) return refused(session.error);
  if (scriptPath) {
    logger.debug(`Session variables from ${scriptPath}: ${Object.keys(session.value).join(", ") || "none"}`);
  }

  // Backup
  const backup = await attempt(
    () =>
      runBorgSequence({
        profile,
        env: buildChildEnvironment(deps.env, credential.value, session.value),
        runner,
        tee: runLog.tee(deps.console),
        dryRun,
        onStepComplete: (step) => tracker.enter(STATE_AFTER_STEP[step.operation]),
      }),
    (message) => new BackupEngineError(message),
  );
  if (!backup.ok) {
    return { started: true, steps: [], error: backup.error };
  }
  return { started: true, ...backup.value };
}
