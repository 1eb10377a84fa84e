import { parseArgs } from "node:util";
import { type RunDependencies, runProfile, STEP_LABELS } from "../../core";
import { errorMessage, EXIT_CODES, toExitCode } from "../../errors";
import type { RunOutcome } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { formatDuration } from "../../utils/format";
import { color, formatStepStatus, formatSummary, type SummaryItem, ui } from "../ui";

export type BackupCommandDependencies = Partial<RunDependencies>;

export async function backupCommand(
  args: string[],
  deps: BackupCommandDependencies = {},
): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      "dry-run": { type: "boolean", short: "d", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const profileDir = positionals[0];
  if (!profileDir || positionals.length > 1) {
    ui.error("Expected exactly one profile directory");
    ui.info(`Run ${color.cyan("borgrun backup --help")} for usage`);
    return EXIT_CODES.unexpected;
  }

  const dryRun = values["dry-run"];
  ui.intro("borgrun backup");
  if (dryRun) {
    ui.warn("[DRY RUN] borg runs with --dry-run, compact is skipped");
  }

  let outcome: RunOutcome;
  try {
    outcome = await runProfile(
      { profileDir, dryRun },
      {
        env: process.env,
        console: {
          stdout: (chunk) => process.stdout.write(chunk),
          stderr: (chunk) => process.stderr.write(chunk),
        },
        ...deps,
      },
    );
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    ui.cancel("Run aborted");
    return toExitCode(error);
  }

  ui.note(formatSummary(summarize(outcome)), "Run Summary");

  if (outcome.error) {
    ui.error(`Backup failed: ${outcome.error.message}`);
  } else if (outcome.logArchiveError) {
    ui.warn(`Backup complete, but log archiving failed: ${outcome.logArchiveError.message}`);
  }

  if (outcome.state === "DONE") {
    ui.outro(dryRun ? "Dry run complete!" : "Backup complete!");
  } else {
    ui.cancel(`Run aborted (exit ${outcome.exitCode})`);
  }

  return outcome.exitCode;
}

function summarize(outcome: RunOutcome): SummaryItem[] {
  const items: SummaryItem[] = outcome.steps.map((step) => ({
    label: STEP_LABELS[step.operation],
    value: formatStepStatus(step),
  }));

  items.push(
    { label: "Stopped at", value: outcome.state === "ABORTED" ? lastState(outcome) : null },
    { label: "Duration", value: formatDuration(outcome.durationMs) },
    { label: "Exit code", value: outcome.exitCode },
  );
  return items;
}

function lastState(outcome: RunOutcome): string {
  // reached ends with ABORTED; the state before it is where the run stopped
  return outcome.reached[outcome.reached.length - 2] ?? "START";
}

function printHelp(): void {
  console.log(`
${color.bold("borgrun backup")} - Run a backup profile

${color.dim("USAGE:")}
  borgrun backup <global-dir>/<profile> [OPTIONS]
  borgrun <global-dir>/<profile> [OPTIONS]

${color.dim("OPTIONS:")}
  -d, --dry-run           Pass --dry-run to borg and --debug to logrotate
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("STEPS:")}
  1. Load <global-dir>/config.yaml and <profile>/profile.yaml
  2. Check the default gateway against network.allowedGateways
  3. Look up the repository passphrase in the secret store
  4. borg create, borg prune, borg compact (stops at the first failure)
  5. Rotate the run log with logrotate

${color.dim("EXIT CODES:")}
  0  success            4  secret store lookup failed
  2  configuration      5  borg failed
  3  network policy     6  log rotation failed

${color.dim("EXAMPLES:")}
  borgrun ~/.config/borgrun/nas               # Back up to the "nas" profile
  borgrun backup ~/.config/borgrun/nas -d     # Preview
`);
}
