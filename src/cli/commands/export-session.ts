import { parseArgs } from "node:util";
import { errorMessage, toExitCode } from "../../errors";
import {
  defaultSessionScriptPath,
  exportSessionVariables,
  SESSION_VARIABLE_NAMES,
} from "../../system";
import type { Environment } from "../../types";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export interface ExportSessionCommandDependencies {
  env?: Environment;
  now?: Date;
}

export async function exportSessionCommand(
  args: string[],
  deps: ExportSessionCommandDependencies = {},
): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      output: { type: "string", short: "o" },
      "allow-empty": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const env = deps.env ?? process.env;

  try {
    const result = await exportSessionVariables({
      env,
      outputPath: values.output ?? defaultSessionScriptPath(env),
      allowEmpty: values["allow-empty"],
      now: deps.now,
    });

    ui.note(
      formatSummary(
        SESSION_VARIABLE_NAMES.map((name) => ({
          label: name,
          value: result.missing.includes(name) ? color.yellow("(empty)") : color.green("set"),
        })),
      ),
      result.path,
    );

    if (result.missing.length > 0) {
      ui.warn(`Exported empty value(s) for ${result.missing.join(", ")}`);
    }
    ui.success(`Session script written to ${result.path}`);
    return 0;
  } catch (error) {
    ui.error(`Export failed: ${errorMessage(error)}`);
    return toExitCode(error);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgrun export-session")} - Snapshot SSH agent and D-Bus session variables

${color.dim("USAGE:")}
  borgrun export-session [OPTIONS]

Writes SSH_AUTH_SOCK and DBUS_SESSION_BUS_ADDRESS from the current desktop
session into a script (mode 0600) that backup runs read back. Run it from
your session's autostart.

${color.dim("OPTIONS:")}
  -o, --output <path>     Script path (default: ~/.config/borgrun/session-env.sh)
      --allow-empty       Export empty values instead of failing on unset variables
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("PROFILE:")}
  Point a profile at the script with ${color.cyan("sessionScript: ~/.config/borgrun/session-env.sh")}
`);
}
