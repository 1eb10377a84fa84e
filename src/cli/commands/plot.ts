import * as fs from "node:fs/promises";
import { parseArgs } from "node:util";
import { loadProfile as defaultLoadProfile } from "../../config";
import { buildChildEnvironment, buildListArgs, parseBorgListing, renderTimeline } from "../../core";
import { errorMessage } from "../../errors";
import {
  type CommandRunner,
  readSessionScript,
  runCommand,
  type SecretStore,
  SecretToolStore,
  sessionEnvironment,
} from "../../system";
import type { Environment, Profile } from "../../types";
import { formatDateTime } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, ui } from "../ui";

export interface PlotCommandDependencies {
  runner?: CommandRunner;
  env?: Environment;
  /** Defaults to secret-tool (per the profile's `secret.command`) */
  secrets?: SecretStore;
  loadProfile?: (profileDir: string, env: Environment) => Promise<Profile>;
  readStdin?: () => Promise<string>;
  /** Receives each rendered line */
  print?: (line: string) => void;
}

async function readProcessStdin(): Promise<string> {
  let content = "";
  process.stdin.setEncoding("utf8");
  for await (const chunk of process.stdin) {
    content += String(chunk);
  }
  return content;
}

export async function plotCommand(args: string[], deps: PlotCommandDependencies = {}): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      input: { type: "string", short: "i" },
      profile: { type: "string", short: "p" },
      borg: { type: "string" },
      names: { type: "boolean", short: "n", default: false },
      "no-color": { type: "boolean", default: false },
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

  const repository = positionals[0];
  const print = deps.print ?? ((line: string) => console.log(line));

  try {
    let listing: string;
    if (values.input === "-") {
      listing = await (deps.readStdin ?? readProcessStdin)();
    } else if (values.input) {
      listing = await fs.readFile(values.input, "utf8");
    } else if (values.profile) {
      const runner = deps.runner ?? runCommand;
      const env = deps.env ?? process.env;
      const profile = await (deps.loadProfile ?? defaultLoadProfile)(values.profile, env);
      const { config } = profile;
      const secrets = deps.secrets ?? new SecretToolStore(runner, config.secret.command);
      const passphrase = await secrets.lookup(config.secret.attributes);
      const session = config.sessionScript
        ? sessionEnvironment(await readSessionScript(config.sessionScript))
        : {};

      const target = repository ?? config.repository;
      const result = await runner(values.borg ?? config.borg.binary, buildListArgs(target), {
        env: buildChildEnvironment(env, passphrase, session),
      });
      if (!result.success) {
        ui.error(`borg list exited with code ${result.exitCode}${result.stderr ? `: ${result.stderr}` : ""}`);
        return 1;
      }
      listing = result.stdout;
    } else if (repository) {
      const runner = deps.runner ?? runCommand;
      // borg finds the passphrase itself (BORG_PASSPHRASE or BORG_PASSCOMMAND)
      const result = await runner(values.borg ?? "borg", buildListArgs(repository), {
        env: deps.env ?? process.env,
      });
      if (!result.success) {
        ui.error(`borg list exited with code ${result.exitCode}${result.stderr ? `: ${result.stderr}` : ""}`);
        return 1;
      }
      listing = result.stdout;
    } else {
      ui.error("Give a repository, --profile <dir> or --input <file>");
      return 1;
    }

    const { entries, skipped } = parseBorgListing(listing);
    if (skipped > 0) {
      ui.warn(`Skipped ${skipped} line(s) that did not look like archives`);
    }

    const first = entries[0];
    const last = entries[entries.length - 1];
    if (!first || !last) {
      ui.info("No archives found");
      return 0;
    }

    ui.step(
      `${entries.length} archive(s), ${formatDateTime(first.time)} → ${formatDateTime(last.time)}`,
    );

    const useColor = !values["no-color"] && process.stdout.isTTY === true;
    for (const line of renderTimeline(entries, { color: useColor, names: values.names })) {
      print(line);
    }
    return 0;
  } catch (error) {
    ui.error(`Plot failed: ${errorMessage(error)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("borgrun plot")} - Draw archive timestamps as a timeline

${color.dim("USAGE:")}
  borgrun plot <repository> [OPTIONS]
  borgrun plot --profile <global-dir>/<profile> [<repository>] [OPTIONS]
  borgrun plot --input <file|-> [OPTIONS]

${color.dim("OPTIONS:")}
  -i, --input <file>      Read saved \`borg list\` output instead of running borg (- for stdin)
  -p, --profile <dir>     Use the profile's repository, passphrase and session variables
      --borg <path>       borg executable (default: the profile's borg.binary, else borg)
  -n, --names             Show archive names beside the markers
      --no-color          Disable colours
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  borgrun plot ssh://nas/./backups
  borgrun plot -p ~/.config/borgrun/nas
  borg list ssh://nas/./backups | borgrun plot -i -
`);
}
