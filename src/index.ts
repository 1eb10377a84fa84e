#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../package.json";
import { backupCommand } from "./cli/commands/backup";
import { exportSessionCommand } from "./cli/commands/export-session";
import { plotCommand } from "./cli/commands/plot";

const VERSION = pkg.version;

function printHelp(): void {
  p.intro(`${color.cyan("borgrun")} ${color.dim(`v${VERSION}`)} - BorgBackup profile runner`);

  p.note(
    `${color.cyan("backup")}           Run a backup profile (default command)
${color.cyan("export-session")}   Snapshot SSH agent / D-Bus variables for unattended runs
${color.cyan("plot")}             Draw archive timestamps from borg list`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `borgrun ~/.config/borgrun/nas            ${color.dim("# Back up the nas profile")}
borgrun backup ~/.config/borgrun/nas -d  ${color.dim("# Dry run")}
borgrun export-session                   ${color.dim("# From the desktop session autostart")}
borgrun plot ssh://nas/./backups         ${color.dim("# Archive timeline")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("borgrun <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 1;
  }

  const command = args[0] ?? "";
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "export-session":
      return exportSessionCommand(commandArgs);

    case "plot":
      return plotCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      // `borgrun <profile-dir>` is shorthand for `borgrun backup <profile-dir>`
      if (!command.startsWith("-")) {
        return backupCommand(args);
      }
      console.error(`${color.red("Error:")} Unknown option: ${command}`);
      console.error(`Run ${color.cyan("borgrun --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
