#!/usr/bin/env node

import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { listCommand } from "./cli/commands/list";
import { CLI_NAME, ui, VERSION } from "./cli/ui";

function printHelp(): void {
  ui.intro(`${color.cyan(CLI_NAME)} ${color.dim(`v${VERSION}`)} - Docker Compose configuration backups`);

  ui.note(
    `${color.cyan("backup")}      Back up all configuration directories into one archive
${color.cyan("cleanup")}     Delete archives beyond the retention count
${color.cyan("list")}        List existing archives`,
    "Commands",
  );

  ui.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  ui.note(
    `${CLI_NAME} backup                    ${color.dim("# Run a backup")}
${CLI_NAME} backup --dry-run          ${color.dim("# Preview a backup")}
${CLI_NAME} cleanup --dry-run         ${color.dim("# Preview cleanup")}
${CLI_NAME} list                      ${color.dim("# List all backups")}`,
    "Examples",
  );

  ui.outro(`Run ${color.cyan(`${CLI_NAME} <command> --help`)} for command details`);
}

function printVersion(): void {
  console.log(`${CLI_NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${CLI_NAME} --help`)} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
