import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import {
  BackupPreconditionError,
  createCoordinator,
  isRunSuccessful,
  listSourceEntries,
  runBackup,
  summarizeRun,
} from "../../core";
import { isDockerAvailable } from "../../docker/client";
import type { BackupConfig, RunSummary } from "../../types";
import { errorMessage } from "../../utils/errors";
import { setLogLevel } from "../../utils/logger";
import { formatDuration } from "../../utils/naming";
import { applyLoggingConfig, loadCommandConfig } from "../config";
import { CLI_NAME, color, formatOutcome, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      only: { type: "string", multiple: true },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
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

  try {
    const config = await loadCommandConfig(values.config, values);
    if (!config) {
      return 1;
    }
    applyLoggingConfig(config, values.verbose ?? false);

    ui.intro(`${CLI_NAME} backup`);

    if (values["dry-run"]) {
      return await previewBackup(config, values.only);
    }

    ui.step(`Backing up ${config.sourceDir}`);
    const summary = await runBackup(config, { only: values.only });

    printResults(summary);

    if (isRunSuccessful(summary)) {
      ui.outro("Backup complete!");
      return 0;
    }

    ui.cancel("Backup finished with errors");
    return 1;
  } catch (error) {
    if (error instanceof BackupPreconditionError) {
      ui.error(`Backup could not start: ${error.message}`);
    } else {
      ui.error(`Backup failed: ${errorMessage(error)}`);
    }
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

async function previewBackup(config: BackupConfig, only: string[] | undefined): Promise<number> {
  let entries = await listSourceEntries(config.sourceDir, config.stagingDir);
  if (only && only.length > 0) {
    entries = entries.filter((e) => only.includes(e.name));
  }

  if (entries.length === 0) {
    ui.info("No directories to back up; no archive would be created");
    ui.warn("[DRY RUN] No changes were made.");
    ui.outro("Nothing to do");
    return 0;
  }

  const coordinator = createCoordinator(config);
  ui.step(`${entries.length} director${entries.length === 1 ? "y" : "ies"} would be backed up:`);
  for (const entry of entries) {
    const managed = await coordinator.isManaged(entry.name);
    const hint = managed ? color.cyan("compose project") : color.dim("no compose project");
    ui.message(`  ${color.dim("•")} ${entry.name} ${color.dim("(")}${hint}${color.dim(")")}`);
  }

  if (!(await isDockerAvailable({ command: config.compose.command }))) {
    ui.warn(`'${config.compose.command}' is not available; locked directories could not be recovered`);
  }

  ui.note(
    formatSummary([
      { label: "Staging", value: config.stagingDir },
      { label: "Archives", value: config.archiveDir },
      { label: "Keep", value: config.retention.keepCount },
    ]),
    "Backup Plan",
  );
  ui.warn("[DRY RUN] No changes were made.");
  ui.outro("Preview complete");
  return 0;
}

function printResults(summary: RunSummary): void {
  if (summary.items.length > 0) {
    ui.step("Directories:");
    for (const item of summary.items) {
      ui.message(`  [${formatOutcome(item.outcome)}] ${item.entry.name}`);
      if (item.errorDetail) {
        ui.message(`         ${color.dim(item.errorDetail)}`);
      }
    }
  }

  if (summary.archiveError) {
    ui.error(`Archive creation failed: ${summary.archiveError.cause}`);
    if (summary.archiveError.stagingPreserved) {
      ui.info("The staged copies were kept for inspection");
    }
  }
  for (const rotationError of summary.rotationErrors) {
    ui.warn(`Could not delete ${rotationError.filename}: ${rotationError.cause}`);
  }

  const counts = summarizeRun(summary.items);
  ui.note(
    formatSummary([
      { label: "Run ID", value: summary.runId },
      { label: "Directories", value: counts.total },
      { label: "Succeeded", value: counts.succeeded },
      { label: "Recovered", value: counts.recovered },
      { label: "Failed", value: counts.failed },
      { label: "Archive", value: summary.archivePath ?? "(none)" },
      { label: "Rotated", value: summary.rotationDeleted.length },
      { label: "Duration", value: formatDuration(summary.durationMs) },
    ]),
    "Backup Summary",
  );
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} backup`)} - Back up every configuration directory into one archive

${color.dim("USAGE:")}
  ${CLI_NAME} backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./config-backup.config.yaml)
      --only <name>       Only back up this directory (can be repeated)
      --dry-run           List the directories that would be backed up
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --source-dir <path>          Directory whose subdirectories are backed up
      --staging-dir <path>         Temporary copy location (removed after zipping)
      --archive-dir <path>         Archive location (default: parent of staging dir)
      --compose-dir <path>         Directory with one Compose project per source entry
      --keep <n>                   Number of archives to keep (default: 7)
      --archive-prefix <str>       Archive filename prefix (default: docker_configs_backup_)
      --compression <0-9>          Compression level (default: 6)
      --quiescence-delay <secs>    Wait after stopping a service (default: 10)
      --log-file <path>            Append log output to this file

${color.dim("EXIT STATUS:")}
  0 when every directory was backed up and the archive was written, 1 otherwise.

${color.dim("EXAMPLES:")}
  ${CLI_NAME} backup                          # Use ./config-backup.config.yaml
  ${CLI_NAME} backup --dry-run                # Preview
  ${CLI_NAME} backup --only nginx --only db   # Selected directories only
  ${CLI_NAME} backup --source-dir ~/config --staging-dir /mnt/backups/temp --compose-dir ~/docker
`);
}
