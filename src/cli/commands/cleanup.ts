import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { rotateArchives } from "../../core";
import { errorMessage } from "../../utils/errors";
import { setLogLevel } from "../../utils/logger";
import { applyLoggingConfig, loadCommandConfig } from "../config";
import { CLI_NAME, color, formatSummary, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
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

    const keepCount = config.retention.keepCount;
    const rotateOptions = { prefix: config.archive.prefix };

    ui.intro(`${CLI_NAME} cleanup`);

    // Preview what will be deleted first
    const preview = await rotateArchives(config.archiveDir, keepCount, {
      ...rotateOptions,
      dryRun: true,
    });

    if (preview.deleted.length === 0) {
      ui.success(`No backups need to be cleaned up (${preview.kept.length} kept, limit ${keepCount})`);
      ui.outro("Nothing to do");
      return 0;
    }

    ui.step(`Found ${preview.deleted.length} backup(s) to delete:`);
    for (const filename of preview.deleted) {
      ui.message(`  ${color.dim("•")} ${filename}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${preview.deleted.length} backup(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Cleaning up old backups...");
    const result = await rotateArchives(config.archiveDir, keepCount, rotateOptions);
    s.stop("Cleanup complete");

    ui.step("Deletions:");
    for (const filename of result.deleted) {
      ui.message(`  [${color.green("OK")}] ${filename}`);
    }
    for (const failure of result.errors) {
      ui.message(`  [${color.red("FAILED")}] ${failure.filename}`);
      ui.error(`         ${failure.cause}`);
    }

    ui.note(
      formatSummary([
        { label: "Kept", value: result.kept.length },
        { label: "Deleted", value: result.deleted.length },
        { label: "Failed", value: result.errors.length },
      ]),
      "Cleanup Summary",
    );

    if (result.errors.length > 0) {
      ui.outro("Cleanup finished with warnings");
      return 1;
    }

    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    ui.error(`Cleanup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} cleanup`)} - Delete the oldest archives beyond the retention count

${color.dim("USAGE:")}
  ${CLI_NAME} cleanup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./config-backup.config.yaml)
      --keep <n>          Number of archives to keep (overrides retention.keepCount)
      --archive-dir <path>  Archive directory (overrides archiveDir)
      --dry-run           Show what would be deleted without doing it
      --force             Skip confirmation prompts
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("NOTES:")}
  Only regular files named <prefix>YYYY-MM-DD_HH-MM-SS.zip are considered.
  Other files in the archive directory are never touched.

${color.dim("EXAMPLES:")}
  ${CLI_NAME} cleanup                     # Cleanup with confirmation
  ${CLI_NAME} cleanup --keep 3 --force    # Keep the 3 newest, no prompt
  ${CLI_NAME} cleanup --dry-run           # Preview what would be deleted
`);
}
