import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config";
import { listArchives } from "../../core";
import type { ArchiveRecord } from "../../types";
import { errorMessage } from "../../utils/errors";
import { setLogLevel } from "../../utils/logger";
import { formatBytes } from "../../utils/naming";
import { loadCommandConfig } from "../config";
import {
  CLI_NAME,
  color,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  TABLE_WIDTHS,
  ui,
} from "../ui";

const WIDTHS = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.created, TABLE_WIDTHS.size];

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
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

    let archives = await listArchives(config.archiveDir, config.archive.prefix);

    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      archives = archives.slice(0, limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(archives.map(toJson), null, 2));
        return 0;
      default:
        ui.intro(`${CLI_NAME} list`);

        if (archives.length === 0) {
          ui.info(`No backups found in ${config.archiveDir}`);
          ui.outro("Done");
          return 0;
        }

        printTable(archives);

        ui.outro(`${archives.length} backup(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

export function toJson(archive: ArchiveRecord): Record<string, string | number | null> {
  return {
    filename: archive.filename,
    path: archive.path,
    createdAt: archive.createdAt ? archive.createdAt.toISOString() : null,
    sizeBytes: archive.sizeBytes,
  };
}

function printTable(archives: ArchiveRecord[]): void {
  ui.step("Backups:");
  console.log(formatTableRow(["Archive", "Created", "Size"], WIDTHS));
  console.log(formatTableSeparator(WIDTHS));

  for (const archive of archives) {
    console.log(
      formatTableRow(
        [archive.filename, formatTimestamp(archive.createdAt), formatBytes(archive.sizeBytes)],
        WIDTHS,
      ),
    );
  }

  console.log(formatTableSeparator(WIDTHS));
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} list`)} - List existing backups, newest first

${color.dim("USAGE:")}
  ${CLI_NAME} list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./config-backup.config.yaml)
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json (default: table)
      --archive-dir <path>  Archive directory (overrides archiveDir)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  ${CLI_NAME} list                        # List all backups
  ${CLI_NAME} list -n 3                   # List the 3 newest backups
  ${CLI_NAME} list --format json          # Output as JSON (for scripting)
`);
}
