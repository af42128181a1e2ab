/**
 * Archive naming utilities
 *
 * Archives are named `<prefix><YYYY-MM-DD_HH-MM-SS>.zip` in local time. The
 * timestamp is fixed-width and zero-padded, so sorting names sorts by age.
 */

export { formatBytes, formatDuration } from "./format";

export const DEFAULT_ARCHIVE_PREFIX = "docker_configs_backup_";
export const ARCHIVE_EXTENSION = ".zip";

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number = 2): string {
  return value.toString().padStart(width, "0");
}

export function formatArchiveTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function generateArchiveName(
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
  date: Date = new Date(),
): string {
  return `${prefix}${formatArchiveTimestamp(date)}${ARCHIVE_EXTENSION}`;
}

/**
 * Whether a filename belongs to the archive set managed by rotation.
 * Only prefix and extension are checked.
 */
export function isArchiveName(
  filename: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): boolean {
  return (
    filename.startsWith(prefix) &&
    filename.endsWith(ARCHIVE_EXTENSION) &&
    filename.length > prefix.length + ARCHIVE_EXTENSION.length
  );
}

/**
 * Decode the creation time embedded in an archive name
 */
export function parseArchiveTimestamp(
  filename: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): Date | null {
  if (!isArchiveName(filename, prefix)) return null;

  const stamp = filename.slice(prefix.length, -ARCHIVE_EXTENSION.length);
  const match = stamp.match(TIMESTAMP_PATTERN);
  if (!match) return null;

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  // Reject values Date silently rolls over, such as month 13
  if (formatArchiveTimestamp(date) !== stamp) return null;
  return date;
}
