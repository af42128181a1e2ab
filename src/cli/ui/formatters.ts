/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { BackupOutcome } from "../../types";

export const TABLE_WIDTHS = {
  archiveName: 45,
  created: 19,
  size: 10,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

const OUTCOME_LABELS: Record<BackupOutcome, string> = {
  succeeded: "OK",
  succeeded_after_retry: "RECOVERED",
  failed: "FAILED",
};

export function formatOutcome(outcome: BackupOutcome): string {
  const label = OUTCOME_LABELS[outcome];
  switch (outcome) {
    case "succeeded":
      return color.green(label);
    case "succeeded_after_retry":
      return color.yellow(label);
    case "failed":
      return color.red(label);
  }
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date | null): string {
  if (!date) return "unknown";
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(
    date.getHours(),
  )}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
