import { describe, expect, test } from "vitest";
import {
  CLI_NAME,
  formatOutcome,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  ui,
  VERSION,
} from "../../src/cli/ui";

function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

describe("CLI UI utilities", () => {
  test("ui object exposes exactly the output and prompt helpers", () => {
    expect(Object.keys(ui).sort()).toEqual([
      "cancel",
      "confirm",
      "error",
      "info",
      "intro",
      "isCancel",
      "message",
      "note",
      "outro",
      "spinner",
      "step",
      "success",
      "warn",
    ]);
    for (const fn of Object.values(ui)) {
      expect(typeof fn).toBe("function");
    }
  });

  test("exposes the name and package version", () => {
    expect(CLI_NAME).toBe("config-backup");
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });

  describe("formatSummary", () => {
    test("aligns labels and drops empty values", () => {
      const summary = formatSummary([
        { label: "Run ID", value: "abc" },
        { label: "Archive", value: null },
        { label: "Failed", value: 0 },
      ]);

      expect(stripAnsi(summary)).toBe("Run ID   abc\nFailed   0");
    });
  });

  describe("tables", () => {
    test("pads columns to their widths", () => {
      expect(stripAnsi(formatTableRow(["a", "bb"], [3, 4]))).toBe("a   │ bb  ");
    });

    test("draws a separator matching the widths", () => {
      expect(stripAnsi(formatTableSeparator([2, 3]))).toBe("───┼────");
    });
  });

  describe("formatOutcome", () => {
    test("labels each outcome", () => {
      expect(stripAnsi(formatOutcome("succeeded"))).toBe("OK");
      expect(stripAnsi(formatOutcome("succeeded_after_retry"))).toBe("RECOVERED");
      expect(stripAnsi(formatOutcome("failed"))).toBe("FAILED");
    });
  });

  describe("formatTimestamp", () => {
    test("formats local time", () => {
      expect(formatTimestamp(new Date(2024, 0, 5, 3, 4, 5))).toBe("2024-01-05 03:04:05");
    });

    test("handles a missing date", () => {
      expect(formatTimestamp(null)).toBe("unknown");
    });
  });
});
