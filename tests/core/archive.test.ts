import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createArchive } from "../../src/core";

const RUN_DATE = new Date(2024, 0, 5, 3, 4, 5);

describe("createArchive", () => {
  let tempDir: string;
  let stagingDir: string;
  let outputDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-backup-archive-"));
    stagingDir = path.join(tempDir, "temp");
    outputDir = path.join(tempDir, "archives");

    await fs.mkdir(path.join(stagingDir, "svcA"), { recursive: true });
    await fs.mkdir(path.join(stagingDir, "svcB", "sub"), { recursive: true });
    await fs.writeFile(path.join(stagingDir, "svcA", "config.yml"), "port: 8080\n");
    await fs.writeFile(path.join(stagingDir, "svcB", "sub", "data.txt"), "nested content");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test("zips staging children as top-level entries", async () => {
    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.filename).toBe("docker_configs_backup_2024-01-05_03-04-05.zip");
    expect(result.value.path).toBe(path.join(outputDir, "docker_configs_backup_2024-01-05_03-04-05.zip"));
    expect(result.value.createdAt).toEqual(RUN_DATE);

    const zip = new AdmZip(result.value.path);
    const names = zip.getEntries().map((e) => e.entryName);
    expect(names).toContain("svcA/config.yml");
    expect(names).toContain("svcB/sub/data.txt");
    expect(names.some((n) => n.startsWith("temp/"))).toBe(false);
    expect(zip.readAsText("svcA/config.yml")).toBe("port: 8080\n");
  });

  test("stores symlinks as link entries, dangling ones included", async () => {
    await fs.symlink("config.yml", path.join(stagingDir, "svcA", "link.yml"));
    await fs.symlink("does-not-exist", path.join(stagingDir, "svcA", "dangling"));

    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const zip = new AdmZip(result.value.path);
    for (const [name, target] of [
      ["svcA/link.yml", "config.yml"],
      ["svcA/dangling", "does-not-exist"],
    ] as const) {
      const entry = zip.getEntry(name);
      expect(entry).not.toBeNull();
      if (!entry) return;
      expect((entry.header.attr >>> 16) & 0o170000).toBe(0o120000);
      expect(entry.getData().toString("utf8")).toBe(target);
    }
  });

  test("reports the archive size", async () => {
    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.sizeBytes).toBe((await fs.stat(result.value.path)).size);
    expect(result.value.sizeBytes).toBeGreaterThan(0);
  });

  test("removes the staging directory after success", async () => {
    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(true);
    await expect(fs.access(stagingDir)).rejects.toThrow();
  });

  test("uses a custom prefix", async () => {
    const result = await createArchive(stagingDir, outputDir, { prefix: "configs-", date: RUN_DATE });

    expect(result.ok && result.value.filename).toBe("configs-2024-01-05_03-04-05.zip");
  });

  test("overwrites an archive from the same second", async () => {
    await fs.mkdir(outputDir, { recursive: true });
    const existing = path.join(outputDir, "docker_configs_backup_2024-01-05_03-04-05.zip");
    await fs.writeFile(existing, "old archive");

    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(true);
    expect(new AdmZip(existing).getEntries().length).toBeGreaterThan(0);
  });

  test("preserves staging when the archive cannot be written", async () => {
    // A file where the output directory should be
    await fs.writeFile(outputDir, "in the way");

    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("archive_error");
    expect(result.error.stagingPreserved).toBe(true);
    expect(await fs.readFile(path.join(stagingDir, "svcA", "config.yml"), "utf8")).toBe("port: 8080\n");
  });

  test("fails without hanging when the archive file cannot be opened", async () => {
    // A directory where the archive file should be
    const archivePath = path.join(outputDir, "docker_configs_backup_2024-01-05_03-04-05.zip");
    await fs.mkdir(archivePath, { recursive: true });

    const result = await createArchive(stagingDir, outputDir, { date: RUN_DATE });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.cause).toContain("EISDIR");
    expect((await fs.stat(archivePath)).isDirectory()).toBe(true);
    expect(await fs.readFile(path.join(stagingDir, "svcA", "config.yml"), "utf8")).toBe("port: 8080\n");
  });

  test("refuses an output directory inside staging", async () => {
    const result = await createArchive(stagingDir, path.join(stagingDir, "out"), { date: RUN_DATE });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "archive_error",
        cause: `Archive directory '${path.join(stagingDir, "out")}' must not be inside the staging directory`,
        stagingPreserved: true,
      },
    });
    expect((await fs.readdir(stagingDir)).sort()).toEqual(["svcA", "svcB"]);
  });
});
