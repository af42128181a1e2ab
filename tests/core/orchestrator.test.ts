import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import AdmZip from "adm-zip";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  BackupPreconditionError,
  type CopierFileSystem,
  DirectorySnapshotCopier,
  isRunSuccessful,
  nodeFileSystem,
  runBackup,
  summarizeRun,
} from "../../src/core";
import type { BackupConfig } from "../../src/types";
import { generateArchiveName } from "../../src/utils/naming";
import { FakeCoordinator } from "../helpers/fakes";

const RUN_DATE = new Date(2024, 0, 5, 3, 4, 5);
const ARCHIVE_NAME = "docker_configs_backup_2024-01-05_03-04-05.zip";

function makeConfig(root: string, overrides: Partial<BackupConfig> = {}): BackupConfig {
  return {
    version: "1",
    sourceDir: path.join(root, "config"),
    stagingDir: path.join(root, "backups", "temp"),
    archiveDir: path.join(root, "backups"),
    compose: { projectsDir: path.join(root, "docker"), command: "docker", quiescenceDelaySeconds: 10 },
    retention: { keepCount: 7 },
    archive: { prefix: "docker_configs_backup_", compression: 6 },
    logging: { level: "info" },
    ...overrides,
  };
}

/** Copier whose copyFile fails with EBUSY for the named file while `isLocked` says so */
function lockingCopier(fileName: string, isLocked: () => boolean): DirectorySnapshotCopier {
  const fileSystem: CopierFileSystem = {
    ...nodeFileSystem,
    copyFile: async (src, dest) => {
      if (isLocked() && path.basename(src) === fileName) {
        throw Object.assign(new Error("EBUSY: resource busy or locked"), { code: "EBUSY" });
      }
      await nodeFileSystem.copyFile(src, dest);
    },
  };
  return new DirectorySnapshotCopier(fileSystem);
}

describe("runBackup", () => {
  let tempDir: string;
  let config: BackupConfig;
  const sleep = vi.fn(async (_ms: number): Promise<void> => {});

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-backup-run-"));
    config = makeConfig(tempDir);
    await fs.mkdir(config.sourceDir, { recursive: true });
    sleep.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeSource(relativePath: string, content: string): Promise<void> {
    const filePath = path.join(config.sourceDir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }

  test("recovers a locked directory by stopping its service once", async () => {
    await writeSource("svcA/app.conf", "listen 80");
    await writeSource("svcB/db.sqlite", "rows");
    await writeSource("svcB/settings.json", "{}");

    let locked = true;
    const coordinator = new FakeCoordinator({
      managed: ["svcB"],
      onStop: () => {
        locked = false;
      },
    });

    const summary = await runBackup(config, {
      coordinator,
      copier: lockingCopier("db.sqlite", () => locked),
      sleep,
      now: () => RUN_DATE,
    });

    expect(summary.items.map((i) => [i.entry.name, i.outcome])).toEqual([
      ["svcA", "succeeded"],
      ["svcB", "succeeded_after_retry"],
    ]);
    expect(coordinator.calls).toEqual(["isManaged:svcB", "stop:svcB", "start:svcB"]);
    expect(sleep).toHaveBeenCalledWith(10_000);
    expect(summarizeRun(summary.items)).toEqual({ total: 2, succeeded: 1, recovered: 1, failed: 0 });
    expect(isRunSuccessful(summary)).toBe(true);

    expect(summary.archivePath).toBe(path.join(config.archiveDir, ARCHIVE_NAME));
    const zip = new AdmZip(path.join(config.archiveDir, ARCHIVE_NAME));
    expect(zip.readAsText("svcA/app.conf")).toBe("listen 80");
    expect(zip.readAsText("svcB/db.sqlite")).toBe("rows");
    expect(zip.readAsText("svcB/settings.json")).toBe("{}");

    await expect(fs.access(config.stagingDir)).rejects.toThrow();
  });

  test("an empty source creates no archive and rotates nothing", async () => {
    await fs.mkdir(config.archiveDir, { recursive: true });
    const existing = [1, 2, 3, 4, 5, 6, 7, 8, 9].map((day) =>
      generateArchiveName(undefined, new Date(2023, 5, day)),
    );
    for (const name of existing) {
      await fs.writeFile(path.join(config.archiveDir, name), "old");
    }

    const summary = await runBackup(config, { coordinator: new FakeCoordinator(), now: () => RUN_DATE });

    expect(summary.items).toEqual([]);
    expect(summary.archivePath).toBeNull();
    expect(summary.archiveError).toBeNull();
    expect(summary.rotationDeleted).toEqual([]);
    const files = (await fs.readdir(config.archiveDir)).filter((f) => f.endsWith(".zip"));
    expect(files.sort()).toEqual(existing);
  });

  test("rotates old archives after a successful archive", async () => {
    await writeSource("svcA/app.conf", "listen 80");
    await fs.mkdir(config.archiveDir, { recursive: true });
    const existing = [1, 2, 3, 4, 5, 6, 7, 8].map((day) =>
      generateArchiveName(undefined, new Date(2023, 5, day)),
    );
    for (const name of existing) {
      await fs.writeFile(path.join(config.archiveDir, name), "old");
    }

    const summary = await runBackup(config, { coordinator: new FakeCoordinator(), now: () => RUN_DATE });

    expect(summary.rotationDeleted).toEqual(existing.slice(0, 2));
    const files = (await fs.readdir(config.archiveDir)).sort();
    expect(files).toEqual([...existing.slice(2), ARCHIVE_NAME]);
  });

  test("still archives the other directories when one fails", async () => {
    await writeSource("svcA/db.sqlite", "rows");
    await writeSource("svcC/app.conf", "ok");

    const summary = await runBackup(config, {
      coordinator: new FakeCoordinator(),
      copier: lockingCopier("db.sqlite", () => true),
      sleep,
      now: () => RUN_DATE,
    });

    expect(summary.items.map((i) => i.outcome)).toEqual(["failed", "succeeded"]);
    expect(summary.items[0]?.errorDetail).toBe(
      "1 file(s) could not be copied: db.sqlite (EBUSY: resource busy or locked)",
    );
    expect(summary.archivePath).not.toBeNull();
    expect(isRunSuccessful(summary)).toBe(false);
    expect(sleep).not.toHaveBeenCalled();
  });

  test("a stale staging copy never reaches the archive when its directory fails", async () => {
    await writeSource("svcA/app.conf", "new");
    await writeSource("svcB/app.conf", "b");
    await fs.mkdir(path.join(config.stagingDir, "svcA"), { recursive: true });
    await fs.writeFile(path.join(config.stagingDir, "svcA", "app.conf"), "old");

    const unreadable = path.join(config.sourceDir, "svcA");
    const fileSystem: CopierFileSystem = {
      ...nodeFileSystem,
      readdir: async (p) => {
        if (p === unreadable) {
          throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
        }
        return nodeFileSystem.readdir(p);
      },
    };

    const summary = await runBackup(config, {
      coordinator: new FakeCoordinator(),
      copier: new DirectorySnapshotCopier(fileSystem),
      now: () => RUN_DATE,
    });

    expect(summary.items.map((i) => [i.entry.name, i.outcome])).toEqual([
      ["svcA", "failed"],
      ["svcB", "succeeded"],
    ]);
    const zip = new AdmZip(path.join(config.archiveDir, ARCHIVE_NAME));
    expect(zip.getEntry("svcA/app.conf")).toBeNull();
    expect(zip.readAsText("svcB/app.conf")).toBe("b");
  });

  test("keeps staging and skips rotation when the archive fails", async () => {
    await writeSource("svcA/app.conf", "listen 80");
    const blocked = path.join(tempDir, "archives-file");
    await fs.writeFile(blocked, "not a directory");

    const summary = await runBackup(
      { ...config, archiveDir: blocked },
      { coordinator: new FakeCoordinator(), now: () => RUN_DATE },
    );

    expect(summary.archivePath).toBeNull();
    expect(summary.archiveError?.kind).toBe("archive_error");
    expect(summary.rotationDeleted).toEqual([]);
    expect(isRunSuccessful(summary)).toBe(false);
    expect(await fs.readFile(path.join(config.stagingDir, "svcA", "app.conf"), "utf8")).toBe("listen 80");
  });

  test("uses the configured archive prefix and quiescence delay", async () => {
    await writeSource("svcB/db.sqlite", "rows");
    let locked = true;

    const summary = await runBackup(
      {
        ...config,
        archive: { prefix: "configs-", compression: 0 },
        compose: { ...config.compose, quiescenceDelaySeconds: 2 },
      },
      {
        coordinator: new FakeCoordinator({
          managed: ["svcB"],
          onStop: () => {
            locked = false;
          },
        }),
        copier: lockingCopier("db.sqlite", () => locked),
        sleep,
        now: () => RUN_DATE,
      },
    );

    expect(summary.archivePath).toBe(path.join(config.archiveDir, "configs-2024-01-05_03-04-05.zip"));
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  test("only backs up the selected directories", async () => {
    await writeSource("svcA/app.conf", "a");
    await writeSource("svcB/app.conf", "b");

    const summary = await runBackup(config, {
      only: ["svcB"],
      coordinator: new FakeCoordinator(),
      now: () => RUN_DATE,
    });

    expect(summary.items.map((i) => i.entry.name)).toEqual(["svcB"]);
    const zip = new AdmZip(path.join(config.archiveDir, ARCHIVE_NAME));
    expect(zip.getEntry("svcA/app.conf")).toBeNull();
    expect(zip.readAsText("svcB/app.conf")).toBe("b");
  });

  test("rejects when the source directory is missing", async () => {
    await expect(
      runBackup({ ...config, sourceDir: path.join(tempDir, "missing") }, { coordinator: new FakeCoordinator() }),
    ).rejects.toThrow(BackupPreconditionError);
  });
});
