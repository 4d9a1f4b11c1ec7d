import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DirectoryTransport,
  createScriptedPrompter,
  createTestContext,
  makeTempDir,
  setTimes,
  writeFiles,
} from "../../__tests__/helpers.js";
import { BackupManager } from "../backup.js";
import {
  ReconciliationEngine,
  decideSync,
  formatDelta,
  summarizeSyncResult,
  emptySyncResult,
  type SyncCandidate,
} from "../reconcile.js";

const T = new Date("2026-03-01T12:00:00Z");
const LATER = new Date(T.getTime() + 300_000);

function candidate(overrides: Partial<SyncCandidate> = {}): SyncCandidate {
  return {
    name: "Farm1",
    localExists: true,
    deviceExists: true,
    localModifiedAt: T,
    deviceModifiedAt: T,
    ...overrides,
  };
}

describe("decideSync", () => {
  it("treats times inside the tolerance window as equal", () => {
    const deviceModifiedAt = new Date(T.getTime() + 59_999);
    expect(decideSync(candidate({ deviceModifiedAt }), 60_000)).toEqual({ action: "none", reason: "in-sync" });
  });

  it("acts once the difference reaches the tolerance", () => {
    const deviceModifiedAt = new Date(T.getTime() + 60_000);
    expect(decideSync(candidate({ deviceModifiedAt }), 60_000).action).toBe("pull");
  });

  it("is symmetric between the two sides", () => {
    expect(decideSync(candidate({ deviceModifiedAt: LATER }))).toEqual({
      action: "pull",
      reason: "device-newer",
      backup: true,
      defaultAnswer: true,
    });
    expect(decideSync(candidate({ localModifiedAt: LATER }))).toEqual({
      action: "push",
      reason: "local-newer",
      defaultAnswer: true,
    });
  });

  it("defaults one-sided items to no", () => {
    expect(decideSync(candidate({ deviceExists: false, deviceModifiedAt: null }))).toEqual({
      action: "push",
      reason: "local-only",
      defaultAnswer: false,
    });
    expect(decideSync(candidate({ localExists: false, localModifiedAt: null }))).toEqual({
      action: "pull",
      reason: "device-only",
      backup: false,
      defaultAnswer: false,
    });
  });

  it("skips items whose device time is unknown", () => {
    expect(decideSync(candidate({ deviceModifiedAt: null }))).toEqual({
      action: "none",
      reason: "timestamp-unavailable",
    });
  });
});

describe("formatDelta", () => {
  it("rounds to minutes, hours or days", () => {
    expect(formatDelta(candidate({ deviceModifiedAt: LATER }))).toBe("5m");
    expect(formatDelta(candidate({ localModifiedAt: new Date(T.getTime() + 7_200_000) }))).toBe("2h");
    expect(formatDelta(candidate({ deviceModifiedAt: new Date(T.getTime() + 3 * 86_400_000) }))).toBe("3d");
    expect(formatDelta(candidate({ deviceModifiedAt: null }))).toBe("?");
  });
});

describe("summarizeSyncResult", () => {
  it("mentions declined and failed items only when present", () => {
    expect(summarizeSyncResult(emptySyncResult())).toBe("0 pulled, 0 pushed, 0 unchanged");
    expect(
      summarizeSyncResult({ ...emptySyncResult(), pulled: ["a"], skipped: ["b", "c"], declined: ["d"], failed: ["e"] }),
    ).toBe("1 pulled, 0 pushed, 2 unchanged, 1 declined, 1 failed");
  });
});

describe("ReconciliationEngine", () => {
  let tempDir: string;
  let localRoot: string;
  let deviceRoot: string;
  let transport: DirectoryTransport;

  beforeEach(async () => {
    tempDir = await makeTempDir("reconcile");
    localRoot = path.join(tempDir, "local");
    deviceRoot = path.join(tempDir, "device");
    await fs.mkdir(path.join(localRoot, "saves"), { recursive: true });
    await fs.mkdir(path.join(localRoot, "mods"), { recursive: true });
    await fs.mkdir(path.join(deviceRoot, "Saves"), { recursive: true });
    await fs.mkdir(path.join(deviceRoot, "Mods"), { recursive: true });
    transport = new DirectoryTransport(deviceRoot);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createEngine(answers: boolean[] = [], options: { force?: boolean } = {}) {
    const { context, logger } = createTestContext(options);
    const prompter = createScriptedPrompter(answers);
    const backups = new BackupManager(
      { sourceDir: path.join(localRoot, "saves"), backupsDir: path.join(localRoot, "backups"), now: () => T },
      context,
    );
    const engine = new ReconciliationEngine(
      {
        transport,
        savesDir: path.join(localRoot, "saves"),
        modsDir: path.join(localRoot, "mods"),
        backups,
        prompter,
      },
      context,
    );
    return { engine, prompter, logger };
  }

  async function givenNewerDeviceSave(): Promise<void> {
    await writeFiles(localRoot, { "saves/Farm1/Farm1": "local farm", "saves/Farm1/SaveGameInfo": "local info" });
    await writeFiles(deviceRoot, { "Saves/Farm1/Farm1": "device farm", "Saves/Farm1/SaveGameInfo": "device info" });
    await setTimes(path.join(localRoot, "saves", "Farm1"), T);
    await setTimes(path.join(deviceRoot, "Saves", "Farm1"), LATER);
  }

  it("backs up the local save before pulling a newer device copy", async () => {
    await givenNewerDeviceSave();
    const { engine, prompter } = createEngine([true]);

    const result = await engine.syncSaves();

    const backup = path.join(localRoot, "backups", "Farm1", "20260301-120000-000");
    expect(prompter.questions).toEqual(['Pull "Farm1" from device (device copy is 5m newer)?']);
    expect(result.pulled).toEqual(["Farm1"]);
    expect(result.backups).toEqual([backup]);
    expect(await fs.readFile(path.join(backup, "Farm1"), "utf-8")).toBe("local farm");
    expect(await fs.readFile(path.join(localRoot, "saves", "Farm1", "Farm1"), "utf-8")).toBe("device farm");
    expect(await fs.readdir(path.join(localRoot, "saves"))).toEqual(["Farm1"]);
  });

  it("pushes a newer local save without taking a backup", async () => {
    await writeFiles(localRoot, { "saves/Farm1/Farm1": "local farm" });
    await writeFiles(deviceRoot, { "Saves/Farm1/Farm1": "device farm" });
    await setTimes(path.join(localRoot, "saves", "Farm1"), LATER);
    await setTimes(path.join(deviceRoot, "Saves", "Farm1"), T);
    const { engine, prompter } = createEngine([true]);

    const result = await engine.syncSaves();

    expect(prompter.questions).toEqual(['Push "Farm1" to device (local copy is 5m newer)?']);
    expect(result.pushed).toEqual(["Farm1"]);
    expect(result.pulled).toEqual([]);
    expect(result.backups).toEqual([]);
    expect(await fs.readFile(path.join(deviceRoot, "Saves", "Farm1", "Farm1"), "utf-8")).toBe("local farm");
    await expect(fs.stat(path.join(localRoot, "backups"))).rejects.toThrow();
  });

  it("finds nothing to do on the run after a pull", async () => {
    await givenNewerDeviceSave();
    await createEngine([true]).engine.syncSaves();

    const { engine, prompter } = createEngine();
    const result = await engine.syncSaves();

    expect(prompter.questions).toEqual([]);
    expect(result.skipped).toEqual(["Farm1"]);
  });

  it("leaves both sides alone when the operator declines", async () => {
    await givenNewerDeviceSave();
    const { engine } = createEngine([false]);

    const result = await engine.syncSaves();

    expect(result.declined).toEqual(["Farm1"]);
    expect(transport.calls.filter((call) => call.startsWith("pull"))).toEqual([]);
    expect(await fs.readFile(path.join(localRoot, "saves", "Farm1", "Farm1"), "utf-8")).toBe("local farm");
  });

  it("acts without asking when forced", async () => {
    await givenNewerDeviceSave();
    await writeFiles(localRoot, { "saves/Farm2/Farm2": "only here" });
    const { engine, prompter } = createEngine([], { force: true });

    const result = await engine.syncSaves();

    expect(prompter.questions).toEqual([]);
    expect(result.pulled).toEqual(["Farm1"]);
    expect(result.pushed).toEqual(["Farm2"]);
    expect(await fs.readFile(path.join(deviceRoot, "Saves", "Farm2", "Farm2"), "utf-8")).toBe("only here");
  });

  it("asks about one-sided saves with a default of no", async () => {
    await writeFiles(deviceRoot, { "Saves/Farm3/Farm3": "device only" });
    const { engine, prompter } = createEngine();

    const result = await engine.syncSaves();

    expect(prompter.questions).toEqual(['"Farm3" exists only on the device. Pull it?']);
    expect(result.declined).toEqual(["Farm3"]);
  });

  it("does not replace a save whose pull fails", async () => {
    await givenNewerDeviceSave();
    transport.failing.add("Saves/Farm1");
    const { engine, logger } = createEngine([true]);

    const result = await engine.syncSaves();

    expect(result.failed).toEqual(["Farm1"]);
    expect(logger.entries).toContainEqual({ level: "error", message: "Failed to pull save Farm1" });
    expect(await fs.readFile(path.join(localRoot, "saves", "Farm1", "Farm1"), "utf-8")).toBe("local farm");
  });

  it("pushes local mods missing from the device and reports device-only ones", async () => {
    await writeFiles(localRoot, { "mods/ExampleMod/manifest.json": "{}" });
    await writeFiles(deviceRoot, { "Mods/DeviceMod/manifest.json": "{}" });

    const first = await createEngine().engine.pushMissingMods();
    expect(first.pushed).toEqual(["ExampleMod"]);
    expect(first.deviceOnly).toEqual(["DeviceMod"]);
    expect(await fs.readFile(path.join(deviceRoot, "Mods", "ExampleMod", "manifest.json"), "utf-8")).toBe("{}");

    const second = await createEngine().engine.pushMissingMods();
    expect(second.pushed).toEqual([]);
    expect(second.skipped).toEqual(["ExampleMod"]);
  });

  it("pulls device-only mods and keeps local copies unless forced", async () => {
    await writeFiles(localRoot, { "mods/Shared/manifest.json": "local" });
    await writeFiles(deviceRoot, { "Mods/Shared/manifest.json": "device", "Mods/DeviceMod/manifest.json": "{}" });

    const result = await createEngine().engine.pullMods();
    expect(result.pulled).toEqual(["DeviceMod"]);
    expect(result.skipped).toEqual(["Shared"]);
    expect(await fs.readFile(path.join(localRoot, "mods", "Shared", "manifest.json"), "utf-8")).toBe("local");

    const forced = await createEngine([], { force: true }).engine.pullMods();
    expect(forced.pulled.sort()).toEqual(["DeviceMod", "Shared"]);
    expect(await fs.readFile(path.join(localRoot, "mods", "Shared", "manifest.json"), "utf-8")).toBe("device");
  });

  it("pulls every device save and backs up existing ones", async () => {
    await givenNewerDeviceSave();
    await writeFiles(deviceRoot, { "Saves/Farm4/Farm4": "new" });

    const result = await createEngine().engine.pullSaves();

    expect(result.pulled).toEqual(["Farm1", "Farm4"]);
    expect(result.backups).toEqual([path.join(localRoot, "backups", "Farm1", "20260301-120000-000")]);
  });
});
