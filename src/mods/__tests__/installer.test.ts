import fs from "node:fs/promises";
import path from "node:path";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  DirectoryTransport,
  createScriptedPrompter,
  createTestContext,
  makeTempDir,
  writeFiles,
} from "../../__tests__/helpers.js";
import type { UpdateCandidate } from "../catalog.js";
import { ModInstaller } from "../installer.js";
import { parseManifest } from "../manifest.js";
import { GitHubTier, ManualTier, NexusTier, type DownloadTier } from "../sources.js";

const FOO_2_MANIFEST = '{"Name": "Foo", "UniqueID": "author.foo", "Version": "2.0"}';

async function zipBuffer(files: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

describe("ModInstaller", () => {
  let tempDir: string;
  let modsDir: string;
  let downloadsDir: string;
  let holdingDir: string;
  let deviceRoot: string;
  let candidate: UpdateCandidate;

  beforeEach(async () => {
    tempDir = await makeTempDir("installer");
    modsDir = path.join(tempDir, "mods");
    downloadsDir = path.join(tempDir, "downloads");
    holdingDir = path.join(downloadsDir, "manual");
    deviceRoot = path.join(tempDir, "device");

    const manifestText = '{"Name": "Foo", "UniqueID": "author.foo", "Version": "1.0", "UpdateKeys": ["Unknown:123"]}';
    await writeFiles(modsDir, {
      "Foo/manifest.json": manifestText,
      "Foo/config.json": '{"keep": true}',
      "Foo/old.dll": "old",
    });
    const manifest = parseManifest(manifestText, {
      manifestPath: path.join(modsDir, "Foo", "manifest.json"),
      modsRoot: modsDir,
    });
    candidate = {
      manifest,
      installedVersion: "1.0",
      targetVersion: "2.0",
      nexusId: null,
      githubRepo: null,
      pageUrl: null,
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createInstaller(
    options: { dryRun?: boolean; archive?: Buffer | null; transport?: DirectoryTransport | null } = {},
  ) {
    const { context, logger } = createTestContext({ dryRun: options.dryRun });
    const prompter = createScriptedPrompter();
    const fetchMock = vi.fn(async () => new Response("unexpected", { status: 500 }));
    const opened: string[] = [];
    const tiers: DownloadTier[] = [
      new NexusTier({ apiKeyFile: path.join(tempDir, "nexus-api-key"), fetch: fetchMock }, context),
      new GitHubTier({ archivePattern: "*.zip", fetch: fetchMock }, context),
      new ManualTier(
        {
          holdingDir,
          archivePattern: "*.zip",
          openUrl: async (url) => {
            opened.push(url);
            if (options.archive) {
              await fs.mkdir(holdingDir, { recursive: true });
              await fs.writeFile(path.join(holdingDir, "Foo-2.0.zip"), options.archive);
            }
            return true;
          },
          prompter,
        },
        context,
      ),
    ];
    const transport = options.transport === undefined ? new DirectoryTransport(deviceRoot) : options.transport;
    const installer = new ModInstaller({ tiers, downloadsDir, transport }, context);
    return { installer, logger, prompter, fetchMock, opened, transport };
  }

  it("falls through to a manual download and keeps the operator's config", async () => {
    const archive = await zipBuffer({
      "Foo 2.0/Foo/manifest.json": '{"Name": "Foo", "UniqueID": "author.foo", "Version": "2.0"}',
      "Foo 2.0/Foo/config.json": '{"keep": false}',
      "Foo 2.0/Foo/Foo.dll": "new",
    });
    const { installer, logger, prompter, fetchMock, opened } = createInstaller({ archive });

    const outcome = await installer.installOne(candidate);

    expect(outcome).toEqual({
      name: "Foo",
      fromVersion: "1.0",
      toVersion: "2.0",
      status: "installed",
      source: "manual",
      pushed: true,
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(opened).toEqual(["https://smapi.io/mods#Foo"]);
    expect(prompter.waits).toEqual([`Download Foo 2.0 into ${holdingDir}, then press Enter`]);
    expect(logger.entries).toContainEqual({ level: "info", message: "Updated Foo to 2.0 (manual)" });

    expect(await fs.readFile(path.join(modsDir, "Foo", "config.json"), "utf-8")).toBe('{"keep": true}');
    expect(await fs.readFile(path.join(modsDir, "Foo", "Foo.dll"), "utf-8")).toBe("new");
    await expect(fs.stat(path.join(modsDir, "Foo", "old.dll"))).rejects.toThrow();
    expect(await fs.readFile(path.join(deviceRoot, "Mods", "Foo", "config.json"), "utf-8")).toBe('{"keep": true}');
    expect((await fs.readdir(downloadsDir)).filter((name) => name.startsWith("extract-"))).toEqual([]);
  });

  it("installs locally only when no device is connected", async () => {
    const archive = await zipBuffer({ "Foo/manifest.json": FOO_2_MANIFEST });
    const { installer } = createInstaller({ archive, transport: null });

    const outcome = await installer.installOne(candidate);

    expect(outcome.status).toBe("installed");
    expect(outcome.pushed).toBe(false);
  });

  it("fails and leaves the mod alone when no source produces an archive", async () => {
    const { installer, logger } = createInstaller({ archive: null });

    const outcome = await installer.installOne(candidate);

    expect(outcome.status).toBe("failed");
    expect(outcome.message).toBe("no download source produced an archive");
    expect(logger.entries).toContainEqual({ level: "error", message: "Foo: no download source produced an archive" });
    expect(await fs.readFile(path.join(modsDir, "Foo", "old.dll"), "utf-8")).toBe("old");
  });

  it("refuses an archive without a manifest", async () => {
    const archive = await zipBuffer({ "readme.txt": "nothing to see" });
    const { installer } = createInstaller({ archive });

    const outcome = await installer.installOne(candidate);

    expect(outcome.message).toBe("Foo-2.0.zip contains no manifest.json");
    expect(await fs.readFile(path.join(modsDir, "Foo", "old.dll"), "utf-8")).toBe("old");
  });

  it("installs the sub-mod whose UniqueID matches from a grouped archive", async () => {
    const groupText = (id: string, version: string) =>
      `{"Name": "${id}", "UniqueID": "author.${id.toLowerCase()}", "Version": "${version}"}`;
    await writeFiles(modsDir, {
      "Group/SubA/manifest.json": groupText("SubA", "1.0"),
      "Group/SubA/a.dll": "old a",
      "Group/SubB/manifest.json": groupText("SubB", "1.0"),
      "Group/SubB/b.dll": "old b",
    });
    const manifestPath = path.join(modsDir, "Group", "SubB", "manifest.json");
    const subB: UpdateCandidate = {
      ...candidate,
      manifest: parseManifest(groupText("SubB", "1.0"), { manifestPath, modsRoot: modsDir }),
    };
    const archive = await zipBuffer({
      "Group/SubA/manifest.json": groupText("SubA", "2.0"),
      "Group/SubA/a.dll": "new a",
      "Group/SubB/manifest.json": '{"Name": "SubB", "UniqueID": "Author.SubB", "Version": "2.0"}',
      "Group/SubB/b.dll": "new b",
    });
    const { installer } = createInstaller({ archive });

    const outcome = await installer.installOne(subB);

    expect(outcome.status).toBe("installed");
    expect(await fs.readFile(manifestPath, "utf-8")).toBe(
      '{"Name": "SubB", "UniqueID": "Author.SubB", "Version": "2.0"}',
    );
    expect((await fs.readdir(path.join(modsDir, "Group", "SubB"))).sort()).toEqual(["b.dll", "manifest.json"]);
    expect(await fs.readFile(path.join(modsDir, "Group", "SubB", "b.dll"), "utf-8")).toBe("new b");
    expect(await fs.readFile(path.join(modsDir, "Group", "SubA", "a.dll"), "utf-8")).toBe("old a");
    expect(await fs.readFile(path.join(deviceRoot, "Mods", "Group", "SubB", "b.dll"), "utf-8")).toBe("new b");
  });

  it("refuses an archive that only holds other mods", async () => {
    const archive = await zipBuffer({
      "Bar/manifest.json": '{"Name": "Bar", "UniqueID": "author.bar", "Version": "2.0"}',
    });
    const { installer } = createInstaller({ archive });

    const outcome = await installer.installOne(candidate);

    expect(outcome.status).toBe("failed");
    expect(outcome.message).toBe("Foo-2.0.zip has no manifest for author.foo");
    expect(await fs.readFile(path.join(modsDir, "Foo", "old.dll"), "utf-8")).toBe("old");
  });

  it("keeps the installed mod when copying the new one fails", async () => {
    const archive = await zipBuffer({ "Foo/manifest.json": FOO_2_MANIFEST, "Foo/Foo.dll": "new" });
    const { installer } = createInstaller({ archive, transport: null });
    const cp = vi.spyOn(fs, "cp").mockRejectedValueOnce(new Error("disk full"));

    try {
      const outcome = await installer.installOne(candidate);

      expect(outcome.status).toBe("failed");
      expect(outcome.message).toBe("disk full");
    } finally {
      cp.mockRestore();
    }
    expect(await fs.readdir(modsDir)).toEqual(["Foo"]);
    expect((await fs.readdir(path.join(modsDir, "Foo"))).sort()).toEqual(["config.json", "manifest.json", "old.dll"]);
  });

  it("takes the first tier that yields an archive", async () => {
    const archivePath = path.join(tempDir, "from-second.zip");
    await fs.writeFile(archivePath, await zipBuffer({ "Foo/manifest.json": FOO_2_MANIFEST }));
    const first: DownloadTier = { name: "nexus", applies: async () => true, download: vi.fn(async () => null) };
    const second: DownloadTier = { name: "github", applies: async () => true, download: vi.fn(async () => archivePath) };
    const third: DownloadTier = { name: "manual", applies: async () => true, download: vi.fn(async () => null) };
    const { context } = createTestContext();
    const installer = new ModInstaller({ tiers: [first, second, third], downloadsDir, transport: null }, context);

    const outcome = await installer.installOne(candidate);

    expect(outcome.source).toBe("github");
    expect(first.download).toHaveBeenCalledTimes(1);
    expect(third.download).not.toHaveBeenCalled();
  });

  it("only describes the update in dry-run", async () => {
    const { installer, logger, opened } = createInstaller({ dryRun: true });

    const outcomes = await installer.installAll([candidate]);

    expect(outcomes).toEqual([
      { name: "Foo", fromVersion: "1.0", toVersion: "2.0", status: "dry-run", source: null, pushed: false },
    ]);
    expect(opened).toEqual([]);
    expect(logger.entries).toEqual([{ level: "info", message: "[dry-run] would update Foo 1.0 -> 2.0 via manual" }]);
  });
});
