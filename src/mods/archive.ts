/**
 * Mod archives
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSZip from "jszip";

import { findManifestFiles, parseManifest, type ModManifest } from "./manifest.js";

/**
 * Extract a zip archive into `destDir`. Entries that would land outside
 * the destination are rejected. Returns the number of files written.
 */
export async function extractArchive(archivePath: string, destDir: string): Promise<number> {
  const zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  const root = path.resolve(destDir);
  let written = 0;

  await fs.mkdir(root, { recursive: true });
  for (const entry of Object.values(zip.files)) {
    if (entry.name.startsWith("__MACOSX/")) continue;
    const target = path.resolve(root, entry.name);
    if (target !== root && !target.startsWith(root + path.sep)) {
      throw new Error(`archive entry escapes the target folder: ${entry.name}`);
    }
    if (entry.dir) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, await entry.async("nodebuffer"));
    written += 1;
  }
  return written;
}

export type ModRootLookup = {
  /** Folder whose manifest declares the wanted UniqueID */
  root: string | null;
  /** Usable manifests seen while looking */
  manifests: number;
};

/**
 * Find the folder whose manifest.json declares `uniqueId`, compared without
 * case. Archives often wrap the mod in extra folders or bundle a whole
 * group of mods, so every manifest in the tree is considered.
 */
export async function findModRoot(dir: string, uniqueId: string): Promise<ModRootLookup> {
  const wanted = uniqueId.toLowerCase();
  const lookup: ModRootLookup = { root: null, manifests: 0 };

  for (const manifestPath of await findManifestFiles(dir)) {
    let manifest: ModManifest;
    try {
      manifest = parseManifest(await fs.readFile(manifestPath, "utf-8"), { manifestPath, modsRoot: dir });
    } catch {
      continue;
    }
    lookup.manifests += 1;
    if (lookup.root === null && manifest.uniqueId.toLowerCase() === wanted) {
      lookup.root = manifest.directory;
    }
  }
  return lookup;
}

/**
 * Newest file in a folder whose name passes `matches`, by modification time.
 */
export async function newestFile(dir: string, matches: (name: string) => boolean): Promise<string | null> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    return null;
  }
  let best: { file: string; mtime: number } | null = null;
  for (const name of entries) {
    if (!matches(name)) continue;
    const file = path.join(dir, name);
    const stat = await fs.stat(file);
    if (!stat.isFile()) continue;
    if (!best || stat.mtimeMs > best.mtime) {
      best = { file, mtime: stat.mtimeMs };
    }
  }
  return best?.file ?? null;
}
