/**
 * Mod manifests
 *
 * Every mod ships a manifest.json. Authors write them by hand, so they
 * often carry comments and trailing commas, use any key casing, and write
 * `UpdateKeys` as a bare string when there is only one key. All of that is
 * normalized here.
 */

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { toPosix } from "../transport/paths.js";

export const MANIFEST_FILE = "manifest.json";

export type ModManifest = {
  name: string;
  uniqueId: string;
  version: string;
  /** Always a list, even when the file held a single string */
  updateKeys: string[];
  author?: string;
  description?: string;
  /** Folder that owns the manifest */
  directory: string;
  /** Folder path relative to the mods root, posix separators */
  relativePath: string;
  manifestPath: string;
};

export type ManifestScanResult = {
  manifests: ModManifest[];
  errors: Array<{ manifestPath: string; message: string }>;
};

/**
 * Remove `//` and block comments outside strings, then trailing commas.
 */
export function stripJsonComments(text: string): string {
  let out = "";
  let inString = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (inString) {
      out += ch;
      if (ch === "\\" && next !== undefined) {
        out += next;
        i += 2;
        continue;
      }
      if (ch === '"') inString = false;
      i += 1;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      i += 1;
    } else if (ch === "/" && next === "/") {
      while (i < text.length && text[i] !== "\n") i += 1;
    } else if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end === -1 ? text.length : end + 2;
      out += " ";
    } else {
      out += ch;
      i += 1;
    }
  }

  return removeTrailingCommas(out);
}

function removeTrailingCommas(text: string): string {
  let out = "";
  let inString = false;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (ch === "\\" && i + 1 < text.length) {
        out += text[i + 1];
        i += 1;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === ",") {
      const rest = text.slice(i + 1).trimStart();
      if (rest.startsWith("}") || rest.startsWith("]")) continue;
    }
    out += ch;
  }
  return out;
}

function lowerKeys(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key.toLowerCase(), inner]));
}

const versionObjectSchema = z.preprocess(
  lowerKeys,
  z.object({
    majorversion: z.number().int(),
    minorversion: z.number().int().default(0),
    patchversion: z.number().int().default(0),
    build: z.string().optional(),
  }),
);

const versionSchema = z.union([
  z.string().min(1),
  z.number().transform((value) => String(value)),
  versionObjectSchema.transform(
    (v) => `${v.majorversion}.${v.minorversion}.${v.patchversion}${v.build ? `-${v.build}` : ""}`,
  ),
]);

const updateKeysSchema = z
  .union([z.string(), z.array(z.string()), z.null(), z.undefined()])
  .transform((value) => {
    const list = value === null || value === undefined ? [] : Array.isArray(value) ? value : [value];
    const keys = list.map((key) => key.trim()).filter((key) => key.length > 0);
    return [...new Set(keys)];
  });

const manifestSchema = z.preprocess(
  lowerKeys,
  z.object({
    name: z.string().min(1),
    uniqueid: z.string().min(1),
    version: versionSchema,
    updatekeys: updateKeysSchema,
    author: z.string().optional(),
    description: z.string().optional(),
  }),
);

export type ManifestLocation = {
  manifestPath: string;
  modsRoot: string;
};

/**
 * Parse manifest text. Throws with a readable message when the manifest
 * is not usable.
 */
export function parseManifest(text: string, location: ManifestLocation): ModManifest {
  let raw: unknown;
  try {
    // Strip a UTF-8 BOM as well
    raw = JSON.parse(stripJsonComments(text.replace(/^\uFEFF/, "")));
  } catch (error) {
    throw new Error(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".") || "manifest"}: ${i.message}`).join("; ");
    throw new Error(message);
  }

  const directory = path.dirname(location.manifestPath);
  const data = parsed.data;
  return {
    name: data.name.trim(),
    uniqueId: data.uniqueid.trim(),
    version: data.version.trim(),
    updateKeys: data.updatekeys,
    ...(data.author ? { author: data.author } : {}),
    ...(data.description ? { description: data.description } : {}),
    directory,
    relativePath: toPosix(path.relative(location.modsRoot, directory)),
    manifestPath: location.manifestPath,
  };
}

/**
 * Every manifest.json below a folder, nested mod groups included.
 */
export async function findManifestFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile() && entry.name.toLowerCase() === MANIFEST_FILE) {
        found.push(full);
      }
    }
  }

  await walk(root);
  return found.sort();
}

export async function scanManifests(modsRoot: string): Promise<ManifestScanResult> {
  const result: ManifestScanResult = { manifests: [], errors: [] };

  for (const manifestPath of await findManifestFiles(modsRoot)) {
    try {
      const text = await fs.readFile(manifestPath, "utf-8");
      result.manifests.push(parseManifest(text, { manifestPath, modsRoot }));
    } catch (error) {
      result.errors.push({
        manifestPath,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  result.manifests.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return result;
}

export type UpdateKey = {
  host: string;
  id: string;
  subkey?: string;
};

/**
 * Split "Nexus:2400@beta" into host, id and subkey.
 */
export function parseUpdateKey(key: string): UpdateKey | null {
  const match = /^\s*([^:\s]+)\s*:\s*([^@\s]+)(?:@(\S+))?\s*$/.exec(key);
  if (!match) return null;
  return {
    host: match[1].toLowerCase(),
    id: match[2],
    ...(match[3] ? { subkey: match[3] } : {}),
  };
}

export function findNexusId(manifest: Pick<ModManifest, "updateKeys">): number | null {
  for (const key of manifest.updateKeys) {
    const parsed = parseUpdateKey(key);
    if (parsed?.host === "nexus" && /^\d+$/.test(parsed.id)) {
      return Number(parsed.id);
    }
  }
  return null;
}

export function findGitHubRepo(manifest: Pick<ModManifest, "updateKeys">): string | null {
  for (const key of manifest.updateKeys) {
    const parsed = parseUpdateKey(key);
    if (parsed?.host === "github" && /^[\w.-]+\/[\w.-]+$/.test(parsed.id)) {
      return parsed.id;
    }
  }
  return null;
}
