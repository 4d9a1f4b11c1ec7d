/**
 * Logical device paths
 *
 * Everything the tool touches on the device lives under the game's
 * app-data root (`Android/data/<package>/files`). A LogicalPath is the list
 * of segments below that root; each transport turns it into its own address.
 */

import path from "node:path";

export type LogicalPath = readonly string[];

export const SAVES_FOLDER = "Saves";
export const MODS_FOLDER = "Mods";
export const LOGS_FOLDER = "ErrorLogs";
export const INTERNAL_CONFIG: LogicalPath = ["smapi-internal", "config.user.json"];

export function savesPath(...rest: string[]): LogicalPath {
  return [SAVES_FOLDER, ...rest];
}

export function modsPath(...rest: string[]): LogicalPath {
  return [MODS_FOLDER, ...rest];
}

export function logsPath(...rest: string[]): LogicalPath {
  return [LOGS_FOLDER, ...rest];
}

/** The mod loader's own user config file */
export function internalConfigPath(): LogicalPath {
  return INTERNAL_CONFIG;
}

/**
 * Segments from a storage volume down to the app-data root.
 */
export function appDataSegments(packageName: string): string[] {
  return ["Android", "data", packageName, "files"];
}

export function parentOf(logical: LogicalPath): { parent: LogicalPath; name: string } | null {
  if (logical.length === 0) return null;
  return { parent: logical.slice(0, -1), name: logical[logical.length - 1] };
}

export function formatLogicalPath(logical: LogicalPath): string {
  return logical.length === 0 ? "<app-data>" : logical.join("/");
}

/**
 * Absolute shell path for the command transport.
 */
export function toShellPath(storageRoot: string, packageName: string, logical: LogicalPath): string {
  const root = storageRoot.replace(/\/+$/, "");
  return [root, ...appDataSegments(packageName), ...logical].join("/");
}

/**
 * Quote a value for `adb shell` (POSIX sh on the device).
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export type NamedEntry = { name: string; isFolder: boolean };

/**
 * Walk folder names one segment at a time, the way the copy-based
 * transport must: each segment is one lookup in its parent's listing.
 *
 * Returns the segments walked (start + logical) or null when any segment
 * is absent.
 */
export async function resolveFolderByName<TRef>(
  start: TRef,
  segments: readonly string[],
  list: (folder: TRef) => Promise<NamedEntry[]>,
  child: (folder: TRef, name: string) => TRef,
): Promise<TRef | null> {
  let current = start;
  for (const segment of segments) {
    const entries = await list(current);
    const match = entries.find((entry) => entry.isFolder && entry.name === segment);
    if (!match) return null;
    current = child(current, match.name);
  }
  return current;
}

/**
 * Convert an OS path relative to the mods root into logical segments.
 */
export function relativeToSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter((segment) => segment.length > 0 && segment !== ".");
}

export function toPosix(input: string): string {
  return input.split(path.sep).join(path.posix.sep);
}
