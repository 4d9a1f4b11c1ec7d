/**
 * Media-copy transport
 *
 * Used when the device blocks adb from the app-data folder. Every transfer
 * goes through the portable-device shell, which only starts copies; each
 * operation then polls until the result is visible, within copyTimeoutMs.
 */

import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { ExecutionContext } from "../context.js";
import type { AdbDevice } from "./adb.js";
import { formatLogicalPath, parentOf, resolveFolderByName, type LogicalPath, type NamedEntry } from "./paths.js";
import { childRef, type PortableDeviceShell, type PortableFolderRef } from "./portable-shell.js";
import { waitFor, waitForStable, type PollOptions } from "./polling.js";
import type { DeviceInfo, DirEntry, FileTransport } from "./types.js";

/** Detail columns that hold "Date modified" across shell versions and locales */
export const DATE_DETAIL_COLUMNS = [3, 4, 5, 12] as const;
/** Detail column holding the rendered size */
export const SIZE_DETAIL_COLUMN = 1;

export type MediaCopyTransportOptions = DeviceInfo & {
  shell: PortableDeviceShell;
  /** Folder reference of the app-data root on the device */
  appDataRoot: PortableFolderRef;
  /** adb channel when commands still work (shell-only adb access) */
  commands: AdbDevice | null;
  poll: PollOptions;
  /** Parent for the session's scratch folder (default: OS temp dir) */
  scratchParent?: string;
};

type TreeStats = { files: number; bytes: number };
type DeviceTree = { files: number; signature: string };

export class MediaCopyTransport implements FileTransport {
  readonly kind = "media-copy" as const;
  readonly canAccessFilesDirectly = false as const;
  readonly identity: string;
  readonly displayName: string;
  readonly model: string;
  readonly commands: AdbDevice | null;

  private readonly shell: PortableDeviceShell;
  private readonly appDataRoot: PortableFolderRef;
  private readonly poll: PollOptions;
  private readonly scratchParent: string;
  private scratchDir: string | null = null;

  constructor(
    options: MediaCopyTransportOptions,
    private readonly context: ExecutionContext,
  ) {
    this.identity = options.identity;
    this.displayName = options.displayName;
    this.model = options.model;
    this.commands = options.commands;
    this.shell = options.shell;
    this.appDataRoot = options.appDataRoot;
    this.poll = options.poll;
    this.scratchParent = options.scratchParent ?? os.tmpdir();
  }

  get canExecuteCommands(): boolean {
    return this.commands !== null;
  }

  async listDirectory(logical: LogicalPath): Promise<DirEntry[]> {
    const folder = await this.resolve(logical);
    if (!folder) return [];
    return this.shell.listChildren(folder);
  }

  async pullFile(logical: LogicalPath, name: string, localDest: string): Promise<boolean> {
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would copy ${this.describe([...logical, name])} -> ${localDest}`);
      return true;
    }
    return this.attempt(`pull ${this.describe([...logical, name])}`, async () => {
      const folder = await this.resolve(logical);
      if (!folder || !(await this.hasChild(folder, name))) return false;
      const staged = await this.copyOut(folder, name);
      if (!staged) return false;
      await moveLocal(staged, localDest);
      return true;
    });
  }

  async pushFile(logical: LogicalPath, localFile: string): Promise<boolean> {
    const name = path.basename(localFile);
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would copy ${localFile} -> ${this.describe([...logical, name])}`);
      return true;
    }
    return this.attempt(`push ${this.describe([...logical, name])}`, async () => {
      const folder = await this.resolve(logical);
      if (!folder) return false;
      return this.copyIn(folder, name, localFile);
    });
  }

  async pullFolder(logical: LogicalPath, localDest: string): Promise<boolean> {
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would copy folder ${this.describe(logical)} -> ${localDest}`);
      return true;
    }
    const split = parentOf(logical);
    if (!split) return false;
    return this.attempt(`pull folder ${this.describe(logical)}`, async () => {
      const folder = await this.resolve(split.parent);
      if (!folder || !(await this.hasChild(folder, split.name))) return false;
      const staged = await this.copyOut(folder, split.name);
      if (!staged) return false;
      await fs.rm(localDest, { recursive: true, force: true });
      await moveLocal(staged, localDest);
      return true;
    });
  }

  async pushFolder(logical: LogicalPath, localDir: string): Promise<boolean> {
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would copy folder ${localDir} -> ${this.describe(logical)}`);
      return true;
    }
    const split = parentOf(logical);
    if (!split) return false;
    return this.attempt(`push folder ${this.describe(logical)}`, async () => {
      const folder = await this.resolve(split.parent);
      if (!folder) return false;

      // The shell copies an item under its own name, so stage a renamed copy when needed
      let source = localDir;
      if (path.basename(localDir) !== split.name) {
        source = path.join(await this.scratch("stage-"), split.name);
        await fs.cp(localDir, source, { recursive: true });
      }

      return this.copyIn(folder, split.name, source);
    });
  }

  async deleteItem(logical: LogicalPath, name: string): Promise<boolean> {
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would delete ${this.describe([...logical, name])}`);
      return true;
    }
    return this.attempt(`delete ${this.describe([...logical, name])}`, async () => {
      const folder = await this.resolve(logical);
      if (!folder) return true;
      return this.remove(folder, name);
    });
  }

  /**
   * Newest date of the item and, for a folder, its direct children.
   */
  async getModificationTime(logical: LogicalPath, name: string): Promise<Date | null> {
    const folder = await this.resolve(logical);
    if (!folder) return null;
    let newest = await this.itemDate(folder, name);
    if (!newest) return null;

    const entry = (await this.shell.listChildren(folder)).find((child) => child.name === name);
    if (entry?.isFolder) {
      const inner = childRef(folder, name);
      for (const child of await this.shell.listChildren(inner)) {
        const date = await this.itemDate(inner, child.name);
        if (date && date.getTime() > newest.getTime()) newest = date;
      }
    }
    return newest;
  }

  async dispose(): Promise<void> {
    try {
      if (this.scratchDir) {
        await fs.rm(this.scratchDir, { recursive: true, force: true });
        this.scratchDir = null;
      }
    } finally {
      await this.shell.close();
    }
  }

  private describe(logical: LogicalPath): string {
    return `${this.displayName}:${formatLogicalPath(logical)}`;
  }

  private resolve(logical: LogicalPath): Promise<PortableFolderRef | null> {
    return resolveFolderByName(
      this.appDataRoot,
      logical,
      (folder) => this.shell.listChildren(folder),
      childRef,
    );
  }

  private async itemDate(folder: PortableFolderRef, name: string): Promise<Date | null> {
    for (const column of DATE_DETAIL_COLUMNS) {
      const detail = await this.shell.getDetail(folder, name, column);
      const parsed = detail === null ? null : parseShellDate(detail);
      if (parsed && parsed.getFullYear() > 2000) {
        return parsed;
      }
    }
    return null;
  }

  private async hasChild(folder: PortableFolderRef, name: string): Promise<boolean> {
    const children = await this.shell.listChildren(folder);
    return children.some((child) => child.name === name);
  }

  /**
   * Copy a device item into a fresh staging folder and wait for it to settle.
   * Returns the staged path, or null on failure/timeout.
   */
  private async copyOut(folder: PortableFolderRef, name: string): Promise<string | null> {
    const staging = await this.scratch("pull-");
    if (!(await this.shell.copyFromDevice(folder, name, staging))) return null;
    const staged = path.join(staging, name);
    const settled = await waitForStable(() => treeStats(staged), {
      ...this.poll,
      ready: (stats) => stats !== null,
      equals: (a, b) => a !== null && b !== null && a.files === b.files && a.bytes === b.bytes,
    });
    if (!settled) {
      this.context.logger.debug(`copy of ${name} did not finish within ${this.poll.timeoutMs}ms`);
      return null;
    }
    return staged;
  }

  /**
   * Replace `name` in a device folder with a local file or folder. The copy
   * counts as done once the device holds as many files as the source and
   * two consecutive walks of the device tree agree.
   */
  private async copyIn(folder: PortableFolderRef, name: string, source: string): Promise<boolean> {
    const expected = (await treeStats(source))?.files ?? 0;
    // Snapshot before mutating: the folder's listing changes under the copy
    const before = await this.shell.listChildren(folder);
    if (before.some((child) => child.name === name)) {
      if (!(await this.remove(folder, name))) return false;
    }
    if (!(await this.shell.copyToDevice(folder, source))) return false;
    const arrived = await waitForStable(() => this.deviceTree(folder, name), {
      ...this.poll,
      ready: (tree) => tree !== null && tree.files >= expected,
      equals: (a, b) => a !== null && b !== null && a.signature === b.signature,
    });
    if (!arrived) {
      this.context.logger.debug(`copy of ${name} to device did not finish within ${this.poll.timeoutMs}ms`);
    }
    return arrived;
  }

  /**
   * File count and a name/size signature of a device item, walked
   * recursively. Null when the item is not listed.
   */
  private async deviceTree(folder: PortableFolderRef, name: string): Promise<DeviceTree | null> {
    const entry = (await this.shell.listChildren(folder)).find((child) => child.name === name);
    return entry ? this.walkDevice(folder, entry) : null;
  }

  private async walkDevice(folder: PortableFolderRef, entry: NamedEntry): Promise<DeviceTree> {
    if (!entry.isFolder) {
      const size = (await this.shell.getDetail(folder, entry.name, SIZE_DETAIL_COLUMN)) ?? "";
      return { files: 1, signature: `${entry.name}=${size}` };
    }
    const inner = childRef(folder, entry.name);
    const parts: string[] = [];
    let files = 0;
    for (const child of await this.shell.listChildren(inner)) {
      const tree = await this.walkDevice(inner, child);
      files += tree.files;
      parts.push(tree.signature);
    }
    return { files, signature: `${entry.name}/{${parts.join(",")}}` };
  }

  /**
   * The shell has no delete verb: move the item out to a throwaway local
   * folder, wait until the device no longer lists it, then discard it.
   */
  private async remove(folder: PortableFolderRef, name: string): Promise<boolean> {
    const snapshot = await this.shell.listChildren(folder);
    if (!snapshot.some((child) => child.name === name)) return true;

    const trash = await this.scratch("trash-");
    if (!(await this.shell.moveFromDevice(folder, name, trash))) return false;
    const gone = await waitFor(async () => !(await this.hasChild(folder, name)), this.poll);
    if (!gone) {
      this.context.logger.debug(`removal of ${name} did not finish within ${this.poll.timeoutMs}ms`);
      return false;
    }
    await fs.rm(trash, { recursive: true, force: true });
    return true;
  }

  private async scratch(prefix: string): Promise<string> {
    if (!this.scratchDir) {
      this.scratchDir = await fs.mkdtemp(path.join(this.scratchParent, "farmsync-mtp-"));
    }
    return fs.mkdtemp(path.join(this.scratchDir, prefix));
  }

  private async attempt(operation: string, run: () => Promise<boolean>): Promise<boolean> {
    try {
      const ok = await run();
      if (!ok) this.context.logger.debug(`${operation} failed`);
      return ok;
    } catch (error) {
      this.context.logger.debug(`${operation} failed: ${String(error)}`);
      return false;
    }
  }
}

async function treeStats(target: string): Promise<TreeStats | null> {
  let stat: Stats;
  try {
    stat = await fs.stat(target);
  } catch {
    return null;
  }
  if (!stat.isDirectory()) return { files: 1, bytes: stat.size };

  const totals: TreeStats = { files: 0, bytes: 0 };
  for (const entry of await fs.readdir(target)) {
    const child = await treeStats(path.join(target, entry));
    if (child) {
      totals.files += child.files;
      totals.bytes += child.bytes;
    }
  }
  return totals;
}

async function moveLocal(source: string, dest: string): Promise<void> {
  await fs.mkdir(path.dirname(dest), { recursive: true });
  await fs.rm(dest, { recursive: true, force: true });
  try {
    await fs.rename(source, dest);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EXDEV") throw error;
    await fs.cp(source, dest, { recursive: true });
    await fs.rm(source, { recursive: true, force: true });
  }
}

const DATE_TIME_PATTERN =
  /(\d{1,4})([./-])(\d{1,2})[./-](\d{1,4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AP]\.?M\.?)?/i;

/**
 * Parse a "Date modified" detail as rendered by the shell, e.g.
 * "10/18/2026 7:05 PM" (with bidi marks) or "18.10.2026 19:05".
 * Returns null for anything that isn't a date with a time.
 */
export function parseShellDate(detail: string): Date | null {
  const text = detail.replace(/[\u200e\u200f\u202a-\u202e]/g, "").trim();
  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) return null;

  const [, a, separator, b, c, hh, mm, ss, meridiem] = match;
  let year: number;
  let month: number;
  let day: number;
  if (a.length === 4) {
    [year, month, day] = [Number(a), Number(b), Number(c)];
  } else if (separator === ".") {
    [day, month, year] = [Number(a), Number(b), Number(c)];
  } else {
    [month, day, year] = [Number(a), Number(b), Number(c)];
  }
  if (year < 100) year += 2000;

  let hours = Number(hh);
  if (meridiem) {
    const pm = meridiem.toUpperCase().startsWith("P");
    if (pm && hours < 12) hours += 12;
    if (!pm && hours === 12) hours = 0;
  }

  const date = new Date(year, month - 1, day, hours, Number(mm), ss ? Number(ss) : 0);
  if (Number.isNaN(date.getTime()) || date.getMonth() !== month - 1) return null;
  return date;
}
