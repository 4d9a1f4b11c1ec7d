/**
 * Direct transport: file access through `adb shell`, `adb pull` and `adb push`.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ExecutionContext } from "../context.js";
import { FileAccessDeniedError } from "../errors.js";
import type { AdbDevice } from "./adb.js";
import { formatLogicalPath, shellQuote, toShellPath, type LogicalPath } from "./paths.js";
import type { DeviceInfo, DirEntry, FileTransport } from "./types.js";

export type DirectTransportOptions = DeviceInfo & {
  device: AdbDevice;
  storageRoot: string;
  packageName: string;
  /** False when the app-data root refused a listing; file calls then fail */
  canAccessFilesDirectly: boolean;
};

export class DirectShellTransport implements FileTransport {
  readonly kind = "direct" as const;
  readonly canExecuteCommands = true;
  readonly canAccessFilesDirectly: boolean;
  readonly identity: string;
  readonly displayName: string;
  readonly model: string;
  readonly commands: AdbDevice;

  private readonly storageRoot: string;
  private readonly packageName: string;

  constructor(
    options: DirectTransportOptions,
    private readonly context: ExecutionContext,
  ) {
    this.identity = options.identity;
    this.displayName = options.displayName;
    this.model = options.model;
    this.commands = options.device;
    this.storageRoot = options.storageRoot;
    this.packageName = options.packageName;
    this.canAccessFilesDirectly = options.canAccessFilesDirectly;
  }

  /** Device-side absolute path of a logical path */
  remotePath(logical: LogicalPath): string {
    return toShellPath(this.storageRoot, this.packageName, logical);
  }

  async listDirectory(logical: LogicalPath): Promise<DirEntry[]> {
    if (!this.ensureAccess("list", logical)) return [];
    const result = await this.commands.shell(`ls -1p ${shellQuote(this.remotePath(logical))}`);
    if (result.code !== 0) {
      this.context.logger.debug(`ls ${formatLogicalPath(logical)}: ${result.stderr.trim() || result.stdout.trim()}`);
      return [];
    }
    return parseListing(result.stdout);
  }

  async pullFile(logical: LogicalPath, name: string, localDest: string): Promise<boolean> {
    const remote = this.remotePath([...logical, name]);
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would pull ${remote} -> ${localDest}`);
      return true;
    }
    if (!this.ensureAccess("pull", logical)) return false;
    if (!(await this.ensureLocalDir(path.dirname(localDest)))) return false;
    const result = await this.commands.pull(remote, localDest);
    return this.succeeded("pull", remote, result.code, result.stderr);
  }

  async pushFile(logical: LogicalPath, localFile: string): Promise<boolean> {
    const remoteDir = this.remotePath(logical);
    const remote = `${remoteDir}/${path.basename(localFile)}`;
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would push ${localFile} -> ${remote}`);
      return true;
    }
    if (!this.ensureAccess("push", logical)) return false;
    const mkdir = await this.commands.shell(`mkdir -p ${shellQuote(remoteDir)}`);
    if (!this.succeeded("mkdir", remoteDir, mkdir.code, mkdir.stderr)) return false;
    const result = await this.commands.push(localFile, remote);
    return this.succeeded("push", remote, result.code, result.stderr);
  }

  async pullFolder(logical: LogicalPath, localDest: string): Promise<boolean> {
    const remote = this.remotePath(logical);
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would pull folder ${remote} -> ${localDest}`);
      return true;
    }
    if (!this.ensureAccess("pull", logical)) return false;
    if (!(await this.ensureLocalDir(localDest))) return false;
    // `<dir>/.` copies the folder's contents rather than the folder itself
    const result = await this.commands.pull(`${remote}/.`, localDest);
    return this.succeeded("pull", remote, result.code, result.stderr);
  }

  async pushFolder(logical: LogicalPath, localDir: string): Promise<boolean> {
    const remote = this.remotePath(logical);
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would push folder ${localDir} -> ${remote}`);
      return true;
    }
    if (!this.ensureAccess("push", logical)) return false;
    // An existing destination would receive the source one level deeper
    const clear = await this.commands.shell(
      `rm -rf ${shellQuote(remote)} && mkdir -p ${shellQuote(remote)}`,
    );
    if (!this.succeeded("clear", remote, clear.code, clear.stderr)) return false;
    const result = await this.commands.push(`${localDir}${path.sep}.`, remote);
    return this.succeeded("push", remote, result.code, result.stderr);
  }

  async deleteItem(logical: LogicalPath, name: string): Promise<boolean> {
    const remote = this.remotePath([...logical, name]);
    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would delete ${remote}`);
      return true;
    }
    if (!this.ensureAccess("delete", logical)) return false;
    const result = await this.commands.shell(`rm -rf ${shellQuote(remote)}`);
    return this.succeeded("delete", remote, result.code, result.stderr);
  }

  async getModificationTime(logical: LogicalPath, name: string): Promise<Date | null> {
    if (!this.canAccessFilesDirectly) return null;
    const remote = this.remotePath([...logical, name]);
    // Newest of the item and its direct children; an empty folder leaves the
    // glob unmatched, so the exit code is not checked
    const quoted = shellQuote(remote);
    const result = await this.commands.shell(`stat -c %Y ${quoted} ${quoted}/* 2>/dev/null`);
    const seconds = result.stdout
      .split(/\r?\n/)
      .map((line) => Number.parseInt(line.trim(), 10))
      .filter((value) => Number.isFinite(value));
    return seconds.length > 0 ? new Date(Math.max(...seconds) * 1000) : null;
  }

  async dispose(): Promise<void> {
    // adb keeps no per-invocation state
  }

  private ensureAccess(operation: string, logical: LogicalPath): boolean {
    if (this.canAccessFilesDirectly) return true;
    const denied = new FileAccessDeniedError(this.remotePath(logical));
    this.context.logger.debug(`${operation} ${formatLogicalPath(logical)}: ${denied.message}`);
    return false;
  }

  private async ensureLocalDir(dir: string): Promise<boolean> {
    try {
      await fs.mkdir(dir, { recursive: true });
      return true;
    } catch (error) {
      this.context.logger.debug(`mkdir ${dir} failed: ${String(error)}`);
      return false;
    }
  }

  private succeeded(operation: string, target: string, code: number, stderr: string): boolean {
    if (code === 0) return true;
    this.context.logger.debug(`${operation} ${target} failed (${code}): ${stderr.trim()}`);
    return false;
  }
}

/**
 * Parse `ls -1p` output: folders carry a trailing slash.
 */
export function parseListing(output: string): DirEntry[] {
  const entries: DirEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trimEnd();
    if (!trimmed || trimmed === "./" || trimmed === "../") continue;
    if (trimmed.endsWith("/")) {
      entries.push({ name: trimmed.slice(0, -1), isFolder: true });
    } else {
      entries.push({ name: trimmed, isFolder: false });
    }
  }
  return entries;
}
