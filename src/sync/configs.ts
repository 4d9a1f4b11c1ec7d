/**
 * Mod config sync
 *
 * Each mod folder may carry a config.json. The desktop keeps them under
 * configs/<mod>/config.json; the loader's own settings file is mirrored at
 * configs/_internal/. Same tolerance and tie-break as save sync, but the newer
 * side always wins: no prompt and no backup.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ExecutionContext } from "../context.js";
import { internalConfigPath, modsPath, parentOf, type LogicalPath } from "../transport/paths.js";
import type { FileTransport } from "../transport/types.js";
import {
  DEFAULT_TOLERANCE_MS,
  decideSync,
  emptySyncResult,
  listLocalFolders,
  type SyncCandidate,
  type SyncResult,
} from "./reconcile.js";

export const CONFIG_FILE = "config.json";
export const INTERNAL_CONFIG_DIR = "_internal";

type ConfigTarget = {
  /** Name used in results */
  name: string;
  /** Device folder holding the file */
  deviceDir: LogicalPath;
  fileName: string;
  localFile: string;
  /** Whether the device folder exists (a config can't be pushed without its mod) */
  deviceDirExists: boolean;
  deviceFileExists: boolean;
};

export type ConfigSyncDeps = {
  transport: FileTransport;
  configsDir: string;
  toleranceMs?: number;
};

export class ConfigSynchronizer {
  private readonly transport: FileTransport;
  private readonly configsDir: string;
  private readonly toleranceMs: number;

  constructor(
    deps: ConfigSyncDeps,
    private readonly context: ExecutionContext,
  ) {
    this.transport = deps.transport;
    this.configsDir = deps.configsDir;
    this.toleranceMs = deps.toleranceMs ?? DEFAULT_TOLERANCE_MS;
  }

  /**
   * Newer side wins for every mod config and the internal config.
   */
  async syncConfigs(): Promise<SyncResult> {
    const result = emptySyncResult();

    for (const target of await this.collectTargets()) {
      const candidate = await this.toCandidate(target);
      const decision = decideSync(candidate, this.toleranceMs);

      if (decision.action === "none") {
        if (decision.reason === "timestamp-unavailable") {
          this.context.logger.warn(`${target.name}: no usable modification time; skipped`);
        }
        result.skipped.push(target.name);
      } else if (decision.action === "pull") {
        await this.pull(target, candidate.deviceModifiedAt, result);
      } else if (target.deviceDirExists) {
        await this.push(target, result);
      } else {
        this.context.logger.debug(`${target.name}: mod not installed on device; config not pushed`);
        result.skipped.push(target.name);
      }
    }

    return result;
  }

  /** Copy every device config to the desktop */
  async pullConfigs(): Promise<SyncResult> {
    const result = emptySyncResult();
    for (const target of await this.collectTargets()) {
      if (!target.deviceFileExists) {
        result.skipped.push(target.name);
        continue;
      }
      const deviceTime = await this.transport.getModificationTime(target.deviceDir, target.fileName);
      await this.pull(target, deviceTime, result);
    }
    return result;
  }

  /** Copy every local config to the device */
  async pushConfigs(): Promise<SyncResult> {
    const result = emptySyncResult();
    for (const target of await this.collectTargets()) {
      if (!(await fileExists(target.localFile)) || !target.deviceDirExists) {
        result.skipped.push(target.name);
        continue;
      }
      await this.push(target, result);
    }
    return result;
  }

  private async collectTargets(): Promise<ConfigTarget[]> {
    const deviceMods = (await this.transport.listDirectory(modsPath()))
      .filter((entry) => entry.isFolder)
      .map((entry) => entry.name);
    const localMods = (await listLocalFolders(this.configsDir)).filter((name) => name !== INTERNAL_CONFIG_DIR);
    const deviceModSet = new Set(deviceMods);

    const targets: ConfigTarget[] = [];
    for (const mod of [...new Set([...deviceMods, ...localMods])].sort()) {
      const deviceDirExists = deviceModSet.has(mod);
      const deviceFiles = deviceDirExists ? await this.transport.listDirectory(modsPath(mod)) : [];
      targets.push({
        name: mod,
        deviceDir: modsPath(mod),
        fileName: CONFIG_FILE,
        localFile: path.join(this.configsDir, mod, CONFIG_FILE),
        deviceDirExists,
        deviceFileExists: deviceFiles.some((entry) => !entry.isFolder && entry.name === CONFIG_FILE),
      });
    }

    const internal = parentOf(internalConfigPath());
    if (internal) {
      const files = await this.transport.listDirectory(internal.parent);
      const folder = parentOf(internal.parent);
      const deviceDirExists = folder
        ? (await this.transport.listDirectory(folder.parent)).some(
            (entry) => entry.isFolder && entry.name === folder.name,
          )
        : true;
      targets.push({
        name: internalConfigPath().join("/"),
        deviceDir: internal.parent,
        fileName: internal.name,
        localFile: path.join(this.configsDir, INTERNAL_CONFIG_DIR, internal.name),
        deviceDirExists,
        deviceFileExists: files.some((entry) => !entry.isFolder && entry.name === internal.name),
      });
    }

    // Mods with a folder but no config on either side have nothing to sync
    const withConfig: ConfigTarget[] = [];
    for (const target of targets) {
      if (target.deviceFileExists || (await fileExists(target.localFile))) {
        withConfig.push(target);
      }
    }
    return withConfig;
  }

  private async toCandidate(target: ConfigTarget): Promise<SyncCandidate> {
    const localTime = await fileTime(target.localFile);
    const localExists = localTime !== null;
    const both = localExists && target.deviceFileExists;
    return {
      name: target.name,
      localExists,
      deviceExists: target.deviceFileExists,
      localModifiedAt: both ? localTime : null,
      deviceModifiedAt: both
        ? await this.transport.getModificationTime(target.deviceDir, target.fileName)
        : null,
    };
  }

  private async pull(target: ConfigTarget, deviceTime: Date | null, result: SyncResult): Promise<void> {
    const ok = await this.transport.pullFile(target.deviceDir, target.fileName, target.localFile);
    if (!ok) {
      this.context.logger.error(`Failed to pull config ${target.name}`);
      result.failed.push(target.name);
      return;
    }
    result.pulled.push(target.name);
    if (deviceTime && !this.context.dryRun) {
      await this.touch(target.localFile, deviceTime);
    }
  }

  private async push(target: ConfigTarget, result: SyncResult): Promise<void> {
    const ok = await this.transport.pushFile(target.deviceDir, target.localFile);
    if (!ok) {
      this.context.logger.error(`Failed to push config ${target.name}`);
      result.failed.push(target.name);
      return;
    }
    result.pushed.push(target.name);
    if (!this.context.dryRun) {
      await this.touch(target.localFile, new Date());
    }
  }

  private async touch(file: string, time: Date): Promise<void> {
    try {
      await fs.utimes(file, time, time);
    } catch (error) {
      this.context.logger.debug(`could not update times of ${file}: ${String(error)}`);
    }
  }
}

async function fileTime(file: string): Promise<Date | null> {
  try {
    const stat = await fs.stat(file);
    return stat.isFile() ? stat.mtime : null;
  } catch {
    return null;
  }
}

async function fileExists(file: string): Promise<boolean> {
  return (await fileTime(file)) !== null;
}
