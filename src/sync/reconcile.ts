/**
 * Save and mod reconciliation
 *
 * Each named item (a save folder or a mod folder) is compared by presence
 * and modification time. Timestamps closer than the tolerance window count
 * as equal; otherwise the newer side wins. Pulls that replace an existing
 * local save are preceded by a backup. Unless forced, every action is
 * confirmed by the operator first.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ExecutionContext } from "../context.js";
import type { Prompter } from "../prompt.js";
import { modsPath, savesPath, type LogicalPath } from "../transport/paths.js";
import type { FileTransport } from "../transport/types.js";
import type { BackupManager } from "./backup.js";

export const DEFAULT_TOLERANCE_MS = 60_000;

const STAGING_DIR = ".farmsync-incoming";

export type SyncCandidate = {
  name: string;
  localExists: boolean;
  deviceExists: boolean;
  localModifiedAt: Date | null;
  deviceModifiedAt: Date | null;
};

export type SyncDecision =
  | { action: "none"; reason: "in-sync" | "timestamp-unavailable" }
  | { action: "pull"; reason: "device-newer" | "device-only"; backup: boolean; defaultAnswer: boolean }
  | { action: "push"; reason: "local-newer" | "local-only"; defaultAnswer: boolean };

export type SyncResult = {
  pulled: string[];
  pushed: string[];
  /** No action needed */
  skipped: string[];
  /** Operator said no */
  declined: string[];
  failed: string[];
  /** Backup folders created */
  backups: string[];
  /** Present only on the device and left there */
  deviceOnly: string[];
};

export function emptySyncResult(): SyncResult {
  return { pulled: [], pushed: [], skipped: [], declined: [], failed: [], backups: [], deviceOnly: [] };
}

export function summarizeSyncResult(result: SyncResult): string {
  return [
    `${result.pulled.length} pulled`,
    `${result.pushed.length} pushed`,
    `${result.skipped.length} unchanged`,
    ...(result.declined.length > 0 ? [`${result.declined.length} declined`] : []),
    ...(result.failed.length > 0 ? [`${result.failed.length} failed`] : []),
  ].join(", ");
}

/**
 * Decide what to do with one item.
 *
 * The clear cases (one side newer) default to yes; one-sided items, where
 * the other side may simply have been deleted, default to no.
 */
export function decideSync(candidate: SyncCandidate, toleranceMs: number = DEFAULT_TOLERANCE_MS): SyncDecision {
  if (candidate.localExists && candidate.deviceExists) {
    if (!candidate.localModifiedAt || !candidate.deviceModifiedAt) {
      return { action: "none", reason: "timestamp-unavailable" };
    }
    const delta = candidate.deviceModifiedAt.getTime() - candidate.localModifiedAt.getTime();
    if (Math.abs(delta) < toleranceMs) {
      return { action: "none", reason: "in-sync" };
    }
    return delta > 0
      ? { action: "pull", reason: "device-newer", backup: true, defaultAnswer: true }
      : { action: "push", reason: "local-newer", defaultAnswer: true };
  }
  if (candidate.localExists) {
    return { action: "push", reason: "local-only", defaultAnswer: false };
  }
  if (candidate.deviceExists) {
    return { action: "pull", reason: "device-only", backup: false, defaultAnswer: false };
  }
  return { action: "none", reason: "in-sync" };
}

export function describeDecision(name: string, decision: SyncDecision, candidate: SyncCandidate): string {
  switch (decision.reason) {
    case "device-newer":
      return `Pull "${name}" from device (device copy is ${formatDelta(candidate)} newer)?`;
    case "local-newer":
      return `Push "${name}" to device (local copy is ${formatDelta(candidate)} newer)?`;
    case "device-only":
      return `"${name}" exists only on the device. Pull it?`;
    case "local-only":
      return `"${name}" exists only locally. Push it to the device?`;
    case "in-sync":
      return `"${name}" is in sync`;
    case "timestamp-unavailable":
      return `"${name}" has no usable modification time; skipped`;
  }
}

export function formatDelta(candidate: SyncCandidate): string {
  if (!candidate.localModifiedAt || !candidate.deviceModifiedAt) return "?";
  const seconds = Math.round(
    Math.abs(candidate.deviceModifiedAt.getTime() - candidate.localModifiedAt.getTime()) / 1000,
  );
  if (seconds < 3600) return `${Math.round(seconds / 60)}m`;
  if (seconds < 86400) return `${Math.round(seconds / 3600)}h`;
  return `${Math.round(seconds / 86400)}d`;
}

/**
 * Newest mtime of a folder and its direct children.
 */
export async function localFolderTime(dir: string): Promise<Date | null> {
  try {
    const stat = await fs.stat(dir);
    let newest = stat.mtimeMs;
    if (stat.isDirectory()) {
      for (const entry of await fs.readdir(dir)) {
        const child = await fs.stat(path.join(dir, entry));
        newest = Math.max(newest, child.mtimeMs);
      }
    }
    return new Date(newest);
  } catch {
    return null;
  }
}

/**
 * Set a folder's (and its direct children's) times so the next comparison
 * sees both sides as equal.
 */
export async function alignLocalTime(target: string, time: Date): Promise<void> {
  const stat = await fs.stat(target);
  if (stat.isDirectory()) {
    for (const entry of await fs.readdir(target)) {
      await fs.utimes(path.join(target, entry), time, time);
    }
  }
  await fs.utimes(target, time, time);
}

export async function listLocalFolders(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

export type ReconciliationDeps = {
  transport: FileTransport;
  savesDir: string;
  modsDir: string;
  backups: BackupManager;
  prompter: Prompter;
  toleranceMs?: number;
  now?: () => Date;
};

export class ReconciliationEngine {
  private readonly transport: FileTransport;
  private readonly savesDir: string;
  private readonly modsDir: string;
  private readonly backups: BackupManager;
  private readonly prompter: Prompter;
  private readonly toleranceMs: number;
  private readonly now: () => Date;

  constructor(
    deps: ReconciliationDeps,
    private readonly context: ExecutionContext,
  ) {
    this.transport = deps.transport;
    this.savesDir = deps.savesDir;
    this.modsDir = deps.modsDir;
    this.backups = deps.backups;
    this.prompter = deps.prompter;
    this.toleranceMs = deps.toleranceMs ?? DEFAULT_TOLERANCE_MS;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Presence and timestamps of every save, local and device names merged.
   */
  async collectSaveCandidates(): Promise<SyncCandidate[]> {
    return this.collectCandidates(this.savesDir, savesPath());
  }

  /**
   * Compare saves without changing anything.
   */
  async compareSaves(): Promise<Array<{ candidate: SyncCandidate; decision: SyncDecision }>> {
    const candidates = await this.collectSaveCandidates();
    return candidates.map((candidate) => ({ candidate, decision: decideSync(candidate, this.toleranceMs) }));
  }

  /**
   * Bidirectional save sync.
   */
  async syncSaves(): Promise<SyncResult> {
    const result = emptySyncResult();
    const { logger } = this.context;

    for (const candidate of await this.collectSaveCandidates()) {
      const decision = decideSync(candidate, this.toleranceMs);

      if (decision.action === "none") {
        if (decision.reason === "timestamp-unavailable") {
          logger.warn(describeDecision(candidate.name, decision, candidate));
        } else {
          logger.debug(describeDecision(candidate.name, decision, candidate));
        }
        result.skipped.push(candidate.name);
        continue;
      }

      if (!this.context.force) {
        const question = describeDecision(candidate.name, decision, candidate);
        if (!(await this.prompter.confirm(question, decision.defaultAnswer))) {
          result.declined.push(candidate.name);
          continue;
        }
      }

      if (decision.action === "pull") {
        await this.pullSave(candidate.name, decision.backup && candidate.localExists, candidate, result);
      } else {
        await this.pushItem(savesPath(candidate.name), this.savesDir, candidate.name, result);
      }
    }

    return result;
  }

  /**
   * Copy every device save to the desktop, backing up existing local copies.
   */
  async pullSaves(): Promise<SyncResult> {
    const result = emptySyncResult();
    for (const candidate of await this.collectSaveCandidates()) {
      if (!candidate.deviceExists) {
        result.skipped.push(candidate.name);
        continue;
      }
      await this.pullSave(candidate.name, candidate.localExists, candidate, result);
    }
    return result;
  }

  /**
   * Copy every local save to the device.
   */
  async pushSaves(): Promise<SyncResult> {
    const result = emptySyncResult();
    for (const name of await listLocalFolders(this.savesDir)) {
      await this.pushItem(savesPath(name), this.savesDir, name, result);
    }
    return result;
  }

  /**
   * Push local mods missing from the device. Device-only mods are reported
   * and left alone: adopting them locally is the job of pullMods.
   */
  async pushMissingMods(): Promise<SyncResult> {
    const result = emptySyncResult();
    const local = await listLocalFolders(this.modsDir);
    const device = new Set(await this.deviceFolders(modsPath()));

    for (const name of local) {
      if (device.has(name)) {
        result.skipped.push(name);
        continue;
      }
      await this.pushItem(modsPath(name), this.modsDir, name, result);
    }

    const localSet = new Set(local);
    result.deviceOnly.push(...[...device].filter((name) => !localSet.has(name)).sort());
    return result;
  }

  /**
   * Copy device-only mods to the desktop; with force, replace local copies too.
   */
  async pullMods(): Promise<SyncResult> {
    const result = emptySyncResult();
    const local = new Set(await listLocalFolders(this.modsDir));

    for (const name of await this.deviceFolders(modsPath())) {
      if (local.has(name) && !this.context.force) {
        result.skipped.push(name);
        continue;
      }
      const ok = await this.pullInto(modsPath(name), this.modsDir, name);
      (ok ? result.pulled : result.failed).push(name);
    }
    return result;
  }

  /**
   * Copy every local mod to the device, replacing device copies.
   */
  async pushMods(): Promise<SyncResult> {
    const result = emptySyncResult();
    for (const name of await listLocalFolders(this.modsDir)) {
      await this.pushItem(modsPath(name), this.modsDir, name, result);
    }
    return result;
  }

  private async collectCandidates(localDir: string, deviceRoot: LogicalPath): Promise<SyncCandidate[]> {
    const local = new Set(await listLocalFolders(localDir));
    const device = new Set(await this.deviceFolders(deviceRoot));
    const names = [...new Set([...local, ...device])].sort();

    const candidates: SyncCandidate[] = [];
    for (const name of names) {
      const localExists = local.has(name);
      const deviceExists = device.has(name);
      const both = localExists && deviceExists;
      candidates.push({
        name,
        localExists,
        deviceExists,
        localModifiedAt: both ? await localFolderTime(path.join(localDir, name)) : null,
        deviceModifiedAt: both ? await this.transport.getModificationTime(deviceRoot, name) : null,
      });
    }
    return candidates;
  }

  private async deviceFolders(logical: LogicalPath): Promise<string[]> {
    const entries = await this.transport.listDirectory(logical);
    return entries.filter((entry) => entry.isFolder).map((entry) => entry.name);
  }

  private async pullSave(
    name: string,
    backupFirst: boolean,
    candidate: SyncCandidate,
    result: SyncResult,
  ): Promise<void> {
    if (backupFirst) {
      try {
        const backup = await this.backups.backup(name);
        if (backup) result.backups.push(backup);
      } catch (error) {
        // Never replace a save that couldn't be backed up
        this.context.logger.error(`Backup of ${name} failed: ${String(error)}`);
        result.failed.push(name);
        return;
      }
    }

    const ok = await this.pullInto(savesPath(name), this.savesDir, name, candidate.deviceModifiedAt);
    if (ok) {
      result.pulled.push(name);
    } else {
      this.context.logger.error(`Failed to pull save ${name}`);
      result.failed.push(name);
    }
  }

  /**
   * Pull a device folder into a staging folder, then swap it in, so a
   * failed transfer never leaves a half-replaced local copy.
   */
  private async pullInto(
    logical: LogicalPath,
    localParent: string,
    name: string,
    deviceTime: Date | null = null,
  ): Promise<boolean> {
    const staging = path.join(localParent, STAGING_DIR, name);
    const target = path.join(localParent, name);

    try {
      await fs.rm(staging, { recursive: true, force: true });
      if (!(await this.transport.pullFolder(logical, staging))) return false;
      if (this.context.dryRun) return true;

      await fs.rm(target, { recursive: true, force: true });
      await fs.rename(staging, target);
      await fs.rm(path.join(localParent, STAGING_DIR), { recursive: true, force: true });
      if (deviceTime) {
        await alignLocalTime(target, deviceTime);
      }
      return true;
    } catch (error) {
      this.context.logger.debug(`pull ${name} failed: ${String(error)}`);
      return false;
    }
  }

  private async pushItem(logical: LogicalPath, localParent: string, name: string, result: SyncResult): Promise<void> {
    const source = path.join(localParent, name);
    const ok = await this.transport.pushFolder(logical, source);
    if (!ok) {
      this.context.logger.error(`Failed to push ${name}`);
      result.failed.push(name);
      return;
    }
    result.pushed.push(name);
    if (!this.context.dryRun) {
      try {
        await alignLocalTime(source, this.now());
      } catch (error) {
        this.context.logger.debug(`could not update times of ${source}: ${String(error)}`);
      }
    }
  }
}
