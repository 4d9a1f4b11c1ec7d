/**
 * Save backups
 *
 * Before a device copy replaces a local save, the local folder is copied to
 * backups/<save>/<stamp>/. Stamps sort by capture time, so pruning keeps the
 * first `retention` names in descending order.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ExecutionContext } from "../context.js";

export const DEFAULT_BACKUP_RETENTION = 5;

export type BackupManagerOptions = {
  /** Folder holding the items being backed up (local saves) */
  sourceDir: string;
  backupsDir: string;
  retention?: number;
  now?: () => Date;
};

/**
 * Sortable UTC stamp: 20261018-190512-042
 */
export function formatBackupStamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `-${pad(date.getUTCMilliseconds(), 3)}`
  );
}

export class BackupManager {
  private readonly sourceDir: string;
  private readonly backupsDir: string;
  private readonly retention: number;
  private readonly now: () => Date;

  constructor(
    options: BackupManagerOptions,
    private readonly context: ExecutionContext,
  ) {
    this.sourceDir = options.sourceDir;
    this.backupsDir = options.backupsDir;
    this.retention = Math.max(1, options.retention ?? DEFAULT_BACKUP_RETENTION);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Snapshot the local copy of `name` and prune old snapshots.
   * Returns the new backup folder, or null when there was nothing to copy.
   */
  async backup(name: string): Promise<string | null> {
    const source = path.join(this.sourceDir, name);
    try {
      const stat = await fs.stat(source);
      if (!stat.isDirectory()) return null;
    } catch {
      return null;
    }

    let stamp = formatBackupStamp(this.now());
    const itemDir = path.join(this.backupsDir, name);
    const existing = await this.list(name);
    // Two backups inside the same millisecond
    while (existing.includes(stamp)) {
      stamp = `${stamp}-1`;
    }
    const target = path.join(itemDir, stamp);

    if (this.context.dryRun) {
      this.context.logger.info(`[dry-run] would back up ${name} -> ${target}`);
      return target;
    }

    await fs.mkdir(itemDir, { recursive: true });
    await fs.cp(source, target, { recursive: true, preserveTimestamps: true });
    this.context.logger.debug(`backed up ${name} -> ${target}`);

    await this.prune(name);
    return target;
  }

  /**
   * Backup stamps of an item, newest first.
   */
  async list(name: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(path.join(this.backupsDir, name), { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort((a, b) => b.localeCompare(a));
    } catch {
      return [];
    }
  }

  private async prune(name: string): Promise<void> {
    const stamps = await this.list(name);
    for (const stale of stamps.slice(this.retention)) {
      await fs.rm(path.join(this.backupsDir, name, stale), { recursive: true, force: true });
      this.context.logger.debug(`pruned backup ${name}/${stale}`);
    }
  }
}
