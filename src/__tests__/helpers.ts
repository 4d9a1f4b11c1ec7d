/**
 * Shared test utilities
 *
 * In-process stand-ins for the device: a file transport backed by a temp
 * directory, a scripted adb client, and a portable-device shell whose copies
 * and moves only become visible a few listings later.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { createExecutionContext, type ExecutionContext } from "../context.js";
import { createMemoryLogger, type MemoryLogger } from "../logger.js";
import { localFolderTime } from "../sync/reconcile.js";
import type { Prompter } from "../prompt.js";
import type { ProcessResult } from "../process.js";
import type { AdbClient, AdbDeviceEntry } from "../transport/adb.js";
import type { LogicalPath, NamedEntry } from "../transport/paths.js";
import type { PortableDeviceShell, PortableFolderRef } from "../transport/portable-shell.js";
import type { DirEntry, FileTransport } from "../transport/types.js";

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `farmsync-${prefix}-`));
}

export function createTestContext(
  options: { dryRun?: boolean; force?: boolean } = {},
): { context: ExecutionContext; logger: MemoryLogger } {
  const logger = createMemoryLogger();
  return { context: createExecutionContext({ ...options, logger }), logger };
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf-8");
  }
}

/**
 * Set the times of a path and its direct children.
 */
export async function setTimes(target: string, time: Date): Promise<void> {
  const stat = await fs.stat(target);
  if (stat.isDirectory()) {
    for (const entry of await fs.readdir(target)) {
      await fs.utimes(path.join(target, entry), time, time);
    }
  }
  await fs.utimes(target, time, time);
}

export function ok(stdout = ""): ProcessResult {
  return { code: 0, stdout, stderr: "" };
}

export function fail(stderr: string, code = 1): ProcessResult {
  return { code, stdout: "", stderr };
}

/**
 * FileTransport over a local directory standing in for the app-data root.
 * Modification times follow the local rule (newest of an item and its
 * direct children); tests set them with setTimes.
 */
export class DirectoryTransport implements FileTransport {
  readonly calls: string[] = [];
  disposed = false;
  /** Logical paths (joined with "/") whose operations fail */
  readonly failing = new Set<string>();

  constructor(readonly root: string) {}

  resolve(logical: LogicalPath, name?: string): string {
    return path.join(this.root, ...logical, ...(name === undefined ? [] : [name]));
  }

  async listDirectory(logical: LogicalPath): Promise<DirEntry[]> {
    this.calls.push(`list ${logical.join("/")}`);
    try {
      const entries = await fs.readdir(this.resolve(logical), { withFileTypes: true });
      return entries.map((entry) => ({ name: entry.name, isFolder: entry.isDirectory() }));
    } catch {
      return [];
    }
  }

  async pullFile(logical: LogicalPath, name: string, localDest: string): Promise<boolean> {
    this.calls.push(`pullFile ${[...logical, name].join("/")}`);
    if (this.failing.has([...logical, name].join("/"))) return false;
    try {
      await fs.mkdir(path.dirname(localDest), { recursive: true });
      await fs.copyFile(this.resolve(logical, name), localDest);
      return true;
    } catch {
      return false;
    }
  }

  async pushFile(logical: LogicalPath, localFile: string): Promise<boolean> {
    this.calls.push(`pushFile ${[...logical, path.basename(localFile)].join("/")}`);
    try {
      await fs.mkdir(this.resolve(logical), { recursive: true });
      await fs.copyFile(localFile, path.join(this.resolve(logical), path.basename(localFile)));
      return true;
    } catch {
      return false;
    }
  }

  async pullFolder(logical: LogicalPath, localDest: string): Promise<boolean> {
    this.calls.push(`pullFolder ${logical.join("/")}`);
    if (this.failing.has(logical.join("/"))) return false;
    try {
      await fs.mkdir(path.dirname(localDest), { recursive: true });
      await fs.cp(this.resolve(logical), localDest, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  async pushFolder(logical: LogicalPath, localDir: string): Promise<boolean> {
    this.calls.push(`pushFolder ${logical.join("/")}`);
    if (this.failing.has(logical.join("/"))) return false;
    try {
      const target = this.resolve(logical);
      await fs.rm(target, { recursive: true, force: true });
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.cp(localDir, target, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  async deleteItem(logical: LogicalPath, name: string): Promise<boolean> {
    this.calls.push(`delete ${[...logical, name].join("/")}`);
    await fs.rm(this.resolve(logical, name), { recursive: true, force: true });
    return true;
  }

  async getModificationTime(logical: LogicalPath, name: string): Promise<Date | null> {
    return localFolderTime(this.resolve(logical, name));
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}

export type FakeAdbOptions = {
  devices?: AdbDeviceEntry[];
  /** Response to `adb shell`; unmatched commands succeed with no output */
  shell?: (command: string) => ProcessResult | undefined;
  pull?: (remote: string, local: string) => Promise<ProcessResult>;
  install?: (apkPaths: readonly string[]) => ProcessResult;
};

export type FakeAdb = AdbClient & {
  readonly commands: string[];
  readonly pulls: Array<{ remote: string; local: string }>;
  readonly pushes: Array<{ local: string; remote: string }>;
  readonly installs: string[][];
};

export function createFakeAdb(options: FakeAdbOptions = {}): FakeAdb {
  const commands: string[] = [];
  const pulls: Array<{ remote: string; local: string }> = [];
  const pushes: Array<{ local: string; remote: string }> = [];
  const installs: string[][] = [];

  return {
    commands,
    pulls,
    pushes,
    installs,
    async devices() {
      return options.devices ?? [];
    },
    async shell(_serial, command) {
      commands.push(command);
      return options.shell?.(command) ?? ok();
    },
    async pull(_serial, remote, local) {
      pulls.push({ remote, local });
      return options.pull ? options.pull(remote, local) : ok();
    },
    async push(_serial, local, remote) {
      pushes.push({ local, remote });
      return ok();
    },
    async install(_serial, apkPaths) {
      installs.push([...apkPaths]);
      return options.install?.(apkPaths) ?? ok("Success");
    },
  };
}

type PendingChange = { remaining: number; apply: () => Promise<void> };

export type FakePortableShellOptions = {
  deviceName?: string;
  /** Listings that pass before a started copy or move shows up (Infinity: never) */
  lag?: number;
};

/**
 * Portable-device shell over a local directory. The directory's top level
 * holds the storage volumes of one device. Copies to the device and moves
 * off it complete after `lag` listings, like the real shell's background
 * transfers.
 */
export class FakePortableShell implements PortableDeviceShell {
  readonly deviceName: string;
  readonly details = new Map<string, Record<number, string>>();
  readonly operations: string[] = [];
  closed = false;
  lag: number;
  /** Copies to the device recreate nested folders empty, like a transfer cut off midway */
  truncateCopies = false;

  private pending: PendingChange[] = [];

  constructor(
    readonly root: string,
    options: FakePortableShellOptions = {},
  ) {
    this.deviceName = options.deviceName ?? "Pixel Test";
    this.lag = options.lag ?? 2;
  }

  folderPath(folder: PortableFolderRef): string {
    return path.join(this.root, ...folder.segments);
  }

  /** Set what getDetail returns for `segments/name` */
  setDetail(segments: readonly string[], name: string, column: number, value: string): void {
    const key = [...segments, name].join("/");
    this.details.set(key, { ...this.details.get(key), [column]: value });
  }

  async listDevices(): Promise<string[]> {
    return [this.deviceName];
  }

  async listChildren(folder: PortableFolderRef): Promise<NamedEntry[]> {
    await this.tick();
    if (folder.device !== this.deviceName) return [];
    try {
      const entries = await fs.readdir(this.folderPath(folder), { withFileTypes: true });
      return entries
        .map((entry) => ({ name: entry.name, isFolder: entry.isDirectory() }))
        .sort((a, b) => a.name.localeCompare(b.name));
    } catch {
      return [];
    }
  }

  async getDetail(folder: PortableFolderRef, name: string, column: number): Promise<string | null> {
    return this.details.get([...folder.segments, name].join("/"))?.[column] ?? null;
  }

  async copyToDevice(folder: PortableFolderRef, localPath: string): Promise<boolean> {
    const target = path.join(this.folderPath(folder), path.basename(localPath));
    this.operations.push(`copyTo ${[...folder.segments, path.basename(localPath)].join("/")}`);
    const truncate = this.truncateCopies;
    this.schedule(async () => {
      await fs.cp(localPath, target, {
        recursive: true,
        filter: async (source) =>
          !truncate || path.dirname(source) === localPath || source === localPath || (await fs.stat(source)).isDirectory(),
      });
    });
    return true;
  }

  async copyFromDevice(folder: PortableFolderRef, name: string, localDir: string): Promise<boolean> {
    const source = path.join(this.folderPath(folder), name);
    this.operations.push(`copyFrom ${[...folder.segments, name].join("/")}`);
    try {
      await fs.cp(source, path.join(localDir, name), { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  async moveFromDevice(folder: PortableFolderRef, name: string, localDir: string): Promise<boolean> {
    const source = path.join(this.folderPath(folder), name);
    this.operations.push(`moveFrom ${[...folder.segments, name].join("/")}`);
    this.schedule(async () => {
      await fs.cp(source, path.join(localDir, name), { recursive: true });
      await fs.rm(source, { recursive: true, force: true });
    });
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private schedule(apply: () => Promise<void>): void {
    this.pending.push({ remaining: this.lag, apply });
  }

  private async tick(): Promise<void> {
    const due: PendingChange[] = [];
    const waiting: PendingChange[] = [];
    for (const change of this.pending) {
      change.remaining -= 1;
      (change.remaining <= 0 ? due : waiting).push(change);
    }
    this.pending = waiting;
    for (const change of due) {
      await change.apply();
    }
  }
}

/**
 * Prompter answering from a script, recording every question.
 */
export function createScriptedPrompter(answers: boolean[] = []): Prompter & {
  readonly questions: string[];
  readonly waits: string[];
} {
  const questions: string[] = [];
  const waits: string[] = [];
  const queue = [...answers];
  return {
    questions,
    waits,
    async confirm(question, defaultAnswer) {
      questions.push(question);
      const next = queue.shift();
      return next ?? defaultAnswer;
    },
    async waitForOperator(message) {
      waits.push(message);
    },
    close() {},
  };
}
