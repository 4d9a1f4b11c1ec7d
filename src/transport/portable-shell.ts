/**
 * Portable-device shell
 *
 * The copy-based transport reaches the phone through the desktop's generic
 * portable-device browser (Windows Shell namespace, driven from PowerShell).
 * Folders are addressed by the chain of display names from the device root;
 * copies and moves only start here and finish asynchronously, on the
 * PowerShell session that started them.
 */

import { spawn } from "node:child_process";
import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { z } from "zod";

import type { NamedEntry } from "./paths.js";

export type PortableFolderRef = {
  readonly device: string;
  readonly segments: readonly string[];
};

export function childRef(folder: PortableFolderRef, name: string): PortableFolderRef {
  return { device: folder.device, segments: [...folder.segments, name] };
}

export interface PortableDeviceShell {
  /** Names of attached portable devices */
  listDevices(): Promise<string[]>;
  /** Children of a folder; empty when the folder can't be reached */
  listChildren(folder: PortableFolderRef): Promise<NamedEntry[]>;
  /** One detail column of an item, as the shell renders it */
  getDetail(folder: PortableFolderRef, name: string, column: number): Promise<string | null>;
  /** Start copying a local file or folder into a device folder */
  copyToDevice(folder: PortableFolderRef, localPath: string): Promise<boolean>;
  /** Start copying a device item into a local folder */
  copyFromDevice(folder: PortableFolderRef, name: string, localDir: string): Promise<boolean>;
  /** Start moving a device item into a local folder */
  moveFromDevice(folder: PortableFolderRef, name: string, localDir: string): Promise<boolean>;
  close(): Promise<void>;
}

// CopyHere/MoveHere flags: no progress dialog (4) + yes to all (16)
const COPY_FLAGS = 20;

// Shell.Application copies run on the process that started them, so one
// PowerShell process serves every request of an invocation and lives until
// close(). Requests and responses are single JSON lines.
const SESSION_SCRIPT = `
$ErrorActionPreference = 'Stop'
[Console]::InputEncoding = [Text.Encoding]::UTF8
[Console]::OutputEncoding = [Text.Encoding]::UTF8
$shell = New-Object -ComObject Shell.Application
function Find-Child($folder, $name) {
  foreach ($i in $folder.Items()) { if ($i.Name -eq $name) { return $i } }
  return $null
}
function Resolve-Folder($device, $segments) {
  $dev = Find-Child ($shell.NameSpace(17)) $device
  if ($null -eq $dev) { return $null }
  $folder = $dev.GetFolder
  foreach ($s in $segments) {
    $item = Find-Child $folder $s
    if ($null -eq $item -or -not $item.IsFolder) { return $null }
    $folder = $item.GetFolder
  }
  return $folder
}
function Resolve-Item($p) {
  $f = Resolve-Folder $p.device $p.segments
  if ($null -eq $f) { return $null }
  return Find-Child $f $p.name
}
function Invoke-Request($p) {
  switch ($p.op) {
    'listDevices' {
      return ,@($shell.NameSpace(17).Items() | Where-Object { -not $_.IsFileSystem } | ForEach-Object { $_.Name })
    }
    'listChildren' {
      $f = Resolve-Folder $p.device $p.segments
      if ($null -eq $f) { return ,@() }
      return ,@(foreach ($i in $f.Items()) { @{ name = $i.Name; isFolder = [bool]$i.IsFolder } })
    }
    'getDetail' {
      $f = Resolve-Folder $p.device $p.segments
      if ($null -eq $f) { return $null }
      $i = Find-Child $f $p.name
      if ($null -eq $i) { return $null }
      return [string]$f.GetDetailsOf($i, [int]$p.column)
    }
    'copyToDevice' {
      $f = Resolve-Folder $p.device $p.segments
      if ($null -eq $f) { return $false }
      $f.CopyHere($p.localPath, ${COPY_FLAGS})
      return $true
    }
    'copyFromDevice' {
      $i = Resolve-Item $p
      if ($null -eq $i) { return $false }
      $shell.NameSpace($p.localDir).CopyHere($i, ${COPY_FLAGS})
      return $true
    }
    'moveFromDevice' {
      $i = Resolve-Item $p
      if ($null -eq $i) { return $false }
      $shell.NameSpace($p.localDir).MoveHere($i, ${COPY_FLAGS})
      return $true
    }
    default { throw "unknown request $($p.op)" }
  }
}
while ($true) {
  $line = [Console]::In.ReadLine()
  if ($null -eq $line -or $line -eq 'exit') { break }
  $p = $line | ConvertFrom-Json
  try {
    $response = @{ id = $p.id; ok = $true; value = (Invoke-Request $p) }
  } catch {
    $response = @{ id = $p.id; ok = $false; error = $_.Exception.Message }
  }
  [Console]::Out.WriteLine((ConvertTo-Json -InputObject $response -Compress -Depth 5))
  [Console]::Out.Flush()
}
`;

type SessionOp =
  | "listDevices"
  | "listChildren"
  | "getDetail"
  | "copyToDevice"
  | "copyFromDevice"
  | "moveFromDevice";

type SessionRequest = { id: number; op: SessionOp } & Record<string, unknown>;

// Windows PowerShell collapses one-element arrays to a scalar
const nameListSchema = z
  .union([z.string(), z.array(z.string()), z.null()])
  .transform((value) => (value === null ? [] : Array.isArray(value) ? value : [value]));

const entrySchema = z.object({ name: z.string(), isFolder: z.boolean() });
const entryListSchema = z
  .union([entrySchema, z.array(entrySchema), z.null()])
  .transform((value) => (value === null ? [] : Array.isArray(value) ? value : [value]));

const responseSchema = z.object({
  id: z.number(),
  ok: z.boolean(),
  value: z.unknown().optional(),
  error: z.string().optional(),
});

type SessionResponse = z.infer<typeof responseSchema>;

export function encodePowerShell(script: string): string {
  return Buffer.from(script, "utf16le").toString("base64");
}

/** The parts of a child process the session talks to */
export interface SessionProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(): boolean;
  once(event: "close", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
}

export type PowerShellOptions = {
  powershellPath?: string;
  /** Longest wait for one response */
  timeoutMs?: number;
  /** How long close() lets the session exit before killing it */
  exitTimeoutMs?: number;
  debug?: (message: string) => void;
  /** Starts the session process; defaults to spawning PowerShell */
  spawnSession?: () => SessionProcess;
};

/**
 * One long-lived PowerShell process, started on first use.
 */
export class PowerShellSession {
  private child: SessionProcess | null = null;
  private closed: Promise<void> | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, (response: SessionResponse) => void>();

  constructor(private readonly options: PowerShellOptions = {}) {}

  request(op: SessionOp, params: Record<string, unknown> = {}): Promise<SessionResponse> {
    const id = this.nextId++;
    const timeoutMs = this.options.timeoutMs ?? 60000;

    return new Promise((resolve) => {
      const child = this.start();
      if (!child) {
        resolve({ id, ok: false, error: "PowerShell session could not start" });
        return;
      }

      const timer = setTimeout(() => {
        this.pending.delete(id);
        this.debug(`portable ${op} timed out after ${timeoutMs}ms`);
        resolve({ id, ok: false, error: "timed out" });
      }, timeoutMs);

      this.pending.set(id, (response) => {
        clearTimeout(timer);
        this.pending.delete(id);
        if (!response.ok) {
          this.debug(`portable ${op} failed: ${response.error ?? "unknown error"}`);
        }
        resolve(response);
      });

      const request: SessionRequest = { ...params, id, op };
      child.stdin.write(`${JSON.stringify(request)}\n`);
    });
  }

  /**
   * Ask the session to exit and wait for it; kill it if it lingers.
   */
  async close(): Promise<void> {
    const child = this.child;
    const closed = this.closed;
    if (!child || !closed) return;

    child.stdin.end("exit\n");
    const exitTimeoutMs = this.options.exitTimeoutMs ?? 5000;
    let timer: NodeJS.Timeout | undefined;
    const lingering = new Promise<"lingering">((resolve) => {
      timer = setTimeout(() => resolve("lingering"), exitTimeoutMs);
    });
    if ((await Promise.race([closed, lingering])) === "lingering") {
      this.debug("PowerShell session did not exit; killing it");
      child.kill();
      await closed;
    }
    clearTimeout(timer);
  }

  private start(): SessionProcess | null {
    if (this.child) return this.child;

    let child: SessionProcess;
    try {
      child = (this.options.spawnSession ?? (() => this.spawnPowerShell()))();
    } catch (error) {
      this.debug(`could not start PowerShell: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
    this.child = child;

    const lines = readline.createInterface({ input: child.stdout });
    lines.on("line", (line) => this.receive(line));
    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (chunk: string) => this.debug(`powershell: ${chunk.trim()}`));
    child.stdin.on("error", (error: Error) => this.debug(`powershell stdin: ${error.message}`));

    this.closed = new Promise<void>((resolve) => {
      const finish = () => {
        if (this.child !== child) return;
        this.child = null;
        this.closed = null;
        lines.close();
        for (const [id, settle] of [...this.pending]) {
          settle({ id, ok: false, error: "PowerShell session exited" });
        }
        resolve();
      };
      child.once("close", finish);
      child.once("error", (error) => {
        this.debug(`PowerShell session failed: ${error.message}`);
        finish();
      });
    });
    return child;
  }

  private receive(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      this.debug(`powershell: ${trimmed}`);
      return;
    }
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      this.debug(`unexpected PowerShell response: ${trimmed}`);
      return;
    }
    this.pending.get(parsed.data.id)?.(parsed.data);
  }

  private spawnPowerShell(): SessionProcess {
    return spawn(
      this.options.powershellPath ?? "powershell.exe",
      ["-NoProfile", "-NonInteractive", "-EncodedCommand", encodePowerShell(SESSION_SCRIPT)],
      { stdio: ["pipe", "pipe", "pipe"], windowsHide: true },
    );
  }

  private debug(message: string): void {
    this.options.debug?.(message);
  }
}

/**
 * Shell backed by Windows Shell automation through one PowerShell session,
 * started lazily and ended by close().
 */
export function createPowerShellPortableShell(options: PowerShellOptions = {}): PortableDeviceShell {
  const session = new PowerShellSession(options);

  const folderParams = (folder: PortableFolderRef) => ({
    device: folder.device,
    segments: [...folder.segments],
  });

  const started = async (op: SessionOp, params: Record<string, unknown>) => {
    const response = await session.request(op, params);
    return response.ok && response.value === true;
  };

  return {
    async listDevices() {
      const response = await session.request("listDevices");
      if (!response.ok) return [];
      const parsed = nameListSchema.safeParse(response.value ?? null);
      return parsed.success ? parsed.data : [];
    },
    async listChildren(folder) {
      const response = await session.request("listChildren", folderParams(folder));
      if (!response.ok) return [];
      const parsed = entryListSchema.safeParse(response.value ?? null);
      return parsed.success ? parsed.data : [];
    },
    async getDetail(folder, name, column) {
      const response = await session.request("getDetail", { ...folderParams(folder), name, column });
      return response.ok && typeof response.value === "string" ? response.value.trim() : null;
    },
    copyToDevice: (folder, localPath) => started("copyToDevice", { ...folderParams(folder), localPath }),
    copyFromDevice: (folder, name, localDir) =>
      started("copyFromDevice", { ...folderParams(folder), name, localDir }),
    moveFromDevice: (folder, name, localDir) =>
      started("moveFromDevice", { ...folderParams(folder), name, localDir }),
    close: () => session.close(),
  };
}

/**
 * Shell for platforms without a portable-device namespace: sees no devices.
 */
export function createUnavailablePortableShell(): PortableDeviceShell {
  return {
    listDevices: async () => [],
    listChildren: async () => [],
    getDetail: async () => null,
    copyToDevice: async () => false,
    copyFromDevice: async () => false,
    moveFromDevice: async () => false,
    close: async () => {},
  };
}
