/**
 * adb client
 *
 * Thin wrapper over the `adb` binary. Every call resolves with the process
 * result; interpreting exit codes is left to the caller.
 */

import { runProcess, type ProcessResult } from "../process.js";
import { shellQuote } from "./paths.js";

export type AdbDeviceState = "device" | "offline" | "unauthorized" | "recovery" | "unknown";

export type AdbDeviceEntry = {
  serial: string;
  state: AdbDeviceState;
};

export interface AdbClient {
  devices(): Promise<AdbDeviceEntry[]>;
  shell(serial: string, command: string): Promise<ProcessResult>;
  pull(serial: string, remote: string, local: string): Promise<ProcessResult>;
  push(serial: string, local: string, remote: string): Promise<ProcessResult>;
  install(serial: string, apkPaths: readonly string[]): Promise<ProcessResult>;
}

const KNOWN_STATES: readonly AdbDeviceState[] = ["device", "offline", "unauthorized", "recovery"];

/**
 * Parse `adb devices` output.
 */
export function parseDevicesOutput(output: string): AdbDeviceEntry[] {
  const entries: AdbDeviceEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("List of devices") || trimmed.startsWith("*")) continue;
    const [serial, rawState] = trimmed.split(/\s+/);
    if (!serial || !rawState) continue;
    const state = KNOWN_STATES.find((known) => known === rawState) ?? "unknown";
    entries.push({ serial, state });
  }
  return entries;
}

export type AdbClientOptions = {
  adbPath?: string;
  /** Per-call limit; transfers of large folders need minutes */
  timeoutMs?: number;
};

export function createAdbClient(options: AdbClientOptions = {}): AdbClient {
  const adb = options.adbPath ?? "adb";
  const timeoutMs = options.timeoutMs ?? 10 * 60 * 1000;
  const run = (args: string[]) => runProcess(adb, args, { timeoutMs });

  return {
    async devices() {
      const result = await run(["devices"]);
      if (result.code !== 0) return [];
      return parseDevicesOutput(result.stdout);
    },
    shell: (serial, command) => run(["-s", serial, "shell", command]),
    pull: (serial, remote, local) => run(["-s", serial, "pull", remote, local]),
    push: (serial, local, remote) => run(["-s", serial, "push", local, remote]),
    install: (serial, apkPaths) =>
      apkPaths.length > 1
        ? run(["-s", serial, "install-multiple", "-r", ...apkPaths])
        : run(["-s", serial, "install", "-r", ...apkPaths]),
  };
}

/**
 * One attached device on the adb channel.
 */
export class AdbDevice {
  constructor(
    private readonly client: AdbClient,
    public readonly serial: string,
  ) {}

  shell(command: string): Promise<ProcessResult> {
    return this.client.shell(this.serial, command);
  }

  pull(remote: string, local: string): Promise<ProcessResult> {
    return this.client.pull(this.serial, remote, local);
  }

  push(local: string, remote: string): Promise<ProcessResult> {
    return this.client.push(this.serial, local, remote);
  }

  install(apkPaths: readonly string[]): Promise<ProcessResult> {
    return this.client.install(this.serial, apkPaths);
  }

  async getProp(name: string): Promise<string> {
    const result = await this.shell(`getprop ${name}`);
    return result.code === 0 ? result.stdout.trim() : "";
  }

  /**
   * Classify a device directory: readable, refused, or absent.
   */
  async probeDirectory(remotePath: string): Promise<"ok" | "denied" | "missing"> {
    const result = await this.shell(`ls -1 ${shellQuote(remotePath)}`);
    const output = `${result.stdout}\n${result.stderr}`;
    if (/permission denied/i.test(output)) return "denied";
    if (result.code === 0) return "ok";
    return "missing";
  }
}
