/**
 * Device control
 *
 * Fire-and-forget shell actions on the adb channel: launching the game,
 * package queries and installs, and pulling logs.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ExecutionContext } from "../context.js";
import { InstallError, TimeoutError } from "../errors.js";
import type { AdbDevice } from "../transport/adb.js";
import { logsPath, toShellPath } from "../transport/paths.js";
import { sleep, waitFor, type PollOptions } from "../transport/polling.js";
import type { FileTransport } from "../transport/types.js";
import type { TapPoint } from "./profiles.js";

export type DeviceControlOptions = {
  packageName: string;
  launcherPackage: string;
  storageRoot: string;
  /** Bounds the wait for the app-data folder after an install */
  installWait: PollOptions;
  /** Pause between launch and tap while the game starts */
  tapDelayMs?: number;
};

export type PackageStatus = {
  packageName: string;
  installed: boolean;
  versionName: string | null;
};

/**
 * Parse `pm path` output into apk paths.
 */
export function parsePackagePaths(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith("package:"))
    .map((line) => line.slice("package:".length));
}

export function parseVersionName(dumpsys: string): string | null {
  const match = dumpsys.match(/versionName=(\S+)/);
  return match ? match[1] : null;
}

export class DeviceControl {
  constructor(
    private readonly device: AdbDevice,
    private readonly options: DeviceControlOptions,
    private readonly context: ExecutionContext,
  ) {}

  /**
   * Restart the game through the mod launcher, then tap the profile's
   * point if one is stored.
   */
  async launchGame(tap?: TapPoint): Promise<boolean> {
    const { packageName, launcherPackage } = this.options;
    const { logger, dryRun } = this.context;

    if (dryRun) {
      logger.info(`[dry-run] would restart ${launcherPackage}${tap ? ` and tap ${tap.x},${tap.y}` : ""}`);
      return true;
    }

    await this.device.shell(`am force-stop ${packageName}`);
    await this.device.shell(`am force-stop ${launcherPackage}`);
    const started = await this.device.shell(
      `monkey -p ${launcherPackage} -c android.intent.category.LAUNCHER 1`,
    );
    if (started.code !== 0) {
      logger.error(`Could not start ${launcherPackage}: ${started.stderr.trim() || started.stdout.trim()}`);
      return false;
    }

    if (tap) {
      await sleep(this.options.tapDelayMs ?? 5000);
      const tapped = await this.device.shell(`input tap ${tap.x} ${tap.y}`);
      if (tapped.code !== 0) {
        logger.warn(`Tap at ${tap.x},${tap.y} failed`);
      }
    }
    return true;
  }

  async apkStatus(): Promise<PackageStatus[]> {
    const statuses: PackageStatus[] = [];
    for (const packageName of [this.options.packageName, this.options.launcherPackage]) {
      const listed = await this.device.shell(`pm list packages ${packageName}`);
      const installed = listed.stdout
        .split(/\r?\n/)
        .some((line) => line.trim() === `package:${packageName}`);
      let versionName: string | null = null;
      if (installed) {
        const dump = await this.device.shell(`dumpsys package ${packageName}`);
        versionName = parseVersionName(dump.stdout);
      }
      statuses.push({ packageName, installed, versionName });
    }
    return statuses;
  }

  /**
   * Copy the game's installed apk files (base and splits) into `destDir`.
   */
  async pullApks(destDir: string): Promise<string[]> {
    const { logger, dryRun } = this.context;
    const result = await this.device.shell(`pm path ${this.options.packageName}`);
    const remotes = parsePackagePaths(result.stdout);
    if (remotes.length === 0) {
      logger.warn(`${this.options.packageName} is not installed`);
      return [];
    }

    const pulled: string[] = [];
    if (!dryRun) {
      await fs.mkdir(destDir, { recursive: true });
    }
    for (const remote of remotes) {
      const local = path.join(destDir, path.posix.basename(remote));
      if (dryRun) {
        logger.info(`[dry-run] would pull ${remote} -> ${local}`);
        pulled.push(local);
        continue;
      }
      const copied = await this.device.pull(remote, local);
      if (copied.code === 0) {
        pulled.push(local);
      } else {
        logger.error(`Pull of ${remote} failed: ${copied.stderr.trim()}`);
      }
    }
    return pulled;
  }

  /**
   * Install every apk in `sourceDir` as one package (base plus splits).
   */
  async installApks(sourceDir: string): Promise<boolean> {
    let names: string[];
    try {
      names = (await fs.readdir(sourceDir)).filter((name) => name.toLowerCase().endsWith(".apk")).sort();
    } catch {
      names = [];
    }
    if (names.length === 0) {
      this.context.logger.warn(`No apk files in ${sourceDir}`);
      return false;
    }
    return this.install(names.map((name) => path.join(sourceDir, name)));
  }

  /**
   * Install the mod launcher apk and wait until the game's app-data folder
   * exists on the device.
   */
  async installSmapi(apkPath: string): Promise<void> {
    const { logger, dryRun } = this.context;
    if (!(await this.install([apkPath]))) {
      throw new InstallError(path.basename(apkPath), "package install failed");
    }
    if (dryRun) return;

    const appData = toShellPath(this.options.storageRoot, this.options.packageName, []);
    logger.info(`Waiting for ${appData}`);
    const appeared = await waitFor(
      async () => (await this.device.probeDirectory(appData)) !== "missing",
      this.options.installWait,
    );
    if (!appeared) {
      throw new TimeoutError(`waiting for ${appData}`, this.options.installWait.timeoutMs);
    }
  }

  private async install(apkPaths: string[]): Promise<boolean> {
    const { logger, dryRun } = this.context;
    if (dryRun) {
      logger.info(`[dry-run] would install ${apkPaths.map((apk) => path.basename(apk)).join(", ")}`);
      return true;
    }
    const result = await this.device.install(apkPaths);
    if (result.code !== 0 || !/Success/.test(result.stdout)) {
      logger.error(`Install failed: ${result.stderr.trim() || result.stdout.trim()}`);
      return false;
    }
    return true;
  }
}

const LOG_FILE = /\.txt$/i;

/**
 * Copy the game's log files into `destDir`. Works on either transport.
 */
export async function pullLogs(
  transport: FileTransport,
  destDir: string,
  context: ExecutionContext,
): Promise<string[]> {
  const entries = await transport.listDirectory(logsPath());
  const pulled: string[] = [];
  for (const entry of entries) {
    if (entry.isFolder || !LOG_FILE.test(entry.name)) continue;
    const local = path.join(destDir, entry.name);
    if (await transport.pullFile(logsPath(), entry.name, local)) {
      pulled.push(local);
    } else {
      context.logger.error(`Could not pull ${entry.name}`);
    }
  }
  return pulled;
}
