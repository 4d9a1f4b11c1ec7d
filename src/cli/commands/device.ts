/**
 * farmsync launch / logs / apk-status / apk-pull / apk-install / smapi-install / device
 */

import { DeviceControl, pullLogs } from "../../devices/control.js";
import { parseTapPoint } from "../../devices/profiles.js";
import { ConfigError, TransportUnavailableError } from "../../errors.js";
import type { Transport } from "../../transport/index.js";
import { formatPath } from "../config.js";
import {
  detectDevice,
  openSession,
  withDevice,
  type CliDeps,
  type CliSession,
  type CommandOptions,
} from "../shared.js";

/**
 * Shell actions for the device, or null when it is reachable only by copy.
 */
export function deviceControl(session: CliSession, transport: Transport): DeviceControl | null {
  if (!transport.commands) return null;
  const { config } = session;
  return new DeviceControl(
    transport.commands,
    {
      packageName: config.packageName,
      launcherPackage: config.launcherPackage,
      storageRoot: config.deviceStorageRoot,
      installWait: { timeoutMs: config.installWaitMs, intervalMs: config.pollIntervalMs },
    },
    session.context,
  );
}

function requireControl(session: CliSession, transport: Transport): DeviceControl {
  const control = deviceControl(session, transport);
  if (!control) {
    throw new TransportUnavailableError("This command needs adb; the device is only reachable for file copies");
  }
  return control;
}

export async function launchCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  await withDevice(session, async (transport) => {
    const profile = await session.profiles.get(transport.identity);
    if (await requireControl(session, transport).launchGame(profile?.tap)) {
      session.context.logger.info("Game started");
    }
  });
}

export async function logsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;
  const pulled = await withDevice(session, (transport) => pullLogs(transport, session.layout.logs, session.context));
  if (pulled.length === 0) {
    logger.info("No game logs on the device");
    return;
  }
  logger.info(`Pulled ${pulled.length} log file(s) to ${formatPath(session.layout.logs)}`);
}

export async function apkStatusCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const statuses = await withDevice(session, (transport) => requireControl(session, transport).apkStatus());
  for (const status of statuses) {
    session.context.logger.info(
      `  ${status.packageName.padEnd(36)} ${status.installed ? status.versionName ?? "installed" : "not installed"}`,
    );
  }
}

export async function apkPullCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const pulled = await withDevice(session, (transport) =>
    requireControl(session, transport).pullApks(session.layout.apks),
  );
  session.context.logger.info(`Pulled ${pulled.length} apk file(s) to ${formatPath(session.layout.apks)}`);
}

export async function apkInstallCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const installed = await withDevice(session, (transport) =>
    requireControl(session, transport).installApks(session.layout.apks),
  );
  if (installed) {
    session.context.logger.info("Installed");
  }
}

/**
 * Install the mod loader apk and wait for the game's data folder.
 */
export async function smapiInstallCommand(apkPath: string, options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  await withDevice(session, (transport) => requireControl(session, transport).installSmapi(apkPath));
  session.context.logger.info("Mod loader installed");
}

export type DeviceOptions = CommandOptions & {
  /** "x,y" point tapped after launch */
  tap?: string;
};

/**
 * List known devices, or store the launch tap point for the connected one.
 */
export async function deviceCommand(options: DeviceOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;

  if (options.tap !== undefined) {
    const tap = parseTapPoint(options.tap);
    if (!tap) {
      throw new ConfigError(`Invalid tap point "${options.tap}", expected x,y`);
    }
    const transport = await detectDevice(session);
    if (!transport) {
      throw new TransportUnavailableError();
    }
    try {
      await session.profiles.setTap(transport.identity, tap);
      logger.info(`Tap point for ${transport.displayName} set to ${tap.x},${tap.y}`);
    } finally {
      await transport.dispose();
    }
    return;
  }

  const profiles = await session.profiles.list();
  if (profiles.length === 0) {
    logger.info("No devices seen yet");
    return;
  }
  for (const profile of profiles) {
    const tap = profile.tap ? ` tap ${profile.tap.x},${profile.tap.y}` : "";
    logger.info(`  ${profile.identity}  ${profile.displayName} (${profile.transport}) last seen ${profile.lastSeen}${tap}`);
  }
}
