/**
 * Transport detection
 *
 * Priority, evaluated once per invocation:
 * | adb device | app-data listable | portable match | Result                                |
 * |------------|-------------------|----------------|---------------------------------------|
 * | Yes        | Yes               | -              | direct                                |
 * | Yes        | No                | Yes            | media-copy, commands over adb         |
 * | Yes        | No                | No             | direct, file access denied per call   |
 * | No         | -                 | Yes            | media-copy, no commands               |
 * | No         | -                 | No             | none                                  |
 *
 * Shell-only adb access is never dropped: device control works without
 * file access.
 */

import type { ExecutionContext } from "../context.js";
import { AdbDevice, type AdbClient } from "./adb.js";
import { DirectShellTransport } from "./direct.js";
import { MediaCopyTransport } from "./media-copy.js";
import { appDataSegments, resolveFolderByName, toShellPath } from "./paths.js";
import { childRef, type PortableDeviceShell, type PortableFolderRef } from "./portable-shell.js";
import type { PollOptions } from "./polling.js";
import type { Transport } from "./index.js";

export type DetectorDeps = {
  adb: AdbClient;
  /** Created only when the portable-device tier is reached */
  portableShell: () => PortableDeviceShell;
  packageName: string;
  storageRoot: string;
  poll: PollOptions;
  context: ExecutionContext;
};

type PortableMatch = { device: string; appDataRoot: PortableFolderRef };

export async function detectTransport(deps: DetectorDeps): Promise<Transport | null> {
  const { adb, context } = deps;
  const logger = context.logger;

  const attached = (await adb.devices()).filter((entry) => entry.state === "device");
  if (attached.length > 1) {
    logger.warn(`${attached.length} adb devices attached; using ${attached[0].serial}`);
  }

  if (attached.length > 0) {
    const device = new AdbDevice(adb, attached[0].serial);
    const info = await describeAdbDevice(device);
    const root = toShellPath(deps.storageRoot, deps.packageName, []);
    const probe = await device.probeDirectory(root);
    logger.debug(`adb ${device.serial}: app-data root ${probe}`);

    if (probe === "ok") {
      return new DirectShellTransport(
        { ...info, device, storageRoot: deps.storageRoot, packageName: deps.packageName, canAccessFilesDirectly: true },
        context,
      );
    }

    const shell = deps.portableShell();
    const match = await findPortableAppData(shell, deps.packageName);
    if (match) {
      logger.debug(`adb file access ${probe}; using portable device "${match.device}"`);
      return new MediaCopyTransport(
        { ...info, shell, appDataRoot: match.appDataRoot, commands: device, poll: deps.poll },
        context,
      );
    }
    await shell.close();

    return new DirectShellTransport(
      { ...info, device, storageRoot: deps.storageRoot, packageName: deps.packageName, canAccessFilesDirectly: false },
      context,
    );
  }

  const shell = deps.portableShell();
  const match = await findPortableAppData(shell, deps.packageName);
  if (match) {
    return new MediaCopyTransport(
      {
        identity: match.device,
        displayName: match.device,
        model: match.device,
        shell,
        appDataRoot: match.appDataRoot,
        commands: null,
        poll: deps.poll,
      },
      context,
    );
  }
  await shell.close();
  return null;
}

async function describeAdbDevice(device: AdbDevice) {
  const manufacturer = await device.getProp("ro.product.manufacturer");
  const model = await device.getProp("ro.product.model");
  const displayName = [manufacturer, model].filter((part) => part.length > 0).join(" ") || device.serial;
  return { identity: device.serial, displayName, model: model || "unknown" };
}

/**
 * First portable device with a storage volume holding the game's app-data root.
 */
export async function findPortableAppData(
  shell: PortableDeviceShell,
  packageName: string,
): Promise<PortableMatch | null> {
  for (const device of await shell.listDevices()) {
    const deviceRoot: PortableFolderRef = { device, segments: [] };
    const volumes = (await shell.listChildren(deviceRoot)).filter((entry) => entry.isFolder);
    for (const volume of volumes) {
      const found = await resolveFolderByName(
        childRef(deviceRoot, volume.name),
        appDataSegments(packageName),
        (folder) => shell.listChildren(folder),
        childRef,
      );
      if (found) return { device, appDataRoot: found };
    }
  }
  return null;
}
