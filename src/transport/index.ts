import type { DirectShellTransport } from "./direct.js";
import type { MediaCopyTransport } from "./media-copy.js";

/** The one live connection to the device for this invocation */
export type Transport = DirectShellTransport | MediaCopyTransport;

export function describeTransport(transport: Transport): string {
  switch (transport.kind) {
    case "direct":
      return transport.canAccessFilesDirectly
        ? "adb (direct file access)"
        : "adb (shell only, file access denied)";
    case "media-copy":
      return transport.canExecuteCommands
        ? "portable-device copy (adb shell available)"
        : "portable-device copy";
  }
}

export { DirectShellTransport, parseListing } from "./direct.js";
export { MediaCopyTransport, parseShellDate, DATE_DETAIL_COLUMNS, SIZE_DETAIL_COLUMN } from "./media-copy.js";
export { AdbDevice, createAdbClient, parseDevicesOutput, type AdbClient } from "./adb.js";
export {
  createPowerShellPortableShell,
  createUnavailablePortableShell,
  type PortableDeviceShell,
  type PortableFolderRef,
} from "./portable-shell.js";
export { detectTransport, type DetectorDeps } from "./detector.js";
export * from "./paths.js";
export type { DirEntry, DeviceInfo, FileTransport, TransportKind } from "./types.js";
