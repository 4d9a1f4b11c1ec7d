/**
 * Transport contract
 *
 * Two ways to reach the device: the adb shell ("direct") and the desktop's
 * portable-device copy interface ("media-copy"). Both expose the same file
 * operations; none of them throw. Failures come back as false / null / []
 * and are logged at debug level, leaving the caller to report them.
 */

import type { LogicalPath } from "./paths.js";
import type { AdbDevice } from "./adb.js";

export type TransportKind = "direct" | "media-copy";

export type DirEntry = {
  name: string;
  isFolder: boolean;
};

export type DeviceInfo = {
  /** Stable key for the device profile store */
  identity: string;
  displayName: string;
  model: string;
};

export interface FileTransport {
  /** Children of a device folder; a missing folder lists as empty */
  listDirectory(path: LogicalPath): Promise<DirEntry[]>;
  /** Copy device file `path/name` to the local file `localDest` */
  pullFile(path: LogicalPath, name: string, localDest: string): Promise<boolean>;
  /** Copy a local file into the device folder `path`, keeping its name */
  pushFile(path: LogicalPath, localFile: string): Promise<boolean>;
  /** Make the local folder `localDest` hold the device folder's contents */
  pullFolder(path: LogicalPath, localDest: string): Promise<boolean>;
  /** Make the device folder `path` hold exactly the local folder's contents */
  pushFolder(path: LogicalPath, localDir: string): Promise<boolean>;
  deleteItem(path: LogicalPath, name: string): Promise<boolean>;
  /** Best effort; null when the device doesn't report a usable time */
  getModificationTime(path: LogicalPath, name: string): Promise<Date | null>;
  /** Release sessions and scratch folders */
  dispose(): Promise<void>;
}

export interface DeviceTransport extends FileTransport, DeviceInfo {
  readonly kind: TransportKind;
  readonly canExecuteCommands: boolean;
  readonly canAccessFilesDirectly: boolean;
  /** Shell channel for device control, when one exists */
  readonly commands: AdbDevice | null;
}
