// Transports
export {
  describeTransport,
  detectTransport,
  DirectShellTransport,
  MediaCopyTransport,
  AdbDevice,
  createAdbClient,
  createPowerShellPortableShell,
  createUnavailablePortableShell,
  parseDevicesOutput,
  parseListing,
  parseShellDate,
  type Transport,
  type AdbClient,
  type DetectorDeps,
  type PortableDeviceShell,
  type PortableFolderRef,
} from "./transport/index.js";
export type { DeviceInfo, DirEntry, FileTransport, TransportKind } from "./transport/types.js";
export {
  savesPath,
  modsPath,
  logsPath,
  internalConfigPath,
  appDataSegments,
  toShellPath,
  resolveFolderByName,
  type LogicalPath,
} from "./transport/paths.js";
export { waitFor, waitForStable, type PollOptions } from "./transport/polling.js";

// Sync
export {
  ReconciliationEngine,
  decideSync,
  summarizeSyncResult,
  DEFAULT_TOLERANCE_MS,
  type SyncCandidate,
  type SyncDecision,
  type SyncResult,
} from "./sync/reconcile.js";
export { ConfigSynchronizer } from "./sync/configs.js";
export { BackupManager, DEFAULT_BACKUP_RETENTION, formatBackupStamp } from "./sync/backup.js";
export { appendSyncLog, readLastSync, type SyncLogEntry } from "./sync/sync-log.js";

// Mods
export {
  parseManifest,
  scanManifests,
  stripJsonComments,
  type ModManifest,
  type ManifestScanResult,
} from "./mods/manifest.js";
export {
  UpdateChecker,
  compareVersions,
  type UpdateCandidate,
  type UpdateCheckResult,
  type CatalogOptions,
} from "./mods/catalog.js";
export { ModInstaller, type InstallOutcome } from "./mods/installer.js";
export { NexusTier, GitHubTier, ManualTier, type DownloadTier } from "./mods/sources.js";
export { extractArchive, findModRoot } from "./mods/archive.js";

// Devices
export { DeviceProfileStore, parseTapPoint, type DeviceProfile, type TapPoint } from "./devices/profiles.js";
export { DeviceControl, pullLogs, type PackageStatus } from "./devices/control.js";

// Ambient
export { createExecutionContext, type ExecutionContext } from "./context.js";
export { createConsoleLogger, createMemoryLogger, silentLogger, type Logger } from "./logger.js";
export type { Prompter } from "./prompt.js";
export { getLocalLayout, type LocalLayout } from "./layout.js";
export {
  FarmSyncError,
  TransportUnavailableError,
  FileAccessDeniedError,
  TimeoutError,
  CatalogQueryError,
  InstallError,
  ProfileStoreError,
  ConfigError,
} from "./errors.js";
