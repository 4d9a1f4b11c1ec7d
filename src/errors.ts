/**
 * Error taxonomy
 *
 * Per-item failures are collected by the flows and never thrown past them;
 * only TransportUnavailableError ends a device command.
 */

export const ExitCodes = {
  Success: 0,
  Failure: 1,
} as const;

export class FarmSyncError extends Error {
  public readonly code: number;

  constructor(message: string, code: number = ExitCodes.Failure) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No device matched any detection tier */
export class TransportUnavailableError extends FarmSyncError {
  constructor(message = "No device found over adb or the portable-device shell") {
    super(message);
  }
}

/** The device refused a file operation (storage restrictions) */
export class FileAccessDeniedError extends FarmSyncError {
  constructor(public readonly devicePath: string) {
    super(`Access denied: ${devicePath}`);
  }
}

/** A bounded wait ran out */
export class TimeoutError extends FarmSyncError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** The update catalog could not be queried or its answer parsed */
export class CatalogQueryError extends FarmSyncError {}

/** A downloaded mod could not be installed */
export class InstallError extends FarmSyncError {
  constructor(
    public readonly modName: string,
    public readonly reason: string,
  ) {
    super(`${modName}: ${reason}`);
  }
}

/** The device profile file exists but cannot be read back safely */
export class ProfileStoreError extends FarmSyncError {}

/** The config file is unreadable or fails validation */
export class ConfigError extends FarmSyncError {}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
