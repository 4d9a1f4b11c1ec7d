/**
 * Shared CLI utilities
 *
 * Session setup (root, config, logger, execution context), device
 * acquisition and error reporting used by all CLI commands.
 */

import { createExecutionContext, type ExecutionContext } from "../context.js";
import { DeviceProfileStore } from "../devices/profiles.js";
import { FarmSyncError, TransportUnavailableError, formatError } from "../errors.js";
import { getLocalLayout, type LocalLayout } from "../layout.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import { openInBrowser } from "../process.js";
import type { Prompter } from "../prompt.js";
import { appendSyncLog } from "../sync/sync-log.js";
import { BackupManager } from "../sync/backup.js";
import { ConfigSynchronizer } from "../sync/configs.js";
import { ReconciliationEngine, summarizeSyncResult, type SyncResult } from "../sync/reconcile.js";
import {
  createAdbClient,
  createPowerShellPortableShell,
  createUnavailablePortableShell,
  describeTransport,
  detectTransport,
  type AdbClient,
  type PortableDeviceShell,
  type Transport,
} from "../transport/index.js";
import type { PollOptions } from "../transport/polling.js";
import { loadConfig, resolveRootDir, type CliConfig } from "./config.js";
import { createTerminalPrompter } from "./prompt.js";

/**
 * Flags shared by the device commands
 */
export type CommandOptions = {
  dir?: string;
  force?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
};

/**
 * Collaborators a session talks to. Commands take these so tests can
 * substitute in-process fakes.
 */
export type CliDeps = {
  adb?: AdbClient;
  portableShell?: () => PortableDeviceShell;
  prompter?: Prompter;
  fetch?: typeof fetch;
  openUrl?: (url: string) => Promise<boolean>;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

export type CliSession = {
  layout: LocalLayout;
  config: CliConfig;
  context: ExecutionContext;
  prompter: Prompter;
  adb: AdbClient;
  portableShell: () => PortableDeviceShell;
  fetch: typeof fetch;
  openUrl: (url: string) => Promise<boolean>;
  profiles: DeviceProfileStore;
};

/**
 * Resolve the root, load config and build the execution context.
 * Throws ConfigError for an invalid config file.
 */
export async function openSession(options: CommandOptions, deps: CliDeps = {}): Promise<CliSession> {
  const env = deps.env ?? process.env;
  const layout = getLocalLayout(resolveRootDir(options, env));
  const config = await loadConfig(layout.root);
  const logger =
    deps.logger ??
    createConsoleLogger({
      verbose: options.verbose === true || env.FARMSYNC_DEBUG === "1",
      logFile: layout.logFile,
    });
  const context = createExecutionContext({ dryRun: options.dryRun, force: options.force, logger });

  return {
    layout,
    config,
    context,
    prompter: deps.prompter ?? createTerminalPrompter(),
    adb: deps.adb ?? createAdbClient({ adbPath: config.adbPath }),
    portableShell:
      deps.portableShell ??
      (() =>
        process.platform === "win32"
          ? createPowerShellPortableShell({
              powershellPath: config.powershellPath,
              timeoutMs: config.copyTimeoutMs,
              debug: (message) => logger.debug(message),
            })
          : createUnavailablePortableShell()),
    fetch: deps.fetch ?? fetch,
    openUrl: deps.openUrl ?? openInBrowser,
    profiles: new DeviceProfileStore(layout.devicesFile),
  };
}

export function copyPollOptions(config: CliConfig): PollOptions {
  return { timeoutMs: config.copyTimeoutMs, intervalMs: config.pollIntervalMs };
}

/**
 * Detect the device and record its profile (not in dry-run). Null when
 * none is reachable.
 */
export async function detectDevice(session: CliSession): Promise<Transport | null> {
  const transport = await detectTransport({
    adb: session.adb,
    portableShell: session.portableShell,
    packageName: session.config.packageName,
    storageRoot: session.config.deviceStorageRoot,
    poll: copyPollOptions(session.config),
    context: session.context,
  });
  if (!transport) return null;

  session.context.logger.debug(`Connected: ${describeTransport(transport)}`);
  if (session.context.dryRun) return transport;
  try {
    await session.profiles.recordDetection(transport);
  } catch (error) {
    session.context.logger.warn(`Could not update device profiles: ${formatError(error)}`);
  }
  return transport;
}

/**
 * Run `action` against the connected device and release the transport
 * afterwards, whatever the outcome.
 */
export async function withDevice<T>(
  session: CliSession,
  action: (transport: Transport) => Promise<T>,
): Promise<T> {
  const transport = await detectDevice(session);
  if (!transport) {
    throw new TransportUnavailableError();
  }
  try {
    return await action(transport);
  } finally {
    await transport.dispose();
  }
}

export function toleranceMs(config: CliConfig): number {
  return config.toleranceSeconds * 1000;
}

export function createEngine(session: CliSession, transport: Transport): ReconciliationEngine {
  const { layout, config, context, prompter } = session;
  const backups = new BackupManager(
    { sourceDir: layout.saves, backupsDir: layout.backups, retention: config.backupRetention },
    context,
  );
  return new ReconciliationEngine(
    {
      transport,
      savesDir: layout.saves,
      modsDir: layout.mods,
      backups,
      prompter,
      toleranceMs: toleranceMs(config),
    },
    context,
  );
}

export function createConfigSynchronizer(session: CliSession, transport: Transport): ConfigSynchronizer {
  return new ConfigSynchronizer(
    { transport, configsDir: session.layout.configs, toleranceMs: toleranceMs(session.config) },
    session.context,
  );
}

/**
 * Print a flow result and list what failed.
 */
export function reportSyncResult(session: CliSession, label: string, result: SyncResult): void {
  const { logger } = session.context;
  logger.info(`${label}: ${summarizeSyncResult(result)}`);
  for (const name of result.failed) {
    logger.error(`${label}: ${name} failed`);
  }
}

/**
 * Append the command's outcome to the last-sync log. Dry runs leave no trace.
 */
export async function recordSync(session: CliSession, command: string, summary: string): Promise<void> {
  if (session.context.dryRun) return;
  try {
    await appendSyncLog(session.layout.syncLog, { timestamp: new Date().toISOString(), command, summary });
  } catch (error) {
    session.context.logger.warn(`Could not write sync log: ${formatError(error)}`);
  }
}

/**
 * Exit with an error message and optional suggestion.
 *
 * All CLI errors should use this for consistent formatting.
 */
export function exitWithError(message: string, suggestion?: string): never {
  console.error(`Error: ${message}`);
  if (suggestion) {
    console.error(`  Suggestion: ${suggestion}`);
  }
  process.exit(1);
}

/**
 * Run a command body, turning thrown errors into an exit code.
 */
export async function runCommand(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (error instanceof TransportUnavailableError) {
      exitWithError(
        error.message,
        "Connect the device with USB debugging enabled, or unlock it for file transfer",
      );
    }
    if (error instanceof FarmSyncError) {
      exitWithError(error.message);
    }
    exitWithError(formatError(error));
  }
}
