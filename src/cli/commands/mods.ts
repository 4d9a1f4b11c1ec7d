/**
 * farmsync mods / pull-mods / push-mods / check-updates / update
 */

import { UpdateChecker, type UpdateCheckResult } from "../../mods/catalog.js";
import { ModInstaller } from "../../mods/installer.js";
import { scanManifests } from "../../mods/manifest.js";
import { GitHubTier, ManualTier, NexusTier } from "../../mods/sources.js";
import { formatPath } from "../config.js";
import {
  createEngine,
  detectDevice,
  openSession,
  recordSync,
  reportSyncResult,
  withDevice,
  type CliDeps,
  type CliSession,
  type CommandOptions,
} from "../shared.js";

/**
 * Push local mods missing on the device. Device-only mods are listed, never pulled.
 */
export async function modsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;
  const result = await withDevice(session, (transport) => createEngine(session, transport).pushMissingMods());

  reportSyncResult(session, "Mods", result);
  if (result.pushed.length === 0 && result.failed.length === 0) {
    logger.info("All local mods are already on the device");
  }
  if (result.deviceOnly.length > 0) {
    logger.info(`On the device only (use pull-mods to copy): ${result.deviceOnly.join(", ")}`);
  }
  await recordSync(session, "mods", `${result.pushed.length} pushed, ${result.deviceOnly.length} device-only`);
}

export async function pullModsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const result = await withDevice(session, (transport) => createEngine(session, transport).pullMods());
  reportSyncResult(session, "Mods", result);
  await recordSync(session, "pull-mods", `${result.pulled.length} pulled, ${result.failed.length} failed`);
}

export async function pushModsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const result = await withDevice(session, (transport) => createEngine(session, transport).pushMods());
  reportSyncResult(session, "Mods", result);
  await recordSync(session, "push-mods", `${result.pushed.length} pushed, ${result.failed.length} failed`);
}

/**
 * Scan local manifests and ask the catalog about them.
 * Throws CatalogQueryError when the catalog can't be queried.
 */
export async function checkForUpdates(session: CliSession): Promise<UpdateCheckResult> {
  const { logger } = session.context;
  const scan = await scanManifests(session.layout.mods);
  for (const error of scan.errors) {
    logger.warn(`${formatPath(error.manifestPath)}: ${error.message}`);
  }

  const checker = new UpdateChecker(
    {
      catalogUrl: session.config.catalogUrl,
      apiVersion: session.config.smapiVersion,
      gameVersion: session.config.gameVersion,
      timeoutMs: session.config.httpTimeoutMs,
      fetch: session.fetch,
    },
    session.context,
  );
  const result = await checker.check(scan.manifests);
  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  return result;
}

export function reportUpdates(session: CliSession, result: UpdateCheckResult): void {
  const { logger } = session.context;
  if (result.candidates.length === 0) {
    logger.info(`All ${result.upToDate.length} checked mods are up to date`);
  } else {
    logger.info(`${result.candidates.length} update(s) available:`);
    for (const candidate of result.candidates) {
      logger.info(`  ${candidate.manifest.name}: ${candidate.installedVersion} -> ${candidate.targetVersion}`);
    }
  }
  if (result.unchecked.length > 0) {
    logger.debug(`No update keys: ${result.unchecked.join(", ")}`);
  }
}

export async function checkUpdatesCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  reportUpdates(session, await checkForUpdates(session));
}

export type UpdateOptions = CommandOptions & {
  /** GitHub token for the release API rate limit */
  githubToken?: string;
};

/**
 * Download and install available updates, all of them or the one named.
 */
export async function updateCommand(
  name: string | undefined,
  options: UpdateOptions,
  deps: CliDeps = {},
): Promise<void> {
  const session = await openSession(options, deps);
  const { layout, config, context } = session;
  const { logger } = context;

  const checked = await checkForUpdates(session);
  const wanted = name?.toLowerCase();
  const candidates = wanted
    ? checked.candidates.filter(
        (candidate) =>
          candidate.manifest.name.toLowerCase() === wanted || candidate.manifest.uniqueId.toLowerCase() === wanted,
      )
    : checked.candidates;

  if (candidates.length === 0) {
    logger.info(name ? `No update available for ${name}` : "No updates available");
    return;
  }

  const transport = await detectDevice(session);
  if (!transport) {
    logger.info("No device connected; updates will be installed locally only");
  }

  try {
    const http = { fetch: session.fetch, timeoutMs: config.httpTimeoutMs };
    const installer = new ModInstaller(
      {
        tiers: [
          new NexusTier({ ...http, apiKeyFile: layout.nexusKeyFile }, context),
          new GitHubTier({ ...http, archivePattern: config.archivePattern, token: options.githubToken }, context),
          new ManualTier(
            {
              holdingDir: layout.manualDownloads,
              archivePattern: config.archivePattern,
              openUrl: session.openUrl,
              prompter: session.prompter,
            },
            context,
          ),
        ],
        downloadsDir: layout.downloads,
        transport,
      },
      context,
    );

    const outcomes = await installer.installAll(candidates);
    const installed = outcomes.filter((outcome) => outcome.status === "installed");
    const failed = outcomes.filter((outcome) => outcome.status === "failed");
    logger.info(`Updates: ${installed.length} installed, ${failed.length} failed`);
    await recordSync(session, "update", `${installed.length} installed, ${failed.length} failed`);
  } finally {
    await transport?.dispose();
  }
}
