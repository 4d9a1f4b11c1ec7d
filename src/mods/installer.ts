/**
 * Mod installer
 *
 * For each update candidate: fetch an archive through the first download
 * tier that yields one, extract it, swap the mod folder while keeping the
 * operator's config.json, then push the folder to the device if connected.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ExecutionContext } from "../context.js";
import { InstallError, formatError } from "../errors.js";
import { pathExists } from "../layout.js";
import { modsPath, relativeToSegments } from "../transport/paths.js";
import type { FileTransport } from "../transport/types.js";
import { extractArchive, findModRoot } from "./archive.js";
import type { UpdateCandidate } from "./catalog.js";
import type { DownloadTier, TierName } from "./sources.js";

const CONFIG_FILE = "config.json";
const INCOMING_SUFFIX = ".farmsync-incoming";
const PREVIOUS_SUFFIX = ".farmsync-previous";

export type InstallStatus = "installed" | "failed" | "dry-run";

export type InstallOutcome = {
  name: string;
  fromVersion: string;
  toVersion: string;
  status: InstallStatus;
  source: TierName | null;
  /** Whether the updated folder reached the device */
  pushed: boolean;
  message?: string;
};

export type ModInstallerOptions = {
  tiers: readonly DownloadTier[];
  downloadsDir: string;
  transport: FileTransport | null;
};

export class ModInstaller {
  constructor(
    private readonly options: ModInstallerOptions,
    private readonly context: ExecutionContext,
  ) {}

  async installAll(candidates: readonly UpdateCandidate[]): Promise<InstallOutcome[]> {
    const outcomes: InstallOutcome[] = [];
    for (const candidate of candidates) {
      outcomes.push(await this.installOne(candidate));
    }
    return outcomes;
  }

  async installOne(candidate: UpdateCandidate): Promise<InstallOutcome> {
    const { logger, dryRun } = this.context;
    const base = {
      name: candidate.manifest.name,
      fromVersion: candidate.installedVersion,
      toVersion: candidate.targetVersion,
    };

    if (dryRun) {
      const tiers = await this.applicableTiers(candidate);
      logger.info(
        `[dry-run] would update ${base.name} ${base.fromVersion} -> ${base.toVersion} via ${tiers.join(", ")}`,
      );
      return { ...base, status: "dry-run", source: null, pushed: false };
    }

    try {
      const { archive, source } = await this.fetchArchive(candidate);
      await this.installArchive(candidate, archive);
      const pushed = await this.pushToDevice(candidate);
      logger.info(`Updated ${base.name} to ${base.toVersion} (${source})`);
      return { ...base, status: "installed", source, pushed };
    } catch (error) {
      const message = error instanceof InstallError ? error.reason : formatError(error);
      logger.error(`${base.name}: ${message}`);
      return { ...base, status: "failed", source: null, pushed: false, message };
    }
  }

  /**
   * Replace the candidate's mod folder with the archive folder whose
   * manifest carries the same UniqueID. The existing config.json, if any,
   * is carried over byte for byte.
   */
  async installArchive(candidate: UpdateCandidate, archivePath: string): Promise<void> {
    const name = candidate.manifest.name;
    const extractDir = path.join(
      this.options.downloadsDir,
      `extract-${candidate.manifest.uniqueId.replace(/[^\w.-]+/g, "_")}-${Date.now()}`,
    );

    try {
      try {
        await extractArchive(archivePath, extractDir);
      } catch (error) {
        throw new InstallError(name, `could not extract ${path.basename(archivePath)}: ${formatError(error)}`);
      }

      const found = await findModRoot(extractDir, candidate.manifest.uniqueId);
      if (!found.root) {
        throw new InstallError(
          name,
          found.manifests === 0
            ? `${path.basename(archivePath)} contains no manifest.json`
            : `${path.basename(archivePath)} has no manifest for ${candidate.manifest.uniqueId}`,
        );
      }

      await replaceFolder(candidate.manifest.directory, found.root);
    } finally {
      await fs.rm(extractDir, { recursive: true, force: true });
    }
  }

  private async fetchArchive(
    candidate: UpdateCandidate,
  ): Promise<{ archive: string; source: TierName }> {
    const { logger } = this.context;
    for (const tier of this.options.tiers) {
      if (!(await tier.applies(candidate))) {
        logger.debug(`${candidate.manifest.name}: ${tier.name} source not applicable`);
        continue;
      }
      const archive = await tier.download(candidate, this.options.downloadsDir);
      if (archive) {
        return { archive, source: tier.name };
      }
      logger.debug(`${candidate.manifest.name}: ${tier.name} source yielded nothing`);
    }
    throw new InstallError(candidate.manifest.name, "no download source produced an archive");
  }

  private async applicableTiers(candidate: UpdateCandidate): Promise<TierName[]> {
    const names: TierName[] = [];
    for (const tier of this.options.tiers) {
      if (await tier.applies(candidate)) names.push(tier.name);
    }
    return names;
  }

  private async pushToDevice(candidate: UpdateCandidate): Promise<boolean> {
    const transport = this.options.transport;
    if (!transport) return false;

    const segments = relativeToSegments(candidate.manifest.relativePath);
    const pushed = await transport.pushFolder(modsPath(...segments), candidate.manifest.directory);
    if (!pushed) {
      this.context.logger.warn(`${candidate.manifest.name} updated locally but could not be pushed to the device`);
    }
    return pushed;
  }
}

/**
 * Copy `source` into a hidden staging folder beside `target`, carry the
 * existing config.json over, then swap the staged folder in. A failed copy
 * leaves `target` untouched.
 */
async function replaceFolder(target: string, source: string): Promise<void> {
  const parent = path.dirname(target);
  const base = path.basename(target);
  const staging = path.join(parent, `.${base}${INCOMING_SUFFIX}`);
  const previous = path.join(parent, `.${base}${PREVIOUS_SUFFIX}`);

  await fs.rm(staging, { recursive: true, force: true });
  try {
    await fs.cp(source, staging, { recursive: true });
    const configPath = path.join(target, CONFIG_FILE);
    if (await pathExists(configPath)) {
      await fs.copyFile(configPath, path.join(staging, CONFIG_FILE));
    }
  } catch (error) {
    await fs.rm(staging, { recursive: true, force: true });
    throw error;
  }

  await fs.rm(previous, { recursive: true, force: true });
  const hadTarget = await pathExists(target);
  if (hadTarget) {
    await fs.rename(target, previous);
  }
  try {
    await fs.rename(staging, target);
  } catch (error) {
    if (hadTarget) {
      await fs.rename(previous, target);
    }
    await fs.rm(staging, { recursive: true, force: true });
    throw error;
  }
  await fs.rm(previous, { recursive: true, force: true });
}
