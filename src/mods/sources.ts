/**
 * Download tiers for mod updates, tried in order until one yields an archive:
 * the Nexus API (needs a stored API key), GitHub releases (needs a GitHub
 * update key), then a manual download by the operator.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import { z } from "zod";

import type { ExecutionContext } from "../context.js";
import { formatError } from "../errors.js";
import type { Prompter } from "../prompt.js";
import { newestFile } from "./archive.js";
import type { UpdateCandidate } from "./catalog.js";

export type TierName = "nexus" | "github" | "manual";

export interface DownloadTier {
  readonly name: TierName;
  /** Whether this tier can be tried for the candidate at all */
  applies(candidate: UpdateCandidate): Promise<boolean>;
  /** Archive path, or null to fall through to the next tier */
  download(candidate: UpdateCandidate, destDir: string): Promise<string | null>;
}

const USER_AGENT = "farmsync-mod-updater";

type HttpOptions = {
  fetch?: typeof fetch;
  timeoutMs?: number;
};

async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  options: HttpOptions,
): Promise<Response> {
  const doFetch = options.fetch ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs ?? 30000);
  try {
    return await doFetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Download a URL to a file inside `destDir`.
 */
export async function downloadFile(
  url: string,
  destDir: string,
  fileName: string,
  options: HttpOptions & { headers?: Record<string, string> },
): Promise<string> {
  const res = await fetchWithTimeout(url, { headers: { "User-Agent": USER_AGENT, ...options.headers } }, options);
  if (!res.ok) {
    throw new Error(`download failed: ${res.status} ${url}`);
  }
  const safeName = path.basename(fileName).replace(/[^\w.\- ]+/g, "_") || "download.zip";
  const target = path.join(destDir, safeName);
  await fs.mkdir(destDir, { recursive: true });
  await fs.writeFile(target, Buffer.from(await res.arrayBuffer()));
  return target;
}

const nexusFilesSchema = z.object({
  files: z.array(
    z.object({
      file_id: z.number().int(),
      file_name: z.string(),
      category_name: z.string().nullish(),
      uploaded_timestamp: z.number(),
    }),
  ),
});

const nexusLinksSchema = z.array(z.object({ URI: z.string() })).min(1);

export type NexusFile = z.infer<typeof nexusFilesSchema>["files"][number];

/**
 * Newest file in the "main" category, else the newest file of any kind.
 */
export function selectNexusFile(files: readonly NexusFile[]): NexusFile | null {
  const newest = (list: readonly NexusFile[]) =>
    list.reduce<NexusFile | null>(
      (best, file) => (!best || file.uploaded_timestamp > best.uploaded_timestamp ? file : best),
      null,
    );
  const main = files.filter((file) => file.category_name?.toUpperCase() === "MAIN");
  return newest(main) ?? newest(files);
}

export type NexusTierOptions = HttpOptions & {
  apiKeyFile: string;
  baseUrl?: string;
  gameDomain?: string;
};

export class NexusTier implements DownloadTier {
  readonly name = "nexus" as const;

  constructor(
    private readonly options: NexusTierOptions,
    private readonly context: ExecutionContext,
  ) {}

  async applies(candidate: UpdateCandidate): Promise<boolean> {
    return candidate.nexusId !== null && (await this.readApiKey()) !== null;
  }

  async download(candidate: UpdateCandidate, destDir: string): Promise<string | null> {
    const apiKey = await this.readApiKey();
    if (candidate.nexusId === null || apiKey === null) return null;

    const base = `${this.options.baseUrl ?? "https://api.nexusmods.com/v1"}/games/${this.options.gameDomain ?? "stardewvalley"}/mods/${candidate.nexusId}`;
    const headers = { apikey: apiKey, Accept: "application/json", "User-Agent": USER_AGENT };
    const { logger } = this.context;

    try {
      const filesRes = await fetchWithTimeout(`${base}/files.json`, { headers }, this.options);
      if (!filesRes.ok) {
        logger.debug(`nexus: file list for ${candidate.nexusId} failed (${filesRes.status})`);
        return null;
      }
      const files = nexusFilesSchema.safeParse(await filesRes.json());
      const file = files.success ? selectNexusFile(files.data.files) : null;
      if (!file) return null;

      const linkRes = await fetchWithTimeout(`${base}/files/${file.file_id}/download_link.json`, { headers }, this.options);
      if (linkRes.status === 401 || linkRes.status === 403) {
        // Direct links need a premium account
        logger.info(`Nexus download links unavailable for this account; trying next source`);
        return null;
      }
      if (!linkRes.ok) {
        logger.debug(`nexus: download link failed (${linkRes.status})`);
        return null;
      }
      const links = nexusLinksSchema.safeParse(await linkRes.json());
      if (!links.success) return null;

      return await downloadFile(links.data[0].URI, destDir, file.file_name, this.options);
    } catch (error) {
      logger.warn(`Nexus download of ${candidate.manifest.name} failed: ${formatError(error)}`);
      return null;
    }
  }

  private async readApiKey(): Promise<string | null> {
    try {
      const key = (await fs.readFile(this.options.apiKeyFile, "utf-8")).trim();
      return key.length > 0 ? key : null;
    } catch {
      return null;
    }
  }
}

const githubReleaseSchema = z.object({
  tag_name: z.string().optional(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string(),
      updated_at: z.string().optional(),
    }),
  ),
});

export type GitHubTierOptions = HttpOptions & {
  archivePattern: string;
  token?: string;
  baseUrl?: string;
};

export class GitHubTier implements DownloadTier {
  readonly name = "github" as const;

  constructor(
    private readonly options: GitHubTierOptions,
    private readonly context: ExecutionContext,
  ) {}

  async applies(candidate: UpdateCandidate): Promise<boolean> {
    return candidate.githubRepo !== null;
  }

  async download(candidate: UpdateCandidate, destDir: string): Promise<string | null> {
    const repo = candidate.githubRepo;
    if (!repo) return null;

    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "User-Agent": USER_AGENT,
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    try {
      const res = await fetchWithTimeout(
        `${this.options.baseUrl ?? "https://api.github.com"}/repos/${repo}/releases/latest`,
        { headers },
        this.options,
      );
      if (!res.ok) {
        this.context.logger.debug(`github: latest release of ${repo} failed (${res.status})`);
        return null;
      }
      const release = githubReleaseSchema.safeParse(await res.json());
      if (!release.success) return null;

      const asset = release.data.assets
        .filter((item) => minimatch(item.name, this.options.archivePattern, { nocase: true }))
        .sort((a, b) => (b.updated_at ?? "").localeCompare(a.updated_at ?? ""))[0];
      if (!asset) {
        this.context.logger.debug(`github: no asset of ${repo} matches ${this.options.archivePattern}`);
        return null;
      }
      return await downloadFile(asset.browser_download_url, destDir, asset.name, this.options);
    } catch (error) {
      this.context.logger.warn(`GitHub download of ${candidate.manifest.name} failed: ${formatError(error)}`);
      return null;
    }
  }
}

export type ManualTierOptions = {
  /** Folder the operator saves the archive into */
  holdingDir: string;
  archivePattern: string;
  openUrl: (url: string) => Promise<boolean>;
  prompter: Prompter;
};

export class ManualTier implements DownloadTier {
  readonly name = "manual" as const;

  constructor(
    private readonly options: ManualTierOptions,
    private readonly context: ExecutionContext,
  ) {}

  async applies(): Promise<boolean> {
    return true;
  }

  async download(candidate: UpdateCandidate): Promise<string | null> {
    const { holdingDir, archivePattern, openUrl, prompter } = this.options;
    const { logger } = this.context;
    const url =
      candidate.pageUrl ?? `https://smapi.io/mods#${encodeURIComponent(candidate.manifest.name)}`;

    await fs.mkdir(holdingDir, { recursive: true });
    logger.info(`Opening ${url}`);
    if (!(await openUrl(url))) {
      logger.warn(`Could not open a browser; visit ${url} manually`);
    }
    await prompter.waitForOperator(
      `Download ${candidate.manifest.name} ${candidate.targetVersion} into ${holdingDir}, then press Enter`,
    );

    const archive = await newestFile(holdingDir, (name) => minimatch(name, archivePattern, { nocase: true }));
    if (!archive) {
      logger.warn(`No archive matching ${archivePattern} found in ${holdingDir}`);
    }
    return archive;
  }
}
