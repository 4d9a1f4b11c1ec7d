/**
 * Update catalog
 *
 * Asks the mod-compatibility web API which installed mods have newer
 * versions. Only manifests with update keys are sent; the others are taken
 * to be the operator's own mods.
 */

import { z } from "zod";

import type { ExecutionContext } from "../context.js";
import { CatalogQueryError, formatError } from "../errors.js";
import { findGitHubRepo, findNexusId, type ModManifest } from "./manifest.js";

export const DEFAULT_CATALOG_URL = "https://smapi.io/api/v3.0/mods";

export type UpdateCandidate = {
  manifest: ModManifest;
  installedVersion: string;
  targetVersion: string;
  /** Nexus mod id, when the catalog or an update key names one */
  nexusId: number | null;
  /** "owner/repo" from a GitHub update key */
  githubRepo: string | null;
  pageUrl: string | null;
};

export type UpdateCheckResult = {
  candidates: UpdateCandidate[];
  upToDate: string[];
  /** Mods skipped for having no update keys */
  unchecked: string[];
  /** Per-mod errors reported by the catalog */
  warnings: string[];
};

export type CatalogOptions = {
  catalogUrl?: string;
  /** Version of the mod loader, sent as apiVersion */
  apiVersion: string;
  gameVersion: string;
  platform?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

export type CatalogModRequest = {
  id: string;
  updateKeys: string[];
  installedVersion: string;
  isBroken: false;
};

const catalogEntrySchema = z.object({
  id: z.string(),
  suggestedUpdate: z
    .object({ version: z.string(), url: z.string().nullish() })
    .nullish(),
  metadata: z
    .object({
      nexusID: z.number().int().nullish(),
      gitHubRepo: z.string().nullish(),
      name: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
  errors: z.array(z.string()).nullish(),
});

const catalogResponseSchema = z.array(catalogEntrySchema);

function normalizeVersion(input: string): string {
  return input.trim().replace(/^v/i, "");
}

/**
 * Compare dotted versions numerically; a pre-release ("2.0.0-beta.1")
 * sorts below its release.
 */
export function compareVersions(a: string, b: string): number {
  const [coreA, ...preA] = normalizeVersion(a).split("-");
  const [coreB, ...preB] = normalizeVersion(b).split("-");
  const pa = coreA.split(".").map((x) => Number.parseInt(x, 10));
  const pb = coreB.split(".").map((x) => Number.parseInt(x, 10));
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i += 1) {
    const av = Number.isFinite(pa[i]) ? pa[i] : 0;
    const bv = Number.isFinite(pb[i]) ? pb[i] : 0;
    if (av > bv) return 1;
    if (av < bv) return -1;
  }
  const tagA = preA.join("-");
  const tagB = preB.join("-");
  if (tagA === tagB) return 0;
  if (!tagA) return 1;
  if (!tagB) return -1;
  return Math.sign(tagA.localeCompare(tagB, undefined, { numeric: true }));
}

export function nexusPageUrl(nexusId: number): string {
  return `https://www.nexusmods.com/stardewvalley/mods/${nexusId}?tab=files`;
}

export function buildCatalogRequest(manifests: readonly ModManifest[]): CatalogModRequest[] {
  return manifests.map((manifest) => ({
    id: manifest.uniqueId,
    updateKeys: [...manifest.updateKeys],
    installedVersion: manifest.version,
    isBroken: false,
  }));
}

export class UpdateChecker {
  private readonly options: CatalogOptions;

  constructor(
    options: CatalogOptions,
    private readonly context: ExecutionContext,
  ) {
    this.options = options;
  }

  /**
   * One batched catalog request for every keyed manifest.
   * Throws CatalogQueryError when the catalog can't be reached or read.
   */
  async check(manifests: readonly ModManifest[]): Promise<UpdateCheckResult> {
    const result: UpdateCheckResult = { candidates: [], upToDate: [], unchecked: [], warnings: [] };

    const keyed: ModManifest[] = [];
    const byId = new Map<string, ModManifest>();
    for (const manifest of manifests) {
      if (manifest.updateKeys.length === 0) {
        result.unchecked.push(manifest.name);
        continue;
      }
      const id = manifest.uniqueId.toLowerCase();
      if (byId.has(id)) {
        result.warnings.push(`${manifest.name}: duplicate mod id ${manifest.uniqueId} in ${manifest.relativePath}`);
        continue;
      }
      byId.set(id, manifest);
      keyed.push(manifest);
    }

    if (keyed.length === 0) return result;

    const entries = await this.query(buildCatalogRequest(keyed));

    for (const entry of entries) {
      const manifest = byId.get(entry.id.toLowerCase());
      if (!manifest) continue;

      for (const message of entry.errors ?? []) {
        result.warnings.push(`${manifest.name}: ${message}`);
      }

      const suggested = entry.suggestedUpdate?.version;
      if (!suggested || compareVersions(suggested, manifest.version) <= 0) {
        result.upToDate.push(manifest.name);
        continue;
      }

      const nexusId = entry.metadata?.nexusID ?? findNexusId(manifest);
      const githubRepo = entry.metadata?.gitHubRepo ?? findGitHubRepo(manifest);
      result.candidates.push({
        manifest,
        installedVersion: manifest.version,
        targetVersion: normalizeVersion(suggested),
        nexusId,
        githubRepo,
        pageUrl:
          entry.suggestedUpdate?.url ??
          (nexusId !== null ? nexusPageUrl(nexusId) : githubRepo ? `https://github.com/${githubRepo}/releases` : null),
      });
    }

    return result;
  }

  private async query(mods: CatalogModRequest[]): Promise<z.infer<typeof catalogResponseSchema>> {
    const doFetch = this.options.fetch ?? fetch;
    const url = this.options.catalogUrl ?? DEFAULT_CATALOG_URL;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 30000);

    this.context.logger.debug(`querying ${url} for ${mods.length} mod(s)`);
    try {
      const res = await doFetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({
          mods,
          apiVersion: this.options.apiVersion,
          gameVersion: this.options.gameVersion,
          platform: this.options.platform ?? "Android",
          includeExtendedMetadata: true,
        }),
        signal: controller.signal,
      });
      if (!res.ok) {
        const text = await res.text();
        throw new CatalogQueryError(`update catalog failed: ${res.status} ${text.slice(0, 200)}`);
      }
      const parsed = catalogResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new CatalogQueryError(`update catalog returned an unexpected response: ${parsed.error.issues[0]?.message}`);
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof CatalogQueryError) throw error;
      throw new CatalogQueryError(`update catalog unreachable: ${formatError(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
