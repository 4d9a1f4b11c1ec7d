/**
 * Device profiles
 *
 * One JSON document keyed by device identity (adb serial or portable device
 * name). Updated on every successful detection, never pruned: entries this
 * version cannot read are written back untouched.
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ProfileStoreError } from "../errors.js";
import type { TransportKind } from "../transport/types.js";

export type TapPoint = { x: number; y: number };

export type DeviceProfile = {
  displayName: string;
  model: string;
  transport: TransportKind;
  /** Screen point tapped after launch to dismiss the game's start prompt */
  tap?: TapPoint;
  /** ISO timestamp */
  lastSeen: string;
};

export type DeviceProfiles = Record<string, DeviceProfile>;

const profileSchema = z.object({
  displayName: z.string(),
  model: z.string(),
  transport: z.enum(["direct", "media-copy"]),
  tap: z.object({ x: z.number().int().nonnegative(), y: z.number().int().nonnegative() }).optional(),
  lastSeen: z.string(),
});

type StoredProfiles = {
  profiles: DeviceProfiles;
  raw: Record<string, unknown> | null;
};

export type DetectedDevice = {
  identity: string;
  displayName: string;
  model: string;
  kind: TransportKind;
};

export class DeviceProfileStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Read all profiles. A missing file, or one that is not a JSON object,
   * reads as an empty store; entries that fail validation are skipped.
   */
  async load(): Promise<DeviceProfiles> {
    const stored = await this.read();
    return stored.profiles;
  }

  async get(identity: string): Promise<DeviceProfile | undefined> {
    const profiles = await this.load();
    return profiles[identity];
  }

  async list(): Promise<Array<{ identity: string } & DeviceProfile>> {
    const profiles = await this.load();
    return Object.entries(profiles)
      .map(([identity, profile]) => ({ identity, ...profile }))
      .sort((a, b) => b.lastSeen.localeCompare(a.lastSeen));
  }

  /**
   * Create or refresh the profile of a freshly detected device, keeping
   * any stored tap point.
   */
  async recordDetection(device: DetectedDevice, now: Date = new Date()): Promise<DeviceProfile> {
    const stored = await this.read();
    const existing = stored.profiles[device.identity];
    const profile: DeviceProfile = {
      displayName: device.displayName,
      model: device.model,
      transport: device.kind,
      ...(existing?.tap ? { tap: existing.tap } : {}),
      lastSeen: now.toISOString(),
    };
    await this.save(stored, device.identity, profile);
    return profile;
  }

  async setTap(identity: string, tap: TapPoint): Promise<DeviceProfile | undefined> {
    const stored = await this.read();
    const existing = stored.profiles[identity];
    if (!existing) return undefined;
    const updated = { ...existing, tap };
    await this.save(stored, identity, updated);
    return updated;
  }

  /**
   * Parse the file. `raw` holds every stored entry, valid or not, so a write
   * never drops what this version could not read; it is null when the file
   * exists but is not a JSON object.
   */
  private async read(): Promise<StoredProfiles> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return { profiles: {}, raw: {} };
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return { profiles: {}, raw: null };
    }
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      return { profiles: {}, raw: null };
    }

    const entries: Record<string, unknown> = { ...raw };
    const profiles: DeviceProfiles = {};
    for (const [identity, value] of Object.entries(entries)) {
      const parsed = profileSchema.safeParse(value);
      if (parsed.success) {
        profiles[identity] = parsed.data;
      }
    }
    return { profiles, raw: entries };
  }

  /**
   * Write one profile over the stored entries, atomically via temp file +
   * rename. Refuses to replace a file that did not parse.
   */
  private async save(stored: StoredProfiles, identity: string, profile: DeviceProfile): Promise<void> {
    if (!stored.raw) {
      throw new ProfileStoreError(`${this.filePath} is not a JSON object; not overwriting it`);
    }
    const entries = { ...stored.raw, [identity]: profile };
    const tempPath = `${this.filePath}.${crypto.randomBytes(4).toString("hex")}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(entries, null, 2), "utf-8");
    await fs.rename(tempPath, this.filePath);
  }
}

export function parseTapPoint(value: string): TapPoint | null {
  const match = /^\s*(\d+)\s*[,x ]\s*(\d+)\s*$/i.exec(value);
  if (!match) return null;
  return { x: Number(match[1]), y: Number(match[2]) };
}
