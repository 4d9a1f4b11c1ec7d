/**
 * CLI configuration loading and directory resolution
 *
 * Config resolution order (later overrides earlier):
 * 1. Built-in defaults
 * 2. <root>/.farmsync/config.json
 * 3. CLI flags and environment variables
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

import { ConfigError, formatError } from "../errors.js";
import { getLocalLayout } from "../layout.js";

export const ROOT_ENV = "FARMSYNC_DIR";
const DEFAULT_ROOT = "farmsync";

const configSchema = z
  .object({
    packageName: z.string().min(1),
    launcherPackage: z.string().min(1),
    deviceStorageRoot: z.string().min(1),
    adbPath: z.string().min(1),
    powershellPath: z.string().min(1),
    /** Timestamps closer than this count as equal */
    toleranceSeconds: z.number().nonnegative(),
    backupRetention: z.number().int().positive(),
    copyTimeoutMs: z.number().int().positive(),
    pollIntervalMs: z.number().int().positive(),
    installWaitMs: z.number().int().positive(),
    catalogUrl: z.string().url(),
    gameVersion: z.string().min(1),
    smapiVersion: z.string().min(1),
    archivePattern: z.string().min(1),
    httpTimeoutMs: z.number().int().positive(),
  })
  .strict();

export type CliConfig = z.infer<typeof configSchema>;

/**
 * Get default config with all settings
 */
export function getDefaultConfig(): CliConfig {
  return {
    packageName: "com.chucklefish.stardewvalley",
    launcherPackage: "abc.smapi.gameloader",
    deviceStorageRoot: "/storage/emulated/0",
    adbPath: "adb",
    powershellPath: "powershell.exe",
    toleranceSeconds: 60,
    backupRetention: 5,
    copyTimeoutMs: 120_000,
    pollIntervalMs: 500,
    installWaitMs: 60_000,
    catalogUrl: "https://smapi.io/api/v3.0/mods",
    gameVersion: "1.6.15",
    smapiVersion: "4.1.10",
    archivePattern: "*.zip",
    httpTimeoutMs: 30_000,
  };
}

/**
 * Resolve the local root directory
 *
 * Priority:
 * 1. --dir flag
 * 2. FARMSYNC_DIR environment variable
 * 3. ~/farmsync
 */
export function resolveRootDir(
  options: { dir?: string },
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (options.dir) {
    return path.resolve(options.dir);
  }

  const envDir = env[ROOT_ENV];
  if (envDir) {
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), DEFAULT_ROOT);
}

export function getConfigPath(rootDir: string): string {
  return getLocalLayout(rootDir).configFile;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects (source overrides target)
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

/**
 * Load config for a root directory, layered over the defaults.
 * A missing file yields the defaults; an unreadable or invalid one throws
 * ConfigError.
 */
export async function loadConfig(rootDir: string): Promise<CliConfig> {
  const configPath = getConfigPath(rootDir);

  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(configPath, "utf-8"));
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw new ConfigError(`Cannot read ${formatPath(configPath)}: ${formatError(error)}`);
    }
  }

  if (!isPlainObject(raw)) {
    throw new ConfigError(`${formatPath(configPath)} must hold a JSON object`);
  }

  const parsed = configSchema.safeParse(deepMerge(getDefaultConfig(), raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${formatPath(configPath)}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Format a path for display (use ~ for home directory)
 */
export function formatPath(filePath: string): string {
  const home = os.homedir();
  if (filePath.startsWith(home)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}
