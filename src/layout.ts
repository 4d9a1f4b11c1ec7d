/**
 * Local mirror layout
 *
 * <root>/
 *   saves/<save>/          one folder per save game
 *   mods/<mod>/            one folder per mod (manifest.json, config.json)
 *   configs/<mod>/         mod config files, mirroring mod names
 *   backups/<save>/<time>/ rolling save backups
 *   downloads/             scratch space for mod updates
 *   logs/ apks/            pulled game logs and packages
 *   .farmsync/             config, device profiles, sync log, credentials
 */

import fs from "node:fs/promises";
import path from "node:path";

export const STATE_DIR = ".farmsync";

export type LocalLayout = {
  root: string;
  saves: string;
  mods: string;
  configs: string;
  backups: string;
  downloads: string;
  /** Where the operator drops manually downloaded archives */
  manualDownloads: string;
  logs: string;
  apks: string;
  stateDir: string;
  configFile: string;
  devicesFile: string;
  syncLog: string;
  logFile: string;
  nexusKeyFile: string;
};

export function getLocalLayout(root: string): LocalLayout {
  const stateDir = path.join(root, STATE_DIR);
  const downloads = path.join(root, "downloads");
  return {
    root,
    saves: path.join(root, "saves"),
    mods: path.join(root, "mods"),
    configs: path.join(root, "configs"),
    backups: path.join(root, "backups"),
    downloads,
    manualDownloads: path.join(downloads, "manual"),
    logs: path.join(root, "logs"),
    apks: path.join(root, "apks"),
    stateDir,
    configFile: path.join(stateDir, "config.json"),
    devicesFile: path.join(stateDir, "devices.json"),
    syncLog: path.join(stateDir, "last-sync.log"),
    logFile: path.join(stateDir, "farmsync.log"),
    nexusKeyFile: path.join(stateDir, "nexus-api-key"),
  };
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
