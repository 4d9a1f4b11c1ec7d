/**
 * farmsync sync / deploy
 */

import { DeviceControl } from "../../devices/control.js";
import { CatalogQueryError } from "../../errors.js";
import { summarizeSyncResult } from "../../sync/reconcile.js";
import {
  createConfigSynchronizer,
  createEngine,
  openSession,
  recordSync,
  reportSyncResult,
  withDevice,
  type CliDeps,
  type CommandOptions,
} from "../shared.js";
import { deviceControl } from "./device.js";
import { checkForUpdates, reportUpdates } from "./mods.js";

/**
 * Full sync: saves both ways, configs newer-wins, missing mods pushed, then
 * an update check. A catalog failure ends only the update check.
 */
export async function syncCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;

  const summary = await withDevice(session, async (transport) => {
    const engine = createEngine(session, transport);

    const saves = await engine.syncSaves();
    reportSyncResult(session, "Saves", saves);

    const configs = await createConfigSynchronizer(session, transport).syncConfigs();
    reportSyncResult(session, "Configs", configs);

    const mods = await engine.pushMissingMods();
    reportSyncResult(session, "Mods", mods);
    if (mods.deviceOnly.length > 0) {
      logger.info(`On the device only: ${mods.deviceOnly.join(", ")}`);
    }

    return `saves: ${summarizeSyncResult(saves)}; configs: ${summarizeSyncResult(configs)}; mods: ${mods.pushed.length} pushed`;
  });
  await recordSync(session, "sync", summary);

  try {
    reportUpdates(session, await checkForUpdates(session));
  } catch (error) {
    if (!(error instanceof CatalogQueryError)) throw error;
    logger.warn(`Update check skipped: ${error.message}`);
  }
}

/**
 * Push missing mods and all configs, then start the game.
 */
export async function deployCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;

  await withDevice(session, async (transport) => {
    const mods = await createEngine(session, transport).pushMissingMods();
    reportSyncResult(session, "Mods", mods);

    const configs = await createConfigSynchronizer(session, transport).pushConfigs();
    reportSyncResult(session, "Configs", configs);

    await recordSync(session, "deploy", `${mods.pushed.length} mods pushed, ${configs.pushed.length} configs pushed`);

    const control: DeviceControl | null = deviceControl(session, transport);
    if (!control) {
      logger.warn("Device has no shell channel; start the game by hand");
      return;
    }
    const profile = await session.profiles.get(transport.identity);
    if (await control.launchGame(profile?.tap)) {
      logger.info("Game started");
    }
  });
}
