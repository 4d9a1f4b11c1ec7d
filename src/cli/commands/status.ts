/**
 * farmsync status - local mirror summary, last sync, and the device if one is attached
 */

import { scanManifests } from "../../mods/manifest.js";
import { listLocalFolders } from "../../sync/reconcile.js";
import { readLastSync } from "../../sync/sync-log.js";
import { describeTransport } from "../../transport/index.js";
import { formatPath } from "../config.js";
import { detectDevice, openSession, type CliDeps, type CommandOptions } from "../shared.js";

export async function statusCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { layout } = session;
  const { logger } = session.context;

  const saves = await listLocalFolders(layout.saves);
  const scan = await scanManifests(layout.mods);
  const lastSync = await readLastSync(layout.syncLog);

  logger.info("farmsync status");
  logger.info("===============");
  logger.info(`Root:       ${formatPath(layout.root)}`);
  logger.info(`Saves:      ${saves.length}`);
  logger.info(`Mods:       ${scan.manifests.length}${scan.errors.length > 0 ? ` (${scan.errors.length} unreadable)` : ""}`);
  logger.info(`Last sync:  ${lastSync ? `${lastSync.timestamp} ${lastSync.command} (${lastSync.summary})` : "never"}`);

  const transport = await detectDevice(session);
  if (!transport) {
    logger.info("Device:     not connected");
    return;
  }
  try {
    logger.info(`Device:     ${transport.displayName} via ${describeTransport(transport)}`);
  } finally {
    await transport.dispose();
  }
}
