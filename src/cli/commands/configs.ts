/**
 * farmsync configs / pull-configs / push-configs
 */

import {
  createConfigSynchronizer,
  openSession,
  recordSync,
  reportSyncResult,
  withDevice,
  type CliDeps,
  type CommandOptions,
} from "../shared.js";

type ConfigFlow = "syncConfigs" | "pullConfigs" | "pushConfigs";

const COMMAND_NAMES: Record<ConfigFlow, string> = {
  syncConfigs: "configs",
  pullConfigs: "pull-configs",
  pushConfigs: "push-configs",
};

async function runConfigFlow(flow: ConfigFlow, options: CommandOptions, deps: CliDeps): Promise<void> {
  const session = await openSession(options, deps);
  const result = await withDevice(session, (transport) => createConfigSynchronizer(session, transport)[flow]());
  reportSyncResult(session, "Configs", result);
  await recordSync(
    session,
    COMMAND_NAMES[flow],
    `${result.pulled.length} pulled, ${result.pushed.length} pushed, ${result.failed.length} failed`,
  );
}

/**
 * Newer side wins for each mod's config.json and the loader's own config.
 */
export function configsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  return runConfigFlow("syncConfigs", options, deps);
}

export function pullConfigsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  return runConfigFlow("pullConfigs", options, deps);
}

export function pushConfigsCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  return runConfigFlow("pushConfigs", options, deps);
}
