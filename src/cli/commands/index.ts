/**
 * CLI Commands
 */

export { configCommand, type ConfigOptions } from "./config.js";
export { configsCommand, pullConfigsCommand, pushConfigsCommand } from "./configs.js";
export {
  apkInstallCommand,
  apkPullCommand,
  apkStatusCommand,
  deviceCommand,
  launchCommand,
  logsCommand,
  smapiInstallCommand,
  type DeviceOptions,
} from "./device.js";
export {
  checkUpdatesCommand,
  modsCommand,
  pullModsCommand,
  pushModsCommand,
  updateCommand,
  type UpdateOptions,
} from "./mods.js";
export { pullSavesCommand, pushSavesCommand, savesCommand } from "./saves.js";
export { statusCommand } from "./status.js";
export { deployCommand, syncCommand } from "./sync.js";
