#!/usr/bin/env node
/**
 * farmsync CLI
 *
 * Keeps Stardew Valley saves, mods and mod configs in step between this
 * computer and an Android device.
 */

import { Command, program } from "commander";

import {
  apkInstallCommand,
  apkPullCommand,
  apkStatusCommand,
  checkUpdatesCommand,
  configCommand,
  configsCommand,
  deployCommand,
  deviceCommand,
  launchCommand,
  logsCommand,
  modsCommand,
  pullConfigsCommand,
  pullModsCommand,
  pullSavesCommand,
  pushConfigsCommand,
  pushModsCommand,
  pushSavesCommand,
  savesCommand,
  smapiInstallCommand,
  statusCommand,
  syncCommand,
  updateCommand,
  type DeviceOptions,
  type UpdateOptions,
} from "./commands/index.js";
import { createTerminalPrompter } from "./prompt.js";
import { runCommand, type CliDeps, type CommandOptions } from "./shared.js";
import { VERSION } from "./version.js";

// One prompter for the process, so answers typed ahead are not lost between questions
const prompter = createTerminalPrompter();
const deps: CliDeps = { prompter };

program
  .name("farmsync")
  .description("Sync Stardew Valley saves, mods and configs with an Android device")
  .version(VERSION);

/**
 * Register a device command with the common flags.
 */
function deviceCommandSpec(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .option("-d, --dir <path>", "Local farmsync directory")
    .option("-f, --force", "Skip confirmations; the newer side wins")
    .option("--dry-run", "Show what would change without changing anything")
    .option("-v, --verbose", "Print debug output");
}

const simple: Array<[string, string, (options: CommandOptions, deps: CliDeps) => Promise<void>]> = [
  ["sync", "Sync saves both ways, configs by newest, push missing mods, check for updates", syncCommand],
  ["saves", "Compare local and device saves", savesCommand],
  ["pull-saves", "Copy every device save here (backing up local copies)", pullSavesCommand],
  ["push-saves", "Copy every local save to the device", pushSavesCommand],
  ["mods", "Push local mods the device is missing", modsCommand],
  ["pull-mods", "Copy device-only mods here (--force replaces local copies)", pullModsCommand],
  ["push-mods", "Copy every local mod to the device", pushModsCommand],
  ["configs", "Sync mod configs, newer side wins", configsCommand],
  ["pull-configs", "Copy every device mod config here", pullConfigsCommand],
  ["push-configs", "Copy every local mod config to the device", pushConfigsCommand],
  ["deploy", "Push missing mods and configs, then start the game", deployCommand],
  ["logs", "Pull the game's log files", logsCommand],
  ["launch", "Start the game through the mod loader", launchCommand],
  ["apk-status", "Show installed game and loader versions", apkStatusCommand],
  ["apk-pull", "Copy the game's apk files here", apkPullCommand],
  ["apk-install", "Install the apk files in apks/", apkInstallCommand],
  ["status", "Show local state and the connected device", statusCommand],
  ["check-updates", "Ask the update catalog about local mods", checkUpdatesCommand],
];

for (const [name, description, action] of simple) {
  deviceCommandSpec(name, description).action((options: CommandOptions) => runCommand(() => action(options, deps)));
}

// farmsync update [name]
deviceCommandSpec("update [name]", "Download and install mod updates")
  .option("--github-token <token>", "GitHub token for release downloads")
  .action((name: string | undefined, options: UpdateOptions) => runCommand(() => updateCommand(name, options, deps)));

// farmsync smapi-install <apk>
deviceCommandSpec("smapi-install <apk>", "Install the mod loader apk and wait for the game's data folder").action(
  (apk: string, options: CommandOptions) => runCommand(() => smapiInstallCommand(apk, options, deps)),
);

// farmsync device
deviceCommandSpec("device", "List known devices")
  .option("--tap <x,y>", "Store the point tapped after launch for the connected device")
  .action((options: DeviceOptions) => runCommand(() => deviceCommand(options, deps)));

// farmsync config
program
  .command("config")
  .description("Print the resolved configuration")
  .option("-d, --dir <path>", "Local farmsync directory")
  .action((options: { dir?: string }) => runCommand(() => configCommand(options, deps)));

program
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  })
  .finally(() => prompter.close());
