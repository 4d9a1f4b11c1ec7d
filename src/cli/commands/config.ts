/**
 * farmsync config - print the resolved configuration
 */

import { formatPath, getConfigPath } from "../config.js";
import { openSession, type CliDeps, type CommandOptions } from "../shared.js";

export type ConfigOptions = Pick<CommandOptions, "dir">;

export async function configCommand(options: ConfigOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;
  logger.info(`# ${formatPath(getConfigPath(session.layout.root))}`);
  logger.info(JSON.stringify(session.config, null, 2));
}
