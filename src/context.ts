import type { Logger } from "./logger.js";

/**
 * Per-invocation flags, fixed for the whole run.
 */
export type ExecutionContext = Readonly<{
  /** Log mutating operations instead of performing them */
  dryRun: boolean;
  /** Skip confirmations; the newer side always wins */
  force: boolean;
  logger: Logger;
}>;

export function createExecutionContext(options: {
  dryRun?: boolean;
  force?: boolean;
  logger: Logger;
}): ExecutionContext {
  return Object.freeze({
    dryRun: options.dryRun ?? false,
    force: options.force ?? false,
    logger: options.logger,
  });
}
