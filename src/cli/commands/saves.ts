/**
 * farmsync saves / pull-saves / push-saves
 */

import { formatDelta, type SyncCandidate, type SyncDecision } from "../../sync/reconcile.js";
import {
  createEngine,
  openSession,
  recordSync,
  reportSyncResult,
  withDevice,
  type CliDeps,
  type CommandOptions,
} from "../shared.js";

function describeState(decision: SyncDecision, candidate: SyncCandidate): string {
  switch (decision.reason) {
    case "in-sync":
      return "in sync";
    case "timestamp-unavailable":
      return "timestamps unavailable";
    case "device-newer":
      return `device newer by ${formatDelta(candidate)}`;
    case "local-newer":
      return `local newer by ${formatDelta(candidate)}`;
    case "device-only":
      return "would pull";
    case "local-only":
      return "would push";
  }
}

/**
 * Print the local/device comparison for every save without changing anything.
 */
export async function savesCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const { logger } = session.context;

  await withDevice(session, async (transport) => {
    const rows = await createEngine(session, transport).compareSaves();
    if (rows.length === 0) {
      logger.info("No saves on either side");
      return;
    }
    for (const { candidate, decision } of rows) {
      const where = candidate.localExists
        ? candidate.deviceExists
          ? "both"
          : "local only"
        : "device only";
      const state = describeState(decision, candidate);
      logger.info(`  ${candidate.name.padEnd(32)} ${where.padEnd(12)} ${state}`);
    }
  });
}

export async function pullSavesCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const result = await withDevice(session, (transport) => createEngine(session, transport).pullSaves());
  reportSyncResult(session, "Saves", result);
  for (const backup of result.backups) {
    session.context.logger.info(`  backup: ${backup}`);
  }
  await recordSync(session, "pull-saves", `${result.pulled.length} pulled, ${result.failed.length} failed`);
}

export async function pushSavesCommand(options: CommandOptions, deps: CliDeps = {}): Promise<void> {
  const session = await openSession(options, deps);
  const result = await withDevice(session, (transport) => createEngine(session, transport).pushSaves());
  reportSyncResult(session, "Saves", result);
  await recordSync(session, "push-saves", `${result.pushed.length} pushed, ${result.failed.length} failed`);
}
