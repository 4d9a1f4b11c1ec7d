/**
 * Last-sync log: append-only, one tab-separated line per sync command.
 */

import fs from "node:fs/promises";
import path from "node:path";

export type SyncLogEntry = {
  timestamp: string;
  command: string;
  summary: string;
};

export async function appendSyncLog(logPath: string, entry: SyncLogEntry): Promise<void> {
  await fs.mkdir(path.dirname(logPath), { recursive: true });
  const summary = entry.summary.replace(/[\t\r\n]+/g, " ");
  await fs.appendFile(logPath, `${entry.timestamp}\t${entry.command}\t${summary}\n`, "utf-8");
}

export async function readLastSync(logPath: string): Promise<SyncLogEntry | null> {
  let content: string;
  try {
    content = await fs.readFile(logPath, "utf-8");
  } catch {
    return null;
  }
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const last = lines[lines.length - 1];
  if (!last) return null;
  const [timestamp, command = "", ...rest] = last.split("\t");
  return { timestamp, command, summary: rest.join("\t") };
}
