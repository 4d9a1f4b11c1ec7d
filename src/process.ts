/**
 * Child process helpers
 */

import { spawn } from "node:child_process";

export type ProcessResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  /** Kill the process after this long (code is then -1) */
  timeoutMs?: number;
  cwd?: string;
};

/**
 * Run a command to completion.
 *
 * Never rejects: a non-zero exit is reported through `code`, and a spawn
 * failure (missing binary) resolves with code -1 and the reason in stderr.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunOptions = {},
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve(result);
    };

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    const timer = options.timeoutMs
      ? setTimeout(() => {
          child.kill("SIGKILL");
          finish({ code: -1, stdout, stderr: `${stderr}\ntimed out after ${options.timeoutMs}ms` });
        }, options.timeoutMs)
      : null;

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      finish({ code: -1, stdout, stderr: error.message });
    });
    child.on("close", (code) => {
      finish({ code: code ?? -1, stdout, stderr });
    });
  });
}

/**
 * Open a URL in the operator's browser.
 */
export async function openInBrowser(url: string): Promise<boolean> {
  const [command, args]: [string, string[]] =
    process.platform === "win32"
      ? ["cmd", ["/c", "start", "", url]]
      : process.platform === "darwin"
        ? ["open", [url]]
        : ["xdg-open", [url]];
  const result = await runProcess(command, args, { timeoutMs: 15000 });
  return result.code === 0;
}
