/**
 * Bounded polling
 *
 * Copy-based transfers finish asynchronously with no completion signal, and a
 * freshly installed app creates its data directory some time after install.
 * Both are waited for here, never longer than the given timeout.
 */

export type PollOptions = {
  timeoutMs: number;
  intervalMs: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll until `check` resolves true. Resolves false on timeout.
 *
 * The check always runs at least once, so a zero timeout still sees an
 * operation that has already completed.
 */
export async function waitFor(
  check: () => Promise<boolean>,
  options: PollOptions,
): Promise<boolean> {
  const pause = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    if (await check()) return true;
    if (now() >= deadline) return false;
    await pause(options.intervalMs);
  }
}

/**
 * Poll a value until two consecutive reads agree (and `ready` accepts it).
 * Used to detect the end of a folder copy whose size keeps growing.
 */
export async function waitForStable<T>(
  read: () => Promise<T>,
  options: PollOptions & { equals?: (a: T, b: T) => boolean; ready?: (value: T) => boolean },
): Promise<boolean> {
  const equals = options.equals ?? ((a: T, b: T) => a === b);
  const ready = options.ready ?? (() => true);
  let previous: { value: T } | null = null;

  return waitFor(async () => {
    const value = await read();
    const stable = previous !== null && ready(value) && equals(previous.value, value);
    previous = { value };
    return stable;
  }, options);
}
