import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async ms => {
  await delay(ms);
};

export interface PollOptions {
  readonly intervalMs: number;
  readonly maxAttempts: number;
  readonly sleep?: Sleep;
}

/**
 * Re-check `predicate` until it holds or the attempt budget is spent.
 *
 * Every failed check is followed by one sleep of `intervalMs`, including the
 * last. Errors thrown by the predicate are not caught.
 */
export async function pollUntil(
  predicate: () => boolean | Promise<boolean>,
  options: PollOptions
): Promise<boolean> {
  const wait = options.sleep ?? sleep;
  let remaining = options.maxAttempts;

  while (remaining > 0) {
    if (await predicate()) {
      return true;
    }
    await wait(options.intervalMs);
    remaining -= 1;
  }

  return false;
}
