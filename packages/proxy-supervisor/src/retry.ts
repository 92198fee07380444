import {setTimeout as delay} from 'node:timers/promises';

export const defaultSleep = async (ms: number) => {
  await delay(ms);
};

export const backoffDelayMs = (baseMs: number, retry: number) => baseMs * 2 ** retry;

export const pollUntil = async ({
  check,
  timeoutMs,
  intervalMs,
  now,
  sleep,
  abandoned = () => false
}: {
  check: () => Promise<boolean>;
  timeoutMs: number;
  intervalMs: number;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  abandoned?: () => boolean;
}): Promise<boolean> => {
  const deadline = now() + timeoutMs;
  for (;;) {
    if (abandoned()) {
      return false;
    }
    if (await check()) {
      return true;
    }
    const remaining = deadline - now();
    if (remaining <= 0) {
      return false;
    }
    await sleep(Math.min(intervalMs, remaining));
  }
};
