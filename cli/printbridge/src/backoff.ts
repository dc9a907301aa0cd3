export type BackoffPolicy = {
  floorMs: number;
  ceilingMs: number;
  /** Fraction of the base delay added or removed at random. */
  jitterRatio: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  floorMs: 1000,
  ceilingMs: 60_000,
  jitterRatio: 0.2,
};

export function backoffBase(failures: number, policy: BackoffPolicy): number {
  if (failures <= 0) return policy.floorMs;
  const exp = Math.min(failures - 1, 30);
  return Math.min(policy.ceilingMs, policy.floorMs * 2 ** exp);
}

export function backoffDelay(failures: number, policy: BackoffPolicy, random: () => number = Math.random): number {
  const base = backoffBase(failures, policy);
  const spread = base * policy.jitterRatio;
  const jittered = base + (random() * 2 - 1) * spread;
  return Math.round(Math.max(0, Math.min(policy.ceilingMs, jittered)));
}

/** Resolves true after ms, or false as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
