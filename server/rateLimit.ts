// Token bucket guarding /simulate. Large workloads are CPU-bound, so requests
// are admitted at a steady rate with a bounded burst.

export type TokenBucket = {
  readonly tryTake: (n?: number) => boolean;
  readonly available: () => number;
};

export function createTokenBucket(opts: {
  rps: number;
  burst: number;
  nowMs?: () => number;
}): TokenBucket {
  const now = opts.nowMs ?? (() => Date.now());
  const perMs = opts.rps / 1000;
  let tokens = opts.burst;
  let stamp = now();

  const refill = (): void => {
    const t = now();
    // a clock stepping backwards only resets the stamp
    if (t > stamp) tokens = Math.min(opts.burst, tokens + (t - stamp) * perMs);
    stamp = t;
  };

  return {
    tryTake(n = 1) {
      if (!Number.isFinite(n) || n <= 0) return false;
      refill();
      if (tokens < n) return false;
      tokens -= n;
      return true;
    },
    available() {
      refill();
      return tokens;
    },
  };
}
