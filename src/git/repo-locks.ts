import path from "node:path";

import pLimit, { type LimitFunction } from "p-limit";

// One operation at a time per key (the repository root). Different repositories run in parallel.
export class RepoLocks {
  private readonly limiters = new Map<string, LimitFunction>();

  async withLock<T>(repoPath: string, fn: () => Promise<T>): Promise<T> {
    const key = path.resolve(repoPath);
    const limiter = this.limiterFor(key);

    try {
      return await limiter(fn);
    } finally {
      if (limiter.activeCount === 0 && limiter.pendingCount === 0) {
        this.limiters.delete(key);
      }
    }
  }

  private limiterFor(key: string): LimitFunction {
    const existing = this.limiters.get(key);
    if (existing) return existing;

    const limiter = pLimit(1);
    this.limiters.set(key, limiter);
    return limiter;
  }
}
