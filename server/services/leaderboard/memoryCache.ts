import type { LeaderboardCache, LeaderboardPage } from "./types";

interface Entry {
  page: LeaderboardPage;
  expiresAt: number;
}

/** Process-local cache used when REDIS_URL is not configured. */
export class MemoryLeaderboardCache implements LeaderboardCache {
  private epoch = 0;
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  private key(limit: number, offset: number): string {
    return `${limit}:${offset}`;
  }

  async currentEpoch(): Promise<number> {
    return this.epoch;
  }

  async get(epoch: number, limit: number, offset: number): Promise<LeaderboardPage | null> {
    if (epoch !== this.epoch) return null;
    const key = this.key(limit, offset);
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.page);
  }

  async set(epoch: number, limit: number, offset: number, page: LeaderboardPage, ttlSeconds: number): Promise<void> {
    // Pages computed before an invalidation are dropped.
    if (epoch !== this.epoch) return;
    this.entries.set(this.key(limit, offset), {
      page: structuredClone(page),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async invalidate(): Promise<number> {
    this.epoch++;
    this.entries.clear();
    return this.epoch;
  }
}
