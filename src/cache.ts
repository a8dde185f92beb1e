import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { CacheFileSchema } from './schemas';
import type { CacheFileData } from './schemas';
import type { CacheEntry, CacheStore, Clock, RemoteRelease } from './types';

export const systemClock: Clock = {
  now: () => Date.now(),
};

function isLive(entry: CacheEntry, now: number): boolean {
  return now < entry.expiresAt;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (!isLive(entry, this.clock.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  async put(key: string, release: RemoteRelease, ttl: number): Promise<void> {
    const now = this.clock.now();
    for (const [existingKey, entry] of this.entries) {
      if (!isLive(entry, now)) {
        this.entries.delete(existingKey);
      }
    }
    this.entries.set(key, { release, insertedAt: now, expiresAt: now + ttl });
  }

  get size(): number {
    return this.entries.size;
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

/**
 * Keeps entries in a single JSON file so they survive process restarts.
 * An unreadable or corrupt file is treated as an empty cache and replaced on the next write.
 */
export class FileCacheStore implements CacheStore {
  private readonly filePath: string;
  private readonly clock: Clock;

  constructor(filePath: string, clock: Clock = systemClock) {
    this.filePath = filePath;
    this.clock = clock;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = this.load().entries[key];
    if (!entry || !isLive(entry, this.clock.now())) {
      return undefined;
    }
    return entry;
  }

  async put(key: string, release: RemoteRelease, ttl: number): Promise<void> {
    const now = this.clock.now();
    const data = this.load();

    // Drop expired entries while rewriting the file
    const entries = Object.fromEntries(
      Object.entries(data.entries).filter(([, entry]) => isLive(entry, now)),
    );
    entries[key] = { release, insertedAt: now, expiresAt: now + ttl };

    this.save({ entries });
  }

  async delete(key: string): Promise<void> {
    if (!existsSync(this.filePath)) return;

    const data = this.load();
    if (!(key in data.entries)) return;

    const entries = { ...data.entries };
    delete entries[key];
    this.save({ entries });
  }

  private load(): CacheFileData {
    if (!existsSync(this.filePath)) {
      return { entries: {} };
    }

    let json: unknown;
    try {
      json = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    }
    catch {
      return { entries: {} };
    }

    const parsed = CacheFileSchema.safeParse(json);
    return parsed.success ? parsed.data : { entries: {} };
  }

  private save(data: CacheFileData): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(data), 'utf-8');
  }
}
