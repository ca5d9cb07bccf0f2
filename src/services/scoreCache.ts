import fs from 'fs/promises';
import path from 'path';
import { describeError } from "../utils/errors";
import { z } from "zod";
import { ScoredResponseSchema } from "./biasSchema";
import type { ScoredResponse } from "./biasSchema";

export interface CacheEntry {
  key: string;
  response: ScoredResponse;
  // epoch milliseconds
  storedAt: number;
  ttlSeconds: number;
}

const CacheEntrySchema = z.object({
  key: z.string(),
  response: ScoredResponseSchema,
  storedAt: z.number(),
  ttlSeconds: z.number()
});

export interface CacheStore {
  get(key: string): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
}

export interface ScoreCacheOptions {
  ttlSeconds?: number;
  now?: () => number;
}

/** Entries from another model version must never be served. */
export function scoreCacheKey(fingerprint: string, modelVersion: string): string {
  return `${modelVersion}:${fingerprint}`;
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return now - entry.storedAt > entry.ttlSeconds * 1000;
}

/**
 * Fingerprint → scored response cache with per-key single flight: concurrent
 * callers for one key share a single compute and its outcome.
 */
export class ScoreCache {
  private readonly inflight = new Map<string, Promise<ScoredResponse>>();
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(private readonly store: CacheStore, options: ScoreCacheOptions = {}) {
    this.ttlSeconds = options.ttlSeconds ?? 86400;
    this.now = options.now ?? Date.now;
  }

  getOrCompute(key: string, compute: () => Promise<ScoredResponse>): Promise<ScoredResponse> {
    const pending = this.inflight.get(key);
    if (pending) return pending;

    const task = this.lookupOrCompute(key, compute).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, task);
    return task;
  }

  private async lookupOrCompute(key: string, compute: () => Promise<ScoredResponse>): Promise<ScoredResponse> {
    const cached = await this.store.get(key);
    if (cached && !isExpired(cached, this.now())) {
      console.log(`[Cache] hit ${key}`);
      return cached.response;
    }

    const response = await compute();
    const entry: CacheEntry = { key, response, storedAt: this.now(), ttlSeconds: this.ttlSeconds };
    try {
      await this.store.set(entry);
    } catch (error) {
      // The computed value is still good; only later lookups miss
      console.error(`[Cache] failed to persist ${key}:`, describeError(error));
    }
    return response;
  }
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | null> {
    return this.entries.get(key) ?? null;
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** One JSON file per key under `directory`. */
export class FileCacheStore implements CacheStore {
  constructor(private readonly directory: string) {}

  private fileFor(key: string): string {
    return path.join(this.directory, `${key.replace(/[^a-zA-Z0-9._-]/g, '_')}.json`);
  }

  async get(key: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(key), 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return null;
      throw error;
    }
    try {
      const entry = CacheEntrySchema.parse(JSON.parse(raw));
      return entry.key === key ? entry : null;
    } catch (error) {
      console.warn(`[Cache] ignoring unreadable entry for ${key}:`, describeError(error));
      return null;
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = this.fileFor(entry.key);
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(entry, null, 2), 'utf8');
    await fs.rename(temp, target);
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
