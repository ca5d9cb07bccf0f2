import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileCacheStore, MemoryCacheStore, ScoreCache, isExpired, scoreCacheKey } from "../src/services/scoreCache";
import type { CacheEntry, CacheStore } from "../src/services/scoreCache";
import type { ScoredResponse } from "../src/services/biasSchema";
import { makeScoredResponse } from "./helpers";

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}

describe("scoreCacheKey", () => {
  it("scopes fingerprints by model version", () => {
    expect(scoreCacheKey('abc123', 'gemini-2.5-flash')).toBe('gemini-2.5-flash:abc123');
    expect(scoreCacheKey('abc123', 'm1')).not.toBe(scoreCacheKey('abc123', 'm2'));
  });
});

describe("isExpired", () => {
  const entry: CacheEntry = { key: 'k', response: makeScoredResponse(), storedAt: 1000, ttlSeconds: 1 };

  it("expires strictly after the ttl", () => {
    expect(isExpired(entry, 2000)).toBe(false);
    expect(isExpired(entry, 2001)).toBe(true);
  });
});

describe("ScoreCache", () => {
  it("runs one compute for concurrent callers of the same key", async () => {
    const cache = new ScoreCache(new MemoryCacheStore());
    const gate = deferred<ScoredResponse>();
    let computes = 0;
    const compute = () => {
      computes++;
      return gate.promise;
    };

    const callers = Array.from({ length: 5 }, () => cache.getOrCompute('m1:fp', compute));
    gate.resolve(makeScoredResponse());
    const results = await Promise.all(callers);

    expect(computes).toBe(1);
    results.forEach(result => expect(result).toEqual(makeScoredResponse()));
  });

  it("serves a stored entry without computing", async () => {
    const cache = new ScoreCache(new MemoryCacheStore());
    let computes = 0;
    const compute = async () => {
      computes++;
      return makeScoredResponse();
    };
    await cache.getOrCompute('m1:fp', compute);
    await cache.getOrCompute('m1:fp', compute);
    expect(computes).toBe(1);
  });

  it("recomputes once an entry outlives its ttl", async () => {
    let clock = 0;
    const cache = new ScoreCache(new MemoryCacheStore(), { ttlSeconds: 1, now: () => clock });
    let computes = 0;
    const compute = async () => {
      computes++;
      return makeScoredResponse({ computedAt: `run-${computes}` });
    };

    expect((await cache.getOrCompute('m1:fp', compute)).computedAt).toBe('run-1');
    clock = 500;
    expect((await cache.getOrCompute('m1:fp', compute)).computedAt).toBe('run-1');
    clock = 2000;
    expect((await cache.getOrCompute('m1:fp', compute)).computedAt).toBe('run-2');
    expect(computes).toBe(2);
  });

  it("hands one failure to every concurrent caller", async () => {
    const store = new MemoryCacheStore();
    const cache = new ScoreCache(store);
    const failure = new Error('model unavailable');
    let computes = 0;
    const compute = async () => {
      computes++;
      await new Promise(resolve => setTimeout(resolve, 5));
      throw failure;
    };

    const settled = await Promise.allSettled(Array.from({ length: 4 }, () => cache.getOrCompute('m1:fp', compute)));

    expect(computes).toBe(1);
    expect(settled.map(result => result.status)).toEqual(['rejected', 'rejected', 'rejected', 'rejected']);
    settled.forEach(result => {
      if (result.status === 'rejected') expect(result.reason).toBe(failure);
    });
    expect(store.size).toBe(0);
  });

  it("does not store a failed compute", async () => {
    const store = new MemoryCacheStore();
    const cache = new ScoreCache(store);
    await expect(cache.getOrCompute('m1:fp', async () => {
      throw new Error('model unavailable');
    })).rejects.toThrow('model unavailable');
    expect(store.size).toBe(0);

    const response = await cache.getOrCompute('m1:fp', async () => makeScoredResponse());
    expect(response).toEqual(makeScoredResponse());
    expect(store.size).toBe(1);
  });

  it("returns the computed value when the store cannot persist it", async () => {
    const failingStore: CacheStore = {
      get: async () => null,
      set: async () => {
        throw new Error('disk full');
      }
    };
    const cache = new ScoreCache(failingStore);
    await expect(cache.getOrCompute('m1:fp', async () => makeScoredResponse())).resolves.toEqual(makeScoredResponse());
  });
});

describe("FileCacheStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'score-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("persists entries across instances", async () => {
    const entry: CacheEntry = { key: 'fake-model@1:abc', response: makeScoredResponse(), storedAt: 42, ttlSeconds: 60 };
    await new FileCacheStore(dir).set(entry);

    expect(await new FileCacheStore(dir).get('fake-model@1:abc')).toEqual(entry);
    expect(await fs.readdir(dir)).toEqual(['fake-model_1_abc.json']);
  });

  it("returns null for a missing key", async () => {
    expect(await new FileCacheStore(dir).get('m1:missing')).toBeNull();
  });

  it("ignores an unreadable entry", async () => {
    await fs.writeFile(path.join(dir, 'm1_broken.json'), '{ not json', 'utf8');
    expect(await new FileCacheStore(dir).get('m1:broken')).toBeNull();
  });
});
