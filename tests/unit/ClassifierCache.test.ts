/**
 * CacheManager, content fingerprints and the verdict cache built on them
 */

import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { ClassifierCache } from '../../bot/src/moderation/cache/ClassifierCache';
import { fingerprint, normalizeText } from '../../bot/src/moderation/cache/fingerprint';
import { createVerdict, Verdict } from '../../bot/src/moderation/types';
import { CacheManager } from '../../bot/src/performance/CacheManager';
import { Logger } from '../../bot/src/utils/Logger';
import { createTestLogger } from '../setup';

describe('CacheManager', () => {
  let logger: Logger;
  let clock: number;
  let cache: CacheManager<string>;

  beforeEach(() => {
    logger = createTestLogger();
    clock = 0;
    cache = new CacheManager<string>(logger, { maxSize: 2, defaultTtl: 1000, cleanupInterval: 0 }, () => clock);
  });

  afterEach(() => {
    cache.destroy();
  });

  test('should return stored values until the ttl passes', () => {
    cache.set('a', 'first');
    clock = 1000;
    expect(cache.get('a')).toBe('first');

    clock = 1001;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  test('should honour a per-entry ttl', () => {
    cache.set('short', 'value', 10);
    clock = 11;
    expect(cache.has('short')).toBe(false);
  });

  test('should evict the least recently used entry when full', () => {
    cache.set('a', 'A');
    clock = 1;
    cache.set('b', 'B');
    clock = 2;
    cache.get('a');
    clock = 3;
    cache.set('c', 'C');

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.getStats().evictions).toBe(1);
  });

  test('should track hits, misses and hit rate', () => {
    cache.set('a', 'A');
    cache.get('a');
    cache.get('a');
    cache.get('missing');

    const stats = cache.getStats();
    expect(stats.hits).toBe(2);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBeCloseTo(2 / 3);
  });

  test('should remove expired entries on cleanup', () => {
    cache.set('a', 'A');
    cache.set('b', 'B', 5000);
    clock = 2000;

    expect(cache.cleanup()).toBe(1);
    expect(cache.has('b')).toBe(true);
  });
});

describe('fingerprint', () => {
  test('should ignore case, repeated whitespace and zero-width characters', () => {
    expect(normalizeText('  Buy\u200B  DRUGS\there ')).toBe('buy drugs here');
    expect(fingerprint('Buy drugs here')).toBe(fingerprint('buy   DRUGS here'));
  });

  test('should distinguish different content', () => {
    expect(fingerprint('hello')).not.toBe(fingerprint('hello there'));
  });

  test('should produce a sha-256 hex digest', () => {
    expect(fingerprint('anything')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('ClassifierCache', () => {
  let logger: Logger;
  let classifierCache: ClassifierCache;

  const aiVerdict: Verdict = createVerdict({
    category: 'weapons',
    severity: 'high',
    confidence: 0.85,
    source: 'ai-primary',
    reason: 'weapon sale'
  });

  beforeEach(() => {
    logger = createTestLogger();
    classifierCache = new ClassifierCache(logger, { cleanupIntervalMs: 0 });
  });

  afterEach(() => {
    classifierCache.destroy();
  });

  test('should return cached verdicts marked with the cache source and their origin', () => {
    classifierCache.store('fp-1', aiVerdict);
    const cached = classifierCache.lookup('fp-1');

    expect(cached).toEqual({
      category: 'weapons',
      severity: 'high',
      confidence: 0.85,
      needsReview: false,
      reason: 'weapon sale',
      matchedRule: undefined,
      source: 'cache',
      origin: 'ai-primary'
    });
  });

  test('should report a miss for unknown fingerprints', () => {
    expect(classifierCache.lookup('unknown')).toBeUndefined();
    expect(classifierCache.getHitRate()).toBe(0);
  });

  test('should treat a failing backend as a miss', () => {
    const broken = new CacheManager<Verdict>(logger, { cleanupInterval: 0 });
    broken.get = () => {
      throw new Error('backend down');
    };
    broken.set = () => {
      throw new Error('backend down');
    };
    const resilient = new ClassifierCache(logger, {}, broken);

    expect(() => resilient.store('fp', aiVerdict)).not.toThrow();
    expect(resilient.lookup('fp')).toBeUndefined();
    resilient.destroy();
  });
});
