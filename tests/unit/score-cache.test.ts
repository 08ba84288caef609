import { ScoreCache } from '../../src/services/relevance/score-cache.js';
import { scoreWithReport } from '../../src/services/relevance/scorer.js';
import { NOW, makeInteraction } from '../helpers/fixtures.js';

describe('ScoreCache', () => {
  const report = scoreWithReport(makeInteraction({ id: 1 }), NOW);

  test('rejects a non-positive ttl', () => {
    expect(() => new ScoreCache(0)).toThrow('ScoreCache requires a positive ttlMs');
  });

  test('serves entries within the same epoch only', () => {
    const cache = new ScoreCache(1000);
    cache.set(1, NOW, report);

    expect(cache.get(1, new Date(NOW.getTime() + 500))).toBe(report);
    expect(cache.get(1, new Date(NOW.getTime() + 1000))).toBeNull();
    expect(cache.get(2, NOW)).toBeNull();
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 2 });
  });

  test('drops the oldest half when full', () => {
    const cache = new ScoreCache(60_000, 2);
    cache.set(1, NOW, report);
    cache.set(2, NOW, report);
    cache.set(3, NOW, report);

    expect(cache.stats().size).toBe(2);
    expect(cache.get(1, NOW)).toBeNull();
    expect(cache.get(2, NOW)).toBe(report);
    expect(cache.get(3, NOW)).toBe(report);
  });

  test('prune removes expired entries first', () => {
    const cache = new ScoreCache(1000, 10);
    cache.set(1, NOW, report);
    cache.prune(new Date(NOW.getTime() + 1000));
    expect(cache.stats().size).toBe(0);
  });
});
