import { EmbeddingIndex, contentHash, type VectorSearchBackend } from '../../src/services/embedding-index/index.js';
import type { TextEmbedder } from '../../src/services/embedding/types.js';
import { DegradedModeError } from '../../src/types/errors.js';
import { FailingEmbedder, HangingEmbedder, KeywordEmbedder } from '../helpers/fixtures.js';

const VOCABULARY = ['deploy', 'docker', 'error', 'test'];

class FakeBackend implements VectorSearchBackend {
  readonly name = 'fake';
  readonly points = new Map<number, number[]>();
  readyDimension: number | null = null;
  searchLimits: number[] = [];
  failSearch = false;
  extraIds: number[] = [];

  async ensureReady(dimension: number): Promise<void> {
    this.readyDimension = dimension;
  }

  async upsert(points: ReadonlyArray<{ id: number; vector: number[] }>): Promise<void> {
    for (const point of points) this.points.set(point.id, point.vector);
  }

  async remove(ids: readonly number[]): Promise<void> {
    for (const id of ids) this.points.delete(id);
  }

  async search(_vector: number[], limit: number): Promise<Array<{ id: number; score: number }>> {
    this.searchLimits.push(limit);
    if (this.failSearch) throw new Error('backend offline');
    return [...this.points.keys(), ...this.extraIds].map(id => ({ id, score: 0 }));
  }
}

/** Writes succeed; searches never settle */
class StalledSearchBackend extends FakeBackend {
  override search(_vector: number[], limit: number): Promise<Array<{ id: number; score: number }>> {
    this.searchLimits.push(limit);
    return new Promise(() => undefined);
  }
}

function createIndex(maxEmbeddings = 100, backend: VectorSearchBackend | null = null, backendTimeoutMs?: number) {
  const embedder = new KeywordEmbedder(VOCABULARY);
  const index = new EmbeddingIndex({ embedder, maxEmbeddings, backend, backendTimeoutMs });
  return { embedder, index };
}

describe('EmbeddingIndex', () => {
  test('rejects a non-positive capacity', () => {
    expect(() => createIndex(0)).toThrow('maxEmbeddings must be a positive integer, got 0');
  });

  test('upsert is idempotent on identical content', async () => {
    const { embedder, index } = createIndex();

    await expect(index.upsert(1, 'deploy docker')).resolves.toBe('inserted');
    await expect(index.upsert(1, 'deploy docker')).resolves.toBe('unchanged');
    expect(embedder.calls).toHaveLength(1);

    await expect(index.upsert(1, 'deploy error')).resolves.toBe('replaced');
    expect(index.size).toBe(1);
    expect(index.dimension).toBe(5);
    expect(index.getRecord(1)).toEqual({
      interaction_id: 1,
      vector: [1, 0, 1, 0, 0],
      content_hash: contentHash('deploy error')
    });
  });

  test('blank text is rejected without calling the embedder', async () => {
    const { embedder, index } = createIndex();
    const report = await index.upsertMany([{ id: 2, text: '   ' }]);
    expect(report.rejected).toEqual([{ id: 2, reason: 'empty_text' }]);
    expect(embedder.calls).toHaveLength(0);
    expect(index.has(2)).toBe(false);
  });

  test('vectors of the wrong dimension are rejected', async () => {
    const index = new EmbeddingIndex({ embedder: new KeywordEmbedder(VOCABULARY), maxEmbeddings: 10, dimension: 3 });
    await expect(index.upsert(1, 'deploy')).resolves.toBe('rejected');
    expect(index.size).toBe(0);
  });

  test('query orders by similarity, then by newer id', async () => {
    const { index } = createIndex();
    await index.upsertMany([
      { id: 1, text: 'deploy docker' },
      { id: 2, text: 'deploy' },
      { id: 3, text: 'error test' },
      { id: 4, text: 'deploy' }
    ]);

    const hits = await index.query('deploy', 10, 0.5);
    expect(hits.map(h => h.interaction_id)).toEqual([4, 2, 1]);
    expect(hits[0].similarity).toBe(1);
    expect(hits[2].similarity).toBeCloseTo(Math.SQRT1_2, 10);

    const top = await index.query('deploy', 1, 0.5);
    expect(top.map(h => h.interaction_id)).toEqual([4]);
  });

  test('restrictTo limits the search to the given ids', async () => {
    const { embedder, index } = createIndex();
    await index.upsertMany([
      { id: 1, text: 'deploy docker' },
      { id: 2, text: 'deploy' },
      { id: 3, text: 'error test' }
    ]);

    const hits = await index.query('deploy', 10, 0.5, { restrictTo: new Set([1, 3]) });
    expect(hits.map(h => h.interaction_id)).toEqual([1]);

    const callsBefore = embedder.calls.length;
    await expect(index.query('deploy', 10, 0.5, { restrictTo: new Set() })).resolves.toEqual([]);
    expect(embedder.calls).toHaveLength(callsBefore);
  });

  test('evicts never-queried records before queried ones', async () => {
    const { index } = createIndex(2);
    await index.upsert(1, 'deploy');
    await index.upsert(2, 'docker');
    await index.query('deploy', 1, 0.9);

    const report = await index.upsertMany([{ id: 3, text: 'error' }]);
    expect(report.evicted).toEqual([2]);
    expect(index.has(1)).toBe(true);
    expect(index.has(3)).toBe(true);
  });

  test('evicts the least recently queried record when all were queried', async () => {
    const { index } = createIndex(2);
    await index.upsert(1, 'deploy');
    await index.upsert(2, 'docker');
    await index.query('docker', 1, 0.9);
    await index.query('deploy', 1, 0.9);

    const report = await index.upsertMany([{ id: 3, text: 'error' }]);
    expect(report.evicted).toEqual([2]);
    expect(index.size).toBe(2);
  });

  test('peek does not count as an access', async () => {
    const { index } = createIndex(2);
    await index.upsert(1, 'deploy');
    await index.upsert(2, 'docker');
    await index.peek('deploy', 1, 0.9);

    const report = await index.upsertMany([{ id: 3, text: 'error' }]);
    expect(report.evicted).toEqual([1]);
  });

  test('a failing embedder rejects with an unavailable degradation', async () => {
    const index = new EmbeddingIndex({ embedder: new FailingEmbedder(), maxEmbeddings: 10 });
    const attempt = index.upsert(1, 'deploy');
    await expect(attempt).rejects.toBeInstanceOf(DegradedModeError);
    await expect(index.upsert(1, 'deploy')).rejects.toMatchObject({ reason: 'unavailable' });
    expect(index.size).toBe(0);
  });

  test('a hanging embedder is cut off by the signal', async () => {
    const index = new EmbeddingIndex({ embedder: new HangingEmbedder(), maxEmbeddings: 10 });
    await expect(index.upsert(1, 'deploy', AbortSignal.timeout(10))).rejects.toMatchObject({ reason: 'timed_out' });

    const controller = new AbortController();
    controller.abort();
    await expect(index.upsert(1, 'deploy', controller.signal)).rejects.toMatchObject({ reason: 'timed_out' });
  });

  test('a query vector of another dimension is reported as unavailable', async () => {
    let width = 2;
    const embedder: TextEmbedder = {
      embed: async texts => texts.map(() => new Array<number>(width).fill(1))
    };
    const index = new EmbeddingIndex({ embedder, maxEmbeddings: 10 });
    await index.upsert(1, 'anything');
    width = 3;
    await expect(index.query('anything', 1, 0)).rejects.toMatchObject({ reason: 'unavailable' });
  });

  describe('with an accelerated backend', () => {
    test('mirrors writes and re-checks backend hits against held records', async () => {
      const backend = new FakeBackend();
      backend.extraIds = [99];
      const { index } = createIndex(100, backend);
      expect(index.searchMode).toBe('accelerated');

      await index.upsertMany([
        { id: 1, text: 'deploy docker' },
        { id: 2, text: 'error' }
      ]);
      expect(backend.readyDimension).toBe(5);
      expect([...backend.points.keys()]).toEqual([1, 2]);

      const hits = await index.query('deploy', 2, 0.5);
      expect(hits.map(h => h.interaction_id)).toEqual([1]);
      expect(backend.searchLimits).toEqual([8]);
    });

    test('evictions are removed from the backend', async () => {
      const backend = new FakeBackend();
      const { index } = createIndex(1, backend);
      await index.upsert(1, 'deploy');
      await index.upsert(2, 'docker');
      expect([...backend.points.keys()]).toEqual([2]);
    });

    test('falls back to brute force when the backend fails', async () => {
      const backend = new FakeBackend();
      const { index } = createIndex(100, backend);
      await index.upsert(1, 'deploy');
      backend.failSearch = true;

      const hits = await index.query('deploy', 1, 0.5);
      expect(hits.map(h => h.interaction_id)).toEqual([1]);
      expect(index.searchMode).toBe('brute_force');
    });

    test('a backend search past its timeout is dropped for brute force', async () => {
      const backend = new StalledSearchBackend();
      const { index } = createIndex(100, backend, 20);
      await index.upsert(1, 'deploy docker');

      const hits = await index.query('deploy', 1, 0.5);
      expect(hits).toEqual([{ interaction_id: 1, similarity: expect.closeTo(Math.SQRT1_2, 10) }]);
      expect(backend.searchLimits).toEqual([4]);
      expect(index.searchMode).toBe('brute_force');
    });

    test('a search cut off by the request signal scans in memory and keeps the backend', async () => {
      const backend = new StalledSearchBackend();
      const { index } = createIndex(100, backend, 10_000);
      await index.upsert(1, 'deploy docker');

      const hits = await index.query('deploy', 1, 0.5, { signal: AbortSignal.timeout(20) });
      expect(hits.map(h => h.interaction_id)).toEqual([1]);
      expect(index.searchMode).toBe('accelerated');
    });
  });

  test('concurrent upserts and queries keep the cap and never surface evicted ids', async () => {
    const { index } = createIndex(5);
    const sizes: number[] = [];
    const evicted: number[] = [];
    const queried: number[][] = [];

    const work: Array<Promise<void>> = [];
    for (let id = 1; id <= 20; id++) {
      work.push(index.upsertMany([{ id, text: `deploy ${id}` }]).then(report => {
        evicted.push(...report.evicted);
        sizes.push(index.size);
      }));
      if (id % 2 === 0) {
        work.push(index.query('deploy', 3, 0.5).then(hits => {
          queried.push(hits.map(hit => hit.interaction_id));
          sizes.push(index.size);
        }));
      }
    }
    await Promise.all(work);

    expect(sizes).toHaveLength(30);
    expect(Math.max(...sizes)).toBeLessThanOrEqual(5);
    expect(index.size).toBe(5);
    expect(evicted).toHaveLength(15);
    expect(new Set(evicted).size).toBe(15);
    for (const hits of queried) {
      expect(hits.length).toBeLessThanOrEqual(3);
      expect(new Set(hits).size).toBe(hits.length);
    }

    const held = (await index.query('deploy', 20, 0.5)).map(hit => hit.interaction_id);
    expect(held).toHaveLength(5);
    expect(held.filter(id => evicted.includes(id))).toEqual([]);
    expect([...held, ...evicted].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
  });
});
