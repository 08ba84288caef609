import { logger } from '../../utils/logger.js';
import type { ScoreReport } from './scorer.js';

interface CacheEntry {
  report: ScoreReport;
  expiresAt: number;
}

/**
 * Short-TTL score cache shared across requests.
 *
 * Keys are `(interaction_id, score_epoch)` with `score_epoch = floor(now / ttl)`,
 * so an entry can never be served to a request whose clock falls in a later
 * epoch. Within one epoch a cached score may reflect an age up to `ttlMs` older
 * than the caller's clock; disable the cache (ttl 0) where that matters.
 */
export class ScoreCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly ttlMs: number, private readonly maxEntries = 10_000) {
    if (ttlMs <= 0) throw new Error('ScoreCache requires a positive ttlMs');
    logger.debug(`[ScoreCache] Initializing with ttl=${ttlMs}ms maxEntries=${maxEntries}`);
  }

  epochOf(now: Date): number {
    return Math.floor(now.getTime() / this.ttlMs);
  }

  private key(interactionId: number, epoch: number): string {
    return `${interactionId}:${epoch}`;
  }

  get(interactionId: number, now: Date): ScoreReport | null {
    const k = this.key(interactionId, this.epochOf(now));
    const entry = this.entries.get(k);
    if (!entry || now.getTime() >= entry.expiresAt) {
      if (entry) this.entries.delete(k);
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.report;
  }

  set(interactionId: number, now: Date, report: ScoreReport): void {
    if (this.entries.size >= this.maxEntries) this.prune(now);
    const epoch = this.epochOf(now);
    this.entries.set(this.key(interactionId, epoch), {
      report,
      expiresAt: (epoch + 1) * this.ttlMs
    });
  }

  /** Drop expired entries; if still full, drop the oldest half. */
  prune(now: Date): void {
    const t = now.getTime();
    for (const [k, entry] of this.entries) {
      if (t >= entry.expiresAt) this.entries.delete(k);
    }
    if (this.entries.size >= this.maxEntries) {
      const dropCount = Math.ceil(this.entries.size / 2);
      let dropped = 0;
      for (const k of this.entries.keys()) {
        if (dropped >= dropCount) break;
        this.entries.delete(k);
        dropped++;
      }
    }
  }

  stats(): { size: number; hits: number; misses: number } {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
