import type { SqlClient, SqlResult } from '../../src/services/store/pg-client.js';

/**
 * In-process stand-in for the pg pool: records every query and answers from
 * a queue of canned results.
 */
export class FakeSqlClient implements SqlClient {
  readonly queries: Array<{ text: string; params: unknown[] }> = [];
  private readonly results: Array<SqlResult | Error> = [];
  ended = false;

  respond(...results: Array<SqlResult | Error>): this {
    this.results.push(...results);
    return this;
  }

  async query(text: string, params: unknown[] = []): Promise<SqlResult> {
    this.queries.push({ text, params });
    const next = this.results.shift() ?? { rows: [] };
    if (next instanceof Error) throw next;
    return next;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}
