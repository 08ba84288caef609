import { ensureSchema, pgHealthCheck } from '../../src/services/store/pg-client.js';
import { PgInteractionStore } from '../../src/services/store/pg-interaction-store.js';
import { PgPreferenceStore } from '../../src/services/store/pg-preference-store.js';
import { INTERACTIONS_SCHEMA_SQL } from '../../src/services/store/pg-schema.js';
import { StoreUnavailableError } from '../../src/types/errors.js';
import { NOW } from '../helpers/fixtures.js';
import { FakeSqlClient } from '../helpers/fake-sql.js';

const row = (id: string, overrides: Record<string, unknown> = {}) => ({
  id,
  timestamp: '2026-03-10T11:00:00.000Z',
  session_id: 's1',
  user_id: null,
  kind: 'client_request',
  text_in: 'hello',
  text_out: null,
  status: 'success',
  metadata: { source: 'cli' },
  ...overrides
});

describe('PgInteractionStore', () => {
  test('recent reads newest first and returns ascending ids', async () => {
    const client = new FakeSqlClient().respond({ rows: [row('3'), row('2')] });
    const store = new PgInteractionStore(client);
    const since = new Date('2026-03-03T12:00:00.000Z');

    const rows = await store.recent({ limit: 10, since });

    expect(rows.map(r => r.id)).toEqual([2, 3]);
    expect(rows[0].timestamp).toEqual(new Date('2026-03-10T11:00:00.000Z'));
    expect(client.queries[0].text).toContain('WHERE (timestamp >= $1 OR timestamp IS NULL) ORDER BY id DESC LIMIT $2');
    expect(client.queries[0].params).toEqual([since, 10]);
  });

  test('recent without a lower bound', async () => {
    const client = new FakeSqlClient().respond({ rows: [] });
    await new PgInteractionStore(client).recent({ limit: 5 });
    expect(client.queries[0].text).toContain('FROM interactions ORDER BY id DESC LIMIT $1');
    expect(client.queries[0].params).toEqual([5]);
  });

  test('recent filters by session and kind', async () => {
    const client = new FakeSqlClient().respond({ rows: [row('6', { kind: 'agent_response' })] });
    const rows = await new PgInteractionStore(client).recent({ limit: 5, sessionId: 's1', kind: 'agent_response' });

    expect(rows.map(r => r.kind)).toEqual(['agent_response']);
    expect(client.queries[0].text).toContain('FROM interactions WHERE session_id = $1 AND kind = $2 ORDER BY id DESC LIMIT $3');
    expect(client.queries[0].params).toEqual(['s1', 'agent_response', 5]);
  });

  test('unknown kinds and statuses are normalized', async () => {
    const client = new FakeSqlClient().respond({
      rows: [row('7', { kind: 'telemetry', status: 'weird', metadata: null, timestamp: 'garbage' })]
    });
    const [interaction] = await new PgInteractionStore(client).bySession('s1');

    expect(interaction.kind).toBe('other');
    expect(interaction.status).toBe('pending');
    expect(interaction.metadata).toEqual({});
    expect(Number.isNaN(interaction.timestamp?.getTime())).toBe(true);
    expect(client.queries[0].params).toEqual(['s1', 50]);
  });

  test('lenient columns are coerced instead of failing the read', async () => {
    const client = new FakeSqlClient().respond({
      rows: [row('5', { metadata: [], timestamp: Infinity }), row('4')]
    });
    const [plain, coerced] = await new PgInteractionStore(client).recent({ limit: 10 });

    expect(plain.id).toBe(4);
    expect(coerced.id).toBe(5);
    expect(coerced.metadata).toEqual({});
    expect(Number.isNaN(coerced.timestamp?.getTime())).toBe(true);
  });

  test('unreadable rows are skipped and reported by id', async () => {
    const client = new FakeSqlClient().respond({
      rows: [row('9', { text_in: 42 }), row('8'), row('abc')]
    });
    const reported: string[] = [];
    const rows = await new PgInteractionStore(client).recent({ limit: 10, onMalformedRow: id => reported.push(id) });

    expect(rows.map(r => r.id)).toEqual([8]);
    expect(reported).toEqual(['9', 'abc']);
  });

  test('append serializes metadata and returns the stored row', async () => {
    const client = new FakeSqlClient().respond({ rows: [row('11')] });
    const stored = await new PgInteractionStore(client).append({
      session_id: 's1',
      user_id: null,
      kind: 'client_request',
      text_in: 'hello',
      text_out: null,
      status: 'success',
      metadata: { source: 'cli' }
    });

    expect(stored.id).toBe(11);
    expect(client.queries[0].params).toEqual([null, 's1', null, 'client_request', 'hello', null, 'success', '{"source":"cli"}']);
  });

  test('an insert without a returned row is a store failure', async () => {
    const client = new FakeSqlClient().respond({ rows: [] });
    await expect(new PgInteractionStore(client).append({
      session_id: null, user_id: null, kind: 'other', text_in: 'x', text_out: null, status: 'success', metadata: {}
    })).rejects.toThrow('Insert returned no row');
  });

  test('driver errors become StoreUnavailableError', async () => {
    const client = new FakeSqlClient().respond(new Error('connect ECONNREFUSED'));
    const attempt = new PgInteractionStore(client).recent({ limit: 10 });
    await expect(attempt).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(attempt).rejects.toThrow('Interaction store recent failed: connect ECONNREFUSED');
  });

  test('health check and close', async () => {
    const client = new FakeSqlClient().respond({ rows: [{ ok: 1 }] }, new Error('down'));
    const store = new PgInteractionStore(client);

    await expect(store.healthCheck()).resolves.toBe(true);
    await expect(store.healthCheck()).resolves.toBe(false);
    expect(client.queries[0].text).toBe('SELECT 1 AS ok');

    await store.close();
    expect(client.ended).toBe(true);
  });
});

describe('PgPreferenceStore', () => {
  const pref = { user_id: 'u1', key: 'editor', value: 'vim', updated_at: NOW };

  test('list, set and remove', async () => {
    const client = new FakeSqlClient().respond(
      { rows: [pref] },
      { rows: [{ ...pref, updated_at: NOW.toISOString() }] },
      { rows: [{ key: 'editor' }] },
      { rows: [] }
    );
    const store = new PgPreferenceStore(client);

    await expect(store.list('u1')).resolves.toEqual([pref]);
    await expect(store.set('u1', 'editor', 'vim')).resolves.toEqual(pref);
    await expect(store.remove('u1', 'editor')).resolves.toBe(true);
    await expect(store.remove('u1', 'editor')).resolves.toBe(false);

    expect(client.queries[1].text).toContain('ON CONFLICT (user_id, key) DO UPDATE');
    expect(client.queries[1].params).toEqual(['u1', 'editor', 'vim']);
  });

  test('driver errors become StoreUnavailableError', async () => {
    const client = new FakeSqlClient().respond(new Error('timeout'));
    await expect(new PgPreferenceStore(client).list('u1')).rejects.toThrow('Preference store list failed: timeout');
  });
});

describe('schema', () => {
  test('ensureSchema applies the DDL', async () => {
    const client = new FakeSqlClient();
    await ensureSchema(client);
    expect(client.queries).toEqual([{ text: INTERACTIONS_SCHEMA_SQL, params: [] }]);
  });

  test('pgHealthCheck rejects unexpected rows', async () => {
    await expect(pgHealthCheck(new FakeSqlClient().respond({ rows: [{ ok: 0 }] }))).resolves.toBe(false);
  });
});
