import request from 'supertest';
import { createServices, type AppServices } from '../../src/bootstrap.js';
import { createHttpApp } from '../../src/http/http-server.js';
import type { HealthRouteOptions } from '../../src/http/http-health-routes.js';
import { createServer } from '../../src/server.js';
import { InMemoryInteractionStore } from '../../src/services/store/memory-interaction-store.js';
import { InMemoryPreferenceStore } from '../../src/services/store/memory-preference-store.js';
import type { Interaction } from '../../src/types/index.js';
import { NOW, hoursAgo, makeInteraction } from '../helpers/fixtures.js';

class UnreachableStore extends InMemoryInteractionStore {
  override async healthCheck(): Promise<boolean> {
    return false;
  }
}

class StalledStore extends InMemoryInteractionStore {
  override healthCheck(): Promise<boolean> {
    return new Promise(() => undefined);
  }
}

function seed(): Interaction[] {
  return [
    makeInteraction({ id: 1, kind: 'client_request', session_id: 's1', timestamp: hoursAgo(1), text_in: 'deploy with docker' }),
    makeInteraction({ id: 2, kind: 'agent_response', session_id: 's1', timestamp: hoursAgo(0.5), text_out: 'deployed' }),
    makeInteraction({ id: 3, kind: 'client_request', session_id: 's2', timestamp: hoursAgo(0.2), text_in: 'write docs' })
  ];
}

async function buildApp(interactions = new InMemoryInteractionStore(seed()), options: HealthRouteOptions = {}) {
  const services: AppServices = await createServices({
    interactions,
    preferences: new InMemoryPreferenceStore(() => NOW),
    embedding: null,
    engine: { clock: () => NOW }
  });
  return createHttpApp(services, () => createServer(services), { timeoutMs: 50, ...options });
}

describe('HTTP health and info routes', () => {
  test('GET /health reports a healthy lexical-only service', async () => {
    const app = await buildApp();
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'healthy',
      service: 'context-intelligence',
      dependencies: { store: 'healthy', embedding: 'healthy' },
      details: {
        store: 'memory store reachable',
        embedding: 'Semantic narrowing disabled (lexical only)',
        semantic: 'lexical',
        search_mode: 'brute_force',
        index_size: 0,
        provider: 'none'
      }
    });
  });

  test('GET /health returns 503 when the store is unreachable', async () => {
    const app = await buildApp(new UnreachableStore());
    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('unhealthy');
    expect(res.body.details.store).toBe('memory store unreachable');
  });

  test('a stalled store health check times out', async () => {
    const app = await buildApp(new StalledStore(), { timeoutMs: 20 });
    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body.details.store).toBe('Store health check timed out');
  });

  test('GET /metrics serves the Prometheus registry', async () => {
    const app = await buildApp();
    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.text).toContain('ctxi_http_requests_total');
  });

  test('GET /metrics is 404 when metrics are disabled', async () => {
    const app = await buildApp(undefined, { metricsEnabled: false });
    const res = await request(app).get('/metrics');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'NOT_FOUND', message: 'Metrics are disabled' });
  });

  test('GET / lists the endpoints', async () => {
    const app = await buildApp();
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body.service).toBe('context-intelligence');
    expect(res.body.endpoints.context).toBe('POST /api/context');
  });
});

describe('HTTP context routes', () => {
  test('POST /api/context returns the payload and prompt', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/context').send({ message: 'hello there', budget_chars: 500 });

    expect(res.status).toBe(200);
    expect(res.body.prompt).toBe('USER MESSAGE:\nhello there');
    expect(res.body.payload).toMatchObject({
      entries: [],
      metadata: { primary_intent: 'general', budget_chars: 500, store_status: 'ok' }
    });
    expect(res.body.duration_ms).toEqual(expect.any(Number));
  });

  test('schema violations are 400 INPUT_ERROR with issue paths', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/context').send({ message: 'hello', budget_chars: 0 });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('INPUT_ERROR');
    expect(res.body.message).toBe('Request validation failed');
    expect(res.body.details.issues[0].path).toBe('budget_chars');
  });

  test('engine input errors keep their message and details', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/context').send({ message: 'hello', budget_chars: 100, session_id: 'bad id' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'INPUT_ERROR',
      message: 'session_id must match ^[A-Za-z0-9._:-]{1,128}$',
      details: { session_id: 'bad id' }
    });
  });

  test('malformed JSON is rejected', async () => {
    const app = await buildApp();
    const res = await request(app)
      .post('/api/context')
      .set('Content-Type', 'application/json')
      .send('{"message": ');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'INPUT_ERROR', message: 'Malformed JSON body' });
  });

  test('POST /api/relevance-debug returns branches with ISO dates', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/relevance-debug').send({ message: 'deploy it', session_id: 's1' });

    expect(res.status).toBe(200);
    expect(res.body.store_status).toBe('ok');
    expect(res.body.branches[0]).toEqual({
      label: 'deployment',
      member_interaction_ids: [1, 2],
      is_active: true,
      aggregate_score: expect.any(Number),
      latest_member_at: hoursAgo(0.5).toISOString()
    });
  });
});

describe('HTTP interaction routes', () => {
  test('GET /api/interactions lists recent interactions', async () => {
    const app = await buildApp();
    const res = await request(app).get('/api/interactions');

    expect(res.status).toBe(200);
    expect(res.body.session_id).toBeNull();
    expect(res.body.count).toBe(3);
    expect(res.body.interactions.map((row: { id: number }) => row.id)).toEqual([1, 2, 3]);
  });

  test('GET /api/interactions filters by session and limit', async () => {
    const app = await buildApp();
    const res = await request(app).get('/api/interactions').query({ session_id: 's1', limit: 1 });

    expect(res.status).toBe(200);
    expect(res.body.session_id).toBe('s1');
    expect(res.body.interactions).toEqual([
      expect.objectContaining({ id: 2, kind: 'agent_response', text_out: 'deployed', timestamp: hoursAgo(0.5).toISOString() })
    ]);
  });

  test('GET /api/interactions filters by kind', async () => {
    const app = await buildApp();
    const res = await request(app).get('/api/interactions').query({ kind: 'agent_response' });

    expect(res.status).toBe(200);
    expect(res.body.kind).toBe('agent_response');
    expect(res.body.interactions.map((row: { id: number }) => row.id)).toEqual([2]);

    const bySession = await request(app).get('/api/interactions').query({ session_id: 's1', kind: 'client_request' });
    expect(bySession.body.interactions.map((row: { id: number }) => row.id)).toEqual([1]);
  });

  test('GET /api/interactions rejects a malformed session id or kind', async () => {
    const app = await buildApp();

    const badSession = await request(app).get('/api/interactions').query({ session_id: 'bad id' });
    expect(badSession.status).toBe(400);
    expect(badSession.body.error).toBe('INPUT_ERROR');
    expect(badSession.body.details.issues[0].path).toBe('session_id');

    const badKind = await request(app).get('/api/interactions').query({ kind: 'telemetry' });
    expect(badKind.status).toBe(400);
    expect(badKind.body.details.issues[0].path).toBe('kind');
  });

  test('POST /api/interactions appends and the row is visible', async () => {
    const app = await buildApp();
    const created = await request(app)
      .post('/api/interactions')
      .send({ kind: 'client_request', text_in: 'run the tests', session_id: 's3' });

    expect(created.status).toBe(201);
    expect(created.body.interaction).toMatchObject({
      id: 4,
      kind: 'client_request',
      text_in: 'run the tests',
      text_out: null,
      session_id: 's3',
      status: 'success',
      metadata: {}
    });

    const listed = await request(app).get('/api/interactions').query({ session_id: 's3' });
    expect(listed.body.count).toBe(1);
  });

  test('POST /api/interactions requires some text', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/interactions').send({ kind: 'other' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'INPUT_ERROR', message: 'text_in or text_out is required' });
  });

  test('GET /api/sessions/:id/summary summarizes the session', async () => {
    const app = await buildApp();
    const res = await request(app).get('/api/sessions/s1/summary');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      session_id: 's1',
      total: 2,
      first_at: hoursAgo(1).toISOString(),
      last_at: hoursAgo(0.5).toISOString(),
      text: '2 interaction(s). Top topics: deployment.\nRecent actions: Agent response: deployed | User request: deploy with docker'
    });
  });

  test('a malformed session id is rejected', async () => {
    const app = await buildApp();
    const res = await request(app).get('/api/sessions/bad%20id/summary');

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('session id must match ^[A-Za-z0-9._:-]{1,128}$');
  });

  test('unknown routes are 404 NOT_FOUND', async () => {
    const app = await buildApp();
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'NOT_FOUND', message: 'No route for GET /nope' });
  });
});
