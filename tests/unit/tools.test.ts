import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ContextEngine } from '../../src/services/context/engine.js';
import { LexicalOnlyNarrower } from '../../src/services/semantic/narrower.js';
import { InMemoryInteractionStore } from '../../src/services/store/memory-interaction-store.js';
import { InMemoryPreferenceStore } from '../../src/services/store/memory-preference-store.js';
import type { InteractionStore } from '../../src/services/store/types.js';
import { handleGetContext } from '../../src/tools/get_context.js';
import { handleGetConversationSummary } from '../../src/tools/get_conversation_summary.js';
import { getInteractionHistoryInputShape, handleGetInteractionHistory } from '../../src/tools/get_interaction_history.js';
import { handleGetRelevanceDebug } from '../../src/tools/get_relevance_debug.js';
import { handleLogInteraction } from '../../src/tools/log_interaction.js';
import {
  handleAddUserPreference,
  handleListUserPreferences,
  handleRemoveUserPreference
} from '../../src/tools/user_preferences.js';
import { NOW, hoursAgo, makeInteraction } from '../helpers/fixtures.js';

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  if (!first || first.type !== 'text') throw new Error('expected text content');
  return first.text;
}

function setup() {
  const store = new InMemoryInteractionStore([
    makeInteraction({ id: 1, kind: 'client_request', session_id: 's1', timestamp: hoursAgo(1), text_in: 'deploy with docker' }),
    makeInteraction({ id: 2, kind: 'agent_response', session_id: 's1', timestamp: hoursAgo(0.5), text_out: 'deployed' }),
    makeInteraction({ id: 3, kind: 'client_request', session_id: 's2', timestamp: hoursAgo(0.2), text_in: 'write docs' })
  ]);
  const preferences = new InMemoryPreferenceStore(() => NOW);
  const engine = new ContextEngine({ store, preferences, narrower: new LexicalOnlyNarrower(), clock: () => NOW });
  return { store, preferences, engine };
}

describe('MCP tool handlers', () => {
  test('get_context returns the prompt as text and the payload as structured content', async () => {
    const { engine } = setup();
    const result = await handleGetContext(engine, { message: 'hello there', budget_chars: 500 });

    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe('USER MESSAGE:\nhello there');
    expect(result.structuredContent).toMatchObject({
      prompt: 'USER MESSAGE:\nhello there',
      payload: { entries: [], metadata: { primary_intent: 'general', budget_chars: 500 } }
    });
  });

  test('input errors come back as isError results with their code', async () => {
    const { engine } = setup();
    const result = await handleGetContext(engine, { message: 'hello', budget_chars: 0 });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({
      error: 'INPUT_ERROR',
      message: 'budget_chars must be a positive integer',
      details: { budget_chars: 0 }
    });
  });

  test('get_relevance_debug serializes branch dates', async () => {
    const { engine } = setup();
    const result = await handleGetRelevanceDebug(engine, { message: 'deploy it', session_id: 's1' });
    const body = JSON.parse(textOf(result));

    expect(body.store_status).toBe('ok');
    expect(body.branches[0]).toEqual({
      label: 'deployment',
      member_interaction_ids: [1, 2],
      is_active: true,
      aggregate_score: expect.any(Number),
      latest_member_at: hoursAgo(0.5).toISOString()
    });
  });

  test('log_interaction appends and validates', async () => {
    const { store } = setup();
    const ok = await handleLogInteraction(store, { kind: 'conversation_turn', text_in: 'hi', text_out: 'hello', session_id: 's1' });
    expect(ok.structuredContent).toMatchObject({
      interaction: { id: 4, kind: 'conversation_turn', session_id: 's1', status: 'success', metadata: {} }
    });
    expect(store.size).toBe(4);

    const missingText = await handleLogInteraction(store, { kind: 'client_request' });
    expect(JSON.parse(textOf(missingText))).toEqual({ error: 'INPUT_ERROR', message: 'text_in or text_out is required' });

    const badSession = await handleLogInteraction(store, { kind: 'client_request', text_in: 'x', session_id: 'a b' });
    expect(JSON.parse(textOf(badSession)).error).toBe('INPUT_ERROR');
    expect(store.size).toBe(4);
  });

  test('unexpected failures map to INTERNAL_ERROR', async () => {
    const { store } = setup();
    const broken: InteractionStore = {
      kind: 'memory',
      recent: query => store.recent(query),
      bySession: (id, limit) => store.bySession(id, limit),
      append: async () => {
        throw new Error('disk full');
      },
      healthCheck: async () => true,
      close: async () => undefined
    };
    const result = await handleLogInteraction(broken, { kind: 'other', text_in: 'x' });
    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({ error: 'INTERNAL_ERROR', message: 'disk full' });
  });

  test('get_interaction_history for a session and overall', async () => {
    const { store } = setup();

    const session = await handleGetInteractionHistory(store, { session_id: 's1' });
    expect(session.structuredContent).toMatchObject({ session_id: 's1', count: 2 });

    const overall = await handleGetInteractionHistory(store, { limit: 1 });
    expect(overall.structuredContent).toMatchObject({
      session_id: null,
      count: 1,
      interactions: [{ id: 3, timestamp: hoursAgo(0.2).toISOString(), text_in: 'write docs' }]
    });
  });

  test('get_interaction_history filters by kind', async () => {
    const { store } = setup();

    const responses = await handleGetInteractionHistory(store, { kind: 'agent_response' });
    expect(responses.structuredContent).toMatchObject({ session_id: null, kind: 'agent_response', count: 1, interactions: [{ id: 2 }] });

    const requests = await handleGetInteractionHistory(store, { session_id: 's1', kind: 'client_request' });
    expect(requests.structuredContent).toMatchObject({ session_id: 's1', kind: 'client_request', count: 1, interactions: [{ id: 1 }] });
  });

  test('get_interaction_history input checks the session id and kind', () => {
    const input = z.object(getInteractionHistoryInputShape);
    expect(input.safeParse({ session_id: 's1', kind: 'conversation_turn' }).success).toBe(true);
    expect(input.safeParse({ session_id: 'a b' }).success).toBe(false);
    expect(input.safeParse({ session_id: 's'.repeat(129) }).success).toBe(false);
    expect(input.safeParse({ kind: 'telemetry' }).success).toBe(false);
  });

  test('get_conversation_summary returns the summary text', async () => {
    const { store } = setup();
    const result = await handleGetConversationSummary(store, { session_id: 's1' });
    expect(textOf(result)).toBe(
      '2 interaction(s). Top topics: deployment.\nRecent actions: Agent response: deployed | User request: deploy with docker'
    );
    expect(result.structuredContent).toMatchObject({
      session_id: 's1',
      total: 2,
      first_at: hoursAgo(1).toISOString(),
      last_at: hoursAgo(0.5).toISOString()
    });
  });

  test('user preference tools', async () => {
    const { preferences } = setup();

    await handleAddUserPreference(preferences, { user_id: 'u1', key: 'language', value: 'typescript' });
    const listed = await handleListUserPreferences(preferences, { user_id: 'u1' });
    expect(listed.structuredContent).toEqual({
      user_id: 'u1',
      preferences: [{ user_id: 'u1', key: 'language', value: 'typescript', updated_at: NOW.toISOString() }]
    });

    const removed = await handleRemoveUserPreference(preferences, { user_id: 'u1', key: 'language' });
    expect(removed.structuredContent).toEqual({ user_id: 'u1', key: 'language', removed: true });
  });
});
