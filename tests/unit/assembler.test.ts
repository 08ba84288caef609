import {
  CONTEXT_FOOTER,
  CONTEXT_HEADER,
  FIXED_OVERHEAD,
  assemble,
  renderContextBlock,
  renderPrompt
} from '../../src/services/context/assembler.js';
import type { AssembleInput } from '../../src/services/context/types.js';
import { EMPTY_PROFILE } from '../../src/services/profile/project-profile.js';
import type { ContextCategory, InteractionKind } from '../../src/types/index.js';
import { hoursAgo, makeInteraction } from '../helpers/fixtures.js';
import { ranked } from '../helpers/ranking.js';

const ERROR_SECTION = '## Error context\n- User request [error]: build failed';
const RECENT_ONE = '## Recent actions\n- User request [error]: build failed';
const RECENT_TWO = `${RECENT_ONE}\n- Agent response: try again`;

function input(budgetChars: number, categories: ContextCategory[] = ['error_context', 'recent_actions']): AssembleInput {
  return {
    message: 'why did the build fail',
    categories,
    candidates: [
      ranked(makeInteraction({ id: 1, kind: 'client_request', status: 'error', text_in: 'build failed' }), 2, ['debugging']),
      ranked(makeInteraction({ id: 2, kind: 'agent_response', text_out: 'try again' }), 1.5)
    ],
    profile: EMPTY_PROFILE,
    preferences: [],
    budgetChars
  };
}

describe('assemble', () => {
  test('sections render in category order when the budget is generous', () => {
    const result = assemble(input(1000));
    expect(result.entries).toEqual([
      { source_kind: 'error_context', rendered_text: ERROR_SECTION, weight: 2 },
      { source_kind: 'recent_actions', rendered_text: RECENT_TWO, weight: 2 }
    ]);
    expect(result.usedChars).toBe(ERROR_SECTION.length + 2 + RECENT_TWO.length);
    expect(result.usedChars).toBe(137);
    expect(result.confidence).toBe(1);
  });

  test('a section shrinks to the largest prefix that fits', () => {
    const result = assemble(input(109));
    expect(result.entries.map(entry => entry.rendered_text)).toEqual([ERROR_SECTION, RECENT_ONE]);
    expect(result.usedChars).toBe(109);
  });

  test('a section that cannot fit one item is skipped', () => {
    const result = assemble(input(60));
    expect(result.entries.map(entry => entry.source_kind)).toEqual(['error_context']);
    expect(result.confidence).toBe(0.5);
  });

  test('a later, smaller section may still fit after a skipped one', () => {
    const result = assemble(input(53, ['recent_actions', 'error_context']));
    expect(result.entries.map(entry => entry.rendered_text)).toEqual([ERROR_SECTION]);
    expect(result.usedChars).toBe(53);
  });

  test('nothing fits a tiny budget', () => {
    expect(assemble(input(52))).toEqual({ entries: [], usedChars: 0, confidence: 0 });
  });

  test('duplicate categories count once', () => {
    const result = assemble(input(1000, ['recent_actions', 'recent_actions']));
    expect(result.entries).toHaveLength(1);
    expect(result.confidence).toBe(1);
  });

  test('no categories means zero confidence', () => {
    expect(assemble(input(1000, [])).confidence).toBe(0);
  });

  test('categories without material are not covered', () => {
    const result = assemble(input(1000, ['recent_actions', 'user_preferences', 'tech_stack']));
    expect(result.entries.map(entry => entry.source_kind)).toEqual(['recent_actions']);
    expect(result.confidence).toBe(0.33);
  });

  test('stays within budget for large candidate sets', () => {
    const kinds: InteractionKind[] = ['client_request', 'agent_response', 'conversation_turn', 'other'];
    const candidates = Array.from({ length: 5000 }, (_, i) => ranked(makeInteraction({
      id: i + 1,
      kind: kinds[i % kinds.length],
      status: i % 7 === 0 ? 'error' : 'success',
      timestamp: hoursAgo(i / 100),
      text_in: `request ${i} about docker deploy and redis ${'detail '.repeat(i % 40)}`,
      text_out: `response ${i}`
    }), 5000 - i, i % 3 === 0 ? ['debugging'] : ['deployment']));

    for (const budgetChars of [0, 1, 40, 120, 500, 2000, 10000]) {
      const result = assemble({
        message: 'deploy fails',
        categories: ['error_context', 'recent_actions', 'tech_stack', 'conversation_history'],
        candidates,
        profile: EMPTY_PROFILE,
        preferences: [],
        budgetChars
      });
      const joined = result.entries.map(entry => entry.rendered_text).join('\n\n');
      expect(joined.length).toBe(result.usedChars);
      expect(result.usedChars).toBeLessThanOrEqual(budgetChars);
    }
  });

  test('is deterministic', () => {
    expect(assemble(input(109))).toEqual(assemble(input(109)));
  });
});

describe('rendering', () => {
  test('context block wraps entries between header and footer', () => {
    const { entries } = assemble(input(1000));
    expect(renderContextBlock(entries)).toBe(`${CONTEXT_HEADER}\n${ERROR_SECTION}\n\n${RECENT_TWO}\n${CONTEXT_FOOTER}`);
    expect(renderContextBlock(entries).length).toBe(FIXED_OVERHEAD + 137);
  });

  test('an empty entry list renders nothing', () => {
    expect(renderContextBlock([])).toBe('');
    expect(renderPrompt([], 'hello')).toBe('USER MESSAGE:\nhello');
  });

  test('prompt puts the context before the message', () => {
    const { entries } = assemble(input(60));
    expect(renderPrompt(entries, 'why?')).toBe(`=== CONTEXT ===\n${ERROR_SECTION}\n=== END CONTEXT ===\n\nUSER MESSAGE:\nwhy?`);
  });
});
