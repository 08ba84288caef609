/**
 * CLI Output Utility
 * Uses process.stdout/stderr directly to avoid console.* linting restrictions
 */

import type { ContextResponse, DebugResponse, HistoryResponse } from './api-client.js';

export function writeStdout(message: string): void {
    process.stdout.write(message + '\n');
}

export function writeStderr(message: string): void {
    process.stderr.write(message + '\n');
}

export function writeError(message: string): void {
    writeStderr(`Error: ${message}`);
}

export function writeJson(data: unknown): void {
    writeStdout(JSON.stringify(data, null, 2));
}

export function formatContext(response: ContextResponse): string {
    const meta = response.payload.metadata;
    const lines = [
        response.prompt,
        '',
        `# intent=${meta.primary_intent} urgency=${meta.urgency} complexity=${meta.complexity} confidence=${meta.confidence}`,
        `# used ${meta.used_chars}/${meta.budget_chars} chars, ${meta.candidate_count} candidates, semantic=${meta.semantic_status} (${meta.search_mode})`
    ];
    if (meta.degradations.length > 0) lines.push(`# degradations: ${meta.degradations.join(', ')}`);
    return lines.join('\n');
}

export function formatDebug(response: DebugResponse, top = 10): string {
    const lines = [
        `intent: ${response.intent.primary_intent} (urgency ${response.intent.urgency}, complexity ${response.intent.complexity})`,
        `keywords: ${response.intent.matched_keywords.join(', ') || '-'}`,
        `active branches: ${response.active_branches.join(', ') || '-'}`,
        `semantic: ${response.semantic_status} (${response.search_mode}), ${response.semantic_matches.length} match(es)`,
        ''
    ];
    for (const entry of response.scores.slice(0, top)) {
        const topics = entry.topics.length > 0 ? entry.topics.join('+') : 'uncategorized';
        lines.push(`#${entry.interaction_id} ${entry.kind} weight=${entry.weight.toFixed(3)} score=${entry.score.toFixed(3)} [${topics}]`);
    }
    if (response.scores.length === 0) lines.push('no candidates');
    return lines.join('\n');
}

export function formatHistory(response: HistoryResponse): string {
    if (response.interactions.length === 0) return 'no interactions';
    return response.interactions
        .map(item => {
            const text = (item.text_in ?? item.text_out ?? '').replace(/\s+/g, ' ').slice(0, 80);
            return `#${item.id} ${item.timestamp ?? '-'} ${item.kind}${item.status === 'error' ? ' [error]' : ''}: ${text}`;
        })
        .join('\n');
}
