import type { ContextEntry } from '../../types/index.js';
import { SECTION_ITEM_LIMIT } from '../../config.js';
import { buildSectionItems, renderSection } from './sections.js';
import type { AssembleInput, AssembledContext } from './types.js';

export const CONTEXT_HEADER = '=== CONTEXT ===';
export const CONTEXT_FOOTER = '=== END CONTEXT ===';
export const ENTRY_SEPARATOR = '\n\n';
/** Header and footer plus the newline after the header and before the footer */
export const FIXED_OVERHEAD = CONTEXT_HEADER.length + CONTEXT_FOOTER.length + 2;

/**
 * Build the bounded entry list. Sections are atomic: for each category, in
 * order, the largest prefix of its items whose rendered section still fits the
 * remaining budget is appended; a section that does not fit even with one item
 * is skipped and the next category is tried. Separators count against the
 * budget, so the joined entries never exceed `budgetChars`.
 */
export function assemble(input: AssembleInput): AssembledContext {
    const limit = input.sectionItemLimit ?? SECTION_ITEM_LIMIT;
    const entries: ContextEntry[] = [];
    let used = 0;
    const seen = new Set<string>();

    for (const category of input.categories) {
        if (seen.has(category)) continue;
        seen.add(category);

        const items = buildSectionItems(category, {
            candidates: input.candidates,
            profile: input.profile,
            preferences: input.preferences,
            sessionId: input.sessionId,
            limit
        });
        if (items.length === 0) continue;

        const separator = entries.length > 0 ? ENTRY_SEPARATOR.length : 0;
        for (let n = items.length; n >= 1; n--) {
            const included = items.slice(0, n);
            const rendered = renderSection(category, included);
            if (used + separator + rendered.length > input.budgetChars) continue;
            entries.push({
                source_kind: category,
                rendered_text: rendered,
                weight: Math.max(...included.map(item => item.weight))
            });
            used += separator + rendered.length;
            break;
        }
    }

    const requested = seen.size;
    const covered = new Set(entries.map(entry => entry.source_kind)).size;
    const confidence = requested === 0 ? 0 : Math.round((covered / requested) * 100) / 100;

    return { entries, usedChars: used, confidence };
}

/** Header, entries joined by blank lines, footer. Empty string when there are no entries. */
export function renderContextBlock(entries: readonly ContextEntry[]): string {
    if (entries.length === 0) return '';
    return `${CONTEXT_HEADER}\n${entries.map(entry => entry.rendered_text).join(ENTRY_SEPARATOR)}\n${CONTEXT_FOOTER}`;
}

export function renderPrompt(entries: readonly ContextEntry[], message: string): string {
    const block = renderContextBlock(entries);
    const userMessage = `USER MESSAGE:\n${message}`;
    return block ? `${block}\n\n${userMessage}` : userMessage;
}
