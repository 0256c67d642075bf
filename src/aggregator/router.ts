/**
 * Query routing - picks the summary source for a query
 */

export const SPACE_KEYWORDS = ['nasa', 'space', 'astronomy', 'planet', 'cosmos', 'asteroid', 'galaxy'] as const;

export type SummarySource = 'astronomy' | 'web';

export function isSpaceQuery(query: string): boolean {
    const normalized = query.toLowerCase();
    return SPACE_KEYWORDS.some(keyword => normalized.includes(keyword));
}

export function selectSummarySource(query: string): SummarySource {
    return isSpaceQuery(query) ? 'astronomy' : 'web';
}
