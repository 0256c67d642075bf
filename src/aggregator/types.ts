import type { ResearchPaper } from '../clients/research-feed.js';

export type { ResearchPaper };

/**
 * Combined output for one query. Field names match the stored `external_data` artifact.
 */
export interface CompositeResult {
    readonly summary: string;
    readonly recent_advancements: readonly ResearchPaper[];
}
