import type { CompositeResult } from './types.js';

/**
 * Process-lifetime cache keyed by exact query text. No eviction, no expiry.
 */
export class ResultCache {
    private entries = new Map<string, CompositeResult>();

    get(query: string): CompositeResult | undefined {
        return this.entries.get(query);
    }

    has(query: string): boolean {
        return this.entries.has(query);
    }

    /**
     * Store a frozen copy so cached results cannot change after the fact.
     */
    set(query: string, result: CompositeResult): CompositeResult {
        const frozen: CompositeResult = Object.freeze({
            summary: result.summary,
            recent_advancements: Object.freeze(result.recent_advancements.map(paper => Object.freeze({ ...paper }))),
        });
        this.entries.set(query, frozen);
        return frozen;
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}
