/**
 * External data aggregator - cache check, source routing and result assembly
 */

import type { Config } from '../config.js';
import { QueryError } from '../errors.js';
import { AstronomyClient } from '../clients/astronomy.js';
import type { RetryPolicy } from '../clients/http.js';
import { ResearchFeedClient, type ResearchPaper } from '../clients/research-feed.js';
import { WebSearchClient } from '../clients/web-search.js';
import { ResultCache } from './cache.js';
import type { MemorySink } from './memory.js';
import { selectSummarySource, type SummarySource } from './router.js';
import type { CompositeResult } from './types.js';

// Structural seams so tests and embedders can swap in their own sources
export interface WebSearchSource {
    search(query: string): Promise<string>;
}

export interface AstronomySource {
    pictureOfTheDay(query: string): Promise<string>;
}

export interface ResearchSource {
    recentPapers(query: string): Promise<ResearchPaper[]>;
}

export interface AggregatorDeps {
    webSearch: WebSearchSource;
    astronomy: AstronomySource;
    researchFeed: ResearchSource;
    sink: MemorySink;
    cache?: ResultCache;
}

export class ExternalDataAggregator {
    private webSearch: WebSearchSource;
    private astronomy: AstronomySource;
    private researchFeed: ResearchSource;
    private sink: MemorySink;
    readonly cache: ResultCache;

    constructor(deps: AggregatorDeps) {
        this.webSearch = deps.webSearch;
        this.astronomy = deps.astronomy;
        this.researchFeed = deps.researchFeed;
        this.sink = deps.sink;
        this.cache = deps.cache ?? new ResultCache();
    }

    /**
     * Fetch the summary and recent papers for a query.
     * Identical query text is answered from the cache without touching any source.
     * Whitespace counts as text; only the empty string is rejected.
     */
    async fetchExternalData(query: string): Promise<CompositeResult> {
        if (query === '') {
            throw new QueryError('Query must not be empty', query);
        }

        this.sink.logEvent(`[Aggregator] Processing external data for: '${query}'`);

        const cached = this.cache.get(query);
        if (cached) {
            this.sink.logEvent('[Aggregator] Cache hit! Returning cached data.');
            this.sink.storeData('external_data', cached);
            return cached;
        }

        const source = selectSummarySource(query);
        const summary = await this.fetchSummary(source, query);

        const papers = await this.researchFeed.recentPapers(query);
        this.sink.logEvent(`[Aggregator] Found ${papers.length} advancements from arXiv.`);

        const result = this.cache.set(query, { summary, recent_advancements: papers });
        this.sink.logEvent('[Aggregator] Cached the new result.');
        this.sink.storeData('external_data', result);

        return result;
    }

    private fetchSummary(source: SummarySource, query: string): Promise<string> {
        switch (source) {
            case 'astronomy':
                return this.astronomy.pictureOfTheDay(query);
            case 'web':
                return this.webSearch.search(query);
        }
    }
}

export function retryPolicyFromConfig(config: Config): RetryPolicy {
    return {
        attempts: config.maxRetries,
        delayMs: config.retryDelayMs,
        timeoutMs: config.requestTimeoutMs,
    };
}

/**
 * Wire the real HTTP clients from configuration
 */
export function createAggregator(config: Config, sink: MemorySink): ExternalDataAggregator {
    const retry = retryPolicyFromConfig(config);

    return new ExternalDataAggregator({
        webSearch: new WebSearchClient({ apiKey: config.googleApiKey, cx: config.googleCx, retry, sink }),
        astronomy: new AstronomyClient({ apiKey: config.nasaApiKey, retry, sink }),
        researchFeed: new ResearchFeedClient({ retry, sink }),
        sink,
    });
}
