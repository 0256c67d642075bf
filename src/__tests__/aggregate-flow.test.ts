/**
 * Integration tests for the aggregation pipeline
 * Source behaviour is mocked at the client seam and at fetch
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExternalDataAggregator, createAggregator } from '../aggregator/orchestrator.js';
import { InMemorySink } from '../aggregator/memory.js';
import { ResultCache } from '../aggregator/cache.js';
import type { ResearchPaper } from '../aggregator/types.js';
import type { Config } from '../config.js';
import { QueryError } from '../errors.js';

const samplePaper: ResearchPaper = {
    title: 'Near-Earth Object Survey',
    summary: 'A census of small bodies.',
    year: 2025,
    published: '2025-07-07T07:07:07Z',
    link: 'https://arxiv.org/abs/2507.00007v1',
    parsed_date: new Date(Date.UTC(2025, 6, 7, 7, 7, 7)),
};

const createMockSources = () => ({
    webSearch: { search: vi.fn().mockResolvedValue('Title: Margherita\nLink: https://pizza.example\nSnippet: Classic.\n') },
    astronomy: { pictureOfTheDay: vi.fn().mockResolvedValue('NASA APOD\nTitle: Bennu\nExplanation: A rubble pile.\n') },
    researchFeed: { recentPapers: vi.fn().mockResolvedValue([samplePaper]) },
});

type MockSources = ReturnType<typeof createMockSources>;

describe('ExternalDataAggregator', () => {
    let sources: MockSources;
    let sink: InMemorySink;
    let aggregator: ExternalDataAggregator;

    beforeEach(() => {
        sources = createMockSources();
        sink = new InMemorySink();
        aggregator = new ExternalDataAggregator({ ...sources, sink });
    });

    describe('routing', () => {
        it('should use the astronomy source for space queries', async () => {
            const result = await aggregator.fetchExternalData('latest asteroid discovery');

            expect(sources.astronomy.pictureOfTheDay).toHaveBeenCalledTimes(1);
            expect(sources.astronomy.pictureOfTheDay).toHaveBeenCalledWith('latest asteroid discovery');
            expect(sources.webSearch.search).not.toHaveBeenCalled();
            expect(sources.researchFeed.recentPapers).toHaveBeenCalledWith('latest asteroid discovery');
            expect(result.summary).toBe('NASA APOD\nTitle: Bennu\nExplanation: A rubble pile.\n');
        });

        it('should use web search for everything else', async () => {
            const result = await aggregator.fetchExternalData('best pizza recipe');

            expect(sources.webSearch.search).toHaveBeenCalledTimes(1);
            expect(sources.astronomy.pictureOfTheDay).not.toHaveBeenCalled();
            expect(sources.researchFeed.recentPapers).toHaveBeenCalledTimes(1);
            expect(result.summary).toBe('Title: Margherita\nLink: https://pizza.example\nSnippet: Classic.\n');
        });

        it('should query the research feed after the summary source', async () => {
            const order: string[] = [];
            sources.webSearch.search.mockImplementation(async () => {
                order.push('summary');
                return 'text';
            });
            sources.researchFeed.recentPapers.mockImplementation(async () => {
                order.push('feed');
                return [];
            });

            await aggregator.fetchExternalData('best pizza recipe');

            expect(order).toEqual(['summary', 'feed']);
        });
    });

    describe('result', () => {
        it('should have exactly the summary and recent_advancements fields', async () => {
            const result = await aggregator.fetchExternalData('best pizza recipe');

            expect(Object.keys(result).sort()).toEqual(['recent_advancements', 'summary']);
            expect(result.recent_advancements).toEqual([samplePaper]);
        });

        it('should keep an empty paper list', async () => {
            sources.researchFeed.recentPapers.mockResolvedValueOnce([]);

            const result = await aggregator.fetchExternalData('best pizza recipe');

            expect(result.recent_advancements).toEqual([]);
        });

        it('should store the result and log progress in the sink', async () => {
            const result = await aggregator.fetchExternalData('best pizza recipe');

            expect(sink.getData('external_data')).toBe(result);
            expect(sink.events).toEqual([
                "[Aggregator] Processing external data for: 'best pizza recipe'",
                '[Aggregator] Found 1 advancements from arXiv.',
                '[Aggregator] Cached the new result.',
            ]);
        });

        it('should cache a degraded summary like any other', async () => {
            sources.webSearch.search.mockResolvedValueOnce('Error: Google Search API request failed after 2 attempts.');

            const first = await aggregator.fetchExternalData('best pizza recipe');
            const second = await aggregator.fetchExternalData('best pizza recipe');

            expect(first.summary).toBe('Error: Google Search API request failed after 2 attempts.');
            expect(second).toBe(first);
        });
    });

    describe('cache', () => {
        it('should answer a repeated query without calling any source', async () => {
            const first = await aggregator.fetchExternalData('latest asteroid discovery');
            const second = await aggregator.fetchExternalData('latest asteroid discovery');

            expect(second).toEqual(first);
            expect(sources.astronomy.pictureOfTheDay).toHaveBeenCalledTimes(1);
            expect(sources.researchFeed.recentPapers).toHaveBeenCalledTimes(1);
            expect(sources.webSearch.search).not.toHaveBeenCalled();
            expect(sink.events).toContain('[Aggregator] Cache hit! Returning cached data.');
            expect(sink.getData('external_data')).toBe(second);
        });

        it('should treat different query text as a different key', async () => {
            await aggregator.fetchExternalData('best pizza recipe');
            await aggregator.fetchExternalData('Best pizza recipe');

            expect(sources.webSearch.search).toHaveBeenCalledTimes(2);
            expect(aggregator.cache.size).toBe(2);
        });

        it('should not share cached results between instances', async () => {
            const other = new ExternalDataAggregator({ ...sources, sink });

            await aggregator.fetchExternalData('best pizza recipe');
            await other.fetchExternalData('best pizza recipe');

            expect(sources.webSearch.search).toHaveBeenCalledTimes(2);
        });

        it('should use a supplied cache', async () => {
            const cache = new ResultCache();
            cache.set('best pizza recipe', { summary: 'prefilled', recent_advancements: [] });
            const withCache = new ExternalDataAggregator({ ...sources, sink, cache });

            const result = await withCache.fetchExternalData('best pizza recipe');

            expect(result.summary).toBe('prefilled');
            expect(sources.webSearch.search).not.toHaveBeenCalled();
        });
    });

    describe('input', () => {
        it('should route a whitespace-only query like any other text', async () => {
            const result = await aggregator.fetchExternalData(' ');

            expect(sources.webSearch.search).toHaveBeenCalledWith(' ');
            expect(sources.researchFeed.recentPapers).toHaveBeenCalledWith(' ');
            expect(result.summary).toBe('Title: Margherita\nLink: https://pizza.example\nSnippet: Classic.\n');
        });

        it('should reject an empty query without calling any source', async () => {
            await expect(aggregator.fetchExternalData('')).rejects.toThrow(QueryError);

            expect(sources.webSearch.search).not.toHaveBeenCalled();
            expect(sources.researchFeed.recentPapers).not.toHaveBeenCalled();
            expect(aggregator.cache.size).toBe(0);
        });
    });
});

describe('createAggregator with HTTP clients', () => {
    const mockFetch = vi.fn();
    const year = new Date().getUTCFullYear();

    const config: Config = {
        googleApiKey: 'test-google-key',
        googleCx: 'test-cx',
        nasaApiKey: 'test-nasa-key',
        maxRetries: 2,
        retryDelayMs: 0,
        requestTimeoutMs: 1000,
        uiMode: 'plain',
        verbose: false,
    };

    const feedXml = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <title>Current</title>
    <summary>Now.</summary>
    <published>${year}-02-01T00:00:00Z</published>
    <link href="https://arxiv.org/abs/current" rel="alternate" type="text/html"/>
  </entry>
  <entry>
    <title>Five Years Back</title>
    <summary>Still in range.</summary>
    <published>${year - 5}-02-01T00:00:00Z</published>
  </entry>
  <entry>
    <title>Six Years Back</title>
    <summary>Out of range.</summary>
    <published>${year - 6}-02-01T00:00:00Z</published>
  </entry>
  <entry>
    <title>Undated</title>
    <summary>No usable date.</summary>
    <published>sometime</published>
  </entry>
</feed>`;

    beforeEach(() => {
        mockFetch.mockReset();
        mockFetch.mockImplementation(async (url: string) => {
            if (url.startsWith('http://export.arxiv.org/')) {
                return { ok: true, status: 200, text: () => Promise.resolve(feedXml) };
            }
            return { ok: false, status: 500 };
        });
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should combine a degraded summary with the filtered feed', async () => {
        const sink = new InMemorySink();
        const aggregator = createAggregator(config, sink);

        const result = await aggregator.fetchExternalData('best pizza recipe');

        expect(result.summary).toBe('Error: Google Search API request failed after 2 attempts.');
        expect(result.recent_advancements.map(p => p.title)).toEqual(['Current', 'Five Years Back']);
        expect(result.recent_advancements[0].link).toBe('https://arxiv.org/abs/current');
        expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should make no requests for a repeated query', async () => {
        const aggregator = createAggregator(config, new InMemorySink());

        const first = await aggregator.fetchExternalData('latest asteroid discovery');
        const callsAfterFirst = mockFetch.mock.calls.length;
        const second = await aggregator.fetchExternalData('latest asteroid discovery');

        expect(callsAfterFirst).toBe(3);
        expect(mockFetch).toHaveBeenCalledTimes(3);
        expect(second).toEqual(first);
        expect(first.summary).toBe('Error: NASA API request failed after 2 attempts.');
    });
});
