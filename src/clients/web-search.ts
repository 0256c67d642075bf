/**
 * Google Custom Search client
 * Returns the top results as displayable text; failures degrade to a labelled error string.
 */

import { z } from 'zod';
import type { MemorySink } from '../aggregator/memory.js';
import { toError } from '../errors.js';
import { buildUrl, DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from './http.js';

export const GOOGLE_SEARCH_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';
export const WEB_RESULT_COUNT = 5;
export const NO_WEB_RESULTS = 'No web results found.';

const SearchItemSchema = z.object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
});

const SearchResponseSchema = z.object({
    items: z.array(SearchItemSchema).optional(),
});

export type WebSearchItem = z.infer<typeof SearchItemSchema>;

export interface WebSearchClientOptions {
    apiKey: string;
    cx: string;
    retry?: RetryPolicy;
    endpoint?: string;
    sink?: MemorySink;
}

export function formatWebResults(items: WebSearchItem[]): string {
    return items
        .map(item => `Title: ${item.title ?? ''}\nLink: ${item.link ?? ''}\nSnippet: ${item.snippet ?? ''}\n`)
        .join('\n');
}

export class WebSearchClient {
    private apiKey: string;
    private cx: string;
    private retry: RetryPolicy;
    private endpoint: string;
    private sink?: MemorySink;

    constructor(options: WebSearchClientOptions) {
        this.apiKey = options.apiKey;
        this.cx = options.cx;
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.endpoint = options.endpoint ?? GOOGLE_SEARCH_ENDPOINT;
        this.sink = options.sink;
    }

    exhaustedMessage(): string {
        return `Error: Google Search API request failed after ${this.retry.attempts} attempts.`;
    }

    /**
     * Search the web and format up to five results as text blocks
     */
    async search(query: string): Promise<string> {
        this.sink?.logEvent('[WebSearch] Querying Google Custom Search API.');

        const url = buildUrl(this.endpoint, {
            q: query,
            key: this.apiKey,
            cx: this.cx,
            num: WEB_RESULT_COUNT,
        });

        const response = await fetchWithRetry(url, {}, this.retry, (attempt, reason) => {
            this.sink?.logEvent(`[WebSearch] Google API attempt ${attempt} failed with ${reason}`);
        });

        if (!response) return this.exhaustedMessage();

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            this.sink?.logEvent(`[WebSearch] Could not read response body: ${toError(error).message}`);
            return 'Error: Google Search API returned a malformed response.';
        }

        const parsed = SearchResponseSchema.safeParse(body);
        if (!parsed.success) {
            const errorMsg = parsed.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
            this.sink?.logEvent(`[WebSearch] Unexpected response shape: ${errorMsg}`);
            return 'Error: Google Search API returned a malformed response.';
        }

        const items = parsed.data.items;
        if (!items) return NO_WEB_RESULTS;

        const urls = items
            .map(item => item.link)
            .filter((link): link is string => typeof link === 'string');
        this.sink?.storeData('external_urls', urls);

        return formatWebResults(items);
    }
}
