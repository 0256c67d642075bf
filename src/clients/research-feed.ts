/**
 * arXiv research feed client
 * Queries the Atom API, parses entries and keeps papers from the last few years.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { MemorySink } from '../aggregator/memory.js';
import { toError } from '../errors.js';
import { buildUrl, DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from './http.js';

export const ARXIV_ENDPOINT = 'http://export.arxiv.org/api/query';
export const FEED_MAX_RESULTS = 10;
export const RECENCY_YEARS = 5;

export interface ResearchPaper {
    title: string;
    summary: string;
    year: number;
    /** Timestamp exactly as the feed sent it. */
    published: string;
    link: string;
    /** Parsed publication time, or the epoch when `published` did not parse. */
    parsed_date: Date;
}

// Atom text nodes come back as a string, or as an object when the element carries attributes
const FeedTextSchema = z.union([
    z.string(),
    z.object({ '#text': z.string().optional() }).transform(node => node['#text'] ?? ''),
]);

const FeedLinkSchema = z.object({
    '@_href': z.string().optional(),
    '@_rel': z.string().optional(),
    '@_type': z.string().optional(),
});

const FeedEntrySchema = z.object({
    title: FeedTextSchema.optional(),
    summary: FeedTextSchema.optional(),
    published: FeedTextSchema.optional(),
    link: z.array(FeedLinkSchema).optional(),
});

// Entries are checked one by one so a single bad record does not sink the batch
const FeedDocumentSchema = z.object({
    feed: z.object({
        entry: z.array(z.unknown()).optional(),
    }),
});

export type FeedEntry = z.infer<typeof FeedEntrySchema>;

const FEED_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Parse `YYYY-MM-DDThh:mm:ssZ` as UTC. Anything else, including
 * out-of-range components such as month 13, yields null.
 */
export function parseFeedTimestamp(text: string): Date | null {
    const match = FEED_TIMESTAMP.exec(text);
    if (!match) return null;

    const [year, month, day, hour, minute, second] = match.slice(1).map(Number);

    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    const roundTrips =
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month - 1 &&
        date.getUTCDate() === day &&
        date.getUTCHours() === hour &&
        date.getUTCMinutes() === minute &&
        date.getUTCSeconds() === second;

    return roundTrips ? date : null;
}

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

function pickLink(links: FeedEntry['link']): string {
    if (!links) return '';
    const alternate = links.find(l => l['@_rel'] === 'alternate' && l['@_href']);
    const first = links.find(l => l['@_href']);
    return alternate?.['@_href'] ?? first?.['@_href'] ?? '';
}

export interface ResearchFeedClientOptions {
    retry?: RetryPolicy;
    endpoint?: string;
    maxResults?: number;
    recencyYears?: number;
    now?: () => Date;
    sink?: MemorySink;
}

export class ResearchFeedClient {
    private retry: RetryPolicy;
    private endpoint: string;
    private maxResults: number;
    private recencyYears: number;
    private now: () => Date;
    private sink?: MemorySink;
    private parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '@_',
        parseTagValue: false,
        isArray: (_name: string, jpath: string) => jpath === 'feed.entry' || jpath === 'feed.entry.link',
    });

    constructor(options: ResearchFeedClientOptions = {}) {
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.endpoint = options.endpoint ?? ARXIV_ENDPOINT;
        this.maxResults = options.maxResults ?? FEED_MAX_RESULTS;
        this.recencyYears = options.recencyYears ?? RECENCY_YEARS;
        this.now = options.now ?? (() => new Date());
        this.sink = options.sink;
    }

    /**
     * Newest papers matching the query, limited to the recency window.
     * Any failure yields an empty list.
     */
    async recentPapers(query: string): Promise<ResearchPaper[]> {
        this.sink?.logEvent('[ResearchFeed] Querying arXiv API for research papers.');

        const url = buildUrl(this.endpoint, {
            search_query: `all:${query}`,
            start: 0,
            max_results: this.maxResults,
            sortBy: 'submittedDate',
            sortOrder: 'descending',
        });

        const response = await fetchWithRetry(url, {}, this.retry, (attempt, reason) => {
            this.sink?.logEvent(`[ResearchFeed] arXiv API attempt ${attempt} failed with ${reason}`);
        });

        if (!response) {
            this.sink?.logEvent('[ResearchFeed] arXiv API request failed after retries');
            return [];
        }

        let xml: string;
        try {
            xml = await response.text();
        } catch (error) {
            this.sink?.logEvent(`[ResearchFeed] Could not read feed body: ${toError(error).message}`);
            return [];
        }

        return this.parseFeed(xml);
    }

    /**
     * Turn an Atom document into papers, dropping entries older than the threshold year
     */
    parseFeed(xml: string): ResearchPaper[] {
        let raw: unknown;
        try {
            raw = this.parser.parse(xml);
        } catch (error) {
            this.sink?.logEvent(`[ResearchFeed] Could not parse feed: ${toError(error).message}`);
            return [];
        }

        const result = FeedDocumentSchema.safeParse(raw);
        if (!result.success) {
            this.sink?.logEvent('[ResearchFeed] Response is not an Atom feed.');
            return [];
        }

        const thresholdYear = this.now().getUTCFullYear() - this.recencyYears;
        const papers: ResearchPaper[] = [];

        (result.data.feed.entry ?? []).forEach((raw, index) => {
            const entry = FeedEntrySchema.safeParse(raw);
            if (!entry.success) {
                this.sink?.logEvent(`[ResearchFeed] Skipping malformed entry ${index + 1}`);
                return;
            }
            const paper = this.toPaper(entry.data);
            if (paper.year >= thresholdYear) papers.push(paper);
        });

        return papers;
    }

    private toPaper(entry: FeedEntry): ResearchPaper {
        const published = entry.published ?? '';
        const parsedDate = parseFeedTimestamp(published);

        if (!parsedDate) {
            this.sink?.logEvent(`[ResearchFeed] Error parsing published date '${published}'`);
        }

        return {
            title: collapseWhitespace(entry.title ?? 'No Title'),
            summary: collapseWhitespace(entry.summary ?? 'No summary available.'),
            year: parsedDate ? parsedDate.getUTCFullYear() : 0,
            published,
            link: pickLink(entry.link),
            parsed_date: parsedDate ?? new Date(0),
        };
    }
}
