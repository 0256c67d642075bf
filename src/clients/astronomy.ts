/**
 * NASA Astronomy Picture of the Day client
 */

import { z } from 'zod';
import type { MemorySink } from '../aggregator/memory.js';
import { toError } from '../errors.js';
import { buildUrl, DEFAULT_RETRY_POLICY, fetchWithRetry, type RetryPolicy } from './http.js';

export const NASA_APOD_ENDPOINT = 'https://api.nasa.gov/planetary/apod';

const ApodResponseSchema = z.object({
    title: z.string().optional(),
    explanation: z.string().optional(),
    url: z.string().optional(),
    hdurl: z.string().optional(),
    date: z.string().optional(),
});

export type ApodRecord = z.infer<typeof ApodResponseSchema>;

export interface AstronomyClientOptions {
    apiKey: string;
    retry?: RetryPolicy;
    endpoint?: string;
    sink?: MemorySink;
}

export function formatApod(record: ApodRecord): string {
    const title = record.title ?? 'No title provided.';
    const explanation = record.explanation ?? 'No explanation available.';
    return `NASA APOD\nTitle: ${title}\nExplanation: ${explanation}\n`;
}

export class AstronomyClient {
    private apiKey: string;
    private retry: RetryPolicy;
    private endpoint: string;
    private sink?: MemorySink;

    constructor(options: AstronomyClientOptions) {
        this.apiKey = options.apiKey;
        this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
        this.endpoint = options.endpoint ?? NASA_APOD_ENDPOINT;
        this.sink = options.sink;
    }

    exhaustedMessage(): string {
        return `Error: NASA API request failed after ${this.retry.attempts} attempts.`;
    }

    /**
     * Fetch today's picture record. The query only selects this source; it is not sent upstream.
     */
    async pictureOfTheDay(query: string): Promise<string> {
        this.sink?.logEvent(`[Astronomy] Querying NASA API (APOD) for '${query}'.`);

        const url = buildUrl(this.endpoint, {
            api_key: this.apiKey,
            hd: 'True',
        });

        const response = await fetchWithRetry(url, {}, this.retry, (attempt, reason) => {
            this.sink?.logEvent(`[Astronomy] NASA API attempt ${attempt} failed with ${reason}`);
        });

        if (!response) return this.exhaustedMessage();

        try {
            const record = ApodResponseSchema.parse(await response.json());
            return formatApod(record);
        } catch (error) {
            this.sink?.logEvent(`[Astronomy] Malformed APOD response: ${toError(error).message}`);
            return 'Error: NASA API returned a malformed response.';
        }
    }
}
