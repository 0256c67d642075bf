/**
 * Memory sink - receives event lines and named artifacts from the aggregator
 */

export type MemoryKey = 'external_data' | 'external_urls';

export interface MemorySink {
    logEvent(message: string): void;
    storeData(key: MemoryKey, value: unknown): void;
}

/**
 * Keeps every event and the latest value stored under each key.
 */
export class InMemorySink implements MemorySink {
    readonly events: string[] = [];
    private data = new Map<MemoryKey, unknown>();

    logEvent(message: string): void {
        this.events.push(message);
    }

    storeData(key: MemoryKey, value: unknown): void {
        this.data.set(key, value);
    }

    getData(key: MemoryKey): unknown {
        return this.data.get(key);
    }

    has(key: MemoryKey): boolean {
        return this.data.has(key);
    }
}

export type EventPrinter = (message: string) => void;

/**
 * In-memory sink that also echoes each event, used by the CLI in verbose mode.
 */
export class ConsoleSink extends InMemorySink {
    private print: EventPrinter;

    constructor(print: EventPrinter) {
        super();
        this.print = print;
    }

    override logEvent(message: string): void {
        super.logEvent(message);
        this.print(message);
    }
}
