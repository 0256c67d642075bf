/**
 * Readers for skyfetch's environment settings.
 * An unset, blank or unparseable value falls back to the caller's default.
 */

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

/** Switches such as VERBOSE */
export function readFlag(raw: string | undefined, fallback: boolean): boolean {
    const value = raw?.trim().toLowerCase();
    if (!value) return fallback;
    return TRUTHY.has(value);
}

/** Credentials such as GOOGLE_API_KEY, without surrounding whitespace */
export function readText(raw: string | undefined, fallback: string): string {
    const value = raw?.trim();
    return value ? value : fallback;
}

/**
 * Whole numbers with a floor: MAX_RETRIES needs at least 1,
 * RETRY_DELAY_MS may be 0.
 */
export function readInt(raw: string | undefined, fallback: number, min: number): number {
    const value = raw?.trim();
    if (!value) return fallback;
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}
