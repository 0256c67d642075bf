/**
 * Configuration management for skyfetch
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { ConfigError } from './errors.js';
import { readFlag, readInt, readText } from './utils/env.js';

export type UiMode = 'minimal' | 'fancy' | 'plain';

/**
 * Centralized default values for the CLI configuration.
 * Unset credentials fall back to these placeholders instead of failing fast.
 */
export const DEFAULTS = {
    googleApiKey: 'YOUR_GOOGLE_API_KEY',
    googleCx: 'YOUR_GOOGLE_CX',
    nasaApiKey: 'YOUR_NASA_API_KEY',
    maxRetries: 2,
    retryDelayMs: 1000,
    requestTimeoutMs: 30_000,
    uiMode: 'minimal' as UiMode,
    verbose: false,
} as const;

export interface Config {
    googleApiKey: string;
    googleCx: string;
    nasaApiKey: string;
    maxRetries: number;
    retryDelayMs: number;
    requestTimeoutMs: number;
    uiMode: UiMode;
    verbose: boolean;
}

export function envUiMode(value: string | undefined): UiMode {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'fancy') return 'fancy';
    if (normalized === 'plain') return 'plain';
    if (normalized === 'minimal') return 'minimal';
    return DEFAULTS.uiMode;
}

/**
 * Strict variant for explicit command-line input, where a typo should not silently fall back
 */
export function parseUiMode(value: string): UiMode {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'fancy' || normalized === 'plain' || normalized === 'minimal') return normalized;
    throw new ConfigError(`Unknown UI mode '${value}'. Expected minimal, fancy or plain.`, 'UI_MODE');
}

export function loadConfig(): Config {
    return {
        googleApiKey: readText(process.env.GOOGLE_API_KEY, DEFAULTS.googleApiKey),
        googleCx: readText(process.env.GOOGLE_CX, DEFAULTS.googleCx),
        nasaApiKey: readText(process.env.NASA_API_KEY, DEFAULTS.nasaApiKey),
        maxRetries: readInt(process.env.MAX_RETRIES, DEFAULTS.maxRetries, 1),
        retryDelayMs: readInt(process.env.RETRY_DELAY_MS, DEFAULTS.retryDelayMs, 0),
        requestTimeoutMs: readInt(process.env.REQUEST_TIMEOUT_MS, DEFAULTS.requestTimeoutMs, 1),
        uiMode: envUiMode(process.env.UI_MODE),
        verbose: readFlag(process.env.VERBOSE, DEFAULTS.verbose),
    };
}

/**
 * Report credentials that still hold their placeholder.
 * Requests made with a placeholder simply fail upstream and degrade like any other failure.
 */
export function validateConfig(config: Config): { valid: boolean; warnings: string[] } {
    const warnings: string[] = [];

    if (config.googleApiKey === DEFAULTS.googleApiKey) warnings.push('GOOGLE_API_KEY is not set');
    if (config.googleCx === DEFAULTS.googleCx) warnings.push('GOOGLE_CX is not set');
    if (config.nasaApiKey === DEFAULTS.nasaApiKey) warnings.push('NASA_API_KEY is not set');

    return {
        valid: warnings.length === 0,
        warnings,
    };
}

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }

    const lines = existing === '' ? [] : existing.split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        const key = match?.[1];
        if (key === undefined) return line;

        const update = updates[key];
        if (update === undefined) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(update)}`;
    });

    if (nextLines.length > 0 && nextLines[nextLines.length - 1]?.trim() !== '') {
        nextLines.push('');
    }

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = nextLines.join('\n').replace(/\n+$/g, '\n');
    const isNewFile = existing === '';
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (isNewFile) writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.SKYFETCH_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

type CredentialAnswers = {
    googleApiKey?: string;
    googleCx?: string;
    nasaApiKey?: string;
};

/**
 * Prompt for any credential still on its placeholder (or all of them with `force`)
 * and persist the answers to the .env file.
 */
export async function ensureConfig(options: { envPath?: string; force?: boolean } = {}): Promise<Config> {
    const current = loadConfig();
    const validation = validateConfig(current);

    if (!options.force && validation.valid) return current;

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt) {
        throw new Error(`Cannot prompt for configuration without a terminal:\n${validation.warnings.map(w => `  • ${w}`).join('\n')}`);
    }

    const inquirer = (await import('inquirer')).default;
    const isPlaceholder = (value: string, placeholder: string) => options.force || value === placeholder;

    const answers = await inquirer.prompt<CredentialAnswers>([
        {
            type: 'password',
            name: 'googleApiKey',
            message: 'Paste your Google Custom Search API key',
            mask: '*',
            when: () => isPlaceholder(current.googleApiKey, DEFAULTS.googleApiKey),
            validate: (input: string) => input.trim().length > 0 || 'Google API key is required',
        },
        {
            type: 'input',
            name: 'googleCx',
            message: 'Google search engine id (cx)',
            when: () => isPlaceholder(current.googleCx, DEFAULTS.googleCx),
            validate: (input: string) => input.trim().length > 0 || 'Search engine id is required',
        },
        {
            type: 'password',
            name: 'nasaApiKey',
            message: 'Paste your NASA API key (DEMO_KEY works for light use)',
            mask: '*',
            when: () => isPlaceholder(current.nasaApiKey, DEFAULTS.nasaApiKey),
            validate: (input: string) => input.trim().length > 0 || 'NASA API key is required',
        },
    ]);

    const updates: Record<string, string> = {};
    if (answers.googleApiKey) updates.GOOGLE_API_KEY = answers.googleApiKey.trim();
    if (answers.googleCx) updates.GOOGLE_CX = answers.googleCx.trim();
    if (answers.nasaApiKey) updates.NASA_API_KEY = answers.nasaApiKey.trim();

    if (Object.keys(updates).length > 0) {
        await writeEnvVars(updates, { envPath: options.envPath });
    }

    return loadConfig();
}
