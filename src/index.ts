#!/usr/bin/env node
/**
 * skyfetch - Main Entry Point
 * Web search or the astronomy picture of the day, plus recent arXiv papers, for one query
 */

import 'dotenv/config';
import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { ensureConfig, loadConfig, parseUiMode, validateConfig } from './config.js';
import { createAggregator } from './aggregator/orchestrator.js';
import { ConsoleSink, InMemorySink } from './aggregator/memory.js';
import { selectSummarySource } from './aggregator/router.js';
import type { CompositeResult } from './aggregator/types.js';
import { exportResult, formatFromPath, isExportFormat, renderJson, EXPORT_FORMATS, type ExportFormat } from './export/formats.js';
import {
    createSpinner,
    showComplete,
    showError,
    showEvent,
    showHeader,
    showPapers,
    showSummary,
    showWarnings,
} from './ui/components.js';
import { colors } from './ui/theme.js';
import { SkyfetchError } from './errors.js';

const PackageJsonSchema = z.object({ version: z.string() });
const packageJson = PackageJsonSchema.parse(
    JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

// Graceful shutdown handling
process.on('SIGINT', () => {
    console.log('\n' + colors.muted('Interrupted. Goodbye!'));
    process.exit(0);
});

process.on('SIGTERM', () => {
    console.log('\n' + colors.muted('Terminated. Goodbye!'));
    process.exit(0);
});

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function parseFormat(value: string): ExportFormat {
    const normalized = value.trim().toLowerCase();
    if (!isExportFormat(normalized)) {
        throw new InvalidArgumentError(`Expected one of: ${EXPORT_FORMATS.join(', ')}`);
    }
    return normalized;
}

function fail(error: unknown): never {
    if (error instanceof SkyfetchError) {
        showError(`${error.name}: ${error.message}`);
    } else {
        showError(error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
}

const program = new Command();

program
    .name('skyfetch')
    .description('Aggregate web search, NASA APOD and recent arXiv papers for a query')
    .version(packageJson.version);

program
    .command('fetch')
    .description('Fetch the summary and recent research papers for a query')
    .argument('<query>', 'Query text')
    .option('--json', 'Print { query, result } as JSON')
    .option('-o, --output <file>', 'Save the result to a file')
    .option('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`, parseFormat)
    .option('-r, --retries <n>', 'Attempts per source before giving up', parsePositiveInt)
    .option('--ui <mode>', 'UI mode: minimal | fancy | plain')
    .option('-v, --verbose', 'Show source events as they happen')
    .action(async (
        query: string,
        options: {
            json?: boolean;
            output?: string;
            format?: ExportFormat;
            retries?: number;
            ui?: string;
            verbose?: boolean;
        }
    ) => {
        try {
            const loaded = loadConfig();
            const config = {
                ...loaded,
                maxRetries: options.retries ?? loaded.maxRetries,
                uiMode: options.ui ? parseUiMode(options.ui) : loaded.uiMode,
                verbose: Boolean(options.verbose) || loaded.verbose,
            };
            process.env.UI_MODE = config.uiMode;

            if (!options.json) showWarnings(validateConfig(config).warnings);

            const sink = config.verbose && !options.json ? new ConsoleSink(showEvent) : new InMemorySink();
            const aggregator = createAggregator(config, sink);

            let result: CompositeResult;
            if (options.json) {
                result = await aggregator.fetchExternalData(query);
                process.stdout.write(renderJson(query, result));
            } else {
                showHeader({ query, source: selectSummarySource(query) });

                const spinner = createSpinner('Fetching sources...');
                if (!config.verbose) spinner.start();
                try {
                    result = await aggregator.fetchExternalData(query);
                } finally {
                    spinner.stop();
                }

                showSummary(result.summary);
                showPapers(result.recent_advancements);
            }

            if (options.output) {
                const format = options.format ?? formatFromPath(options.output);
                await exportResult(query, result, { format, outputPath: options.output });
            }

            if (!options.json) showComplete(options.output);
        } catch (error) {
            fail(error);
        }
    });

program
    .command('route')
    .description('Show which summary source a query would use')
    .argument('<query>', 'Query text')
    .action((query: string) => {
        const source = selectSummarySource(query);
        console.log(source === 'astronomy' ? 'astronomy (NASA APOD)' : 'web (Google Custom Search)');
    });

program
    .command('init')
    .description('Set up API credentials')
    .option('-f, --force', 'Re-enter credentials even if set')
    .action(async (options: { force?: boolean }) => {
        try {
            console.log();
            console.log(colors.primary('Setup'));
            console.log(colors.muted('This will save your credentials to .env in this folder.'));
            console.log();

            const config = await ensureConfig({ force: Boolean(options.force) });
            const { warnings } = validateConfig(config);
            if (warnings.length === 0) {
                console.log(colors.success('Credentials configured.'));
            } else {
                showWarnings(warnings);
            }
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync(process.argv).catch(fail);
