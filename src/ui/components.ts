/**
 * UI Components - terminal rendering of aggregated results
 */

import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import { colors, icons, createHeader, divider, getBoxOuterWidth, numberedLine } from './theme.js';
import type { SummarySource } from '../aggregator/router.js';
import type { ResearchPaper } from '../aggregator/types.js';

type UiMode = 'minimal' | 'fancy' | 'plain';

function getUiMode(): UiMode {
    if (process.env.NO_COLOR !== undefined) return 'plain';
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    if (ui === 'plain') return 'plain';
    if (ui === 'fancy') {
        const isInteractive = Boolean(process.stdout.isTTY && process.stderr.isTTY);
        return isInteractive ? 'fancy' : 'minimal';
    }
    return 'minimal';
}

const SOURCE_LABELS: Record<SummarySource, string> = {
    astronomy: 'NASA Astronomy Picture of the Day',
    web: 'Google Custom Search',
};

export function showHeader(options: { query: string; source: SummarySource }): void {
    const { query, source } = options;
    const mode = getUiMode();

    console.log();

    if (mode === 'fancy') {
        const heading = gradient(['#1D4ED8', '#2563EB', '#F59E0B'])('skyfetch');
        const lines = [
            heading,
            colors.muted(`Query: ${query}`),
            colors.muted(`Source: ${SOURCE_LABELS[source]} + arXiv`),
        ];

        console.log(
            boxen(lines.join('\n'), {
                padding: 1,
                borderStyle: 'round',
                borderColor: '#2563EB',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(createHeader('skyfetch', `Source: ${SOURCE_LABELS[source]} + arXiv`));
    console.log(colors.muted(`Query: ${query}`));
    console.log(colors.muted(divider()));
}

export function createSpinner(text: string): Ora {
    const mode = getUiMode();
    return ora({
        text: mode === 'fancy' ? colors.secondary(text) : colors.muted(text),
        spinner: mode === 'fancy' ? 'dots12' : 'dots',
        isEnabled: mode !== 'plain' && Boolean(process.stderr.isTTY),
    });
}

export function showSummary(summary: string): void {
    const mode = getUiMode();
    const isDegraded = summary.startsWith('Error:');
    const body = isDegraded ? colors.warning(summary) : summary.trimEnd();

    console.log();
    if (mode === 'fancy') {
        console.log(
            boxen(body, {
                padding: 1,
                borderStyle: 'round',
                borderColor: isDegraded ? 'yellow' : '#2563EB',
                title: 'Summary',
                titleAlignment: 'left',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }

    console.log(colors.primary('Summary'));
    console.log(body);
}

export function formatPaperLine(paper: ResearchPaper, index: number): string {
    const date = paper.published.split('T')[0] ?? paper.published;
    return numberedLine(index, paper.title, `(${date})`);
}

export function showPapers(papers: readonly ResearchPaper[]): void {
    console.log();
    console.log(colors.primary(`Recent advancements (${papers.length})`));

    if (papers.length === 0) {
        console.log(colors.muted('No recent papers found.'));
        return;
    }

    papers.forEach((paper, index) => {
        console.log(formatPaperLine(paper, index));
        if (paper.link) console.log(colors.muted(`   ${icons.arrow} ${paper.link}`));
    });
}

export function showEvent(message: string): void {
    console.error(colors.dim(`${icons.bullet} ${message}`));
}

export function showWarnings(warnings: string[]): void {
    if (warnings.length === 0) return;
    for (const warning of warnings) {
        console.error(`${colors.warning(icons.warning)} ${colors.muted(warning)}`);
    }
    console.error(colors.muted('Requests will use placeholder credentials. Run `skyfetch init` to set them.'));
}

export function showComplete(outputPath?: string): void {
    console.log();
    console.log(`${colors.success(icons.complete)} ${colors.success('Done')}`);
    if (outputPath) console.log(colors.muted(`Saved to: ${outputPath}`));
}

export function showError(message: string): void {
    const mode = getUiMode();
    if (mode === 'fancy') {
        console.error(
            boxen(`${colors.error('Error')}\n${message}`, {
                padding: 1,
                borderStyle: 'round',
                borderColor: 'red',
                width: getBoxOuterWidth(),
            })
        );
        return;
    }
    console.error(`${colors.error(icons.error)} ${colors.error('Error:')} ${message}`);
}
