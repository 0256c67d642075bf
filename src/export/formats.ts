/**
 * Export Formats - write an aggregated result to disk
 */

import { writeFile } from 'fs/promises';
import { marked } from 'marked';
import type { CompositeResult } from '../aggregator/types.js';

export type ExportFormat = 'json' | 'markdown' | 'html' | 'txt';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'markdown', 'html', 'txt'];

export interface ExportOptions {
    format: ExportFormat;
    outputPath: string;
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some(format => format === value);
}

export function getExtension(format: ExportFormat): string {
    switch (format) {
        case 'json': return '.json';
        case 'markdown': return '.md';
        case 'html': return '.html';
        case 'txt': return '.txt';
    }
}

/**
 * Guess the format from a file name, defaulting to markdown
 */
export function formatFromPath(outputPath: string): ExportFormat {
    const lower = outputPath.toLowerCase();
    const match = EXPORT_FORMATS.find(format => lower.endsWith(getExtension(format)));
    return match ?? 'markdown';
}

/**
 * The composite result is kept intact under `result`, next to the query that produced it
 */
export function renderJson(query: string, result: CompositeResult): string {
    return JSON.stringify({ query, result }, null, 2) + '\n';
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

// A fence one backtick longer than any run inside the text cannot be closed by it
function codeFence(text: string): string {
    const longestRun = Math.max(0, ...(text.match(/`+/g) ?? []).map(run => run.length));
    return '`'.repeat(Math.max(3, longestRun + 1));
}

function isWebLink(link: string): boolean {
    return /^https?:\/\//i.test(link);
}

// Characters that would end a markdown link destination early
function encodeLinkTarget(link: string): string {
    return link.replace(/[()<>\s]/g, char => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`);
}

/**
 * Feed and query text is escaped so it stays text once the markdown is rendered to HTML
 */
export function renderMarkdown(query: string, result: CompositeResult): string {
    const summary = result.summary.trimEnd();
    const fence = codeFence(summary);
    const lines: string[] = [`# ${escapeHtml(query)}`, '', '## Summary', '', fence, summary, fence, ''];

    lines.push('## Recent advancements', '');
    if (result.recent_advancements.length === 0) {
        lines.push('_No recent papers found._', '');
    }

    result.recent_advancements.forEach((paper, index) => {
        const title = escapeHtml(paper.title);
        const heading = isWebLink(paper.link) ? `[${title}](${encodeLinkTarget(paper.link)})` : title;
        lines.push(`${index + 1}. **${heading}** (${escapeHtml(paper.published)})`, '');
        lines.push(`   ${escapeHtml(paper.summary)}`, '');
    });

    return lines.join('\n');
}

export function renderText(query: string, result: CompositeResult): string {
    const lines: string[] = [query, '', 'SUMMARY', result.summary.trimEnd(), '', 'RECENT ADVANCEMENTS'];

    if (result.recent_advancements.length === 0) {
        lines.push('(none)');
    }

    result.recent_advancements.forEach((paper, index) => {
        lines.push(`${index + 1}. ${paper.title} (${paper.published})`);
        if (paper.link) lines.push(`   ${paper.link}`);
    });

    return lines.join('\n') + '\n';
}

export async function renderHtml(query: string, result: CompositeResult): Promise<string> {
    const htmlContent = await marked.parse(renderMarkdown(query, result));
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(query)}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif;
            max-width: 800px;
            margin: 0 auto;
            padding: 2rem;
            line-height: 1.6;
            color: #333;
        }
        h1 { border-bottom: 2px solid #2563eb; padding-bottom: 0.5rem; }
        pre { background: #f1f5f9; padding: 1rem; border-radius: 8px; white-space: pre-wrap; }
        a { color: #2563eb; }
        li { margin: 0.5rem 0; }
    </style>
</head>
<body>
${htmlContent}
</body>
</html>
`;
}

export async function exportResult(
    query: string,
    result: CompositeResult,
    options: ExportOptions
): Promise<void> {
    const { format, outputPath } = options;

    switch (format) {
        case 'json':
            await writeFile(outputPath, renderJson(query, result), 'utf-8');
            break;
        case 'markdown':
            await writeFile(outputPath, renderMarkdown(query, result), 'utf-8');
            break;
        case 'html':
            await writeFile(outputPath, await renderHtml(query, result), 'utf-8');
            break;
        case 'txt':
            await writeFile(outputPath, renderText(query, result), 'utf-8');
            break;
    }
}
