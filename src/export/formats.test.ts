import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
    exportResult,
    formatFromPath,
    isExportFormat,
    renderHtml,
    renderJson,
    renderMarkdown,
    renderText,
} from './formats.js';
import type { CompositeResult } from '../aggregator/types.js';

const result: CompositeResult = {
    summary: 'Title: Halo Survey\nLink: https://a.example\nSnippet: Maps.\n',
    recent_advancements: [
        {
            title: 'Halo Maps',
            summary: 'We map halos.',
            year: 2025,
            published: '2025-04-02T08:00:00Z',
            link: 'https://arxiv.org/abs/2504.00001v1',
            parsed_date: new Date(Date.UTC(2025, 3, 2, 8, 0, 0)),
        },
    ],
};

const empty: CompositeResult = { summary: 'No web results found.', recent_advancements: [] };

describe('formatFromPath', () => {
    it('should infer the format from the extension', () => {
        expect(formatFromPath('out.json')).toBe('json');
        expect(formatFromPath('report.HTML')).toBe('html');
        expect(formatFromPath('notes.txt')).toBe('txt');
        expect(formatFromPath('notes.md')).toBe('markdown');
        expect(formatFromPath('notes')).toBe('markdown');
    });
});

describe('isExportFormat', () => {
    it('should accept only known formats', () => {
        expect(isExportFormat('json')).toBe(true);
        expect(isExportFormat('docx')).toBe(false);
    });
});

describe('renderJson', () => {
    it('should keep the composite result intact beside the query', () => {
        const parsed = JSON.parse(renderJson('dark matter', result));

        expect(Object.keys(parsed)).toEqual(['query', 'result']);
        expect(parsed.query).toBe('dark matter');
        expect(Object.keys(parsed.result).sort()).toEqual(['recent_advancements', 'summary']);
        expect(parsed.result.summary).toBe(result.summary);
        expect(parsed.result.recent_advancements[0].parsed_date).toBe('2025-04-02T08:00:00.000Z');
    });
});

describe('renderMarkdown', () => {
    it('should list papers with links', () => {
        const lines = renderMarkdown('dark matter', result).split('\n');

        expect(lines[0]).toBe('# dark matter');
        expect(lines).toContain('1. **[Halo Maps](https://arxiv.org/abs/2504.00001v1)** (2025-04-02T08:00:00Z)');
        expect(lines).toContain('   We map halos.');
    });

    it('should note when there are no papers', () => {
        expect(renderMarkdown('pizza', empty).split('\n')).toContain('_No recent papers found._');
    });

    it('should escape markup in the query and paper text', () => {
        const paper = { ...result.recent_advancements[0], title: 'Dust <b>lanes</b>', summary: 'A & B' };
        const lines = renderMarkdown('<i>nebula</i>', { ...result, recent_advancements: [paper] }).split('\n');

        expect(lines[0]).toBe('# &lt;i&gt;nebula&lt;/i&gt;');
        expect(lines).toContain('1. **[Dust &lt;b&gt;lanes&lt;/b&gt;](https://arxiv.org/abs/2504.00001v1)** (2025-04-02T08:00:00Z)');
        expect(lines).toContain('   A &amp; B');
    });

    it('should use a fence longer than any backtick run in the summary', () => {
        const lines = renderMarkdown('pizza', { ...empty, summary: 'before\n```\nafter\n' }).split('\n');

        expect(lines.slice(4, 9)).toEqual(['````', 'before', '```', 'after', '````']);
    });

    it('should only link web addresses', () => {
        const scripted = { ...result.recent_advancements[0], link: 'javascript:alert(1)' };
        const bracketed = { ...result.recent_advancements[0], link: 'https://example.org/a_(b)' };

        const lines = renderMarkdown('halo', { ...result, recent_advancements: [scripted, bracketed] }).split('\n');

        expect(lines).toContain('1. **Halo Maps** (2025-04-02T08:00:00Z)');
        expect(lines).toContain('2. **[Halo Maps](https://example.org/a_%28b%29)** (2025-04-02T08:00:00Z)');
    });
});

describe('renderHtml', () => {
    it('should keep tags from feed text inert', async () => {
        const paper = { ...result.recent_advancements[0], summary: 'We find <img src=x onerror=alert(1)> here' };

        const html = await renderHtml('halo', { ...result, recent_advancements: [paper] });

        expect(html).not.toContain('<img');
        expect(html).toContain('We find &lt;img src=x onerror=alert(1)&gt; here');
    });
});

describe('renderText', () => {
    it('should number papers', () => {
        const lines = renderText('dark matter', result).split('\n');

        expect(lines).toContain('1. Halo Maps (2025-04-02T08:00:00Z)');
        expect(lines).toContain('   https://arxiv.org/abs/2504.00001v1');
    });
});

describe('exportResult', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'skyfetch-export-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should write HTML with an escaped title', async () => {
        const outputPath = path.join(dir, 'report.html');

        await exportResult('stars & gas', result, { format: 'html', outputPath });

        const html = await readFile(outputPath, 'utf-8');
        expect(html).toContain('<title>stars &amp; gas</title>');
        expect(html).toContain('<h2>Summary</h2>');
    });

    it('should write markdown as rendered', async () => {
        const outputPath = path.join(dir, 'report.md');

        await exportResult('dark matter', result, { format: 'markdown', outputPath });

        expect(await readFile(outputPath, 'utf-8')).toBe(renderMarkdown('dark matter', result));
    });
});
