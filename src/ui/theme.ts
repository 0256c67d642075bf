/**
 * UI Theme - palette and glyphs for terminal output
 */

import chalk from 'chalk';
import figures from 'figures';

export function isPlainMode(): boolean {
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    return ui === 'plain' || process.env.NO_COLOR !== undefined;
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 100): number {
    const columns = process.stdout.columns;
    if (typeof columns !== 'number' || columns <= 0) return maxWidth;
    // Keep a small margin to avoid terminal soft-wrapping at the right edge.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

export const colors = {
    primary: maybeColor(chalk.hex('#2563EB')),      // Blue
    secondary: maybeColor(chalk.hex('#F59E0B')),    // Amber
    success: maybeColor(chalk.hex('#10B981')),
    warning: maybeColor(chalk.hex('#F59E0B')),
    error: maybeColor(chalk.hex('#EF4444')),
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
    bold: maybeColor(chalk.bold),
};

export const icons = {
    complete: figures.tick,
    error: figures.cross,
    warning: figures.warning,
    arrow: figures.arrowRight,
    bullet: figures.bullet,
    star: figures.star,
    search: figures.pointerSmall,
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

export function createHeader(title: string, subtitle?: string): string {
    const parts = [isPlainMode() ? title : chalk.bold(colors.primary(title))];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

/**
 * One numbered line in a list, e.g. `3. Title (2024)`
 */
export function numberedLine(index: number, text: string, suffix?: string): string {
    const label = colors.dim(`${index + 1}.`);
    return suffix ? `${label} ${text} ${colors.muted(suffix)}` : `${label} ${text}`;
}
