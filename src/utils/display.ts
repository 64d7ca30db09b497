import chalk from 'chalk';
import type { CacheStats } from '../scraper/cacheStore.js';

export interface CacheStatsRow {
    name: string;
    /** null when the crawler has no cache file yet. */
    stats: CacheStats | null;
}

const COLUMNS = ['pending', 'success', 'failed', 'total'] as const;

/** Plain-text table, one line per crawler. */
export function formatCacheStatsTable(rows: readonly CacheStatsRow[]): string[] {
    const header = ['Crawler', 'Pending', 'Success', 'Failed', 'Total'];
    const body = rows.map((row) =>
        row.stats
            ? [row.name, ...COLUMNS.map((column) => String(row.stats?.[column] ?? 0))]
            : [row.name, '-', '-', '-', '-']
    );

    const widths = header.map((title, i) => Math.max(title.length, ...body.map((cells) => cells[i]?.length ?? 0)));
    const formatRow = (cells: string[]): string =>
        cells.map((cell, i) => (i === 0 ? cell.padEnd(widths[i] ?? 0) : cell.padStart(widths[i] ?? 0))).join(' | ');

    return [formatRow(header), widths.map((w) => '-'.repeat(w)).join('-+-'), ...body.map(formatRow)];
}

export function printCacheStatsTable(rows: readonly CacheStatsRow[]): void {
    const [header, separator, ...lines] = formatCacheStatsTable(rows);
    console.log(chalk.bold(header));
    console.log(chalk.dim(separator));
    lines.forEach((line, i) => {
        const stats = rows[i]?.stats;
        if (!stats) console.log(chalk.dim(line));
        else if (stats.failed > 0) console.log(chalk.yellow(line));
        else console.log(line);
    });
}
