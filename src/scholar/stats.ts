import type { CitationRecord } from '../types/index.js';

export interface CitationSummary {
    total: number;

    /** Earliest and latest dated citation; null when none is dated */
    yearRange: { min: number; max: number } | null;

    /** Citations per cited publication, most cited first */
    perPaper: Array<{ citedPaper: string; count: number }>;
}

/**
 * Run statistics printed after a citation pass.
 */
export function summarizeCitations(records: CitationRecord[]): CitationSummary {
    const years = records
        .map((r) => r.year)
        .filter((year) => /^\d{4}$/.test(year))
        .map((year) => Number.parseInt(year, 10));

    const counts = new Map<string, number>();
    for (const record of records) {
        counts.set(record.citedPaper, (counts.get(record.citedPaper) ?? 0) + 1);
    }

    // Ties keep first-seen order (Array.prototype.sort is stable)
    const perPaper = [...counts.entries()]
        .map(([citedPaper, count]) => ({ citedPaper, count }))
        .sort((a, b) => b.count - a.count);

    return {
        total: records.length,
        yearRange: years.length > 0 ? { min: Math.min(...years), max: Math.max(...years) } : null,
        perPaper,
    };
}
