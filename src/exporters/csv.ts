import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { CitationRecord } from '../types/index.js';
import { InputError } from '../utils/errors.js';

// ─── Citation table ──────────────────────────────────────

const CITATION_COLUMNS = [
    { key: 'title', header: 'title' },
    { key: 'authors', header: 'authors' },
    { key: 'venue', header: 'venue' },
    { key: 'year', header: 'year' },
    { key: 'link', header: 'link' },
    { key: 'snippet', header: 'snippet' },
    { key: 'citedPaper', header: 'cited_paper' },
];

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time as YYYYMMDD_HHMMSS.
 */
export function formatTimestamp(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}

/**
 * "scholar_citations_{id}_{YYYYMMDD_HHMMSS}.csv"; the timestamp keeps runs from
 * overwriting each other.
 */
export function citationsFilename(scholarId: string, date: Date = new Date()): string {
    return `scholar_citations_${scholarId}_${formatTimestamp(date)}.csv`;
}

export function serializeCitations(records: CitationRecord[]): string {
    return stringify(records, { header: true, columns: CITATION_COLUMNS });
}

/**
 * Write the citation table into `outDir` and return the file path.
 */
export function writeCitationsCsv(
    outDir: string,
    scholarId: string,
    records: CitationRecord[],
    date: Date = new Date()
): string {
    mkdirSync(outDir, { recursive: true });
    const outputPath = join(outDir, citationsFilename(scholarId, date));
    writeFileSync(outputPath, serializeCitations(records), 'utf-8');
    return outputPath;
}

// ─── Affiliation pass input ──────────────────────────────

const RowsSchema = z.array(z.array(z.string()));

/**
 * Default affiliation output for a citation table: "x.csv" → "x_affiliations.csv".
 */
export function affiliationsPathFor(inputPath: string): string {
    return `${inputPath.replace(/\.csv$/i, '')}_affiliations.csv`;
}

/**
 * Titles from the `title` column of a CSV, in file order.
 */
export function readTitles(inputPath: string): string[] {
    if (!existsSync(inputPath)) {
        throw new InputError(`Could not find input file: ${inputPath}`);
    }

    let rows: unknown;
    try {
        rows = parse(readFileSync(inputPath, 'utf-8'), { bom: true, skip_empty_lines: true, relax_column_count: true });
    } catch (error) {
        throw new InputError(`Could not read input file ${inputPath}`, { cause: error });
    }

    const parsed = RowsSchema.safeParse(rows);
    if (!parsed.success) {
        throw new InputError(`Input file ${inputPath} is not a CSV table`);
    }

    const [header, ...body] = parsed.data;
    const column = header ? header.indexOf('title') : -1;
    if (column < 0) {
        throw new InputError(`Input file ${inputPath} has no "title" column`);
    }

    return body.map((row) => row[column] ?? '');
}
