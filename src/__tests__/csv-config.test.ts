import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    affiliationsPathFor,
    citationsFilename,
    formatTimestamp,
    readTitles,
    serializeCitations,
    writeCitationsCsv,
} from '../exporters/csv.js';
import { DEFAULT_CONFIG, type CitationRecord } from '../types/index.js';
import { mergeConfig, resolveConfig } from '../utils/config.js';
import { InputError } from '../utils/errors.js';

const RECORD: CitationRecord = {
    title: 'A, B',
    authors: 'X',
    venue: 'V',
    year: '2020',
    link: 'https://x.test',
    snippet: 's',
    citedPaper: 'P',
};

const RUN_DATE = new Date(2024, 0, 5, 7, 8, 9);

let dir: string;

beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'citetrail-'));
});

afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
});

describe('Citation table', () => {
    it('should format local timestamps', () => {
        expect(formatTimestamp(RUN_DATE)).toBe('20240105_070809');
        expect(citationsFilename('abc', RUN_DATE)).toBe('scholar_citations_abc_20240105_070809.csv');
    });

    it('should serialize records with a header and quoting', () => {
        expect(serializeCitations([RECORD])).toBe(
            'title,authors,venue,year,link,snippet,cited_paper\n"A, B",X,V,2020,https://x.test,s,P\n'
        );
    });

    it('should write the table into the output directory', () => {
        const outDir = join(dir, 'runs');
        const path = writeCitationsCsv(outDir, 'abc', [RECORD], RUN_DATE);

        expect(path).toBe(join(outDir, 'scholar_citations_abc_20240105_070809.csv'));
        expect(readFileSync(path, 'utf-8')).toBe(serializeCitations([RECORD]));
    });
});

describe('readTitles', () => {
    it('should read the title column in file order', () => {
        const path = join(dir, 'cites.csv');
        writeFileSync(path, 'id,title,year\n1,"Deep, nets",2020\n2,Second\n');

        expect(readTitles(path)).toEqual(['Deep, nets', 'Second']);
    });

    it('should ignore a byte order mark', () => {
        const path = join(dir, 'bom.csv');
        writeFileSync(path, '\uFEFFtitle\nOnly\n');

        expect(readTitles(path)).toEqual(['Only']);
    });

    it('should read a table written by the citation exporter', () => {
        const path = writeCitationsCsv(dir, 'abc', [RECORD, { ...RECORD, title: 'Second' }], RUN_DATE);

        expect(readTitles(path)).toEqual(['A, B', 'Second']);
    });

    it('should fail on a missing file', () => {
        const path = join(dir, 'missing.csv');
        expect(() => readTitles(path)).toThrow(`Could not find input file: ${path}`);
    });

    it('should fail without a title column', () => {
        const path = join(dir, 'bad.csv');
        writeFileSync(path, 'name,year\nA,2020\n');

        expect(() => readTitles(path)).toThrow(InputError);
    });

    it('should derive the affiliation output path', () => {
        expect(affiliationsPathFor('out/cites.csv')).toBe('out/cites_affiliations.csv');
        expect(affiliationsPathFor('data.CSV')).toBe('data_affiliations.csv');
        expect(affiliationsPathFor('titles')).toBe('titles_affiliations.csv');
    });
});

describe('Config', () => {
    it('should fall back to defaults', () => {
        expect(mergeConfig(null, {})).toEqual(DEFAULT_CONFIG);
    });

    it('should layer CLI flags over the file over defaults', () => {
        const config = mergeConfig(
            { scholar: { maxAttempts: 5 }, outDir: 'from-file', logLevel: 'warn' },
            { outDir: 'from-cli', metadata: { paperDelayMs: 0 } }
        );

        expect(config.scholar).toEqual({ ...DEFAULT_CONFIG.scholar, maxAttempts: 5 });
        expect(config.metadata).toEqual({ ...DEFAULT_CONFIG.metadata, paperDelayMs: 0 });
        expect(config.outDir).toBe('from-cli');
        expect(config.logLevel).toBe('warn');
    });

    it('should load citetrail.config.json from the search directory', async () => {
        const filepath = join(dir, 'citetrail.config.json');
        writeFileSync(filepath, JSON.stringify({ metadata: { email: 'test@example.com' }, logLevel: 'debug' }));

        const resolved = await resolveConfig({ logLevel: 'error' }, dir);

        expect(resolved.filepath).toBe(filepath);
        expect(resolved.config.metadata.email).toBe('test@example.com');
        expect(resolved.config.logLevel).toBe('error');
    });

    it('should use defaults when there is no config file', async () => {
        const resolved = await resolveConfig({}, dir);

        expect(resolved).toEqual({ config: DEFAULT_CONFIG, filepath: null });
    });

    it.each([
        ['an invalid value', { scholar: { maxAttempts: 0 } }],
        ['an unknown key', { retries: 3 }],
        ['an inverted pacing range', { scholar: { pacing: { minMs: 5000, maxMs: 1000 } } }],
    ])('should reject a config file with %s', async (_label, content) => {
        writeFileSync(join(dir, 'citetrail.config.json'), JSON.stringify(content));

        await expect(resolveConfig({}, dir)).rejects.toThrow(InputError);
    });
});
