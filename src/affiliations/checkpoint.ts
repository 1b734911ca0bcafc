import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { AffiliationRecord } from '../types/index.js';
import { InputError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

const CHECKPOINT_COLUMNS = [
    { key: 'paperTitle', header: 'paper_title' },
    { key: 'author', header: 'author' },
    { key: 'affiliations', header: 'affiliations' },
    { key: 'doi', header: 'doi' },
];

const CheckpointRowsSchema = z.array(
    z.object({
        paper_title: z.string(),
        author: z.string(),
        affiliations: z.string(),
        doi: z.string(),
    })
);

/**
 * Batch records grouped by paper, in first-seen order.
 */
function groupByPaper(batch: AffiliationRecord[]): Map<string, AffiliationRecord[]> {
    const papers = new Map<string, AffiliationRecord[]>();
    for (const record of batch) {
        const records = papers.get(record.paperTitle);
        if (records) {
            records.push({ ...record });
        } else {
            papers.set(record.paperTitle, [{ ...record }]);
        }
    }
    return papers;
}

/**
 * Affiliation results persisted as a CSV that is rewritten in full after every
 * paper, so an interrupted pass can resume at paper granularity.
 *
 * A batch replaces every record already held for its papers, as one block at
 * the position of the first of them. Re-processing a paper never duplicates
 * it, and co-authors sharing a name keep one record each.
 */
export class CheckpointStore {
    private records: AffiliationRecord[] = [];

    constructor(
        private readonly path: string,
        private readonly logger: Logger
    ) {}

    /**
     * Load the existing checkpoint, if any, as the starting sequence.
     */
    load(): AffiliationRecord[] {
        this.records = [];

        if (!existsSync(this.path)) {
            return [];
        }

        let rows: unknown;
        try {
            rows = parse(readFileSync(this.path, 'utf-8'), { bom: true, columns: true, skip_empty_lines: true });
        } catch (error) {
            throw new InputError(`Could not read checkpoint ${this.path}`, { cause: error });
        }

        const parsed = CheckpointRowsSchema.safeParse(rows);
        if (!parsed.success) {
            throw new InputError(
                `Checkpoint ${this.path} must have the columns paper_title, author, affiliations, doi`
            );
        }

        this.records = parsed.data.map((row) => ({
            paperTitle: row.paper_title,
            author: row.author,
            affiliations: row.affiliations,
            doi: row.doi,
        }));
        this.logger.info({ path: this.path, records: this.records.length }, 'Loaded existing results');
        return this.all();
    }

    /**
     * Add a paper's records and rewrite the whole file.
     */
    append(batch: AffiliationRecord[]): void {
        this.merge(batch);
        this.write();
    }

    all(): AffiliationRecord[] {
        return [...this.records];
    }

    get size(): number {
        return this.records.length;
    }

    private merge(batch: AffiliationRecord[]): void {
        for (const [paperTitle, replacement] of groupByPaper(batch)) {
            const first = this.records.findIndex((record) => record.paperTitle === paperTitle);
            if (first < 0) {
                this.records.push(...replacement);
                continue;
            }

            const kept = this.records.filter((record, index) => index < first || record.paperTitle !== paperTitle);
            kept.splice(first, 0, ...replacement);
            this.records = kept;
        }
    }

    private write(): void {
        mkdirSync(dirname(this.path), { recursive: true });
        const content = stringify(this.records, { header: true, columns: CHECKPOINT_COLUMNS });

        // Replaced by rename: the file never holds a partial write
        const temporary = `${this.path}.tmp`;
        writeFileSync(temporary, content, 'utf-8');
        renameSync(temporary, this.path);
    }
}
