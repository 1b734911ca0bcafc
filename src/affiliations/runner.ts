import type { HarvestContext } from '../context.js';
import { NOT_FOUND, describeOutcome, type AffiliationRecord } from '../types/index.js';
import { InputError } from '../utils/errors.js';
import type { CheckpointStore } from './checkpoint.js';
import type { AffiliationResolver } from './resolver.js';

export interface AffiliationPassOptions {
    titles: string[];

    /** Index into `titles` to start at; earlier titles are assumed checkpointed */
    startIndex: number;

    /** Fixed wait between papers */
    paperDelayMs: number;
}

export interface AffiliationPassSummary {
    papersProcessed: number;
    papersSkipped: number;
    authorsFound: number;
    authorsWithAffiliations: number;

    /** Records in the checkpoint at the end of the pass, loaded ones included */
    totalRecords: number;
    records: AffiliationRecord[];
}

/**
 * Resolve affiliations for `titles[startIndex..]`, checkpointing after every
 * paper. Records already in the checkpoint are the starting point.
 */
export async function runAffiliationPass(
    ctx: HarvestContext,
    resolver: AffiliationResolver,
    store: CheckpointStore,
    options: AffiliationPassOptions
): Promise<AffiliationPassSummary> {
    const { titles, startIndex, paperDelayMs } = options;
    const { logger } = ctx;

    if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex >= titles.length) {
        throw new InputError(
            `Start index ${startIndex} is out of range for ${titles.length} paper(s)`
        );
    }

    store.load();

    let papersProcessed = 0;
    let papersSkipped = 0;
    let authorsFound = 0;
    let authorsWithAffiliations = 0;

    for (let index = startIndex; index < titles.length; index++) {
        const title = titles[index] ?? '';
        logger.info({ index, paper: index + 1, total: titles.length, title }, 'Processing paper');

        const outcome = await resolver.resolve(title);
        let batch: AffiliationRecord[] = [];

        if (outcome.status === 'success') {
            batch = outcome.value;
            papersProcessed++;
            authorsFound += batch.length;
            authorsWithAffiliations += batch.filter((record) => record.affiliations !== NOT_FOUND).length;
        } else {
            papersSkipped++;
            logger.warn({ index, title, reason: describeOutcome(outcome) }, 'Skipping paper');
        }

        store.append(batch);
        logger.info({ paper: index + 1, records: store.size }, 'Saved checkpoint');

        if (index < titles.length - 1) {
            await ctx.sleep(paperDelayMs);
        }
    }

    return {
        papersProcessed,
        papersSkipped,
        authorsFound,
        authorsWithAffiliations,
        totalRecords: store.size,
        records: store.all(),
    };
}
