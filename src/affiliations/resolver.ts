import type { HarvestContext } from '../context.js';
import { cleanDoi, namesMatch } from '../sources/utils.js';
import {
    AFFILIATION_DELIMITER,
    NOT_FOUND,
    describeOutcome,
    success,
    type AffiliationRecord,
    type AffiliationSource,
    type AuthorAffiliation,
    type Outcome,
    type WorkAuthor,
    type WorkSearchSource,
} from '../types/index.js';

export interface ResolverSources {
    /** Finds the work and its authors by title */
    primary: WorkSearchSource;

    /** Queried by DOI, in order, for authors the primary left without affiliations */
    fallbacks: AffiliationSource[];
}

/**
 * Where an author's affiliations came from; null when no source had any.
 */
export type AffiliationOrigin = WorkSearchSource['sourceId'] | AffiliationSource['sourceId'] | null;

export interface AuthorResolution {
    affiliations: string[];
    origin: AffiliationOrigin;
}

/**
 * Fallback lookups already made for the paper being resolved, keyed by source.
 */
type LookupCache = Map<AffiliationSource['sourceId'], AuthorAffiliation[]>;

/**
 * Resolves author affiliations for a paper title through a chain of sources.
 *
 * For each author the primary response is used as is when it embeds
 * affiliations. Otherwise each fallback is asked in turn, by DOI, until one
 * reports an author whose name matches. A fallback is queried at most once per
 * paper and only when some author needs it.
 */
export class AffiliationResolver {
    constructor(
        private readonly ctx: HarvestContext,
        private readonly sources: ResolverSources
    ) {}

    /**
     * One record per author of the best match for `title`.
     * success([]) when the primary source knows no such work.
     */
    async resolve(title: string): Promise<Outcome<AffiliationRecord[]>> {
        const work = await this.sources.primary.findByTitle(title);
        if (work.status !== 'success') {
            return work;
        }
        if (!work.value) {
            this.ctx.logger.info({ title }, `No match in ${this.sources.primary.name}`);
            return success([]);
        }

        const doi = cleanDoi(work.value.doi);
        const cache: LookupCache = new Map();
        const records: AffiliationRecord[] = [];

        for (const author of work.value.authors) {
            const { affiliations, origin } = await this.resolveAuthor(author, doi, cache);
            this.ctx.logger.debug({ title, author: author.name, origin }, 'Resolved author');

            records.push({
                paperTitle: title,
                author: author.name,
                affiliations: affiliations.length > 0 ? affiliations.join(AFFILIATION_DELIMITER) : NOT_FOUND,
                doi: work.value.doi ?? NOT_FOUND,
            });
        }

        return success(records);
    }

    private async resolveAuthor(author: WorkAuthor, doi: string | null, cache: LookupCache): Promise<AuthorResolution> {
        if (author.affiliations.length > 0) {
            return { affiliations: author.affiliations, origin: this.sources.primary.sourceId };
        }
        if (!doi) {
            return { affiliations: [], origin: null };
        }

        for (const source of this.sources.fallbacks) {
            const reported = await this.lookup(source, doi, cache);
            const affiliations = reported
                .filter((entry) => namesMatch(author.name, entry.authorName))
                .map((entry) => entry.affiliation);

            if (affiliations.length > 0) {
                return { affiliations, origin: source.sourceId };
            }
        }

        return { affiliations: [], origin: null };
    }

    private async lookup(source: AffiliationSource, doi: string, cache: LookupCache): Promise<AuthorAffiliation[]> {
        const cached = cache.get(source.sourceId);
        if (cached) return cached;

        const outcome = await source.fetchAffiliations(doi);
        let reported: AuthorAffiliation[] = [];
        if (outcome.status === 'success') {
            reported = outcome.value;
        } else {
            this.ctx.logger.warn({ doi, source: source.name, reason: describeOutcome(outcome) }, 'Affiliation lookup failed');
        }

        cache.set(source.sourceId, reported);
        return reported;
    }
}
