import { z } from 'zod';
import type { HarvestContext } from '../context.js';
import { failed, success, type AffiliationSource, type AuthorAffiliation, type Outcome } from '../types/index.js';

/** Fields to request from S2 API */
const AUTHOR_FIELDS = ['authors.name', 'authors.affiliations'].join(',');

/**
 * Semantic Scholar paper response (subset of relevant fields).
 */
const S2PaperSchema = z.object({
    paperId: z.string().nullish(),
    authors: z
        .array(
            z.object({
                name: z.string().nullish(),
                affiliations: z.array(z.string()).nullish(),
            })
        )
        .nullish(),
});

export interface SemanticScholarOptions {
    baseUrl: string;
}

/**
 * Semantic Scholar source: last-resort affiliation lookup by DOI.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarSource implements AffiliationSource {
    readonly name = 'Semantic Scholar';
    readonly sourceId = 's2' as const;

    constructor(
        private readonly ctx: HarvestContext,
        private readonly options: SemanticScholarOptions
    ) {}

    async fetchAffiliations(doi: string): Promise<Outcome<AuthorAffiliation[]>> {
        const params = new URLSearchParams({ fields: AUTHOR_FIELDS });
        const url = `${this.options.baseUrl}/DOI:${doi}?${params.toString()}`;
        this.ctx.logger.debug({ url }, 'S2 fetch paper');

        const response = await this.ctx.http.getJson(url, { source: 's2' });
        if (response.status !== 'success') {
            return response;
        }

        const parsed = S2PaperSchema.safeParse(response.value);
        if (!parsed.success) {
            this.ctx.logger.warn({ doi, issues: parsed.error.issues }, 'Unexpected S2 response');
            return failed('permanent-page', 'Unexpected Semantic Scholar response shape');
        }

        const affiliations: AuthorAffiliation[] = [];
        for (const author of parsed.data.authors ?? []) {
            const authorName = author.name?.trim() ?? '';
            if (!authorName) continue;

            for (const affiliation of author.affiliations ?? []) {
                if (affiliation.trim()) {
                    affiliations.push({ authorName, affiliation: affiliation.trim() });
                }
            }
        }

        return success(affiliations);
    }
}
