import { z } from 'zod';
import type { HarvestContext } from '../context.js';
import { failed, success, type AffiliationSource, type AuthorAffiliation, type Outcome } from '../types/index.js';
import { formatInstitution } from './utils.js';

/**
 * OpenAlex work response (subset of relevant fields).
 */
const OpenAlexInstitutionSchema = z.object({
    display_name: z.string().nullish(),
    city: z.string().nullish(),
    region: z.string().nullish(),
    country: z.string().nullish(),
});

const OpenAlexWorkSchema = z.object({
    id: z.string().nullish(),
    authorships: z
        .array(
            z.object({
                author: z.object({ display_name: z.string().nullish() }).nullish(),
                institutions: z.array(OpenAlexInstitutionSchema).nullish(),
            })
        )
        .nullish(),
});

export interface OpenAlexOptions {
    baseUrl: string;
    email?: string;
}

/**
 * OpenAlex source: secondary affiliation lookup by DOI.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexSource implements AffiliationSource {
    readonly name = 'OpenAlex';
    readonly sourceId = 'openalex' as const;

    constructor(
        private readonly ctx: HarvestContext,
        private readonly options: OpenAlexOptions
    ) {}

    async fetchAffiliations(doi: string): Promise<Outcome<AuthorAffiliation[]>> {
        const params = new URLSearchParams();
        if (this.options.email) {
            params.set('mailto', this.options.email);
        }

        const query = params.toString();
        const url = `${this.options.baseUrl}/https://doi.org/${doi}${query ? `?${query}` : ''}`;
        this.ctx.logger.debug({ url }, 'OpenAlex fetch work');

        const response = await this.ctx.http.getJson(url, { source: 'openalex' });
        if (response.status !== 'success') {
            return response;
        }

        const parsed = OpenAlexWorkSchema.safeParse(response.value);
        if (!parsed.success) {
            this.ctx.logger.warn({ doi, issues: parsed.error.issues }, 'Unexpected OpenAlex response');
            return failed('permanent-page', 'Unexpected OpenAlex response shape');
        }

        const affiliations: AuthorAffiliation[] = [];
        for (const authorship of parsed.data.authorships ?? []) {
            const authorName = authorship.author?.display_name?.trim() ?? '';
            if (!authorName) continue;

            for (const institution of authorship.institutions ?? []) {
                const name = institution.display_name?.trim();
                if (!name) continue;
                affiliations.push({
                    authorName,
                    affiliation: formatInstitution(name, [institution.city, institution.region, institution.country]),
                });
            }
        }

        return success(affiliations);
    }
}
