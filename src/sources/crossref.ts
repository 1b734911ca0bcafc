import { z } from 'zod';
import type { HarvestContext } from '../context.js';
import { failed, skipped, success, type Outcome, type WorkMetadata, type WorkSearchSource } from '../types/index.js';
import { cleanTitle } from './utils.js';

/**
 * Crossref /works response (subset of relevant fields).
 */
const CrossrefAuthorSchema = z.object({
    given: z.string().nullish(),
    family: z.string().nullish(),
    name: z.string().nullish(),
    affiliation: z.array(z.object({ name: z.string().nullish() })).nullish(),
});

const CrossrefWorkSchema = z.object({
    DOI: z.string().nullish(),
    title: z.array(z.string()).nullish(),
    author: z.array(CrossrefAuthorSchema).nullish(),
});

const CrossrefSearchSchema = z.object({
    message: z.object({
        items: z.array(CrossrefWorkSchema),
    }),
});

type CrossrefAuthor = z.infer<typeof CrossrefAuthorSchema>;
type CrossrefWork = z.infer<typeof CrossrefWorkSchema>;

export interface CrossrefOptions {
    baseUrl: string;

    /** Contact address for the polite pool */
    email?: string;
}

/**
 * Crossref source: primary lookup, finds a work by title.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefSource implements WorkSearchSource {
    readonly name = 'Crossref';
    readonly sourceId = 'crossref' as const;

    constructor(
        private readonly ctx: HarvestContext,
        private readonly options: CrossrefOptions
    ) {}

    async findByTitle(title: string): Promise<Outcome<WorkMetadata | null>> {
        const query = cleanTitle(title);
        if (!query) {
            return skipped('Empty title');
        }

        const params = new URLSearchParams({
            'query.title': query,
            'select': 'author,title,DOI,publisher',
            'rows': '1',
        });
        if (this.options.email) {
            params.set('mailto', this.options.email);
        }

        const url = `${this.options.baseUrl}?${params.toString()}`;
        this.ctx.logger.debug({ url }, 'Crossref title search');

        const response = await this.ctx.http.getJson(url, { source: 'crossref' });
        if (response.status !== 'success') {
            return response;
        }

        const parsed = CrossrefSearchSchema.safeParse(response.value);
        if (!parsed.success) {
            this.ctx.logger.warn({ url, issues: parsed.error.issues }, 'Unexpected Crossref response');
            return failed('permanent-page', 'Unexpected Crossref response shape');
        }

        const work = parsed.data.message.items[0];
        return success(work ? this.normalizeWork(work) : null);
    }

    private normalizeWork(work: CrossrefWork): WorkMetadata {
        return {
            doi: work.DOI?.trim() || null,
            authors: (work.author ?? []).map((author) => ({
                name: this.authorName(author),
                affiliations: (author.affiliation ?? [])
                    .map((affiliation) => affiliation.name?.trim() ?? '')
                    .filter((name) => name.length > 0),
            })),
        };
    }

    /**
     * "given family" for people, `name` for organisational authors.
     */
    private authorName(author: CrossrefAuthor): string {
        const personal = `${author.given ?? ''} ${author.family ?? ''}`.trim();
        return personal || author.name?.trim() || '';
    }
}
