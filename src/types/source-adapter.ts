import type { Outcome } from './outcome.js';

/**
 * A work as the primary metadata source describes it.
 */
export interface WorkMetadata {
    /** DOI as returned by the source, null when it has none */
    doi: string | null;
    authors: WorkAuthor[];
}

export interface WorkAuthor {
    name: string;

    /** Affiliations embedded in the primary response, possibly empty */
    affiliations: string[];
}

/**
 * One (author, affiliation) pair reported by a fallback source.
 * An author with several institutions appears once per institution.
 */
export interface AuthorAffiliation {
    authorName: string;
    affiliation: string;
}

/**
 * Source that finds a work by its title (Crossref).
 */
export interface WorkSearchSource {
    readonly name: string;
    readonly sourceId: 'crossref';

    /**
     * Best match for a title, or success(null) when the source has none.
     */
    findByTitle(title: string): Promise<Outcome<WorkMetadata | null>>;
}

/**
 * Source that lists author affiliations for a DOI (OpenAlex, Semantic Scholar).
 */
export interface AffiliationSource {
    readonly name: string;
    readonly sourceId: 'openalex' | 's2';

    fetchAffiliations(doi: string): Promise<Outcome<AuthorAffiliation[]>>;
}
