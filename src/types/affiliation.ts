/**
 * One (paper, author) row of the affiliation table.
 */
export interface AffiliationRecord {
    paperTitle: string;
    author: string;

    /** Affiliations joined with AFFILIATION_DELIMITER, or NOT_FOUND */
    affiliations: string;

    /** DOI as reported by the primary source, or NOT_FOUND */
    doi: string;
}

export const NOT_FOUND = 'Not found';
export const AFFILIATION_DELIMITER = '; ';
