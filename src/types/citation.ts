/**
 * One of the researcher's own papers, as listed on the profile page.
 */
export interface PublicationRef {
    title: string;

    /** Listing of the papers citing this one; null when the row has no "Cited by" link */
    citingFeedUrl: string | null;
}

/**
 * A paper citing one of the researcher's publications.
 * Every field is a string so that the record maps 1:1 onto a CSV row.
 */
export interface CitationRecord {
    title: string;

    /** Author segment of the byline, unparsed */
    authors: string;

    venue: string;

    /** Four ASCII digits, or '' when the byline carries no year */
    year: string;

    link: string;

    snippet: string;

    /** Title of the researcher's publication this record cites */
    citedPaper: string;
}

/**
 * What the extractor can see on a results page; the collector adds `citedPaper`.
 */
export type PartialCitation = Omit<CitationRecord, 'citedPaper'>;

export interface PageFetchResult {
    pageIndex: number;
    url: string;
    content: string;
}

export const EMPTY_CITATION: Readonly<PartialCitation> = {
    title: '',
    authors: '',
    venue: '',
    year: '',
    link: '',
    snippet: '',
};
