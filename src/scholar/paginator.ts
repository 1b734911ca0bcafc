import { load } from 'cheerio';

/** One search result on a citing-papers listing */
export const RESULT_SELECTOR = 'div.gs_r.gs_or.gs_scl';

/** Footer holding the numbered page links */
export const PAGINATION_SELECTOR = '#gs_n';

/**
 * Total number of pages for a listing, judged from its first page.
 *
 * 0 when the page has no results; the highest digit-only link label in the
 * pagination footer when there is one; otherwise 1.
 */
export function discoverPageCount(firstPageHtml: string): number {
    const $ = load(firstPageHtml);

    if ($(RESULT_SELECTOR).length === 0) {
        return 0;
    }

    const labels = $(PAGINATION_SELECTOR)
        .find('a')
        .map((_, link) => $(link).text().trim())
        .get()
        .filter((label) => /^\d+$/.test(label))
        .map((label) => Number.parseInt(label, 10));

    return labels.length > 0 ? Math.max(...labels) : 1;
}

/**
 * URL of page `pageIndex` (0-based) of a listing.
 */
export function buildPageUrl(baseUrl: string, pageIndex: number, pageSize: number): string {
    const url = new URL(baseUrl);
    url.searchParams.set('start', String(pageIndex * pageSize));
    return url.toString();
}

/**
 * Generates the follow-up requests for a listing whose first page has been
 * fetched. Each page index is produced once, in ascending order.
 */
export class Paginator {
    constructor(private readonly pageSize: number) {
        if (!Number.isInteger(pageSize) || pageSize <= 0) {
            throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
        }
    }

    discoverPageCount(firstPageHtml: string): number {
        return discoverPageCount(firstPageHtml);
    }

    buildPageUrl(baseUrl: string, pageIndex: number): string {
        return buildPageUrl(baseUrl, pageIndex, this.pageSize);
    }

    *remainingPages(baseUrl: string, totalPages: number): Generator<{ pageIndex: number; url: string }> {
        for (let pageIndex = 1; pageIndex < totalPages; pageIndex++) {
            yield { pageIndex, url: this.buildPageUrl(baseUrl, pageIndex) };
        }
    }
}
