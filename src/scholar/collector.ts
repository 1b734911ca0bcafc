import type { HarvestContext } from '../context.js';
import {
    describeOutcome,
    failed,
    skipped,
    success,
    type CitationRecord,
    type Outcome,
    type PageFetchResult,
    type PublicationRef,
    type ScholarConfig,
} from '../types/index.js';
import { jitteredDelay } from '../utils/http-client.js';
import { extractRecords, isEmptyCitation } from './extractor.js';
import { Paginator } from './paginator.js';
import { buildProfileUrl, extractPublications } from './profile.js';

/**
 * Per-publication traversal states. `complete` and `aborted` are terminal.
 */
export type PublicationState =
    | 'resolving-feed-url'
    | 'fetching-first-page'
    | 'discovering-page-count'
    | 'iterating-pages'
    | 'complete'
    | 'aborted';

export interface CollectorOptions {
    scholar: ScholarConfig;
    minYear?: number;
}

/**
 * Citations gathered for one publication.
 */
export interface PublicationHarvest {
    records: CitationRecord[];
    totalPages: number;
    pagesFetched: number;

    /** A page fetch failed mid-traversal; records hold what came before it */
    stoppedEarly: boolean;
}

export interface PublicationReport {
    publication: PublicationRef;
    state: Extract<PublicationState, 'complete' | 'aborted'>;
    citations: number;
    totalPages: number;
    pagesFetched: number;

    /** A page after the first failed, so later pages were never fetched */
    stoppedEarly: boolean;
    reason?: string;
}

export interface CollectionResult {
    scholarId: string;
    publications: PublicationRef[];
    reports: PublicationReport[];

    /** All citations, filtered and sorted (see sortCitations) */
    records: CitationRecord[];
}

/**
 * Keep records whose year is absent, non-numeric, or at least `minYear`.
 */
export function filterByMinYear(records: CitationRecord[], minYear?: number): CitationRecord[] {
    if (minYear === undefined) return records;
    return records.filter((record) => !/^\d+$/.test(record.year) || Number.parseInt(record.year, 10) >= minYear);
}

function numericYear(year: string): number | null {
    return /^\d+$/.test(year) ? Number.parseInt(year, 10) : null;
}

/**
 * Stable sort: newest year first, undated last, then title by code point.
 */
export function sortCitations(records: CitationRecord[]): CitationRecord[] {
    return [...records].sort((a, b) => {
        const yearA = numericYear(a.year);
        const yearB = numericYear(b.year);

        if (yearA !== yearB) {
            if (yearA === null) return 1;
            if (yearB === null) return -1;
            return yearB - yearA;
        }

        if (a.title === b.title) return 0;
        return a.title < b.title ? -1 : 1;
    });
}

/**
 * Walks a researcher's profile and every "Cited by" listing, one request at a
 * time. Every request after the first successful one is preceded by a
 * jittered pacing wait, on top of whatever backoff the HTTP client applies.
 */
export class CitationCollector {
    private readonly paginator: Paginator;
    private hasFetched = false;

    constructor(
        private readonly ctx: HarvestContext,
        private readonly options: CollectorOptions
    ) {
        this.paginator = new Paginator(options.scholar.resultsPerPage);
    }

    async collect(scholarId: string): Promise<Outcome<CollectionResult>> {
        const { baseUrl, language, profilePageSize } = this.options.scholar;
        const { logger } = this.ctx;

        const profileUrl = buildProfileUrl(baseUrl, scholarId, language, profilePageSize);
        const profile = await this.fetchPage(profileUrl, 0);
        if (profile.status !== 'success') {
            logger.error({ scholarId, url: profileUrl, reason: describeOutcome(profile) }, 'Could not access profile');
            return profile;
        }

        const publications = extractPublications(profile.value.content, baseUrl, language);
        logger.info({ scholarId, publications: publications.length }, 'Found publications to process');

        const reports: PublicationReport[] = [];
        const records: CitationRecord[] = [];

        for (const [index, publication] of publications.entries()) {
            logger.info(
                { index: index + 1, total: publications.length, title: publication.title },
                'Processing publication'
            );

            const outcome = await this.collectPublication(publication);
            if (outcome.status !== 'success') {
                const reason = describeOutcome(outcome);
                logger.warn({ index: index + 1, title: publication.title, reason }, 'Skipping publication');
                reports.push({
                    publication,
                    state: 'aborted',
                    citations: 0,
                    totalPages: 0,
                    pagesFetched: 0,
                    stoppedEarly: false,
                    reason,
                });
                continue;
            }

            const { totalPages, pagesFetched, stoppedEarly } = outcome.value;
            const kept = filterByMinYear(outcome.value.records, this.options.minYear);
            records.push(...kept);
            reports.push({
                publication,
                state: 'complete',
                citations: kept.length,
                totalPages,
                pagesFetched,
                stoppedEarly,
            });

            if (stoppedEarly) {
                logger.warn(
                    { title: publication.title, citations: kept.length, pagesFetched, totalPages },
                    'Listing cut short, keeping partial citations'
                );
            } else {
                logger.info({ title: publication.title, citations: kept.length }, 'Found citations for publication');
            }
        }

        return success({ scholarId, publications, reports, records: sortCitations(records) });
    }

    /**
     * Traverse one publication's citing-papers listing.
     * skipped: no feed URL. failed: the first page could not be fetched.
     */
    async collectPublication(publication: PublicationRef): Promise<Outcome<PublicationHarvest>> {
        this.transition(publication, 'resolving-feed-url');
        const feedUrl = publication.citingFeedUrl;
        if (!feedUrl) {
            this.transition(publication, 'aborted');
            return skipped('No "Cited by" link');
        }

        this.transition(publication, 'fetching-first-page');
        this.ctx.logger.info({ url: feedUrl }, 'Getting citations from feed');
        const first = await this.fetchPage(feedUrl, 0);
        if (first.status !== 'success') {
            this.transition(publication, 'aborted');
            return first;
        }

        this.transition(publication, 'discovering-page-count');
        const totalPages = this.paginator.discoverPageCount(first.value.content);
        if (totalPages === 0) {
            this.transition(publication, 'complete');
            return success({ records: [], totalPages: 0, pagesFetched: 1, stoppedEarly: false });
        }

        this.transition(publication, 'iterating-pages');
        const records = this.toCitations(first.value, publication.title);
        let pagesFetched = 1;
        let stoppedEarly = false;

        for (const { pageIndex, url } of this.paginator.remainingPages(feedUrl, totalPages)) {
            const page = await this.fetchPage(url, pageIndex);
            if (page.status !== 'success') {
                this.ctx.logger.warn(
                    { url, pageIndex, title: publication.title, reason: describeOutcome(page) },
                    'Page fetch failed, keeping citations gathered so far'
                );
                stoppedEarly = true;
                break;
            }

            records.push(...this.toCitations(page.value, publication.title));
            pagesFetched++;
            this.ctx.logger.info({ page: pageIndex + 1, totalPages }, 'Processed page');
        }

        this.transition(publication, 'complete');
        return success({ records, totalPages, pagesFetched, stoppedEarly });
    }

    private async fetchPage(url: string, pageIndex: number): Promise<Outcome<PageFetchResult>> {
        await this.pace();

        const outcome = await this.ctx.http.getText(url, { source: 'scholar' });
        if (outcome.status !== 'success') {
            return outcome.status === 'failed' ? outcome : failed('permanent-page', outcome.reason);
        }

        this.hasFetched = true;
        return success({ pageIndex, url, content: outcome.value });
    }

    private async pace(): Promise<void> {
        if (!this.hasFetched) return;
        await this.ctx.sleep(jitteredDelay(this.options.scholar.pacing, this.ctx.random));
    }

    private toCitations(page: PageFetchResult, citedPaper: string): CitationRecord[] {
        return extractRecords(page.content, this.ctx.logger)
            .filter((record) => !isEmptyCitation(record))
            .map((record) => ({ ...record, citedPaper }));
    }

    private transition(publication: PublicationRef, state: PublicationState): void {
        this.ctx.logger.debug({ title: publication.title, state }, 'Publication state');
    }
}
