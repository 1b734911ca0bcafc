import { load, type CheerioAPI } from 'cheerio';
import type { PublicationRef } from '../types/index.js';

const UNKNOWN_TITLE = 'Unknown Title';

function selectPublicationRows($: CheerioAPI) {
    return $('tr.gsc_a_tr');
}

/**
 * Profile page listing the researcher's publications.
 */
export function buildProfileUrl(baseUrl: string, scholarId: string, language: string, pageSize: number): string {
    const params = new URLSearchParams({
        user: scholarId,
        hl: language,
        pagesize: String(pageSize),
    });
    return `${baseUrl}/citations?${params.toString()}`;
}

/**
 * Cluster identifier carried in the `cites` parameter of a "Cited by" link.
 * Relative hrefs are resolved against `baseUrl`.
 */
export function extractClusterId(href: string, baseUrl: string): string | null {
    let url: URL;
    try {
        url = new URL(href, baseUrl);
    } catch {
        return null;
    }
    const clusterId = url.searchParams.get('cites');
    return clusterId ? clusterId : null;
}

/**
 * Listing of every paper citing the cluster.
 */
export function buildFeedUrl(baseUrl: string, clusterId: string, language: string): string {
    const params = new URLSearchParams({
        cites: clusterId,
        hl: language,
        sciodt: '0,5',
    });
    return `${baseUrl}/scholar?${params.toString()}`;
}

/**
 * Publications on a profile page, in listing order. A row without a usable
 * "Cited by" link keeps a null feed URL.
 */
export function extractPublications(profileHtml: string, baseUrl: string, language: string): PublicationRef[] {
    const $ = load(profileHtml);
    const rows = selectPublicationRows($);
    const publications: PublicationRef[] = [];

    for (let i = 0; i < rows.length; i++) {
        const row = rows.eq(i);
        const title = row.find('a.gsc_a_at').first().text().trim() || UNKNOWN_TITLE;
        const href = row.find('a.gsc_a_ac').first().attr('href');
        const clusterId = href ? extractClusterId(href, baseUrl) : null;

        publications.push({
            title,
            citingFeedUrl: clusterId ? buildFeedUrl(baseUrl, clusterId, language) : null,
        });
    }

    return publications;
}
