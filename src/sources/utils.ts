/**
 * Shared utilities for metadata sources.
 */

/** Result-type tags Scholar prefixes to titles, e.g. "[HTML] Some title" */
const TITLE_MARKERS = /\[(?:HTML|PDF|BOOK|CITATION|B|C)\]/gi;

/**
 * Title as sent to a search API: Scholar markers removed, whitespace collapsed.
 * "[HTML][HTML] Deep  nets" → "Deep nets"
 */
export function cleanTitle(title: string | null | undefined): string {
    if (!title) return '';
    return title
        .replace(TITLE_MARKERS, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * DOI as used in lookups: prefix stripped, trimmed, lower-cased.
 */
export function cleanDoi(doi: string | null | undefined): string | null {
    return stripDoiPrefix(doi)?.toLowerCase() ?? null;
}

/**
 * Loose author-name match: case-insensitive substring containment in either
 * direction. "Smith" matches "John Smith" and vice versa. Empty names never match.
 */
export function namesMatch(a: string, b: string): boolean {
    const left = a.trim().toLowerCase();
    const right = b.trim().toLowerCase();
    if (!left || !right) return false;
    return left.includes(right) || right.includes(left);
}

/**
 * "MIT" + ["Cambridge", "", "US"] → "MIT, Cambridge, US"
 */
export function formatInstitution(name: string, location: Array<string | null | undefined>): string {
    const parts = location.filter((part): part is string => !!part);
    return parts.length > 0 ? `${name}, ${parts.join(', ')}` : name;
}
