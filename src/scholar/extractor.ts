import { load, type CheerioAPI } from 'cheerio';
import {
    EMPTY_CITATION,
    describeOutcome,
    failed,
    success,
    type Outcome,
    type PartialCitation,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { RESULT_SELECTOR } from './paginator.js';

const BYLINE_SEPARATOR = ' - ';
const YEAR_PATTERN = /(?:19|20)\d{2}/;

function selectResultBlocks($: CheerioAPI) {
    return $(RESULT_SELECTOR);
}

/** One `div.gs_r` result block */
export type ResultBlock = ReturnType<typeof selectResultBlocks>;

/** Reads one result block; may throw on markup it does not understand */
export type BlockParser = (block: ResultBlock) => PartialCitation;

/**
 * Collapse runs of whitespace (including &nbsp;) and trim.
 */
export function cleanText(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

/**
 * Split a result byline ("A Author, B Author - Venue, 2020 - host") into its
 * parts. Only the first two segments are used.
 */
export function parseByline(byline: string): Pick<PartialCitation, 'authors' | 'venue' | 'year'> {
    const parts = byline.split(BYLINE_SEPARATOR);
    const yearMatch = byline.match(YEAR_PATTERN);

    return {
        authors: parts[0] ?? '',
        venue: parts[1] ?? '',
        year: yearMatch ? yearMatch[0] : '',
    };
}

export function parseResultBlock(block: ResultBlock): PartialCitation {
    const heading = block.find('h3.gs_rt').first();
    const title = cleanText(heading.text());
    const link = heading.find('a').first().attr('href') ?? '';

    const byline = cleanText(block.find('div.gs_a').first().text());
    const snippet = cleanText(block.find('div.gs_rs').first().text());

    return { title, link, snippet, ...parseByline(byline) };
}

/**
 * True for the placeholder a malformed block is replaced with.
 */
export function isEmptyCitation(record: PartialCitation): boolean {
    return Object.values(record).every((value) => value === '');
}

/**
 * Extract one block, turning a parser exception into a `malformed-record` failure.
 */
export function extractBlock(block: ResultBlock, parseBlock: BlockParser = parseResultBlock): Outcome<PartialCitation> {
    try {
        return success(parseBlock(block));
    } catch (error) {
        return failed('malformed-record', error instanceof Error ? error.message : String(error));
    }
}

/**
 * Parse one results page into citation records, in page order.
 * A block that cannot be read becomes an empty record (see isEmptyCitation);
 * the rest of the page is still extracted.
 */
export function extractRecords(
    pageHtml: string,
    logger?: Logger,
    parseBlock: BlockParser = parseResultBlock
): PartialCitation[] {
    const $ = load(pageHtml);
    const blocks = selectResultBlocks($);
    const records: PartialCitation[] = [];

    for (let i = 0; i < blocks.length; i++) {
        const outcome = extractBlock(blocks.eq(i), parseBlock);
        if (outcome.status === 'success') {
            records.push(outcome.value);
            continue;
        }

        logger?.warn({ blockIndex: i, reason: describeOutcome(outcome) }, 'Malformed result block, substituting empty record');
        records.push({ ...EMPTY_CITATION });
    }

    return records;
}
