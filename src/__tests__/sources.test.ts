import { describe, it, expect, afterEach, vi } from 'vitest';
import { CrossrefSource } from '../sources/crossref.js';
import { OpenAlexSource } from '../sources/openalex.js';
import { SemanticScholarSource } from '../sources/semantic-scholar.js';
import { cleanDoi, cleanTitle, formatInstitution, namesMatch, stripDoiPrefix } from '../sources/utils.js';
import { html, json, makeContext, requestedUrls, stubFetch } from './helpers.js';

describe('Source utils', () => {
    it('should strip Scholar markers from titles', () => {
        expect(cleanTitle('[HTML][HTML] Deep  nets')).toBe('Deep nets');
        expect(cleanTitle('[b] A Book [citation]')).toBe('A Book');
        expect(cleanTitle(null)).toBe('');
    });

    it('should strip DOI prefixes', () => {
        expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('http://doi.org/10.1234/test')).toBe('10.1234/test');
        expect(stripDoiPrefix('')).toBeNull();
    });

    it('should lower-case DOIs for lookups', () => {
        expect(cleanDoi('https://doi.org/10.1234/ABC')).toBe('10.1234/abc');
        expect(cleanDoi('   ')).toBeNull();
        expect(cleanDoi(undefined)).toBeNull();
    });

    it('should match names by containment in either direction', () => {
        expect(namesMatch('Smith', 'John Smith')).toBe(true);
        expect(namesMatch('JOHN SMITH', 'smith')).toBe(true);
        expect(namesMatch('Jane Doe', 'John Smith')).toBe(false);
        expect(namesMatch('', 'John Smith')).toBe(false);
        expect(namesMatch('  ', '  ')).toBe(false);
    });

    it('should append non-empty location parts to an institution', () => {
        expect(formatInstitution('MIT', ['Cambridge', '', 'US'])).toBe('MIT, Cambridge, US');
        expect(formatInstitution('MIT', [null, undefined])).toBe('MIT');
    });
});

describe('Metadata sources', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('CrossrefSource', () => {
        const options = { baseUrl: 'https://api.test/works', email: 'test@example.com' };

        it('should search by cleaned title and normalize the first item', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            const mock = stubFetch(() =>
                json({
                    message: {
                        items: [
                            {
                                DOI: '10.1/ABC',
                                author: [
                                    {
                                        given: 'Ada',
                                        family: 'Lovelace',
                                        affiliation: [{ name: ' Analytical Society ' }, { name: '' }],
                                    },
                                    { name: 'Tests Consortium' },
                                    { given: null, family: 'Smith' },
                                ],
                            },
                        ],
                    },
                })
            );

            const outcome = await new CrossrefSource(ctx, options).findByTitle('[PDF] Deep  nets');

            expect(requestedUrls(mock)).toEqual([
                'https://api.test/works?query.title=Deep+nets&select=author%2Ctitle%2CDOI%2Cpublisher&rows=1&mailto=test%40example.com',
            ]);
            expect(outcome).toEqual({
                status: 'success',
                value: {
                    doi: '10.1/ABC',
                    authors: [
                        { name: 'Ada Lovelace', affiliations: ['Analytical Society'] },
                        { name: 'Tests Consortium', affiliations: [] },
                        { name: 'Smith', affiliations: [] },
                    ],
                },
            });
        });

        it('should report no match for an empty result list', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            stubFetch(() => json({ message: { items: [] } }));

            expect(await new CrossrefSource(ctx, options).findByTitle('Unknown')).toEqual({
                status: 'success',
                value: null,
            });
        });

        it('should skip titles that are empty after cleaning', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            const mock = stubFetch(() => json({}));

            expect(await new CrossrefSource(ctx, options).findByTitle('[PDF]')).toEqual({
                status: 'skipped',
                reason: 'Empty title',
            });
            expect(mock).not.toHaveBeenCalled();
        });

        it('should fail on an unexpected response shape', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            stubFetch(() => json({ message: {} }));

            expect(await new CrossrefSource(ctx, options).findByTitle('Deep nets')).toMatchObject({
                status: 'failed',
                kind: 'permanent-page',
            });
        });
    });

    describe('OpenAlexSource', () => {
        it('should list one entry per author institution', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            const mock = stubFetch(() =>
                json({
                    id: 'https://openalex.org/W1',
                    authorships: [
                        {
                            author: { display_name: 'Ada Lovelace' },
                            institutions: [
                                { display_name: 'Univ A', city: 'London', region: null, country: 'GB' },
                                { display_name: '' },
                            ],
                        },
                        { author: null, institutions: [{ display_name: 'Orphan Institute' }] },
                        { author: { display_name: 'Bob' }, institutions: [] },
                    ],
                })
            );

            const source = new OpenAlexSource(ctx, { baseUrl: 'https://api.test/oa', email: 'test@example.com' });
            const outcome = await source.fetchAffiliations('10.1/abc');

            expect(requestedUrls(mock)).toEqual(['https://api.test/oa/https://doi.org/10.1/abc?mailto=test%40example.com']);
            expect(outcome).toEqual({
                status: 'success',
                value: [{ authorName: 'Ada Lovelace', affiliation: 'Univ A, London, GB' }],
            });
        });

        it('should pass HTTP failures through', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            stubFetch(() => html('', 404));

            const outcome = await new OpenAlexSource(ctx, { baseUrl: 'https://api.test/oa' }).fetchAffiliations('10.1/x');

            expect(outcome).toMatchObject({ status: 'failed', kind: 'permanent-page', httpStatus: 404 });
        });
    });

    describe('SemanticScholarSource', () => {
        it('should list trimmed, non-empty affiliations per author', async () => {
            const { ctx } = makeContext({ maxAttempts: 1 });
            const mock = stubFetch(() =>
                json({
                    paperId: 'abc',
                    authors: [
                        { name: 'Ada', affiliations: [' Univ A ', '  '] },
                        { name: 'Bob', affiliations: null },
                    ],
                })
            );

            const outcome = await new SemanticScholarSource(ctx, { baseUrl: 'https://api.test/s2' }).fetchAffiliations(
                '10.1/abc'
            );

            expect(requestedUrls(mock)).toEqual(['https://api.test/s2/DOI:10.1/abc?fields=authors.name%2Cauthors.affiliations']);
            expect(outcome).toEqual({ status: 'success', value: [{ authorName: 'Ada', affiliation: 'Univ A' }] });
        });
    });
});
