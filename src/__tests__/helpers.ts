import pino from 'pino';
import { vi } from 'vitest';
import type { HarvestContext } from '../context.js';
import { DEFAULT_CONFIG, type ScholarConfig } from '../types/index.js';
import { HttpClient, createRetryPolicy, type RandomSource, type Sleep } from '../utils/http-client.js';

export const silentLogger = pino({ level: 'silent' });

export const TEST_SCHOLAR: ScholarConfig = {
    ...DEFAULT_CONFIG.scholar,
    baseUrl: 'https://scholar.test',
};

/**
 * Context whose waits are recorded instead of slept.
 */
export function makeContext(options: { maxAttempts?: number; random?: RandomSource } = {}): {
    ctx: HarvestContext;
    waits: number[];
} {
    const waits: number[] = [];
    const sleep: Sleep = async (ms) => {
        waits.push(ms);
    };
    const random = options.random ?? (() => 0.5);
    const http = new HttpClient({
        logger: silentLogger,
        sleep,
        timeout: 5000,
        retryPolicy: createRetryPolicy({
            maxAttempts: options.maxAttempts ?? 3,
            rateLimitCooldownMs: 60000,
            jitter: { minMs: 2000, maxMs: 4000 },
            random,
        }),
    });
    return { ctx: { http, logger: silentLogger, sleep, random }, waits };
}

/**
 * Replace global fetch; `route` answers each requested URL.
 */
export function stubFetch(route: (url: string) => Response | Promise<Response>) {
    const mock = vi.fn(async (input: string | URL | Request) => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
        return route(url);
    });
    vi.stubGlobal('fetch', mock);
    return mock;
}

export function requestedUrls(mock: ReturnType<typeof stubFetch>): string[] {
    return mock.mock.calls.map(([input]) => String(input));
}

export const html = (body: string, status = 200) =>
    new Response(body, { status, headers: { 'content-type': 'text/html' } });

export const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

// ─── Scholar markup ──────────────────────────────────────

export interface ResultFixture {
    title?: string;
    href?: string;
    byline?: string;
    snippet?: string;
}

export function resultBlock(fixture: ResultFixture): string {
    const anchor = fixture.href ? `<a href="${fixture.href}">${fixture.title ?? ''}</a>` : fixture.title ?? '';
    const heading = fixture.title !== undefined ? `<h3 class="gs_rt">${anchor}</h3>` : '';
    const byline = fixture.byline !== undefined ? `<div class="gs_a">${fixture.byline}</div>` : '';
    const snippet = fixture.snippet !== undefined ? `<div class="gs_rs">${fixture.snippet}</div>` : '';
    return `<div class="gs_r gs_or gs_scl"><div class="gs_ri">${heading}${byline}${snippet}</div></div>`;
}

export function resultsPage(blocks: ResultFixture[], pageLabels?: string[]): string {
    const footer = pageLabels
        ? `<div id="gs_n"><table><tr>${pageLabels.map((label) => `<td><a href="#">${label}</a></td>`).join('')}</tr></table></div>`
        : '';
    return `<html><body><div id="gs_res_ccl_mid">${blocks.map(resultBlock).join('')}</div>${footer}</body></html>`;
}

export interface ProfileRowFixture {
    title?: string;
    citedByHref?: string;
}

export function profilePage(rows: ProfileRowFixture[]): string {
    const body = rows
        .map((row) => {
            const title = row.title !== undefined ? `<a class="gsc_a_at" href="#">${row.title}</a>` : '';
            const citedBy = row.citedByHref !== undefined ? `<a class="gsc_a_ac" href="${row.citedByHref}">7</a>` : '<a class="gsc_a_ac"></a>';
            return `<tr class="gsc_a_tr"><td class="gsc_a_t">${title}</td><td class="gsc_a_c">${citedBy}</td></tr>`;
        })
        .join('');
    return `<html><body><table id="gsc_a_t"><tbody id="gsc_a_b">${body}</tbody></table></body></html>`;
}
