import type { MetadataConfig, ScholarConfig } from './types/index.js';
import {
    HttpClient,
    createRetryPolicy,
    sleep as realSleep,
    type RandomSource,
    type Sleep,
} from './utils/http-client.js';
import type { Logger } from './utils/logger.js';

/**
 * Everything a component needs from its surroundings, passed in explicitly
 * instead of living in module-level singletons.
 */
export interface HarvestContext {
    http: HttpClient;
    logger: Logger;
    sleep: Sleep;
    random: RandomSource;
}

export interface ContextOverrides {
    sleep?: Sleep;
    random?: RandomSource;
}

/**
 * Browser-like headers for the Scholar search surface.
 */
export const SCHOLAR_HEADERS: Readonly<Record<string, string>> = {
    'User-Agent':
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/98.0.4758.102 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
};

export function createScholarContext(
    config: ScholarConfig,
    logger: Logger,
    overrides: ContextOverrides = {}
): HarvestContext {
    const sleep = overrides.sleep ?? realSleep;
    const random = overrides.random ?? Math.random;
    const http = new HttpClient({
        logger,
        sleep,
        timeout: config.timeoutMs,
        headers: { ...SCHOLAR_HEADERS },
        retryPolicy: createRetryPolicy({
            maxAttempts: config.maxAttempts,
            rateLimitCooldownMs: config.rateLimitCooldownMs,
            jitter: config.pacing,
            random,
        }),
    });
    return { http, logger, sleep, random };
}

/**
 * Context for the metadata APIs. They tolerate more traffic than Scholar, so
 * retries reuse the same backoff shape with a smaller budget and pacing is a
 * fixed per-paper delay applied by the runner.
 */
export function createMetadataContext(
    config: MetadataConfig,
    logger: Logger,
    version: string,
    overrides: ContextOverrides = {}
): HarvestContext {
    const sleep = overrides.sleep ?? realSleep;
    const random = overrides.random ?? Math.random;
    const http = new HttpClient({
        logger,
        sleep,
        timeout: config.timeoutMs,
        headers: {
            'User-Agent': `CiteTrail/${version} (mailto:${config.email})`,
            'Accept': 'application/json',
        },
        retryPolicy: createRetryPolicy({
            maxAttempts: config.maxAttempts,
            rateLimitCooldownMs: config.paperDelayMs,
            jitter: { minMs: config.paperDelayMs, maxMs: config.paperDelayMs * 2 },
            random,
        }),
    });
    return { http, logger, sleep, random };
}
