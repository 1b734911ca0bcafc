/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Closed interval for a randomised wait, in milliseconds.
 */
export interface DelayRange {
    minMs: number;
    maxMs: number;
}

/**
 * Settings for the Scholar search surface.
 */
export interface ScholarConfig {
    baseUrl: string;
    language: string;

    /** Rows requested from the profile page */
    profilePageSize: number;

    /**
     * Results per listing page. The `start` offset of page N is N times this,
     * so it must change whenever the service changes its page size.
     */
    resultsPerPage: number;

    maxAttempts: number;
    timeoutMs: number;

    /** Jittered wait between requests, also used as retry backoff */
    pacing: DelayRange;

    /** Multiplied by the attempt number after an HTTP 429 */
    rateLimitCooldownMs: number;
}

/**
 * Settings for the Crossref, OpenAlex and Semantic Scholar APIs.
 */
export interface MetadataConfig {
    /** Contact address sent in the User-Agent and as `mailto` */
    email: string;
    crossrefUrl: string;
    openalexUrl: string;
    semanticScholarUrl: string;
    maxAttempts: number;
    timeoutMs: number;

    /** Fixed wait between papers */
    paperDelayMs: number;
}

/**
 * Full configuration merged from CLI flags, the config file and defaults.
 */
export interface CiteTrailConfig {
    scholar: ScholarConfig;
    metadata: MetadataConfig;

    /** Drop citing papers older than this year (undated ones are kept) */
    minYear?: number;

    /** Directory the citation table is written to */
    outDir: string;

    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * CLI flags and config file contents: every key optional, sections partial.
 */
export type CiteTrailOverrides = Partial<Omit<CiteTrailConfig, 'scholar' | 'metadata'>> & {
    scholar?: Partial<ScholarConfig>;
    metadata?: Partial<MetadataConfig>;
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CiteTrailConfig = {
    scholar: {
        baseUrl: 'https://scholar.google.com',
        language: 'en',
        profilePageSize: 100,
        resultsPerPage: 10,
        maxAttempts: 3,
        timeoutMs: 30000,
        pacing: { minMs: 2000, maxMs: 4000 },
        rateLimitCooldownMs: 60000,
    },
    metadata: {
        email: 'citetrail@example.com',
        crossrefUrl: 'https://api.crossref.org/works',
        openalexUrl: 'https://api.openalex.org/works',
        semanticScholarUrl: 'https://api.semanticscholar.org/graph/v1/paper',
        maxAttempts: 1,
        timeoutMs: 30000,
        paperDelayMs: 1000,
    },
    outDir: '.',
    logLevel: 'info',
    jsonLogs: false,
};
