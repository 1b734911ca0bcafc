/**
 * Barrel export for all shared types.
 */
export type { PublicationRef, CitationRecord, PartialCitation, PageFetchResult } from './citation.js';
export { EMPTY_CITATION } from './citation.js';
export type { AffiliationRecord } from './affiliation.js';
export { NOT_FOUND, AFFILIATION_DELIMITER } from './affiliation.js';
export type { Outcome, Success, Skipped, Failed, FailureKind } from './outcome.js';
export { success, skipped, failed, describeOutcome } from './outcome.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CiteTrailConfig,
    CiteTrailOverrides,
    ScholarConfig,
    MetadataConfig,
    DelayRange,
    LogLevel,
} from './config.js';
export type {
    WorkSearchSource,
    AffiliationSource,
    WorkMetadata,
    WorkAuthor,
    AuthorAffiliation,
} from './source-adapter.js';
