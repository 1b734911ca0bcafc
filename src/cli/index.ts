#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { CheckpointStore } from '../affiliations/checkpoint.js';
import { AffiliationResolver } from '../affiliations/resolver.js';
import { runAffiliationPass } from '../affiliations/runner.js';
import { createMetadataContext, createScholarContext } from '../context.js';
import { affiliationsPathFor, readTitles, writeCitationsCsv } from '../exporters/csv.js';
import { CitationCollector } from '../scholar/collector.js';
import { summarizeCitations } from '../scholar/stats.js';
import { CrossrefSource } from '../sources/crossref.js';
import { OpenAlexSource } from '../sources/openalex.js';
import { SemanticScholarSource } from '../sources/semantic-scholar.js';
import type { CiteTrailConfig, CiteTrailOverrides, LogLevel } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import { InputError } from '../utils/errors.js';
import { formatRequestCounts } from '../utils/http-client.js';
import { initLogger, type Logger } from '../utils/logger.js';

const VERSION = '1.0.0';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!/^-?\d+$/.test(value.trim()) || Number.isNaN(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
    }
    return level;
}

interface CommonOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Only the flags actually given, so they do not shadow the config file.
 */
function commonOverrides(opts: CommonOptions): CiteTrailOverrides {
    const overrides: CiteTrailOverrides = {};
    if (opts.logLevel) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;
    return overrides;
}

async function setup(cliFlags: CiteTrailOverrides): Promise<{ config: CiteTrailConfig; logger: Logger }> {
    const { config, filepath } = await resolveConfig(cliFlags);
    const logger = initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    if (filepath) {
        logger.debug({ path: filepath }, 'Loaded config file');
    }
    return { config, logger };
}

/**
 * Report a fatal error. Sets the exit code rather than exiting so the log
 * transport can flush.
 */
function fail(logger: Logger | null, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    if (logger) {
        logger.error({ error }, error instanceof InputError ? message : 'Run failed');
    } else {
        console.error(`Error: ${message}`);
    }
    process.exitCode = 1;
}

const program = new Command();

program
    .name('citetrail')
    .description("Harvest the papers citing a researcher's work and resolve their authors' affiliations.")
    .version(VERSION);

// ─── CITATIONS command ───────────────────────────────────

program
    .command('citations')
    .description('Collect every paper citing the publications on a Scholar profile')
    .argument('<scholarId>', 'Scholar profile identifier')
    .option('--min-year <year>', 'Drop citing papers published before this year', parseInteger)
    .option('-o, --out-dir <dir>', 'Directory for the citation table')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (scholarId: string, opts: CommonOptions & { minYear?: number; outDir?: string }) => {
        let logger: Logger | null = null;
        try {
            const cliConfig = commonOverrides(opts);
            if (opts.minYear !== undefined) cliConfig.minYear = opts.minYear;
            if (opts.outDir) cliConfig.outDir = opts.outDir;

            const setupResult = await setup(cliConfig);
            const { config } = setupResult;
            logger = setupResult.logger;
            logger.info({ scholarId, minYear: config.minYear }, 'Starting citation scraping');

            const ctx = createScholarContext(config.scholar, logger);
            const collector = new CitationCollector(ctx, { scholar: config.scholar, minYear: config.minYear });
            const outcome = await collector.collect(scholarId);

            if (outcome.status !== 'success' || outcome.value.records.length === 0) {
                logger.warn({ requests: ctx.http.getAllRequestCounts() }, 'No citations found or an error occurred');
                return;
            }

            const { records, reports } = outcome.value;
            const outputPath = writeCitationsCsv(config.outDir, scholarId, records);
            logger.info({ outputPath, requests: ctx.http.getAllRequestCounts() }, 'Results saved');

            const summary = summarizeCitations(records);
            console.log(`\nTotal citing papers: ${summary.total}`);
            if (summary.yearRange) {
                console.log(`Year range: ${summary.yearRange.min} - ${summary.yearRange.max}`);
            }
            console.log('\nCitations per paper:');
            for (const { citedPaper, count } of summary.perPaper) {
                console.log(`  ${count}  ${citedPaper}`);
            }

            const incomplete = reports.filter((report) => report.stoppedEarly);
            if (incomplete.length > 0) {
                console.log('\nListings cut short by a failed page:');
                for (const report of incomplete) {
                    console.log(`  ${report.pagesFetched}/${report.totalPages} pages  ${report.publication.title}`);
                }
            }
            console.log(`\nRequests: ${formatRequestCounts(ctx.http.getAllRequestCounts())}\n`);
        } catch (error) {
            fail(logger, error);
        }
    });

// ─── AFFILIATIONS command ────────────────────────────────

program
    .command('affiliations')
    .description('Resolve author affiliations for the titles of a citation table')
    .requiredOption('-i, --input <csv>', 'CSV with a "title" column')
    .option('-o, --out <csv>', 'Affiliation table, also the checkpoint (default: <input>_affiliations.csv)')
    .option('-s, --start-index <n>', 'Index of the first title to process', parseInteger, 0)
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions & { input: string; out?: string; startIndex: number }) => {
        let logger: Logger | null = null;
        try {
            const setupResult = await setup(commonOverrides(opts));
            const { config } = setupResult;
            logger = setupResult.logger;

            const titles = readTitles(opts.input);
            const outputPath = opts.out ?? affiliationsPathFor(opts.input);
            logger.info({ input: opts.input, outputPath, papers: titles.length, startIndex: opts.startIndex }, 'Starting affiliation pass');

            const { metadata } = config;
            const ctx = createMetadataContext(metadata, logger, VERSION);
            const resolver = new AffiliationResolver(ctx, {
                primary: new CrossrefSource(ctx, { baseUrl: metadata.crossrefUrl, email: metadata.email }),
                fallbacks: [
                    new OpenAlexSource(ctx, { baseUrl: metadata.openalexUrl, email: metadata.email }),
                    new SemanticScholarSource(ctx, { baseUrl: metadata.semanticScholarUrl }),
                ],
            });
            const store = new CheckpointStore(outputPath, logger);

            const summary = await runAffiliationPass(ctx, resolver, store, {
                titles,
                startIndex: opts.startIndex,
                paperDelayMs: metadata.paperDelayMs,
            });

            console.log('\nFinal Summary:');
            console.log(`Papers processed: ${summary.papersProcessed} (${summary.papersSkipped} skipped)`);
            console.log(`Authors found this run: ${summary.authorsFound}`);
            console.log(`Authors with affiliations this run: ${summary.authorsWithAffiliations}`);
            console.log(`Total records: ${summary.totalRecords}`);
            console.log(`Requests: ${formatRequestCounts(ctx.http.getAllRequestCounts())}`);
            console.log(`Results saved to: ${outputPath}\n`);
        } catch (error) {
            fail(logger, error);
        }
    });

await program.parseAsync();
