import { Command, InvalidArgumentError } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import {
    envelopeFromCatalog,
    findLatestExport,
    readEnvelope,
    writeEnvelope,
    type ExportEnvelope,
    type ExportedPaper,
} from '../exporters/export.js';
import { runIngestion, type IngestReport } from '../ingest/pipeline.js';
import { listSources } from '../sources/registry.js';
import { CatalogDatabase } from '../storage/database.js';
import type { BibHarvestConfig, LogLevel } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import { yearOf } from '../utils/dates.js';
import { ConfigurationError, ValidationError, describeError } from '../utils/errors.js';
import { LOG_LEVELS, getLogger, initLogger } from '../utils/logger.js';

const VERSION = '1.0.0';

type GlobalOptions = {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    db?: string;
};

interface FetchOptions {
    query?: string;
    term?: string[];
    include?: string[];
    exclude?: string[];
    constraint?: string[];
    exact: boolean;
    startYear?: number;
    endYear?: number;
    maxResults?: number;
    pageSize?: number;
    db: boolean;
    json: boolean;
}

interface ResultsOptions {
    file?: string;
    count: number;
}

interface QueryOptions {
    query?: string;
    source?: string;
    startYear?: number;
    endYear?: number;
    limit: number;
    output?: string;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parsePositive(value: string): number {
    const parsed = parseInteger(value);
    if (parsed <= 0) {
        throw new InvalidArgumentError('Must be greater than zero.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

function collect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}

/**
 * Load .env, merge configuration and start the logger.
 */
async function setup(globals: GlobalOptions): Promise<BibHarvestConfig> {
    dotenvConfig();
    const config = await resolveConfig({
        logLevel: globals.logLevel,
        jsonLogs: globals.jsonLogs,
        dbPath: globals.db,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Report an error and set a failing exit code. Configuration and query
 * errors print their message alone.
 */
function fail(error: unknown, context: string): void {
    if (error instanceof ConfigurationError || error instanceof ValidationError) {
        console.error(`${context}: ${error.message}`);
    } else {
        getLogger().error({ err: error }, context);
        console.error(`${context}: ${describeError(error)}`);
    }
    process.exitCode = 1;
}

function printReport(report: IngestReport): void {
    console.log('\nIngestion summary\n');
    console.log(`  Query:      ${report.query}`);
    console.log(`  Status:     ${report.fetchStatus}${report.fetchError ? ` (${report.fetchError})` : ''}`);
    console.log(`  Fetched:    ${report.fetched}`);
    console.log(`  Normalized: ${report.normalized}`);
    console.log(`  Malformed:  ${report.malformed.length}`);
    if (report.persist) {
        console.log(`  Inserted:   ${report.persist.inserted}`);
        console.log(`  Merged:     ${report.persist.merged}`);
        console.log(`  Skipped:    ${report.persist.skipped}`);
        console.log(`  Failed:     ${report.persist.failed}`);
    }
    if (report.exportPath) {
        console.log(`  Export:     ${report.exportPath}`);
    }
    console.log('');
}

function shorten(text: string, width: number): string {
    return text.length > width ? `${text.slice(0, width)}...` : text;
}

function authorLine(paper: ExportedPaper): string {
    if (paper.authors.length === 0) return 'Unknown authors';
    const names = paper.authors.slice(0, 3).map((author) => author.name).join(', ');
    return paper.authors.length > 3 ? `${names} et al.` : names;
}

// `YYYYMMDD_HHMMSS` → `YYYY-MM-DD HH:MM:SS UTC`
function displayTimestamp(timestamp: string): string {
    const match = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/.exec(timestamp);
    if (!match) return timestamp;
    const [, year, month, day, hour, minute, second] = match;
    return `${year}-${month}-${day} ${hour}:${minute}:${second} UTC`;
}

function printEnvelope(file: string, envelope: ExportEnvelope, count: number): void {
    console.log(`\nRequest file: ${file}\n`);
    console.log(`  Query:     ${envelope.query ?? '-'}`);
    console.log(`  Timestamp: ${displayTimestamp(envelope.timestamp)}`);
    console.log(`  Years:     ${envelope.start_year ?? '-'} to ${envelope.end_year ?? '-'}`);
    console.log(`  Source:    ${envelope.source}`);
    console.log(`  Papers:    ${envelope.count}\n`);

    const shown = envelope.papers.slice(0, count);
    for (const paper of shown) {
        const year = paper.publication_date ? yearOf(paper.publication_date) : 'n.d.';
        console.log(`  ${shorten(paper.title, 50)} (${year})`);
        console.log(`    ${authorLine(paper)}  Source: ${paper.source}`);
    }
    if (shown.length < envelope.papers.length) {
        console.log(`\n  (Showing ${shown.length} of ${envelope.papers.length} papers)`);
    }
    console.log('');
}

/**
 * Build the bibharvest command tree.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('bibharvest')
        .description('Fetch bibliographic records from scholarly search APIs into a deduplicated SQLite catalog.')
        .version(VERSION)
        .option('--log-level <level>', 'Log level: error | warn | info | debug | silent', parseLogLevel)
        .option('--json-logs', 'Output JSON logs')
        .option('--db <path>', 'Catalog database path');

    const globals = (): GlobalOptions => program.opts<GlobalOptions>();

    // ─── FETCH command ────────────────────────────────────────

    const fetch = program.command('fetch').description('Fetch papers from a source');

    fetch
        .command('scopus')
        .description('Search Scopus and store the results')
        .option('-q, --query <query>', 'Raw Scopus query expression')
        .option('-t, --term <term>', 'Free search term (repeatable)', collect)
        .option('-i, --include <term>', 'Required term (repeatable)', collect)
        .option('-x, --exclude <term>', 'Excluded term (repeatable)', collect)
        .option('-c, --constraint <expr>', 'Raw constraint, e.g. DOCTYPE(ar) (repeatable)', collect)
        .option('--exact', 'Quote every term', false)
        .option('--start-year <year>', 'Earliest publication year', parseInteger)
        .option('--end-year <year>', 'Latest publication year', parseInteger)
        .option('-m, --max-results <n>', 'Maximum results to fetch', parsePositive)
        .option('--page-size <n>', 'Results per request', parsePositive)
        .option('--no-db', 'Do not save to the database')
        .option('--no-json', 'Do not write the JSON export')
        .action(async (opts: FetchOptions) => {
            let db: CatalogDatabase | undefined;
            const controller = new AbortController();
            const onInterrupt = (): void => {
                getLogger().warn('Interrupted, keeping results fetched so far');
                controller.abort();
            };

            try {
                const config = await setup(globals());
                db = opts.db ? new CatalogDatabase(config.dbPath) : undefined;
                process.once('SIGINT', onInterrupt);

                const report = await runIngestion(
                    {
                        source: 'scopus',
                        query: opts.query,
                        terms: opts.term,
                        inclusions: opts.include,
                        exclusions: opts.exclude,
                        constraints: opts.constraint,
                        exact: opts.exact,
                        startYear: opts.startYear,
                        endYear: opts.endYear,
                        maxResults: opts.maxResults,
                        pageSize: opts.pageSize,
                        saveToDb: opts.db,
                        saveToJson: opts.json,
                        signal: controller.signal,
                    },
                    { config, db }
                );
                printReport(report);
            } catch (error) {
                fail(error, 'Fetch failed');
            } finally {
                process.removeListener('SIGINT', onInterrupt);
                db?.close();
            }
        });

    fetch
        .command('results')
        .description('Show a request export (the most recent one by default)')
        .option('-f, --file <path>', 'Export file to show')
        .option('-n, --count <n>', 'Papers to list', parsePositive, 10)
        .action(async (opts: ResultsOptions) => {
            try {
                const config = await setup(globals());
                const file = opts.file ?? findLatestExport(config.requestsDir);
                if (!file) {
                    console.log(`No request exports found in ${config.requestsDir}`);
                    return;
                }
                printEnvelope(file, readEnvelope(file), opts.count);
            } catch (error) {
                fail(error, 'Reading results failed');
            }
        });

    // ─── PAPERS commands ──────────────────────────────────────

    const papers = program.command('papers').description('Query the local catalog');

    papers
        .command('init-db')
        .description('Create the catalog database and its tables')
        .action(async () => {
            try {
                const config = await setup(globals());
                const db = new CatalogDatabase(config.dbPath);
                db.close();
                console.log(`Database ready: ${config.dbPath}`);
            } catch (error) {
                fail(error, 'Database initialization failed');
            }
        });

    papers
        .command('query')
        .description('Search stored papers')
        .option('-q, --query <text>', 'Text matched against title, abstract and keywords')
        .option('-s, --source <source>', 'Only papers from this source')
        .option('--start-year <year>', 'Earliest publication year', parseInteger)
        .option('--end-year <year>', 'Latest publication year', parseInteger)
        .option('-l, --limit <n>', 'Maximum papers to return', parsePositive, 100)
        .option('-o, --output <file>', 'Write results as JSON to this file')
        .action(async (opts: QueryOptions) => {
            let db: CatalogDatabase | undefined;
            try {
                const config = await setup(globals());
                db = new CatalogDatabase(config.dbPath);
                const found = db.searchPapers({
                    query: opts.query,
                    source: opts.source,
                    startYear: opts.startYear,
                    endYear: opts.endYear,
                    limit: opts.limit,
                });

                if (opts.output) {
                    const envelope = envelopeFromCatalog(db, found, {
                        query: opts.query ?? null,
                        startYear: opts.startYear ?? null,
                        endYear: opts.endYear ?? null,
                        source: opts.source ?? 'catalog',
                    });
                    writeEnvelope(envelope, opts.output);
                    console.log(`Exported ${found.length} papers to ${opts.output}`);
                    return;
                }

                console.log(`\nFound ${found.length} papers\n`);
                for (const paper of found) {
                    const year = paper.publication_date ? yearOf(paper.publication_date) : 'n.d.';
                    console.log(`  ${paper.title} (${year})`);
                    console.log(`    DOI: ${paper.doi ?? '-'}  Citations: ${paper.citations}  Source: ${paper.source}`);
                }
                console.log('');
            } catch (error) {
                fail(error, 'Query failed');
            } finally {
                db?.close();
            }
        });

    papers
        .command('stats')
        .description('Show catalog statistics')
        .action(async () => {
            let db: CatalogDatabase | undefined;
            try {
                const config = await setup(globals());
                db = new CatalogDatabase(config.dbPath);
                const stats = db.getStats();

                console.log('\nCatalog Statistics\n');
                console.log(`  Papers:  ${stats.total_papers}`);
                console.log(`  Authors: ${stats.total_authors}`);

                if (Object.keys(stats.papers_by_source).length > 0) {
                    console.log('\n  Papers by source:');
                    for (const [source, count] of Object.entries(stats.papers_by_source)) {
                        console.log(`    ${source}: ${count}`);
                    }
                }

                if (Object.keys(stats.top_keywords).length > 0) {
                    console.log('\n  Top keywords:');
                    for (const [keyword, count] of Object.entries(stats.top_keywords)) {
                        console.log(`    ${keyword}: ${count}`);
                    }
                }

                console.log('');
            } catch (error) {
                fail(error, 'Stats failed');
            } finally {
                db?.close();
            }
        });

    // ─── SOURCES command ──────────────────────────────────────

    program
        .command('sources')
        .description('List available sources')
        .action(() => {
            console.log('\nAvailable sources\n');
            for (const source of listSources()) {
                console.log(`  ${source.name.padEnd(10)} ${source.description}`);
            }
            console.log('');
        });

    return program;
}
