#!/usr/bin/env node
/**
 * src/main.ts
 *
 * CLI control surface:
 *
 *   maps-harvest <query...> [--max n] [--output file] [--headful] [--verbose]
 *
 * start(query) is running the command. Ctrl+C escalates:
 *
 *   1st → requestStopScrolling()  discovery ends, loaded cards are extracted
 *   2nd → requestStopAll()        extraction stops before the next card
 *   3rd → immediate exit          nothing is written
 *
 * After the first two, whatever was accumulated is still written to the
 * output file.
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { log } from 'crawlee';
import { aiConfigFromEnv, loadEnv } from './config/env.js';
import { PLATFORM_HOSTS, Selectors } from './config.js';
import { TabularFileSink } from './export.js';
import { harvestQuery } from './harvest.js';
import { AiExtractor } from './services/aiExtractor.js';
import type { HarvestResult } from './types.js';
import { errorMessage } from './utils/errors.js';
import { closeFileLogger, initFileLogger } from './utils/fileLogger.js';
import { resolveLogLevel } from './utils/logLevel.js';
import { StopSignal } from './utils/stopSignal.js';

interface CliOptions {
    max?: number;
    output?: string;
    headful?: boolean;
    verbose?: boolean;
}

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return n;
}

// ─── Stop Controls ────────────────────────────────────────────────────────────

function installStopControls(stop: StopSignal): () => void {
    let presses = 0;

    const onSigint = () => {
        presses++;
        if (presses === 1) {
            stop.requestStopScrolling();
            log.warning('[Main] 🛑 Stop scrolling requested — extracting the cards loaded so far (Ctrl+C again to stop all)');
        } else if (presses === 2) {
            stop.requestStopAll();
            log.warning('[Main] 🛑 Stop all requested — finishing the current card, then writing results (Ctrl+C again to exit now)');
        } else {
            log.error('[Main] Exiting immediately.');
            process.exit(130);
        }
    };

    process.on('SIGINT', onSigint);
    return () => {
        process.off('SIGINT', onSigint);
    };
}

// ─── Summary ──────────────────────────────────────────────────────────────────

function printSummary(result: HarvestResult, outputFile: string): void {
    const { stats } = result;

    console.log('');
    console.log(chalk.bold(`Harvest "${result.query}"`) + chalk.dim(` (run ${result.runId})`));
    console.log(
        chalk.dim('  discovery   ') +
        `${result.discovery.handles.length} card(s), ${result.discovery.polls} poll(s), ended by ${result.discovery.reason}`
    );
    console.log(
        chalk.dim('  extraction  ') +
        `${stats.processed} processed · ${stats.aiExtracted} AI · ${stats.heuristicExtracted} heuristic · ` +
        `${stats.duplicates} duplicate(s) · ${stats.skipped} skipped`
    );
    console.log(chalk.dim('  emails      ') + `${stats.emailsResolved} resolved from websites`);

    if (result.aborted) {
        console.log(chalk.yellow(`⚠ Stopped early — partial results (${result.records.length}) written to ${outputFile}`));
    } else {
        console.log(chalk.green(`✓ ${result.records.length} record(s) written to ${outputFile}`));
    }
}

// ─── Run ──────────────────────────────────────────────────────────────────────

async function run(queryParts: string[], options: CliOptions): Promise<void> {
    const query = queryParts.join(' ').trim();
    if (!query) {
        throw new InvalidArgumentError('Search query must not be empty.');
    }

    const env = loadEnv();
    initFileLogger(env.LOG_FILE);
    log.setLevel(resolveLogLevel(env.CRAWLEE_LOG_LEVEL, options.verbose));

    const sink = new TabularFileSink(options.output ?? env.OUTPUT_FILE);
    const stop = new StopSignal();
    const removeStopControls = installStopControls(stop);
    const targetCount = options.max ?? env.TARGET_COUNT;

    try {
        const result = await harvestQuery({
            headless: options.headful ? false : env.HEADLESS,
            stop,
            ai: new AiExtractor(aiConfigFromEnv(env)),
            surface: {
                mapsUrl: env.MAPS_URL,
                detailSettleMs: env.DETAIL_SETTLE_MS,
            },
            harvest: {
                query,
                targetCount,
                maxNoGrowthAttempts: env.MAX_NO_GROWTH_SCROLLS,
                settleMs: env.SCROLL_SETTLE_MS,
                settleMultiplier: env.SCROLL_SETTLE_MULTIPLIER,
                pageDownPresses: env.PAGE_DOWN_PRESSES,
                detailTimeoutMs: env.DETAIL_TIMEOUT_MS,
                heuristic: { platformHosts: PLATFORM_HOSTS },
            },
            contact: env.CONTACT_RESOLUTION_ENABLED
                ? {
                    emailDomains: env.CONTACT_EMAIL_DOMAINS,
                    navigationTimeoutMs: env.CONTACT_NAV_TIMEOUT_MS,
                    loadTimeoutMs: env.CONTACT_LOAD_TIMEOUT_MS,
                    contactSelectors: Selectors.contact,
                }
                : null,
        });

        await sink.write(result.records);
        printSummary(result, sink.filePath);
    } finally {
        removeStopControls();
        await closeFileLogger();
    }
}

async function main(): Promise<void> {
    const program = new Command();

    program
        .name('maps-harvest')
        .description('Harvest business leads from Google Maps search results')
        .argument('<query...>', 'Search query, e.g. "coffee shops in Austin"')
        .option('-m, --max <n>', 'Maximum number of records (defaults to TARGET_COUNT)', parsePositiveInt)
        .option('-o, --output <file>', 'Output file, .xlsx or .csv (defaults to OUTPUT_FILE)')
        .option('--headful', 'Show the browser window')
        .option('-v, --verbose', 'Debug logging')
        .action((queryParts: string[], options: CliOptions) => run(queryParts, options));

    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        console.error(chalk.red(`Harvest failed: ${errorMessage(error)}`));
        process.exitCode = 1;
    }
}

void main();
