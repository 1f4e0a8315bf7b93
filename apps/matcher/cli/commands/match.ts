/**
 * Match Command Implementation
 *
 * Runs one or more matching jobs with spinners, a progress bar and a summary
 * table per job.
 */

import debug from "debug";
import service, { type BackendClient } from "../../service";
import { type MatcherConfig, loadMatcherConfig } from "../../service/config";
import {
    loadCategoryTable,
    selectCategories,
} from "../../service/helpers/categories";
import { countCsvRows } from "../../service/helpers/fs";
import { splitCategoryList } from "../../service/helpers/jobs";
import {
    createProgressBar,
    displayBox,
    displayKeyValue,
    displaySection,
    failSpinner,
    formatDuration,
    formatNumber,
    formatPercent,
    formatStatus,
    getDaemonMode,
    logSuccess,
    logWarning,
    startSpinner,
    succeedSpinner,
    updateSpinner,
    warnSpinner,
} from "../../service/helpers/terminalUI";
import { FatalRunError } from "../../service/matching/errors";
import type {
    CategoryTable,
    MatchJob,
    MatchSummary,
} from "../../service/types";
import { type RunOverrides, applyRunOverrides } from "../options";

/** Debug logger for matching runs */
const logger = debug("matcher");

/** Debug logger for error operations */
const error = debug("error");

/**
 * Command options for the match command.
 */
export interface MatchCommandOptions extends RunOverrides {
    /** Run in daemon (background) mode */
    daemon: boolean;
    /** Input CSV */
    input: string;
    /** Output file */
    output: string;
    /** Comma-separated category names */
    categories: string;
    /** Output format */
    format: "csv" | "jsonl";
    /** Write only matched results */
    matchedOnly: boolean;
    /** Prefix CSV output with a byte order mark */
    bom: boolean;
}

/**
 * Enables the default loggers unless the user chose their own.
 */
export const enableDefaultLoggers = (): void => {
    if (!getDaemonMode() && process.env.DEBUG === undefined) {
        debug.enable("matcher,error,error:*");
    }
};

/**
 * Shows the effective configuration.
 */
const displayConfiguration = (
    config: MatcherConfig,
    extra: Record<string, string | number>,
): void => {
    displaySection("Configuration");
    displayKeyValue({
        "OpenSearch Index": config.indexName,
        "Chunk Size": formatNumber(config.chunkSize),
        "Batch Size": formatNumber(config.batchSize),
        Concurrency: config.concurrency,
        "Flush Threshold": formatNumber(config.flushThreshold),
        "Max Retries": config.maxRetries,
        ...extra,
    });
};

/**
 * Prints the counters of a finished (or aborted) job.
 *
 * @param job - The job.
 * @param summary - Its counters.
 */
export const displaySummary = (job: MatchJob, summary: MatchSummary): void => {
    displaySection(`Summary: ${job.name}`);
    displayKeyValue({
        "Rows Read": formatNumber(summary.read),
        "Skipped (invalid)": formatNumber(summary.skipped.invalid),
        "Skipped (filtered)": formatNumber(summary.skipped.filtered),
        Queries: formatNumber(summary.queries),
        Batches: formatNumber(summary.batches),
        Retries: formatNumber(summary.retries),
        "Rows Written": formatNumber(summary.written),
        "Match Rate": formatPercent(summary.matchRate),
        Duration: formatDuration(summary.durationMs),
    });
    if (getDaemonMode()) return;

    console.log();
    for (const status of ["matched", "unmatched", "failed"] as const) {
        console.log(`  ${formatStatus(status)}  ${formatNumber(summary[status])}`);
    }
    if (summary.abandoned > 0) {
        logWarning(
            `${formatNumber(summary.abandoned)} queries were abandoned without a result`,
        );
    }
};

/**
 * Opens the backend, printing connection progress.
 *
 * @param config - Effective configuration.
 * @returns The connected client.
 */
export const connectWithSpinner = async (
    config: MatcherConfig,
): Promise<BackendClient> => {
    startSpinner("Connecting to OpenSearch...");
    try {
        const client = await service.connect(config);
        succeedSpinner(`Connected to OpenSearch, index '${config.indexName}' ready`);
        logger("es client connected");
        return client;
    } catch (err) {
        failSpinner("Failed to connect to OpenSearch");
        throw err;
    }
};

/**
 * Runs one job with a progress spinner and prints its summary.
 *
 * @param client - Connected OpenSearch client.
 * @param job - The job to run.
 * @param config - Effective configuration.
 * @param table - Category table.
 * @returns The job's counters.
 * @throws {FatalRunError} If the run is aborted (after printing its partial summary).
 */
export const executeJob = async (
    client: BackendClient,
    job: MatchJob,
    config: MatcherConfig,
    table: CategoryTable,
): Promise<MatchSummary> => {
    // Validate category names before touching any file
    selectCategories(table, job.categories);

    const total = await countCsvRows(job.input).catch((err: unknown) => {
        error(`cannot count rows of ${job.input}`, err);
        return 0;
    });

    startSpinner(`Matching ${job.name}...`);
    try {
        const summary = await service.match(
            service.backend(client, config),
            job,
            config,
            table,
            {
                onProgress: (chunk, progress) => {
                    const bar =
                        total > 0
                            ? `${createProgressBar(progress.read, total)} `
                            : "";
                    updateSpinner(
                        `Matching ${job.name} ${bar}${formatNumber(progress.read)} rows, chunk ${chunk.sequence}, ${formatNumber(progress.matched)} matched`,
                    );
                },
            },
        );

        if (summary.failed > 0) {
            warnSpinner(
                `${job.name}: matched with ${formatNumber(summary.failed)} failed queries`,
            );
        } else {
            succeedSpinner(`${job.name}: matched`);
        }
        displaySummary(job, summary);
        return summary;
    } catch (err) {
        failSpinner(`${job.name}: matching failed`);
        if (err instanceof FatalRunError) {
            displaySummary(job, err.summary);
        }
        throw err;
    }
};

/**
 * Executes the match command.
 *
 * 1. Loads configuration and the category table
 * 2. Connects to OpenSearch and verifies the index
 * 3. Runs the job
 * 4. Prints a summary
 *
 * @param options - Command options from the CLI.
 * @throws {Error} If any step fails.
 */
export async function runMatchCommand(
    options: MatchCommandOptions,
): Promise<void> {
    const startTime = Date.now();
    const isDaemon = getDaemonMode();
    enableDefaultLoggers();

    const config = applyRunOverrides(loadMatcherConfig(), options);
    const table = loadCategoryTable(config.categoriesFile);

    const job: MatchJob = {
        name: options.input,
        input: options.input,
        output: options.output,
        categories: splitCategoryList(options.categories),
        format: options.format,
        matchedOnly: options.matchedOnly,
        bom: options.bom,
    };

    if (!isDaemon) {
        displayConfiguration(config, {
            Input: job.input,
            Output: job.output,
            Categories: job.categories.join(", "),
            Format: job.format,
            "Matched Only": job.matchedOnly ? "Yes" : "No",
        });
        displaySection("Matching");
    }

    const client = await connectWithSpinner(config);
    try {
        await executeJob(client, job, config, table);
    } catch (err) {
        if (!isDaemon) {
            displayBox("Matching failed. Check logs for details.", "error");
        }
        throw err;
    } finally {
        await client.close();
    }

    const duration = Date.now() - startTime;
    if (!isDaemon) {
        console.log();
        displayBox(`Matching completed in ${formatDuration(duration)}`, "success");
        console.log();
    }
    logSuccess(`Results written to ${job.output}`);
}
