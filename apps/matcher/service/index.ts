import { esConnect, verifyIndex } from "@repo/geomatch-client/elasticsearch";
import { createGeoSearchClient } from "@repo/geomatch-client/geoSearch";
import type { GeoSearchClient } from "@repo/geomatch-core/geo";
import debug from "debug";
import type { MatcherConfig } from "./config";
import { selectCategories } from "./helpers/categories";
import { fileExists } from "./helpers/fs";
import { buildOutputColumns, createResultSink } from "./helpers/resultSink";
import { ChunkReader } from "./matching/chunkReader";
import { MatchOrchestrator } from "./matching/orchestrator";
import type {
    CategoryTable,
    Chunk,
    MatchJob,
    MatchSummary,
} from "./types";

/**
 * Loggers for the matcher.
 */
export const logger = debug("matcher");
export const error = debug("error");

/**
 * Connected OpenSearch client.
 */
export type BackendClient = Awaited<ReturnType<typeof esConnect>>;

/**
 * Callbacks a caller can attach to a job.
 */
export type MatchJobHooks = {
    /** Called after each input chunk is read */
    onProgress?: (chunk: Chunk, summary: MatchSummary) => void;
};

/**
 * Connects to OpenSearch and checks that the facility index exists.
 *
 * @param config - Matcher configuration.
 * @returns The connected client.
 * @throws {Error} If the cluster stays unreachable or the index is missing.
 */
export const connectBackend = async (
    config: MatcherConfig,
): Promise<BackendClient> => {
    const client = await esConnect({
        requestTimeout: config.requestTimeoutMs,
        timeout: config.connectTimeoutMs,
    });
    try {
        await verifyIndex(client, config.indexName);
    } catch (err) {
        await client.close();
        throw err;
    }
    return client;
};

/**
 * Wraps a connected client as the geo search backend of a run.
 *
 * @param client - Connected OpenSearch client.
 * @param config - Matcher configuration.
 * @returns The geo search client.
 */
export const createBackend = (
    client: BackendClient,
    config: MatcherConfig,
): GeoSearchClient =>
    createGeoSearchClient(client, {
        index: config.indexName,
        requestTimeout: config.requestTimeoutMs,
    });

/**
 * Matches one input file against its categories and writes the results.
 *
 * @param backend - Geo search backend.
 * @param job - The job to run.
 * @param config - Matcher configuration.
 * @param table - Full category table; the job picks from it.
 * @param hooks - Progress callbacks.
 * @returns Counters of the run.
 * @throws {CategoryConfigError} If the job names an unknown category.
 * @throws {FatalRunError} If the run is aborted.
 */
export const runMatchJob = async (
    backend: GeoSearchClient,
    job: MatchJob,
    config: MatcherConfig,
    table: CategoryTable,
    hooks: MatchJobHooks = {},
): Promise<MatchSummary> => {
    const categories = selectCategories(table, job.categories);

    if (!(await fileExists(job.input))) {
        throw new Error(`Input file '${job.input}' does not exist`);
    }

    const sink = createResultSink(job.format, {
        target: job.output,
        columns: buildOutputColumns(categories),
        matchedOnly: job.matchedOnly,
        bom: job.bom,
    });
    const reader = ChunkReader.fromFile(job.input, {
        chunkSize: config.chunkSize,
        categories,
        columns: config.columns,
    });
    const orchestrator = new MatchOrchestrator(backend, sink, {
        ...config,
        categories,
        ...(hooks.onProgress && { onProgress: hooks.onProgress }),
    });

    logger(
        `job '${job.name}': ${job.input} -> ${job.output} [${[...categories.keys()].join(", ")}]`,
    );

    const summary = await orchestrator.run(reader);

    logger(
        `job '${job.name}' done: ${summary.matched} matched, ${summary.unmatched} unmatched, ${summary.failed} failed`,
    );
    return summary;
};

/**
 * The default export for the service: the operations the CLI drives.
 */
export default {
    connect: connectBackend,
    backend: createBackend,
    match: runMatchJob,
};
