/**
 * Centralized configuration module for the GeoMatch matcher.
 *
 * Environment variables are parsed once, into a plain {@link MatcherConfig}
 * value that is handed to each matching component at construction. Invalid
 * numbers fall back to their defaults.
 *
 * @module config
 */

import * as path from "node:path";
import * as dotenv from "dotenv";

dotenv.config();

/**
 * Whether to enable verbose logging.
 *
 * @default false
 * @env VERBOSE
 */
export const VERBOSE = process.env.VERBOSE === "true";

/**
 * Location of the bundled category radius table.
 */
export const DEFAULT_CATEGORIES_FILE = path.join(
    __dirname,
    "../config/categories.yaml",
);

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Every tunable of a matching run.
 */
export type MatcherConfig = {
    /** Name of the facility index. @env ES_INDEX_NAME */
    indexName: string;
    /** Maximum points per chunk (C). @env GEOMATCH_CHUNK_SIZE */
    chunkSize: number;
    /** Maximum queries per backend round trip (B). @env GEOMATCH_BATCH_SIZE */
    batchSize: number;
    /** Concurrent batch executions (W). @env GEOMATCH_CONCURRENCY */
    concurrency: number;
    /** Completed batches buffered before workers wait. @env GEOMATCH_QUEUE_CAPACITY */
    queueCapacity: number;
    /** Results buffered before a durable write (N). @env GEOMATCH_FLUSH_THRESHOLD */
    flushThreshold: number;
    /** Per-call backend timeout. @env GEOMATCH_REQUEST_TIMEOUT_MS */
    requestTimeoutMs: number;
    /** How long to wait for the cluster at startup (0 waits indefinitely). @env GEOMATCH_CONNECT_TIMEOUT_MS */
    connectTimeoutMs: number;
    /** Re-executions of a batch after a transient failure. @env GEOMATCH_MAX_RETRIES */
    maxRetries: number;
    /** First backoff delay. @env GEOMATCH_BACKOFF_INITIAL */
    backoffInitialMs: number;
    /** Added to the delay after each retry. @env GEOMATCH_BACKOFF_INCREMENT */
    backoffIncrementMs: number;
    /** Backoff cap. @env GEOMATCH_BACKOFF_MAX */
    backoffMaxMs: number;
    /** Grace period for in-flight batches after a fatal error. @env GEOMATCH_DRAIN_TIMEOUT_MS */
    drainTimeoutMs: number;
    /** Exhausted connectivity failures that abort the run. @env GEOMATCH_CIRCUIT_FAILURE_THRESHOLD */
    circuitFailureThreshold: number;
    /** Window in which those failures are counted. @env GEOMATCH_CIRCUIT_WINDOW_MS */
    circuitWindowMs: number;
    /** Category radius table. @env GEOMATCH_CATEGORIES_FILE */
    categoriesFile: string;
    /** Input column names. @env GEOMATCH_ID_COLUMN, GEOMATCH_LAT_COLUMN, ... */
    columns: InputColumns;
};

/**
 * Names of the input columns the reader looks at.
 */
export type InputColumns = {
    id: string;
    lat: string;
    lon: string;
    category: string;
    timeType: string;
};

// ---------------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------------

/**
 * Reads an integer variable, falling back when unset, unparsable or below
 * `min`.
 *
 * @param env - The environment to read.
 * @param name - Variable name.
 * @param fallback - Default value.
 * @param min - Smallest accepted value.
 * @returns The parsed integer.
 */
const readInt = (
    env: NodeJS.ProcessEnv,
    name: string,
    fallback: number,
    min = 1,
): number => {
    const parsed = Number.parseInt(env[name] ?? "", 10);
    return Number.isNaN(parsed) || parsed < min ? fallback : parsed;
};

/**
 * Builds the matcher configuration from the environment.
 *
 * @param env - The environment to read (defaults to `process.env`).
 * @returns The configuration.
 */
export const loadMatcherConfig = (
    env: NodeJS.ProcessEnv = process.env,
): MatcherConfig => {
    const concurrency = readInt(env, "GEOMATCH_CONCURRENCY", 30);

    return {
        indexName: env.ES_INDEX_NAME ?? "geomatch-places",
        chunkSize: readInt(env, "GEOMATCH_CHUNK_SIZE", 50000),
        batchSize: readInt(env, "GEOMATCH_BATCH_SIZE", 1000),
        concurrency,
        queueCapacity: readInt(env, "GEOMATCH_QUEUE_CAPACITY", concurrency * 2),
        flushThreshold: readInt(env, "GEOMATCH_FLUSH_THRESHOLD", 100000),
        requestTimeoutMs: readInt(env, "GEOMATCH_REQUEST_TIMEOUT_MS", 30000),
        connectTimeoutMs: readInt(env, "GEOMATCH_CONNECT_TIMEOUT_MS", 60000),
        maxRetries: readInt(env, "GEOMATCH_MAX_RETRIES", 3, 0),
        backoffInitialMs: readInt(env, "GEOMATCH_BACKOFF_INITIAL", 1000, 0),
        backoffIncrementMs: readInt(env, "GEOMATCH_BACKOFF_INCREMENT", 1000, 0),
        backoffMaxMs: readInt(env, "GEOMATCH_BACKOFF_MAX", 30000, 0),
        drainTimeoutMs: readInt(env, "GEOMATCH_DRAIN_TIMEOUT_MS", 30000, 0),
        circuitFailureThreshold: readInt(
            env,
            "GEOMATCH_CIRCUIT_FAILURE_THRESHOLD",
            5,
        ),
        circuitWindowMs: readInt(env, "GEOMATCH_CIRCUIT_WINDOW_MS", 60000),
        categoriesFile: env.GEOMATCH_CATEGORIES_FILE ?? DEFAULT_CATEGORIES_FILE,
        columns: {
            id: env.GEOMATCH_ID_COLUMN ?? "id",
            lat: env.GEOMATCH_LAT_COLUMN ?? "lat",
            lon: env.GEOMATCH_LON_COLUMN ?? "lon",
            category: env.GEOMATCH_CATEGORY_COLUMN ?? "category",
            timeType: env.GEOMATCH_TIME_TYPE_COLUMN ?? "time_type",
        },
    };
};
