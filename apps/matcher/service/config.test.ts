import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CATEGORIES_FILE, loadMatcherConfig } from "./config";

describe("loadMatcherConfig", () => {
    it("uses the defaults for an empty environment", () => {
        expect(loadMatcherConfig({})).toEqual({
            indexName: "geomatch-places",
            chunkSize: 50000,
            batchSize: 1000,
            concurrency: 30,
            queueCapacity: 60,
            flushThreshold: 100000,
            requestTimeoutMs: 30000,
            connectTimeoutMs: 60000,
            maxRetries: 3,
            backoffInitialMs: 1000,
            backoffIncrementMs: 1000,
            backoffMaxMs: 30000,
            drainTimeoutMs: 30000,
            circuitFailureThreshold: 5,
            circuitWindowMs: 60000,
            categoriesFile: DEFAULT_CATEGORIES_FILE,
            columns: {
                id: "id",
                lat: "lat",
                lon: "lon",
                category: "category",
                timeType: "time_type",
            },
        });
    });

    it("reads overrides and sizes the queue from the concurrency", () => {
        const config = loadMatcherConfig({
            ES_INDEX_NAME: "places",
            GEOMATCH_CONCURRENCY: "8",
            GEOMATCH_MAX_RETRIES: "0",
            GEOMATCH_LAT_COLUMN: "latitude",
        });

        expect(config).toMatchObject({
            indexName: "places",
            concurrency: 8,
            queueCapacity: 16,
            maxRetries: 0,
            columns: { lat: "latitude", lon: "lon" },
        });
    });

    it("falls back to the default for an unparsable number", () => {
        expect(
            loadMatcherConfig({ GEOMATCH_BATCH_SIZE: "lots" }).batchSize,
        ).toBe(1000);
    });

    it("falls back to the default for sizes below one", () => {
        const config = loadMatcherConfig({
            GEOMATCH_CONCURRENCY: "0",
            GEOMATCH_CHUNK_SIZE: "-5",
            GEOMATCH_FLUSH_THRESHOLD: "0",
        });

        expect(config).toMatchObject({
            concurrency: 30,
            queueCapacity: 60,
            chunkSize: 50000,
            flushThreshold: 100000,
        });
    });

    it("accepts zero where zero means none", () => {
        const config = loadMatcherConfig({
            GEOMATCH_MAX_RETRIES: "0",
            GEOMATCH_BACKOFF_INITIAL: "0",
            GEOMATCH_DRAIN_TIMEOUT_MS: "0",
            GEOMATCH_QUEUE_CAPACITY: "0",
        });

        expect(config).toMatchObject({
            maxRetries: 0,
            backoffInitialMs: 0,
            drainTimeoutMs: 0,
            queueCapacity: 60,
        });
    });

    it("points at the bundled category table", () => {
        expect(path.basename(DEFAULT_CATEGORIES_FILE)).toBe("categories.yaml");
    });
});
