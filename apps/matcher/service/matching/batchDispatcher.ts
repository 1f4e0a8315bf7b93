import debug from "debug";
import { VERBOSE } from "../config";
import type { Batch, CategoryTable, Chunk, MatchQuery } from "../types";

const logger = debug("matcher:dispatcher");

/**
 * Splits chunks into batches of at most `batchSize` queries.
 *
 * Every point yields one query per requested category (or only for the
 * category named on its row), in point order with the categories nested
 * inside. Batch sequence numbers run across the whole run.
 */
export class BatchDispatcher {
    private sequence = 0;

    /**
     * @param batchSize - Maximum queries per batch (B).
     * @param categories - Requested categories and their radii.
     */
    constructor(
        private readonly batchSize: number,
        private readonly categories: CategoryTable,
    ) {
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new Error(
                `Batch size must be a positive integer, got ${batchSize}`,
            );
        }
        if (categories.size === 0) {
            throw new Error("At least one category is required");
        }
    }

    /** Batches emitted so far. */
    get emitted(): number {
        return this.sequence;
    }

    /**
     * Builds the queries of a chunk, in order.
     *
     * @param chunk - The chunk to expand.
     * @returns One query per point and category.
     */
    *queries(chunk: Chunk): Generator<MatchQuery> {
        for (const point of chunk.points) {
            for (const category of this.categories.values()) {
                if (
                    point.categoryFilter !== undefined &&
                    point.categoryFilter !== category.name
                ) {
                    continue;
                }
                yield {
                    pointId: point.pointId,
                    lat: point.lat,
                    lon: point.lon,
                    placeType: category.name,
                    radiusMeters: category.radiusMeters,
                    resultLimit: 1,
                    sort: "distance-asc",
                };
            }
        }
    }

    /**
     * Splits a chunk into contiguous batches. Only the batch being filled is
     * held; a chunk's final batch may be short.
     *
     * @param chunk - The chunk to split.
     * @returns The batches, lazily.
     */
    *split(chunk: Chunk): Generator<Batch> {
        let queries: MatchQuery[] = [];

        for (const query of this.queries(chunk)) {
            queries.push(query);
            if (queries.length === this.batchSize) {
                yield this.emit(chunk, queries);
                queries = [];
            }
        }

        if (queries.length > 0) {
            yield this.emit(chunk, queries);
        }
    }

    private emit(chunk: Chunk, queries: MatchQuery[]): Batch {
        this.sequence++;
        if (VERBOSE)
            logger(
                `chunk ${chunk.sequence} -> batch ${this.sequence} (${queries.length} queries)`,
            );
        return { sequence: this.sequence, queries };
    }
}
