import debug from "debug";
import { VERBOSE } from "../config";
import type { ResultSink } from "../helpers/resultSink";
import type { MatchResult } from "../types";

const logger = debug("matcher:accumulator");
const error = debug("error:accumulator");

/**
 * Buffers match results in arrival order and appends them to a sink every
 * `flushThreshold` results (N). At most N results are ever held unflushed
 * while writes succeed.
 *
 * Only the orchestrator's consumer loop touches an accumulator.
 */
export class ResultAccumulator {
    private buffer: MatchResult[] = [];
    private acceptedCount = 0;
    private flushedCount = 0;
    private writtenCount = 0;
    private flushCount = 0;

    /**
     * @param sink - Destination of flushed results.
     * @param flushThreshold - Results buffered before a flush (N).
     */
    constructor(
        private readonly sink: ResultSink,
        private readonly flushThreshold: number,
    ) {
        if (!Number.isInteger(flushThreshold) || flushThreshold < 1) {
            throw new Error(
                `Flush threshold must be a positive integer, got ${flushThreshold}`,
            );
        }
    }

    /** Results handed to {@link add}. */
    get accepted(): number {
        return this.acceptedCount;
    }

    /** Results handed to the sink by successful flushes. */
    get flushed(): number {
        return this.flushedCount;
    }

    /** Rows the sink reported written (after its own filtering). */
    get written(): number {
        return this.writtenCount;
    }

    /** Results waiting for the next flush. */
    get pending(): number {
        return this.buffer.length;
    }

    /**
     * Creates the destination so that even an empty run leaves a file.
     */
    async open(): Promise<void> {
        await this.sink.open();
    }

    /**
     * Buffers one result, flushing when the threshold is reached.
     *
     * @param result - The result to record.
     * @throws If the flush fails; the result stays buffered.
     */
    async add(result: MatchResult): Promise<void> {
        this.buffer.push(result);
        this.acceptedCount++;
        if (this.buffer.length >= this.flushThreshold) {
            await this.flush();
        }
    }

    /**
     * Buffers results in order, flushing each time the threshold is reached.
     *
     * @param results - The results to record.
     */
    async addAll(results: readonly MatchResult[]): Promise<void> {
        for (const result of results) {
            await this.add(result);
        }
    }

    /**
     * Appends every buffered result to the sink.
     *
     * @returns Number of results flushed.
     * @throws If the sink fails. The results are put back in front of the
     * buffer so a later flush can still write them.
     */
    async flush(): Promise<number> {
        if (this.buffer.length === 0) return 0;

        const rows = this.buffer;
        this.buffer = [];

        try {
            this.writtenCount += await this.sink.write(rows);
        } catch (err) {
            this.buffer = rows.concat(this.buffer);
            error(
                `Failed to write ${rows.length} results to ${this.sink.target}`,
                err,
            );
            throw err;
        }

        this.flushedCount += rows.length;
        this.flushCount++;

        if (VERBOSE)
            logger(
                `flush ${this.flushCount}: ${rows.length} results (${this.flushedCount} total) -> ${this.sink.target}`,
            );

        return rows.length;
    }

    /**
     * Flushes what is left and releases the sink.
     */
    async close(): Promise<void> {
        await this.flush();
        await this.sink.close();
    }
}
