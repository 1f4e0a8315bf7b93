/**
 * Drives a matching run from the input reader to the result sink.
 *
 * Chunks are read and split into batches lazily as the worker pool asks for
 * work, so input reading is paced by batch execution. Completions are
 * consumed by a single loop that owns every counter and the accumulator.
 *
 * On a fatal completion (rejected credentials, open circuit) or a sink
 * failure the run:
 * 1. stops handing out batches,
 * 2. keeps consuming completions of batches already taken, for at most
 *    `drainTimeoutMs`,
 * 3. abandons whatever is still in flight,
 * 4. flushes what it has and throws {@link FatalRunError}.
 *
 * @module orchestrator
 */

import type { GeoSearchClient } from "@repo/geomatch-core/geo";
import debug from "debug";
import { type MatcherConfig, VERBOSE } from "../config";
import { CircuitBreaker } from "../helpers/circuitBreaker";
import type { ResultSink } from "../helpers/resultSink";
import type {
    Batch,
    CategoryTable,
    Chunk,
    MatchResult,
    MatchSummary,
} from "../types";
import { BatchDispatcher } from "./batchDispatcher";
import type { ReaderStats } from "./chunkReader";
import {
    type BatchCompletion,
    ConcurrencyController,
} from "./concurrencyController";
import { FatalRunError } from "./errors";
import { ResultAccumulator } from "./resultAccumulator";
import { RetryPolicy, linearBackoff } from "./retryPolicy";

const logger = debug("matcher:orchestrator");
const error = debug("error:orchestrator");

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Where chunks come from (a {@link ChunkReader} in production).
 */
export interface ChunkSource {
    next(): Promise<Chunk | undefined>;
    readonly stats: Readonly<ReaderStats>;
    close(): void;
}

/**
 * Tunables of a run, as loaded by `loadMatcherConfig`.
 */
export type MatchRunSettings = Pick<
    MatcherConfig,
    | "batchSize"
    | "concurrency"
    | "queueCapacity"
    | "flushThreshold"
    | "maxRetries"
    | "backoffInitialMs"
    | "backoffIncrementMs"
    | "backoffMaxMs"
    | "drainTimeoutMs"
    | "circuitFailureThreshold"
    | "circuitWindowMs"
>;

export type MatchOrchestratorOptions = MatchRunSettings & {
    /** Categories requested for the run */
    categories: CategoryTable;
    /** Called after each chunk is read */
    onProgress?: (chunk: Chunk, summary: MatchSummary) => void;
    /** Replaces the backoff wait, for tests */
    sleep?: (ms: number) => Promise<void>;
    /** Clock, for tests */
    now?: () => number;
};

/** Counters owned by the consumer loop */
type Counters = Omit<
    MatchSummary,
    "read" | "skipped" | "written" | "durationMs" | "matchRate"
>;

/** Resolved by the drain timer */
const DRAIN_EXPIRED = Symbol("drain-expired");

// ---------------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------------

export class MatchOrchestrator {
    private readonly options: MatchOrchestratorOptions;
    private readonly now: () => number;

    /**
     * @param client - Backend the queries are executed against.
     * @param sink - Destination of the results.
     * @param options - Run options.
     */
    constructor(
        private readonly client: GeoSearchClient,
        private readonly sink: ResultSink,
        options: MatchOrchestratorOptions,
    ) {
        this.options = options;
        this.now = options.now ?? Date.now;
    }

    /**
     * Matches every valid point of the source.
     *
     * @param source - The input, read once.
     * @returns Counters of the completed run.
     * @throws {FatalRunError} If the run is aborted; its summary holds the
     * counters reached and every result counted in it up to the last
     * successful flush is in the output.
     */
    async run(source: ChunkSource): Promise<MatchSummary> {
        const startedAt = this.now();
        const { categories } = this.options;

        const counters: Counters = {
            queries: 0,
            matched: 0,
            unmatched: 0,
            failed: 0,
            abandoned: 0,
            batches: 0,
            retries: 0,
        };

        const accumulator = new ResultAccumulator(
            this.sink,
            this.options.flushThreshold,
        );
        const dispatcher = new BatchDispatcher(
            this.options.batchSize,
            categories,
        );
        const policy = new RetryPolicy(this.client, {
            maxRetries: this.options.maxRetries,
            backoff: linearBackoff(
                this.options.backoffInitialMs,
                this.options.backoffIncrementMs,
                this.options.backoffMaxMs,
            ),
            ...(this.options.sleep && { sleep: this.options.sleep }),
        });
        const controller = new ConcurrencyController(policy, {
            concurrency: this.options.concurrency,
            queueCapacity: this.options.queueCapacity,
            categories,
            circuit: new CircuitBreaker({
                name: "geo-search",
                failureThreshold: this.options.circuitFailureThreshold,
                windowMs: this.options.circuitWindowMs,
                now: this.now,
            }),
        });

        const summarize = (): MatchSummary => {
            const stats = source.stats;
            return {
                ...counters,
                read: stats.read,
                skipped: {
                    invalid: stats.skippedInvalid,
                    filtered: stats.skippedFiltered,
                },
                written: accumulator.written,
                durationMs: this.now() - startedAt,
                matchRate:
                    counters.queries > 0
                        ? counters.matched / counters.queries
                        : 0,
            };
        };

        const onProgress = this.options.onProgress;
        async function* batches(): AsyncGenerator<Batch> {
            while (true) {
                const chunk = await source.next();
                if (chunk === undefined) return;
                onProgress?.(chunk, summarize());
                yield* dispatcher.split(chunk);
            }
        }

        let fatal: unknown;
        let aborted = false;
        let sinkFailed = false;
        let drainDeadline = 0;

        const abort = (cause: unknown, reason: string): void => {
            if (aborted) return;
            aborted = true;
            fatal = cause;
            drainDeadline = this.now() + this.options.drainTimeoutMs;
            error(`Aborting run: ${reason}`, cause);
            controller.stop();
        };

        const record = async (results: MatchResult[]): Promise<void> => {
            for (const result of results) {
                if (result.status === "matched") counters.matched++;
                else if (result.status === "unmatched") counters.unmatched++;
                else counters.failed++;
            }
            try {
                await accumulator.addAll(results);
            } catch (err) {
                sinkFailed = true;
                abort(err, `cannot write results to ${this.sink.target}`);
            }
        };

        const consume = async (completion: BatchCompletion): Promise<void> => {
            const size = completion.batch.queries.length;
            counters.batches++;
            counters.queries += size;

            if (completion.kind === "fatal") {
                counters.abandoned += size;
                abort(
                    completion.error,
                    `batch ${completion.batch.sequence} failed: ${completion.error.message}`,
                );
                return;
            }

            counters.retries += completion.attempts - 1;
            if (sinkFailed) {
                // Nowhere to put them
                counters.abandoned += size;
                return;
            }
            await record(completion.results);
        };

        try {
            await accumulator.open();
        } catch (err) {
            source.close();
            throw new FatalRunError(
                `Cannot open output ${this.sink.target}`,
                summarize(),
                err,
            );
        }

        const completions = controller.run(batches());

        try {
            while (true) {
                const pending = completions.next();
                const next = aborted
                    ? await this.raceDrain(pending, drainDeadline)
                    : await pending;

                if (next === DRAIN_EXPIRED) {
                    const work = controller.abandon();
                    counters.batches += work.batches;
                    counters.queries += work.queries;
                    counters.abandoned += work.queries;
                    // A completion may have been handed over as the timer fired
                    const last = await pending;
                    if (!last.done) await consume(last.value);
                    break;
                }
                if (next.done) break;
                await consume(next.value);
            }
        } catch (err) {
            abort(err, "input could not be read");
        } finally {
            source.close();
        }

        if (aborted) {
            const summary = await this.salvage(accumulator, summarize);
            if (summary.abandoned > 0) {
                error(
                    `${summary.abandoned} of ${summary.queries} queries have no recorded result`,
                );
            }
            const message =
                fatal instanceof Error ? fatal.message : String(fatal);
            throw new FatalRunError(
                `Matching aborted: ${message}`,
                summary,
                fatal,
            );
        }

        try {
            await accumulator.close();
        } catch (err) {
            throw new FatalRunError(
                `Cannot write results to ${this.sink.target}`,
                summarize(),
                err,
            );
        }

        const summary = summarize();
        if (VERBOSE) logger("run complete", summary);
        return summary;
    }

    /**
     * Waits for the next completion until the drain deadline passes.
     */
    private async raceDrain<T>(
        pending: Promise<T>,
        deadline: number,
    ): Promise<T | typeof DRAIN_EXPIRED> {
        const remaining = Math.max(0, deadline - this.now());
        let timer: NodeJS.Timeout | undefined;
        const expired = new Promise<typeof DRAIN_EXPIRED>((resolve) => {
            timer = setTimeout(() => resolve(DRAIN_EXPIRED), remaining);
        });
        try {
            return await Promise.race([pending, expired]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Best-effort final flush of an aborted run.
     */
    private async salvage(
        accumulator: ResultAccumulator,
        summarize: () => MatchSummary,
    ): Promise<MatchSummary> {
        try {
            await accumulator.close();
        } catch (err) {
            error(
                `Final flush failed, ${accumulator.pending} results were not written`,
                err,
            );
        }
        return summarize();
    }
}
