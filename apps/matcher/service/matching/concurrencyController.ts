/**
 * Bounded worker pool executing batches against the backend.
 *
 * W workers pull batches from one shared source, run each through the retry
 * policy and push the completion onto a bounded channel. A worker whose
 * completion does not fit waits, which in turn stops it from pulling more
 * batches. Completions arrive in whatever order batches finish; the single
 * consumer of {@link ConcurrencyController.run} owns every counter.
 *
 * @module concurrencyController
 */

import type { FailureKind } from "@repo/geomatch-core/geo";
import debug from "debug";
import { VERBOSE } from "../config";
import { BoundedChannel } from "../helpers/channel";
import type { CircuitBreaker } from "../helpers/circuitBreaker";
import type { Batch, CategoryTable, MatchResult } from "../types";
import { toMatchResult } from "./resultMapping";
import type { BatchExecution } from "./retryPolicy";

const logger = debug("matcher:pool");
const error = debug("error:pool");

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Anything that can run a batch to completion (the retry policy).
 */
export interface BatchRunner {
    run(batch: Batch, signal?: AbortSignal): Promise<BatchExecution>;
}

/**
 * Outcome of one batch, as seen by the consumer.
 */
export type BatchCompletion =
    | {
          kind: "completed";
          batch: Batch;
          /** One result per query, in query order */
          results: MatchResult[];
          /** Round trips made */
          attempts: number;
          /** Transient failure kind that exhausted retries */
          exhaustedKind?: FailureKind;
      }
    | {
          kind: "fatal";
          batch: Batch;
          error: Error;
      };

/**
 * Work given up by {@link ConcurrencyController.abandon}.
 */
export type AbandonedWork = {
    batches: number;
    queries: number;
};

export type ConcurrencyControllerOptions = {
    /** Concurrent batch executions (W) */
    concurrency: number;
    /** Completions buffered before workers wait */
    queueCapacity: number;
    /** Categories of the run, for result mapping */
    categories: CategoryTable;
    /** Circuit counting batches lost to connectivity failures */
    circuit?: CircuitBreaker;
};

/** Failure kinds that count against the circuit */
const CONNECTIVITY_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>([
    "connection",
    "timeout",
]);

// ---------------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------------

export class ConcurrencyController {
    private readonly concurrency: number;
    private readonly queueCapacity: number;
    private readonly categories: CategoryTable;
    private readonly circuit: CircuitBreaker | undefined;

    /** Batches taken by a worker whose completion the consumer has not received */
    private readonly inFlight = new Map<number, Batch>();
    /** Aborted by {@link abandon} so runners stop retrying */
    private readonly cancellation = new AbortController();

    private channel: BoundedChannel<BatchCompletion> | undefined;
    private stopped = false;
    private abandoned = false;

    /**
     * @param runner - Executes batches (usually a RetryPolicy).
     * @param options - Pool options.
     */
    constructor(
        private readonly runner: BatchRunner,
        options: ConcurrencyControllerOptions,
    ) {
        if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
            throw new Error(
                `Concurrency must be a positive integer, got ${options.concurrency}`,
            );
        }
        if (
            !Number.isInteger(options.queueCapacity) ||
            options.queueCapacity < 1
        ) {
            throw new Error(
                `Queue capacity must be a positive integer, got ${options.queueCapacity}`,
            );
        }
        this.concurrency = options.concurrency;
        this.queueCapacity = options.queueCapacity;
        this.categories = options.categories;
        this.circuit = options.circuit;
    }

    /** Batches currently held by workers. */
    get inFlightCount(): number {
        return this.inFlight.size;
    }

    /**
     * Executes every batch of the source and yields their completions.
     *
     * @param batches - Batch source, shared by the workers.
     * @returns Completions in arrival order.
     * @throws {Error} If the batch source fails.
     */
    async *run(
        batches: Iterable<Batch> | AsyncIterable<Batch>,
    ): AsyncGenerator<BatchCompletion> {
        const source = toAsyncIterator(batches);
        const channel = new BoundedChannel<BatchCompletion>(this.queueCapacity);
        this.channel = channel;

        let sourceError: unknown;
        let sourceFailed = false;

        const worker = async (id: number): Promise<void> => {
            while (!this.stopped) {
                let next: IteratorResult<Batch>;
                try {
                    next = await source.next();
                } catch (err) {
                    if (!sourceFailed) {
                        sourceFailed = true;
                        sourceError = err;
                    }
                    this.stop();
                    return;
                }
                if (next.done || this.stopped) return;

                const batch = next.value;
                this.inFlight.set(batch.sequence, batch);
                if (VERBOSE)
                    logger(`worker ${id} took batch ${batch.sequence}`);

                const completion = await this.execute(batch);
                if (!(await channel.push(completion))) return;
            }
        };

        const workers = Array.from({ length: this.concurrency }, (_, id) =>
            worker(id),
        );

        // The channel ends once every worker has returned (or on abandon)
        void Promise.all(workers).then(
            () => channel.close(),
            (err: unknown) => {
                error("batch worker crashed", err);
                if (!sourceFailed) {
                    sourceFailed = true;
                    sourceError = err;
                }
                this.stop();
                channel.close();
            },
        );

        try {
            for await (const completion of channel) {
                this.inFlight.delete(completion.batch.sequence);
                yield completion;
            }
        } finally {
            this.stop();
            channel.close();
        }

        if (sourceFailed) throw sourceError;
    }

    /**
     * Stops workers from taking new batches. Batches already taken finish.
     */
    stop(): void {
        if (!this.stopped && VERBOSE) logger("stopping batch submission");
        this.stopped = true;
    }

    /**
     * Gives up on every batch whose completion the consumer has not received,
     * including completions still buffered in the channel. Runners still
     * working on a batch are told to stop. Iteration of {@link run} ends.
     *
     * @returns The work given up.
     */
    abandon(): AbandonedWork {
        this.stop();
        this.abandoned = true;

        const work: AbandonedWork = { batches: 0, queries: 0 };
        for (const batch of this.inFlight.values()) {
            work.batches++;
            work.queries += batch.queries.length;
        }
        this.inFlight.clear();
        this.channel?.discard();
        this.cancellation.abort();

        if (work.batches > 0) {
            error(
                `Abandoned ${work.batches} in-flight batches (${work.queries} queries) without results`,
            );
        }
        return work;
    }

    /**
     * Runs one batch, converting every failure into a completion.
     */
    private async execute(batch: Batch): Promise<BatchCompletion> {
        if (this.circuit && !this.circuit.canExecute()) {
            return { kind: "fatal", batch, error: this.circuit.openError() };
        }

        let execution: BatchExecution;
        try {
            execution = await this.runner.run(
                batch,
                this.cancellation.signal,
            );
        } catch (err) {
            return {
                kind: "fatal",
                batch,
                error: err instanceof Error ? err : new Error(String(err)),
            };
        }

        if (this.circuit && !this.abandoned) {
            if (
                execution.exhaustedKind !== undefined &&
                CONNECTIVITY_FAILURES.has(execution.exhaustedKind)
            ) {
                this.circuit.recordFailure(
                    `batch ${batch.sequence} exhausted retries (${execution.exhaustedKind})`,
                );
            } else {
                this.circuit.recordSuccess();
            }
        }

        const results = batch.queries.map((query, index) =>
            toMatchResult(
                query,
                execution.outcomes[index],
                this.categories.get(query.placeType),
            ),
        );

        return {
            kind: "completed",
            batch,
            results,
            attempts: execution.attempts,
            ...(execution.exhaustedKind !== undefined && {
                exhaustedKind: execution.exhaustedKind,
            }),
        };
    }
}

/**
 * Gives sync and async batch sources the same shape.
 */
const toAsyncIterator = (
    batches: Iterable<Batch> | AsyncIterable<Batch>,
): AsyncIterator<Batch> => {
    if (Symbol.asyncIterator in batches) {
        return batches[Symbol.asyncIterator]();
    }
    const iterator = batches[Symbol.iterator]();
    return {
        next: async () => iterator.next(),
    };
};
