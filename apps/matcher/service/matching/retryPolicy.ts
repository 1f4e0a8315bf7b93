/**
 * Per-batch retry policy.
 *
 * A batch is executed as one backend round trip. Queries that come back with
 * a transient failure (or whose whole round trip failed transiently) are
 * retried by re-executing the batch after a backoff delay; only queries
 * still waiting for a retry take the new attempt's results. Every other
 * failure is terminal for its query. Rejected credentials abort the run.
 *
 * Query lifecycle:
 *
 *   pending -> dispatched -> succeeded ---------> recorded
 *                         -> retrying -> dispatched
 *                         -> terminal-failure --> recorded
 *
 * @module retryPolicy
 */

import {
    type FailureKind,
    type GeoHit,
    type GeoQuery,
    type GeoQueryResult,
    type GeoSearchClient,
    GeoSearchError,
    isTransientFailure,
} from "@repo/geomatch-core/geo";
import debug from "debug";
import { VERBOSE } from "../config";
import type { Batch, MatchQuery, QueryState } from "../types";
import {
    BatchAbandonedError,
    FatalBackendError,
    InvalidTransitionError,
} from "./errors";

const logger = debug("matcher:retry");
const error = debug("error:retry");

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Final outcome of a query.
 */
export type QueryOutcome =
    | { state: "succeeded"; hit: GeoHit | undefined }
    | { state: "terminal-failure"; kind: FailureKind; message: string };

/**
 * Result of running a batch through the policy.
 */
export type BatchExecution = {
    readonly batch: Batch;
    /** One outcome per query, aligned with `batch.queries` */
    readonly outcomes: readonly QueryOutcome[];
    /** Round trips made (1 + retries) */
    readonly attempts: number;
    /** Transient failure kind that exhausted the retries of some query */
    readonly exhaustedKind?: FailureKind;
};

/**
 * A lifecycle change of one query.
 */
export type QueryTransition = {
    batchSequence: number;
    index: number;
    pointId: string;
    from: QueryState;
    to: QueryState;
};

export type RetryPolicyOptions = {
    /** Re-executions allowed after the first attempt */
    maxRetries: number;
    /** Delay before retry `n` (1-based) */
    backoff?: (retry: number) => number;
    /** Waits for the given delay, returning early once `signal` aborts; replaceable in tests */
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    /** Observer of every query lifecycle change */
    onTransition?: (transition: QueryTransition) => void;
};

// ---------------------------------------------------------------------------------
// Backoff
// ---------------------------------------------------------------------------------

/**
 * Builds a linear backoff: the first retry waits `initial`, each later one
 * `increment` more, never more than `max`.
 *
 * @param initial - First delay in milliseconds.
 * @param increment - Added per retry.
 * @param max - Upper bound.
 * @returns The backoff function.
 */
export const linearBackoff =
    (initial: number, increment: number, max: number) =>
    (retry: number): number =>
        Math.min(max, initial + increment * Math.max(0, retry - 1));

const defaultSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve) => {
        const wake = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener("abort", wake);
            resolve();
        };
        const timer = setTimeout(wake, ms);
        if (signal?.aborted) wake();
        else signal?.addEventListener("abort", wake, { once: true });
    });

// ---------------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------------

/**
 * Allowed lifecycle transitions.
 */
export const QUERY_TRANSITIONS: Readonly<
    Record<QueryState, readonly QueryState[]>
> = {
    pending: ["dispatched"],
    dispatched: ["succeeded", "retrying", "terminal-failure"],
    retrying: ["dispatched"],
    succeeded: ["recorded"],
    "terminal-failure": ["recorded"],
    recorded: [],
};

/**
 * Converts a match query to the backend's query shape.
 */
const toGeoQuery = (query: MatchQuery): GeoQuery => ({
    placeType: query.placeType,
    lat: query.lat,
    lon: query.lon,
    radiusMeters: query.radiusMeters,
    limit: query.resultLimit,
    sort: query.sort,
});

const messageOf = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);

// ---------------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------------

export class RetryPolicy {
    private readonly maxRetries: number;
    private readonly backoff: (retry: number) => number;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
    private readonly onTransition:
        | ((transition: QueryTransition) => void)
        | undefined;

    /**
     * @param client - Backend the batches are executed against.
     * @param options - Retry options.
     */
    constructor(
        private readonly client: GeoSearchClient,
        options: RetryPolicyOptions,
    ) {
        if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
            throw new Error(
                `Max retries must be a non-negative integer, got ${options.maxRetries}`,
            );
        }
        this.maxRetries = options.maxRetries;
        this.backoff = options.backoff ?? linearBackoff(1000, 1000, 30000);
        this.sleep = options.sleep ?? defaultSleep;
        this.onTransition = options.onTransition;
    }

    /**
     * Runs a batch to completion: every query ends succeeded or failed.
     *
     * @param batch - The batch to execute.
     * @param signal - Aborted when the batch is given up; no round trip or
     * backoff starts after that.
     * @returns One outcome per query.
     * @throws {FatalBackendError} If the backend rejects our credentials.
     * @throws {BatchAbandonedError} If `signal` aborts before the batch settles.
     */
    async run(batch: Batch, signal?: AbortSignal): Promise<BatchExecution> {
        const { queries } = batch;
        const states: QueryState[] = queries.map(() => "pending");
        const outcomes: Array<QueryOutcome | undefined> = queries.map(
            () => undefined,
        );
        const geoQueries = queries.map(toGeoQuery);

        const move = (index: number, to: QueryState): void => {
            const from = states[index];
            if (!QUERY_TRANSITIONS[from].includes(to)) {
                throw new InvalidTransitionError(
                    queries[index].pointId,
                    from,
                    to,
                );
            }
            states[index] = to;
            this.onTransition?.({
                batchSequence: batch.sequence,
                index,
                pointId: queries[index].pointId,
                from,
                to,
            });
        };

        let active = queries.map((_, index) => index);
        let attempts = 0;
        let exhaustedKind: FailureKind | undefined;

        const throwIfAbandoned = (): void => {
            if (signal?.aborted) {
                if (VERBOSE)
                    logger(
                        `Batch ${batch.sequence} abandoned after ${attempts} attempt(s)`,
                    );
                throw new BatchAbandonedError(batch.sequence, attempts);
            }
        };

        while (active.length > 0) {
            throwIfAbandoned();
            for (const index of active) move(index, "dispatched");
            attempts++;

            const results = await this.execute(batch, geoQueries);
            const retriesLeft = attempts - 1 < this.maxRetries;
            const retrying: number[] = [];

            for (const index of active) {
                const result = results[index];

                if (result.status !== "error") {
                    move(index, "succeeded");
                    outcomes[index] = {
                        state: "succeeded",
                        hit: result.status === "hit" ? result.hit : undefined,
                    };
                    continue;
                }

                const { kind, message } = result.error;
                if (kind === "auth") {
                    throw new FatalBackendError(
                        `Backend rejected credentials on batch ${batch.sequence}: ${message}`,
                        kind,
                        batch.sequence,
                        result.error,
                    );
                }

                if (isTransientFailure(kind) && retriesLeft) {
                    move(index, "retrying");
                    retrying.push(index);
                    continue;
                }

                move(index, "terminal-failure");
                outcomes[index] = { state: "terminal-failure", kind, message };
                if (isTransientFailure(kind)) exhaustedKind = kind;
            }

            if (retrying.length > 0) {
                const delay = this.backoff(attempts);
                error(
                    `Batch ${batch.sequence}: ${retrying.length}/${queries.length} queries failed transiently (attempt ${attempts}/${this.maxRetries + 1}), retrying in ${delay}ms`,
                );
                await (signal === undefined
                    ? this.sleep(delay)
                    : this.sleep(delay, signal));
            }
            active = retrying;
        }

        const settled: QueryOutcome[] = [];
        for (const [index, outcome] of outcomes.entries()) {
            if (outcome === undefined) {
                throw new Error(
                    `Query ${index} of batch ${batch.sequence} has no outcome`,
                );
            }
            move(index, "recorded");
            settled.push(outcome);
        }

        if (VERBOSE)
            logger(
                `Batch ${batch.sequence} settled after ${attempts} attempt(s)`,
            );

        return {
            batch,
            outcomes: settled,
            attempts,
            ...(exhaustedKind !== undefined && { exhaustedKind }),
        };
    }

    /**
     * Executes one round trip, turning a failure of the whole round trip
     * into an error result for every query.
     */
    private async execute(
        batch: Batch,
        geoQueries: readonly GeoQuery[],
    ): Promise<GeoQueryResult[]> {
        let batchError: GeoSearchError;

        try {
            const results = await this.client.execute(geoQueries);
            if (results.length === geoQueries.length) return results;

            batchError = new GeoSearchError(
                `Expected ${geoQueries.length} results, got ${results.length}`,
                "malformed",
            );
        } catch (err) {
            batchError =
                err instanceof GeoSearchError
                    ? err
                    : new GeoSearchError(messageOf(err), "unknown");
        }

        error(
            `Batch ${batch.sequence} round trip failed (${batchError.kind}): ${batchError.message}`,
        );
        return geoQueries.map(
            (): GeoQueryResult => ({ status: "error", error: batchError }),
        );
    }
}
