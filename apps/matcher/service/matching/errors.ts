import type { FailureKind } from "@repo/geomatch-core/geo";
import type { MatchSummary } from "../types";

/**
 * Raised when the backend fails in a way no retry can fix (rejected
 * credentials). Aborts the run.
 */
export class FatalBackendError extends Error {
    /** Failure classification reported by the backend */
    readonly kind: FailureKind;
    /** Sequence of the batch that surfaced the failure */
    readonly batchSequence: number;

    /**
     * @param message - Human-readable error description.
     * @param kind - Failure classification.
     * @param batchSequence - Batch that surfaced the failure.
     * @param cause - The underlying error.
     */
    constructor(
        message: string,
        kind: FailureKind,
        batchSequence: number,
        cause?: unknown,
    ) {
        super(message, { cause });
        this.name = "FatalBackendError";
        this.kind = kind;
        this.batchSequence = batchSequence;
    }
}

/**
 * Raised by the retry policy when a batch is given up while it still has
 * queries to run.
 */
export class BatchAbandonedError extends Error {
    /** Sequence of the abandoned batch */
    readonly batchSequence: number;
    /** Round trips made before the batch was given up */
    readonly attempts: number;

    constructor(batchSequence: number, attempts: number) {
        super(
            `Batch ${batchSequence} was abandoned after ${attempts} attempt(s)`,
        );
        this.name = "BatchAbandonedError";
        this.batchSequence = batchSequence;
        this.attempts = attempts;
    }
}

/**
 * Raised when a query moves between lifecycle states in an order the retry
 * policy does not allow.
 */
export class InvalidTransitionError extends Error {
    constructor(pointId: string, from: string, to: string) {
        super(`Query for point '${pointId}' cannot move from ${from} to ${to}`);
        this.name = "InvalidTransitionError";
    }
}

/**
 * Raised when a run is aborted. Carries the counters reached before the
 * abort; results flushed until then stay in the output.
 */
export class FatalRunError extends Error {
    /** Counters at the time of the abort */
    readonly summary: MatchSummary;

    /**
     * @param message - Human-readable error description.
     * @param summary - Partial run summary.
     * @param cause - The failure that aborted the run.
     */
    constructor(message: string, summary: MatchSummary, cause?: unknown) {
        super(message, { cause });
        this.name = "FatalRunError";
        this.summary = summary;
    }
}
