/**
 * Circuit breaker for a matching run.
 *
 * Counts batches whose retries were exhausted by a connectivity failure. Once
 * the count inside the sliding window reaches the threshold the circuit opens
 * and stays open: a run that has lost its backend is aborted rather than
 * recording every remaining point as failed.
 *
 * Circuit States:
 * - CLOSED: Normal operation, batches are dispatched
 * - OPEN: Failure threshold reached, batches complete as fatal
 *
 * @module circuitBreaker
 */

import debug from "debug";
import { VERBOSE } from "../config";

// ---------------------------------------------------------------------------------
// Debug Loggers
// ---------------------------------------------------------------------------------

/** Logger for circuit breaker operations */
const logger = debug("matcher:circuit");

/** Logger for circuit breaker errors */
const error = debug("error:circuit");

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Possible states of the circuit breaker.
 */
export type CircuitState = "CLOSED" | "OPEN";

/**
 * Configuration options for the circuit breaker.
 */
export type CircuitBreakerConfig = {
    /** Number of failures in the window that opens the circuit */
    failureThreshold: number;
    /** Duration of the sliding window for failure tracking */
    windowMs: number;
    /** Name identifier for this circuit (for logging) */
    name: string;
    /** Clock, replaceable in tests */
    now: () => number;
};

/**
 * Statistics about circuit breaker activity.
 */
export type CircuitBreakerStats = {
    /** Current state of the circuit */
    state: CircuitState;
    /** Total number of recorded successes */
    successes: number;
    /** Total number of recorded failures */
    failures: number;
    /** Number of batches rejected because the circuit was open */
    rejections: number;
    /** Failures inside the current window */
    currentFailureCount: number;
    /** Timestamp when the circuit opened */
    openedAt: number | undefined;
};

/**
 * Error reported for a batch rejected by an open circuit.
 */
export class CircuitOpenError extends Error {
    /** The name of the circuit that rejected the batch */
    readonly circuitName: string;
    /** Failures that opened the circuit */
    readonly failureCount: number;

    /**
     * Creates a new CircuitOpenError.
     *
     * @param circuitName - Name of the circuit that is open.
     * @param failureCount - Failures counted when it opened.
     */
    constructor(circuitName: string, failureCount: number) {
        super(
            `Circuit '${circuitName}' is OPEN after ${failureCount} exhausted connectivity failures.`,
        );
        this.name = "CircuitOpenError";
        this.circuitName = circuitName;
        this.failureCount = failureCount;
    }
}

// ---------------------------------------------------------------------------------
// Circuit Breaker Implementation
// ---------------------------------------------------------------------------------

/**
 * Sliding-window circuit breaker.
 */
export class CircuitBreaker {
    /** Current state of the circuit */
    private state: CircuitState = "CLOSED";

    /** Configuration for this circuit breaker */
    private readonly config: CircuitBreakerConfig;

    /** Timestamps of failures inside the window */
    private failureTimestamps: number[] = [];

    private totalSuccesses = 0;
    private totalFailures = 0;
    private totalRejections = 0;

    /** Timestamp when the circuit was opened */
    private openedAt: number | undefined;

    /**
     * Creates a new circuit breaker with the specified configuration.
     *
     * @param config - Partial configuration to override defaults.
     */
    constructor(config?: Partial<CircuitBreakerConfig>) {
        this.config = {
            failureThreshold: config?.failureThreshold ?? 5,
            windowMs: config?.windowMs ?? 60000,
            name: config?.name ?? "default",
            now: config?.now ?? Date.now,
        };

        if (this.config.failureThreshold < 1) {
            throw new Error(
                `Circuit failure threshold must be at least 1, got ${this.config.failureThreshold}`,
            );
        }

        if (VERBOSE)
            logger(`Circuit breaker '${this.config.name}' initialized:`, {
                failureThreshold: this.config.failureThreshold,
                windowMs: this.config.windowMs,
            });
    }

    /**
     * Determines whether a batch may be dispatched. Counts a rejection when
     * the circuit is open.
     *
     * @returns True if the circuit is closed.
     */
    public canExecute(): boolean {
        if (this.state === "OPEN") {
            this.totalRejections++;
            return false;
        }
        return true;
    }

    /**
     * Records a batch that completed without a connectivity failure.
     */
    public recordSuccess(): void {
        this.totalSuccesses++;
    }

    /**
     * Records a batch whose retries were exhausted by a connectivity failure
     * and opens the circuit when the threshold is reached.
     *
     * @param reason - Description of the failure, for logs.
     */
    public recordFailure(reason: string): void {
        const now = this.config.now();
        this.totalFailures++;
        this.failureTimestamps.push(now);
        this.prune(now);

        error(`Circuit '${this.config.name}' recorded failure: ${reason}`);

        if (
            this.state === "CLOSED" &&
            this.failureTimestamps.length >= this.config.failureThreshold
        ) {
            this.state = "OPEN";
            this.openedAt = now;
            logger(
                `Circuit '${this.config.name}' transitioned CLOSED -> OPEN (${this.failureTimestamps.length} failures in ${this.config.windowMs}ms)`,
            );
        }
    }

    /**
     * Builds the error reported for batches rejected by the open circuit.
     *
     * @returns The error.
     */
    public openError(): CircuitOpenError {
        return new CircuitOpenError(
            this.config.name,
            this.failureTimestamps.length,
        );
    }

    /**
     * Removes failures outside the sliding window.
     *
     * @param now - Current time.
     */
    private prune(now: number): void {
        const cutoff = now - this.config.windowMs;
        this.failureTimestamps = this.failureTimestamps.filter(
            (timestamp) => timestamp >= cutoff,
        );
    }

    /**
     * Gets the current state of the circuit.
     *
     * @returns The current circuit state.
     */
    public getState(): CircuitState {
        return this.state;
    }

    /**
     * Gets statistics about the circuit breaker.
     *
     * @returns Statistics object.
     */
    public getStats(): CircuitBreakerStats {
        if (this.state === "CLOSED") this.prune(this.config.now());

        return {
            state: this.state,
            successes: this.totalSuccesses,
            failures: this.totalFailures,
            rejections: this.totalRejections,
            currentFailureCount: this.failureTimestamps.length,
            openedAt: this.openedAt,
        };
    }
}
