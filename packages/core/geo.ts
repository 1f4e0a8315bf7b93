/**
 * Contract between the matching engine and the geo-indexed search backend.
 *
 * The engine never talks to OpenSearch directly: it hands a batch of
 * radius-bounded nearest-facility queries to a {@link GeoSearchClient} and
 * receives one result per query, in the same order. Implementations live in
 * `@repo/geomatch-client`; tests provide in-process fakes.
 *
 * @module geo
 */

// ---------------------------------------------------------------------------------
// Failure Taxonomy
// ---------------------------------------------------------------------------------

/**
 * Classification of a failed query or batch.
 *
 * - `timeout`: the per-call timeout elapsed
 * - `connection`: the backend could not be reached (refused, reset, no living node)
 * - `server`: the backend answered with 429 or a 5xx status
 * - `auth`: the backend rejected our credentials (401/403)
 * - `rejected`: the backend refused the query itself (other 4xx)
 * - `malformed`: the backend answered with a body we could not interpret
 * - `unknown`: anything else
 */
export type FailureKind =
    | "timeout"
    | "connection"
    | "server"
    | "auth"
    | "rejected"
    | "malformed"
    | "unknown";

/**
 * Failure kinds worth re-executing a batch for.
 */
export const TRANSIENT_FAILURES: ReadonlySet<FailureKind> = new Set<FailureKind>(
    ["timeout", "connection", "server"],
);

/**
 * Whether a failure kind is transient.
 *
 * @param kind - The failure kind to check.
 * @returns True for timeouts, connectivity failures and 429/5xx answers.
 */
export const isTransientFailure = (kind: FailureKind): boolean =>
    TRANSIENT_FAILURES.has(kind);

/**
 * Error raised by a {@link GeoSearchClient}, either for a whole batch (the
 * promise rejects) or for a single query (carried inside its result).
 */
export class GeoSearchError extends Error {
    /** Classification used by the retry policy */
    readonly kind: FailureKind;
    /** HTTP status reported by the backend, when there was one */
    readonly statusCode: number | undefined;

    /**
     * Creates a new GeoSearchError.
     *
     * @param message - Human-readable error description.
     * @param kind - Failure classification.
     * @param statusCode - HTTP status reported by the backend.
     */
    constructor(message: string, kind: FailureKind, statusCode?: number) {
        super(message);
        this.name = "GeoSearchError";
        this.kind = kind;
        this.statusCode = statusCode;
    }
}

// ---------------------------------------------------------------------------------
// Queries & Results
// ---------------------------------------------------------------------------------

/**
 * A single nearest-facility query.
 */
export type GeoQuery = {
    /** Facility category to search (`place_type` in the index) */
    placeType: string;
    /** Latitude of the origin point */
    lat: number;
    /** Longitude of the origin point */
    lon: number;
    /** Search radius in meters */
    radiusMeters: number;
    /** Maximum number of candidates to return */
    limit: number;
    /** Candidate ordering; only nearest-first is supported */
    sort: "distance-asc";
};

/**
 * The nearest candidate returned for a query.
 */
export type GeoHit = {
    /** Document id of the facility in the index */
    id: string;
    /** Distance from the origin point in meters */
    distance: number;
    /** Stored facility document */
    source: Readonly<Record<string, unknown>>;
};

/**
 * Per-query outcome of a backend round trip.
 */
export type GeoQueryResult =
    | { status: "hit"; hit: GeoHit }
    | { status: "none" }
    | { status: "error"; error: GeoSearchError };

/**
 * Abstraction over the geo-indexed search backend.
 */
export interface GeoSearchClient {
    /**
     * Executes a batch of queries in one round trip.
     *
     * Resolves with exactly one result per query, in query order. A failure of
     * one query is reported in its own result; a failure of the whole round
     * trip rejects with a {@link GeoSearchError}.
     *
     * @param queries - The queries to run.
     */
    execute(queries: readonly GeoQuery[]): Promise<GeoQueryResult[]>;
}
