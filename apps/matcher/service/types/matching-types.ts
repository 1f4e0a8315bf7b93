import type { FailureKind } from "@repo/geomatch-core/geo";

/**
 * A user location read from the input dataset.
 */
export type LocationPoint = {
    /** Identifier of the point (the input's id column) */
    readonly pointId: string;
    /** WGS84 latitude */
    readonly lat: number;
    /** WGS84 longitude */
    readonly lon: number;
    /** Category named on the input row, restricting which categories are queried */
    readonly categoryFilter?: string;
};

/**
 * A bounded window of valid points read in one pass.
 */
export type Chunk = {
    /** 1-based position of the chunk in the input */
    readonly sequence: number;
    /** The points, in input order */
    readonly points: readonly LocationPoint[];
};

/**
 * A nearest-facility query for one point and one category.
 */
export type MatchQuery = {
    readonly pointId: string;
    readonly lat: number;
    readonly lon: number;
    /** Facility category searched */
    readonly placeType: string;
    /** Category radius in meters */
    readonly radiusMeters: number;
    /** Always 1: only the nearest candidate matters */
    readonly resultLimit: 1;
    readonly sort: "distance-asc";
};

/**
 * Queries sent to the backend in one round trip.
 */
export type Batch = {
    /** Run-wide batch number, used in logs */
    readonly sequence: number;
    /** The queries, in point order */
    readonly queries: readonly MatchQuery[];
};

/**
 * Terminal outcome of a query.
 */
export type MatchStatus = "matched" | "unmatched" | "failed";

/**
 * The single recorded outcome of a point for a category.
 */
export type MatchResult = {
    readonly pointId: string;
    readonly placeType: string;
    readonly lat: number;
    readonly lon: number;
    readonly status: MatchStatus;
    /** Whether a facility was found within the radius */
    readonly matched: boolean;
    /** Distance to the facility in meters (matched only) */
    readonly distance?: number;
    /** Facility code, from the category's code field (matched only) */
    readonly facilityCode?: string;
    /** Facility fields listed in the category's attributes (matched only) */
    readonly facilityAttrs?: Readonly<Record<string, string>>;
    /** Why the query failed (failed only) */
    readonly failureReason?: FailureKind;
    /** Backend message for the failure (failed only) */
    readonly failureMessage?: string;
};

/**
 * Lifecycle of a query inside the retry policy.
 */
export type QueryState =
    | "pending"
    | "dispatched"
    | "retrying"
    | "succeeded"
    | "terminal-failure"
    | "recorded";

/**
 * Counters of a matching run.
 *
 * `queries` counts every query taken for execution; each one ends matched,
 * unmatched, failed or abandoned (no result recorded).
 */
export type MatchSummary = {
    /** Data rows read from the input */
    read: number;
    skipped: {
        /** Rows with a missing id or unusable coordinates */
        invalid: number;
        /** Rows excluded by the category or time filter */
        filtered: number;
    };
    queries: number;
    matched: number;
    unmatched: number;
    failed: number;
    /** Queries that never got a recorded result */
    abandoned: number;
    /** Batches executed or abandoned */
    batches: number;
    /** Round trips repeated after a transient failure */
    retries: number;
    /** Rows written to the output (after any matched-only filter) */
    written: number;
    durationMs: number;
    /** matched / queries, 0 for an empty run */
    matchRate: number;
};
