/**
 * OpenSearch implementation of the geo search contract.
 *
 * Each batch becomes a single `_msearch` request. Every query is a
 * `place_type` term filter combined with a `geo_distance` filter, sorted by
 * `_geo_distance` ascending so the first hit is the nearest facility and
 * `hit.sort[0]` is its distance in meters.
 *
 * @module geoSearch
 */

import type { Client } from "@opensearch-project/opensearch";
import { errors } from "@opensearch-project/opensearch";
import {
    type FailureKind,
    type GeoHit,
    type GeoQuery,
    type GeoQueryResult,
    type GeoSearchClient,
    GeoSearchError,
} from "@repo/geomatch-core/geo";
import { formatDistance } from "@repo/geomatch-core/utils/distance";
import debug from "debug";
import { VERBOSE } from "./elasticsearch";

/** Logger for geo search requests */
const logger = debug("matcher:search");

/** Logger for geo search failures */
const error = debug("error:search");

// ---------------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------------

/**
 * Body of an `_msearch` request: alternating header and query lines.
 */
export type MsearchBody = Array<Record<string, unknown>>;

/**
 * The slice of the OpenSearch client this module depends on.
 */
export type MsearchTransport = {
    msearch(
        params: { body: MsearchBody },
        options: { requestTimeout: number; maxRetries: number },
    ): Promise<{ body: unknown }>;
};

/**
 * Options for {@link OpenSearchGeoClient}.
 */
export type OpenSearchGeoClientOptions = {
    /** Name of the facility index */
    index: string;
    /** Per-call timeout in milliseconds */
    requestTimeout: number;
    /** Field holding the facility's `geo_point` */
    locationField?: string;
    /** Field holding the facility category */
    placeTypeField?: string;
};

// ---------------------------------------------------------------------------------
// Request Building
// ---------------------------------------------------------------------------------

/**
 * Builds the `_msearch` body for a batch of queries.
 *
 * @param queries - The queries of the batch.
 * @param options - Index and field names.
 * @returns Alternating header/body lines, two per query.
 */
export const buildMsearchBody = (
    queries: readonly GeoQuery[],
    {
        index,
        locationField = "location",
        placeTypeField = "place_type",
    }: Pick<
        OpenSearchGeoClientOptions,
        "index" | "locationField" | "placeTypeField"
    >,
): MsearchBody => {
    const body: MsearchBody = [];

    for (const query of queries) {
        const origin = { lat: query.lat, lon: query.lon };

        body.push({ index });
        body.push({
            query: {
                bool: {
                    must: [
                        { term: { [placeTypeField]: query.placeType } },
                        {
                            geo_distance: {
                                distance: formatDistance(query.radiusMeters),
                                [locationField]: origin,
                            },
                        },
                    ],
                },
            },
            sort: [
                {
                    _geo_distance: {
                        [locationField]: origin,
                        order: "asc",
                        unit: "m",
                    },
                },
            ],
            size: query.limit,
            _source: true,
        });
    }

    return body;
};

// ---------------------------------------------------------------------------------
// Response Parsing
// ---------------------------------------------------------------------------------

/**
 * Narrows an unknown value to a plain object.
 */
const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Maps an HTTP status to a failure kind.
 *
 * @param statusCode - HTTP status reported by the backend.
 * @returns The matching failure kind.
 */
export const classifyStatus = (statusCode: number): FailureKind => {
    if (statusCode === 401 || statusCode === 403) return "auth";
    if (statusCode === 408) return "timeout";
    if (statusCode === 429 || statusCode >= 500) return "server";
    if (statusCode >= 400) return "rejected";
    return "unknown";
};

/**
 * Describes a per-query `error` object from an `_msearch` response.
 */
const describeQueryError = (value: unknown): string => {
    if (isRecord(value)) {
        const type = typeof value.type === "string" ? value.type : "error";
        const reason = typeof value.reason === "string" ? value.reason : "";
        return reason ? `${type}: ${reason}` : type;
    }
    return String(value);
};

/**
 * Turns one entry of `responses` into a query result.
 *
 * @param entry - The raw response entry.
 * @returns The query result.
 */
const parseQueryResponse = (entry: unknown): GeoQueryResult => {
    if (!isRecord(entry)) {
        return {
            status: "error",
            error: new GeoSearchError("Response entry is not an object", "malformed"),
        };
    }

    if (entry.error !== undefined) {
        const statusCode =
            typeof entry.status === "number" ? entry.status : undefined;
        return {
            status: "error",
            error: new GeoSearchError(
                describeQueryError(entry.error),
                statusCode === undefined ? "unknown" : classifyStatus(statusCode),
                statusCode,
            ),
        };
    }

    const hits = isRecord(entry.hits) ? entry.hits.hits : undefined;
    if (!Array.isArray(hits)) {
        return {
            status: "error",
            error: new GeoSearchError("Response entry has no hits", "malformed"),
        };
    }

    if (hits.length === 0) {
        return { status: "none" };
    }

    const first: unknown = hits[0];
    if (!isRecord(first) || !Array.isArray(first.sort)) {
        return {
            status: "error",
            error: new GeoSearchError("Hit carries no sort distance", "malformed"),
        };
    }

    const distance: unknown = first.sort[0];
    if (typeof distance !== "number" || !Number.isFinite(distance)) {
        return {
            status: "error",
            error: new GeoSearchError("Hit distance is not numeric", "malformed"),
        };
    }

    const hit: GeoHit = {
        id: typeof first._id === "string" ? first._id : "",
        distance,
        source: isRecord(first._source) ? first._source : {},
    };

    return { status: "hit", hit };
};

/**
 * Parses an `_msearch` response body into one result per query.
 *
 * @param body - The response body.
 * @param expected - Number of queries sent.
 * @returns The per-query results.
 * @throws {GeoSearchError} If the body is not a response to this batch.
 */
export const parseMsearchResponse = (
    body: unknown,
    expected: number,
): GeoQueryResult[] => {
    if (!isRecord(body) || !Array.isArray(body.responses)) {
        throw new GeoSearchError("Response carries no 'responses'", "malformed");
    }

    if (body.responses.length !== expected) {
        throw new GeoSearchError(
            `Expected ${expected} responses, got ${body.responses.length}`,
            "malformed",
        );
    }

    return body.responses.map(parseQueryResponse);
};

/**
 * Classifies an error thrown by the OpenSearch client for a whole request.
 *
 * @param err - The thrown error.
 * @returns A {@link GeoSearchError} carrying the failure kind.
 */
export const classifyOpenSearchError = (err: unknown): GeoSearchError => {
    if (err instanceof GeoSearchError) return err;

    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof errors.TimeoutError) {
        return new GeoSearchError(message, "timeout");
    }
    if (
        err instanceof errors.ConnectionError ||
        err instanceof errors.NoLivingConnectionsError
    ) {
        return new GeoSearchError(message, "connection");
    }
    if (err instanceof errors.ResponseError) {
        const { statusCode } = err;
        return new GeoSearchError(
            message,
            typeof statusCode === "number" ? classifyStatus(statusCode) : "unknown",
            typeof statusCode === "number" ? statusCode : undefined,
        );
    }
    if (err instanceof errors.DeserializationError) {
        return new GeoSearchError(message, "malformed");
    }

    // Raw socket errors that escaped the transport
    const lowered = message.toLowerCase();
    if (lowered.includes("timeout") || lowered.includes("timed out")) {
        return new GeoSearchError(message, "timeout");
    }
    if (
        lowered.includes("econnrefused") ||
        lowered.includes("econnreset") ||
        lowered.includes("socket hang up")
    ) {
        return new GeoSearchError(message, "connection");
    }

    return new GeoSearchError(message, "unknown");
};

// ---------------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------------

/**
 * Geo search client backed by OpenSearch `_msearch`.
 */
export class OpenSearchGeoClient implements GeoSearchClient {
    private readonly transport: MsearchTransport;
    private readonly options: OpenSearchGeoClientOptions;

    /**
     * @param transport - Anything exposing `msearch`, normally the OpenSearch client.
     * @param options - Index name, timeout and field names.
     */
    constructor(transport: MsearchTransport, options: OpenSearchGeoClientOptions) {
        this.transport = transport;
        this.options = options;
    }

    /**
     * Runs the batch as one `_msearch` round trip.
     *
     * Transport-level retries are disabled: re-execution is the retry policy's job.
     */
    public async execute(queries: readonly GeoQuery[]): Promise<GeoQueryResult[]> {
        if (queries.length === 0) return [];

        const body = buildMsearchBody(queries, this.options);

        let responseBody: unknown;
        try {
            const response = await this.transport.msearch(
                { body },
                { requestTimeout: this.options.requestTimeout, maxRetries: 0 },
            );
            responseBody = response.body;
        } catch (err) {
            const classified = classifyOpenSearchError(err);
            error(
                `msearch of ${queries.length} queries failed (${classified.kind}): ${classified.message}`,
            );
            throw classified;
        }

        const results = parseMsearchResponse(responseBody, queries.length);
        if (VERBOSE) logger(`msearch returned ${results.length} responses`);
        return results;
    }
}

/**
 * Wraps a connected OpenSearch client as a {@link GeoSearchClient}.
 *
 * @param client - Connected OpenSearch client.
 * @param options - Index name, timeout and field names.
 * @returns The geo search client.
 */
export const createGeoSearchClient = (
    client: Client,
    options: OpenSearchGeoClientOptions,
): GeoSearchClient =>
    new OpenSearchGeoClient(
        {
            msearch: (params, requestOptions) =>
                client.msearch(params, requestOptions),
        },
        options,
    );
