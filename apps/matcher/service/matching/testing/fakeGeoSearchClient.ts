/**
 * In-process stand-in for the geo search backend, used by the tests.
 */

import type {
    GeoHit,
    GeoQuery,
    GeoQueryResult,
    GeoSearchClient,
    GeoSearchError,
} from "@repo/geomatch-core/geo";

/**
 * What the fake does for one round trip: answer normally (undefined), fail
 * the whole round trip, or replace individual results.
 */
export type FakeRoundTrip =
    | undefined
    | GeoSearchError
    | ((
          results: GeoQueryResult[],
          queries: readonly GeoQuery[],
      ) => GeoQueryResult[]);

export type FakeGeoSearchClientOptions = {
    /** Nearest facility for a query, if any */
    nearest?: (query: GeoQuery) => GeoHit | undefined;
    /** Behaviour per round trip, by 1-based call number */
    script?: (call: number, queries: readonly GeoQuery[]) => FakeRoundTrip;
    /** Milliseconds each round trip takes */
    latencyMs?: number;
};

export class FakeGeoSearchClient implements GeoSearchClient {
    /** Queries of every round trip, in call order */
    readonly calls: GeoQuery[][] = [];
    /** Most round trips seen in flight at once */
    maxInFlight = 0;

    private inFlight = 0;

    constructor(private readonly options: FakeGeoSearchClientOptions = {}) {}

    async execute(queries: readonly GeoQuery[]): Promise<GeoQueryResult[]> {
        this.calls.push([...queries]);
        const call = this.calls.length;

        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            if (this.options.latencyMs !== undefined) {
                await new Promise<void>((resolve) => {
                    setTimeout(resolve, this.options.latencyMs);
                });
            } else {
                await Promise.resolve();
            }

            const plan = this.options.script?.(call, queries);
            if (plan instanceof Error) throw plan;

            const results = queries.map((query): GeoQueryResult => {
                const hit = this.options.nearest?.(query);
                return hit === undefined
                    ? { status: "none" }
                    : { status: "hit", hit };
            });
            return plan === undefined ? results : plan(results, queries);
        } finally {
            this.inFlight--;
        }
    }
}
