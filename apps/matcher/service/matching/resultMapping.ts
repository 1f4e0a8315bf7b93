import type { GeoHit } from "@repo/geomatch-core/geo";
import type { CategoryDefinition, MatchQuery, MatchResult } from "../types";
import type { QueryOutcome } from "./retryPolicy";

/**
 * Renders a facility document value as output text.
 */
const textOf = (value: unknown): string | undefined => {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }
    return undefined;
};

/**
 * Copies the category's attribute fields out of a facility document.
 */
const pickAttributes = (
    hit: GeoHit,
    category: CategoryDefinition | undefined,
): Record<string, string> => {
    const attrs: Record<string, string> = {};
    for (const field of category?.attributes ?? []) {
        const value = textOf(hit.source[field]);
        if (value !== undefined) attrs[field] = value;
    }
    return attrs;
};

/**
 * Turns the final outcome of a query into its match result.
 *
 * A candidate farther than the query radius is recorded as unmatched, so a
 * reported distance never exceeds the radius. The facility code falls back
 * to the document id when the category's code field is absent.
 *
 * @param query - The query.
 * @param outcome - Its outcome from the retry policy.
 * @param category - The query's category definition.
 * @returns The match result.
 */
export const toMatchResult = (
    query: MatchQuery,
    outcome: QueryOutcome,
    category: CategoryDefinition | undefined,
): MatchResult => {
    const base = {
        pointId: query.pointId,
        placeType: query.placeType,
        lat: query.lat,
        lon: query.lon,
    };

    if (outcome.state === "terminal-failure") {
        return {
            ...base,
            status: "failed",
            matched: false,
            failureReason: outcome.kind,
            failureMessage: outcome.message,
        };
    }

    const { hit } = outcome;
    if (hit === undefined || hit.distance > query.radiusMeters) {
        return { ...base, status: "unmatched", matched: false };
    }

    const codeField = category?.codeField;
    const facilityCode =
        (codeField !== undefined ? textOf(hit.source[codeField]) : undefined) ??
        hit.id;

    return {
        ...base,
        status: "matched",
        matched: true,
        distance: hit.distance,
        facilityCode,
        facilityAttrs: pickAttributes(hit, category),
    };
};
