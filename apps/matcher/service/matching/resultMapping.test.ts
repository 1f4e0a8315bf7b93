import { describe, expect, it } from "vitest";
import type { CategoryDefinition, MatchQuery } from "../types";
import { toMatchResult } from "./resultMapping";

const query: MatchQuery = {
    pointId: "u-1",
    lat: 37.5665,
    lon: 126.978,
    placeType: "company",
    radiusMeters: 200,
    resultLimit: 1,
    sort: "distance-asc",
};

const company: CategoryDefinition = {
    name: "company",
    radiusMeters: 200,
    codeField: "corp_cd",
    attributes: ["corp_depth1_cd", "ctp_cd"],
};

describe("toMatchResult", () => {
    it("records a hit inside the radius with its code and attributes", () => {
        const result = toMatchResult(
            query,
            {
                state: "succeeded",
                hit: {
                    id: "doc-7",
                    distance: 85,
                    source: {
                        corp_cd: "C-77",
                        corp_depth1_cd: 3,
                        ctp_cd: "11",
                        name: "ignored",
                    },
                },
            },
            company,
        );

        expect(result).toEqual({
            pointId: "u-1",
            placeType: "company",
            lat: 37.5665,
            lon: 126.978,
            status: "matched",
            matched: true,
            distance: 85,
            facilityCode: "C-77",
            facilityAttrs: { corp_depth1_cd: "3", ctp_cd: "11" },
        });
    });

    it("records an empty answer as unmatched", () => {
        expect(
            toMatchResult(query, { state: "succeeded", hit: undefined }, company),
        ).toEqual({
            pointId: "u-1",
            placeType: "company",
            lat: 37.5665,
            lon: 126.978,
            status: "unmatched",
            matched: false,
        });
    });

    it("treats a candidate beyond the radius as unmatched", () => {
        const result = toMatchResult(
            query,
            {
                state: "succeeded",
                hit: { id: "doc-8", distance: 250, source: { corp_cd: "C-8" } },
            },
            company,
        );

        expect(result.status).toBe("unmatched");
        expect(result.distance).toBeUndefined();
    });

    it("falls back to the document id without a code field", () => {
        const result = toMatchResult(
            query,
            { state: "succeeded", hit: { id: "doc-9", distance: 10, source: {} } },
            company,
        );

        expect(result.facilityCode).toBe("doc-9");
        expect(result.facilityAttrs).toEqual({});
    });

    it("carries the failure kind of a failed query", () => {
        expect(
            toMatchResult(
                query,
                {
                    state: "terminal-failure",
                    kind: "connection",
                    message: "connect ECONNREFUSED",
                },
                company,
            ),
        ).toMatchObject({
            status: "failed",
            matched: false,
            failureReason: "connection",
            failureMessage: "connect ECONNREFUSED",
        });
    });
});
