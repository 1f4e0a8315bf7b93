import { describe, expect, it } from "vitest";
import type {
    CategoryDefinition,
    CategoryTable,
    Chunk,
    LocationPoint,
} from "../types";
import { BatchDispatcher } from "./batchDispatcher";

const category = (
    name: string,
    radiusMeters: number,
): [string, CategoryDefinition] => [
    name,
    { name, radiusMeters, codeField: "fac_cd", attributes: [] },
];

const schools: CategoryTable = new Map([category("high_school", 200)]);

const chunkOf = (count: number, sequence = 1): Chunk => {
    const points: LocationPoint[] = [];
    for (let i = 1; i <= count; i++) {
        points.push({ pointId: `u-${i}`, lat: 37.5, lon: 127 });
    }
    return { sequence, points };
};

describe("BatchDispatcher", () => {
    it("splits 2,500 points into 1000 + 1000 + 500 in order", () => {
        const dispatcher = new BatchDispatcher(1000, schools);

        const batches = [...dispatcher.split(chunkOf(2500))];

        expect(batches.map((batch) => batch.queries.length)).toEqual([
            1000, 1000, 500,
        ]);
        expect(batches.map((batch) => batch.sequence)).toEqual([1, 2, 3]);
        expect(batches[0].queries[0].pointId).toBe("u-1");
        expect(batches[1].queries[0].pointId).toBe("u-1001");
        expect(batches[2].queries[499].pointId).toBe("u-2500");
    });

    it("shapes each query with the category radius", () => {
        const dispatcher = new BatchDispatcher(10, schools);

        const [batch] = [...dispatcher.split(chunkOf(1))];

        expect(batch.queries).toEqual([
            {
                pointId: "u-1",
                lat: 37.5,
                lon: 127,
                placeType: "high_school",
                radiusMeters: 200,
                resultLimit: 1,
                sort: "distance-asc",
            },
        ]);
    });

    it("nests categories inside each point", () => {
        const dispatcher = new BatchDispatcher(
            3,
            new Map([category("high_school", 200), category("university", 300)]),
        );

        const batches = [...dispatcher.split(chunkOf(2))];

        expect(
            batches.map((batch) =>
                batch.queries.map(
                    (query) => `${query.pointId}/${query.placeType}`,
                ),
            ),
        ).toEqual([
            ["u-1/high_school", "u-1/university", "u-2/high_school"],
            ["u-2/university"],
        ]);
    });

    it("queries only the category named on a point", () => {
        const dispatcher = new BatchDispatcher(
            10,
            new Map([category("high_school", 200), category("university", 300)]),
        );
        const chunk: Chunk = {
            sequence: 1,
            points: [
                {
                    pointId: "u-1",
                    lat: 37.5,
                    lon: 127,
                    categoryFilter: "university",
                },
            ],
        };

        const [batch] = [...dispatcher.split(chunk)];

        expect(batch.queries.map((query) => query.placeType)).toEqual([
            "university",
        ]);
        expect(batch.queries[0].radiusMeters).toBe(300);
    });

    it("numbers batches across chunks and emits nothing for an empty chunk", () => {
        const dispatcher = new BatchDispatcher(2, schools);

        expect([...dispatcher.split(chunkOf(3, 1))]).toHaveLength(2);
        expect([...dispatcher.split(chunkOf(0, 2))]).toHaveLength(0);
        const [next] = [...dispatcher.split(chunkOf(1, 3))];

        expect(next.sequence).toBe(3);
        expect(dispatcher.emitted).toBe(3);
    });

    it("rejects a batch size below one", () => {
        expect(() => new BatchDispatcher(0, schools)).toThrow(
            "Batch size must be a positive integer, got 0",
        );
    });
});
