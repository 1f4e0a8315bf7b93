import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import type { CategoryDefinition, CategoryTable, Chunk } from "../types";
import { ChunkReader, classifyRow, requiredTimeType } from "./chunkReader";

const definition = (
    name: string,
    radiusMeters: number,
    timeType?: string,
): [string, CategoryDefinition] => [
    name,
    {
        name,
        radiusMeters,
        codeField: "fac_cd",
        attributes: [],
        ...(timeType !== undefined && { timeType }),
    },
];

const schools: CategoryTable = new Map([definition("high_school", 200)]);

const columns = {
    id: "id",
    lat: "lat",
    lon: "lon",
    category: "category",
    timeType: "time_type",
};

const readAll = async (reader: ChunkReader): Promise<Chunk[]> => {
    const chunks: Chunk[] = [];
    for await (const chunk of reader) chunks.push(chunk);
    return chunks;
};

const csv = (lines: string[]): Readable =>
    Readable.from(`${lines.join("\n")}\n`);

describe("classifyRow", () => {
    it("accepts a point with usable coordinates", () => {
        expect(
            classifyRow({ id: " u-1 ", lat: "37.5", lon: "127" }, columns, schools),
        ).toEqual({
            kind: "point",
            point: { pointId: "u-1", lat: 37.5, lon: 127 },
        });
    });

    it.each([
        [{ id: "u-1", lat: "NaN", lon: "127" }],
        [{ id: "u-1", lat: "", lon: "127" }],
        [{ id: "u-1", lat: "37.5" }],
        [{ id: "u-1", lat: "91", lon: "127" }],
        [{ id: "u-1", lat: "37.5", lon: "-180.5" }],
        [{ id: "", lat: "37.5", lon: "127" }],
        [{ id: "u-1", lat: "0x1A", lon: "127" }],
        [{ id: "u-1", lat: "0b11", lon: "127" }],
        [{ id: "u-1", lat: "1e1", lon: "127" }],
        [{ id: "u-1", lat: "37.5", lon: "Infinity" }],
    ])("drops %o as invalid", (row) => {
        expect(classifyRow(row, columns, schools).kind).toBe("invalid");
    });

    it("filters rows naming a category that was not requested", () => {
        expect(
            classifyRow(
                { id: "u-1", lat: "37.5", lon: "127", category: "company" },
                columns,
                schools,
            ),
        ).toEqual({
            kind: "filtered",
            reason: "category 'company' not requested",
        });
    });

    it("restricts a row to the category it names", () => {
        const table = new Map([
            definition("high_school", 200),
            definition("university", 300),
        ]);
        expect(
            classifyRow(
                { id: "u-1", lat: "37.5", lon: "127", category: "university" },
                columns,
                table,
            ),
        ).toEqual({
            kind: "point",
            point: {
                pointId: "u-1",
                lat: 37.5,
                lon: 127,
                categoryFilter: "university",
            },
        });
    });

    it("filters rows with a different time type", () => {
        const companies = new Map([definition("company", 200, "DAY")]);
        const base = { id: "u-1", lat: "37.5", lon: "127" };

        expect(
            classifyRow({ ...base, time_type: "NIGHT" }, columns, companies).kind,
        ).toBe("filtered");
        expect(
            classifyRow({ ...base, time_type: "DAY" }, columns, companies).kind,
        ).toBe("point");
        expect(classifyRow(base, columns, companies).kind).toBe("point");
    });

    it("filters rows with a blank time type when the column is present", () => {
        const companies = new Map([definition("company", 200, "DAY")]);

        expect(
            classifyRow(
                { id: "a", lat: "37", lon: "127", time_type: "" },
                columns,
                companies,
            ),
        ).toEqual({
            kind: "filtered",
            reason: "time type missing, 'DAY' required",
        });
    });

    it("accepts signed and fractional decimal coordinates", () => {
        expect(
            classifyRow({ id: "u-1", lat: "-.5", lon: "+127." }, columns, schools),
        ).toEqual({
            kind: "point",
            point: { pointId: "u-1", lat: -0.5, lon: 127 },
        });
    });
});

describe("requiredTimeType", () => {
    it("applies only when every category agrees", () => {
        const mixed = new Map([
            definition("company", 200, "DAY"),
            definition("high_school", 200),
        ]);
        expect(requiredTimeType(mixed)).toBeUndefined();
        expect(requiredTimeType(mixed, "company")).toBe("DAY");
        expect(
            requiredTimeType(new Map([definition("company", 200, "DAY")])),
        ).toBe("DAY");
    });
});

describe("ChunkReader", () => {
    it("groups valid points into bounded chunks in input order", async () => {
        const reader = new ChunkReader(
            csv([
                "id,lat,lon",
                "u-1,37.50,127.00",
                "u-2,37.51,127.01",
                "u-3,NaN,127.02",
                "u-4,37.53,127.03",
                "u-5,37.54,127.04",
                "u-6,37.55,127.05",
            ]),
            { chunkSize: 2, categories: schools },
        );

        const chunks = await readAll(reader);

        expect(chunks.map((chunk) => chunk.sequence)).toEqual([1, 2, 3]);
        expect(
            chunks.map((chunk) => chunk.points.map((point) => point.pointId)),
        ).toEqual([["u-1", "u-2"], ["u-4", "u-5"], ["u-6"]]);
        expect(reader.stats).toEqual({
            read: 6,
            skippedInvalid: 1,
            skippedFiltered: 0,
        });
    });

    it("ends immediately for a header-only input", async () => {
        const reader = new ChunkReader(csv(["id,lat,lon"]), {
            chunkSize: 10,
            categories: schools,
        });

        expect(await reader.next()).toBeUndefined();
        expect(reader.stats.read).toBe(0);
    });

    it("reads renamed columns and strips a byte order mark", async () => {
        const reader = new ChunkReader(csv(["\uFEFFuser,y,x", "u-1,37.5,127"]), {
            chunkSize: 10,
            categories: schools,
            columns: { id: "user", lat: "y", lon: "x" },
        });

        const chunk = await reader.next();

        expect(chunk?.points).toEqual([{ pointId: "u-1", lat: 37.5, lon: 127 }]);
    });

    it("keeps chunks within the bound across many rows", async () => {
        const lines = ["id,lat,lon"];
        for (let i = 0; i < 250; i++) lines.push(`u-${i},37.5,127`);
        const reader = new ChunkReader(csv(lines), {
            chunkSize: 64,
            categories: schools,
        });

        const chunks = await readAll(reader);

        expect(chunks.map((chunk) => chunk.points.length)).toEqual([
            64, 64, 64, 58,
        ]);
    });

    it("surfaces a source error", async () => {
        const reader = ChunkReader.fromFile("/nonexistent/points.csv", {
            chunkSize: 10,
            categories: schools,
        });

        await expect(reader.next()).rejects.toThrow("ENOENT");
    });

    it("rejects a non-positive chunk size", () => {
        expect(
            () =>
                new ChunkReader(csv(["id,lat,lon"]), {
                    chunkSize: 0,
                    categories: schools,
                }),
        ).toThrow("Chunk size must be a positive integer, got 0");
    });
});
