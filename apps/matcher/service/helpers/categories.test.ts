import * as path from "node:path";
import { describe, expect, it } from "vitest";
import {
    CategoryConfigError,
    buildCategoryTable,
    loadCategoryTable,
    selectCategories,
} from "./categories";

const bundledTable = path.join(__dirname, "../../config/categories.yaml");

describe("loadCategoryTable", () => {
    it("reads the bundled radius table", () => {
        const table = loadCategoryTable(bundledTable);

        expect([...table.keys()]).toEqual([
            "high_school",
            "university",
            "company",
        ]);
        expect(table.get("high_school")).toEqual({
            name: "high_school",
            radiusMeters: 200,
            codeField: "fac_cd",
            attributes: ["ctp_cd", "sig_cd", "emd_cd"],
        });
        expect(table.get("university")?.radiusMeters).toBe(300);
        expect(table.get("company")).toMatchObject({
            radiusMeters: 200,
            codeField: "corp_cd",
            timeType: "DAY",
        });
    });

    it("reports a missing file", () => {
        expect(() => loadCategoryTable("/nonexistent/categories.yaml")).toThrow(
            CategoryConfigError,
        );
    });
});

describe("buildCategoryTable", () => {
    it("accepts kilometers and bare meters", () => {
        const table = buildCategoryTable(
            {
                park: { radius: "0.3km", codeField: "park_cd" },
                station: { radius: 150, codeField: "stn_cd" },
            },
            "inline",
        );

        expect(table.get("park")).toEqual({
            name: "park",
            radiusMeters: 300,
            codeField: "park_cd",
            attributes: [],
        });
        expect(table.get("station")?.radiusMeters).toBe(150);
    });

    it("lists every invalid entry", () => {
        try {
            buildCategoryTable(
                { park: { radius: "near", codeField: "park_cd" } },
                "inline",
            );
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(CategoryConfigError);
            if (err instanceof CategoryConfigError) {
                expect(err.issues).toEqual([
                    "park.radius: Invalid distance 'near'",
                ]);
            }
        }
    });

    it("rejects entries without a code field", () => {
        expect(() =>
            buildCategoryTable({ park: { radius: "100m" } }, "inline"),
        ).toThrow("Invalid category table 'inline'");
    });

    it("rejects an empty table", () => {
        expect(() => buildCategoryTable({}, "inline")).toThrow(
            "Category table 'inline' defines no categories",
        );
    });
});

describe("selectCategories", () => {
    const table = buildCategoryTable(
        {
            high_school: { radius: "200m", codeField: "fac_cd" },
            university: { radius: "300m", codeField: "fac_cd" },
        },
        "inline",
    );

    it("keeps request order and drops duplicates", () => {
        const selected = selectCategories(table, [
            "university",
            " high_school ",
            "university",
        ]);

        expect([...selected.keys()]).toEqual(["university", "high_school"]);
    });

    it("names unknown categories", () => {
        expect(() => selectCategories(table, ["hospital"])).toThrow(
            "Unknown categories: hospital (known: high_school, university)",
        );
    });

    it("requires at least one category", () => {
        expect(() => selectCategories(table, [" "])).toThrow(
            "No categories requested",
        );
    });
});
