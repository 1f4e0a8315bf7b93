import { describe, expect, it } from "vitest";
import { formatDistance, parseDistance } from "./distance";

describe("parseDistance", () => {
    it("reads meters and kilometers", () => {
        expect(parseDistance("200m")).toBe(200);
        expect(parseDistance("0.3km")).toBe(300);
        expect(parseDistance("1.5 KM")).toBe(1500);
    });

    it("treats bare numbers as meters", () => {
        expect(parseDistance(250)).toBe(250);
        expect(parseDistance("75")).toBe(75);
    });

    it("rejects zero, negative and unparsable distances", () => {
        expect(() => parseDistance(0)).toThrow("Invalid distance '0'");
        expect(() => parseDistance(-5)).toThrow("Invalid distance '-5'");
        expect(() => parseDistance("0m")).toThrow("Invalid distance '0m'");
        expect(() => parseDistance("two hundred")).toThrow(
            "Invalid distance 'two hundred'",
        );
        expect(() => parseDistance(Number.NaN)).toThrow();
    });
});

describe("formatDistance", () => {
    it("appends the meter unit", () => {
        expect(formatDistance(300)).toBe("300m");
    });
});
