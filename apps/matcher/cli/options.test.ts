import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { loadMatcherConfig } from "../service/config";
import { applyRunOverrides, integerAtLeast } from "./options";

describe("integerAtLeast", () => {
    it("accepts integers at or above the minimum", () => {
        expect(integerAtLeast(1)("250")).toBe(250);
        expect(integerAtLeast(0)("0")).toBe(0);
    });

    it.each(["0", "-3", "1.5", "many", ""])("rejects '%s'", (value) => {
        expect(() => integerAtLeast(1)(value)).toThrow(InvalidArgumentError);
    });
});

describe("applyRunOverrides", () => {
    it("keeps the environment values when no flag is given", () => {
        const config = loadMatcherConfig({ GEOMATCH_BATCH_SIZE: "500" });

        expect(applyRunOverrides(config, {}, {})).toEqual(config);
    });

    it("replaces overridden values", () => {
        const config = loadMatcherConfig({});

        const effective = applyRunOverrides(
            config,
            { batchSize: 200, maxRetries: 0, index: "places-test" },
            {},
        );

        expect(effective).toMatchObject({
            batchSize: 200,
            maxRetries: 0,
            indexName: "places-test",
            chunkSize: 50000,
        });
    });

    it("sizes the queue from an overridden concurrency", () => {
        const config = loadMatcherConfig({});

        expect(
            applyRunOverrides(config, { concurrency: 4 }, {}).queueCapacity,
        ).toBe(8);
    });

    it("keeps an explicit queue capacity", () => {
        const env = { GEOMATCH_QUEUE_CAPACITY: "16" };
        const config = loadMatcherConfig(env);

        expect(
            applyRunOverrides(config, { concurrency: 4 }, env).queueCapacity,
        ).toBe(16);
    });
});
