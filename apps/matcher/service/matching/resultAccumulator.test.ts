import { describe, expect, it } from "vitest";
import type { MatchResult } from "../types";
import { ResultAccumulator } from "./resultAccumulator";
import { MemoryResultSink } from "./testing/memoryResultSink";

const result = (pointId: string): MatchResult => ({
    pointId,
    placeType: "high_school",
    lat: 37.5,
    lon: 127,
    status: "unmatched",
    matched: false,
});

const results = (count: number): MatchResult[] =>
    Array.from({ length: count }, (_, i) => result(`u-${i + 1}`));

describe("ResultAccumulator", () => {
    it("writes a group every time the threshold is reached", async () => {
        const sink = new MemoryResultSink();
        const accumulator = new ResultAccumulator(sink, 3);

        await accumulator.addAll(results(7));

        expect(sink.writes).toEqual([3, 3]);
        expect(accumulator.pending).toBe(1);
        expect(accumulator.accepted).toBe(7);
        expect(accumulator.flushed).toBe(6);
    });

    it("keeps arrival order across flushes", async () => {
        const sink = new MemoryResultSink();
        const accumulator = new ResultAccumulator(sink, 2);

        await accumulator.addAll(results(5));
        await accumulator.close();

        expect(sink.rows.map((row) => row.pointId)).toEqual([
            "u-1",
            "u-2",
            "u-3",
            "u-4",
            "u-5",
        ]);
        expect(sink.writes).toEqual([2, 2, 1]);
        expect(sink.closed).toBe(true);
    });

    it("never holds more than the threshold unflushed", async () => {
        const sink = new MemoryResultSink();
        const accumulator = new ResultAccumulator(sink, 4);

        let peak = 0;
        for (const row of results(19)) {
            await accumulator.add(row);
            peak = Math.max(peak, accumulator.pending);
        }

        expect(peak).toBeLessThan(4);
        expect(accumulator.flushed + accumulator.pending).toBe(19);
    });

    it("puts rows back when a write fails", async () => {
        const sink = new MemoryResultSink(new Error("disk full"));
        const accumulator = new ResultAccumulator(sink, 2);

        await accumulator.add(result("u-1"));
        await expect(accumulator.add(result("u-2"))).rejects.toThrow(
            "disk full",
        );
        expect(accumulator.pending).toBe(2);
        expect(accumulator.flushed).toBe(0);

        sink.failWith = undefined;
        await accumulator.flush();

        expect(sink.rows.map((row) => row.pointId)).toEqual(["u-1", "u-2"]);
        expect(accumulator.pending).toBe(0);
    });

    it("does nothing when flushing an empty buffer", async () => {
        const sink = new MemoryResultSink();
        const accumulator = new ResultAccumulator(sink, 2);

        expect(await accumulator.flush()).toBe(0);
        expect(sink.writes).toEqual([]);
    });

    it("rejects a non-positive threshold", () => {
        expect(() => new ResultAccumulator(new MemoryResultSink(), 0)).toThrow(
            "Flush threshold must be a positive integer, got 0",
        );
    });
});
