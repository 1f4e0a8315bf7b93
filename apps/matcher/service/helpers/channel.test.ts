import { describe, expect, it } from "vitest";
import { BoundedChannel } from "./channel";

describe("BoundedChannel", () => {
    it("delivers values in push order", async () => {
        const channel = new BoundedChannel<number>(4);
        await channel.push(1);
        await channel.push(2);
        channel.close();

        const received: number[] = [];
        for await (const value of channel) received.push(value);

        expect(received).toEqual([1, 2]);
    });

    it("holds a pusher while the buffer is full", async () => {
        const channel = new BoundedChannel<string>(1);
        await channel.push("a");

        let delivered = false;
        const pending = channel.push("b").then((ok) => {
            delivered = ok;
        });

        await Promise.resolve();
        expect(delivered).toBe(false);
        expect(channel.size).toBe(1);

        expect(await channel.pull()).toBe("a");
        await pending;
        expect(delivered).toBe(true);
        expect(await channel.pull()).toBe("b");
    });

    it("releases waiting pushers when closed", async () => {
        const channel = new BoundedChannel<number>(1);
        await channel.push(1);
        const pending = channel.push(2);

        channel.close();

        await expect(pending).resolves.toBe(false);
        expect(await channel.pull()).toBe(1);
        expect(await channel.pull()).toBeUndefined();
    });

    it("wakes a waiting consumer", async () => {
        const channel = new BoundedChannel<number>(2);
        const pulled = channel.pull();
        await channel.push(7);

        await expect(pulled).resolves.toBe(7);
    });

    it("drops buffered values when discarded", async () => {
        const channel = new BoundedChannel<number>(2);
        await channel.push(1);
        await channel.push(2);

        expect(channel.discard()).toBe(2);
        expect(channel.isClosed).toBe(true);
        expect(channel.size).toBe(0);
        expect(await channel.pull()).toBeUndefined();
        expect(await channel.push(3)).toBe(false);
    });

    it("rejects a capacity below one", () => {
        expect(() => new BoundedChannel(0)).toThrow(
            "Channel capacity must be at least 1, got 0",
        );
    });
});
