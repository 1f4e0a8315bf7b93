import { describe, expect, it } from "vitest";
import { CircuitBreaker, CircuitOpenError } from "./circuitBreaker";

describe("CircuitBreaker", () => {
    it("opens once the failure threshold is reached inside the window", () => {
        let now = 0;
        const circuit = new CircuitBreaker({
            name: "test",
            failureThreshold: 2,
            windowMs: 1000,
            now: () => now,
        });

        circuit.recordFailure("connection");
        expect(circuit.canExecute()).toBe(true);

        now = 500;
        circuit.recordFailure("connection");
        expect(circuit.getState()).toBe("OPEN");
        expect(circuit.canExecute()).toBe(false);
        expect(circuit.getStats()).toMatchObject({
            state: "OPEN",
            failures: 2,
            rejections: 1,
            openedAt: 500,
        });
    });

    it("forgets failures older than the window", () => {
        let now = 0;
        const circuit = new CircuitBreaker({
            failureThreshold: 2,
            windowMs: 1000,
            now: () => now,
        });

        circuit.recordFailure("timeout");
        now = 1500;
        circuit.recordFailure("timeout");

        expect(circuit.getState()).toBe("CLOSED");
        expect(circuit.getStats().currentFailureCount).toBe(1);
    });

    it("does not count successes against the threshold", () => {
        const circuit = new CircuitBreaker({ failureThreshold: 1 });
        circuit.recordSuccess();
        circuit.recordSuccess();

        expect(circuit.canExecute()).toBe(true);
        expect(circuit.getStats().successes).toBe(2);
    });

    it("describes itself in the open error", () => {
        const circuit = new CircuitBreaker({
            name: "opensearch",
            failureThreshold: 1,
        });
        circuit.recordFailure("connection");

        const err = circuit.openError();
        expect(err).toBeInstanceOf(CircuitOpenError);
        expect(err.message).toBe(
            "Circuit 'opensearch' is OPEN after 1 exhausted connectivity failures.",
        );
    });

    it("rejects a threshold below one", () => {
        expect(() => new CircuitBreaker({ failureThreshold: 0 })).toThrow(
            "Circuit failure threshold must be at least 1, got 0",
        );
    });
});
