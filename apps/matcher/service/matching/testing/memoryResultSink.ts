/**
 * In-memory result sink used by the tests.
 */

import type { ResultSink } from "../../helpers/resultSink";
import type { MatchResult } from "../../types";

export class MemoryResultSink implements ResultSink {
    readonly target: string;
    /** Every row written, in write order */
    readonly rows: MatchResult[] = [];
    /** Size of each write */
    readonly writes: number[] = [];
    opened = 0;
    closed = false;

    /**
     * @param failWith - Thrown by every write while set.
     */
    constructor(
        public failWith: Error | undefined = undefined,
        target = "memory://results",
    ) {
        this.target = target;
    }

    async open(): Promise<void> {
        this.opened++;
    }

    async write(rows: readonly MatchResult[]): Promise<number> {
        if (this.failWith) throw this.failWith;
        this.rows.push(...rows);
        this.writes.push(rows.length);
        return rows.length;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
