/**
 * Bounded async channel between batch workers and the single consumer.
 *
 * `push` resolves once the value is buffered; while the buffer is full the
 * caller waits. After `close()` pending and future pushes resolve to `false`
 * and iteration ends once the buffer is drained.
 *
 * @module channel
 */

type Waiter = () => void;

export class BoundedChannel<T> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private readonly pushWaiters: Waiter[] = [];
    private readonly pullWaiters: Waiter[] = [];
    private closed = false;

    /**
     * @param capacity - Values buffered before `push` waits.
     */
    constructor(private readonly capacity: number) {
        if (capacity < 1) {
            throw new Error(
                `Channel capacity must be at least 1, got ${capacity}`,
            );
        }
    }

    /** Number of buffered values. */
    get size(): number {
        return this.buffer.length;
    }

    /** Whether the channel takes no more values. */
    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Buffers a value, waiting for room when the channel is full.
     *
     * @param value - The value to deliver.
     * @returns False when the channel was closed before the value was taken.
     */
    async push(value: T): Promise<boolean> {
        while (!this.closed && this.buffer.length >= this.capacity) {
            await new Promise<void>((resolve) => this.pushWaiters.push(resolve));
        }
        if (this.closed) return false;

        this.buffer.push(value);
        this.wake(this.pullWaiters);
        return true;
    }

    /**
     * Takes the next value, waiting while the channel is empty.
     *
     * @returns The value, or undefined once closed and drained.
     */
    async pull(): Promise<T | undefined> {
        while (this.buffer.length === 0 && !this.closed) {
            await new Promise<void>((resolve) => this.pullWaiters.push(resolve));
        }
        const value = this.buffer.shift();
        this.wake(this.pushWaiters);
        return value;
    }

    /**
     * Ends the channel. Buffered values can still be pulled.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.wakeAll(this.pushWaiters);
        this.wakeAll(this.pullWaiters);
    }

    /**
     * Ends the channel and drops every buffered value.
     *
     * @returns Number of values dropped.
     */
    discard(): number {
        const dropped = this.buffer.splice(0).length;
        this.close();
        return dropped;
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        while (true) {
            const value = await this.pull();
            if (value === undefined) return;
            yield value;
        }
    }

    private wake(waiters: Waiter[]): void {
        const waiter = waiters.shift();
        if (waiter) waiter();
    }

    private wakeAll(waiters: Waiter[]): void {
        for (const waiter of waiters.splice(0)) waiter();
    }
}
