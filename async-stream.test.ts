import { describe, it, expect } from "vitest";
import { AsyncStream } from "./async-stream";
import type { TerminationReason } from "./async-stream";

async function collect<T>(source: AsyncIterable<T>) : Promise<Array<T>> {
    const out: Array<T> = [];
    for await (const v of source) {
        out.push(v);
    }
    return out;
}

describe("AsyncStream", () => {
    it("yields the values pushed by its builder then ends", async () => {
        const stream = new AsyncStream<number>(c => {
            c.yield(1);
            c.yield(2);
            c.finish();
        });

        await expect(collect(stream)).resolves.toEqual([1, 2]);
    });

    it("throws the failure after the queued values", async () => {
        const failure = new Error("producer failed");
        const stream = new AsyncStream<number>(c => {
            c.yield(1);
            c.finish(failure);
        });

        const seen: Array<number> = [];
        let caught: unknown = null;
        try {
            for await (const v of stream) {
                seen.push(v);
            }
        } catch (ex) {
            caught = ex;
        }
        expect(seen).toEqual([1]);
        expect(caught).toBe(failure);
    });

    it("refuses values after it finished", async () => {
        const { stream, continuation } = AsyncStream.withContinuation<number>();
        expect(continuation.yield(1)).toBe(true);
        continuation.finish();
        expect(continuation.yield(2)).toBe(false);

        await expect(collect(stream)).resolves.toEqual([1]);
    });

    it("reports termination once", () => {
        const reasons: Array<TerminationReason> = [];
        const { continuation } = AsyncStream.withContinuation<number>();
        continuation.onTermination = r => reasons.push(r);

        continuation.finish();
        continuation.finish(new Error("ignored"));

        expect(reasons).toEqual(["finished"]);
    });

    it("resolves a pending pull with the next value", async () => {
        const { stream, continuation } = AsyncStream.withContinuation<number>();
        const pending = stream[Symbol.asyncIterator]().next();

        continuation.yield(5);

        await expect(pending).resolves.toEqual({ value: 5, done: false });
    });

    it("ends a pending pull when the consumer returns", async () => {
        const reasons: Array<TerminationReason> = [];
        const { stream, continuation } = AsyncStream.withContinuation<number>();
        continuation.onTermination = r => reasons.push(r);
        const iterator = stream[Symbol.asyncIterator]();
        const pending = iterator.next();

        await iterator.return?.();

        await expect(pending).resolves.toEqual({ value: undefined, done: true });
        expect(reasons).toEqual(["cancelled"]);
        expect(continuation.yield(1)).toBe(false);
    });

    it("can only be iterated once", () => {
        const stream = new AsyncStream<number>();
        stream[Symbol.asyncIterator]();
        expect(() => stream[Symbol.asyncIterator]()).toThrow("AsyncStream can only be iterated once");
    });

    it("is exposed as a publisher", async () => {
        const stream = new AsyncStream<string>(c => {
            c.yield("first");
            c.yield("last");
            c.finish();
        });

        await expect(stream.publisher.awaitLast()).resolves.toBe("last");
    });
});
