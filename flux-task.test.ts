import { describe, it, expect, vi } from "vitest";
import { Flux } from "./flux";
import type { Completion } from "./flux-task";
import { AsyncStream } from "./async-stream";
import { Task } from "./task";
import { CancellationError } from "./errors";
import { TestSubscriber } from "./subscriber";

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe("Task", () => {
    it("resolves with the value of its body", async () => {
        await expect(Task.run(async () => "done").value).resolves.toBe("done");
    });

    it("runs high priority work first", async () => {
        const order: Array<string> = [];
        const low = Task.run(() => { order.push("low"); }, { priority: "low" });
        const normal = Task.run(() => { order.push("normal"); });
        const high = Task.run(() => { order.push("high"); }, { priority: "high" });

        await Promise.all([low.value, normal.value, high.value]);
        expect(order[0]).toBe("high");
        expect([...order].sort()).toEqual(["high", "low", "normal"]);
    });

    it("rejects without running the body when cancelled before it starts", async () => {
        let ran = false;
        const t = Task.run(() => {
            ran = true;
            return 1;
        }, { priority: "low" });

        t.cancel();

        await expect(t.value).rejects.toBeInstanceOf(CancellationError);
        expect(ran).toBe(false);
        expect(t.isCancelled).toBe(true);
    });

    it("lets a running body observe cancellation", async () => {
        const t = Task.run(signal => new Promise<string>(resolve => {
            signal.addEventListener("abort", () => resolve("aborted"));
        }));

        await sleep(10);
        t.cancel();

        await expect(t.value).resolves.toBe("aborted");
    });
});

describe("Flux.task and Flux.fromTask", () => {
    it("emits the task's value then completes", async () => {
        const ts = new TestSubscriber<number>(Infinity);
        Flux.task(async () => 42).subscribe(ts);

        await vi.waitFor(() => expect(ts.completions).toBe(1));
        ts.assertValues([42]);
        ts.assertNoError();
    });

    it("signals the task's failure", async () => {
        const failure = new Error("task failed");
        const ts = new TestSubscriber<number>(Infinity);
        Flux.task<number>(async () => {
            throw failure;
        }).subscribe(ts);

        await vi.waitFor(() => expect(ts.terminations).toBe(1));
        ts.assertNoValues();
        expect(ts.errors[0]).toBe(failure);
    });

    it("launches the body without a subscriber", async () => {
        let started = false;
        Flux.task(() => {
            started = true;
            return 1;
        });

        await sleep(10);
        expect(started).toBe(true);
    });

    it("replays an existing task to every subscriber", async () => {
        const t = Task.run(async () => "shared");
        const f = Flux.fromTask(t);

        await expect(f.awaitLast()).resolves.toBe("shared");
        await expect(f.awaitLast()).resolves.toBe("shared");
    });

    it("holds the value until it is requested", async () => {
        const t = Task.run(async () => 42);
        const ts = new TestSubscriber<number>();
        Flux.fromTask(t).subscribe(ts);

        await t.value;
        await sleep(0);
        ts.assertNoValues();

        ts.request(1);
        ts.assertValues([42]);
        ts.assertComplete();
    });

    it("emits nothing after cancel", async () => {
        const ts = new TestSubscriber<number>(Infinity);
        Flux.task(async () => 42).subscribe(ts);

        ts.cancel();

        await sleep(10);
        ts.assertNoValues();
        ts.assertNotTerminated();
    });
});

describe("consumeAsync", () => {
    it("runs the callbacks for every item and the completion", async () => {
        const received: Array<number> = [];
        const completions: Array<Completion> = [];
        Flux.fromArray([1, 2, 3]).consumeAsync(
            async v => { received.push(v); },
            async c => { completions.push(c); });

        await vi.waitFor(() => expect(completions.length).toBe(1));
        expect([...received].sort()).toEqual([1, 2, 3]);
        expect(completions[0]).toEqual({ kind: "finished" });
    });

    it("hands the failure to the completion callback", async () => {
        const failure = new Error("upstream failed");
        const completions: Array<Completion> = [];
        Flux.error<number>(failure).consumeAsync(() => { }, c => { completions.push(c); });

        await vi.waitFor(() => expect(completions).toEqual([{ kind: "failure", error: failure }]));
    });

    it("does not order the callback bodies", async () => {
        const finished: Array<number> = [];
        Flux.fromArray([1, 2]).consumeAsync(async v => {
            if (v == 1) {
                await sleep(30);
            }
            finished.push(v);
        });

        await vi.waitFor(() => expect(finished.length).toBe(2));
        expect(finished).toEqual([2, 1]);
    });

    it("stops receiving items once disposed", async () => {
        const received: Array<number> = [];
        const { stream, continuation } = AsyncStream.withContinuation<number>();
        const cancellation = stream.publisher.consumeAsync(v => { received.push(v); });

        continuation.yield(1);
        await vi.waitFor(() => expect(received).toEqual([1]));

        cancellation.dispose();
        await sleep(10);
        continuation.yield(2);
        await sleep(10);
        expect(received).toEqual([1]);
    });
});
