import { describe, it, expect } from "vitest";
import { Flux } from "./flux";
import { TestSubscriber } from "./subscriber";

describe("Flux", () => {
    it("emits an array as far as requested", () => {
        const ts = new TestSubscriber<number>(2);
        Flux.fromArray([1, 2, 3]).subscribe(ts);

        ts.assertValues([1, 2]);
        ts.assertNotComplete();

        ts.request(1);
        ts.assertValues([1, 2, 3]);
        ts.assertComplete();
    });

    it("completes an empty array right away", () => {
        const ts = new TestSubscriber<number>();
        Flux.fromArray<number>([]).subscribe(ts);

        ts.assertSubscribed();
        ts.assertNoValues();
        ts.assertComplete();
    });

    it("emits a single value once requested", () => {
        const ts = new TestSubscriber<string>();
        Flux.just("x").subscribe(ts);
        ts.assertNoValues();

        ts.request(1);
        ts.assertValues(["x"]);
        ts.assertComplete();
    });

    it("signals an error without values", () => {
        const ts = new TestSubscriber<number>();
        Flux.error<number>(new Error("failed")).subscribe(ts);

        ts.assertNoValues();
        ts.assertError("failed");
    });

    it("never signals anything from never()", () => {
        const ts = new TestSubscriber<number>(Infinity);
        Flux.never<number>().subscribe(ts);

        ts.assertSubscribed();
        ts.assertNotTerminated();
    });

    it("records a non-positive request as an error", () => {
        const ts = new TestSubscriber<number>();
        Flux.fromArray([1]).subscribe(ts);

        ts.request(0);
        ts.assertError("n > 0 required but it was 0");
    });
});

describe("consume", () => {
    it("receives every item then the completion", () => {
        const got: Array<number> = [];
        let completed = false;
        Flux.fromArray([1, 2]).consume(v => { got.push(v); }, undefined, () => { completed = true; });

        expect(got).toEqual([1, 2]);
        expect(completed).toBe(true);
    });

    it("cancels upstream and reports an error thrown by the item callback", () => {
        const got: Array<number> = [];
        const errors: Array<Error> = [];
        let completed = false;
        Flux.fromArray([1, 2, 3]).consume(v => {
            got.push(v);
            if (v == 2) {
                throw new Error("bad item");
            }
        }, e => { errors.push(e); }, () => { completed = true; });

        expect(got).toEqual([1, 2]);
        expect(errors.map(e => e.message)).toEqual(["bad item"]);
        expect(completed).toBe(false);
    });

    it("can be disposed after it completed", () => {
        const got: Array<number> = [];
        const c = Flux.just(1).consume(v => { got.push(v); });

        c.dispose();
        expect(got).toEqual([1]);
    });
});
