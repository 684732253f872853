/**
 * Tracks the outstanding demand of one subscriber.
 *
 * Demand is a non-negative integer or Infinity (unbounded). Unbounded demand
 * absorbs every increment and is never decremented back to a finite value.
 * Increments that would leave the safe integer range saturate to Infinity.
 */
export class DemandTracker {
    private mRequested: number;

    constructor(initial?: number) {
        this.mRequested = 0;
        if (initial !== undefined) {
            this.increment(initial);
        }
    }

    get current() : number {
        return this.mRequested;
    }

    get isUnbounded() : boolean {
        return this.mRequested == Infinity;
    }

    hasDemand() : boolean {
        return this.mRequested > 0;
    }

    increment(n: number) : void {
        if (Number.isNaN(n) || n < 0) {
            throw new Error("n >= 0 required but it was " + n);
        }
        if (n == 0) {
            return;
        }
        if (this.isUnbounded) {
            return;
        }
        const u = this.mRequested + n;
        this.mRequested = u >= Number.MAX_SAFE_INTEGER ? Infinity : u;
    }

    tryConsumeOne() : boolean {
        if (this.isUnbounded) {
            return true;
        }
        const r = this.mRequested;
        if (r == 0) {
            return false;
        }
        this.mRequested = r - 1;
        return true;
    }

    reset() : void {
        this.mRequested = 0;
    }
}

/** Folds the demand a subscriber returned from onNext into the tracker. */
export function addReturnedDemand(tracker: DemandTracker, more: number | void) : void {
    if (typeof more === "number" && more > 0) {
        tracker.increment(more);
    }
}
