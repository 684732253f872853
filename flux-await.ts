import * as rs from './reactivestreams-spec';
import * as sp from './subscription';
import { CancellationError, NoOutputProducedError, toError } from './errors';

export interface AwaitOptions {
    /** Aborting cancels the subscription and ends the wait. */
    signal?: AbortSignal;
}

type Outcome<T> =
    | { readonly kind: "value"; readonly value: T }
    | { readonly kind: "empty" }
    | { readonly kind: "failure"; readonly error: Error }
    | { readonly kind: "cancelled"; readonly last: { value: T } | null };

/** Keeps the latest item of one subscription and resumes its waiter exactly once. */
class PendingAwait<T> implements rs.Subscriber<T> {
    
    private last: { value: T } | null;
    
    private resumed: boolean;
    
    private s: rs.Subscription | null;
    
    constructor(private readonly resume: (o: Outcome<T>) => void) {
        this.last = null;
        this.resumed = false;
        this.s = null;
    }
    
    onSubscribe(s: rs.Subscription) : void {
        if (this.resumed || this.s != null) {
            s.cancel();
            return;
        }
        this.s = s;
        s.request(Infinity);
    }
    
    onNext(t: T) : void {
        if (!this.resumed) {
            this.last = { value: t };
        }
    }
    
    onError(t: Error) : void {
        this.settle({ kind: "failure", error: t });
    }
    
    onComplete() : void {
        const l = this.last;
        this.settle(l != null ? { kind: "value", value: l.value } : { kind: "empty" });
    }
    
    cancel() : void {
        this.settle({ kind: "cancelled", last: this.last });
    }
    
    private settle(o: Outcome<T>) : void {
        if (this.resumed) {
            return;
        }
        this.resumed = true;
        const s = this.s;
        this.s = sp.SH.CANCELLED;
        this.last = null;
        if (s != null) {
            s.cancel();
        }
        this.resume(o);
    }
}

function awaitOutcome<T>(publisher: rs.Publisher<T>, options?: AwaitOptions) : Promise<Outcome<T>> {
    const signal = options?.signal;
    return new Promise<Outcome<T>>(resolve => {
        if (signal !== undefined && signal.aborted) {
            resolve({ kind: "cancelled", last: null });
            return;
        }
        
        const pending = new PendingAwait<T>(o => {
            if (signal !== undefined) {
                signal.removeEventListener("abort", onAbort);
            }
            resolve(o);
        });
        
        function onAbort() : void {
            pending.cancel();
        }
        
        if (signal !== undefined) {
            signal.addEventListener("abort", onAbort, { once: true });
        }
        
        try {
            publisher.subscribe(pending);
        } catch (ex) {
            pending.onError(toError(ex));
        }
    });
}

/**
 * Subscribes to the publisher and resolves with the last item it emitted
 * before completing.
 * 
 * Rejects with the publisher's error, with NoOutputProducedError when it
 * completed without items, or with CancellationError when the signal aborts
 * first. An already aborted signal rejects without subscribing.
 */
export async function awaitLast<T>(publisher: rs.Publisher<T>, options?: AwaitOptions) : Promise<T> {
    const o = await awaitOutcome(publisher, options);
    switch (o.kind) {
        case "value":
            return o.value;
        case "empty":
            throw new NoOutputProducedError();
        case "failure":
            throw o.error;
        case "cancelled":
            throw new CancellationError();
    }
}

/**
 * For publishers that never fail: resolves with the last item, or undefined
 * when the publisher completed empty or the signal aborted before any item.
 * After an abort the latest item seen so far is returned.
 * An error signalled anyway still rejects.
 */
export async function awaitLastOrUndefined<T>(publisher: rs.Publisher<T>, options?: AwaitOptions) : Promise<T | undefined> {
    const o = await awaitOutcome(publisher, options);
    switch (o.kind) {
        case "value":
            return o.value;
        case "empty":
            return undefined;
        case "failure":
            throw o.error;
        case "cancelled":
            return o.last != null ? o.last.value : undefined;
    }
}
