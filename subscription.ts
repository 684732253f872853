import * as rs from './reactivestreams-spec';

class CancelledSubscription implements rs.Subscription {
    request(n: number) : void {
        // deliberately ignored
    }
    
    cancel() : void {
        // deliberately ignored
    }
}

export class EmptySubscription implements rs.Subscription {
    request(n: number) : void {
        // deliberately ignored
    }
    
    cancel() : void {
        // deliberately ignored
    }
    
    static complete(s : rs.Subscriber<unknown>) : void {
        s.onSubscribe(EmptySubscription.INSTANCE);
        s.onComplete();
    }
    
    static error(s : rs.Subscriber<unknown>, e : Error) : void {
        s.onSubscribe(EmptySubscription.INSTANCE);
        s.onError(e);
    }
    
    public static INSTANCE : rs.Subscription = new EmptySubscription();
}

enum DeferredState {
    NO_REQUEST_NO_VALUE,
    HAS_REQUEST_NO_VALUE,
    NO_REQUEST_HAS_VALUE,
    HAS_REQUEST_HAS_VALUE,
    CANCELLED,
}

/** 
 * Emits a single value that becomes available later, once both the value
 * and a request have arrived, or an error as soon as it is known.
 */
export class DeferredScalarSubscription<T> implements rs.Subscription {
    private mActual: rs.Subscriber<T>;
    private mValue: { value: T } | null;
    private mState: DeferredState;
    
    constructor(actual: rs.Subscriber<T>) {
        this.mActual = actual;
        this.mValue = null;
        this.mState = DeferredState.NO_REQUEST_NO_VALUE;
    }
    
    complete(t: T) : void {
        const s = this.mState;
        if (s == DeferredState.HAS_REQUEST_NO_VALUE) {
            this.mState = DeferredState.HAS_REQUEST_HAS_VALUE;
            
            this.mActual.onNext(t);
            if (!this.isCancelled()) {
                this.mActual.onComplete();
            }
        } else
        if (s == DeferredState.NO_REQUEST_NO_VALUE) {
            this.mValue = { value: t };
            this.mState = DeferredState.NO_REQUEST_HAS_VALUE;
        }
    }

    error(e: Error) : void {
        const s = this.mState;
        if (s == DeferredState.NO_REQUEST_NO_VALUE || s == DeferredState.HAS_REQUEST_NO_VALUE) {
            this.mState = DeferredState.HAS_REQUEST_HAS_VALUE;
            this.mActual.onError(e);
        }
    }
    
    request(n: number) : void {
        if (SH.validRequest(n)) {
            const s = this.mState;
            const v = this.mValue;
            if (s == DeferredState.NO_REQUEST_HAS_VALUE && v != null) {
                this.mState = DeferredState.HAS_REQUEST_HAS_VALUE;
                this.mValue = null;

                this.mActual.onNext(v.value);
                if (!this.isCancelled()) {
                    this.mActual.onComplete();
                }
            } else
            if (s == DeferredState.NO_REQUEST_NO_VALUE) {
                this.mState = DeferredState.HAS_REQUEST_NO_VALUE;
            }
        }
    }
    
    cancel() : void {
        this.mState = DeferredState.CANCELLED;
        this.mValue = null;
    }

    isCancelled() : boolean {
        return this.mState == DeferredState.CANCELLED;
    }
}

export class SH {
    static validRequest(n: number) : boolean {
        if (!(n > 0)) {
            throw new Error("n > 0 required but it was " + n);
        }
        return true;
    }
    
    static CANCELLED : rs.Subscription = new CancelledSubscription();
}
