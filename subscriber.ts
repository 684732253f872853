import * as rs from './reactivestreams-spec';
import * as flow from './flow';
import * as sp from './subscription';
import { toError } from './errors';
import { createLogger } from './logger';

const log = createLogger("subscriber");

/** Requests unbounded demand and forwards every signal to callbacks. */
export class CallbackSubscriber<T> implements rs.Subscriber<T>, flow.Cancellation {
    private mOnNext : (t: T) => void;
    private mOnError : (t: Error) => void;
    private mOnComplete : () => void;
    
    private done : boolean;
    private s : rs.Subscription | null;
    
    constructor(onNext : (t: T) => void, onError : (t: Error) => void, onComplete : () => void) {
        this.mOnNext = onNext;
        this.mOnError = onError;
        this.mOnComplete = onComplete;
        this.done = false;
        this.s = null;
    }
    
    onSubscribe(s: rs.Subscription) : void {
        if (this.s != null) {
            if (this.s != sp.SH.CANCELLED) {
                throw new Error("Subscription already set");
            }
            s.cancel();
            return;
        }
        this.s = s;
        s.request(Infinity);
    }
    
    onNext(t: T) : void {
        if (this.done) {
            return;
        }
        try {
            this.mOnNext(t);
        } catch (ex) {
            this.dispose();
            this.signalError(toError(ex));
        }
    }
    
    onError(t: Error) : void {
        if (this.done) {
            log.error({ err: t }, "error signalled after termination");
            return;
        }
        this.done = true;
        this.signalError(t);
    }
    
    private signalError(t: Error) : void {
        try {
            this.mOnError(t);
        } catch (ex) {
            log.error({ err: toError(ex), cause: t }, "error callback failed");
        }
    }
    
    onComplete() : void {
        if (this.done) {
            return;
        }
        this.done = true;
        try {
            this.mOnComplete();
        } catch (ex) {
            log.error({ err: toError(ex) }, "completion callback failed");
        }
    }
    
    dispose() : void {
        const a = this.s;
        this.s = sp.SH.CANCELLED;
        this.done = true;
        if (a != null && a != sp.SH.CANCELLED) {
            a.cancel();
        }
    }
}

/** Provides convenient assertXXX checks on the received signal pattern. */
export class TestSubscriber<T> implements rs.Subscriber<T>, rs.Subscription {
    
    private requested: number;
    
    private demandOnNext: number;
    
    private s: rs.Subscription | null;
    
    private subscriptionChecked: boolean;
    
    private mCompletions: number;
    
    private mValues: Array<T>;
    
    private mErrors: Array<Error>;
    
    /**
     * @param initialRequest - demand requested as soon as the subscription arrives
     * @param demandOnNext - demand returned from every onNext
     */
    constructor(initialRequest?: number, demandOnNext?: number) {
        this.requested = initialRequest === undefined ? 0 : initialRequest;
        this.demandOnNext = demandOnNext === undefined ? 0 : demandOnNext;
        this.s = null;
        this.subscriptionChecked = false;
        this.mCompletions = 0;
        this.mValues = new Array<T>();
        this.mErrors = new Array<Error>();
    }
    
    get values() : ReadonlyArray<T> {
        return this.mValues;
    }
    
    get errors() : ReadonlyArray<Error> {
        return this.mErrors;
    }
    
    get completions() : number {
        return this.mCompletions;
    }
    
    /** Number of terminal signals (completions and errors) received. */
    get terminations() : number {
        return this.mCompletions + this.mErrors.length;
    }
    
    onSubscribe(s: rs.Subscription) : void {
        if (this.s != null) {
            if (this.s == sp.SH.CANCELLED) {
                s.cancel();
                return;
            }
            this.mErrors.push(new Error("Subscription already set"));
            s.cancel();
        } else {
            this.s = s;
            const r = this.requested;
            if (r != 0) {
                this.requested = 0;
                s.request(r);
            }
        }
    }
    
    onNext(t: T) : number {
        this.checkSubscribed("onNext");
        this.mValues.push(t);
        return this.demandOnNext;
    }
    
    onError(t: Error) : void {
        this.checkSubscribed("onError");
        this.mErrors.push(t);
    }
    
    onComplete() : void {
        this.checkSubscribed("onComplete");
        this.mCompletions++;        
    }
    
    request(n: number) : void {
        if (!(n > 0)) {
            this.mErrors.push(new Error("n > 0 required but it was " + n));
        } else {
            if (this.s == null) {
                this.requested += n;
            } else {
                this.s.request(n);
            }
        }        
    }
    
    cancel() : void {
        const a = this.s;
        if (a != sp.SH.CANCELLED) {
            this.s = sp.SH.CANCELLED;
            if (a != null) {
                a.cancel();
            }
        }
    }
    
    private checkSubscribed(signal: string) : void {
        if (!this.subscriptionChecked) {
            this.subscriptionChecked = true;
            if (this.s == null) {
                this.mErrors.push(new Error("onSubscribe not called before " + signal));
            }
        }
    }
    
    private error(message: string) : never {
        var m = message
             + " (" + this.mCompletions + " completions)"
             + " (" + this.mErrors.length + " errors)";
             
        for (var e of this.mErrors) {
            m += "\n";
            m += e;
        }
        
        throw new Error(m);
    }
    
    assertNoValues() : void {
        if (this.mValues.length != 0) {
            this.error("No values expected but " + this.mValues.length + " received:\n" + this.mValues + "\n");
        }
    }
    
    assertNoError() : void {
        if (this.mErrors.length != 0) {
            this.error("No errors expected");
        }
    }
    
    assertComplete() : void {
        if (this.mCompletions == 0) {
            this.error("Completion expected");
        }
        if (this.mCompletions > 1) {
            this.error("Single completion expected");
        }
    }
    
    assertNotComplete() : void {
        if (this.mCompletions != 0) {
            this.error("No completion expected");
        }
    }
    
    assertNotTerminated() : void {
        this.assertNotComplete();
        this.assertNoError();
    }
    
    assertError(messagePart: string) : void {
        if (this.mErrors.length != 1) {
            this.error("Single error expected");
        } else {
            if (this.mErrors[0].message.indexOf(messagePart) < 0) {
                this.error("Error message doesn't contain '" + messagePart + "'");
            }
        }
    }
    
    assertValueCount(n: number) : void {
        if (this.mValues.length != n) {
            this.error("" + n + " values expected but " + this.mValues.length + " values received");
        }
    }
    
    assertValues(v: Array<T>) : void {
        if (this.mValues.length != v.length) {
            this.error("Number of values differ. Expected: [" + v.length + "] " + v + "; Actual: [" + this.mValues.length + "] " + this.mValues + "\n");
        }
        
        for (var i = 0; i < v.length; i++) {
            const o1 = v[i];
            const o2 = this.mValues[i];
            
            if (o1 !== o2) {
                this.error("Values @ " + i + " differ. Expected: " + o1 + "; Actual: " + o2);
            }
        }
    }
    
    assertSubscribed() : void {
        if (this.s == null) {
            this.error("onSubscribe not called");
        }
    }
}
