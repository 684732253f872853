import * as rs from './reactivestreams-spec';
import * as flow from './flow';
import * as sp from './subscription';
import * as sch from './scheduler';
import { DemandTracker, addReturnedDemand } from './flux-demand';
import type { BackoffConfig } from './config';
import { toError } from './errors';
import { createLogger } from './logger';

const log = createLogger("flux-sequence");

/**
 * Pulls an AsyncIterable one item at a time on behalf of a single subscriber.
 * 
 * Items are never buffered: when a pulled item finds no demand, the loop polls
 * for demand with exponential backoff and, if none arrives within the retry
 * budget, drops that item and stops pulling without a terminal signal.
 * Cancellation is silent and takes effect at the next check of the loop.
 */
export class SequenceSubscription<T> implements rs.Subscription {
    private mActual: rs.Subscriber<T> | null;
    
    private readonly demand: DemandTracker;
    
    private cancelled: boolean;
    
    private done: boolean;
    
    private mSleep: flow.Cancellation | null;
    
    private mWake: (() => void) | null;
    
    private mTask: Promise<void> | null;
    
    constructor(actual: rs.Subscriber<T>,
            private readonly source: AsyncIterable<T>,
            private readonly backoff: BackoffConfig,
            private readonly scheduler: sch.TimedScheduler) {
        this.mActual = actual;
        this.demand = new DemandTracker();
        this.cancelled = false;
        this.done = false;
        this.mSleep = null;
        this.mWake = null;
        this.mTask = null;
    }
    
    /** Settles once the driving loop has stopped and released the iterator. */
    get task() : Promise<void> {
        return this.mTask ?? Promise.resolve();
    }
    
    start() : void {
        if (this.mTask == null && !this.cancelled) {
            this.mTask = this.run();
        }
    }
    
    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.demand.increment(n);
        }
    }
    
    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            this.mActual = null;
            this.demand.reset();
            this.wake();
            log.debug("sequence subscription cancelled");
        }
    }
    
    private async run() : Promise<void> {
        const iterator = this.open();
        if (iterator == null) {
            return;
        }
        
        // set once the iterator itself reported exhaustion or failure
        var finished = false;
        try {
            for (;;) {
                if (this.cancelled) {
                    return;
                }
                
                var r: IteratorResult<T>;
                try {
                    r = await iterator.next();
                } catch (ex) {
                    finished = true;
                    if (!this.cancelled) {
                        this.error(toError(ex));
                    }
                    return;
                }
                
                if (this.cancelled) {
                    return;
                }
                if (r.done) {
                    finished = true;
                    this.complete();
                    return;
                }
                
                if (!this.demand.hasDemand() && !(await this.awaitDemand())) {
                    if (!this.cancelled) {
                        log.warn({ retries: this.backoff.maxRetries, demand: this.demand.current }, "no demand within the retry budget, item dropped and pulling stopped");
                    }
                    return;
                }
                
                this.emit(r.value);
            }
        } catch (ex) {
            // thrown by the subscriber's onNext
            this.error(toError(ex));
        } finally {
            if (!finished) {
                await this.release(iterator);
            }
        }
    }
    
    private open() : AsyncIterator<T> | null {
        try {
            return this.source[Symbol.asyncIterator]();
        } catch (ex) {
            this.error(toError(ex));
            return null;
        }
    }
    
    private emit(t: T) : void {
        const a = this.mActual;
        if (a == null || !this.demand.tryConsumeOne()) {
            return;
        }
        addReturnedDemand(this.demand, a.onNext(t));
    }
    
    /** Polls for demand; false when the retry budget ran out or the subscription was cancelled. */
    private async awaitDemand() : Promise<boolean> {
        const b = this.backoff;
        var delay = b.minDelayMs;
        
        for (var retry = 0; retry < b.maxRetries; retry++) {
            if (this.cancelled) {
                return false;
            }
            if (this.demand.hasDemand()) {
                return true;
            }
            await this.sleep(Math.min(delay, b.maxDelayMs));
            delay *= 2;
        }
        return !this.cancelled && this.demand.hasDemand();
    }
    
    private sleep(delay: number) : Promise<void> {
        return new Promise<void>(resolve => {
            this.mWake = resolve;
            this.mSleep = this.scheduler.scheduleDelayed(() => {
                this.mSleep = null;
                this.mWake = null;
                resolve();
            }, delay);
        });
    }
    
    private wake() : void {
        const s = this.mSleep;
        const w = this.mWake;
        this.mSleep = null;
        this.mWake = null;
        if (s != null) {
            s.dispose();
        }
        if (w != null) {
            w();
        }
    }
    
    private async release(iterator: AsyncIterator<T>) : Promise<void> {
        if (iterator.return === undefined) {
            return;
        }
        try {
            await iterator.return();
        } catch (ex) {
            log.error({ err: toError(ex) }, "failed to release the sequence");
        }
    }
    
    private complete() : void {
        const a = this.terminate();
        if (a != null) {
            log.debug("sequence exhausted");
            try {
                a.onComplete();
            } catch (ex) {
                log.error({ err: toError(ex) }, "subscriber failed on completion");
            }
        }
    }
    
    private error(e: Error) : void {
        const a = this.terminate();
        if (a != null) {
            log.debug({ err: e }, "sequence failed");
            try {
                a.onError(e);
            } catch (ex) {
                log.error({ err: toError(ex), cause: e }, "subscriber failed on the error signal");
            }
        }
    }
    
    private terminate() : rs.Subscriber<T> | null {
        if (this.done) {
            return null;
        }
        this.done = true;
        const a = this.mActual;
        this.mActual = null;
        return a;
    }
}
