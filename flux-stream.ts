import * as rs from './reactivestreams-spec';
import * as sp from './subscription';
import * as util from './util';
import { DemandTracker, addReturnedDemand } from './flux-demand';
import type { StreamConfig } from './config';
import { toError } from './errors';
import { createLogger } from './logger';

const log = createLogger("flux-stream");

/** One outcome of the producer, funneled through a single serialised handler. */
export type StreamResult<T> =
    | { readonly kind: "item"; readonly value: T }
    | { readonly kind: "failure"; readonly error: Error }
    | { readonly kind: "end" };

/**
 * Drains a push-based AsyncIterable as fast as it emits, on behalf of a single
 * subscriber.
 * 
 * Items arriving without demand are kept in an unbounded FIFO buffer until the
 * subscriber requests them, so a producer outrunning a subscriber that never
 * requests grows the buffer without limit. At the end of the stream the
 * buffer is drained as far as the outstanding demand allows, then the rest is
 * discarded and completion is signalled. A failure is signalled immediately
 * and discards the buffer.
 */
export class StreamSubscription<T> implements rs.Subscription {
    private mActual: rs.Subscriber<T> | null;
    
    private readonly demand: DemandTracker;
    
    private readonly queue: util.LinkedArrayQueue<T>;
    
    private iterator: AsyncIterator<T> | null;
    
    private cancelled: boolean;
    
    private done: boolean;
    
    private error: Error | null;
    
    private wip: number;
    
    private warned: boolean;
    
    private mTask: Promise<void> | null;
    
    constructor(actual: rs.Subscriber<T>,
            private readonly source: AsyncIterable<T>,
            private readonly config: StreamConfig) {
        this.mActual = actual;
        this.demand = new DemandTracker();
        this.queue = new util.LinkedArrayQueue<T>(16);
        this.iterator = null;
        this.cancelled = false;
        this.done = false;
        this.error = null;
        this.wip = 0;
        this.warned = false;
        this.mTask = null;
    }
    
    /** Settles once the driving loop has stopped. */
    get task() : Promise<void> {
        return this.mTask ?? Promise.resolve();
    }
    
    /** Number of items received but not yet delivered. */
    get buffered() : number {
        return this.queue.size();
    }
    
    start() : void {
        if (this.mTask == null && !this.cancelled) {
            this.mTask = this.run();
        }
    }
    
    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.demand.increment(n);
            this.drain();
        }
    }
    
    cancel() : void {
        if (!this.cancelled) {
            this.cancelled = true;
            log.debug({ buffered: this.buffered, demand: this.demand.current }, "stream subscription cancelled");
            if (this.wip++ == 0) {
                this.mActual = null;
                this.queue.clear();
            }
            this.release();
        }
    }
    
    private async run() : Promise<void> {
        const it = this.open();
        if (it == null) {
            return;
        }
        this.iterator = it;
        
        try {
            for (;;) {
                if (this.cancelled) {
                    return;
                }
                const r = await it.next();
                if (r.done) {
                    this.handle({ kind: "end" });
                    return;
                }
                this.handle({ kind: "item", value: r.value });
            }
        } catch (ex) {
            this.handle({ kind: "failure", error: toError(ex) });
        } finally {
            this.iterator = null;
        }
    }
    
    private open() : AsyncIterator<T> | null {
        try {
            return this.source[Symbol.asyncIterator]();
        } catch (ex) {
            this.handle({ kind: "failure", error: toError(ex) });
            return null;
        }
    }
    
    private handle(r: StreamResult<T>) : void {
        if (this.done || this.cancelled) {
            return;
        }
        switch (r.kind) {
            case "item":
                this.queue.offer(r.value);
                this.checkBuffer();
                break;
            case "failure":
                this.error = r.error;
                this.done = true;
                break;
            case "end":
                this.done = true;
                break;
        }
        this.drain();
    }
    
    private drain() : void {
        if (this.wip++ != 0) {
            return;
        }
        
        var missed = 1;
        
        for (;;) {
            
            for (;;) {
                const a = this.mActual;
                if (this.cancelled || a == null) {
                    this.mActual = null;
                    this.queue.clear();
                    return;
                }
                
                const d = this.done;
                const ex = this.error;
                if (d && ex != null) {
                    this.terminate(a, ex);
                    return;
                }
                
                const empty = this.queue.isEmpty();
                if (d && empty) {
                    this.terminate(a, null);
                    return;
                }
                
                if (empty || !this.demand.tryConsumeOne()) {
                    if (d) {
                        this.terminate(a, null);
                        return;
                    }
                    break;
                }
                
                const v = this.queue.take();
                
                var more: number | void;
                try {
                    more = a.onNext(v);
                } catch (ex) {
                    this.cancelled = true;
                    this.release();
                    this.terminate(a, toError(ex));
                    return;
                }
                addReturnedDemand(this.demand, more);
            }
            
            const m = this.wip - missed;
            this.wip = m;
            if (m == 0) {
                break;
            }
            missed = m;
        }
    }
    
    /** Delivers the one terminal signal; wip stays non-zero so no later drain delivers anything. */
    private terminate(a: rs.Subscriber<T>, e: Error | null) : void {
        this.mActual = null;
        this.queue.clear();
        this.done = true;
        try {
            if (e != null) {
                log.debug({ err: e }, "stream failed");
                a.onError(e);
            } else {
                log.debug("stream finished");
                a.onComplete();
            }
        } catch (ex) {
            log.error({ err: toError(ex), cause: e }, "subscriber failed on the terminal signal");
        }
    }
    
    private checkBuffer() : void {
        const n = this.queue.size();
        if (!this.warned && n > this.config.maxBuffered) {
            this.warned = true;
            log.warn({ buffered: n, maxBuffered: this.config.maxBuffered }, "stream buffer above threshold, subscriber is not keeping up");
        }
    }
    
    private release() : void {
        const it = this.iterator;
        this.iterator = null;
        if (it == null) {
            return;
        }
        void Promise.resolve()
            .then(() => it.return?.())
            .catch((ex: unknown) => {
                log.error({ err: toError(ex) }, "failed to release the stream");
            });
    }
}
