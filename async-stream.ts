import * as util from './util';
import { Flux } from './flux';

export type TerminationReason = "finished" | "cancelled";

/** The producer side of an AsyncStream. */
export interface StreamContinuation<T> {
    /** Queues a value; false once the stream has terminated. */
    yield(value: T) : boolean;
    /** Ends the stream; with an error, the consumer throws it after the queued values. */
    finish(error?: Error) : void;
    /** Called once when the stream finishes or its consumer stops iterating. */
    onTermination: ((reason: TerminationReason) => void) | null;
}

interface Waiter<T> {
    resolve(r: IteratorResult<T>) : void;
    reject(e: Error) : void;
}

/**
 * A push-based producer: values are yielded through the continuation at the
 * producer's pace and queued, without bound, until the single consumer pulls
 * them.
 */
export class AsyncStream<T> implements AsyncIterable<T> {
    private readonly queue: util.LinkedArrayQueue<T>;
    
    private waiter: Waiter<T> | null;
    
    private finished: boolean;
    
    private failure: Error | null;
    
    private terminated: boolean;
    
    private iterated: boolean;
    
    readonly continuation: StreamContinuation<T>;
    
    constructor(build?: (continuation: StreamContinuation<T>) => void) {
        this.queue = new util.LinkedArrayQueue<T>(16);
        this.waiter = null;
        this.finished = false;
        this.failure = null;
        this.terminated = false;
        this.iterated = false;
        this.continuation = {
            yield: (value: T) => this.push(value),
            finish: (error?: Error) => this.finish(error),
            onTermination: null,
        };
        if (build !== undefined) {
            build(this.continuation);
        }
    }
    
    static withContinuation<T>() : { stream: AsyncStream<T>, continuation: StreamContinuation<T> } {
        const stream = new AsyncStream<T>();
        return { stream: stream, continuation: stream.continuation };
    }
    
    /** This stream as a publisher that buffers until its subscriber requests. */
    get publisher() : Flux<T> {
        return Flux.fromAsyncStream(this);
    }
    
    [Symbol.asyncIterator]() : AsyncIterator<T> {
        if (this.iterated) {
            throw new Error("AsyncStream can only be iterated once");
        }
        this.iterated = true;
        return {
            next: () => this.next(),
            return: () => this.cancel(),
        };
    }
    
    private push(value: T) : boolean {
        if (this.finished) {
            return false;
        }
        const w = this.waiter;
        if (w != null) {
            this.waiter = null;
            w.resolve({ value: value, done: false });
        } else {
            this.queue.offer(value);
        }
        return true;
    }
    
    private finish(error?: Error) : void {
        if (this.finished) {
            return;
        }
        this.finished = true;
        if (error !== undefined) {
            this.failure = error;
        }
        const w = this.waiter;
        if (w != null) {
            this.waiter = null;
            this.settle(w);
        }
        this.terminate("finished");
    }
    
    private next() : Promise<IteratorResult<T>> {
        if (!this.queue.isEmpty()) {
            return Promise.resolve({ value: this.queue.take(), done: false });
        }
        if (this.finished) {
            return new Promise<IteratorResult<T>>((resolve, reject) => this.settle({ resolve: resolve, reject: reject }));
        }
        return new Promise<IteratorResult<T>>((resolve, reject) => {
            this.waiter = { resolve: resolve, reject: reject };
        });
    }
    
    private cancel() : Promise<IteratorResult<T>> {
        this.finished = true;
        this.failure = null;
        this.queue.clear();
        const w = this.waiter;
        if (w != null) {
            this.waiter = null;
            w.resolve({ value: undefined, done: true });
        }
        this.terminate("cancelled");
        return Promise.resolve({ value: undefined, done: true });
    }
    
    /** Ends one pull on a finished stream; the failure is reported to exactly one pull. */
    private settle(w: Waiter<T>) : void {
        const e = this.failure;
        if (e != null) {
            this.failure = null;
            w.reject(e);
        } else {
            w.resolve({ value: undefined, done: true });
        }
    }
    
    private terminate(reason: TerminationReason) : void {
        if (this.terminated) {
            return;
        }
        this.terminated = true;
        const t = this.continuation.onTermination;
        if (t != null) {
            t(reason);
        }
    }
}
