import * as rs from "./reactivestreams-spec";
import * as flow from "./flow";
import * as subscriber from "./subscriber";
import * as sp from './subscription';
import * as sch from './scheduler';
import * as array from './flux-array';
import * as sequence from './flux-sequence';
import * as stream from './flux-stream';
import * as task from './flux-task';
import * as aw from './flux-await';
import { Task } from './task';
import type { TaskOptions } from './task';
import { BackoffConfigSchema, ConfigurationManager, StreamConfigSchema } from './config';
import type { BackoffConfig, StreamConfig } from './config';
import { isCancellationError } from './errors';
import { createLogger } from './logger';

const log = createLogger("flux");

function logUnhandled(e: Error) : void {
    if (isCancellationError(e)) {
        log.debug({ err: e }, "cancelled");
    } else {
        log.error({ err: e }, "unhandled error signal");
    }
}

export interface SequenceOptions {
    /** Overrides the configured demand backoff. */
    backoff?: Partial<BackoffConfig>;
    /** Where backoff sleeps are timed. */
    scheduler?: sch.TimedScheduler;
}

export interface StreamOptions {
    stream?: Partial<StreamConfig>;
}

/** A publisher of 0 to N elements optionally followed by an error or completion. */
export abstract class Flux<T> implements rs.Publisher<T> {
    
    abstract subscribe(s: rs.Subscriber<T>) : void;
    
    static never<T>() : Flux<T> {
        return new FluxNever<T>();
    }

    static empty<T>() : Flux<T> {
        return new FluxEmpty<T>();
    }
    
    static just<T>(t: T) : Flux<T> {
        return new FluxJust<T>(t);
    }
    
    static error<T>(e: Error) : Flux<T> {
        return new FluxError<T>(e);
    }
    
    static fromArray<T>(array: ReadonlyArray<T>) : Flux<T> {
        if (array.length == 0) {
            return Flux.empty();
        }
        return new FluxArray<T>(array);
    }
    
    /** 
     * Pulls the sequence one item at a time, only as fast as the subscriber
     * requests; see SequenceSubscription for the demand backoff.
     */
    static fromAsyncIterable<T>(source: AsyncIterable<T>, options?: SequenceOptions) : Flux<T> {
        const backoff = BackoffConfigSchema.parse({ ...ConfigurationManager.current.backoff, ...options?.backoff });
        const scheduler = options?.scheduler ?? sch.DefaultScheduler.INSTANCE;
        return new FluxFromAsyncIterable<T>(source, backoff, scheduler);
    }
    
    /** 
     * Drains a push-based stream at its own pace, buffering every item until
     * the subscriber requests it.
     */
    static fromAsyncStream<T>(source: AsyncIterable<T>, options?: StreamOptions) : Flux<T> {
        const config = StreamConfigSchema.parse({ ...ConfigurationManager.current.stream, ...options?.stream });
        return new FluxFromAsyncStream<T>(source, config);
    }
    
    /** Emits the value of an already running task, or its failure. */
    static fromTask<T>(t: Task<T>) : Flux<T> {
        return new FluxFromTask<T>(t);
    }
    
    /** Launches the body right away and emits its value, or its failure. */
    static task<T>(body: (signal: AbortSignal) => Promise<T> | T, options?: TaskOptions) : Flux<T> {
        return new FluxFromTask<T>(Task.run(body, options));
    }
    
    // ------------------------------------
    
    consume(onNext : (t: T) => void, onError? : (t : Error) => void, onComplete? : () => void) : flow.Cancellation {
        const cs = new subscriber.CallbackSubscriber(
            onNext, 
            onError === undefined ? logUnhandled : onError,
            onComplete === undefined ? () : void => { } : onComplete);
        this.subscribe(cs);
        return cs;
    }
    
    /** 
     * Consumes with unbounded demand, running every callback in its own task.
     * Callback bodies are not ordered relative to each other.
     */
    consumeAsync(onNext: (t: T) => Promise<void> | void, 
            onCompletion?: (c: task.Completion) => Promise<void> | void, 
            options?: TaskOptions) : flow.Cancellation {
        const cs = task.dispatchingSubscriber<T>(
            onNext,
            onCompletion === undefined ? () : void => { } : onCompletion,
            options);
        this.subscribe(cs);
        return cs;
    }
    
    awaitLast(options?: aw.AwaitOptions) : Promise<T> {
        return aw.awaitLast(this, options);
    }
    
    awaitLastOrUndefined(options?: aw.AwaitOptions) : Promise<T | undefined> {
        return aw.awaitLastOrUndefined(this, options);
    }
}

// ----------------------------------------------------------------------

class FluxEmpty<T> extends Flux<T> {
    subscribe(s: rs.Subscriber<T>) : void {
        sp.EmptySubscription.complete(s);
    }
}

class FluxNever<T> extends Flux<T> {
    subscribe(s: rs.Subscriber<T>) : void {
        s.onSubscribe(sp.EmptySubscription.INSTANCE);
    }
}

class FluxError<T> extends Flux<T> {
    constructor(private readonly error: Error) {
        super();
    }
    
    subscribe(s: rs.Subscriber<T>) : void {
        sp.EmptySubscription.error(s, this.error);
    }
}

class FluxJust<T> extends Flux<T> {
    constructor(private readonly value: T) {
        super();
    }
    
    subscribe(s: rs.Subscriber<T>) : void {
        const d = new sp.DeferredScalarSubscription<T>(s);
        s.onSubscribe(d);
        d.complete(this.value);
    }
}

class FluxArray<T> extends Flux<T> {
    constructor(private readonly array: ReadonlyArray<T>) {
        super();
    }
    
    subscribe(s: rs.Subscriber<T>) : void {
        s.onSubscribe(new array.ArraySubscription<T>(this.array, s));
    }
}

class FluxFromAsyncIterable<T> extends Flux<T> {
    constructor(private readonly source: AsyncIterable<T>, 
            private readonly backoff: BackoffConfig,
            private readonly scheduler: sch.TimedScheduler) {
        super();
    }
    
    subscribe(s: rs.Subscriber<T>) : void {
        const parent = new sequence.SequenceSubscription<T>(s, this.source, this.backoff, this.scheduler);
        s.onSubscribe(parent);
        parent.start();
    }
}

class FluxFromAsyncStream<T> extends Flux<T> {
    constructor(private readonly source: AsyncIterable<T>, private readonly config: StreamConfig) {
        super();
    }
    
    subscribe(s: rs.Subscriber<T>) : void {
        const parent = new stream.StreamSubscription<T>(s, this.source, this.config);
        s.onSubscribe(parent);
        parent.start();
    }
}

class FluxFromTask<T> extends Flux<T> {
    private readonly outcome: Promise<task.TaskOutcome<T>>;
    
    constructor(t: Task<T>) {
        super();
        this.outcome = task.settleTask(t);
    }
    
    subscribe(s: rs.Subscriber<T>) : void {
        task.subscribeOutcome(s, this.outcome);
    }
}
