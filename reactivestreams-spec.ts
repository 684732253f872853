/** Represents an active connection between a Subscriber and a Publisher. */
export interface Subscription {
    request(n: number) : void;
    cancel() : void;
}

/** 
 * Represents the consumer of signals. 
 * 
 * onNext may return additional demand (Infinity meaning unbounded); returning
 * nothing or 0 leaves the outstanding demand as it is.
 */
export interface Subscriber<T> {
    onSubscribe(s: Subscription) : void;
    onNext(t: T) : number | void;
    onError(t: Error) : void;
    onComplete() : void;
}

/** Represents the originator/emitter of signals. */
export interface Publisher<T> {
    subscribe(s: Subscriber<T>) : void;
}
