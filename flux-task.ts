import * as rs from './reactivestreams-spec';
import * as sp from './subscription';
import * as subscriber from './subscriber';
import { Task } from './task';
import type { TaskOptions } from './task';
import { toError } from './errors';
import { createLogger } from './logger';

const log = createLogger("flux-task");

/** The terminal event handed to an asynchronous completion callback. */
export type Completion =
    | { readonly kind: "finished" }
    | { readonly kind: "failure"; readonly error: Error };

/** A settled task, kept as data so it can be replayed to every subscriber. */
export type TaskOutcome<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: Error };

export function settleTask<T>(task: Task<T>) : Promise<TaskOutcome<T>> {
    return task.value.then(
        (v): TaskOutcome<T> => ({ ok: true, value: v }),
        (e: unknown): TaskOutcome<T> => ({ ok: false, error: toError(e) }));
}

/** Signals the outcome as one item followed by completion, or as a failure. */
export function subscribeOutcome<T>(s: rs.Subscriber<T>, outcome: Promise<TaskOutcome<T>>) : void {
    const dsd = new sp.DeferredScalarSubscription<T>(s);
    s.onSubscribe(dsd);
    
    void outcome
        .then(o => {
            if (dsd.isCancelled()) {
                return;
            }
            if (o.ok) {
                dsd.complete(o.value);
            } else {
                dsd.error(o.error);
            }
        })
        .catch((ex: unknown) => {
            log.error({ err: toError(ex) }, "subscriber failed while receiving the task outcome");
        });
}

/**
 * Creates a subscriber that launches a new task for every item and one for the
 * terminal event. The tasks are not serialised: their bodies may run in any
 * order relative to each other.
 */
export function dispatchingSubscriber<T>(
        onNext: (t: T) => Promise<void> | void,
        onCompletion: (c: Completion) => Promise<void> | void,
        options?: TaskOptions) : subscriber.CallbackSubscriber<T> {
    
    const dispatch = (body: () => Promise<void> | void) : void => {
        void Task.run(body, options).value.catch((ex: unknown) => {
            log.error({ err: toError(ex) }, "dispatched callback failed");
        });
    };
    
    return new subscriber.CallbackSubscriber<T>(
        t => dispatch(() => onNext(t)),
        e => dispatch(() => onCompletion({ kind: "failure", error: e })),
        () => dispatch(() => onCompletion({ kind: "finished" })));
}
