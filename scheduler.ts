import * as flow from './flow';

/** Provides an abstract asychronous boundary to operators. */
export interface Scheduler {
    schedule(task: () => void) : flow.Cancellation;
}

export interface TimedScheduler extends Scheduler {
    scheduleDelayed(task: () => void, delay: number) : flow.Cancellation;
}

/** Hint for where a launched task is queued relative to other pending work. */
export type TaskPriority = "high" | "normal" | "low";

/** Runs tasks on the timer queue. */
export class DefaultScheduler implements TimedScheduler {
    private static P_INSTANCE = new DefaultScheduler();
    
    public static get INSTANCE() : TimedScheduler { return DefaultScheduler.P_INSTANCE; }

    schedule(task: () => void) : flow.Cancellation {
        const id = setTimeout(task, 0);
        return new flow.CallbackCancellation(() => clearTimeout(id));
    }
    
    scheduleDelayed(task: () => void, delay: number) : flow.Cancellation {
        const id = setTimeout(task, delay);
        return new flow.CallbackCancellation(() => clearTimeout(id));
    }
}

/** Runs tasks on the check queue, ahead of pending timers. */
export class ImmediateScheduler implements Scheduler {
    private static P_INSTANCE = new ImmediateScheduler();
    
    public static get INSTANCE() : Scheduler { return ImmediateScheduler.P_INSTANCE; }

    schedule(task: () => void) : flow.Cancellation {
        const id = setImmediate(task);
        return new flow.CallbackCancellation(() => clearImmediate(id));
    }
}

/** Runs tasks as microtasks, before any other queued work. */
export class MicrotaskScheduler implements Scheduler {
    private static P_INSTANCE = new MicrotaskScheduler();
    
    public static get INSTANCE() : Scheduler { return MicrotaskScheduler.P_INSTANCE; }

    schedule(task: () => void) : flow.Cancellation {
        const bc = new flow.BooleanCancellation();
        queueMicrotask(() => {
            if (!bc.isCancelled()) {
                task();
            }
        });
        return bc;
    }
}

export function schedulerFor(priority?: TaskPriority) : Scheduler {
    switch (priority) {
        case "high":
            return MicrotaskScheduler.INSTANCE;
        case "low":
            return DefaultScheduler.INSTANCE;
        default:
            return ImmediateScheduler.INSTANCE;
    }
}
