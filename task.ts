import * as sch from './scheduler';
import { CancellationError } from './errors';

export interface TaskOptions {
    priority?: sch.TaskPriority;
    /** Overrides the scheduler the priority would pick. */
    scheduler?: sch.Scheduler;
}

/**
 * A one-shot asynchronous computation launched on a scheduler.
 * 
 * Cancellation is cooperative: a task that has not started yet rejects with a
 * CancellationError, a running body observes it through its AbortSignal.
 */
export class Task<T> {
    private readonly mController: AbortController;

    readonly value: Promise<T>;
    
    private constructor(body: (signal: AbortSignal) => Promise<T> | T, scheduler: sch.Scheduler) {
        const controller = new AbortController();
        this.mController = controller;
        this.value = new Promise<T>((resolve, reject) => {
            scheduler.schedule(() => {
                if (controller.signal.aborted) {
                    reject(new CancellationError());
                    return;
                }
                try {
                    Promise.resolve(body(controller.signal)).then(resolve, reject);
                } catch (ex) {
                    reject(ex);
                }
            });
        });
    }
    
    static run<T>(body: (signal: AbortSignal) => Promise<T> | T, options?: TaskOptions) : Task<T> {
        const s = options?.scheduler ?? sch.schedulerFor(options?.priority);
        return new Task<T>(body, s);
    }
    
    get signal() : AbortSignal {
        return this.mController.signal;
    }
    
    get isCancelled() : boolean {
        return this.mController.signal.aborted;
    }
    
    cancel() : void {
        if (!this.mController.signal.aborted) {
            this.mController.abort(new CancellationError());
        }
    }
}
