import * as rs from './reactivestreams-spec';
import * as sp from './subscription';
import { DemandTracker, addReturnedDemand } from './flux-demand';

export class ArraySubscription<T> implements rs.Subscription {
    private readonly demand: DemandTracker;
    private mIndex: number;
    private emitting: boolean;
    private cancelled: boolean;
    
    constructor(private readonly mArray: ReadonlyArray<T>, private readonly mActual: rs.Subscriber<T>) {
        this.demand = new DemandTracker();
        this.mIndex = 0;
        this.emitting = false;
        this.cancelled = false; 
    }
    
    request(n: number) : void {
        if (sp.SH.validRequest(n)) {
            this.demand.increment(n);
            if (this.emitting) {
                return;
            }
            this.emitting = true;
            
            const b = this.mArray;
            const f = b.length;
            const a = this.mActual;
            
            while (this.mIndex != f && !this.cancelled && this.demand.tryConsumeOne()) {
                const v = b[this.mIndex++];
                addReturnedDemand(this.demand, a.onNext(v));
            }
            
            this.emitting = false;
            
            if (this.mIndex == f && !this.cancelled) {
                this.cancelled = true;
                a.onComplete();
            }
        }
    }
    
    cancel() : void {
        this.cancelled = true;
    }
}
