import * as flow from "./flow";

interface Chunk<T> {
    readonly items: Array<T>;
    next: Chunk<T> | null;
}

/** 
 * An unbounded FIFO queue made of linked power-of-2 sized array chunks.
 * Any value, including null and undefined, may be queued.
 */
export class LinkedArrayQueue<T> implements flow.Queue<T> {
    private mMask: number;
    private mProducerIndex: number;
    private mProducerChunk: Chunk<T>;
    private mConsumerIndex: number;
    private mConsumerChunk: Chunk<T>;
    
    constructor(capacity: number) {
        if ((capacity & (capacity - 1)) != 0) {
            throw new Error("capacity must be power-of-2");
        }
        if (capacity < 2) {
            capacity = 2;
        }
        this.mMask = capacity - 1;
        const c = this.newChunk();
        this.mProducerChunk = c;
        this.mProducerIndex = 0;
        this.mConsumerChunk = c;
        this.mConsumerIndex = 0;
    }
    
    offer(t: T) : boolean {
        const pi = this.mProducerIndex;
        const o = pi & this.mMask;
        
        if (o == 0 && pi != 0) {
            const c = this.newChunk();
            this.mProducerChunk.next = c;
            this.mProducerChunk = c;
        }
        this.mProducerChunk.items[o] = t;
        this.mProducerIndex = pi + 1;
        return true;
    }
    
    poll() : T | undefined {
        if (this.isEmpty()) {
            return undefined;
        }
        return this.take();
    }
    
    /** Removes the oldest item; the queue must not be empty. */
    take() : T {
        const ci = this.mConsumerIndex;
        if (ci == this.mProducerIndex) {
            throw new Error("Queue is empty");
        }
        const o = ci & this.mMask;
        
        if (o == 0 && ci != 0) {
            const next = this.mConsumerChunk.next;
            if (next == null) {
                throw new Error("Queue chunk link missing");
            }
            this.mConsumerChunk = next;
        }
        const a = this.mConsumerChunk.items;
        const v = a[o];
        delete a[o];
        this.mConsumerIndex = ci + 1;
        return v;
    }
    
    isEmpty() : boolean {
        return this.mProducerIndex == this.mConsumerIndex;
    }
    
    size() : number {
        return this.mProducerIndex - this.mConsumerIndex;
    }
    
    clear() : void {
        const c = this.newChunk();
        this.mProducerChunk = c;
        this.mConsumerChunk = c;
        this.mProducerIndex = 0;
        this.mConsumerIndex = 0;
    }

    private newChunk() : Chunk<T> {
        return { items: new Array<T>(this.mMask + 1), next: null };
    }
}
