export interface Cancellation {
    dispose() : void;
}

export interface Queue<T> {
    offer(t: T) : boolean;
    poll() : T | undefined;
    isEmpty() : boolean;
    clear() : void;
    size() : number;
}

export class CallbackCancellation implements Cancellation {
    private mCallback: (() => void) | null;
    
    constructor(callback: () => void) {
        this.mCallback = callback;
    }
    
    dispose() : void {
        const c = this.mCallback;
        if (c != null) {
            this.mCallback = null;
            c();
        }
    }
}

export class BooleanCancellation implements Cancellation {
    private mCancelled: boolean = false;
    
    dispose() : void {
        this.mCancelled = true;
    }
    
    isCancelled() : boolean {
        return this.mCancelled;
    }
}
