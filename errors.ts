/** Signals that a publisher completed successfully without emitting any value. */
export class NoOutputProducedError extends Error {
    constructor() {
        super("Publisher completed without producing any values");
        this.name = "NoOutputProducedError";
    }
}

/** Signals that an awaiting computation was cancelled before it received a result. */
export class CancellationError extends Error {
    constructor(message?: string) {
        super(message === undefined ? "The operation was cancelled" : message);
        this.name = "CancellationError";
    }
}

export function isCancellationError(e: unknown) : e is CancellationError {
    return e instanceof CancellationError;
}

/** 
 * Errors pass through as the same instance; any other thrown value is wrapped,
 * keeping the original as the cause.
 */
export function toError(e: unknown) : Error {
    if (e instanceof Error) {
        return e;
    }
    return new Error(String(e), { cause: e });
}
