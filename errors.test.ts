import { describe, it, expect } from "vitest";
import { CancellationError, NoOutputProducedError, isCancellationError, toError } from "./errors";

describe("errors", () => {
    it("recognises cancellation", () => {
        expect(isCancellationError(new CancellationError())).toBe(true);
        expect(isCancellationError(new NoOutputProducedError())).toBe(false);
        expect(isCancellationError("cancelled")).toBe(false);
    });

    it("uses the default cancellation message", () => {
        expect(new CancellationError().message).toBe("The operation was cancelled");
        expect(new CancellationError("stopped").message).toBe("stopped");
    });

    it("passes errors through and wraps other values", () => {
        const e = new Error("same");
        expect(toError(e)).toBe(e);

        const wrapped = toError(42);
        expect(wrapped.message).toBe("42");
        expect(wrapped.cause).toBe(42);
    });
});
