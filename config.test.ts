import { afterEach, describe, it, expect, vi } from "vitest";
import { ZodError } from "zod";
import { ConfigurationManager } from "./config";
import { Flux } from "./flux";
import { TestSubscriber } from "./subscriber";

describe("ConfigurationManager", () => {
    afterEach(() => {
        ConfigurationManager.reset();
    });

    it("provides defaults", () => {
        expect(ConfigurationManager.createDefault()).toEqual({
            backoff: { minDelayMs: 1, maxDelayMs: 50, maxRetries: 10 },
            stream: { maxBuffered: Infinity },
        });
        expect(ConfigurationManager.current).toEqual(ConfigurationManager.createDefault());
    });

    it("merges overrides onto the defaults", () => {
        const c = ConfigurationManager.create({ backoff: { maxRetries: 3 } });
        expect(c.backoff).toEqual({ minDelayMs: 1, maxDelayMs: 50, maxRetries: 3 });
        expect(c.stream.maxBuffered).toBe(Infinity);
    });

    it("rejects a cap below the first delay", () => {
        expect(() => ConfigurationManager.create({ backoff: { minDelayMs: 20, maxDelayMs: 10 } })).toThrow(ZodError);
    });

    it("rejects invalid numbers", () => {
        expect(() => ConfigurationManager.create({ backoff: { maxRetries: -1 } })).toThrow(ZodError);
        expect(() => ConfigurationManager.create({ backoff: { maxRetries: 1.5 } })).toThrow(ZodError);
        expect(() => ConfigurationManager.create({ stream: { maxBuffered: 0 } })).toThrow(ZodError);
    });

    it("reads environment variables", () => {
        const c = ConfigurationManager.fromEnv({
            FLUX_BACKOFF_MIN_MS: "2",
            FLUX_BACKOFF_MAX_RETRIES: "4",
            FLUX_STREAM_MAX_BUFFERED: "100",
        });
        expect(c.backoff).toEqual({ minDelayMs: 2, maxDelayMs: 50, maxRetries: 4 });
        expect(c.stream.maxBuffered).toBe(100);
    });

    it("rejects a non-numeric environment variable", () => {
        expect(() => ConfigurationManager.fromEnv({ FLUX_BACKOFF_MAX_MS: "soon" })).toThrow(ZodError);
    });

    it("applies the configured backoff to new bridges", async () => {
        ConfigurationManager.configure({ backoff: { maxRetries: 0 } });
        expect(ConfigurationManager.current.backoff.maxRetries).toBe(0);

        let released = false;
        async function* source() : AsyncGenerator<number> {
            try {
                yield 1;
            } finally {
                released = true;
            }
        }
        const ts = new TestSubscriber<number>();
        Flux.fromAsyncIterable(source()).subscribe(ts);

        await vi.waitFor(() => expect(released).toBe(true));
        ts.assertNoValues();
        ts.assertNotTerminated();
    });
});
