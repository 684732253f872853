import { z } from "zod";

export const BackoffConfigSchema = z.object({
    /** First delay of the demand poll. */
    minDelayMs: z.number().positive(),
    /** Cap on each individual delay; delays double until they reach it. */
    maxDelayMs: z.number().positive(),
    /** Number of sleeps before a pulled item is abandoned. */
    maxRetries: z.number().int().nonnegative(),
}).refine(b => b.maxDelayMs >= b.minDelayMs, {
    message: "maxDelayMs must not be below minDelayMs",
    path: ["maxDelayMs"],
});

export const StreamConfigSchema = z.object({
    /** Buffer size above which a warning is logged. Items are never dropped. */
    maxBuffered: z.union([z.number().int().positive(), z.literal(Infinity)]),
});

export const BridgeConfigSchema = z.object({
    backoff: BackoffConfigSchema,
    stream: StreamConfigSchema,
});

export type BackoffConfig = z.infer<typeof BackoffConfigSchema>;
export type StreamConfig = z.infer<typeof StreamConfigSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export interface BridgeConfigOverrides {
    backoff?: Partial<BackoffConfig>;
    stream?: Partial<StreamConfig>;
}

const EnvSchema = z.object({
    FLUX_BACKOFF_MIN_MS: z.coerce.number().optional(),
    FLUX_BACKOFF_MAX_MS: z.coerce.number().optional(),
    FLUX_BACKOFF_MAX_RETRIES: z.coerce.number().optional(),
    FLUX_STREAM_MAX_BUFFERED: z.coerce.number().optional(),
});

export class ConfigurationManager {
    private static mCurrent: BridgeConfig = ConfigurationManager.createDefault();

    static createDefault() : BridgeConfig {
        return {
            backoff: {
                minDelayMs: 1,
                maxDelayMs: 50,
                maxRetries: 10,
            },
            stream: {
                maxBuffered: Infinity,
            },
        };
    }

    static create(overrides: BridgeConfigOverrides = {}, base?: BridgeConfig) : BridgeConfig {
        const b = base === undefined ? ConfigurationManager.createDefault() : base;
        return BridgeConfigSchema.parse({
            backoff: { ...b.backoff, ...overrides.backoff },
            stream: { ...b.stream, ...overrides.stream },
        });
    }

    static fromEnv(env: Record<string, string | undefined> = process.env) : BridgeConfig {
        const e = EnvSchema.parse(env);
        const backoff: Partial<BackoffConfig> = {};
        const stream: Partial<StreamConfig> = {};
        if (e.FLUX_BACKOFF_MIN_MS !== undefined) {
            backoff.minDelayMs = e.FLUX_BACKOFF_MIN_MS;
        }
        if (e.FLUX_BACKOFF_MAX_MS !== undefined) {
            backoff.maxDelayMs = e.FLUX_BACKOFF_MAX_MS;
        }
        if (e.FLUX_BACKOFF_MAX_RETRIES !== undefined) {
            backoff.maxRetries = e.FLUX_BACKOFF_MAX_RETRIES;
        }
        if (e.FLUX_STREAM_MAX_BUFFERED !== undefined) {
            stream.maxBuffered = e.FLUX_STREAM_MAX_BUFFERED;
        }
        return ConfigurationManager.create({ backoff: backoff, stream: stream });
    }

    /** The process-wide configuration new bridges start from. */
    static get current() : BridgeConfig {
        return ConfigurationManager.mCurrent;
    }

    static configure(overrides: BridgeConfigOverrides) : BridgeConfig {
        const c = ConfigurationManager.create(overrides, ConfigurationManager.mCurrent);
        ConfigurationManager.mCurrent = c;
        return c;
    }

    static reset() : void {
        ConfigurationManager.mCurrent = ConfigurationManager.createDefault();
    }
}
