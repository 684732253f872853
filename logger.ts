import pino, { type Logger } from "pino";

const ROOT_NAME = "flux-async-bridge";

const root: Logger = pino({
    name: ROOT_NAME,
    level: process.env["LOG_LEVEL"] || "warn",
});

/** Returns a child of the library's root logger bound to the given module name. */
export function createLogger(module: string) : Logger {
    return root.child({ module: module });
}

export type { Logger } from "pino";
