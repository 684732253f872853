export type { Publisher, Subscriber, Subscription } from './reactivestreams-spec';
export type { Cancellation } from './flow';
export { Flux } from './flux';
export type { SequenceOptions, StreamOptions } from './flux';
export { DemandTracker } from './flux-demand';
export { SequenceSubscription } from './flux-sequence';
export { StreamSubscription } from './flux-stream';
export type { StreamResult } from './flux-stream';
export { AsyncStream } from './async-stream';
export type { StreamContinuation, TerminationReason } from './async-stream';
export { awaitLast, awaitLastOrUndefined } from './flux-await';
export type { AwaitOptions } from './flux-await';
export type { Completion } from './flux-task';
export { Task } from './task';
export type { TaskOptions } from './task';
export { DefaultScheduler } from './scheduler';
export type { TaskPriority, Scheduler, TimedScheduler } from './scheduler';
export { CallbackSubscriber, TestSubscriber } from './subscriber';
export { NoOutputProducedError, CancellationError, isCancellationError } from './errors';
export { ConfigurationManager } from './config';
export type { BridgeConfig, BridgeConfigOverrides, BackoffConfig, StreamConfig } from './config';
