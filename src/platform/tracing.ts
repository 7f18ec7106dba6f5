/**
 * Tracing Module - AsyncLocalStorage wrapper
 *
 * Every outbound request of a session runs inside its own trace context, so
 * the log lines of one request (redirect hops, cookie updates, cache writes)
 * share a trace id even when several sessions interleave on the event loop.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

export interface TraceContext {
    /** Unique id shared by every log line of one request */
    traceId: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * 12 characters is plenty to tell concurrent requests apart.
 */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * Run an async function inside a trace context.
 *
 * @example
 * await runWithTraceId(generateTraceId(), async () => {
 *     logger.info({ kind: 'sys', component: 'X', message: 'Hello' }); // carries traceId
 * });
 */
export async function runWithTraceId<T>(traceId: string, fn: () => Promise<T>): Promise<T> {
    const context: TraceContext = { traceId };
    return asyncLocalStorage.run(context, fn);
}

/**
 * Returns undefined outside of a trace context.
 */
export function getTraceId(): string | undefined {
    return asyncLocalStorage.getStore()?.traceId;
}
