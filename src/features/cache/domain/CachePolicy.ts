/**
 * Domain rules - cache freshness and save triggers. No I/O.
 */

/** Selects which events persist the session automatically. */
export enum CacheType {
    /** Only explicit `cacheSession()` calls */
    MANUAL = 'MANUAL',
    AFTER_EACH_REQUEST = 'AFTER_EACH_REQUEST',
    AFTER_EACH_POST = 'AFTER_EACH_POST',
    /** After each successful login */
    AFTER_EACH_LOGIN = 'AFTER_EACH_LOGIN',
    /**
     * When a scoped session exits. Unscoped sessions fall back to a process
     * exit hook that is not guaranteed to run.
     */
    AT_EXIT = 'AT_EXIT',
}

export const CACHE_TYPES: readonly CacheType[] = Object.values(CacheType);

export function isCacheType(value: unknown): value is CacheType {
    return CACHE_TYPES.some((cacheType) => cacheType === value);
}

export type CacheEvent =
    | { kind: 'request_sent'; method: string }
    | { kind: 'login_succeeded' }
    | { kind: 'scope_exit' };

/**
 * Rule: a cache file is usable while its age is strictly below the timeout.
 * A missing file (null mtime) is never usable.
 */
export function shouldLoad(lastModifiedMs: number | null, timeoutSeconds: number, now: number): boolean {
    if (lastModifiedMs === null) return false;
    return now - lastModifiedMs < timeoutSeconds * 1000;
}

/**
 * Rule: exactly one row of the trigger table applies per cache type.
 */
export function shouldTriggerSave(cacheType: CacheType, event: CacheEvent): boolean {
    switch (cacheType) {
        case CacheType.MANUAL:
            return false;
        case CacheType.AFTER_EACH_REQUEST:
            return event.kind === 'request_sent';
        case CacheType.AFTER_EACH_POST:
            return event.kind === 'request_sent' && event.method.toUpperCase() === 'POST';
        case CacheType.AFTER_EACH_LOGIN:
            return event.kind === 'login_succeeded';
        case CacheType.AT_EXIT:
            return event.kind === 'scope_exit';
    }
}
