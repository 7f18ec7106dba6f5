import type { CacheStore } from '../../../core/ports/CacheStore.js';
import { logger } from '../../../platform/logger.js';
import { shouldLoad } from '../domain/CachePolicy.js';
import type { SessionSnapshot } from '../domain/SessionSnapshot.js';

const COMPONENT = 'CacheLoading';

export type CacheLoadResult =
    | { outcome: 'restored'; snapshot: SessionSnapshot; ageMs: number }
    | { outcome: 'not_found' }
    | { outcome: 'expired'; ageMs: number }
    | { outcome: 'corrupt'; reason: string };

/**
 * Decide whether the cache file at `filePath` can be resumed, and read it if so.
 * Every outcome other than `restored` means "start fresh"; none of them throw.
 *
 * @param now - Current time in ms (default: Date.now(); inject for tests)
 */
export async function resolveCachedSnapshot(
    store: CacheStore,
    filePath: string,
    timeoutSeconds: number,
    now: number = Date.now()
): Promise<CacheLoadResult> {
    logger.info({ kind: 'biz', component: COMPONENT, message: 'Check session cache', meta: { filePath } });

    let lastModified: number | null;
    try {
        lastModified = await store.lastModified(filePath);
    } catch (error) {
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Cache file corrupted', error, meta: { filePath } });
        return { outcome: 'corrupt', reason: error instanceof Error ? error.message : String(error) };
    }

    if (lastModified === null) {
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Cache file not found', meta: { filePath } });
        return { outcome: 'not_found' };
    }

    const ageMs = now - lastModified;
    logger.info({
        kind: 'biz',
        component: COMPONENT,
        message: `Cache file found (last modified ${Math.floor(ageMs / 1000)}s ago)`,
        meta: { filePath, ageMs },
    });

    if (!shouldLoad(lastModified, timeoutSeconds, now)) {
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: `Cache expired (older than ${timeoutSeconds}s)`,
            meta: { filePath, ageMs, timeoutSeconds },
        });
        return { outcome: 'expired', ageMs };
    }

    const result = await store.read(filePath);
    switch (result.status) {
        case 'found':
            return { outcome: 'restored', snapshot: result.snapshot, ageMs };
        case 'not_found':
            // Removed between stat and read
            logger.info({ kind: 'biz', component: COMPONENT, message: 'Cache file not found', meta: { filePath } });
            return { outcome: 'not_found' };
        case 'corrupt':
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Cache file corrupted',
                meta: { filePath, reason: result.reason },
            });
            return { outcome: 'corrupt', reason: result.reason };
    }
}
