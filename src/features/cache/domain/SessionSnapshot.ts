import type { CacheType } from './CachePolicy.js';

export const SNAPSHOT_VERSION = 1;

/** A stored cookie with the metadata needed to match it against a URL */
export interface StoredCookie {
    name: string;
    value: string;
    /** Lower-case host, without a leading dot */
    domain: string;
    path: string;
    /** Sent to `domain` only, not to its subdomains */
    hostOnly: boolean;
    secure: boolean;
    httpOnly: boolean;
    /** Epoch ms; absent for session cookies */
    expires?: number;
}

/**
 * Everything needed to resume a session in another process.
 */
export interface SessionSnapshot {
    version: typeof SNAPSHOT_VERSION;
    cookies: StoredCookie[];
    /** Lower-case header names */
    headers: Record<string, string>;
    proxies: Record<string, string>;
    cache: {
        filePath: string;
        timeoutSeconds: number;
        cacheType: CacheType;
    };
    /** Informational; freshness always comes from the file mtime */
    savedAt: string;
}
