import { isCacheType } from '../../features/cache/domain/CachePolicy.js';
import {
    SNAPSHOT_VERSION,
    type SessionSnapshot,
    type StoredCookie,
} from '../../features/cache/domain/SessionSnapshot.js';

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const requireString = (field: string, value: unknown): string => {
    if (typeof value !== 'string') {
        throw new Error(`SessionSnapshotSchema: ${field} must be string`);
    }
    return value;
};

const requireNonEmptyString = (field: string, value: unknown): string => {
    const str = requireString(field, value);
    if (str.length === 0) {
        throw new Error(`SessionSnapshotSchema: ${field} must be non-empty string`);
    }
    return str;
};

const requireBoolean = (field: string, value: unknown): boolean => {
    if (typeof value !== 'boolean') {
        throw new Error(`SessionSnapshotSchema: ${field} must be boolean`);
    }
    return value;
};

const requireFiniteNumber = (field: string, value: unknown): number => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new Error(`SessionSnapshotSchema: ${field} must be finite number`);
    }
    return value;
};

const parseStringMap = (field: string, value: unknown): Record<string, string> => {
    if (!isRecord(value)) {
        throw new Error(`SessionSnapshotSchema: ${field} must be an object`);
    }
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
        result[key] = requireString(`${field}.${key}`, entry);
    }
    return result;
};

const parseCookie = (value: unknown, idx: number): StoredCookie => {
    const field = `cookies[${idx}]`;
    if (!isRecord(value)) {
        throw new Error(`SessionSnapshotSchema: ${field} must be an object`);
    }
    const cookie: StoredCookie = {
        name: requireNonEmptyString(`${field}.name`, value.name),
        value: requireString(`${field}.value`, value.value),
        domain: requireNonEmptyString(`${field}.domain`, value.domain),
        path: requireNonEmptyString(`${field}.path`, value.path),
        hostOnly: requireBoolean(`${field}.hostOnly`, value.hostOnly),
        secure: requireBoolean(`${field}.secure`, value.secure),
        httpOnly: requireBoolean(`${field}.httpOnly`, value.httpOnly),
    };
    if (value.expires !== undefined) {
        cookie.expires = requireFiniteNumber(`${field}.expires`, value.expires);
    }
    return cookie;
};

const parseCacheBlock = (value: unknown): SessionSnapshot['cache'] => {
    if (!isRecord(value)) {
        throw new Error('SessionSnapshotSchema: cache must be an object');
    }
    const timeoutSeconds = requireFiniteNumber('cache.timeoutSeconds', value.timeoutSeconds);
    if (timeoutSeconds < 0) {
        throw new Error('SessionSnapshotSchema: cache.timeoutSeconds must not be negative');
    }
    const cacheType = value.cacheType;
    if (!isCacheType(cacheType)) {
        throw new Error(`SessionSnapshotSchema: cache.cacheType is not a known cache type (${String(cacheType)})`);
    }
    return {
        filePath: requireNonEmptyString('cache.filePath', value.filePath),
        timeoutSeconds,
        cacheType,
    };
};

/**
 * Field-by-field validation of a decoded cache file. Anything that is not a
 * version 1 snapshot is rejected with an Error naming the first bad field.
 */
export const SessionSnapshotSchema = {
    parse(input: unknown): SessionSnapshot {
        if (!isRecord(input)) {
            throw new Error('SessionSnapshotSchema: snapshot must be an object');
        }
        if (input.version !== SNAPSHOT_VERSION) {
            throw new Error(`SessionSnapshotSchema: unsupported version ${String(input.version)}`);
        }
        if (!Array.isArray(input.cookies)) {
            throw new Error('SessionSnapshotSchema: cookies must be array');
        }

        return {
            version: SNAPSHOT_VERSION,
            cookies: input.cookies.map((cookie, idx) => parseCookie(cookie, idx)),
            headers: parseStringMap('headers', input.headers),
            proxies: parseStringMap('proxies', input.proxies),
            cache: parseCacheBlock(input.cache),
            savedAt: requireString('savedAt', input.savedAt),
        };
    },

    serialize(snapshot: SessionSnapshot): string {
        return JSON.stringify(snapshot, null, 2);
    },
};
