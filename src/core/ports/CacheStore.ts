import type { SessionSnapshot } from '../../features/cache/domain/SessionSnapshot.js';

export type CacheReadResult =
    | { status: 'found'; snapshot: SessionSnapshot }
    | { status: 'not_found' }
    | { status: 'corrupt'; reason: string };

/**
 * Port - persistence for one session snapshot per path.
 * Knows nothing about HTTP; only about files and their freshness signal.
 */
export interface CacheStore {
    /** Never throws for a missing or unreadable snapshot. */
    read(filePath: string): Promise<CacheReadResult>;
    /** Always writes, so the modification time refreshes even for identical content. */
    write(filePath: string, snapshot: SessionSnapshot): Promise<void>;
    /** Blocking variant for process exit hooks. */
    writeSync(filePath: string, snapshot: SessionSnapshot): void;
    /** Epoch ms, or null when there is no file. */
    lastModified(filePath: string): Promise<number | null>;
}
