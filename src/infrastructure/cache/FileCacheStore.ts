import fs from 'fs';
import path from 'path';
import { nanoid } from 'nanoid';
import { logger } from '../../platform/logger.js';
import type { CacheReadResult, CacheStore } from '../../core/ports/CacheStore.js';
import type { SessionSnapshot } from '../../features/cache/domain/SessionSnapshot.js';
import { SessionSnapshotSchema } from './SessionSnapshotSchema.js';

const COMPONENT = 'FileCacheStore';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
    error instanceof Error && 'code' in error;

const tempPathFor = (filePath: string): string =>
    path.join(path.dirname(filePath), `.${path.basename(filePath)}.${nanoid(8)}.tmp`);

/**
 * One JSON snapshot per file. Writes go to a sibling temp file that is then
 * renamed over the target, so readers never see a half-written snapshot on
 * filesystems where rename is atomic.
 */
export class FileCacheStore implements CacheStore {
    async read(filePath: string): Promise<CacheReadResult> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return { status: 'not_found' };
            }
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Cache file unreadable', error, meta: { filePath } });
            return { status: 'corrupt', reason: error instanceof Error ? error.message : String(error) };
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch (error) {
            return { status: 'corrupt', reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
        }

        try {
            return { status: 'found', snapshot: SessionSnapshotSchema.parse(decoded) };
        } catch (error) {
            return { status: 'corrupt', reason: error instanceof Error ? error.message : String(error) };
        }
    }

    async write(filePath: string, snapshot: SessionSnapshot): Promise<void> {
        const tempPath = tempPathFor(filePath);
        try {
            await fs.promises.writeFile(tempPath, SessionSnapshotSchema.serialize(snapshot), 'utf-8');
            await fs.promises.rename(tempPath, filePath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true });
            throw error;
        }
        logger.debug({ kind: 'sys', component: COMPONENT, message: 'Snapshot written', meta: { filePath } });
    }

    writeSync(filePath: string, snapshot: SessionSnapshot): void {
        const tempPath = tempPathFor(filePath);
        try {
            fs.writeFileSync(tempPath, SessionSnapshotSchema.serialize(snapshot), 'utf-8');
            fs.renameSync(tempPath, filePath);
        } catch (error) {
            fs.rmSync(tempPath, { force: true });
            throw error;
        }
        logger.debug({ kind: 'sys', component: COMPONENT, message: 'Snapshot written (sync)', meta: { filePath } });
    }

    async lastModified(filePath: string): Promise<number | null> {
        try {
            const stats = await fs.promises.stat(filePath);
            return stats.mtimeMs;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }
    }
}
