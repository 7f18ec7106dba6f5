import { logger } from '../../../platform/logger.js';

const COMPONENT = 'ExitFallback';

export interface Finalizable {
    /** Synchronous last-chance save. */
    finalize(): void;
}

/**
 * Best-effort save at process exit for sessions that were never used in a
 * scope. Only weak references are held, so a collected session is simply
 * skipped. Nothing here runs on SIGKILL, on a crash inside native code, or
 * when the process is terminated by an unhandled signal.
 */
const registered = new Set<WeakRef<Finalizable>>();

const cleanup = new FinalizationRegistry<WeakRef<Finalizable>>((ref) => {
    registered.delete(ref);
});

let hookInstalled = false;

export function runExitFallbacks(): void {
    for (const ref of registered) {
        const target = ref.deref();
        if (!target) continue;
        try {
            target.finalize();
        } catch (error) {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Save on exit failed', error });
        }
    }
    registered.clear();
}

export function registerExitFallback(target: Finalizable): WeakRef<Finalizable> {
    if (!hookInstalled) {
        process.once('exit', runExitFallbacks);
        hookInstalled = true;
    }
    const ref = new WeakRef(target);
    registered.add(ref);
    cleanup.register(target, ref, ref);
    return ref;
}

export function unregisterExitFallback(ref: WeakRef<Finalizable>): void {
    registered.delete(ref);
    cleanup.unregister(ref);
}

export function registeredExitFallbackCount(): number {
    return registered.size;
}
