export {
    PersistentSession,
    temporaryCacheFilePath,
    type PersistentSessionOptions,
    type RequestOptions,
} from './features/session/usecases/PersistentSession.js';
export { CacheType, shouldLoad, shouldTriggerSave, type CacheEvent } from './features/cache/domain/CachePolicy.js';
export { SNAPSHOT_VERSION, type SessionSnapshot, type StoredCookie } from './features/cache/domain/SessionSnapshot.js';
export { resolveCachedSnapshot, type CacheLoadResult } from './features/cache/usecases/cacheLoading.js';
export { LoginResponse, LoginStatus } from './features/login/domain/LoginResponse.js';
export { type LoginPayload, type LoginRequestOptions } from './features/login/usecases/loginEvaluator.js';
export { SessionError, SessionErrorType } from './core/errors.js';
export { HttpResponse, type HttpResponseInit, type RawHeaders } from './core/http/HttpResponse.js';
export type { CacheStore, CacheReadResult } from './core/ports/CacheStore.js';
export type { HttpEngine, PreparedRequest, ProxyConfig } from './core/ports/HttpEngine.js';
export { FileCacheStore } from './infrastructure/cache/FileCacheStore.js';
export { SessionSnapshotSchema } from './infrastructure/cache/SessionSnapshotSchema.js';
export { CookieJar } from './infrastructure/networking/CookieJar.js';
export { NodeFetchEngine } from './infrastructure/networking/NodeFetchEngine.js';
export { DEFAULT_USER_AGENT, DEFAULT_CACHE_TIMEOUT_SECONDS } from './platform/config.js';
