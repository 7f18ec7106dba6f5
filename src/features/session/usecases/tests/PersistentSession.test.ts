import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import config from '../../../../platform/config.js';
import { SessionError, SessionErrorType } from '../../../../core/errors.js';
import { HttpResponse, type RawHeaders } from '../../../../core/http/HttpResponse.js';
import type { HttpEngine, PreparedRequest } from '../../../../core/ports/HttpEngine.js';
import { FileCacheStore } from '../../../../infrastructure/cache/FileCacheStore.js';
import { CacheType } from '../../../cache/domain/CachePolicy.js';
import type { SessionSnapshot } from '../../../cache/domain/SessionSnapshot.js';
import { LoginStatus } from '../../../login/domain/LoginResponse.js';
import { PersistentSession } from '../PersistentSession.js';

type Responder = (request: PreparedRequest) => HttpResponse;

const reply = (request: PreparedRequest, status: number, headers: RawHeaders = {}, body = ''): HttpResponse =>
    new HttpResponse({ status, statusText: '', url: request.url, headers, body: Buffer.from(body) });

/** In-process HttpEngine that records every request it is handed */
class StubEngine implements HttpEngine {
    requests: PreparedRequest[] = [];
    closeCalls = 0;

    constructor(private readonly responder: Responder = (request) => reply(request, 200)) {}

    async send(request: PreparedRequest): Promise<HttpResponse> {
        this.requests.push(request);
        return this.responder(request);
    }

    close(): void {
        this.closeCalls += 1;
    }
}

/** Real file store that counts writes */
class CountingStore extends FileCacheStore {
    writes = 0;
    syncWrites = 0;

    override async write(filePath: string, snapshot: SessionSnapshot): Promise<void> {
        this.writes += 1;
        await super.write(filePath, snapshot);
    }

    override writeSync(filePath: string, snapshot: SessionSnapshot): void {
        this.syncWrites += 1;
        super.writeSync(filePath, snapshot);
    }
}

const BASE = 'https://example.test';

describe('PersistentSession', () => {
    let dir: string;
    let cacheFilePath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'persistent-session-test-'));
        cacheFilePath = path.join(dir, 'session.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('cache triggers', () => {
        it('AFTER_EACH_POST writes once for a GET followed by a POST', async () => {
            const store = new CountingStore();
            const session = await PersistentSession.create({
                cacheFilePath,
                cacheType: CacheType.AFTER_EACH_POST,
                engine: new StubEngine(),
                store,
            });

            await session.get(`${BASE}/a`);
            await session.post(`${BASE}/b`, { data: { x: '1' } });

            expect(store.writes).toBe(1);
            expect(fs.existsSync(cacheFilePath)).toBe(true);
        });

        it('AFTER_EACH_REQUEST writes after every request', async () => {
            const store = new CountingStore();
            const session = await PersistentSession.create({
                cacheFilePath,
                cacheType: CacheType.AFTER_EACH_REQUEST,
                engine: new StubEngine(),
                store,
            });

            await session.get(`${BASE}/a`);
            await session.put(`${BASE}/b`);
            await session.delete(`${BASE}/c`);

            expect(store.writes).toBe(3);
        });

        it('MANUAL writes only on cacheSession', async () => {
            const store = new CountingStore();
            const session = await PersistentSession.create({
                cacheFilePath,
                cacheType: CacheType.MANUAL,
                engine: new StubEngine(),
                store,
            });

            await session.post(`${BASE}/a`);
            expect(store.writes).toBe(0);
            await session.cacheSession();
            expect(store.writes).toBe(1);
        });

        it('AFTER_EACH_LOGIN writes on a successful login only', async () => {
            const loggedIn: Responder = (request) =>
                request.method === 'GET' ? reply(request, 302, { location: ['/home'] }) : reply(request, 200);
            const store = new CountingStore();
            const session = await PersistentSession.create({
                cacheFilePath,
                engine: new StubEngine(loggedIn),
                store,
            });

            const result = await session.login(`${BASE}/login`, { user: 'u', password: 'test-secret' });

            expect(result.status).toBe(LoginStatus.SUCCESS);
            expect(store.writes).toBe(1);

            const failingStore = new CountingStore();
            const other = await PersistentSession.create({
                cacheFilePath: path.join(dir, 'other.json'),
                engine: new StubEngine(),
                store: failingStore,
            });
            const failed = await other.login(`${BASE}/login`, 'user=u');
            expect(failed.status).toBe(LoginStatus.FAILURE);
            expect(failingStore.writes).toBe(0);
        });
    });

    describe('AT_EXIT', () => {
        it('saves when a scoped session exits and not again on finalize', async () => {
            const seed = await PersistentSession.create({ cacheFilePath, engine: new StubEngine() });
            await seed.cacheSession();
            const past = Date.now() / 1000 - 60;
            fs.utimesSync(cacheFilePath, past, past);

            const store = new CountingStore();
            const engine = new StubEngine();
            const captured: { session?: PersistentSession } = {};
            const status = await PersistentSession.withSession(
                { cacheFilePath, cacheType: CacheType.AT_EXIT, engine, store },
                async (session) => {
                    captured.session = session;
                    const response = await session.get(`${BASE}/data`);
                    return response.status;
                }
            );

            expect(status).toBe(200);
            expect(store.writes).toBe(1);
            expect(fs.statSync(cacheFilePath).mtimeMs).toBeGreaterThan(past * 1000);
            expect(engine.closeCalls).toBe(1);
            expect(captured.session?.isClosed).toBe(true);

            captured.session?.finalize();
            expect(store.syncWrites).toBe(0);
            expect(store.writes).toBe(1);
        });

        it('saves on scope exit even when the body throws', async () => {
            const store = new CountingStore();
            const failure = new Error('boom');
            await expect(
                PersistentSession.withSession(
                    { cacheFilePath, cacheType: CacheType.AT_EXIT, engine: new StubEngine(), store },
                    async () => {
                        throw failure;
                    }
                )
            ).rejects.toBe(failure);
            expect(store.writes).toBe(1);
        });

        it('exit is idempotent', async () => {
            const store = new CountingStore();
            const session = (
                await PersistentSession.create({ cacheFilePath, cacheType: CacheType.AT_EXIT, engine: new StubEngine(), store })
            ).enter();

            await session.exit();
            await session.exit();

            expect(store.writes).toBe(1);
        });

        it('falls back to a blocking write for unscoped sessions', async () => {
            const store = new CountingStore();
            const engine = new StubEngine();
            const session = await PersistentSession.create({ cacheFilePath, cacheType: CacheType.AT_EXIT, engine, store });

            session.finalize();
            session.finalize();

            expect(store.syncWrites).toBe(1);
            expect(store.writes).toBe(0);
            expect(fs.existsSync(cacheFilePath)).toBe(true);
            expect(engine.closeCalls).toBe(1);
        });

        it('does not save on exit for other cache types', async () => {
            const store = new CountingStore();
            const session = (
                await PersistentSession.create({ cacheFilePath, cacheType: CacheType.MANUAL, engine: new StubEngine(), store })
            ).enter();

            await session.exit();
            session.finalize();

            expect(store.writes).toBe(0);
            expect(store.syncWrites).toBe(0);
        });
    });

    describe('restoring', () => {
        it('round-trips cookies, headers and proxies', async () => {
            const first = await PersistentSession.create({
                cacheFilePath,
                cacheType: CacheType.MANUAL,
                cacheTimeout: 120,
                engine: new StubEngine((request) => reply(request, 200, { 'set-cookie': ['sid=abc; Path=/'] })),
            });
            await first.get(`${BASE}/login`);
            first.setHeader('X-Token', 't');
            first.setProxies({ https: 'http://proxy.test:3128' });
            await first.cacheSession();

            const engine = new StubEngine();
            const second = await PersistentSession.create({ cacheFilePath, engine });

            expect(second.cookies.get('sid')).toBe('abc');
            expect(second.getHeader('x-token')).toBe('t');
            expect(second.getProxies()).toEqual({ https: 'http://proxy.test:3128' });
            expect(second.getCacheType()).toBe(CacheType.MANUAL);
            expect(second.getCacheTimeout()).toBe(120);

            await second.get(`${BASE}/data`);
            expect(engine.requests[0]?.headers['cookie']).toBe('sid=abc');
            expect(engine.requests[0]?.headers['x-token']).toBe('t');
            expect(engine.requests[0]?.proxies).toEqual({ https: 'http://proxy.test:3128' });
        });

        it('lets explicit options win over the cache', async () => {
            const first = await PersistentSession.create({ cacheFilePath, userAgent: 'Y', engine: new StubEngine() });
            first.setProxies({ https: 'http://cached.test:1' });
            await first.cacheSession();

            const explicit = await PersistentSession.create({
                cacheFilePath,
                userAgent: 'X',
                proxies: { http: 'http://explicit.test:2' },
                cacheType: CacheType.AT_EXIT,
                engine: new StubEngine(),
            });
            expect(explicit.getHeader('user-agent')).toBe('X');
            expect(explicit.getProxies()).toEqual({ https: 'http://cached.test:1', http: 'http://explicit.test:2' });
            expect(explicit.getCacheType()).toBe(CacheType.AT_EXIT);
            explicit.enter();

            const inherited = await PersistentSession.create({ cacheFilePath, engine: new StubEngine() });
            expect(inherited.getHeader('user-agent')).toBe('Y');
        });

        it('ignores an expired cache', async () => {
            const first = await PersistentSession.create({ cacheFilePath, userAgent: 'Y', engine: new StubEngine() });
            await first.cacheSession();
            const past = Date.now() / 1000 - 120;
            fs.utimesSync(cacheFilePath, past, past);

            const second = await PersistentSession.create({ cacheFilePath, cacheTimeout: 60, engine: new StubEngine() });
            expect(second.getHeader('user-agent')).toBe(config.session.userAgent);
        });

        it('starts fresh from a garbage cache file', async () => {
            fs.writeFileSync(cacheFilePath, 'not json{');

            const session = await PersistentSession.create({ cacheFilePath, engine: new StubEngine() });

            expect(session.cookies.size).toBe(0);
            expect(session.headers).toEqual({ 'user-agent': config.session.userAgent });
            expect(session.getProxies()).toEqual({});
        });

        it('reloads on demand', async () => {
            const session = await PersistentSession.create({ cacheFilePath, engine: new StubEngine() });
            expect(await session.loadSession()).toBe(false);

            const writer = await PersistentSession.create({ cacheFilePath, engine: new StubEngine() });
            writer.setHeader('x-token', 'fresh');
            await writer.cacheSession();

            expect(await session.loadSession()).toBe(true);
            expect(session.getHeader('x-token')).toBe('fresh');
        });

        it('defaults to a temporary cache path', async () => {
            const session = await PersistentSession.create({ engine: new StubEngine() });
            expect(path.dirname(session.getCacheFilePath())).toBe(os.tmpdir());
            expect(path.basename(session.getCacheFilePath())).toMatch(/^PersistentSession-.+\.json$/);
        });
    });

    describe('login probe', () => {
        it('makes no request for an empty URL', async () => {
            const engine = new StubEngine();
            const session = await PersistentSession.create({ cacheFilePath, engine });
            expect(await session.isLoggedIn('')).toBe(false);
            expect(engine.requests).toHaveLength(0);
        });

        it('probes without following the redirect', async () => {
            const engine = new StubEngine((request) => reply(request, 302, { location: ['/home'] }));
            const session = await PersistentSession.create({ cacheFilePath, engine });
            expect(await session.isLoggedIn(`${BASE}/login`)).toBe(true);
            expect(engine.requests).toHaveLength(1);
        });
    });

    describe('requests', () => {
        it('encodes form data, JSON and query parameters', async () => {
            const engine = new StubEngine();
            const session = await PersistentSession.create({ cacheFilePath, userAgent: 'TestUA', engine });

            await session.post(`${BASE}/form`, { data: { user: 'u', password: 'test-secret' }, headers: { 'X-Custom': '1' } });
            await session.post(`${BASE}/api`, { json: { a: 1 } });
            await session.get(`${BASE}/search?q=1`, { params: { page: '2' } });

            const [form, json, search] = engine.requests;
            expect(form?.body).toBe('user=u&password=test-secret');
            expect(form?.headers).toEqual({
                'user-agent': 'TestUA',
                'x-custom': '1',
                'content-type': 'application/x-www-form-urlencoded',
            });
            expect(json?.body).toBe('{"a":1}');
            expect(json?.headers['content-type']).toBe('application/json');
            expect(search?.url).toBe(`${BASE}/search?q=1&page=2`);
            expect(search?.body).toBeUndefined();
        });

        it('follows a POST redirect as GET, storing cookies per hop', async () => {
            const engine = new StubEngine((request) =>
                request.url === `${BASE}/login`
                    ? reply(request, 302, { location: ['/home'], 'set-cookie': ['sid=1; Path=/'] })
                    : reply(request, 200, {}, 'welcome')
            );
            const session = await PersistentSession.create({ cacheFilePath, engine });

            const response = await session.post(`${BASE}/login`, { data: { user: 'u' } });

            expect(response.status).toBe(200);
            expect(response.text()).toBe('welcome');
            expect(response.url).toBe(`${BASE}/home`);
            expect(response.history.map((hop) => hop.status)).toEqual([302]);
            const hop = engine.requests[1];
            expect(hop?.method).toBe('GET');
            expect(hop?.body).toBeUndefined();
            expect(hop?.headers['content-type']).toBeUndefined();
            expect(hop?.headers['cookie']).toBe('sid=1');
        });

        it('returns the redirect itself when redirects are disabled', async () => {
            const engine = new StubEngine((request) => reply(request, 302, { location: ['/home'] }));
            const session = await PersistentSession.create({ cacheFilePath, engine });

            const response = await session.get(`${BASE}/login`, { allowRedirects: false });

            expect(response.status).toBe(302);
            expect(engine.requests).toHaveLength(1);
        });

        it('gives up after maxRedirects hops', async () => {
            const engine = new StubEngine((request) => reply(request, 302, { location: ['/loop'] }));
            const session = await PersistentSession.create({ cacheFilePath, engine, maxRedirects: 2 });

            const attempt = session.get(`${BASE}/loop`);
            await expect(attempt).rejects.toBeInstanceOf(SessionError);
            await expect(attempt).rejects.toHaveProperty('type', SessionErrorType.TOO_MANY_REDIRECTS);
            expect(engine.requests).toHaveLength(3);
        });

        it('keeps an explicit Cookie header', async () => {
            const engine = new StubEngine((request) => reply(request, 200, { 'set-cookie': ['sid=jar; Path=/'] }));
            const session = await PersistentSession.create({ cacheFilePath, engine });
            await session.get(`${BASE}/`);

            await session.get(`${BASE}/`, { headers: { Cookie: 'sid=manual' } });

            expect(engine.requests[1]?.headers['cookie']).toBe('sid=manual');
        });

        it('drops an explicit Cookie header on redirect hops', async () => {
            const engine = new StubEngine((request) => {
                if (request.url === `${BASE}/start`) {
                    return reply(request, 302, { location: ['/next'], 'set-cookie': ['sid=jar; Path=/'] });
                }
                if (request.url === `${BASE}/next`) {
                    return reply(request, 302, { location: ['https://elsewhere.test/x'] });
                }
                return reply(request, 200);
            });
            const session = await PersistentSession.create({ cacheFilePath, engine });

            await session.get(`${BASE}/start`, { headers: { Cookie: 'sid=manual' } });

            expect(engine.requests.map((request) => request.headers['cookie'])).toEqual([
                'sid=manual',
                'sid=jar',
                undefined,
            ]);
        });

        it('rejects an invalid URL', async () => {
            const session = await PersistentSession.create({ cacheFilePath, engine: new StubEngine() });
            await expect(session.get('not a url')).rejects.toHaveProperty('type', SessionErrorType.INVALID_URL);
        });
    });

    describe('failures', () => {
        it('wraps cache write failures', async () => {
            const session = await PersistentSession.create({
                cacheFilePath: path.join(dir, 'missing', 'session.json'),
                engine: new StubEngine(),
            });

            const attempt = session.cacheSession();
            await expect(attempt).rejects.toBeInstanceOf(SessionError);
            await expect(attempt).rejects.toHaveProperty('type', SessionErrorType.CACHE_WRITE_FAILED);
            await expect(attempt).rejects.toHaveProperty('cause.code', 'ENOENT');
        });

        it.each([Infinity, NaN, -1])('rejects a cacheTimeout of %s', async (cacheTimeout) => {
            const attempt = PersistentSession.create({ cacheFilePath, cacheTimeout, engine: new StubEngine() });

            await expect(attempt).rejects.toBeInstanceOf(SessionError);
            await expect(attempt).rejects.toHaveProperty('type', SessionErrorType.INVALID_OPTION);
            expect(fs.existsSync(cacheFilePath)).toBe(false);
        });

        it('accepts a zero cacheTimeout', async () => {
            const session = await PersistentSession.create({ cacheFilePath, cacheTimeout: 0, engine: new StubEngine() });
            expect(session.getCacheTimeout()).toBe(0);
        });

        it('refuses requests once closed', async () => {
            const engine = new StubEngine();
            const session = await PersistentSession.create({ cacheFilePath, engine });

            session.close();
            session.close();

            expect(engine.closeCalls).toBe(1);
            await expect(session.get(`${BASE}/`)).rejects.toHaveProperty('type', SessionErrorType.SESSION_CLOSED);
            expect(engine.requests).toHaveLength(0);
        });
    });
});
