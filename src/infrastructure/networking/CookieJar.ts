import type { StoredCookie } from '../../features/cache/domain/SessionSnapshot.js';

const keyOf = (cookie: Pick<StoredCookie, 'domain' | 'path' | 'name'>): string =>
    `${cookie.domain};${cookie.path};${cookie.name}`;

/**
 * Default-path algorithm: the request path up to (not including) its last '/'.
 */
export function defaultCookiePath(pathname: string): string {
    if (!pathname.startsWith('/')) return '/';
    const lastSlash = pathname.lastIndexOf('/');
    return lastSlash <= 0 ? '/' : pathname.slice(0, lastSlash);
}

export function domainMatches(host: string, cookie: Pick<StoredCookie, 'domain' | 'hostOnly'>): boolean {
    if (host === cookie.domain) return true;
    return !cookie.hostOnly && host.endsWith(`.${cookie.domain}`);
}

export function pathMatches(requestPath: string, cookiePath: string): boolean {
    if (requestPath === cookiePath) return true;
    if (!requestPath.startsWith(cookiePath)) return false;
    return cookiePath.endsWith('/') || requestPath.charAt(cookiePath.length) === '/';
}

/**
 * Parse one Set-Cookie header value received from `url`.
 * Returns null when the header is malformed or names a domain the host may not set.
 * A returned cookie with `expires <= now` is a deletion.
 */
export function parseSetCookie(header: string, url: URL, now: number): StoredCookie | null {
    const [pair, ...attributes] = header.split(';');
    if (!pair) return null;

    const separator = pair.indexOf('=');
    if (separator <= 0) return null;
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (!name) return null;

    const host = url.hostname.toLowerCase();
    const cookie: StoredCookie = {
        name,
        value,
        domain: host,
        path: defaultCookiePath(url.pathname),
        hostOnly: true,
        secure: false,
        httpOnly: false,
    };

    let maxAge: number | undefined;
    for (const attribute of attributes) {
        const eq = attribute.indexOf('=');
        const attrName = (eq === -1 ? attribute : attribute.slice(0, eq)).trim().toLowerCase();
        const attrValue = eq === -1 ? '' : attribute.slice(eq + 1).trim();

        switch (attrName) {
            case 'domain': {
                const domain = attrValue.replace(/^\./, '').toLowerCase();
                if (!domain) break;
                if (host !== domain && !host.endsWith(`.${domain}`)) {
                    return null;
                }
                cookie.domain = domain;
                cookie.hostOnly = false;
                break;
            }
            case 'path':
                if (attrValue.startsWith('/')) {
                    cookie.path = attrValue;
                }
                break;
            case 'expires': {
                const parsed = Date.parse(attrValue);
                if (!Number.isNaN(parsed)) {
                    cookie.expires = parsed;
                }
                break;
            }
            case 'max-age': {
                const seconds = Number(attrValue);
                if (attrValue !== '' && Number.isInteger(seconds)) {
                    maxAge = seconds;
                }
                break;
            }
            case 'secure':
                cookie.secure = true;
                break;
            case 'httponly':
                cookie.httpOnly = true;
                break;
        }
    }

    // Max-Age wins over Expires
    if (maxAge !== undefined) {
        cookie.expires = maxAge <= 0 ? 0 : now + maxAge * 1000;
    }

    return cookie;
}

/**
 * In-memory cookie storage keyed by (domain, path, name).
 */
export class CookieJar {
    private cookies = new Map<string, StoredCookie>();

    constructor(cookies: StoredCookie[] = []) {
        this.replaceAll(cookies);
    }

    get size(): number {
        return this.cookies.size;
    }

    set(cookie: StoredCookie, now: number = Date.now()): void {
        const key = keyOf(cookie);
        if (cookie.expires !== undefined && cookie.expires <= now) {
            this.cookies.delete(key);
            return;
        }
        this.cookies.set(key, { ...cookie });
    }

    /**
     * Store every Set-Cookie header of a response received from `url`.
     */
    storeFromResponse(url: string, setCookieHeaders: string[], now: number = Date.now()): void {
        const target = new URL(url);
        for (const header of setCookieHeaders) {
            const cookie = parseSetCookie(header, target, now);
            if (cookie) {
                this.set(cookie, now);
            }
        }
    }

    /**
     * Cookies to send to `url`, most specific path first.
     */
    matching(url: string, now: number = Date.now()): StoredCookie[] {
        const target = new URL(url);
        const host = target.hostname.toLowerCase();
        const isSecure = target.protocol === 'https:';
        this.purgeExpired(now);

        return this.list()
            .filter((cookie) => domainMatches(host, cookie))
            .filter((cookie) => pathMatches(target.pathname || '/', cookie.path))
            .filter((cookie) => !cookie.secure || isSecure)
            .sort((a, b) => b.path.length - a.path.length);
    }

    /** Value of a `Cookie` request header for `url`, or undefined when nothing matches. */
    cookieHeaderFor(url: string, now: number = Date.now()): string | undefined {
        const cookies = this.matching(url, now);
        if (cookies.length === 0) return undefined;
        return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
    }

    /** First stored value for `name`, regardless of domain. */
    get(name: string): string | undefined {
        return this.list().find((cookie) => cookie.name === name)?.value;
    }

    delete(name: string, domain?: string): void {
        for (const [key, cookie] of this.cookies.entries()) {
            if (cookie.name === name && (domain === undefined || cookie.domain === domain)) {
                this.cookies.delete(key);
            }
        }
    }

    list(): StoredCookie[] {
        return Array.from(this.cookies.values()).map((cookie) => ({ ...cookie }));
    }

    replaceAll(cookies: StoredCookie[]): void {
        this.cookies.clear();
        for (const cookie of cookies) {
            this.cookies.set(keyOf(cookie), { ...cookie });
        }
    }

    clear(): void {
        this.cookies.clear();
    }

    private purgeExpired(now: number): void {
        for (const [key, cookie] of this.cookies.entries()) {
            if (cookie.expires !== undefined && cookie.expires <= now) {
                this.cookies.delete(key);
            }
        }
    }
}
