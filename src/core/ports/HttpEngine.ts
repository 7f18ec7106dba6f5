import type { HttpResponse } from '../http/HttpResponse.js';

/** Scheme (`http`, `https`) or `all` mapped to a proxy URL */
export type ProxyConfig = Record<string, string>;

export interface PreparedRequest {
    /** Upper-case HTTP method */
    method: string;
    /** Absolute URL, query string included */
    url: string;
    /** Final headers, cookie header included */
    headers: Record<string, string>;
    body?: string | Buffer;
    proxies: ProxyConfig;
}

/**
 * Port - the transport a session sends through.
 * Implementations never follow redirects and never store cookies; the
 * session owns both.
 */
export interface HttpEngine {
    send(request: PreparedRequest): Promise<HttpResponse>;
    /** Release sockets and agents. */
    close(): void;
}
