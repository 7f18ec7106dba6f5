import fetch from 'node-fetch';
import { ProxyAgent } from 'proxy-agent';
import { logger } from '../../platform/logger.js';
import { HttpResponse } from '../../core/http/HttpResponse.js';
import type { HttpEngine, PreparedRequest, ProxyConfig } from '../../core/ports/HttpEngine.js';

const COMPONENT = 'NodeFetchEngine';

/**
 * Proxy URL for `url` under a requests-style proxy map: the entry for the
 * URL's scheme first, then `all`. Empty string means "connect directly".
 */
export function proxyForUrl(proxies: ProxyConfig, url: string): string {
    const scheme = new URL(url).protocol.replace(/:$/, '');
    return proxies[scheme] ?? proxies.all ?? '';
}

/**
 * HTTP engine on node-fetch. Redirects are returned as-is; the session
 * follows them so it can capture cookies on every hop.
 */
export class NodeFetchEngine implements HttpEngine {
    private agents = new Map<string, ProxyAgent>();

    async send(request: PreparedRequest): Promise<HttpResponse> {
        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: `${request.method} ${request.url}`,
            meta: { headers: Object.keys(request.headers) },
        });

        const response = await fetch(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            redirect: 'manual',
            agent: this.agentFor(request.proxies),
        });

        const body = Buffer.from(await response.arrayBuffer());
        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: `HTTP ${response.status} for ${request.url}`,
            meta: { bytes: body.length },
        });

        return new HttpResponse({
            status: response.status,
            statusText: response.statusText,
            url: response.url || request.url,
            headers: response.headers.raw(),
            body,
        });
    }

    close(): void {
        for (const agent of this.agents.values()) {
            agent.destroy();
        }
        this.agents.clear();
    }

    /**
     * One agent per distinct proxy map, so keep-alive sockets are reused.
     * With no explicit proxies the agent falls back to HTTP_PROXY / HTTPS_PROXY / NO_PROXY.
     */
    private agentFor(proxies: ProxyConfig): ProxyAgent {
        const key = JSON.stringify(Object.entries(proxies).sort(([a], [b]) => a.localeCompare(b)));
        const existing = this.agents.get(key);
        if (existing) return existing;

        const snapshot = { ...proxies };
        const agent = Object.keys(snapshot).length > 0
            ? new ProxyAgent({ getProxyForUrl: (url: string) => proxyForUrl(snapshot, url) })
            : new ProxyAgent();
        if (Object.keys(snapshot).length > 0) {
            logger.info({ kind: 'sys', component: COMPONENT, message: 'Using proxies', meta: { schemes: Object.keys(snapshot) } });
        }
        this.agents.set(key, agent);
        return agent;
    }
}
