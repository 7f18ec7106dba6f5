export type RawHeaders = Record<string, string[]>;

export interface HttpResponseInit {
    status: number;
    statusText: string;
    /** Final URL the response was received from */
    url: string;
    /** Header names are lower-cased */
    headers: RawHeaders;
    body: Buffer;
}

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/**
 * A fully buffered HTTP response.
 */
export class HttpResponse {
    readonly status: number;
    readonly statusText: string;
    readonly url: string;
    readonly headers: RawHeaders;
    readonly body: Buffer;
    /** Redirect hops that led to this response, oldest first */
    history: HttpResponse[] = [];

    constructor(init: HttpResponseInit) {
        this.status = init.status;
        this.statusText = init.statusText;
        this.url = init.url;
        this.body = init.body;
        this.headers = Object.fromEntries(
            Object.entries(init.headers).map(([name, values]) => [name.toLowerCase(), [...values]])
        );
    }

    get ok(): boolean {
        return this.status >= 200 && this.status < 300;
    }

    get isRedirect(): boolean {
        return REDIRECT_STATUSES.has(this.status) && this.header('location') !== undefined;
    }

    headerValues(name: string): string[] {
        return this.headers[name.toLowerCase()] ?? [];
    }

    header(name: string): string | undefined {
        const values = this.headerValues(name);
        return values.length > 0 ? values.join(', ') : undefined;
    }

    text(): string {
        return this.body.toString('utf-8');
    }

    json(): unknown {
        return JSON.parse(this.text());
    }
}
