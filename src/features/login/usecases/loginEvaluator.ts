import type { HttpResponse } from '../../../core/http/HttpResponse.js';
import { logger } from '../../../platform/logger.js';
import { LoginResponse, LoginStatus } from '../domain/LoginResponse.js';

const COMPONENT = 'LoginEvaluator';

/** Body of a login POST: form fields, pre-encoded form, or a raw string. */
export type LoginPayload = Record<string, string> | URLSearchParams | string;

export interface LoginRequestOptions {
    headers?: Record<string, string>;
    params?: Record<string, string>;
}

/**
 * What the evaluator needs from a session.
 */
export interface LoginClient {
    get(url: string, options: { allowRedirects: boolean }): Promise<HttpResponse>;
    post(url: string, options: LoginRequestOptions & { data: LoginPayload }): Promise<HttpResponse>;
}

/**
 * Heuristic login check: a GET to `loginCheckUrl` with redirects disabled
 * answers 302 Found when the site sends authenticated users elsewhere.
 *
 * Only an exact 302 counts. 301, 303, 307 and 308 are treated as "not logged
 * in", and sites that do not redirect authenticated users always read as
 * logged out. An empty URL returns false without sending anything.
 */
export async function isLoggedIn(client: LoginClient, loginCheckUrl: string | undefined): Promise<boolean> {
    logger.debug({ kind: 'biz', component: COMPONENT, message: `Check login - ${loginCheckUrl ?? ''}` });
    if (!loginCheckUrl) {
        return false;
    }

    const response = await client.get(loginCheckUrl, { allowRedirects: false });
    if (response.status === 302) {
        logger.info({ kind: 'biz', component: COMPONENT, message: 'Is logged in', meta: { url: loginCheckUrl } });
        return true;
    }
    logger.info({
        kind: 'biz',
        component: COMPONENT,
        message: 'Is not logged in',
        meta: { url: loginCheckUrl, status: response.status },
    });
    return false;
}

/**
 * POST `payload` to `url`, then probe the same `url` with `isLoggedIn`.
 * The login page doubles as the check page: it is expected to redirect once
 * the session is authenticated.
 *
 * @param onSuccess - Runs before the response is returned; its errors propagate.
 */
export async function login(
    client: LoginClient,
    url: string,
    payload: LoginPayload,
    options: LoginRequestOptions = {},
    onSuccess?: () => Promise<void>
): Promise<LoginResponse> {
    logger.info({ kind: 'biz', component: COMPONENT, message: `Try to Login - ${url}` });
    const response = await client.post(url, { ...options, data: payload });

    if (await isLoggedIn(client, url)) {
        if (onSuccess) {
            await onSuccess();
        }
        return new LoginResponse(LoginStatus.SUCCESS, response);
    }
    return new LoginResponse(LoginStatus.FAILURE, response);
}
