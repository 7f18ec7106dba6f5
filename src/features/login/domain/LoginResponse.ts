import type { HttpResponse } from '../../../core/http/HttpResponse.js';

export enum LoginStatus {
    SUCCESS = 'Login Successful',
    FAILURE = 'Login Failed',
}

/**
 * The response of a login POST paired with its classification.
 */
export class LoginResponse {
    constructor(
        readonly status: LoginStatus,
        readonly response: HttpResponse
    ) {}

    get isSuccess(): boolean {
        return this.status === LoginStatus.SUCCESS;
    }
}
