// src/http-client/retry.ts

import { ApiError, isApiError, isTransportError } from './types.js';

export interface RetryPolicy {
    /** 重试前等待的毫秒数 */
    delay: number;
    /** 网络错误后、重试前执行(重新登录) */
    onTransportError: () => Promise<unknown>;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * 网络错误时等待、重新登录并重放一次；业务错误直接抛出
 * 重放的失败原样抛出
 */
export async function withRetry<T>(call: () => Promise<T>, policy: RetryPolicy): Promise<T> {
    try {
        return await call();
    } catch (error) {
        if (isTransportError(error)) {
            console.warn(`[ApiClient] ${error.message}, retrying after ${policy.delay}ms`);
            await sleep(policy.delay);
            await policy.onTransportError();
            return call();
        }
        if (isApiError(error)) {
            throw error;
        }
        throw new ApiError('geektime api error', undefined, error);
    }
}
