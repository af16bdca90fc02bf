// src/http-client/request.ts

import axios, { AxiosInstance } from 'axios';
import { REDACTED_FIELDS } from './constants.js';
import { ApiEnvelope, ApiError, TransportError } from './types.js';

export interface PostOptions {
    userAgent: string;
    timeout: number;
    headers?: Record<string, string>;
    cookieHeader?: string;
}

export interface PostResult {
    envelope: ApiEnvelope;
    setCookie: string[];
}

/**
 * 复制一份请求数据并隐藏账号密码，不修改调用方的对象
 */
export function redactPayload(data?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!data) {
        return undefined;
    }
    const copy: Record<string, unknown> = { ...data };
    for (const key of REDACTED_FIELDS) {
        if (key in copy) {
            copy[key] = 'xxx';
        }
    }
    return copy;
}

function isEnvelope(body: unknown): body is ApiEnvelope {
    return typeof body === 'object'
        && body !== null
        && 'code' in body
        && typeof body.code === 'number';
}

/**
 * 发送 JSON POST 请求并校验响应信封
 */
export async function postJson(
    http: AxiosInstance,
    url: string,
    data: Record<string, unknown> | undefined,
    options: PostOptions
): Promise<PostResult> {
    console.log(`[ApiClient] request geektime api, ${url}, ${JSON.stringify(redactPayload(data))}`);

    const headers: Record<string, string> = {
        ...options.headers,
        'Content-Type': 'application/json',
        'User-Agent': options.userAgent,
    };
    if (options.cookieHeader) {
        headers['Cookie'] = options.cookieHeader;
    }

    let body: unknown;
    let setCookie: string[] = [];
    try {
        const response = await http.post<unknown>(url, data ?? null, {
            headers,
            timeout: options.timeout,
        });
        body = response.data;
        const setCookieHeader: unknown = response.headers['set-cookie'];
        if (Array.isArray(setCookieHeader)) {
            setCookie = setCookieHeader.filter((item): item is string => typeof item === 'string');
        }
    } catch (error) {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            console.warn(`[ApiClient] transport failure on ${url}: ${status ?? error.code ?? error.message}`);
            throw new TransportError(
                status ? `HTTP ${status} from ${url}` : `Network error on ${url}: ${error.message}`,
                status,
                error
            );
        }
        throw error;
    }

    if (!isEnvelope(body)) {
        throw new ApiError(`malformed response from ${url}`);
    }
    if (body.code !== 0) {
        throw new ApiError(`geektime api fail:${body.error?.msg ?? 'unknown error'}`, body.code);
    }

    return { envelope: body, setCookie };
}
