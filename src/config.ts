// src/config.ts

import { DEFAULT_CONFIG } from './http-client/constants.js';
import { ApiClientConfig } from './http-client/types.js';

function parseBool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') {
        return fallback;
    }
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * 从环境变量读取客户端配置
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiClientConfig {
    return {
        account: env.GEEKTIME_ACCOUNT || '',
        password: env.GEEKTIME_PASSWORD || '',
        area: env.GEEKTIME_AREA || DEFAULT_CONFIG.area,
        noLogin: parseBool(env.GEEKTIME_NO_LOGIN, DEFAULT_CONFIG.noLogin),
        lazyLogin: parseBool(env.GEEKTIME_LAZY_LOGIN, DEFAULT_CONFIG.lazyLogin),
        timeout: parseNumber(env.GEEKTIME_TIMEOUT, DEFAULT_CONFIG.timeout),
        retryDelay: parseNumber(env.GEEKTIME_RETRY_DELAY, DEFAULT_CONFIG.retryDelay),
    };
}
