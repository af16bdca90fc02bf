// src/http-client/constants.ts

import { ApiClientConfig } from './types.js';

/**
 * 登录时随机选取的 User-Agent
 */
export const USER_AGENTS: readonly [string, ...string[]] = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
];

export function getRandomUserAgent(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)] ?? USER_AGENTS[0];
}

const TIME_HOST = 'https://time.geekbang.org';

export const API_CONSTANTS = {
    LOGIN_URL: 'https://account.geekbang.org/account/ticket/login',
    LOGIN_REFERER: 'https://account.geekbang.org/signin?redirect=https%3A%2F%2Fwww.geekbang.org%2F',
    COLUMN_ALL_URL: `${TIME_HOST}/serv/v1/column/all`,
    COLUMN_ARTICLES_URL: `${TIME_HOST}/serv/v1/column/articles`,
    COLUMN_INTRO_URL: `${TIME_HOST}/serv/v1/column/intro`,
    ARTICLE_URL: `${TIME_HOST}/serv/v1/article`,
    COMMENTS_URL: `${TIME_HOST}/serv/v1/comments`,
    VIDEO_COLLECTION_URL: `${TIME_HOST}/serv/v2/video/GetCollectById`,
    VIDEO_LIST_URL: `${TIME_HOST}/serv/v2/video/GetListByType`,
    TIME_HOST,
    POST_LIST_SIZE: 1000,
    VIDEO_LIST_SIZE: 50,
} as const;

/**
 * 每日一课合辑 ID 区间(闭区间)
 * 合辑列表接口没有找到，这里是手工整理的近似值
 */
export const VIDEO_COLLECTION_ID_RANGES: ReadonlyArray<readonly [number, number]> = [
    [3, 81],
    [104, 140],
];

/** 日志中需要脱敏的请求字段 */
export const REDACTED_FIELDS: readonly string[] = ['cellphone', 'password'];

export const DEFAULT_CONFIG: Omit<ApiClientConfig, 'account' | 'password' | 'cookies'> = {
    area: '86',
    noLogin: false,
    lazyLogin: true,
    timeout: 10000,
    retryDelay: 100,
};

/**
 * 校验客户端配置
 */
export function validateConfig(config: ApiClientConfig): boolean {
    if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
        return false;
    }
    if (!Number.isFinite(config.retryDelay) || config.retryDelay < 0) {
        return false;
    }
    if (!config.noLogin && !config.cookies && (!config.account || !config.password)) {
        return false;
    }
    return true;
}
