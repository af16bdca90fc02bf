// src/http-client/session.ts

import { randomUUID } from 'node:crypto';
import { SessionData } from './types.js';

/**
 * 一次登录得到的会话
 * 创建后不再修改，重新登录时整体替换
 */
export class Session {
    public readonly id: string;
    public readonly createdAt: number;
    private readonly cookies: Readonly<Record<string, string>>;
    private readonly userAgent: string;

    constructor(data: SessionData) {
        this.id = randomUUID();
        this.createdAt = Date.now();
        this.cookies = Object.freeze({ ...data.cookies });
        this.userAgent = data.userAgent;
    }

    public getCredentials(): SessionData {
        return {
            cookies: { ...this.cookies },
            userAgent: this.userAgent,
        };
    }

    /**
     * 生成 Cookie 请求头
     */
    public toCookieHeader(): string {
        return Object.entries(this.cookies)
            .map(([key, value]) => `${key}=${value}`)
            .join('; ');
    }
}
