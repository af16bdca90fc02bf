// src/http-client/sessionManager.ts

import { AxiosInstance } from 'axios';
import { Session } from './session.js';
import { ApiClientConfig, ApiError, AuthError, SessionState } from './types.js';
import { API_CONSTANTS, getRandomUserAgent } from './constants.js';
import { postJson } from './request.js';

/**
 * SessionManager
 * 负责单个账号的登录状态：何时登录、登录结果整体替换
 */
export class SessionManager {
    private session?: Session;
    private userAgent: string;
    private loginPromise?: Promise<Session>;
    private initialized: boolean = false;

    constructor(
        private readonly http: AxiosInstance,
        private readonly config: ApiClientConfig
    ) {
        this.userAgent = getRandomUserAgent();
        if (config.cookies && Object.keys(config.cookies).length > 0) {
            this.session = new Session({ cookies: config.cookies, userAgent: this.userAgent });
        }
    }

    /**
     * 初始化
     * 已提供 cookie、noLogin 或 lazyLogin 时不登录
     */
    public async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }
        this.initialized = true;

        if (this.session) {
            console.log(`[SessionManager] Using supplied session ${this.session.id.slice(0, 8)}`);
            return;
        }
        if (this.config.noLogin || this.config.lazyLogin) {
            return;
        }
        await this.resetSession();
    }

    public getState(): SessionState {
        if (this.loginPromise) {
            return SessionState.AUTHENTICATING;
        }
        return this.session ? SessionState.AUTHENTICATED : SessionState.UNAUTHENTICATED;
    }

    public getSession(): Session | undefined {
        return this.session;
    }

    public getUserAgent(): string {
        return this.userAgent;
    }

    public isLoginDisabled(): boolean {
        return this.config.noLogin;
    }

    /**
     * 没有会话且允许登录时先登录
     */
    public async ensureSession(): Promise<Session | undefined> {
        if (!this.session && !this.config.noLogin) {
            return this.resetSession();
        }
        return this.session;
    }

    /**
     * 【核心】登录
     * 同一时间只有一个登录请求，并发调用方共用同一个结果
     */
    public resetSession(): Promise<Session> {
        if (this.loginPromise) {
            return this.loginPromise;
        }

        this.loginPromise = this._doLogin().finally(() => {
            this.loginPromise = undefined;
        });
        return this.loginPromise;
    }

    private async _doLogin(): Promise<Session> {
        this.userAgent = getRandomUserAgent();
        console.log('[SessionManager] Logging in...');

        const data = {
            country: this.config.area,
            cellphone: this.config.account,
            password: this.config.password,
            captcha: '',
            remember: 1,
            platform: 3,
            appid: 1,
        };

        try {
            const { setCookie } = await postJson(this.http, API_CONSTANTS.LOGIN_URL, data, {
                userAgent: this.userAgent,
                timeout: this.config.timeout,
                headers: {
                    'Accept': 'application/json, text/plain, */*',
                    'Accept-Language': 'zh-CN,zh;q=0.8,zh-TW;q=0.7,zh-HK;q=0.5,en-US;q=0.3,en;q=0.2',
                    'Referer': API_CONSTANTS.LOGIN_REFERER,
                },
            });

            const session = new Session({
                cookies: this._parseCookies(setCookie),
                userAgent: this.userAgent,
            });
            this.session = session;
            console.log(`[SessionManager] New session created: ${session.id.slice(0, 8)}`);
            return session;
        } catch (error) {
            console.error('[SessionManager] Login failed:', error instanceof Error ? error.message : error);
            if (error instanceof ApiError) {
                throw new AuthError(`login failed: ${error.message}`, error.code, error);
            }
            throw error;
        }
    }

    /**
     * 解析 Set-Cookie 字符串数组
     */
    private _parseCookies(cookies: string[]): Record<string, string> {
        const cookieRecord: Record<string, string> = {};

        cookies.forEach((cookie) => {
            const keyValuePart = cookie.split(';')[0];

            if (keyValuePart) {
                const separator = keyValuePart.indexOf('=');
                if (separator <= 0) {
                    return;
                }
                const key = keyValuePart.slice(0, separator).trim();
                const value = keyValuePart.slice(separator + 1).trim();

                if (key && value) {
                    cookieRecord[key] = value;
                }
            }
        });

        return cookieRecord;
    }
}
