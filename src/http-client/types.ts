// src/http-client/types.ts

/**
 * 会话状态枚举
 */
export enum SessionState {
    UNAUTHENTICATED = 'UNAUTHENTICATED',  // 未登录
    AUTHENTICATING = 'AUTHENTICATING',    // 登录中
    AUTHENTICATED = 'AUTHENTICATED',      // 已登录
}

/**
 * 会话数据接口
 */
export interface SessionData {
    cookies: Record<string, string>;
    userAgent: string;
}

/**
 * 客户端配置接口
 */
export interface ApiClientConfig {
    account: string;
    password: string;
    /** 国家/地区区号 */
    area: string;
    /** 完全跳过登录，只访问公开数据 */
    noLogin: boolean;
    /** 延迟到第一次需要登录的调用时再登录 */
    lazyLogin: boolean;
    /** 已有的登录 cookie，提供时不再登录 */
    cookies?: Record<string, string>;
    timeout: number;
    retryDelay: number;
}

/**
 * 接口响应信封
 */
export interface ApiEnvelope<T = unknown> {
    code: number;
    data: T;
    error?: { msg?: string };
}

/**
 * 错误类型枚举
 */
export enum ErrorType {
    TRANSPORT = 'TRANSPORT',
    API = 'API',
    AUTH = 'AUTH',
}

/**
 * 网络层错误(连接失败、超时、非 2xx 状态码)
 * 会触发一次重新登录后重试
 */
export class TransportError extends Error {
    public readonly type = ErrorType.TRANSPORT;

    constructor(
        message: string,
        public readonly status?: number,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'TransportError';
    }
}

/**
 * 业务错误(服务端返回非 0 code、数据为空等)，不重试
 */
export class ApiError extends Error {
    public readonly type: ErrorType = ErrorType.API;

    constructor(
        message: string,
        public readonly code?: number,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

/**
 * 登录失败
 */
export class AuthError extends ApiError {
    public readonly type: ErrorType = ErrorType.AUTH;

    constructor(message: string, code?: number, originalError?: unknown) {
        super(message, code, originalError);
        this.name = 'AuthError';
    }
}

export function isTransportError(error: unknown): error is TransportError {
    return error instanceof TransportError;
}

export function isApiError(error: unknown): error is ApiError {
    return error instanceof ApiError;
}

/* ----- 接口数据 ----- */

export interface Comment {
    id: number;
    score: number;
    comment_content?: string;
    [key: string]: unknown;
}

export interface CommentPage {
    list: Comment[];
    page: { more: boolean };
}

export interface PostSummary {
    id: number;
    article_title?: string;
    [key: string]: unknown;
}

export interface VideoCollectionRef {
    collection_id: number;
}
