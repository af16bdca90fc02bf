// src/http-client/apiClient.ts

import axios, { AxiosInstance } from 'axios';
import { SessionManager } from './sessionManager.js';
import { withRetry } from './retry.js';
import { postJson } from './request.js';
import { API_CONSTANTS, DEFAULT_CONFIG, VIDEO_COLLECTION_ID_RANGES, validateConfig } from './constants.js';
import {
    ApiClientConfig,
    ApiError,
    Comment,
    CommentPage,
    PostSummary,
    SessionState,
    VideoCollectionRef,
} from './types.js';

export type ApiClientOptions =
    Partial<Omit<ApiClientConfig, 'account' | 'password'>>
    & Pick<ApiClientConfig, 'account' | 'password'>
    & { http?: AxiosInstance };

/**
 * 极客时间接口客户端
 *
 * 一个课程(专栏、视频课等)称作 course 或 column，
 * 课程下的章节称作 post 或 article。
 */
export class ApiClient {
    private readonly config: ApiClientConfig;
    private readonly http: AxiosInstance;
    private readonly sessionManager: SessionManager;

    constructor(options: ApiClientOptions) {
        const { http, ...rest } = options;
        // 显式传入的 undefined 不覆盖默认值
        this.config = {
            ...rest,
            area: rest.area ?? DEFAULT_CONFIG.area,
            noLogin: rest.noLogin ?? DEFAULT_CONFIG.noLogin,
            lazyLogin: rest.lazyLogin ?? DEFAULT_CONFIG.lazyLogin,
            timeout: rest.timeout ?? DEFAULT_CONFIG.timeout,
            retryDelay: rest.retryDelay ?? DEFAULT_CONFIG.retryDelay,
        };
        if (!validateConfig(this.config)) {
            throw new Error('Invalid api client configuration');
        }
        this.http = http ?? axios.create();
        this.sessionManager = new SessionManager(this.http, this.config);
    }

    /**
     * 按配置决定是否立即登录
     */
    public initialize(): Promise<void> {
        return this.sessionManager.initialize();
    }

    /**
     * 强制重新登录
     */
    public async resetSession(): Promise<void> {
        await this.sessionManager.resetSession();
    }

    public getSessionState(): SessionState {
        return this.sessionManager.getState();
    }

    public getCookies(): Record<string, string> | undefined {
        return this.sessionManager.getSession()?.getCredentials().cookies;
    }

    /**
     * 课程列表
     */
    public getCourseList(): Promise<Record<string, unknown>> {
        return this.retrying(async () => {
            const data = await this.post(API_CONSTANTS.COLUMN_ALL_URL, undefined, `${API_CONSTANTS.TIME_HOST}/paid-content`);
            if (!isRecord(data)) {
                throw new ApiError('malformed course list');
            }
            return data;
        });
    }

    /**
     * 课程所有章节，按发布时间从旧到新
     */
    public getPostListOf(courseId: number): Promise<PostSummary[]> {
        return this.retrying(async () => {
            const data = await this.post(
                API_CONSTANTS.COLUMN_ARTICLES_URL,
                { cid: String(courseId), size: API_CONSTANTS.POST_LIST_SIZE, prev: 0, order: 'newest' },
                `${API_CONSTANTS.TIME_HOST}/column/${courseId}`
            );
            if (isEmpty(data)) {
                throw new ApiError(`course not exists:${courseId}`);
            }
            if (!isRecord(data) || !Array.isArray(data.list)) {
                throw new ApiError(`malformed post list for course ${courseId}`);
            }
            return [...data.list].reverse();
        });
    }

    /**
     * 课程简介
     */
    public getCourseIntro(courseId: number): Promise<Record<string, unknown>> {
        return this.retrying(async () => {
            const data = await this.post(
                API_CONSTANTS.COLUMN_INTRO_URL,
                { cid: String(courseId) },
                `${API_CONSTANTS.TIME_HOST}/column/${courseId}`
            );
            if (isEmpty(data) || !isRecord(data)) {
                throw new ApiError(`invalid course ID: ${courseId}`);
            }
            return data;
        });
    }

    /**
     * 章节详情
     */
    public getPostContent(postId: number): Promise<unknown> {
        return this.retrying(() => this.post(
            API_CONSTANTS.ARTICLE_URL,
            { id: postId },
            `${API_CONSTANTS.TIME_HOST}/column/article/${postId}`
        ));
    }

    /**
     * 章节评论，按页返回(不合并)
     * 游标取每页最后一条评论的 score，假定评论按 score 倒序
     */
    public getPostComments(postId: number): Promise<Comment[][]> {
        return this.retrying(async () => {
            const pages: Comment[][] = [];
            let prev = 0;
            let more = true;

            while (more) {
                const data = await this.post(
                    API_CONSTANTS.COMMENTS_URL,
                    { aid: String(postId), prev },
                    `${API_CONSTANTS.TIME_HOST}/column/article/${postId}`
                );
                if (!isCommentPage(data)) {
                    throw new ApiError(`malformed comment page for post ${postId}`);
                }

                pages.push(data.list);
                more = data.page.more;

                const last = data.list[data.list.length - 1];
                if (!last) {
                    break;
                }
                prev = last.score;
            }

            return pages;
        });
    }

    /**
     * 每日一课合辑简介
     */
    public getVideoCollectionIntro(collectionId: number): Promise<unknown> {
        return this.retrying(() => this.post(
            API_CONSTANTS.VIDEO_COLLECTION_URL,
            { id: String(collectionId) },
            `${API_CONSTANTS.TIME_HOST}/dailylesson/collection/${collectionId}`
        ));
    }

    /**
     * 每日一课合辑列表
     * 不请求接口，返回固定的 ID 区间
     */
    public getVideoCollectionList(): Promise<VideoCollectionRef[]> {
        return this.retrying(async () => {
            const refs: VideoCollectionRef[] = [];
            for (const [start, end] of VIDEO_COLLECTION_ID_RANGES) {
                for (let id = start; id <= end; id++) {
                    refs.push({ collection_id: id });
                }
            }
            return refs;
        });
    }

    /**
     * 每日一课合辑视频列表
     */
    public getVideoListOf(collectionId: number): Promise<unknown> {
        return this.retrying(() => this.post(
            API_CONSTANTS.VIDEO_LIST_URL,
            { id: String(collectionId), size: API_CONSTANTS.VIDEO_LIST_SIZE },
            `${API_CONSTANTS.TIME_HOST}/dailylesson/collection/${collectionId}`
        ));
    }

    private retrying<T>(call: () => Promise<T>): Promise<T> {
        return withRetry(call, {
            delay: this.config.retryDelay,
            onTransportError: async () => {
                if (this.sessionManager.isLoginDisabled()) {
                    return;
                }
                await this.sessionManager.resetSession();
            },
        });
    }

    /**
     * 需要时先登录，再发请求，返回 data 字段
     */
    private async post(url: string, data: Record<string, unknown> | undefined, referer: string): Promise<unknown> {
        const session = await this.sessionManager.ensureSession();
        const { envelope } = await postJson(this.http, url, data, {
            userAgent: this.sessionManager.getUserAgent(),
            timeout: this.config.timeout,
            headers: { 'Referer': referer },
            cookieHeader: session?.toCookieHeader(),
        });
        return envelope.data;
    }
}

/**
 * 创建客户端并按配置登录
 */
export async function createApiClient(options: ApiClientOptions): Promise<ApiClient> {
    const client = new ApiClient(options);
    await client.initialize();
    return client;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEmpty(value: unknown): boolean {
    if (value === null || value === undefined || value === '' || value === 0 || value === false) {
        return true;
    }
    if (Array.isArray(value)) {
        return value.length === 0;
    }
    return isRecord(value) && Object.keys(value).length === 0;
}

function isCommentPage(value: unknown): value is CommentPage {
    return isRecord(value)
        && Array.isArray(value.list)
        && value.list.every(item => isRecord(item) && typeof item.score === 'number')
        && isRecord(value.page)
        && typeof value.page.more === 'boolean';
}
