// src/http-client/index.ts

/**
 * HTTP 客户端模块统一导出
 */

export { Session } from './session.js';
export { SessionManager } from './sessionManager.js';
export { ApiClient, createApiClient, type ApiClientOptions } from './apiClient.js';
export { withRetry, type RetryPolicy } from './retry.js';
export { redactPayload } from './request.js';
export {
    SessionState,
    ErrorType,
    TransportError,
    ApiError,
    AuthError,
    isTransportError,
    isApiError,
    type SessionData,
    type ApiClientConfig,
    type ApiEnvelope,
    type Comment,
    type CommentPage,
    type PostSummary,
    type VideoCollectionRef,
} from './types.js';
export { USER_AGENTS, API_CONSTANTS, DEFAULT_CONFIG, validateConfig } from './constants.js';
