// test/http-client/request.test.ts
import { postJson, redactPayload } from '../../src/http-client/request';
import { ApiError, ErrorType, TransportError } from '../../src/http-client/types';
import { createFakeHttp, down, ok, silenceConsole } from './fakeHttp';

const ARTICLE_URL = 'https://time.geekbang.org/serv/v1/article';
const OPTIONS = { userAgent: 'TestUA', timeout: 10000 };

describe('redactPayload', () => {
    test('should hide credentials in a copy', () => {
        const data = { cellphone: '13800000000', password: 'test-secret', country: '86' };

        expect(redactPayload(data)).toEqual({ cellphone: 'xxx', password: 'xxx', country: '86' });
        expect(data.password).toBe('test-secret');
    });

    test('should leave payloads without credentials alone', () => {
        expect(redactPayload({ aid: '7', prev: 0 })).toEqual({ aid: '7', prev: 0 });
        expect(redactPayload(undefined)).toBeUndefined();
    });
});

describe('postJson', () => {
    beforeEach(() => {
        silenceConsole();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('should send headers and return the envelope', async () => {
        const { http, requests } = createFakeHttp({ [ARTICLE_URL]: [ok({ id: 5 }, ['SERVERID=s1; Path=/'])] });

        const result = await postJson(http, ARTICLE_URL, { id: 5 }, {
            ...OPTIONS,
            headers: { Referer: 'https://time.geekbang.org/column/article/5' },
            cookieHeader: 'GCID=abc',
        });

        expect(result.envelope).toEqual({ code: 0, data: { id: 5 } });
        expect(result.setCookie).toEqual(['SERVERID=s1; Path=/']);
        expect(requests[0]?.headers['content-type']).toBe('application/json');
        expect(requests[0]?.headers['user-agent']).toBe('TestUA');
        expect(requests[0]?.headers['referer']).toBe('https://time.geekbang.org/column/article/5');
        expect(requests[0]?.headers['cookie']).toBe('GCID=abc');
    });

    test('should map network failures to TransportError', async () => {
        const { http } = createFakeHttp({ [ARTICLE_URL]: [down()] });

        const attempt = postJson(http, ARTICLE_URL, { id: 5 }, OPTIONS);

        await expect(attempt).rejects.toBeInstanceOf(TransportError);
        await expect(attempt).rejects.toMatchObject({ type: ErrorType.TRANSPORT, message: `Network error on ${ARTICLE_URL}: connect ECONNREFUSED` });
    });

    test('should keep the HTTP status on TransportError', async () => {
        const { http } = createFakeHttp({ [ARTICLE_URL]: [{ status: 503, body: 'busy' }] });

        await expect(postJson(http, ARTICLE_URL, { id: 5 }, OPTIONS)).rejects.toMatchObject({ status: 503 });
    });

    test('should raise ApiError with the server message and code', async () => {
        const { http } = createFakeHttp({ [ARTICLE_URL]: [{ body: { code: -1, data: null, error: { msg: 'no access' } } }] });

        const error = await postJson(http, ARTICLE_URL, { id: 5 }, OPTIONS).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ type: ErrorType.API, message: 'geektime api fail:no access', code: -1 });
    });
});
