// test/http-client/session.test.ts
import { Session } from '../../src/http-client/session';

describe('Session', () => {
    let session: Session;

    beforeEach(() => {
        session = new Session({
            cookies: { GCID: 'abc', GCESS: 'xyz' },
            userAgent: 'TestUA',
        });
    });

    test('should create session with id and creation time', () => {
        expect(session.id).toBeDefined();
        expect(session.createdAt).toBeLessThanOrEqual(Date.now());
    });

    test('should build cookie header', () => {
        expect(session.toCookieHeader()).toBe('GCID=abc; GCESS=xyz');
    });

    test('should return credentials', () => {
        const creds = session.getCredentials();
        expect(creds.cookies).toEqual({ GCID: 'abc', GCESS: 'xyz' });
        expect(creds.userAgent).toBe('TestUA');
    });

    test('should not be changed through returned credentials', () => {
        session.getCredentials().cookies.GCID = 'changed';
        expect(session.toCookieHeader()).toBe('GCID=abc; GCESS=xyz');
    });

    test('should not be changed through the source cookies', () => {
        const cookies: Record<string, string> = { SERVERID: 's1' };
        const adopted = new Session({ cookies, userAgent: 'TestUA' });
        cookies.SERVERID = 's2';
        expect(adopted.toCookieHeader()).toBe('SERVERID=s1');
    });
});
