import { describe, it, expect, beforeEach } from 'vitest';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { SessionManager } from '../SessionManager.js';
import type { AuthContext } from '../types.js';

describe('SessionManager', () => {
    let sessions: SessionManager;
    const alice: AuthContext = { subject: 'alice', clientId: 'client-1', scopes: ['inventory'] };

    beforeEach(() => {
        sessions = new SessionManager();
    });

    it('should create sessions bound to the principal', () => {
        const session = sessions.create(alice);

        expect(session.sessionId).toMatch(/^[0-9a-f-]{36}$/);
        expect(session).toMatchObject({
            subject: 'alice',
            clientId: 'client-1',
            protocolVersion: LATEST_PROTOCOL_VERSION,
            clientCapabilities: {},
        });
        expect(sessions.get(session.sessionId)).toEqual(session);
    });

    it('should give every session a fresh id', () => {
        const a = sessions.create(alice);
        const b = sessions.create(alice);

        expect(a.sessionId).not.toBe(b.sessionId);
        expect(sessions.size).toBe(2);
    });

    it('should reuse a given id', () => {
        const session = sessions.create(alice, {
            sessionId: 'recovered-id',
            protocolVersion: '2024-11-05',
            clientInfo: { name: 'test-client', version: '1.0.0' },
        });

        expect(session.sessionId).toBe('recovered-id');
        expect(session.protocolVersion).toBe('2024-11-05');
        expect(sessions.get('recovered-id')?.clientInfo).toEqual({ name: 'test-client', version: '1.0.0' });
    });

    it('should destroy sessions idempotently', () => {
        const { sessionId } = sessions.create(alice);

        expect(sessions.destroy(sessionId)).toBe(true);
        expect(sessions.destroy(sessionId)).toBe(false);
        expect(sessions.get(sessionId)).toBeUndefined();
        expect(sessions.size).toBe(0);
    });
});
