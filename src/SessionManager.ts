import crypto from 'node:crypto';
import debug from 'debug';
import { LATEST_PROTOCOL_VERSION, type ClientCapabilities, type Implementation } from '@modelcontextprotocol/sdk/types.js';
import { MemoryStore } from './MemoryStore.js';
import type { AuthContext, Session } from './types.js';

const log = debug('mcp:SessionManager');

export interface CreateSessionOptions {
    /** Reuse a specific id, used when recovering a session the process no longer knows about. */
    sessionId?: string;
    protocolVersion?: string;
    clientInfo?: Implementation;
    clientCapabilities?: ClientCapabilities;
}

/**
 * MCP sessions, keyed by the `Mcp-Session-Id` header value.
 *
 * A session is either live or absent; sessions do not expire and do not survive a restart.
 */
export class SessionManager {
    private sessions = new MemoryStore<Session>('sessions');

    create(auth: AuthContext, options: CreateSessionOptions = {}): Session {
        const sessionId = options.sessionId ?? crypto.randomUUID();
        const session = this.sessions.set(sessionId, {
            sessionId,
            subject: auth.subject,
            clientId: auth.clientId,
            createdAt: new Date(),
            protocolVersion: options.protocolVersion ?? LATEST_PROTOCOL_VERSION,
            clientInfo: options.clientInfo,
            clientCapabilities: options.clientCapabilities ?? {},
        });
        log('created session %s for %s', session.sessionId, session.subject);
        return session;
    }

    get(sessionId: string): Session | undefined {
        return this.sessions.get(sessionId);
    }

    /** Idempotent; returns whether a live session was removed. */
    destroy(sessionId: string): boolean {
        const removed = this.sessions.delete(sessionId);
        if (removed) {
            log('destroyed session %s', sessionId);
        }
        return removed;
    }

    get size(): number {
        return this.sessions.size;
    }
}
