import debug from 'debug';
import { InvalidTokenError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { MemoryStore, isExpired } from './MemoryStore.js';
import { generateToken } from './random.js';
import type { AccessToken } from './types.js';

const log = debug('oauth:TokenStore');

export interface IssueTokenParams {
    subject: string;
    clientId: string;
    scopes: string[];
}

export class TokenStore {
    private tokens = new MemoryStore<AccessToken>('access tokens');

    /**
     * @param ttl lifetime in seconds
     */
    issue(params: IssueTokenParams, ttl: number): AccessToken {
        const token = generateToken();
        const now = Date.now();
        const record = this.tokens.set(token, {
            token,
            subject: params.subject,
            clientId: params.clientId,
            scopes: [...params.scopes],
            createdAt: new Date(now),
            expiresAt: new Date(now + ttl * 1000),
        });
        log('issued token for client %s, subject %s', params.clientId, params.subject);
        return { ...record, scopes: [...record.scopes] };
    }

    validate(token: string): AccessToken {
        const tokenData = this.tokens.peek(token);
        if (!tokenData) {
            throw new InvalidTokenError('Invalid token');
        }

        if (isExpired(tokenData)) {
            this.tokens.delete(token);
            log('evicted expired token for subject %s', tokenData.subject);
            throw new InvalidTokenError('Token has expired');
        }

        return { ...tokenData, scopes: [...tokenData.scopes] };
    }

    revoke(token: string): void {
        if (this.tokens.delete(token)) {
            log('revoked token');
        }
    }

    purgeExpired(): number {
        return this.tokens.purgeExpired();
    }

    get size(): number {
        return this.tokens.size;
    }
}
