import debug from 'debug';
import { InvalidGrantError, InvalidRequestError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { ExpiredGrantError } from './errors.js';
import { MemoryStore, isExpired } from './MemoryStore.js';
import { generateToken } from './random.js';
import { validateChallenge } from './pkce.js';
import type { AuthorizationCode, CodeChallengeMethod } from './types.js';

const log = debug('oauth:AuthorizationCodeStore');

// RFC 6749 recommends a maximum lifetime of 10 minutes
const DEFAULT_CODE_LIFETIME = 10 * 60;

export interface IssueCodeParams {
    clientId: string;
    redirectUri: string;
    scopes: string[];
    codeChallenge?: string;
    codeChallengeMethod?: CodeChallengeMethod;
    subject: string;
    state?: string;
}

export interface RedeemExpectations {
    clientId?: string;
    redirectUri?: string;
}

export class AuthorizationCodeStore {
    private codes = new MemoryStore<AuthorizationCode>('authorization codes');

    /**
     * @param lifetime authorization code lifetime in seconds
     */
    constructor(readonly lifetime: number = DEFAULT_CODE_LIFETIME) {}

    issue(params: IssueCodeParams): string {
        const code = generateToken();
        const now = Date.now();

        this.codes.set(code, {
            code,
            clientId: params.clientId,
            redirectUri: params.redirectUri,
            scopes: [...params.scopes],
            codeChallenge: params.codeChallenge || undefined,
            codeChallengeMethod: params.codeChallengeMethod ?? 'S256',
            subject: params.subject,
            state: params.state,
            createdAt: new Date(now),
            expiresAt: new Date(now + this.lifetime * 1000),
        });

        log('issued code for client %s, subject %s', params.clientId, params.subject);
        return code;
    }

    /**
     * Redeems a code exactly once.
     *
     * Failed PKCE or binding checks leave the code in place so a corrected request can still
     * redeem it before it expires; an expired code is removed.
     */
    redeem(code: string, codeVerifier?: string, expected: RedeemExpectations = {}): AuthorizationCode {
        const codeData = this.codes.peek(code);
        if (!codeData) {
            throw new InvalidGrantError('Invalid authorization code');
        }

        if (isExpired(codeData)) {
            this.codes.delete(code);
            throw new ExpiredGrantError();
        }

        if (expected.clientId !== undefined && expected.clientId !== codeData.clientId) {
            throw new InvalidGrantError(
                `Authorization code was not issued to this client, ${codeData.clientId} != ${expected.clientId}`,
            );
        }

        if (expected.redirectUri !== undefined && expected.redirectUri !== codeData.redirectUri) {
            throw new InvalidGrantError(
                `Authorization code was issued to a different redirect URI, ${codeData.redirectUri} != ${expected.redirectUri}`,
            );
        }

        if (codeData.codeChallenge) {
            if (!codeVerifier) {
                throw new InvalidRequestError('code_verifier required for PKCE');
            }
            validateChallenge(codeData.codeChallenge, codeData.codeChallengeMethod, codeVerifier);
        }

        const redeemed = this.codes.take(code);
        if (!redeemed) {
            throw new InvalidGrantError('Invalid authorization code');
        }

        log('redeemed code for client %s', redeemed.clientId);
        return { ...redeemed, scopes: [...redeemed.scopes] };
    }

    get(code: string): AuthorizationCode | undefined {
        const codeData = this.codes.get(code);
        return codeData && { ...codeData, scopes: [...codeData.scopes] };
    }

    purgeExpired(): number {
        return this.codes.purgeExpired();
    }
}
