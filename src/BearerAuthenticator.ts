import debug from 'debug';
import { InsufficientScopeError, InvalidTokenError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import type { OAuthServer } from './OAuthServer.js';
import type { AuthContext } from './types.js';

const log = debug('oauth:BearerAuthenticator');

export interface BearerAuthenticatorOptions {
    /** Token verifier, usually the {@link OAuthServer} that issued the tokens. */
    verifier: Pick<OAuthServer, 'verifyAccessToken'>;

    /** Scopes every token must carry. A token missing one is rejected with `insufficient_scope`. */
    requiredScopes?: string[];
}

export class BearerAuthenticator {
    private verifier: BearerAuthenticatorOptions['verifier'];
    private requiredScopes: string[];

    constructor(options: BearerAuthenticatorOptions) {
        this.verifier = options.verifier;
        this.requiredScopes = options.requiredScopes ?? [];
    }

    /**
     * Resolves the value of an `Authorization` header to the principal it authenticates.
     *
     * @throws InvalidTokenError when the header is missing or malformed, or the token is unknown or expired
     * @throws InsufficientScopeError when the token lacks a required scope
     */
    async authenticate(authorization: string | undefined): Promise<AuthContext> {
        if (!authorization) {
            throw new InvalidTokenError('Missing Authorization header');
        }

        const [type, token, ...rest] = authorization.trim().split(/\s+/);
        if (type.toLowerCase() !== 'bearer' || !token || rest.length) {
            throw new InvalidTokenError("Invalid Authorization header format, expected 'Bearer TOKEN'");
        }

        const authContext = await this.verifier.verifyAccessToken(token);

        const missing = this.requiredScopes.filter((scope) => !authContext.scopes.includes(scope));
        if (missing.length) {
            log('token for %s lacks scopes %o', authContext.subject, missing);
            throw new InsufficientScopeError(`Insufficient scope, required: ${missing.join(' ')}`);
        }

        return authContext;
    }
}
