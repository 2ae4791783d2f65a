import type { Request } from 'express';
import { z } from 'zod';
import debug from 'debug';
import type { OAuthTokens } from '@modelcontextprotocol/sdk/shared/auth.js';
import {
    InvalidRequestError,
    InvalidScopeError,
    UnsupportedGrantTypeError,
} from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { AuthorizationCodeStore } from './AuthorizationCodeStore.js';
import { ClientStore, type RegisteredClient } from './ClientStore.js';
import { TokenStore } from './TokenStore.js';
import { autoApproveConsent, isDenied, type ConsentProvider } from './consent.js';
import { describeIssues } from './errors.js';
import { isCodeChallengeMethod } from './pkce.js';
import type { AuthContext } from './types.js';

const log = debug('oauth:OAuthServer');

export type ErrorHandler = (
    step: 'authorize' | 'exchangeAuthorizationCode' | 'verifyAccessToken' | 'registerClient' | 'revokeToken',
    error: unknown,
    params?: Record<string, unknown>,
) => void;

const defaultErrorHandler: ErrorHandler = (step, error, params) => {
    log(`error: ${step}`, error, params);
};

const AuthorizeQuerySchema = z.object({
    client_id: z.string({ required_error: 'client_id is required' }).min(1, 'client_id is required'),
    redirect_uri: z.string({ required_error: 'redirect_uri is required' }).url('redirect_uri must be an absolute URL'),
    response_type: z.string().optional(),
    state: z.string().optional(),
    code_challenge: z.string().optional(),
    code_challenge_method: z.string().optional(),
    scope: z.string().optional(),
});

const TokenRequestSchema = z.object({
    grant_type: z.string().optional(),
    code: z.string().optional(),
    redirect_uri: z.string().optional(),
    client_id: z.string().optional(),
    code_verifier: z.string().optional(),
});

export interface OAuthServerOptions {
    /** @default a new {@link AuthorizationCodeStore} */
    codeStore?: AuthorizationCodeStore;

    /** @default a new {@link TokenStore} */
    tokenStore?: TokenStore;

    /** @default a new {@link ClientStore} */
    clientStore?: ClientStore;

    /**
     * Decides who the authorization is granted for.
     *
     * @default {@link autoApproveConsent}, which approves every request as `demo_user`
     */
    consent?: ConsentProvider;

    /**
     * The scopes supported by this OAuth server. Requests for any other scope are rejected with `invalid_scope`.
     *
     * If unset, any scope is accepted.
     */
    scopesSupported?: string[];

    /**
     * Scopes granted when the client does not request any.
     *
     * @default ['inventory']
     */
    defaultScopes?: string[];

    /**
     * The lifetime of the access token in seconds.
     *
     * @default 1 hour
     */
    accessTokenLifetime?: number;

    errorHandler?: ErrorHandler;
}

/**
 * Authorization endpoint and token exchange of an OAuth 2.1 authorization code grant with PKCE.
 *
 * All credentials live in process memory and are lost on restart.
 */
export class OAuthServer {
    readonly codeStore: AuthorizationCodeStore;
    readonly tokenStore: TokenStore;
    readonly clientStore: ClientStore;
    readonly consent: ConsentProvider;

    scopesSupported?: string[];
    defaultScopes: string[];
    accessTokenLifetime: number;
    errorHandler: ErrorHandler;

    constructor(options: OAuthServerOptions = {}) {
        this.codeStore = options.codeStore || new AuthorizationCodeStore();
        this.tokenStore = options.tokenStore || new TokenStore();
        this.clientStore = options.clientStore || new ClientStore();
        this.consent = options.consent || autoApproveConsent();
        this.scopesSupported = options.scopesSupported;
        this.defaultScopes = options.defaultScopes || ['inventory'];
        this.accessTokenLifetime = options.accessTokenLifetime || 3600;
        this.errorHandler = options.errorHandler || defaultErrorHandler;
    }

    /**
     * Handles an authorization request and returns where to send the user agent.
     *
     * Problems with `client_id` or `redirect_uri` are thrown, never redirected, since the
     * redirect target is not trustworthy yet. A consent denial is reported to the client's
     * redirect URI as `access_denied`.
     */
    async authorize(query: unknown, req: Request): Promise<URL> {
        try {
            const parsed = AuthorizeQuerySchema.safeParse(query ?? {});
            if (!parsed.success) {
                throw new InvalidRequestError(describeIssues(parsed.error));
            }
            const params = parsed.data;

            if (params.response_type !== 'code') {
                throw new InvalidRequestError('response_type must be "code"');
            }

            const codeChallengeMethod = params.code_challenge_method || 'S256';
            if (!isCodeChallengeMethod(codeChallengeMethod)) {
                throw new InvalidRequestError('code_challenge_method must be "S256" or "plain"');
            }

            const client = this.clientStore.get(params.client_id);
            if (client && !client.redirect_uris.includes(params.redirect_uri)) {
                throw new InvalidRequestError('Unregistered redirect_uri');
            }

            const scopes = this.validateScope(params.scope);

            const decision = await this.consent.obtainConsent(
                {
                    clientId: params.client_id,
                    clientName: client?.client_name,
                    redirectUri: params.redirect_uri,
                    scopes,
                    state: params.state,
                    codeChallengeMethod,
                },
                req,
            );

            const targetUrl = new URL(params.redirect_uri);

            if (isDenied(decision)) {
                log('authorize: consent denied for client %s', params.client_id);
                targetUrl.searchParams.set('error', 'access_denied');
                targetUrl.searchParams.set('error_description', decision.reason || 'User denied access');
            } else {
                const authorizationCode = this.codeStore.issue({
                    clientId: params.client_id,
                    redirectUri: params.redirect_uri,
                    scopes,
                    codeChallenge: params.code_challenge,
                    codeChallengeMethod,
                    subject: decision.subject,
                    state: params.state,
                });
                targetUrl.searchParams.set('code', authorizationCode);
            }

            if (params.state) {
                targetUrl.searchParams.set('state', params.state);
            }

            log('authorize', { clientId: params.client_id, redirectUri: params.redirect_uri, scopes });
            return targetUrl;
        } catch (error) {
            this.errorHandler('authorize', error, { query });
            throw error;
        }
    }

    async exchangeAuthorizationCode(body: unknown): Promise<OAuthTokens> {
        try {
            const parsed = TokenRequestSchema.safeParse(body ?? {});
            if (!parsed.success) {
                throw new InvalidRequestError(describeIssues(parsed.error));
            }
            const params = parsed.data;

            if (!params.grant_type) {
                throw new InvalidRequestError('grant_type is required');
            }
            if (params.grant_type !== 'authorization_code') {
                throw new UnsupportedGrantTypeError(`Unsupported grant type: ${params.grant_type}`);
            }
            if (!params.code) {
                throw new InvalidRequestError('code is required');
            }
            if (!params.client_id) {
                throw new InvalidRequestError('client_id is required');
            }

            const codeData = this.codeStore.redeem(params.code, params.code_verifier, {
                clientId: params.client_id,
                redirectUri: params.redirect_uri,
            });

            const tokenData = this.tokenStore.issue(
                {
                    subject: codeData.subject,
                    clientId: codeData.clientId,
                    scopes: codeData.scopes,
                },
                this.accessTokenLifetime,
            );

            log('exchangeAuthorizationCode', { clientId: codeData.clientId, subject: codeData.subject });

            return {
                access_token: tokenData.token,
                token_type: 'bearer',
                expires_in: this.accessTokenLifetime,
                scope: codeData.scopes.join(' '),
            };
        } catch (error) {
            this.errorHandler('exchangeAuthorizationCode', error);
            throw error;
        }
    }

    async verifyAccessToken(token: string): Promise<AuthContext> {
        try {
            const tokenData = this.tokenStore.validate(token);

            log('verifyAccessToken', { clientId: tokenData.clientId, subject: tokenData.subject });

            return {
                token,
                subject: tokenData.subject,
                clientId: tokenData.clientId,
                scopes: tokenData.scopes,
                expiresAt: Math.floor(tokenData.expiresAt.getTime() / 1000),
            };
        } catch (error) {
            this.errorHandler('verifyAccessToken', error);
            throw error;
        }
    }

    async registerClient(metadata: unknown): Promise<RegisteredClient> {
        try {
            return this.clientStore.register(metadata);
        } catch (error) {
            this.errorHandler('registerClient', error, { metadata });
            throw error;
        }
    }

    /**
     * Revokes an access token. Unknown tokens are not an error.
     *
     * @see https://www.rfc-editor.org/rfc/rfc7009#section-2.2
     */
    async revokeToken(token: string): Promise<void> {
        try {
            this.tokenStore.revoke(token);
        } catch (error) {
            this.errorHandler('revokeToken', error);
            throw error;
        }
    }

    /**
     * Parses the space-delimited scope parameter.
     *
     * Some clients do not send scopes at all; they get the default scopes.
     */
    private validateScope(scope?: string): string[] {
        const scopes = scope?.split(' ').filter(Boolean) ?? [];
        if (!scopes.length) {
            return [...this.defaultScopes];
        }

        const supported = this.scopesSupported;
        if (supported && !scopes.every((s) => supported.includes(s))) {
            throw new InvalidScopeError('Invalid scope: requested scope is not supported');
        }

        return scopes;
    }
}
