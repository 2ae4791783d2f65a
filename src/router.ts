import express, { type RequestHandler } from 'express';
import type { OAuthServer } from './OAuthServer.js';
import {
    AUTHORIZATION_SERVER_METADATA_PATH,
    PROTECTED_RESOURCE_METADATA_PATH,
    createOAuthMetadata,
    createProtectedResourceMetadata,
} from './discovery.js';
import { authorizationHandler } from './handlers/authorize.js';
import { metadataHandler } from './handlers/metadata.js';
import { clientRegistrationHandler } from './handlers/register.js';
import { revocationHandler } from './handlers/revoke.js';
import { tokenHandler } from './handlers/token.js';

export interface OAuthRouterOptions {
    provider: OAuthServer;

    /** The authorization server's issuer identifier. Endpoints are served at the root of this URL. */
    issuerUrl: URL;

    /** The protected MCP endpoint, published as the resource in the protected resource metadata. */
    mcpServerUrl: URL;

    /** @default provider.scopesSupported */
    scopesSupported?: string[];
}

/**
 * Installs the discovery documents and the `/authorize`, `/token`, `/register` and `/revoke` endpoints.
 * Must be mounted at the application root.
 */
export function oauthRouter({ provider, issuerUrl, mcpServerUrl, scopesSupported }: OAuthRouterOptions): RequestHandler {
    const discovery = {
        issuerUrl,
        mcpServerUrl,
        scopesSupported: scopesSupported ?? provider.scopesSupported,
    };

    const router = express.Router();

    router.use(AUTHORIZATION_SERVER_METADATA_PATH, metadataHandler(createOAuthMetadata(discovery)));
    router.use(PROTECTED_RESOURCE_METADATA_PATH, metadataHandler(createProtectedResourceMetadata(discovery)));

    router.use('/authorize', authorizationHandler({ provider }));
    router.use('/token', tokenHandler({ provider }));
    router.use('/register', clientRegistrationHandler({ provider }));
    router.use('/revoke', revocationHandler({ provider }));

    return router;
}
