import type { OAuthMetadata } from '@modelcontextprotocol/sdk/shared/auth.js';

export interface DiscoveryOptions {
    issuerUrl: URL;
    mcpServerUrl: URL;
    scopesSupported?: string[];
}

export interface AuthorizationServerReference {
    issuer: string;
    authorization_endpoint: string;
}

export interface ProtectedResourceMetadata {
    resource: string;
    authorization_servers: AuthorizationServerReference[];
    scopes_supported?: string[];
    bearer_methods_supported: string[];
}

export const PROTECTED_RESOURCE_METADATA_PATH = '/.well-known/oauth-protected-resource';
export const AUTHORIZATION_SERVER_METADATA_PATH = '/.well-known/oauth-authorization-server';

function issuerOf(issuerUrl: URL): string {
    return issuerUrl.href.replace(/\/$/, '');
}

/** RFC 8414 authorization server metadata. */
export function createOAuthMetadata({ issuerUrl, scopesSupported }: DiscoveryOptions): OAuthMetadata {
    return {
        issuer: issuerOf(issuerUrl),
        authorization_endpoint: new URL('/authorize', issuerUrl).href,
        token_endpoint: new URL('/token', issuerUrl).href,
        registration_endpoint: new URL('/register', issuerUrl).href,
        revocation_endpoint: new URL('/revoke', issuerUrl).href,
        token_endpoint_auth_methods_supported: ['none'],
        scopes_supported: scopesSupported,
        response_types_supported: ['code'],
        response_modes_supported: ['query'],
        grant_types_supported: ['authorization_code'],
        code_challenge_methods_supported: ['S256', 'plain'],
    };
}

/**
 * Protected resource metadata for the MCP endpoint. Each authorization server is described by
 * its issuer and authorization endpoint.
 */
export function createProtectedResourceMetadata({
    issuerUrl,
    mcpServerUrl,
    scopesSupported,
}: DiscoveryOptions): ProtectedResourceMetadata {
    return {
        resource: mcpServerUrl.href,
        authorization_servers: [
            {
                issuer: issuerOf(issuerUrl),
                authorization_endpoint: new URL('/authorize', issuerUrl).href,
            },
        ],
        ...(scopesSupported && { scopes_supported: scopesSupported }),
        bearer_methods_supported: ['header'],
    };
}

export function getProtectedResourceMetadataUrl(issuerUrl: URL): string {
    return new URL(PROTECTED_RESOURCE_METADATA_PATH, issuerUrl).href;
}
