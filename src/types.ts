import type { ClientCapabilities, Implementation } from '@modelcontextprotocol/sdk/types.js';

export type CodeChallengeMethod = 'S256' | 'plain';

export interface AuthorizationCode {
    code: string;
    clientId: string;
    redirectUri: string;
    scopes: string[];
    codeChallenge?: string;
    codeChallengeMethod: CodeChallengeMethod;
    subject: string;
    state?: string;
    createdAt: Date;
    expiresAt: Date;
}

export interface AccessToken {
    token: string;
    subject: string;
    clientId: string;
    scopes: string[];
    createdAt: Date;
    expiresAt: Date;
}

/**
 * The authenticated principal attached to a request once its bearer token has been verified.
 */
export interface AuthContext {
    subject: string;
    clientId: string;
    scopes: string[];
    token?: string;
    /** Seconds since epoch */
    expiresAt?: number;
}

export interface Session {
    sessionId: string;
    /** Subject of the principal that created the session; every later request must carry the same one. */
    subject: string;
    clientId: string;
    createdAt: Date;
    protocolVersion: string;
    clientInfo?: Implementation;
    clientCapabilities: ClientCapabilities;
}

/** A JSON-RPC id is any JSON scalar, echoed back exactly as received. */
export type JsonRpcId = string | number | boolean | null;
