import cors from 'cors';
import express, { type Express } from 'express';
import type { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { AuthorizationCodeStore } from './AuthorizationCodeStore.js';
import { BearerAuthenticator } from './BearerAuthenticator.js';
import type { ConsentProvider } from './consent.js';
import { getProtectedResourceMetadataUrl } from './discovery.js';
import { healthHandler, type HealthCheck } from './handlers/health.js';
import { SESSION_HEADER, mcpHandler } from './handlers/mcp.js';
import { McpDispatcher } from './McpDispatcher.js';
import { accessLog } from './middleware/accessLog.js';
import { requireBearerAuth } from './middleware/bearerAuth.js';
import { OAuthServer, type ErrorHandler } from './OAuthServer.js';
import { oauthRouter } from './router.js';
import { SessionManager } from './SessionManager.js';
import { TokenStore } from './TokenStore.js';
import { ToolRegistry, type ToolDefinition } from './ToolRegistry.js';
import type { AuthContext } from './types.js';

export interface AppOptions {
    /** Public base URL of this server; also the OAuth issuer. */
    issuerUrl: URL;

    /** @default `/mcp` under {@link issuerUrl} */
    mcpServerUrl?: URL;

    tools: ToolRegistry | ToolDefinition[];

    consent?: ConsentProvider;
    scopesSupported?: string[];
    defaultScopes?: string[];

    /** Scopes an access token needs to use the MCP endpoint. */
    requiredScopes?: string[];

    /** Seconds */
    accessTokenLifetime?: number;

    /** Seconds */
    authorizationCodeLifetime?: number;

    /** @see McpDispatcherOptions.sessionRecovery */
    sessionRecovery?: boolean;

    /**
     * Debug only: skip bearer authentication on the MCP endpoint and run every request as this identity.
     */
    authBypass?: AuthContext;

    serverInfo?: Implementation;
    instructions?: string;

    /** Liveness of the store the tools delegate to, reported by `GET /health`. */
    healthCheck?: HealthCheck;

    errorHandler?: ErrorHandler;
}

export interface Gateway {
    app: Express;
    oauthServer: OAuthServer;
    sessions: SessionManager;
    tools: ToolRegistry;
    dispatcher: McpDispatcher;
    codeStore: AuthorizationCodeStore;
    tokenStore: TokenStore;
}

export function createApp(options: AppOptions): Gateway {
    const mcpServerUrl = options.mcpServerUrl ?? new URL('/mcp', options.issuerUrl);
    const tools = options.tools instanceof ToolRegistry ? options.tools : new ToolRegistry(options.tools);

    const codeStore = new AuthorizationCodeStore(options.authorizationCodeLifetime);
    const tokenStore = new TokenStore();
    const oauthServer = new OAuthServer({
        codeStore,
        tokenStore,
        consent: options.consent,
        scopesSupported: options.scopesSupported,
        defaultScopes: options.defaultScopes,
        accessTokenLifetime: options.accessTokenLifetime,
        errorHandler: options.errorHandler,
    });

    const sessions = new SessionManager();
    const dispatcher = new McpDispatcher({
        sessions,
        tools,
        serverInfo: options.serverInfo,
        instructions: options.instructions,
        sessionRecovery: options.sessionRecovery,
    });

    const authMiddleware = requireBearerAuth({
        authenticator: new BearerAuthenticator({ verifier: oauthServer, requiredScopes: options.requiredScopes }),
        resourceMetadataUrl: getProtectedResourceMetadataUrl(options.issuerUrl),
        bypass: options.authBypass,
    });

    const app = express();
    app.use(cors({ origin: '*', exposedHeaders: [SESSION_HEADER, 'WWW-Authenticate'] }));
    app.use(accessLog());

    app.use(oauthRouter({ provider: oauthServer, issuerUrl: options.issuerUrl, mcpServerUrl }));
    app.get('/health', healthHandler(options.healthCheck));
    app.use(mcpServerUrl.pathname, mcpHandler({ dispatcher, sessions, authMiddleware }));

    return { app, oauthServer, sessions, tools, dispatcher, codeStore, tokenStore };
}
