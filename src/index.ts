export { createApp, type AppOptions, type Gateway } from './app.js';
export { loadConfig, appOptionsFromConfig, ConfigError, type ServerConfig } from './config.js';

export { OAuthServer, type OAuthServerOptions, type ErrorHandler } from './OAuthServer.js';
export { AuthorizationCodeStore, type IssueCodeParams, type RedeemExpectations } from './AuthorizationCodeStore.js';
export { TokenStore, type IssueTokenParams } from './TokenStore.js';
export { ClientStore, type RegisteredClient } from './ClientStore.js';
export { MemoryStore, isExpired, type Expiring } from './MemoryStore.js';
export {
    autoApproveConsent,
    isDenied,
    type ConsentDecision,
    type ConsentProvider,
    type ConsentRequest,
} from './consent.js';
export { computeChallenge, validateChallenge, isCodeChallengeMethod } from './pkce.js';

export { BearerAuthenticator, type BearerAuthenticatorOptions } from './BearerAuthenticator.js';
export { requireBearerAuth, type BearerAuthMiddlewareOptions } from './middleware/bearerAuth.js';

export { SessionManager, type CreateSessionOptions } from './SessionManager.js';
export { ToolRegistry, jsonResult, toolFailure, type ToolDefinition, type ToolHandler } from './ToolRegistry.js';
export { McpDispatcher, type McpDispatcherOptions, type DispatchContext, type DispatchResult } from './McpDispatcher.js';
export { mcpHandler, SESSION_HEADER } from './handlers/mcp.js';

export { oauthRouter, type OAuthRouterOptions } from './router.js';
export {
    createOAuthMetadata,
    createProtectedResourceMetadata,
    getProtectedResourceMetadataUrl,
    type ProtectedResourceMetadata,
} from './discovery.js';
export { healthHandler, type HealthCheck } from './handlers/health.js';
export { startStoreSweeper, type Purgeable } from './sweeper.js';

export * from './errors.js';
export type { AccessToken, AuthContext, AuthorizationCode, CodeChallengeMethod, JsonRpcId, Session } from './types.js';
