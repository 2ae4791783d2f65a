import { z } from 'zod';
import type { AppOptions } from './app.js';
import { describeIssues } from './errors.js';

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

function booleanFlag(defaultValue: boolean) {
    return z
        .string()
        .optional()
        .transform((value, ctx) => {
            if (value === undefined || value.trim() === '') {
                return defaultValue;
            }
            const normalized = value.trim().toLowerCase();
            if (TRUE_VALUES.includes(normalized)) return true;
            if (FALSE_VALUES.includes(normalized)) return false;
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true/false/1/0/yes/no, got "${value}"` });
            return z.NEVER;
        });
}

function seconds(defaultValue: number, { min }: { min: number }) {
    return z.coerce.number().int().min(min).default(defaultValue);
}

function scopeList(defaultValue: string) {
    return z
        .string()
        .default(defaultValue)
        .transform((value) => value.split(/\s+/).filter(Boolean))
        .refine((scopes) => scopes.length > 0, 'at least one scope is required');
}

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(10000),
    BASE_URL: z.string().url().optional(),
    ACCESS_TOKEN_TTL: seconds(30 * 24 * 60 * 60, { min: 1 }),
    AUTHORIZATION_CODE_TTL: seconds(10 * 60, { min: 1 }),
    OAUTH_DEFAULT_SCOPE: scopeList('inventory'),
    OAUTH_SCOPES_SUPPORTED: scopeList('inventory search fetch'),
    MCP_SESSION_RECOVERY: booleanFlag(true),
    MCP_AUTH_DISABLED: booleanFlag(false),
    MCP_DEBUG_SUBJECT: z.string().min(1).default('debug_user'),
    STORE_SWEEP_INTERVAL: seconds(60, { min: 0 }),
});

export interface ServerConfig {
    port: number;
    baseUrl: URL;
    /** Seconds */
    accessTokenLifetime: number;
    /** Seconds */
    authorizationCodeLifetime: number;
    defaultScopes: string[];
    scopesSupported: string[];
    sessionRecovery: boolean;
    authDisabled: boolean;
    debugSubject: string;
    /** Milliseconds, 0 disables the sweeper */
    sweepInterval: number;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Reads the server configuration from environment variables.
 *
 * @throws ConfigError naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    // Empty strings count as unset
    const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
    }
    const vars = parsed.data;

    const unsupported = vars.OAUTH_DEFAULT_SCOPE.filter((scope) => !vars.OAUTH_SCOPES_SUPPORTED.includes(scope));
    if (unsupported.length) {
        throw new ConfigError(
            `Invalid configuration: OAUTH_DEFAULT_SCOPE: ${unsupported.join(' ')} not in OAUTH_SCOPES_SUPPORTED`,
        );
    }

    return {
        port: vars.PORT,
        baseUrl: new URL(vars.BASE_URL ?? `http://localhost:${vars.PORT}`),
        accessTokenLifetime: vars.ACCESS_TOKEN_TTL,
        authorizationCodeLifetime: vars.AUTHORIZATION_CODE_TTL,
        defaultScopes: vars.OAUTH_DEFAULT_SCOPE,
        scopesSupported: vars.OAUTH_SCOPES_SUPPORTED,
        sessionRecovery: vars.MCP_SESSION_RECOVERY,
        authDisabled: vars.MCP_AUTH_DISABLED,
        debugSubject: vars.MCP_DEBUG_SUBJECT,
        sweepInterval: vars.STORE_SWEEP_INTERVAL * 1000,
    };
}

/** The parts of {@link AppOptions} that come from configuration. */
export function appOptionsFromConfig(
    config: ServerConfig,
): Pick<
    AppOptions,
    | 'issuerUrl'
    | 'scopesSupported'
    | 'defaultScopes'
    | 'accessTokenLifetime'
    | 'authorizationCodeLifetime'
    | 'sessionRecovery'
    | 'authBypass'
> {
    return {
        issuerUrl: config.baseUrl,
        scopesSupported: config.scopesSupported,
        defaultScopes: config.defaultScopes,
        accessTokenLifetime: config.accessTokenLifetime,
        authorizationCodeLifetime: config.authorizationCodeLifetime,
        sessionRecovery: config.sessionRecovery,
        authBypass: config.authDisabled
            ? { subject: config.debugSubject, clientId: 'debug', scopes: [...config.scopesSupported] }
            : undefined,
    };
}
