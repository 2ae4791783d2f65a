import { InvalidGrantError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { ZodError } from 'zod';
import type { JsonRpcId } from './types.js';

export {
    InsufficientScopeError,
    InvalidClientMetadataError,
    InvalidGrantError,
    InvalidRequestError,
    InvalidScopeError,
    InvalidTokenError,
    OAuthError,
    ServerError,
    UnsupportedGrantTypeError,
} from '@modelcontextprotocol/sdk/server/auth/errors.js';

/**
 * The authorization code existed but its lifetime has elapsed.
 *
 * Serialized as `invalid_grant`, like any other unusable code.
 *
 * @see https://www.rfc-editor.org/rfc/rfc6749.html#section-5.2
 */
export class ExpiredGrantError extends InvalidGrantError {
    constructor(message: string = 'Authorization code has expired') {
        super(message);
    }
}

/** Implementation-defined JSON-RPC server error codes. */
export const ServerErrorCode = {
    /** Session header missing, unknown, or bound to another principal */
    SessionUnavailable: -32000,
    Unauthorized: -32001,
} as const;

export interface JsonRpcErrorObject {
    code: number;
    message: string;
    data?: unknown;
}

export interface JsonRpcErrorResponse {
    jsonrpc: '2.0';
    id: JsonRpcId;
    error: JsonRpcErrorObject;
}

export class JsonRpcError extends Error {
    constructor(
        readonly code: number,
        message: string,
        readonly data?: unknown,
    ) {
        super(message);
        this.name = 'JsonRpcError';
    }

    toErrorObject(): JsonRpcErrorObject {
        return this.data === undefined
            ? { code: this.code, message: this.message }
            : { code: this.code, message: this.message, data: this.data };
    }

    static methodNotFound(message: string, data?: unknown) {
        return new JsonRpcError(ErrorCode.MethodNotFound, message, data);
    }

    static invalidParams(message: string) {
        return new JsonRpcError(ErrorCode.InvalidParams, message);
    }
}

/**
 * The request cannot be tied to a usable session. Carries the HTTP status to answer with:
 * 400 when the header is missing, 404 when the session is unknown or belongs to someone else.
 */
export class SessionUnavailableError extends JsonRpcError {
    constructor(
        message: string,
        readonly status: 400 | 404,
    ) {
        super(ServerErrorCode.SessionUnavailable, message);
        this.name = 'SessionUnavailableError';
    }
}

export function errorResponse(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcErrorResponse {
    return { jsonrpc: '2.0', id, error };
}

/** Flattens zod issues into a single `path: message` description. */
export function describeIssues(error: ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join(', ');
}
