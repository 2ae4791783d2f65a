import { ErrorCode, JSONRPC_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { JsonRpcError } from './errors.js';
import type { JsonRpcId } from './types.js';

export interface JsonRpcRequest {
    jsonrpc: typeof JSONRPC_VERSION;
    /** Absent for notifications */
    id?: JsonRpcId;
    method: string;
    params?: unknown;
}

export interface JsonRpcSuccessResponse<T = unknown> {
    jsonrpc: typeof JSONRPC_VERSION;
    id: JsonRpcId;
    result: T;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonRpcId(value: unknown): value is JsonRpcId {
    return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Best-effort extraction of the request id, for error envelopes produced before the body
 * has been validated. Anything that is not a usable id becomes null.
 */
export function requestIdOf(body: unknown): JsonRpcId {
    if (isRecord(body) && isJsonRpcId(body.id)) {
        return body.id;
    }
    return null;
}

/** Only `notifications/*` methods without an id are fire-and-forget; other id-less requests are still run. */
export function isNotification(request: JsonRpcRequest): boolean {
    return request.id === undefined && request.method.startsWith('notifications/');
}

/**
 * Validates the JSON-RPC 2.0 envelope. Batches are not supported.
 *
 * @throws JsonRpcError with code -32600 when the envelope is malformed
 */
export function parseEnvelope(body: unknown): JsonRpcRequest {
    if (!isRecord(body)) {
        throw new JsonRpcError(ErrorCode.InvalidRequest, 'Invalid Request: expected a JSON-RPC 2.0 request object');
    }
    if (body.jsonrpc !== JSONRPC_VERSION) {
        throw new JsonRpcError(ErrorCode.InvalidRequest, 'Invalid JSON-RPC version');
    }
    if ('id' in body && !isJsonRpcId(body.id)) {
        throw new JsonRpcError(ErrorCode.InvalidRequest, 'Invalid Request: id must be a JSON scalar or null');
    }
    if (typeof body.method !== 'string' || !body.method) {
        throw new JsonRpcError(ErrorCode.InvalidRequest, 'Invalid Request: method must be a string');
    }

    const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, method: body.method, params: body.params };
    if ('id' in body && isJsonRpcId(body.id)) {
        request.id = body.id;
    }
    return request;
}

export function successResponse<T>(id: JsonRpcId, result: T): JsonRpcSuccessResponse<T> {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}
