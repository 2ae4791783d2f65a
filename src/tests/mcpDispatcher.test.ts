import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { McpDispatcher } from '../McpDispatcher.js';
import { SessionManager } from '../SessionManager.js';
import { ToolRegistry, jsonResult } from '../ToolRegistry.js';
import type { AuthContext } from '../types.js';
import { createTestTools } from './test-helpers.js';

describe('McpDispatcher', () => {
    let sessions: SessionManager;
    let dispatcher: McpDispatcher;
    const alice: AuthContext = { subject: 'alice', clientId: 'client-1', scopes: ['inventory'] };
    const bob: AuthContext = { subject: 'bob', clientId: 'client-1', scopes: ['inventory'] };

    beforeEach(() => {
        sessions = new SessionManager();
        dispatcher = new McpDispatcher({
            sessions,
            tools: new ToolRegistry(createTestTools()),
            serverInfo: { name: 'test-server', version: '1.2.3' },
            instructions: 'Test instructions',
        });
    });

    async function initialize(auth: AuthContext = alice): Promise<string> {
        const result = await dispatcher.dispatch({ jsonrpc: '2.0', id: 0, method: 'initialize', params: {} }, { auth });
        if (!result.sessionId) {
            throw new Error('initialize did not create a session');
        }
        return result.sessionId;
    }

    describe('envelope', () => {
        it.each([['request-1'], [42], [Number.MAX_SAFE_INTEGER], [null], [true], [false]])(
            'should echo the id %j exactly',
            async (id) => {
                const sessionId = await initialize();

                const result = await dispatcher.dispatch(
                    { jsonrpc: '2.0', id, method: 'tools/list' },
                    { auth: alice, sessionId },
                );

                expect(result.status).toBe(200);
                expect(result.body).toMatchObject({ jsonrpc: '2.0', id });
            },
        );

        it('should reject a wrong JSON-RPC version with -32600', async () => {
            const result = await dispatcher.dispatch({ jsonrpc: '1.0', id: 5, method: 'tools/list' }, { auth: alice });

            expect(result).toEqual({
                status: 400,
                sessionId: undefined,
                body: { jsonrpc: '2.0', id: 5, error: { code: -32600, message: 'Invalid JSON-RPC version' } },
            });
            expect(sessions.size).toBe(0);
        });

        it.each([
            ['a batch', [{ jsonrpc: '2.0', id: 1, method: 'tools/list' }]],
            ['a string', 'tools/list'],
            ['a missing method', { jsonrpc: '2.0', id: 1 }],
            ['an object id', { jsonrpc: '2.0', id: { nested: true }, method: 'tools/list' }],
        ])('should reject %s as an invalid request', async (_label, message) => {
            const result = await dispatcher.dispatch(message, { auth: alice });

            expect(result.status).toBe(400);
            expect(result.body).toMatchObject({ jsonrpc: '2.0', error: { code: -32600 } });
        });

        it('should echo a boolean id in an invalid request envelope', async () => {
            const result = await dispatcher.dispatch({ jsonrpc: '1.0', id: true, method: 'tools/list' }, { auth: alice });

            expect(result.status).toBe(400);
            expect(result.body).toEqual({
                jsonrpc: '2.0',
                id: true,
                error: { code: -32600, message: 'Invalid JSON-RPC version' },
            });
        });

        it('should run an id-less request that is not a notification and answer with a null id', async () => {
            const handler = vi.fn(() => jsonResult({ added: true }));
            dispatcher = new McpDispatcher({
                sessions,
                tools: new ToolRegistry([
                    { name: 'add', description: 'Adds', inputSchema: { type: 'object', properties: {} }, handler },
                ]),
            });

            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', method: 'tools/call', params: { name: 'add', arguments: {} } },
                { auth: alice },
            );

            expect(handler).toHaveBeenCalledTimes(1);
            expect(result.status).toBe(200);
            expect(result.sessionId).toBeDefined();
            expect(result.body).toEqual({
                jsonrpc: '2.0',
                id: null,
                result: {
                    content: [{ type: 'text', text: '{"added":true}' }],
                    structuredContent: { added: true },
                },
            });
        });

        it('should answer an id-less unknown method with a null id', async () => {
            const result = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'resources/list' }, { auth: alice });

            expect(result.status).toBe(200);
            expect(result.body).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32601 } });
        });

        it('should accept notifications without a response or a new session', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', method: 'notifications/initialized' },
                { auth: alice },
            );

            expect(result).toEqual({ status: 202, sessionId: undefined });
            expect(sessions.size).toBe(0);
        });

        it('should answer unknown methods with -32601', async () => {
            const sessionId = await initialize();

            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 3, method: 'resources/list' },
                { auth: alice, sessionId },
            );

            expect(result).toEqual({
                status: 200,
                sessionId,
                body: {
                    jsonrpc: '2.0',
                    id: 3,
                    error: { code: -32601, message: 'Unknown method: resources/list', data: { method: 'resources/list' } },
                },
            });
        });
    });

    describe('initialize', () => {
        it('should create a session and describe the server', async () => {
            const result = await dispatcher.dispatch(
                {
                    jsonrpc: '2.0',
                    id: 1,
                    method: 'initialize',
                    params: {
                        protocolVersion: '2024-11-05',
                        capabilities: {},
                        clientInfo: { name: 'test-client', version: '0.0.1' },
                    },
                },
                { auth: alice },
            );

            expect(result.status).toBe(200);
            expect(result.body).toEqual({
                jsonrpc: '2.0',
                id: 1,
                result: {
                    protocolVersion: '2024-11-05',
                    capabilities: { tools: { listChanged: false } },
                    serverInfo: { name: 'test-server', version: '1.2.3' },
                    instructions: 'Test instructions',
                },
            });
            const session = sessions.get(result.sessionId ?? '');
            expect(session?.subject).toBe('alice');
            expect(session?.clientInfo).toEqual({ name: 'test-client', version: '0.0.1' });
        });

        it('should fall back to the latest protocol version', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 1, method: 'initialize', params: { protocolVersion: '1999-01-01' } },
                { auth: alice },
            );

            expect(result.body).toMatchObject({ result: { protocolVersion: LATEST_PROTOCOL_VERSION } });
        });

        it('should always start a new session', async () => {
            const first = await initialize();

            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 1, method: 'initialize' },
                { auth: alice, sessionId: first },
            );

            expect(result.sessionId).toBeDefined();
            expect(result.sessionId).not.toBe(first);
            expect(sessions.size).toBe(2);
        });
    });

    describe('sessions', () => {
        it('should create a session for a request without one', async () => {
            const result = await dispatcher.dispatch({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, { auth: alice });

            expect(result.status).toBe(200);
            expect(sessions.get(result.sessionId ?? '')?.subject).toBe('alice');
        });

        it('should keep one session per header-less request', async () => {
            await dispatcher.dispatch({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, { auth: alice });
            await dispatcher.dispatch({ jsonrpc: '2.0', id: 2, method: 'tools/list' }, { auth: alice });

            expect(sessions.size).toBe(2);
        });

        it('should recover an unknown session under the same id', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 1, method: 'tools/list' },
                { auth: alice, sessionId: 'lost-after-restart' },
            );

            expect(result.status).toBe(200);
            expect(result.sessionId).toBe('lost-after-restart');
            expect(sessions.get('lost-after-restart')?.subject).toBe('alice');
        });

        it('should refuse a session that belongs to someone else', async () => {
            const sessionId = await initialize(alice);

            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 'x', method: 'tools/list' },
                { auth: bob, sessionId },
            );

            expect(result).toEqual({
                status: 404,
                body: { jsonrpc: '2.0', id: 'x', error: { code: -32000, message: 'Session not found' } },
            });
            expect(sessions.get(sessionId)?.subject).toBe('alice');
        });

        describe('without recovery', () => {
            beforeEach(() => {
                dispatcher = new McpDispatcher({
                    sessions,
                    tools: new ToolRegistry(createTestTools()),
                    sessionRecovery: false,
                });
            });

            it('should require the session header', async () => {
                const result = await dispatcher.dispatch({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, { auth: alice });

                expect(result.status).toBe(400);
                expect(result.body).toMatchObject({ id: 1, error: { code: -32000 } });
                expect(sessions.size).toBe(0);
            });

            it('should answer 404 for unknown sessions', async () => {
                const result = await dispatcher.dispatch(
                    { jsonrpc: '2.0', id: 1, method: 'tools/list' },
                    { auth: alice, sessionId: 'unknown' },
                );

                expect(result.status).toBe(404);
                expect(result.body).toMatchObject({ id: 1, error: { code: -32000, message: 'Session not found' } });
            });

            it('should still serve known sessions', async () => {
                const sessionId = await initialize();

                const result = await dispatcher.dispatch(
                    { jsonrpc: '2.0', id: 1, method: 'tools/list' },
                    { auth: alice, sessionId },
                );

                expect(result.status).toBe(200);
                expect(result.sessionId).toBe(sessionId);
            });
        });
    });

    describe('tools', () => {
        let sessionId: string;

        beforeEach(async () => {
            sessionId = await initialize();
        });

        it('should list the registered tools', async () => {
            const result = await dispatcher.dispatch({ jsonrpc: '2.0', id: 1, method: 'tools/list' }, { auth: alice, sessionId });

            expect(result.body).toMatchObject({
                result: { tools: [{ name: 'echo' }, { name: 'fail' }] },
            });
        });

        it('should call a tool as the authenticated principal', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'echo', arguments: { message: 'hi' } } },
                { auth: alice, sessionId },
            );

            expect(result.body).toEqual({
                jsonrpc: '2.0',
                id: 2,
                result: {
                    content: [{ type: 'text', text: '{"message":"hi","subject":"alice"}' }],
                    structuredContent: { message: 'hi', subject: 'alice' },
                },
            });
        });

        it('should answer unknown tools with -32601', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'nonexistent' } },
                { auth: alice, sessionId },
            );

            expect(result.status).toBe(200);
            expect(result.body).toEqual({
                jsonrpc: '2.0',
                id: 3,
                error: { code: -32601, message: 'Unknown tool: nonexistent', data: { name: 'nonexistent' } },
            });
        });

        it('should answer a missing tool name with -32602', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 4, method: 'tools/call', params: {} },
                { auth: alice, sessionId },
            );

            expect(result.body).toMatchObject({ id: 4, error: { code: -32602 } });
        });

        it('should answer non-object arguments with -32602', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'echo', arguments: ['hi'] } },
                { auth: alice, sessionId },
            );

            expect(result.body).toMatchObject({
                id: 5,
                error: { code: -32602, message: 'Invalid params: arguments must be an object' },
            });
        });

        it('should report a throwing tool as success: false', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 6, method: 'tools/call', params: { name: 'fail' } },
                { auth: alice, sessionId },
            );

            expect(result.status).toBe(200);
            expect(result.body).toEqual({
                jsonrpc: '2.0',
                id: 6,
                result: {
                    content: [{ type: 'text', text: '{"success":false,"error":"boom"}' }],
                    structuredContent: { success: false, error: 'boom' },
                    isError: true,
                },
            });
        });

        it('should describe invalid arguments', async () => {
            const result = await dispatcher.dispatch(
                { jsonrpc: '2.0', id: 7, method: 'tools/call', params: { name: 'echo', arguments: {} } },
                { auth: alice, sessionId },
            );

            expect(result.body).toMatchObject({
                result: {
                    structuredContent: { success: false, error: 'Invalid arguments: message: Required' },
                    isError: true,
                },
            });
        });
    });

    it('should hide unexpected failures behind -32603', async () => {
        class BrokenRegistry extends ToolRegistry {
            list(): never {
                throw new Error('catalog unavailable');
            }
        }
        dispatcher = new McpDispatcher({ sessions, tools: new BrokenRegistry() });

        const result = await dispatcher.dispatch({ jsonrpc: '2.0', id: 9, method: 'tools/list' }, { auth: alice });

        expect(result.status).toBe(500);
        expect(result.body).toEqual({ jsonrpc: '2.0', id: 9, error: { code: -32603, message: 'Internal error' } });
    });
});
