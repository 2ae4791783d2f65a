import { describe, it, expect, beforeEach } from 'vitest';
import { ClientStore } from '../ClientStore.js';
import { InvalidClientMetadataError } from '../errors.js';
import { createTestClient } from './test-helpers.js';

describe('ClientStore', () => {
    let store: ClientStore;

    beforeEach(() => {
        store = new ClientStore();
    });

    it('should register a public client', () => {
        const client = store.register(createTestClient());

        expect(client.client_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
        expect(client).toMatchObject({
            client_name: 'Test Client',
            redirect_uris: ['http://localhost:3000/callback', 'http://localhost:3000/callback2'],
            token_endpoint_auth_method: 'none',
            grant_types: ['authorization_code'],
            response_types: ['code'],
        });
        expect(store.get(client.client_id)).toEqual(client);
    });

    it('should omit client_name when none is given', () => {
        const client = store.register({ redirect_uris: ['https://client.example/cb'] });

        expect('client_name' in client).toBe(false);
    });

    it('should require at least one redirect URI', () => {
        expect(() => store.register({ client_name: 'No redirects' })).toThrow('redirect_uris: Required');
        expect(() => store.register(createTestClient({ redirect_uris: [] }))).toThrow(InvalidClientMetadataError);
    });

    it('should reject redirect URIs that are not URLs', () => {
        expect(() => store.register(createTestClient({ redirect_uris: ['not a url'] }))).toThrow('redirect_uris.0: Invalid url');
    });

    it('should return undefined for unknown clients', () => {
        expect(store.get('unknown')).toBeUndefined();
    });
});
