import debug from 'debug';
import crypto from 'node:crypto';
import { z } from 'zod';
import { InvalidClientMetadataError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { describeIssues } from './errors.js';

const log = debug('oauth:ClientStore');

export interface RegisteredClient {
    client_id: string;
    client_id_issued_at: number;
    client_name?: string;
    redirect_uris: string[];
    token_endpoint_auth_method: 'none';
    grant_types: ['authorization_code'];
    response_types: ['code'];
}

const ClientMetadataSchema = z.object({
    client_name: z.string().optional(),
    redirect_uris: z.array(z.string().url()).min(1),
});

/**
 * Dynamic client registration (RFC 7591) for public clients.
 *
 * Registration is optional: the authorization endpoint also accepts client ids it has never
 * seen, but holds registered clients to their declared redirect URIs.
 */
export class ClientStore {
    private clients = new Map<string, RegisteredClient>();

    register(metadata: unknown): RegisteredClient {
        const parsed = ClientMetadataSchema.safeParse(metadata);
        if (!parsed.success) {
            throw new InvalidClientMetadataError(describeIssues(parsed.error));
        }

        const client: RegisteredClient = {
            client_id: crypto.randomUUID(),
            client_id_issued_at: Math.floor(Date.now() / 1000),
            ...(parsed.data.client_name !== undefined && { client_name: parsed.data.client_name }),
            redirect_uris: parsed.data.redirect_uris,
            token_endpoint_auth_method: 'none',
            grant_types: ['authorization_code'],
            response_types: ['code'],
        };

        this.clients.set(client.client_id, client);
        log('registerClient', client);
        return client;
    }

    get(clientId: string): RegisteredClient | undefined {
        return this.clients.get(clientId);
    }
}
