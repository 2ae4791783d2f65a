import http from 'node:http';
import debug from 'debug';
import { appOptionsFromConfig, autoApproveConsent, createApp, loadConfig, startStoreSweeper } from '../src/index.js';
import { InventoryStore, createInventoryTools } from './inventory.js';

const log = debug('pantry');
log.enabled = true;

function main() {
    const config = loadConfig();

    const inventory = new InventoryStore([
        { name: 'Whole milk', quantity: 2, unit: 'LITERS', category: 'DAIRY', location: 'FRIDGE', expiresOn: '2026-10-25' },
        { name: 'Carrots', quantity: 1, unit: 'KG', category: 'VEGETABLES', location: 'FRIDGE' },
        { name: 'Chickpeas', quantity: 3, unit: 'PIECES', category: 'PRESERVES', location: 'PANTRY' },
    ]);

    const { app, codeStore, tokenStore } = createApp({
        ...appOptionsFromConfig(config),
        tools: createInventoryTools(inventory),
        consent: autoApproveConsent(),
        healthCheck: () => inventory.ping(),
        serverInfo: { name: 'pantry-mcp-gateway', version: '0.1.0' },
    });

    const stopSweeper =
        config.sweepInterval > 0 ? startStoreSweeper([codeStore, tokenStore], config.sweepInterval) : () => {};

    const server = http.createServer(app);
    server.listen(config.port, () => {
        log('listening on port %d, issuer %s', config.port, config.baseUrl.href);
    });

    const shutdown = (signal: string) => {
        log('received %s, shutting down', signal);
        stopSweeper();
        inventory.close();
        server.close((error) => {
            if (error) {
                log('error while closing the server', error);
                process.exitCode = 1;
            }
        });
        server.closeIdleConnections();
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main();
