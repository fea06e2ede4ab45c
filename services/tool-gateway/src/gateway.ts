import { Express } from 'express';
import { createService, installErrorHandler, logger } from '@retailops/service-template';
import { RetailBackendClient } from './backend/RetailBackendClient';
import { RetailBackend } from './backend/types';
import { GatewayConfig } from './config';
import { ConfirmationStore } from './confirmation/confirmationStore';
import { createHandlers } from './handlers';
import { DocumentIndex, MarkdownDocumentIndex } from './knowledge/documentIndex';
import { IdempotencyLedger } from './ledger/idempotencyLedger';
import { ToolRegistry } from './registry/toolRegistry';
import { WriteReceipt } from './registry/types';
import { createRouter } from './routes';
import { ToolRouter } from './router/toolRouter';

export interface GatewayOverrides {
    backend?: RetailBackend;
    documents?: DocumentIndex;
    now?: () => number;
    mintToken?: () => string;
}

export interface Gateway {
    app: Express;
    router: ToolRouter;
    registry: ToolRegistry;
    confirmations: ConfirmationStore;
    ledger: IdempotencyLedger<WriteReceipt>;
    /** Starts the periodic preview and ledger sweeps. */
    start(): void;
    close(): void;
}

/** Builds the process-wide stores and wires them into an Express app. */
export const createGateway = (config: GatewayConfig, overrides: GatewayOverrides = {}): Gateway => {
    const registry = new ToolRegistry();
    const confirmations = new ConfirmationStore(registry, {
        ttlMs: config.previewTtlMs,
        now: overrides.now,
        mintToken: overrides.mintToken
    });
    const ledger = new IdempotencyLedger<WriteReceipt>({ retentionMs: config.ledgerRetentionMs, now: overrides.now });

    let client: RetailBackendClient | undefined;
    let backend: RetailBackend;
    if (overrides.backend) {
        backend = overrides.backend;
    } else {
        client = new RetailBackendClient(config.backend);
        backend = client;
    }
    const documents = overrides.documents || MarkdownDocumentIndex.fromDirectory(config.knowledge.docsDir, config.knowledge.baseUrl);

    const router = new ToolRouter(
        { registry, confirmations, ledger, services: { backend, documents } },
        { pendingWaitMs: config.backend.writeTimeoutMs }
    );

    const app = createService(config.serviceName);
    app.use(createRouter(createHandlers({ router, registry, confirmations, ledger, roleHeader: config.roleHeader })));
    installErrorHandler(app);

    return {
        app,
        router,
        registry,
        confirmations,
        ledger,
        start() {
            confirmations.start(config.sweepIntervalMs);
            ledger.start(config.sweepIntervalMs);
            logger.info('Tool gateway ready', { tools: registry.list().length, backend: config.backend.baseUrl });
        },
        close() {
            confirmations.stop();
            ledger.stop();
            if (client) {
                client.close();
            }
        }
    };
};
