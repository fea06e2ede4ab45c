import { Router } from 'express';
import { Handlers } from './handlers';

export const createRouter = (handlers: Handlers): Router => {
    const router = Router();

    router.get('/tools', handlers.handleListTools);
    router.post('/tools/:tool/invoke', handlers.handleInvokeTool);

    router.delete('/previews/:token', handlers.handleRejectPreview);

    // Manual review of ambiguous writes
    router.get('/ledger/:key', handlers.handleGetLedgerEntry);
    router.post('/ledger/:key/resolve', handlers.handleResolveLedgerEntry);

    return router;
};
