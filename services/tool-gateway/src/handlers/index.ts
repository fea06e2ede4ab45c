import { Request, Response } from 'express';
import { logger } from '@retailops/service-template';
import { ConfirmationStore } from '../confirmation/confirmationStore';
import { describeError, GatewayError, httpStatusFor, toErrorBody } from '../errors';
import { IdempotencyLedger, LedgerEntry, ManualResolution } from '../ledger/idempotencyLedger';
import { extractRoleContext } from '../roles/roleContext';
import { ToolRegistry } from '../registry/toolRegistry';
import { WriteReceipt } from '../registry/types';
import { ToolResult, ToolRouter } from '../router/toolRouter';
import { compileSchema, formatErrors } from '../validation';

export interface HandlerDeps {
    router: ToolRouter;
    registry: ToolRegistry;
    confirmations: ConfirmationStore;
    ledger: IdempotencyLedger<WriteReceipt>;
    /** Lower-case name of the header that carries the caller role. */
    roleHeader: string;
}

interface InvokeBody {
    arguments?: Record<string, unknown>;
    confirmation_token?: string;
    idempotency_key?: string;
}

type ResolveBody =
    | { status: 'succeeded'; id: string; timestamp?: string; record?: Record<string, unknown> }
    | { status: 'failed'; message: string };

const validateInvokeBody = compileSchema<InvokeBody>({
    type: 'object',
    properties: {
        arguments: { type: 'object' },
        confirmation_token: { type: 'string', minLength: 1, maxLength: 128 },
        idempotency_key: { type: 'string', minLength: 1, maxLength: 200 }
    },
    additionalProperties: false
});

const validateResolveBody = compileSchema<ResolveBody>({
    oneOf: [
        {
            type: 'object',
            properties: {
                status: { const: 'succeeded' },
                id: { type: 'string', minLength: 1 },
                timestamp: { type: 'string', format: 'date-time' },
                record: { type: 'object' }
            },
            required: ['status', 'id'],
            additionalProperties: false
        },
        {
            type: 'object',
            properties: {
                status: { const: 'failed' },
                message: { type: 'string', minLength: 1 }
            },
            required: ['status', 'message'],
            additionalProperties: false
        }
    ]
});

export const statusCodeFor = (result: ToolResult): number => {
    switch (result.status) {
        case 'error':
            return httpStatusFor(result.error_kind);
        case 'preview':
            return 202;
        default:
            return 200;
    }
};

const sendError = (res: Response, error: unknown): void => {
    const gatewayError = error instanceof GatewayError
        ? error
        : new GatewayError('Internal', describeError(error));
    if (gatewayError.kind === 'Internal') {
        logger.error('Unhandled gateway error', { error: gatewayError.message });
    }
    res.status(httpStatusFor(gatewayError.kind)).json({ status: 'error', ...toErrorBody(gatewayError) });
};

const serializeEntry = (entry: LedgerEntry<WriteReceipt>) => {
    const { createdAt, updatedAt, ...rest } = entry;
    return {
        ...rest,
        created_at: new Date(createdAt).toISOString(),
        updated_at: new Date(updatedAt).toISOString()
    };
};

const receiptStatusFor = (tool: string): WriteReceipt['status'] => (tool === 'reserve_item' ? 'reserved' : 'created');

export const createHandlers = (deps: HandlerDeps) => {
    const callerRole = (req: Request) => extractRoleContext({ header: req.headers[deps.roleHeader] }).context.role;

    const handleListTools = async (req: Request, res: Response): Promise<void> => {
        res.json({ tools: deps.registry.list() });
    };

    const handleInvokeTool = async (req: Request, res: Response): Promise<void> => {
        const body: unknown = req.body ?? {};
        if (!validateInvokeBody(body)) {
            sendError(res, new GatewayError('InvalidArguments', `Invalid request body: ${formatErrors(validateInvokeBody.errors)}`));
            return;
        }

        const headerKey = req.header('idempotency-key');
        if (headerKey !== undefined && body.idempotency_key !== undefined && headerKey !== body.idempotency_key) {
            sendError(res, new GatewayError('InvalidArguments', 'Idempotency-Key header and idempotency_key field differ'));
            return;
        }

        try {
            const result = await deps.router.handle({
                tool: req.params.tool,
                arguments: body.arguments,
                roleHeader: req.headers[deps.roleHeader],
                confirmationToken: body.confirmation_token,
                idempotencyKey: body.idempotency_key ?? headerKey
            });
            res.status(statusCodeFor(result)).json(result);
        } catch (error) {
            sendError(res, error);
        }
    };

    const handleRejectPreview = async (req: Request, res: Response): Promise<void> => {
        try {
            const preview = deps.confirmations.reject(req.params.token, callerRole(req));
            res.json({ status: 'rejected', token: preview.token, tool: preview.tool });
        } catch (error) {
            sendError(res, error);
        }
    };

    const handleGetLedgerEntry = async (req: Request, res: Response): Promise<void> => {
        try {
            callerRole(req);
            const entry = deps.ledger.peek(req.params.key);
            if (!entry) {
                throw new GatewayError('TokenNotFound', `No ledger entry for key '${req.params.key}'`, {
                    fallbackAction: 'Check the idempotency key; the entry may have passed its retention window.'
                });
            }
            res.json(serializeEntry(entry));
        } catch (error) {
            sendError(res, error);
        }
    };

    const handleResolveLedgerEntry = async (req: Request, res: Response): Promise<void> => {
        try {
            const role = callerRole(req);
            if (role !== 'support') {
                throw new GatewayError('PermissionDenied', `Role '${role}' may not resolve ledger entries; allowed roles: support`);
            }

            const body: unknown = req.body;
            if (!validateResolveBody(body)) {
                throw new GatewayError('InvalidArguments', `Invalid resolution: ${formatErrors(validateResolveBody.errors)}`);
            }

            const entry = deps.ledger.peek(req.params.key);
            const resolution: ManualResolution<WriteReceipt> = body.status === 'succeeded'
                ? {
                    status: 'succeeded',
                    result: {
                        status: receiptStatusFor(entry ? entry.tool : ''),
                        id: body.id,
                        timestamp: body.timestamp ?? new Date().toISOString(),
                        record: body.record ?? { id: body.id }
                    }
                }
                : { status: 'failed', message: body.message };

            res.json(serializeEntry(deps.ledger.resolve(req.params.key, resolution)));
        } catch (error) {
            sendError(res, error);
        }
    };

    return {
        handleListTools,
        handleInvokeTool,
        handleRejectPreview,
        handleGetLedgerEntry,
        handleResolveLedgerEntry
    };
};

export type Handlers = ReturnType<typeof createHandlers>;
