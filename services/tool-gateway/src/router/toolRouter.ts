import { logger } from '@retailops/service-template';
import { ConfirmationStore, ActionRequest } from '../confirmation/confirmationStore';
import { describeError, ErrorBody, ErrorKind, GatewayError, toErrorBody } from '../errors';
import { IdempotencyLedger, LedgerEntry } from '../ledger/idempotencyLedger';
import { deriveIdempotencyKey } from '../ledger/idempotencyKey';
import { extractRoleContext, Role } from '../roles/roleContext';
import { ToolRegistry } from '../registry/toolRegistry';
import { BoundWrite, ToolServices, WriteReceipt, WriteToolDefinition } from '../registry/types';
import { redactSensitiveData } from '../validation';

export interface RawToolRequest {
    tool: string;
    arguments?: unknown;
    roleHeader?: string | string[];
    confirmationToken?: string;
    idempotencyKey?: string;
}

export interface OkResult {
    status: 'ok';
    tool: string;
    data: unknown;
}

export interface PreviewResult {
    status: 'preview';
    tool: string;
    token: string;
    expires_at: string;
    effect_summary: string;
}

export interface ExecutedResult {
    status: WriteReceipt['status'];
    tool: string;
    id: string;
    timestamp: string;
    idempotency_key: string;
    replayed: boolean;
    record: Record<string, unknown>;
}

export interface ErrorResult extends ErrorBody {
    status: 'error';
    tool: string;
}

export type ToolResult = OkResult | PreviewResult | ExecutedResult | ErrorResult;

export interface ToolRouterDeps {
    registry: ToolRegistry;
    confirmations: ConfirmationStore;
    ledger: IdempotencyLedger<WriteReceipt>;
    services: ToolServices;
}

export interface ToolRouterOptions {
    /** How long a duplicate call waits for an in-flight write with the same key. */
    pendingWaitMs: number;
}

const DENIAL_KINDS = new Set<ErrorKind>(['UnauthenticatedRole', 'RoleMismatch', 'PermissionDenied']);

const ledgerFallback = (key: string): string =>
    `Check GET /ledger/${key} for the outcome before resending; support can resolve it after checking the backend.`;

const RETRY_WITH_NEW_PREVIEW = 'Nothing was changed. Call the tool again without a confirmation_token to get a fresh preview, then confirm it.';

export class ToolRouter {
    constructor(private readonly deps: ToolRouterDeps, private readonly options: ToolRouterOptions) {}

    /** Answers one tool call. Every failure is returned as an ErrorResult. */
    async handle(request: RawToolRequest): Promise<ToolResult> {
        logger.info('TOOL_INVOKE_START', {
            tool: request.tool,
            has_confirmation_token: request.confirmationToken !== undefined,
            has_idempotency_key: request.idempotencyKey !== undefined
        });

        try {
            const { context, arguments: args } = extractRoleContext({
                header: request.roleHeader,
                arguments: request.arguments
            });
            const definition = this.deps.registry.lookup(request.tool);
            this.deps.registry.authorize(definition, context.role);

            if (definition.classification === 'READ') {
                const bound = definition.bind(args);
                const data = await bound.execute(this.deps.services, { role: context.role });
                logger.info('TOOL_INVOKE_RESULT', { tool: bound.tool, role: context.role, status: 'ok' });
                return { status: 'ok', tool: bound.tool, data };
            }

            return await this.handleWrite(definition, definition.bind(args), context.role, request);
        } catch (error) {
            return this.failure(request.tool, error);
        }
    }

    // No await between the ledger peek and `begin`: concurrent duplicates
    // either see the pending entry or never get past confirmation.
    private handleWrite(definition: WriteToolDefinition, bound: BoundWrite, role: Role, request: RawToolRequest): Promise<ToolResult> {
        const action: ActionRequest = { tool: bound.tool, role, args: bound.args, idempotencyKey: request.idempotencyKey };
        const token = request.confirmationToken;
        const clientKey = request.idempotencyKey;
        const loggedArgs = redactSensitiveData(bound.args, definition.sensitivity);

        if (token === undefined && clientKey === undefined) {
            return Promise.resolve(this.issuePreview(action, loggedArgs));
        }

        const key = deriveIdempotencyKey({ tool: bound.tool, args: bound.args, clientKey, confirmationToken: token });
        // A token confirmed under one client key may come back with another or none
        const tokenKey = token === undefined
            ? undefined
            : deriveIdempotencyKey({ tool: bound.tool, args: bound.args, confirmationToken: token });
        const existing = this.deps.ledger.peek(key) || (tokenKey === undefined ? undefined : this.deps.ledger.peek(tokenKey));
        if (existing && existing.status !== 'failed') {
            return this.replay(existing.key, existing);
        }

        if (token === undefined || tokenKey === undefined) {
            return Promise.resolve(this.issuePreview(action, loggedArgs));
        }

        const validated = this.deps.confirmations.confirm(token, action);
        return this.execute(key, tokenKey, bound, validated.role, loggedArgs);
    }

    private issuePreview(action: ActionRequest, loggedArgs: unknown): PreviewResult {
        const preview = this.deps.confirmations.preview(action);
        logger.info('TOOL_PREVIEW_ISSUED', {
            tool: preview.tool,
            role: preview.role,
            arguments: loggedArgs,
            expires_at: new Date(preview.expiresAt).toISOString()
        });
        return {
            status: 'preview',
            tool: preview.tool,
            token: preview.token,
            expires_at: new Date(preview.expiresAt).toISOString(),
            effect_summary: preview.effectSummary
        };
    }

    private async execute(key: string, tokenKey: string, bound: BoundWrite, role: Role, loggedArgs: unknown): Promise<ToolResult> {
        const begun = this.deps.ledger.begin(key, bound.tool);
        this.deps.ledger.alias(tokenKey, key);
        if (begun.kind !== 'proceed') {
            return this.replay(key, begun.entry);
        }

        let receipt: WriteReceipt;
        try {
            receipt = await bound.execute(this.deps.services, { role, idempotencyKey: key });
        } catch (error) {
            if (error instanceof GatewayError && error.outcome !== 'unknown') {
                this.deps.ledger.fail(key, { kind: error.kind, message: error.message });
                throw error.outcome === 'not_executed' ? error.withFallback(RETRY_WITH_NEW_PREVIEW) : error;
            }
            const ambiguous = error instanceof GatewayError
                ? error
                : new GatewayError('BackendAmbiguous', `Outcome of ${bound.tool} is unknown: ${describeError(error)}`);
            this.deps.ledger.markAmbiguous(key, { kind: ambiguous.kind, message: ambiguous.message });
            throw ambiguous.withFallback(ledgerFallback(key));
        }

        this.deps.ledger.complete(key, receipt);
        logger.info('TOOL_INVOKE_RESULT', {
            tool: bound.tool,
            role,
            status: receipt.status,
            id: receipt.id,
            arguments: loggedArgs,
            idempotency_key: key
        });
        return this.executed(bound.tool, key, receipt, false);
    }

    private async replay(key: string, entry: LedgerEntry<WriteReceipt>): Promise<ToolResult> {
        const settled = entry.status === 'pending' && !entry.ambiguity
            ? await this.deps.ledger.waitFor(key, this.options.pendingWaitMs)
            : entry;

        if (!settled) {
            throw new GatewayError('ActionPending', `No outcome is recorded for idempotency key '${key}'`, {
                fallbackAction: ledgerFallback(key)
            });
        }

        if (settled.status === 'succeeded') {
            logger.info('TOOL_INVOKE_REPLAYED', { tool: settled.tool, id: settled.result.id, idempotency_key: key });
            return this.executed(settled.tool, key, settled.result, true);
        }
        if (settled.status === 'failed') {
            throw new GatewayError(settled.error.kind, settled.error.message);
        }
        if (settled.ambiguity) {
            throw new GatewayError('BackendAmbiguous', settled.ambiguity.message, { fallbackAction: ledgerFallback(key) });
        }
        throw new GatewayError('ActionPending', `A ${settled.tool} call with this idempotency key is still in flight`, {
            fallbackAction: ledgerFallback(key)
        });
    }

    private executed(tool: string, key: string, receipt: WriteReceipt, replayed: boolean): ExecutedResult {
        return {
            status: receipt.status,
            tool,
            id: receipt.id,
            timestamp: receipt.timestamp,
            idempotency_key: key,
            replayed,
            record: receipt.record
        };
    }

    private failure(tool: string, error: unknown): ErrorResult {
        const gatewayError = error instanceof GatewayError
            ? error
            : new GatewayError('Internal', `Unexpected error in ${tool}: ${describeError(error)}`);

        const event = DENIAL_KINDS.has(gatewayError.kind) ? 'TOOL_INVOKE_DENIED' : 'TOOL_INVOKE_FAILED';
        const meta = { tool, error_kind: gatewayError.kind, error: gatewayError.message, outcome: gatewayError.outcome };
        if (gatewayError.kind === 'Internal') {
            logger.error(event, meta);
        } else {
            logger.warn(event, meta);
        }

        return { status: 'error', tool, ...toErrorBody(gatewayError) };
    }
}
