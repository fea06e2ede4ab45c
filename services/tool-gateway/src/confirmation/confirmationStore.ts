import { v4 as uuidv4 } from 'uuid';
import { logger } from '@retailops/service-template';
import { GatewayError } from '../errors';
import { Role } from '../roles/roleContext';
import { ToolRegistry } from '../registry/toolRegistry';
import { ToolName } from '../registry/types';
import { canonicalJson } from '../util/canonicalJson';
import { startSweeper } from '../util/sweeper';

export type PreviewState = 'PREVIEWED' | 'CONFIRMED' | 'REJECTED' | 'EXPIRED';

/** A write call as the router saw it, after role extraction and validation. */
export interface ActionRequest {
    tool: ToolName;
    role: Role;
    args: Record<string, unknown>;
    idempotencyKey?: string;
}

export interface Preview {
    token: string;
    tool: ToolName;
    role: Role;
    effectSummary: string;
    createdAt: number;
    expiresAt: number;
    request: ActionRequest;
}

/** Returned once per token; the router may execute it exactly once. */
export interface ValidatedRequest {
    token: string;
    tool: ToolName;
    role: Role;
    args: Record<string, unknown>;
    effectSummary: string;
}

interface PreviewRecord {
    state: PreviewState;
    preview: Preview;
    fingerprint: string;
}

export interface ConfirmationStoreOptions {
    ttlMs: number;
    now?: () => number;
    mintToken?: () => string;
}

const fingerprintOf = (request: ActionRequest): string =>
    canonicalJson({ tool: request.tool, role: request.role, args: request.args });

export class ConfirmationStore {
    private readonly records = new Map<string, PreviewRecord>();
    private readonly now: () => number;
    private readonly mintToken: () => string;
    private stopSweeper?: () => void;

    constructor(private readonly registry: ToolRegistry, private readonly options: ConfirmationStoreOptions) {
        this.now = options.now || Date.now;
        this.mintToken = options.mintToken || uuidv4;
    }

    /** Issues a single-use token for a write. Never contacts the backend. */
    preview(request: ActionRequest): Preview {
        const definition = this.registry.lookup(request.tool);
        if (definition.classification !== 'WRITE') {
            throw new GatewayError('Internal', `${request.tool} is not a write tool and cannot be previewed`);
        }

        const token = this.uniqueToken();
        const createdAt = this.now();
        const preview: Preview = {
            token,
            tool: request.tool,
            role: request.role,
            effectSummary: definition.bind(request.args).summarize(request.role),
            createdAt,
            expiresAt: createdAt + this.options.ttlMs,
            request: { ...request, args: { ...request.args } }
        };

        this.records.set(token, { state: 'PREVIEWED', preview, fingerprint: fingerprintOf(request) });
        return preview;
    }

    confirm(token: string, request: ActionRequest): ValidatedRequest {
        const record = this.liveRecord(token);

        if (record.fingerprint !== fingerprintOf(request)) {
            // The preview stays confirmable with its original arguments
            throw new GatewayError(
                'RequestMismatch',
                `Confirmation for token '${token}' does not match the previewed ${record.preview.tool} request`,
                { details: { previewed: record.preview.effectSummary } }
            );
        }

        record.state = 'CONFIRMED';
        const { preview } = record;
        return {
            token,
            tool: preview.tool,
            role: preview.role,
            args: { ...preview.request.args },
            effectSummary: preview.effectSummary
        };
    }

    /** Declines a preview so its token can never be confirmed. */
    reject(token: string, role: Role): Preview {
        const record = this.liveRecord(token);
        if (record.preview.role !== role) {
            throw new GatewayError('RequestMismatch', `Token '${token}' was issued to a different role`);
        }
        record.state = 'REJECTED';
        logger.info('Preview rejected', { tool: record.preview.tool, role });
        return record.preview;
    }

    inspect(token: string): PreviewState | undefined {
        const record = this.records.get(token);
        if (!record) {
            return undefined;
        }
        if (record.state === 'PREVIEWED' && this.isExpired(record)) {
            return 'EXPIRED';
        }
        return record.state;
    }

    /** Removes every record past its expiry, whatever its state. */
    sweep(): number {
        let removed = 0;
        for (const [token, record] of this.records) {
            if (this.isExpired(record)) {
                this.records.delete(token);
                removed += 1;
            }
        }
        return removed;
    }

    get size(): number {
        return this.records.size;
    }

    start(intervalMs: number): void {
        this.stop();
        this.stopSweeper = startSweeper('preview', this, intervalMs);
    }

    stop(): void {
        if (this.stopSweeper) {
            this.stopSweeper();
            this.stopSweeper = undefined;
        }
    }

    private liveRecord(token: string): PreviewRecord {
        const record = this.records.get(token);
        if (!record) {
            throw new GatewayError('TokenNotFound', `Confirmation token '${token}' is unknown`);
        }
        if (record.state !== 'PREVIEWED') {
            throw new GatewayError('TokenNotFound', `Confirmation token '${token}' was already used`);
        }
        if (this.isExpired(record)) {
            this.records.delete(token);
            throw new GatewayError(
                'TokenExpired',
                `Confirmation token '${token}' expired at ${new Date(record.preview.expiresAt).toISOString()}`
            );
        }
        return record;
    }

    private isExpired(record: PreviewRecord): boolean {
        return this.now() > record.preview.expiresAt;
    }

    private uniqueToken(): string {
        let token = this.mintToken();
        while (this.records.has(token)) {
            token = this.mintToken();
        }
        return token;
    }
}
