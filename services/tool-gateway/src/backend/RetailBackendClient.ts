import { createHash } from 'crypto';
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import CircuitBreaker from 'opossum';
import { ValidateFunction } from 'ajv';
import { logger } from '@retailops/service-template';
import { GatewayError, describeError } from '../errors';
import { formatErrors } from '../validation';
import {
    BackendCallContext,
    InventoryAvailability,
    InventoryQuery,
    Reservation,
    ReservationRequest,
    RetailBackend,
    Ticket,
    TicketRequest,
    Transfer,
    TransferRequest,
    WriteCallContext
} from './types';
import {
    StoreStockWire,
    validateInventoryLookup,
    validateReservation,
    validateTicket,
    validateTransfer
} from './wire';

export interface RetailBackendOptions {
    baseUrl: string;
    readTimeoutMs: number;
    writeTimeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    /** Header the backend reads the caller's role from. */
    roleHeader?: string;
    /** Transport override; defaults to a fresh axios instance. */
    http?: AxiosInstance;
    now?: () => Date;
    breaker?: {
        errorThresholdPercentage?: number;
        resetTimeoutMs?: number;
        volumeThreshold?: number;
    };
}

type OperationKind = 'read' | 'write';

interface Operation<T> {
    name: string;
    kind: OperationKind;
    request: AxiosRequestConfig;
    validate: ValidateFunction<T>;
    rejectionFallback: string;
}

interface Classified {
    error: GatewayError;
    retryable: boolean;
}

// The request never left this process or never reached the backend.
const NEVER_SENT_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const OPEN_BREAKER_CODE = 'EOPENBREAKER';

export const DEFAULT_BACKEND_ROLE_HEADER = 'X-DEMO-ROLE';
export const IDEMPOTENCY_HEADER = 'Idempotency-Key';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const errorCode = (error: unknown): string | undefined => {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
};

const isRejection = (error: unknown): boolean => {
    if (!axios.isAxiosError(error) || !error.response) {
        return false;
    }
    return error.response.status >= 400 && error.response.status < 500;
};

const backendDetail = (response: AxiosResponse): string => {
    const data: unknown = response.data;
    if (typeof data === 'object' && data !== null && 'detail' in data && typeof data.detail === 'string') {
        return data.detail;
    }
    if (typeof data === 'string' && data.length > 0) {
        return data;
    }
    return response.statusText || `HTTP ${response.status}`;
};

/** Stable reservation id for backends that do not issue one, so replays report the same id. */
export const reservationIdFor = (idempotencyKey: string): string =>
    `RSV-${createHash('sha256').update(idempotencyKey).digest('hex').slice(0, 12).toUpperCase()}`;

const toStoreStock = (row: StoreStockWire) => ({
    storeId: row.store_id,
    storeName: row.store_name,
    city: row.city,
    state: row.state,
    distanceMiles: row.distance_miles,
    onHand: row.on_hand,
    reserved: row.reserved,
    available: row.available,
    lastUpdated: row.last_updated
});

export class RetailBackendClient implements RetailBackend {
    private readonly http: AxiosInstance;
    private readonly roleHeader: string;
    private readonly now: () => Date;
    private readonly breaker: CircuitBreaker<[AxiosRequestConfig], AxiosResponse<unknown>>;

    constructor(private readonly options: RetailBackendOptions) {
        this.http = options.http || axios.create();
        this.roleHeader = options.roleHeader || DEFAULT_BACKEND_ROLE_HEADER;
        this.now = options.now || (() => new Date());
        this.breaker = new CircuitBreaker((config: AxiosRequestConfig) => this.http.request<unknown>(config), {
            timeout: false,
            errorThresholdPercentage: options.breaker?.errorThresholdPercentage ?? 50,
            resetTimeout: options.breaker?.resetTimeoutMs ?? 5000,
            volumeThreshold: options.breaker?.volumeThreshold ?? 10,
            // 4xx answers mean the backend is healthy
            errorFilter: (error: unknown) => isRejection(error)
        });

        this.breaker.on('open', () => logger.warn('Retail backend circuit opened'));
        this.breaker.on('close', () => logger.info('Retail backend circuit closed'));
    }

    async lookupInventory(query: InventoryQuery, context: BackendCallContext): Promise<InventoryAvailability> {
        const data = await this.send({
            name: 'lookupInventory',
            kind: 'read',
            request: {
                method: 'GET',
                url: '/inventory/lookup',
                params: { sku: query.sku, store_id: query.store, radius_miles: query.radius },
                headers: { [this.roleHeader]: context.role }
            },
            validate: validateInventoryLookup,
            rejectionFallback: query.store
                ? `Check that SKU ${query.sku} and store ${query.store} exist, then search again.`
                : `Provide a store to search around, then look up ${query.sku} again.`
        });

        return {
            sku: data.sku,
            store: query.store,
            radius: data.radius_miles,
            stores: data.stores.map(toStoreStock)
        };
    }

    async reserveItem(request: ReservationRequest, context: WriteCallContext): Promise<Reservation> {
        const data = await this.send({
            name: 'reserveItem',
            kind: 'write',
            request: {
                method: 'POST',
                url: '/reserve',
                data: { sku: request.sku, store_id: request.store, qty: request.qty, confirm: true },
                headers: this.writeHeaders(context)
            },
            validate: validateReservation,
            rejectionFallback: `Run inventory_lookup for ${request.sku} to find an alternate store with available stock.`
        });

        return {
            id: data.reservation_id === undefined ? reservationIdFor(context.idempotencyKey) : String(data.reservation_id),
            sku: data.sku,
            store: data.store_id,
            qty: data.qty,
            status: data.status,
            onHand: data.on_hand,
            reserved: data.reserved,
            reservedAt: data.last_updated
        };
    }

    async createTransfer(request: TransferRequest, context: WriteCallContext): Promise<Transfer> {
        const data = await this.send({
            name: 'createTransfer',
            kind: 'write',
            request: {
                method: 'POST',
                url: '/transfer',
                data: {
                    from_store: request.source,
                    to_store: request.destination,
                    sku: request.sku,
                    qty: request.qty,
                    reason: request.reason,
                    confirm: true
                },
                headers: this.writeHeaders(context)
            },
            validate: validateTransfer,
            rejectionFallback: `Run inventory_lookup for ${request.sku} to pick a source store with enough on-hand stock.`
        });

        return {
            id: String(data.transfer_id),
            source: data.from_store,
            destination: data.to_store,
            sku: data.sku,
            qty: data.qty,
            status: data.status,
            inboundStatus: data.inbound_status,
            expectedDate: data.expected_date,
            createdAt: data.created_at ?? this.now().toISOString()
        };
    }

    async createTicket(request: TicketRequest, context: WriteCallContext): Promise<Ticket> {
        const data = await this.send({
            name: 'createTicket',
            kind: 'write',
            request: {
                method: 'POST',
                url: '/tickets',
                data: {
                    store_id: request.store,
                    category: request.category,
                    severity: request.severity,
                    description: request.description
                },
                headers: this.writeHeaders(context)
            },
            validate: validateTicket,
            rejectionFallback: `Check that store ${request.store} exists and resubmit the ticket.`
        });

        return {
            id: data.ticket_id,
            category: data.category,
            severity: data.severity,
            store: data.store_id,
            status: data.status,
            openedAt: data.opened_date
        };
    }

    close(): void {
        this.breaker.shutdown();
    }

    private writeHeaders(context: WriteCallContext): Record<string, string> {
        return {
            [this.roleHeader]: context.role,
            [IDEMPOTENCY_HEADER]: context.idempotencyKey
        };
    }

    private async send<T>(operation: Operation<T>): Promise<T> {
        const timeout = operation.kind === 'read' ? this.options.readTimeoutMs : this.options.writeTimeoutMs;

        for (let attempt = 1; ; attempt += 1) {
            let response: AxiosResponse<unknown>;
            try {
                response = await this.breaker.fire({ ...operation.request, baseURL: this.options.baseUrl, timeout });
            } catch (error) {
                const classified = this.classify(error, operation, timeout);
                if (classified.retryable && attempt <= this.options.maxRetries) {
                    const delayMs = this.options.retryBaseDelayMs * 2 ** (attempt - 1);
                    logger.warn('backend_retry_delay', {
                        operation: operation.name,
                        attempt,
                        delay_ms: delayMs,
                        error_kind: classified.error.kind
                    });
                    await sleep(delayMs);
                    continue;
                }
                logger.error('backend_call_failed', {
                    operation: operation.name,
                    attempt,
                    error_kind: classified.error.kind,
                    error: classified.error.message
                });
                throw classified.error;
            }

            const data: unknown = response.data;
            if (!operation.validate(data)) {
                const reason = formatErrors(operation.validate.errors);
                if (operation.kind === 'write') {
                    throw new GatewayError('BackendAmbiguous', `Outcome of ${operation.name} is unknown: unexpected response (${reason})`);
                }
                throw new GatewayError('BackendUnavailable', `${operation.name} returned an unexpected response (${reason})`);
            }
            return data;
        }
    }

    private classify<T>(error: unknown, operation: Operation<T>, timeoutMs: number): Classified {
        const isWrite = operation.kind === 'write';
        const ambiguous = (reason: string): Classified => ({
            error: new GatewayError('BackendAmbiguous', `Outcome of ${operation.name} is unknown after ${reason}; do not resend`),
            retryable: false
        });

        if (error instanceof GatewayError) {
            return { error, retryable: false };
        }

        if (axios.isAxiosError(error)) {
            if (error.response) {
                const status = error.response.status;
                if (status >= 400 && status < 500) {
                    return {
                        error: new GatewayError('BackendRejected', `${operation.name} rejected by backend (${status}): ${backendDetail(error.response)}`, {
                            fallbackAction: operation.rejectionFallback,
                            details: { upstream_status: status }
                        }),
                        retryable: false
                    };
                }
                if (isWrite) {
                    return ambiguous(`HTTP ${status}`);
                }
                return { error: new GatewayError('BackendUnavailable', `${operation.name} failed with HTTP ${status}`), retryable: true };
            }

            const code = error.code;
            if (code !== undefined && NEVER_SENT_CODES.has(code)) {
                return { error: new GatewayError('BackendUnavailable', `Retail backend is unreachable (${code})`), retryable: true };
            }
            if (code !== undefined && TIMEOUT_CODES.has(code)) {
                if (isWrite) {
                    return ambiguous(`a ${timeoutMs}ms timeout`);
                }
                return { error: new GatewayError('BackendTimeout', `${operation.name} timed out after ${timeoutMs}ms`), retryable: true };
            }
            if (isWrite) {
                return ambiguous(code || error.message);
            }
            return { error: new GatewayError('BackendUnavailable', `${operation.name} failed: ${error.message}`), retryable: true };
        }

        if (errorCode(error) === OPEN_BREAKER_CODE) {
            return { error: new GatewayError('BackendUnavailable', 'Retail backend circuit is open'), retryable: false };
        }

        if (isWrite) {
            return ambiguous(describeError(error));
        }
        return { error: new GatewayError('BackendUnavailable', `${operation.name} failed: ${describeError(error)}`), retryable: false };
    }
}
