import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { GatewayError } from '../errors';
import { RetailBackendClient, RetailBackendOptions, reservationIdFor } from './RetailBackendClient';

type Reply = (config: InternalAxiosRequestConfig) => AxiosResponse | Promise<AxiosResponse>;

const ok = (config: InternalAxiosRequestConfig, data: unknown): AxiosResponse => ({
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config
});

const httpError = (config: InternalAxiosRequestConfig, status: number, data: unknown): never => {
    const response: AxiosResponse = { data, status, statusText: 'Error', headers: {}, config };
    throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
};

const networkError = (config: InternalAxiosRequestConfig, code: string): never => {
    throw new AxiosError(`network failure ${code}`, code, config);
};

const reservationBody = {
    status: 'reserved',
    store_id: 'ST002',
    sku: 'AST-LIN-BLZ-SND-M',
    qty: 1,
    on_hand: 4,
    reserved: 2,
    last_updated: '2026-01-05T10:00:00.250000+00:00'
};

const transferBody = {
    status: 'created',
    transfer_id: 17,
    from_store: 'ST001',
    to_store: 'ST004',
    sku: 'SKU-1',
    qty: 6,
    inbound_status: 'inbound_pending',
    expected_date: '2026-01-07'
};

const clients: RetailBackendClient[] = [];

const makeClientWith = (overrides: Partial<RetailBackendOptions>, ...replies: Reply[]) => {
    const calls: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
        adapter: async (config) => {
            calls.push(config);
            const reply = replies[Math.min(calls.length - 1, replies.length - 1)];
            return reply(config);
        }
    });
    const options: RetailBackendOptions = {
        baseUrl: 'http://backend.test',
        readTimeoutMs: 200,
        writeTimeoutMs: 800,
        maxRetries: 2,
        retryBaseDelayMs: 1,
        http,
        ...overrides
    };
    const client = new RetailBackendClient(options);
    clients.push(client);
    return { client, calls };
};

const makeClient = (...replies: Reply[]) => makeClientWith({}, ...replies);

const failureOf = async (promise: Promise<unknown>): Promise<GatewayError> => {
    try {
        await promise;
    } catch (error) {
        if (error instanceof GatewayError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected the call to fail');
};

const writeContext = { role: 'associate' as const, idempotencyKey: 'reserve_item:abc' };
const reservation = { sku: 'AST-LIN-BLZ-SND-M', store: 'ST002', qty: 1 };

describe('RetailBackendClient', () => {
    afterEach(() => {
        clients.splice(0).forEach((client) => client.close());
    });

    it('looks up inventory and maps the wire format', async () => {
        const { client, calls } = makeClient((config) => ok(config, {
            sku: 'SKU-1',
            query_store_id: 'ST001',
            radius_miles: 10,
            stores: [{
                store_id: 'ST001',
                store_name: 'Downtown',
                city: 'Austin',
                state: 'TX',
                distance_miles: 0,
                on_hand: 5,
                reserved: 1,
                available: 4,
                last_updated: '2026-01-05T09:00:00Z'
            }]
        }));

        const result = await client.lookupInventory({ sku: 'SKU-1', store: 'ST001', radius: 10 }, { role: 'merch' });

        expect(result).toEqual({
            sku: 'SKU-1',
            store: 'ST001',
            radius: 10,
            stores: [{
                storeId: 'ST001',
                storeName: 'Downtown',
                city: 'Austin',
                state: 'TX',
                distanceMiles: 0,
                onHand: 5,
                reserved: 1,
                available: 4,
                lastUpdated: '2026-01-05T09:00:00Z'
            }]
        });
        expect(calls[0].url).toBe('/inventory/lookup');
        expect(calls[0].params).toEqual({ sku: 'SKU-1', store_id: 'ST001', radius_miles: 10 });
        expect(calls[0].headers.get('X-DEMO-ROLE')).toBe('merch');
        expect(calls[0].timeout).toBe(200);
    });

    it('sends reservations with role and idempotency headers', async () => {
        const { client, calls } = makeClient((config) => ok(config, reservationBody));

        const result = await client.reserveItem(reservation, writeContext);

        expect(result).toEqual({
            id: reservationIdFor('reserve_item:abc'),
            sku: 'AST-LIN-BLZ-SND-M',
            store: 'ST002',
            qty: 1,
            status: 'reserved',
            onHand: 4,
            reserved: 2,
            reservedAt: '2026-01-05T10:00:00.250000+00:00'
        });
        expect(result.id).toMatch(/^RSV-[0-9A-F]{12}$/);
        expect(calls[0].method).toBe('post');
        expect(calls[0].url).toBe('/reserve');
        expect(calls[0].headers.get('X-DEMO-ROLE')).toBe('associate');
        expect(calls[0].headers.get('Idempotency-Key')).toBe('reserve_item:abc');
        expect(JSON.parse(String(calls[0].data))).toEqual({ sku: 'AST-LIN-BLZ-SND-M', store_id: 'ST002', qty: 1, confirm: true });
        expect(calls[0].timeout).toBe(800);
    });

    it('derives the same reservation id for the same idempotency key', () => {
        expect(reservationIdFor('reserve_item:abc')).toBe(reservationIdFor('reserve_item:abc'));
        expect(reservationIdFor('reserve_item:abc')).not.toBe(reservationIdFor('reserve_item:abd'));
    });

    it('keeps a reservation id issued by the backend', async () => {
        const { client } = makeClient((config) => ok(config, { ...reservationBody, reservation_id: 123 }));

        await expect(client.reserveItem(reservation, writeContext)).resolves.toMatchObject({ id: '123', status: 'reserved' });
    });

    it('sends the role in a configurable header', async () => {
        const { client, calls } = makeClientWith({ roleHeader: 'X-Store-Role' }, (config) => ok(config, reservationBody));

        await client.reserveItem(reservation, writeContext);

        expect(calls[0].headers.get('X-Store-Role')).toBe('associate');
        expect(calls[0].headers.get('X-DEMO-ROLE')).toBeUndefined();
    });

    it('stamps transfers with the completion time', async () => {
        const transfers = makeClientWith({ now: () => new Date('2026-01-05T11:00:00Z') }, (config) => ok(config, transferBody));
        const transfer = await transfers.client.createTransfer(
            { sku: 'SKU-1', source: 'ST001', destination: 'ST004', qty: 6, reason: 'size run' },
            { role: 'merch', idempotencyKey: 'create_transfer:abc' }
        );
        expect(transfer).toEqual({
            id: '17',
            source: 'ST001',
            destination: 'ST004',
            sku: 'SKU-1',
            qty: 6,
            status: 'created',
            inboundStatus: 'inbound_pending',
            expectedDate: '2026-01-07',
            createdAt: '2026-01-05T11:00:00.000Z'
        });
        expect(transfers.calls[0].url).toBe('/transfer');
    });

    it('maps tickets', async () => {
        const tickets = makeClient((config) => ok(config, {
            ticket_id: 'TCKT0042',
            status: 'open',
            category: 'pos',
            severity: 'high',
            store_id: 'ST003',
            opened_date: '2026-01-05'
        }));
        const ticket = await tickets.client.createTicket(
            { category: 'pos', severity: 'high', store: 'ST003', description: 'Register offline' },
            { role: 'support', idempotencyKey: 'create_ticket:abc' }
        );
        expect(ticket).toEqual({ id: 'TCKT0042', category: 'pos', severity: 'high', store: 'ST003', status: 'open', openedAt: '2026-01-05' });
        expect(tickets.calls[0].url).toBe('/tickets');
    });

    it('surfaces 4xx responses as BackendRejected with the backend detail', async () => {
        const { client, calls } = makeClient((config) => httpError(config, 409, { detail: 'Insufficient available stock' }));

        const error = await failureOf(client.reserveItem(reservation, writeContext));

        expect(error.kind).toBe('BackendRejected');
        expect(error.message).toBe('reserveItem rejected by backend (409): Insufficient available stock');
        expect(error.fallbackAction).toBe('Run inventory_lookup for AST-LIN-BLZ-SND-M to find an alternate store with available stock.');
        expect(error.outcome).toBe('rejected');
        expect(calls).toHaveLength(1);
    });

    it('asks for a store when a lookup without one is rejected', async () => {
        const { client } = makeClient((config) => httpError(config, 422, { detail: [{ loc: ['query', 'store_id'], msg: 'Field required' }] }));

        const error = await failureOf(client.lookupInventory({ sku: 'SKU-1', radius: 25 }, { role: 'associate' }));

        expect(error.kind).toBe('BackendRejected');
        expect(error.fallbackAction).toBe('Provide a store to search around, then look up SKU-1 again.');
    });

    it('retries reads that never reached the backend', async () => {
        const { client, calls } = makeClient(
            (config) => networkError(config, 'ECONNREFUSED'),
            (config) => ok(config, { sku: 'SKU-1', radius_miles: 25, stores: [] })
        );

        const result = await client.lookupInventory({ sku: 'SKU-1', radius: 25 }, { role: 'associate' });

        expect(result.stores).toEqual([]);
        expect(calls).toHaveLength(2);
    });

    it('gives up on reads after the retry budget', async () => {
        const { client, calls } = makeClient((config) => networkError(config, 'ECONNABORTED'));

        const error = await failureOf(client.lookupInventory({ sku: 'SKU-1', radius: 25 }, { role: 'associate' }));

        expect(error.kind).toBe('BackendTimeout');
        expect(error.message).toBe('lookupInventory timed out after 200ms');
        expect(calls).toHaveLength(3);
    });

    it('retries writes only when the request was never sent', async () => {
        const { client, calls } = makeClient(
            (config) => networkError(config, 'ENOTFOUND'),
            (config) => ok(config, reservationBody)
        );

        await expect(client.reserveItem(reservation, writeContext)).resolves.toMatchObject({ status: 'reserved', onHand: 4 });
        expect(calls).toHaveLength(2);
    });

    it('reports a write timeout as ambiguous without resending', async () => {
        const { client, calls } = makeClient((config) => networkError(config, 'ECONNABORTED'));

        const error = await failureOf(client.reserveItem(reservation, writeContext));

        expect(error.kind).toBe('BackendAmbiguous');
        expect(error.outcome).toBe('unknown');
        expect(error.message).toBe('Outcome of reserveItem is unknown after a 800ms timeout; do not resend');
        expect(calls).toHaveLength(1);
    });

    it('reports a 5xx on a write as ambiguous', async () => {
        const { client, calls } = makeClient((config) => httpError(config, 502, 'Bad Gateway'));

        const error = await failureOf(client.reserveItem(reservation, writeContext));

        expect(error.kind).toBe('BackendAmbiguous');
        expect(calls).toHaveLength(1);
    });

    it('reports a 5xx on a read as unavailable after retrying', async () => {
        const { client, calls } = makeClient((config) => httpError(config, 503, { detail: 'maintenance' }));

        const error = await failureOf(client.lookupInventory({ sku: 'SKU-1', radius: 25 }, { role: 'associate' }));

        expect(error.kind).toBe('BackendUnavailable');
        expect(error.message).toBe('lookupInventory failed with HTTP 503');
        expect(calls).toHaveLength(3);
    });

    it('treats a malformed write response as ambiguous', async () => {
        const { client } = makeClient((config) => ok(config, { reservation_id: 1 }));

        const error = await failureOf(client.reserveItem(reservation, writeContext));

        expect(error.kind).toBe('BackendAmbiguous');
        expect(error.message).toMatch(/^Outcome of reserveItem is unknown: unexpected response/);
    });

    it('fails fast once the circuit opens', async () => {
        const calls: InternalAxiosRequestConfig[] = [];
        const http = axios.create({
            adapter: async (config) => {
                calls.push(config);
                return networkError(config, 'ECONNREFUSED');
            }
        });
        const client = new RetailBackendClient({
            baseUrl: 'http://backend.test',
            readTimeoutMs: 200,
            writeTimeoutMs: 800,
            maxRetries: 2,
            retryBaseDelayMs: 1,
            http,
            breaker: { volumeThreshold: 1, errorThresholdPercentage: 50, resetTimeoutMs: 60_000 }
        });
        clients.push(client);

        const error = await failureOf(client.lookupInventory({ sku: 'SKU-1', radius: 25 }, { role: 'associate' }));

        expect(error.kind).toBe('BackendUnavailable');
        expect(error.message).toBe('Retail backend circuit is open');
        expect(calls).toHaveLength(1);
    });
});
