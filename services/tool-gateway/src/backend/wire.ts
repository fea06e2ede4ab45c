import { compileSchema } from '../validation';

// Response bodies of the retail backend's REST API.

export interface StoreStockWire {
    store_id: string;
    store_name: string;
    city: string;
    state: string;
    distance_miles: number;
    on_hand: number;
    reserved: number;
    available: number;
    last_updated: string;
}

export interface InventoryLookupWire {
    sku: string;
    query_store_id?: string;
    radius_miles: number;
    stores: StoreStockWire[];
}

// The backend answers with the updated stock row; it has no reservation id yet.
export interface ReservationWire {
    reservation_id?: string | number;
    status: string;
    sku: string;
    store_id: string;
    qty: number;
    on_hand: number;
    reserved: number;
    last_updated: string;
}

export interface TransferWire {
    transfer_id: string | number;
    status: string;
    from_store: string;
    to_store: string;
    sku: string;
    qty: number;
    inbound_status: string;
    expected_date: string;
    created_at?: string;
}

export interface TicketWire {
    ticket_id: string;
    status: string;
    category: string;
    severity: string;
    store_id: string;
    opened_date: string;
}

const identifier = { type: ['string', 'integer'] };

export const validateInventoryLookup = compileSchema<InventoryLookupWire>({
    type: 'object',
    properties: {
        sku: { type: 'string' },
        query_store_id: { type: 'string' },
        radius_miles: { type: 'number' },
        stores: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    store_id: { type: 'string' },
                    store_name: { type: 'string' },
                    city: { type: 'string' },
                    state: { type: 'string' },
                    distance_miles: { type: 'number' },
                    on_hand: { type: 'integer' },
                    reserved: { type: 'integer' },
                    available: { type: 'integer' },
                    last_updated: { type: 'string' }
                },
                required: ['store_id', 'store_name', 'city', 'state', 'distance_miles', 'on_hand', 'reserved', 'available', 'last_updated']
            }
        }
    },
    required: ['sku', 'radius_miles', 'stores']
});

export const validateReservation = compileSchema<ReservationWire>({
    type: 'object',
    properties: {
        reservation_id: identifier,
        status: { type: 'string' },
        sku: { type: 'string' },
        store_id: { type: 'string' },
        qty: { type: 'integer' },
        on_hand: { type: 'integer' },
        reserved: { type: 'integer' },
        last_updated: { type: 'string' }
    },
    required: ['status', 'sku', 'store_id', 'qty', 'on_hand', 'reserved', 'last_updated']
});

export const validateTransfer = compileSchema<TransferWire>({
    type: 'object',
    properties: {
        transfer_id: identifier,
        status: { type: 'string' },
        from_store: { type: 'string' },
        to_store: { type: 'string' },
        sku: { type: 'string' },
        qty: { type: 'integer' },
        inbound_status: { type: 'string' },
        expected_date: { type: 'string', format: 'date' },
        created_at: { type: 'string' }
    },
    required: ['transfer_id', 'status', 'from_store', 'to_store', 'sku', 'qty', 'inbound_status', 'expected_date']
});

export const validateTicket = compileSchema<TicketWire>({
    type: 'object',
    properties: {
        ticket_id: { type: 'string' },
        status: { type: 'string' },
        category: { type: 'string' },
        severity: { type: 'string' },
        store_id: { type: 'string' },
        opened_date: { type: 'string', format: 'date' }
    },
    required: ['ticket_id', 'status', 'category', 'severity', 'store_id', 'opened_date']
});
