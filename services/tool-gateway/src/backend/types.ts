import { Role } from '../roles/roleContext';

export type TicketSeverity = 'low' | 'medium' | 'high';

export interface InventoryQuery {
    sku: string;
    store?: string;
    radius: number;
}

export interface ReservationRequest {
    sku: string;
    store: string;
    qty: number;
}

export interface TransferRequest {
    sku: string;
    source: string;
    destination: string;
    qty: number;
    reason: string;
}

export interface TicketRequest {
    category: string;
    severity: TicketSeverity;
    store: string;
    description: string;
}

export interface StoreStock {
    storeId: string;
    storeName: string;
    city: string;
    state: string;
    distanceMiles: number;
    onHand: number;
    reserved: number;
    available: number;
    lastUpdated: string;
}

export interface InventoryAvailability {
    sku: string;
    store?: string;
    radius: number;
    stores: StoreStock[];
}

export interface Reservation {
    id: string;
    sku: string;
    store: string;
    qty: number;
    status: string;
    /** Stock at the store after the hold. */
    onHand: number;
    reserved: number;
    reservedAt: string;
}

export interface Transfer {
    id: string;
    source: string;
    destination: string;
    sku: string;
    qty: number;
    status: string;
    inboundStatus: string;
    expectedDate: string;
    createdAt: string;
}

export interface Ticket {
    id: string;
    category: string;
    severity: string;
    store: string;
    status: string;
    openedAt: string;
}

export interface BackendCallContext {
    role: Role;
}

export interface WriteCallContext extends BackendCallContext {
    idempotencyKey: string;
}

/**
 * Proxy for the retail backend's inventory, reservation, transfer and
 * ticket endpoints. Failures are thrown as classified GatewayErrors.
 */
export interface RetailBackend {
    lookupInventory(query: InventoryQuery, context: BackendCallContext): Promise<InventoryAvailability>;
    reserveItem(request: ReservationRequest, context: WriteCallContext): Promise<Reservation>;
    createTransfer(request: TransferRequest, context: WriteCallContext): Promise<Transfer>;
    createTicket(request: TicketRequest, context: WriteCallContext): Promise<Ticket>;
}
