import { Schema } from 'ajv';
import { GatewayError } from '../errors';
import { Role, ROLES } from '../roles/roleContext';
import { compileSchema, formatErrors, Sensitivity } from '../validation';
import { TicketSeverity } from '../backend/types';
import {
    BoundRead,
    BoundWrite,
    ReadContext,
    ReadToolDefinition,
    ToolDefinition,
    ToolName,
    ToolServices,
    WriteContext,
    WriteReceipt,
    WriteToolDefinition
} from './types';

export const MIN_QTY = 1;
export const MAX_QTY = 20;

type SearchArgs = { query: string; limit: number };
type FetchArgs = { id: string };
type InventoryLookupArgs = { sku: string; store?: string; radius: number };
type ReserveItemArgs = { sku: string; store: string; qty: number };
type CreateTransferArgs = { sku: string; source: string; destination: string; qty: number; reason: string };
type CreateTicketArgs = { category: string; severity: TicketSeverity; store: string; description: string };

interface ToolSpec<TArgs> {
    name: ToolName;
    description: string;
    allowedRoles: readonly Role[];
    schema: Schema;
    sensitivity?: Sensitivity;
    /** Cross-field rules the schema cannot express. */
    check?(args: TArgs): void;
}

interface ReadSpec<TArgs> extends ToolSpec<TArgs> {
    run(args: TArgs, services: ToolServices, context: ReadContext): Promise<unknown>;
}

interface WriteSpec<TArgs> extends ToolSpec<TArgs> {
    summarize(args: TArgs, role: Role): string;
    run(args: TArgs, services: ToolServices, context: WriteContext): Promise<WriteReceipt>;
}

const validator = <TArgs extends Record<string, unknown>>(spec: ToolSpec<TArgs>) => {
    const validate = compileSchema<TArgs>(spec.schema);
    return (raw: unknown): TArgs => {
        // Defaults are written into the value; never touch the caller's copy
        const candidate: unknown = structuredClone(raw ?? {});
        if (!validate(candidate)) {
            throw new GatewayError('InvalidArguments', `Invalid arguments for ${spec.name}: ${formatErrors(validate.errors)}`);
        }
        if (spec.check) {
            spec.check(candidate);
        }
        return candidate;
    };
};

const defineReadTool = <TArgs extends Record<string, unknown>>(spec: ReadSpec<TArgs>): ReadToolDefinition => {
    const validate = validator(spec);
    return {
        name: spec.name,
        description: spec.description,
        classification: 'READ',
        allowedRoles: spec.allowedRoles,
        inputSchema: spec.schema,
        sensitivity: spec.sensitivity || 'low',
        bind(raw: unknown): BoundRead {
            const args = validate(raw);
            return {
                tool: spec.name,
                args,
                execute: (services, context) => spec.run(args, services, context)
            };
        }
    };
};

const defineWriteTool = <TArgs extends Record<string, unknown>>(spec: WriteSpec<TArgs>): WriteToolDefinition => {
    const validate = validator(spec);
    return {
        name: spec.name,
        description: spec.description,
        classification: 'WRITE',
        allowedRoles: spec.allowedRoles,
        inputSchema: spec.schema,
        sensitivity: spec.sensitivity || 'low',
        bind(raw: unknown): BoundWrite {
            const args = validate(raw);
            return {
                tool: spec.name,
                args,
                summarize: (role) => spec.summarize(args, role),
                execute: (services, context) => spec.run(args, services, context)
            };
        }
    };
};

const units = (qty: number): string => (qty === 1 ? '1 unit' : `${qty} units`);

const excerpt = (text: string, max = 80): string => {
    const flat = text.replace(/\s+/g, ' ').trim();
    return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
};

const identifier = { type: 'string', minLength: 1, maxLength: 64, pattern: '\\S' } as const;
const quantity = { type: 'integer', minimum: MIN_QTY, maximum: MAX_QTY } as const;

const search = defineReadTool<SearchArgs>({
    name: 'search',
    description: 'Search store policies, playbooks and runbooks. Returns section ids usable with fetch.',
    allowedRoles: ROLES,
    schema: {
        type: 'object',
        properties: {
            query: { type: 'string', maxLength: 500 },
            limit: { type: 'integer', minimum: 1, maximum: 20, default: 5 }
        },
        required: ['query', 'limit'],
        additionalProperties: false
    },
    run: async (args, services) => ({ results: await services.documents.search(args.query, args.limit) })
});

const fetchTool = defineReadTool<FetchArgs>({
    name: 'fetch',
    description: 'Fetch the full text of a knowledge section by id.',
    allowedRoles: ROLES,
    schema: {
        type: 'object',
        properties: {
            id: { type: 'string', minLength: 1 }
        },
        required: ['id'],
        additionalProperties: false
    },
    run: (args, services) => services.documents.fetch(args.id)
});

const inventoryLookup = defineReadTool<InventoryLookupArgs>({
    name: 'inventory_lookup',
    description: 'Look up on-hand and available stock for a SKU at nearby stores.',
    allowedRoles: ROLES,
    schema: {
        type: 'object',
        properties: {
            sku: identifier,
            store: identifier,
            radius: { type: 'number', exclusiveMinimum: 0, maximum: 500, default: 25 }
        },
        required: ['sku', 'radius'],
        additionalProperties: false
    },
    run: (args, services, context) =>
        services.backend.lookupInventory({ sku: args.sku, store: args.store, radius: args.radius }, { role: context.role })
});

const reserveItem = defineWriteTool<ReserveItemArgs>({
    name: 'reserve_item',
    description: 'Place a customer hold on units of a SKU at a store. Requires preview and confirmation.',
    allowedRoles: ['associate'],
    schema: {
        type: 'object',
        properties: {
            sku: identifier,
            store: identifier,
            qty: quantity
        },
        required: ['sku', 'store', 'qty'],
        additionalProperties: false
    },
    summarize: (args) => `Reserve ${units(args.qty)} of ${args.sku} at store ${args.store}.`,
    run: async (args, services, context) => {
        const reservation = await services.backend.reserveItem(
            { sku: args.sku, store: args.store, qty: args.qty },
            { role: context.role, idempotencyKey: context.idempotencyKey }
        );
        return {
            status: 'reserved',
            id: reservation.id,
            timestamp: reservation.reservedAt,
            record: { ...reservation }
        };
    }
});

const createTransfer = defineWriteTool<CreateTransferArgs>({
    name: 'create_transfer',
    description: 'Request a stock transfer between two stores. Requires preview and confirmation.',
    allowedRoles: ['merch'],
    schema: {
        type: 'object',
        properties: {
            sku: identifier,
            source: identifier,
            destination: identifier,
            qty: quantity,
            reason: { type: 'string', minLength: 1, maxLength: 500, pattern: '\\S' }
        },
        required: ['sku', 'source', 'destination', 'qty', 'reason'],
        additionalProperties: false
    },
    check: (args) => {
        if (args.source === args.destination) {
            throw new GatewayError('InvalidArguments', `Invalid arguments for create_transfer: source and destination are both ${args.source}`);
        }
    },
    summarize: (args) =>
        `Transfer ${units(args.qty)} of ${args.sku} from store ${args.source} to store ${args.destination} (reason: ${args.reason}).`,
    run: async (args, services, context) => {
        const transfer = await services.backend.createTransfer(
            { sku: args.sku, source: args.source, destination: args.destination, qty: args.qty, reason: args.reason },
            { role: context.role, idempotencyKey: context.idempotencyKey }
        );
        return {
            status: 'created',
            id: transfer.id,
            timestamp: transfer.createdAt,
            record: { ...transfer }
        };
    }
});

const createTicket = defineWriteTool<CreateTicketArgs>({
    name: 'create_ticket',
    description: 'Open a support ticket for a store. Requires preview and confirmation.',
    allowedRoles: ['support'],
    sensitivity: 'high',
    schema: {
        type: 'object',
        properties: {
            category: { type: 'string', minLength: 1, maxLength: 64, pattern: '\\S' },
            severity: { type: 'string', enum: ['low', 'medium', 'high'] },
            store: identifier,
            description: { type: 'string', minLength: 1, maxLength: 2000, pattern: '\\S' }
        },
        required: ['category', 'severity', 'store', 'description'],
        additionalProperties: false
    },
    summarize: (args) =>
        `Open a ${args.severity}-severity ${args.category} ticket for store ${args.store}: "${excerpt(args.description)}"`,
    run: async (args, services, context) => {
        const ticket = await services.backend.createTicket(
            { category: args.category, severity: args.severity, store: args.store, description: args.description },
            { role: context.role, idempotencyKey: context.idempotencyKey }
        );
        return {
            status: 'created',
            id: ticket.id,
            timestamp: ticket.openedAt,
            record: { ...ticket }
        };
    }
});

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
    search,
    fetchTool,
    inventoryLookup,
    reserveItem,
    createTransfer,
    createTicket
];
