import { Schema } from 'ajv';
import { Role } from '../roles/roleContext';
import { Sensitivity } from '../validation';
import { RetailBackend } from '../backend/types';
import { DocumentIndex } from '../knowledge/documentIndex';

export type ToolName =
    | 'search'
    | 'fetch'
    | 'inventory_lookup'
    | 'reserve_item'
    | 'create_transfer'
    | 'create_ticket';

export type ToolClassification = 'READ' | 'WRITE';

/** Collaborators a tool may call when it executes. */
export interface ToolServices {
    backend: RetailBackend;
    documents: DocumentIndex;
}

export interface ReadContext {
    role: Role;
}

export interface WriteContext {
    role: Role;
    idempotencyKey: string;
}

/** What the backend reported after a write took effect. */
export interface WriteReceipt {
    status: 'reserved' | 'created';
    id: string;
    timestamp: string;
    record: Record<string, unknown>;
}

export interface BoundRead {
    readonly tool: ToolName;
    readonly args: Record<string, unknown>;
    execute(services: ToolServices, context: ReadContext): Promise<unknown>;
}

export interface BoundWrite {
    readonly tool: ToolName;
    readonly args: Record<string, unknown>;
    summarize(role: Role): string;
    execute(services: ToolServices, context: WriteContext): Promise<WriteReceipt>;
}

interface DefinitionBase {
    readonly name: ToolName;
    readonly description: string;
    readonly allowedRoles: readonly Role[];
    readonly inputSchema: Schema;
    readonly sensitivity: Sensitivity;
}

export interface ReadToolDefinition extends DefinitionBase {
    readonly classification: 'READ';
    /** Validates raw arguments, applying schema defaults. */
    bind(args: unknown): BoundRead;
}

export interface WriteToolDefinition extends DefinitionBase {
    readonly classification: 'WRITE';
    bind(args: unknown): BoundWrite;
}

export type ToolDefinition = ReadToolDefinition | WriteToolDefinition;

/** Discovery view returned by GET /tools. */
export interface ToolDescriptor {
    name: ToolName;
    description: string;
    classification: ToolClassification;
    allowed_roles: readonly Role[];
    input_schema: Schema;
}
