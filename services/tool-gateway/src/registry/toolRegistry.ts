import { GatewayError } from '../errors';
import { Role } from '../roles/roleContext';
import { TOOL_DEFINITIONS } from './definitions';
import { ToolDefinition, ToolDescriptor } from './types';

/**
 * Immutable name → definition map built once at start-up. Lookups never
 * mutate it, so any number of concurrent requests may share one instance.
 */
export class ToolRegistry {
    private readonly definitions: ReadonlyMap<string, ToolDefinition>;

    constructor(definitions: readonly ToolDefinition[] = TOOL_DEFINITIONS) {
        const byName = new Map<string, ToolDefinition>();
        for (const definition of definitions) {
            if (byName.has(definition.name)) {
                throw new Error(`Duplicate tool definition: ${definition.name}`);
            }
            byName.set(definition.name, definition);
        }
        this.definitions = byName;
    }

    lookup(name: string): ToolDefinition {
        const definition = this.definitions.get(name);
        if (!definition) {
            throw new GatewayError('UnknownTool', `Unknown tool '${name}'`);
        }
        return definition;
    }

    authorize(definition: ToolDefinition, role: Role): void {
        if (!definition.allowedRoles.includes(role)) {
            throw new GatewayError(
                'PermissionDenied',
                `Role '${role}' may not call ${definition.name}; allowed roles: ${definition.allowedRoles.join(', ')}`
            );
        }
    }

    list(): ToolDescriptor[] {
        return [...this.definitions.values()].map((definition) => ({
            name: definition.name,
            description: definition.description,
            classification: definition.classification,
            allowed_roles: definition.allowedRoles,
            input_schema: definition.inputSchema
        }));
    }
}
