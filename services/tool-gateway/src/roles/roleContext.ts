import { GatewayError } from '../errors';

export const ROLES = ['associate', 'merch', 'support'] as const;

export type Role = typeof ROLES[number];

export type RoleSource = 'header' | 'argument' | 'both';

/** The caller's role, resolved once per request and passed to every later check. */
export interface RoleContext {
    readonly role: Role;
    readonly source: RoleSource;
}

export interface RoleInput {
    header?: string | string[];
    arguments?: unknown;
}

export interface ExtractedRole {
    context: RoleContext;
    /** Tool arguments with any `role` field removed. */
    arguments: unknown;
}

export const parseRole = (raw: unknown): Role | undefined => {
    if (typeof raw !== 'string') {
        return undefined;
    }
    const normalized = raw.trim().toLowerCase();
    return ROLES.find((role) => role === normalized);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const splitRoleArgument = (args: unknown): { role: unknown; rest: unknown } => {
    if (!isRecord(args) || !('role' in args)) {
        return { role: undefined, rest: args };
    }
    const { role, ...rest } = args;
    return { role, rest };
};

const isPresent = (raw: unknown): boolean => raw !== undefined && raw !== null && raw !== '';

export const extractRoleContext = (input: RoleInput): ExtractedRole => {
    const headerRaw = Array.isArray(input.header) ? input.header[0] : input.header;
    const { role: argumentRaw, rest } = splitRoleArgument(input.arguments);

    const hasHeader = isPresent(headerRaw);
    const hasArgument = isPresent(argumentRaw);

    if (!hasHeader && !hasArgument) {
        throw new GatewayError('UnauthenticatedRole', 'No caller role was supplied');
    }

    const headerRole = hasHeader ? parseRole(headerRaw) : undefined;
    const argumentRole = hasArgument ? parseRole(argumentRaw) : undefined;

    if ((hasHeader && !headerRole) || (hasArgument && !argumentRole)) {
        throw new GatewayError('UnauthenticatedRole', `Unrecognized role '${String(hasHeader && !headerRole ? headerRaw : argumentRaw)}'`);
    }

    if (headerRole && argumentRole) {
        if (headerRole !== argumentRole) {
            throw new GatewayError('RoleMismatch', `Role header '${headerRole}' does not match role argument '${argumentRole}'`);
        }
        return { context: { role: headerRole, source: 'both' }, arguments: rest };
    }

    if (headerRole) {
        return { context: { role: headerRole, source: 'header' }, arguments: rest };
    }
    if (argumentRole) {
        return { context: { role: argumentRole, source: 'argument' }, arguments: rest };
    }

    throw new GatewayError('UnauthenticatedRole', 'No caller role was supplied');
};
