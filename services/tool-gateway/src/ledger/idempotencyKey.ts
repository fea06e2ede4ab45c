import { createHash } from 'crypto';
import { canonicalJson } from '../util/canonicalJson';

export interface IdempotencySource {
    tool: string;
    args: unknown;
    /** Caller-supplied idempotency key; takes precedence over the token. */
    clientKey?: string;
    confirmationToken?: string;
}

/**
 * Stable ledger key for one logical write. Identical tool, arguments and
 * caller key always map to the same entry.
 */
export const deriveIdempotencyKey = (source: IdempotencySource): string => {
    const discriminator = source.clientKey !== undefined
        ? `client:${source.clientKey}`
        : source.confirmationToken !== undefined
            ? `token:${source.confirmationToken}`
            : 'none';

    const digest = createHash('sha256')
        .update(canonicalJson({ tool: source.tool, args: source.args, discriminator }))
        .digest('hex');

    return `${source.tool}:${digest}`;
};
