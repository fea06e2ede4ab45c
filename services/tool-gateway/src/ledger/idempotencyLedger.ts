import { logger } from '@retailops/service-template';
import { ErrorKind, GatewayError } from '../errors';
import { startSweeper } from '../util/sweeper';

export type LedgerStatus = 'pending' | 'succeeded' | 'failed';

export interface LedgerFailure {
    kind: ErrorKind;
    message: string;
}

interface EntryBase {
    key: string;
    tool: string;
    createdAt: number;
    updatedAt: number;
}

export interface PendingEntry extends EntryBase {
    status: 'pending';
    /** Set when the backend call ended without a known outcome. */
    ambiguity?: LedgerFailure;
}

export interface SucceededEntry<T> extends EntryBase {
    status: 'succeeded';
    result: T;
    /** True when an operator recorded the result after manual review. */
    resolvedManually?: boolean;
}

export interface FailedEntry extends EntryBase {
    status: 'failed';
    error: LedgerFailure;
    resolvedManually?: boolean;
}

export type LedgerEntry<T> = PendingEntry | SucceededEntry<T> | FailedEntry;

export type BeginOutcome<T> =
    | { kind: 'proceed' }
    | { kind: 'pending'; entry: PendingEntry }
    | { kind: 'succeeded'; entry: SucceededEntry<T> };

export type ManualResolution<T> =
    | { status: 'succeeded'; result: T }
    | { status: 'failed'; message: string };

export interface LedgerOptions {
    retentionMs: number;
    now?: () => number;
}

type Waiter<T> = (entry: LedgerEntry<T>) => void;

/**
 * At-most-once bookkeeping for write executions, keyed by idempotency key.
 *
 * `begin` is synchronous, so on a single event loop two concurrent callers
 * with the same key can never both receive `proceed`.
 */
export class IdempotencyLedger<T> {
    private readonly entries = new Map<string, LedgerEntry<T>>();
    private readonly waiters = new Map<string, Set<Waiter<T>>>();
    // alias -> key of the entry it stands for
    private readonly aliases = new Map<string, string>();
    private readonly now: () => number;
    private stopSweeper?: () => void;

    constructor(private readonly options: LedgerOptions) {
        this.now = options.now || Date.now;
    }

    begin(key: string, tool: string): BeginOutcome<T> {
        const existing = this.peek(key);

        if (existing && existing.status === 'pending') {
            return { kind: 'pending', entry: existing };
        }
        if (existing && existing.status === 'succeeded') {
            return { kind: 'succeeded', entry: existing };
        }

        // Absent, or failed before anything reached the backend
        const timestamp = this.now();
        this.entries.set(key, { key, tool, status: 'pending', createdAt: timestamp, updatedAt: timestamp });
        return { kind: 'proceed' };
    }

    complete(key: string, result: T): SucceededEntry<T> {
        const entry = this.requirePending(key);
        const settled: SucceededEntry<T> = { ...this.base(entry), status: 'succeeded', result };
        this.settle(settled);
        return settled;
    }

    fail(key: string, error: LedgerFailure): FailedEntry {
        const entry = this.requirePending(key);
        const settled: FailedEntry = { ...this.base(entry), status: 'failed', error };
        this.settle(settled);
        return settled;
    }

    /**
     * Records that the backend may or may not have applied the write. The
     * entry stays pending until an operator resolves it, so later callers
     * are never handed `proceed` for this key.
     */
    markAmbiguous(key: string, ambiguity: LedgerFailure): PendingEntry {
        const entry = this.requirePending(key);
        const flagged: PendingEntry = { ...this.base(entry), status: 'pending', ambiguity };
        this.entries.set(key, flagged);
        logger.warn('Write outcome is ambiguous; awaiting manual review', { idempotency_key: key, tool: entry.tool });
        this.notify(flagged);
        return flagged;
    }

    /** Operator action for an ambiguous write after checking the backend by hand. */
    resolve(key: string, resolution: ManualResolution<T>): LedgerEntry<T> {
        const entry = this.peek(key);
        if (!entry) {
            throw new GatewayError('TokenNotFound', `No ledger entry for key '${key}'`, {
                fallbackAction: 'Check the idempotency key; the entry may have passed its retention window.'
            });
        }
        if (entry.status !== 'pending' || !entry.ambiguity) {
            throw new GatewayError('RequestMismatch', `Ledger entry '${key}' is ${entry.status} and not awaiting review`, {
                fallbackAction: 'Only pending entries flagged as ambiguous can be resolved manually.'
            });
        }

        const settled: LedgerEntry<T> = resolution.status === 'succeeded'
            ? { ...this.base(entry), status: 'succeeded', result: resolution.result, resolvedManually: true }
            : { ...this.base(entry), status: 'failed', error: { kind: 'BackendRejected', message: resolution.message }, resolvedManually: true };

        logger.info('Ledger entry resolved manually', { idempotency_key: key, status: settled.status });
        this.settle(settled);
        return settled;
    }

    /** Makes `alias` find the entry stored under `key` for as long as that entry is retained. */
    alias(alias: string, key: string): void {
        if (alias !== key) {
            this.aliases.set(alias, key);
        }
    }

    /** The entry under `key`, or under the key `key` is an alias of. */
    peek(key: string): LedgerEntry<T> | undefined {
        const target = this.aliases.get(key) ?? key;
        const entry = this.entries.get(target);
        if (entry && this.isStale(entry)) {
            this.entries.delete(target);
            this.aliases.delete(key);
            return undefined;
        }
        return entry;
    }

    /**
     * Resolves with the entry once it settles or is flagged ambiguous, or
     * with the current entry when `timeoutMs` elapses first.
     */
    waitFor(key: string, timeoutMs: number): Promise<LedgerEntry<T> | undefined> {
        const current = this.peek(key);
        if (!current || current.status !== 'pending' || current.ambiguity) {
            return Promise.resolve(current);
        }

        return new Promise((resolve) => {
            const listeners = this.waiters.get(key) || new Set<Waiter<T>>();
            this.waiters.set(key, listeners);

            const waiter: Waiter<T> = (entry) => {
                clearTimeout(timer);
                resolve(entry);
            };
            const timer = setTimeout(() => {
                listeners.delete(waiter);
                if (listeners.size === 0) {
                    this.waiters.delete(key);
                }
                resolve(this.peek(key));
            }, timeoutMs);

            listeners.add(waiter);
        });
    }

    /** Drops entries older than the retention window. Pending entries are kept. */
    sweep(): number {
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (this.isStale(entry)) {
                this.entries.delete(key);
                removed += 1;
            }
        }
        for (const [alias, key] of this.aliases) {
            if (!this.entries.has(key)) {
                this.aliases.delete(alias);
            }
        }
        return removed;
    }

    get size(): number {
        return this.entries.size;
    }

    start(intervalMs: number): void {
        this.stop();
        this.stopSweeper = startSweeper('ledger', this, intervalMs);
    }

    stop(): void {
        if (this.stopSweeper) {
            this.stopSweeper();
            this.stopSweeper = undefined;
        }
    }

    private isStale(entry: LedgerEntry<T>): boolean {
        // An in-flight or unreviewed write must stay visible until it settles
        if (entry.status === 'pending') {
            return false;
        }
        return this.now() - entry.updatedAt > this.options.retentionMs;
    }

    private base(entry: LedgerEntry<T>): EntryBase {
        return { key: entry.key, tool: entry.tool, createdAt: entry.createdAt, updatedAt: this.now() };
    }

    private requirePending(key: string): PendingEntry {
        const entry = this.entries.get(key);
        if (!entry || entry.status !== 'pending') {
            throw new GatewayError('Internal', `Ledger entry '${key}' is not pending`);
        }
        return entry;
    }

    private settle(entry: LedgerEntry<T>): void {
        this.entries.set(entry.key, entry);
        this.notify(entry);
    }

    private notify(entry: LedgerEntry<T>): void {
        const listeners = this.waiters.get(entry.key);
        if (!listeners) {
            return;
        }
        this.waiters.delete(entry.key);
        for (const listener of listeners) {
            listener(entry);
        }
    }
}
