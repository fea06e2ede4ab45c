import { GatewayError } from '../errors';
import { IdempotencyLedger } from './idempotencyLedger';
import { deriveIdempotencyKey } from './idempotencyKey';

const RETENTION_MS = 60_000;

interface Receipt {
    id: string;
}

const setup = () => {
    let clock = 0;
    const ledger = new IdempotencyLedger<Receipt>({ retentionMs: RETENTION_MS, now: () => clock });
    return {
        ledger,
        advance: (ms: number) => {
            clock += ms;
        }
    };
};

describe('IdempotencyLedger', () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    it('lets exactly one of several concurrent begins proceed', () => {
        const { ledger } = setup();
        const outcomes = [ledger.begin('k1', 'reserve_item'), ledger.begin('k1', 'reserve_item'), ledger.begin('k1', 'reserve_item')];
        expect(outcomes.map((outcome) => outcome.kind)).toEqual(['proceed', 'pending', 'pending']);
    });

    it('replays a completed result', () => {
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');
        ledger.complete('k1', { id: 'R123' });

        const outcome = ledger.begin('k1', 'reserve_item');
        expect(outcome.kind).toBe('succeeded');
        if (outcome.kind === 'succeeded') {
            expect(outcome.entry.result).toEqual({ id: 'R123' });
        }
    });

    it('allows a new attempt after a failure', () => {
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');
        ledger.fail('k1', { kind: 'BackendUnavailable', message: 'unreachable' });

        expect(ledger.peek('k1')).toMatchObject({ status: 'failed', error: { kind: 'BackendUnavailable' } });
        expect(ledger.begin('k1', 'reserve_item').kind).toBe('proceed');
    });

    it('keeps ambiguous entries pending', () => {
        const { ledger } = setup();
        ledger.begin('k1', 'create_transfer');
        ledger.markAmbiguous('k1', { kind: 'BackendAmbiguous', message: 'timed out' });

        const outcome = ledger.begin('k1', 'create_transfer');
        expect(outcome.kind).toBe('pending');
        if (outcome.kind === 'pending') {
            expect(outcome.entry.ambiguity).toEqual({ kind: 'BackendAmbiguous', message: 'timed out' });
        }
    });

    it('refuses to settle an entry that is not pending', () => {
        const { ledger } = setup();
        expect(() => ledger.complete('missing', { id: 'R1' })).toThrow("Ledger entry 'missing' is not pending");
    });

    it('wakes waiters with the settled entry', async () => {
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');

        const waiting = ledger.waitFor('k1', 5_000);
        ledger.complete('k1', { id: 'R123' });

        await expect(waiting).resolves.toMatchObject({ status: 'succeeded', result: { id: 'R123' } });
    });

    it('wakes waiters when the outcome becomes ambiguous', async () => {
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');

        const waiting = ledger.waitFor('k1', 5_000);
        ledger.markAmbiguous('k1', { kind: 'BackendAmbiguous', message: 'reset' });

        await expect(waiting).resolves.toMatchObject({ status: 'pending', ambiguity: { message: 'reset' } });
    });

    it('gives up waiting after the timeout', async () => {
        jest.useFakeTimers();
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');

        const waiting = ledger.waitFor('k1', 1_000);
        jest.advanceTimersByTime(1_000);

        await expect(waiting).resolves.toMatchObject({ status: 'pending' });
    });

    it('resolves an ambiguous entry by manual review', () => {
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');
        ledger.markAmbiguous('k1', { kind: 'BackendAmbiguous', message: 'timed out' });

        const resolved = ledger.resolve('k1', { status: 'succeeded', result: { id: 'R9' } });
        expect(resolved).toMatchObject({ status: 'succeeded', result: { id: 'R9' }, resolvedManually: true });
        expect(ledger.begin('k1', 'reserve_item').kind).toBe('succeeded');
    });

    it('only resolves entries awaiting review', () => {
        const { ledger } = setup();
        ledger.begin('k1', 'reserve_item');

        let error: unknown;
        try {
            ledger.resolve('k1', { status: 'failed', message: 'not found in backend' });
        } catch (caught) {
            error = caught;
        }
        expect(error).toBeInstanceOf(GatewayError);
        expect(error instanceof GatewayError && error.kind).toBe('RequestMismatch');
    });

    it('sweeps settled entries after the retention window', () => {
        const { ledger, advance } = setup();
        ledger.begin('done', 'reserve_item');
        ledger.complete('done', { id: 'R1' });
        ledger.begin('inflight', 'reserve_item');

        advance(RETENTION_MS);
        expect(ledger.sweep()).toBe(0);
        advance(1);
        expect(ledger.sweep()).toBe(1);
        expect(ledger.peek('done')).toBeUndefined();
        expect(ledger.peek('inflight')).toMatchObject({ status: 'pending' });
    });

    it('finds an entry through its alias until the entry is swept', () => {
        const { ledger, advance } = setup();
        ledger.begin('client-key', 'reserve_item');
        ledger.alias('token-key', 'client-key');
        ledger.complete('client-key', { id: 'R1' });

        expect(ledger.peek('token-key')).toMatchObject({ key: 'client-key', status: 'succeeded', result: { id: 'R1' } });

        advance(RETENTION_MS + 1);
        expect(ledger.sweep()).toBe(1);
        expect(ledger.peek('token-key')).toBeUndefined();
        expect(ledger.begin('token-key', 'reserve_item')).toEqual({ kind: 'proceed' });
    });
});

describe('deriveIdempotencyKey', () => {
    const args = { sku: 'SKU-1', store: 'ST001', qty: 2 };

    it('ignores argument key order', () => {
        const a = deriveIdempotencyKey({ tool: 'reserve_item', args, confirmationToken: 'T1' });
        const b = deriveIdempotencyKey({ tool: 'reserve_item', args: { qty: 2, store: 'ST001', sku: 'SKU-1' }, confirmationToken: 'T1' });
        expect(a).toBe(b);
        expect(a).toMatch(/^reserve_item:[0-9a-f]{64}$/);
    });

    it('distinguishes tokens, client keys and arguments', () => {
        const base = deriveIdempotencyKey({ tool: 'reserve_item', args, confirmationToken: 'T1' });
        expect(deriveIdempotencyKey({ tool: 'reserve_item', args, confirmationToken: 'T2' })).not.toBe(base);
        expect(deriveIdempotencyKey({ tool: 'reserve_item', args: { ...args, qty: 3 }, confirmationToken: 'T1' })).not.toBe(base);
        expect(deriveIdempotencyKey({ tool: 'reserve_item', args, clientKey: 'T1' })).not.toBe(base);
    });

    it('prefers the client key over the token', () => {
        const withToken = deriveIdempotencyKey({ tool: 'reserve_item', args, clientKey: 'order-7', confirmationToken: 'T1' });
        const withoutToken = deriveIdempotencyKey({ tool: 'reserve_item', args, clientKey: 'order-7' });
        expect(withToken).toBe(withoutToken);
    });
});
