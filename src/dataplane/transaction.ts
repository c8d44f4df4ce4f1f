import { zone } from '../logging/zone';
import { ConfigurationVersionSchema, TransactionResponseSchema } from './models';
import { DecodeError, TransactionClosedError, errorMessage } from './errors';
import type { TransactionState } from './errors';
import { TRANSACTIONS_BASE, VERSION_PATH, transactionPath } from './paths';
import type { Transport } from './transport';

const log = zone('dataplane.transaction');

export type Transaction = {
    readonly id: string;
    /** Configuration version the transaction was opened against. */
    readonly baseVersion: string;
    state: TransactionState;
};

export type TransactionWork<T> = (transactionId: string, signal?: AbortSignal) => Promise<T>;

/**
 * Begin, commit and rollback of one Data Plane transaction.
 * Never retries; callers that want another attempt start a new transaction.
 */
export class TransactionEnvelope {
    constructor(private readonly transport: Transport) {}

    async getConfigurationVersion(signal?: AbortSignal): Promise<string> {
        const response = await this.transport.request('GET', VERSION_PATH, { signal });
        this.transport.expect(response, [200], 'GET', VERSION_PATH);

        const parsed = ConfigurationVersionSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new DecodeError(`unexpected configuration version payload: ${response.text.trim() || 'empty body'}`);
        }
        const value = parsed.data;
        return typeof value === 'object' ? String(value.version) : String(value);
    }

    async begin(signal?: AbortSignal): Promise<Transaction> {
        const version = await this.getConfigurationVersion(signal);
        const response = await this.transport.request('POST', TRANSACTIONS_BASE, { query: { version }, signal });
        this.transport.expect(response, [201], 'POST', TRANSACTIONS_BASE);

        const parsed = TransactionResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new DecodeError(`unexpected transaction payload: ${response.text.trim() || 'empty body'}`);
        }

        log.debug({ message: 'Transaction started', data: { transactionId: parsed.data.id, version } });
        return { id: parsed.data.id, baseVersion: version, state: 'open' };
    }

    async commit(tx: Transaction, signal?: AbortSignal): Promise<void> {
        if (tx.state !== 'open') throw new TransactionClosedError(tx.id, tx.state);

        const path = transactionPath(tx.id);
        const response = await this.transport.request('PUT', path, { signal });
        this.transport.expect(response, [200, 202], 'PUT', path);

        tx.state = 'committed';
        log.debug({ message: 'Transaction committed', data: { transactionId: tx.id } });
    }

    async rollback(tx: Transaction, signal?: AbortSignal): Promise<void> {
        if (tx.state !== 'open') throw new TransactionClosedError(tx.id, tx.state);

        const path = transactionPath(tx.id);
        const response = await this.transport.request('DELETE', path, { signal });
        this.transport.expect(response, [200, 204], 'DELETE', path);

        tx.state = 'rolledBack';
        log.debug({ message: 'Transaction rolled back', data: { transactionId: tx.id } });
    }

    /**
     * Roll back a handle that is still open, logging instead of throwing.
     * Runs without the caller's signal so a cancelled operation still cleans up.
     */
    async rollbackQuietly(tx: Transaction): Promise<void> {
        if (tx.state !== 'open') return;
        try {
            await this.rollback(tx);
        } catch (err) {
            log.warn({ message: 'Rollback failed', data: { transactionId: tx.id, error: errorMessage(err) } });
        }
    }

    /**
     * Begin, run the work, commit. On any failure the transaction is rolled
     * back (best effort) and the original error is rethrown.
     */
    async runInTransaction<T>(work: TransactionWork<T>, signal?: AbortSignal): Promise<T> {
        const tx = await this.begin(signal);
        try {
            const result = await work(tx.id, signal);
            await this.commit(tx, signal);
            return result;
        } catch (err) {
            await this.rollbackQuietly(tx);
            throw err;
        }
    }
}
