import { zone } from '../logging/zone';
import { matchRetryRule } from './classifier';
import { OperationCancelledError, RetriesExhaustedError, errorMessage } from './errors';
import type { Transaction, TransactionEnvelope, TransactionWork } from './transaction';

const log = zone('dataplane.retry');

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryPolicy = {
    maxAttempts: number;
    delayMs: number;
    sleep: Sleep;
};

export type AttemptResult<T> = {
    /** Attempts used, 1-based. */
    attempts: number;
    /** Id of the transaction that committed. */
    transactionId: string;
    result: T;
};

/** Resolves after `ms`, or rejects with OperationCancelledError once the signal fires. */
export const sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new OperationCancelledError(signal.reason));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new OperationCancelledError(signal?.reason));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 10,
    delayMs: 2000,
    sleep,
};

/**
 * Runs work inside a fresh transaction per attempt.
 *
 * Attempting -> Succeeded | FailedFatal | FailedRetryable
 * FailedRetryable -> Attempting (after delayMs) | RetriesExhausted (at maxAttempts)
 *
 * This is the only place in the client that retries.
 */
export class RetryOrchestrator {
    readonly policy: RetryPolicy;

    constructor(private readonly envelope: TransactionEnvelope, policy: Partial<RetryPolicy> = {}) {
        // Entries given as undefined keep their default
        this.policy = {
            maxAttempts: policy.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
            delayMs: policy.delayMs ?? DEFAULT_RETRY_POLICY.delayMs,
            sleep: policy.sleep ?? DEFAULT_RETRY_POLICY.sleep,
        };
        if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${this.policy.maxAttempts}`);
        }
    }

    async run<T>(operation: string, work: TransactionWork<T>, signal?: AbortSignal): Promise<AttemptResult<T>> {
        const { maxAttempts, delayMs } = this.policy;
        let attempt = 1;

        for (;;) {
            if (signal?.aborted) throw new OperationCancelledError(signal.reason);

            let tx: Transaction | null = null;
            try {
                tx = await this.envelope.begin(signal);
                const result = await work(tx.id, signal);
                await this.envelope.commit(tx, signal);

                if (attempt > 1) {
                    log.info({ message: `${operation} succeeded after ${attempt} attempts`, data: { transactionId: tx.id } });
                }
                return { attempts: attempt, transactionId: tx.id, result };
            } catch (err) {
                if (tx) await this.envelope.rollbackQuietly(tx);

                const rule = matchRetryRule(err);
                if (rule === null) {
                    log.debug({ message: `${operation} failed permanently on attempt ${attempt}`, data: { error: errorMessage(err) } });
                    throw err;
                }
                if (attempt >= maxAttempts) {
                    log.error({ message: `${operation} gave up after ${attempt} attempts`, data: { rule, error: errorMessage(err) } });
                    throw new RetriesExhaustedError(operation, attempt, err);
                }

                log.warn({
                    message: `${operation} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`,
                    data: { rule, error: errorMessage(err) },
                });
                await this.policy.sleep(delayMs, signal);
                attempt += 1;
            }
        }
    }
}
