import { ApiError, OperationCancelledError, TransactionClosedError } from './errors';

export type ErrorClass = 'retryable' | 'fatal';

/**
 * A retry rule matches when any one of its alternatives matches, and an
 * alternative matches when every substring in it appears in one message.
 */
export type RetryRule = {
    name: string;
    alternatives: readonly (readonly string[])[];
};

// The API reports a stale configuration through several shapes; all of them mean "start over"
export const RETRY_RULES: readonly RetryRule[] = [
    {
        name: 'transaction-outdated',
        alternatives: [['transaction outdated'], ['transaction', 'is outdated']],
    },
    {
        name: 'transaction-missing',
        alternatives: [['transaction does not exist']],
    },
    {
        name: 'version-mismatch',
        alternatives: [['version mismatch']],
    },
    {
        name: 'version-unspecified',
        alternatives: [['version or transaction not specified']],
    },
    {
        // Reported while a concurrent commit rewrites the defaults section
        name: 'transient-validation',
        alternatives: [['validation error', 'defaults section']],
    },
];

const ABSENT_PATTERNS: readonly string[] = ['missing object', 'not found'];

/** Messages of the error and everything in its cause chain, lower-cased. */
export function collectMessages(err: unknown): string[] {
    const messages: string[] = [];
    const seen = new Set<unknown>();
    let current: unknown = err;

    while (current !== undefined && current !== null && !seen.has(current)) {
        seen.add(current);
        if (current instanceof Error) {
            messages.push(current.message.toLowerCase());
            if (current instanceof ApiError) {
                if (current.apiMessage) messages.push(current.apiMessage.toLowerCase());
                if (current.body) messages.push(current.body.toLowerCase());
            }
            current = current.cause;
        } else {
            messages.push(String(current).toLowerCase());
            break;
        }
    }

    return messages;
}

function findInChain<T extends Error>(err: unknown, ctor: abstract new (...args: never[]) => T): T | null {
    const seen = new Set<unknown>();
    let current: unknown = err;
    while (current instanceof Error && !seen.has(current)) {
        if (current instanceof ctor) return current;
        seen.add(current);
        current = current.cause;
    }
    return null;
}

/** Name of the first retry rule the error satisfies, or null. */
export function matchRetryRule(err: unknown): string | null {
    if (findInChain(err, OperationCancelledError)) return null;
    if (findInChain(err, TransactionClosedError)) return 'transaction-closed';

    const messages = collectMessages(err);
    for (const rule of RETRY_RULES) {
        const hit = rule.alternatives.some((parts) =>
            messages.some((message) => parts.every((part) => message.includes(part)))
        );
        if (hit) return rule.name;
    }
    return null;
}

export function classifyError(err: unknown): ErrorClass {
    return matchRetryRule(err) === null ? 'fatal' : 'retryable';
}

export function isRetryableError(err: unknown): boolean {
    return classifyError(err) === 'retryable';
}

/** True when a non-retryable failure only says the target object is already gone. */
export function isAbsentError(err: unknown): boolean {
    if (isRetryableError(err)) return false;
    if (findInChain(err, OperationCancelledError)) return false;

    const apiError = findInChain(err, ApiError);
    if (apiError && apiError.status === 404) return true;

    const messages = collectMessages(err);
    return ABSENT_PATTERNS.some((pattern) => messages.some((message) => message.includes(pattern)));
}
