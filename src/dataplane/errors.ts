/**
 * Error taxonomy for the Data Plane client.
 *
 * Lower layers throw these untouched; only the retry orchestrator decides
 * what happens next, so every class keeps the fields the classifier reads.
 */

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class DataPlaneError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The request never produced an HTTP response. */
export class TransportError extends DataPlaneError {
    readonly method: string;
    readonly path: string;

    constructor(method: string, path: string, cause: unknown) {
        super(`${method} ${path} failed: ${errorMessage(cause)}`, { cause });
        this.method = method;
        this.path = path;
    }
}

export type ApiErrorInit = {
    status: number;
    method: string;
    path: string;
    body: string;
};

/** A non-2xx response from the Data Plane API. */
export class ApiError extends DataPlaneError {
    readonly status: number;
    readonly method: string;
    readonly path: string;
    readonly body: string;
    readonly apiCode: number | null;
    readonly apiMessage: string | null;

    constructor(init: ApiErrorInit) {
        const parsed = parseApiErrorBody(init.body);
        const detail = parsed?.message ?? (init.body.trim() || 'no response body');
        super(`API error ${init.status}: ${detail}`);
        this.status = init.status;
        this.method = init.method;
        this.path = init.path;
        this.body = init.body;
        this.apiCode = parsed?.code ?? null;
        this.apiMessage = parsed?.message ?? null;
    }
}

/** The API answers `{code, message}` on most failures; anything else stays raw text. */
export function parseApiErrorBody(body: string): { code: number | null; message: string } | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        return null;
    }
    if (!parsed || typeof parsed !== 'object' || !('message' in parsed)) return null;

    const message = parsed.message;
    if (typeof message !== 'string' || message.length === 0) return null;

    const code = 'code' in parsed && typeof parsed.code === 'number' ? parsed.code : null;
    return { code, message };
}

/** A 2xx body that does not have the shape the configured API version promises. */
export class DecodeError extends DataPlaneError {}

export class OperationCancelledError extends DataPlaneError {
    constructor(reason?: unknown) {
        super(reason === undefined ? 'operation cancelled' : `operation cancelled: ${errorMessage(reason)}`, { cause: reason });
    }
}

export type TransactionState = 'open' | 'committed' | 'rolledBack';

/** Commit or rollback requested on a handle that already reached a terminal state. */
export class TransactionClosedError extends DataPlaneError {
    readonly transactionId: string;
    readonly state: TransactionState;

    constructor(transactionId: string, state: TransactionState) {
        super(`transaction ${transactionId} does not exist (already ${state})`);
        this.transactionId = transactionId;
        this.state = state;
    }
}

export type StepAction = 'creation' | 'update' | 'deletion';

/** A bundle step failed; the cause is the error the step's request produced. */
export class ResourceStepError extends DataPlaneError {
    readonly step: string;
    readonly action: StepAction;

    constructor(step: string, action: StepAction, cause: unknown) {
        super(`${step} ${action} failed: ${errorMessage(cause)}`, { cause });
        this.step = step;
        this.action = action;
    }
}

export class RetriesExhaustedError extends DataPlaneError {
    readonly operation: string;
    readonly attempts: number;
    readonly lastError: unknown;

    constructor(operation: string, attempts: number, lastError: unknown) {
        super(`${operation} failed after ${attempts} attempts: ${errorMessage(lastError)}`, { cause: lastError });
        this.operation = operation;
        this.attempts = attempts;
        this.lastError = lastError;
    }
}

export class BundleValidationError extends DataPlaneError {}

export class ConfigError extends DataPlaneError {}
