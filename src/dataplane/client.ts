import { zone } from '../logging/zone';
import type { DataPlaneConfig } from '../types/config';
import { planCreate, planDelete, planUpdate, readExistingChildren, runSteps, validateBundle } from './bundle';
import type { BundleStep, ResourceBundle } from './bundle';
import type { ApiVersion } from './decoder';
import type { AclPayload, BackendPayload, FrontendPayload, ServerPayload } from './models';
import { RetryOrchestrator } from './orchestrator';
import type { AttemptResult, Sleep } from './orchestrator';
import { parentScope, ROOT } from './paths';
import type { ParentType } from './paths';
import { ResourceOperations } from './resources';
import { TransactionEnvelope } from './transaction';
import type { TransactionWork } from './transaction';
import { Transport } from './transport';
import type { TransportOptions } from './transport';

const log = zone('dataplane.client');

export type ClientOptions = TransportOptions & {
    /** Replaces the timer used between attempts. */
    sleep?: Sleep;
};

export type BundleResult = {
    attempts: number;
    transactionId: string;
    /** Labels of lenient steps skipped because their target was already gone. */
    skipped: string[];
};

/** Names identifying a bundle that was applied earlier. */
export type BundleRef = {
    backend?: string;
    frontend?: string;
    aclParent?: { parentType: ParentType; parentName: string };
};

export type BundleSnapshot = {
    backend: BackendPayload | null;
    servers: ServerPayload[];
    frontend: FrontendPayload | null;
    acls: AclPayload[];
};

type StepPlanner = (signal?: AbortSignal) => Promise<BundleStep[]>;

export class DataPlaneClient {
    readonly transport: Transport;
    readonly transactions: TransactionEnvelope;
    readonly retries: RetryOrchestrator;
    readonly resources: ResourceOperations;

    constructor(config: DataPlaneConfig, options: ClientOptions = {}) {
        this.transport = new Transport(config, { adapter: options.adapter });
        this.transactions = new TransactionEnvelope(this.transport);
        this.retries = new RetryOrchestrator(this.transactions, {
            maxAttempts: config.retry.maxAttempts,
            delayMs: config.retry.delayMs,
            sleep: options.sleep,
        });
        this.resources = new ResourceOperations(this.transport);
    }

    get apiVersion(): ApiVersion {
        return this.transport.apiVersion;
    }

    async createAllResources(bundle: ResourceBundle, signal?: AbortSignal): Promise<BundleResult> {
        const steps = planCreate(bundle);
        return this.applyBundle('create bundle', async () => steps, signal);
    }

    /** Servers and ACLs missing from the bundle are deleted, new ones created. */
    async updateAllResources(bundle: ResourceBundle, signal?: AbortSignal): Promise<BundleResult> {
        const validated = validateBundle(bundle);
        return this.applyBundle(
            'update bundle',
            async (attemptSignal) => planUpdate(bundle, await readExistingChildren(validated, this.resources, attemptSignal)),
            signal
        );
    }

    async deleteAllResources(bundle: ResourceBundle, signal?: AbortSignal): Promise<BundleResult> {
        const steps = planDelete(bundle);
        return this.applyBundle('delete bundle', async () => steps, signal);
    }

    /** One begin/work/commit cycle without retries. */
    withTransaction<T>(work: TransactionWork<T>, signal?: AbortSignal): Promise<T> {
        return this.transactions.runInTransaction(work, signal);
    }

    withRetries<T>(operation: string, work: TransactionWork<T>, signal?: AbortSignal): Promise<AttemptResult<T>> {
        return this.retries.run(operation, work, signal);
    }

    /** Committed state of a bundle; absent objects read as null or []. */
    async readBundle(ref: BundleRef, signal?: AbortSignal): Promise<BundleSnapshot> {
        const { backend, server, frontend, acl } = this.resources;

        const backendPayload = ref.backend ? await backend.get(ROOT, ref.backend, signal) : null;
        const servers = ref.backend && backendPayload
            ? await server.list(parentScope('backend', ref.backend), signal)
            : [];
        const frontendPayload = ref.frontend ? await frontend.get(ROOT, ref.frontend, signal) : null;

        let acls: AclPayload[] = [];
        if (ref.aclParent) {
            acls = await acl.list(parentScope(ref.aclParent.parentType, ref.aclParent.parentName), signal);
        } else if (ref.frontend && frontendPayload) {
            acls = await acl.list(parentScope('frontend', ref.frontend), signal);
        }

        return { backend: backendPayload, servers, frontend: frontendPayload, acls };
    }

    // Planning runs inside each attempt so an update sees the configuration its transaction started from
    private async applyBundle(operation: string, plan: StepPlanner, signal?: AbortSignal): Promise<BundleResult> {
        const outcome = await this.retries.run(
            operation,
            async (transactionId, attemptSignal) => {
                const steps = await plan(attemptSignal);
                const skipped = await runSteps(steps, this.resources, transactionId, attemptSignal);
                return { skipped, steps: steps.length };
            },
            signal
        );
        log.info({
            message: `${operation} committed`,
            data: { transactionId: outcome.transactionId, attempts: outcome.attempts, steps: outcome.result.steps },
        });
        return { attempts: outcome.attempts, transactionId: outcome.transactionId, skipped: outcome.result.skipped };
    }
}

export function createDataPlaneClient(config: DataPlaneConfig, options: ClientOptions = {}): DataPlaneClient {
    return new DataPlaneClient(config, options);
}
