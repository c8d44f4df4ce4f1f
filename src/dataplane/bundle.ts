import { zone } from '../logging/zone';
import { isAbsentError } from './classifier';
import { BundleValidationError, OperationCancelledError, ResourceStepError } from './errors';
import type { StepAction } from './errors';
import type { AclPayload, BackendPayload, FrontendPayload, ServerPayload } from './models';
import { parentScope, ROOT } from './paths';
import type { ParentType, ScopeRef } from './paths';
import type { ResourceOperations } from './resources';

const log = zone('dataplane.bundle');

/**
 * Related objects applied together in one transaction.
 * Servers live under the backend; ACLs under the frontend unless aclParent says otherwise.
 */
export type ResourceBundle = {
    backend?: BackendPayload;
    servers?: ServerPayload[];
    frontend?: FrontendPayload;
    acls?: AclPayload[];
    aclParent?: { parentType: ParentType; parentName: string };
};

/** A bundle whose references were checked and whose ACLs all carry an index. */
export type ValidatedBundle = {
    backend: BackendPayload | null;
    servers: ServerPayload[];
    frontend: FrontendPayload | null;
    acls: (AclPayload & { index: number })[];
    aclScope: ScopeRef | null;
};

export type BundleStep = {
    label: string;
    action: StepAction;
    /** An "already gone" failure skips the step instead of aborting the bundle. */
    lenient: boolean;
    run(ops: ResourceOperations, transactionId: string, signal?: AbortSignal): Promise<void>;
};

function requireName(kind: string, name: string | undefined): void {
    if (!name || name.trim() === '') {
        throw new BundleValidationError(`${kind} name must not be empty`);
    }
}

export function validateBundle(bundle: ResourceBundle): ValidatedBundle {
    const backend = bundle.backend ?? null;
    const frontend = bundle.frontend ?? null;
    const servers = bundle.servers ?? [];
    const acls = bundle.acls ?? [];

    if (backend) requireName('backend', backend.name);
    if (frontend) requireName('frontend', frontend.name);
    servers.forEach((server, i) => requireName(`server ${i + 1}`, server.name));
    acls.forEach((acl, i) => requireName(`ACL ${i + 1}`, acl.acl_name));

    if (servers.length > 0 && !backend) {
        throw new BundleValidationError('servers require a backend in the same bundle');
    }

    let aclScope: ScopeRef | null = null;
    if (bundle.aclParent) {
        requireName(`ACL parent ${bundle.aclParent.parentType}`, bundle.aclParent.parentName);
        aclScope = parentScope(bundle.aclParent.parentType, bundle.aclParent.parentName);
    } else if (frontend) {
        aclScope = parentScope('frontend', frontend.name);
    }
    if (acls.length > 0 && !aclScope) {
        throw new BundleValidationError('ACLs require a frontend or an explicit aclParent');
    }

    const seen = new Set<number>();
    const indexed = acls.map((acl, position) => {
        const index = acl.index ?? position;
        if (!Number.isInteger(index) || index < 0) {
            throw new BundleValidationError(`ACL ${position + 1} index must be a non-negative integer, got ${index}`);
        }
        if (seen.has(index)) {
            throw new BundleValidationError(`ACL index ${index} is used more than once`);
        }
        seen.add(index);
        return { ...acl, index };
    });

    return { backend, servers, frontend, acls: indexed, aclScope };
}

/** Servers and ACLs already present under the scopes a bundle touches. */
export type ExistingChildren = {
    servers: ServerPayload[];
    acls: AclPayload[];
};

/** backend, servers 1..n, frontend, ACLs 1..n */
export function planCreate(bundle: ResourceBundle): BundleStep[] {
    const { backend, servers, frontend, acls, aclScope } = validateBundle(bundle);
    const steps: BundleStep[] = [];

    if (backend) {
        steps.push({
            label: 'backend',
            action: 'creation',
            lenient: false,
            run: (ops, txId, signal) => ops.backend.create(ROOT, backend, txId, signal),
        });
        const serverScope = parentScope('backend', backend.name);
        servers.forEach((server, i) => {
            steps.push({
                label: `server ${i + 1}`,
                action: 'creation',
                lenient: false,
                run: (ops, txId, signal) => ops.server.create(serverScope, server, txId, signal),
            });
        });
    }

    if (frontend) {
        steps.push({
            label: 'frontend',
            action: 'creation',
            lenient: false,
            run: (ops, txId, signal) => ops.frontend.create(ROOT, frontend, txId, signal),
        });
    }

    if (aclScope) {
        acls.forEach((acl, i) => {
            steps.push({
                label: `ACL ${i + 1}`,
                action: 'creation',
                lenient: false,
                run: (ops, txId, signal) => ops.acl.create(aclScope, acl, txId, signal),
            });
        });
    }

    return steps;
}

export async function readExistingChildren(
    bundle: ValidatedBundle,
    ops: ResourceOperations,
    signal?: AbortSignal
): Promise<ExistingChildren> {
    const servers = bundle.backend ? await ops.server.list(parentScope('backend', bundle.backend.name), signal) : [];
    const acls = bundle.aclScope ? await ops.acl.list(bundle.aclScope, signal) : [];
    return { servers, acls };
}

/**
 * Bring the objects under the bundle in line with it, in creation order.
 *
 * Servers match by name: missing ones are created, present ones updated and
 * the rest deleted. ACLs match by index: present indexes are updated first,
 * surplus indexes deleted from the highest down, then new indexes created
 * from the lowest up.
 */
export function planUpdate(bundle: ResourceBundle, existing: ExistingChildren): BundleStep[] {
    const { backend, servers, frontend, acls, aclScope } = validateBundle(bundle);
    const steps: BundleStep[] = [];

    if (backend) {
        steps.push({
            label: 'backend',
            action: 'update',
            lenient: false,
            run: (ops, txId, signal) => ops.backend.update(ROOT, backend.name, backend, txId, signal),
        });

        const serverScope = parentScope('backend', backend.name);
        const wanted = new Set(servers.map((server) => server.name));
        const present = new Set(existing.servers.map((server) => server.name));

        for (const stale of existing.servers.filter((server) => !wanted.has(server.name)).reverse()) {
            steps.push({
                label: `removed server ${stale.name}`,
                action: 'deletion',
                lenient: false,
                run: (ops, txId, signal) => ops.server.remove(serverScope, stale.name, txId, signal),
            });
        }
        servers.forEach((server, i) => {
            const exists = present.has(server.name);
            steps.push({
                label: `server ${i + 1}`,
                action: exists ? 'update' : 'creation',
                lenient: false,
                run: (ops, txId, signal) =>
                    exists
                        ? ops.server.update(serverScope, server.name, server, txId, signal)
                        : ops.server.create(serverScope, server, txId, signal),
            });
        });
    }

    if (frontend) {
        steps.push({
            label: 'frontend',
            action: 'update',
            lenient: false,
            run: (ops, txId, signal) => ops.frontend.update(ROOT, frontend.name, frontend, txId, signal),
        });
    }

    if (aclScope) {
        const wanted = new Set(acls.map((acl) => acl.index));
        const present = new Set(existing.acls.flatMap((acl) => (acl.index === undefined ? [] : [acl.index])));
        const labelled = acls.map((acl, i) => ({ acl, label: `ACL ${i + 1}` }));

        for (const { acl, label } of labelled.filter(({ acl }) => present.has(acl.index))) {
            steps.push({
                label,
                action: 'update',
                lenient: false,
                run: (ops, txId, signal) => ops.acl.update(aclScope, acl.index, acl, txId, signal),
            });
        }
        for (const index of [...present].filter((index) => !wanted.has(index)).sort((a, b) => b - a)) {
            steps.push({
                label: `removed ACL ${index}`,
                action: 'deletion',
                lenient: true,
                run: (ops, txId, signal) => ops.acl.remove(aclScope, index, txId, signal),
            });
        }
        const added = labelled.filter(({ acl }) => !present.has(acl.index)).sort((a, b) => a.acl.index - b.acl.index);
        for (const { acl, label } of added) {
            steps.push({
                label,
                action: 'creation',
                lenient: false,
                run: (ops, txId, signal) => ops.acl.create(aclScope, acl, txId, signal),
            });
        }
    }

    return steps;
}

/**
 * ACLs n..1, frontend, servers n..1, backend.
 * ACLs go highest index first so earlier indexes do not shift underneath.
 */
export function planDelete(bundle: ResourceBundle): BundleStep[] {
    const { backend, servers, frontend, acls, aclScope } = validateBundle(bundle);
    const steps: BundleStep[] = [];

    if (aclScope) {
        for (let i = acls.length - 1; i >= 0; i--) {
            const acl = acls[i];
            steps.push({
                label: `ACL ${i + 1}`,
                action: 'deletion',
                lenient: true,
                run: (ops, txId, signal) => ops.acl.remove(aclScope, acl.index, txId, signal),
            });
        }
    }

    if (frontend) {
        steps.push({
            label: 'frontend',
            action: 'deletion',
            lenient: false,
            run: (ops, txId, signal) => ops.frontend.remove(ROOT, frontend.name, txId, signal),
        });
    }

    if (backend) {
        const serverScope = parentScope('backend', backend.name);
        for (let i = servers.length - 1; i >= 0; i--) {
            const server = servers[i];
            steps.push({
                label: `server ${i + 1}`,
                action: 'deletion',
                lenient: false,
                run: (ops, txId, signal) => ops.server.remove(serverScope, server.name, txId, signal),
            });
        }
        steps.push({
            label: 'backend',
            action: 'deletion',
            lenient: false,
            run: (ops, txId, signal) => ops.backend.remove(ROOT, backend.name, txId, signal),
        });
    }

    return steps;
}

/**
 * Run planned steps in order inside one transaction.
 * Returns the labels of lenient steps skipped because their target was already gone.
 */
export async function runSteps(
    steps: readonly BundleStep[],
    ops: ResourceOperations,
    transactionId: string,
    signal?: AbortSignal
): Promise<string[]> {
    const skipped: string[] = [];

    for (const step of steps) {
        try {
            await step.run(ops, transactionId, signal);
        } catch (err) {
            if (err instanceof OperationCancelledError) throw err;
            if (step.lenient && isAbsentError(err)) {
                log.info({ message: `${step.label} already absent, skipping ${step.action}`, data: { transactionId } });
                skipped.push(step.label);
                continue;
            }
            throw new ResourceStepError(step.label, step.action, err);
        }
    }

    return skipped;
}
