import type { ApiVersion } from './decoder';
import { DataPlaneError } from './errors';

export const CONFIGURATION_BASE = '/services/haproxy/configuration';
export const TRANSACTIONS_BASE = '/services/haproxy/transactions';
export const VERSION_PATH = `${CONFIGURATION_BASE}/version`;

export type ParentType = 'frontend' | 'backend';

/**
 * Where an object lives.
 *  - root: a top-level collection (`/frontends`, `/resolvers`, ...)
 *  - parent: a child of a frontend or backend; v3 nests it in the path, v2 passes parent_type/parent_name
 *  - section: a child of a named section addressed by one query parameter in both versions
 */
export type ScopeSpec =
    | { kind: 'root' }
    | { kind: 'parent'; parentTypes: readonly ParentType[] }
    | { kind: 'section'; param: string };

export type ScopeRef =
    | { kind: 'root' }
    | { kind: 'parent'; parentType: ParentType; parentName: string }
    | { kind: 'section'; section: string };

export const ROOT: ScopeRef = { kind: 'root' };

export function parentScope(parentType: ParentType, parentName: string): ScopeRef {
    return { kind: 'parent', parentType, parentName };
}

export function sectionScope(section: string): ScopeRef {
    return { kind: 'section', section };
}

export type Query = Record<string, string>;

export type ResolvedPath = {
    path: string;
    query: Query;
};

export type PathTarget = {
    kind: string;
    collection: string;
    scope: ScopeSpec;
};

export function encodeSegment(segment: string | number): string {
    return encodeURIComponent(String(segment));
}

function describeRef(ref: ScopeRef): string {
    switch (ref.kind) {
        case 'root':
            return 'root scope';
        case 'parent':
            return `${ref.parentType} "${ref.parentName}"`;
        case 'section':
            return `section "${ref.section}"`;
    }
}

function scopeMismatch(target: PathTarget, ref: ScopeRef): DataPlaneError {
    return new DataPlaneError(`${target.kind} cannot be addressed under ${describeRef(ref)}`);
}

/** Path and query of a collection, before any transaction_id is added. */
export function collectionPath(version: ApiVersion, target: PathTarget, ref: ScopeRef): ResolvedPath {
    const spec = target.scope;

    if (spec.kind === 'root') {
        if (ref.kind !== 'root') throw scopeMismatch(target, ref);
        return { path: `${CONFIGURATION_BASE}/${target.collection}`, query: {} };
    }

    if (spec.kind === 'parent') {
        if (ref.kind !== 'parent' || !spec.parentTypes.includes(ref.parentType)) {
            throw scopeMismatch(target, ref);
        }
        if (version === 'v3') {
            return {
                path: `${CONFIGURATION_BASE}/${ref.parentType}s/${encodeSegment(ref.parentName)}/${target.collection}`,
                query: {},
            };
        }
        return {
            path: `${CONFIGURATION_BASE}/${target.collection}`,
            query: { parent_type: ref.parentType, parent_name: ref.parentName },
        };
    }

    if (ref.kind !== 'section') throw scopeMismatch(target, ref);
    return {
        path: `${CONFIGURATION_BASE}/${target.collection}`,
        query: { [spec.param]: ref.section },
    };
}

export function itemPath(version: ApiVersion, target: PathTarget, ref: ScopeRef, key: string | number): ResolvedPath {
    const base = collectionPath(version, target, ref);
    return { path: `${base.path}/${encodeSegment(key)}`, query: base.query };
}

export function transactionPath(transactionId: string): string {
    return `${TRANSACTIONS_BASE}/${encodeSegment(transactionId)}`;
}

export function withTransaction(query: Query, transactionId: string): Query {
    return { ...query, transaction_id: transactionId };
}
