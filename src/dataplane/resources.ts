import type { z } from 'zod';
import { zone } from '../logging/zone';
import type { JsonObject } from './decoder';
import { DataPlaneError, DecodeError } from './errors';
import {
    AclSchema,
    AddressedSchema,
    BackendSchema,
    BindSchema,
    FrontendSchema,
    GlobalSchema,
    HttpCheckSchema,
    NamedSchema,
    RuleSchema,
    ServerSchema,
    TcpCheckSchema,
} from './models';
import { collectionPath, itemPath, withTransaction } from './paths';
import type { PathTarget, ResolvedPath, ScopeRef } from './paths';
import type { Transport } from './transport';

const log = zone('dataplane.resources');

export type KeyKind = 'name' | 'index' | 'singleton';

export type KeyOf<K extends KeyKind> = K extends 'name' ? string : K extends 'index' ? number : null;

export type ResourceDescriptor<T extends JsonObject, K extends KeyKind> = PathTarget & {
    key: K;
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    /** Statuses besides 404 that a list answers when the scope holds nothing. */
    emptyStatuses?: readonly number[];
};

function describe<T extends JsonObject, K extends KeyKind>(descriptor: ResourceDescriptor<T, K>): ResourceDescriptor<T, K> {
    return descriptor;
}

const BOTH_PARENTS = ['frontend', 'backend'] as const;
// Rule endpoints answer 422 instead of an empty list when the parent has no rules
const RULE_EMPTY = [422] as const;

export const descriptors = {
    frontend: describe({ kind: 'frontend', collection: 'frontends', scope: { kind: 'root' }, key: 'name', schema: FrontendSchema }),
    backend: describe({ kind: 'backend', collection: 'backends', scope: { kind: 'root' }, key: 'name', schema: BackendSchema }),
    server: describe({ kind: 'server', collection: 'servers', scope: { kind: 'parent', parentTypes: ['backend'] }, key: 'name', schema: ServerSchema }),
    bind: describe({ kind: 'bind', collection: 'binds', scope: { kind: 'parent', parentTypes: ['frontend'] }, key: 'name', schema: BindSchema }),
    acl: describe({ kind: 'acl', collection: 'acls', scope: { kind: 'parent', parentTypes: BOTH_PARENTS }, key: 'index', schema: AclSchema }),
    httpRequestRule: describe({
        kind: 'http request rule',
        collection: 'http_request_rules',
        scope: { kind: 'parent', parentTypes: BOTH_PARENTS },
        key: 'index',
        schema: RuleSchema,
        emptyStatuses: RULE_EMPTY,
    }),
    httpResponseRule: describe({
        kind: 'http response rule',
        collection: 'http_response_rules',
        scope: { kind: 'parent', parentTypes: BOTH_PARENTS },
        key: 'index',
        schema: RuleSchema,
        emptyStatuses: RULE_EMPTY,
    }),
    tcpRequestRule: describe({
        kind: 'tcp request rule',
        collection: 'tcp_request_rules',
        scope: { kind: 'parent', parentTypes: BOTH_PARENTS },
        key: 'index',
        schema: RuleSchema,
        emptyStatuses: RULE_EMPTY,
    }),
    tcpResponseRule: describe({
        kind: 'tcp response rule',
        collection: 'tcp_response_rules',
        scope: { kind: 'parent', parentTypes: ['backend'] },
        key: 'index',
        schema: RuleSchema,
        emptyStatuses: RULE_EMPTY,
    }),
    httpCheck: describe({ kind: 'http check', collection: 'http_checks', scope: { kind: 'parent', parentTypes: ['backend'] }, key: 'index', schema: HttpCheckSchema }),
    tcpCheck: describe({ kind: 'tcp check', collection: 'tcp_checks', scope: { kind: 'parent', parentTypes: ['backend'] }, key: 'index', schema: TcpCheckSchema }),
    stickTable: describe({ kind: 'stick table', collection: 'stick_tables', scope: { kind: 'root' }, key: 'name', schema: NamedSchema }),
    stickRule: describe({ kind: 'stick rule', collection: 'stick_rules', scope: { kind: 'section', param: 'backend' }, key: 'index', schema: RuleSchema }),
    resolver: describe({ kind: 'resolver', collection: 'resolvers', scope: { kind: 'root' }, key: 'name', schema: NamedSchema }),
    nameserver: describe({ kind: 'nameserver', collection: 'nameservers', scope: { kind: 'section', param: 'resolver' }, key: 'name', schema: AddressedSchema }),
    peers: describe({ kind: 'peers', collection: 'peers', scope: { kind: 'root' }, key: 'name', schema: NamedSchema }),
    peerEntry: describe({ kind: 'peer entry', collection: 'peer_entries', scope: { kind: 'section', param: 'peers' }, key: 'name', schema: AddressedSchema }),
    logForward: describe({ kind: 'log forward', collection: 'log_forwards', scope: { kind: 'root' }, key: 'name', schema: NamedSchema }),
    global: describe({ kind: 'global', collection: 'global', scope: { kind: 'root' }, key: 'singleton', schema: GlobalSchema }),
};

export type Descriptors = typeof descriptors;
export type ResourceKind = keyof Descriptors;

export type EntityOperations<T extends JsonObject, K extends KeyKind> = {
    readonly descriptor: ResourceDescriptor<T, K>;
    list(ref: ScopeRef, signal?: AbortSignal): Promise<T[]>;
    /** Null when the object does not exist. */
    get(ref: ScopeRef, key: KeyOf<K>, signal?: AbortSignal): Promise<T | null>;
    create(ref: ScopeRef, payload: T, transactionId: string, signal?: AbortSignal): Promise<void>;
    update(ref: ScopeRef, key: KeyOf<K>, payload: T, transactionId: string, signal?: AbortSignal): Promise<void>;
    remove(ref: ScopeRef, key: KeyOf<K>, transactionId: string, signal?: AbortSignal): Promise<void>;
};

type OperationsFor<D> = D extends ResourceDescriptor<infer T, infer K> ? EntityOperations<T, K> : never;

export type OperationsTable = { [P in ResourceKind]: OperationsFor<Descriptors[P]> };

/**
 * Generic CRUD over one descriptor. Every entity kind gets the same
 * operations; only paths, keys and payload schemas differ.
 */
export function createEntityOperations<T extends JsonObject, K extends KeyKind>(
    transport: Transport,
    descriptor: ResourceDescriptor<T, K>
): EntityOperations<T, K> {
    const version = transport.apiVersion;

    function keyedPath(ref: ScopeRef, key: string | number | null): ResolvedPath {
        return key === null ? collectionPath(version, descriptor, ref) : itemPath(version, descriptor, ref, key);
    }

    function unsupported(operation: string): DataPlaneError {
        return new DataPlaneError(`${descriptor.kind} does not support ${operation}`);
    }

    function validate(item: JsonObject): T {
        const result = descriptor.schema.safeParse(item);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue && issue.path.length ? issue.path.join('.') : 'value';
            throw new DecodeError(`${descriptor.kind} payload rejected: ${where} ${issue ? issue.message : 'is invalid'}`);
        }
        return result.data;
    }

    // v3 addresses a new indexed child by its index; v2 posts to the collection with the index in the body
    function createPath(ref: ScopeRef, payload: T): ResolvedPath {
        const index = payload.index;
        if (descriptor.key === 'index' && version === 'v3' && typeof index === 'number') {
            return itemPath(version, descriptor, ref, index);
        }
        return collectionPath(version, descriptor, ref);
    }

    return {
        descriptor,

        async list(ref, signal) {
            if (descriptor.key === 'singleton') throw unsupported('list');
            const { path, query } = collectionPath(version, descriptor, ref);
            const items = await transport.readCollection(path, { query, signal, emptyStatuses: descriptor.emptyStatuses });
            return items.map(validate);
        },

        async get(ref, key, signal) {
            const { path, query } = keyedPath(ref, key);
            const item = await transport.readEntity(path, { query, signal });
            return item === null ? null : validate(item);
        },

        async create(ref, payload, transactionId, signal) {
            if (descriptor.key === 'singleton') throw unsupported('create');
            const { path, query } = createPath(ref, payload);
            await transport.create(path, payload, { query: withTransaction(query, transactionId), signal });
            log.debug({ message: `Created ${descriptor.kind}`, data: { transactionId, path } });
        },

        async update(ref, key, payload, transactionId, signal) {
            const { path, query } = keyedPath(ref, key);
            await transport.update(path, payload, { query: withTransaction(query, transactionId), signal });
            log.debug({ message: `Updated ${descriptor.kind}`, data: { transactionId, path } });
        },

        async remove(ref, key, transactionId, signal) {
            if (descriptor.key === 'singleton') throw unsupported('remove');
            const { path, query } = keyedPath(ref, key);
            await transport.remove(path, { query: withTransaction(query, transactionId), signal });
            log.debug({ message: `Deleted ${descriptor.kind}`, data: { transactionId, path } });
        },
    };
}

/** Operations for every known kind, bound to one transport. */
export class ResourceOperations {
    private readonly table: OperationsTable;

    constructor(transport: Transport) {
        this.table = {
            frontend: createEntityOperations(transport, descriptors.frontend),
            backend: createEntityOperations(transport, descriptors.backend),
            server: createEntityOperations(transport, descriptors.server),
            bind: createEntityOperations(transport, descriptors.bind),
            acl: createEntityOperations(transport, descriptors.acl),
            httpRequestRule: createEntityOperations(transport, descriptors.httpRequestRule),
            httpResponseRule: createEntityOperations(transport, descriptors.httpResponseRule),
            tcpRequestRule: createEntityOperations(transport, descriptors.tcpRequestRule),
            tcpResponseRule: createEntityOperations(transport, descriptors.tcpResponseRule),
            httpCheck: createEntityOperations(transport, descriptors.httpCheck),
            tcpCheck: createEntityOperations(transport, descriptors.tcpCheck),
            stickTable: createEntityOperations(transport, descriptors.stickTable),
            stickRule: createEntityOperations(transport, descriptors.stickRule),
            resolver: createEntityOperations(transport, descriptors.resolver),
            nameserver: createEntityOperations(transport, descriptors.nameserver),
            peers: createEntityOperations(transport, descriptors.peers),
            peerEntry: createEntityOperations(transport, descriptors.peerEntry),
            logForward: createEntityOperations(transport, descriptors.logForward),
            global: createEntityOperations(transport, descriptors.global),
        };
    }

    forKind<P extends ResourceKind>(kind: P): OperationsTable[P] {
        return this.table[kind];
    }

    get backend(): OperationsTable['backend'] {
        return this.table.backend;
    }

    get server(): OperationsTable['server'] {
        return this.table.server;
    }

    get frontend(): OperationsTable['frontend'] {
        return this.table.frontend;
    }

    get acl(): OperationsTable['acl'] {
        return this.table.acl;
    }
}
