import { describe, it, expect } from 'vitest';
import {
    collectionPath,
    itemPath,
    parentScope,
    ROOT,
    sectionScope,
    transactionPath,
    withTransaction,
} from '../../../src/dataplane/paths';
import type { PathTarget } from '../../../src/dataplane/paths';

const frontends: PathTarget = { kind: 'frontend', collection: 'frontends', scope: { kind: 'root' } };
const acls: PathTarget = { kind: 'acl', collection: 'acls', scope: { kind: 'parent', parentTypes: ['frontend', 'backend'] } };
const servers: PathTarget = { kind: 'server', collection: 'servers', scope: { kind: 'parent', parentTypes: ['backend'] } };
const nameservers: PathTarget = { kind: 'nameserver', collection: 'nameservers', scope: { kind: 'section', param: 'resolver' } };

describe('dataplane/paths', () => {
    it('builds root collections the same way in both versions', () => {
        for (const version of ['v2', 'v3'] as const) {
            expect(collectionPath(version, frontends, ROOT)).toEqual({
                path: '/services/haproxy/configuration/frontends',
                query: {},
            });
            expect(itemPath(version, frontends, ROOT, 'fe app')).toEqual({
                path: '/services/haproxy/configuration/frontends/fe%20app',
                query: {},
            });
        }
    });

    it('nests parent-scoped objects in v3', () => {
        expect(itemPath('v3', acls, parentScope('frontend', 'fe/1'), 2)).toEqual({
            path: '/services/haproxy/configuration/frontends/fe%2F1/acls/2',
            query: {},
        });
        expect(collectionPath('v3', servers, parentScope('backend', 'be_app'))).toEqual({
            path: '/services/haproxy/configuration/backends/be_app/servers',
            query: {},
        });
    });

    it('uses parent_type and parent_name in v2', () => {
        expect(itemPath('v2', acls, parentScope('backend', 'be_app'), 0)).toEqual({
            path: '/services/haproxy/configuration/acls/0',
            query: { parent_type: 'backend', parent_name: 'be_app' },
        });
    });

    it('addresses section children through their query parameter in both versions', () => {
        const expected = {
            path: '/services/haproxy/configuration/nameservers/dns1',
            query: { resolver: 'internal' },
        };
        expect(itemPath('v2', nameservers, sectionScope('internal'), 'dns1')).toEqual(expected);
        expect(itemPath('v3', nameservers, sectionScope('internal'), 'dns1')).toEqual(expected);
    });

    it('refuses a scope the object cannot live in', () => {
        expect(() => collectionPath('v3', servers, parentScope('frontend', 'fe'))).toThrow(
            'server cannot be addressed under frontend "fe"'
        );
        expect(() => collectionPath('v3', frontends, sectionScope('x'))).toThrow(
            'frontend cannot be addressed under section "x"'
        );
        expect(() => collectionPath('v2', acls, ROOT)).toThrow('acl cannot be addressed under root scope');
    });

    it('adds the transaction id without touching the original query', () => {
        const query = { parent_type: 'frontend', parent_name: 'fe' };
        expect(withTransaction(query, 'tx-1')).toEqual({ ...query, transaction_id: 'tx-1' });
        expect(query).not.toHaveProperty('transaction_id');
    });

    it('encodes transaction ids', () => {
        expect(transactionPath('a b')).toBe('/services/haproxy/transactions/a%20b');
    });
});
