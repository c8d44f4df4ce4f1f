import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { createDataPlaneClient } from '../../../src/dataplane/client';
import type { DataPlaneClient } from '../../../src/dataplane/client';
import type { Sleep } from '../../../src/dataplane/orchestrator';
import {
    BundleValidationError,
    OperationCancelledError,
    ResourceStepError,
    RetriesExhaustedError,
} from '../../../src/dataplane/errors';
import { ROOT } from '../../../src/dataplane/paths';
import { createMockBundle } from '../../helpers/mockHelpers';
import { FakeDataPlane } from '../../helpers/fakeDataPlane';
import type { RecordedRequest } from '../../helpers/fakeDataPlane';

const BASE = '/services/haproxy/configuration';
const TRANSACTIONS = '/services/haproxy/transactions';
const REF = { backend: 'be_app', frontend: 'fe_app' };

function isAclWrite(request: RecordedRequest, method: string, aclName: string): boolean {
    const body = request.body;
    return (
        request.method === method &&
        request.path.includes('/acls') &&
        typeof body === 'object' &&
        body !== null &&
        'acl_name' in body &&
        body.acl_name === aclName
    );
}

describe.each(['v2', 'v3'] as const)('dataplane/client (%s)', (version) => {
    let fake: FakeDataPlane;
    let pause: Mock<Sleep>;
    let client: DataPlaneClient;

    const serversPath = version === 'v3' ? `${BASE}/backends/be_app/servers` : `${BASE}/servers`;
    const aclPath = (index: number) => (version === 'v3' ? `${BASE}/frontends/fe_app/acls/${index}` : `${BASE}/acls`);

    beforeEach(() => {
        fake = new FakeDataPlane({ version });
        pause = vi.fn<Sleep>(async () => undefined);
        client = createDataPlaneClient(fake.config(), { adapter: fake.adapter, sleep: pause });
    });

    it('reports the configured API version', () => {
        expect(client.apiVersion).toBe(version);
    });

    it('creates a bundle in dependency order in one transaction', async () => {
        const result = await client.createAllResources(createMockBundle(2, 3));

        expect(result).toEqual({ attempts: 1, transactionId: 'tx-1', skipped: [] });
        expect(fake.mutations()).toEqual([
            `POST ${BASE}/backends`,
            `POST ${serversPath}`,
            `POST ${serversPath}`,
            `POST ${BASE}/frontends`,
            `POST ${aclPath(0)}`,
            `POST ${aclPath(1)}`,
            `POST ${aclPath(2)}`,
        ]);
        expect(fake.transactionCalls()).toEqual([`POST ${TRANSACTIONS}`, `PUT ${TRANSACTIONS}/tx-1`]);
        expect(pause).not.toHaveBeenCalled();
    });

    it('reads back what it created', async () => {
        const bundle = createMockBundle(2, 2);
        await client.createAllResources(bundle);

        const snapshot = await client.readBundle(REF);
        expect(snapshot).toEqual({
            backend: bundle.backend,
            servers: bundle.servers,
            frontend: bundle.frontend,
            acls: [
                { acl_name: 'is_path_1', criterion: 'path_beg', value: '/p1', index: 0 },
                { acl_name: 'is_path_2', criterion: 'path_beg', value: '/p2', index: 1 },
            ],
        });
    });

    it('reads an absent bundle as empty', async () => {
        await expect(client.readBundle(REF)).resolves.toEqual({ backend: null, servers: [], frontend: null, acls: [] });
    });

    it('rolls back the whole bundle when ACL 2 fails fatally', async () => {
        fake.fail({
            match: (r) => isAclWrite(r, 'POST', 'is_path_2'),
            reply: { status: 400, body: { code: 400, message: 'invalid criterion' } },
        });

        const err = await client.createAllResources(createMockBundle(2, 3)).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(ResourceStepError);
        expect(err).toMatchObject({ step: 'ACL 2', action: 'creation' });
        expect(err).toHaveProperty('message', 'ACL 2 creation failed: API error 400: invalid criterion');
        expect(fake.transactionCalls()).toEqual([`POST ${TRANSACTIONS}`, `DELETE ${TRANSACTIONS}/tx-1`]);
        expect(pause).not.toHaveBeenCalled();
        await expect(client.readBundle(REF)).resolves.toEqual({ backend: null, servers: [], frontend: null, acls: [] });
    });

    it('retries when a transaction cannot be opened', async () => {
        fake.fail({
            method: 'POST',
            path: TRANSACTIONS,
            times: 3,
            reply: { status: 409, body: { code: 409, message: 'version mismatch' } },
        });

        const result = await client.createAllResources(createMockBundle(1, 1));

        expect(result.attempts).toBe(4);
        expect(pause).toHaveBeenCalledTimes(3);
        expect(pause).toHaveBeenCalledWith(0, undefined);
        expect(fake.committedItems('backends')).toEqual([{ name: 'be_app', mode: 'http', balance: { algorithm: 'roundrobin' } }]);
    });

    it('retries a mid-bundle version mismatch in fresh transactions', async () => {
        fake.fail({
            method: 'POST',
            path: '/servers',
            times: 3,
            reply: { status: 409, body: { code: 409, message: 'version mismatch' } },
        });

        const result = await client.createAllResources(createMockBundle(1, 1));

        expect(result).toEqual({ attempts: 4, transactionId: 'tx-4', skipped: [] });
        expect(fake.transactionCalls()).toEqual([
            `POST ${TRANSACTIONS}`,
            `DELETE ${TRANSACTIONS}/tx-1`,
            `POST ${TRANSACTIONS}`,
            `DELETE ${TRANSACTIONS}/tx-2`,
            `POST ${TRANSACTIONS}`,
            `DELETE ${TRANSACTIONS}/tx-3`,
            `POST ${TRANSACTIONS}`,
            `PUT ${TRANSACTIONS}/tx-4`,
        ]);
        expect(pause).toHaveBeenCalledTimes(3);
        expect(fake.configVersion).toBe(2);
        expect(fake.committedItems('backends')).toHaveLength(1);
    });

    it('gives up after the configured attempt budget', async () => {
        client = createDataPlaneClient(fake.config({ retry: { maxAttempts: 2, delayMs: 5 } }), {
            adapter: fake.adapter,
            sleep: pause,
        });
        fake.fail({
            method: 'POST',
            path: TRANSACTIONS,
            times: 5,
            reply: { status: 409, body: { code: 409, message: 'version mismatch' } },
        });

        const err = await client.deleteAllResources(createMockBundle(1, 1)).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(RetriesExhaustedError);
        expect(err).toHaveProperty('message', 'delete bundle failed after 2 attempts: API error 409: version mismatch');
        expect(pause).toHaveBeenCalledWith(5, undefined);
    });

    it('skips an ACL that is already gone and deletes the rest in reverse order', async () => {
        await client.createAllResources(createMockBundle(2, 3));
        const before = fake.requests.length;
        fake.fail({
            method: 'DELETE',
            path: version === 'v3' ? '/frontends/fe_app/acls/1' : '/acls/1',
            reply: { status: 404, body: { code: 404, message: 'missing object' } },
        });

        const result = await client.deleteAllResources(createMockBundle(2, 3));

        expect(result).toEqual({ attempts: 1, transactionId: 'tx-2', skipped: ['ACL 2'] });
        const aclItem = (index: number) =>
            version === 'v3' ? `${BASE}/frontends/fe_app/acls/${index}` : `${BASE}/acls/${index}`;
        const serverItem = (name: string) =>
            version === 'v3' ? `${BASE}/backends/be_app/servers/${name}` : `${BASE}/servers/${name}`;
        expect(
            fake.requests
                .slice(before)
                .filter((r) => r.method === 'DELETE' && r.path.startsWith(BASE))
                .map((r) => r.path)
        ).toEqual([
            aclItem(2),
            aclItem(1),
            aclItem(0),
            `${BASE}/frontends/fe_app`,
            serverItem('app2'),
            serverItem('app1'),
            `${BASE}/backends/be_app`,
        ]);
        await expect(client.readBundle(REF)).resolves.toEqual({ backend: null, servers: [], frontend: null, acls: [] });
    });

    it('aborts a delete when a non-ACL object is missing', async () => {
        const err = await client.deleteAllResources({ frontend: { name: 'fe_app' } }).catch((e: unknown) => e);
        expect(err).toBeInstanceOf(ResourceStepError);
        expect(err).toHaveProperty('message', 'frontend deletion failed: API error 404: missing object');
    });

    it('updates every object of a bundle', async () => {
        await client.createAllResources(createMockBundle(1, 1));

        const changed = createMockBundle(1, 1);
        changed.servers = [{ name: 'app1', address: '10.0.0.9', port: 9090, weight: 50 }];
        changed.acls = [{ acl_name: 'is_path_1', criterion: 'path_end', value: '.json' }];
        await client.updateAllResources(changed);

        const snapshot = await client.readBundle(REF);
        expect(snapshot.servers).toEqual([{ name: 'app1', address: '10.0.0.9', port: 9090, weight: 50 }]);
        expect(snapshot.acls).toEqual([{ acl_name: 'is_path_1', criterion: 'path_end', value: '.json', index: 0 }]);
    });

    it('adds and removes servers and ACLs when updating', async () => {
        await client.createAllResources(createMockBundle(2, 2));
        const before = fake.mutations().length;

        const changed = createMockBundle(0, 1);
        changed.servers = [
            { name: 'app2', address: '10.0.0.22', port: 8080 },
            { name: 'app3', address: '10.0.0.3', port: 8080 },
        ];
        const result = await client.updateAllResources(changed);

        expect(result).toEqual({ attempts: 1, transactionId: 'tx-2', skipped: [] });
        const serverItem = (name: string) =>
            version === 'v3' ? `${BASE}/backends/be_app/servers/${name}` : `${BASE}/servers/${name}`;
        const aclItem = (index: number) =>
            version === 'v3' ? `${BASE}/frontends/fe_app/acls/${index}` : `${BASE}/acls/${index}`;
        expect(fake.mutations().slice(before)).toEqual([
            `PUT ${BASE}/backends/be_app`,
            `DELETE ${serverItem('app1')}`,
            `PUT ${serverItem('app2')}`,
            `POST ${serversPath}`,
            `PUT ${BASE}/frontends/fe_app`,
            `PUT ${aclItem(0)}`,
            `DELETE ${aclItem(1)}`,
        ]);

        const snapshot = await client.readBundle(REF);
        expect(snapshot.servers).toEqual([
            { name: 'app2', address: '10.0.0.22', port: 8080 },
            { name: 'app3', address: '10.0.0.3', port: 8080 },
        ]);
        expect(snapshot.acls).toEqual([{ acl_name: 'is_path_1', criterion: 'path_beg', value: '/p1', index: 0 }]);
    });

    it('validates the bundle before touching the network', async () => {
        await expect(client.createAllResources({ servers: [{ name: 's', address: '10.0.0.1' }] })).rejects.toBeInstanceOf(
            BundleValidationError
        );
        expect(fake.requests).toHaveLength(0);
    });

    it('stops and rolls back when cancelled mid-bundle', async () => {
        const controller = new AbortController();
        fake.onRequest((r) => {
            if (r.method === 'POST' && r.path === `${BASE}/frontends`) controller.abort();
        });

        await expect(client.createAllResources(createMockBundle(1, 1), controller.signal)).rejects.toBeInstanceOf(
            OperationCancelledError
        );
        expect(fake.openTransactions()).toEqual([]);
        expect(fake.committedItems('backends')).toEqual([]);
        expect(pause).not.toHaveBeenCalled();
    });

    it('runs ad-hoc work in a single transaction', async () => {
        const tables = client.resources.forKind('stickTable');
        await client.withTransaction((tx) => tables.create(ROOT, { name: 'st_src', type: 'ip', size: 1000 }, tx));

        await expect(tables.list(ROOT)).resolves.toEqual([{ name: 'st_src', type: 'ip', size: 1000 }]);
    });

    it('retries custom work through the orchestrator', async () => {
        let calls = 0;
        const outcome = await client.withRetries('touch global', async () => {
            calls += 1;
            if (calls === 1) throw new Error('Transaction tx-1 is outdated');
            return 'ok';
        });
        expect(outcome).toEqual({ attempts: 2, transactionId: 'tx-2', result: 'ok' });
    });
});
