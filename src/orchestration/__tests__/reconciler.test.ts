import { describe, it, expect, beforeEach } from 'vitest';
import { RecordDependencies, Reconciler } from '../reconciler';
import { MemoryStateStore } from '../../state';
import type { DeploymentRecord, ResourceHandle } from '../../types';
import type { BucketInput, ProvisionTarget, ProvisioningResult } from '../../provisioning/types';
import type { ResourceSpec } from '../types';
import { FakeCloud, FakeProvider } from './fake-providers';

const SUFFIX = '20240101-abcd1234';

function emptyRecord(): DeploymentRecord {
  return {
    runSuffix: SUFFIX,
    resources: {},
    outputs: {},
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z'
  };
}

class ConvergingProvider extends FakeProvider<BucketInput> {
  convergeStatus: ProvisioningResult['status'] = 'unchanged';
  converged: string[] = [];
  convergedHandles: ResourceHandle[] = [];

  async converge(target: ProvisionTarget<BucketInput>, handle: ResourceHandle): Promise<ProvisioningResult> {
    this.converged.push(target.name);
    this.convergedHandles.push(handle);
    return { identifier: handle.identifier, status: this.convergeStatus, details: { website: 'enabled' } };
  }
}

describe('RecordDependencies', () => {
  const record: DeploymentRecord = {
    ...emptyRecord(),
    resources: {
      'inventory-table': {
        kind: 'table',
        name: 'Inventory',
        identifier: 'arn:aws:dynamodb:us-east-1:111122223333:table/Inventory',
        status: 'created',
        details: { streamArn: '' }
      },
      'notification-topic': {
        kind: 'topic',
        name: 'NoStock-20240101-abcd1234',
        identifier: 'arn:aws:sns:us-east-1:111122223333:NoStock-20240101-abcd1234',
        status: 'deleted'
      }
    }
  };

  it('should expose declared handles', () => {
    const deps = new RecordDependencies(record, ['inventory-table'], 'loader-function');

    expect(deps.identifier('inventory-table')).toBe('arn:aws:dynamodb:us-east-1:111122223333:table/Inventory');
    expect(deps.handle('inventory-table').name).toBe('Inventory');
  });

  it('should refuse undeclared reads', () => {
    const deps = new RecordDependencies(record, [], 'loader-function');

    expect(() => deps.handle('inventory-table'))
      .toThrow('loader-function reads inventory-table without declaring it as a dependency');
  });

  it('should refuse missing and deleted handles', () => {
    const deps = new RecordDependencies(record, ['execution-role', 'notification-topic'], 'notify-function');

    expect(() => deps.identifier('execution-role'))
      .toThrow('notify-function depends on execution-role, which has not been provisioned');
    expect(() => deps.identifier('notification-topic'))
      .toThrow('notify-function depends on notification-topic, which has not been provisioned');
  });

  it('should refuse empty details', () => {
    const deps = new RecordDependencies(record, ['inventory-table'], 'stream-trigger');

    expect(() => deps.detail('inventory-table', 'streamArn'))
      .toThrow('inventory-table has no streamArn recorded, required by stream-trigger');
  });
});

describe('Reconciler', () => {
  let cloud: FakeCloud;
  let provider: ConvergingProvider;
  let store: MemoryStateStore;
  let reconciler: Reconciler;
  let spec: ResourceSpec<BucketInput>;

  beforeEach(() => {
    cloud = new FakeCloud();
    provider = new ConvergingProvider(cloud, 'storage', { details: name => ({ bucketName: name }) });
    store = new MemoryStateStore();
    reconciler = new Reconciler(store, () => new Date('2024-02-02T00:00:00Z'));
    spec = {
      key: 'web-bucket',
      kind: 'storage',
      dependsOn: [],
      provider,
      name: runSuffix => `web-${runSuffix}`,
      input: () => ({ tags: {} }),
      outputs: handle => ({ webBucket: handle.name })
    };
  });

  it('should create a missing resource and persist its handle', async () => {
    const record = emptyRecord();

    const result = await reconciler.reconcile(spec, record);

    expect(result).toEqual({ step: 'web-bucket', outcome: 'created', identifier: 'fake:storage:web-20240101-abcd1234:1' });
    expect(cloud.calls).toEqual(['create web-20240101-abcd1234']);

    const saved = await store.load();
    expect(saved?.resources['web-bucket']).toEqual({
      kind: 'storage',
      name: 'web-20240101-abcd1234',
      identifier: 'fake:storage:web-20240101-abcd1234:1',
      status: 'created',
      details: { bucketName: 'web-20240101-abcd1234' }
    });
    expect(saved?.outputs).toEqual({ webBucket: 'web-20240101-abcd1234' });
    expect(saved?.updatedAt).toBe('2024-02-02T00:00:00.000Z');
  });

  it('should verify and converge a recorded resource that still exists', async () => {
    const record = emptyRecord();
    await reconciler.reconcile(spec, record);
    cloud.calls.length = 0;

    const result = await reconciler.reconcile(spec, record);

    expect(result.outcome).toBe('verified');
    expect(cloud.calls).toEqual(['exists web-20240101-abcd1234', 'describe web-20240101-abcd1234']);
    expect(provider.converged).toEqual(['web-20240101-abcd1234']);
    expect(record.resources['web-bucket']).toMatchObject({
      status: 'verified',
      details: { bucketName: 'web-20240101-abcd1234', website: 'enabled' }
    });
  });

  it('should converge against the recorded details, not the freshly described ones', async () => {
    const record = emptyRecord();
    await reconciler.reconcile(spec, record);
    const live = cloud.get('storage', 'web-20240101-abcd1234');
    if (live) {
      cloud.put({ ...live, details: { bucketName: 'web-20240101-abcd1234', policy: 'edited' } });
    }

    await reconciler.reconcile(spec, record);

    expect(provider.convergedHandles.map(handle => handle.details)).toEqual([{ bucketName: 'web-20240101-abcd1234' }]);
    expect(record.resources['web-bucket']?.details).toEqual({
      bucketName: 'web-20240101-abcd1234',
      policy: 'edited',
      website: 'enabled'
    });
  });

  it('should report a converge that changed something as updated', async () => {
    const record = emptyRecord();
    await reconciler.reconcile(spec, record);
    provider.convergeStatus = 'updated';

    const result = await reconciler.reconcile(spec, record);

    expect(result.outcome).toBe('updated');
  });

  it('should recreate a recorded resource that no longer exists', async () => {
    const record = emptyRecord();
    await reconciler.reconcile(spec, record);
    cloud.remove('storage', 'web-20240101-abcd1234');
    cloud.calls.length = 0;

    const result = await reconciler.reconcile(spec, record);

    expect(result).toEqual({ step: 'web-bucket', outcome: 'created', identifier: 'fake:storage:web-20240101-abcd1234:2' });
    expect(cloud.calls).toEqual(['exists web-20240101-abcd1234', 'create web-20240101-abcd1234']);
  });

  it('should not trust a handle recorded under another name', async () => {
    const record = emptyRecord();
    record.resources['web-bucket'] = {
      kind: 'storage',
      name: 'web-renamed',
      identifier: 'fake:storage:web-renamed:9',
      status: 'created'
    };

    const result = await reconciler.reconcile(spec, record);

    expect(result.outcome).toBe('created');
    expect(cloud.calls).toEqual(['create web-20240101-abcd1234']);
  });

  it('should not trust a handle marked deleted', async () => {
    const record = emptyRecord();
    await reconciler.reconcile(spec, record);
    const existing = record.resources['web-bucket'];
    if (existing) {
      record.resources['web-bucket'] = { ...existing, status: 'deleted' };
    }
    cloud.calls.length = 0;

    const result = await reconciler.reconcile(spec, record);

    expect(result.outcome).toBe('verified');
    expect(cloud.calls).toEqual(['create web-20240101-abcd1234']);
  });

  it('should leave the record unsaved when the provider fails', async () => {
    const record = emptyRecord();
    cloud.failOnce('create', 'web-20240101-abcd1234');

    await expect(reconciler.reconcile(spec, record)).rejects.toThrow('create web-20240101-abcd1234 failed');
    expect(record.resources['web-bucket']).toBeUndefined();
    await expect(store.load()).resolves.toBeNull();
  });
});
