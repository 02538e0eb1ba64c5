import { describe, it, expect, beforeEach } from 'vitest';
import { DeploymentOrchestrator, type OrchestratorDependencies } from '../deployment-orchestrator';
import { TeardownEngine } from '../teardown-engine';
import { ResourceNamingService } from '../../config/naming';
import { MemoryStateStore } from '../../state';
import { RecordingReporter, testConfig } from '../../__tests__/helpers';
import type { DeploymentConfig, DeploymentRecord } from '../../types';
import { FakeCloud, ROLE_ARN, createFakeProviders } from './fake-providers';

const SUFFIX = '20240101-abcd1234';

class FixedNaming extends ResourceNamingService {
  generateRunSuffix(now: Date = new Date()): string {
    return super.generateRunSuffix(now, 'abcd1234-0000-4000-8000-000000000000');
  }
}

class FailingSaveStore extends MemoryStateStore {
  failNextSave = false;

  async save(record: DeploymentRecord): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new Error('No space left on device');
    }
    return super.save(record);
  }
}

const DELETION_ORDER = [
  'InventoryAPI',
  'NotifyLowStockFunction-stream',
  'inventory-uploads-20240101-abcd1234-csv-loader',
  'NotifyLowStockFunction',
  'GetInventoryApiFunction',
  'LoadInventoryFunction',
  'Inventory',
  'NoStock-20240101-abcd1234',
  'inventory-web-20240101-abcd1234',
  'inventory-uploads-20240101-abcd1234'
];

describe('TeardownEngine', () => {
  let cloud: FakeCloud;
  let stateStore: FailingSaveStore;
  let reporter: RecordingReporter;
  let config: DeploymentConfig;
  let deps: OrchestratorDependencies;

  beforeEach(() => {
    cloud = new FakeCloud();
    stateStore = new FailingSaveStore();
    reporter = new RecordingReporter();
    config = testConfig({ site: { index_file: 'does-not-exist/index.html' }, data: { seed: false } });
    deps = {
      providers: createFakeProviders(cloud),
      stateStore,
      reporter,
      naming: new FixedNaming(),
      clock: () => new Date('2024-01-01T12:00:00Z')
    };
  });

  async function deploy(): Promise<void> {
    const result = await new DeploymentOrchestrator(config, deps).apply();
    expect(result.success).toBe(true);
    cloud.calls.length = 0;
    reporter.infos.length = 0;
    reporter.warnings.length = 0;
    reporter.steps.length = 0;
  }

  it('should delete by kind, dependents first within a kind', () => {
    expect(new TeardownEngine(config, deps).plan().map(spec => spec.key)).toEqual([
      'inventory-api',
      'stream-trigger',
      'uploads-trigger',
      'notify-function',
      'api-function',
      'loader-function',
      'inventory-table',
      'notification-topic',
      'web-bucket',
      'uploads-bucket'
    ]);
  });

  it('should do nothing without a deployment record', async () => {
    const result = await new TeardownEngine(config, deps).destroy();

    expect(result.success).toBe(true);
    expect(result.steps).toEqual([]);
    expect(cloud.calls).toEqual([]);
    expect(reporter.infos).toEqual(['No deployment record found, nothing to tear down']);
  });

  it('should delete every resource, keep the role and clear the record', async () => {
    await deploy();

    const result = await new TeardownEngine(config, deps).destroy();

    expect(result.success).toBe(true);
    expect(cloud.callsTo('delete')).toEqual(DELETION_ORDER);
    expect(cloud.names()).toEqual(['LabRole']);
    expect(result.steps.filter(step => step.outcome === 'deleted')).toHaveLength(10);
    expect(result.steps[result.steps.length - 1]).toEqual({
      step: 'execution-role',
      outcome: 'skipped',
      identifier: ROLE_ARN,
      message: 'externally managed'
    });
    expect(result.outputs).toEqual({});
    expect(result.metadata.runSuffix).toBe(SUFFIX);
    await expect(stateStore.load()).resolves.toBeNull();
    expect(reporter.infos).toEqual([`Deployment ${SUFFIX} removed`]);
  });

  it('should continue past a failed deletion and keep the record for a retry', async () => {
    await deploy();
    cloud.failOnce('delete', 'Inventory');

    const result = await new TeardownEngine(config, deps).destroy();

    expect(result.success).toBe(false);
    expect(cloud.callsTo('delete')).toEqual(DELETION_ORDER);
    expect(result.errors).toEqual([{
      code: 'DEPLOYMENT_FAILED',
      message: 'delete Inventory failed',
      resource: 'inventory-table',
      remediation: 'Check the AWS error above, then re-run the command to resume'
    }]);
    expect(result.outputs).toEqual({ apiUrl: 'https://InventoryAPI.example.test/prod' });
    expect(reporter.warnings).toEqual(['1 resource(s) could not be deleted; run destroy again to retry']);

    const record = await stateStore.load();
    expect(record?.resources['inventory-table']?.status).toBe('created');
    expect(record?.resources['web-bucket']?.status).toBe('deleted');

    cloud.calls.length = 0;
    const retry = await new TeardownEngine(config, deps).destroy();

    expect(retry.success).toBe(true);
    expect(cloud.callsTo('delete')).toEqual(['Inventory']);
    expect(retry.steps.filter(step => step.outcome === 'absent')).toHaveLength(9);
    expect(retry.steps.find(step => step.step === 'inventory-table')?.outcome).toBe('deleted');
    await expect(stateStore.load()).resolves.toBeNull();
  });

  it('should keep deleting when the record cannot be saved after one deletion', async () => {
    await deploy();
    stateStore.failNextSave = true;

    const result = await new TeardownEngine(config, deps).destroy();

    expect(result.success).toBe(false);
    expect(cloud.callsTo('delete')).toEqual(DELETION_ORDER);
    expect(result.errors).toEqual([{
      code: 'DEPLOYMENT_FAILED',
      message: 'No space left on device',
      resource: 'inventory-api',
      remediation: 'Check the AWS error above, then re-run the command to resume'
    }]);
    expect(result.steps.filter(step => step.outcome === 'deleted')).toHaveLength(9);
    await expect(stateStore.load()).resolves.not.toBeNull();
  });

  it('should treat resources already gone as deleted', async () => {
    await deploy();
    cloud.remove('topic', 'NoStock-20240101-abcd1234');

    const result = await new TeardownEngine(config, deps).destroy();

    expect(result.success).toBe(true);
    expect(result.steps.find(step => step.step === 'notification-topic')?.outcome).toBe('deleted');
  });
});
