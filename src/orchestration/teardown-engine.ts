import type {
  DeploymentConfig,
  DeploymentError,
  DeploymentRecord,
  DeploymentResult,
  ResourceKind,
  StepResult
} from '../types';
import type { StateStore } from '../state/types';
import type { DeploymentReporter } from '../logging';
import { toDeploymentError } from '../errors';
import { topologicalOrder } from './dependency-graph';
import { buildResourceSpecs } from './resource-specs';
import { resolveDependencies, type OrchestratorDependencies } from './deployment-orchestrator';
import type { ResourceSpec } from './types';

/**
 * Kinds in deletion order. Roles are externally owned and never deleted.
 */
export const TEARDOWN_KIND_ORDER: readonly ResourceKind[] = ['gateway', 'trigger', 'function', 'table', 'topic', 'storage'];

/**
 * Deletes everything the record names. Missing resources count as deleted,
 * and one failed deletion does not stop the others.
 */
export class TeardownEngine {
  private readonly reporter: DeploymentReporter;
  private readonly stateStore: StateStore;
  private readonly clock: () => Date;
  private readonly specs: ResourceSpec[];

  constructor(private readonly config: DeploymentConfig, deps: OrchestratorDependencies = {}) {
    const resolved = resolveDependencies(config, deps);
    this.reporter = resolved.reporter;
    this.stateStore = resolved.stateStore;
    this.clock = resolved.clock;
    this.specs = buildResourceSpecs(config, resolved.providers, resolved.naming);
  }

  /**
   * Resource keys in deletion order: by kind, then reverse dependency order within a kind.
   */
  plan(): ResourceSpec[] {
    const reversed = topologicalOrder(this.specs.map(spec => ({ id: spec.key, dependsOn: spec.dependsOn, spec })))
      .map(node => node.spec)
      .reverse();

    return TEARDOWN_KIND_ORDER.flatMap(kind => reversed.filter(spec => spec.kind === kind));
  }

  async destroy(): Promise<DeploymentResult> {
    const startTime = Date.now();
    const steps: StepResult[] = [];
    const errors: DeploymentError[] = [];
    let record: DeploymentRecord | null = null;

    try {
      record = await this.stateStore.load();
      if (!record) {
        this.reporter.info('No deployment record found, nothing to tear down');
      } else {
        await this.deleteResources(record, steps, errors);

        if (errors.length === 0) {
          await this.stateStore.clear();
          this.reporter.info(`Deployment ${record.runSuffix} removed`);
        } else {
          this.reporter.warn(`${errors.length} resource(s) could not be deleted; run destroy again to retry`);
        }
      }
    } catch (error) {
      const deploymentError = toDeploymentError(error);
      errors.push(deploymentError);
      this.reporter.error(deploymentError.message, error);
    }

    return {
      success: errors.length === 0,
      steps,
      outputs: errors.length > 0 && record ? record.outputs : {},
      errors: errors.length > 0 ? errors : undefined,
      metadata: {
        runSuffix: record?.runSuffix,
        timestamp: this.clock(),
        duration: Date.now() - startTime,
        region: this.config.aws.region
      }
    };
  }

  private async deleteResources(record: DeploymentRecord, steps: StepResult[], errors: DeploymentError[]): Promise<void> {
    const report = (result: StepResult) => {
      steps.push(result);
      this.reporter.step(result);
    };

    for (const spec of this.plan()) {
      const handle = record.resources[spec.key];
      if (!handle) {
        continue;
      }
      if (handle.status === 'deleted') {
        report({ step: spec.key, outcome: 'absent', identifier: handle.identifier });
        continue;
      }

      try {
        await spec.provider.delete(handle);
        record.resources[spec.key] = { ...handle, status: 'deleted' };
        record.updatedAt = this.clock().toISOString();
        await this.stateStore.save(record);
      } catch (error) {
        const deploymentError = toDeploymentError(error, spec.key);
        errors.push(deploymentError);
        report({ step: spec.key, outcome: 'failed', identifier: handle.identifier, message: deploymentError.message });
        continue;
      }

      report({ step: spec.key, outcome: 'deleted', identifier: handle.identifier });
    }

    const role = record.resources['execution-role'];
    if (role) {
      report({ step: 'execution-role', outcome: 'skipped', identifier: role.identifier, message: 'externally managed' });
    }
  }
}
