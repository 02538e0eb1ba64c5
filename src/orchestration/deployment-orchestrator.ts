import type {
  DeploymentConfig,
  DeploymentError,
  DeploymentRecord,
  DeploymentResult,
  StepResult
} from '../types';
import type { ResourceProviders } from '../provisioning/types';
import { createAwsProviders } from '../provisioning';
import type { StateStore } from '../state/types';
import { FileStateStore } from '../state/file-state-store';
import { ConsoleReporter, type DeploymentReporter } from '../logging';
import { ResourceNamingService } from '../config/naming';
import { toDeploymentError } from '../errors';
import { topologicalOrder } from './dependency-graph';
import { buildResourceSpecs } from './resource-specs';
import { buildPipelineTasks } from './pipeline-tasks';
import { RecordDependencies, Reconciler } from './reconciler';
import type { PipelineStep, PipelineTask, ResourceSpec } from './types';

export interface OrchestratorDependencies {
  providers?: ResourceProviders;
  stateStore?: StateStore;
  reporter?: DeploymentReporter;
  naming?: ResourceNamingService;
  clock?: () => Date;
}

/**
 * Adapters and stores for one configuration; anything not injected is built
 * from the configuration.
 */
export function resolveDependencies(config: DeploymentConfig, deps: OrchestratorDependencies) {
  const reporter = deps.reporter ?? new ConsoleReporter();
  return {
    reporter,
    providers: deps.providers ?? createAwsProviders({
      region: config.aws.region,
      profile: config.aws.profile,
      propagationTimeoutMs: config.propagation.timeout_seconds * 1000,
      propagationIntervalMs: config.propagation.interval_seconds * 1000,
      reporter
    }),
    stateStore: deps.stateStore ?? new FileStateStore(config.state.file),
    naming: deps.naming ?? new ResourceNamingService(),
    clock: deps.clock ?? (() => new Date())
  };
}

/**
 * Runs every resource and pipeline task in dependency order against the
 * persisted record. A failed run stops at the failing step and leaves the
 * record as far as it got; the next apply resumes from there.
 */
export class DeploymentOrchestrator {
  private readonly reporter: DeploymentReporter;
  private readonly stateStore: StateStore;
  private readonly naming: ResourceNamingService;
  private readonly clock: () => Date;
  private readonly specs: ResourceSpec[];
  private readonly tasks: PipelineTask[];

  constructor(private readonly config: DeploymentConfig, deps: OrchestratorDependencies = {}) {
    const resolved = resolveDependencies(config, deps);
    this.reporter = resolved.reporter;
    this.stateStore = resolved.stateStore;
    this.naming = resolved.naming;
    this.clock = resolved.clock;
    this.specs = buildResourceSpecs(config, resolved.providers, resolved.naming);
    this.tasks = buildPipelineTasks(config, resolved.providers.storage);
  }

  /**
   * Step ids in execution order. Validates the graph without touching AWS.
   */
  plan(): string[] {
    return this.orderedSteps().map(step => step.id);
  }

  async apply(): Promise<DeploymentResult> {
    const startTime = Date.now();
    const steps: StepResult[] = [];
    const errors: DeploymentError[] = [];
    let record: DeploymentRecord | null = null;
    let current: string | undefined;

    try {
      const ordered = this.orderedSteps();
      record = await this.loadOrCreateRecord();
      const reconciler = new Reconciler(this.stateStore, this.clock);

      for (const step of ordered) {
        current = step.id;
        const result = step.type === 'resource'
          ? await reconciler.reconcile(step.spec, record)
          : await this.runTask(step.task, record);
        steps.push(result);
        this.reporter.step(result);

        if (result.outcome === 'failed') {
          errors.push({ code: 'TASK_FAILED', message: result.message ?? `${step.id} failed`, resource: step.id });
        }
      }
    } catch (error) {
      const deploymentError = toDeploymentError(error, current);
      if (current) {
        const failed: StepResult = { step: current, outcome: 'failed', message: deploymentError.message };
        steps.push(failed);
        this.reporter.step(failed);
      }
      errors.push(deploymentError);
      this.reporter.error(deploymentError.message, error);
    }

    return {
      success: errors.length === 0,
      steps,
      outputs: record?.outputs ?? {},
      errors: errors.length > 0 ? errors : undefined,
      metadata: {
        runSuffix: record?.runSuffix,
        timestamp: this.clock(),
        duration: Date.now() - startTime,
        region: this.config.aws.region
      }
    };
  }

  async status(): Promise<DeploymentRecord | null> {
    return this.stateStore.load();
  }

  private orderedSteps(): PipelineStep[] {
    const steps: PipelineStep[] = [
      ...this.specs.map((spec): PipelineStep => ({ type: 'resource', id: spec.key, dependsOn: spec.dependsOn, spec })),
      ...this.tasks.map((task): PipelineStep => ({ type: 'task', id: task.name, dependsOn: task.dependsOn, task }))
    ];
    return topologicalOrder(steps);
  }

  /**
   * The run suffix is generated once and persisted before any resource is touched.
   */
  private async loadOrCreateRecord(): Promise<DeploymentRecord> {
    const existing = await this.stateStore.load();
    if (existing) {
      this.reporter.info(`Resuming deployment ${existing.runSuffix}`);
      return existing;
    }

    const now = this.clock();
    const record: DeploymentRecord = {
      runSuffix: this.naming.generateRunSuffix(now),
      resources: {},
      outputs: {},
      createdAt: now.toISOString(),
      updatedAt: now.toISOString()
    };
    await this.stateStore.save(record);
    this.reporter.info(`Starting new deployment ${record.runSuffix}`);
    return record;
  }

  private async runTask(task: PipelineTask, record: DeploymentRecord): Promise<StepResult> {
    const result = await task.run({
      record,
      deps: new RecordDependencies(record, task.dependsOn, task.name),
      reporter: this.reporter
    });

    if (result.outputs) {
      record.outputs = { ...record.outputs, ...result.outputs };
      record.updatedAt = this.clock().toISOString();
      await this.stateStore.save(record);
    }

    return {
      step: task.name,
      outcome: result.outcome,
      identifier: result.identifier,
      message: result.message
    };
  }
}
