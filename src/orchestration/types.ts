import type {
  DeploymentRecord,
  ResourceHandle,
  ResourceKey,
  ResourceKind,
  StepOutcome
} from '../types';
import type { ResourceProvider } from '../provisioning/types';
import type { DeploymentReporter } from '../logging';

// Orchestration-specific types

/**
 * Read access to the handles a step declared in `dependsOn`.
 * Every accessor throws a fatal error when the handle or value is missing.
 */
export interface ResolvedDependencies {
  handle(key: ResourceKey): ResourceHandle;
  identifier(key: ResourceKey): string;
  detail(key: ResourceKey, name: string): string;
}

/**
 * One declared resource. Never persisted; rebuilt from configuration on every run.
 */
export interface ResourceSpec<TInput = unknown> {
  key: ResourceKey;
  kind: ResourceKind;
  dependsOn: readonly ResourceKey[];
  provider: ResourceProvider<TInput>;
  /** Deterministic physical name for a run suffix. */
  name(runSuffix: string): string;
  input(deps: ResolvedDependencies): TInput;
  /** Values published into the record's outputs once the resource is reconciled. */
  outputs?(handle: ResourceHandle): Record<string, string>;
}

export interface TaskContext {
  record: DeploymentRecord;
  deps: ResolvedDependencies;
  reporter: DeploymentReporter;
}

export interface TaskResult {
  outcome: StepOutcome;
  identifier?: string;
  message?: string;
  outputs?: Record<string, string>;
}

/**
 * A non-resource step (site publication, data seeding) ordered in the same graph.
 */
export interface PipelineTask {
  name: string;
  dependsOn: readonly ResourceKey[];
  run(context: TaskContext): Promise<TaskResult>;
}

export type PipelineStep =
  | { type: 'resource'; id: ResourceKey; dependsOn: readonly string[]; spec: ResourceSpec }
  | { type: 'task'; id: string; dependsOn: readonly string[]; task: PipelineTask };
