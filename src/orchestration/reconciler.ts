import type { DeploymentRecord, ResourceHandle, ResourceKey, StepOutcome, StepResult } from '../types';
import type { ProvisioningResult } from '../provisioning/types';
import type { StateStore } from '../state/types';
import { FatalDeploymentError } from '../errors';
import type { ResolvedDependencies, ResourceSpec } from './types';

/**
 * Dependency access limited to the keys a step declared.
 */
export class RecordDependencies implements ResolvedDependencies {
  constructor(
    private readonly record: DeploymentRecord,
    private readonly declared: readonly ResourceKey[],
    private readonly dependent: string
  ) {}

  handle(key: ResourceKey): ResourceHandle {
    if (!this.declared.includes(key)) {
      throw new FatalDeploymentError(`${this.dependent} reads ${key} without declaring it as a dependency`, this.dependent);
    }
    const handle = this.record.resources[key];
    if (!handle || handle.status === 'deleted') {
      throw new FatalDeploymentError(`${this.dependent} depends on ${key}, which has not been provisioned`, this.dependent);
    }
    return handle;
  }

  identifier(key: ResourceKey): string {
    return this.handle(key).identifier;
  }

  detail(key: ResourceKey, name: string): string {
    const value = this.handle(key).details?.[name];
    if (!value) {
      throw new FatalDeploymentError(`${key} has no ${name} recorded, required by ${this.dependent}`, this.dependent);
    }
    return value;
  }
}

const CREATE_OUTCOMES: Record<ProvisioningResult['status'], StepOutcome> = {
  created: 'created',
  updated: 'updated',
  unchanged: 'verified'
};

/**
 * Create, converge or skip one resource against remote reality, then persist.
 *
 * A recorded handle is only trusted after the provider confirms the resource
 * still exists; otherwise the resource is created again under a new handle.
 */
export class Reconciler {
  constructor(
    private readonly store: StateStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async reconcile(spec: ResourceSpec, record: DeploymentRecord): Promise<StepResult> {
    const deps = new RecordDependencies(record, spec.dependsOn, spec.key);
    const name = spec.name(record.runSuffix);
    const input = spec.input(deps);
    const prior = record.resources[spec.key];

    let handle: ResourceHandle;
    let outcome: StepOutcome;

    const reusable = prior !== undefined
      && prior.status !== 'deleted'
      && prior.name === name
      && await spec.provider.exists({ name, input, identifier: prior.identifier });

    if (prior && reusable) {
      const described = await spec.provider.describe(prior);
      handle = {
        ...prior,
        status: 'verified',
        details: { ...prior.details, ...described }
      };
      outcome = 'verified';

      // converge compares against what was recorded, not the details just described
      if (spec.provider.converge) {
        const converged = await spec.provider.converge({ name, input, identifier: prior.identifier }, prior);
        handle.details = { ...handle.details, ...converged.details };
        if (converged.status === 'updated') {
          outcome = 'updated';
        }
      }
    } else {
      const created = await spec.provider.create({ name, input });
      handle = {
        kind: spec.kind,
        name,
        identifier: created.identifier,
        status: 'created',
        details: created.details
      };
      outcome = CREATE_OUTCOMES[created.status];
    }

    record.resources[spec.key] = handle;
    if (spec.outputs) {
      record.outputs = { ...record.outputs, ...spec.outputs(handle) };
    }
    record.updatedAt = this.clock().toISOString();
    await this.store.save(record);

    return {
      step: spec.key,
      outcome,
      identifier: handle.identifier
    };
  }
}
