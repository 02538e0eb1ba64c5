import type { DeploymentConfig, StepResult } from '../types';
import { validateAndNormalizeConfig } from '../config/validator';
import type { DeploymentReporter } from '../logging';
import type { ProviderSettings } from '../provisioning/types';

/**
 * Reporter that keeps every line for assertions.
 */
export class RecordingReporter implements DeploymentReporter {
  readonly steps: StepResult[] = [];
  readonly infos: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  step(result: StepResult): void {
    this.steps.push(result);
  }

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export function testConfig(overrides: Record<string, unknown> = {}): DeploymentConfig {
  return validateAndNormalizeConfig(overrides);
}

export function testSettings(reporter: DeploymentReporter = new RecordingReporter()): ProviderSettings {
  return {
    region: 'us-east-1',
    propagationTimeoutMs: 0,
    propagationIntervalMs: 0,
    reporter
  };
}

/**
 * An AWS SDK style service exception.
 */
export function awsError(name: string, httpStatusCode?: number, message: string = name): Error {
  return Object.assign(new Error(message), {
    name,
    $metadata: httpStatusCode === undefined ? {} : { httpStatusCode }
  });
}
