// Error taxonomy shared by providers, the reconciler and the teardown engine
import type { DeploymentError } from '../types';

export type DeploymentErrorCode = 'ALREADY_EXISTS' | 'NOT_FOUND' | 'PROPAGATION_TIMEOUT' | 'FATAL';

export class DeploymentStepError extends Error {
  readonly code: DeploymentErrorCode;
  readonly resource?: string;

  constructor(message: string, code: DeploymentErrorCode, resource?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeploymentStepError';
    this.code = code;
    this.resource = resource;
  }
}

/**
 * Raised when a dependent resource did not become ready within the propagation bound.
 */
export class PropagationTimeoutError extends DeploymentStepError {
  constructor(description: string, timeoutMs: number, resource?: string) {
    super(`Timed out after ${timeoutMs / 1000} seconds waiting for ${description}`, 'PROPAGATION_TIMEOUT', resource);
    this.name = 'PropagationTimeoutError';
  }
}

/**
 * Malformed local input, missing local assets, unresolved dependencies.
 */
export class FatalDeploymentError extends DeploymentStepError {
  constructor(message: string, resource?: string, options?: { cause?: unknown }) {
    super(message, 'FATAL', resource, options);
    this.name = 'FatalDeploymentError';
  }
}

const ALREADY_EXISTS_NAMES = new Set([
  'BucketAlreadyOwnedByYou',
  'ResourceInUseException',
  'ResourceConflictException',
  'ConflictException',
  'EntityAlreadyExistsException'
]);

const NOT_FOUND_NAMES = new Set([
  'NotFound',
  'NoSuchBucket',
  'NoSuchEntity',
  'NoSuchEntityException',
  'NotFoundException',
  'ResourceNotFoundException'
]);

export function errorName(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.name;
  }
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

export function httpStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
    return metadata.httpStatusCode;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function isAlreadyExistsError(error: unknown): boolean {
  const name = errorName(error);
  return name !== undefined && ALREADY_EXISTS_NAMES.has(name);
}

export function isNotFoundError(error: unknown): boolean {
  const name = errorName(error);
  if (name !== undefined && NOT_FOUND_NAMES.has(name)) {
    return true;
  }
  return httpStatusCode(error) === 404;
}

export function isAccessDeniedError(error: unknown): boolean {
  const name = errorName(error);
  return name === 'AccessDenied' || name === 'AccessDeniedException' || httpStatusCode(error) === 403;
}

const REMEDIATIONS: Record<DeploymentErrorCode | 'DEPLOYMENT_FAILED', string> = {
  ALREADY_EXISTS: 'The name is taken outside this deployment; rename the resource in the configuration',
  NOT_FOUND: 'Re-run the command; missing resources are recreated or skipped',
  PROPAGATION_TIMEOUT: 'Re-run the command; completed steps are verified and skipped',
  FATAL: 'Fix the configuration or local assets, then re-run the command',
  DEPLOYMENT_FAILED: 'Check the AWS error above, then re-run the command to resume'
};

/**
 * First {@link DeploymentStepError} in the error's cause chain.
 */
export function findStepError(error: unknown): DeploymentStepError | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 10 && current !== undefined; depth++) {
    if (current instanceof DeploymentStepError) {
      return current;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

export function toDeploymentError(error: unknown, resource?: string): DeploymentError {
  const stepError = findStepError(error);
  const code = stepError?.code ?? 'DEPLOYMENT_FAILED';
  return {
    code,
    message: errorMessage(error),
    resource: resource ?? stepError?.resource,
    remediation: REMEDIATIONS[code]
  };
}
