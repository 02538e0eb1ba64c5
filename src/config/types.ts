import type { DeploymentConfig } from '../types';

// Configuration-specific types
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<DeploymentConfig>;
  validate(config: unknown): ConfigValidationResult;
}

/**
 * Environment variables the loader understands, after `.env` has been read.
 */
export interface EnvironmentOverrides {
  AWS_DEFAULT_REGION?: string;
  AWS_PROFILE?: string;
  EMAIL_NOTIFY?: string;
  DEPLOY_STATE_FILE?: string;
}
