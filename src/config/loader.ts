// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { DeploymentConfig } from '../types';
import type { ConfigLoader, ConfigValidationResult, EnvironmentOverrides } from './types';
import { validateAndNormalizeConfig, validateConfig } from './validator';

type ConfigTree = { [key: string]: ConfigValue };
type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigTree;

export const DEFAULT_CONFIG_PATHS = ['./deploy.yml', './deploy.yaml', './deploy.json'];

function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class DeploymentConfigLoader implements ConfigLoader {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load, resolve and validate configuration from a file
   * @param path - Path to the configuration file (YAML or JSON)
   */
  async load(path: string): Promise<DeploymentConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      if (rawConfig === null || rawConfig === undefined) {
        return this.fromObject({});
      }
      if (!isConfigTree(rawConfig)) {
        throw new Error('Configuration root must be a mapping');
      }

      return this.fromObject(rawConfig);
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${path}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${path}: ${String(error)}`);
    }
  }

  /**
   * Build a configuration from an in-memory object, applying the same
   * substitution, environment overrides and defaults as {@link load}.
   */
  fromObject(rawConfig: ConfigTree): DeploymentConfig {
    const withEnvVars = this.resolveEnvironmentVariables(rawConfig);
    const merged = isConfigTree(withEnvVars)
      ? this.deepMerge(withEnvVars, this.environmentOverrides())
      : this.environmentOverrides();
    return validateAndNormalizeConfig(merged);
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Load the first configuration file found; fall back to defaults plus environment when none exists.
   */
  async loadFromPaths(searchPaths: string[]): Promise<DeploymentConfig> {
    const found = searchPaths.find(path => existsSync(path));
    if (found) {
      return this.load(found);
    }
    return this.fromObject({});
  }

  /**
   * Recursively resolve ${VAR_NAME} and ${VAR_NAME:-default_value} placeholders
   */
  private resolveEnvironmentVariables(value: ConfigValue): ConfigValue {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isConfigTree(value)) {
      const result: ConfigTree = {};
      for (const [key, child] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(child);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = this.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset variable without a default keeps the placeholder
      return match;
    });
  }

  /**
   * Environment variables win over file values.
   */
  private environmentOverrides(): ConfigTree {
    const env: EnvironmentOverrides = this.env;
    const overrides: ConfigTree = {};

    if (env.AWS_DEFAULT_REGION) {
      overrides.aws = { region: env.AWS_DEFAULT_REGION };
    }
    if (env.AWS_PROFILE) {
      overrides.aws = { ...(isConfigTree(overrides.aws) ? overrides.aws : {}), profile: env.AWS_PROFILE };
    }
    if (env.EMAIL_NOTIFY) {
      overrides.notifications = { email: env.EMAIL_NOTIFY };
    }
    if (env.DEPLOY_STATE_FILE) {
      overrides.state = { file: env.DEPLOY_STATE_FILE };
    }

    return overrides;
  }

  private deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
    const result: ConfigTree = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isConfigTree(value) && isConfigTree(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

export function createConfigLoader(env?: NodeJS.ProcessEnv): DeploymentConfigLoader {
  return new DeploymentConfigLoader(env);
}

/**
 * Load configuration from deploy.yml, deploy.yaml or deploy.json in the current directory
 */
export async function loadDefaultConfig(env?: NodeJS.ProcessEnv): Promise<DeploymentConfig> {
  return createConfigLoader(env).loadFromPaths(DEFAULT_CONFIG_PATHS);
}
