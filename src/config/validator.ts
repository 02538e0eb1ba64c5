import Joi from 'joi';
import type { DeploymentConfig } from '../types';
import type { ConfigValidationResult } from './types';

const SUPPORTED_RUNTIMES = ['nodejs18.x', 'nodejs20.x', 'nodejs22.x', 'python3.10', 'python3.11', 'python3.12'];

const applicationConfigSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .min(1)
    .max(30)
    .default('inventory')
    .messages({
      'string.pattern.base': 'Application name must contain only lowercase letters, digits and hyphens (it prefixes bucket names)',
      'string.max': 'Application name must be no more than 30 characters long'
    })
}).default();

const awsConfigSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    }),
  role_name: Joi.string()
    .pattern(/^[\w+=,.@-]+$/)
    .max(64)
    .default('LabRole')
    .messages({
      'string.pattern.base': 'Role name contains characters IAM does not allow'
    })
}).default();

const tableConfigSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z0-9_.-]{3,255}$/)
    .default('Inventory')
    .messages({
      'string.pattern.base': 'Table name must be 3-255 characters of letters, digits, underscores, hyphens and dots'
    })
}).default();

function functionSourceSchema(defaults: { name: string; source: string }) {
  return Joi.object({
    name: Joi.string()
      .pattern(/^[a-zA-Z0-9-_]{1,64}$/)
      .default(defaults.name)
      .messages({
        'string.pattern.base': 'Function name must be 1-64 letters, digits, hyphens or underscores'
      }),
    source: Joi.string().default(defaults.source),
    handler: Joi.string()
      .pattern(/^[a-zA-Z0-9_./-]+\.[a-zA-Z0-9_]+$/)
      .default('lambda_function.lambda_handler')
      .messages({
        'string.pattern.base': 'Handler must be in format "file.function" (e.g., "lambda_function.lambda_handler")'
      })
  }).default();
}

const functionsConfigSchema = Joi.object({
  runtime: Joi.string()
    .valid(...SUPPORTED_RUNTIMES)
    .default('python3.11')
    .messages({
      'any.only': 'Runtime must be a supported Lambda runtime'
    }),
  timeout: Joi.number()
    .integer()
    .min(1)
    .max(900)
    .default(30)
    .messages({
      'number.min': 'Timeout must be at least 1 second',
      'number.max': 'Timeout must be no more than 900 seconds (15 minutes)'
    }),
  memory: Joi.number()
    .integer()
    .min(128)
    .max(10240)
    .default(256)
    .messages({
      'number.min': 'Memory must be at least 128 MB',
      'number.max': 'Memory must be no more than 10240 MB'
    }),
  loader: functionSourceSchema({ name: 'LoadInventoryFunction', source: 'lambdas/load_inventory/lambda_function.py' }),
  api: functionSourceSchema({ name: 'GetInventoryApiFunction', source: 'lambdas/get_inventory_api/lambda_function.py' }),
  notify: functionSourceSchema({ name: 'NotifyLowStockFunction', source: 'lambdas/notify_low_stock/lambda_function.py' })
}).default();

const apiConfigSchema = Joi.object({
  name: Joi.string().min(1).max(128).default('InventoryAPI'),
  stage: Joi.string()
    .pattern(/^[a-zA-Z0-9_]+$/)
    .default('prod')
    .messages({
      'string.pattern.base': 'Stage name must contain only letters, digits and underscores'
    })
}).default();

const notificationsConfigSchema = Joi.object({
  email: Joi.string()
    .email({ tlds: { allow: false } })
    .optional()
    .messages({
      'string.email': 'Notification email must be a valid e-mail address'
    }),
  topic_prefix: Joi.string()
    .pattern(/^[a-zA-Z0-9_-]+$/)
    .default('NoStock')
}).default();

const deploymentConfigSchema = Joi.object<DeploymentConfig>({
  application: applicationConfigSchema,
  aws: awsConfigSchema,
  table: tableConfigSchema,
  functions: functionsConfigSchema,
  api: apiConfigSchema,
  notifications: notificationsConfigSchema,
  site: Joi.object({
    index_file: Joi.string().default('web/index.html')
  }).default(),
  data: Joi.object({
    dir: Joi.string().default('data'),
    seed: Joi.boolean().default(true)
  }).default(),
  state: Joi.object({
    file: Joi.string().default('.inventory-deploy/state.json')
  }).default(),
  propagation: Joi.object({
    timeout_seconds: Joi.number().min(0).max(900).default(60),
    interval_seconds: Joi.number().min(0).max(60).default(2)
  }).default(),
  deployment: Joi.object({
    tags: Joi.object()
      .pattern(Joi.string(), Joi.string())
      .default({})
      .messages({
        'object.pattern.match': 'Tags must be key-value pairs of strings'
      })
  }).default()
}).unknown(false);

const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates a deployment configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = deploymentConfigSchema.validate(config ?? {}, VALIDATION_OPTIONS);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a deployment configuration and returns it with every default applied.
 * @throws Error listing every validation failure
 */
export function validateAndNormalizeConfig(config: unknown): DeploymentConfig {
  const { error, value } = deploymentConfigSchema.validate(config ?? {}, VALIDATION_OPTIONS);

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<DeploymentConfig> {
  return deploymentConfigSchema;
}
