import Joi from 'joi';
import type { DeploymentRecord } from '../types';

const RESOURCE_KINDS = ['storage', 'table', 'function', 'gateway', 'topic', 'trigger', 'role'];
const RESOURCE_STATUSES = ['pending', 'created', 'verified', 'deleted'];
const RESOURCE_KEYS = [
  'uploads-bucket',
  'web-bucket',
  'inventory-table',
  'execution-role',
  'loader-function',
  'api-function',
  'inventory-api',
  'uploads-trigger',
  'notification-topic',
  'notify-function',
  'stream-trigger'
];

const resourceHandleSchema = Joi.object({
  kind: Joi.string().valid(...RESOURCE_KINDS).required(),
  name: Joi.string().required(),
  identifier: Joi.string().required(),
  status: Joi.string().valid(...RESOURCE_STATUSES).required(),
  details: Joi.object().pattern(Joi.string(), Joi.string().allow('')).optional()
});

export const deploymentRecordSchema = Joi.object<DeploymentRecord>({
  runSuffix: Joi.string().pattern(/^\d{8}-[0-9a-f]{8}$/).required(),
  resources: Joi.object()
    .pattern(Joi.string().valid(...RESOURCE_KEYS), resourceHandleSchema)
    .required(),
  outputs: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
  createdAt: Joi.string().isoDate().required(),
  updatedAt: Joi.string().isoDate().required()
});

/**
 * @throws Error describing every mismatch when the document is not a deployment record
 */
export function parseDeploymentRecord(document: unknown): DeploymentRecord {
  const { error, value } = deploymentRecordSchema.validate(document, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid deployment record:\n${error.details.map(detail => detail.message).join('\n')}`);
  }
  return value;
}
