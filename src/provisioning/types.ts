import type { ResourceDetails, ResourceHandle, ResourceKind } from '../types';
import type { DeploymentReporter } from '../logging';

// Provisioning-specific types

/**
 * What a provider is asked to reconcile: the deterministic physical name, the
 * inputs resolved from dependencies, and the identifier recorded by an earlier run.
 */
export interface ProvisionTarget<TInput> {
  name: string;
  input: TInput;
  identifier?: string;
}

export interface ProvisioningResult {
  identifier: string;
  status: 'created' | 'updated' | 'unchanged';
  details?: ResourceDetails;
}

/**
 * Capability set every resource adapter offers.
 *
 * `create` must tolerate the resource already existing and fall through to its
 * update path. `delete` must treat a missing resource as success.
 */
export interface ResourceProvider<TInput> {
  readonly kind: ResourceKind;
  exists(target: ProvisionTarget<TInput>): Promise<boolean>;
  create(target: ProvisionTarget<TInput>): Promise<ProvisioningResult>;
  describe(handle: ResourceHandle): Promise<ResourceDetails>;
  delete(handle: ResourceHandle): Promise<void>;
  /**
   * Re-apply idempotent settings to a resource that was verified to exist.
   * `handle` is the handle as recorded by the previous run.
   */
  converge?(target: ProvisionTarget<TInput>, handle: ResourceHandle): Promise<ProvisioningResult>;
}

/**
 * Settings every AWS adapter is constructed with, instead of reading process-wide state.
 */
export interface ProviderSettings {
  region: string;
  profile?: string;
  propagationTimeoutMs: number;
  propagationIntervalMs: number;
  reporter: DeploymentReporter;
}

export interface BucketInput {
  tags: Record<string, string>;
}

export interface TableInput {
  partitionKey: string;
  sortKey: string;
  tags: Record<string, string>;
}

export interface RoleInput {
  roleName: string;
}

export interface FunctionInput {
  roleArn: string;
  runtime: string;
  handler: string;
  sourcePath: string;
  timeout: number;
  memorySize: number;
  environment: Record<string, string>;
  tags: Record<string, string>;
}

export interface GatewayRoute {
  method: string;
  path: string;
}

export interface GatewayInput {
  functionArn: string;
  functionName: string;
  accountId: string;
  partition: string;
  stageName: string;
  routes: GatewayRoute[];
  corsOrigins: string[];
  tags: Record<string, string>;
}

export interface TopicInput {
  subscriptionEmail?: string;
  tags: Record<string, string>;
}

export interface BucketTriggerInput {
  bucketName: string;
  functionArn: string;
  functionName: string;
  suffix: string;
}

export interface StreamTriggerInput {
  functionName: string;
  streamArn: string;
  batchSize: number;
  startingPosition: 'LATEST' | 'TRIM_HORIZON';
}

export interface UploadResult {
  key: string;
  etag: string;
  url: string;
}

/**
 * Bucket adapter plus the idempotent follow-up operations the pipeline tasks use.
 */
export interface StorageProvider extends ResourceProvider<BucketInput> {
  publishWebsite(bucketName: string, indexDocument: string, body: string): Promise<string>;
  uploadFile(bucketName: string, key: string, filePath: string): Promise<UploadResult>;
  waitForFunctionNotification(bucketName: string, functionArn: string): Promise<void>;
}

/**
 * The full set of adapters one deployment drives.
 */
export interface ResourceProviders {
  storage: StorageProvider;
  table: ResourceProvider<TableInput>;
  role: ResourceProvider<RoleInput>;
  functions: ResourceProvider<FunctionInput>;
  gateway: ResourceProvider<GatewayInput>;
  topic: ResourceProvider<TopicInput>;
  bucketTrigger: ResourceProvider<BucketTriggerInput>;
  streamTrigger: ResourceProvider<StreamTriggerInput>;
}
