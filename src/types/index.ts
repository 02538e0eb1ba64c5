// Core type definitions for the inventory deployer

export interface ApplicationConfig {
  name: string;
}

export interface AWSConfig {
  region: string;
  profile?: string;
  role_name: string;
}

export interface TableConfig {
  name: string;
}

export interface FunctionSourceConfig {
  name: string;
  source: string;
  handler: string;
}

export interface FunctionsConfig {
  runtime: string;
  timeout: number;
  memory: number;
  loader: FunctionSourceConfig;
  api: FunctionSourceConfig;
  notify: FunctionSourceConfig;
}

export interface ApiConfig {
  name: string;
  stage: string;
}

export interface NotificationsConfig {
  email?: string;
  topic_prefix: string;
}

export interface SiteConfig {
  index_file: string;
}

export interface DataConfig {
  dir: string;
  seed: boolean;
}

export interface StateConfig {
  file: string;
}

export interface PropagationConfig {
  timeout_seconds: number;
  interval_seconds: number;
}

export interface DeploymentSettings {
  tags: Record<string, string>;
}

export interface DeploymentConfig {
  application: ApplicationConfig;
  aws: AWSConfig;
  table: TableConfig;
  functions: FunctionsConfig;
  api: ApiConfig;
  notifications: NotificationsConfig;
  site: SiteConfig;
  data: DataConfig;
  state: StateConfig;
  propagation: PropagationConfig;
  deployment: DeploymentSettings;
}

export type ResourceKind = 'storage' | 'table' | 'function' | 'gateway' | 'topic' | 'trigger' | 'role';

export type ResourceStatus = 'pending' | 'created' | 'verified' | 'deleted';

export type ResourceKey =
  | 'uploads-bucket'
  | 'web-bucket'
  | 'inventory-table'
  | 'execution-role'
  | 'loader-function'
  | 'api-function'
  | 'inventory-api'
  | 'uploads-trigger'
  | 'notification-topic'
  | 'notify-function'
  | 'stream-trigger';

export type ResourceDetails = Record<string, string>;

export interface ResourceHandle {
  kind: ResourceKind;
  name: string;
  identifier: string;
  status: ResourceStatus;
  details?: ResourceDetails;
}

export interface DeploymentRecord {
  runSuffix: string;
  resources: Partial<Record<ResourceKey, ResourceHandle>>;
  outputs: Record<string, string>;
  createdAt: string;
  updatedAt: string;
}

export type StepOutcome = 'created' | 'updated' | 'verified' | 'skipped' | 'deleted' | 'absent' | 'failed';

export interface StepResult {
  step: string;
  outcome: StepOutcome;
  identifier?: string;
  message?: string;
}

export interface DeploymentError {
  code: string;
  message: string;
  resource?: string;
  remediation?: string;
}

export interface DeploymentMetadata {
  runSuffix?: string;
  timestamp: Date;
  duration?: number;
  region: string;
}

export interface DeploymentResult {
  success: boolean;
  steps: StepResult[];
  outputs: Record<string, string>;
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}
