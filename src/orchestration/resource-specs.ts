import { resolve } from 'path';
import type { DeploymentConfig, FunctionSourceConfig } from '../types';
import type { FunctionInput, ResourceProviders } from '../provisioning/types';
import { ResourceNamingService } from '../config/naming';
import type { ResolvedDependencies, ResourceSpec } from './types';

export const TABLE_PARTITION_KEY = 'store';
export const TABLE_SORT_KEY = 'item';
export const CSV_SUFFIX = '.csv';

/**
 * Routes served by the reader function.
 */
export const API_ROUTES = [
  { method: 'GET', path: '/items' },
  { method: 'GET', path: '/items/{store}' }
];

function defineResource<TInput>(spec: ResourceSpec<TInput>): ResourceSpec {
  return spec;
}

/**
 * Every resource of an inventory deployment, in declaration order. The
 * declaration order only breaks ties; `dependsOn` is what orders the run.
 */
export function buildResourceSpecs(
  config: DeploymentConfig,
  providers: ResourceProviders,
  naming: ResourceNamingService = new ResourceNamingService()
): ResourceSpec[] {
  const names = (runSuffix: string) => naming.generateResourceNames(config, runSuffix);
  const tags = config.deployment.tags;

  const functionInput = (
    source: FunctionSourceConfig,
    deps: ResolvedDependencies,
    environment: Record<string, string>
  ): FunctionInput => ({
    roleArn: deps.identifier('execution-role'),
    runtime: config.functions.runtime,
    handler: source.handler,
    sourcePath: resolve(source.source),
    timeout: config.functions.timeout,
    memorySize: config.functions.memory,
    environment,
    tags
  });

  return [
    defineResource({
      key: 'uploads-bucket',
      kind: 'storage',
      dependsOn: [],
      provider: providers.storage,
      name: runSuffix => names(runSuffix).uploadsBucketName,
      input: () => ({ tags })
    }),
    defineResource({
      key: 'web-bucket',
      kind: 'storage',
      dependsOn: [],
      provider: providers.storage,
      name: runSuffix => names(runSuffix).webBucketName,
      input: () => ({ tags })
    }),
    defineResource({
      key: 'inventory-table',
      kind: 'table',
      dependsOn: [],
      provider: providers.table,
      name: runSuffix => names(runSuffix).tableName,
      input: () => ({ partitionKey: TABLE_PARTITION_KEY, sortKey: TABLE_SORT_KEY, tags })
    }),
    defineResource({
      key: 'execution-role',
      kind: 'role',
      dependsOn: [],
      provider: providers.role,
      name: runSuffix => names(runSuffix).roleName,
      input: () => ({ roleName: config.aws.role_name })
    }),
    defineResource({
      key: 'loader-function',
      kind: 'function',
      dependsOn: ['execution-role', 'inventory-table'],
      provider: providers.functions,
      name: runSuffix => names(runSuffix).loaderFunctionName,
      input: deps => functionInput(config.functions.loader, deps, {
        TABLE_NAME: deps.handle('inventory-table').name
      })
    }),
    defineResource({
      key: 'api-function',
      kind: 'function',
      dependsOn: ['execution-role', 'inventory-table'],
      provider: providers.functions,
      name: runSuffix => names(runSuffix).apiFunctionName,
      input: deps => functionInput(config.functions.api, deps, {
        TABLE_NAME: deps.handle('inventory-table').name
      })
    }),
    defineResource({
      key: 'inventory-api',
      kind: 'gateway',
      dependsOn: ['api-function', 'execution-role'],
      provider: providers.gateway,
      name: runSuffix => names(runSuffix).apiName,
      input: deps => ({
        functionArn: deps.identifier('api-function'),
        functionName: deps.handle('api-function').name,
        accountId: deps.detail('execution-role', 'accountId'),
        partition: deps.detail('execution-role', 'partition'),
        stageName: config.api.stage,
        routes: API_ROUTES,
        corsOrigins: ['*'],
        tags
      }),
      outputs: (handle): Record<string, string> => (handle.details?.apiUrl ? { apiUrl: handle.details.apiUrl } : {})
    }),
    defineResource({
      key: 'uploads-trigger',
      kind: 'trigger',
      dependsOn: ['uploads-bucket', 'loader-function'],
      provider: providers.bucketTrigger,
      name: runSuffix => `${names(runSuffix).uploadsBucketName}-csv-loader`,
      input: deps => ({
        bucketName: deps.handle('uploads-bucket').name,
        functionArn: deps.identifier('loader-function'),
        functionName: deps.handle('loader-function').name,
        suffix: CSV_SUFFIX
      })
    }),
    defineResource({
      key: 'notification-topic',
      kind: 'topic',
      dependsOn: [],
      provider: providers.topic,
      name: runSuffix => names(runSuffix).topicName,
      input: () => ({ subscriptionEmail: config.notifications.email, tags })
    }),
    defineResource({
      key: 'notify-function',
      kind: 'function',
      dependsOn: ['execution-role', 'notification-topic'],
      provider: providers.functions,
      name: runSuffix => names(runSuffix).notifyFunctionName,
      input: deps => functionInput(config.functions.notify, deps, {
        TOPIC_ARN: deps.identifier('notification-topic')
      })
    }),
    defineResource({
      key: 'stream-trigger',
      kind: 'trigger',
      dependsOn: ['notify-function', 'inventory-table'],
      provider: providers.streamTrigger,
      name: runSuffix => `${names(runSuffix).notifyFunctionName}-stream`,
      input: deps => ({
        functionName: deps.handle('notify-function').name,
        streamArn: deps.detail('inventory-table', 'streamArn'),
        batchSize: 1,
        startingPosition: 'LATEST' as const
      })
    })
  ];
}
