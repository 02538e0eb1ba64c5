import {
  APIGatewayClient,
  CreateRestApiCommand,
  CreateResourceCommand,
  PutMethodCommand,
  PutIntegrationCommand,
  CreateDeploymentCommand,
  GetRestApisCommand,
  GetRestApiCommand,
  GetResourcesCommand,
  GetStageCommand,
  DeleteRestApiCommand,
  PutMethodResponseCommand,
  PutIntegrationResponseCommand,
  type RestApi
} from '@aws-sdk/client-api-gateway';
import type { ResourceDetails, ResourceHandle } from '../types';
import { errorMessage, isAlreadyExistsError, isNotFoundError } from '../errors';
import type { GatewayInput, GatewayRoute, ProviderSettings, ProvisionTarget, ProvisioningResult, ResourceProvider } from './types';
import type { LambdaManager } from './lambda-manager';
import { partitionForRegion } from './arn';

export type InvokePermissions = Pick<LambdaManager, 'addPermission'>;

export interface APIGatewayResult extends ProvisioningResult {
  details: {
    apiId: string;
    apiUrl: string;
    stageName: string;
  };
}

const CORS_HEADERS = ['Content-Type', 'X-Amz-Date', 'Authorization'];

/**
 * REST API in front of the reader function. Every sub-step is replay-safe:
 * resources are looked up by path, and conflicts on methods count as applied.
 */
export class APIGatewayManager implements ResourceProvider<GatewayInput> {
  readonly kind = 'gateway' as const;
  private client: APIGatewayClient;
  private region: string;

  constructor(private readonly settings: ProviderSettings, private readonly lambda: InvokePermissions) {
    this.region = settings.region;
    this.client = new APIGatewayClient({ region: settings.region, profile: settings.profile });
  }

  async exists(target: ProvisionTarget<GatewayInput>): Promise<boolean> {
    const apiId = target.identifier ? this.apiIdFromArn(target.identifier) : undefined;
    if (apiId) {
      const api = await this.getApiById(apiId);
      return api !== null && api.name === target.name;
    }
    return (await this.getApiIfExists(target.name)) !== null;
  }

  async create(target: ProvisionTarget<GatewayInput>): Promise<APIGatewayResult> {
    const apiName = target.name;
    const config = target.input;

    try {
      const existingApi = await this.getApiIfExists(apiName);
      let apiId = existingApi?.id;
      let status: ProvisioningResult['status'] = 'unchanged';

      if (!apiId) {
        const apiResult = await this.client.send(new CreateRestApiCommand({
          name: apiName,
          description: `Inventory API (${config.stageName})`,
          endpointConfiguration: { types: ['REGIONAL'] },
          tags: Object.keys(config.tags).length > 0 ? config.tags : undefined
        }));
        if (!apiResult.id) {
          throw new Error('CreateRestApi returned no id');
        }
        apiId = apiResult.id;
        status = 'created';
        this.settings.reporter.info(`Created REST API ${apiName} (${apiId})`);
      }

      await this.configureApi(apiId, config);
      await this.deployApi(apiId, config.stageName);

      return this.toResult(apiId, config.stageName, existingApi ? 'updated' : status);
    } catch (error) {
      throw new Error(`Failed to create API Gateway ${apiName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Re-apply routes, CORS and the invoke permission; redeploy only when something was added
   * or the stage is missing.
   */
  async converge(target: ProvisionTarget<GatewayInput>, handle: ResourceHandle): Promise<APIGatewayResult> {
    const apiId = this.requireApiId(handle);
    const config = target.input;

    try {
      const changed = await this.configureApi(apiId, config);
      const stageExists = await this.stageExists(apiId, config.stageName);
      if (changed || !stageExists) {
        await this.deployApi(apiId, config.stageName);
        return this.toResult(apiId, config.stageName, 'updated');
      }
      return this.toResult(apiId, config.stageName, 'unchanged');
    } catch (error) {
      throw new Error(`Failed to update API Gateway ${target.name}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async describe(handle: ResourceHandle): Promise<ResourceDetails> {
    const apiId = this.requireApiId(handle);
    const api = await this.getApiById(apiId);
    if (!api) {
      throw new Error(`REST API ${handle.name} (${apiId}) does not exist`);
    }
    const stageName = handle.details?.stageName ?? 'prod';
    return this.toResult(apiId, stageName, 'unchanged').details;
  }

  async delete(handle: ResourceHandle): Promise<void> {
    const apiId = this.apiIdFromArn(handle.identifier) ?? handle.details?.apiId;
    if (!apiId) {
      return;
    }

    try {
      await this.client.send(new DeleteRestApiCommand({ restApiId: apiId }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw new Error(`Failed to delete API Gateway ${apiId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * @returns true when any resource, method or permission was newly added
   */
  private async configureApi(apiId: string, config: GatewayInput): Promise<boolean> {
    let changed = false;
    const resourceIds = await this.getResourceIds(apiId);

    for (const route of config.routes) {
      const { resourceId, created } = await this.ensureResourcePath(apiId, route.path, resourceIds);
      const routeAdded = await this.createRoute(apiId, resourceId, route, config);
      const corsAdded = config.corsOrigins.length > 0
        ? await this.configureCors(apiId, resourceId, config.corsOrigins)
        : false;
      changed = changed || created || routeAdded || corsAdded;
    }

    const permissionAdded = await this.lambda.addPermission({
      functionName: config.functionName,
      statementId: `ApiGatewayInvoke-${apiId}`,
      principal: 'apigateway.amazonaws.com',
      sourceArn: `arn:${config.partition}:execute-api:${this.region}:${config.accountId}:${apiId}/*/*`
    });

    return changed || permissionAdded;
  }

  private async ensureResourcePath(
    apiId: string,
    path: string,
    resourceIds: Map<string, string>
  ): Promise<{ resourceId: string; created: boolean }> {
    const rootId = resourceIds.get('/');
    if (!rootId) {
      throw new Error(`REST API ${apiId} has no root resource`);
    }

    let currentPath = '';
    let currentResourceId = rootId;
    let created = false;

    for (const part of path.split('/').filter(segment => segment)) {
      currentPath += `/${part}`;
      const existingId = resourceIds.get(currentPath);

      if (existingId) {
        currentResourceId = existingId;
        continue;
      }

      const resourceResult = await this.client.send(new CreateResourceCommand({
        restApiId: apiId,
        parentId: currentResourceId,
        pathPart: part
      }));
      if (!resourceResult.id) {
        throw new Error(`CreateResource returned no id for ${currentPath}`);
      }
      currentResourceId = resourceResult.id;
      resourceIds.set(currentPath, currentResourceId);
      created = true;
    }

    return { resourceId: currentResourceId, created };
  }

  private async createRoute(apiId: string, resourceId: string, route: GatewayRoute, config: GatewayInput): Promise<boolean> {
    const httpMethod = route.method.toUpperCase();

    const methodAdded = await this.ignoreConflict(() => this.client.send(new PutMethodCommand({
      restApiId: apiId,
      resourceId,
      httpMethod,
      authorizationType: 'NONE',
      requestParameters: this.pathParameters(route.path)
    })));

    await this.ignoreConflict(() => this.client.send(new PutMethodResponseCommand({
      restApiId: apiId,
      resourceId,
      httpMethod,
      statusCode: '200',
      responseParameters: {
        'method.response.header.Access-Control-Allow-Origin': false
      }
    })));

    await this.client.send(new PutIntegrationCommand({
      restApiId: apiId,
      resourceId,
      httpMethod,
      type: 'AWS_PROXY',
      integrationHttpMethod: 'POST',
      uri: this.buildIntegrationUri(config.functionArn, config.partition)
    }));

    return methodAdded;
  }

  private async configureCors(apiId: string, resourceId: string, allowOrigins: string[]): Promise<boolean> {
    const methodAdded = await this.ignoreConflict(() => this.client.send(new PutMethodCommand({
      restApiId: apiId,
      resourceId,
      httpMethod: 'OPTIONS',
      authorizationType: 'NONE'
    })));

    await this.ignoreConflict(() => this.client.send(new PutMethodResponseCommand({
      restApiId: apiId,
      resourceId,
      httpMethod: 'OPTIONS',
      statusCode: '200',
      responseParameters: {
        'method.response.header.Access-Control-Allow-Origin': false,
        'method.response.header.Access-Control-Allow-Methods': false,
        'method.response.header.Access-Control-Allow-Headers': false
      }
    })));

    await this.client.send(new PutIntegrationCommand({
      restApiId: apiId,
      resourceId,
      httpMethod: 'OPTIONS',
      type: 'MOCK',
      requestTemplates: {
        'application/json': '{"statusCode": 200}'
      }
    }));

    await this.client.send(new PutIntegrationResponseCommand({
      restApiId: apiId,
      resourceId,
      httpMethod: 'OPTIONS',
      statusCode: '200',
      responseParameters: {
        'method.response.header.Access-Control-Allow-Origin': `'${allowOrigins.join(',')}'`,
        'method.response.header.Access-Control-Allow-Methods': "'GET,OPTIONS'",
        'method.response.header.Access-Control-Allow-Headers': `'${CORS_HEADERS.join(',')}'`
      }
    }));

    return methodAdded;
  }

  private async deployApi(apiId: string, stageName: string): Promise<void> {
    await this.client.send(new CreateDeploymentCommand({
      restApiId: apiId,
      stageName,
      description: `Deployment to ${stageName}`
    }));
  }

  private async stageExists(apiId: string, stageName: string): Promise<boolean> {
    try {
      await this.client.send(new GetStageCommand({ restApiId: apiId, stageName }));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * @returns false when the call was rejected because it was already applied
   */
  private async ignoreConflict(action: () => Promise<unknown>): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return false;
      }
      throw error;
    }
  }

  private async getApiIfExists(apiName: string): Promise<RestApi | null> {
    let position: string | undefined;

    do {
      const page = await this.client.send(new GetRestApisCommand({ position, limit: 500 }));
      const match = page.items?.find(api => api.name === apiName);
      if (match) {
        return match;
      }
      position = page.position;
    } while (position);

    return null;
  }

  private async getApiById(apiId: string): Promise<RestApi | null> {
    try {
      return await this.client.send(new GetRestApiCommand({ restApiId: apiId }));
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async getResourceIds(apiId: string): Promise<Map<string, string>> {
    const resourceIds = new Map<string, string>();
    let position: string | undefined;

    do {
      const page = await this.client.send(new GetResourcesCommand({ restApiId: apiId, position, limit: 500 }));
      for (const resource of page.items ?? []) {
        if (resource.path && resource.id) {
          resourceIds.set(resource.path, resource.id);
        }
      }
      position = page.position;
    } while (position);

    return resourceIds;
  }

  private pathParameters(path: string): Record<string, boolean> | undefined {
    const names = [...path.matchAll(/\{([^}]+)\}/g)].map(match => match[1]);
    if (names.length === 0) {
      return undefined;
    }
    return Object.fromEntries(names.map(name => [`method.request.path.${name}`, true]));
  }

  private buildIntegrationUri(functionArn: string, partition: string): string {
    return `arn:${partition}:apigateway:${this.region}:lambda:path/2015-03-31/functions/${functionArn}/invocations`;
  }

  private apiArn(apiId: string): string {
    return `arn:${partitionForRegion(this.region)}:apigateway:${this.region}::/restapis/${apiId}`;
  }

  private apiIdFromArn(arn: string): string | undefined {
    const match = /\/restapis\/([^/]+)$/.exec(arn);
    return match?.[1];
  }

  private requireApiId(handle: ResourceHandle): string {
    const apiId = this.apiIdFromArn(handle.identifier) ?? handle.details?.apiId;
    if (!apiId) {
      throw new Error(`Handle for ${handle.name} carries no REST API id`);
    }
    return apiId;
  }

  private toResult(apiId: string, stageName: string, status: ProvisioningResult['status']): APIGatewayResult {
    return {
      identifier: this.apiArn(apiId),
      status,
      details: {
        apiId,
        apiUrl: `https://${apiId}.execute-api.${this.region}.amazonaws.com/${stageName}`,
        stageName
      }
    };
  }
}
